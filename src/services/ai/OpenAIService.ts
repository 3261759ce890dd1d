import OpenAI from 'openai';
import { DEFAULT_MODEL, openai } from '../../config/openai';
import { ConversationMessage } from '../../types';
import { Logger, logger as defaultLogger } from '../../utils/logger';

export interface CompletionRequest {
  messages: ConversationMessage[];
  temperature?: number;
  maxTokens?: number;
  model?: string;
  jsonResponse?: boolean;
}

export interface CompletionResult {
  content: string;
  model: string;
  totalTokens?: number;
}

/**
 * The slice of a chat-completion provider the rest of the app depends on.
 */
export interface ChatModel {
  createCompletion(request: CompletionRequest): Promise<CompletionResult>;
}

/**
 * Narrow view of the OpenAI client, so tests can hand in a stub.
 */
export interface ChatCompletionClient {
  chat: {
    completions: {
      create(body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming): Promise<{
        model: string;
        choices: Array<{ message?: { content?: string | null } }>;
        usage?: { total_tokens: number };
      }>;
    };
  };
}

function toApiMessage(message: ConversationMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAIService implements ChatModel {
  constructor(
    private logger: Logger = defaultLogger,
    private client: ChatCompletionClient = openai
  ) {}

  /**
   * Newer models (gpt-5.x, o-series) take max_completion_tokens instead of max_tokens
   */
  static requiresMaxCompletionTokens(model: string): boolean {
    return ['gpt-5', 'o1', 'o3', 'o4'].some(prefix => model.startsWith(prefix));
  }

  async createCompletion(request: CompletionRequest): Promise<CompletionResult> {
    const startTime = Date.now();
    const model = request.model || DEFAULT_MODEL;

    const apiRequest: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming = {
      model,
      messages: request.messages.map(toApiMessage)
    };

    if (request.temperature !== undefined) {
      apiRequest.temperature = request.temperature;
    }
    if (request.maxTokens !== undefined) {
      if (OpenAIService.requiresMaxCompletionTokens(model)) {
        apiRequest.max_completion_tokens = request.maxTokens;
      } else {
        apiRequest.max_tokens = request.maxTokens;
      }
    }
    if (request.jsonResponse) {
      apiRequest.response_format = { type: 'json_object' };
    }

    try {
      const completion = await this.client.chat.completions.create(apiRequest);
      const content = completion.choices[0]?.message?.content?.trim() || '';

      this.logger.debug(`OpenAI completion (${model}) finished in ${Date.now() - startTime}ms`, {
        totalTokens: completion.usage?.total_tokens
      });

      return { content, model: completion.model || model, totalTokens: completion.usage?.total_tokens };
    } catch (error) {
      this.logger.error('Error creating completion:', error);
      throw new Error(`Error creating completion: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }
}
