import { MEMORY_EXTRACTION_ENABLED } from '../../config/environment';
import { EXTRACTION_MODEL } from '../../config/openai';
import { HISTORY_WINDOW, MAX_EXTRACTED_FACTS } from '../../config/memory';
import { SystemPrompts } from '../../config/system-prompts';
import { ValidationError } from '../../core/errors';
import { ChatReply, ChatRequest, ConversationMessage } from '../../types';
import { AgentProfile } from '../../types/agent';
import { SearchResult } from '../../types/memory';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { ChatModel } from '../ai/OpenAIService';
import { ConversationStore, estimateTokens } from '../conversationHistory';
import { AgentDirectory } from '../database/AgentService';
import { MemoryService } from '../memory/MemoryService';
import { parseExtractedFacts } from './factExtraction';

/**
 * Keys are unique per agent, so facts about a lead are stored under a lead-scoped key.
 */
export function leadMemoryKey(leadId: string, key: string): string {
  return `${leadId}:${key}`;
}

export interface ChatServiceDependencies {
  agents: AgentDirectory;
  memories: MemoryService;
  conversations: ConversationStore;
  model: ChatModel;
  logger?: Logger;
  extractionEnabled?: boolean;
  now?: () => Date;
}

export class ChatService {
  private agents: AgentDirectory;
  private memories: MemoryService;
  private conversations: ConversationStore;
  private model: ChatModel;
  private logger: Logger;
  private extractionEnabled: boolean;
  private now: () => Date;

  constructor(deps: ChatServiceDependencies) {
    this.agents = deps.agents;
    this.memories = deps.memories;
    this.conversations = deps.conversations;
    this.model = deps.model;
    this.logger = deps.logger ?? defaultLogger;
    this.extractionEnabled = deps.extractionEnabled ?? MEMORY_EXTRACTION_ENABLED;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Answers a message as the given agent, using what it remembers about the lead.
   */
  async processMessage(request: ChatRequest): Promise<ChatReply> {
    const message = request.message.trim();
    if (!message) {
      throw new ValidationError('Missing required field: message');
    }
    const leadId = request.leadId?.trim() || null;

    const agent = await this.agents.getAgent(request.agentId);
    this.logger.info(`💬 [ChatService] ${agent.name} <- ${leadId ?? 'anonymous'}: "${message}"`);

    const relevantMemories = await this.recallMemories(agent.id, leadId, message);
    const history = leadId ? await this.conversations.getHistory(agent.id, leadId, HISTORY_WINDOW) : [];

    const messages: ConversationMessage[] = [
      { role: 'system', content: SystemPrompts.getAgentPrompt(agent, relevantMemories.map(memory => ({
        key: leadId ? memory.key.replace(leadMemoryKey(leadId, ''), '') : memory.key,
        value: memory.value
      }))) },
      ...history,
      { role: 'user', content: message }
    ];

    this.logger.debug(`[ChatService] Sending ${messages.length} messages (~${estimateTokens(messages)} tokens)`);

    const completion = await this.model.createCompletion({
      messages,
      model: agent.configuration.model,
      temperature: agent.configuration.temperature,
      maxTokens: agent.configuration.max_tokens
    });
    const response = completion.content;

    if (leadId) {
      await this.conversations.append(agent.id, leadId, 'user', message);
      await this.conversations.append(agent.id, leadId, 'assistant', response);

      if (this.extractionEnabled) {
        await this.rememberFacts(agent, leadId, message, response);
      }
    }

    return {
      response,
      suggested_actions: [],
      context: {
        conversation_length: history.length + 2,
        agent_name: agent.name,
        personality: agent.personality,
        memories_used: relevantMemories.length
      }
    };
  }

  /**
   * Agent-wide memories plus the ones recorded for this lead; other leads' facts stay out of the prompt.
   */
  private async recallMemories(agentId: string, leadId: string | null, message: string): Promise<SearchResult[]> {
    try {
      return await this.memories.search(agentId, message, { leadScope: leadId });
    } catch (error) {
      // A reply without recalled facts is still a reply
      this.logger.warn('[ChatService] Memory search failed, answering without memories:', error);
      return [];
    }
  }

  /**
   * Asks the model for durable facts in the exchange and stores them for the lead.
   * Returns how many facts were stored.
   */
  async rememberFacts(agent: AgentProfile, leadId: string, userMessage: string, reply: string): Promise<number> {
    try {
      const extraction = await this.model.createCompletion({
        messages: [
          { role: 'system', content: SystemPrompts.getFactExtractionPrompt(MAX_EXTRACTED_FACTS) },
          { role: 'user', content: `Customer: ${userMessage}\nAssistant: ${reply}` }
        ],
        model: EXTRACTION_MODEL,
        temperature: 0,
        maxTokens: 300,
        jsonResponse: true
      });

      const facts = parseExtractedFacts(extraction.content, this.now());
      for (const fact of facts) {
        await this.memories.upsert({
          agentId: agent.id,
          leadId,
          key: leadMemoryKey(leadId, fact.key),
          value: fact.value,
          relevanceScore: fact.relevanceScore,
          expiresAt: fact.expiresAt,
          metadata: { source: 'conversation' }
        });
      }

      if (facts.length > 0) {
        this.logger.info(`🧠 [ChatService] Stored ${facts.length} memories for ${agent.id}:${leadId}`);
      }
      return facts.length;
    } catch (error) {
      this.logger.error('[ChatService] Fact extraction failed:', error);
      return 0;
    }
  }
}
