// src/services/conversationHistory.ts
import { QueryFn } from '../config/database';
import { HISTORY_WINDOW, MAX_STORED_MESSAGES } from '../config/memory';
import { ChatRole, ConversationMessage } from '../types';
import { Logger, logger as defaultLogger } from '../utils/logger';
import { BaseService } from './database/BaseService';

/**
 * Sliding window of the conversation between an agent and a lead.
 * History comes back oldest first, ready to be sent to the model.
 */
export interface ConversationStore {
  getHistory(agentId: string, leadId: string, limit?: number): Promise<ConversationMessage[]>;
  append(agentId: string, leadId: string, role: ChatRole, content: string): Promise<void>;
  clear(agentId: string, leadId: string): Promise<void>;
}

export class PostgresConversationStore extends BaseService implements ConversationStore {
  constructor(loggerInstance: Logger = defaultLogger, runQuery?: QueryFn) {
    super(loggerInstance, runQuery);
  }

  async getHistory(agentId: string, leadId: string, limit: number = HISTORY_WINDOW): Promise<ConversationMessage[]> {
    const rows = await this.executeQuery<{ role: ChatRole; content: string }>(
      `SELECT role, content
       FROM conversation_messages
       WHERE agent_id = $1 AND lead_id = $2
       ORDER BY created_at DESC, id DESC
       LIMIT $3`,
      [agentId, leadId, limit]
    );

    // Return in chronological order (oldest first) for proper context
    return rows.reverse().map(row => ({ role: row.role, content: row.content }));
  }

  /**
   * Saves a message and trims the thread to MAX_STORED_MESSAGES.
   */
  async append(agentId: string, leadId: string, role: ChatRole, content: string): Promise<void> {
    await this.executeCommand(
      `INSERT INTO conversation_messages (agent_id, lead_id, role, content)
       VALUES ($1, $2, $3, $4)`,
      [agentId, leadId, role, content]
    );

    await this.executeCommand(
      `DELETE FROM conversation_messages
       WHERE id IN (
         SELECT id FROM conversation_messages
         WHERE agent_id = $1 AND lead_id = $2
         ORDER BY created_at DESC, id DESC
         OFFSET $3
       )`,
      [agentId, leadId, MAX_STORED_MESSAGES]
    );

    this.logger.debug(`Saved ${role} message for ${agentId}:${leadId}`);
  }

  async clear(agentId: string, leadId: string): Promise<void> {
    await this.executeCommand(
      'DELETE FROM conversation_messages WHERE agent_id = $1 AND lead_id = $2',
      [agentId, leadId]
    );
    this.logger.info(`Cleared conversation history for ${agentId}:${leadId}`);
  }
}

export class InMemoryConversationStore implements ConversationStore {
  private threads = new Map<string, ConversationMessage[]>();

  async getHistory(agentId: string, leadId: string, limit: number = HISTORY_WINDOW): Promise<ConversationMessage[]> {
    const thread = this.threads.get(this.threadKey(agentId, leadId)) ?? [];
    return thread.slice(-limit).map(message => ({ ...message }));
  }

  async append(agentId: string, leadId: string, role: ChatRole, content: string): Promise<void> {
    const key = this.threadKey(agentId, leadId);
    const thread = this.threads.get(key) ?? [];
    thread.push({ role, content });
    this.threads.set(key, thread.slice(-MAX_STORED_MESSAGES));
  }

  async clear(agentId: string, leadId: string): Promise<void> {
    this.threads.delete(this.threadKey(agentId, leadId));
  }

  private threadKey(agentId: string, leadId: string): string {
    return `${agentId}:${leadId}`;
  }
}

/**
 * Estimate token count for messages (rough approximation)
 * 1 token ≈ 4 characters for English text
 */
export function estimateTokens(messages: ConversationMessage[]): number {
  const totalChars = messages.reduce((sum, msg) => sum + msg.content.length, 0);
  return Math.ceil(totalChars / 4);
}
