import { randomUUID } from 'crypto';
import { TEXT_SEARCH_LANGUAGE, TextSearchLanguage } from '../../config/environment';
import { NotFoundError } from '../../core/errors';
import { MemoryQuery, MemoryRecord, MemoryWrite, SearchResult } from '../../types/memory';
import { MemoryRepository } from './MemoryRepository';
import { compareRanked, scoreMemory } from './textSearch';

interface StoredMemory {
  record: MemoryRecord;
  sequence: number;
}

export interface InMemoryMemoryRepositoryOptions {
  now?: () => Date;
  language?: TextSearchLanguage;
  /**
   * When set, writes for agents outside this set fail with NotFoundError.
   * Leave undefined to accept any agent id.
   */
  agentIds?: Iterable<string>;
}

/**
 * Process-local memory store. Each operation runs to completion without awaiting,
 * so writes to the same (agent, key) are serialized by the event loop.
 */
export class InMemoryMemoryRepository implements MemoryRepository {
  private memories = new Map<string, StoredMemory>();
  private readonly agents: Set<string> | undefined;
  private sequence = 0;
  private readonly now: () => Date;
  private readonly language: TextSearchLanguage;

  constructor(options: InMemoryMemoryRepositoryOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.language = options.language ?? TEXT_SEARCH_LANGUAGE;
    this.agents = options.agentIds ? new Set(options.agentIds) : undefined;
  }

  /**
   * Removes an agent and, like the foreign key's ON DELETE CASCADE, all its memories.
   */
  removeAgent(agentId: string): number {
    this.agents?.delete(agentId);
    let removed = 0;
    for (const [storageKey, stored] of this.memories) {
      if (stored.record.agent_id === agentId) {
        this.memories.delete(storageKey);
        removed++;
      }
    }
    return removed;
  }

  async upsert(write: MemoryWrite): Promise<MemoryRecord> {
    if (this.agents && !this.agents.has(write.agentId)) {
      throw new NotFoundError(`Agent ${write.agentId} not found`);
    }

    const storageKey = this.storageKey(write.agentId, write.key);
    const timestamp = this.now();
    const existing = this.memories.get(storageKey);

    const record: MemoryRecord = existing
      ? {
          ...existing.record,
          lead_id: write.leadId ?? existing.record.lead_id,
          value: write.value,
          relevance_score: write.relevanceScore,
          metadata: structuredClone(write.metadata),
          expires_at: write.expiresAt,
          updated_at: timestamp
        }
      : {
          id: randomUUID(),
          agent_id: write.agentId,
          lead_id: write.leadId,
          key: write.key,
          value: write.value,
          relevance_score: write.relevanceScore,
          metadata: structuredClone(write.metadata),
          created_at: timestamp,
          updated_at: timestamp,
          expires_at: write.expiresAt
        };

    this.memories.set(storageKey, {
      record,
      sequence: existing ? existing.sequence : this.sequence++
    });

    return this.copy(record);
  }

  async search(query: MemoryQuery): Promise<SearchResult[]> {
    const candidates: Array<SearchResult & { sequence: number }> = [];

    for (const { record, sequence } of this.memories.values()) {
      if (record.agent_id !== query.agentId || record.relevance_score < query.minRelevance) {
        continue;
      }
      if (query.leadScope !== undefined && record.lead_id !== null && record.lead_id !== query.leadScope) {
        continue;
      }
      const score = scoreMemory(record, query.text, this.language);
      if (score.matched) {
        candidates.push({ ...this.copy(record), rank: score.rank, sequence });
      }
    }

    return candidates
      .sort(compareRanked)
      .slice(0, query.limit)
      .map(({ sequence: _sequence, ...result }) => result);
  }

  async get(agentId: string, key: string): Promise<MemoryRecord | null> {
    const stored = this.memories.get(this.storageKey(agentId, key));
    return stored ? this.copy(stored.record) : null;
  }

  async list(agentId: string, limit: number): Promise<MemoryRecord[]> {
    return [...this.memories.values()]
      .filter(stored => stored.record.agent_id === agentId)
      .sort((a, b) => b.record.updated_at.getTime() - a.record.updated_at.getTime() || b.sequence - a.sequence)
      .slice(0, limit)
      .map(stored => this.copy(stored.record));
  }

  async delete(agentId: string, key: string): Promise<boolean> {
    return this.memories.delete(this.storageKey(agentId, key));
  }

  async purgeExpired(): Promise<number> {
    const cutoff = this.now().getTime();
    let deleted = 0;
    for (const [storageKey, { record }] of this.memories) {
      if (record.expires_at !== null && record.expires_at.getTime() < cutoff) {
        this.memories.delete(storageKey);
        deleted++;
      }
    }
    return deleted;
  }

  size(): number {
    return this.memories.size;
  }

  private storageKey(agentId: string, key: string): string {
    return JSON.stringify([agentId, key]);
  }

  private copy(record: MemoryRecord): MemoryRecord {
    return structuredClone(record);
  }
}
