import {
  DEFAULT_LIST_LIMIT,
  DEFAULT_MIN_RELEVANCE,
  DEFAULT_RELEVANCE_SCORE,
  DEFAULT_SEARCH_LIMIT
} from '../../config/memory';
import { ValidationError } from '../../core/errors';
import {
  MemoryMetadata,
  MemoryRecord,
  SearchMemoryOptions,
  SearchResult,
  UpsertMemoryInput
} from '../../types/memory';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { MemoryRepository } from './MemoryRepository';

function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`Missing required field: ${field}`);
  }
  return value.trim();
}

function isPlainObject(value: unknown): value is MemoryMetadata {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

export class MemoryService {
  constructor(
    private repository: MemoryRepository,
    private logger: Logger = defaultLogger
  ) {}

  /**
   * Insert or replace the memory stored under (agentId, key).
   */
  async upsert(input: UpsertMemoryInput): Promise<MemoryRecord> {
    const agentId = requireText(input.agentId, 'agent_id');
    const key = requireText(input.key, 'key');

    if (typeof input.value !== 'string') {
      throw new ValidationError('Field value must be a string');
    }

    const relevanceScore = input.relevanceScore ?? DEFAULT_RELEVANCE_SCORE;
    if (typeof relevanceScore !== 'number' || !Number.isFinite(relevanceScore)) {
      throw new ValidationError('Field relevance_score must be a finite number');
    }

    const expiresAt = input.expiresAt ?? null;
    if (expiresAt !== null && (!(expiresAt instanceof Date) || Number.isNaN(expiresAt.getTime()))) {
      throw new ValidationError('Field expires_at must be a valid date');
    }

    const metadata = input.metadata ?? {};
    if (!isPlainObject(metadata)) {
      throw new ValidationError('Field metadata must be an object');
    }

    const leadId = input.leadId == null || input.leadId.trim() === '' ? null : input.leadId.trim();

    const memory = await this.repository.upsert({
      agentId,
      key,
      value: input.value,
      leadId,
      relevanceScore,
      expiresAt,
      metadata
    });

    this.logger.debug(`[MemoryService] Upserted memory "${key}" for agent ${agentId}`);
    return memory;
  }

  /**
   * Ranked retrieval by free text. Returns an empty list when nothing matches.
   */
  async search(agentId: string, queryText: string, options: SearchMemoryOptions = {}): Promise<SearchResult[]> {
    const scopedAgentId = requireText(agentId, 'agent_id');

    if (typeof queryText !== 'string') {
      throw new ValidationError('Query text must be a string');
    }

    const minRelevance = options.minRelevance ?? DEFAULT_MIN_RELEVANCE;
    if (typeof minRelevance !== 'number' || !Number.isFinite(minRelevance)) {
      throw new ValidationError('min_relevance must be a finite number');
    }

    const limit = this.validateLimit(options.limit ?? DEFAULT_SEARCH_LIMIT);

    // A blank lead counts as none, as on upsert
    const leadScope = typeof options.leadScope === 'string' ? options.leadScope.trim() || null : options.leadScope;

    const results = await this.repository.search({
      agentId: scopedAgentId,
      text: queryText,
      minRelevance,
      limit,
      leadScope
    });

    this.logger.debug(`[MemoryService] Search "${queryText}" for agent ${scopedAgentId} returned ${results.length} memories`);
    return results;
  }

  async get(agentId: string, key: string): Promise<MemoryRecord | null> {
    return this.repository.get(requireText(agentId, 'agent_id'), requireText(key, 'key'));
  }

  async list(agentId: string, limit: number = DEFAULT_LIST_LIMIT): Promise<MemoryRecord[]> {
    return this.repository.list(requireText(agentId, 'agent_id'), this.validateLimit(limit));
  }

  async delete(agentId: string, key: string): Promise<boolean> {
    const scopedAgentId = requireText(agentId, 'agent_id');
    const scopedKey = requireText(key, 'key');
    const deleted = await this.repository.delete(scopedAgentId, scopedKey);
    if (deleted) {
      this.logger.info(`[MemoryService] Deleted memory "${scopedKey}" for agent ${scopedAgentId}`);
    }
    return deleted;
  }

  /**
   * Physically deletes every memory whose expires_at has passed.
   */
  async purgeExpired(): Promise<number> {
    const deleted = await this.repository.purgeExpired();
    this.logger.info(`[MemoryService] Purged ${deleted} expired memories`);
    return deleted;
  }

  private validateLimit(limit: number): number {
    if (typeof limit !== 'number' || !Number.isInteger(limit) || limit < 1) {
      throw new ValidationError('limit must be an integer greater than or equal to 1');
    }
    return limit;
  }
}
