import { QueryFn } from '../../config/database';
import { TEXT_SEARCH_LANGUAGE, TextSearchLanguage } from '../../config/environment';
import { MemoryMetadata, MemoryQuery, MemoryRecord, MemoryWrite, SearchResult } from '../../types/memory';
import { Logger, logger as defaultLogger } from '../../utils/logger';
import { BaseService } from '../database/BaseService';
import { MemoryRepository } from './MemoryRepository';

interface MemoryRow {
  id: string;
  agent_id: string;
  lead_id: string | null;
  key: string;
  value: string;
  relevance_score: number;
  metadata: MemoryMetadata | null;
  created_at: Date;
  updated_at: Date;
  expires_at: Date | null;
}

interface SearchRow extends MemoryRow {
  rank: number;
}

const MEMORY_COLUMNS = 'id, agent_id, lead_id, key, value, relevance_score, metadata, created_at, updated_at, expires_at';

/**
 * Escapes LIKE wildcards so the query text is matched literally.
 */
export function escapeLikePattern(text: string): string {
  return text.replace(/[\\%_]/g, '\\$&');
}

export class PostgresMemoryRepository extends BaseService implements MemoryRepository {
  private readonly language: TextSearchLanguage;

  constructor(
    loggerInstance: Logger = defaultLogger,
    runQuery?: QueryFn,
    language: TextSearchLanguage = TEXT_SEARCH_LANGUAGE
  ) {
    super(loggerInstance, runQuery);
    this.language = language;
  }

  async upsert(write: MemoryWrite): Promise<MemoryRecord> {
    // updated_at is also maintained by the agent_memories_updated_at trigger
    const row = await this.executeSingleQuery<MemoryRow>(
      `INSERT INTO agent_memories (agent_id, lead_id, key, value, relevance_score, metadata, expires_at)
       VALUES ($1, $2, $3, $4, $5, $6::jsonb, $7)
       ON CONFLICT (agent_id, key) DO UPDATE SET
         lead_id = COALESCE(EXCLUDED.lead_id, agent_memories.lead_id),
         value = EXCLUDED.value,
         relevance_score = EXCLUDED.relevance_score,
         metadata = EXCLUDED.metadata,
         expires_at = EXCLUDED.expires_at,
         updated_at = NOW()
       RETURNING ${MEMORY_COLUMNS}`,
      [
        write.agentId,
        write.leadId,
        write.key,
        write.value,
        write.relevanceScore,
        JSON.stringify(write.metadata),
        write.expiresAt
      ]
    );

    if (!row) {
      throw new Error(`Upsert of memory "${write.key}" returned no row`);
    }
    return this.mapRow(row);
  }

  async search(query: MemoryQuery): Promise<SearchResult[]> {
    // The language comes from a closed set, so it is inlined to keep the GIN index usable
    const document = `to_tsvector('${this.language}', immutable_unaccent(m.key || ' ' || m.value))`;
    const params: unknown[] = [query.agentId, query.text, query.minRelevance, query.limit, escapeLikePattern(query.text)];

    // A null scope compares lead_id = NULL, which keeps agent-wide memories only
    let leadFilter = '';
    if (query.leadScope !== undefined) {
      params.push(query.leadScope);
      leadFilter = `AND (m.lead_id IS NULL OR m.lead_id = $${params.length})`;
    }

    const rows = await this.executeQuery<SearchRow>(
      `WITH q AS (
         SELECT plainto_tsquery('${this.language}', immutable_unaccent($2)) AS tsq,
                '%' || immutable_unaccent($5) || '%' AS pattern
       )
       SELECT ${MEMORY_COLUMNS.split(', ').map(column => `m.${column}`).join(', ')},
              ts_rank(${document}, q.tsq) AS rank
       FROM agent_memories m, q
       WHERE m.agent_id = $1
         AND m.relevance_score >= $3
         ${leadFilter}
         AND (
           ${document} @@ q.tsq
           OR immutable_unaccent(m.key) ILIKE q.pattern
           OR immutable_unaccent(m.value) ILIKE q.pattern
         )
       ORDER BY rank DESC, m.relevance_score DESC, m.created_at DESC, m.insertion_seq ASC
       LIMIT $4`,
      params
    );

    return rows.map(row => ({ ...this.mapRow(row), rank: Number(row.rank) }));
  }

  async get(agentId: string, key: string): Promise<MemoryRecord | null> {
    const row = await this.executeSingleQuery<MemoryRow>(
      `SELECT ${MEMORY_COLUMNS} FROM agent_memories WHERE agent_id = $1 AND key = $2`,
      [agentId, key]
    );
    return row ? this.mapRow(row) : null;
  }

  async list(agentId: string, limit: number): Promise<MemoryRecord[]> {
    const rows = await this.executeQuery<MemoryRow>(
      `SELECT ${MEMORY_COLUMNS}
       FROM agent_memories
       WHERE agent_id = $1
       ORDER BY updated_at DESC, insertion_seq DESC
       LIMIT $2`,
      [agentId, limit]
    );
    return rows.map(row => this.mapRow(row));
  }

  async delete(agentId: string, key: string): Promise<boolean> {
    const deleted = await this.executeCommand(
      'DELETE FROM agent_memories WHERE agent_id = $1 AND key = $2',
      [agentId, key]
    );
    return deleted > 0;
  }

  async purgeExpired(): Promise<number> {
    return this.executeCommand(
      'DELETE FROM agent_memories WHERE expires_at IS NOT NULL AND expires_at < NOW()'
    );
  }

  private mapRow(row: MemoryRow): MemoryRecord {
    return {
      id: row.id,
      agent_id: row.agent_id,
      lead_id: row.lead_id,
      key: row.key,
      value: row.value,
      relevance_score: Number(row.relevance_score),
      metadata: row.metadata ?? {},
      created_at: new Date(row.created_at),
      updated_at: new Date(row.updated_at),
      expires_at: row.expires_at ? new Date(row.expires_at) : null
    };
  }
}
