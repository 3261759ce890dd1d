import { MemoryQuery, MemoryRecord, MemoryWrite, SearchResult } from '../../types/memory';

/**
 * Storage contract for agent memories. Every implementation must:
 * - resolve (agent_id, key) conflicts inside a single write
 * - set updated_at in that same write, leaving created_at untouched on conflict
 * - scope every read to the given agent
 * - throw NotFoundError when the owning agent does not exist
 */
export interface MemoryRepository {
  upsert(write: MemoryWrite): Promise<MemoryRecord>;
  search(query: MemoryQuery): Promise<SearchResult[]>;
  get(agentId: string, key: string): Promise<MemoryRecord | null>;
  list(agentId: string, limit: number): Promise<MemoryRecord[]>;
  delete(agentId: string, key: string): Promise<boolean>;
  purgeExpired(): Promise<number>;
}
