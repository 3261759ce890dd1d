// Type definitions for the conversational memory store

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type MemoryMetadata = Record<string, JsonValue>;

export interface MemoryRecord {
  id: string;
  agent_id: string;
  lead_id: string | null;
  key: string;
  value: string;
  relevance_score: number;
  metadata: MemoryMetadata;
  created_at: Date;
  updated_at: Date;
  expires_at: Date | null;
}

export interface SearchResult extends MemoryRecord {
  rank: number; // Full-text relevance, 0 for substring-only matches
}

export interface UpsertMemoryInput {
  agentId: string;
  key: string;
  value: string;
  leadId?: string | null;
  relevanceScore?: number;
  expiresAt?: Date | null;
  metadata?: MemoryMetadata;
}

export interface SearchMemoryOptions {
  minRelevance?: number;
  limit?: number;
  /**
   * Restricts results to agent-wide memories plus those of this lead.
   * null keeps agent-wide memories only; undefined applies no lead filter.
   */
  leadScope?: string | null;
}

/**
 * Fully-resolved write, defaults already applied
 */
export interface MemoryWrite {
  agentId: string;
  key: string;
  value: string;
  leadId: string | null;
  relevanceScore: number;
  expiresAt: Date | null;
  metadata: MemoryMetadata;
}

export interface MemoryQuery {
  agentId: string;
  text: string;
  minRelevance: number;
  limit: number;
  leadScope?: string | null;
}
