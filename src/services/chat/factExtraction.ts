/**
 * Parses the model's fact-extraction answer into memory writes.
 *
 * Expected shape: {"memories": [{"key": "...", "value": "...", "relevance_score": 0.8, "ttl_days": 30}]}
 * Items that fail validation are dropped; unparseable output yields no facts.
 */

import { z } from 'zod';
import { DEFAULT_RELEVANCE_SCORE, MAX_EXTRACTED_FACTS } from '../../config/memory';
import { normalizeText } from '../memory/textSearch';

const MAX_KEY_LENGTH = 64;
const MAX_VALUE_LENGTH = 500;
const DAY_MS = 24 * 60 * 60 * 1000;

export const ExtractedFactSchema = z.object({
  key: z.string().trim().min(1),
  value: z.string().trim().min(1),
  relevance_score: z.number().finite().optional(),
  ttl_days: z.number().positive().optional()
});

const ExtractionPayloadSchema = z.object({
  memories: z.array(z.unknown())
});

export interface ExtractedFact {
  key: string;
  value: string;
  relevanceScore: number;
  expiresAt: Date | null;
}

/**
 * snake_case, ASCII only, bounded length.
 */
export function normalizeFactKey(key: string): string {
  return normalizeText(key)
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .slice(0, MAX_KEY_LENGTH);
}

export function parseExtractedFacts(raw: string, now: Date = new Date()): ExtractedFact[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }

  const payload = ExtractionPayloadSchema.safeParse(parsed);
  if (!payload.success) {
    return [];
  }

  const facts: ExtractedFact[] = [];
  for (const item of payload.data.memories) {
    const fact = ExtractedFactSchema.safeParse(item);
    if (!fact.success) {
      continue;
    }
    const key = normalizeFactKey(fact.data.key);
    if (!key) {
      continue;
    }
    facts.push({
      key,
      value: fact.data.value.slice(0, MAX_VALUE_LENGTH),
      relevanceScore: fact.data.relevance_score ?? DEFAULT_RELEVANCE_SCORE,
      expiresAt: fact.data.ttl_days ? new Date(now.getTime() + fact.data.ttl_days * DAY_MS) : null
    });
    if (facts.length >= MAX_EXTRACTED_FACTS) {
      break;
    }
  }
  return facts;
}
