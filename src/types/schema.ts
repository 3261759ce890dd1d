import { z } from 'zod';
import { JsonValue } from './memory';

/**
 * Zod schemas for request validation
 */

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(z.string(), JsonValueSchema)
  ])
);

// Chat schemas
export const SendMessageSchema = z.object({
  agent_id: z.string().trim().min(1),
  message: z.string().trim().min(1).max(10000),
  lead_id: z.string().trim().min(1).max(200).nullish()
});

// Memory schemas
export const UpsertMemorySchema = z.object({
  value: z.string(),
  relevance_score: z.number().finite().optional(),
  expires_at: z
    .string()
    .datetime({ offset: true })
    .transform(value => new Date(value))
    .nullish(),
  metadata: z.record(z.string(), JsonValueSchema).optional(),
  lead_id: z.string().trim().min(1).max(200).nullish()
});

export const SearchMemoriesQuerySchema = z.object({
  q: z.string().default(''),
  min_relevance: z.coerce.number().finite().optional(),
  limit: z.coerce.number().int().min(1).max(100).optional()
});

export const ListMemoriesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});
