import express, { Request, Response } from 'express';
import { NotFoundError } from '../core/errors';
import { asyncHandler } from '../middleware/asyncHandler';
import { validate } from '../middleware/validation';
import { MemoryService } from '../services/memory/MemoryService';
import { ListMemoriesQuerySchema, SearchMemoriesQuerySchema, UpsertMemorySchema } from '../types/schema';

export function createMemoryRouter(memoryService: MemoryService): express.Router {
  const router = express.Router();

  router.get('/agents/:agentId/memories', asyncHandler(async (req: Request, res: Response) => {
    const { limit } = validate(ListMemoriesQuerySchema, req.query);
    const memories = await memoryService.list(req.params.agentId, limit);
    res.json({ memories });
  }));

  // Registered before /:key so "search" is not taken for a key
  router.get('/agents/:agentId/memories/search', asyncHandler(async (req: Request, res: Response) => {
    const { q, min_relevance, limit } = validate(SearchMemoriesQuerySchema, req.query);
    const memories = await memoryService.search(req.params.agentId, q, { minRelevance: min_relevance, limit });
    res.json({ memories });
  }));

  router.get('/agents/:agentId/memories/:key', asyncHandler(async (req: Request, res: Response) => {
    const memory = await memoryService.get(req.params.agentId, req.params.key);
    if (!memory) {
      throw new NotFoundError(`Memory "${req.params.key}" not found`);
    }
    res.json(memory);
  }));

  router.put('/agents/:agentId/memories/:key', asyncHandler(async (req: Request, res: Response) => {
    const body = validate(UpsertMemorySchema, req.body);
    const memory = await memoryService.upsert({
      agentId: req.params.agentId,
      key: req.params.key,
      value: body.value,
      leadId: body.lead_id,
      relevanceScore: body.relevance_score,
      expiresAt: body.expires_at,
      metadata: body.metadata
    });
    res.json(memory);
  }));

  router.delete('/agents/:agentId/memories/:key', asyncHandler(async (req: Request, res: Response) => {
    const deleted = await memoryService.delete(req.params.agentId, req.params.key);
    if (!deleted) {
      throw new NotFoundError(`Memory "${req.params.key}" not found`);
    }
    res.sendStatus(204);
  }));

  router.post('/memories/purge', asyncHandler(async (_req: Request, res: Response) => {
    const deleted = await memoryService.purgeExpired();
    res.json({ deleted });
  }));

  return router;
}
