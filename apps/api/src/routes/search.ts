import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import type { AppServices } from '../services/container';
import { sourceListSchema, timeRangeSchema } from './schemas';

const searchSchema = z.object({
  query: z.string().trim().min(1, 'Query is required'),
  sources: sourceListSchema.optional(),
  timeRange: timeRangeSchema.optional(),
  limit: z.number().int().min(1).max(100).optional(),
});

const exploreSchema = z.object({
  query: z.string().trim().min(1, 'Query is required'),
  sources: sourceListSchema.optional(),
  limit: z.number().int().min(1).max(200).optional(),
});

export function createSearchRoutes(services: AppServices) {
  const search = new Hono();

  /**
   * POST /api/search
   * Single query across the chosen sources, no LLM filtering
   */
  search.post('/', zValidator('json', searchSchema), async (c) => {
    const { query, ...options } = c.req.valid('json');
    const outcome = await services.aggregator.search(query, { ...options, signal: c.req.raw.signal });
    return c.json(outcome);
  });

  /**
   * POST /api/search/explore
   * What appeared in the last few days
   */
  search.post('/explore', zValidator('json', exploreSchema), async (c) => {
    const { query, ...options } = c.req.valid('json');
    const outcome = await services.aggregator.explore(query, { ...options, signal: c.req.raw.signal });
    return c.json(outcome);
  });

  return search;
}
