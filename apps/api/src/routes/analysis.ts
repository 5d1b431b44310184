import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import { z } from 'zod';
import { describeResult, type BatchProgress } from '@radar/shared';
import type { AppServices } from '../services/container';
import { analyzeBatch } from '../services/pipelines/batch';
import { searchResultSchema } from './schemas';
import { streamOperation } from './sse';

const batchSchema = z.object({
  items: z.array(searchResultSchema).min(1).max(20),
});

const relatedSchema = z.object({
  item: searchResultSchema,
});

export function createAnalysisRoutes(services: AppServices) {
  const analysis = new Hono();

  /**
   * POST /api/analysis/batch
   * Deep analysis of each item in turn (SSE); result maps title → report
   */
  analysis.post('/batch', zValidator('json', batchSchema), (c) => {
    const { items } = c.req.valid('json');
    return streamOperation<BatchProgress, Record<string, string>>(c, 'BatchAnalysis', (emit) =>
      analyzeBatch(
        items,
        {
          adapters: services.adapters,
          createAnalyzer: services.createAnalyzer,
          fetchImages: services.batch.fetchImages,
          maxImages: services.batch.maxImages,
        },
        { onProgress: emit }
      )
    );
  });

  /**
   * POST /api/analysis/related
   * Related-work report for one item (SSE)
   */
  analysis.post('/related', zValidator('json', relatedSchema), (c) => {
    const { item } = c.req.valid('json');
    const paperInfo = `标题: ${item.title}\n摘要: ${describeResult(item)}`;
    return streamOperation<{ message: string }, { report: string }>(c, 'RelatedWork', async (emit) => ({
      report: await services.relatedWork.run(paperInfo, { onProgress: (message) => emit({ message }) }),
    }));
  });

  return analysis;
}
