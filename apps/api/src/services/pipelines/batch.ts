/**
 * Batch analysis: items run one after another, each through the pipeline its
 * artifact adapter names. One item failing never stops the batch.
 */

import type { BatchProgress, SearchResult } from '@radar/shared';
import { errorMessage, log } from '../logging';
import { prepareArtifact, type ArtifactAdapters } from '../artifacts';
import type { AnalysisProfile, ContentAnalyzer } from './types';

export const FAILURE_PREFIX = '❌ 分析失败: ';

export interface BatchDependencies {
  adapters: ArtifactAdapters;
  createAnalyzer: (profile: AnalysisProfile) => ContentAnalyzer;
  /** Already accounts for whether the model is multimodal */
  fetchImages: boolean;
  maxImages: number;
}

export interface BatchOptions {
  onProgress?: (progress: BatchProgress) => void;
}

/** Title → report, or a failure marker for items that could not be analysed. */
export async function analyzeBatch(
  items: readonly SearchResult[],
  deps: BatchDependencies,
  options: BatchOptions = {}
): Promise<Record<string, string>> {
  const reports: Record<string, string> = {};
  const total = items.length;
  const startedAt = Date.now();
  let failures = 0;

  for (const [index, item] of items.entries()) {
    const current = index + 1;
    const notify = (message: string) => options.onProgress?.({ message, current, total });
    notify(`正在分析 (${current}/${total}): ${item.title.slice(0, 40)}...`);

    try {
      const prepared = await prepareArtifact(item, deps.adapters, {
        maxImages: deps.fetchImages ? deps.maxImages : 0,
      });
      reports[item.title] = await deps.createAnalyzer(prepared.profile).run(prepared.content, {
        images: prepared.images,
        onProgress: notify,
      });
    } catch (error) {
      failures += 1;
      reports[item.title] = `${FAILURE_PREFIX}${errorMessage(error)}`;
      log({ level: 'warn', component: 'BatchAnalysis', message: `${item.title} failed: ${errorMessage(error)}` });
    }
  }

  log({
    level: 'info',
    component: 'BatchAnalysis',
    message: `Analysed ${total} items (${failures} failed)`,
    durationMs: Date.now() - startedAt,
  });
  return reports;
}
