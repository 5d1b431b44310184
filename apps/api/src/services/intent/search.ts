import type { ProgressCallback, SearchStrategy } from '@radar/shared';
import type { SearchAggregator, SearchOutcome } from '../search/aggregator';
import type { IntentCollector } from './collector';

export interface IntentSearchOutcome extends SearchOutcome {
  strategy: SearchStrategy;
}

export interface IntentSearchOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
}

/** Strategy from the collected profile, then an aggregated search filtered against the same profile. */
export async function searchFromIntent(
  collector: IntentCollector,
  aggregator: SearchAggregator,
  options: IntentSearchOptions = {}
): Promise<IntentSearchOutcome> {
  options.onProgress?.('正在构建搜索策略...');
  const strategy = await collector.buildSearchStrategy();

  const userIntent = collector.describeIntent();
  const outcome = await aggregator.run(
    strategy,
    async (results) => (await collector.filterResults(results, userIntent)).matched,
    options
  );
  return { strategy, ...outcome };
}
