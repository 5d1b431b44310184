/**
 * Search Aggregator
 * Fans a strategy out over keywords × sources, sequentially, then merges,
 * deduplicates and filters. A failing source contributes zero results and is
 * reported in `failedSources`; it never fails the run.
 */

import {
  SEARCH_SOURCES,
  type ProgressCallback,
  type RepositoryResult,
  type SearchResult,
  type SearchSource,
  type SearchStrategy,
  type TimeRange,
} from '@radar/shared';
import { errorMessage, log } from '../logging';
import { dedupeByTitle } from './dedupe';
import { windowForDays, windowForTimeRange } from './time-range';
import type { DateWindow, SearchSourceClient } from './types';

/** Returns the subset of `results` judged relevant, in any order the filter likes. */
export type ResultFilter = (results: SearchResult[]) => Promise<SearchResult[]>;

export interface SearchOutcome {
  results: SearchResult[];
  /** Results left after deduplication, before filtering */
  uniqueCount: number;
  failedSources: SearchSource[];
  cancelled: boolean;
}

export interface SearchAggregatorOptions {
  maxKeywords: number;
  perSourceLimit: Record<SearchSource, number>;
  plainSearchLimit: number;
  exploreWindowDays: number;
}

export const DEFAULT_AGGREGATOR_OPTIONS: SearchAggregatorOptions = {
  maxKeywords: 3,
  perSourceLimit: { arxiv: 20, github: 10, huggingface: 10, modelscope: 10 },
  plainSearchLimit: 20,
  exploreWindowDays: 3,
};

export interface RunOptions {
  signal?: AbortSignal;
  onProgress?: ProgressCallback;
  now?: Date;
}

export interface PlainSearchOptions {
  sources?: readonly SearchSource[];
  timeRange?: TimeRange;
  limit?: number;
  signal?: AbortSignal;
  now?: Date;
}

export interface ExploreOptions {
  sources?: readonly SearchSource[];
  limit?: number;
  signal?: AbortSignal;
  now?: Date;
}

interface Query {
  text: string;
  source: SearchSource;
  limit: number;
}

/** Keep the canonical source order regardless of how the caller listed them. */
function orderSources(sources: readonly SearchSource[]): SearchSource[] {
  return SEARCH_SOURCES.filter((source) => sources.includes(source));
}

export class SearchAggregator {
  private readonly clients = new Map<SearchSource, SearchSourceClient>();
  private readonly options: SearchAggregatorOptions;

  constructor(clients: readonly SearchSourceClient[], options: Partial<SearchAggregatorOptions> = {}) {
    for (const client of clients) {
      this.clients.set(client.source, client);
    }
    this.options = { ...DEFAULT_AGGREGATOR_OPTIONS, ...options };
  }

  /**
   * Strategy-driven search: first `maxKeywords` keywords, every strategy source
   * per keyword, then dedup and filter. When the filter keeps nothing the first
   * `targetCount` unique results are returned instead.
   */
  async run(strategy: SearchStrategy, filter: ResultFilter, options: RunOptions = {}): Promise<SearchOutcome> {
    const notify = (message: string) => options.onProgress?.(message);
    const keywords = strategy.keywords.slice(0, this.options.maxKeywords);
    const sources = orderSources(strategy.sources);
    const window = windowForTimeRange(strategy.timeRange, options.now);

    notify(`搜索关键词: ${strategy.keywords.join(', ')}`);

    const queries: Query[] = [];
    for (const keyword of keywords) {
      for (const source of sources) {
        queries.push({ text: keyword, source, limit: this.options.perSourceLimit[source] });
      }
    }

    const collected = await this.execute(queries, window, options.signal, (query, index) => {
      if (index % sources.length === 0) notify(`搜索: ${query.text}...`);
    });
    const unique = dedupeByTitle(collected.results);

    if (collected.cancelled) {
      log({ level: 'info', component: 'SearchAggregator', message: `Run cancelled with ${unique.length} results collected` });
      return { results: unique, uniqueCount: unique.length, failedSources: collected.failedSources, cancelled: true };
    }

    notify(`筛选 ${unique.length} 条结果...`);
    const matched = unique.length > 0 ? await filter(unique) : [];

    return {
      results: matched.length > 0 ? matched : unique.slice(0, strategy.targetCount),
      uniqueCount: unique.length,
      failedSources: collected.failedSources,
      cancelled: false,
    };
  }

  /** One query against each requested source, no filtering. */
  async search(query: string, options: PlainSearchOptions = {}): Promise<SearchOutcome> {
    const limit = options.limit ?? this.options.plainSearchLimit;
    const queries = orderSources(options.sources ?? SEARCH_SOURCES).map((source) => ({ text: query, source, limit }));
    const window = windowForTimeRange(options.timeRange ?? 'past_year', options.now);

    const collected = await this.execute(queries, window, options.signal);
    const unique = dedupeByTitle(collected.results);
    return { results: unique, uniqueCount: unique.length, failedSources: collected.failedSources, cancelled: collected.cancelled };
  }

  /**
   * What is new in the last few days: `max(5, floor(limit / 4))` per source,
   * repositories first by stars, everything else after in source order.
   */
  async explore(query: string, options: ExploreOptions = {}): Promise<SearchOutcome> {
    const perSource = Math.max(5, Math.floor((options.limit ?? 30) / 4));
    const queries = orderSources(options.sources ?? SEARCH_SOURCES).map((source) => ({
      text: query,
      source,
      limit: perSource,
    }));
    const window = windowForDays(this.options.exploreWindowDays, options.now);

    const collected = await this.execute(queries, window, options.signal);
    const unique = dedupeByTitle(collected.results);
    const repositories = unique
      .filter((result): result is RepositoryResult => result.kind === 'repository')
      .sort((a, b) => b.stars - a.stars);
    const others = unique.filter((result) => result.kind !== 'repository');
    const results = [...repositories, ...others];

    return { results, uniqueCount: results.length, failedSources: collected.failedSources, cancelled: collected.cancelled };
  }

  private async execute(
    queries: readonly Query[],
    window: DateWindow,
    signal: AbortSignal | undefined,
    beforeQuery?: (query: Query, index: number) => void
  ): Promise<{ results: SearchResult[]; failedSources: SearchSource[]; cancelled: boolean }> {
    const results: SearchResult[] = [];
    const failed = new Set<SearchSource>();

    for (const [index, query] of queries.entries()) {
      if (signal?.aborted) {
        return { results, failedSources: [...failed], cancelled: true };
      }
      beforeQuery?.(query, index);

      const client = this.clients.get(query.source);
      if (!client) {
        log({ level: 'warn', component: 'SearchAggregator', message: `No client configured for ${query.source}` });
        failed.add(query.source);
        continue;
      }

      const startedAt = Date.now();
      try {
        const found = await client.search(query.text, window, query.limit);
        results.push(...found);
        log({
          level: 'debug',
          component: 'SearchAggregator',
          message: `${query.source} "${query.text}" → ${found.length} results`,
          durationMs: Date.now() - startedAt,
        });
      } catch (error) {
        failed.add(query.source);
        log({
          level: 'warn',
          component: 'SearchAggregator',
          message: `${query.source} "${query.text}" failed: ${errorMessage(error)}`,
        });
      }
    }

    return { results, failedSources: [...failed], cancelled: false };
  }
}
