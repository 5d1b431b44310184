import type { SearchResult, SearchSource } from '@radar/shared';

/** Inclusive window a source restricts its results to. */
export interface DateWindow {
  start: Date;
  end: Date;
}

/**
 * One upstream search API. Implementations throw `SearchSourceError` when the
 * upstream rejects a request; callers decide whether that is fatal.
 */
export interface SearchSourceClient<R extends SearchResult = SearchResult> {
  readonly source: SearchSource;
  search(query: string, window: DateWindow, limit: number): Promise<R[]>;
}
