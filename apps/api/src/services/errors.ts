import type { SearchSource } from '@radar/shared';

/**
 * Raised by a search source client when the upstream API rejects a request.
 * The aggregator treats it as zero results from that source.
 */
export class SearchSourceError extends Error {
  constructor(
    public source: SearchSource,
    message: string,
    public status?: number
  ) {
    super(`${source}: ${message}`);
    this.name = 'SearchSourceError';
  }
}

export class SessionNotFoundError extends Error {
  constructor(public sessionId: string) {
    super(`Intent session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}
