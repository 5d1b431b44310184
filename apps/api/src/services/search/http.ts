import type { SearchSource } from '@radar/shared';
import type { z } from 'zod';
import { SearchSourceError } from '../errors';

export const USER_AGENT = 'research-radar/0.1';

/** Fetch with a timeout; any non-2xx status becomes a `SearchSourceError`. */
export async function requestUpstream(
  source: SearchSource,
  url: string,
  init: RequestInit,
  timeoutMs: number
): Promise<Response> {
  const response = await fetch(url, { ...init, signal: AbortSignal.timeout(timeoutMs) });
  if (!response.ok) {
    throw new SearchSourceError(source, `HTTP ${response.status} ${response.statusText}`.trim(), response.status);
  }
  return response;
}

export async function readJson<S extends z.ZodTypeAny>(
  source: SearchSource,
  response: Response,
  schema: S
): Promise<z.infer<S>> {
  const parsed = schema.safeParse(await response.json());
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SearchSourceError(source, `Unexpected response: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`);
  }
  return parsed.data;
}
