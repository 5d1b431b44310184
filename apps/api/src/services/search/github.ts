/**
 * GithubClient - repository search and repository content over the GitHub REST API
 */

import type { RepositoryResult } from '@radar/shared';
import { z } from 'zod';
import { log } from '../logging';
import { readJson, requestUpstream, USER_AGENT } from './http';
import { formatDate } from './time-range';
import type { DateWindow, SearchSourceClient } from './types';

const API_URL = 'https://api.github.com';
const PAGE_SIZE = 30;

const RepositorySchema = z.object({
  full_name: z.string(),
  description: z.string().nullable(),
  html_url: z.string(),
  stargazers_count: z.number(),
  language: z.string().nullable(),
  topics: z.array(z.string()).optional(),
  updated_at: z.string(),
  default_branch: z.string().optional(),
});

const SearchResponseSchema = z.object({
  items: z.array(RepositorySchema),
});

const ContentFileSchema = z.object({
  content: z.string(),
  encoding: z.string(),
});

const TreeSchema = z.object({
  tree: z.array(
    z.object({
      path: z.string(),
      type: z.string(),
      size: z.number().optional(),
    })
  ),
  truncated: z.boolean().optional(),
});

export interface TreeEntry {
  path: string;
  type: 'file' | 'dir';
  size: number;
}

function decodeContent(file: z.infer<typeof ContentFileSchema>): string {
  return file.encoding === 'base64' ? Buffer.from(file.content, 'base64').toString('utf-8') : file.content;
}

function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}

export interface GithubClientOptions {
  token?: string;
  timeoutMs?: number;
}

export class GithubClient implements SearchSourceClient<RepositoryResult> {
  readonly source = 'github' as const;
  private readonly token?: string;
  private readonly timeoutMs: number;

  constructor(options: GithubClientOptions = {}) {
    this.token = options.token;
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /** Repositories pushed inside the window, most stars first. */
  async search(query: string, window: DateWindow, limit: number): Promise<RepositoryResult[]> {
    const q = `${query} pushed:${formatDate(window.start)}..${formatDate(window.end)}`;
    const results: RepositoryResult[] = [];

    for (let page = 1; results.length < limit; page += 1) {
      const params = new URLSearchParams({
        q,
        sort: 'stars',
        order: 'desc',
        per_page: String(PAGE_SIZE),
        page: String(page),
      });
      const body = await this.getJson(`/search/repositories?${params.toString()}`, SearchResponseSchema);

      for (const repo of body.items.slice(0, limit - results.length)) {
        results.push({
          kind: 'repository',
          source: 'github',
          title: repo.full_name,
          url: repo.html_url,
          description: repo.description ?? '',
          stars: repo.stargazers_count,
          language: repo.language,
          topics: repo.topics ?? [],
          updated: repo.updated_at.split('T')[0],
        });
      }

      if (body.items.length < PAGE_SIZE) break;
    }

    return results;
  }

  /** README text, or '' when the repository has none. */
  async getReadme(fullName: string): Promise<string> {
    const response = await fetch(`${API_URL}/repos/${fullName}/readme`, {
      headers: this.headers(),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (response.status === 404) return '';
    if (!response.ok) {
      log({ level: 'warn', component: 'GithubClient', message: `README for ${fullName} returned HTTP ${response.status}` });
      return '';
    }
    const parsed = ContentFileSchema.safeParse(await response.json());
    return parsed.success ? decodeContent(parsed.data) : '';
  }

  /** Every path of the default branch, files and directories. */
  async getTree(fullName: string): Promise<TreeEntry[]> {
    const repo = await this.getJson(`/repos/${fullName}`, RepositorySchema);
    const branch = repo.default_branch ?? 'main';
    const body = await this.getJson(`/repos/${fullName}/git/trees/${encodeURIComponent(branch)}?recursive=1`, TreeSchema);
    if (body.truncated) {
      log({ level: 'debug', component: 'GithubClient', message: `Tree of ${fullName} was truncated by the API` });
    }
    return body.tree.map((entry): TreeEntry => ({
      path: entry.path,
      type: entry.type === 'tree' ? 'dir' : 'file',
      size: entry.size ?? 0,
    }));
  }

  async getFileContent(fullName: string, path: string): Promise<string> {
    const file = await this.getJson(`/repos/${fullName}/contents/${encodePath(path)}`, ContentFileSchema);
    return decodeContent(file);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      Accept: 'application/vnd.github+json',
      'User-Agent': USER_AGENT,
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }
    return headers;
  }

  private async getJson<S extends z.ZodTypeAny>(pathAndQuery: string, schema: S): Promise<z.infer<S>> {
    log({ level: 'debug', component: 'GithubClient', message: `Fetching: ${pathAndQuery}` });
    const response = await requestUpstream('github', `${API_URL}${pathAndQuery}`, { headers: this.headers() }, this.timeoutMs);
    return readJson('github', response, schema);
  }
}
