/**
 * HuggingFaceClient - model search over the public Hub API
 */

import type { ModelHubResult } from '@radar/shared';
import { z } from 'zod';
import { log } from '../logging';
import type { ModelHubContent, ModelHubContentSource } from './model-hub';
import { readJson, requestUpstream, USER_AGENT } from './http';
import { isWithinWindow } from './time-range';
import type { DateWindow, SearchSourceClient } from './types';

const API_URL = 'https://huggingface.co/api/models';
const SITE_URL = 'https://huggingface.co';
/** The Hub cannot filter by date, so ask for extra rows to survive the window filter */
const OVERFETCH_FACTOR = 3;
const MAX_PAGE = 100;

const ModelSchema = z.object({
  id: z.string(),
  downloads: z.number().optional(),
  likes: z.number().optional(),
  tags: z.array(z.string()).optional(),
  pipeline_tag: z.string().optional(),
  library_name: z.string().optional(),
  lastModified: z.string().optional(),
  author: z.string().optional(),
  siblings: z.array(z.object({ rfilename: z.string() })).optional(),
});

type HubModel = z.infer<typeof ModelSchema>;

function describeModel(model: HubModel): string {
  const parts: string[] = [];
  if (model.pipeline_tag) parts.push(model.pipeline_tag);
  if (model.library_name) parts.push(model.library_name);
  const tags = (model.tags ?? []).slice(0, 8);
  if (tags.length > 0) parts.push(`tags: ${tags.join(', ')}`);
  return parts.join('; ');
}

function toResult(model: HubModel): ModelHubResult {
  return {
    kind: 'model',
    source: 'huggingface',
    title: model.id,
    url: `${SITE_URL}/${model.id}`,
    description: describeModel(model),
    downloads: model.downloads ?? 0,
    likes: model.likes ?? 0,
    tags: model.tags ?? [],
    updated: model.lastModified?.split('T')[0],
  };
}

export interface HuggingFaceClientOptions {
  timeoutMs?: number;
}

export class HuggingFaceClient implements SearchSourceClient<ModelHubResult>, ModelHubContentSource {
  readonly source = 'huggingface' as const;
  private readonly timeoutMs: number;

  constructor(options: HuggingFaceClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  /** Most-downloaded models matching the query, keeping those modified inside the window when the Hub reports a date. */
  async search(query: string, window: DateWindow, limit: number): Promise<ModelHubResult[]> {
    const params = new URLSearchParams({
      search: query,
      sort: 'downloads',
      direction: '-1',
      limit: String(Math.min(MAX_PAGE, limit * OVERFETCH_FACTOR)),
      full: 'true',
    });
    const url = `${API_URL}?${params.toString()}`;
    log({ level: 'debug', component: 'HuggingFaceClient', message: `Fetching: ${url}` });

    const response = await requestUpstream('huggingface', url, { headers: { 'User-Agent': USER_AGENT } }, this.timeoutMs);
    const models = await readJson('huggingface', response, z.array(ModelSchema));

    return models
      .filter((model) => {
        if (!model.lastModified) return true;
        const modified = new Date(model.lastModified);
        return Number.isNaN(modified.getTime()) || isWithinWindow(modified, window);
      })
      .slice(0, limit)
      .map(toResult);
  }

  async getModelContent(modelId: string): Promise<ModelHubContent> {
    const response = await requestUpstream(
      'huggingface',
      `${API_URL}/${modelId}`,
      { headers: { 'User-Agent': USER_AGENT } },
      this.timeoutMs
    );
    const model = await readJson('huggingface', response, ModelSchema);

    const modelInfo = [
      `作者: ${model.author ?? modelId.split('/')[0]}`,
      `任务: ${model.pipeline_tag ?? '未知'}`,
      `下载量: ${model.downloads ?? 0}`,
      `点赞: ${model.likes ?? 0}`,
      `标签: ${(model.tags ?? []).join(', ')}`,
    ].join('\n');

    return {
      modelInfo,
      readme: await this.getReadme(modelId),
      files: (model.siblings ?? []).map((sibling) => sibling.rfilename),
    };
  }

  private async getReadme(modelId: string): Promise<string> {
    const response = await fetch(`${SITE_URL}/${modelId}/raw/main/README.md`, {
      headers: { 'User-Agent': USER_AGENT },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      log({ level: 'debug', component: 'HuggingFaceClient', message: `No README for ${modelId} (HTTP ${response.status})` });
      return '';
    }
    return response.text();
  }
}
