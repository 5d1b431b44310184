/**
 * ModelScopeClient - model search over the ModelScope hub API
 *
 * The listing endpoint has no date filter, so the window is not applied here.
 */

import type { ModelHubResult } from '@radar/shared';
import { z } from 'zod';
import { errorMessage, log } from '../logging';
import type { ModelHubContent, ModelHubContentSource } from './model-hub';
import { readJson, requestUpstream, USER_AGENT } from './http';
import type { DateWindow, SearchSourceClient } from './types';

const API_URL = 'https://modelscope.cn/api/v1';
const SITE_URL = 'https://modelscope.cn/models';

const TaskSchema = z.object({
  Name: z.string().optional(),
  ChineseName: z.string().optional(),
});

const ModelSchema = z.object({
  Name: z.string(),
  Path: z.string(),
  ChineseName: z.string().optional().catch(undefined),
  Description: z.string().nullable().optional().catch(undefined),
  Downloads: z.number().optional().catch(undefined),
  Stars: z.number().optional().catch(undefined),
  Tasks: z.array(TaskSchema).nullable().optional().catch(undefined),
  Tags: z.array(z.string()).nullable().optional().catch(undefined),
  LastUpdatedTime: z.number().optional().catch(undefined),
  ReadMeContent: z.string().optional().catch(undefined),
});

const ListResponseSchema = z.object({
  Data: z
    .object({
      Model: z.object({
        Models: z.array(ModelSchema).nullable(),
      }),
    })
    .optional(),
});

const DetailResponseSchema = z.object({
  Data: ModelSchema.partial(),
});

const FilesResponseSchema = z.object({
  Data: z.object({
    Files: z.array(z.object({ Path: z.string(), Type: z.string().optional() })).nullable(),
  }),
});

type HubModel = z.infer<typeof ModelSchema>;

function taskNames(model: Partial<HubModel>): string[] {
  return (model.Tasks ?? []).map((task) => task.ChineseName ?? task.Name ?? '').filter((name) => name.length > 0);
}

function toResult(model: HubModel): ModelHubResult {
  const modelPath = `${model.Path}/${model.Name}`;
  const description = [model.ChineseName, model.Description ?? undefined, taskNames(model).join(', ')]
    .filter((part): part is string => Boolean(part))
    .join('; ');
  return {
    kind: 'model',
    source: 'modelscope',
    title: modelPath,
    url: `${SITE_URL}/${modelPath}`,
    description,
    downloads: model.Downloads ?? 0,
    likes: model.Stars ?? 0,
    tags: model.Tags ?? [],
    updated: model.LastUpdatedTime ? new Date(model.LastUpdatedTime * 1000).toISOString().split('T')[0] : undefined,
  };
}

/** `https://modelscope.cn/models/<owner>/<name>` → `<owner>/<name>` */
export function modelPathFromUrl(url: string): string {
  return url.replace(`${SITE_URL}/`, '');
}

export interface ModelScopeClientOptions {
  timeoutMs?: number;
}

export class ModelScopeClient implements SearchSourceClient<ModelHubResult>, ModelHubContentSource {
  readonly source = 'modelscope' as const;
  private readonly timeoutMs: number;

  constructor(options: ModelScopeClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async search(query: string, _window: DateWindow, limit: number): Promise<ModelHubResult[]> {
    log({ level: 'debug', component: 'ModelScopeClient', message: `Searching models: ${query}` });
    const response = await requestUpstream(
      'modelscope',
      `${API_URL}/dolphin/models`,
      {
        method: 'PUT',
        headers: { 'Content-Type': 'application/json', 'User-Agent': USER_AGENT },
        body: JSON.stringify({
          PageSize: limit,
          PageNumber: 1,
          SortBy: 'Default',
          Target: '',
          SingleCriterion: [],
          Name: query,
        }),
      },
      this.timeoutMs
    );
    const body = await readJson('modelscope', response, ListResponseSchema);
    return (body.Data?.Model.Models ?? []).slice(0, limit).map(toResult);
  }

  async getModelContent(modelPath: string): Promise<ModelHubContent> {
    const response = await requestUpstream(
      'modelscope',
      `${API_URL}/models/${modelPath}`,
      { headers: { 'User-Agent': USER_AGENT } },
      this.timeoutMs
    );
    const { Data: model } = await readJson('modelscope', response, DetailResponseSchema);

    const modelInfo = [
      `名称: ${model.ChineseName ?? modelPath}`,
      `描述: ${model.Description ?? ''}`,
      `任务: ${taskNames(model).join(', ') || '未知'}`,
      `下载量: ${model.Downloads ?? 0}`,
      `收藏: ${model.Stars ?? 0}`,
    ].join('\n');

    return {
      modelInfo,
      readme: model.ReadMeContent ?? '',
      files: await this.listFiles(modelPath),
    };
  }

  private async listFiles(modelPath: string): Promise<string[]> {
    const params = new URLSearchParams({ Revision: 'master', Root: '' });
    try {
      const response = await requestUpstream(
        'modelscope',
        `${API_URL}/models/${modelPath}/repo/files?${params.toString()}`,
        { headers: { 'User-Agent': USER_AGENT } },
        this.timeoutMs
      );
      const body = await readJson('modelscope', response, FilesResponseSchema);
      return (body.Data.Files ?? []).map((file) => file.Path);
    } catch (error) {
      log({
        level: 'warn',
        component: 'ModelScopeClient',
        message: `File list for ${modelPath} unavailable: ${errorMessage(error)}`,
      });
      return [];
    }
  }
}
