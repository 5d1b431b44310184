import type { ModelHubResult, PaperResult, RepositoryResult } from '@radar/shared';
import { getConfig, type AppConfig } from './config';
import { getLLMClient, type ChatCompletionClient } from './llm';
import { isMultimodalModel } from './agents/models';
import { createArtifactAdapters, type ArtifactAdapters } from './artifacts';
import type { RepositoryContentSource } from './artifacts/repository';
import { IntentSessionStore } from './intent/session-store';
import { ContentAnalysisPipeline } from './pipelines/content-analysis';
import { RelatedWorkPipeline } from './pipelines/related-work';
import type { AnalysisProfile, ContentAnalyzer } from './pipelines/types';
import { SearchAggregator } from './search/aggregator';
import { ArxivClient } from './search/arxiv';
import { GithubClient } from './search/github';
import { HuggingFaceClient } from './search/huggingface';
import { ModelScopeClient } from './search/modelscope';
import type { ModelHubContentSource } from './search/model-hub';
import type { SearchSourceClient } from './search/types';

/**
 * Everything the HTTP routes need, wired once per process.
 * Tests build their own with fakes in place of the LLM and the sources.
 */
export interface AppServices {
  llm: ChatCompletionClient;
  sessions: IntentSessionStore;
  aggregator: SearchAggregator;
  adapters: ArtifactAdapters;
  createAnalyzer(profile: AnalysisProfile): ContentAnalyzer;
  relatedWork: RelatedWorkPipeline;
  batch: {
    /** Config switch and model capability combined */
    fetchImages: boolean;
    maxImages: number;
  };
}

export interface SearchClients {
  arxiv: SearchSourceClient<PaperResult>;
  github: SearchSourceClient<RepositoryResult> & RepositoryContentSource;
  huggingface: SearchSourceClient<ModelHubResult> & ModelHubContentSource;
  modelscope: SearchSourceClient<ModelHubResult> & ModelHubContentSource;
}

export function createSearchClients(config: AppConfig): SearchClients {
  const timeoutMs = config.search.timeoutMs;
  return {
    arxiv: new ArxivClient({ timeoutMs }),
    github: new GithubClient({ token: config.search.githubToken, timeoutMs }),
    huggingface: new HuggingFaceClient({ timeoutMs }),
    modelscope: new ModelScopeClient({ timeoutMs }),
  };
}

export function createAppServices(
  config: AppConfig = getConfig(),
  llm: ChatCompletionClient = getLLMClient(),
  clients: SearchClients = createSearchClients(config)
): AppServices {
  const agentOptions = { maxAttempts: config.agents.maxAttempts, temperature: config.llm.temperature };
  const { maxSessions, sessionIdleMinutes, ...intentDefaults } = config.intent;

  return {
    llm,
    sessions: new IntentSessionStore(
      llm,
      { ...agentOptions, ...intentDefaults },
      { maxSessions, idleTtlMs: sessionIdleMinutes * 60_000 }
    ),
    aggregator: new SearchAggregator([clients.arxiv, clients.github, clients.huggingface, clients.modelscope], {
      maxKeywords: config.search.maxKeywords,
      perSourceLimit: config.search.perSourceLimit,
      plainSearchLimit: config.search.plainSearchLimit,
      exploreWindowDays: config.search.exploreWindowDays,
    }),
    adapters: createArtifactAdapters({
      github: clients.github,
      huggingface: clients.huggingface,
      modelscope: clients.modelscope,
    }),
    createAnalyzer: (profile) =>
      new ContentAnalysisPipeline(llm, profile, {
        ...agentOptions,
        maxRepairPasses: config.pipeline.maxRepairPasses,
        visionContextChars: config.agents.visionContextChars,
      }),
    relatedWork: new RelatedWorkPipeline(llm, clients.arxiv, { ...agentOptions, ...config.relatedWork }),
    batch: {
      fetchImages: config.batch.fetchImages && isMultimodalModel(llm.getModel()),
      maxImages: config.batch.maxImages,
    },
  };
}
