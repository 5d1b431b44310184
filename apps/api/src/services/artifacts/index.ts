import type { SearchResult } from '@radar/shared';
import type { ModelHubContentSource } from '../search/model-hub';
import { ModelHubAdapter } from './model-hub';
import { PaperAdapter } from './paper';
import { RepositoryAdapter, type RepositoryContentSource } from './repository';
import type { ArtifactAdapter, ArtifactAdapters, PaperImageExtractor, PreparedArtifact } from './types';

export interface ArtifactSources {
  github: RepositoryContentSource;
  huggingface: ModelHubContentSource;
  modelscope: ModelHubContentSource;
  paperImages?: PaperImageExtractor;
}

export function createArtifactAdapters(sources: ArtifactSources): ArtifactAdapters {
  return {
    paper: new PaperAdapter(sources.paperImages),
    repository: new RepositoryAdapter(sources.github),
    model: new ModelHubAdapter({ huggingface: sources.huggingface, modelscope: sources.modelscope }),
  };
}

export interface PrepareOptions {
  /** Zero skips image extraction entirely */
  maxImages: number;
}

async function prepareWith<R extends SearchResult>(
  adapter: ArtifactAdapter<R>,
  result: R,
  options: PrepareOptions
): Promise<PreparedArtifact> {
  const content = await adapter.buildAnalysisContent(result);
  const images = options.maxImages > 0 ? await adapter.extractImages(result, options.maxImages) : [];
  return { profile: adapter.profile, content, images };
}

/** Dispatch on the result kind to the adapter that understands it. */
export function prepareArtifact(
  result: SearchResult,
  adapters: ArtifactAdapters,
  options: PrepareOptions
): Promise<PreparedArtifact> {
  switch (result.kind) {
    case 'paper':
      return prepareWith(adapters.paper, result, options);
    case 'repository':
      return prepareWith(adapters.repository, result, options);
    case 'model':
      return prepareWith(adapters.model, result, options);
  }
}

export type { ArtifactAdapter, ArtifactAdapters, PaperImageExtractor, PreparedArtifact } from './types';
