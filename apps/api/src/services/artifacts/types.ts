import type { ImageReference, ModelHubResult, PaperResult, RepositoryResult, SearchResult } from '@radar/shared';
import type { AnalysisProfile } from '../pipelines/types';

/**
 * Turns one kind of search result into analysis input: the text the
 * pipeline reads, the images the vision stage may look at, and which
 * pipeline profile applies.
 */
export interface ArtifactAdapter<R extends SearchResult> {
  readonly profile: AnalysisProfile;
  buildAnalysisContent(result: R): Promise<string>;
  extractImages(result: R, maxImages: number): Promise<ImageReference[]>;
}

export interface ArtifactAdapters {
  paper: ArtifactAdapter<PaperResult>;
  repository: ArtifactAdapter<RepositoryResult>;
  model: ArtifactAdapter<ModelHubResult>;
}

/** Pulls figures out of a paper PDF. */
export interface PaperImageExtractor {
  extract(pdfUrl: string, maxImages: number): Promise<ImageReference[]>;
}

export interface PreparedArtifact {
  profile: AnalysisProfile;
  content: string;
  images: ImageReference[];
}
