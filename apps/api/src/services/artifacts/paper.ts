import type { ImageReference, PaperResult } from '@radar/shared';
import { log } from '../logging';
import { PAPER_PROFILE } from '../pipelines/content-analysis';
import type { ArtifactAdapter, PaperImageExtractor } from './types';

export function buildPaperContent(paper: Pick<PaperResult, 'title' | 'abstract' | 'authors'>): string {
  return `标题: ${paper.title}\n摘要: ${paper.abstract}\n作者: ${paper.authors.join(', ')}`;
}

export class PaperAdapter implements ArtifactAdapter<PaperResult> {
  readonly profile = PAPER_PROFILE;

  constructor(private readonly imageExtractor?: PaperImageExtractor) {}

  async buildAnalysisContent(paper: PaperResult): Promise<string> {
    return buildPaperContent(paper);
  }

  async extractImages(paper: PaperResult, maxImages: number): Promise<ImageReference[]> {
    if (!paper.pdfUrl || maxImages <= 0) return [];
    if (!this.imageExtractor) {
      log({ level: 'debug', component: 'PaperAdapter', message: 'No PDF image extractor configured; skipping figures' });
      return [];
    }
    const images = await this.imageExtractor.extract(paper.pdfUrl, maxImages);
    return images.slice(0, maxImages);
  }
}
