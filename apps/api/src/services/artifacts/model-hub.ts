import type { ImageReference, ModelHubResult } from '@radar/shared';
import { PROJECT_PROFILE } from '../pipelines/content-analysis';
import type { ModelHubContentSource } from '../search/model-hub';
import { modelPathFromUrl } from '../search/modelscope';
import type { ArtifactAdapter } from './types';

const README_CHARS = 15000;
const FILE_LINES = 30;

const HUB_LABELS: Record<ModelHubResult['source'], string> = {
  huggingface: 'HuggingFace模型',
  modelscope: 'ModelScope模型',
};

export class ModelHubAdapter implements ArtifactAdapter<ModelHubResult> {
  readonly profile = PROJECT_PROFILE;

  constructor(private readonly hubs: Record<ModelHubResult['source'], ModelHubContentSource>) {}

  async buildAnalysisContent(model: ModelHubResult): Promise<string> {
    // HuggingFace ids are the title; ModelScope needs the owner/name path from the URL
    const modelId = model.source === 'modelscope' ? modelPathFromUrl(model.url) : model.title;
    const hub = await this.hubs[model.source].getModelContent(modelId);

    return (
      `# ${HUB_LABELS[model.source]}: ${model.title}\n${hub.modelInfo}\n## README\n${hub.readme.slice(0, README_CHARS)}\n` +
      `## 文件列表\n${hub.files.slice(0, FILE_LINES).join('\n')}`
    );
  }

  async extractImages(): Promise<ImageReference[]> {
    return [];
  }
}
