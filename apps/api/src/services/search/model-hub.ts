/** Material a model-hub entry contributes to an analysis. */
export interface ModelHubContent {
  modelInfo: string;
  readme: string;
  files: string[];
}

/** A search source that can also describe one of its models in depth. */
export interface ModelHubContentSource {
  getModelContent(modelId: string): Promise<ModelHubContent>;
}
