/**
 * Model-name fragments of chat models that accept image input.
 * Matched case-insensitively as substrings of the configured model id.
 */
export const MULTIMODAL_MODEL_PATTERNS = [
  'gpt-4-vision',
  'gpt-4-turbo',
  'gpt-4o',
  'gpt-4o-mini',
  'claude-3-opus',
  'claude-3-sonnet',
  'claude-3-haiku',
  'claude-3.5-sonnet',
  'claude-3-5-sonnet',
  'gemini-pro-vision',
  'gemini-1.5-pro',
  'gemini-1.5-flash',
  'gemini-2',
] as const;

export function isMultimodalModel(model: string): boolean {
  const lower = model.toLowerCase();
  return MULTIMODAL_MODEL_PATTERNS.some((pattern) => lower.includes(pattern));
}
