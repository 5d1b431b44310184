import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Get directory of this file for reliable path resolution
const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

// Config path relative to this file: services/ -> src/ -> api/ -> apps/ -> project root
const REPO_ROOT = path.resolve(__dirname, '../../../../');
const DEFAULT_CONFIG_PATH = path.join(REPO_ROOT, 'config/default.json');

const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

const LLMConfigSchema = z.object({
  provider: z.string(),
  baseUrl: z.string(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  /** Kept low so analytical text stays close to deterministic */
  temperature: z.number().min(0).max(2),
  timeout: z.number().int().positive(),
});

const AgentsConfigSchema = z.object({
  /** Chat calls allowed per ask, counting continuation attempts after a length-limited stop */
  maxAttempts: z.number().int().min(1),
  visionContextChars: z.number().int().positive(),
});

const PipelineConfigSchema = z.object({
  maxRepairPasses: z.number().int().min(0),
});

const RelatedWorkConfigSchema = z.object({
  maxKeywords: z.number().int().min(1),
  perKeywordLimit: z.number().int().min(1),
  windowDays: z.number().int().min(1),
  filterCandidateLimit: z.number().int().min(1),
  abstractExcerptChars: z.number().int().min(1),
  comparisonContextChars: z.number().int().min(1),
  summaryListChars: z.number().int().min(1),
});

const IntentConfigSchema = z.object({
  /** Question rounds after which the collector declares readiness on its own */
  maxQuestions: z.number().int().min(1),
  filterCandidateLimit: z.number().int().min(1),
  excerptChars: z.number().int().min(1),
  defaultTargetCount: z.number().int().min(1),
  /** Live interview sessions kept in memory before the least recently used is dropped */
  maxSessions: z.number().int().min(1),
  sessionIdleMinutes: z.number().int().min(1),
});

const SearchConfigSchema = z.object({
  maxKeywords: z.number().int().min(1),
  perSourceLimit: z.object({
    arxiv: z.number().int().min(1),
    github: z.number().int().min(1),
    huggingface: z.number().int().min(1),
    modelscope: z.number().int().min(1),
  }),
  plainSearchLimit: z.number().int().min(1),
  exploreWindowDays: z.number().int().min(1),
  timeoutMs: z.number().int().positive(),
  githubToken: z.string().optional(),
});

const BatchConfigSchema = z.object({
  fetchImages: z.boolean(),
  maxImages: z.number().int().min(0),
});

const ServerConfigSchema = z.object({
  port: z.number().int().positive(),
  allowedOrigins: z.array(z.string()),
});

const LoggingConfigSchema = z.object({
  level: LogLevelSchema,
});

export const AppConfigSchema = z.object({
  llm: LLMConfigSchema,
  agents: AgentsConfigSchema,
  pipeline: PipelineConfigSchema,
  relatedWork: RelatedWorkConfigSchema,
  intent: IntentConfigSchema,
  search: SearchConfigSchema,
  batch: BatchConfigSchema,
  server: ServerConfigSchema,
  logging: LoggingConfigSchema,
});

export type LLMConfig = z.infer<typeof LLMConfigSchema>;
export type AgentsConfig = z.infer<typeof AgentsConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type RelatedWorkConfig = z.infer<typeof RelatedWorkConfigSchema>;
export type IntentConfig = z.infer<typeof IntentConfigSchema>;
export type SearchConfig = z.infer<typeof SearchConfigSchema>;
export type BatchConfig = z.infer<typeof BatchConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LogLevel = z.infer<typeof LogLevelSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;

let cachedConfig: AppConfig | null = null;

function resolveConfigPath(rawPath: string): string {
  const candidates: string[] = [];
  if (path.isAbsolute(rawPath)) {
    candidates.push(rawPath);
  } else {
    candidates.push(path.resolve(process.cwd(), rawPath));
    // Also resolve relative to repository root for monorepo/dev-server cwd drift.
    candidates.push(path.resolve(REPO_ROOT, rawPath));
    candidates.push(rawPath);
  }

  for (const candidate of candidates) {
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      return candidate;
    }
  }

  return candidates[0] || rawPath;
}

function applyEnvironmentOverrides(config: AppConfig): AppConfig {
  const next: AppConfig = {
    ...config,
    llm: { ...config.llm },
    search: { ...config.search },
    logging: { ...config.logging },
  };

  if (process.env.LLM_BASE_URL) {
    next.llm.baseUrl = process.env.LLM_BASE_URL;
  }
  if (process.env.LLM_MODEL) {
    next.llm.model = process.env.LLM_MODEL;
  }
  if (process.env.GITHUB_TOKEN) {
    next.search.githubToken = process.env.GITHUB_TOKEN;
  }
  const level = LogLevelSchema.safeParse(process.env.LOG_LEVEL);
  if (level.success) {
    next.logging.level = level.data;
  }

  return next;
}

/**
 * Load application configuration from JSON file with environment overrides
 */
export function loadConfig(): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const requestedPath = process.env.CONFIG_PATH || DEFAULT_CONFIG_PATH;
  const configPath = resolveConfigPath(requestedPath);

  let config: AppConfig;

  try {
    const configFile = fs.readFileSync(configPath, 'utf-8');
    config = AppConfigSchema.parse(JSON.parse(configFile));
  } catch (error) {
    console.error(`Failed to load config from ${configPath} (requested: ${requestedPath}):`, error);
    throw new Error(`Configuration file not found or invalid: ${requestedPath}`);
  }

  cachedConfig = applyEnvironmentOverrides(config);
  return cachedConfig;
}

/**
 * Get the loaded config (loads it on first use)
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    return loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear cached config (useful for testing)
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
