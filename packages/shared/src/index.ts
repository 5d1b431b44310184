// ============ Chat Types ============

export type ChatRole = 'system' | 'user' | 'assistant';

/**
 * Inline image reference carried inside a user turn.
 * `url` is a self-describing data URL: `data:<mime>;base64,<bytes>`.
 */
export interface ImageReference {
  url: string;
}

export interface ChatTurn {
  role: ChatRole;
  content: string;
  images?: ImageReference[];
}

// ============ Search Types ============

export const SEARCH_SOURCES = ['arxiv', 'github', 'huggingface', 'modelscope'] as const;

export type SearchSource = (typeof SEARCH_SOURCES)[number];

export const TIME_RANGES = ['past_week', 'past_month', 'past_3months', 'past_year'] as const;

export type TimeRange = (typeof TIME_RANGES)[number];

export interface SearchStrategy {
  keywords: string[];
  timeRange: TimeRange;
  sources: SearchSource[];
  /** Always >= 1 */
  targetCount: number;
}

interface SearchResultBase {
  /** Dedup key across sources and keywords */
  title: string;
  url: string;
}

export interface PaperResult extends SearchResultBase {
  kind: 'paper';
  source: 'arxiv';
  authors: string[];
  abstract: string;
  /** YYYY-MM-DD */
  published: string;
  pdfUrl?: string;
  categories: string[];
}

export interface RepositoryResult extends SearchResultBase {
  kind: 'repository';
  source: 'github';
  description: string;
  stars: number;
  language: string | null;
  topics: string[];
  /** YYYY-MM-DD */
  updated: string;
}

export interface ModelHubResult extends SearchResultBase {
  kind: 'model';
  source: 'huggingface' | 'modelscope';
  description: string;
  downloads: number;
  likes: number;
  tags: string[];
  /** YYYY-MM-DD, when the hub reports it */
  updated?: string;
}

export type SearchResult = PaperResult | RepositoryResult | ModelHubResult;

export type SearchResultKind = SearchResult['kind'];

/**
 * Text used to judge relevance: the abstract for papers, the description otherwise.
 */
export function describeResult(result: SearchResult): string {
  return result.kind === 'paper' ? result.abstract : result.description;
}

// ============ Intent Types ============

/** Free-form key/value facts gathered from the conversation; keys are whatever the model emitted. */
export type UserProfile = Record<string, string>;

export interface IntentTurn {
  type: 'question' | 'ready';
  message: string;
  profile: UserProfile;
}

// ============ Progress Types ============

export type ProgressCallback = (message: string) => void;

export interface BatchProgress {
  message: string;
  current: number;
  total: number;
}
