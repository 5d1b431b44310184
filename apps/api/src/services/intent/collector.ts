/**
 * Intent Collector
 * Multi-turn interview that accumulates a user profile, then turns it into a
 * search strategy and filters search results against it.
 */

import {
  SEARCH_SOURCES,
  describeResult,
  type IntentTurn,
  type SearchResult,
  type SearchSource,
  type SearchStrategy,
  type UserProfile,
} from '@radar/shared';
import type { ChatCompletionClient } from '../llm';
import { log } from '../logging';
import { Agent, PERSONAS, type AgentOptions } from '../agents/agent';
import { defaultResponseClassifier, type ResponseClassifier } from '../agents/response-classifier';
import { FILTER_RESULTS_PROMPT, FORCED_READY_NOTICE, INTERVIEW_PROMPT, SEARCH_STRATEGY_PROMPT } from '../prompts/intent';

export interface IntentCollectorOptions extends AgentOptions {
  /** Turns after which the collector declares readiness on its own */
  maxQuestions?: number;
  /** Sources the strategy searches unless told otherwise */
  sources?: readonly SearchSource[];
  filterCandidateLimit?: number;
  excerptChars?: number;
  defaultTargetCount?: number;
  classifier?: ResponseClassifier;
  sessionId?: string;
}

export interface TranscriptEntry {
  role: 'user' | 'assistant';
  content: string;
}

export interface FilterOutcome {
  matched: SearchResult[];
  unmatched: SearchResult[];
}

export class IntentCollector {
  private readonly interviewer: Agent;
  private readonly brain: Agent;
  private readonly classifier: ResponseClassifier;
  private readonly maxQuestions: number;
  private readonly sources: SearchSource[];
  private readonly filterCandidateLimit: number;
  private readonly excerptChars: number;
  private readonly defaultTargetCount: number;
  private readonly sessionId?: string;

  private profile: UserProfile = {};
  private transcript: TranscriptEntry[] = [];
  private questionCount = 0;
  private ready = false;

  constructor(llm: ChatCompletionClient, options: IntentCollectorOptions = {}) {
    const agentOptions: AgentOptions = { maxAttempts: options.maxAttempts, temperature: options.temperature };
    this.interviewer = new Agent(llm, PERSONAS.interviewer, agentOptions);
    this.brain = new Agent(llm, PERSONAS.intentBrain, agentOptions);
    this.classifier = options.classifier ?? defaultResponseClassifier;
    this.maxQuestions = Math.max(1, options.maxQuestions ?? 3);
    this.sources = [...(options.sources ?? SEARCH_SOURCES)];
    this.filterCandidateLimit = options.filterCandidateLimit ?? 30;
    this.excerptChars = options.excerptChars ?? 200;
    this.defaultTargetCount = options.defaultTargetCount ?? 20;
    this.sessionId = options.sessionId;
  }

  get isReady(): boolean {
    return this.ready;
  }

  get turns(): number {
    return this.questionCount;
  }

  getProfile(): UserProfile {
    return { ...this.profile };
  }

  getTranscript(): TranscriptEntry[] {
    return this.transcript.map((entry) => ({ ...entry }));
  }

  /**
   * One interview turn. An empty utterance asks for the opening question.
   * Once the turn count reaches `maxQuestions` the turn is ready even without a marker.
   */
  async ask(utterance = ''): Promise<IntentTurn> {
    const text = utterance.trim();
    if (text) {
      this.transcript.push({ role: 'user', content: text });
    }
    this.questionCount += 1;

    const historyText = this.transcript
      .map((entry) => `${entry.role === 'user' ? '用户' : 'AI'}: ${entry.content}`)
      .join('\n');
    const response = await this.interviewer.think(
      INTERVIEW_PROMPT,
      `对话历史:\n${historyText}\n\n已收集信息:\n${JSON.stringify(this.profile)}`
    );
    this.transcript.push({ role: 'assistant', content: response });

    Object.assign(this.profile, this.classifier.extractProfileUpdates(response));

    let ready = this.classifier.isSearchReady(response);
    let message = this.classifier.stripMarkers(response);
    if (!ready && this.questionCount >= this.maxQuestions) {
      ready = true;
      message = message ? `${message}\n\n${FORCED_READY_NOTICE}` : FORCED_READY_NOTICE;
      log({
        level: 'info',
        component: 'IntentCollector',
        message: `Question budget of ${this.maxQuestions} reached; forcing readiness`,
        sessionId: this.sessionId,
      });
    }
    this.ready = this.ready || ready;

    return { type: ready ? 'ready' : 'question', message, profile: this.getProfile() };
  }

  async buildSearchStrategy(): Promise<SearchStrategy> {
    const defaults: SearchStrategy = {
      keywords: [],
      timeRange: 'past_year',
      sources: [...this.sources],
      targetCount: this.defaultTargetCount,
    };
    const response = await this.brain.think(
      SEARCH_STRATEGY_PROMPT,
      `用户画像:\n${JSON.stringify(this.profile, null, 2)}`
    );
    const strategy = this.classifier.parseStrategy(response, defaults);

    log({
      level: 'info',
      component: 'IntentCollector',
      message: `Strategy: ${strategy.keywords.length} keywords, ${strategy.timeRange}, target ${strategy.targetCount}`,
      sessionId: this.sessionId,
    });
    return strategy;
  }

  /**
   * Ask the brain which of the first candidates match the intent. The outcome
   * partitions the full input list, order preserved.
   */
  async filterResults(results: readonly SearchResult[], userIntent: string = this.describeIntent()): Promise<FilterOutcome> {
    if (results.length === 0) {
      return { matched: [], unmatched: [] };
    }

    const candidates = results
      .slice(0, this.filterCandidateLimit)
      .map((result, index) => `[${index + 1}] ${result.title}\n摘要: ${describeResult(result).slice(0, this.excerptChars)}...`)
      .join('\n');
    const response = await this.brain.think(FILTER_RESULTS_PROMPT, `用户意图:\n${userIntent}\n\n搜索结果:\n${candidates}`);

    const matchedIndices = new Set(this.classifier.parseFilterIndices(response, results.length));
    const matched: SearchResult[] = [];
    const unmatched: SearchResult[] = [];
    results.forEach((result, index) => (matchedIndices.has(index) ? matched : unmatched).push(result));
    return { matched, unmatched };
  }

  /** Profile as `key: value` lines. */
  describeIntent(): string {
    return Object.entries(this.profile)
      .map(([key, value]) => `${key}: ${value}`)
      .join('\n');
  }

  reset(): void {
    this.profile = {};
    this.transcript = [];
    this.questionCount = 0;
    this.ready = false;
  }
}
