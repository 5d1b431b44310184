/**
 * Related Work Pipeline
 *
 * keyword plan → arXiv search over extracted terms → dedup → relevance filter
 * → technical comparison → experimental comparison → summary.
 * Short-circuits with a fixed message when the search finds nothing.
 */

import type { PaperResult, ProgressCallback } from '@radar/shared';
import type { ChatCompletionClient } from '../llm';
import { errorMessage, log } from '../logging';
import { Agent, PERSONAS, type AgentOptions } from '../agents/agent';
import { defaultResponseClassifier, type ResponseClassifier } from '../agents/response-classifier';
import {
  NO_RELATED_PAPERS_MESSAGE,
  RELATED_EXPERIMENT_PROMPT,
  RELATED_FILTER_PROMPT,
  RELATED_KEYWORD_PROMPT,
  RELATED_SUMMARY_PROMPT,
  RELATED_TECH_PROMPT,
} from '../prompts/related-work';
import { dedupeByTitle } from '../search/dedupe';
import { windowForDays } from '../search/time-range';
import type { SearchSourceClient } from '../search/types';

export interface RelatedWorkOptions extends AgentOptions {
  maxKeywords?: number;
  perKeywordLimit?: number;
  windowDays?: number;
  filterCandidateLimit?: number;
  abstractExcerptChars?: number;
  comparisonContextChars?: number;
  summaryListChars?: number;
  classifier?: ResponseClassifier;
}

export interface RelatedWorkRunOptions {
  onProgress?: ProgressCallback;
  now?: Date;
}

export function formatCandidateList(papers: readonly PaperResult[], limit: number, excerptChars: number): string {
  return papers
    .slice(0, limit)
    .map((paper, index) => `[${index + 1}] ${paper.title}\n摘要: ${paper.abstract.slice(0, excerptChars)}...`)
    .join('\n');
}

export class RelatedWorkPipeline {
  private readonly brain: Agent;
  private readonly techAnalyst: Agent;
  private readonly experimentAnalyst: Agent;
  private readonly classifier: ResponseClassifier;
  private readonly settings: Required<Omit<RelatedWorkOptions, keyof AgentOptions | 'classifier'>>;

  constructor(
    llm: ChatCompletionClient,
    private readonly papers: SearchSourceClient<PaperResult>,
    options: RelatedWorkOptions = {}
  ) {
    const agentOptions: AgentOptions = { maxAttempts: options.maxAttempts, temperature: options.temperature };
    this.brain = new Agent(llm, PERSONAS.relatedBrain, agentOptions);
    this.techAnalyst = new Agent(llm, PERSONAS.techComparison, agentOptions);
    this.experimentAnalyst = new Agent(llm, PERSONAS.experimentComparison, agentOptions);
    this.classifier = options.classifier ?? defaultResponseClassifier;
    this.settings = {
      maxKeywords: options.maxKeywords ?? 3,
      perKeywordLimit: options.perKeywordLimit ?? 10,
      windowDays: options.windowDays ?? 1095,
      filterCandidateLimit: options.filterCandidateLimit ?? 20,
      abstractExcerptChars: options.abstractExcerptChars ?? 300,
      comparisonContextChars: options.comparisonContextChars ?? 8000,
      summaryListChars: options.summaryListChars ?? 5000,
    };
  }

  async run(paperInfo: string, options: RelatedWorkRunOptions = {}): Promise<string> {
    const notify = (message: string) => options.onProgress?.(message);
    const startedAt = Date.now();

    notify('大脑Agent正在分析论文并提取搜索关键词...');
    const keywordPlan = await this.brain.think(RELATED_KEYWORD_PROMPT, paperInfo);

    notify('正在搜索arXiv相关论文（近3年）...');
    const candidates = dedupeByTitle(await this.searchRelated(keywordPlan, options.now));

    if (candidates.length === 0) {
      log({ level: 'info', component: 'RelatedWork', message: 'No candidate papers found' });
      return NO_RELATED_PAPERS_MESSAGE;
    }

    notify(`大脑Agent正在从${candidates.length}篇论文中筛选最相关的...`);
    const candidateList = formatCandidateList(
      candidates,
      this.settings.filterCandidateLimit,
      this.settings.abstractExcerptChars
    );
    const filterResult = await this.brain.think(
      RELATED_FILTER_PROMPT,
      `当前论文:\n${paperInfo}\n\n候选相关论文:\n${candidateList}`
    );

    const comparisonInput = `当前论文:\n${paperInfo}\n\n相关论文:\n${candidateList.slice(0, this.settings.comparisonContextChars)}`;

    notify('技术框架分析Agent正在分析技术差异...');
    const techComparison = await this.techAnalyst.think(RELATED_TECH_PROMPT, comparisonInput);

    notify('实验分析Agent正在分析实验差异...');
    const experimentComparison = await this.experimentAnalyst.think(RELATED_EXPERIMENT_PROMPT, comparisonInput);

    notify('大脑Agent正在汇总分析结果...');
    const summaryInput = [
      `当前论文: ${paperInfo}`,
      `搜索关键词分析:\n${keywordPlan}`,
      `筛选结果:\n${filterResult}`,
      `技术框架对比分析:\n${techComparison}`,
      `实验对比分析:\n${experimentComparison}`,
      `找到的相关论文列表:\n${candidateList.slice(0, this.settings.summaryListChars)}`,
    ].join('\n\n');
    const report = await this.brain.think(RELATED_SUMMARY_PROMPT, summaryInput);

    log({
      level: 'info',
      component: 'RelatedWork',
      message: `Related-work report ready from ${candidates.length} candidates`,
      durationMs: Date.now() - startedAt,
    });
    return report;
  }

  private async searchRelated(keywordPlan: string, now?: Date): Promise<PaperResult[]> {
    const terms = this.classifier.extractSearchTerms(keywordPlan).slice(0, this.settings.maxKeywords);
    const window = windowForDays(this.settings.windowDays, now);
    const found: PaperResult[] = [];

    for (const term of terms) {
      try {
        found.push(...(await this.papers.search(term, window, this.settings.perKeywordLimit)));
      } catch (error) {
        log({ level: 'warn', component: 'RelatedWork', message: `Search for "${term}" failed: ${errorMessage(error)}` });
      }
    }

    return found;
  }
}
