/**
 * Content Analysis Pipeline
 *
 * plan → domain experts → (vision) → summary → reflection → bounded repair.
 * Stages run strictly in order; a failing stage aborts the run.
 */

import type { ChatCompletionClient } from '../llm';
import { log } from '../logging';
import { Agent, PERSONAS, VisionAgent, type AgentOptions } from '../agents/agent';
import { defaultResponseClassifier, type ResponseClassifier } from '../agents/response-classifier';
import {
  ARCHITECTURE_PROMPT,
  CODE_PROMPT,
  EXPERIMENT_PROMPT,
  IMPROVE_PROMPT,
  METHOD_PROMPT,
  PAPER_PLAN_PROMPT,
  PAPER_SUMMARY_PROMPT,
  PROJECT_PLAN_PROMPT,
  PROJECT_SUMMARY_PROMPT,
  REFLECT_PROMPT,
  REVIEW_PROMPT,
  USAGE_PROMPT,
} from '../prompts/analysis';
import type {
  AnalysisProfile,
  AnalysisResult,
  AnalysisRun,
  AnalysisRunOptions,
  AnalysisStage,
  ContentAnalyzer,
} from './types';

export const PAPER_PROFILE: AnalysisProfile = {
  id: 'paper',
  planInstructions: PAPER_PLAN_PROMPT,
  summaryInstructions: PAPER_SUMMARY_PROMPT,
  stages: [
    {
      key: 'method',
      persona: PERSONAS.method,
      instructions: METHOD_PROMPT,
      progress: '方法理解Agent正在分析核心方法...',
      heading: '【方法理解Agent分析】',
    },
    {
      key: 'experiment',
      persona: PERSONAS.experiment,
      instructions: EXPERIMENT_PROMPT,
      progress: '实验分析Agent正在分析实验设计...',
      heading: '【实验分析Agent分析】',
    },
    {
      key: 'review',
      persona: PERSONAS.reviewer,
      instructions: REVIEW_PROMPT,
      progress: '审稿人Agent正在进行批判性评审...',
      heading: '【审稿人Agent评审】',
    },
  ],
  visionProgress: '视觉分析Agent正在分析论文图片...',
  sourceHeading: '原始论文信息',
  reflectionSourceLabel: '原始论文',
};

/** Used for GitHub repositories and model-hub entries alike. */
export const PROJECT_PROFILE: AnalysisProfile = {
  id: 'project',
  planInstructions: PROJECT_PLAN_PROMPT,
  summaryInstructions: PROJECT_SUMMARY_PROMPT,
  stages: [
    {
      key: 'architecture',
      persona: PERSONAS.architecture,
      instructions: ARCHITECTURE_PROMPT,
      progress: '架构分析Agent正在分析项目架构...',
      heading: '【架构分析Agent】',
    },
    {
      key: 'code',
      persona: PERSONAS.code,
      instructions: CODE_PROMPT,
      progress: '代码分析Agent正在分析核心代码...',
      heading: '【代码分析Agent】',
    },
    {
      key: 'usage',
      persona: PERSONAS.usage,
      instructions: USAGE_PROMPT,
      progress: '使用分析Agent正在分析使用方法...',
      heading: '【使用分析Agent】',
    },
  ],
  visionProgress: '视觉分析Agent正在分析图片...',
  sourceHeading: '原始项目信息',
};

export const PLAN_PROGRESS = '大脑Agent正在规划分析任务...';
export const SUMMARY_PROGRESS = '大脑Agent正在汇总分析结果...';
export const REFLECT_PROGRESS = '大脑Agent正在进行质量检查...';
export const REPAIR_PROGRESS = '发现问题，正在改进...';

export interface ContentAnalysisOptions extends AgentOptions {
  /** Upper bound on improve calls per run */
  maxRepairPasses?: number;
  /** Leading slice of the content handed to the vision stage as background */
  visionContextChars?: number;
  classifier?: ResponseClassifier;
}

interface StageOutput {
  stage: AnalysisStage;
  text: string;
}

export class ContentAnalysisPipeline implements ContentAnalyzer {
  private readonly brain: Agent;
  private readonly experts: Array<{ stage: AnalysisStage; agent: Agent }>;
  private readonly vision: VisionAgent;
  private readonly classifier: ResponseClassifier;
  private readonly maxRepairPasses: number;
  private readonly visionContextChars: number;

  constructor(
    llm: ChatCompletionClient,
    readonly profile: AnalysisProfile,
    options: ContentAnalysisOptions = {}
  ) {
    const agentOptions: AgentOptions = {
      maxAttempts: options.maxAttempts,
      temperature: options.temperature,
    };
    this.brain = new Agent(llm, PERSONAS.brain, agentOptions);
    this.experts = profile.stages.map((stage) => ({ stage, agent: new Agent(llm, stage.persona, agentOptions) }));
    this.vision = new VisionAgent(llm, agentOptions);
    this.classifier = options.classifier ?? defaultResponseClassifier;
    this.maxRepairPasses = Math.max(0, options.maxRepairPasses ?? 1);
    this.visionContextChars = options.visionContextChars ?? 2000;
  }

  async run(content: string, options: AnalysisRunOptions = {}): Promise<string> {
    const { report } = await this.analyze(content, options);
    return report;
  }

  async analyze(content: string, options: AnalysisRunOptions = {}): Promise<AnalysisRun> {
    const notify = (message: string) => options.onProgress?.(message);
    const startedAt = Date.now();

    notify(PLAN_PROGRESS);
    // The plan steers nothing downstream; it is still issued so the brain sees the material first.
    await this.brain.think(this.profile.planInstructions, content);

    const outputs: StageOutput[] = [];
    for (const { stage, agent } of this.experts) {
      notify(stage.progress);
      outputs.push({ stage, text: await agent.think(stage.instructions, content) });
    }

    const images = options.images ?? [];
    let visionText: string | undefined;
    if (images.length > 0 && this.vision.supportsVision) {
      notify(this.profile.visionProgress);
      visionText = await this.vision.analyzeImages(images, content.slice(0, this.visionContextChars));
    }

    notify(SUMMARY_PROGRESS);
    let report = await this.brain.think(
      this.profile.summaryInstructions,
      this.buildSummaryInput(content, outputs, visionText)
    );

    notify(REFLECT_PROGRESS);
    let reflection = await this.brain.think(REFLECT_PROMPT, this.buildReflectionInput(report, content));

    let repairPasses = 0;
    while (repairPasses < this.maxRepairPasses && this.classifier.needsRepair(reflection)) {
      notify(REPAIR_PROGRESS);
      report = await this.brain.think(IMPROVE_PROMPT, this.buildRepairInput(reflection, report, content));
      repairPasses += 1;

      if (repairPasses < this.maxRepairPasses) {
        notify(REFLECT_PROGRESS);
        reflection = await this.brain.think(REFLECT_PROMPT, this.buildReflectionInput(report, content));
      }
    }

    log({
      level: 'info',
      component: 'ContentAnalysis',
      message: `${this.profile.id} report ready (${outputs.length} expert stages, ${repairPasses} repair passes)`,
      durationMs: Date.now() - startedAt,
    });

    const stages: AnalysisResult = {};
    for (const output of outputs) {
      stages[output.stage.key] = output.text;
    }
    if (visionText !== undefined) {
      stages.vision = visionText;
    }

    return { report, stages, reflection, repairPasses };
  }

  private buildSummaryInput(content: string, outputs: StageOutput[], visionText?: string): string {
    const sections = [
      `${this.profile.sourceHeading}:\n${content}`,
      '各专家分析结果:',
      ...outputs.map(({ stage, text }) => `${stage.heading}\n${text}`),
    ];
    if (visionText !== undefined) {
      sections.push(`【视觉分析Agent】\n${visionText}`);
    }
    return sections.join('\n\n');
  }

  private buildReflectionInput(report: string, content: string): string {
    const label = this.profile.reflectionSourceLabel;
    return label ? `最终报告:\n${report}\n\n${label}:\n${content}` : `最终报告:\n${report}`;
  }

  private buildRepairInput(reflection: string, report: string, content: string): string {
    const base = `质量检查反馈:\n${reflection}\n\n原报告:\n${report}`;
    const label = this.profile.reflectionSourceLabel;
    return label ? `${base}\n\n${label}:\n${content}` : base;
  }
}
