import type { ImageReference } from '@radar/shared';
import type { ChatCompletionClient, LLMMessage } from '../llm';
import { log } from '../logging';
import { VISION_PROMPT } from '../prompts/analysis';
import { askWithContinuation } from './continuation';
import { isMultimodalModel } from './models';

export interface Persona {
  name: string;
  role: string;
}

export interface AgentOptions {
  maxAttempts?: number;
  temperature?: number;
}

export interface ThinkOptions {
  history?: readonly LLMMessage[];
  images?: readonly ImageReference[];
}

/**
 * A named persona over a shared chat client. Holds no conversation state:
 * whatever history a caller wants considered is passed in on each call.
 */
export class Agent {
  readonly supportsVision: boolean;

  constructor(
    protected readonly llm: ChatCompletionClient,
    readonly persona: Persona,
    private readonly options: AgentOptions = {}
  ) {
    this.supportsVision = isMultimodalModel(llm.getModel());
  }

  get name(): string {
    return this.persona.name;
  }

  systemPrompt(instructions: string): string {
    return `你是${this.persona.name}，${this.persona.role}\n\n${instructions}`;
  }

  async think(instructions: string, content: string, options: ThinkOptions = {}): Promise<string> {
    const startedAt = Date.now();
    const text = await askWithContinuation(this.llm, {
      systemPrompt: this.systemPrompt(instructions),
      userContent: content,
      history: options.history,
      images: options.images,
      supportsVision: this.supportsVision,
      maxAttempts: this.options.maxAttempts,
      temperature: this.options.temperature,
    });

    log({
      level: 'debug',
      component: 'Agent',
      message: `${this.persona.name} answered with ${text.length} chars`,
      durationMs: Date.now() - startedAt,
    });
    return text;
  }
}

export class VisionAgent extends Agent {
  constructor(llm: ChatCompletionClient, options: AgentOptions = {}) {
    super(llm, PERSONAS.vision, options);
  }

  /** Returns '' without calling the model when there is nothing it can look at. */
  async analyzeImages(images: readonly ImageReference[], context = ''): Promise<string> {
    if (images.length === 0 || !this.supportsVision) {
      return '';
    }
    const content = context ? `请分析以下图片。\n\n背景信息：${context}` : '请分析以下图片。';
    return this.think(VISION_PROMPT, content, { images });
  }
}

export const PERSONAS = {
  brain: {
    name: '大脑Agent',
    role: '负责任务规划、协调各个专家Agent、汇总结果并进行质量控制的总指挥',
  },
  method: {
    name: '方法理解Agent',
    role: '专注于理解和解释论文核心方法、技术原理的方法论专家',
  },
  experiment: {
    name: '实验分析Agent',
    role: '专注于分析实验设计、数据集、实验结果和资源消耗的实验专家',
  },
  reviewer: {
    name: '审稿人Agent',
    role: '一位严格的学术审稿人，负责批判性分析论文的优势、劣势和学术规范性',
  },
  architecture: {
    name: '架构分析Agent',
    role: '专注于分析项目架构、技术栈、模块设计的架构师',
  },
  code: {
    name: '代码分析Agent',
    role: '专注于分析核心代码实现、算法逻辑、代码质量的代码专家',
  },
  usage: {
    name: '使用分析Agent',
    role: '专注于分析项目使用方法、API接口、部署方式的应用专家',
  },
  vision: {
    name: '视觉分析Agent',
    role: '专注于分析架构图、实验结果图、表格等视觉内容的多模态专家',
  },
  relatedBrain: {
    name: '大脑Agent',
    role: '负责规划搜索策略、协调分析、汇总比较结果的总指挥',
  },
  techComparison: {
    name: '技术框架分析Agent',
    role: '专注于分析和比较不同论文的技术框架、方法论差异',
  },
  experimentComparison: {
    name: '实验分析Agent',
    role: '专注于分析和比较不同论文的实验设置、任务、效果差异',
  },
  interviewer: {
    name: '访谈Agent',
    role: '负责通过友好的对话了解用户的研究需求和背景',
  },
  intentBrain: {
    name: '大脑Agent',
    role: '负责分析用户意图、构建搜索策略、筛选结果',
  },
} satisfies Record<string, Persona>;
