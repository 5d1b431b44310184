import type { ImageReference, ProgressCallback } from '@radar/shared';
import type { Persona } from '../agents/agent';

/** Stage key → text produced by that stage during one run. */
export type AnalysisResult = Record<string, string>;

export interface AnalysisStage {
  key: string;
  persona: Persona;
  instructions: string;
  /** Emitted before the stage runs */
  progress: string;
  /** Section heading the stage output is filed under in the summary input */
  heading: string;
}

/**
 * Everything that differs between analysing a paper and analysing a project:
 * the domain experts, their prompts, and how much of the source the
 * quality check gets to see.
 */
export interface AnalysisProfile {
  id: 'paper' | 'project';
  planInstructions: string;
  summaryInstructions: string;
  stages: readonly AnalysisStage[];
  visionProgress: string;
  /** Label of the source block in the summary input */
  sourceHeading: string;
  /** When set, reflection and repair also receive the source under this label */
  reflectionSourceLabel?: string;
}

export interface AnalysisRunOptions {
  images?: readonly ImageReference[];
  onProgress?: ProgressCallback;
}

export interface AnalysisRun {
  report: string;
  stages: AnalysisResult;
  reflection: string;
  repairPasses: number;
}

/** Anything that can turn artifact content into a report. */
export interface ContentAnalyzer {
  run(content: string, options?: AnalysisRunOptions): Promise<string>;
}
