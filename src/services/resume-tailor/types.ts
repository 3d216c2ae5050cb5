/**
 * Resume Tailoring Types
 */

import type { JobAnalysis } from '@/services/job-analyzer';

export type TailoringStatus = 'COMPLETED' | 'ERROR';

/**
 * `structured` renders the content model and only asks the model for LaTeX
 * when that fails; `ai` asks the model to write the document directly.
 */
export type LatexStrategy = 'structured' | 'ai';

/** Which path produced the final document */
export type LatexOrigin = 'structured' | 'ai' | 'fallback' | 'none';

export const OPTIMIZATION_METRICS = [
  'keywordCoverage',
  'requiredSkillCoverage',
  'quantifiedBullets',
  'sectionCompleteness',
  'experienceEntries',
  'bulletsKept',
  'bulletsDropped',
] as const;

export type OptimizationMetric = (typeof OPTIMIZATION_METRICS)[number];

export interface TailoringResult {
  readonly tailoredResumeText: string;
  /** Empty only when status is ERROR */
  readonly latexSource: string;
  /** Integer in [0, 100] */
  readonly atsScore: number;
  readonly jobAnalysis: JobAnalysis;
  readonly selectedExperiences: readonly string[];
  readonly selectedSkills: readonly string[];
  readonly metrics: Readonly<Record<OptimizationMetric, number>>;
  readonly processingNotes: readonly string[];
  readonly degraded: Readonly<{ ai: boolean; latex: boolean }>;
  readonly latexOrigin: LatexOrigin;
  readonly status: TailoringStatus;
  readonly errorMessage: string | null;
}

export interface TailorOptions {
  latexStrategy?: LatexStrategy;
  priorityExperiences?: readonly string[];
  prioritySkills?: readonly string[];
  signal?: AbortSignal;
  /** Year used for "Present" end dates; defaults to the current year */
  currentYear?: number;
}
