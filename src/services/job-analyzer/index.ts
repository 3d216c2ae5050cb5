/**
 * Job Analyzer Service
 *
 * Turns raw job-posting text into a structured JobAnalysis.
 *
 * How it works:
 * 1. Asks the LLM gateway for a fixed-schema JSON analysis
 * 2. Parses the answer (structured → labelled sections → nothing)
 * 3. Falls back to locally derived signals when the model is unavailable
 *    or its answer is unusable
 *
 * The analyzer never fails a request: the worst case is a keyword-frequency
 * analysis of the posting itself.
 */

import { createLogger } from '@/lib/logger';
import type { LlmGateway } from '@/services/llm-gateway';
import { analyzeLocally, inferExperienceLevel } from './local-signals';
import { parseJobAnalysis } from './parser';
import { JOB_ANALYSIS_SYSTEM_PROMPT, buildJobAnalysisPrompt } from './prompts';
import type { AnalysisFields, AnalysisSource, JobAnalysis } from './types';

const log = createLogger('Job Analyzer');

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export class JobAnalyzer {
  constructor(private readonly gateway: LlmGateway) {}

  async analyze(
    jobPostingText: string,
    jobTitle?: string | null,
    companyName?: string | null,
    options: AnalyzeOptions = {}
  ): Promise<JobAnalysis> {
    const startTime = Date.now();
    const posting = jobPostingText.trim();

    // =========================================================================
    // Step 1: Ask the model
    // =========================================================================
    const completion = await this.gateway.completeFor(
      'JOB_ANALYSIS',
      JOB_ANALYSIS_SYSTEM_PROMPT,
      buildJobAnalysisPrompt({ jobPosting: posting, jobTitle, companyName }),
      { signal: options.signal }
    );

    // =========================================================================
    // Step 2: Parse, or degrade to local signals
    // =========================================================================
    let fields: AnalysisFields;
    let source: AnalysisSource;

    if (completion.success) {
      const parsed = parseJobAnalysis(completion.content);
      if (parsed.kind === 'default') {
        log.warn('Model response was not usable, deriving analysis locally');
        fields = analyzeLocally(posting, jobTitle);
        source = 'default';
      } else {
        fields = parsed.fields;
        source = parsed.kind;
      }
    } else {
      log.warn(`AI analysis unavailable (${completion.errorReason}), deriving analysis locally`);
      fields = analyzeLocally(posting, jobTitle);
      source = 'default';
    }

    const analysis = finalizeAnalysis(fields, source, posting, jobTitle, companyName);

    log.info(`Analysis complete in ${Date.now() - startTime}ms`, {
      source,
      experienceLevel: analysis.experienceLevel,
      requiredSkills: analysis.requiredSkills.length,
      primaryKeywords: analysis.primaryKeywords.length,
    });

    return analysis;
  }
}

// ============================================================================
// Scoring helpers
// ============================================================================

/**
 * Required skills start at 0.9 and step down to 0.6, preferred skills start
 * at 0.5 and step down to 0.3. Priorities reported by the model win.
 */
export function computeSkillPriority(
  requiredSkills: readonly string[],
  preferredSkills: readonly string[],
  reported: Readonly<Record<string, number>> = {}
): Record<string, number> {
  const priority: Record<string, number> = {};

  preferredSkills.forEach((skill, index) => {
    priority[skill] = round2(Math.max(0.3, 0.5 - index * 0.05));
  });
  requiredSkills.forEach((skill, index) => {
    priority[skill] = round2(Math.max(0.6, 0.9 - index * 0.05));
  });

  return { ...priority, ...reported };
}

export function computeMatchPotential(requiredSkillCount: number, primaryKeywordCount: number): number {
  return round2(Math.min(1, 0.3 + 0.05 * requiredSkillCount + 0.02 * primaryKeywordCount));
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function finalizeAnalysis(
  fields: AnalysisFields,
  source: AnalysisSource,
  posting: string,
  jobTitle?: string | null,
  companyName?: string | null
): JobAnalysis {
  const title = jobTitle?.trim() || fields.jobTitle;
  return Object.freeze({
    jobTitle: title,
    companyName: companyName?.trim() || fields.companyName,
    experienceLevel: fields.experienceLevel ?? inferExperienceLevel(posting, title),
    requiredSkills: Object.freeze([...fields.requiredSkills]),
    preferredSkills: Object.freeze([...fields.preferredSkills]),
    primaryKeywords: Object.freeze([...fields.primaryKeywords]),
    secondaryKeywords: Object.freeze([...fields.secondaryKeywords]),
    actionVerbs: Object.freeze([...fields.actionVerbs]),
    responsibilities: Object.freeze([...fields.responsibilities]),
    companyCulture: Object.freeze([...fields.companyCulture]),
    optimizationTips: Object.freeze([...fields.optimizationTips]),
    jobType: fields.jobType,
    remoteType: fields.remoteType,
    skillPriority: Object.freeze(
      computeSkillPriority(fields.requiredSkills, fields.preferredSkills, fields.skillPriority)
    ),
    matchPotential: computeMatchPotential(fields.requiredSkills.length, fields.primaryKeywords.length),
    source,
  });
}

export { analyzeLocally } from './local-signals';
export { parseJobAnalysis } from './parser';
export * from './types';
