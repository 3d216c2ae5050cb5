/**
 * Resume Tailoring Engine
 *
 * Produces a job-specific resume from the master resume and a JobAnalysis.
 *
 * How it works:
 * 1. Asks the model for tailored, structured content (falls back to parsing
 *    the master resume locally)
 * 2. Drops disabled sections, then reorders and trims to the page budget
 * 3. Renders plain text and scores it for ATS compatibility
 * 4. Renders LaTeX, degrading to the AI conversion and then the fallback
 *    template when a document cannot be cleaned
 */

import { getErrorMessage, MalformedDocumentError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { parseAiJson } from '@/lib/safe-json';
import { resumeContentSchema, type ResumeContent, type SectionToggles } from '@/lib/validations/resume';
import type { JobAnalysis } from '@/services/job-analyzer';
import { buildLatex, fallbackDocument, processDocument } from '@/services/latex';
import type { LlmGateway } from '@/services/llm-gateway';
import { computeAtsScore } from './ats-score';
import { applySectionToggles, prioritizeContent } from './prioritizer';
import {
  LATEX_CONVERSION_SYSTEM_PROMPT,
  RESUME_TAILORING_SYSTEM_PROMPT,
  buildLatexConversionPrompt,
  buildTailoringPrompt,
} from './prompts';
import { renderTailoredText } from './render-text';
import { parseResumeText } from './resume-parser';
import type { LatexOrigin, OptimizationMetric, TailorOptions, TailoringResult } from './types';

const log = createLogger('Resume Tailor');

function hasEntries(content: ResumeContent): boolean {
  return content.experience.length > 0 || content.education.length > 0 || content.projects.length > 0;
}

export class ResumeTailor {
  constructor(private readonly gateway: LlmGateway) {}

  async tailor(
    masterResumeText: string,
    jobPosting: string,
    analysis: JobAnalysis,
    toggles: SectionToggles,
    targetLength: number,
    options: TailorOptions = {}
  ): Promise<TailoringResult> {
    const startTime = Date.now();
    const notes: string[] = [];

    // =========================================================================
    // Step 1: Acquire structured content
    // =========================================================================
    const localContent = parseResumeText(masterResumeText);
    let content = localContent;
    let aiTailored = false;

    const completion = await this.gateway.completeFor(
      'RESUME_TAILORING',
      RESUME_TAILORING_SYSTEM_PROMPT,
      buildTailoringPrompt({
        masterResume: masterResumeText,
        jobPosting,
        analysis,
        toggles,
        targetLength,
        priorityExperiences: options.priorityExperiences,
        prioritySkills: options.prioritySkills,
      }),
      { signal: options.signal }
    );

    if (completion.success) {
      const parsed = parseAiJson(completion.content, resumeContentSchema);
      if (parsed && hasEntries(parsed)) {
        content = parsed.header.name ? parsed : { ...parsed, header: localContent.header };
        aiTailored = true;
      } else {
        log.warn('Tailoring response was not usable, prioritizing the master resume locally');
        notes.push('AI response could not be used. Resume content was prioritized locally using job keywords.');
      }
    } else {
      log.warn(`AI tailoring unavailable (${completion.errorReason}), prioritizing locally`);
      notes.push(completion.content);
    }

    // =========================================================================
    // Step 2: Toggles and page budget
    // =========================================================================
    const prioritized = prioritizeContent(applySectionToggles(content, toggles), analysis, targetLength, {
      priorityExperiences: options.priorityExperiences,
      prioritySkills: options.prioritySkills,
      currentYear: options.currentYear,
    });

    // =========================================================================
    // Step 3: Text and score
    // =========================================================================
    const tailoredResumeText = renderTailoredText(prioritized.content);
    const ats = computeAtsScore(tailoredResumeText, prioritized.content, analysis, toggles);

    // =========================================================================
    // Step 4: LaTeX
    // =========================================================================
    const latex = await this.produceLatex(prioritized.content, tailoredResumeText, analysis, options);

    notes.unshift(
      ats.score >= 80
        ? 'Excellent ATS compatibility'
        : ats.score >= 60
          ? 'Good ATS compatibility'
          : 'Consider adding more keywords from the job posting'
    );
    if (analysis.requiredSkills.length > 8) {
      notes.push('The posting lists many required skills; the strongest matches are shown first');
    }
    if (analysis.experienceLevel === 'SENIOR' || analysis.experienceLevel === 'EXECUTIVE') {
      notes.push('Senior role: make sure leadership and mentoring achievements stand out');
    }
    if (prioritized.bulletsDropped > 0) {
      notes.push(`${prioritized.bulletsDropped} lower-relevance bullet(s) trimmed to fit ${targetLength} page(s)`);
    }
    if (latex.origin === 'fallback') {
      notes.push('LaTeX could not be generated from the tailored content; a fallback template was used');
    }

    const metrics: Record<OptimizationMetric, number> = {
      keywordCoverage: ats.keywordCoverage,
      requiredSkillCoverage: ats.requiredSkillCoverage,
      quantifiedBullets: ats.quantifiedBullets,
      sectionCompleteness: ats.sectionCompleteness,
      experienceEntries: prioritized.content.experience.length,
      bulletsKept: prioritized.bulletsKept,
      bulletsDropped: prioritized.bulletsDropped,
    };

    log.info(`Tailoring complete in ${Date.now() - startTime}ms`, {
      atsScore: ats.score,
      aiTailored,
      latexOrigin: latex.origin,
    });

    const result: TailoringResult = {
      tailoredResumeText,
      latexSource: latex.source,
      atsScore: ats.score,
      jobAnalysis: analysis,
      selectedExperiences: Object.freeze(prioritized.selectedExperiences),
      selectedSkills: Object.freeze(prioritized.selectedSkills),
      metrics: Object.freeze(metrics),
      processingNotes: Object.freeze(notes),
      degraded: Object.freeze({ ai: !aiTailored, latex: latex.origin === 'fallback' || latex.origin === 'none' }),
      latexOrigin: latex.origin,
      status: latex.origin === 'none' ? 'ERROR' : 'COMPLETED',
      errorMessage: latex.error,
    };
    return Object.freeze(result);
  }

  // ===========================================================================
  // LaTeX production
  // ===========================================================================

  private async produceLatex(
    content: ResumeContent,
    tailoredText: string,
    analysis: JobAnalysis,
    options: TailorOptions
  ): Promise<{ source: string; origin: LatexOrigin; error: string | null }> {
    if ((options.latexStrategy ?? 'structured') === 'structured') {
      const structured = this.renderStructured(content);
      if (structured) return { source: structured, origin: 'structured', error: null };
    }

    const converted = await this.convertWithAi(tailoredText, options.signal);
    if (converted) return { source: converted, origin: 'ai', error: null };

    try {
      return {
        source: fallbackDocument({ jobTitle: analysis.jobTitle, companyName: analysis.companyName }),
        origin: 'fallback',
        error: null,
      };
    } catch (error) {
      log.error('Fallback document could not be rendered', { error: getErrorMessage(error) });
      return { source: '', origin: 'none', error: getErrorMessage(error) };
    }
  }

  private renderStructured(content: ResumeContent): string | null {
    try {
      const result = processDocument(buildLatex(content), { origin: 'rendered' });
      if (result.state === 'VALID') return result.latex;
      this.reportMalformed('Structured render', result.reason);
      return null;
    } catch (error) {
      log.error('Structured LaTeX render failed', { error: getErrorMessage(error) });
      return null;
    }
  }

  private async convertWithAi(tailoredText: string, signal?: AbortSignal): Promise<string | null> {
    const completion = await this.gateway.completeFor(
      'LATEX_CONVERSION',
      LATEX_CONVERSION_SYSTEM_PROMPT,
      buildLatexConversionPrompt(tailoredText),
      { signal }
    );
    if (!completion.success) {
      log.warn(`AI LaTeX conversion unavailable (${completion.errorReason})`);
      return null;
    }

    const result = processDocument(completion.content);
    if (result.state === 'VALID') return result.latex;
    this.reportMalformed('AI conversion', result.reason);
    return null;
  }

  private reportMalformed(stage: string, reason: string): void {
    const issue = new MalformedDocumentError(`${stage} produced a malformed document`, {
      details: { reason },
    });
    log.warn(issue.message, { traceId: issue.traceId, reason });
  }
}

export { computeAtsScore, isQuantified } from './ats-score';
export { applySectionToggles, pageBudget, prioritizeContent } from './prioritizer';
export { renderTailoredText } from './render-text';
export { parseResumeText } from './resume-parser';
export * from './types';
