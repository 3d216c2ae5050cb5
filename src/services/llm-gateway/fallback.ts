import type { CompletionPurpose } from './types';

const FALLBACK_TEXT: Record<CompletionPurpose, string> = {
  JOB_ANALYSIS:
    'AI job analysis is unavailable. The analysis was derived from keywords found in the posting.',
  RESUME_TAILORING:
    'AI tailoring is unavailable. Resume content was prioritized locally using job keywords.',
  LATEX_CONVERSION:
    'AI LaTeX conversion is unavailable. The document was rendered from the standard template.',
  GENERAL:
    'AI service temporarily unavailable. Your request has been noted and will be processed when the service is restored.',
};

/**
 * Locally generated stand-in text for a failed or skipped completion.
 * Same purpose, same text: callers can rely on it being reproducible.
 */
export function fallbackContent(purpose: CompletionPurpose): string {
  return FALLBACK_TEXT[purpose];
}
