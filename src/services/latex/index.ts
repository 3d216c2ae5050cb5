/**
 * LaTeX Document Builder / Validator
 */

export { buildLatex, renderFreeTextBody, renderResumeBody } from './builder';
export {
  BEGIN_SENTINEL,
  END_SENTINEL,
  clean,
  cleanDocument,
  hasBalancedBraces,
  isRefusal,
  processDocument,
  validate,
} from './document';
export type {
  DocumentOptions,
  DocumentOrigin,
  DocumentRepair,
  DocumentState,
  MalformedReason,
  ValidationResult,
} from './document';
export { escapeLatex, escapeUrl, normalizeUnicode, sanitizeValue } from './escape';
export { BODY_PLACEHOLDER, fallbackDocument, getResumeTemplate, wrapInTemplate } from './template';
export type { FallbackOptions } from './template';
