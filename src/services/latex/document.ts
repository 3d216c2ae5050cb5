/**
 * LaTeX document cleaning and validation
 *
 * Each document moves RAW → CLEANED → VALID, or RAW → MALFORMED.
 *
 * Cleaning strips what models wrap around a document (code fences,
 * narration, sentinel markers), trims duplicated documents, appends a
 * missing `\end{document}` and wraps `\item`s that sit outside any list.
 * Inputs are never mutated; a `null` from `clean` means the caller must
 * use its fallback.
 */

import { normalizeUnicode } from './escape';

export const BEGIN_SENTINEL = '%__BEGIN_LATEX__';
export const END_SENTINEL = '%__END_LATEX__';

const DOCUMENTCLASS = '\\documentclass';
const BEGIN_DOCUMENT = '\\begin{document}';
const END_DOCUMENT = '\\end{document}';

const MIN_DOCUMENT_LENGTH = 50;

export type MalformedReason =
  | 'EMPTY'
  | 'REFUSAL'
  | 'FOREIGN_CODE_FENCE'
  | 'MISSING_DOCUMENTCLASS'
  | 'MISSING_BEGIN_DOCUMENT'
  | 'MISSING_END_DOCUMENT'
  | 'DUPLICATE_STRUCTURE'
  | 'TOO_SHORT'
  | 'UNBALANCED_BRACES';

export type DocumentRepair =
  | 'EXTRACTED_FROM_SENTINELS'
  | 'STRIPPED_WRAPPER_TEXT'
  | 'TRIMMED_DUPLICATE_DOCUMENT'
  | 'APPENDED_END_DOCUMENT'
  | 'WRAPPED_LONELY_ITEMS';

export type DocumentState =
  | { state: 'CLEANED'; latex: string; repairs: DocumentRepair[] }
  | { state: 'VALID'; latex: string; repairs: DocumentRepair[] }
  | { state: 'MALFORMED'; reason: MalformedReason };

export type ValidationResult = { ok: true; reason: null } | { ok: false; reason: MalformedReason };

/**
 * Where a document came from. `model` covers completions and caller-supplied
 * LaTeX; `rendered` covers documents this package built from resume content,
 * whose prose is the user's own.
 */
export type DocumentOrigin = 'model' | 'rendered';

export interface DocumentOptions {
  origin?: DocumentOrigin;
}

// ============================================================================
// Detection
// ============================================================================

const REFUSAL_PATTERN =
  /\b(I cannot|I can't|I can not|I'm sorry|I am sorry|I'm unable|I am unable|I apologi[sz]e|As an AI)\b/i;

// Rendered documents only refuse when a line opens with the apology
const RENDERED_REFUSAL_PATTERN = /^[ \t]*(I cannot|I'm sorry)\b/m;

const FOREIGN_FENCE_PATTERN =
  /```[ \t]*(python|py|javascript|js|typescript|ts|java|json|html|css|bash|sh|shell|sql|yaml|yml|xml|cpp|c\+\+|go|ruby|php|markdown|md)\b/i;

const FENCE_LINE_PATTERN = /^\s*```[A-Za-z]*\s*$/;

const NARRATION_PATTERN =
  /^\s*(here is|here's|below is|following is|the latex|this latex|note:|i've|i have (created|generated|converted))/i;

export function isRefusal(text: string, origin: DocumentOrigin = 'model'): boolean {
  const pattern = origin === 'rendered' ? RENDERED_REFUSAL_PATTERN : REFUSAL_PATTERN;
  return pattern.test(text.replace(/[‘’]/g, "'"));
}

function countOccurrences(text: string, needle: string): number {
  let count = 0;
  let index = text.indexOf(needle);
  while (index !== -1) {
    count += 1;
    index = text.indexOf(needle, index + needle.length);
  }
  return count;
}

/**
 * Unescaped `{` and `}` must pair up once comments, `\\` line breaks and
 * escaped braces are ignored.
 */
export function hasBalancedBraces(latex: string): boolean {
  let depth = 0;
  for (const rawLine of latex.split('\n')) {
    const line = rawLine
      .replace(/\\\\/g, '')
      .replace(/\\[{}%]/g, '')
      .replace(/%.*$/, '');
    for (const char of line) {
      if (char === '{') depth += 1;
      if (char === '}') depth -= 1;
      if (depth < 0) return false;
    }
  }
  return depth === 0;
}

// ============================================================================
// Cleaning steps
// ============================================================================

function extractBetweenSentinels(text: string): string | null {
  const start = text.indexOf(BEGIN_SENTINEL);
  if (start === -1) return null;
  const end = text.indexOf(END_SENTINEL, start + BEGIN_SENTINEL.length);
  if (end === -1) return null;
  return text.slice(start + BEGIN_SENTINEL.length, end);
}

/**
 * Drop fence lines anywhere, and narration lines outside the
 * `\documentclass` … `\end{document}` span.
 */
function stripWrapperLines(text: string): string {
  const spanStart = text.indexOf(DOCUMENTCLASS);
  const lastEnd = text.lastIndexOf(END_DOCUMENT);
  const spanEnd = spanStart !== -1 && lastEnd > spanStart ? lastEnd + END_DOCUMENT.length : text.length;

  const kept: string[] = [];
  let offset = 0;
  for (const line of text.split('\n')) {
    const lineEnd = offset + line.length;
    const outsideSpan = spanStart === -1 || lineEnd <= spanStart || offset >= spanEnd;
    offset = lineEnd + 1;

    if (FENCE_LINE_PATTERN.test(line)) continue;
    if (outsideSpan && NARRATION_PATTERN.test(line)) continue;
    kept.push(line);
  }
  return kept.join('\n');
}

const LIST_OPEN = /\\begin\{(itemize|enumerate|description)\}|\\resumeSubHeadingListStart|\\resumeItemListStart/g;
const LIST_CLOSE = /\\end\{(itemize|enumerate|description)\}|\\resumeSubHeadingListEnd|\\resumeItemListEnd/g;
const ITEM_PATTERN = /\\(item|resumeItem|resumeSubItem|resumeSubheading|resumeProjectHeading)\b/;

/**
 * Wrap runs of item lines found outside any list environment
 */
function wrapLonelyItems(body: string): { body: string; changed: boolean } {
  const output: string[] = [];
  let depth = 0;
  let lonely: string[] = [];
  let changed = false;

  const flush = () => {
    if (lonely.length === 0) return;
    output.push('\\begin{itemize}', ...lonely, '\\end{itemize}');
    lonely = [];
    changed = true;
  };

  for (const line of body.split('\n')) {
    const code = line.replace(/(?<!\\)%.*$/, '');
    const opens = code.match(LIST_OPEN)?.length ?? 0;
    const closes = code.match(LIST_CLOSE)?.length ?? 0;

    if (depth === 0 && opens === 0 && ITEM_PATTERN.test(code)) {
      lonely.push(line);
      continue;
    }
    if (lonely.length > 0 && line.trim() === '') {
      lonely.push(line);
      continue;
    }

    flush();
    output.push(line);
    depth = Math.max(0, depth + opens - closes);
  }
  flush();

  return { body: output.join('\n'), changed };
}

// ============================================================================
// State transitions
// ============================================================================

/**
 * RAW → CLEANED | MALFORMED
 */
export function cleanDocument(raw: string, options: DocumentOptions = {}): DocumentState {
  if (!raw.trim()) return { state: 'MALFORMED', reason: 'EMPTY' };
  if (isRefusal(raw, options.origin)) return { state: 'MALFORMED', reason: 'REFUSAL' };
  if (FOREIGN_FENCE_PATTERN.test(raw)) return { state: 'MALFORMED', reason: 'FOREIGN_CODE_FENCE' };

  const repairs: DocumentRepair[] = [];
  let text = raw;

  const fromSentinels = extractBetweenSentinels(text);
  if (fromSentinels !== null) {
    text = fromSentinels;
    repairs.push('EXTRACTED_FROM_SENTINELS');
  }

  const stripped = stripWrapperLines(text);
  if (stripped !== text) repairs.push('STRIPPED_WRAPPER_TEXT');
  text = stripped;

  const classStart = text.indexOf(DOCUMENTCLASS);
  if (classStart === -1) return { state: 'MALFORMED', reason: 'MISSING_DOCUMENTCLASS' };
  if (classStart > 0 && text.slice(0, classStart).trim()) repairs.push('STRIPPED_WRAPPER_TEXT');
  text = text.slice(classStart);

  // A second \documentclass starts a repeated document: keep the first
  const secondClass = text.indexOf(DOCUMENTCLASS, DOCUMENTCLASS.length);
  if (secondClass !== -1) {
    text = text.slice(0, secondClass);
    repairs.push('TRIMMED_DUPLICATE_DOCUMENT');
  }

  const beginIndex = text.indexOf(BEGIN_DOCUMENT);
  if (beginIndex === -1) return { state: 'MALFORMED', reason: 'MISSING_BEGIN_DOCUMENT' };
  if (countOccurrences(text, BEGIN_DOCUMENT) > 1) {
    return { state: 'MALFORMED', reason: 'DUPLICATE_STRUCTURE' };
  }

  const bodyStart = beginIndex + BEGIN_DOCUMENT.length;
  const endIndex = text.indexOf(END_DOCUMENT, bodyStart);
  let body: string;
  if (endIndex === -1) {
    body = text.slice(bodyStart);
    repairs.push('APPENDED_END_DOCUMENT');
  } else {
    body = text.slice(bodyStart, endIndex);
    if (text.slice(endIndex + END_DOCUMENT.length).trim()) repairs.push('STRIPPED_WRAPPER_TEXT');
  }

  const wrapped = wrapLonelyItems(body);
  if (wrapped.changed) repairs.push('WRAPPED_LONELY_ITEMS');

  const preamble = text.slice(0, bodyStart);
  const latex = normalizeUnicode(`${preamble}${wrapped.body.trimEnd()}\n\n${END_DOCUMENT}\n`);

  return { state: 'CLEANED', latex, repairs: [...new Set(repairs)] };
}

/**
 * Structural checks on a finished document. Never modifies the input.
 *
 * Expects cleaned output: a missing `\end{document}` is reported here, but
 * `cleanDocument` repairs it before validation, so `processDocument` and
 * `clean` never reject a document for it.
 */
export function validate(latex: string, options: DocumentOptions = {}): ValidationResult {
  if (!latex.trim()) return { ok: false, reason: 'EMPTY' };
  if (isRefusal(latex, options.origin)) return { ok: false, reason: 'REFUSAL' };
  if (FOREIGN_FENCE_PATTERN.test(latex)) return { ok: false, reason: 'FOREIGN_CODE_FENCE' };

  const classCount = countOccurrences(latex, DOCUMENTCLASS);
  const beginCount = countOccurrences(latex, BEGIN_DOCUMENT);
  const endCount = countOccurrences(latex, END_DOCUMENT);

  if (classCount === 0) return { ok: false, reason: 'MISSING_DOCUMENTCLASS' };
  if (beginCount === 0) return { ok: false, reason: 'MISSING_BEGIN_DOCUMENT' };
  if (endCount === 0) return { ok: false, reason: 'MISSING_END_DOCUMENT' };
  if (classCount > 1 || beginCount > 1 || endCount > 1) {
    return { ok: false, reason: 'DUPLICATE_STRUCTURE' };
  }
  if (latex.trim().length < MIN_DOCUMENT_LENGTH) return { ok: false, reason: 'TOO_SHORT' };
  if (!hasBalancedBraces(latex)) return { ok: false, reason: 'UNBALANCED_BRACES' };

  return { ok: true, reason: null };
}

/**
 * RAW → CLEANED → VALID | MALFORMED
 */
export function processDocument(
  raw: string,
  options: DocumentOptions = {}
): Exclude<DocumentState, { state: 'CLEANED' }> {
  const cleaned = cleanDocument(raw, options);
  if (cleaned.state !== 'CLEANED') return cleaned;

  const result = validate(cleaned.latex, options);
  if (!result.ok) return { state: 'MALFORMED', reason: result.reason };
  return { state: 'VALID', latex: cleaned.latex, repairs: cleaned.repairs };
}

/**
 * Cleaned document, or null when it cannot be salvaged
 */
export function clean(raw: string, options: DocumentOptions = {}): string | null {
  const result = processDocument(raw, options);
  return result.state === 'VALID' ? result.latex : null;
}
