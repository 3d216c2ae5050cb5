/**
 * LaTeX escaping and value sanitisation
 */

const LATEX_REPLACEMENTS: Record<string, string> = {
  '\\': '\\textbackslash{}',
  '&': '\\&',
  '%': '\\%',
  $: '\\$',
  '#': '\\#',
  _: '\\_',
  '{': '\\{',
  '}': '\\}',
  '^': '\\textasciicircum{}',
  '~': '\\textasciitilde{}',
  '–': '--',
  '—': '---',
  '‘': '`',
  '’': "'",
  '“': '``',
  '”': "''",
  '…': '\\ldots{}',
  '•': '\\textbullet{}',
  '\u00A0': ' ',
};

const LATEX_SPECIALS = /[\\&%$#_{}^~–—‘’“”…•\u00A0]/g;

/**
 * Escape text for use inside a LaTeX document. Single pass, so already
 * produced escapes are never escaped again.
 */
export function escapeLatex(value: string | null | undefined): string {
  if (!value) return '';
  return value.replace(LATEX_SPECIALS, (char) => LATEX_REPLACEMENTS[char] ?? char);
}

/**
 * Normalise typographic unicode in LaTeX source (not user text): smart
 * quotes, dashes, ellipses and non-breaking spaces.
 */
export function normalizeUnicode(latex: string): string {
  return latex
    .replace(/[‘’]/g, "'")
    .replace(/[“”]/g, '"')
    .replace(/—/g, '---')
    .replace(/–/g, '--')
    .replace(/…/g, '...')
    .replace(/\u00A0/g, ' ')
    .replace(/•/g, '\\textbullet{}');
}

const PLACEHOLDER_VALUES = new Set([
  'not specified',
  'not provided',
  'n/a',
  'na',
  'none',
  'unknown',
  'null',
  'undefined',
  '-',
  '--',
  'tbd',
  'to be determined',
  'no data',
  'no degree',
  'no details',
  'no information',
  'none provided',
]);

/**
 * Blank out placeholder values a model emits for missing fields
 * ("N/A", "Not specified", ...).
 */
export function sanitizeValue(value: string | null | undefined): string {
  const trimmed = value?.trim() ?? '';
  if (!trimmed) return '';
  const lower = trimmed.toLowerCase();
  if (PLACEHOLDER_VALUES.has(lower) || lower.startsWith('not available')) {
    return '';
  }
  return trimmed;
}

/**
 * Prepare a URL for `\href`: add a scheme, drop characters that break the
 * argument, escape `%` and `#`.
 */
export function escapeUrl(value: string | null | undefined): string {
  const trimmed = sanitizeValue(value).replace(/[\s{}\\]/g, '');
  if (!trimmed) return '';
  const withScheme = /^(https?:|mailto:)/i.test(trimmed) ? trimmed : `https://${trimmed}`;
  return withScheme.replace(/[%#]/g, (char) => `\\${char}`);
}
