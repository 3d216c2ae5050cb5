/**
 * Resume LaTeX template
 *
 * Single source of the document preamble and macros. Bodies are inserted at
 * the `%__BODY__` marker in `templates/resume.tex`.
 */

import { readFileSync } from 'node:fs';
import { escapeLatex } from './escape';

export const BODY_PLACEHOLDER = '%__BODY__';

const TEMPLATE_URL = new URL('./templates/resume.tex', import.meta.url);

let cachedTemplate: string | null = null;

export function getResumeTemplate(): string {
  cachedTemplate ??= readFileSync(TEMPLATE_URL, 'utf8');
  return cachedTemplate;
}

/**
 * Wrap body content in the template. An empty body gets the fallback notice.
 */
export function wrapInTemplate(body: string): string {
  const content = body.trim() || fallbackBody();
  // Function replacer: bodies contain `$` sequences that must stay literal
  return getResumeTemplate().replace(BODY_PLACEHOLDER, () => content);
}

export interface FallbackOptions {
  jobTitle?: string | null;
  companyName?: string | null;
}

function fallbackBody(options: FallbackOptions = {}): string {
  const target = [options.jobTitle, options.companyName]
    .map((value) => value?.trim())
    .filter((value): value is string => Boolean(value))
    .map(escapeLatex)
    .join(' at ');

  return `\\begin{center}
    {\\textbf{\\Huge \\scshape Professional Resume}} \\\\ \\vspace{1pt}
    \\small ${target ? `Prepared for ${target}` : 'Generation Notice'}
\\end{center}

\\section{Notice}
\\begin{itemize}[leftmargin=0.15in, label={}]
    \\item \\textbf{Status:} This is a fallback document generated because the tailored content could not be rendered.
    \\item \\textbf{Action Required:} Please regenerate your resume to get the tailored content.
\\end{itemize}

\\section{Troubleshooting}
\\begin{itemize}[leftmargin=0.15in, label={}]
    \\item Verify that the AI provider API key is configured
    \\item Check that your resume content does not contain unusual control characters
    \\item Try regenerating with different section preferences
\\end{itemize}`;
}

/**
 * Complete, compilable placeholder document used when neither the
 * structured render nor the AI conversion produced a usable document.
 */
export function fallbackDocument(options: FallbackOptions = {}): string {
  return wrapInTemplate(fallbackBody(options));
}
