/**
 * Keyword matching helpers shared by the job analyzer and ATS scoring.
 */

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Word-boundary pattern for a term such as "C++", "Node.js" or "Go".
 * Short capitalised terms ("Go", "R", "C") match case-sensitively so the
 * verb "go" is not read as the language.
 */
export function termPattern(term: string, global = false): RegExp {
  const trimmed = term.trim();
  const caseSensitive = trimmed.length <= 2 && /[A-Z]/.test(trimmed);
  const flags = `${global ? 'g' : ''}${caseSensitive ? '' : 'i'}`;
  return new RegExp(`(?<![A-Za-z0-9])${escapeRegExp(trimmed)}(?![A-Za-z0-9+#])`, flags);
}

export function containsTerm(text: string, term: string): boolean {
  if (!term.trim()) return false;
  return termPattern(term).test(text);
}

/** Index of the first occurrence, or -1 */
export function findTerm(text: string, term: string): number {
  if (!term.trim()) return -1;
  return text.search(termPattern(term));
}

export function countTerm(text: string, term: string): number {
  if (!term.trim()) return 0;
  return text.match(termPattern(term, true))?.length ?? 0;
}

/** Case-insensitive de-duplication that keeps the first spelling seen */
export function uniqueTerms(terms: Iterable<string>): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of terms) {
    const term = raw.trim();
    const key = term.toLowerCase();
    if (!term || seen.has(key)) continue;
    seen.add(key);
    result.push(term);
  }
  return result;
}
