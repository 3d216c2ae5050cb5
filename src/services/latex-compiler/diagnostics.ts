/**
 * Compiler error diagnostics
 *
 * Turns a compiler error response into a readable report: the extracted
 * message, hints for known LaTeX failure signatures, debugging steps and
 * the raw response.
 */

import { z } from 'zod';

const compilerErrorBodySchema = z.object({
  error: z.string(),
});

/**
 * The compiler answers errors with `{"error": "..."}`; anything else is
 * used as raw text.
 */
export function extractCompilerMessage(rawBody: string, status: number | null): string {
  const trimmed = rawBody.trim();
  const parsed = compilerErrorBodySchema.safeParse(parseJson(trimmed));
  if (parsed.success && parsed.data.error.trim()) return parsed.data.error.trim();
  if (trimmed) return trimmed;
  return status === null ? 'Compiler returned no response' : `Compiler returned HTTP ${status}`;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

interface Signature {
  pattern: RegExp;
  hint: (match: RegExpMatchArray) => string;
}

const SIGNATURES: Signature[] = [
  {
    pattern: /Undefined control sequence(?:[\s\S]*?l\.(\d+)[ \t]*[^\n]*?(\\[A-Za-z@]+)[ \t]*$)?/m,
    hint: (match) =>
      match[1] && match[2]
        ? `Undefined control sequence ${match[2]} near line ${match[1]}: check the spelling or load the package that defines it`
        : 'Undefined control sequence: a command is misspelled or its package is not loaded',
  },
  {
    pattern: /Lonely \\item/,
    hint: () => '\\item appears outside an itemize or enumerate environment',
  },
  {
    pattern: /Missing \\begin\{document\}/,
    hint: () => 'Text appears before \\begin{document}; check the preamble for stray content',
  },
  {
    pattern: /Misplaced alignment tab character &/,
    hint: () => 'An unescaped & was found outside a table; write \\& in text',
  },
  {
    pattern: /Missing \$ inserted/,
    hint: () => 'A math-only character (_ or ^) or an unescaped $ appears in text; escape it',
  },
  {
    pattern: /File `([^']+)' not found/,
    hint: (match) => `Missing file or package: ${match[1]}`,
  },
  {
    pattern: /Font [^\n]*not found|font not found/i,
    hint: () => 'A font is not installed on the compiler; use a standard font package',
  },
  {
    pattern: /Runaway argument/,
    hint: () => 'Runaway argument: a command argument is missing its closing brace',
  },
];

/** One hint per known signature found in the message */
export function diagnose(message: string): string[] {
  return SIGNATURES.flatMap((signature) => {
    const match = message.match(signature.pattern);
    return match ? [signature.hint(match)] : [];
  });
}

export function formatCompilationReport(params: {
  message: string;
  hints: readonly string[];
  rawBody: string;
  debugSessionId: string | null;
}): string {
  const steps = [
    'Review the LaTeX source around the reported line',
    'Check that special characters (& % $ # _ { } ~ ^) are escaped in text',
    'Make sure every \\item sits inside a list environment',
  ];
  if (params.debugSessionId) {
    steps.push(`Inspect debug session ${params.debugSessionId} for the exact source that failed`);
  }

  return [
    'LATEX COMPILATION ERROR',
    params.message,
    '',
    'DETAILED ERROR ANALYSIS:',
    ...(params.hints.length > 0
      ? params.hints.map((hint) => `- ${hint}`)
      : ['- No known error pattern matched']),
    '',
    'DEBUGGING STEPS:',
    ...steps.map((step, index) => `${index + 1}. ${step}`),
    '',
    'RAW ERROR RESPONSE:',
    params.rawBody.trim() || '(empty)',
  ].join('\n');
}
