import { describe, expect, it } from 'vitest';
import { clean, hasBalancedBraces, processDocument, validate } from './document';
import { fallbackDocument } from './template';

const MINIMAL =
  '\\documentclass{article}\n\\begin{document}\nHello resume world, this is long enough.\n\\end{document}\n';

const CLEANED_MINIMAL =
  '\\documentclass{article}\n\\begin{document}\nHello resume world, this is long enough.\n\n\\end{document}\n';

// ---------------------------------------------------------------------------
// clean / processDocument
// ---------------------------------------------------------------------------

describe('clean', () => {
  it('rejects refusals', () => {
    expect(clean("I'm sorry, I cannot help with that")).toBeNull();
    expect(processDocument("I'm sorry, I cannot help with that")).toEqual({
      state: 'MALFORMED',
      reason: 'REFUSAL',
    });
  });

  it('accepts apology phrases inside rendered resume content', () => {
    const source =
      '\\documentclass{article}\n\\begin{document}\nServed as an AI platform lead for twelve engineers.\n\n\\end{document}\n';

    expect(processDocument(source, { origin: 'rendered' })).toEqual({ state: 'VALID', latex: source, repairs: [] });
    expect(processDocument(source)).toEqual({ state: 'MALFORMED', reason: 'REFUSAL' });
  });

  it('still rejects a rendered document that opens a line with an apology', () => {
    const source = "\\documentclass{article}\n\\begin{document}\nI'm sorry, I cannot help with that request.\n\\end{document}\n";

    expect(processDocument(source, { origin: 'rendered' })).toEqual({ state: 'MALFORMED', reason: 'REFUSAL' });
  });

  it('rejects code fences in other languages', () => {
    expect(processDocument('```python\nprint("resume")\n```')).toEqual({
      state: 'MALFORMED',
      reason: 'FOREIGN_CODE_FENCE',
    });
  });

  it('strips narration and latex fences', () => {
    const result = processDocument(`Here is your resume:\n\`\`\`latex\n${MINIMAL}\`\`\``);

    expect(result.state).toBe('VALID');
    if (result.state === 'VALID') {
      expect(result.latex).toBe(CLEANED_MINIMAL);
      expect(result.repairs).toContain('STRIPPED_WRAPPER_TEXT');
    }
  });

  it('keeps narration-like lines inside the document', () => {
    const source =
      '\\documentclass{article}\n\\begin{document}\nHere is a summary of ten years in platform work.\n\n\\end{document}\n';

    expect(processDocument(`Here is your resume:\n${source}`)).toEqual({
      state: 'VALID',
      latex: source,
      repairs: ['STRIPPED_WRAPPER_TEXT'],
    });
  });

  it('extracts the document between sentinel markers', () => {
    const result = processDocument(`Sure!\n%__BEGIN_LATEX__\n${MINIMAL}%__END_LATEX__\ntrailing words`);

    expect(result.state).toBe('VALID');
    if (result.state === 'VALID') {
      expect(result.latex).toBe(CLEANED_MINIMAL);
      expect(result.repairs).toContain('EXTRACTED_FROM_SENTINELS');
    }
  });

  it('appends a missing end marker', () => {
    const result = processDocument(
      '\\documentclass{article}\n\\begin{document}\nHello resume world, this is long enough.'
    );

    expect(result).toEqual({ state: 'VALID', latex: CLEANED_MINIMAL, repairs: ['APPENDED_END_DOCUMENT'] });
  });

  it('keeps only the first of repeated documents', () => {
    const result = processDocument(MINIMAL + MINIMAL);

    expect(result.state).toBe('VALID');
    if (result.state === 'VALID') {
      expect(result.latex).toBe(CLEANED_MINIMAL);
      expect(result.repairs).toContain('TRIMMED_DUPLICATE_DOCUMENT');
    }
  });

  it('returns null without a document class', () => {
    expect(clean('\\begin{document}hi\\end{document}')).toBeNull();
    expect(processDocument('\\begin{document}hi\\end{document}')).toEqual({
      state: 'MALFORMED',
      reason: 'MISSING_DOCUMENTCLASS',
    });
  });

  it('returns null without a document body', () => {
    expect(processDocument('\\documentclass{article}\nHello')).toEqual({
      state: 'MALFORMED',
      reason: 'MISSING_BEGIN_DOCUMENT',
    });
  });

  it('wraps items that sit outside any list', () => {
    const result = clean(
      '\\documentclass{article}\n\\begin{document}\n\\section{Skills}\n\\item Go\n\\item Rust\n\\end{document}'
    );

    expect(result).toBe(
      '\\documentclass{article}\n\\begin{document}\n\\section{Skills}\n\\begin{itemize}\n\\item Go\n\\item Rust\n\n\\end{itemize}\n\n\\end{document}\n'
    );
  });

  it('leaves items inside lists alone', () => {
    const source =
      '\\documentclass{article}\n\\begin{document}\n\\begin{itemize}\n\\item Go\n\\end{itemize}\n\n\\end{document}\n';

    const result = processDocument(source);

    expect(result).toEqual({ state: 'VALID', latex: source, repairs: [] });
  });

  it('normalizes smart punctuation', () => {
    const result = clean(
      '\\documentclass{article}\n\\begin{document}\nLed “migration” — shipped on time.\n\\end{document}\n'
    );

    expect(result).toContain('Led "migration" --- shipped on time.');
  });
});

// ---------------------------------------------------------------------------
// validate
// ---------------------------------------------------------------------------

describe('validate', () => {
  it('accepts a complete document', () => {
    expect(validate(MINIMAL)).toEqual({ ok: true, reason: null });
  });

  it('reports a missing end marker that cleaning would repair', () => {
    const source = '\\documentclass{article}\n\\begin{document}\nHello resume world, this is long enough.';

    expect(validate(source)).toEqual({ ok: false, reason: 'MISSING_END_DOCUMENT' });
    expect(processDocument(source).state).toBe('VALID');
  });

  it.each([
    ['', 'EMPTY'],
    ['plain words only', 'MISSING_DOCUMENTCLASS'],
    ['\\documentclass{a}\\begin{document}\\end{document}', 'TOO_SHORT'],
    [MINIMAL + MINIMAL, 'DUPLICATE_STRUCTURE'],
    ['\\documentclass{article}\n\\begin{document}\n\\textbf{oops\n\\end{document}\n', 'UNBALANCED_BRACES'],
  ])('reports %j as %s', (latex, reason) => {
    expect(validate(latex)).toEqual({ ok: false, reason });
  });
});

describe('hasBalancedBraces', () => {
  it('ignores escaped braces and comments', () => {
    expect(hasBalancedBraces('\\{ not a group')).toBe(true);
    expect(hasBalancedBraces('{ % }')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// Fallback template
// ---------------------------------------------------------------------------

describe('fallbackDocument', () => {
  it('names the target role and survives cleaning', () => {
    const latex = fallbackDocument({ jobTitle: 'Engineer', companyName: 'R&D Co' });

    expect(latex).toContain('Prepared for Engineer at R\\&D Co');
    expect(latex).toContain('\\section{Troubleshooting}');
    expect(clean(latex)).toBe(latex);
  });
});
