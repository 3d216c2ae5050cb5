import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { MalformedDocumentError, NotFoundError, ValidationError } from '@/lib/errors';
import { buildLatex } from '@/services/latex';
import { LatexCompilerClient } from '@/services/latex-compiler';
import { InMemoryResumeRepository } from '@/services/resumes/repository';
import { sampleResumeContent } from '@/test/fixtures';
import { ExportService } from '.';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const PDF_BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x37]);
const JPG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00]);

function setup(reply: () => Response = () => new Response(PDF_BYTES, { status: 200 })) {
  const fetchMock = vi.fn<typeof fetch>(async () => reply());
  vi.stubGlobal('fetch', fetchMock);
  const repository = new InMemoryResumeRepository();
  const compiler = new LatexCompilerClient({ baseUrl: 'http://compiler.test' });
  return { service: new ExportService({ repository, compiler }), repository, fetchMock };
}

async function storeResume(repository: InMemoryResumeRepository, latexCode: string | null) {
  const created = await repository.create({
    userId: 'user-1',
    sessionId: null,
    jobTitle: 'Backend Engineer',
    companyName: 'Orbit Cloud',
    masterResume: 'master',
    jobPosting: 'posting',
    targetLength: 1,
  });
  await repository.update(created.id, { latexCode, status: 'COMPLETED' });
  return created.id;
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === 'string' ? JSON.parse(init.body) : null;
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ExportService.export', () => {
  it('returns custom LaTeX as text without calling the compiler', async () => {
    const { service, fetchMock } = setup();
    const latex = buildLatex(sampleResumeContent());

    const artifact = await service.export({ customLatexCode: latex, format: 'latex' });

    expect(artifact).toEqual({
      format: 'LATEX',
      payload: latex,
      contentType: 'application/x-latex',
      filename: 'resume.tex',
      validation: 'unchecked',
      source: 'custom',
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('compiles the stored document to PDF with default page settings', async () => {
    const { service, repository, fetchMock } = setup();
    const latex = buildLatex(sampleResumeContent());
    const resumeId = await storeResume(repository, latex);

    const artifact = await service.export({ resumeId, format: 'PDF' });

    expect(artifact.contentType).toBe('application/pdf');
    expect(artifact.filename).toBe('resume.pdf');
    expect(artifact.validation).toBe('valid');
    expect(artifact.source).toBe('stored');
    expect(requestBody(fetchMock.mock.calls[0][1])).toEqual({
      latex,
      name: 'resume',
      paperSize: 'A4',
      orientation: 'portrait',
    });
  });

  it('passes image options through to the compiler', async () => {
    const { service, fetchMock } = setup(() => new Response(JPG_BYTES, { status: 200 }));

    const artifact = await service.export({
      customLatexCode: buildLatex(sampleResumeContent()),
      format: 'JPG',
      dpi: 150,
      backgroundColor: 'transparent',
      highQuality: false,
    });

    expect(artifact.contentType).toBe('image/jpeg');
    expect(requestBody(fetchMock.mock.calls[0][1])).toMatchObject({
      format: 'jpg',
      dpi: 150,
      backgroundColor: 'transparent',
      highQuality: false,
    });
  });

  it('exports the fallback document when the stored LaTeX is unusable', async () => {
    const { service, repository } = setup();
    const resumeId = await storeResume(repository, 'I cannot help with that.');

    const artifact = await service.export({ resumeId, format: 'LATEX' });

    expect(artifact.source).toBe('fallback');
    expect(artifact.payload).toContain('Prepared for Backend Engineer at Orbit Cloud');
  });

  it('rejects an unknown resume', async () => {
    const { service } = setup();

    await expect(service.export({ resumeId: 'missing', format: 'PDF' })).rejects.toBeInstanceOf(NotFoundError);
  });

  it('rejects custom LaTeX that cannot be cleaned', async () => {
    const { service } = setup();

    await expect(service.export({ customLatexCode: 'just some text', format: 'PDF' })).rejects.toBeInstanceOf(
      MalformedDocumentError
    );
  });

  it.each([
    { format: 'PDF' },
    { resumeId: 'r-1', format: 'DOCX' },
    { resumeId: 'r-1', format: 'PNG', dpi: 1200 },
  ])('rejects invalid input %o', async (input) => {
    const { service } = setup();

    await expect(service.export(input)).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('ExportService.availableFormats', () => {
  it('lists every format with its content type', () => {
    const { service } = setup();

    expect(service.availableFormats()).toEqual([
      { format: 'LATEX', contentType: 'application/x-latex', filename: 'resume.tex' },
      { format: 'PDF', contentType: 'application/pdf', filename: 'resume.pdf' },
      { format: 'PNG', contentType: 'image/png', filename: 'resume.png' },
      { format: 'JPG', contentType: 'image/jpeg', filename: 'resume.jpg' },
    ]);
  });
});
