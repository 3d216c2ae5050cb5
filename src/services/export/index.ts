/**
 * Export Service
 *
 * Resolves the document to export (custom LaTeX, else the stored resume)
 * and hands it to the compiler for binary formats. LATEX exports never
 * touch the compiler.
 */

import { MalformedDocumentError, NotFoundError, ValidationError, createTraceId } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import {
  EXPORT_FORMATS,
  exportRequestSchema,
  type ExportFormat,
  type ExportRequest,
  type ExportRequestInput,
} from '@/lib/validations/resume';
import { clean, fallbackDocument, processDocument } from '@/services/latex';
import {
  FORMAT_TABLE,
  type DebugSession,
  type DebugSessionStore,
  type LatexCompilerClient,
} from '@/services/latex-compiler';
import type { ResumeRepository } from '@/services/resumes/repository';

const log = createLogger('Export');

/** Where the exported document came from */
export type DocumentSource = 'custom' | 'stored' | 'fallback';

export interface ExportArtifact {
  format: ExportFormat;
  /** LaTeX text for LATEX, compiled bytes otherwise */
  payload: string | Buffer;
  contentType: string;
  filename: string;
  /** `valid` once the compiler produced bytes with the right signature */
  validation: 'valid' | 'unchecked';
  source: DocumentSource;
}

export interface FormatDescriptor {
  format: ExportFormat;
  contentType: string;
  filename: string;
}

export interface ExportServiceDeps {
  repository: ResumeRepository;
  compiler: LatexCompilerClient;
  debugSessions?: DebugSessionStore;
}

export interface ExportOptions {
  signal?: AbortSignal;
}

export class ExportService {
  constructor(private readonly deps: ExportServiceDeps) {}

  async export(input: ExportRequestInput, options: ExportOptions = {}): Promise<ExportArtifact> {
    const traceId = createTraceId();
    const parsed = exportRequestSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromZod(parsed.error, traceId);
    const request = parsed.data;

    const { latex, source } = await this.resolveDocument(request, traceId);
    const spec = FORMAT_TABLE[request.format];

    log.info(`Exporting ${request.format} [${traceId}]`, { source, resumeId: request.resumeId ?? null });

    const artifact = { format: request.format, contentType: spec.contentType, filename: spec.filename, source };

    switch (request.format) {
      case 'LATEX':
        return { ...artifact, payload: latex, validation: 'unchecked' };
      case 'PDF':
        return {
          ...artifact,
          payload: await this.deps.compiler.compileToPdf(latex, request.paperSize, request.orientation, {
            signal: options.signal,
          }),
          validation: 'valid',
        };
      case 'PNG':
      case 'JPG':
        return {
          ...artifact,
          payload: await this.deps.compiler.compileToImage(
            latex,
            request.format,
            request.dpi,
            request.backgroundColor,
            { highQuality: request.highQuality, signal: options.signal }
          ),
          validation: 'valid',
        };
    }
  }

  availableFormats(): FormatDescriptor[] {
    return EXPORT_FORMATS.map((format) => ({
      format,
      contentType: FORMAT_TABLE[format].contentType,
      filename: FORMAT_TABLE[format].filename,
    }));
  }

  async health(): Promise<boolean> {
    return this.deps.compiler.health();
  }

  async getDebugSession(sessionId: string): Promise<DebugSession | null> {
    return (await this.deps.debugSessions?.get(sessionId)) ?? null;
  }

  // ===========================================================================
  // Document resolution
  // ===========================================================================

  private async resolveDocument(
    request: ExportRequest,
    traceId: string
  ): Promise<{ latex: string; source: DocumentSource }> {
    if (request.customLatexCode) {
      const state = processDocument(request.customLatexCode);
      if (state.state === 'MALFORMED') {
        throw new MalformedDocumentError(`Custom LaTeX could not be used: ${state.reason}`, {
          traceId,
          details: { reason: state.reason },
        });
      }
      return { latex: state.latex, source: 'custom' };
    }

    const resumeId = request.resumeId ?? '';
    const resume = await this.deps.repository.findById(resumeId);
    if (!resume) throw new NotFoundError('Resume', resumeId, { traceId });

    const cleaned = resume.latexCode ? clean(resume.latexCode, { origin: 'rendered' }) : null;
    if (cleaned) return { latex: cleaned, source: 'stored' };

    log.warn(`Stored LaTeX for resume ${resume.id} is unusable, exporting the fallback document [${traceId}]`);
    return {
      latex: fallbackDocument({ jobTitle: resume.jobTitle, companyName: resume.companyName }),
      source: 'fallback',
    };
  }
}

export type { ExportFormat } from '@/lib/validations/resume';
