/**
 * LaTeX Compiler Client
 *
 * HTTP client for the external LaTeX compilation service.
 *
 * Endpoints:
 * - POST /compile/pdf    LaTeX → PDF bytes
 * - POST /compile/image  LaTeX → PNG/JPEG bytes
 * - POST /validate       structural check, `{valid, errors}`
 * - GET  /health         availability
 *
 * Compile calls run once with a per-call timeout; only the health check is
 * retried. Every artifact is checked against its magic number, so an empty
 * or wrong payload fails even on HTTP 200.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { CompilationFailureError, createTraceId, getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { linkSignal, withRetry } from '@/lib/retry';
import type { Orientation, PaperSize } from '@/lib/validations/resume';
import type { DebugSessionStore } from './debug-sessions';
import { diagnose, extractCompilerMessage, formatCompilationReport } from './diagnostics';
import { FORMAT_TABLE, hasSignature, type BinaryFormat, type ImageFormat } from './formats';
import { withTempDir } from './temp-files';

const log = createLogger('LaTeX Compiler');

export interface CompilerTimeouts {
  pdfMs: number;
  imageMs: number;
  validateMs: number;
  healthMs: number;
}

export const DEFAULT_COMPILER_TIMEOUTS: CompilerTimeouts = {
  pdfMs: 45_000,
  imageMs: 75_000,
  validateMs: 15_000,
  healthMs: 5_000,
};

export interface LatexCompilerConfig {
  baseUrl: string;
  timeouts?: Partial<CompilerTimeouts>;
  debugSessions?: DebugSessionStore;
  /** Parent directory for per-compile staging directories */
  tempRoot?: string;
  /** Delay before the health check retries */
  healthRetryDelayMs?: number;
}

export interface CompileOptions {
  signal?: AbortSignal;
}

export interface ImageOptions extends CompileOptions {
  highQuality?: boolean;
}

const validationResponseSchema = z.object({
  valid: z.boolean(),
  errors: z.array(z.string()).catch([]),
});

export type CompilerValidation = z.infer<typeof validationResponseSchema>;

export class LatexCompilerClient {
  private readonly baseUrl: string;
  private readonly timeouts: CompilerTimeouts;

  constructor(private readonly config: LatexCompilerConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
    this.timeouts = { ...DEFAULT_COMPILER_TIMEOUTS, ...config.timeouts };
  }

  async compileToPdf(
    latex: string,
    paperSize: PaperSize = 'A4',
    orientation: Orientation = 'portrait',
    options: CompileOptions = {}
  ): Promise<Buffer> {
    return this.compile(
      '/compile/pdf',
      latex,
      { name: 'resume', paperSize, orientation },
      'PDF',
      this.timeouts.pdfMs,
      options.signal
    );
  }

  async compileToImage(
    latex: string,
    format: ImageFormat,
    dpi = 300,
    backgroundColor = 'white',
    options: ImageOptions = {}
  ): Promise<Buffer> {
    return this.compile(
      '/compile/image',
      latex,
      {
        name: 'resume',
        format: FORMAT_TABLE[format].extension,
        dpi,
        backgroundColor,
        highQuality: options.highQuality ?? true,
      },
      format,
      this.timeouts.imageMs,
      options.signal
    );
  }

  /**
   * Ask the compiler whether the source is structurally sound
   */
  async validate(latex: string, options: CompileOptions = {}): Promise<CompilerValidation> {
    const linked = linkSignal(this.timeouts.validateMs, options.signal);
    try {
      const response = await fetch(`${this.baseUrl}/validate`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ latex }),
        signal: linked.signal,
      });
      const raw = await response.text();
      if (!response.ok) {
        return { valid: false, errors: [extractCompilerMessage(raw, response.status)] };
      }
      const parsed = validationResponseSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : { valid: false, errors: ['Unexpected validation response'] };
    } catch (error) {
      const message = linked.timedOut()
        ? `Validation timed out after ${this.timeouts.validateMs}ms`
        : getErrorMessage(error);
      log.warn('Validation request failed', { error: message });
      return { valid: false, errors: [message] };
    } finally {
      linked.dispose();
    }
  }

  /**
   * True when the compiler answers its health endpoint. Retried once.
   */
  async health(): Promise<boolean> {
    try {
      return await withRetry(
        async () => {
          const linked = linkSignal(this.timeouts.healthMs);
          try {
            const response = await fetch(`${this.baseUrl}/health`, { method: 'GET', signal: linked.signal });
            if (!response.ok) throw new Error(`Health check returned HTTP ${response.status}`);
            return true;
          } finally {
            linked.dispose();
          }
        },
        { attempts: 2, retryDelayMs: this.config.healthRetryDelayMs ?? 250 }
      );
    } catch (error) {
      log.warn('LaTeX compiler is unavailable', { error: getErrorMessage(error) });
      return false;
    }
  }

  // ===========================================================================
  // Compilation
  // ===========================================================================

  private async compile(
    endpoint: string,
    latex: string,
    fields: Record<string, string | number | boolean>,
    format: BinaryFormat,
    timeoutMs: number,
    signal?: AbortSignal
  ): Promise<Buffer> {
    const traceId = createTraceId();
    const spec = FORMAT_TABLE[format];
    const startTime = Date.now();

    log.info(`Compiling ${format} [${traceId}]`, { latexChars: latex.length });

    return withTempDir(
      'resume-compile-',
      async (directory) => {
        await writeFile(join(directory, 'resume.tex'), latex, 'utf8');

        const linked = linkSignal(timeoutMs, signal);
        let response: Response;
        try {
          response = await fetch(`${this.baseUrl}${endpoint}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json', Accept: spec.contentType },
            body: JSON.stringify({ latex, ...fields }),
            signal: linked.signal,
          });
        } catch (error) {
          const message = linked.timedOut()
            ? `Compiler did not respond within ${timeoutMs}ms`
            : `Compiler request failed: ${getErrorMessage(error)}`;
          linked.dispose();
          throw await this.failure(traceId, latex, message, '', null, error);
        }

        let raw = '';
        let bytes = new Uint8Array(0);
        try {
          if (response.ok) bytes = new Uint8Array(await response.arrayBuffer());
          else raw = await response.text();
        } catch (error) {
          const message = linked.timedOut()
            ? `Compiler did not finish responding within ${timeoutMs}ms`
            : `Compiler response could not be read: ${getErrorMessage(error)}`;
          throw await this.failure(traceId, latex, message, '', response.status, error);
        } finally {
          linked.dispose();
        }

        if (!response.ok) {
          throw await this.failure(traceId, latex, extractCompilerMessage(raw, response.status), raw, response.status);
        }

        if (!hasSignature(bytes, format)) {
          const message =
            bytes.length === 0
              ? `Compiler returned an empty ${format} payload`
              : `Compiler returned a payload that is not a valid ${format} file`;
          throw await this.failure(traceId, latex, message, '', response.status);
        }

        // Stage the artifact on disk before handing it out
        const artifactPath = join(directory, spec.filename);
        await writeFile(artifactPath, bytes);
        const artifact = await readFile(artifactPath);

        await this.config.debugSessions?.record(latex, null);
        log.info(`Compiled ${format} in ${Date.now() - startTime}ms [${traceId}]`, { bytes: artifact.length });
        return artifact;
      },
      this.config.tempRoot
    );
  }

  private async failure(
    traceId: string,
    latex: string,
    message: string,
    rawBody: string,
    httpStatus: number | null,
    cause?: unknown
  ): Promise<CompilationFailureError> {
    const hints = diagnose(`${message}\n${rawBody}`);
    const debugSessionId = (await this.config.debugSessions?.record(latex, rawBody || message)) ?? null;

    log.error(`Compilation failed [${traceId}]: ${message.split('\n')[0]}`, {
      httpStatus,
      hints: hints.length,
      debugSessionId,
    });

    return new CompilationFailureError(formatCompilationReport({ message, hints, rawBody, debugSessionId }), {
      traceId,
      compilerMessage: message,
      hints,
      debugSessionId,
      httpStatus,
      cause,
    });
  }
}

export { DebugSessionStore } from './debug-sessions';
export type { DebugSession } from './debug-sessions';
export { diagnose, extractCompilerMessage, formatCompilationReport } from './diagnostics';
export { FORMAT_TABLE, hasSignature } from './formats';
export type { BinaryFormat, FormatSpec, ImageFormat } from './formats';
export { withTempDir } from './temp-files';
