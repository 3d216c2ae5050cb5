/**
 * Application Errors
 *
 * Typed error taxonomy shared by every stage of the tailoring pipeline.
 * Each error carries a trace id so log lines from the analyzer, tailor and
 * compiler can be correlated with the response a caller receives.
 */

import { randomUUID } from 'node:crypto';
import { ZodError } from 'zod';

// ============================================================================
// Trace IDs
// ============================================================================

/**
 * Short, human-readable trace id (first 8 chars of a UUID, upper-case)
 */
export function createTraceId(): string {
  return randomUUID().slice(0, 8).toUpperCase();
}

// ============================================================================
// Error Classes
// ============================================================================

export type ErrorCode =
  | 'CONFIGURATION_ERROR'
  | 'AI_UNAVAILABLE'
  | 'MALFORMED_DOCUMENT'
  | 'COMPILATION_FAILURE'
  | 'NOT_FOUND'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

export interface AppErrorOptions {
  traceId?: string;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: ErrorCode;
  readonly status: number;
  readonly traceId: string;
  readonly details: Record<string, unknown>;

  constructor(code: ErrorCode, status: number, message: string, options: AppErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.code = code;
    this.status = status;
    this.traceId = options.traceId ?? createTraceId();
    this.details = options.details ?? {};
  }
}

/** Missing or invalid environment configuration. Fatal at startup. */
export class ConfigurationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('CONFIGURATION_ERROR', 500, message, options);
  }
}

/** LLM not configured or provider failure. Recovered locally by fallback generation. */
export class AiUnavailableError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('AI_UNAVAILABLE', 503, message, options);
  }
}

/** LaTeX that fails validation and cannot be cleaned. */
export class MalformedDocumentError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('MALFORMED_DOCUMENT', 422, message, options);
  }
}

export interface CompilationFailureOptions extends AppErrorOptions {
  compilerMessage: string;
  hints: string[];
  debugSessionId?: string | null;
  httpStatus?: number | null;
}

/** Compiler HTTP error or invalid binary signature. Terminal for the request. */
export class CompilationFailureError extends AppError {
  readonly compilerMessage: string;
  readonly hints: string[];
  readonly debugSessionId: string | null;
  readonly httpStatus: number | null;

  constructor(message: string, options: CompilationFailureOptions) {
    super('COMPILATION_FAILURE', 502, message, {
      ...options,
      details: {
        ...options.details,
        compilerMessage: options.compilerMessage,
        hints: options.hints,
        debugSessionId: options.debugSessionId ?? null,
      },
    });
    this.compilerMessage = options.compilerMessage;
    this.hints = options.hints;
    this.debugSessionId = options.debugSessionId ?? null;
    this.httpStatus = options.httpStatus ?? null;
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string, id: string, options?: AppErrorOptions) {
    super('NOT_FOUND', 404, `${resource} not found: ${id}`, options);
  }
}

export class ValidationError extends AppError {
  constructor(message: string, options?: AppErrorOptions) {
    super('VALIDATION_ERROR', 400, message, options);
  }

  static fromZod(error: ZodError, traceId?: string): ValidationError {
    return new ValidationError('Invalid request', {
      traceId,
      details: { issues: error.errors.map((e) => ({ path: e.path.join('.'), message: e.message })) },
    });
  }
}

// ============================================================================
// Response Mapping
// ============================================================================

export interface ErrorResponse {
  status: number;
  body: {
    error: string;
    message: string;
    traceId: string;
    details?: Record<string, unknown>;
  };
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map any thrown value to the status/body pair a caller receives.
 * Unknown errors are reported without their message.
 */
export function toErrorResponse(error: unknown): ErrorResponse {
  if (error instanceof ZodError) {
    return toErrorResponse(ValidationError.fromZod(error));
  }

  if (error instanceof AppError) {
    const hasDetails = Object.keys(error.details).length > 0;
    return {
      status: error.status,
      body: {
        error: error.code,
        message: error.message,
        traceId: error.traceId,
        ...(hasDetails ? { details: error.details } : {}),
      },
    };
  }

  return {
    status: 500,
    body: {
      error: 'INTERNAL_ERROR',
      message: 'An unexpected error occurred',
      traceId: createTraceId(),
    },
  };
}
