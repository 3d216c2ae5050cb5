import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import {
  CompilationFailureError,
  ConfigurationError,
  NotFoundError,
  createTraceId,
  getErrorMessage,
  toErrorResponse,
} from './errors';

describe('createTraceId', () => {
  it('is eight upper-case hex characters', () => {
    expect(createTraceId()).toMatch(/^[0-9A-F]{8}$/);
  });
});

describe('toErrorResponse', () => {
  it('maps an application error to its status and code', () => {
    const error = new NotFoundError('Resume', 'r-1', { traceId: 'ABCD1234' });

    expect(toErrorResponse(error)).toEqual({
      status: 404,
      body: { error: 'NOT_FOUND', message: 'Resume not found: r-1', traceId: 'ABCD1234' },
    });
  });

  it('includes compiler diagnostics', () => {
    const error = new CompilationFailureError('LATEX COMPILATION ERROR', {
      compilerMessage: 'Lonely \\item',
      hints: ['\\item appears outside an itemize or enumerate environment'],
      debugSessionId: 'session-1-ABC',
      traceId: 'TRACE001',
    });

    expect(toErrorResponse(error)).toEqual({
      status: 502,
      body: {
        error: 'COMPILATION_FAILURE',
        message: 'LATEX COMPILATION ERROR',
        traceId: 'TRACE001',
        details: {
          compilerMessage: 'Lonely \\item',
          hints: ['\\item appears outside an itemize or enumerate environment'],
          debugSessionId: 'session-1-ABC',
        },
      },
    });
  });

  it('turns a zod error into a validation error', () => {
    const parsed = z.object({ dpi: z.number() }).safeParse({ dpi: 'high' });
    if (parsed.success) throw new Error('expected a parse failure');

    const response = toErrorResponse(parsed.error);

    expect(response.status).toBe(400);
    expect(response.body.error).toBe('VALIDATION_ERROR');
    expect(response.body.details).toEqual({
      issues: [{ path: 'dpi', message: 'Expected number, received string' }],
    });
  });

  it('hides the message of unknown errors', () => {
    const response = toErrorResponse(new Error('password=test-secret'));

    expect(response.status).toBe(500);
    expect(response.body.message).toBe('An unexpected error occurred');
  });
});

describe('AppError', () => {
  it('names the subclass', () => {
    const error = new ConfigurationError('bad');

    expect(error.name).toBe('ConfigurationError');
    expect(error.status).toBe(500);
    expect(error).toBeInstanceOf(Error);
  });
});

describe('getErrorMessage', () => {
  it('stringifies non-errors', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain')).toBe('plain');
  });
});
