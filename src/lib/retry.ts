/**
 * Retry and timeout helpers for outbound calls.
 *
 * Retries are reserved for idempotent reads (health checks, lookups).
 * Generation and compilation calls run once.
 */

export interface RetryOptions {
  /** Total attempts including the first one */
  attempts?: number;
  /** Base delay; attempt N waits `retryDelayMs * N` before retrying */
  retryDelayMs?: number;
  isRetryable?: (error: unknown) => boolean;
}

const DEFAULT_RETRY: Required<RetryOptions> = {
  attempts: 2,
  retryDelayMs: 250,
  isRetryable: () => true,
};

export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_RETRY, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.attempts; attempt++) {
    try {
      return await operation(attempt);
    } catch (error) {
      lastError = error;
      if (attempt === config.attempts || !config.isRetryable(error)) break;
      await delay(config.retryDelayMs * attempt);
    }
  }

  throw lastError;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface LinkedSignal {
  signal: AbortSignal;
  /** True when the timeout, not the caller, aborted the signal */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Combine a per-call timeout with an optional caller signal.
 * Always call `dispose()` once the call settles.
 */
export function linkSignal(timeoutMs: number, parent?: AbortSignal): LinkedSignal {
  const controller = new AbortController();
  let didTimeout = false;

  const timer = setTimeout(() => {
    didTimeout = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
  }, timeoutMs);

  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  return {
    signal: controller.signal,
    timedOut: () => didTimeout,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
