/**
 * LLM Gateway
 *
 * Single entry point for language-model completions (Groq).
 *
 * Contract:
 * - `complete()` always resolves to a CompletionResult, it never throws.
 * - Without a usable API key it short-circuits to local fallback text
 *   (`NOT_CONFIGURED`) and makes no network call.
 * - Timeouts, cancellations and non-2xx answers become `PROVIDER_ERROR`.
 */

import { checkGroqApiKey } from '@/data/env/server';
import { AiUnavailableError, getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { linkSignal } from '@/lib/retry';
import { fallbackContent } from './fallback';
import { createGroqTransport, ProviderHttpError, type CompletionTransport } from './transport';
import {
  REQUEST_PRESETS,
  TEMPERATURE_LIMITS,
  TOKEN_LIMITS,
  type CompletionOptions,
  type CompletionPurpose,
  type CompletionResult,
  type LlmGatewayConfig,
  type LlmHealthStatus,
} from './types';

const log = createLogger('LLM Gateway');

export class LlmGateway {
  private readonly config: LlmGatewayConfig;
  private readonly transport: CompletionTransport | null;

  /**
   * @param transport - injected transport; defaults to the Groq SDK transport
   *   when an API key is configured
   */
  constructor(config: LlmGatewayConfig, transport?: CompletionTransport) {
    this.config = config;
    const keyUsable = checkGroqApiKey(config.apiKey) === 'ok';
    if (!keyUsable) {
      this.transport = null;
    } else if (transport) {
      this.transport = transport;
    } else {
      this.transport = createGroqTransport({ apiKey: config.apiKey ?? '', baseUrl: config.baseUrl });
    }
  }

  isConfigured(): boolean {
    return this.transport !== null;
  }

  healthStatus(): LlmHealthStatus {
    return {
      configured: this.isConfigured(),
      model: this.config.model,
      baseUrl: this.config.baseUrl,
    };
  }

  /**
   * Run a completion with the token/temperature preset for `purpose`
   */
  completeFor(
    purpose: CompletionPurpose,
    systemPrompt: string,
    userPrompt: string,
    options: Omit<CompletionOptions, 'purpose'> = {}
  ): Promise<CompletionResult> {
    const preset = REQUEST_PRESETS[purpose];
    return this.complete(systemPrompt, userPrompt, preset.maxTokens, preset.temperature, {
      jsonMode: preset.jsonMode,
      ...options,
      purpose,
    });
  }

  async complete(
    systemPrompt: string,
    userPrompt: string,
    maxTokens: number,
    temperature: number,
    options: CompletionOptions = {}
  ): Promise<CompletionResult> {
    const startTime = Date.now();
    const purpose = options.purpose ?? 'GENERAL';
    const fallback = fallbackContent(purpose);

    if (!systemPrompt.trim() || !userPrompt.trim()) {
      return {
        success: false,
        content: fallback,
        errorReason: 'INVALID_REQUEST',
        body: 'System and user prompts must be non-empty',
        durationMs: Date.now() - startTime,
      };
    }

    if (!this.transport) {
      const issue = new AiUnavailableError(`Groq API key not configured, using fallback response (${purpose})`, {
        details: { purpose },
      });
      log.warn(issue.message, { traceId: issue.traceId });
      return {
        success: false,
        content: fallback,
        errorReason: 'NOT_CONFIGURED',
        traceId: issue.traceId,
        durationMs: Date.now() - startTime,
      };
    }

    const request = {
      model: this.config.model,
      systemPrompt,
      userPrompt,
      maxTokens: clamp(Math.round(maxTokens), TOKEN_LIMITS.min, TOKEN_LIMITS.max),
      temperature: clamp(temperature, TEMPERATURE_LIMITS.min, TEMPERATURE_LIMITS.max),
      jsonMode: options.jsonMode ?? false,
    };

    log.info(`Calling ${this.config.model} (${purpose})`, {
      promptChars: systemPrompt.length + userPrompt.length,
      maxTokens: request.maxTokens,
    });
    log.debug('Prompt contents', { systemPrompt, userPrompt });

    const linked = linkSignal(this.config.timeoutMs, options.signal);
    try {
      const response = await this.transport.complete(request, {
        signal: linked.signal,
        timeoutMs: this.config.timeoutMs,
      });
      const durationMs = Date.now() - startTime;
      const content = response.content?.trim() ?? '';

      if (!content) {
        const issue = new AiUnavailableError(`Empty response from provider after ${durationMs}ms`, {
          details: { purpose },
        });
        log.warn(issue.message, { traceId: issue.traceId });
        return {
          success: false,
          content: fallback,
          errorReason: 'PROVIDER_ERROR',
          status: 200,
          body: 'Empty completion',
          traceId: issue.traceId,
          durationMs,
        };
      }

      log.info(`Completion received in ${durationMs}ms`, {
        responseChars: content.length,
        ...(response.usage ?? {}),
      });
      log.debug('Completion contents', { content });

      return {
        success: true,
        content,
        durationMs,
        ...(response.usage ? { usage: response.usage } : {}),
      };
    } catch (error) {
      const durationMs = Date.now() - startTime;
      const timedOut = linked.timedOut();
      const status = error instanceof ProviderHttpError ? error.status : null;
      const body = error instanceof ProviderHttpError ? error.body : getErrorMessage(error);

      const issue = new AiUnavailableError(
        timedOut
          ? `Provider call timed out after ${durationMs}ms`
          : `Provider call failed after ${durationMs}ms`,
        { details: { purpose, status }, cause: error }
      );
      log.error(issue.message, { traceId: issue.traceId, status, error: getErrorMessage(error) });

      return {
        success: false,
        content: fallback,
        errorReason: 'PROVIDER_ERROR',
        status,
        body: timedOut ? `Timed out after ${this.config.timeoutMs}ms` : body,
        traceId: issue.traceId,
        durationMs,
      };
    } finally {
      linked.dispose();
    }
  }
}

function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.min(max, Math.max(min, value));
}

export { fallbackContent } from './fallback';
export { createGroqTransport, ProviderHttpError } from './transport';
export type { CompletionTransport, TransportRequest, TransportResponse } from './transport';
export * from './types';
