/**
 * LLM Gateway Types
 */

export type CompletionPurpose =
  | 'JOB_ANALYSIS'
  | 'RESUME_TAILORING'
  | 'LATEX_CONVERSION'
  | 'GENERAL';

export interface RequestPreset {
  maxTokens: number;
  temperature: number;
  /** Ask the provider for a JSON object response */
  jsonMode: boolean;
}

export const REQUEST_PRESETS: Record<CompletionPurpose, RequestPreset> = {
  JOB_ANALYSIS: { maxTokens: 3000, temperature: 0.3, jsonMode: true },
  RESUME_TAILORING: { maxTokens: 4000, temperature: 0.4, jsonMode: true },
  LATEX_CONVERSION: { maxTokens: 4000, temperature: 0.2, jsonMode: false },
  GENERAL: { maxTokens: 2000, temperature: 0.7, jsonMode: false },
};

export const TOKEN_LIMITS = { min: 1, max: 8192 } as const;
export const TEMPERATURE_LIMITS = { min: 0, max: 2 } as const;

export type CompletionErrorReason = 'NOT_CONFIGURED' | 'PROVIDER_ERROR' | 'INVALID_REQUEST';

export type CompletionResult =
  | {
      success: true;
      content: string;
      durationMs: number;
      usage?: { promptTokens: number; completionTokens: number };
    }
  | {
      success: false;
      /** Deterministic local fallback text */
      content: string;
      errorReason: CompletionErrorReason;
      /** Provider HTTP status, when one was received */
      status?: number | null;
      /** Raw provider error body or failure message */
      body?: string | null;
      /** Trace id of the logged AiUnavailableError */
      traceId?: string;
      durationMs: number;
    };

export interface CompletionOptions {
  purpose?: CompletionPurpose;
  jsonMode?: boolean;
  signal?: AbortSignal;
}

export interface LlmGatewayConfig {
  apiKey?: string;
  baseUrl: string;
  model: string;
  timeoutMs: number;
}

export interface LlmHealthStatus {
  configured: boolean;
  model: string;
  baseUrl: string;
}
