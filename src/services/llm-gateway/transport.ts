/**
 * Groq chat-completion transport.
 *
 * Groq exposes an OpenAI-compatible API, so the official `openai` SDK is
 * pointed at Groq's base URL. SDK retries are disabled: generation calls
 * are never retried.
 */

import OpenAI from 'openai';
import type { ChatCompletionCreateParamsNonStreaming } from 'openai/resources/chat/completions';

export interface TransportRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  maxTokens: number;
  temperature: number;
  jsonMode: boolean;
}

export interface TransportResponse {
  content: string | null;
  usage?: { promptTokens: number; completionTokens: number };
}

export interface CompletionTransport {
  complete(
    request: TransportRequest,
    options: { signal: AbortSignal; timeoutMs: number }
  ): Promise<TransportResponse>;
}

/** Provider answered with a non-2xx status */
export class ProviderHttpError extends Error {
  constructor(
    message: string,
    readonly status: number | null,
    readonly body: string | null
  ) {
    super(message);
    this.name = 'ProviderHttpError';
  }
}

export function createGroqTransport(config: { apiKey: string; baseUrl: string }): CompletionTransport {
  const client = new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.baseUrl,
    maxRetries: 0,
  });

  return {
    async complete(request, { signal, timeoutMs }) {
      const params: ChatCompletionCreateParamsNonStreaming = {
        model: request.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          { role: 'user', content: request.userPrompt },
        ],
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      };
      if (request.jsonMode) {
        params.response_format = { type: 'json_object' };
      }

      try {
        const response = await client.chat.completions.create(params, {
          signal,
          timeout: timeoutMs,
        });
        const usage = response.usage;
        return {
          content: response.choices[0]?.message?.content ?? null,
          ...(usage
            ? { usage: { promptTokens: usage.prompt_tokens, completionTokens: usage.completion_tokens } }
            : {}),
        };
      } catch (error) {
        if (error instanceof OpenAI.APIError) {
          throw new ProviderHttpError(
            error.message,
            error.status ?? null,
            error.error === undefined ? null : JSON.stringify(error.error)
          );
        }
        throw error;
      }
    },
  };
}
