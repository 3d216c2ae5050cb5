import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createEnv } from '@t3-oss/env-core';
import { z } from 'zod';
import { ConfigurationError } from '@/lib/errors';
import { createLogger } from '@/lib/logger';

const log = createLogger('Config');

const httpUrl = z
  .string()
  .url()
  .refine((value) => /^https?:\/\//i.test(value), 'must be an http(s) URL');

const booleanFlag = z
  .enum(['true', 'false'])
  .default('false')
  .transform((value) => value === 'true');

export type RuntimeEnv = Record<string, string | undefined>;

/**
 * Validate the process environment. Throws ConfigurationError when the
 * compiler URL (or any other present value) is invalid. The Groq key is
 * optional: without it the pipeline runs on local fallbacks.
 */
export function loadServerEnv(runtimeEnv: RuntimeEnv = process.env) {
  const env = createEnv({
    server: {
      LATEX_SERVICE_URL: httpUrl,
      GROQ_API_KEY: z.string().min(1).optional(),
      GROQ_API_URL: httpUrl.default('https://api.groq.com/openai/v1'),
      GROQ_MODEL: z.string().min(1).default('llama3-8b-8192'),
      GROQ_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
      DATABASE_URL: z.string().url().optional(),
      LATEX_DEBUG_ENABLED: booleanFlag,
      LATEX_DEBUG_DIR: z.string().min(1).default(join(tmpdir(), 'resume-latex-debug')),
      LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
      LOG_BUFFER_SIZE: z.coerce.number().int().positive().default(500),
    },
    runtimeEnv,
    emptyStringAsUndefined: true,
    onValidationError: (error: z.ZodError) => {
      const fields = error.flatten().fieldErrors;
      const summary = Object.entries(fields)
        .map(([key, messages]) => `${key}: ${(messages ?? []).join(', ')}`)
        .join('; ');
      throw new ConfigurationError(`Invalid environment configuration - ${summary}`, {
        details: { fields },
      });
    },
  });

  for (const warning of startupWarnings(env.GROQ_API_KEY)) {
    log.warn(warning);
  }

  return env;
}

export type ServerEnv = ReturnType<typeof loadServerEnv>;

// ============================================================================
// Groq credential checks
// ============================================================================

const PLACEHOLDER_KEYS = new Set(['your-groq-api-key', 'your_groq_api_key', 'changeme']);
const MIN_KEY_LENGTH = 20;

export type ApiKeyStatus = 'ok' | 'missing' | 'placeholder' | 'too_short';

export function checkGroqApiKey(key: string | undefined | null): ApiKeyStatus {
  const trimmed = key?.trim() ?? '';
  if (!trimmed) return 'missing';
  if (PLACEHOLDER_KEYS.has(trimmed.toLowerCase()) || trimmed.startsWith('${')) {
    return 'placeholder';
  }
  if (trimmed.length < MIN_KEY_LENGTH) return 'too_short';
  return 'ok';
}

function startupWarnings(groqApiKey: string | undefined): string[] {
  switch (checkGroqApiKey(groqApiKey)) {
    case 'missing':
      return ['GROQ_API_KEY is not set - AI features will use local fallbacks'];
    case 'placeholder':
      return ['GROQ_API_KEY contains a placeholder value - AI features will use local fallbacks'];
    case 'too_short':
      return ['GROQ_API_KEY looks too short to be valid - AI features will use local fallbacks'];
    default:
      return [];
  }
}
