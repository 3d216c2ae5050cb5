/**
 * Safe JSON Parsing Utilities
 *
 * Provides safe JSON parsing with error handling for AI responses.
 */

import type { z } from 'zod';

/**
 * Extract JSON from a string that might contain markdown code blocks
 */
export function extractJsonFromResponse(content: string): string {
  // Remove markdown code blocks if present
  const jsonBlockMatch = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonBlockMatch) {
    return jsonBlockMatch[1].trim();
  }

  // Try to find JSON object
  const jsonMatch = content.match(/\{[\s\S]*\}/);
  if (jsonMatch) {
    return jsonMatch[0];
  }

  return content.trim();
}

/**
 * Parse an AI response against a schema. Returns null instead of throwing
 * when the payload is not JSON or does not match.
 */
export function parseAiJson<T extends z.ZodTypeAny>(
  content: string,
  schema: T
): z.infer<T> | null {
  let raw: unknown;
  try {
    raw = JSON.parse(extractJsonFromResponse(content));
  } catch {
    return null;
  }
  const result = schema.safeParse(raw);
  return result.success ? result.data : null;
}
