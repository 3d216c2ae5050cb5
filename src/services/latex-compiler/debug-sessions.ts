/**
 * Debug session capture
 *
 * When enabled, every compile attempt is written to the debug directory as
 * `<sessionId>.json` holding the LaTeX source and the compiler error log.
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { z } from 'zod';
import { createTraceId, getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';

const log = createLogger('LaTeX Debug');

export const debugSessionSchema = z.object({
  sessionId: z.string(),
  latex: z.string(),
  errorLog: z.string().nullable(),
  createdAt: z.string(),
});

export type DebugSession = z.infer<typeof debugSessionSchema>;

const SESSION_ID_PATTERN = /^session-\d+-[A-Z0-9]+$/;

export class DebugSessionStore {
  constructor(
    private readonly directory: string,
    private readonly enabled: boolean
  ) {}

  isEnabled(): boolean {
    return this.enabled;
  }

  /**
   * Write a session and return its id. Returns null when capture is off or
   * the write fails; a compile never fails because of debug capture.
   */
  async record(latex: string, errorLog: string | null): Promise<string | null> {
    if (!this.enabled) return null;

    const session: DebugSession = {
      sessionId: `session-${Date.now()}-${createTraceId()}`,
      latex,
      errorLog,
      createdAt: new Date().toISOString(),
    };

    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(this.pathFor(session.sessionId), JSON.stringify(session, null, 2), 'utf8');
      log.debug(`Recorded debug session ${session.sessionId}`);
      return session.sessionId;
    } catch (error) {
      log.warn('Could not write debug session', { error: getErrorMessage(error) });
      return null;
    }
  }

  async get(sessionId: string): Promise<DebugSession | null> {
    if (!SESSION_ID_PATTERN.test(sessionId)) return null;
    try {
      const raw = await readFile(this.pathFor(sessionId), 'utf8');
      const parsed = debugSessionSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch (error) {
      log.debug(`Debug session ${sessionId} unavailable`, { error: getErrorMessage(error) });
      return null;
    }
  }

  private pathFor(sessionId: string): string {
    return join(this.directory, `${sessionId}.json`);
  }
}
