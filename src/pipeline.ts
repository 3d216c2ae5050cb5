/**
 * Pipeline factory
 *
 * Wires every service from a validated environment. Without DATABASE_URL
 * runs are kept in memory.
 */

import { loadServerEnv, type ServerEnv } from '@/data/env/server';
import { createDatabase, type DatabaseHandle } from '@/drizzle/db';
import { RingLogBuffer, type LogEntry } from '@/lib/log-buffer';
import { createLogger, setLogBuffer, setLogLevel } from '@/lib/logger';
import { ExportService } from '@/services/export';
import { JobAnalyzer } from '@/services/job-analyzer';
import { DebugSessionStore, LatexCompilerClient } from '@/services/latex-compiler';
import { LlmGateway, type CompletionTransport, type LlmHealthStatus } from '@/services/llm-gateway';
import { ResumeTailor } from '@/services/resume-tailor';
import {
  DrizzleResumeRepository,
  InMemoryResumeRepository,
  ResumeService,
  type ResumeRepository,
} from '@/services/resumes';

const log = createLogger('Pipeline');

export interface PipelineOverrides {
  /** Replaces the Groq transport */
  transport?: CompletionTransport;
  /** Replaces the repository chosen from DATABASE_URL */
  repository?: ResumeRepository;
}

export interface PipelineHealth {
  llm: LlmHealthStatus;
  compiler: boolean;
}

export interface Pipeline {
  env: ServerEnv;
  gateway: LlmGateway;
  analyzer: JobAnalyzer;
  tailor: ResumeTailor;
  compiler: LatexCompilerClient;
  resumes: ResumeService;
  exports: ExportService;
  health(): Promise<PipelineHealth>;
  /** Most recent log entries, oldest first */
  recentLogs(limit?: number): LogEntry[];
  close(): Promise<void>;
}

export function createPipeline(env: ServerEnv = loadServerEnv(), overrides: PipelineOverrides = {}): Pipeline {
  setLogLevel(env.LOG_LEVEL);
  const logBuffer = new RingLogBuffer(env.LOG_BUFFER_SIZE);
  setLogBuffer(logBuffer);

  const gateway = new LlmGateway(
    {
      apiKey: env.GROQ_API_KEY,
      baseUrl: env.GROQ_API_URL,
      model: env.GROQ_MODEL,
      timeoutMs: env.GROQ_TIMEOUT_MS,
    },
    overrides.transport
  );

  const debugSessions = new DebugSessionStore(env.LATEX_DEBUG_DIR, env.LATEX_DEBUG_ENABLED);
  const compiler = new LatexCompilerClient({ baseUrl: env.LATEX_SERVICE_URL, debugSessions });

  let database: DatabaseHandle | null = null;
  let repository = overrides.repository;
  if (!repository) {
    if (env.DATABASE_URL) {
      database = createDatabase(env.DATABASE_URL);
      repository = new DrizzleResumeRepository(database.db);
    } else {
      log.warn('DATABASE_URL is not set - resumes are kept in memory');
      repository = new InMemoryResumeRepository();
    }
  }

  const analyzer = new JobAnalyzer(gateway);
  const tailor = new ResumeTailor(gateway);

  log.info('Pipeline ready', {
    model: env.GROQ_MODEL,
    aiConfigured: gateway.isConfigured(),
    compiler: env.LATEX_SERVICE_URL,
    debugCapture: debugSessions.isEnabled(),
  });

  return {
    env,
    gateway,
    analyzer,
    tailor,
    compiler,
    resumes: new ResumeService({ analyzer, tailor, repository }),
    exports: new ExportService({ repository, compiler, debugSessions }),
    health: async () => ({ llm: gateway.healthStatus(), compiler: await compiler.health() }),
    recentLogs: (limit) => logBuffer.entries(limit),
    close: async () => {
      await database?.close();
    },
  };
}
