/**
 * Resume Service
 *
 * Pipeline boundary: validates a generate request, runs analysis and
 * tailoring, and keeps a stored record of the run.
 *
 * How it works:
 * 1. Records the run as PROCESSING
 * 2. Analyzes the posting, then tailors the master resume
 * 3. Stores the outcome as COMPLETED or ERROR
 *
 * Persistence is best effort: a failing repository is logged and the
 * tailoring result is still returned.
 */

import { NotFoundError, ValidationError, createTraceId, getErrorMessage } from '@/lib/errors';
import { createLogger } from '@/lib/logger';
import { linkSignal, type LinkedSignal } from '@/lib/retry';
import { generateResumeSchema, type GenerateResumeInput } from '@/lib/validations/resume';
import type { JobAnalyzer } from '@/services/job-analyzer';
import type { ResumeTailor, TailoringResult } from '@/services/resume-tailor';
import type { ResumeRepository, ResumeUpdate, StoredResume } from './repository';

const log = createLogger('Resumes');

export interface GenerateOptions {
  /** Overall budget for the outbound calls of this run */
  deadlineMs?: number;
  signal?: AbortSignal;
}

export interface GeneratedResume extends TailoringResult {
  /** Null when the run could not be stored */
  readonly resumeId: string | null;
}

export interface ResumeServiceDeps {
  analyzer: JobAnalyzer;
  tailor: ResumeTailor;
  repository: ResumeRepository;
}

export class ResumeService {
  constructor(private readonly deps: ResumeServiceDeps) {}

  async generate(input: GenerateResumeInput, options: GenerateOptions = {}): Promise<GeneratedResume> {
    const traceId = createTraceId();
    const parsed = generateResumeSchema.safeParse(input);
    if (!parsed.success) throw ValidationError.fromZod(parsed.error, traceId);
    const request = parsed.data;

    const startTime = Date.now();
    const deadline: LinkedSignal | null =
      options.deadlineMs !== undefined ? linkSignal(options.deadlineMs, options.signal) : null;
    const signal = deadline?.signal ?? options.signal;

    log.info(`Generating resume [${traceId}]`, { targetLength: request.targetLength, userId: request.userId ?? null });

    // =========================================================================
    // Step 1: Record the run
    // =========================================================================
    const stored = await this.persist(traceId, 'create', () =>
      this.deps.repository.create({
        userId: request.userId ?? null,
        sessionId: request.sessionId ?? null,
        jobTitle: request.jobTitle ?? null,
        companyName: request.companyName ?? null,
        masterResume: request.masterResumeText,
        jobPosting: request.jobPostingText,
        targetLength: request.targetLength,
      })
    );
    const resumeId = stored?.id ?? null;

    try {
      // =======================================================================
      // Step 2: Analyze and tailor
      // =======================================================================
      const analysis = await this.deps.analyzer.analyze(
        request.jobPostingText,
        request.jobTitle,
        request.companyName,
        { signal }
      );

      const result = await this.deps.tailor.tailor(
        request.masterResumeText,
        request.jobPostingText,
        analysis,
        request.sectionToggles,
        request.targetLength,
        {
          latexStrategy: request.latexStrategy,
          priorityExperiences: request.priorityExperiences,
          prioritySkills: request.prioritySkills,
          signal,
        }
      );

      // =======================================================================
      // Step 3: Store the outcome
      // =======================================================================
      if (resumeId) {
        await this.persist(traceId, 'update', () =>
          this.deps.repository.update(resumeId, {
            jobTitle: analysis.jobTitle || null,
            companyName: analysis.companyName || null,
            tailoredResume: result.tailoredResumeText,
            latexCode: result.latexSource || null,
            atsScore: result.atsScore,
            status: result.status,
          })
        );
      }

      log.info(`Resume ${result.status.toLowerCase()} in ${Date.now() - startTime}ms [${traceId}]`, {
        resumeId,
        atsScore: result.atsScore,
        degraded: result.degraded,
      });

      return { ...result, resumeId };
    } catch (error) {
      log.error(`Resume generation failed [${traceId}]: ${getErrorMessage(error)}`);
      if (resumeId) await this.markFailed(traceId, resumeId);
      throw error;
    } finally {
      deadline?.dispose();
    }
  }

  async getResume(id: string): Promise<StoredResume> {
    const resume = await this.deps.repository.findById(id);
    if (!resume) throw new NotFoundError('Resume', id);
    return resume;
  }

  async listResumes(userId: string): Promise<StoredResume[]> {
    return this.deps.repository.listByUser(userId);
  }

  async deleteResume(id: string): Promise<void> {
    const deleted = await this.deps.repository.delete(id);
    if (!deleted) throw new NotFoundError('Resume', id);
    log.info(`Deleted resume ${id}`);
  }

  // ===========================================================================
  // Persistence helpers
  // ===========================================================================

  private async markFailed(traceId: string, resumeId: string): Promise<void> {
    const patch: ResumeUpdate = { status: 'ERROR' };
    await this.persist(traceId, 'update', () => this.deps.repository.update(resumeId, patch));
  }

  private async persist<T>(traceId: string, action: string, write: () => Promise<T>): Promise<T | null> {
    try {
      return await write();
    } catch (error) {
      log.error(`Could not ${action} resume record [${traceId}]`, { error: getErrorMessage(error) });
      return null;
    }
  }
}

export { DrizzleResumeRepository, InMemoryResumeRepository } from './repository';
export type { NewResume, ResumeRepository, ResumeStatus, ResumeUpdate, StoredResume } from './repository';
