/**
 * Resume persistence
 *
 * The service talks to a `ResumeRepository`; Postgres (drizzle) in
 * production, an in-process map when no database is configured.
 */

import { randomUUID } from 'node:crypto';
import { desc, eq } from 'drizzle-orm';
import type { Database } from '@/drizzle/db';
import { resumes, type ResumeRow } from '@/drizzle/schema';

export type ResumeStatus = 'PROCESSING' | 'COMPLETED' | 'ERROR';

export interface StoredResume {
  id: string;
  userId: string | null;
  sessionId: string | null;
  jobTitle: string | null;
  companyName: string | null;
  masterResume: string;
  jobPosting: string;
  tailoredResume: string | null;
  latexCode: string | null;
  targetLength: number;
  status: ResumeStatus;
  atsScore: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewResume = Pick<
  StoredResume,
  'userId' | 'sessionId' | 'jobTitle' | 'companyName' | 'masterResume' | 'jobPosting' | 'targetLength'
>;

export type ResumeUpdate = Partial<
  Pick<StoredResume, 'jobTitle' | 'companyName' | 'tailoredResume' | 'latexCode' | 'atsScore' | 'status'>
>;

export interface ResumeRepository {
  create(input: NewResume): Promise<StoredResume>;
  update(id: string, patch: ResumeUpdate): Promise<StoredResume | null>;
  findById(id: string): Promise<StoredResume | null>;
  /** Newest first */
  listByUser(userId: string): Promise<StoredResume[]>;
  delete(id: string): Promise<boolean>;
}

// ============================================================================
// Postgres
// ============================================================================

function toStoredResume(row: ResumeRow): StoredResume {
  return {
    id: row.id,
    userId: row.user_id,
    sessionId: row.session_id,
    jobTitle: row.job_title,
    companyName: row.company_name,
    masterResume: row.master_resume,
    jobPosting: row.job_posting,
    tailoredResume: row.tailored_resume,
    latexCode: row.latex_code,
    targetLength: row.target_length,
    status: row.status,
    atsScore: row.ats_score,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export class DrizzleResumeRepository implements ResumeRepository {
  constructor(private readonly db: Database) {}

  async create(input: NewResume): Promise<StoredResume> {
    const [row] = await this.db
      .insert(resumes)
      .values({
        user_id: input.userId,
        session_id: input.sessionId,
        job_title: input.jobTitle,
        company_name: input.companyName,
        master_resume: input.masterResume,
        job_posting: input.jobPosting,
        target_length: input.targetLength,
        status: 'PROCESSING',
      })
      .returning();
    return toStoredResume(row);
  }

  async update(id: string, patch: ResumeUpdate): Promise<StoredResume | null> {
    const [row] = await this.db
      .update(resumes)
      .set({
        job_title: patch.jobTitle,
        company_name: patch.companyName,
        tailored_resume: patch.tailoredResume,
        latex_code: patch.latexCode,
        ats_score: patch.atsScore,
        status: patch.status,
        updated_at: new Date(),
      })
      .where(eq(resumes.id, id))
      .returning();
    return row ? toStoredResume(row) : null;
  }

  async findById(id: string): Promise<StoredResume | null> {
    const [row] = await this.db.select().from(resumes).where(eq(resumes.id, id)).limit(1);
    return row ? toStoredResume(row) : null;
  }

  async listByUser(userId: string): Promise<StoredResume[]> {
    const rows = await this.db
      .select()
      .from(resumes)
      .where(eq(resumes.user_id, userId))
      .orderBy(desc(resumes.created_at));
    return rows.map(toStoredResume);
  }

  async delete(id: string): Promise<boolean> {
    const deleted = await this.db.delete(resumes).where(eq(resumes.id, id)).returning({ id: resumes.id });
    return deleted.length > 0;
  }
}

// ============================================================================
// In-memory
// ============================================================================

function keep<T>(next: T | undefined, current: T): T {
  return next === undefined ? current : next;
}

export class InMemoryResumeRepository implements ResumeRepository {
  private readonly rows = new Map<string, StoredResume>();

  async create(input: NewResume): Promise<StoredResume> {
    const now = new Date();
    const resume: StoredResume = {
      ...input,
      id: randomUUID(),
      tailoredResume: null,
      latexCode: null,
      atsScore: null,
      status: 'PROCESSING',
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(resume.id, resume);
    return { ...resume };
  }

  async update(id: string, patch: ResumeUpdate): Promise<StoredResume | null> {
    const current = this.rows.get(id);
    if (!current) return null;
    const updated: StoredResume = {
      ...current,
      jobTitle: keep(patch.jobTitle, current.jobTitle),
      companyName: keep(patch.companyName, current.companyName),
      tailoredResume: keep(patch.tailoredResume, current.tailoredResume),
      latexCode: keep(patch.latexCode, current.latexCode),
      atsScore: keep(patch.atsScore, current.atsScore),
      status: keep(patch.status, current.status),
      updatedAt: new Date(),
    };
    this.rows.set(id, updated);
    return { ...updated };
  }

  async findById(id: string): Promise<StoredResume | null> {
    const resume = this.rows.get(id);
    return resume ? { ...resume } : null;
  }

  async listByUser(userId: string): Promise<StoredResume[]> {
    return [...this.rows.values()]
      .filter((resume) => resume.userId === userId)
      .reverse()
      .map((resume) => ({ ...resume }));
  }

  async delete(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}
