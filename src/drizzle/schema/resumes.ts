/**
 * Resumes Table
 *
 * One row per tailoring run: the inputs, the tailored text and LaTeX, and
 * the run status.
 */

import { randomUUID } from 'node:crypto';
import { index, integer, pgEnum, pgTable, text, timestamp, varchar } from 'drizzle-orm/pg-core';

// ============================================================================
// Enums
// ============================================================================

export const resumeStatusEnum = pgEnum('resume_status', ['PROCESSING', 'COMPLETED', 'ERROR']);

// ============================================================================
// Resumes Table
// ============================================================================

export const resumes = pgTable(
  'resumes',
  {
    id: varchar('id', { length: 36 })
      .primaryKey()
      .$defaultFn(() => randomUUID()),

    // Ownership
    user_id: varchar('user_id', { length: 255 }),
    session_id: varchar('session_id', { length: 255 }),

    // Target job
    job_title: varchar('job_title', { length: 255 }),
    company_name: varchar('company_name', { length: 255 }),

    // Inputs
    master_resume: text('master_resume').notNull(),
    job_posting: text('job_posting').notNull(),
    target_length: integer('target_length').default(1).notNull(),

    // Outputs
    tailored_resume: text('tailored_resume'),
    latex_code: text('latex_code'),
    ats_score: integer('ats_score'),

    status: resumeStatusEnum('status').default('PROCESSING').notNull(),

    created_at: timestamp('created_at').defaultNow().notNull(),
    updated_at: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [
    index('idx_resumes_user').on(table.user_id),
    index('idx_resumes_created').on(table.created_at),
  ]
);

export type ResumeRow = typeof resumes.$inferSelect;
export type NewResumeRow = typeof resumes.$inferInsert;
