/**
 * Job Analyzer Types
 */

export const EXPERIENCE_LEVELS = ['ENTRY', 'MID', 'SENIOR', 'EXECUTIVE'] as const;
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number];

export const JOB_TYPES = ['FULL_TIME', 'PART_TIME', 'CONTRACT', 'INTERNSHIP'] as const;
export type JobType = (typeof JOB_TYPES)[number];

export const REMOTE_TYPES = ['REMOTE', 'HYBRID', 'ONSITE'] as const;
export type RemoteType = (typeof REMOTE_TYPES)[number];

/** Where the analysis fields came from */
export type AnalysisSource = 'parsed' | 'heuristic' | 'default';

export interface JobAnalysis {
  readonly jobTitle: string | null;
  readonly companyName: string | null;
  readonly experienceLevel: ExperienceLevel;
  readonly requiredSkills: readonly string[];
  readonly preferredSkills: readonly string[];
  readonly primaryKeywords: readonly string[];
  readonly secondaryKeywords: readonly string[];
  readonly actionVerbs: readonly string[];
  readonly responsibilities: readonly string[];
  readonly companyCulture: readonly string[];
  readonly optimizationTips: readonly string[];
  readonly jobType: JobType | null;
  readonly remoteType: RemoteType | null;
  /** skill → priority in [0, 1] */
  readonly skillPriority: Readonly<Record<string, number>>;
  /** Overall match potential in [0, 1] */
  readonly matchPotential: number;
  readonly source: AnalysisSource;
}

/**
 * Fields recovered from a model response. Omitted lists are empty,
 * omitted scalars are null.
 */
export interface AnalysisFields {
  jobTitle: string | null;
  companyName: string | null;
  experienceLevel: ExperienceLevel | null;
  requiredSkills: string[];
  preferredSkills: string[];
  primaryKeywords: string[];
  secondaryKeywords: string[];
  actionVerbs: string[];
  responsibilities: string[];
  companyCulture: string[];
  optimizationTips: string[];
  jobType: JobType | null;
  remoteType: RemoteType | null;
  skillPriority: Record<string, number>;
}

/**
 * Outcome of parsing a model response: structured schema first, labelled
 * sections second, nothing usable last.
 */
export type AnalysisParse =
  | { kind: 'parsed'; fields: AnalysisFields }
  | { kind: 'heuristic'; fields: AnalysisFields }
  | { kind: 'default' };
