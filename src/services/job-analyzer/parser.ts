/**
 * Job analysis response parser
 *
 * 1. Structured: JSON payload validated by `JobAnalysisPayloadSchema`
 * 2. Heuristic: labelled sections (`REQUIRED_SKILLS:` followed by bullets)
 * 3. Default: nothing usable
 *
 * Partial output never throws; missing lists come back empty.
 */

import { z } from 'zod';
import { parseAiJson } from '@/lib/safe-json';
import { uniqueTerms } from '@/lib/keywords';
import {
  EXPERIENCE_LEVELS,
  JOB_TYPES,
  REMOTE_TYPES,
  type AnalysisFields,
  type AnalysisParse,
  type ExperienceLevel,
  type JobType,
  type RemoteType,
} from './types';

// ============================================================================
// Schema
// ============================================================================

const stringList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    uniqueTerms(items.filter((item): item is string => typeof item === 'string'))
  );

const optionalString = z
  .string()
  .nullish()
  .catch(null)
  .transform((value) => (value && value.trim() ? value.trim() : null));

export const JobAnalysisPayloadSchema = z.object({
  job_title: optionalString,
  company_name: optionalString,
  experience_level: optionalString,
  required_skills: stringList,
  preferred_skills: stringList,
  primary_keywords: stringList,
  secondary_keywords: stringList,
  action_verbs: stringList,
  responsibilities: stringList,
  company_culture: stringList,
  optimization_tips: stringList,
  job_type: optionalString,
  remote_type: optionalString,
  skill_priority: z.record(z.string(), z.number()).catch({}),
});

export type JobAnalysisPayload = z.infer<typeof JobAnalysisPayloadSchema>;

// ============================================================================
// Enum normalisation
// ============================================================================

function toEnum<T extends string>(values: readonly T[], raw: string | null): T | null {
  if (!raw) return null;
  const normalized = raw.trim().toUpperCase().replace(/[\s-]+/g, '_');
  return values.find((value) => value === normalized) ?? null;
}

export function normalizeExperienceLevel(raw: string | null): ExperienceLevel | null {
  const direct = toEnum(EXPERIENCE_LEVELS, raw);
  if (direct || !raw) return direct;

  const lower = raw.toLowerCase();
  if (/exec|director|vp|chief|head/.test(lower)) return 'EXECUTIVE';
  if (/senior|lead|staff|principal/.test(lower)) return 'SENIOR';
  if (/entry|junior|intern|graduate/.test(lower)) return 'ENTRY';
  if (/mid|intermediate/.test(lower)) return 'MID';
  return null;
}

function normalizeJobType(raw: string | null): JobType | null {
  return toEnum(JOB_TYPES, raw);
}

function normalizeRemoteType(raw: string | null): RemoteType | null {
  const direct = toEnum(REMOTE_TYPES, raw);
  if (direct) return direct;
  return raw && /on[\s_-]?site|office/i.test(raw) ? 'ONSITE' : null;
}

function clampPriorities(raw: Record<string, number>): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [skill, value] of Object.entries(raw)) {
    if (!skill.trim() || !Number.isFinite(value)) continue;
    result[skill.trim()] = Math.min(1, Math.max(0, value));
  }
  return result;
}

export function emptyFields(): AnalysisFields {
  return {
    jobTitle: null,
    companyName: null,
    experienceLevel: null,
    requiredSkills: [],
    preferredSkills: [],
    primaryKeywords: [],
    secondaryKeywords: [],
    actionVerbs: [],
    responsibilities: [],
    companyCulture: [],
    optimizationTips: [],
    jobType: null,
    remoteType: null,
    skillPriority: {},
  };
}

function hasContent(fields: AnalysisFields): boolean {
  return (
    fields.requiredSkills.length > 0 ||
    fields.preferredSkills.length > 0 ||
    fields.primaryKeywords.length > 0 ||
    fields.responsibilities.length > 0 ||
    fields.experienceLevel !== null
  );
}

// ============================================================================
// Structured parse
// ============================================================================

function parseStructured(content: string): AnalysisFields | null {
  const payload = parseAiJson(content, JobAnalysisPayloadSchema);
  if (!payload) return null;

  return {
    jobTitle: payload.job_title,
    companyName: payload.company_name,
    experienceLevel: normalizeExperienceLevel(payload.experience_level),
    requiredSkills: payload.required_skills,
    preferredSkills: payload.preferred_skills,
    primaryKeywords: payload.primary_keywords,
    secondaryKeywords: payload.secondary_keywords,
    actionVerbs: payload.action_verbs,
    responsibilities: payload.responsibilities,
    companyCulture: payload.company_culture,
    optimizationTips: payload.optimization_tips,
    jobType: normalizeJobType(payload.job_type),
    remoteType: normalizeRemoteType(payload.remote_type),
    skillPriority: clampPriorities(payload.skill_priority),
  };
}

// ============================================================================
// Heuristic parse (labelled sections)
// ============================================================================

type ListField =
  | 'requiredSkills'
  | 'preferredSkills'
  | 'primaryKeywords'
  | 'secondaryKeywords'
  | 'actionVerbs'
  | 'responsibilities'
  | 'companyCulture'
  | 'optimizationTips';

type ScalarField = 'experienceLevel' | 'jobType' | 'remoteType';

const LIST_FIELDS: readonly ListField[] = [
  'requiredSkills',
  'preferredSkills',
  'primaryKeywords',
  'secondaryKeywords',
  'actionVerbs',
  'responsibilities',
  'companyCulture',
  'optimizationTips',
];

const LIST_SECTIONS: Record<string, ListField> = {
  REQUIRED_SKILLS: 'requiredSkills',
  PREFERRED_SKILLS: 'preferredSkills',
  KEY_KEYWORDS: 'primaryKeywords',
  PRIMARY_KEYWORDS: 'primaryKeywords',
  SECONDARY_KEYWORDS: 'secondaryKeywords',
  ACTION_VERBS: 'actionVerbs',
  RESPONSIBILITIES: 'responsibilities',
  COMPANY_CULTURE: 'companyCulture',
  OPTIMIZATION_TIPS: 'optimizationTips',
};

const SCALAR_SECTIONS: Record<string, ScalarField> = {
  EXPERIENCE_LEVEL: 'experienceLevel',
  JOB_TYPE: 'jobType',
  REMOTE_TYPE: 'remoteType',
};

const HEADER_PATTERN = /^\s*(?:#+\s*)?\**([A-Za-z][A-Za-z _]*?)\**\s*:\s*(.*)$/;
const BULLET_PATTERN = /^\s*[-•*]\s+(.+)$/;

function parseLabelledSections(content: string): AnalysisFields | null {
  const fields = emptyFields();
  const lists = new Map(LIST_FIELDS.map((field): [ListField, string[]] => [field, []]));
  let current: ListField | null = null;
  let sawSection = false;

  for (const line of content.split('\n')) {
    const bullet = line.match(BULLET_PATTERN);
    if (bullet && current) {
      const item = bullet[1].trim();
      if (item.length > 2) lists.get(current)?.push(item);
      continue;
    }

    const header = line.match(HEADER_PATTERN);
    if (!header) continue;

    const label = header[1].trim().toUpperCase().replace(/\s+/g, '_');
    const inline = header[2].replace(/^\*+|\*+$/g, '').trim();

    const listField = LIST_SECTIONS[label];
    if (listField) {
      current = listField;
      sawSection = true;
      const items = inline.split(',').map((part) => part.trim());
      lists.get(listField)?.push(...items.filter((item) => item.length > 0));
      continue;
    }

    const scalarField = SCALAR_SECTIONS[label];
    if (scalarField) {
      current = null;
      sawSection = true;
      if (scalarField === 'experienceLevel') fields.experienceLevel = normalizeExperienceLevel(inline);
      if (scalarField === 'jobType') fields.jobType = normalizeJobType(inline);
      if (scalarField === 'remoteType') fields.remoteType = normalizeRemoteType(inline);
      continue;
    }

    current = null;
  }

  if (!sawSection) return null;

  for (const field of LIST_FIELDS) {
    fields[field] = uniqueTerms(lists.get(field) ?? []);
  }
  return fields;
}

// ============================================================================
// Entry point
// ============================================================================

export function parseJobAnalysis(content: string): AnalysisParse {
  const structured = parseStructured(content);
  if (structured && hasContent(structured)) {
    return { kind: 'parsed', fields: structured };
  }

  const heuristic = parseLabelledSections(content);
  if (heuristic && hasContent(heuristic)) {
    return { kind: 'heuristic', fields: heuristic };
  }

  return { kind: 'default' };
}
