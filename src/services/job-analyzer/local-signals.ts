/**
 * Locally derivable job signals
 *
 * Used when the model is unavailable or its answer is unusable. Everything
 * here is deterministic: the same posting always yields the same analysis.
 */

import { countTerm, findTerm, uniqueTerms } from '@/lib/keywords';
import actionVerbList from './data/action-verbs.json';
import softSkillList from './data/soft-skills.json';
import stopWordList from './data/stop-words.json';
import techTermList from './data/tech-terms.json';
import type { AnalysisFields, ExperienceLevel, JobType, RemoteType } from './types';

const STOP_WORDS = new Set(stopWordList);
const PREFERRED_MARKERS = /\b(preferred|nice[- ]to[- ]have|bonus|a plus|is a plus|desirable|optional)\b/i;

const MAX_PRIMARY_KEYWORDS = 10;
const MAX_SECONDARY_KEYWORDS = 10;
const MAX_RESPONSIBILITIES = 8;

// ============================================================================
// Experience level / job type / remote type
// ============================================================================

const LEVEL_PATTERNS: Array<[ExperienceLevel, RegExp]> = [
  ['EXECUTIVE', /\b(director|vp|vice president|head of|chief|cto|ceo|cio)\b/i],
  ['SENIOR', /\b(senior|sr\.?|staff|principal|tech lead|team lead|lead (?:engineer|developer|designer|scientist))\b/i],
  ['ENTRY', /\b(intern|internship|junior|jr\.?|entry[- ]level|new grad|recent graduate)\b/i],
];

export function inferExperienceLevel(posting: string, jobTitle?: string | null): ExperienceLevel {
  for (const text of [jobTitle ?? '', posting]) {
    for (const [level, pattern] of LEVEL_PATTERNS) {
      if (pattern.test(text)) return level;
    }
  }

  const years = posting.match(/(\d{1,2})\+?\s*(?:-\s*\d{1,2}\s*)?years?/i);
  if (years) {
    const count = Number(years[1]);
    if (count >= 7) return 'SENIOR';
    if (count <= 1) return 'ENTRY';
  }
  return 'MID';
}

export function inferJobType(posting: string): JobType | null {
  if (/\binternship\b|\bintern\b/i.test(posting)) return 'INTERNSHIP';
  if (/\b(contract|contractor|freelance)\b/i.test(posting)) return 'CONTRACT';
  if (/\bpart[- ]time\b/i.test(posting)) return 'PART_TIME';
  if (/\bfull[- ]time\b/i.test(posting)) return 'FULL_TIME';
  return null;
}

export function inferRemoteType(posting: string): RemoteType | null {
  if (/\bhybrid\b/i.test(posting)) return 'HYBRID';
  if (/\bremote\b/i.test(posting)) return 'REMOTE';
  if (/\b(on[- ]?site|in[- ]office)\b/i.test(posting)) return 'ONSITE';
  return null;
}

// ============================================================================
// Skills and keywords
// ============================================================================

interface TermHit {
  term: string;
  index: number;
  count: number;
}

function findTerms(text: string, terms: readonly string[]): TermHit[] {
  const hits: TermHit[] = [];
  for (const term of terms) {
    const index = findTerm(text, term);
    if (index >= 0) hits.push({ term, index, count: countTerm(text, term) });
  }
  return hits.sort((a, b) => a.index - b.index);
}

/**
 * Split known technology terms into required and preferred by the sentence
 * they first appear in.
 */
export function extractSkills(posting: string): { required: string[]; preferred: string[] } {
  const sentences = posting.split(/[.\n;]+/).filter((s) => s.trim());
  const required: string[] = [];
  const preferred: string[] = [];

  for (const hit of findTerms(posting, techTermList)) {
    const sentence = sentences.find((s) => findTerm(s, hit.term) >= 0) ?? '';
    (PREFERRED_MARKERS.test(sentence) ? preferred : required).push(hit.term);
  }

  const softSkills = findTerms(posting, softSkillList).map((hit) => hit.term);
  return {
    required: uniqueTerms(required),
    preferred: uniqueTerms([...preferred, ...softSkills]),
  };
}

/**
 * Technology terms ranked by frequency (ties by first appearance)
 */
export function extractPrimaryKeywords(posting: string): string[] {
  const hits = findTerms(posting, techTermList);
  return uniqueTerms(
    [...hits].sort((a, b) => b.count - a.count || a.index - b.index).map((hit) => hit.term)
  ).slice(0, MAX_PRIMARY_KEYWORDS);
}

/**
 * Most frequent non-stop-words that are not already primary keywords
 */
export function extractSecondaryKeywords(posting: string, exclude: readonly string[]): string[] {
  const excluded = new Set(exclude.map((term) => term.toLowerCase()));
  const counts = new Map<string, { count: number; first: number }>();

  const words = posting.toLowerCase().match(/[a-z][a-z0-9+#.-]*[a-z0-9+#]|[a-z]/g) ?? [];
  words.forEach((word, position) => {
    if (word.length < 4 || STOP_WORDS.has(word) || excluded.has(word)) return;
    const entry = counts.get(word);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(word, { count: 1, first: position });
    }
  });

  return [...counts.entries()]
    .sort(([, a], [, b]) => b.count - a.count || a.first - b.first)
    .slice(0, MAX_SECONDARY_KEYWORDS)
    .map(([word]) => word);
}

export function extractActionVerbs(posting: string): string[] {
  return findTerms(posting, actionVerbList).map((hit) => hit.term);
}

export function extractResponsibilities(posting: string): string[] {
  return posting
    .split('\n')
    .map((line) => line.match(/^\s*[-•*]\s+(.+)$/)?.[1]?.trim() ?? '')
    .filter((line) => line.length > 2)
    .slice(0, MAX_RESPONSIBILITIES);
}

// ============================================================================
// Full local analysis
// ============================================================================

export function analyzeLocally(posting: string, jobTitle?: string | null): AnalysisFields {
  const { required, preferred } = extractSkills(posting);
  const primaryKeywords = extractPrimaryKeywords(posting);

  const tips = [
    primaryKeywords.length > 0
      ? `Mention ${primaryKeywords.slice(0, 3).join(', ')} explicitly in experience bullets`
      : 'Mirror the wording of the job posting in experience bullets',
    'Quantify achievements with concrete metrics',
  ];

  return {
    jobTitle: null,
    companyName: null,
    experienceLevel: inferExperienceLevel(posting, jobTitle),
    requiredSkills: required,
    preferredSkills: preferred,
    primaryKeywords,
    secondaryKeywords: extractSecondaryKeywords(posting, primaryKeywords),
    actionVerbs: extractActionVerbs(posting),
    responsibilities: extractResponsibilities(posting),
    companyCulture: [],
    optimizationTips: tips,
    jobType: inferJobType(posting),
    remoteType: inferRemoteType(posting),
    skillPriority: {},
  };
}
