/**
 * Content prioritization
 *
 * Removes disabled sections, reorders bullets and entries by relevance to
 * the job, and trims everything to the page budget. Nothing is invented:
 * skills the resume does not list are never added.
 */

import { containsTerm, uniqueTerms } from '@/lib/keywords';
import {
  SKILL_CATEGORIES,
  type ExperienceEntry,
  type ProjectEntry,
  type ResumeContent,
  type SectionToggles,
} from '@/lib/validations/resume';
import type { JobAnalysis } from '@/services/job-analyzer';
import { isQuantified } from './ats-score';

export interface PageBudget {
  experienceEntries: number;
  experienceBullets: number;
  projectEntries: number;
  projectBullets: number;
  extraEntries: number;
  extraBullets: number;
}

export interface PrioritizeOptions {
  priorityExperiences?: readonly string[];
  prioritySkills?: readonly string[];
  /** Year used for "Present" end dates */
  currentYear?: number;
}

export interface PrioritizedContent {
  content: ResumeContent;
  selectedExperiences: string[];
  selectedSkills: string[];
  bulletsKept: number;
  bulletsDropped: number;
}

const PRIORITY_BOOST = 1000;

export function pageBudget(targetLength: number): PageBudget {
  const pages = Math.min(3, Math.max(1, Math.round(targetLength)));
  const multiPage = pages > 1;
  return {
    experienceEntries: 3 * pages,
    experienceBullets: multiPage ? 6 : 4,
    projectEntries: 2 * pages,
    projectBullets: multiPage ? 4 : 3,
    extraEntries: 2 * pages,
    extraBullets: 3,
  };
}

/**
 * Copy of the content with disabled sections emptied
 */
export function applySectionToggles(content: ResumeContent, toggles: SectionToggles): ResumeContent {
  return {
    header: { ...content.header },
    education: toggles.education ? content.education : [],
    experience: toggles.experience ? content.experience : [],
    projects: toggles.projects ? content.projects : [],
    skills: toggles.skills
      ? content.skills
      : { languages: [], frameworks: [], developerTools: [], libraries: [], databases: [], other: [] },
    leadership: toggles.leadership ? content.leadership : [],
    certifications: toggles.certifications ? content.certifications : [],
    volunteering: toggles.volunteering ? content.volunteering : [],
  };
}

// ============================================================================
// Scoring
// ============================================================================

interface KeywordSets {
  primary: string[];
  secondary: string[];
}

function keywordSets(analysis: JobAnalysis): KeywordSets {
  const primary = uniqueTerms([...analysis.primaryKeywords, ...analysis.requiredSkills]);
  const primaryKeys = new Set(primary.map((term) => term.toLowerCase()));
  const secondary = uniqueTerms([...analysis.secondaryKeywords, ...analysis.preferredSkills]).filter(
    (term) => !primaryKeys.has(term.toLowerCase())
  );
  return { primary, secondary };
}

/**
 * Primary keyword hits weigh 3, secondary hits 1, a quantified result 1
 */
export function scoreBullet(bullet: string, keywords: KeywordSets): number {
  const primary = keywords.primary.filter((term) => containsTerm(bullet, term)).length;
  const secondary = keywords.secondary.filter((term) => containsTerm(bullet, term)).length;
  return primary * 3 + secondary + (isQuantified(bullet) ? 1 : 0);
}

/** Latest year an entry covers; "Present" counts as the current year */
export function endYear(dates: string, currentYear: number): number {
  if (/\b(present|current|now)\b/i.test(dates)) return currentYear;
  const years = dates.match(/\b(?:19|20)\d{2}\b/g)?.map(Number) ?? [];
  return years.length > 0 ? Math.max(...years) : 0;
}

function rankBullets(bullets: readonly string[], keywords: KeywordSets, limit: number) {
  const ranked = bullets
    .map((bullet, index) => ({ bullet, index, score: scoreBullet(bullet, keywords) }))
    .sort((a, b) => b.score - a.score || a.index - b.index);
  return {
    kept: ranked.slice(0, limit).map((item) => item.bullet),
    score: ranked.reduce((sum, item) => sum + item.score, 0),
    dropped: Math.max(0, ranked.length - limit),
  };
}

function matchesPriority(values: readonly string[], priorities: readonly string[]): boolean {
  return priorities.some((priority) => {
    const wanted = priority.trim().toLowerCase();
    return wanted.length > 0 && values.some((value) => value.toLowerCase().includes(wanted));
  });
}

interface Ranked<T> {
  entry: T;
  index: number;
  relevance: number;
  recency: number;
  dropped: number;
}

/**
 * Keep the most relevant entries (ties go to the most recent), then restore
 * reverse-chronological order for display.
 */
function selectEntries<T>(ranked: Ranked<T>[], limit: number): { kept: Ranked<T>[]; dropped: Ranked<T>[] } {
  const byRelevance = [...ranked].sort(
    (a, b) => b.relevance - a.relevance || b.recency - a.recency || a.index - b.index
  );
  const kept = byRelevance
    .slice(0, limit)
    .sort((a, b) => b.recency - a.recency || a.index - b.index);
  return { kept, dropped: byRelevance.slice(limit) };
}

// ============================================================================
// Prioritization
// ============================================================================

export function prioritizeContent(
  content: ResumeContent,
  analysis: JobAnalysis,
  targetLength: number,
  options: PrioritizeOptions = {}
): PrioritizedContent {
  const budget = pageBudget(targetLength);
  const keywords = keywordSets(analysis);
  const currentYear = options.currentYear ?? new Date().getFullYear();
  const priorityExperiences = options.priorityExperiences ?? [];
  let bulletsKept = 0;
  let bulletsDropped = 0;

  const trim = <T extends { dates: string; bullets: string[] }>(
    entries: readonly T[],
    entryLimit: number,
    bulletLimit: number,
    extraRelevance: (entry: T) => number
  ): T[] => {
    const ranked = entries.map((entry, index): Ranked<T> => {
      const bullets = rankBullets(entry.bullets, keywords, bulletLimit);
      return {
        entry: { ...entry, bullets: bullets.kept },
        index,
        relevance: bullets.score + extraRelevance(entry),
        recency: endYear(entry.dates, currentYear),
        dropped: bullets.dropped,
      };
    });
    const { kept, dropped } = selectEntries(ranked, entryLimit);
    for (const item of kept) {
      bulletsKept += item.entry.bullets.length;
      bulletsDropped += item.dropped;
    }
    for (const item of dropped) {
      bulletsDropped += item.entry.bullets.length + item.dropped;
    }
    return kept.map((item) => item.entry);
  };

  const primaryHits = (text: string) => keywords.primary.filter((term) => containsTerm(text, term)).length;

  const positions = (entries: readonly ExperienceEntry[], boostPriority: boolean): ExperienceEntry[] =>
    trim(
      entries,
      boostPriority ? budget.experienceEntries : budget.extraEntries,
      boostPriority ? budget.experienceBullets : budget.extraBullets,
      (entry) =>
        primaryHits(entry.title) * 3 +
        (boostPriority && matchesPriority([entry.title, entry.company], priorityExperiences) ? PRIORITY_BOOST : 0)
    );

  const projects = (entries: readonly ProjectEntry[]): ProjectEntry[] =>
    trim(entries, budget.projectEntries, budget.projectBullets, (entry) => primaryHits(`${entry.name} ${entry.techStack}`) * 3);

  const experience = positions(content.experience, true);

  const prioritized: ResumeContent = {
    header: { ...content.header },
    education: content.education.map((entry) => ({ ...entry, highlights: [...entry.highlights] })),
    experience,
    projects: projects(content.projects),
    skills: prioritizeSkills(content, analysis, options.prioritySkills ?? []),
    leadership: positions(content.leadership, false),
    certifications: positions(content.certifications, false),
    volunteering: positions(content.volunteering, false),
  };

  return {
    content: prioritized,
    selectedExperiences: experience.map((entry) =>
      [entry.title, entry.company].filter(Boolean).join(' at ')
    ),
    selectedSkills: orderSkills(
      SKILL_CATEGORIES.flatMap((category) => prioritized.skills[category]),
      jobTerms(analysis, options.prioritySkills ?? [])
    ),
    bulletsKept,
    bulletsDropped,
  };
}

// ============================================================================
// Skills
// ============================================================================

function jobTerms(analysis: JobAnalysis, prioritySkills: readonly string[]): string[] {
  return uniqueTerms([
    ...prioritySkills,
    ...analysis.requiredSkills,
    ...analysis.primaryKeywords,
    ...analysis.preferredSkills,
  ]);
}

/**
 * Skills matching a job term move to the front, in job-term order; the rest
 * keep their original order.
 */
export function orderSkills(skills: readonly string[], terms: readonly string[]): string[] {
  const rankOf = (skill: string): number => {
    const index = terms.findIndex(
      (term) => term.toLowerCase() === skill.toLowerCase() || containsTerm(skill, term)
    );
    return index === -1 ? Number.MAX_SAFE_INTEGER : index;
  };
  return skills
    .map((skill, index) => ({ skill, index, rank: rankOf(skill) }))
    .sort((a, b) => a.rank - b.rank || a.index - b.index)
    .map((item) => item.skill);
}

function prioritizeSkills(
  content: ResumeContent,
  analysis: JobAnalysis,
  prioritySkills: readonly string[]
): ResumeContent['skills'] {
  const terms = jobTerms(analysis, prioritySkills);
  return {
    languages: orderSkills(content.skills.languages, terms),
    frameworks: orderSkills(content.skills.frameworks, terms),
    developerTools: orderSkills(content.skills.developerTools, terms),
    libraries: orderSkills(content.skills.libraries, terms),
    databases: orderSkills(content.skills.databases, terms),
    other: orderSkills(content.skills.other, terms),
  };
}
