/**
 * ATS compatibility score
 *
 *   score = round(100 × (0.5·K + 0.2·Q + 0.2·C + 0.1·R))
 *
 * K: share of primary keywords found in the tailored text (0 without keywords)
 * Q: quantified bullets, saturating at 5
 * C: share of enabled core sections that have content
 * R: share of required skills found in the tailored text
 */

import { containsTerm } from '@/lib/keywords';
import type { ResumeContent, SectionToggles } from '@/lib/validations/resume';
import type { JobAnalysis } from '@/services/job-analyzer';

export const ATS_WEIGHTS = { keywords: 0.5, quantified: 0.2, completeness: 0.2, requiredSkills: 0.1 } as const;

const QUANTIFIED_TARGET = 5;

const QUANTIFIED_PATTERNS: RegExp[] = [
  /\d+(?:\.\d+)?\s?%/,
  /\$\s?\d[\d,.]*\s?[KMB]?\b/i,
  /\b\d+\+?\s+(?:years?|months?|weeks?)\b/i,
  /\b\d+\+?\s+(?:people|members|employees|clients|customers|users|engineers|developers|teams?)\b/i,
  /\b(?:increased|decreased|improved|reduced|grew|cut|boosted|saved)\b.*\bby\s+\d/i,
  /\b\d{2,}[\d,.]*[KMB]?\b/,
];

export function isQuantified(text: string): boolean {
  return QUANTIFIED_PATTERNS.some((pattern) => pattern.test(text));
}

export interface AtsBreakdown {
  score: number;
  keywordCoverage: number;
  quantifiedBullets: number;
  sectionCompleteness: number;
  requiredSkillCoverage: number;
}

function coverage(text: string, terms: readonly string[]): number {
  if (terms.length === 0) return 0;
  return terms.filter((term) => containsTerm(text, term)).length / terms.length;
}

function allBullets(content: ResumeContent): string[] {
  return [
    ...content.experience.flatMap((entry) => entry.bullets),
    ...content.projects.flatMap((entry) => entry.bullets),
    ...content.leadership.flatMap((entry) => entry.bullets),
    ...content.volunteering.flatMap((entry) => entry.bullets),
  ];
}

function sectionCompleteness(content: ResumeContent, toggles: SectionToggles): number {
  const core = [
    { enabled: toggles.experience, filled: content.experience.length > 0 },
    { enabled: toggles.education, filled: content.education.length > 0 },
    { enabled: toggles.projects, filled: content.projects.length > 0 },
    { enabled: toggles.skills, filled: Object.values(content.skills).some((values) => values.length > 0) },
  ].filter((section) => section.enabled);

  if (core.length === 0) return 0;
  return core.filter((section) => section.filled).length / core.length;
}

export function computeAtsScore(
  tailoredText: string,
  content: ResumeContent,
  analysis: JobAnalysis,
  toggles: SectionToggles
): AtsBreakdown {
  const keywordCoverage = coverage(tailoredText, analysis.primaryKeywords);
  const quantifiedBullets = allBullets(content).filter(isQuantified).length;
  const completeness = sectionCompleteness(content, toggles);
  const requiredSkillCoverage = coverage(tailoredText, analysis.requiredSkills);

  const weighted =
    ATS_WEIGHTS.keywords * keywordCoverage +
    ATS_WEIGHTS.quantified * Math.min(1, quantifiedBullets / QUANTIFIED_TARGET) +
    ATS_WEIGHTS.completeness * completeness +
    ATS_WEIGHTS.requiredSkills * requiredSkillCoverage;

  return {
    score: Math.max(0, Math.min(100, Math.round(100 * weighted))),
    keywordCoverage: round2(keywordCoverage),
    quantifiedBullets,
    sectionCompleteness: round2(completeness),
    requiredSkillCoverage: round2(requiredSkillCoverage),
  };
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}
