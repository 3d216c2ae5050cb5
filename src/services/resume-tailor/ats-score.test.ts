import { describe, expect, it } from 'vitest';
import { sectionTogglesSchema } from '@/lib/validations/resume';
import { sampleAnalysis, sampleResumeContent } from '@/test/fixtures';
import { computeAtsScore, isQuantified } from './ats-score';

const ALL_SECTIONS = sectionTogglesSchema.parse({});

describe('isQuantified', () => {
  it.each([
    ['Cut costs by 30%', true],
    ['Grew revenue $2M in a year', true],
    ['Led a team of 5 engineers', true],
    ['Improved query latency by 4x', true],
    ['Wrote documentation', false],
  ])('%s -> %s', (text, expected) => {
    expect(isQuantified(text)).toBe(expected);
  });
});

describe('computeAtsScore', () => {
  it('scores a resume with the primary keywords above one without them', () => {
    const content = sampleResumeContent();
    const analysis = sampleAnalysis();

    const without = computeAtsScore('Built services in Python', content, analysis, ALL_SECTIONS);
    const withKeywords = computeAtsScore(
      'Built services in Python with Kubernetes, Go and gRPC',
      content,
      analysis,
      ALL_SECTIONS
    );

    expect(without).toEqual({
      score: 24,
      keywordCoverage: 0,
      quantifiedBullets: 1,
      sectionCompleteness: 1,
      requiredSkillCoverage: 0,
    });
    expect(withKeywords.score).toBe(84);
    expect(withKeywords.keywordCoverage).toBe(1);
  });

  it('gives no keyword credit when the analysis has no primary keywords', () => {
    const result = computeAtsScore(
      'Kubernetes Go gRPC',
      sampleResumeContent(),
      sampleAnalysis({ primaryKeywords: [] }),
      ALL_SECTIONS
    );

    expect(result.keywordCoverage).toBe(0);
  });

  it('only counts enabled core sections toward completeness', () => {
    const content = { ...sampleResumeContent(), education: [] };

    const enabled = computeAtsScore('', content, sampleAnalysis(), ALL_SECTIONS);
    const disabled = computeAtsScore('', content, sampleAnalysis(), { ...ALL_SECTIONS, education: false });

    expect(enabled.sectionCompleteness).toBe(0.75);
    expect(disabled.sectionCompleteness).toBe(1);
  });

  it('scores only quantified bullets when every section is disabled', () => {
    const none = computeAtsScore(
      '',
      sampleResumeContent(),
      sampleAnalysis(),
      { experience: false, education: false, projects: false, skills: false, leadership: false, certifications: false, volunteering: false }
    );

    expect(none.score).toBe(4);
  });
});
