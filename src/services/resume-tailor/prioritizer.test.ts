import { describe, expect, it } from 'vitest';
import { emptyResumeContent, sectionTogglesSchema, type ExperienceEntry } from '@/lib/validations/resume';
import { sampleAnalysis, sampleResumeContent } from '@/test/fixtures';
import { applySectionToggles, endYear, orderSkills, pageBudget, prioritizeContent } from './prioritizer';

function job(title: string, company: string, dates: string, bullets: string[]): ExperienceEntry {
  return { title, company, location: '', dates, bullets };
}

const FIVE_JOBS = [
  job('Intern', 'Alpha', '2012 - 2013', ['Fixed bugs']),
  job('Engineer', 'Beta', '2015 - 2017', ['Ran Kubernetes clusters']),
  job('Engineer', 'Gamma', '2017 - 2019', ['Wrote docs']),
  job('Engineer', 'Delta', '2019 - Present', ['Built Go services']),
  job('Engineer', 'Epsilon', '2014 - 2015', ['Wrote docs']),
];

// ---------------------------------------------------------------------------
// Budget and toggles
// ---------------------------------------------------------------------------

describe('pageBudget', () => {
  it('scales entries with the page count', () => {
    expect(pageBudget(1)).toEqual({
      experienceEntries: 3,
      experienceBullets: 4,
      projectEntries: 2,
      projectBullets: 3,
      extraEntries: 2,
      extraBullets: 3,
    });
    expect(pageBudget(2)).toEqual({
      experienceEntries: 6,
      experienceBullets: 6,
      projectEntries: 4,
      projectBullets: 4,
      extraEntries: 4,
      extraBullets: 3,
    });
  });
});

describe('applySectionToggles', () => {
  it('empties disabled sections and keeps the rest', () => {
    const toggled = applySectionToggles(
      sampleResumeContent(),
      sectionTogglesSchema.parse({ education: false })
    );

    expect(toggled.education).toEqual([]);
    expect(toggled.experience).toHaveLength(1);
    expect(toggled.projects).toHaveLength(1);
  });
});

describe('endYear', () => {
  it('reads the latest year and treats Present as the current year', () => {
    expect(endYear('2019 - Present', 2030)).toBe(2030);
    expect(endYear('Jan 2018 - Mar 2020', 2030)).toBe(2020);
    expect(endYear('', 2030)).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Prioritization
// ---------------------------------------------------------------------------

describe('prioritizeContent', () => {
  it('orders bullets by keyword relevance', () => {
    const content = {
      ...emptyResumeContent(),
      experience: [
        job('Engineer', 'Nimbus', '2020', ['Wrote docs', 'Shipped Kubernetes operator', 'Cut build time by 40%']),
      ],
    };

    const result = prioritizeContent(content, sampleAnalysis(), 1);

    expect(result.content.experience[0].bullets).toEqual([
      'Shipped Kubernetes operator',
      'Cut build time by 40%',
      'Wrote docs',
    ]);
  });

  it('keeps the most relevant entries, preferring recent ones on ties', () => {
    const content = { ...emptyResumeContent(), experience: FIVE_JOBS };

    const result = prioritizeContent(content, sampleAnalysis(), 1, { currentYear: 2030 });

    expect(result.selectedExperiences).toEqual(['Engineer at Delta', 'Engineer at Gamma', 'Engineer at Beta']);
    expect(result.bulletsKept).toBe(3);
    expect(result.bulletsDropped).toBe(2);
  });

  it('always keeps priority experiences', () => {
    const content = { ...emptyResumeContent(), experience: FIVE_JOBS };

    const result = prioritizeContent(content, sampleAnalysis(), 1, {
      currentYear: 2030,
      priorityExperiences: ['alpha'],
    });

    expect(result.selectedExperiences).toEqual(['Engineer at Delta', 'Engineer at Beta', 'Intern at Alpha']);
  });

  it('trims bullets to the page budget', () => {
    const content = {
      ...emptyResumeContent(),
      experience: [job('Engineer', 'Nimbus', '2020', ['a1', 'a2', 'a3', 'a4', 'a5', 'a6'])],
    };

    const onePage = prioritizeContent(content, sampleAnalysis(), 1);
    const twoPages = prioritizeContent(content, sampleAnalysis(), 2);

    expect(onePage.content.experience[0].bullets).toEqual(['a1', 'a2', 'a3', 'a4']);
    expect(onePage.bulletsDropped).toBe(2);
    expect(twoPages.content.experience[0].bullets).toHaveLength(6);
  });

  it('moves matching skills first without adding missing ones', () => {
    const content = {
      ...emptyResumeContent(),
      skills: {
        ...emptyResumeContent().skills,
        languages: ['Python', 'Go', 'TypeScript'],
        developerTools: ['Docker', 'Kubernetes', 'Git'],
      },
    };

    const result = prioritizeContent(content, sampleAnalysis(), 1, { prioritySkills: ['Docker'] });

    expect(result.content.skills.languages).toEqual(['Go', 'Python', 'TypeScript']);
    expect(result.content.skills.developerTools).toEqual(['Docker', 'Kubernetes', 'Git']);
    expect(result.selectedSkills).toEqual(['Docker', 'Go', 'Kubernetes', 'Python', 'TypeScript', 'Git']);
    expect(result.selectedSkills).not.toContain('gRPC');
  });
});

describe('orderSkills', () => {
  it('keeps original order for unmatched skills', () => {
    expect(orderSkills(['Rust', 'Elixir', 'Go'], ['Go'])).toEqual(['Go', 'Rust', 'Elixir']);
  });
});
