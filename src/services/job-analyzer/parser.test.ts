import { describe, expect, it } from 'vitest';
import { parseJobAnalysis } from './parser';

describe('parseJobAnalysis', () => {
  it('parses a fenced JSON payload and normalises enums', () => {
    const content = [
      'Here is the analysis:',
      '```json',
      JSON.stringify({
        job_title: 'Platform Engineer',
        required_skills: ['Go', 'gRPC', 3],
        primary_keywords: ['Kubernetes'],
        experience_level: 'senior level',
        job_type: 'full-time',
        remote_type: 'on-site',
        skill_priority: { Go: 1.4 },
      }),
      '```',
    ].join('\n');

    const result = parseJobAnalysis(content);

    expect(result.kind).toBe('parsed');
    if (result.kind !== 'parsed') return;
    expect(result.fields).toMatchObject({
      jobTitle: 'Platform Engineer',
      companyName: null,
      requiredSkills: ['Go', 'gRPC'],
      preferredSkills: [],
      primaryKeywords: ['Kubernetes'],
      experienceLevel: 'SENIOR',
      jobType: 'FULL_TIME',
      remoteType: 'ONSITE',
      skillPriority: { Go: 1 },
    });
  });

  it('falls back to labelled sections', () => {
    const content = [
      'REQUIRED_SKILLS:',
      '- Python',
      '- SQL',
      '• Airflow',
      'EXPERIENCE_LEVEL: Mid-level',
      'KEY_KEYWORDS: data pipelines, ETL',
    ].join('\n');

    const result = parseJobAnalysis(content);

    expect(result.kind).toBe('heuristic');
    if (result.kind !== 'heuristic') return;
    expect(result.fields.requiredSkills).toEqual(['Python', 'SQL', 'Airflow']);
    expect(result.fields.experienceLevel).toBe('MID');
    expect(result.fields.primaryKeywords).toEqual(['data pipelines', 'ETL']);
    expect(result.fields.responsibilities).toEqual([]);
  });

  it('ignores bullets outside a known section', () => {
    const content = ['Notes:', '- not a skill', 'PREFERRED_SKILLS:', '- Terraform'].join('\n');

    const result = parseJobAnalysis(content);

    expect(result.kind).toBe('heuristic');
    if (result.kind !== 'heuristic') return;
    expect(result.fields.preferredSkills).toEqual(['Terraform']);
    expect(result.fields.requiredSkills).toEqual([]);
  });

  it('returns default for a refusal', () => {
    expect(parseJobAnalysis("I'm sorry, I cannot help with that")).toEqual({ kind: 'default' });
  });

  it('returns default for a JSON payload with no content', () => {
    expect(parseJobAnalysis('{"required_skills": []}')).toEqual({ kind: 'default' });
  });
});
