import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, ValidationError } from '@/lib/errors';
import { validate } from '@/services/latex';
import { JobAnalyzer } from '@/services/job-analyzer';
import { ResumeTailor } from '@/services/resume-tailor';
import { JOB_POSTING_TEXT, MASTER_RESUME_TEXT } from '@/test/fixtures';
import { offlineGateway } from '@/test/llm';
import { InMemoryResumeRepository, ResumeService, type NewResume, type ResumeRepository } from '.';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function setup(repository: ResumeRepository = new InMemoryResumeRepository()) {
  const gateway = offlineGateway();
  const analyzer = new JobAnalyzer(gateway);
  const tailor = new ResumeTailor(gateway);
  return { service: new ResumeService({ analyzer, tailor, repository }), repository, tailor };
}

const INPUT = {
  masterResumeText: MASTER_RESUME_TEXT,
  jobPostingText: JOB_POSTING_TEXT,
  jobTitle: 'Senior Backend Engineer',
  companyName: 'Orbit Cloud',
  userId: 'user-1',
};

class FailingRepository extends InMemoryResumeRepository {
  override async create(_input: NewResume): Promise<never> {
    throw new Error('connection refused');
  }
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('ResumeService.generate', () => {
  it('tailors a resume end to end without an AI provider', async () => {
    const { service } = setup();

    const result = await service.generate(INPUT);

    expect(result.status).toBe('COMPLETED');
    expect(result.degraded.ai).toBe(true);
    expect(result.latexOrigin).toBe('structured');
    expect(validate(result.latexSource).ok).toBe(true);
    expect(result.atsScore).toBeGreaterThanOrEqual(0);
    expect(result.atsScore).toBeLessThanOrEqual(100);
    expect(result.jobAnalysis.jobTitle).toBe('Senior Backend Engineer');
    expect(result.resumeId).not.toBeNull();
  });

  it('scores a short posting deterministically from local keyword overlap', async () => {
    const { service } = setup();
    const input = {
      masterResumeText: MASTER_RESUME_TEXT,
      jobPostingText: 'Senior Go Engineer, gRPC, Kubernetes required',
      targetLength: 1,
      sectionToggles: {
        experience: true,
        education: true,
        projects: true,
        skills: true,
        leadership: true,
        certifications: true,
        volunteering: true,
      },
    };

    const first = await service.generate(input);
    const second = await service.generate(input);

    expect(first.status).toBe('COMPLETED');
    expect(first.latexSource).toContain('\\documentclass');
    expect(second.atsScore).toBe(first.atsScore);
    expect(second.tailoredResumeText).toBe(first.tailoredResumeText);
  });

  it('renders the user resume when bullets mention AI work or start with "No"', async () => {
    const { service } = setup();
    const masterResumeText = MASTER_RESUME_TEXT.replace(
      '- Mentored 4 engineers on code review practices',
      '- Served as an AI platform lead for 12 engineers\n- No downtime during migration of 40 services'
    );

    const result = await service.generate({ ...INPUT, masterResumeText });

    expect(result.status).toBe('COMPLETED');
    expect(result.latexOrigin).toBe('structured');
    expect(result.latexSource).toContain('Jordan Rivera');
    expect(result.latexSource).not.toContain('\\section{Notice}');
    const bullet = 'No downtime during migration of 40 services';
    expect(result.latexSource.includes(bullet)).toBe(result.tailoredResumeText.includes(bullet));
  });

  it('stores the completed run', async () => {
    const { service } = setup();

    const result = await service.generate(INPUT);
    const stored = await service.getResume(result.resumeId ?? '');

    expect(stored).toMatchObject({
      userId: 'user-1',
      jobTitle: 'Senior Backend Engineer',
      companyName: 'Orbit Cloud',
      status: 'COMPLETED',
      tailoredResume: result.tailoredResumeText,
      latexCode: result.latexSource,
      atsScore: result.atsScore,
      targetLength: 1,
    });
  });

  it('returns the result when the run cannot be stored', async () => {
    const { service } = setup(new FailingRepository());

    const result = await service.generate(INPUT);

    expect(result.status).toBe('COMPLETED');
    expect(result.resumeId).toBeNull();
  });

  it('marks the run as failed when tailoring throws', async () => {
    const { service, repository, tailor } = setup();
    vi.spyOn(tailor, 'tailor').mockRejectedValue(new Error('boom'));

    await expect(service.generate(INPUT)).rejects.toThrow('boom');

    const [stored] = await repository.listByUser('user-1');
    expect(stored.status).toBe('ERROR');
  });

  it('rejects an empty master resume', async () => {
    const { service } = setup();

    await expect(service.generate({ ...INPUT, masterResumeText: '   ' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects a target length outside 1..3', async () => {
    const { service } = setup();

    await expect(service.generate({ ...INPUT, targetLength: 4 })).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('ResumeService records', () => {
  it('lists a user resumes newest first', async () => {
    const { service } = setup();

    const first = await service.generate({ ...INPUT, companyName: 'First Co' });
    const second = await service.generate({ ...INPUT, companyName: 'Second Co' });

    const listed = await service.listResumes('user-1');
    expect(listed.map((resume) => resume.id)).toEqual([second.resumeId, first.resumeId]);
    expect(await service.listResumes('someone-else')).toEqual([]);
  });

  it('deletes a resume once', async () => {
    const { service } = setup();
    const { resumeId } = await service.generate(INPUT);
    const id = resumeId ?? '';

    await service.deleteResume(id);

    await expect(service.getResume(id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.deleteResume(id)).rejects.toBeInstanceOf(NotFoundError);
  });
});
