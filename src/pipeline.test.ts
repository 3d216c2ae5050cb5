import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { loadServerEnv } from '@/data/env/server';
import { InMemoryResumeRepository } from '@/services/resumes';
import { JOB_POSTING_TEXT, MASTER_RESUME_TEXT } from '@/test/fixtures';
import { TEST_API_KEY } from '@/test/llm';
import { createPipeline } from './pipeline';

const PDF_BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46, 0x2d, 0x31, 0x2e, 0x37]);

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('createPipeline', () => {
  it('generates and exports a resume with the provider unavailable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response(PDF_BYTES, { status: 200 }))
    );
    const pipeline = createPipeline(loadServerEnv({ LATEX_SERVICE_URL: 'http://compiler.test' }));

    const generated = await pipeline.resumes.generate({
      masterResumeText: MASTER_RESUME_TEXT,
      jobPostingText: JOB_POSTING_TEXT,
    });
    const artifact = await pipeline.exports.export({ resumeId: generated.resumeId ?? '', format: 'PDF' });

    expect(generated.status).toBe('COMPLETED');
    expect(artifact.source).toBe('stored');
    expect(artifact.contentType).toBe('application/pdf');
    await pipeline.close();
  });

  it('routes completions through an injected transport', async () => {
    const complete = vi.fn(async () => ({ content: null }));
    const pipeline = createPipeline(
      loadServerEnv({ LATEX_SERVICE_URL: 'http://compiler.test', GROQ_API_KEY: TEST_API_KEY }),
      { transport: { complete }, repository: new InMemoryResumeRepository() }
    );

    expect(pipeline.gateway.isConfigured()).toBe(true);
    await pipeline.analyzer.analyze(JOB_POSTING_TEXT);
    expect(complete).toHaveBeenCalledTimes(1);
  });

  it('reports health and keeps recent logs', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response('ok', { status: 200 }))
    );
    const pipeline = createPipeline(
      loadServerEnv({ LATEX_SERVICE_URL: 'http://compiler.test', LOG_BUFFER_SIZE: '20' })
    );

    expect(await pipeline.health()).toEqual({
      llm: { configured: false, model: 'llama3-8b-8192', baseUrl: 'https://api.groq.com/openai/v1' },
      compiler: true,
    });
    expect(pipeline.recentLogs().map((entry) => entry.message)).toContain('Pipeline ready');
  });
});
