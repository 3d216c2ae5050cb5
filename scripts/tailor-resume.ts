/**
 * Tailor a resume from files on disk
 *
 * Run with: npx tsx scripts/tailor-resume.ts <master-resume.txt> <job-posting.txt> [options]
 *
 * Options:
 *   --title <text>      job title
 *   --company <text>    company name
 *   --pages <n>         target length in pages (1-3)
 *   --format <fmt>      LATEX | PDF | PNG | JPG (default LATEX)
 *   --out <dir>         output directory (default ./out)
 *   --ai-latex          ask the model to write the LaTeX directly
 */

import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { parseArgs } from 'node:util';
import { createPipeline } from '../src/pipeline';
import { toErrorResponse } from '../src/lib/errors';

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      title: { type: 'string' },
      company: { type: 'string' },
      pages: { type: 'string', default: '1' },
      format: { type: 'string', default: 'LATEX' },
      out: { type: 'string', default: 'out' },
      'ai-latex': { type: 'boolean', default: false },
    },
  });

  const [masterPath, postingPath] = positionals;
  if (!masterPath || !postingPath) {
    console.error('Usage: tailor-resume <master-resume.txt> <job-posting.txt> [--format PDF] [--out dir]');
    process.exitCode = 1;
    return;
  }

  const outDir = values.out ?? 'out';
  const format = values.format ?? 'LATEX';
  const pipeline = createPipeline();
  try {
    console.log('='.repeat(60));
    console.log('Resume Tailoring');
    console.log('='.repeat(60));

    const result = await pipeline.resumes.generate({
      masterResumeText: await readFile(masterPath, 'utf8'),
      jobPostingText: await readFile(postingPath, 'utf8'),
      jobTitle: values.title,
      companyName: values.company,
      targetLength: Number(values.pages ?? '1'),
      latexStrategy: values['ai-latex'] ? 'ai' : 'structured',
    });

    console.log(`\nStatus:     ${result.status}`);
    console.log(`ATS score:  ${result.atsScore}`);
    console.log(`Job:        ${result.jobAnalysis.jobTitle ?? 'unknown'} at ${result.jobAnalysis.companyName ?? 'unknown'}`);
    console.log(`Experience: ${result.selectedExperiences.join('; ') || 'none'}`);
    for (const note of result.processingNotes) console.log(`  - ${note}`);

    await mkdir(outDir, { recursive: true });
    await writeFile(join(outDir, 'tailored-resume.txt'), result.tailoredResumeText, 'utf8');

    if (!result.resumeId) {
      await writeFile(join(outDir, 'resume.tex'), result.latexSource, 'utf8');
      console.log(`\nWrote ${outDir}/resume.tex (run was not stored, export skipped)`);
      return;
    }

    const artifact = await pipeline.exports.export({ resumeId: result.resumeId, format });
    await writeFile(join(outDir, artifact.filename), artifact.payload);
    console.log(`\nWrote ${join(outDir, artifact.filename)} (${artifact.contentType})`);
  } finally {
    await pipeline.close();
  }
}

main().catch((error: unknown) => {
  const { status, body } = toErrorResponse(error);
  console.error(`\n${body.error} (${status}) [${body.traceId}]`);
  console.error(body.message);
  process.exitCode = 1;
});
