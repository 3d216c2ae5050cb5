/**
 * AI Prompt Templates for Resume Tailoring
 */

import type { SectionToggles } from '@/lib/validations/resume';
import { BEGIN_SENTINEL, END_SENTINEL } from '@/services/latex';
import type { JobAnalysis } from '@/services/job-analyzer';

export const RESUME_TAILORING_SYSTEM_PROMPT = `You are an expert resume writer and ATS (Applicant Tracking System) specialist.
You rewrite a candidate's master resume so it targets one job posting.

Rules:
- Never invent employers, titles, dates, degrees, metrics or skills the master resume does not contain
- Rephrase bullets to lead with strong action verbs and use the posting's keywords where they are truthful
- Keep every date exactly as written in the master resume
- Order bullets within each entry from most to least relevant to the job
- Leave out sections the instructions mark as disabled
- Use empty strings and empty arrays for missing values, never "N/A"

Output must be a single valid JSON object with exactly this structure:
{
  "header": { "name": "", "phone": "", "email": "", "location": "", "linkedin": "", "linkedinUrl": "", "github": "", "githubUrl": "" },
  "education": [{ "school": "", "location": "", "degree": "", "dates": "", "highlights": [] }],
  "experience": [{ "title": "", "company": "", "location": "", "dates": "", "bullets": [] }],
  "projects": [{ "name": "", "techStack": "", "dates": "", "bullets": [] }],
  "skills": { "languages": [], "frameworks": [], "developerTools": [], "libraries": [], "databases": [], "other": [] },
  "leadership": [{ "title": "", "company": "", "location": "", "dates": "", "bullets": [] }],
  "certifications": [{ "title": "", "company": "", "location": "", "dates": "", "bullets": [] }],
  "volunteering": [{ "title": "", "company": "", "location": "", "dates": "", "bullets": [] }]
}`;

function list(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : 'none';
}

/**
 * Build the user prompt for tailoring the master resume to the analysis
 */
export function buildTailoringPrompt(params: {
  masterResume: string;
  jobPosting: string;
  analysis: JobAnalysis;
  toggles: SectionToggles;
  targetLength: number;
  priorityExperiences?: readonly string[];
  prioritySkills?: readonly string[];
}): string {
  const { analysis, toggles } = params;
  const enabled = Object.entries(toggles)
    .filter(([, on]) => on)
    .map(([section]) => section);
  const disabled = Object.entries(toggles)
    .filter(([, on]) => !on)
    .map(([section]) => section);

  return `Tailor this master resume to the job below.

## TARGET JOB
Title: ${analysis.jobTitle ?? 'not stated'}
Company: ${analysis.companyName ?? 'not stated'}
Experience level: ${analysis.experienceLevel}
Required skills: ${list(analysis.requiredSkills)}
Preferred skills: ${list(analysis.preferredSkills)}
Primary keywords: ${list(analysis.primaryKeywords)}
Secondary keywords: ${list(analysis.secondaryKeywords)}
Action verbs: ${list(analysis.actionVerbs)}

## INSTRUCTIONS
Target length: ${params.targetLength} page(s)
Enabled sections: ${list(enabled)}
Disabled sections: ${list(disabled)}
Experiences to emphasize: ${list(params.priorityExperiences ?? [])}
Skills to emphasize: ${list(params.prioritySkills ?? [])}

## JOB POSTING
${params.jobPosting.trim()}

## MASTER RESUME
${params.masterResume.trim()}

Return the JSON object described in your instructions.`;
}

export const LATEX_CONVERSION_SYSTEM_PROMPT = `You are a LaTeX typesetting expert who converts plain-text resumes into compilable LaTeX documents.

Rules:
- Produce one complete document using the article class and only standard packages
- Escape LaTeX special characters in resume text: & % $ # _ { } ~ ^ \\
- Put every \\item inside an itemize environment
- Do not add content that is not in the resume
- Write no explanations, comments or code fences

Wrap the document in marker lines exactly like this:
${BEGIN_SENTINEL}
\\documentclass[letterpaper,11pt]{article}
...
\\end{document}
${END_SENTINEL}`;

export function buildLatexConversionPrompt(tailoredText: string): string {
  return `Convert this resume to LaTeX.

## RESUME
${tailoredText.trim()}`;
}
