/**
 * LaTeX Resume Builder
 *
 * Renders ResumeContent into the resume template. Section order: header,
 * Education, Experience, Projects, Technical Skills, then Leadership,
 * Certifications and Volunteering. Sections without content are omitted.
 */

import {
  SKILL_CATEGORIES,
  SKILL_CATEGORY_LABELS,
  type EducationEntry,
  type ExperienceEntry,
  type ProjectEntry,
  type ResumeContent,
  type ResumeHeader,
  type Skills,
} from '@/lib/validations/resume';
import { escapeLatex, escapeUrl, sanitizeValue } from './escape';
import { wrapInTemplate } from './template';

/** Sanitise then escape */
function tex(value: string | null | undefined): string {
  return escapeLatex(sanitizeValue(value));
}

function itemList(items: readonly string[], indent = '      '): string {
  const rendered = items.map(tex).filter(Boolean);
  if (rendered.length === 0) return '';
  return [
    `${indent}\\resumeItemListStart`,
    ...rendered.map((item) => `${indent}  \\resumeItem{${item}}`),
    `${indent}\\resumeItemListEnd`,
  ].join('\n');
}

function section(title: string, entries: string[]): string {
  if (entries.length === 0) return '';
  return [
    `\\section{${title}}`,
    '  \\resumeSubHeadingListStart',
    ...entries,
    '  \\resumeSubHeadingListEnd',
  ].join('\n');
}

// ============================================================================
// Sections
// ============================================================================

function renderHeader(header: ResumeHeader): string {
  const name = tex(header.name) || 'Your Name';
  const contact: string[] = [];

  const phone = tex(header.phone);
  if (phone) contact.push(phone);

  const email = sanitizeValue(header.email).replace(/\s/g, '');
  if (email) {
    const mailto = email.replace(/[{}\\%#]/g, '');
    contact.push(`\\href{mailto:${mailto}}{\\underline{${escapeLatex(email)}}}`);
  }

  for (const [display, url] of [
    [header.linkedin, header.linkedinUrl],
    [header.github, header.githubUrl],
  ]) {
    const href = escapeUrl(url || display);
    if (!href) continue;
    const label = tex(display) || escapeLatex(href.replace(/^https?:\/\//i, '').replace(/\\/g, ''));
    contact.push(`\\href{${href}}{\\underline{${label}}}`);
  }

  const location = tex(header.location);
  if (location) contact.push(location);

  const lines = [
    '\\begin{center}',
    `    \\textbf{\\Huge \\scshape ${name}} \\\\ \\vspace{1pt}`,
  ];
  if (contact.length > 0) lines.push(`    \\small ${contact.join(' $|$ ')}`);
  lines.push('\\end{center}');
  return lines.join('\n');
}

function renderEducation(entries: readonly EducationEntry[]): string {
  const rendered = entries
    .filter((entry) => tex(entry.school) || tex(entry.degree))
    .map((entry) => {
      const heading = [
        '    \\resumeSubheading',
        `      {${tex(entry.school)}}{${tex(entry.location)}}`,
        `      {${tex(entry.degree)}}{${tex(entry.dates)}}`,
      ];
      const highlights = itemList(entry.highlights);
      return [...heading, ...(highlights ? [highlights] : [])].join('\n');
    });
  return section('Education', rendered);
}

function renderPositions(title: string, entries: readonly ExperienceEntry[]): string {
  const rendered = entries
    .filter((entry) => tex(entry.title) || tex(entry.company) || entry.bullets.some((b) => tex(b)))
    .map((entry) => {
      const heading = [
        '    \\resumeSubheading',
        `      {${tex(entry.title)}}{${tex(entry.dates)}}`,
        `      {${tex(entry.company)}}{${tex(entry.location)}}`,
      ];
      const bullets = itemList(entry.bullets);
      return [...heading, ...(bullets ? [bullets] : [])].join('\n');
    });
  return section(title, rendered);
}

function renderProjects(entries: readonly ProjectEntry[]): string {
  const rendered = entries
    .filter((entry) => tex(entry.name))
    .map((entry) => {
      const stack = tex(entry.techStack);
      const label = stack
        ? `\\textbf{${tex(entry.name)}} $|$ \\emph{${stack}}`
        : `\\textbf{${tex(entry.name)}}`;
      const bullets = itemList(entry.bullets);
      return [
        '    \\resumeProjectHeading',
        `      {${label}}{${tex(entry.dates)}}`,
        ...(bullets ? [bullets] : []),
      ].join('\n');
    });
  return section('Projects', rendered);
}

function renderSkills(skills: Skills): string {
  const lines = SKILL_CATEGORIES.map((category) => {
    const values = skills[category].map(tex).filter(Boolean);
    return values.length > 0
      ? `     \\textbf{${SKILL_CATEGORY_LABELS[category]}}{: ${values.join(', ')}}`
      : '';
  }).filter(Boolean);

  if (lines.length === 0) return '';
  return [
    '\\section{Technical Skills}',
    ' \\begin{itemize}[leftmargin=0.15in, label={}]',
    '    \\small{\\item{',
    lines.join(' \\\\\n'),
    '    }}',
    ' \\end{itemize}',
  ].join('\n');
}

// ============================================================================
// Public API
// ============================================================================

export function renderResumeBody(content: ResumeContent): string {
  return [
    renderHeader(content.header),
    renderEducation(content.education),
    renderPositions('Experience', content.experience),
    renderProjects(content.projects),
    renderSkills(content.skills),
    renderPositions('Leadership', content.leadership),
    renderPositions('Certifications', content.certifications),
    renderPositions('Volunteering', content.volunteering),
  ]
    .filter(Boolean)
    .join('\n\n');
}

const HEADING_LINE = /^[A-Z][A-Z &/-]{2,40}:?$/;
const BULLET_LINE = /^\s*[-•*]\s+(.+)$/;

/**
 * Render unstructured text: upper-case lines become sections, bullet runs
 * become itemize lists, everything else is escaped prose.
 */
export function renderFreeTextBody(text: string): string {
  const output: string[] = [];
  let bullets: string[] = [];

  const flush = () => {
    if (bullets.length === 0) return;
    output.push(['\\begin{itemize}', ...bullets.map((b) => `  \\item ${b}`), '\\end{itemize}'].join('\n'));
    bullets = [];
  };

  for (const rawLine of text.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      flush();
      continue;
    }
    const bullet = line.match(BULLET_LINE);
    if (bullet) {
      bullets.push(escapeLatex(bullet[1].trim()));
      continue;
    }
    flush();
    if (HEADING_LINE.test(line)) {
      output.push(`\\section{${escapeLatex(line.replace(/:$/, ''))}}`);
    } else {
      output.push(`${escapeLatex(line)}\n`);
    }
  }
  flush();

  return output.join('\n');
}

/**
 * Build a complete LaTeX document from structured content or free text
 */
export function buildLatex(input: ResumeContent | string): string {
  const body = typeof input === 'string' ? renderFreeTextBody(input) : renderResumeBody(input);
  return wrapInTemplate(body);
}
