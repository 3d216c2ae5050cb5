import { SKILL_CATEGORIES, SKILL_CATEGORY_LABELS, type ResumeContent } from '@/lib/validations/resume';

function joinFields(...fields: string[]): string {
  return fields.filter((field) => field.trim()).join(' | ');
}

function bulletLines(bullets: readonly string[]): string[] {
  return bullets.map((bullet) => `- ${bullet}`);
}

function block(heading: string, lines: string[]): string {
  return lines.length > 0 ? [heading, ...lines].join('\n') : '';
}

/**
 * Plain-text rendering of tailored content. The layout reads back through
 * `parseResumeText`.
 */
export function renderTailoredText(content: ResumeContent): string {
  const { header } = content;

  const headerBlock = [
    header.name,
    joinFields(header.email, header.phone, header.linkedinUrl || header.linkedin, header.githubUrl || header.github, header.location),
  ]
    .filter(Boolean)
    .join('\n');

  const positions = (heading: string, entries: ResumeContent['experience']) =>
    block(
      heading,
      entries.flatMap((entry) => [
        joinFields(entry.title, entry.company, entry.location, entry.dates),
        ...bulletLines(entry.bullets),
      ])
    );

  const skillLines = SKILL_CATEGORIES.filter((category) => content.skills[category].length > 0).map(
    (category) => `${SKILL_CATEGORY_LABELS[category]}: ${content.skills[category].join(', ')}`
  );

  return [
    headerBlock,
    block(
      'EDUCATION',
      content.education.flatMap((entry) => [
        joinFields(entry.school, entry.location),
        joinFields(entry.degree, entry.dates),
        ...bulletLines(entry.highlights),
      ]).filter(Boolean)
    ),
    positions('EXPERIENCE', content.experience),
    block(
      'PROJECTS',
      content.projects.flatMap((entry) => [
        joinFields(entry.name, entry.techStack, entry.dates),
        ...bulletLines(entry.bullets),
      ])
    ),
    block('TECHNICAL SKILLS', skillLines),
    positions('LEADERSHIP', content.leadership),
    positions('CERTIFICATIONS', content.certifications),
    positions('VOLUNTEERING', content.volunteering),
  ]
    .filter(Boolean)
    .join('\n\n');
}
