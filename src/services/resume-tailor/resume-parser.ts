/**
 * Local master-resume parser
 *
 * Reads the plain-text resume users paste in: a header block, then sections
 * introduced by a heading line (EXPERIENCE, Education:, ...). Within a
 * section, non-bullet lines start entries and bullet lines belong to the
 * entry above them.
 */

import {
  SKILL_CATEGORIES,
  emptyResumeContent,
  type EducationEntry,
  type ExperienceEntry,
  type ProjectEntry,
  type ResumeContent,
  type ResumeHeader,
  type SkillCategory,
} from '@/lib/validations/resume';

type SectionKey =
  | 'education'
  | 'experience'
  | 'projects'
  | 'skills'
  | 'leadership'
  | 'certifications'
  | 'volunteering'
  | 'ignored';

const SECTION_HEADINGS: Record<string, SectionKey> = {
  EDUCATION: 'education',
  'EDUCATIONAL BACKGROUND': 'education',
  EXPERIENCE: 'experience',
  'WORK EXPERIENCE': 'experience',
  'PROFESSIONAL EXPERIENCE': 'experience',
  EMPLOYMENT: 'experience',
  'EMPLOYMENT HISTORY': 'experience',
  PROJECTS: 'projects',
  'PERSONAL PROJECTS': 'projects',
  'TECHNICAL PROJECTS': 'projects',
  SKILLS: 'skills',
  'TECHNICAL SKILLS': 'skills',
  'SKILLS & INTERESTS': 'skills',
  LEADERSHIP: 'leadership',
  'LEADERSHIP EXPERIENCE': 'leadership',
  ACTIVITIES: 'leadership',
  CERTIFICATIONS: 'certifications',
  CERTIFICATES: 'certifications',
  'LICENSES & CERTIFICATIONS': 'certifications',
  VOLUNTEER: 'volunteering',
  VOLUNTEERING: 'volunteering',
  'VOLUNTEER EXPERIENCE': 'volunteering',
  SUMMARY: 'ignored',
  'PROFESSIONAL SUMMARY': 'ignored',
  OBJECTIVE: 'ignored',
  PROFILE: 'ignored',
  INTERESTS: 'ignored',
  AWARDS: 'ignored',
};

const BULLET_PATTERN = /^\s*[-•*▪◦]\s+(.+)$/;
const FIELD_SEPARATOR = /\s*(?:\||\t|\s—\s|\s·\s)\s*/;
const DATE_PATTERN = /\b(?:19|20)\d{2}\b|\bpresent\b|\bcurrent\b/i;
const EMAIL_PATTERN = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/;
const PHONE_PATTERN = /^\+?[\d\s().-]{7,}\d$/;

const SKILL_LABELS: Array<[RegExp, SkillCategory]> = [
  [/language/i, 'languages'],
  [/framework/i, 'frameworks'],
  [/librar/i, 'libraries'],
  [/database|data store|storage/i, 'databases'],
  [/tool|devops|cloud|platform|infrastructure/i, 'developerTools'],
];

function headingFor(line: string): SectionKey | null {
  const normalized = line
    .trim()
    .replace(/[:#*]+/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toUpperCase();
  return SECTION_HEADINGS[normalized] ?? null;
}

function splitFields(line: string): { dates: string; fields: string[] } {
  const parts = line
    .split(FIELD_SEPARATOR)
    .map((part) => part.trim())
    .filter(Boolean);
  return {
    dates: parts.filter((part) => DATE_PATTERN.test(part)).join(' '),
    fields: parts.filter((part) => !DATE_PATTERN.test(part)),
  };
}

// ============================================================================
// Header
// ============================================================================

function parseHeader(lines: readonly string[]): ResumeHeader {
  const header = emptyResumeContent().header;
  const [first, ...rest] = lines.map((line) => line.trim()).filter(Boolean);
  if (!first) return header;

  const tokens: string[] = [];
  // A name line that already carries contact details
  if (first.includes('|') || EMAIL_PATTERN.test(first)) {
    const [name, ...contact] = first.split(/\s*[|•·]\s*/);
    header.name = EMAIL_PATTERN.test(name) ? '' : name;
    tokens.push(...contact);
    if (!header.name) tokens.push(name);
  } else {
    header.name = first;
  }
  for (const line of rest) tokens.push(...line.split(/\s*[|•·]\s*/));

  for (const raw of tokens) {
    const token = raw.trim();
    if (!token) continue;
    const email = token.match(EMAIL_PATTERN);
    if (email && !header.email) {
      header.email = email[0];
    } else if (/linkedin\.com/i.test(token)) {
      header.linkedin = token.replace(/^https?:\/\/(www\.)?/i, '');
      header.linkedinUrl = /^https?:/i.test(token) ? token : '';
    } else if (/github\.com/i.test(token)) {
      header.github = token.replace(/^https?:\/\/(www\.)?/i, '');
      header.githubUrl = /^https?:/i.test(token) ? token : '';
    } else if (PHONE_PATTERN.test(token) && !header.phone) {
      header.phone = token;
    } else if (!header.location) {
      header.location = token;
    }
  }

  return header;
}

// ============================================================================
// Entry sections
// ============================================================================

interface RawEntry {
  headingLines: string[];
  bullets: string[];
}

function groupEntries(lines: readonly string[]): RawEntry[] {
  const entries: RawEntry[] = [];
  let current: RawEntry | null = null;

  for (const line of lines) {
    if (!line.trim()) continue;

    const bullet = line.match(BULLET_PATTERN);
    if (bullet) {
      if (!current) {
        current = { headingLines: [], bullets: [] };
        entries.push(current);
      }
      current.bullets.push(bullet[1].trim());
      continue;
    }

    // A new heading line starts an entry once the current one has bullets,
    // or when both lines carry their own dates
    const startsEntry =
      !current ||
      current.bullets.length > 0 ||
      (current.headingLines.some((heading) => DATE_PATTERN.test(heading)) && DATE_PATTERN.test(line));

    if (startsEntry || !current) {
      current = { headingLines: [line.trim()], bullets: [] };
      entries.push(current);
    } else {
      current.headingLines.push(line.trim());
    }
  }

  return entries;
}

function fieldsOf(entry: RawEntry): { dates: string; fields: string[] } {
  const split = entry.headingLines.map(splitFields);
  return {
    dates: split
      .map((part) => part.dates)
      .filter(Boolean)
      .join(' '),
    fields: split.flatMap((part) => part.fields),
  };
}

function toExperience(entry: RawEntry): ExperienceEntry {
  const { dates, fields } = fieldsOf(entry);
  const [title = '', company = '', ...location] = fields;
  return { title, company, location: location.join(', '), dates, bullets: entry.bullets };
}

function toEducation(entry: RawEntry): EducationEntry {
  const { dates, fields } = fieldsOf(entry);
  const [school = '', location = '', ...degree] = fields;
  return { school, location, degree: degree.join(', '), dates, highlights: entry.bullets };
}

function toProject(entry: RawEntry): ProjectEntry {
  const { dates, fields } = fieldsOf(entry);
  const [name = '', ...stack] = fields;
  return { name, techStack: stack.join(', '), dates, bullets: entry.bullets };
}

// ============================================================================
// Skills
// ============================================================================

function parseSkills(lines: readonly string[], content: ResumeContent): void {
  for (const rawLine of lines) {
    const line = (rawLine.match(BULLET_PATTERN)?.[1] ?? rawLine).trim();
    if (!line) continue;

    const labelled = line.match(/^([^:]{2,40}):\s*(.*)$/);
    const label = labelled?.[1] ?? '';
    const values = (labelled?.[2] ?? line)
      .split(/\s*[,;|]\s*/)
      .map((value) => value.trim())
      .filter(Boolean);

    const category = SKILL_LABELS.find(([pattern]) => pattern.test(label))?.[1] ?? 'other';
    content.skills[category].push(...values);
  }
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse plain resume text into the structured content model. Never throws;
 * text without recognisable headings yields a header and empty sections.
 */
export function parseResumeText(text: string): ResumeContent {
  const content = emptyResumeContent();
  const headerLines: string[] = [];
  const sections = new Map<SectionKey, string[]>();
  let active: SectionKey | null = null;

  for (const line of text.replace(/\r\n?/g, '\n').split('\n')) {
    const heading = headingFor(line);
    if (heading) {
      active = heading;
      if (!sections.has(heading)) sections.set(heading, []);
      continue;
    }
    if (active === null) {
      headerLines.push(line);
    } else {
      sections.get(active)?.push(line);
    }
  }

  content.header = parseHeader(headerLines);

  for (const [section, lines] of sections) {
    switch (section) {
      case 'education':
        content.education = groupEntries(lines).map(toEducation);
        break;
      case 'experience':
      case 'leadership':
      case 'certifications':
      case 'volunteering':
        content[section] = groupEntries(lines).map(toExperience);
        break;
      case 'projects':
        content.projects = groupEntries(lines).map(toProject);
        break;
      case 'skills':
        parseSkills(lines, content);
        break;
      case 'ignored':
        break;
    }
  }

  for (const category of SKILL_CATEGORIES) {
    content.skills[category] = [...new Set(content.skills[category])];
  }

  return content;
}
