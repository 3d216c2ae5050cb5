import { z } from 'zod';

// ============================================================================
// Field helpers
// ============================================================================

/** Any missing or non-string value becomes an empty string */
const text = z
  .string()
  .nullish()
  .catch(null)
  .transform((value) => value?.trim() ?? '');

/** Any missing or non-array value becomes an empty list; non-strings are dropped */
const textList = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .filter((item): item is string => typeof item === 'string')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

// ============================================================================
// Resume content (intermediate model)
// ============================================================================

export const resumeHeaderSchema = z.object({
  name: text,
  phone: text,
  email: text,
  location: text,
  linkedin: text,
  linkedinUrl: text,
  github: text,
  githubUrl: text,
});

export type ResumeHeader = z.infer<typeof resumeHeaderSchema>;

export const educationEntrySchema = z.object({
  school: text,
  location: text,
  degree: text,
  dates: text,
  highlights: textList,
});

export type EducationEntry = z.infer<typeof educationEntrySchema>;

export const experienceEntrySchema = z.object({
  title: text,
  company: text,
  location: text,
  dates: text,
  bullets: textList,
});

export type ExperienceEntry = z.infer<typeof experienceEntrySchema>;

export const projectEntrySchema = z.object({
  name: text,
  techStack: text,
  dates: text,
  bullets: textList,
});

export type ProjectEntry = z.infer<typeof projectEntrySchema>;

export const SKILL_CATEGORIES = [
  'languages',
  'frameworks',
  'developerTools',
  'libraries',
  'databases',
  'other',
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

export const SKILL_CATEGORY_LABELS: Record<SkillCategory, string> = {
  languages: 'Languages',
  frameworks: 'Frameworks',
  developerTools: 'Developer Tools',
  libraries: 'Libraries',
  databases: 'Databases',
  other: 'Other',
};

export const skillsSchema = z.object({
  languages: textList,
  frameworks: textList,
  developerTools: textList,
  libraries: textList,
  databases: textList,
  other: textList,
});

export type Skills = z.infer<typeof skillsSchema>;

const entries = <T extends z.ZodTypeAny>(schema: T) => z.array(schema).catch([]);

/**
 * Canonical resume shape shared by the tailoring engine and the LaTeX
 * builder. Every list is present (possibly empty).
 */
export const resumeContentSchema = z.object({
  header: resumeHeaderSchema.catch(emptyHeader()),
  education: entries(educationEntrySchema),
  experience: entries(experienceEntrySchema),
  projects: entries(projectEntrySchema),
  skills: skillsSchema.catch(emptySkills()),
  leadership: entries(experienceEntrySchema),
  certifications: entries(experienceEntrySchema),
  volunteering: entries(experienceEntrySchema),
});

export type ResumeContent = z.infer<typeof resumeContentSchema>;

export function emptyHeader(): ResumeHeader {
  return {
    name: '',
    phone: '',
    email: '',
    location: '',
    linkedin: '',
    linkedinUrl: '',
    github: '',
    githubUrl: '',
  };
}

export function emptySkills(): Skills {
  return { languages: [], frameworks: [], developerTools: [], libraries: [], databases: [], other: [] };
}

export function emptyResumeContent(): ResumeContent {
  return {
    header: emptyHeader(),
    education: [],
    experience: [],
    projects: [],
    skills: emptySkills(),
    leadership: [],
    certifications: [],
    volunteering: [],
  };
}

// ============================================================================
// Pipeline input
// ============================================================================

export const RESUME_SECTIONS = [
  'experience',
  'education',
  'projects',
  'skills',
  'leadership',
  'certifications',
  'volunteering',
] as const;

export type ResumeSection = (typeof RESUME_SECTIONS)[number];

export const sectionTogglesSchema = z.object({
  experience: z.boolean().default(true),
  education: z.boolean().default(true),
  projects: z.boolean().default(true),
  skills: z.boolean().default(true),
  leadership: z.boolean().default(true),
  certifications: z.boolean().default(false),
  volunteering: z.boolean().default(false),
});

export type SectionToggles = z.infer<typeof sectionTogglesSchema>;

export const generateResumeSchema = z.object({
  masterResumeText: z.string().trim().min(1, 'Master resume text is required'),
  jobPostingText: z.string().trim().min(1, 'Job posting text is required'),
  jobTitle: z.string().trim().optional(),
  companyName: z.string().trim().optional(),
  targetLength: z.number().int().min(1).max(3).default(1),
  sectionToggles: sectionTogglesSchema.default({}),
  priorityExperiences: z.array(z.string()).default([]),
  prioritySkills: z.array(z.string()).default([]),
  latexStrategy: z.enum(['structured', 'ai']).default('structured'),
  userId: z.string().optional(),
  sessionId: z.string().optional(),
});

export type GenerateResumeInput = z.input<typeof generateResumeSchema>;
export type GenerateResumeRequest = z.infer<typeof generateResumeSchema>;

// ============================================================================
// Export input
// ============================================================================

export const EXPORT_FORMATS = ['LATEX', 'PDF', 'PNG', 'JPG'] as const;
export type ExportFormat = (typeof EXPORT_FORMATS)[number];

export const PAPER_SIZES = ['A4', 'LETTER', 'LEGAL'] as const;
export type PaperSize = (typeof PAPER_SIZES)[number];

export const ORIENTATIONS = ['portrait', 'landscape'] as const;
export type Orientation = (typeof ORIENTATIONS)[number];

const upperCased = z.string().transform((value) => value.trim().toUpperCase());

export const exportRequestSchema = z
  .object({
    resumeId: z.string().min(1).optional(),
    customLatexCode: z.string().min(1).optional(),
    format: upperCased.pipe(z.enum(EXPORT_FORMATS)),
    paperSize: upperCased.pipe(z.enum(PAPER_SIZES)).default('A4'),
    orientation: z.enum(ORIENTATIONS).default('portrait'),
    dpi: z.number().int().min(72).max(600).default(300),
    backgroundColor: z.string().min(1).default('white'),
    highQuality: z.boolean().default(true),
  })
  .refine((value) => value.resumeId || value.customLatexCode, {
    message: 'Either resumeId or customLatexCode is required',
    path: ['resumeId'],
  });

export type ExportRequestInput = z.input<typeof exportRequestSchema>;
export type ExportRequest = z.infer<typeof exportRequestSchema>;
