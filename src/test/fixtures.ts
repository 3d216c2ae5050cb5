/**
 * Shared test data for the tailoring pipeline
 */

import { emptyResumeContent, type ResumeContent } from '@/lib/validations/resume';
import type { JobAnalysis } from '@/services/job-analyzer';

export const MASTER_RESUME_TEXT = `Jordan Rivera
jordan.rivera@example.com | (555) 010-0000 | linkedin.com/in/jordan-rivera | github.com/jrivera | Springfield, IL

EDUCATION
State University | Springfield, IL
B.S. Computer Science | 2014 - 2018
- Dean's List

EXPERIENCE
Backend Engineer | Nimbus Systems | Remote | 2021 - Present
- Built gRPC services in Go handling 2M requests per day
- Migrated deployments to Kubernetes, reducing hosting costs by 30%
- Mentored 4 engineers on code review practices
Software Developer | Harbor Analytics | Chicago, IL | 2018 - 2021
- Maintained Python ETL pipelines for weekly reporting
- Improved query latency by 40% with PostgreSQL indexing

PROJECTS
Queue Visualizer | TypeScript, React | 2022
- Real-time dashboard for message queue depth

SKILLS
Languages: Python, Go, TypeScript
Frameworks: React, Express
Developer Tools: Docker, Kubernetes, Git
Databases: PostgreSQL, Redis
`;

/** Same resume shape, none of the cloud-native keywords */
export const PLAIN_RESUME_TEXT = `Jordan Rivera
jordan.rivera@example.com

EXPERIENCE
Software Developer | Harbor Analytics | Chicago, IL | 2018 - 2021
- Maintained Python ETL pipelines for weekly reporting
- Improved query latency by 40% with PostgreSQL indexing

SKILLS
Languages: Python
Databases: PostgreSQL
`;

export const JOB_POSTING_TEXT = `Senior Backend Engineer at Orbit Cloud

We are hiring a senior engineer to build distributed services.

Requirements:
- 5+ years of backend development
- Strong Go and gRPC experience
- Production Kubernetes experience

Nice to have: Terraform.

Full-time, remote.`;

export function sampleResumeContent(): ResumeContent {
  return {
    ...emptyResumeContent(),
    header: {
      name: 'Jordan Rivera',
      phone: '(555) 010-0000',
      email: 'jordan.rivera@example.com',
      location: 'Springfield, IL',
      linkedin: 'linkedin.com/in/jordan-rivera',
      linkedinUrl: '',
      github: '',
      githubUrl: '',
    },
    education: [
      {
        school: 'State University',
        location: 'Springfield, IL',
        degree: 'B.S. Computer Science',
        dates: '2014 - 2018',
        highlights: [],
      },
    ],
    experience: [
      {
        title: 'Backend Engineer',
        company: 'Nimbus Systems',
        location: 'Remote',
        dates: '2021 - Present',
        bullets: ['Built gRPC services in Go', 'Cut costs by 30% & improved uptime'],
      },
    ],
    projects: [
      {
        name: 'Queue Visualizer',
        techStack: 'TypeScript, React',
        dates: '2022',
        bullets: ['Real-time dashboard for queue depth'],
      },
    ],
    skills: {
      languages: ['Go', 'C#'],
      frameworks: [],
      developerTools: ['Kubernetes'],
      libraries: [],
      databases: [],
      other: [],
    },
  };
}

export function sampleAnalysis(overrides: Partial<JobAnalysis> = {}): JobAnalysis {
  return {
    jobTitle: 'Senior Backend Engineer',
    companyName: 'Orbit Cloud',
    experienceLevel: 'SENIOR',
    requiredSkills: ['Go', 'gRPC', 'Kubernetes'],
    preferredSkills: ['Terraform'],
    primaryKeywords: ['Kubernetes', 'Go', 'gRPC'],
    secondaryKeywords: ['distributed', 'services'],
    actionVerbs: ['build'],
    responsibilities: [],
    companyCulture: [],
    optimizationTips: [],
    jobType: 'FULL_TIME',
    remoteType: 'REMOTE',
    skillPriority: { Go: 0.9, gRPC: 0.85, Kubernetes: 0.8, Terraform: 0.5 },
    matchPotential: 0.51,
    source: 'parsed',
    ...overrides,
  };
}
