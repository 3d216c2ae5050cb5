export { createPipeline } from './pipeline';
export type { Pipeline, PipelineHealth, PipelineOverrides } from './pipeline';
export { loadServerEnv, checkGroqApiKey } from './data/env/server';
export type { ServerEnv } from './data/env/server';
export * from './lib/errors';
export type { LogEntry, LogLevel } from './lib/log-buffer';
export type {
  ExportFormat,
  ExportRequestInput,
  GenerateResumeInput,
  Orientation,
  PaperSize,
  ResumeContent,
  SectionToggles,
} from './lib/validations/resume';
export { ExportService } from './services/export';
export type { ExportArtifact, FormatDescriptor } from './services/export';
export { JobAnalyzer } from './services/job-analyzer';
export type { JobAnalysis } from './services/job-analyzer';
export { LatexCompilerClient } from './services/latex-compiler';
export { LlmGateway } from './services/llm-gateway';
export { ResumeTailor } from './services/resume-tailor';
export type { TailoringResult } from './services/resume-tailor';
export { ResumeService } from './services/resumes';
export type { GeneratedResume, StoredResume } from './services/resumes';
