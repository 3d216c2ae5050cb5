// Schema barrel export
// All table schemas are exported from here for centralized access

export * from './schema/resumes';
