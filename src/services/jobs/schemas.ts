import { z } from 'zod';

export const SUPPORTED_JOB_TYPES = ['implementation', 'fix'] as const;
export type CodeJobType = (typeof SUPPORTED_JOB_TYPES)[number];

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

/**
 * Body of the job launch endpoint. Every field is optional so that a
 * request without a usable job type gets the "not supported" answer
 * rather than a validation error.
 */
export const CodeJobRequestSchema = z.object({
  pat: text,
  org_url: text,
  project_name: text,
  functional_spec: text,
  test_plan: text,
  issue: text,
  report: text,
  code_agent: text,
  job_type: z
    .string()
    .nullish()
    .transform((value) => value ?? 'code_job'),
});

export type CodeJobRequest = z.infer<typeof CodeJobRequestSchema>;

export interface CodeJobPayload {
  pat: string;
  org_url: string;
  project_name: string;
  code_agent: string;
  job_type: CodeJobType;
  functional_spec?: string;
  test_plan?: string;
  issue?: string;
  report?: string;
}

export function isSupportedJobType(jobType: string): jobType is CodeJobType {
  return SUPPORTED_JOB_TYPES.some((supported) => supported === jobType);
}
