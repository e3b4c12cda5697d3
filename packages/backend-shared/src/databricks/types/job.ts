import { z } from "zod";

export const jobRunAsSchema = z.object({
  user_name: z.string().optional(),
  service_principal_name: z.string().optional(),
});

export type JobRunAs = z.infer<typeof jobRunAsSchema>;

export const jobTaskSchema = z.object({
  task_key: z.string().optional(),
  existing_cluster_id: z.string().optional(),
  job_cluster_key: z.string().optional(),
  new_cluster: z.record(z.unknown()).optional(),
  max_retries: z.number().int().optional(),
  retry_on_timeout: z.boolean().optional(),
  timeout_seconds: z.number().int().optional(),
});

export type JobTask = z.infer<typeof jobTaskSchema>;

export const jobSettingsSchema = z.object({
  name: z.string().optional(),
  run_as: jobRunAsSchema.optional(),
  tags: z.record(z.string()).optional(),
  tasks: z.array(jobTaskSchema).optional(),
  timeout_seconds: z.number().int().optional(),
  max_retries: z.number().int().optional(),
  retry_on_timeout: z.boolean().optional(),
});

export type JobSettings = z.infer<typeof jobSettingsSchema>;

export const jobSchema = z.object({
  job_id: z.number().int(),
  creator_user_name: z.string().optional(),
  run_as_user_name: z.string().optional(),
  created_time: z.number().optional(),
  settings: jobSettingsSchema.default({}),
});

export type Job = z.infer<typeof jobSchema>;

export const listJobsResponseSchema = z.object({
  jobs: z.array(jobSchema).default([]),
  has_more: z.boolean().optional(),
  next_page_token: z.string().optional(),
});

export type ListJobsResponse = z.infer<typeof listJobsResponseSchema>;
