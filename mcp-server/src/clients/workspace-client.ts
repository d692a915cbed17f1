import { z } from 'zod';
import type { DatabricksHttpClient } from './databricks-http.js';

const IdSchema = z.union([z.string(), z.number()]).transform(String);

export const JobSettingsSchema = z.object({
  job_id: IdSchema.optional(),
  settings: z
    .object({
      name: z.string().optional(),
      tasks: z
        .array(
          z.object({
            task_key: z.string(),
            notebook_task: z.object({ notebook_path: z.string() }).optional()
          })
        )
        .optional()
    })
    .optional()
});

export const ObjectStatusSchema = z.object({
  object_id: IdSchema.optional(),
  object_type: z.string().optional(),
  path: z.string().optional()
});

export type JobSettings = z.infer<typeof JobSettingsSchema>;
export type ObjectStatus = z.infer<typeof ObjectStatusSchema>;

/**
 * Jobs and workspace lookups used to name the notebooks found in lineage.
 */
export interface WorkspaceApi {
  getJob(jobId: string, signal?: AbortSignal): Promise<JobSettings>;
  getNotebookStatus(path: string, signal?: AbortSignal): Promise<ObjectStatus>;
}

export class DatabricksWorkspaceClient implements WorkspaceApi {
  constructor(private readonly http: DatabricksHttpClient) {}

  getJob(jobId: string, signal?: AbortSignal): Promise<JobSettings> {
    return this.http.get('/api/2.1/jobs/get', JobSettingsSchema, { params: { job_id: jobId }, signal });
  }

  getNotebookStatus(path: string, signal?: AbortSignal): Promise<ObjectStatus> {
    return this.http.get('/api/2.0/workspace/get-status', ObjectStatusSchema, { params: { path }, signal });
  }
}
