import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { JobRecord } from '../../types/domain';
import { describeError, JobNotFoundError, JobStoreError } from '../errors';

export interface JobRecordStore {
  get(jobId: string): Promise<JobRecord>;
}

export interface JobRecordStoreOptions {
  table: string;
  timeoutMs: number;
}

const JOB_DETAIL_COLUMNS = 'id,jobid,jobstatus,requestid,query,destination';

export const jobDetailRowSchema = z.object({
  id: z.string(),
  jobid: z.string(),
  jobstatus: z.string(),
  requestid: z.string(),
  query: z.string(),
  destination: z.string()
});

export const toJobRecord = (row: z.infer<typeof jobDetailRowSchema>): JobRecord => ({
  id: row.id,
  runId: row.jobid,
  status: row.jobstatus,
  requestId: row.requestid,
  query: row.query,
  destination: row.destination
});

export const createJobRecordStore = (
  client: SupabaseClient,
  { table, timeoutMs }: JobRecordStoreOptions
): JobRecordStore => ({
  get: async (jobId) => {
    // PostgREST usually reports transport failures and aborts through `error`; a rejection is mapped the same way.
    const { data, error } = await client
      .from(table)
      .select(JOB_DETAIL_COLUMNS)
      .eq('id', jobId)
      .abortSignal(AbortSignal.timeout(timeoutMs))
      .maybeSingle()
      .then(
        (result) => result,
        (err: unknown) => {
          throw new JobStoreError(describeError(err));
        }
      );

    if (error) throw new JobStoreError(describeError(error));
    if (!data) throw new JobNotFoundError(jobId);

    const parsed = jobDetailRowSchema.safeParse(data);
    if (!parsed.success) {
      throw new JobStoreError(`invalid job record: ${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')}`);
    }
    return toJobRecord(parsed.data);
  }
});
