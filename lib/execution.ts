import { CancelJobRunCommand, EMRServerlessClient } from '@aws-sdk/client-emr-serverless';
import { describeError, JobExecutionError } from './errors';

export interface JobExecutionClient {
  cancel(runId: string): Promise<void>;
}

// The slice of EMRServerlessClient this module calls.
export interface CancelJobRunSender {
  send(command: CancelJobRunCommand, options?: { abortSignal?: AbortSignal }): Promise<unknown>;
}

export interface EmrExecutionOptions {
  applicationId: string;
  timeoutMs: number;
}

export const createEmrClient = (region: string) => new EMRServerlessClient({ region });

export const createEmrExecutionClient = (
  client: CancelJobRunSender,
  { applicationId, timeoutMs }: EmrExecutionOptions
): JobExecutionClient => ({
  cancel: async (runId) => {
    const command = new CancelJobRunCommand({ applicationId, jobRunId: runId });
    try {
      await client.send(command, { abortSignal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      throw new JobExecutionError(describeError(err));
    }
  }
});
