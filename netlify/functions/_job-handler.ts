import type { JobRequest } from '../../types/domain';
import { handleJobRequest, type JobManagementDeps } from '../../lib/job-management';
import { header, json, withErrorHandling, type FunctionEvent, type FunctionHandler } from './_http';

export const toJobRequest = (event: FunctionEvent): JobRequest => ({
  method: event.httpMethod.toUpperCase(),
  jobId: event.queryStringParameters?.jobID ?? '',
  vaultId: event.queryStringParameters?.vaultID ?? '',
  authorization: header(event, 'Authorization'),
  forwardedFor: header(event, 'X-Forwarded-For')
});

export const createJobManagementHandler = (deps: JobManagementDeps): FunctionHandler =>
  withErrorHandling(async (event) => {
    const { statusCode, body } = await handleJobRequest(toJobRequest(event), deps);
    if (body === null) return { statusCode, body: '' };
    return json(statusCode, body);
  }, deps.logger);
