import type { JobRecord, JobRequest, JobResponse } from '../types/domain';
import { isAuthorized, type VaultAuthorizer } from './auth/authorization';
import { extractTokenClaim, validateAuthScheme } from './auth/token';
import { validateVaultId } from './auth/vault';
import type { JobRecordStore } from './db/jobs';
import { describeError, JobNotFoundError } from './errors';
import type { JobExecutionClient } from './execution';
import { decideJobAction, isKnownJobStatus } from './job-policy';
import type { Logger } from './logger';

export interface JobManagementDeps {
  validVaultIds: readonly string[];
  tokenClaim: string;
  authorize: VaultAuthorizer;
  store: JobRecordStore;
  executor: JobExecutionClient;
  logger: Logger;
}

const fail = (statusCode: number, id: string, message: string): JobResponse => ({
  statusCode,
  body: { id, message }
});

export const clientIpAddress = (forwardedFor: string): string => forwardedFor.split(',')[0].trim();

/**
 * Runs one GET or DELETE on a job through the fixed pipeline:
 * scheme check, claim extraction, vault allow-list, vault authorization,
 * record lookup, then dispatch by method. The first failing stage answers.
 */
export const handleJobRequest = async (request: JobRequest, deps: JobManagementDeps): Promise<JobResponse> => {
  const { jobId: id, vaultId, authorization } = request;
  if (!id) return { statusCode: 400, body: { message: 'jobID is required' } };

  let log = deps.logger.child({ jobId: id });
  log.info('Initiated', { method: request.method, clientIp: clientIpAddress(request.forwardedFor) });

  if (!validateAuthScheme(authorization)) {
    log.warn('Rejected auth scheme');
    return fail(401, id, 'Auth Scheme not supported');
  }

  try {
    log = log.child({ tokenId: extractTokenClaim(authorization, deps.tokenClaim) });
  } catch (err) {
    const message = describeError(err);
    log.warn('Rejected credential', { error: message });
    return fail(403, id, message);
  }

  if (!validateVaultId(vaultId, deps.validVaultIds)) {
    log.warn('Rejected vault ID', { vaultId });
    return fail(403, id, 'Invalid Vault ID');
  }
  log = log.child({ vaultId });

  const outcome = await deps.authorize(authorization, vaultId, log);
  if (outcome.kind === 'transport_error') return fail(outcome.statusCode, id, outcome.error);
  if (!isAuthorized(outcome)) return fail(outcome.statusCode, id, outcome.body);
  log.info('Successfully authorized', { authRequestId: outcome.requestId });

  let job: JobRecord;
  try {
    job = await deps.store.get(id);
  } catch (err) {
    const message = describeError(err);
    if (err instanceof JobNotFoundError) {
      log.warn('Job record not found');
    } else {
      log.error('Failed to get job details', { error: message, stack: err instanceof Error ? err.stack : undefined });
    }
    return fail(400, id, `Failed to check record for id: ${id} with error: ${message}`);
  }
  log = log.child({ runId: job.runId });

  if (request.method === 'GET') {
    return {
      statusCode: 200,
      body: { id: job.id, jobId: job.runId, jobStatus: job.status, requestId: job.requestId }
    };
  }

  if (request.method === 'DELETE') {
    if (!isKnownJobStatus(job.status)) {
      log.warn('Unrecognized job status, treating as running', { jobStatus: job.status });
    }

    const decision = decideJobAction(job.status, 'DELETE');
    if (decision.outcome === 'deny') {
      log.info('Cancellation denied', { jobStatus: job.status, reason: decision.reason });
      return fail(400, id, `Job for jobId:${job.runId} is ${decision.reason}`);
    }

    log.info('Cancelling job');
    try {
      await deps.executor.cancel(job.runId);
    } catch (err) {
      const message = describeError(err);
      log.error('Failed to cancel job', { error: message });
      return fail(400, id, `Failed to cancel job for jobId: ${job.runId} with error: ${message}`);
    }
    log.info('Successfully cancelled job');

    return {
      statusCode: 200,
      body: { id: job.id, jobId: job.runId, requestId: job.requestId, message: 'Successfully deleted' }
    };
  }

  log.warn('Unsupported method passed through', { method: request.method });
  return { statusCode: 200, body: null };
};
