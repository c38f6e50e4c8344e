import { JOB_STATUSES, type JobDecision, type JobOperation, type JobStatus } from '../types/domain';

const COMPLETED: readonly string[] = ['SUCCESS', 'FAILURE'];
const CANCELLED: readonly string[] = ['CANCELLING', 'CANCELLED'];

export const isKnownJobStatus = (status: string): status is JobStatus =>
  (JOB_STATUSES as readonly string[]).includes(status);

// Statuses outside JOB_STATUSES are treated as still running, so DELETE is allowed.
export const decideJobAction = (status: string, operation: JobOperation): JobDecision => {
  if (operation === 'GET') return { outcome: 'allow', effect: 'none' };
  if (COMPLETED.includes(status)) return { outcome: 'deny', reason: 'already completed' };
  if (CANCELLED.includes(status)) return { outcome: 'deny', reason: 'already cancelled' };
  return { outcome: 'allow', effect: 'cancel' };
};
