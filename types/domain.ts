export const JOB_STATUSES = ['PENDING', 'RUNNING', 'SUCCESS', 'FAILURE', 'CANCELLING', 'CANCELLED'] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type JobOperation = 'GET' | 'DELETE';

export interface JobRecord {
  id: string;
  runId: string;
  // Kept as a raw string: the backend may report states outside JOB_STATUSES.
  status: string;
  requestId: string;
  query: string;
  destination: string;
}

export type JobDecision =
  | { outcome: 'allow'; effect: 'none' | 'cancel' }
  | { outcome: 'deny'; reason: 'already completed' | 'already cancelled' };

export type AuthorizationOutcome =
  | { kind: 'response'; statusCode: number; requestId: string | null; body: string }
  | { kind: 'transport_error'; statusCode: 500; error: string };

export interface JobRequest {
  method: string;
  jobId: string;
  vaultId: string;
  authorization: string;
  forwardedFor: string;
}

export interface JobStatusBody {
  id: string;
  jobId: string;
  jobStatus: string;
  requestId: string;
}

export interface JobCancelledBody {
  id: string;
  jobId: string;
  requestId: string;
  message: 'Successfully deleted';
}

export type FailureBody = { id: string; message: string } | { message: string };

export interface JobResponse {
  statusCode: number;
  // null is the empty pass-through body for methods other than GET and DELETE.
  body: JobStatusBody | JobCancelledBody | FailureBody | null;
}
