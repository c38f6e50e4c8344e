export class MalformedCredentialError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MalformedCredentialError';
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`no job record found for id: ${jobId}`);
    this.name = 'JobNotFoundError';
  }
}

export class JobStoreError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobStoreError';
  }
}

export class JobExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'JobExecutionError';
  }
}

const stringField = (value: object, key: string): string | undefined => {
  const field: unknown = Reflect.get(value, key);
  return typeof field === 'string' && field.length > 0 ? field : undefined;
};

/**
 * Best-effort text for a thrown value. PostgREST errors arrive as plain objects
 * with `message`, `details`, `hint` and `code`, so those are folded in as well.
 */
export const describeError = (err: unknown): string => {
  if (typeof err === 'string') return err || 'Unknown error';
  if (typeof err !== 'object' || err === null) return 'Unknown error';

  const message = stringField(err, 'message') ?? (err instanceof Error ? err.name : 'Unknown error');
  const extra = ['details', 'hint', 'code']
    .map((key) => {
      const value = stringField(err, key);
      return value ? `${key}: ${value}` : undefined;
    })
    .filter((item): item is string => item !== undefined);

  return extra.length > 0 ? `${message} (${extra.join(', ')})` : message;
};
