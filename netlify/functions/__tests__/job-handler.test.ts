import jwt from 'jsonwebtoken';
import { describe, expect, it, vi } from 'vitest';
import type { VaultAuthorizer } from '../../../lib/auth/authorization';
import type { JobRecordStore } from '../../../lib/db/jobs';
import type { JobExecutionClient } from '../../../lib/execution';
import { createLogger } from '../../../lib/logger';
import type { FunctionEvent } from '../_http';
import { createJobManagementHandler, toJobRequest } from '../_job-handler';

const bearer = `Bearer ${jwt.sign({ jti: 'tok-1' }, 'test-secret')}`;

const buildHandler = () => {
  const authorize = vi
    .fn<VaultAuthorizer>()
    .mockResolvedValue({ kind: 'response', statusCode: 200, requestId: 'auth-req-1', body: '{}' });
  const get = vi.fn<JobRecordStore['get']>().mockResolvedValue({
    id: 'j1',
    runId: 'run-1',
    status: 'RUNNING',
    requestId: 'req-9',
    query: 'select 1',
    destination: 's3://results/j1/'
  });
  const cancel = vi.fn<JobExecutionClient['cancel']>().mockResolvedValue(undefined);
  const logger = createLogger({ silent: true });
  const handler = createJobManagementHandler({
    validVaultIds: ['v1'],
    tokenClaim: 'jti',
    authorize,
    store: { get },
    executor: { cancel },
    logger
  });
  return { handler, authorize, cancel, logger };
};

const event = (overrides: Partial<FunctionEvent> = {}): FunctionEvent => ({
  httpMethod: 'GET',
  headers: { authorization: bearer, 'x-forwarded-for': '203.0.113.7' },
  queryStringParameters: { jobID: 'j1', vaultID: 'v1' },
  ...overrides
});

describe('toJobRequest', () => {
  it('reads path parameters and headers regardless of case', () => {
    const request = toJobRequest(
      event({ httpMethod: 'delete', headers: { Authorization: 'Bearer abc', 'X-Forwarded-For': '198.51.100.2' } })
    );

    expect(request).toEqual({
      method: 'DELETE',
      jobId: 'j1',
      vaultId: 'v1',
      authorization: 'Bearer abc',
      forwardedFor: '198.51.100.2'
    });
  });
});

describe('createJobManagementHandler', () => {
  it('serializes the status body', async () => {
    const { handler } = buildHandler();

    const response = await handler(event());

    expect(response).toEqual({
      statusCode: 200,
      headers: { 'content-type': 'application/json' },
      body: '{"id":"j1","jobId":"run-1","jobStatus":"RUNNING","requestId":"req-9"}'
    });
  });

  it('serializes the failure body', async () => {
    const { handler } = buildHandler();

    const response = await handler(event({ headers: { authorization: 'Basic xyz' } }));

    expect(response.statusCode).toBe(401);
    expect(response.body).toBe('{"id":"j1","message":"Auth Scheme not supported"}');
  });

  it('cancels on DELETE', async () => {
    const { handler, cancel } = buildHandler();

    const response = await handler(event({ httpMethod: 'DELETE' }));

    expect(cancel).toHaveBeenCalledWith('run-1');
    expect(response.body).toBe('{"id":"j1","jobId":"run-1","requestId":"req-9","message":"Successfully deleted"}');
  });

  it('answers other methods with an empty body', async () => {
    const { handler } = buildHandler();

    expect(await handler(event({ httpMethod: 'PUT' }))).toEqual({ statusCode: 200, body: '' });
  });

  it('answers 400 without an id when jobID is missing', async () => {
    const { handler } = buildHandler();

    const response = await handler(event({ queryStringParameters: null }));

    expect(response.statusCode).toBe(400);
    expect(response.body).toBe('{"message":"jobID is required"}');
  });

  it('answers 500 on an unexpected exception', async () => {
    const { handler, authorize, logger } = buildHandler();
    authorize.mockRejectedValue(new Error('boom'));
    const consoleError = vi.spyOn(console, 'error');
    const logError = vi.spyOn(logger, 'error');

    const response = await handler(event());

    expect(response.statusCode).toBe(500);
    expect(response.body).toBe('{"message":"boom"}');
    expect(logError).toHaveBeenCalledWith('Function error', { error: 'boom', stack: expect.any(String) });
    expect(consoleError).not.toHaveBeenCalled();
  });
});
