import type { AuthorizationOutcome } from '../../types/domain';
import { describeError } from '../errors';
import type { Logger } from '../logger';

export type VaultAuthorizer = (credential: string, vaultId: string, log: Logger) => Promise<AuthorizationOutcome>;

export interface VaultAuthorizerOptions {
  managementUrl: string;
  timeoutMs: number;
}

export const isAuthorized = (outcome: AuthorizationOutcome): boolean =>
  outcome.kind === 'response' && outcome.statusCode === 200;

export const createVaultAuthorizer =
  ({ managementUrl, timeoutMs }: VaultAuthorizerOptions): VaultAuthorizer =>
  async (credential, vaultId, log) => {
    const url = `${managementUrl}/v1/vaults/${encodeURIComponent(vaultId)}`;
    log.info('Requesting vault authorization', { vaultId });

    try {
      const response = await fetch(url, {
        method: 'GET',
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: credential
        },
        signal: AbortSignal.timeout(timeoutMs)
      });
      const body = await response.text();
      const requestId = response.headers.get('x-request-id');

      if (response.status !== 200) {
        log.warn('Vault authorization rejected', { statusCode: response.status, authRequestId: requestId, body });
      }

      return { kind: 'response', statusCode: response.status, requestId, body };
    } catch (err) {
      const error = describeError(err);
      log.error('Vault authorization request failed', { error });
      return { kind: 'transport_error', statusCode: 500, error };
    }
  };
