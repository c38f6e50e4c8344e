import jwt from 'jsonwebtoken';
import { MalformedCredentialError } from '../errors';

export const AUTH_SCHEME = 'Bearer';

const splitCredential = (credential: string): [string, string] => {
  const space = credential.indexOf(' ');
  if (space === -1) return [credential, ''];
  return [credential.slice(0, space), credential.slice(space + 1)];
};

export const validateAuthScheme = (credential: string | undefined): boolean => {
  if (!credential) return false;
  const [scheme] = splitCredential(credential);
  return scheme === AUTH_SCHEME;
};

/**
 * Reads one claim out of the bearer token for log correlation.
 *
 * The signature is NOT verified. The value must never feed an authorization
 * decision; trust comes only from the vault authorization round trip.
 */
export const extractTokenClaim = (credential: string, claim: string): string => {
  const [, token] = splitCredential(credential);
  if (!token) {
    throw new MalformedCredentialError('Malformed credential: missing token');
  }

  let payload: ReturnType<typeof jwt.decode>;
  try {
    // jws parses the payload unguarded when the header says `typ: JWT`.
    payload = jwt.decode(token, { json: true });
  } catch {
    payload = null;
  }
  if (!payload || typeof payload !== 'object') {
    throw new MalformedCredentialError('Malformed credential: token could not be decoded');
  }

  const value: unknown = payload[claim];
  if (typeof value !== 'string' || value.length === 0) {
    throw new MalformedCredentialError(`Malformed credential: claim "${claim}" is missing`);
  }
  return value;
};
