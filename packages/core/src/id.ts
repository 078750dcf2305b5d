import { randomBytes } from 'node:crypto';

import { CLIENT_ID_PREFIX } from '#constants';

// byte lengths for random identifiers
const OPAQUE_ID_BYTES = 32;
const CLIENT_ID_BYTES = 16;

/**
 * generates an unguessable url-safe identifier
 * used for transaction ids, authorization codes, reference ids and jtis
 * @param bytes amount of entropy in bytes
 * @returns base64url encoded random string
 */
export function generateOpaqueId(bytes: number = OPAQUE_ID_BYTES): string {
  return randomBytes(bytes).toString('base64url');
}

/**
 * generates a proxy client identifier
 * @returns unique client identifier with the 'dcr_' prefix
 */
export function generateClientId(): string {
  return CLIENT_ID_PREFIX + randomBytes(CLIENT_ID_BYTES).toString('hex');
}
