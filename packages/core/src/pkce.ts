/**
 * @module pkce
 * @description PKCE (RFC 7636) helpers for both sides of the proxy: the pair the proxy
 * generates for the upstream provider and the verification of a client's verifier.
 */

import { createHash, timingSafeEqual } from 'node:crypto';

import { generateOpaqueId } from '#id';

import type { CodeChallengeMethod } from '#types';

/** verifier charset and length per RFC 7636 Section 4.1 */
const CODE_VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

/** a PKCE verifier with its derived challenge */
export interface PkcePair {
  verifier: string;
  challenge: string;
  method: CodeChallengeMethod;
}

/**
 * derives the S256 challenge of a verifier
 * @param verifier code verifier
 * @returns BASE64URL(SHA256(verifier))
 */
export function computeS256Challenge(verifier: string): string {
  return createHash('sha256').update(verifier).digest('base64url');
}

/**
 * generates a fresh PKCE pair
 * @returns 43-character verifier with its S256 challenge
 */
export function generatePkcePair(): PkcePair {
  const verifier = generateOpaqueId();

  return { verifier, challenge: computeS256Challenge(verifier), method: 'S256' };
}

/**
 * checks a verifier against RFC 7636 syntax
 * @param verifier candidate verifier
 * @returns true when the verifier is well formed
 */
export function isValidCodeVerifier(verifier: string): boolean {
  return CODE_VERIFIER_PATTERN.test(verifier);
}

/**
 * verifies a code verifier against a stored challenge
 * @param verifier client-provided code verifier
 * @param challenge stored code challenge
 * @param method challenge method
 * @returns true if verification passes
 */
export function verifyPkce(
  verifier: string,
  challenge: string,
  method: CodeChallengeMethod,
): boolean {
  if (method !== 'S256' || !isValidCodeVerifier(verifier)) {
    return false;
  }

  const expected = Buffer.from(challenge);
  const actual = Buffer.from(computeS256Challenge(verifier));

  return expected.length === actual.length && timingSafeEqual(expected, actual);
}
