import { describe, expect, it } from 'vitest';

import {
  computeS256Challenge,
  generatePkcePair,
  isValidCodeVerifier,
  verifyPkce,
} from '#pkce';

// RFC 7636 Appendix B
const RFC_VERIFIER = 'dBjftJeZ4CVP-mJ92K9ETPebLfGcf_e8OH1XsyjyROQ';
const RFC_CHALLENGE = 'E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM';

describe('fn:computeS256Challenge', () => {
  it('should derive the challenge from the RFC 7636 test vector', () => {
    expect(computeS256Challenge(RFC_VERIFIER)).toBe(RFC_CHALLENGE);
  });
});

describe('fn:generatePkcePair', () => {
  it('should generate a valid verifier with a matching challenge', () => {
    const pair = generatePkcePair();

    expect(pair.method).toBe('S256');
    expect(pair.verifier).toHaveLength(43);
    expect(isValidCodeVerifier(pair.verifier)).toBe(true);
    expect(pair.challenge).toBe(computeS256Challenge(pair.verifier));
  });

  it('should generate a different verifier each time', () => {
    expect(generatePkcePair().verifier).not.toBe(generatePkcePair().verifier);
  });
});

describe('fn:isValidCodeVerifier', () => {
  it('should accept the unreserved character set', () => {
    expect(isValidCodeVerifier(`${'a'.repeat(40)}-._~`)).toBe(true);
  });

  it('should reject verifiers shorter than 43 characters', () => {
    expect(isValidCodeVerifier('a'.repeat(42))).toBe(false);
  });

  it('should reject verifiers longer than 128 characters', () => {
    expect(isValidCodeVerifier('a'.repeat(129))).toBe(false);
  });

  it('should reject reserved characters', () => {
    expect(isValidCodeVerifier(`${'a'.repeat(43)}+`)).toBe(false);
  });
});

describe('fn:verifyPkce', () => {
  it('should accept the matching verifier', () => {
    expect(verifyPkce(RFC_VERIFIER, RFC_CHALLENGE, 'S256')).toBe(true);
  });

  it('should reject a different verifier', () => {
    expect(verifyPkce('a'.repeat(43), RFC_CHALLENGE, 'S256')).toBe(false);
  });

  it('should reject a malformed verifier even when it hashes to the challenge', () => {
    const verifier = 'short';

    expect(verifyPkce(verifier, computeS256Challenge(verifier), 'S256')).toBe(
      false,
    );
  });

  it('should reject a challenge of a different length', () => {
    expect(verifyPkce(RFC_VERIFIER, 'abc', 'S256')).toBe(false);
  });
});
