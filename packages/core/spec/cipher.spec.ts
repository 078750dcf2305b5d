import { describe, expect, it } from 'vitest';

import { TokenCipher, assertSecretKeys } from '#cipher';

const KEY_A = { id: 'a', secret: 'test-secret-a-0123456789abcdefghij' };
const KEY_B = { id: 'b', secret: 'test-secret-b-0123456789abcdefghij' };

describe('fn:assertSecretKeys', () => {
  it('should require at least one key', () => {
    expect(() => assertSecretKeys([], 'signing')).toThrow(
      'at least one signing key is required',
    );
  });

  it('should reject duplicate ids', () => {
    expect(() => assertSecretKeys([KEY_A, KEY_A], 'signing')).toThrow(
      'duplicate signing key id: a',
    );
  });

  it('should reject short secrets', () => {
    expect(() =>
      assertSecretKeys([{ id: 'short', secret: 'test-secret' }], 'encryption'),
    ).toThrow('encryption key short must be at least 32 characters');
  });

  it('should reject empty ids', () => {
    expect(() =>
      assertSecretKeys([{ id: '', secret: KEY_A.secret }], 'signing'),
    ).toThrow('signing key id must not be empty');
  });
});

describe('cl:TokenCipher', () => {
  it('should decrypt what it encrypted', async () => {
    const cipher = new TokenCipher([KEY_A]);

    const encrypted = await cipher.encrypt('upstream-refresh-1');

    expect(encrypted).not.toContain('upstream-refresh-1');
    expect(await cipher.decrypt(encrypted)).toBe('upstream-refresh-1');
  });

  it('should produce a different ciphertext on every call', async () => {
    const cipher = new TokenCipher([KEY_A]);

    expect(await cipher.encrypt('value')).not.toBe(await cipher.encrypt('value'));
  });

  it('should keep values written with a rotated-out key readable', async () => {
    const before = new TokenCipher([KEY_A]);
    const after = new TokenCipher([KEY_B, KEY_A]);

    const encrypted = await before.encrypt('value');

    expect(await after.decrypt(encrypted)).toBe('value');
  });

  it('should refuse values written with an unknown key', async () => {
    const encrypted = await new TokenCipher([KEY_A]).encrypt('value');

    await expect(new TokenCipher([KEY_B]).decrypt(encrypted)).rejects.toThrow(
      'unknown encryption key id: a',
    );
  });

  it('should refuse tampered values', async () => {
    const cipher = new TokenCipher([KEY_A]);
    const [header, key, iv, ciphertext, tag] = (
      await cipher.encrypt('value')
    ).split('.');
    const flipped = ciphertext.startsWith('A')
      ? `B${ciphertext.slice(1)}`
      : `A${ciphertext.slice(1)}`;

    await expect(
      cipher.decrypt([header, key, iv, flipped, tag].join('.')),
    ).rejects.toThrow();
  });
});
