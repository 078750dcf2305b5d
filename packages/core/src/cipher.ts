import { createHash } from 'node:crypto';

import { CompactEncrypt, compactDecrypt, decodeProtectedHeader } from 'jose';

import { MINIMUM_SECRET_LENGTH } from '#constants';

/** an operator-supplied symmetric key */
export interface SecretKey {
  /** key id, written into token headers so rotation keeps old material readable */
  id: string;
  /** secret of at least 32 characters */
  secret: string;
}

const ALGORITHM = 'dir';
const ENCRYPTION = 'A256GCM';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/**
 * derives a 256-bit content key from an operator secret
 * @param secret operator secret
 * @returns raw key bytes
 */
function deriveKey(secret: string): Uint8Array {
  return new Uint8Array(createHash('sha256').update(secret).digest());
}

/**
 * checks a key list is usable
 * @param keys configured keys
 * @param purpose label for error messages
 * @throws {Error} when the list is empty, has duplicate ids, or a short secret
 */
export function assertSecretKeys(
  keys: readonly SecretKey[],
  purpose: string,
): void {
  if (keys.length === 0) {
    throw new Error(`at least one ${purpose} key is required`);
  }

  const seen = new Set<string>();
  for (const key of keys) {
    if (!key.id) {
      throw new Error(`${purpose} key id must not be empty`);
    }
    if (seen.has(key.id)) {
      throw new Error(`duplicate ${purpose} key id: ${key.id}`);
    }
    if (key.secret.length < MINIMUM_SECRET_LENGTH) {
      throw new Error(
        `${purpose} key ${key.id} must be at least ${MINIMUM_SECRET_LENGTH} characters`,
      );
    }
    seen.add(key.id);
  }
}

/**
 * symmetric encryption of secrets at rest (JWE compact, dir + A256GCM)
 * the first key encrypts, any key decrypts by its id
 */
export class TokenCipher {
  readonly #activeKeyId: string;
  readonly #keys: Map<string, Uint8Array>;

  /**
   * creates a cipher over a rotatable key list
   * @param keys encryption keys, the first one active
   */
  constructor(keys: readonly SecretKey[]) {
    assertSecretKeys(keys, 'encryption');

    this.#activeKeyId = keys[0].id;
    this.#keys = new Map(keys.map((key) => [key.id, deriveKey(key.secret)]));
  }

  /**
   * encrypts a plaintext value with the active key
   * @param plaintext value to protect
   * @returns compact JWE
   */
  public async encrypt(plaintext: string): Promise<string> {
    const key = this.#requireKey(this.#activeKeyId);

    return new CompactEncrypt(encoder.encode(plaintext))
      .setProtectedHeader({
        alg: ALGORITHM,
        enc: ENCRYPTION,
        kid: this.#activeKeyId,
      })
      .encrypt(key);
  }

  /**
   * decrypts a value written by any configured key
   * @param ciphertext compact JWE
   * @returns original plaintext
   * @throws {Error} when the key id is unknown or the ciphertext was tampered with
   */
  public async decrypt(ciphertext: string): Promise<string> {
    const { kid } = decodeProtectedHeader(ciphertext);
    if (!kid) {
      throw new Error('encrypted value carries no key id');
    }

    const { plaintext } = await compactDecrypt(
      ciphertext,
      this.#requireKey(kid),
      { keyManagementAlgorithms: [ALGORITHM], contentEncryptionAlgorithms: [ENCRYPTION] },
    );

    return decoder.decode(plaintext);
  }

  #requireKey(id: string): Uint8Array {
    const key = this.#keys.get(id);
    if (!key) {
      throw new Error(`unknown encryption key id: ${id}`);
    }

    return key;
  }
}
