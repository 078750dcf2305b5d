/**
 * @module upstream-tokens
 * @description Durable store of upstream token material keyed by reference id.
 * Token strings are encrypted before they leave process memory; updates are conditional on a
 * monotonically increasing version so concurrent refreshes cannot overwrite each other.
 */

import { DEFAULT_REFRESH_TOKEN_TTL_SECONDS } from '#constants';
import {
  isJsonObject,
  isOptionalString,
  isRecord,
  isStringArray,
  parseJson,
} from '#validation';

import type { TokenCipher } from '#cipher';
import type { KeyValueStore } from '#store/types';
import type { UpstreamTokenRecord } from '#types';

const RECORD_PREFIX = 'grant:';
const REFRESH_PREFIX = 'refresh:';

/** configuration options for the upstream token store */
export interface UpstreamTokenStoreOptions {
  /** persistent backend */
  store: KeyValueStore;
  /** protects upstream tokens at rest */
  cipher: TokenCipher;
  /** how long a grant and its refresh mapping survive without use */
  ttlSeconds?: number;
}

/** fields a caller supplies when writing a record */
export type UpstreamTokenInput = Omit<
  UpstreamTokenRecord,
  'referenceId' | 'version' | 'updatedAt'
>;

/**
 * tells whether some worker currently holds the refresh lease of a record
 * @param record upstream grant
 * @returns true while the lease has not run out
 */
export function isRefreshLeased(record: UpstreamTokenRecord): boolean {
  return (
    record.refreshingUntil !== undefined && record.refreshingUntil > Date.now()
  );
}

/**
 * narrows a stored record to its encrypted form
 * @param value parsed record
 * @returns true for a well-formed record
 */
function isStoredRecord(value: unknown): value is UpstreamTokenRecord {
  return (
    isRecord(value) &&
    typeof value.referenceId === 'string' &&
    typeof value.clientId === 'string' &&
    typeof value.accessToken === 'string' &&
    isOptionalString(value.refreshToken) &&
    (value.expiresAt === null || typeof value.expiresAt === 'number') &&
    isStringArray(value.scopes) &&
    isOptionalString(value.upstreamSubject) &&
    isJsonObject(value.claims) &&
    typeof value.refreshJti === 'string' &&
    typeof value.version === 'number' &&
    typeof value.updatedAt === 'number' &&
    (value.refreshingUntil === undefined ||
      typeof value.refreshingUntil === 'number')
  );
}

/** encrypted upstream grants plus the refresh-token mappings that point at them */
export class UpstreamTokenStore {
  readonly #store: KeyValueStore;
  readonly #cipher: TokenCipher;
  readonly #ttlSeconds: number;

  constructor(options: UpstreamTokenStoreOptions) {
    this.#store = options.store;
    this.#cipher = options.cipher;
    this.#ttlSeconds = options.ttlSeconds ?? DEFAULT_REFRESH_TOKEN_TTL_SECONDS;
  }

  /**
   * stores a new record
   * @param referenceId key of the record
   * @param input token material and metadata
   * @returns the stored record at version 1
   */
  public async put(
    referenceId: string,
    input: UpstreamTokenInput,
  ): Promise<UpstreamTokenRecord> {
    const record: UpstreamTokenRecord = {
      ...input,
      referenceId,
      version: 1,
      updatedAt: Date.now(),
    };

    await this.#store.set(RECORD_PREFIX + referenceId, await this.#seal(record), {
      ttlSeconds: this.#ttlSeconds,
    });

    return record;
  }

  /**
   * reads a record
   * @param referenceId key of the record
   * @returns decrypted record, or null when missing
   */
  public async get(referenceId: string): Promise<UpstreamTokenRecord | null> {
    const raw = await this.#store.get(RECORD_PREFIX + referenceId);

    return raw === null ? null : this.#open(raw);
  }

  /**
   * replaces a record if nobody else changed it first
   * @param referenceId key of the record
   * @param expectedVersion version the caller read
   * @param input new token material and metadata, without a refresh lease unless it names one
   * @returns the stored record at the next version, or null when the version moved on or the record is gone
   */
  public async update(
    referenceId: string,
    expectedVersion: number,
    input: UpstreamTokenInput,
  ): Promise<UpstreamTokenRecord | null> {
    return this.#swap(referenceId, expectedVersion, () => input);
  }

  /**
   * takes the refresh lease of a record, so other workers wait for this one instead of calling upstream
   * @param referenceId key of the record
   * @param expectedVersion version the caller read
   * @param leaseMs how long the lease holds
   * @returns the leased record at the next version, or null when the version moved on, the record is gone or another lease is live
   */
  public async claimRefresh(
    referenceId: string,
    expectedVersion: number,
    leaseMs: number,
  ): Promise<UpstreamTokenRecord | null> {
    return this.#swap(referenceId, expectedVersion, (current) =>
      isRefreshLeased(current)
        ? null
        : { ...current, refreshingUntil: Date.now() + leaseMs },
    );
  }

  /**
   * gives up a refresh lease and leaves the token material as it was
   * @param referenceId key of the record
   * @param leasedVersion version returned by claimRefresh
   * @returns the released record, or null when the version moved on or the record is gone
   */
  public async releaseRefresh(
    referenceId: string,
    leasedVersion: number,
  ): Promise<UpstreamTokenRecord | null> {
    return this.#swap(referenceId, leasedVersion, (current) => ({
      ...current,
      refreshingUntil: undefined,
    }));
  }

  /**
   * removes a record and its refresh mapping
   * @param referenceId key of the record
   * @returns true when a record was removed
   */
  public async delete(referenceId: string): Promise<boolean> {
    const current = await this.get(referenceId);
    if (current) {
      await this.unlinkRefreshToken(current.refreshJti);
    }

    return this.#store.delete(RECORD_PREFIX + referenceId);
  }

  /**
   * removes a record and its refresh mapping unless it changed since the caller read it
   * @param referenceId key of the record
   * @param expectedVersion version the caller read
   * @returns true when the record was removed
   */
  public async deleteIfVersion(
    referenceId: string,
    expectedVersion: number,
  ): Promise<boolean> {
    const key = RECORD_PREFIX + referenceId;
    const raw = await this.#store.get(key);
    const current = raw === null ? null : await this.#open(raw);
    if (raw === null || current?.version !== expectedVersion) {
      return false;
    }

    const removed = await this.#store.deleteIf(key, raw);
    if (removed) {
      await this.unlinkRefreshToken(current.refreshJti);
    }

    return removed;
  }

  /**
   * maps a proxy refresh token id to its record
   * @param jti refresh token id
   * @param referenceId key of the record
   */
  public async linkRefreshToken(jti: string, referenceId: string): Promise<void> {
    await this.#store.set(REFRESH_PREFIX + jti, referenceId, {
      ttlSeconds: this.#ttlSeconds,
    });
  }

  /**
   * follows a refresh token id to its record
   * @param jti refresh token id
   * @returns reference id, or null when the mapping is gone
   */
  public async resolveRefreshToken(jti: string): Promise<string | null> {
    return this.#store.get(REFRESH_PREFIX + jti);
  }

  /**
   * drops a refresh token mapping
   * @param jti refresh token id
   * @returns true when a mapping was removed
   */
  public async unlinkRefreshToken(jti: string): Promise<boolean> {
    return this.#store.delete(REFRESH_PREFIX + jti);
  }

  async #swap(
    referenceId: string,
    expectedVersion: number,
    change: (current: UpstreamTokenRecord) => UpstreamTokenInput | null,
  ): Promise<UpstreamTokenRecord | null> {
    const key = RECORD_PREFIX + referenceId;
    const raw = await this.#store.get(key);
    const current = raw === null ? null : await this.#open(raw);
    if (raw === null || current?.version !== expectedVersion) {
      return null;
    }

    const input = change(current);
    if (!input) {
      return null;
    }

    const next: UpstreamTokenRecord = {
      ...input,
      referenceId,
      version: expectedVersion + 1,
      updatedAt: Date.now(),
    };

    const written = await this.#store.replace(key, raw, await this.#seal(next), {
      ttlSeconds: this.#ttlSeconds,
    });

    return written ? next : null;
  }

  async #seal(record: UpstreamTokenRecord): Promise<string> {
    return JSON.stringify({
      ...record,
      accessToken: await this.#cipher.encrypt(record.accessToken),
      refreshToken:
        record.refreshToken === undefined
          ? undefined
          : await this.#cipher.encrypt(record.refreshToken),
    });
  }

  async #open(raw: string): Promise<UpstreamTokenRecord | null> {
    const stored = parseJson(raw, isStoredRecord);
    if (!stored) {
      return null;
    }

    return {
      ...stored,
      accessToken: await this.#cipher.decrypt(stored.accessToken),
      refreshToken:
        stored.refreshToken === undefined
          ? undefined
          : await this.#cipher.decrypt(stored.refreshToken),
    };
  }
}
