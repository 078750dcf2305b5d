import { DEFAULT_SWEEP_INTERVAL_MS, MS_PER_SECOND } from '#constants';
import { KeyValueStore } from '#store/types';

import type { SetOptions } from '#store/types';

/** configuration options for in-memory storage */
export interface MemoryKeyValueStoreOptions {
  /** how often expired entries are purged, 0 disables the sweep */
  sweepIntervalMs?: number;
}

interface MemoryEntry {
  value: string;
  /** epoch milliseconds, undefined for entries that never expire */
  expiresAt?: number;
}

/**
 * in-memory key-value storage
 * expiry is enforced on every read and by a periodic sweep that never keeps the process alive
 */
export class MemoryKeyValueStore extends KeyValueStore {
  readonly #entries = new Map<string, MemoryEntry>();
  #sweeper?: NodeJS.Timeout;

  /**
   * creates new memory storage
   * @param options storage configuration options
   */
  constructor(options?: MemoryKeyValueStoreOptions) {
    super();

    const interval = options?.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (interval > 0) {
      this.#sweeper = setInterval(() => this.sweep(), interval);
      this.#sweeper.unref();
    }
  }

  /** number of live entries */
  public get size(): number {
    this.sweep();

    return this.#entries.size;
  }

  /**
   * removes every expired entry
   * @returns number of entries removed
   */
  public sweep(): number {
    const now = Date.now();
    let removed = 0;
    for (const [key, entry] of this.#entries) {
      if (isExpired(entry, now)) {
        this.#entries.delete(key);
        removed++;
      }
    }

    return removed;
  }

  public async get(key: string): Promise<string | null> {
    return this.#read(key)?.value ?? null;
  }

  public async set(
    key: string,
    value: string,
    options?: SetOptions,
  ): Promise<void> {
    this.#entries.set(key, createEntry(value, options));
  }

  public async take(key: string): Promise<string | null> {
    const entry = this.#read(key);
    this.#entries.delete(key);

    return entry?.value ?? null;
  }

  public async replace(
    key: string,
    expected: string,
    next: string,
    options?: SetOptions,
  ): Promise<boolean> {
    const entry = this.#read(key);
    if (entry?.value !== expected) {
      return false;
    }

    this.#entries.set(key, createEntry(next, options));

    return true;
  }

  public async delete(key: string): Promise<boolean> {
    const entry = this.#read(key);
    this.#entries.delete(key);

    return entry !== undefined;
  }

  public async deleteIf(key: string, expected: string): Promise<boolean> {
    if (this.#read(key)?.value !== expected) {
      return false;
    }

    this.#entries.delete(key);

    return true;
  }

  public async close(): Promise<void> {
    clearInterval(this.#sweeper);
    this.#sweeper = undefined;
  }

  /**
   * reads an entry, dropping it when expired
   * @param key record key
   * @returns live entry or undefined
   */
  #read(key: string): MemoryEntry | undefined {
    const entry = this.#entries.get(key);
    if (entry && isExpired(entry, Date.now())) {
      this.#entries.delete(key);

      return undefined;
    }

    return entry;
  }
}

/**
 * builds an entry with an absolute expiry
 * @param value serialised value
 * @param options write options
 * @returns entry
 */
function createEntry(value: string, options?: SetOptions): MemoryEntry {
  return options?.ttlSeconds === undefined
    ? { value }
    : { value, expiresAt: Date.now() + options.ttlSeconds * MS_PER_SECOND };
}

/**
 * checks whether an entry has passed its expiry
 * @param entry stored entry
 * @param now current epoch milliseconds
 * @returns true when expired
 */
function isExpired(entry: MemoryEntry, now: number): boolean {
  return entry.expiresAt !== undefined && entry.expiresAt <= now;
}
