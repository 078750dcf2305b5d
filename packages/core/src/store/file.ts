import { createHash } from 'node:crypto';
import { mkdir, readFile, readdir, rename, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { DEFAULT_SWEEP_INTERVAL_MS, MS_PER_SECOND } from '#constants';
import { generateOpaqueId } from '#id';
import { describeError, silentLog } from '#logging';
import { KeyedMutex } from '#mutex';
import { KeyValueStore } from '#store/types';
import { isRecord } from '#validation';

import type { Log } from '#logging';
import type { SetOptions } from '#store/types';

/** configuration options for file-backed storage */
export interface FileKeyValueStoreOptions {
  /** directory holding one file per key, created on first write */
  directory: string;
  /** how often expired files are purged, 0 disables the sweep */
  sweepIntervalMs?: number;
  /** sink for sweep failures */
  log?: Log;
}

/** content of one record file */
interface FileEntry {
  key: string;
  value: string;
  expiresAt?: number;
}

const FILE_EXTENSION = '.json';
const TEMP_EXTENSION = '.tmp';

/**
 * narrows parsed file content to an entry
 * @param content parsed json
 * @returns true when the content is a well-formed entry
 */
function isFileEntry(content: unknown): content is FileEntry {
  return (
    isRecord(content) &&
    typeof content.key === 'string' &&
    typeof content.value === 'string' &&
    (content.expiresAt === undefined || typeof content.expiresAt === 'number')
  );
}

/**
 * checks whether an entry has passed its expiry
 * @param entry stored entry
 * @returns true when expired
 */
function isExpired(entry: FileEntry): boolean {
  return entry.expiresAt !== undefined && entry.expiresAt <= Date.now();
}

/**
 * checks for a missing-file error
 * @param error caught error
 * @returns true for ENOENT
 */
function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * durable key-value storage, one json file per key
 * writes go through a temp file and a rename so readers never see a partial record;
 * atomic operations are serialised per key within this process
 */
export class FileKeyValueStore extends KeyValueStore {
  readonly #directory: string;
  readonly #mutex = new KeyedMutex();
  readonly #log: Log;
  #ready?: Promise<void>;
  #sweeper?: NodeJS.Timeout;

  /**
   * creates file-backed storage
   * @param options storage configuration options
   */
  constructor(options: FileKeyValueStoreOptions) {
    super();

    this.#directory = options.directory;
    this.#log = options.log ?? silentLog;

    const interval = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
    if (interval > 0) {
      this.#sweeper = setInterval(() => {
        this.sweep().catch((error: unknown) => {
          this.#log('warn', 'file store sweep failed', describeError(error));
        });
      }, interval);
      this.#sweeper.unref();
    }
  }

  public async get(key: string): Promise<string | null> {
    return (await this.#read(key))?.value ?? null;
  }

  public async set(
    key: string,
    value: string,
    options?: SetOptions,
  ): Promise<void> {
    await this.#mutex.run(key, async () => this.#write(key, value, options));
  }

  public async take(key: string): Promise<string | null> {
    return this.#mutex.run(key, async () => {
      const entry = await this.#read(key);
      await this.#remove(key);

      return entry?.value ?? null;
    });
  }

  public async replace(
    key: string,
    expected: string,
    next: string,
    options?: SetOptions,
  ): Promise<boolean> {
    return this.#mutex.run(key, async () => {
      const entry = await this.#read(key);
      if (entry?.value !== expected) {
        return false;
      }

      await this.#write(key, next, options);

      return true;
    });
  }

  public async delete(key: string): Promise<boolean> {
    return this.#mutex.run(key, async () => {
      const entry = await this.#read(key);
      await this.#remove(key);

      return entry !== null;
    });
  }

  public async deleteIf(key: string, expected: string): Promise<boolean> {
    return this.#mutex.run(key, async () => {
      const entry = await this.#read(key);
      if (entry?.value !== expected) {
        return false;
      }

      await this.#remove(key);

      return true;
    });
  }

  public async close(): Promise<void> {
    clearInterval(this.#sweeper);
    this.#sweeper = undefined;
  }

  /**
   * removes every expired record file
   * @returns number of records removed
   */
  public async sweep(): Promise<number> {
    let names: string[];
    try {
      names = await readdir(this.#directory);
    } catch (error) {
      if (isMissingFile(error)) {
        return 0;
      }
      throw error;
    }

    let removed = 0;
    for (const name of names.filter((file) => file.endsWith(FILE_EXTENSION))) {
      const path = join(this.#directory, name);
      const entry = await this.#parse(path);
      if (entry && isExpired(entry)) {
        // re-check under the key's lock, a writer may have refreshed the record
        const deleted = await this.#mutex.run(entry.key, async () => {
          const current = await this.#parse(path);
          if (!current || !isExpired(current)) {
            return false;
          }
          await rm(path, { force: true });

          return true;
        });
        if (deleted) {
          removed++;
        }
      }
    }

    return removed;
  }

  /**
   * maps a key to its record file
   * @param key record key
   * @returns absolute file path
   */
  #pathOf(key: string): string {
    const digest = createHash('sha256').update(key).digest('hex');

    return join(this.#directory, `${digest}${FILE_EXTENSION}`);
  }

  async #ensureDirectory(): Promise<void> {
    this.#ready ??= mkdir(this.#directory, { recursive: true }).then(
      () => undefined,
    );
    await this.#ready;
  }

  /**
   * reads and parses a record file
   * @param path file path
   * @returns entry, or null when missing or unreadable
   */
  async #parse(path: string): Promise<FileEntry | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    try {
      const content: unknown = JSON.parse(raw);

      return isFileEntry(content) ? content : null;
    } catch (error) {
      this.#log('warn', 'discarding corrupt record file', {
        path,
        ...describeError(error),
      });

      return null;
    }
  }

  /**
   * reads a live entry, deleting it when expired
   * @param key record key
   * @returns entry or null
   */
  async #read(key: string): Promise<FileEntry | null> {
    const path = this.#pathOf(key);
    const entry = await this.#parse(path);
    if (!entry || entry.key !== key) {
      return null;
    }

    if (isExpired(entry)) {
      await rm(path, { force: true });

      return null;
    }

    return entry;
  }

  async #write(key: string, value: string, options?: SetOptions): Promise<void> {
    await this.#ensureDirectory();

    const entry: FileEntry = {
      key,
      value,
      ...(options?.ttlSeconds !== undefined && {
        expiresAt: Date.now() + options.ttlSeconds * MS_PER_SECOND,
      }),
    };

    const path = this.#pathOf(key);
    const temp = `${path}.${generateOpaqueId(8)}${TEMP_EXTENSION}`;
    await writeFile(temp, JSON.stringify(entry), 'utf8');
    await rename(temp, path);
  }

  async #remove(key: string): Promise<void> {
    await rm(this.#pathOf(key), { force: true });
  }
}
