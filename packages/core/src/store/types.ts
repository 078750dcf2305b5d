/** options for a write */
export interface SetOptions {
  /** lifetime in seconds, omitted for records that never expire */
  ttlSeconds?: number;
}

/**
 * key-value backend shared by every proxy store
 * values are serialised JSON strings; implementations must make take, replace and deleteIf atomic
 */
export abstract class KeyValueStore {
  /**
   * reads a value
   * @param key record key
   * @returns stored value or null if missing or expired
   */
  public abstract get(key: string): Promise<string | null>;

  /** writes a value, replacing any previous one */
  public abstract set(
    key: string,
    value: string,
    options?: SetOptions,
  ): Promise<void>;

  /**
   * atomically reads and deletes a value
   * @param key record key
   * @returns the value, or null if missing or expired; at most one concurrent caller gets it
   */
  public abstract take(key: string): Promise<string | null>;

  /**
   * writes a value only if the current value is exactly the expected one
   * @param key record key
   * @param expected value the caller last read
   * @param next replacement value
   * @param options write options
   * @returns true if the write happened
   */
  public abstract replace(
    key: string,
    expected: string,
    next: string,
    options?: SetOptions,
  ): Promise<boolean>;

  /**
   * deletes a value
   * @param key record key
   * @returns true if a live value was removed
   */
  public abstract delete(key: string): Promise<boolean>;

  /**
   * deletes a value only if it is exactly the expected one
   * @param key record key
   * @param expected value the caller last read
   * @returns true if the value was removed
   */
  public abstract deleteIf(key: string, expected: string): Promise<boolean>;

  /** releases timers and handles */
  public abstract close(): Promise<void>;
}
