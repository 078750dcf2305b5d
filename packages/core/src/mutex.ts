/**
 * in-process lock keyed by string
 * callers holding the same key run one at a time in arrival order, different keys never wait on each other
 */
export class KeyedMutex {
  readonly #tails = new Map<string, Promise<void>>();

  /**
   * runs a task once every earlier task for the same key has settled
   * @param key lock key
   * @param task work to run under the lock
   * @returns the task's result
   */
  public async run<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.#tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.#tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      // the last waiter cleans up so idle keys leave no entry behind
      if (this.#tails.get(key) === tail) {
        this.#tails.delete(key);
      }
    }
  }
}
