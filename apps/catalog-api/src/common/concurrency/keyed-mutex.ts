/**
 * KeyedMutex - Serializes async tasks that share a key
 *
 * Tasks for the same key run one at a time in call order; tasks for different
 * keys run concurrently. A key is forgotten once its last queued task settles.
 */
export class KeyedMutex {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `task` once every earlier task queued under `key` has settled
   * @param key - Lock key (e.g. 'role:Editors')
   * @param task - Work to run while holding the key
   * @returns Whatever the task resolves to; a task rejection is passed through
   */
  async runExclusive<T>(key: string, task: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await task();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  /** True while a task holds or waits on `key` */
  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
