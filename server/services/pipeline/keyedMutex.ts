import pLimit, { type LimitFunction } from "p-limit";

/** Serializes work per key; unrelated keys never wait on each other. */
export class KeyedMutex {
  private readonly locks = new Map<string, LimitFunction>();

  async run<T>(key: string, work: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(key);
    if (!lock) {
      lock = pLimit(1);
      this.locks.set(key, lock);
    }
    const held = lock;
    try {
      return await held(work);
    } finally {
      if (held.activeCount === 0 && held.pendingCount === 0) {
        this.locks.delete(key);
      }
    }
  }

  get size() {
    return this.locks.size;
  }
}
