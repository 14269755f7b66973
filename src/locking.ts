// In-process async lock per key. Callers on the same key run one at a time, in arrival order.
// NOTE: a single writer process per room is assumed; a multi-process deployment needs a distributed lock.
export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  async withLock<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => undefined;
    const current = new Promise<void>((res) => (release = res));
    const tail = prev.then(() => current);
    this.tails.set(key, tail);

    await prev;
    try {
      return await fn();
    } finally {
      release();
      // cleanup if nobody queued behind us
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }

  isIdle(key: string): boolean {
    return !this.tails.has(key);
  }
}
