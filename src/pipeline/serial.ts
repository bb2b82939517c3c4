// Runs tasks one at a time per key; different keys interleave freely.
export class KeyedSerializer {
  private readonly tails = new Map<string, Promise<void>>();

  run<T>(key: string, task: () => T | Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(task);
    const tail: Promise<void> = result.then(noop, noop).then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });
    this.tails.set(key, tail);
    return result;
  }

  /** Waits for every task queued so far, whatever its outcome. */
  async drain(): Promise<void> {
    await Promise.all([...this.tails.values()]);
  }

  get pending(): number { return this.tails.size; }
}

function noop(): void {}
