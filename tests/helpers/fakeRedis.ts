import type { RedisLike } from '../../src/sinks/redis.js';

// Redis list index semantics: negatives count from the end, stop is inclusive.
function span(len: number, start: number, stop: number): [number, number] {
  const s = Math.max(0, start < 0 ? len + start : start);
  const e = Math.min(len - 1, stop < 0 ? len + stop : stop);
  return [s, e];
}

/** In-process stand-in for the handful of ioredis commands the stores use. */
export class FakeRedis implements RedisLike {
  readonly strings = new Map<string, string>();
  readonly lists = new Map<string, string[]>();
  down = false;

  private check(): void {
    if (this.down) throw new Error('connection refused');
  }

  async incr(key: string): Promise<number> {
    this.check();
    const n = Number(this.strings.get(key) ?? '0') + 1;
    this.strings.set(key, String(n));
    return n;
  }

  async get(key: string): Promise<string | null> {
    this.check();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<'OK'> {
    this.check();
    this.strings.set(key, value);
    return 'OK';
  }

  async rpush(key: string, ...values: string[]): Promise<number> {
    this.check();
    const list = this.lists.get(key) ?? [];
    list.push(...values);
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.check();
    const list = this.lists.get(key) ?? [];
    const [s, e] = span(list.length, start, stop);
    return s > e ? [] : list.slice(s, e + 1);
  }

  async ltrim(key: string, start: number, stop: number): Promise<'OK'> {
    this.check();
    const list = this.lists.get(key) ?? [];
    const [s, e] = span(list.length, start, stop);
    this.lists.set(key, s > e ? [] : list.slice(s, e + 1));
    return 'OK';
  }
}
