import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import type { EnrichedReading } from './schemas.js';

export type OfferResult = 'queued' | 'dropped_oldest' | 'closed';

const DONE: IteratorReturnResult<undefined> = { value: undefined, done: true };

function item(value: EnrichedReading): IteratorYieldResult<EnrichedReading> {
  return { value, done: false };
}

/**
 * One live subscriber: a bounded queue drained by a single reader. When the
 * queue is full the oldest reading goes, so a slow reader sees fresh data
 * rather than holding up the publisher.
 */
export class Subscription implements AsyncIterable<EnrichedReading> {
  private queue: EnrichedReading[] = [];
  private waiter: ((r: IteratorResult<EnrichedReading, undefined>) => void) | null = null;
  private done = false;
  dropped = 0;

  constructor(readonly id: string, private readonly capacity: number) {}

  get closed(): boolean { return this.done; }
  get pending(): number { return this.queue.length; }

  offer(r: EnrichedReading): OfferResult {
    if (this.done) return 'closed';
    if (this.waiter) {
      const w = this.waiter;
      this.waiter = null;
      w(item(r));
      return 'queued';
    }
    let res: OfferResult = 'queued';
    if (this.queue.length >= this.capacity) {
      this.queue.shift();
      this.dropped++;
      res = 'dropped_oldest';
    }
    this.queue.push(r);
    return res;
  }

  next(): Promise<IteratorResult<EnrichedReading, undefined>> {
    const head = this.queue.shift();
    if (head !== undefined) return Promise.resolve(item(head));
    if (this.done) return Promise.resolve(DONE);
    if (this.waiter) return Promise.reject(new Error(`subscription ${this.id} already has a pending reader`));
    return new Promise(resolve => { this.waiter = resolve; });
  }

  /** Ends iteration and discards anything still queued. */
  close(): void {
    if (this.done) return;
    this.done = true;
    this.queue = [];
    const w = this.waiter;
    this.waiter = null;
    w?.(DONE);
  }

  [Symbol.asyncIterator](): AsyncIterator<EnrichedReading, undefined> {
    return {
      next: () => this.next(),
      return: () => { this.close(); return Promise.resolve(DONE); },
    };
  }
}

export type HubOptions = {
  queueMax: number;
  metrics?: PipelineMetrics;
  now?: () => number;
};

export class BroadcastHub {
  private readonly subs = new Map<string, Subscription>();
  private readonly now: () => number;
  private last: EnrichedReading | null = null;
  private lastReal: EnrichedReading | null = null;
  private lastAt = 0;
  private seq = 0;

  constructor(private readonly opts: HubOptions) {
    this.now = opts.now ?? (() => Date.now());
  }

  subscribe(): Subscription {
    const sub = new Subscription(`sub-${++this.seq}`, this.opts.queueMax);
    this.subs.set(sub.id, sub);
    this.opts.metrics?.subscribers.set(this.subs.size);
    logEvent('debug', 'hub.subscribed', { id: sub.id, subscribers: this.subs.size });
    return sub;
  }

  unsubscribe(sub: Subscription): boolean {
    sub.close();
    const removed = this.subs.delete(sub.id);
    if (removed) {
      this.opts.metrics?.subscribers.set(this.subs.size);
      logEvent('debug', 'hub.unsubscribed', { id: sub.id, subscribers: this.subs.size, dropped: sub.dropped });
    }
    return removed;
  }

  /**
   * Enqueues to every registered subscriber and returns how many took it.
   * Never waits on a reader; subscriptions found closed are pruned here.
   */
  publish(r: EnrichedReading): number {
    this.last = r;
    if (!r.synthetic) this.lastReal = r;
    this.lastAt = this.now();
    let delivered = 0;
    let dropped = 0;
    for (const sub of [...this.subs.values()]) {
      const res = sub.offer(r);
      if (res === 'closed') { this.unsubscribe(sub); continue; }
      if (res === 'dropped_oldest') dropped++;
      delivered++;
    }
    if (delivered) this.opts.metrics?.delivered.inc(delivered);
    if (dropped) this.opts.metrics?.dropped.inc(dropped);
    return delivered;
  }

  lastReading(): EnrichedReading | null { return this.last; }

  /** Latest reading that came through ingestion rather than the heartbeat. */
  lastRealReading(): EnrichedReading | null { return this.lastReal; }

  /** Epoch ms of the latest publish, 0 before the first. */
  lastPublishedAt(): number { return this.lastAt; }

  get size(): number { return this.subs.size; }

  close(): void {
    for (const sub of [...this.subs.values()]) this.unsubscribe(sub);
  }
}
