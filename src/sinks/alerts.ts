import type { JobsOptions } from 'bullmq';
import { errorMessage } from '../pipeline/errors.js';
import { isAlertSeverity, isAlertType, isRecord, type AlertRecord } from '../pipeline/schemas.js';
import type { RedisLike } from './redis.js';

/** Where alert records go. Records are appended once and later resolved, never removed. */
export interface AlertSink {
  append(record: AlertRecord): Promise<void>;
  resolve(id: string, resolvedAt: number): Promise<void>;
}

export type AlertListQuery = { activeOnly?: boolean; limit?: number };

export interface AlertStore extends AlertSink {
  list(q?: AlertListQuery): Promise<AlertRecord[]>;
}

function pick(newestFirst: AlertRecord[], q: AlertListQuery = {}): AlertRecord[] {
  const limit = Math.min(500, Math.max(1, Math.floor(q.limit ?? 100)));
  return newestFirst.filter(a => !q.activeOnly || !a.resolved).slice(0, limit);
}

export class MemoryAlertStore implements AlertStore {
  private readonly rows = new Map<string, AlertRecord>();

  async append(record: AlertRecord): Promise<void> {
    this.rows.set(record.id, record);
  }

  async resolve(id: string, resolvedAt: number): Promise<void> {
    const cur = this.rows.get(id);
    if (!cur) throw new Error(`unknown alert ${id}`);
    this.rows.set(id, Object.freeze({ ...cur, resolved: true, resolved_at: resolvedAt }));
  }

  async list(q?: AlertListQuery): Promise<AlertRecord[]> {
    return pick([...this.rows.values()].reverse(), q);
  }
}

export function parseAlertRecord(raw: string): AlertRecord | null {
  let v: unknown;
  try { v = JSON.parse(raw); } catch { return null; }
  if (!isRecord(v)) return null;
  const { id, type, severity, message, source, co2_ppm, risk_score, timestamp, resolved, resolved_at } = v;
  if (typeof id !== 'string' || typeof message !== 'string' || typeof source !== 'string') return null;
  if (!isAlertType(type) || !isAlertSeverity(severity)) return null;
  if (typeof co2_ppm !== 'number' || typeof risk_score !== 'number' || typeof timestamp !== 'number') return null;
  if (typeof resolved !== 'boolean') return null;
  const base = { id, type, severity, message, source, co2_ppm, risk_score, timestamp, resolved };
  return Object.freeze(typeof resolved_at === 'number' ? { ...base, resolved_at } : base);
}

// `<prefix>:<id>` holds the record, `<prefix>:ids` the append order.
export class RedisAlertStore implements AlertStore {
  constructor(private readonly client: RedisLike, private readonly prefix = 'airpulse:alerts', private readonly maxLen = 5_000) {}

  async append(record: AlertRecord): Promise<void> {
    await this.client.set(`${this.prefix}:${record.id}`, JSON.stringify(record));
    await this.client.rpush(`${this.prefix}:ids`, record.id);
    await this.client.ltrim(`${this.prefix}:ids`, -this.maxLen, -1);
  }

  async resolve(id: string, resolvedAt: number): Promise<void> {
    const raw = await this.client.get(`${this.prefix}:${id}`);
    const cur = raw ? parseAlertRecord(raw) : null;
    if (!cur) throw new Error(`unknown alert ${id}`);
    await this.client.set(`${this.prefix}:${id}`, JSON.stringify({ ...cur, resolved: true, resolved_at: resolvedAt }));
  }

  async list(q?: AlertListQuery): Promise<AlertRecord[]> {
    const ids = await this.client.lrange(`${this.prefix}:ids`, -this.maxLen, -1);
    const out: AlertRecord[] = [];
    for (let k = ids.length - 1; k >= 0; k--) {
      const raw = await this.client.get(`${this.prefix}:${ids[k]}`);
      const rec = raw ? parseAlertRecord(raw) : null;
      if (rec) out.push(rec);
    }
    return pick(out, q);
  }
}

// What the notifier needs from a BullMQ Queue.
export interface JobQueue {
  add(name: string, data: Record<string, unknown>, opts?: JobsOptions): Promise<unknown>;
}

/** Hands raised/resolved alerts to downstream notification workers. */
export class QueueAlertNotifier implements AlertSink {
  constructor(private readonly queue: JobQueue) {}

  async append(record: AlertRecord): Promise<void> {
    await this.queue.add('alert.raised', { ...record }, { jobId: `raised:${record.id}` });
  }

  async resolve(id: string, resolvedAt: number): Promise<void> {
    await this.queue.add('alert.resolved', { id, resolved_at: resolvedAt }, { jobId: `resolved:${id}` });
  }
}

/** Writes to every sink; reports the failures after all have been tried. */
export class FanoutAlertSink implements AlertSink {
  constructor(private readonly sinks: AlertSink[]) {}

  async append(record: AlertRecord): Promise<void> {
    await this.all(s => s.append(record));
  }

  async resolve(id: string, resolvedAt: number): Promise<void> {
    await this.all(s => s.resolve(id, resolvedAt));
  }

  private async all(op: (s: AlertSink) => Promise<void>): Promise<void> {
    const results = await Promise.allSettled(this.sinks.map(op));
    const errs = results.flatMap(r => (r.status === 'rejected' ? [errorMessage(r.reason)] : []));
    if (errs.length) throw new Error(`alert sink failed: ${errs.join('; ')}`);
  }
}
