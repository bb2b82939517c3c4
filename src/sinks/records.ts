import { isRecord, isSeverity, type EnrichedReading, type StoredReading } from '../pipeline/schemas.js';
import type { RedisLike } from './redis.js';

export type RecordQuery = {
  source?: string;
  since?: number; // epoch seconds, inclusive
  limit?: number;
  offset?: number;
};

/** Persistent record store. Newest first from `query`. */
export interface RecordStore {
  append(r: EnrichedReading): Promise<string>;
  query(q?: RecordQuery): Promise<StoredReading[]>;
  get(id: string): Promise<StoredReading | null>;
}

export const DEFAULT_LIMIT = 50;
export const MAX_LIMIT = 500;

function clampLimit(n: number | undefined): number {
  if (n === undefined || !Number.isFinite(n)) return DEFAULT_LIMIT;
  return Math.min(MAX_LIMIT, Math.max(1, Math.floor(n)));
}

function applyQuery(newestFirst: StoredReading[], q: RecordQuery = {}): StoredReading[] {
  const offset = Math.max(0, Math.floor(q.offset ?? 0));
  const limit = clampLimit(q.limit);
  const since = q.since;
  const hits = newestFirst.filter(r =>
    (q.source === undefined || r.source === q.source) && (since === undefined || r.timestamp >= since));
  return hits.slice(offset, offset + limit);
}

export class MemoryRecordStore implements RecordStore {
  private rows: StoredReading[] = [];
  private seq = 0;
  constructor(private readonly maxRows = 10_000) {}

  async append(r: EnrichedReading): Promise<string> {
    const id = String(++this.seq);
    this.rows.push(Object.freeze({ ...r, id }));
    if (this.rows.length > this.maxRows) this.rows.shift();
    return id;
  }

  async query(q?: RecordQuery): Promise<StoredReading[]> {
    return applyQuery([...this.rows].reverse(), q);
  }

  async get(id: string): Promise<StoredReading | null> {
    return this.rows.find(r => r.id === id) ?? null;
  }
}

export function parseStoredReading(raw: string): StoredReading | null {
  let v: unknown;
  try { v = JSON.parse(raw); } catch { return null; }
  if (!isRecord(v)) return null;
  const { id, source, co2_ppm, location, timestamp, risk_score, carbon_score, severity, anomaly } = v;
  if (typeof id !== 'string' || typeof source !== 'string') return null;
  if (typeof co2_ppm !== 'number' || typeof timestamp !== 'number') return null;
  if (typeof risk_score !== 'number' || typeof carbon_score !== 'number') return null;
  if (!isSeverity(severity) || typeof anomaly !== 'boolean') return null;
  const base = { id, source, co2_ppm, timestamp, risk_score, carbon_score, severity, anomaly };
  return Object.freeze(typeof location === 'string' ? { ...base, location } : base);
}

/**
 * Readings as JSON in a capped Redis list plus one key per id.
 * Keys: `<prefix>:seq`, `<prefix>:log`, `<prefix>:row:<id>`.
 */
export class RedisRecordStore implements RecordStore {
  constructor(private readonly client: RedisLike, private readonly prefix = 'airpulse:readings', private readonly maxLen = 10_000) {}

  async append(r: EnrichedReading): Promise<string> {
    const id = String(await this.client.incr(`${this.prefix}:seq`));
    const json = JSON.stringify({ ...r, id });
    await this.client.set(`${this.prefix}:row:${id}`, json);
    await this.client.rpush(`${this.prefix}:log`, json);
    await this.client.ltrim(`${this.prefix}:log`, -this.maxLen, -1);
    return id;
  }

  async query(q?: RecordQuery): Promise<StoredReading[]> {
    const raw = await this.client.lrange(`${this.prefix}:log`, -this.maxLen, -1);
    const rows: StoredReading[] = [];
    for (let k = raw.length - 1; k >= 0; k--) {
      const row = parseStoredReading(raw[k]);
      if (row) rows.push(row);
    }
    return applyQuery(rows, q);
  }

  async get(id: string): Promise<StoredReading | null> {
    const raw = await this.client.get(`${this.prefix}:row:${id}`);
    return raw ? parseStoredReading(raw) : null;
  }
}
