import { ValidationError } from './errors.js';
import { isRecord, type RawReading } from './schemas.js';

export type ReadingInput = {
  source?: unknown;
  co2_ppm?: unknown;
  location?: unknown;
  timestamp?: unknown;
};

const MAX_SOURCE_LEN = 128;
const MAX_LOCATION_LEN = 256;

// Numbers, or strings that parse to one ("420.5" from CSV-ish senders).
function toNumber(v: unknown): number | null {
  if (typeof v === 'number') return v;
  if (typeof v === 'string' && v.trim() !== '') return Number(v);
  return null;
}

export function validateReadingInput(input: unknown): string[] {
  if (!isRecord(input)) return ['body.not_object'];
  const errs: string[] = [];
  const { source, co2_ppm, location, timestamp } = input;

  if (typeof source !== 'string' || !source.trim()) errs.push('source.missing');
  else if (source.trim().length > MAX_SOURCE_LEN) errs.push('source.too_long');

  const co2 = toNumber(co2_ppm);
  if (co2 === null || !Number.isFinite(co2)) errs.push('co2_ppm.invalid');
  else if (co2 < 0) errs.push('co2_ppm.negative');

  if (location != null) {
    if (typeof location !== 'string') errs.push('location.invalid');
    else if (location.length > MAX_LOCATION_LEN) errs.push('location.too_long');
  }

  if (timestamp != null) {
    const ts = toNumber(timestamp);
    if (ts === null || !Number.isFinite(ts)) errs.push('timestamp.invalid');
  }
  return errs;
}

/**
 * Canonical, frozen RawReading from boundary input. A missing timestamp
 * becomes `nowSec`.
 */
export function normalizeReading(input: unknown, nowSec = Date.now() / 1000): RawReading {
  const errs = validateReadingInput(input);
  if (errs.length || !isRecord(input)) throw new ValidationError(errs.length ? errs : ['body.not_object']);
  const source = String(input.source).trim();
  const co2 = Number(toNumber(input.co2_ppm));
  const ts = input.timestamp == null ? nowSec : Number(toNumber(input.timestamp));
  const location = typeof input.location === 'string' && input.location.trim() ? input.location.trim() : undefined;
  return Object.freeze(location === undefined
    ? { source, co2_ppm: co2, timestamp: ts }
    : { source, co2_ppm: co2, location, timestamp: ts });
}
