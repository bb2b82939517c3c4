import type { Thresholds } from '../config/pipeline.js';
import { ValidationError } from './errors.js';
import type { EnrichedReading, RawReading, Severity } from './schemas.js';
import { HistoryBook, type HistoryWindow, type WindowStats } from './window.js';

export type ExtractorOptions = {
  thresholds: Thresholds;
  anomalyZ: number;
  anomalyMinSamples: number;
  historyCapacity: number;
  maxSources?: number;
};

export function riskScore(co2: number, danger: number): number {
  return Math.min(co2 / danger, 1);
}

export function carbonScore(co2: number, baseline: number): number {
  return (co2 - baseline) / baseline;
}

// Boundaries belong to the upper tier.
export function classifySeverity(co2: number, t: Pick<Thresholds, 'warning' | 'danger' | 'critical'>): Severity {
  if (co2 < t.warning) return 'safe';
  if (co2 < t.danger) return 'warning';
  if (co2 < t.critical) return 'danger';
  return 'critical';
}

export function zscore(x: number, mean: number, std: number): number {
  if (std > 0) return (x - mean) / std;
  if (x === mean) return 0;
  return x > mean ? Infinity : -Infinity;
}

export function isAnomaly(value: number, stats: WindowStats, opts: Pick<ExtractorOptions, 'anomalyZ' | 'anomalyMinSamples'>): boolean {
  if (stats.count < opts.anomalyMinSamples) return false;
  return Math.abs(zscore(value, stats.mean, stats.stddev)) > opts.anomalyZ;
}

function assertScorable(raw: RawReading): void {
  const errs: string[] = [];
  if (!Number.isFinite(raw.co2_ppm)) errs.push('co2_ppm.invalid');
  else if (raw.co2_ppm < 0) errs.push('co2_ppm.negative');
  if (!Number.isFinite(raw.timestamp)) errs.push('timestamp.invalid');
  if (errs.length) throw new ValidationError(errs);
}

function scores(raw: RawReading, t: Thresholds) {
  return {
    risk_score: riskScore(raw.co2_ppm, t.danger),
    carbon_score: carbonScore(raw.co2_ppm, t.baseline),
    severity: classifySeverity(raw.co2_ppm, t),
  };
}

/**
 * Scores a reading against its source window, then pushes the value into
 * that window. The anomaly flag compares against history *before* the push.
 */
export function enrich(raw: RawReading, history: HistoryWindow, opts: ExtractorOptions): EnrichedReading {
  assertScorable(raw);
  const anomaly = isAnomaly(raw.co2_ppm, history.stats(), opts);
  history.push(raw.co2_ppm, raw.timestamp);
  return Object.freeze({ ...raw, ...scores(raw, opts.thresholds), anomaly });
}

export class FeatureExtractor {
  readonly history: HistoryBook;

  constructor(private readonly opts: ExtractorOptions) {
    this.history = new HistoryBook(opts.historyCapacity, opts.maxSources);
  }

  enrich(raw: RawReading): EnrichedReading {
    assertScorable(raw);
    return enrich(raw, this.history.get(raw.source), this.opts);
  }

  /** Same scores without reading or touching any history window. */
  score(raw: RawReading): EnrichedReading {
    assertScorable(raw);
    return Object.freeze({ ...raw, ...scores(raw, this.opts.thresholds), anomaly: false });
  }

  get thresholds(): Thresholds { return this.opts.thresholds; }
}
