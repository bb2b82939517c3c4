import type { HeartbeatConfig } from '../config/pipeline.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import { errorMessage } from './errors.js';
import type { BroadcastHub } from './hub.js';
import type { EnrichedReading, RawReading } from './schemas.js';

export type HeartbeatOptions = HeartbeatConfig & {
  random?: () => number;
  metrics?: PipelineMetrics;
};

type Stopper = () => void;

function round2(x: number): number { return Math.round(x * 100) / 100; }

// Last known value plus uniform jitter in [-jitterPpm, +jitterPpm].
export function synthesizeRaw(last: EnrichedReading | null, opts: HeartbeatOptions, nowMs: number): RawReading {
  const base = last ? last.co2_ppm : opts.seedPpm;
  const rand = opts.random ?? Math.random;
  const jitter = (rand() * 2 - 1) * opts.jitterPpm;
  return Object.freeze({ source: opts.source, co2_ppm: Math.max(0, round2(base + jitter)), timestamp: nowMs / 1000 });
}

/**
 * Keeps the live feed at a minimum cadence. The timer is always armed for
 * `lastPublish + cadence`, so k silent intervals produce exactly k synthetic
 * readings and real traffic pushes the next one out.
 */
export function startHeartbeat(hub: BroadcastHub, score: (raw: RawReading) => EnrichedReading, opts: HeartbeatOptions): Stopper {
  const cadence = opts.cadenceMs;
  const startedAt = Date.now();
  let timer: ReturnType<typeof setTimeout> | null = null;
  let stopped = false;

  const reference = () => Math.max(startedAt, hub.lastPublishedAt());

  const schedule = () => {
    if (stopped) return;
    const due = Math.max(0, reference() + cadence - Date.now());
    timer = setTimeout(tick, due);
  };

  const tick = () => {
    timer = null;
    const now = Date.now();
    if (now - reference() >= cadence) {
      try {
        const synthetic: EnrichedReading = Object.freeze({ ...score(synthesizeRaw(hub.lastRealReading(), opts, now)), synthetic: true });
        hub.publish(synthetic);
        opts.metrics?.heartbeats.inc();
      } catch (e) {
        logEvent('warn', 'heartbeat.failed', { error: errorMessage(e) });
      }
    }
    schedule();
  };

  schedule();
  return () => {
    stopped = true;
    if (timer) clearTimeout(timer);
    timer = null;
  };
}
