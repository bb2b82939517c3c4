import type { Counter } from 'prom-client';
import type { PipelineConfig, Thresholds } from '../../src/config/pipeline.js';
import { FeatureExtractor } from '../../src/pipeline/extract.js';
import type { EnrichedReading } from '../../src/pipeline/schemas.js';

export const thresholds: Thresholds = {
  warning: 350,
  danger: 400,
  critical: 500,
  baseline: 350,
  criticalRiskCutoff: 0.9,
};

export function testConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  return {
    thresholds,
    anomalyZ: 2.5,
    anomalyMinSamples: 5,
    historyCapacity: 20,
    historyMaxSources: 100,
    subscriberQueueMax: 8,
    heartbeat: { cadenceMs: 2000, jitterPpm: 5, source: 'live-sensor', seedPpm: 400 },
    ...overrides,
  };
}

const scorer = new FeatureExtractor({ thresholds, anomalyZ: 2.5, anomalyMinSamples: 5, historyCapacity: 20 });

// A scored reading that never touches history.
export function reading(co2: number, source = 's1', timestamp = 1000): EnrichedReading {
  return scorer.score({ source, co2_ppm: co2, timestamp });
}

export async function counterValue(c: Counter<string>, labels: Record<string, string> = {}): Promise<number> {
  const m = await c.get();
  const hit = m.values.find(v => Object.entries(labels).every(([k, want]) => v.labels[k] === want));
  return hit ? hit.value : 0;
}
