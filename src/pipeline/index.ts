import type { PipelineConfig } from '../config/pipeline.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import type { AlertSink } from '../sinks/alerts.js';
import type { RecordStore } from '../sinks/records.js';
import { AlertEvaluator } from './alerts.js';
import { FeatureExtractor } from './extract.js';
import { IngestionGateway } from './gateway.js';
import { startHeartbeat } from './heartbeat.js';
import { BroadcastHub } from './hub.js';

export type PipelineDeps = {
  records: RecordStore;
  alertSink: AlertSink;
  metrics?: PipelineMetrics;
};

export type Pipeline = ReturnType<typeof createPipeline>;

/** Wires one set of pipeline services; callers pass these around explicitly. */
export function createPipeline(config: PipelineConfig, deps: PipelineDeps) {
  const extractor = new FeatureExtractor({
    thresholds: config.thresholds,
    anomalyZ: config.anomalyZ,
    anomalyMinSamples: config.anomalyMinSamples,
    historyCapacity: config.historyCapacity,
    maxSources: config.historyMaxSources,
  });
  const alerts = new AlertEvaluator(config.thresholds);
  const hub = new BroadcastHub({ queueMax: config.subscriberQueueMax, metrics: deps.metrics });
  const gateway = new IngestionGateway({ extractor, alerts, hub, records: deps.records, alertSink: deps.alertSink, metrics: deps.metrics });
  return {
    config,
    extractor,
    alerts,
    hub,
    gateway,
    startHeartbeat: () => startHeartbeat(hub, raw => extractor.score(raw), { ...config.heartbeat, metrics: deps.metrics }),
  };
}

export { AlertEvaluator } from './alerts.js';
export { FeatureExtractor, enrich, riskScore, carbonScore, classifySeverity } from './extract.js';
export { IngestionGateway, type IngestResult } from './gateway.js';
export { BroadcastHub, Subscription } from './hub.js';
export { HistoryWindow, HistoryBook, type HistoryPoint } from './window.js';
export { replayFile, watchInbox, type ReplaySummary } from './replay.js';
export * from './errors.js';
export * from './schemas.js';
