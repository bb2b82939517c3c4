import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export type PipelineMetrics = ReturnType<typeof createPipelineMetrics>;

// Each call owns its registry so tests and embedded pipelines never collide
// on metric names.
export function createPipelineMetrics(registry = new Registry(), opts: { defaults?: boolean } = {}) {
  if (opts.defaults) collectDefaultMetrics({ register: registry, prefix: 'airpulse_' });
  const registers = [registry];
  return {
    registry,
    ingested: new Counter({ name: 'airpulse_readings_ingested_total', help: 'Readings enriched and dispatched', registers }),
    rejected: new Counter({ name: 'airpulse_readings_rejected_total', help: 'Readings rejected by validation', registers }),
    anomalies: new Counter({ name: 'airpulse_anomalies_total', help: 'Readings flagged as anomalous', registers }),
    persistenceFailures: new Counter({ name: 'airpulse_persistence_failures_total', help: 'Record store appends that failed', registers }),
    alertSinkFailures: new Counter({ name: 'airpulse_alert_sink_failures_total', help: 'Alert sink writes that failed', registers }),
    alertsRaised: new Counter({ name: 'airpulse_alerts_raised_total', help: 'Alert records opened', labelNames: ['type'] as const, registers }),
    alertsResolved: new Counter({ name: 'airpulse_alerts_resolved_total', help: 'Alert records resolved', labelNames: ['type'] as const, registers }),
    delivered: new Counter({ name: 'airpulse_broadcast_deliveries_total', help: 'Readings enqueued to subscribers', registers }),
    dropped: new Counter({ name: 'airpulse_broadcast_dropped_total', help: 'Queued readings dropped to make room for newer ones', registers }),
    subscribers: new Gauge({ name: 'airpulse_subscribers', help: 'Live subscribers', registers }),
    transportErrors: new Counter({ name: 'airpulse_subscriber_transport_errors_total', help: 'Subscribers dropped after a transport failure', registers }),
    heartbeats: new Counter({ name: 'airpulse_heartbeats_total', help: 'Synthetic readings published for cadence', registers }),
    answeringFallbacks: new Counter({ name: 'airpulse_answering_fallbacks_total', help: 'Queries answered from the fallback template', registers }),
    ingestMs: new Histogram({ name: 'airpulse_ingest_ms', help: 'Ingest latency in milliseconds', buckets: [1, 2, 5, 10, 25, 50, 100, 250, 500, 1000], registers }),
  };
}
