import { SpanStatusCode, trace } from '@opentelemetry/api';
import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import type { AlertSink } from '../sinks/alerts.js';
import type { RecordStore } from '../sinks/records.js';
import type { AlertEvaluator, AlertTransition } from './alerts.js';
import { PersistenceUnavailable, ValidationError, errorMessage } from './errors.js';
import type { FeatureExtractor } from './extract.js';
import type { BroadcastHub } from './hub.js';
import type { AlertRecord, EnrichedReading, RawReading } from './schemas.js';
import { KeyedSerializer } from './serial.js';
import { normalizeReading } from './validate.js';

export type IngestResult = EnrichedReading & {
  id: string | null; // null when the record store could not take it
  persisted: boolean;
  alerts: AlertRecord[];
};

export type GatewayDeps = {
  extractor: FeatureExtractor;
  alerts: AlertEvaluator;
  hub: BroadcastHub;
  records: RecordStore;
  alertSink: AlertSink;
  metrics?: PipelineMetrics;
  now?: () => number;
};

const tracer = trace.getTracer('airpulse.pipeline');

/**
 * Single entry for every reading, request-driven or replayed. Enrichment,
 * alert evaluation and broadcast run under a per-source lock so each
 * source's feed keeps ingestion order. The record store is written
 * afterwards, best effort; alert sink writes are queued per source and not
 * awaited.
 */
export class IngestionGateway {
  private readonly serial = new KeyedSerializer();
  private readonly alertSerial = new KeyedSerializer();
  private readonly now: () => number;

  constructor(private readonly deps: GatewayDeps) {
    this.now = deps.now ?? (() => Date.now());
  }

  async ingest(input: unknown): Promise<IngestResult> {
    const t0 = this.now();
    const { metrics } = this.deps;
    const raw = this.normalize(input, t0);

    return tracer.startActiveSpan('pipeline.ingest', async span => {
      span.setAttribute('reading.source', raw.source);
      try {
        const { reading, transitions } = await this.serial.run(raw.source, () => {
          const reading = this.deps.extractor.enrich(raw);
          const transitions = this.deps.alerts.evaluate(reading);
          this.deps.hub.publish(reading);
          // queued while still holding the source lock: a resolve never overtakes its raise
          if (transitions.length > 0) this.queueAlerts(raw.source, transitions);
          return { reading, transitions };
        });
        metrics?.ingested.inc();
        if (reading.anomaly) metrics?.anomalies.inc();

        const id = await this.persist(reading);
        span.setAttribute('reading.severity', reading.severity);
        span.setAttribute('reading.persisted', id !== null);
        metrics?.ingestMs.observe(this.now() - t0);
        return {
          ...reading,
          id,
          persisted: id !== null,
          alerts: transitions.map(t => t.record),
        };
      } catch (e) {
        span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(e) });
        throw e;
      } finally {
        span.end();
      }
    });
  }

  /** Resolves once every alert write queued so far has settled. */
  alertsSettled(): Promise<void> {
    return this.alertSerial.drain();
  }

  // Not awaited by ingest; failures are logged here.
  private queueAlerts(source: string, transitions: AlertTransition[]): void {
    void this.alertSerial.run(source, () => this.dispatchAlerts(transitions)).catch(e => {
      logEvent('error', 'alert.dispatch_failed', { source, error: errorMessage(e) });
    });
  }

  private normalize(input: unknown, nowMs: number): RawReading {
    try {
      return normalizeReading(input, nowMs / 1000);
    } catch (e) {
      this.deps.metrics?.rejected.inc();
      logEvent('warn', 'ingest.rejected', { errs: e instanceof ValidationError ? e.errs : [errorMessage(e)] });
      throw e;
    }
  }

  private async persist(reading: EnrichedReading): Promise<string | null> {
    try {
      return await this.deps.records.append(reading);
    } catch (e) {
      const err = new PersistenceUnavailable('record store', e);
      this.deps.metrics?.persistenceFailures.inc();
      logEvent('error', 'ingest.persist_failed', { code: err.code, error: err.message, source: reading.source });
      return null;
    }
  }

  // In transition order; one failing write does not stop the rest.
  private async dispatchAlerts(transitions: AlertTransition[]): Promise<void> {
    const { alertSink, metrics } = this.deps;
    for (const t of transitions) {
      try {
        if (t.kind === 'raised') {
          await alertSink.append(t.record);
          metrics?.alertsRaised.inc({ type: t.record.type });
          logEvent('warn', 'alert.raised', { id: t.record.id, type: t.record.type, source: t.record.source, co2_ppm: t.record.co2_ppm });
        } else {
          await alertSink.resolve(t.record.id, t.record.resolved_at ?? t.record.timestamp);
          metrics?.alertsResolved.inc({ type: t.record.type });
          logEvent('info', 'alert.resolved', { id: t.record.id, type: t.record.type, source: t.record.source });
        }
      } catch (e) {
        const err = new PersistenceUnavailable('alert sink', e);
        metrics?.alertSinkFailures.inc();
        logEvent('error', 'alert.sink_failed', { code: err.code, error: err.message, id: t.record.id, kind: t.kind });
      }
    }
  }
}
