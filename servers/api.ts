import 'dotenv/config';
import { Redis } from 'ioredis';
import { HttpAnsweringService } from '../src/answering/client.js';
import { QueryService } from '../src/answering/query.js';
import { readPipelineConfig, readServerConfig } from '../src/config/pipeline.js';
import { createPipelineMetrics } from '../src/observability/metrics.js';
import { logEvent } from '../src/observability/log.js';
import { errorMessage } from '../src/pipeline/errors.js';
import { createPipeline, watchInbox } from '../src/pipeline/index.js';
import { QUEUE_NAMES, createQueues } from '../src/queues.js';
import { buildApp } from '../src/server/app.js';
import { FanoutAlertSink, MemoryAlertStore, QueueAlertNotifier, RedisAlertStore, type AlertSink, type AlertStore } from '../src/sinks/alerts.js';
import { MemoryRecordStore, RedisRecordStore, type RecordStore } from '../src/sinks/records.js';
import { setupTracing } from '../src/tracing.js';

process.on('uncaughtException', e => {
  logEvent('error', 'process.uncaught_exception', { error: e.stack ?? e.message });
});
process.on('unhandledRejection', e => {
  logEvent('error', 'process.unhandled_rejection', { error: errorMessage(e) });
});

const serviceName = 'airpulse';
const pipelineConfig = readPipelineConfig();
const serverConfig = readServerConfig();
const stopTracing = serverConfig.tracingEnabled ? await setupTracing(serviceName) : async () => {};

const closers: Array<() => Promise<void>> = [];
let records: RecordStore;
let alertStore: AlertStore;
if (serverConfig.redisUrl) {
  const client = new Redis(serverConfig.redisUrl);
  closers.push(async () => { await client.quit(); });
  records = new RedisRecordStore(client);
  alertStore = new RedisAlertStore(client);
} else {
  records = new MemoryRecordStore();
  alertStore = new MemoryAlertStore();
}

let alertSink: AlertSink = alertStore;
if (serverConfig.alertQueueEnabled && serverConfig.redisUrl) {
  const queues = createQueues(serverConfig.redisUrl);
  closers.push(() => queues.close());
  alertSink = new FanoutAlertSink([alertStore, new QueueAlertNotifier(queues.get(QUEUE_NAMES.ALERT_READY))]);
} else if (serverConfig.alertQueueEnabled) {
  logEvent('warn', 'boot.alert_queue_skipped', { reason: 'REDIS_URL not set' });
}

const metrics = createPipelineMetrics(undefined, { defaults: true });
const pipeline = createPipeline(pipelineConfig, { records, alertSink, metrics });
const answering = serverConfig.answeringUrl
  ? new HttpAnsweringService(serverConfig.answeringUrl, serverConfig.answeringTimeoutMs)
  : null;
const query = new QueryService(answering, () => pipeline.hub.lastRealReading(), metrics);

const app = buildApp({ pipeline, records, alerts: alertStore, query, metrics, httpLogs: serverConfig.httpLogs, maintenance: serverConfig.maintenance });
const stopHeartbeat = pipeline.startHeartbeat();
const stopInbox = serverConfig.inputDir
  ? watchInbox(pipeline.gateway, serverConfig.inputDir, serverConfig.inboxPollMs)
  : () => {};

app.addHook('onClose', async () => {
  stopHeartbeat();
  stopInbox();
  pipeline.hub.close();
  for (const close of closers) await close();
  await stopTracing();
});

logEvent('info', 'boot.starting', {
  store: serverConfig.redisUrl ? 'redis' : 'memory',
  alertQueue: alertSink !== alertStore,
  answering: answering !== null,
  heartbeatMs: pipelineConfig.heartbeat.cadenceMs,
});
try {
  await app.listen({ port: serverConfig.port, host: serverConfig.host });
  logEvent('info', 'boot.listening', { host: serverConfig.host, port: serverConfig.port });
} catch (e) {
  logEvent('error', 'boot.failed', { error: errorMessage(e) });
  process.exit(1);
}

let shuttingDown = false;
const shutdown = (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logEvent('info', 'shutdown.begin', { signal });
  app.close().then(
    () => process.exit(0),
    e => {
      logEvent('error', 'shutdown.failed', { error: errorMessage(e) });
      process.exit(1);
    },
  );
};
process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));
