import { randomBytes } from 'node:crypto';
import { fastify, type FastifyInstance } from 'fastify';
import { assessRisk, recommend } from '../answering/advice.js';
import { predict } from '../answering/forecast.js';
import type { QueryService } from '../answering/query.js';
import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import type { Pipeline } from '../pipeline/index.js';
import { PipelineError, ValidationError } from '../pipeline/errors.js';
import { isRecord } from '../pipeline/schemas.js';
import type { AlertStore } from '../sinks/alerts.js';
import { MAX_LIMIT, type RecordQuery, type RecordStore } from '../sinks/records.js';
import { registerStreams } from './stream.js';

export type AppContext = {
  pipeline: Pipeline;
  records: RecordStore;
  alerts: AlertStore;
  query: QueryService;
  metrics: PipelineMetrics;
  httpLogs?: boolean;
  maintenance?: boolean;
};

type Query = { Querystring: Record<string, unknown> };

function one(v: unknown): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

function intParam(q: Record<string, unknown>, key: string, min: number, max: number, errs: string[]): number | undefined {
  const raw = one(q[key]);
  if (raw === undefined || raw.trim() === '') return undefined;
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    errs.push(`${key}.invalid`);
    return undefined;
  }
  return n;
}

export function parseRecordQuery(q: Record<string, unknown>): RecordQuery {
  const errs: string[] = [];
  const limit = intParam(q, 'limit', 1, MAX_LIMIT, errs);
  const offset = intParam(q, 'offset', 0, Number.MAX_SAFE_INTEGER, errs);
  const sinceRaw = one(q.since);
  let since: number | undefined;
  if (sinceRaw !== undefined && sinceRaw.trim() !== '') {
    since = Number(sinceRaw);
    if (!Number.isFinite(since)) errs.push('since.invalid');
  }
  if (errs.length) throw new ValidationError(errs);
  const source = one(q.source)?.trim();
  return {
    ...(source ? { source } : {}),
    ...(since !== undefined ? { since } : {}),
    ...(limit !== undefined ? { limit } : {}),
    ...(offset !== undefined ? { offset } : {}),
  };
}

export function buildApp(ctx: AppContext): FastifyInstance {
  const { pipeline, metrics } = ctx;
  const started = Date.now();
  let closing = false;

  const app = fastify({
    logger: ctx.httpLogs ?? false,
    requestIdHeader: 'x-request-id',
    genReqId: () => randomBytes(12).toString('hex'),
  });

  app.addHook('onRequest', async (req, reply) => {
    reply.header('x-request-id', req.id);
  });
  app.addHook('preClose', async () => {
    closing = true;
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof ValidationError) {
      return reply.code(400).send({ error: err.message, code: err.code, details: err.errs });
    }
    const status = typeof err.statusCode === 'number' ? err.statusCode : 500;
    if (status < 500) return reply.code(status).send({ error: err.message, code: err.code });
    logEvent('error', 'http.failed', { reqId: req.id, method: req.method, url: req.url, error: err.message });
    if (err instanceof PipelineError) return reply.code(status).send({ error: err.message, code: err.code });
    return reply.code(500).send({ error: 'internal' });
  });
  app.setNotFoundHandler((_req, reply) => reply.code(404).send({ error: 'not_found' }));

  app.post('/api/v1/events', async (req, reply) => {
    const result = await pipeline.gateway.ingest(req.body);
    return reply.code(201).send(result);
  });

  app.get<Query>('/api/v1/events', async req => {
    const rows = await ctx.records.query(parseRecordQuery(req.query));
    return { items: rows, count: rows.length };
  });

  app.get<{ Params: { id: string } }>('/api/v1/events/:id', async (req, reply) => {
    const row = await ctx.records.get(req.params.id);
    if (!row) return reply.code(404).send({ error: 'not_found' });
    return row;
  });

  app.get<Query>('/api/v1/alerts', async req => {
    const errs: string[] = [];
    const limit = intParam(req.query, 'limit', 1, MAX_LIMIT, errs);
    if (errs.length) throw new ValidationError(errs);
    const items = await ctx.alerts.list({ activeOnly: one(req.query.active) === 'true', limit });
    return { items, count: items.length };
  });

  app.post('/api/v1/query', async req => {
    const body = req.body;
    return ctx.query.ask(isRecord(body) ? body.query : undefined);
  });

  app.get('/api/v1/risk', async (_req, reply) => {
    const r = pipeline.hub.lastReading();
    if (!r) return reply.code(503).send({ error: 'no_live_reading' });
    return assessRisk(r, pipeline.config.thresholds);
  });

  app.get('/api/v1/recommendation', async (_req, reply) => {
    const r = pipeline.hub.lastReading();
    if (!r) return reply.code(503).send({ error: 'no_live_reading' });
    return recommend(r);
  });

  app.get<Query>('/api/v1/prediction', async (req, reply) => {
    const source = one(req.query.source)?.trim() || pipeline.hub.lastRealReading()?.source;
    if (!source) return reply.code(503).send({ error: 'no_live_reading' });
    const prediction = predict(source, pipeline.extractor.history.peek(source)?.points() ?? []);
    if (!prediction) return reply.code(404).send({ error: 'not_found' });
    return prediction;
  });

  app.get('/health', async () => ({
    ok: true,
    service: 'airpulse',
    uptime_s: Math.round((Date.now() - started) / 1000),
    subscribers: pipeline.hub.size,
    answering: ctx.query.configured,
  }));

  app.get('/live', async (_req, reply) => reply.type('text/plain').send('ok'));

  app.get('/ready', async (_req, reply) => {
    if (closing || ctx.maintenance) {
      return reply.code(503).header('Retry-After', '30').type('text/plain').send('not ready');
    }
    return reply.type('text/plain').send('ready');
  });

  app.get('/metrics', async (_req, reply) => {
    reply.header('Content-Type', metrics.registry.contentType);
    return reply.send(await metrics.registry.metrics());
  });

  registerStreams(app, pipeline.hub, metrics);
  return app;
}
