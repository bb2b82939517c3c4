import { once } from 'node:events';
import http, { type ClientRequest, type IncomingMessage } from 'node:http';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { WebSocket } from 'ws';
import { createPipelineMetrics } from '../src/observability/metrics.js';
import { BroadcastHub } from '../src/pipeline/hub.js';
import { SSE_PATH, WS_PATH, pump } from '../src/server/stream.js';
import { createTestApp } from './helpers/app.js';
import { counterValue, reading } from './helpers/fixtures.js';

function openSse(url: string): Promise<{ req: ClientRequest; res: IncomingMessage }> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, res => resolve({ req, res }));
    req.on('error', reject);
  });
}

function nextData(res: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    let buf = '';
    const onData = (chunk: Buffer) => {
      buf += chunk.toString('utf8');
      const m = /^data: (.*)\n\n/m.exec(buf);
      if (m) {
        res.off('data', onData);
        resolve(m[1]);
      }
    };
    res.on('data', onData);
    res.once('error', reject);
  });
}

describe('live streams', () => {
  let t: ReturnType<typeof createTestApp>;
  let base: string;
  let closed = false;

  beforeEach(async () => {
    t = createTestApp();
    await t.app.listen({ port: 0, host: '127.0.0.1' });
    const addr = t.app.server.address();
    const port = addr !== null && typeof addr === 'object' ? addr.port : 0;
    base = `127.0.0.1:${port}`;
  });

  afterEach(async () => {
    if (!closed) await t.app.close();
    closed = false;
  });

  it('SSE delivers one data frame per reading and unsubscribes on disconnect', async () => {
    const { req, res } = await openSse(`http://${base}${SSE_PATH}`);
    expect(res.statusCode).toBe(200);
    expect(res.headers['content-type']).toBe('text/event-stream');
    await vi.waitFor(() => expect(t.pipeline.hub.size).toBe(1));

    const frame = nextData(res);
    await t.pipeline.gateway.ingest({ source: 's1', co2_ppm: 420.5, timestamp: 1000 });
    const msg = JSON.parse(await frame);
    expect(msg).toEqual({
      source: 's1',
      co2_ppm: 420.5,
      risk_score: 1,
      carbon_score: 70.5 / 350,
      severity: 'danger',
      anomaly: false,
      timestamp: 1000,
    });

    req.destroy();
    await vi.waitFor(() => expect(t.pipeline.hub.size).toBe(0));
  });

  it('WebSocket clients get the same messages', async () => {
    const ws = new WebSocket(`ws://${base}${WS_PATH}`);
    await once(ws, 'open');
    await vi.waitFor(() => expect(t.pipeline.hub.size).toBe(1));

    const message = once(ws, 'message');
    await t.pipeline.gateway.ingest({ source: 's2', co2_ppm: 300, timestamp: 7 });
    const [data] = await message;
    const msg = JSON.parse(String(data));
    expect(msg.source).toBe('s2');
    expect(msg.severity).toBe('safe');
    expect(msg.risk_score).toBe(0.75);

    ws.close();
    await vi.waitFor(() => expect(t.pipeline.hub.size).toBe(0));
  });

  it('closing the server ends open SSE streams', async () => {
    const { res } = await openSse(`http://${base}${SSE_PATH}`);
    res.resume();
    await vi.waitFor(() => expect(t.pipeline.hub.size).toBe(1));
    const ended = once(res, 'end');
    closed = true;
    await t.app.close();
    await ended;
    expect(t.pipeline.hub.size).toBe(0);
  });
});

describe('pump', () => {
  it('drops only the failing subscriber', async () => {
    const metrics = createPipelineMetrics();
    const hub = new BroadcastHub({ queueMax: 8 });
    const broken = hub.subscribe();
    const healthy = hub.subscribe();
    const done = pump(hub, broken, async () => { throw new Error('EPIPE'); }, metrics);

    hub.publish(reading(410));
    await done;

    expect(hub.size).toBe(1);
    expect(broken.closed).toBe(true);
    expect(healthy.pending).toBe(1);
    expect(await counterValue(metrics.transportErrors)).toBe(1);
  });
});
