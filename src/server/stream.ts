import type { ServerResponse } from 'node:http';
import type { FastifyInstance } from 'fastify';
import { WebSocket, WebSocketServer } from 'ws';
import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import { SubscriberTransportError, errorMessage } from '../pipeline/errors.js';
import type { BroadcastHub, Subscription } from '../pipeline/hub.js';
import { toLiveMessage } from '../pipeline/schemas.js';

export const SSE_PATH = '/api/v1/stream/events';
export const WS_PATH = '/api/v1/stream/ws';

type Send = (payload: string) => Promise<void>;

// Resolves once the frame is buffered; waits for drain under backpressure.
export function writeFrame(res: ServerResponse, frame: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (res.destroyed || res.writableEnded) {
      reject(new Error('stream closed'));
      return;
    }
    const ok = res.write(frame, err => { if (err) reject(err); });
    if (ok) {
      resolve();
      return;
    }
    const onDrain = () => { cleanup(); resolve(); };
    const onClose = () => { cleanup(); reject(new Error('stream closed')); };
    const cleanup = () => { res.off('drain', onDrain); res.off('close', onClose); };
    res.once('drain', onDrain);
    res.once('close', onClose);
  });
}

function sendWs(ws: WebSocket, payload: string): Promise<void> {
  return new Promise((resolve, reject) => {
    if (ws.readyState !== WebSocket.OPEN) {
      reject(new Error('socket not open'));
      return;
    }
    ws.send(payload, err => (err ? reject(err) : resolve()));
  });
}

/**
 * Drains one subscription into a transport. A failed write ends only this
 * subscriber; the hub and everyone else carry on.
 */
export async function pump(hub: BroadcastHub, sub: Subscription, send: Send, metrics?: PipelineMetrics): Promise<void> {
  try {
    for await (const r of sub) await send(JSON.stringify(toLiveMessage(r)));
  } catch (e) {
    const err = new SubscriberTransportError(sub.id, e);
    metrics?.transportErrors.inc();
    logEvent('warn', 'stream.transport_failed', { id: sub.id, code: err.code, error: err.message });
  } finally {
    hub.unsubscribe(sub);
  }
}

export function registerStreams(app: FastifyInstance, hub: BroadcastHub, metrics?: PipelineMetrics): void {
  const open = new Set<Subscription>();
  const attach = (send: Send, end: () => void): Subscription => {
    const sub = hub.subscribe();
    open.add(sub);
    void pump(hub, sub, send, metrics)
      .catch(e => logEvent('error', 'stream.pump_failed', { id: sub.id, error: errorMessage(e) }))
      .finally(() => { open.delete(sub); end(); });
    return sub;
  };

  app.get(SSE_PATH, (req, reply) => {
    reply.hijack();
    const res = reply.raw;
    res.writeHead(200, {
      'content-type': 'text/event-stream',
      'cache-control': 'no-cache',
      connection: 'keep-alive',
      'x-accel-buffering': 'no',
    });
    res.flushHeaders();
    res.write(': connected\n\n');
    const sub = attach(payload => writeFrame(res, `data: ${payload}\n\n`), () => { if (!res.writableEnded) res.end(); });
    logEvent('info', 'stream.sse_open', { id: sub.id, reqId: req.id });
    res.on('close', () => hub.unsubscribe(sub));
  });

  const wss = new WebSocketServer({ noServer: true });
  wss.on('connection', ws => {
    const sub = attach(payload => sendWs(ws, payload), () => {
      if (ws.readyState === WebSocket.OPEN) ws.close(1001, 'stream ended');
    });
    logEvent('info', 'stream.ws_open', { id: sub.id });
    ws.on('close', () => hub.unsubscribe(sub));
    ws.on('error', e => logEvent('warn', 'stream.ws_error', { id: sub.id, error: errorMessage(e) }));
  });

  app.server.on('upgrade', (req, socket, head) => {
    const path = (req.url ?? '').split('?')[0];
    if (path !== WS_PATH) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(req, socket, head, ws => wss.emit('connection', ws, req));
  });

  // Plain GETs on the socket path are not upgrades.
  app.get(WS_PATH, async (_req, reply) => reply.code(426).send({ error: 'upgrade_required' }));

  app.addHook('preClose', async () => {
    for (const sub of [...open]) hub.unsubscribe(sub);
    for (const ws of wss.clients) ws.terminate();
    await new Promise<void>(resolve => wss.close(() => resolve()));
  });
}
