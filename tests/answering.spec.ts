import { describe, it, expect, vi, beforeEach } from 'vitest';

const requestMock = vi.hoisted(() => vi.fn());
vi.mock('undici', () => ({ request: requestMock }));

import { HttpAnsweringService } from '../src/answering/client.js';
import { QueryService, fallbackAnswer } from '../src/answering/query.js';
import { createPipelineMetrics } from '../src/observability/metrics.js';
import { AnsweringServiceUnavailable, ValidationError } from '../src/pipeline/errors.js';
import { counterValue, reading } from './helpers/fixtures.js';

function respond(statusCode: number, payload: unknown) {
  const dump = vi.fn(async () => undefined);
  return { statusCode, body: { json: async () => payload, dump }, dump };
}

describe('HttpAnsweringService', () => {
  beforeEach(() => {
    requestMock.mockReset();
  });

  it('posts the question with live context and parses the answer', async () => {
    requestMock.mockResolvedValueOnce(respond(200, { answer: ' Ventilate. ', sources: ['guide.pdf', 3], latency_ms: 12 }));
    const svc = new HttpAnsweringService('http://answering.test', 500);

    const out = await svc.answer('what should I do?', 420.5);

    expect(out).toEqual({ answer: 'Ventilate.', sources: ['guide.pdf'], latency_ms: 12 });
    const [url, opts] = requestMock.mock.calls[0];
    expect(url).toBe('http://answering.test/answer');
    expect(opts.method).toBe('POST');
    expect(JSON.parse(opts.body)).toEqual({ question: 'what should I do?', live_co2_context: 420.5 });
  });

  it('turns an error status into AnsweringServiceUnavailable', async () => {
    const res = respond(503, {});
    requestMock.mockResolvedValueOnce(res);
    const svc = new HttpAnsweringService('http://answering.test');
    await expect(svc.answer('q?', null)).rejects.toThrow('answering service unavailable: status 503');
    expect(res.dump).toHaveBeenCalledTimes(1);
  });

  it('wraps transport failures', async () => {
    requestMock.mockRejectedValueOnce(new Error('ECONNREFUSED'));
    const svc = new HttpAnsweringService('http://answering.test');
    const err = await svc.answer('q?', null).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(AnsweringServiceUnavailable);
    expect(err instanceof AnsweringServiceUnavailable ? err.statusCode : 0).toBe(502);
  });

  it('rejects a malformed body', async () => {
    requestMock.mockResolvedValueOnce(respond(200, { text: 'no answer field' }));
    const svc = new HttpAnsweringService('http://answering.test');
    await expect(svc.answer('q?', null)).rejects.toThrow('answering service unavailable: malformed response');
  });
});

describe('QueryService', () => {
  it('validates the question length', async () => {
    const q = new QueryService(null, () => null);
    await expect(q.ask('hi')).rejects.toBeInstanceOf(ValidationError);
    await expect(q.ask('x'.repeat(2001))).rejects.toThrow('invalid input: query.length');
    await expect(q.ask(42)).rejects.toThrow('invalid input: query.missing');
  });

  it('passes the trimmed question and latest co2 through', async () => {
    const answer = vi.fn(async () => ({ answer: 'ok', sources: [], latency_ms: 1 }));
    const q = new QueryService({ answer }, () => reading(431));
    expect(await q.ask('  is it safe?  ')).toEqual({ answer: 'ok', sources: [], latency_ms: 1 });
    expect(answer).toHaveBeenCalledWith('is it safe?', 431);
  });

  it('falls back to a template when the service fails', async () => {
    const metrics = createPipelineMetrics();
    const failing = { answer: async () => { throw new AnsweringServiceUnavailable('status 500'); } };
    const q = new QueryService(failing, () => reading(420.5, 's1'), metrics);
    const out = await q.ask('is it safe?');
    expect(out.answer).toBe(
      "The latest live reading is 420.5 ppm CO2 from 's1' (severity: danger, risk score 1.00). The answering service is currently unavailable; please retry shortly.",
    );
    expect(out.sources).toEqual([]);
    expect(await counterValue(metrics.answeringFallbacks)).toBe(1);
  });

  it('answers from the template when no service is configured', async () => {
    const q = new QueryService(null, () => null);
    expect(q.configured).toBe(false);
    expect((await q.ask('what now?')).answer).toBe(
      'No live reading is available yet. The answering service is currently unavailable; please retry shortly.',
    );
  });

  it('fallbackAnswer rounds the latency', () => {
    expect(fallbackAnswer(null, 1.23456).latency_ms).toBe(1.23);
  });
});
