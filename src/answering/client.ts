import { request } from 'undici';
import { AnsweringServiceUnavailable, errorMessage } from '../pipeline/errors.js';
import { isRecord } from '../pipeline/schemas.js';

export type Answer = {
  answer: string;
  sources: string[];
  latency_ms: number;
};

/** Question + live CO2 context in, grounded answer out. */
export interface AnsweringService {
  answer(question: string, liveCo2: number | null): Promise<Answer>;
}

export function parseAnswer(v: unknown, measuredMs: number): Answer | null {
  if (!isRecord(v) || typeof v.answer !== 'string') return null;
  const sources = Array.isArray(v.sources) ? v.sources.filter((s): s is string => typeof s === 'string') : [];
  const latency = typeof v.latency_ms === 'number' && Number.isFinite(v.latency_ms) ? v.latency_ms : measuredMs;
  return { answer: v.answer.trim(), sources, latency_ms: latency };
}

/**
 * Client for an answering service exposing `POST <base>/answer` with
 * `{question, live_co2_context}`. Any transport, status or shape problem
 * surfaces as AnsweringServiceUnavailable.
 */
export class HttpAnsweringService implements AnsweringService {
  constructor(private readonly baseUrl: string, private readonly timeoutMs = 8000) {}

  async answer(question: string, liveCo2: number | null): Promise<Answer> {
    const t0 = Date.now();
    let payload: unknown;
    try {
      const res = await request(`${this.baseUrl}/answer`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ question, live_co2_context: liveCo2 }),
        headersTimeout: this.timeoutMs,
        bodyTimeout: this.timeoutMs,
      });
      if (res.statusCode >= 400) {
        await res.body.dump();
        throw new AnsweringServiceUnavailable(`status ${res.statusCode}`);
      }
      payload = await res.body.json();
    } catch (e) {
      if (e instanceof AnsweringServiceUnavailable) throw e;
      throw new AnsweringServiceUnavailable(errorMessage(e), e);
    }
    const parsed = parseAnswer(payload, Date.now() - t0);
    if (!parsed) throw new AnsweringServiceUnavailable('malformed response');
    return parsed;
  }
}
