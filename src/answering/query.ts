import type { PipelineMetrics } from '../observability/metrics.js';
import { logEvent } from '../observability/log.js';
import { ValidationError, errorMessage } from '../pipeline/errors.js';
import type { EnrichedReading } from '../pipeline/schemas.js';
import type { Answer, AnsweringService } from './client.js';

export const QUERY_MIN = 3;
export const QUERY_MAX = 2000;

function round2(x: number): number { return Math.round(x * 100) / 100; }

export function fallbackAnswer(reading: EnrichedReading | null, latencyMs: number): Answer {
  const context = reading
    ? `The latest live reading is ${reading.co2_ppm.toFixed(1)} ppm CO2 from '${reading.source}' (severity: ${reading.severity}, risk score ${reading.risk_score.toFixed(2)}).`
    : 'No live reading is available yet.';
  return {
    answer: `${context} The answering service is currently unavailable; please retry shortly.`,
    sources: [],
    latency_ms: round2(latencyMs),
  };
}

/**
 * Front door for questions. Supplies the latest real CO2 value as live
 * context; when there is no collaborator, or it fails, answers from the
 * fallback template instead of failing the caller.
 */
export class QueryService {
  constructor(
    private readonly service: AnsweringService | null,
    private readonly live: () => EnrichedReading | null,
    private readonly metrics?: PipelineMetrics,
  ) {}

  get configured(): boolean { return this.service !== null; }

  async ask(question: unknown): Promise<Answer> {
    if (typeof question !== 'string') throw new ValidationError(['query.missing']);
    const q = question.trim();
    if (q.length < QUERY_MIN || q.length > QUERY_MAX) throw new ValidationError(['query.length']);
    const reading = this.live();
    const t0 = Date.now();
    if (!this.service) {
      this.metrics?.answeringFallbacks.inc();
      return fallbackAnswer(reading, Date.now() - t0);
    }
    try {
      return await this.service.answer(q, reading ? reading.co2_ppm : null);
    } catch (e) {
      this.metrics?.answeringFallbacks.inc();
      logEvent('warn', 'query.answering_unavailable', { error: errorMessage(e) });
      return fallbackAnswer(reading, Date.now() - t0);
    }
  }
}
