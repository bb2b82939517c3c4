import { describe, it, expect } from 'vitest';
import { predict } from '../src/answering/forecast.js';
import type { HistoryPoint } from '../src/pipeline/window.js';

const pts = (...pairs: Array<[number, number]>): HistoryPoint[] =>
  pairs.map(([timestamp, co2_ppm]) => ({ timestamp, co2_ppm }));

describe('predict', () => {
  it('projects a rising window an hour ahead', () => {
    expect(predict('s1', pts([0, 400], [60, 410], [120, 420]))).toEqual({
      source: 's1',
      current_co2: 420,
      predicted_co2_1h: 1020,
      trend: 'increasing',
      slope_ppm_per_hour: 600,
      confidence: 1,
      samples: 3,
    });
  });

  it('calls a gentle decline decreasing once it leaves the band', () => {
    const p = predict('s1', pts([0, 500], [3600, 480]));
    expect(p?.predicted_co2_1h).toBe(460);
    expect(p?.slope_ppm_per_hour).toBe(-20);
    expect(p?.trend).toBe('decreasing');
  });

  it('keeps a flat window stable', () => {
    const p = predict('s1', pts([0, 400], [60, 400], [120, 400]));
    expect(p?.predicted_co2_1h).toBe(400);
    expect(p?.trend).toBe('stable');
    expect(p?.slope_ppm_per_hour).toBe(0);
  });

  it('never projects below zero', () => {
    const p = predict('s1', pts([0, 100], [60, 50]));
    expect(p?.predicted_co2_1h).toBe(0);
    expect(p?.trend).toBe('decreasing');
  });

  it('holds the current value when there is nothing to fit', () => {
    expect(predict('s1', pts([Number.NaN, 410], [Number.NaN, 415]))).toEqual({
      source: 's1',
      current_co2: 415,
      predicted_co2_1h: 415,
      trend: 'stable',
      slope_ppm_per_hour: 0,
      confidence: 0,
      samples: 2,
    });
    expect(predict('s1', pts([5, 410]))?.confidence).toBe(0);
  });

  it('returns null for an empty window', () => {
    expect(predict('s1', [])).toBeNull();
  });
});
