import type { HistoryPoint } from '../pipeline/window.js';

export type Trend = 'increasing' | 'decreasing' | 'stable';

export type Prediction = {
  source: string;
  current_co2: number;
  predicted_co2_1h: number;
  trend: Trend;
  slope_ppm_per_hour: number;
  confidence: number; // r² of the fit, 0 when there is nothing to fit
  samples: number;
};

// Projected moves inside this band count as stable.
export const TREND_BAND_PPM = 15;

const round2 = (x: number) => Math.round(x * 100) / 100;

/**
 * Least-squares line through the window (timestamps in seconds), projected
 * one hour past the newest value. Points without a timestamp are left out
 * of the fit.
 */
export function predict(source: string, points: HistoryPoint[]): Prediction | null {
  const last = points[points.length - 1];
  if (!last) return null;
  const usable = points.filter(p => Number.isFinite(p.timestamp));

  let slope = 0;
  let r2 = 0;
  if (usable.length >= 2) {
    const n = usable.length;
    const mt = usable.reduce((a, p) => a + p.timestamp, 0) / n;
    const mv = usable.reduce((a, p) => a + p.co2_ppm, 0) / n;
    let sxx = 0;
    let sxy = 0;
    let syy = 0;
    for (const p of usable) {
      const dt = p.timestamp - mt;
      const dv = p.co2_ppm - mv;
      sxx += dt * dt;
      sxy += dt * dv;
      syy += dv * dv;
    }
    if (sxx > 0) {
      slope = sxy / sxx;
      r2 = syy > 0 ? (sxy * sxy) / (sxx * syy) : 1;
    }
  }

  const perHour = slope * 3600;
  const predicted = Math.max(0, round2(last.co2_ppm + perHour));
  const delta = predicted - last.co2_ppm;
  const trend: Trend = delta > TREND_BAND_PPM ? 'increasing' : delta < -TREND_BAND_PPM ? 'decreasing' : 'stable';
  return {
    source,
    current_co2: last.co2_ppm,
    predicted_co2_1h: predicted,
    trend,
    slope_ppm_per_hour: round2(perHour),
    confidence: round2(r2),
    samples: points.length,
  };
}
