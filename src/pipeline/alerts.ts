import { randomUUID } from 'node:crypto';
import type { Thresholds } from '../config/pipeline.js';
import type { AlertRecord, AlertSeverity, AlertType, EnrichedReading } from './schemas.js';

export type AlertTransition =
  | { kind: 'raised'; record: AlertRecord }
  | { kind: 'resolved'; record: AlertRecord };

type Rule = {
  type: AlertType;
  holds: (r: EnrichedReading) => boolean;
  severity: (r: EnrichedReading) => AlertSeverity;
  message: (r: EnrichedReading) => string;
};

function rules(t: Thresholds): Rule[] {
  return [
    {
      type: 'high_co2',
      holds: r => r.co2_ppm >= t.danger,
      severity: r => (r.severity === 'critical' ? 'critical' : 'warning'),
      message: r => `CO2 level at ${r.co2_ppm.toFixed(1)} ppm from '${r.source}' exceeds safe threshold (${t.danger} ppm). Risk score: ${r.risk_score.toFixed(2)}.`,
    },
    {
      type: 'critical_risk',
      holds: r => r.risk_score >= t.criticalRiskCutoff,
      severity: () => 'critical',
      message: r => `Risk score ${r.risk_score.toFixed(2)} from '${r.source}' is critically high. Immediate action required.`,
    },
  ];
}

/**
 * Threshold-crossing detector. One {inactive, active} machine per
 * (source, alert type): a record is raised on the first qualifying reading,
 * held while the condition persists, and resolved on the first reading
 * where it no longer does.
 */
export class AlertEvaluator {
  private readonly open = new Map<string, AlertRecord>();
  private readonly rules: Rule[];

  constructor(thresholds: Thresholds, private readonly newId: () => string = randomUUID) {
    this.rules = rules(thresholds);
  }

  evaluate(r: EnrichedReading): AlertTransition[] {
    const out: AlertTransition[] = [];
    for (const rule of this.rules) {
      const key = `${r.source}\u0000${rule.type}`;
      const current = this.open.get(key);
      const holds = rule.holds(r);
      if (holds && !current) {
        const record: AlertRecord = Object.freeze({
          id: this.newId(),
          type: rule.type,
          severity: rule.severity(r),
          message: rule.message(r),
          source: r.source,
          co2_ppm: r.co2_ppm,
          risk_score: r.risk_score,
          timestamp: r.timestamp,
          resolved: false,
        });
        this.open.set(key, record);
        out.push({ kind: 'raised', record });
      } else if (!holds && current) {
        this.open.delete(key);
        out.push({ kind: 'resolved', record: Object.freeze({ ...current, resolved: true, resolved_at: r.timestamp }) });
      }
    }
    return out;
  }

  active(source?: string): AlertRecord[] {
    const all = [...this.open.values()];
    return source === undefined ? all : all.filter(a => a.source === source);
  }
}
