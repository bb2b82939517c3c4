import type { Thresholds } from '../config/pipeline.js';
import { riskScore } from '../pipeline/extract.js';
import type { EnrichedReading, Severity } from '../pipeline/schemas.js';
import templates from './recommendations.json' with { type: 'json' };

export type Recommendation = {
  title: string;
  recommendation: string;
  actions: string[];
  urgency: string;
  co2_context: number;
  severity: Severity;
};

export type RiskAssessment = {
  risk_score: number;
  risk_level: Severity;
  co2_ppm: number;
  threshold: number;
  message: string;
  source: string;
  timestamp: number;
};

const RISK_MESSAGES: Record<Severity, string> = {
  safe: 'CO2 levels are within safe range. No action required.',
  warning: 'CO2 is elevated. Consider improving ventilation.',
  danger: 'Dangerous CO2 level detected. Take immediate action.',
  critical: 'CRITICAL: CO2 is at hazardous levels. Evacuate if necessary.',
};

export function assessRisk(reading: EnrichedReading, t: Thresholds): RiskAssessment {
  return {
    risk_score: riskScore(reading.co2_ppm, t.danger),
    risk_level: reading.severity,
    co2_ppm: reading.co2_ppm,
    threshold: t.danger,
    message: RISK_MESSAGES[reading.severity],
    source: reading.source,
    timestamp: reading.timestamp,
  };
}

export function recommend(reading: EnrichedReading): Recommendation {
  const tpl = templates[reading.severity];
  return {
    title: tpl.title,
    recommendation: tpl.recommendation,
    actions: [...tpl.actions],
    urgency: tpl.urgency,
    co2_context: reading.co2_ppm,
    severity: reading.severity,
  };
}
