export const SEVERITIES = ['safe', 'warning', 'danger', 'critical'] as const;
export type Severity = (typeof SEVERITIES)[number];

export type RawReading = Readonly<{
  source: string;
  co2_ppm: number;
  location?: string;
  timestamp: number; // unix epoch seconds
}>;

export type EnrichedReading = Readonly<RawReading & {
  risk_score: number; // [0, 1]
  carbon_score: number; // relative to baseline, may be negative
  severity: Severity;
  anomaly: boolean;
  synthetic?: boolean; // heartbeat filler, never persisted
}>;

export type StoredReading = EnrichedReading & Readonly<{ id: string }>;

export type AlertType = 'high_co2' | 'critical_risk';
export type AlertSeverity = 'warning' | 'critical';

export type AlertRecord = Readonly<{
  id: string;
  type: AlertType;
  severity: AlertSeverity;
  message: string;
  source: string;
  co2_ppm: number;
  risk_score: number;
  timestamp: number;
  resolved: boolean;
  resolved_at?: number;
}>;

// One frame of the live feed
export type LiveMessage = {
  source: string;
  co2_ppm: number;
  risk_score: number;
  carbon_score: number;
  severity: Severity;
  anomaly: boolean;
  timestamp: number;
};

export function toLiveMessage(r: EnrichedReading): LiveMessage {
  return {
    source: r.source,
    co2_ppm: r.co2_ppm,
    risk_score: r.risk_score,
    carbon_score: r.carbon_score,
    severity: r.severity,
    anomaly: r.anomaly,
    timestamp: r.timestamp,
  };
}

export function isSeverity(v: unknown): v is Severity {
  return SEVERITIES.some(s => s === v);
}

export function isAlertType(v: unknown): v is AlertType {
  return v === 'high_co2' || v === 'critical_risk';
}

export function isAlertSeverity(v: unknown): v is AlertSeverity {
  return v === 'warning' || v === 'critical';
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}
