export type Thresholds = {
  warning: number;
  danger: number;
  critical: number;
  baseline: number; // pre-industrial reference for carbon_score
  criticalRiskCutoff: number; // risk_score at which critical_risk opens
};

export type HeartbeatConfig = {
  cadenceMs: number;
  jitterPpm: number;
  source: string;
  seedPpm: number; // used before anything has been published
};

export type PipelineConfig = {
  thresholds: Thresholds;
  anomalyZ: number;
  anomalyMinSamples: number;
  historyCapacity: number;
  historyMaxSources: number;
  subscriberQueueMax: number;
  heartbeat: HeartbeatConfig;
};

export type ServerConfig = {
  port: number;
  host: string;
  redisUrl: string;
  alertQueueEnabled: boolean;
  answeringUrl: string;
  answeringTimeoutMs: number;
  inputDir: string;
  inboxPollMs: number;
  tracingEnabled: boolean;
  httpLogs: boolean;
  maintenance: boolean; // /ready answers 503 while set
};

export type Env = Record<string, string | undefined>;

function num(env: Env, k: string, d: number): number {
  const raw = env[k];
  if (raw === undefined || raw.trim() === '') return d;
  const n = Number(raw);
  return Number.isFinite(n) ? n : d;
}

function int(env: Env, k: string, d: number, min: number): number {
  return Math.max(min, Math.floor(num(env, k, d)));
}

function flag(env: Env, k: string): boolean {
  return (env[k] ?? 'false') === 'true';
}

function str(env: Env, k: string, d: string): string {
  const v = env[k]?.trim();
  return v ? v : d;
}

export function readPipelineConfig(env: Env = process.env): PipelineConfig {
  const thresholds: Thresholds = {
    warning: num(env, 'CO2_WARNING_THRESHOLD', 350),
    danger: num(env, 'CO2_DANGER_THRESHOLD', 400),
    critical: num(env, 'CO2_CRITICAL_THRESHOLD', 500),
    baseline: num(env, 'CO2_BASELINE_PPM', 350),
    criticalRiskCutoff: num(env, 'CRITICAL_RISK_CUTOFF', 0.9),
  };
  const errs = checkThresholds(thresholds);
  if (errs.length) throw new Error(`invalid threshold configuration: ${errs.join(', ')}`);
  return {
    thresholds,
    anomalyZ: Math.max(0, num(env, 'ANOMALY_Z', 2.5)),
    anomalyMinSamples: int(env, 'ANOMALY_MIN_SAMPLES', 5, 2),
    historyCapacity: int(env, 'HISTORY_CAPACITY', 20, 2),
    historyMaxSources: int(env, 'HISTORY_MAX_SOURCES', 10_000, 1),
    subscriberQueueMax: int(env, 'SUBSCRIBER_QUEUE_MAX', 64, 1),
    heartbeat: {
      cadenceMs: int(env, 'HEARTBEAT_MS', 2000, 100),
      jitterPpm: Math.max(0, num(env, 'HEARTBEAT_JITTER_PPM', 5)),
      source: str(env, 'HEARTBEAT_SOURCE', 'live-sensor'),
      seedPpm: Math.max(0, num(env, 'HEARTBEAT_SEED_PPM', 400)),
    },
  };
}

export function checkThresholds(t: Thresholds): string[] {
  const errs: string[] = [];
  if (!(t.warning > 0)) errs.push('warning.nonpositive');
  if (!(t.danger > t.warning)) errs.push('danger.not_above_warning');
  if (!(t.critical > t.danger)) errs.push('critical.not_above_danger');
  if (!(t.baseline > 0)) errs.push('baseline.nonpositive');
  if (!(t.criticalRiskCutoff > 0 && t.criticalRiskCutoff <= 1)) errs.push('critical_risk_cutoff.range');
  return errs;
}

export function readServerConfig(env: Env = process.env): ServerConfig {
  return {
    port: int(env, 'PORT', 8000, 0),
    host: str(env, 'HOST', '0.0.0.0'),
    redisUrl: str(env, 'REDIS_URL', ''),
    alertQueueEnabled: flag(env, 'ALERT_QUEUE_ENABLED'),
    answeringUrl: str(env, 'ANSWERING_URL', '').replace(/\/+$/, ''),
    answeringTimeoutMs: int(env, 'ANSWERING_TIMEOUT_MS', 8000, 100),
    inputDir: str(env, 'PIPELINE_INPUT_DIR', ''),
    inboxPollMs: int(env, 'INBOX_POLL_MS', 2000, 100),
    tracingEnabled: flag(env, 'TRACING_ENABLED'),
    httpLogs: flag(env, 'HTTP_LOGS'),
    maintenance: flag(env, 'MAINTENANCE_MODE'),
  };
}
