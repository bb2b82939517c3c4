import { describe, it, expect, vi, afterEach } from 'vitest';
import { checkThresholds, readPipelineConfig, readServerConfig } from '../src/config/pipeline.js';
import { logEvent } from '../src/observability/log.js';
import { withEnv } from './helpers/mockEnv.js';

describe('readPipelineConfig', () => {
  it('falls back to defaults', () => {
    const c = readPipelineConfig({});
    expect(c.thresholds).toEqual({ warning: 350, danger: 400, critical: 500, baseline: 350, criticalRiskCutoff: 0.9 });
    expect(c.anomalyZ).toBe(2.5);
    expect(c.anomalyMinSamples).toBe(5);
    expect(c.historyCapacity).toBe(20);
    expect(c.historyMaxSources).toBe(10_000);
    expect(c.heartbeat).toEqual({ cadenceMs: 2000, jitterPpm: 5, source: 'live-sensor', seedPpm: 400 });
  });

  it('reads overrides and clamps floors', () => {
    const c = readPipelineConfig({
      CO2_DANGER_THRESHOLD: '450',
      HEARTBEAT_MS: '10',
      HISTORY_CAPACITY: '1',
      ANOMALY_Z: 'abc',
      HEARTBEAT_SOURCE: '  roof-1  ',
    });
    expect(c.thresholds.danger).toBe(450);
    expect(c.heartbeat.cadenceMs).toBe(100);
    expect(c.historyCapacity).toBe(2);
    expect(c.anomalyZ).toBe(2.5);
    expect(c.heartbeat.source).toBe('roof-1');
  });

  it('refuses thresholds out of order', () => {
    expect(() => readPipelineConfig({ CO2_WARNING_THRESHOLD: '400' }))
      .toThrow('invalid threshold configuration: danger.not_above_warning');
  });

  it('checkThresholds lists every problem', () => {
    expect(checkThresholds({ warning: 0, danger: 0, critical: 0, baseline: -1, criticalRiskCutoff: 1.5 })).toEqual([
      'warning.nonpositive',
      'danger.not_above_warning',
      'critical.not_above_danger',
      'baseline.nonpositive',
      'critical_risk_cutoff.range',
    ]);
  });
});

describe('readServerConfig', () => {
  it('reads the server settings', () => {
    const c = readServerConfig({ PORT: '9100', ANSWERING_URL: 'http://answering.test//', ALERT_QUEUE_ENABLED: 'true' });
    expect(c.port).toBe(9100);
    expect(c.host).toBe('0.0.0.0');
    expect(c.answeringUrl).toBe('http://answering.test');
    expect(c.alertQueueEnabled).toBe(true);
    expect(c.redisUrl).toBe('');
    expect(c.tracingEnabled).toBe(false);
    expect(c.maintenance).toBe(false);
  });

  it('turns on maintenance mode only for "true"', () => {
    expect(readServerConfig({ MAINTENANCE_MODE: 'true' }).maintenance).toBe(true);
    expect(readServerConfig({ MAINTENANCE_MODE: '1' }).maintenance).toBe(false);
  });
});

describe('logEvent', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes one JSON line with redaction', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    withEnv({ LOG_LEVEL: 'info', LOG_REDACT_LIST: 'test-secret' }, () => {
      logEvent('info', 'auth.checked', { token: 'test-secret' });
    });
    expect(spy).toHaveBeenCalledTimes(1);
    const line = JSON.parse(String(spy.mock.calls[0][0]));
    expect(line.level).toBe('info');
    expect(line.at).toBe('auth.checked');
    expect(line.token).toBe('[REDACTED]');
  });

  it('drops events below LOG_LEVEL', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    withEnv({ LOG_LEVEL: 'warn', LOG_REDACT_LIST: undefined }, () => {
      logEvent('info', 'quiet');
      logEvent('warn', 'loud');
    });
    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
