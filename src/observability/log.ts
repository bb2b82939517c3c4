export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const ORDER: Record<LogLevel | 'silent', number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

function isLevel(v: string): v is LogLevel | 'silent' {
  return Object.prototype.hasOwnProperty.call(ORDER, v);
}

function threshold(): number {
  const v = (process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(v) ? ORDER[v] : ORDER.info;
}

/**
 * One JSON line per event: `{ts, level, at, ...fields}`. `at` names the
 * call site in dotted form (`ingest.rejected`). Values listed in
 * LOG_REDACT_LIST are replaced in the serialized line.
 */
export function logEvent(level: LogLevel, at: string, fields: Record<string, unknown> = {}): void {
  if (ORDER[level] < threshold()) return;
  const line = { ts: new Date().toISOString(), level, at, ...fields };
  let out = JSON.stringify(line);
  const redactList = String(process.env.LOG_REDACT_LIST || '').split(',').map(s => s.trim()).filter(Boolean);
  for (const needle of redactList) out = out.split(needle).join('[REDACTED]');
  if (level === 'error') console.error(out);
  else if (level === 'warn') console.warn(out);
  else console.log(out);
}
