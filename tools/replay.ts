import 'dotenv/config';
import { readPipelineConfig } from '../src/config/pipeline.js';
import { logEvent } from '../src/observability/log.js';
import { createPipeline, errorMessage, replayFile, type ReplaySummary } from '../src/pipeline/index.js';
import { MemoryAlertStore } from '../src/sinks/alerts.js';
import { MemoryRecordStore } from '../src/sinks/records.js';

// Usage: tsx tools/replay.ts <file.jsonl> [more files...]
// Replays recorded readings through a fresh in-memory pipeline and prints
// a summary with the alerts they raised.
const files = process.argv.slice(2);
if (!files.length) {
  console.error('usage: replay <file.jsonl> [...files]');
  process.exit(2);
}

const records = new MemoryRecordStore();
const alerts = new MemoryAlertStore();
const pipeline = createPipeline(readPipelineConfig(), { records, alertSink: alerts });

const perFile: Record<string, ReplaySummary> = {};
try {
  for (const file of files) perFile[file] = await replayFile(pipeline.gateway, file);
} catch (e) {
  logEvent('error', 'replay.failed', { error: errorMessage(e) });
  process.exit(1);
}

await pipeline.gateway.alertsSettled();
const stored = await records.query({ limit: 1 });
const raised = await alerts.list({ limit: 500 });
console.log(JSON.stringify({
  files: perFile,
  latest: stored[0] ?? null,
  alerts: { total: raised.length, active: raised.filter(a => !a.resolved).length },
}, null, 2));
