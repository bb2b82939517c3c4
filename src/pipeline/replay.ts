import { createReadStream } from 'node:fs';
import { readdir, rename } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';
import { logEvent } from '../observability/log.js';
import { ValidationError, errorMessage } from './errors.js';
import type { IngestionGateway } from './gateway.js';

export type ReplaySummary = {
  processed: number;
  skipped: number; // lines that were not JSON
  rejected: number; // JSON that failed validation
};

type Ingest = Pick<IngestionGateway, 'ingest'>;

/**
 * Pushes every reading of a JSONL log through the gateway, in file order and
 * one at a time. A line may also hold a JSON array of readings. Blank lines
 * are ignored.
 */
export async function replayFile(gateway: Ingest, file: string): Promise<ReplaySummary> {
  const summary: ReplaySummary = { processed: 0, skipped: 0, rejected: 0 };
  const lines = createInterface({ input: createReadStream(file, { encoding: 'utf8' }), crlfDelay: Infinity });
  let lineNo = 0;
  for await (const line of lines) {
    lineNo++;
    const text = line.trim();
    if (!text) continue;
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      summary.skipped++;
      logEvent('warn', 'replay.malformed_line', { file, line: lineNo, error: errorMessage(e) });
      continue;
    }
    for (const item of Array.isArray(parsed) ? parsed : [parsed]) {
      try {
        await gateway.ingest(item);
        summary.processed++;
      } catch (e) {
        if (!(e instanceof ValidationError)) throw e;
        summary.rejected++;
        logEvent('warn', 'replay.rejected', { file, line: lineNo, errs: e.errs });
      }
    }
  }
  logEvent('info', 'replay.done', { file, ...summary });
  return summary;
}

const INBOX_PATTERN = /\.jsonl?$/i;

/**
 * Polls `dir` for `*.json` / `*.jsonl` drops, replays each (oldest name
 * first) and renames it to `<name>.done`. A file is claimed as
 * `<name>.processing` before replay, so it is read at most once even when
 * the final rename fails or another watcher shares the directory.
 */
export function watchInbox(gateway: Ingest, dir: string, pollMs = 2000): () => void {
  let busy = false;
  const tick = async () => {
    if (busy) return;
    busy = true;
    try {
      const names = (await readdir(dir)).filter(n => INBOX_PATTERN.test(n)).sort();
      for (const name of names) {
        const file = path.join(dir, name);
        const claimed = `${file}.processing`;
        try {
          await rename(file, claimed);
        } catch (e) {
          logEvent('warn', 'inbox.claim_failed', { file, error: errorMessage(e) });
          continue;
        }
        await replayFile(gateway, claimed);
        await rename(claimed, `${file}.done`);
      }
    } finally {
      busy = false;
    }
  };
  const id = setInterval(() => {
    tick().catch(e => logEvent('error', 'inbox.failed', { dir, error: errorMessage(e) }));
  }, pollMs);
  logEvent('info', 'inbox.watching', { dir, pollMs });
  return () => clearInterval(id);
}
