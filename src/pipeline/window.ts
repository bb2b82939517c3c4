export type WindowStats = { mean: number; stddev: number; count: number };
export type HistoryPoint = { timestamp: number; co2_ppm: number };

// Fixed-capacity ring of the most recent co2 values for one source.
export class HistoryWindow {
  private readonly buf: Float64Array;
  private readonly at: Float64Array;
  private i = 0;
  private n = 0;

  constructor(readonly capacity = 20) {
    if (!Number.isInteger(capacity) || capacity < 1) throw new RangeError(`history capacity must be a positive integer, got ${capacity}`);
    this.buf = new Float64Array(capacity);
    this.at = new Float64Array(capacity);
  }

  push(value: number, timestamp = Number.NaN): void {
    this.buf[this.i] = value;
    this.at[this.i] = timestamp;
    this.i = (this.i + 1) % this.capacity;
    this.n = Math.min(this.n + 1, this.capacity);
  }

  get size(): number { return this.n; }

  /** Oldest first. */
  values(): number[] {
    const out = new Array<number>(this.n);
    for (let k = 0; k < this.n; k++) out[k] = this.buf[(this.i - this.n + k + this.capacity) % this.capacity];
    return out;
  }

  /** Oldest first; `timestamp` is NaN for values pushed without one. */
  points(): HistoryPoint[] {
    const out: HistoryPoint[] = [];
    for (let k = 0; k < this.n; k++) {
      const j = (this.i - this.n + k + this.capacity) % this.capacity;
      out.push({ timestamp: this.at[j], co2_ppm: this.buf[j] });
    }
    return out;
  }

  // Population stddev; the occupied slots are always 0..n-1.
  stats(): WindowStats {
    const n = this.n;
    if (n === 0) return { mean: 0, stddev: 0, count: 0 };
    let sum = 0;
    for (let k = 0; k < n; k++) sum += this.buf[k];
    const mean = sum / n;
    let sq = 0;
    for (let k = 0; k < n; k++) { const d = this.buf[k] - mean; sq += d * d; }
    return { mean, stddev: Math.sqrt(sq / n), count: n };
  }
}

export const DEFAULT_MAX_SOURCES = 10_000;

/**
 * One window per source. Past `maxSources` the least recently written
 * source is forgotten.
 */
export class HistoryBook {
  private readonly windows = new Map<string, HistoryWindow>();

  constructor(private readonly capacity = 20, readonly maxSources = DEFAULT_MAX_SOURCES) {
    if (!Number.isInteger(maxSources) || maxSources < 1) throw new RangeError(`max sources must be a positive integer, got ${maxSources}`);
  }

  get(source: string): HistoryWindow {
    let w = this.windows.get(source);
    if (w) {
      // Map keeps insertion order, so re-inserting marks it most recent.
      this.windows.delete(source);
    } else {
      w = new HistoryWindow(this.capacity);
      if (this.windows.size >= this.maxSources) {
        const oldest = this.windows.keys().next();
        if (!oldest.done) this.windows.delete(oldest.value);
      }
    }
    this.windows.set(source, w);
    return w;
  }

  peek(source: string): HistoryWindow | undefined {
    return this.windows.get(source);
  }

  get sources(): number { return this.windows.size; }
}
