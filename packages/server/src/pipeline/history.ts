// ============================================================================
// LaunchTrack — Sample History
// ============================================================================
import { METRIC_KEYS, type MetricKey, type TelemetrySample } from '@launchtrack/shared';
import { RingBuffer } from './ring-buffer.js';

export interface MetricSeries {
  times: number[];
  values: number[];
}

/**
 * Per-metric ring buffers that advance in lockstep: every appended row writes
 * the time ring and all metric rings, so index i refers to the same sample in
 * each. A metric the sample did not carry is stored as a gap (null).
 */
export class HistoryBuffer {
  private readonly time: RingBuffer<number>;
  private readonly metrics: Record<MetricKey, RingBuffer<number | null>>;
  private origin: number | null = null;

  constructor(readonly capacity = 500, private readonly clock: () => number = Date.now) {
    this.time = new RingBuffer<number>(capacity);
    this.metrics = {
      altitude: new RingBuffer<number | null>(capacity),
      velocity: new RingBuffer<number | null>(capacity),
      acceleration: new RingBuffer<number | null>(capacity),
      temperature: new RingBuffer<number | null>(capacity),
      pressure: new RingBuffer<number | null>(capacity),
    };
  }

  get size(): number {
    return this.time.size;
  }

  /** Returns false when the sample had nothing to plot. */
  append(sample: TelemetrySample): boolean {
    const hasMetric = METRIC_KEYS.some(key => sample[key] !== undefined);
    if (!hasMetric && sample.flightTime === undefined) return false;

    this.time.push(sample.flightTime ?? this.elapsedSeconds());
    for (const key of METRIC_KEYS) {
      this.metrics[key].push(sample[key] ?? null);
    }
    return true;
  }

  series(metric: MetricKey): MetricSeries {
    const ring = this.metrics[metric];
    const times: number[] = [];
    const values: number[] = [];
    for (let i = 0; i < this.time.size; i++) {
      const t = this.time.get(i);
      const v = ring.get(i);
      if (t === undefined || v === undefined || v === null) continue;
      times.push(t);
      values.push(v);
    }
    return { times, values };
  }

  clear(): void {
    this.time.clear();
    for (const key of METRIC_KEYS) this.metrics[key].clear();
    this.origin = null;
  }

  private elapsedSeconds(): number {
    const now = this.clock();
    if (this.origin === null) this.origin = now;
    return Math.round(now - this.origin) / 1000;
  }
}
