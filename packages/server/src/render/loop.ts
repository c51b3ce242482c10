// ============================================================================
// LaunchTrack — Render Loop
// ============================================================================
import { EventEmitter } from 'events';
import type { ChartFrame, ChartSlot, MetricKey, MonitorFrame, TelemetrySample, Viewport } from '@launchtrack/shared';
import type { HistoryBuffer } from '../pipeline/history.js';
import type { SampleQueue } from '../pipeline/queue.js';
import { renderChart } from './chart.js';
import type { MonitorView } from './view.js';

export interface RenderLoopOptions {
  intervalMs?: number;
  charts: ChartSlot[];
  viewport: Viewport;
}

/**
 * Consumer side of the pipeline. Each tick drains the queue into the history
 * and view model, then redraws every chart once for the whole batch.
 *
 * Emits `frame` (MonitorFrame) after each redraw.
 */
export class RenderLoop extends EventEmitter {
  private timer: ReturnType<typeof setInterval> | null = null;
  private slots: ChartSlot[];
  private latest: ChartFrame[];
  private dirty = false;
  private readonly intervalMs: number;
  private readonly viewport: Viewport;

  constructor(
    private readonly queue: SampleQueue<TelemetrySample>,
    private readonly history: HistoryBuffer,
    private readonly view: MonitorView,
    options: RenderLoopOptions,
  ) {
    super();
    this.intervalMs = options.intervalMs ?? 50;
    this.viewport = options.viewport;
    this.slots = options.charts.map(c => ({ ...c }));
    this.latest = this.slots.map(c => ({ ...c, primitives: [] }));
  }

  get running(): boolean { return this.timer !== null; }

  start() {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.intervalMs);
  }

  stop() {
    if (this.timer) { clearInterval(this.timer); this.timer = null; }
  }

  /** Process everything queued since the last tick. Returns the frame drawn, if any. */
  tick(): MonitorFrame | null {
    const batch = this.queue.drainAll();
    for (const sample of batch) {
      this.history.append(sample);
      this.view.apply(sample);
    }
    if (batch.length === 0 && !this.dirty) return null;

    this.dirty = false;
    this.latest = this.slots.map(slot => this.draw(slot));
    const frame: MonitorFrame = { snapshot: this.view.snapshot(), charts: this.charts() };
    this.emit('frame', frame);
    return frame;
  }

  charts(): ChartFrame[] {
    return this.latest.map(c => ({ ...c, primitives: [...c.primitives] }));
  }

  hasChart(id: string): boolean {
    return this.slots.some(s => s.id === id);
  }

  /** Returns false for an unknown chart id. The change shows on the next tick. */
  setMetric(id: string, metric: MetricKey): boolean {
    const slot = this.slots.find(s => s.id === id);
    if (!slot) return false;
    slot.metric = metric;
    this.dirty = true;
    return true;
  }

  /** Force a redraw on the next tick even if no samples arrive. */
  invalidate() {
    this.dirty = true;
  }

  private draw(slot: ChartSlot): ChartFrame {
    const { times, values } = this.history.series(slot.metric);
    return {
      id: slot.id,
      metric: slot.metric,
      primitives: renderChart(slot.metric, times, values, this.viewport.width, this.viewport.height),
    };
  }
}
