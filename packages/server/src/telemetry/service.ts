// ============================================================================
// LaunchTrack Telemetry Monitor
// ============================================================================
import { EventEmitter } from 'events';
import type {
  ChartFrame, ChartSlot, ConnectResult, MetricKey, MonitorFrame, MonitorSnapshot,
  SourceAvailability, SourceConfig, TelemetrySample, Viewport,
} from '@launchtrack/shared';
import { AcquisitionLoop } from '../pipeline/acquisition.js';
import { HistoryBuffer, type MetricSeries } from '../pipeline/history.js';
import { SampleQueue } from '../pipeline/queue.js';
import { RenderLoop } from '../render/loop.js';
import { MonitorView } from '../render/view.js';
import { createSource, sourceAvailability, type SourceOptions } from '../sources/factory.js';
import type { DataSource } from '../sources/types.js';

const LINK_CHECK_MS = 1000;

export const DEFAULT_CHARTS: ChartSlot[] = [
  { id: 'graph1', metric: 'altitude' },
  { id: 'graph2', metric: 'velocity' },
];

export interface TelemetryMonitorOptions {
  historyCapacity?: number;
  acquisitionIntervalMs?: number;
  renderIntervalMs?: number;
  viewport?: Viewport;
  charts?: ChartSlot[];
  sources?: SourceOptions;
  /** Swap in a custom source builder, e.g. for tests. */
  sourceFactory?: (config: SourceConfig, options: SourceOptions) => DataSource;
}

/**
 * Owns the single live data source and the pipeline around it:
 * source -> AcquisitionLoop -> SampleQueue -> RenderLoop -> history/view/charts.
 *
 * Events: `frame` (MonitorFrame), `status` (MonitorSnapshot).
 */
export class TelemetryMonitor extends EventEmitter {
  private readonly queue = new SampleQueue<TelemetrySample>();
  private readonly history: HistoryBuffer;
  private readonly view = new MonitorView();
  private readonly renderer: RenderLoop;
  private readonly acquisitionIntervalMs: number;
  private readonly sourceOptions: SourceOptions;
  private readonly sourceFactory: (config: SourceConfig, options: SourceOptions) => DataSource;
  private source: DataSource | null = null;
  private acquisition: AcquisitionLoop | null = null;
  private linkWatch: ReturnType<typeof setInterval> | null = null;
  // Serializes connect/disconnect so two requests never interleave
  private transition: Promise<unknown> = Promise.resolve();

  constructor(options: TelemetryMonitorOptions = {}) {
    super();
    this.history = new HistoryBuffer(options.historyCapacity ?? 500);
    this.acquisitionIntervalMs = options.acquisitionIntervalMs ?? 50;
    this.sourceOptions = options.sources ?? {};
    this.sourceFactory = options.sourceFactory ?? createSource;
    this.renderer = new RenderLoop(this.queue, this.history, this.view, {
      intervalMs: options.renderIntervalMs ?? 50,
      charts: options.charts ?? DEFAULT_CHARTS,
      viewport: options.viewport ?? { width: 800, height: 240 },
    });
    this.renderer.on('frame', (frame: MonitorFrame) => this.emit('frame', frame));
  }

  get connected(): boolean {
    return this.source?.connected ?? false;
  }

  get activeSource(): DataSource | null {
    return this.source;
  }

  start() {
    this.renderer.start();
    if (!this.linkWatch) this.linkWatch = setInterval(() => {
      this.checkLink().catch(err => console.error('📡 link check failed:', err));
    }, LINK_CHECK_MS);
  }

  async stop(): Promise<void> {
    this.renderer.stop();
    if (this.linkWatch) { clearInterval(this.linkWatch); this.linkWatch = null; }
    await this.disconnect();
  }

  connect(config: SourceConfig): Promise<ConnectResult> {
    return this.serialize(() => this.doConnect(config));
  }

  disconnect(): Promise<void> {
    return this.serialize(() => this.doDisconnect());
  }

  /** Run the render step now instead of waiting for the timer. */
  tick(): MonitorFrame | null {
    return this.renderer.tick();
  }

  snapshot(): MonitorSnapshot { return this.view.snapshot(); }
  charts(): ChartFrame[] { return this.renderer.charts(); }
  hasChart(id: string): boolean { return this.renderer.hasChart(id); }
  series(metric: MetricKey): MetricSeries { return this.history.series(metric); }
  sources(): Promise<SourceAvailability[]> { return sourceAvailability(); }

  setChartMetric(id: string, metric: MetricKey): boolean {
    return this.renderer.setMetric(id, metric);
  }

  /** Tear down a source whose link dropped underneath it (remote close, unplugged device). */
  async checkLink(): Promise<void> {
    const source = this.source;
    if (!source || source.connected) return;
    await this.serialize(async () => {
      // A newer connection may have replaced it in the meantime
      if (this.source !== source) return;
      console.error(`📡 ${source.kind} link lost`);
      this.view.append('Link lost');
      await this.doDisconnect();
    });
  }

  private serialize<T>(task: () => Promise<T>): Promise<T> {
    const next = this.transition.then(task, task);
    this.transition = next.catch(() => undefined);
    return next;
  }

  private async doConnect(config: SourceConfig): Promise<ConnectResult> {
    await this.doDisconnect();

    const source = this.sourceFactory(config, this.sourceOptions);
    const result = await source.connect();
    if (!result.ok) {
      await source.disconnect();
      this.view.append(`Connection failed: ${result.message}`);
      this.emit('status', this.view.snapshot());
      return result;
    }

    this.source = source;
    this.queue.drainAll();
    this.history.clear();
    this.acquisition = new AcquisitionLoop(source, this.queue, this.acquisitionIntervalMs);
    this.acquisition.start();
    this.view.setStatus('connected', source.kind);
    this.view.append(`Connected: ${result.message}`);
    this.renderer.invalidate();
    console.log(`🚀 ${source.kind} source connected: ${result.message}`);
    this.emit('status', this.view.snapshot());
    return result;
  }

  private async doDisconnect(): Promise<void> {
    const source = this.source;
    if (!source) return;

    // Stop the reader before the handle it reads from goes away
    await this.acquisition?.stop();
    this.acquisition = null;
    await source.disconnect();
    this.source = null;

    this.view.setStatus('disconnected', null);
    this.view.append('Disconnected');
    this.renderer.invalidate();
    console.log(`🚀 ${source.kind} source disconnected`);
    this.emit('status', this.view.snapshot());
  }
}
