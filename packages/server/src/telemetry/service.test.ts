import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import type { ConnectResult, MonitorSnapshot, SourceConfig } from '@launchtrack/shared';
import type { DataSource } from '../sources/types.js';
import { TelemetryMonitor } from './service.js';

class FakeSource implements DataSource {
  readonly kind = 'tcp' as const;
  connected = false;

  constructor(private readonly events: string[], private readonly name: string) {}

  async connect(): Promise<ConnectResult> {
    this.events.push(`connect ${this.name}`);
    await new Promise(resolve => setTimeout(resolve, 5));
    if (this.name === 'down') return { ok: false, message: 'nope' };
    this.connected = true;
    return { ok: true, message: `${this.name} up` };
  }

  async disconnect(): Promise<void> {
    this.events.push(`disconnect ${this.name}`);
    this.connected = false;
  }

  readData() {
    return null;
  }
}

function fakeMonitor() {
  const events: string[] = [];
  const built: FakeSource[] = [];
  const monitor = new TelemetryMonitor({
    sourceFactory: (config: SourceConfig) => {
      const source = new FakeSource(events, config.type === 'tcp' ? config.host : config.type);
      built.push(source);
      return source;
    },
  });
  return { monitor, events, built };
}

const tcp = (host: string): SourceConfig => ({ type: 'tcp', host, port: 5000 });

describe('TelemetryMonitor', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('streams simulator samples into history', async () => {
    const monitor = new TelemetryMonitor({ acquisitionIntervalMs: 1, sources: { simulator: { random: () => 0.5 } } });

    await expect(monitor.connect({ type: 'simulator' })).resolves.toEqual({ ok: true, message: 'Simulator started' });
    expect(monitor.snapshot()).toMatchObject({ status: 'connected', source: 'simulator', log: ['Connected: Simulator started'] });

    await vi.waitFor(() => {
      monitor.tick();
      expect(monitor.series('altitude').times.length).toBeGreaterThanOrEqual(3);
    });
    const { times } = monitor.series('altitude');
    expect(times.slice(0, 3)).toEqual([0.1, 0.2, 0.3]);

    await monitor.stop();
    expect(monitor.connected).toBe(false);
  });

  it('starts each connection with an empty history', async () => {
    const monitor = new TelemetryMonitor({ acquisitionIntervalMs: 1 });
    await monitor.connect({ type: 'simulator' });
    await vi.waitFor(() => {
      monitor.tick();
      expect(monitor.series('velocity').times.length).toBeGreaterThan(0);
    });

    await monitor.connect({ type: 'simulator' });
    expect(monitor.series('velocity').times).toEqual([]);
    await monitor.disconnect();
  });

  it('reports a failed connection and stays disconnected', async () => {
    const { monitor, events } = fakeMonitor();
    const statuses: MonitorSnapshot[] = [];
    monitor.on('status', snapshot => statuses.push(snapshot));

    const result = await monitor.connect(tcp('down'));

    expect(result).toEqual({ ok: false, message: 'nope' });
    expect(events).toEqual(['connect down', 'disconnect down']);
    expect(monitor.activeSource).toBeNull();
    expect(monitor.snapshot()).toMatchObject({ status: 'disconnected', source: null, log: ['Connection failed: nope'] });
    expect(statuses).toHaveLength(1);
  });

  it('closes the previous source before opening the next', async () => {
    const { monitor, events, built } = fakeMonitor();

    await Promise.all([monitor.connect(tcp('a')), monitor.connect(tcp('b'))]);

    expect(events).toEqual(['connect a', 'disconnect a', 'connect b']);
    expect(monitor.activeSource).toBe(built[1]);
    expect(monitor.snapshot().log).toEqual(['Connected: a up', 'Disconnected', 'Connected: b up']);
    await monitor.disconnect();
  });

  it('disconnect is a no-op without a source', async () => {
    const { monitor } = fakeMonitor();
    await monitor.disconnect();
    expect(monitor.snapshot().log).toEqual([]);
  });

  it('tears down a source whose link dropped', async () => {
    const { monitor, built } = fakeMonitor();
    await monitor.connect(tcp('a'));
    await monitor.checkLink();
    expect(monitor.connected).toBe(true);

    const source = built[0];
    if (source) source.connected = false;
    await monitor.checkLink();

    expect(monitor.activeSource).toBeNull();
    expect(monitor.snapshot()).toMatchObject({ status: 'disconnected', log: ['Connected: a up', 'Link lost', 'Disconnected'] });
  });

  it('switches chart metrics by id', async () => {
    const { monitor } = fakeMonitor();
    expect(monitor.setChartMetric('graph2', 'temperature')).toBe(true);
    expect(monitor.setChartMetric('graph3', 'temperature')).toBe(false);
    expect(monitor.tick()?.charts.map(c => c.metric)).toEqual(['altitude', 'temperature']);
  });
});
