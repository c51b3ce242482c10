import { describe, it, expect, vi } from 'vitest';
import type { MonitorFrame, TelemetrySample } from '@launchtrack/shared';
import { HistoryBuffer } from '../pipeline/history.js';
import { SampleQueue } from '../pipeline/queue.js';
import { RenderLoop } from './loop.js';
import { MonitorView } from './view.js';

const clock = () => new Date(2024, 0, 1, 14, 3, 9, 500);

function setup() {
  const queue = new SampleQueue<TelemetrySample>();
  const history = new HistoryBuffer(100);
  const view = new MonitorView(clock);
  const loop = new RenderLoop(queue, history, view, {
    charts: [{ id: 'graph1', metric: 'altitude' }, { id: 'graph2', metric: 'velocity' }],
    viewport: { width: 800, height: 240 },
  });
  return { queue, history, view, loop };
}

describe('MonitorView', () => {
  it('formats cards to one decimal and logs each sample', () => {
    const view = new MonitorView(clock);
    view.apply({ timestamp: '14:03:09.512', altitude: 120.46, velocity: 33, phase: 'Coasting' });

    const snapshot = view.snapshot();
    expect(snapshot.cards).toMatchObject({ altitude: '120.5', velocity: '33.0', pressure: '--' });
    expect(snapshot.phase).toBe('Coasting');
    expect(snapshot.log).toEqual(['[14:03:09.512] ALT:120.5m VEL:33.0m/s Coasting']);
  });

  it('keeps previous values for fields a sample lacks', () => {
    const view = new MonitorView(clock);
    view.apply({ altitude: 10, phase: 'Powered Ascent' });
    view.apply({ velocity: 4 });

    const snapshot = view.snapshot();
    expect(snapshot.cards.altitude).toBe('10.0');
    expect(snapshot.cards.velocity).toBe('4.0');
    expect(snapshot.phase).toBe('Powered Ascent');
    expect(snapshot.log[1]).toBe('[14:03:09] ALT:0.0m VEL:4.0m/s --');
  });

  it('keeps only the last five log lines', () => {
    const view = new MonitorView(clock);
    for (let i = 1; i <= 7; i++) view.append(`line ${i}`);
    expect(view.snapshot().log).toEqual(['line 3', 'line 4', 'line 5', 'line 6', 'line 7']);
  });

  it('hands out copies', () => {
    const view = new MonitorView(clock);
    const snapshot = view.snapshot();
    snapshot.log.push('tampered');
    snapshot.cards.altitude = '999';
    expect(view.snapshot().log).toEqual([]);
    expect(view.snapshot().cards.altitude).toBe('--');
  });
});

describe('RenderLoop', () => {
  it('does nothing when the queue is empty', () => {
    const { loop } = setup();
    expect(loop.tick()).toBeNull();
  });

  it('drains the whole batch before redrawing once', () => {
    const { queue, history, loop } = setup();
    const frames: MonitorFrame[] = [];
    loop.on('frame', frame => frames.push(frame));

    queue.put({ flightTime: 1, altitude: 0, velocity: 1 });
    queue.put({ flightTime: 2, altitude: 50, velocity: 2 });
    queue.put({ flightTime: 3, altitude: 100 });
    const frame = loop.tick();

    expect(queue.size).toBe(0);
    expect(history.size).toBe(3);
    expect(frames).toHaveLength(1);
    expect(frame?.snapshot.log).toHaveLength(3);
    expect(frame?.charts.map(c => c.id)).toEqual(['graph1', 'graph2']);
    expect(frame?.charts[0]?.primitives.find(p => p.kind === 'polyline')).toMatchObject({
      points: [[40, 200], [400, 120], [760, 40]],
    });
    expect(frame?.charts[1]?.primitives).toHaveLength(15);
    expect(loop.tick()).toBeNull();
  });

  it('leaves a chart blank until it has two points', () => {
    const { queue, loop } = setup();
    queue.put({ flightTime: 0.1, altitude: 1 });
    expect(loop.tick()?.charts[0]?.primitives).toEqual([]);
  });

  it('redraws after a metric change without new samples', () => {
    const { queue, loop } = setup();
    queue.put({ flightTime: 0.1, pressure: 100 });
    queue.put({ flightTime: 0.2, pressure: 99 });
    loop.tick();

    expect(loop.setMetric('graph1', 'pressure')).toBe(true);
    const frame = loop.tick();
    expect(frame?.charts[0]?.metric).toBe('pressure');
    expect(frame?.charts[0]?.primitives).toHaveLength(15);
  });

  it('rejects unknown chart ids', () => {
    const { loop } = setup();
    expect(loop.hasChart('graph3')).toBe(false);
    expect(loop.setMetric('graph3', 'pressure')).toBe(false);
    expect(loop.tick()).toBeNull();
  });

  it('redraws on an interval once started', async () => {
    const queue = new SampleQueue<TelemetrySample>();
    const loop = new RenderLoop(queue, new HistoryBuffer(10), new MonitorView(clock), {
      intervalMs: 5,
      charts: [{ id: 'graph1', metric: 'altitude' }],
      viewport: { width: 800, height: 240 },
    });
    const listener = vi.fn();
    loop.on('frame', listener);

    loop.start();
    queue.put({ flightTime: 1, altitude: 1 });
    await vi.waitFor(() => expect(listener).toHaveBeenCalledTimes(1));
    loop.stop();
    expect(loop.running).toBe(false);
  });
});
