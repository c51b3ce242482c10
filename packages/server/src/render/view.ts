// ============================================================================
// LaunchTrack — Monitor View Model
// ============================================================================
import type { MonitorCards, MonitorSnapshot, SourceKind, TelemetrySample } from '@launchtrack/shared';
import { formatClock } from '../clock.js';

const LOG_LINES = 5;
const EMPTY = '--';

function fixed1(value: number | undefined): string {
  return (value ?? 0).toFixed(1);
}

/**
 * Display state for the cards, phase label, status line and log. Only fields
 * present on a sample change; absent ones keep their previous text.
 */
export class MonitorView {
  private status: MonitorSnapshot['status'] = 'disconnected';
  private source: SourceKind | null = null;
  private phase = EMPTY;
  private readonly cards: MonitorCards = {
    altitude: EMPTY,
    velocity: EMPTY,
    acceleration: EMPTY,
    temperature: EMPTY,
    pressure: EMPTY,
    flightTime: EMPTY,
  };
  private log: string[] = [];

  constructor(private readonly clock: () => Date = () => new Date()) {}

  apply(sample: TelemetrySample) {
    if (sample.altitude !== undefined) this.cards.altitude = sample.altitude.toFixed(1);
    if (sample.velocity !== undefined) this.cards.velocity = sample.velocity.toFixed(1);
    if (sample.acceleration !== undefined) this.cards.acceleration = sample.acceleration.toFixed(1);
    if (sample.temperature !== undefined) this.cards.temperature = sample.temperature.toFixed(1);
    if (sample.pressure !== undefined) this.cards.pressure = sample.pressure.toFixed(1);
    if (sample.flightTime !== undefined) this.cards.flightTime = sample.flightTime.toFixed(1);
    if (sample.phase !== undefined) this.phase = sample.phase;

    const stamp = sample.timestamp ?? formatClock(this.clock()).slice(0, 8);
    this.append(`[${stamp}] ALT:${fixed1(sample.altitude)}m VEL:${fixed1(sample.velocity)}m/s ${sample.phase ?? EMPTY}`);
  }

  setStatus(status: MonitorSnapshot['status'], source: SourceKind | null) {
    this.status = status;
    this.source = source;
  }

  append(line: string) {
    this.log.push(line);
    if (this.log.length > LOG_LINES) this.log = this.log.slice(-LOG_LINES);
  }

  snapshot(): MonitorSnapshot {
    return {
      status: this.status,
      source: this.source,
      phase: this.phase,
      cards: { ...this.cards },
      log: [...this.log],
    };
  }
}
