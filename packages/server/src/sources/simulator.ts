// ============================================================================
// LaunchTrack — Flight Simulator Source
// ============================================================================
import type { ConnectResult, FlightPhase, TelemetrySample } from '@launchtrack/shared';
import { formatClock } from '../clock.js';
import type { DataSource } from './types.js';

const G = 9.8;
const TIME_STEP = 0.1;
const IGNITION = 2;
const BURNOUT = 15;
const COAST_END = 25;
const APOGEE_END = 27;
const TOUCHDOWN = 50;
const COAST_DECEL = 3;
const DESCENT_RATE = 5;

const BURN = BURNOUT - IGNITION;
const BURNOUT_VELOCITY = G * BURN;
const BURNOUT_ALTITUDE = 0.5 * G * BURN ** 2;
const COAST = COAST_END - BURNOUT;
export const APOGEE_ALTITUDE = BURNOUT_ALTITUDE + BURNOUT_VELOCITY * COAST - 0.5 * COAST_DECEL * COAST ** 2;

export interface Kinematics {
  phase: FlightPhase;
  altitude: number;
  velocity: number;
  acceleration: number;
  /** Half-width of the uniform noise added to acceleration. */
  accelerationNoise: number;
}

export function phaseAt(t: number): FlightPhase {
  if (t < IGNITION) return 'Pre-Launch';
  if (t < BURNOUT) return 'Powered Ascent';
  if (t < COAST_END) return 'Coasting';
  if (t < APOGEE_END) return 'Apogee';
  if (t < TOUCHDOWN) return 'Descent';
  return 'Landed';
}

/** Noise-free flight profile at flight time t. */
export function kinematicsAt(t: number): Kinematics {
  const phase = phaseAt(t);
  switch (phase) {
    case 'Powered Ascent': {
      const dt = t - IGNITION;
      return { phase, altitude: 0.5 * G * dt ** 2, velocity: G * dt, acceleration: G, accelerationNoise: 0.5 };
    }
    case 'Coasting': {
      const dt = t - BURNOUT;
      return {
        phase,
        altitude: BURNOUT_ALTITUDE + BURNOUT_VELOCITY * dt - 0.5 * COAST_DECEL * dt ** 2,
        velocity: BURNOUT_VELOCITY - COAST_DECEL * dt,
        acceleration: -COAST_DECEL,
        accelerationNoise: 0.2,
      };
    }
    case 'Apogee':
      return { phase, altitude: APOGEE_ALTITUDE, velocity: 0, acceleration: 0, accelerationNoise: 0 };
    case 'Descent':
      return {
        phase,
        altitude: APOGEE_ALTITUDE - DESCENT_RATE * (t - APOGEE_END),
        velocity: -DESCENT_RATE,
        acceleration: -1,
        accelerationNoise: 0.1,
      };
    case 'Pre-Launch':
    case 'Landed':
      return { phase, altitude: 0, velocity: 0, acceleration: 0, accelerationNoise: 0 };
  }
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

export interface SimulatorOptions {
  /** Uniform [0, 1) generator. */
  random?: () => number;
  clock?: () => Date;
}

export class SimulatorSource implements DataSource {
  readonly kind = 'simulator' as const;
  private ticks = 0;
  private isConnected = false;
  private readonly random: () => number;
  private readonly clock: () => Date;

  constructor(options: SimulatorOptions = {}) {
    this.random = options.random ?? Math.random;
    this.clock = options.clock ?? (() => new Date());
  }

  get connected(): boolean { return this.isConnected; }
  get flightTime(): number { return this.ticks * TIME_STEP; }

  async connect(): Promise<ConnectResult> {
    this.ticks = 0;
    this.isConnected = true;
    return { ok: true, message: 'Simulator started' };
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
  }

  readData(): TelemetrySample | null {
    if (!this.isConnected) return null;

    this.ticks++;
    const t = this.flightTime;
    const k = kinematicsAt(t);
    const acceleration = k.accelerationNoise > 0
      ? k.acceleration + this.uniform(-k.accelerationNoise, k.accelerationNoise)
      : k.acceleration;
    const altitude = Math.max(0, k.altitude + this.uniform(-2, 2));

    return {
      timestamp: formatClock(this.clock()),
      flightTime: round2(t),
      phase: k.phase,
      altitude: round2(altitude),
      velocity: round2(k.velocity),
      acceleration: round2(acceleration),
      temperature: round2(20 - altitude * 0.0065 + this.uniform(-1, 1)),
      pressure: round2(101.325 * Math.exp(-altitude / 8500) + this.uniform(-0.1, 0.1)),
    };
  }

  private uniform(min: number, max: number): number {
    return min + (max - min) * this.random();
  }
}
