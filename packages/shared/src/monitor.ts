// ============================================================================
// LaunchTrack Monitor View Model
// ============================================================================
import type { ChartFrame } from './chart.js';
import type { SourceKind } from './source.js';

export interface MonitorCards {
  altitude: string;
  velocity: string;
  acceleration: string;
  temperature: string;
  pressure: string;
  flightTime: string;
}

export interface MonitorSnapshot {
  status: 'connected' | 'disconnected';
  source: SourceKind | null;
  phase: string;
  cards: MonitorCards;
  log: string[];
}

export interface MonitorFrame {
  snapshot: MonitorSnapshot;
  charts: ChartFrame[];
}

export type MonitorMessage =
  | { type: 'snapshot'; snapshot: MonitorSnapshot }
  | { type: 'frame'; frame: MonitorFrame }
  | { type: 'error'; message: string };
