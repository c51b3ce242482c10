// ============================================================================
// LaunchTrack Telemetry Types
// ============================================================================

export type FlightPhase =
  | 'Pre-Launch'
  | 'Powered Ascent'
  | 'Coasting'
  | 'Apogee'
  | 'Descent'
  | 'Landed';

export const METRIC_KEYS = ['altitude', 'velocity', 'acceleration', 'temperature', 'pressure'] as const;

export type MetricKey = (typeof METRIC_KEYS)[number];

export const METRIC_LABELS: Record<MetricKey, string> = {
  altitude: 'Altitude (m)',
  velocity: 'Velocity (m/s)',
  acceleration: 'Acceleration (m/s²)',
  temperature: 'Temperature (°C)',
  pressure: 'Pressure (kPa)',
};

export const METRIC_UNITS: Record<MetricKey | 'flightTime', string> = {
  altitude: 'm',
  velocity: 'm/s',
  acceleration: 'm/s²',
  temperature: '°C',
  pressure: 'kPa',
  flightTime: 's',
};

/**
 * One reading. Simulated samples carry every field; samples decoded from an
 * external payload carry whatever subset the payload had.
 */
export interface TelemetrySample {
  readonly timestamp?: string;   // HH:MM:SS.mmm
  readonly flightTime?: number;  // seconds
  readonly phase?: string;
  readonly altitude?: number;
  readonly velocity?: number;
  readonly acceleration?: number;
  readonly temperature?: number;
  readonly pressure?: number;
}

export function isMetricKey(value: unknown): value is MetricKey {
  return typeof value === 'string' && METRIC_KEYS.some(key => key === value);
}
