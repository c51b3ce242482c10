// ============================================================================
// LaunchTrack — External Telemetry Payload Decoding
// ============================================================================
import { z } from 'zod';
import type { TelemetrySample } from '@launchtrack/shared';
import { ParseError, describeError } from '../errors.js';

// A recognized key with a value of the wrong type is dropped on its own;
// it does not invalidate the rest of the record.
const measurement = z.number().finite().optional().catch(undefined);
const label = z.string().optional().catch(undefined);

const payloadSchema = z.object({
  timestamp: label,
  flight_time: measurement,
  phase: label,
  altitude: measurement,
  velocity: measurement,
  acceleration: measurement,
  temperature: measurement,
  pressure: measurement,
});

/**
 * Decode one line of the structured payload, e.g.
 * `{"altitude": 120.5, "velocity": 33.1, "phase": "Coasting"}`.
 * Unrecognized keys are ignored.
 */
export function decodePayload(line: string): TelemetrySample {
  const text = line.trim();
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ParseError(`Payload is not valid JSON: ${describeError(err)}`, text, { cause: err });
  }
  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ParseError('Payload is not a JSON object', text);
  }

  const p = payloadSchema.parse(raw);
  const sample: TelemetrySample = {
    timestamp: p.timestamp,
    flightTime: p.flight_time,
    phase: p.phase,
    altitude: p.altitude,
    velocity: p.velocity,
    acceleration: p.acceleration,
    temperature: p.temperature,
    pressure: p.pressure,
  };
  if (Object.values(sample).every(v => v === undefined)) {
    throw new ParseError('Payload has no recognized telemetry keys', text);
  }
  return sample;
}

/** Lenient variant used by the read path: malformed payloads become "no sample". */
export function parsePayload(line: string, origin: string): TelemetrySample | null {
  try {
    return decodePayload(line);
  } catch (err) {
    if (err instanceof ParseError) {
      console.error(`📡 ${origin}: dropped payload (${err.message}): ${err.payload.slice(0, 120)}`);
      return null;
    }
    throw err;
  }
}
