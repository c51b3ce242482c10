// ============================================================================
// LaunchTrack Chart Primitives
// ============================================================================
import type { MetricKey } from './telemetry.js';

export interface LinePrimitive {
  kind: 'line';
  x1: number;
  y1: number;
  x2: number;
  y2: number;
  stroke: string;
  width: number;
  dash?: number[];
}

export interface PolylinePrimitive {
  kind: 'polyline';
  points: [number, number][];
  stroke: string;
  width: number;
  smooth: boolean;
}

export interface TextPrimitive {
  kind: 'text';
  x: number;
  y: number;
  text: string;
  anchor: 'start' | 'middle' | 'end';
  fill: string;
  fontSize: number;
  angle?: number;  // degrees, counter-clockwise
}

export type DrawPrimitive = LinePrimitive | PolylinePrimitive | TextPrimitive;

export interface ChartSlot {
  id: string;
  metric: MetricKey;
}

export interface ChartFrame extends ChartSlot {
  primitives: DrawPrimitive[];
}

export interface Viewport {
  width: number;
  height: number;
}
