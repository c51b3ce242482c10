// ============================================================================
// LaunchTrack — Line Chart Renderer
// ============================================================================
import { METRIC_LABELS, type DrawPrimitive, type MetricKey } from '@launchtrack/shared';

export const CHART_PADDING = 40;
const GRID_LINES = 5;

export const CHART_COLORS = {
  background: '#0a0e27',
  axis: '#444444',
  grid: '#222222',
  series: '#00ff88',
  tick: '#666666',
  caption: '#888888',
};

function tickLabel(value: number, range: number): string {
  const decimals = range >= 10 ? 0 : range >= 1 ? 1 : 2;
  const text = value.toFixed(decimals);
  return /^-0(\.0+)?$/.test(text) ? text.slice(1) : text;
}

/**
 * Lay out one metric against flight time as draw primitives. Scaling is
 * linear and derived from the points given, so the chart always fits the
 * current window. Fewer than two points draws nothing.
 */
export function renderChart(
  metric: MetricKey,
  times: readonly number[],
  values: readonly number[],
  width: number,
  height: number,
): DrawPrimitive[] {
  const n = Math.min(times.length, values.length);
  if (n < 2 || width < 10 || height < 10) return [];

  const pad = CHART_PADDING;
  const plotWidth = width - 2 * pad;
  const plotHeight = height - 2 * pad;

  let minX = Infinity, maxX = -Infinity, minY = Infinity, maxY = -Infinity;
  for (let i = 0; i < n; i++) {
    minX = Math.min(minX, times[i]);
    maxX = Math.max(maxX, times[i]);
    minY = Math.min(minY, values[i]);
    maxY = Math.max(maxY, values[i]);
  }
  // A flat series gets a unit range centred on its value
  if (maxY === minY) {
    minY -= 0.5;
    maxY += 0.5;
  }
  const rangeY = maxY - minY;
  const rangeX = maxX !== minX ? maxX - minX : 1;

  const primitives: DrawPrimitive[] = [
    { kind: 'line', x1: pad, y1: height - pad, x2: width - pad, y2: height - pad, stroke: CHART_COLORS.axis, width: 2 },
    { kind: 'line', x1: pad, y1: pad, x2: pad, y2: height - pad, stroke: CHART_COLORS.axis, width: 2 },
  ];

  for (let i = 0; i < GRID_LINES; i++) {
    const y = pad + (plotHeight * i) / (GRID_LINES - 1);
    primitives.push({ kind: 'line', x1: pad, y1: y, x2: width - pad, y2: y, stroke: CHART_COLORS.grid, width: 1, dash: [2, 4] });
    primitives.push({
      kind: 'text', x: pad - 5, y,
      text: tickLabel(maxY - (rangeY * i) / (GRID_LINES - 1), rangeY),
      anchor: 'end', fill: CHART_COLORS.tick, fontSize: 8,
    });
  }

  const points: [number, number][] = [];
  for (let i = 0; i < n; i++) {
    const x = pad + ((times[i] - minX) / rangeX) * plotWidth;
    const y = height - pad - ((values[i] - minY) / rangeY) * plotHeight;
    points.push([x, y]);
  }
  primitives.push({ kind: 'polyline', points, stroke: CHART_COLORS.series, width: 2, smooth: true });

  primitives.push({ kind: 'text', x: width / 2, y: height - 10, text: 'Flight Time (s)', anchor: 'middle', fill: CHART_COLORS.caption, fontSize: 9 });
  primitives.push({ kind: 'text', x: 15, y: height / 2, text: METRIC_LABELS[metric], anchor: 'middle', fill: CHART_COLORS.caption, fontSize: 9, angle: 90 });

  return primitives;
}
