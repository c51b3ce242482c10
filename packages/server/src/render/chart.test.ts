import { describe, it, expect } from 'vitest';
import type { DrawPrimitive, TextPrimitive } from '@launchtrack/shared';
import { CHART_COLORS, renderChart } from './chart.js';
import { renderSvg } from './svg.js';

function texts(primitives: DrawPrimitive[]): TextPrimitive[] {
  return primitives.filter((p): p is TextPrimitive => p.kind === 'text');
}

describe('renderChart', () => {
  it('draws nothing with fewer than two points', () => {
    expect(renderChart('altitude', [], [], 800, 240)).toEqual([]);
    expect(renderChart('altitude', [1], [5], 800, 240)).toEqual([]);
  });

  it('draws nothing into a viewport too small to hold a chart', () => {
    expect(renderChart('altitude', [0, 1], [0, 1], 9, 240)).toEqual([]);
  });

  it('lays out axes, grid, series and captions', () => {
    const primitives = renderChart('altitude', [0, 1, 2], [0, 50, 100], 800, 240);

    expect(primitives).toHaveLength(15);
    expect(primitives[0]).toEqual({ kind: 'line', x1: 40, y1: 200, x2: 760, y2: 200, stroke: CHART_COLORS.axis, width: 2 });
    expect(primitives[1]).toEqual({ kind: 'line', x1: 40, y1: 40, x2: 40, y2: 200, stroke: CHART_COLORS.axis, width: 2 });

    const grid = primitives.filter(p => p.kind === 'line' && p.dash !== undefined);
    expect(grid.map(p => (p.kind === 'line' ? p.y1 : NaN))).toEqual([40, 80, 120, 160, 200]);

    expect(texts(primitives).map(t => t.text)).toEqual(['100', '75', '50', '25', '0', 'Flight Time (s)', 'Altitude (m)']);

    const series = primitives.find(p => p.kind === 'polyline');
    expect(series).toEqual({
      kind: 'polyline',
      points: [[40, 200], [400, 120], [760, 40]],
      stroke: CHART_COLORS.series,
      width: 2,
      smooth: true,
    });
  });

  it('rotates the metric label', () => {
    const label = texts(renderChart('velocity', [0, 1], [0, 1], 800, 240)).at(-1);
    expect(label).toMatchObject({ text: 'Velocity (m/s)', x: 15, y: 120, angle: 90 });
  });

  it('centres a flat series in a unit range', () => {
    const primitives = renderChart('temperature', [0, 1], [5, 5], 800, 240);
    const labels = texts(primitives).map(t => t.text);

    expect(labels[0]).toBe('5.5');
    expect(labels[2]).toBe('5.0');
    expect(labels[4]).toBe('4.5');
    expect(primitives.find(p => p.kind === 'polyline')).toMatchObject({ points: [[40, 120], [760, 120]] });
  });

  it('uses two decimals for narrow ranges', () => {
    const labels = texts(renderChart('pressure', [0, 1], [101.2, 101.6], 800, 240)).map(t => t.text);
    expect(labels[0]).toBe('101.60');
    expect(labels[4]).toBe('101.20');
  });

  it('stacks points at the left edge when every sample shares one time', () => {
    const series = renderChart('altitude', [3, 3], [1, 2], 800, 240).find(p => p.kind === 'polyline');
    expect(series).toMatchObject({ points: [[40, 200], [40, 40]] });
  });
});

describe('renderSvg', () => {
  it('wraps primitives in an svg document with a background', () => {
    const svg = renderSvg(renderChart('altitude', [0, 1, 2], [0, 50, 100], 800, 240), 800, 240);
    const lines = svg.split('\n');

    expect(lines[0]).toBe('<svg xmlns="http://www.w3.org/2000/svg" width="800" height="240" viewBox="0 0 800 240">');
    expect(lines[1]).toBe(`<rect width="100%" height="100%" fill="${CHART_COLORS.background}"/>`);
    expect(lines).toContain(
      '<polyline points="40,200 400,120 760,40" fill="none" stroke="#00ff88" stroke-width="2" stroke-linejoin="round" stroke-linecap="round"/>',
    );
    expect(lines).toContain('<line x1="40" y1="80" x2="760" y2="80" stroke="#222222" stroke-width="1" stroke-dasharray="2 4"/>');
    expect(lines.at(-2)).toBe(
      '<text x="15" y="120" text-anchor="middle" dominant-baseline="middle" fill="#888888" font-family="Arial, sans-serif" font-size="9" transform="rotate(-90 15 120)">Altitude (m)</text>',
    );
    expect(lines.at(-1)).toBe('</svg>');
  });

  it('escapes text content', () => {
    const svg = renderSvg([{ kind: 'text', x: 1, y: 2, text: '<a & "b">', anchor: 'start', fill: '#fff', fontSize: 8 }], 10, 10);
    expect(svg.split('\n')[2]).toBe(
      '<text x="1" y="2" text-anchor="start" dominant-baseline="middle" fill="#fff" font-family="Arial, sans-serif" font-size="8">&lt;a &amp; &quot;b&quot;&gt;</text>',
    );
  });

  it('rounds coordinates to two decimals', () => {
    const svg = renderSvg([{ kind: 'line', x1: 1 / 3, y1: 0, x2: 2, y2: 2, stroke: '#000', width: 1 }], 10, 10);
    expect(svg.split('\n')[2]).toBe('<line x1="0.33" y1="0" x2="2" y2="2" stroke="#000" stroke-width="1"/>');
  });
});
