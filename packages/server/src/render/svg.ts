import type { DrawPrimitive } from '@launchtrack/shared';
import { CHART_COLORS } from './chart.js';

function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function num(value: number): string {
  return String(Math.round(value * 100) / 100);
}

function element(p: DrawPrimitive): string {
  switch (p.kind) {
    case 'line': {
      const dash = p.dash ? ` stroke-dasharray="${p.dash.join(' ')}"` : '';
      return `<line x1="${num(p.x1)}" y1="${num(p.y1)}" x2="${num(p.x2)}" y2="${num(p.y2)}" stroke="${p.stroke}" stroke-width="${p.width}"${dash}/>`;
    }
    case 'polyline': {
      const points = p.points.map(([x, y]) => `${num(x)},${num(y)}`).join(' ');
      const join = p.smooth ? ' stroke-linejoin="round" stroke-linecap="round"' : '';
      return `<polyline points="${points}" fill="none" stroke="${p.stroke}" stroke-width="${p.width}"${join}/>`;
    }
    case 'text': {
      const rotate = p.angle ? ` transform="rotate(${-p.angle} ${num(p.x)} ${num(p.y)})"` : '';
      return `<text x="${num(p.x)}" y="${num(p.y)}" text-anchor="${p.anchor}" dominant-baseline="middle" fill="${p.fill}" font-family="Arial, sans-serif" font-size="${p.fontSize}"${rotate}>${escapeXml(p.text)}</text>`;
    }
  }
}

/** Serialize draw primitives into a standalone SVG document. */
export function renderSvg(primitives: readonly DrawPrimitive[], width: number, height: number): string {
  return [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `<rect width="100%" height="100%" fill="${CHART_COLORS.background}"/>`,
    ...primitives.map(element),
    '</svg>',
  ].join('\n');
}
