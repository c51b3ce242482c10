export * from './telemetry.js';
export * from './source.js';
export * from './chart.js';
export * from './monitor.js';
