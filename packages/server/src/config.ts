// ============================================================================
// LaunchTrack — Runtime Configuration
// ============================================================================
import { z } from 'zod';
import type { BaudRate } from '@launchtrack/shared';
import { baudRate } from './sources/schema.js';

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3410),
  HOST: z.string().min(1).default('0.0.0.0'),
  HISTORY_CAPACITY: z.coerce.number().int().min(2).default(500),
  ACQUISITION_INTERVAL_MS: z.coerce.number().int().min(20).max(50).default(50),
  RENDER_INTERVAL_MS: z.coerce.number().int().min(10).default(50),
  CHART_WIDTH: z.coerce.number().int().min(10).default(800),
  CHART_HEIGHT: z.coerce.number().int().min(10).default(240),
  SERIAL_SETTLE_MS: z.coerce.number().int().min(0).default(2000),
  TCP_CONNECT_TIMEOUT_MS: z.coerce.number().int().min(1).default(5000),
  SERIAL_PATH: z.string().min(1).default('/dev/cu.usbserial-0001'),
  SERIAL_BAUD: baudRate.default(9600),
  TCP_HOST: z.string().min(1).default('192.168.1.100'),
  TCP_PORT: z.coerce.number().int().min(1).max(65535).default(5000),
});

export interface AppConfig {
  port: number;
  host: string;
  historyCapacity: number;
  acquisitionIntervalMs: number;
  renderIntervalMs: number;
  chart: { width: number; height: number };
  serialSettleMs: number;
  tcpConnectTimeoutMs: number;
  defaults: {
    serial: { path: string; baudRate: BaudRate };
    tcp: { host: string; port: number };
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n  ${issues.join('\n  ')}`);
    this.name = 'ConfigError';
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Empty strings count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`));
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    host: e.HOST,
    historyCapacity: e.HISTORY_CAPACITY,
    acquisitionIntervalMs: e.ACQUISITION_INTERVAL_MS,
    renderIntervalMs: e.RENDER_INTERVAL_MS,
    chart: { width: e.CHART_WIDTH, height: e.CHART_HEIGHT },
    serialSettleMs: e.SERIAL_SETTLE_MS,
    tcpConnectTimeoutMs: e.TCP_CONNECT_TIMEOUT_MS,
    defaults: {
      serial: { path: e.SERIAL_PATH, baudRate: e.SERIAL_BAUD },
      tcp: { host: e.TCP_HOST, port: e.TCP_PORT },
    },
  };
}
