import type { SourceAvailability, SourceConfig } from '@launchtrack/shared';
import { SerialSource, serialSupport, type PortFactory } from './serial.js';
import { SimulatorSource, type SimulatorOptions } from './simulator.js';
import { TcpSocketSource } from './tcp.js';
import type { DataSource } from './types.js';

export interface SourceOptions {
  simulator?: SimulatorOptions;
  serialSettleMs?: number;
  serialPortFactory?: PortFactory;
  tcpConnectTimeoutMs?: number;
}

export function createSource(config: SourceConfig, options: SourceOptions = {}): DataSource {
  switch (config.type) {
    case 'simulator':
      return new SimulatorSource(options.simulator);
    case 'serial':
      return new SerialSource({
        path: config.path,
        baudRate: config.baudRate,
        settleMs: options.serialSettleMs,
        portFactory: options.serialPortFactory,
      });
    case 'tcp':
      return new TcpSocketSource({ host: config.host, port: config.port, connectTimeoutMs: options.tcpConnectTimeoutMs });
    default: {
      const unknown: never = config;
      throw new Error(`Unknown source type: ${JSON.stringify(unknown)}`);
    }
  }
}

export async function sourceAvailability(): Promise<SourceAvailability[]> {
  const serial = await serialSupport();
  return [
    { type: 'simulator', label: 'Simulator', available: true },
    serial.available
      ? { type: 'serial', label: 'Serial Port', available: true }
      : { type: 'serial', label: 'Serial Port', available: false, reason: serial.reason },
    { type: 'tcp', label: 'TCP Socket', available: true },
  ];
}
