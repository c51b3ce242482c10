// ============================================================================
// LaunchTrack — Serial Port Source
// ============================================================================
import { ReadlineParser } from '@serialport/parser-readline';
import type { SerialPort, SerialPortMock } from 'serialport';
import type { BaudRate, ConnectResult, SerialPortEntry, TelemetrySample } from '@launchtrack/shared';
import { ConnectionError, describeError } from '../errors.js';
import { parsePayload } from './payload.js';
import { LineBacklog, type DataSource } from './types.js';

type SerialModule = typeof import('serialport');
export type SerialPortHandle = SerialPort | SerialPortMock;
export type PortFactory = (path: string, baudRate: number) => Promise<SerialPortHandle>;

// The native binding is optional: load it on first use so that a host
// without it can still run the other sources.
let serialModule: Promise<SerialModule> | null = null;

function loadSerialModule(): Promise<SerialModule> {
  if (!serialModule) serialModule = import('serialport');
  return serialModule;
}

export async function serialSupport(): Promise<{ available: true } | { available: false; reason: string }> {
  try {
    await loadSerialModule();
    return { available: true };
  } catch (err) {
    return { available: false, reason: describeError(err) };
  }
}

export async function listSerialPorts(): Promise<SerialPortEntry[]> {
  const { SerialPort } = await loadSerialModule();
  const ports = await SerialPort.list();
  return ports.map(p => ({ path: p.path, manufacturer: p.manufacturer, serialNumber: p.serialNumber }));
}

const defaultPortFactory: PortFactory = async (path, baudRate) => {
  const { SerialPort } = await loadSerialModule();
  return new SerialPort({ path, baudRate, autoOpen: false });
};

function openPort(port: SerialPortHandle): Promise<void> {
  return new Promise((resolve, reject) => {
    port.open(err => (err ? reject(err) : resolve()));
  });
}

function closePort(port: SerialPortHandle): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!port.isOpen) return resolve();
    port.close(err => (err ? reject(err) : resolve()));
  });
}

export interface SerialSourceOptions {
  path: string;
  baudRate: BaudRate;
  /** Delay after opening before the link counts as connected. */
  settleMs?: number;
  portFactory?: PortFactory;
}

export class SerialSource implements DataSource {
  readonly kind = 'serial' as const;
  private port: SerialPortHandle | null = null;
  private isConnected = false;
  private backlog = new LineBacklog();
  private readonly path: string;
  private readonly baudRate: BaudRate;
  private readonly settleMs: number;
  private readonly portFactory: PortFactory;

  constructor(options: SerialSourceOptions) {
    this.path = options.path;
    this.baudRate = options.baudRate;
    this.settleMs = options.settleMs ?? 2000;
    this.portFactory = options.portFactory ?? defaultPortFactory;
  }

  get connected(): boolean { return this.isConnected; }

  async connect(): Promise<ConnectResult> {
    try {
      await this.open();
      return { ok: true, message: `Connected to ${this.path}` };
    } catch (err) {
      await this.release();
      const message = err instanceof ConnectionError ? err.message : `Failed to open ${this.path}: ${describeError(err)}`;
      console.error(`📡 Serial: ${message}`);
      return { ok: false, message };
    }
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
    await this.release();
  }

  readData(): TelemetrySample | null {
    if (!this.isConnected || !this.port) return null;
    const line = this.backlog.shift();
    if (line === undefined) return null;
    return parsePayload(line, `Serial ${this.path}`);
  }

  private async open(): Promise<void> {
    let port: SerialPortHandle;
    try {
      port = await this.portFactory(this.path, this.baudRate);
    } catch (err) {
      throw new ConnectionError(`Serial support unavailable: ${describeError(err)}`, { cause: err });
    }
    this.port = port;
    await openPort(port);

    const parser = port.pipe(new ReadlineParser({ delimiter: '\n' }));
    parser.on('data', (line: string) => this.backlog.push(line));
    port.on('error', (err: Error) => console.error(`📡 Serial ${this.path} error: ${err.message}`));
    port.on('close', () => {
      if (this.isConnected) console.log(`📡 Serial ${this.path} closed`);
      this.isConnected = false;
    });

    if (this.settleMs > 0) await new Promise(resolve => setTimeout(resolve, this.settleMs));
    if (this.port !== port || !port.isOpen) {
      throw new ConnectionError('Serial port closed while settling');
    }
    this.isConnected = true;
    console.log(`📡 Serial connected to ${this.path} @ ${this.baudRate}`);
  }

  private async release(): Promise<void> {
    const port = this.port;
    this.port = null;
    this.backlog.clear();
    if (!port) return;
    try {
      port.unpipe();
      await closePort(port);
    } catch (err) {
      console.error(`📡 Serial ${this.path}: close failed: ${describeError(err)}`);
    }
  }
}
