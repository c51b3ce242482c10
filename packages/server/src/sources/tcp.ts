// ============================================================================
// LaunchTrack — TCP Socket Source
// ============================================================================
import { Socket } from 'net';
import type { ConnectResult, TelemetrySample } from '@launchtrack/shared';
import { describeError } from '../errors.js';
import { parsePayload } from './payload.js';
import { LineBacklog, type DataSource } from './types.js';

/** Longest record kept while waiting for its newline. */
export const MAX_LINE_LENGTH = 64 * 1024;
const WARN_EVERY = 100;

export interface TcpSourceOptions {
  host: string;
  port: number;
  connectTimeoutMs?: number;
}

/**
 * Client for a telemetry feed that writes one JSON record per line.
 * Incoming bytes are buffered as they arrive; `readData()` only ever looks
 * at what is already buffered.
 */
export class TcpSocketSource implements DataSource {
  readonly kind = 'tcp' as const;
  private socket: Socket | null = null;
  private isConnected = false;
  private partial = '';
  // Set while skipping the rest of an over-long record
  private overflowed = false;
  private backlog = new LineBacklog();
  private nextDropWarning = 1;
  private readonly host: string;
  private readonly port: number;
  private readonly connectTimeoutMs: number;

  constructor(options: TcpSourceOptions) {
    this.host = options.host;
    this.port = options.port;
    this.connectTimeoutMs = options.connectTimeoutMs ?? 5000;
  }

  get connected(): boolean { return this.isConnected; }
  get endpoint(): string { return `${this.host}:${this.port}`; }
  /** Characters received since the last newline. */
  get pending(): number { return this.partial.length; }

  connect(): Promise<ConnectResult> {
    return new Promise(resolve => {
      const socket = new Socket();
      this.socket = socket;
      let settled = false;

      const fail = (message: string) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        socket.destroy();
        if (this.socket === socket) this.socket = null;
        console.error(`📡 TCP: ${message}`);
        resolve({ ok: false, message });
      };

      const timeout = setTimeout(() => {
        fail(`Connection to ${this.endpoint} timed out after ${this.connectTimeoutMs}ms`);
      }, this.connectTimeoutMs);

      socket.setEncoding('utf8');

      socket.on('connect', () => {
        if (settled) return;
        settled = true;
        clearTimeout(timeout);
        this.isConnected = true;
        console.log(`📡 TCP connected to ${this.endpoint}`);
        resolve({ ok: true, message: `Connected to ${this.endpoint}` });
      });

      socket.on('data', (chunk: string) => this.receive(chunk));

      socket.on('error', (err: Error) => {
        if (!settled) {
          fail(`Connection to ${this.endpoint} failed: ${err.message}`);
          return;
        }
        console.error(`📡 TCP ${this.endpoint} error: ${err.message}`);
      });

      socket.on('close', () => {
        if (this.isConnected) console.log(`📡 TCP disconnected from ${this.endpoint}`);
        this.isConnected = false;
      });

      socket.connect(this.port, this.host);
    });
  }

  async disconnect(): Promise<void> {
    this.isConnected = false;
    this.partial = '';
    this.overflowed = false;
    this.backlog.clear();
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    try {
      socket.destroy();
    } catch (err) {
      console.error(`📡 TCP ${this.endpoint}: close failed: ${describeError(err)}`);
    }
  }

  readData(): TelemetrySample | null {
    if (!this.isConnected || !this.socket) return null;
    const line = this.backlog.shift();
    if (line === undefined) return null;
    return parsePayload(line, `TCP ${this.endpoint}`);
  }

  private receive(chunk: string) {
    const pieces = chunk.split('\n');
    const tail = pieces.pop() ?? '';
    for (const piece of pieces) {
      const line = this.partial + piece;
      this.partial = '';
      if (this.overflowed) {
        this.overflowed = false;
        continue;
      }
      if (line.length > MAX_LINE_LENGTH) {
        this.dropOversized(line);
        continue;
      }
      this.backlog.push(line);
    }

    if (!this.overflowed) {
      if (this.partial.length + tail.length > MAX_LINE_LENGTH) {
        this.dropOversized(this.partial || tail);
        this.partial = '';
        this.overflowed = true;
      } else {
        this.partial += tail;
      }
    }

    const dropped = this.backlog.dropped;
    if (dropped >= this.nextDropWarning) {
      console.warn(`📡 TCP ${this.endpoint}: reader falling behind, ${dropped} records dropped`);
      this.nextDropWarning = dropped + WARN_EVERY;
    }
  }

  private dropOversized(head: string) {
    console.error(`📡 TCP ${this.endpoint}: dropped payload (line exceeds ${MAX_LINE_LENGTH} characters): ${head.slice(0, 120)}`);
  }
}
