import type { ConnectResult, SourceKind, TelemetrySample } from '@launchtrack/shared';

/**
 * Capability shared by every telemetry source. Each implementation owns its
 * own `connected` flag and connection handle.
 *
 * - `connect()` resolves with a human-readable result and never rejects.
 * - `disconnect()` is idempotent, releases any OS handle and never rejects.
 * - `readData()` does not block; it returns null when nothing new is available.
 */
export interface DataSource {
  readonly kind: SourceKind;
  readonly connected: boolean;
  connect(): Promise<ConnectResult>;
  disconnect(): Promise<void>;
  readData(): TelemetrySample | null;
}

/** Newline-delimited records waiting for `readData()`. */
export class LineBacklog {
  private lines: string[] = [];
  dropped = 0;

  constructor(private readonly limit = 1000) {}

  get size(): number {
    return this.lines.length;
  }

  push(line: string): void {
    const text = line.trim();
    if (!text) return;
    this.lines.push(text);
    if (this.lines.length > this.limit) {
      this.lines.shift();
      this.dropped++;
    }
  }

  shift(): string | undefined {
    return this.lines.shift();
  }

  clear(): void {
    this.lines = [];
  }
}
