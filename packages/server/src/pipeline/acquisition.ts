// ============================================================================
// LaunchTrack — Acquisition Loop
// ============================================================================
import type { TelemetrySample } from '@launchtrack/shared';
import { ReadError, describeError } from '../errors.js';
import type { DataSource } from '../sources/types.js';
import type { SampleQueue } from './queue.js';

function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal.aborted) return resolve();
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Producer side of the pipeline: polls one source at a fixed cadence and
 * forwards samples to the queue. Read failures are logged and counted; they
 * never end the loop. Only `stop()` does.
 */
export class AcquisitionLoop {
  private controller: AbortController | null = null;
  private loop: Promise<void> | null = null;
  private readErrors = 0;
  private reads = 0;

  constructor(
    private readonly source: DataSource,
    private readonly queue: SampleQueue<TelemetrySample>,
    private readonly intervalMs = 50,
  ) {}

  get running(): boolean { return this.controller !== null; }
  get stats() { return { reads: this.reads, readErrors: this.readErrors }; }

  start() {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    this.loop = this.run(controller.signal);
  }

  /** Resolves once the loop has observed the stop signal and exited. */
  async stop(): Promise<void> {
    this.controller?.abort();
    this.controller = null;
    const loop = this.loop;
    if (!loop) return;
    await loop;
    if (this.loop === loop) this.loop = null;
  }

  /** One iteration's read. */
  poll() {
    this.reads++;
    try {
      const sample = this.source.readData();
      if (sample) this.queue.put(sample);
    } catch (err) {
      this.readErrors++;
      const error = err instanceof ReadError ? err : new ReadError(describeError(err), { cause: err });
      console.error(`📡 ${this.source.kind} read error: ${error.message}`);
    }
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      this.poll();
      await pause(this.intervalMs, signal);
    }
  }
}
