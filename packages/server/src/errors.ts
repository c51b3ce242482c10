// ============================================================================
// LaunchTrack — Error Taxonomy
// ============================================================================

/** Opening a source failed. Reported once to the caller; no state is kept. */
export class ConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

/** A read from a live source failed. Transient. */
export class ReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReadError';
  }
}

/** An external payload could not be decoded into a sample. */
export class ParseError extends Error {
  readonly payload: string;

  constructor(message: string, payload: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ParseError';
    this.payload = payload;
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
