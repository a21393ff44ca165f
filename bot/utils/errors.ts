/**
 * Persisted ledger could not be read or parsed. The record is left as is.
 */
export class LedgerReadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerReadError";
  }
}

/**
 * Durable write failed. The previous record stays authoritative.
 */
export class LedgerWriteError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LedgerWriteError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * A snapshot file exists but does not hold the expected shape.
 */
export class SnapshotFormatError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SnapshotFormatError";
  }
}
