/**
 * Error taxonomy of the scanner.
 * "No pattern" is never an error: detectors return null for it.
 */

export type ScannerErrorCode =
  | 'DATA_ANOMALY'
  | 'FETCH_ERROR'
  | 'TIMEOUT'
  | 'STORE_UNAVAILABLE'
  | 'STORE_CONFLICT'
  | 'INVALID_CURSOR'
  | 'SCAN_IN_PROGRESS';

export class ScannerError extends Error {
  readonly code: ScannerErrorCode;

  constructor(code: ScannerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed, gapped or split-contaminated input. Aborts one ticker. */
export class DataAnomaly extends ScannerError {
  readonly ticker?: string;
  readonly index?: number;

  constructor(message: string, details: { ticker?: string; index?: number } = {}) {
    super('DATA_ANOMALY', message);
    this.ticker = details.ticker;
    this.index = details.index;
  }
}

/** Candle provider unavailable or returned an unusable response. */
export class FetchError extends ScannerError {
  readonly ticker: string;
  readonly status?: number;

  constructor(ticker: string, message: string, options?: { cause?: unknown; status?: number }) {
    super('FETCH_ERROR', message, options);
    this.ticker = ticker;
    this.status = options?.status;
  }
}

export class TimeoutError extends ScannerError {
  readonly ms: number;

  constructor(label: string, ms: number) {
    super('TIMEOUT', `${label} timed out after ${ms}ms`);
    this.ms = ms;
  }
}

export type StoreErrorKind = 'unavailable' | 'conflict';

export class StoreError extends ScannerError {
  readonly kind: StoreErrorKind;

  constructor(kind: StoreErrorKind, message: string, options?: { cause?: unknown }) {
    super(kind === 'unavailable' ? 'STORE_UNAVAILABLE' : 'STORE_CONFLICT', message, options);
    this.kind = kind;
  }
}

/** Client-supplied pagination token is malformed, tampered or stale. */
export class InvalidCursor extends ScannerError {
  constructor(reason: string) {
    super('INVALID_CURSOR', `Invalid cursor: ${reason}`);
  }
}

/** A batch scan is already running in this process. */
export class ScanInProgress extends ScannerError {
  constructor() {
    super('SCAN_IN_PROGRESS', 'A scan is already running');
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
