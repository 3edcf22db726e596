/**
 * Scan error hierarchy
 */

export type ScanErrorCode =
  | 'INVALID_TARGET'
  | 'INVALID_PORT_RANGE'
  | 'PROBE_TRANSPORT'
  | 'SCAN_CANCELLED';

/**
 * Base class for every error the scanner raises on purpose
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/**
 * Target is empty or does not resolve
 */
export class InvalidTargetError extends ScanError {
  readonly target: string;

  constructor(target: string, reason: string, options?: { cause?: unknown }) {
    super('INVALID_TARGET', reason, options);
    this.target = target;
  }
}

/**
 * Port selection is empty, malformed or outside 1-65535
 */
export class InvalidPortRangeError extends ScanError {
  constructor(message: string) {
    super('INVALID_PORT_RANGE', message);
  }
}

/**
 * Unexpected dialer failure. Never surfaced; the port is recorded as filtered.
 */
export class ProbeTransportError extends ScanError {
  readonly port: number;

  constructor(port: number, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super('PROBE_TRANSPORT', `Probe on port ${port} failed: ${detail}`, { cause });
    this.port = port;
  }
}

/**
 * Scan aborted before every probe completed
 */
export class CancellationError extends ScanError {
  readonly completed: number;
  readonly total: number;

  constructor(completed: number, total: number) {
    super('SCAN_CANCELLED', 'Scan cancelled');
    this.completed = completed;
    this.total = total;
  }
}

export function isScanError(error: unknown): error is ScanError {
  return error instanceof ScanError;
}
