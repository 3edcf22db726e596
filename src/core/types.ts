/**
 * Type definitions for PORTSCOUT
 */

/**
 * Output formats supported by the renderer
 */
export type OutputFormat = 'text' | 'json';

/**
 * Application configuration
 */
export interface AppConfig {
  target: string;
  ports: string;
  concurrency: number;
  timeout: number;
  format: OutputFormat;
  export?: string;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Host being scanned. `host` is the user input, `address` the resolved IP.
 */
export interface ScanTarget {
  readonly host: string;
  readonly address: string;
}

/**
 * Outcome of a single connection probe
 */
export type PortState = 'open' | 'closed' | 'filtered';

/**
 * Per-port result
 */
export interface PortResult {
  readonly port: number;
  readonly state: PortState;
  readonly service?: string;
  /** Probe duration in milliseconds */
  readonly latency: number;
}

/**
 * Aggregate counts for a finished scan
 */
export interface ScanSummary {
  readonly totalScanned: number;
  readonly openCount: number;
  readonly closedCount: number;
  readonly filteredCount: number;
  readonly elapsedMs: number;
}

/**
 * Complete scan report. `results` only lists open ports, ascending.
 */
export interface ScanReport {
  readonly target: ScanTarget;
  readonly results: readonly PortResult[];
  readonly summary: ScanSummary;
  readonly startTime: Date;
  readonly endTime: Date;
}

export interface DialOptions {
  timeout: number;
  signal?: AbortSignal;
}

/**
 * Attempts one TCP connection and classifies the outcome.
 * Implementations must settle within `timeout` and release the socket when `signal` aborts.
 */
export type Dialer = (host: string, port: number, options: DialOptions) => Promise<PortState>;

/**
 * Maps a hostname to a single IP address
 */
export type LookupFn = (hostname: string) => Promise<string>;

/**
 * Called once per completed probe
 */
export type ProgressListener = (result: PortResult, completed: number, total: number) => void;

/**
 * Logger levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
