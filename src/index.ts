/**
 * PORTSCOUT - Concurrent TCP Port Scanner
 * Main entry point for programmatic usage
 */

import { parsePortSelection } from './core/ports.js';
import { scan, type PortScannerOptions, type ScanOptions } from './core/scanner.js';
import type { ScanReport } from './core/types.js';

export { App } from './core/app.js';
export { PortScanner, scan, buildReport, DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT } from './core/scanner.js';
export type { PortScannerOptions, ScanOptions } from './core/scanner.js';
export { createTcpDialer, tcpDialer } from './core/dialer.js';
export { TargetResolver, systemLookup } from './core/resolver.js';
export { parsePortSelection, normalizePorts, expandRange, isValidPort } from './core/ports.js';
export { WELL_KNOWN_PORTS, COMMON_PORTS, lookupService } from './core/services.js';
export { formatText, formatJSON, summaryLine, render } from './core/report.js';
export { resolveConfig, DEFAULT_CONFIG } from './core/config.js';
export * from './core/errors.js';
export * from './core/types.js';

/**
 * Version information
 */
export const VERSION = '1.0.0';

/**
 * Quick scan interface for programmatic usage
 * @example
 * ```typescript
 * import { quickScan } from 'portscout';
 *
 * const report = await quickScan('scanme.local', 'common', { concurrency: 20 });
 * console.log(report.summary.openCount);
 * ```
 */
export async function quickScan(
  target: string,
  ports = 'common',
  options: PortScannerOptions & ScanOptions = {}
): Promise<ScanReport> {
  return await scan(target, parsePortSelection(ports), options);
}
