/**
 * Port scanning engine
 */

import { getMaxListeners, setMaxListeners } from 'events';
import pLimit from 'p-limit';
import { CancellationError, ProbeTransportError } from './errors.js';
import { tcpDialer } from './dialer.js';
import { normalizePorts } from './ports.js';
import { assertTarget, TargetResolver } from './resolver.js';
import { lookupService } from './services.js';
import { logger } from '../utils/logger.js';
import type {
  Dialer,
  PortResult,
  PortState,
  ProgressListener,
  ScanReport,
  ScanTarget,
} from './types.js';

const ABORTED = Symbol('aborted');

export const DEFAULT_TIMEOUT = 1000;
export const DEFAULT_CONCURRENCY = 20;

export interface PortScannerOptions {
  /** Per-connection timeout in milliseconds */
  timeout?: number;
  /** Maximum probes in flight */
  concurrency?: number;
  dialer?: Dialer;
  resolver?: TargetResolver;
}

export interface ScanOptions {
  signal?: AbortSignal;
  onProgress?: ProgressListener;
}

/**
 * Concurrent TCP connect scanner
 */
export class PortScanner {
  private timeout: number;
  private concurrency: number;
  private dialer: Dialer;
  private resolver: TargetResolver;

  constructor(options: PortScannerOptions = {}) {
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
    this.dialer = options.dialer ?? tcpDialer;
    this.resolver = options.resolver ?? new TargetResolver();

    if (!Number.isInteger(this.concurrency) || this.concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${this.concurrency}`);
    }
    if (!Number.isFinite(this.timeout) || this.timeout <= 0) {
      throw new RangeError(`Timeout must be a positive number, got ${this.timeout}`);
    }
  }

  /**
   * Scan `ports` on `target`.
   *
   * Resolves with a complete report, or rejects with InvalidTargetError,
   * InvalidPortRangeError or CancellationError. Partial results are never returned.
   */
  async scan(target: string, ports: Iterable<number>, options: ScanOptions = {}): Promise<ScanReport> {
    const { signal, onProgress } = options;
    const startTime = new Date();

    assertTarget(target);
    const portList = normalizePorts(ports);
    if (signal?.aborted) {
      throw new CancellationError(0, portList.length);
    }

    const scanTarget = await this.untilAborted(this.resolver.resolve(target), signal);
    if (scanTarget === ABORTED) {
      throw new CancellationError(0, portList.length);
    }
    logger.debug(
      `Scanning ${portList.length} ports on ${scanTarget.address} ` +
        `(concurrency ${this.concurrency}, timeout ${this.timeout}ms)`
    );

    // Single writer: only task continuations on the event loop touch this map.
    const collected = new Map<number, PortResult>();
    const active = new Set<Promise<PortResult>>();
    const limit = pLimit(this.concurrency);

    if (signal) {
      // one abort listener per in-flight probe, plus the wait below
      const needed = this.concurrency + 1;
      if (getMaxListeners(signal) < needed) {
        setMaxListeners(needed, signal);
      }
    }

    const tasks = portList.map((port) =>
      limit(async () => {
        if (signal?.aborted) return;

        const probe = this.probe(scanTarget.address, port, signal);
        active.add(probe);
        try {
          const result = await probe;
          if (signal?.aborted) return;
          collected.set(port, result);
          onProgress?.(result, collected.size, portList.length);
        } finally {
          active.delete(probe);
        }
      })
    );

    await this.untilAborted(Promise.all(tasks), signal);

    if (signal?.aborted) {
      limit.clearQueue();
      await Promise.allSettled(Array.from(active));
      logger.debug(`Scan aborted after ${collected.size}/${portList.length} probes`);
      throw new CancellationError(collected.size, portList.length);
    }

    return buildReport(scanTarget, portList, collected, startTime);
  }

  /**
   * Run one probe; any dialer failure is downgraded to filtered
   */
  private async probe(address: string, port: number, signal?: AbortSignal): Promise<PortResult> {
    const started = Date.now();
    let state: PortState;

    try {
      state = await this.dialer(address, port, { timeout: this.timeout, signal });
    } catch (error) {
      const transportError = new ProbeTransportError(port, error);
      logger.debug(transportError.message);
      state = 'filtered';
    }

    const latency = Date.now() - started;
    const service = state === 'open' ? lookupService(port) : undefined;
    return service === undefined ? { port, state, latency } : { port, state, service, latency };
  }

  /**
   * Wait for `work`, or stop waiting as soon as the signal aborts.
   * The abandoned promise keeps its handlers, so a late rejection is not unhandled.
   */
  private untilAborted<T>(work: Promise<T>, signal?: AbortSignal): Promise<T | typeof ABORTED> {
    if (!signal) {
      return work;
    }
    if (signal.aborted) {
      return Promise.resolve(ABORTED);
    }

    return new Promise<T | typeof ABORTED>((resolve, reject) => {
      const onAbort = () => resolve(ABORTED);
      signal.addEventListener('abort', onAbort, { once: true });
      void work.then(
        (value) => {
          signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }
}

/**
 * Assemble the immutable report from the collected results
 */
export function buildReport(
  target: ScanTarget,
  ports: readonly number[],
  collected: ReadonlyMap<number, PortResult>,
  startTime: Date
): ScanReport {
  const missing = ports.filter((port) => !collected.has(port));
  if (missing.length > 0 || collected.size !== ports.length) {
    throw new Error(`Scan incomplete: no result for ports ${missing.join(', ')}`);
  }

  let openCount = 0;
  let closedCount = 0;
  let filteredCount = 0;
  const open: PortResult[] = [];

  for (const result of collected.values()) {
    switch (result.state) {
      case 'open':
        openCount++;
        open.push(Object.freeze(result));
        break;
      case 'closed':
        closedCount++;
        break;
      default:
        filteredCount++;
    }
  }

  open.sort((a, b) => a.port - b.port);

  const endTime = new Date();
  return Object.freeze({
    target: Object.freeze({ ...target }),
    results: Object.freeze(open),
    summary: Object.freeze({
      totalScanned: collected.size,
      openCount,
      closedCount,
      filteredCount,
      elapsedMs: endTime.getTime() - startTime.getTime(),
    }),
    startTime,
    endTime,
  });
}

/**
 * One-shot scan with a fresh scanner
 */
export async function scan(
  target: string,
  ports: Iterable<number>,
  options: PortScannerOptions & ScanOptions = {}
): Promise<ScanReport> {
  const { signal, onProgress, ...scannerOptions } = options;
  return await new PortScanner(scannerOptions).scan(target, ports, { signal, onProgress });
}
