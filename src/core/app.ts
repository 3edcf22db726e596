/**
 * Main application orchestrator
 */
import { writeFile } from 'fs/promises';
import chalk from 'chalk';
import { parsePortSelection } from './ports.js';
import { render } from './report.js';
import { TargetResolver } from './resolver.js';
import { PortScanner } from './scanner.js';
import { logger } from '../utils/logger.js';
import type { AppConfig, Dialer, LookupFn, ScanReport } from './types.js';

/**
 * Injection points, mainly for tests
 */
export interface AppDependencies {
  dialer?: Dialer;
  lookup?: LookupFn;
  /** Receives rendered output; defaults to stdout */
  write?: (output: string) => void;
}

/**
 * Runs one scan from a validated config: parse ports, scan, render, export
 */
export class App {
  private config: AppConfig;
  private scanner: PortScanner;
  private write: (output: string) => void;

  constructor(config: AppConfig, deps: AppDependencies = {}) {
    this.config = config;
    this.scanner = new PortScanner({
      timeout: config.timeout,
      concurrency: config.concurrency,
      dialer: deps.dialer,
      resolver: new TargetResolver(deps.lookup),
    });
    this.write = deps.write ?? ((output) => console.log(output));

    logger.setQuiet(config.quiet);
    logger.setLevel(config.verbose ? 'debug' : 'info');
  }

  async run(signal?: AbortSignal): Promise<ScanReport> {
    const ports = parsePortSelection(this.config.ports);

    logger.info(
      chalk.cyan(`Scanning ${ports.length} ports on ${this.config.target}`) +
        chalk.gray(` (concurrency ${this.config.concurrency}, timeout ${this.config.timeout}ms)`)
    );

    try {
      const report = await this.scanner.scan(this.config.target, ports, {
        signal,
        onProgress: (_result, completed, total) => logger.progress('Probing', completed, total),
      });

      await this.outputResults(report);
      return report;
    } finally {
      logger.clearProgress();
    }
  }

  private async outputResults(report: ScanReport): Promise<void> {
    const output = render(report, this.config.format);

    if (!this.config.quiet) {
      this.write(output);
    }

    if (this.config.export) {
      await writeFile(this.config.export, output, 'utf-8');
      logger.info(`Results exported to: ${this.config.export}`);
    }
  }
}
