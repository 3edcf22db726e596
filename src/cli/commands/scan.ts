/**
 * Scan command implementation
 */

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { App, type AppDependencies } from '../../core/app.js';
import { DEFAULT_CONFIG, resolveConfig } from '../../core/config.js';
import { CancellationError, isScanError } from '../../core/errors.js';
import type { AppConfig } from '../../core/types.js';

const EXIT_OK = 0;
const EXIT_FAILURE = 1;
const EXIT_CANCELLED = 130;

export interface ScanCommandOptions {
  target: string;
  ports: string;
  concurrency: number;
  timeout: number;
  format: string;
  export?: string;
  quiet: boolean;
  verbose: boolean;
}

/**
 * Commander option parser for positive integers
 */
export function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(parsed)) {
    throw new InvalidArgumentError('Not a whole number.');
  }
  return parsed;
}

export const scanCommand = new Command('scan')
  .description('Scan a host for open TCP ports')
  .requiredOption('-H, --target <host>', 'Target hostname or IP address')
  .option(
    '-p, --ports <selection>',
    'Ports: "common", a range like 1-1024, or a list like 22,80,8000-8010',
    DEFAULT_CONFIG.ports
  )
  .option('-c, --concurrency <number>', 'Concurrent probes', parseInteger, DEFAULT_CONFIG.concurrency)
  .option('-t, --timeout <ms>', 'Connect timeout in milliseconds', parseInteger, DEFAULT_CONFIG.timeout)
  .option('-f, --format <type>', 'Output format: text|json', DEFAULT_CONFIG.format)
  .option('-e, --export <file>', 'Export results to file')
  .option('-q, --quiet', 'Suppress output', false)
  .option('-v, --verbose', 'Debug logging', false)
  .action(async (options: ScanCommandOptions) => {
    const controller = new AbortController();
    const onInterrupt = () => controller.abort();
    process.once('SIGINT', onInterrupt);

    try {
      // exit once stdout has drained
      process.exitCode = await runScan(options, controller.signal);
    } finally {
      process.removeListener('SIGINT', onInterrupt);
    }
  });

/**
 * Run one scan from raw command options and report failures on stderr.
 * @returns the process exit code
 */
export async function runScan(
  options: ScanCommandOptions,
  signal?: AbortSignal,
  deps: AppDependencies = {}
): Promise<number> {
  try {
    const config = resolveConfig(options);

    if (!config.quiet && config.format === 'text') {
      printStartBanner(config);
    }

    await new App(config, deps).run(signal);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof CancellationError) {
      console.error(
        chalk.yellow(`\n   Scan cancelled`) +
          chalk.gray(` (${error.completed}/${error.total} ports done, results discarded)\n`)
      );
      return EXIT_CANCELLED;
    }

    const message = error instanceof Error ? error.message : String(error);
    console.error(chalk.red.bold('\n   ✘ Scan failed'));
    console.error(chalk.red('   Error: ') + chalk.white(message));
    if (!isScanError(error)) {
      console.error(chalk.dim('\n   Check your input arguments or network connectivity.\n'));
    }
    return EXIT_FAILURE;
  }
}

function printStartBanner(config: AppConfig) {
  console.log(
    chalk.bold('\n   Target') + chalk.gray(' ──▶ ') + chalk.cyan.bold(config.target) + '\n'
  );
  console.log(chalk.dim('   Configuration'));
  console.log(chalk.gray('   ├─ Ports            : ') + chalk.white.bold(config.ports));
  console.log(chalk.gray('   ├─ Concurrency      : ') + chalk.white.bold(config.concurrency.toString()));
  console.log(chalk.gray('   ├─ Timeout          : ') + chalk.white(`${config.timeout}ms`));
  if (config.export) {
    console.log(chalk.gray('   ├─ Export File      : ') + chalk.blue(config.export));
  }
  console.log(chalk.gray('   └─ Output Format    : ') + chalk.magenta.bold(config.format.toUpperCase()));
  console.log();
}
