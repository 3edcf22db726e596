/**
 * Application configuration defaults and validation
 */

import { DEFAULT_CONCURRENCY, DEFAULT_TIMEOUT } from './scanner.js';
import type { AppConfig, OutputFormat } from './types.js';

export const MAX_CONCURRENCY = 1000;
export const MAX_TIMEOUT = 60000;

const FORMATS: readonly string[] = ['text', 'json'];

export const DEFAULT_CONFIG: Readonly<Omit<AppConfig, 'target'>> = Object.freeze({
  ports: 'common',
  concurrency: DEFAULT_CONCURRENCY,
  timeout: DEFAULT_TIMEOUT,
  format: 'text',
  quiet: false,
  verbose: false,
});

/**
 * Raw, unvalidated options as they come from the CLI or a caller
 */
export interface ConfigInput {
  target: string;
  ports?: string;
  concurrency?: number;
  timeout?: number;
  format?: string;
  export?: string;
  quiet?: boolean;
  verbose?: boolean;
}

export function isOutputFormat(value: string): value is OutputFormat {
  return FORMATS.includes(value);
}

/**
 * Merge user options over the defaults and validate the result
 */
export function resolveConfig(input: ConfigInput): AppConfig {
  const concurrency = input.concurrency ?? DEFAULT_CONFIG.concurrency;
  const timeout = input.timeout ?? DEFAULT_CONFIG.timeout;
  const format = input.format ?? DEFAULT_CONFIG.format;

  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw new Error(`Invalid concurrency: ${concurrency}. Use 1-${MAX_CONCURRENCY}.`);
  }
  if (!Number.isInteger(timeout) || timeout < 1 || timeout > MAX_TIMEOUT) {
    throw new Error(`Invalid timeout: ${timeout}. Use 1-${MAX_TIMEOUT} ms.`);
  }
  if (!isOutputFormat(format)) {
    throw new Error(`Invalid format: ${format}. Use text or json.`);
  }

  return {
    target: input.target,
    ports: input.ports ?? DEFAULT_CONFIG.ports,
    concurrency,
    timeout,
    format,
    export: input.export,
    quiet: input.quiet ?? DEFAULT_CONFIG.quiet,
    verbose: input.verbose ?? DEFAULT_CONFIG.verbose,
  };
}
