/**
 * Tests for the scan command runner
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import chalk from 'chalk';
import { runScan, type ScanCommandOptions } from '../src/cli/commands/scan.js';
import { logger } from '../src/utils/logger.js';
import { instrumentedDialer } from './helpers/network.js';

const baseOptions: ScanCommandOptions = {
  target: 'scan.test',
  ports: '80,443',
  concurrency: 20,
  timeout: 1000,
  format: 'json',
  quiet: false,
  verbose: false,
};

describe('runScan', () => {
  let outputs: string[];
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;
  const lookup = async () => '127.0.0.1';
  const write = (output: string) => outputs.push(output);

  beforeEach(() => {
    outputs = [];
    chalk.level = 0;
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit called');
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    logger.setQuiet(false);
    logger.setLevel('info');
  });

  it('should return 0 after writing the JSON report', async () => {
    const { dialer } = instrumentedDialer([443]);

    const code = await runScan(baseOptions, undefined, { dialer, lookup, write });

    expect(code).toBe(0);
    expect(exitSpy).not.toHaveBeenCalled();
    expect(outputs).toHaveLength(1);
    expect(JSON.parse(outputs[0])).toMatchObject({
      results: [{ port: 443, state: 'open', service: 'HTTPS' }],
      summary: { totalScanned: 2, openCount: 1, closedCount: 1 },
    });
  });

  it('should return 130 when the scan is cancelled', async () => {
    const { dialer, stats } = instrumentedDialer([443]);
    const controller = new AbortController();
    controller.abort();

    const code = await runScan(baseOptions, controller.signal, { dialer, lookup, write });

    expect(code).toBe(130);
    expect(exitSpy).not.toHaveBeenCalled();
    expect(stats.calls).toBe(0);
    expect(outputs).toHaveLength(0);
    expect(errorSpy).toHaveBeenCalledWith(
      '\n   Scan cancelled (0/2 ports done, results discarded)\n'
    );
  });

  it('should return 1 for an invalid port selection', async () => {
    const { dialer, stats } = instrumentedDialer([]);

    const code = await runScan({ ...baseOptions, ports: '90-80' }, undefined, {
      dialer,
      lookup,
      write,
    });

    expect(code).toBe(1);
    expect(exitSpy).not.toHaveBeenCalled();
    expect(stats.calls).toBe(0);
    expect(errorSpy).toHaveBeenCalledWith('   Error: Range start 90 is greater than end 80');
  });

  it('should return 1 for an invalid format', async () => {
    const code = await runScan({ ...baseOptions, format: 'xml' }, undefined, { lookup, write });

    expect(code).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('   Error: Invalid format: xml. Use text or json.');
  });
});
