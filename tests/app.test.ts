/**
 * Tests for the App orchestrator
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { App } from '../src/core/app.js';
import { resolveConfig } from '../src/core/config.js';
import { InvalidPortRangeError } from '../src/core/errors.js';
import { logger } from '../src/utils/logger.js';
import { instrumentedDialer } from './helpers/network.js';

describe('App', () => {
  let outputs: string[];
  let workDir: string;

  beforeEach(async () => {
    outputs = [];
    workDir = await mkdtemp(join(tmpdir(), 'portscout-'));
  });

  afterEach(async () => {
    logger.setQuiet(false);
    logger.setLevel('info');
    await rm(workDir, { recursive: true, force: true });
  });

  const lookup = async () => '127.0.0.1';
  const write = (output: string) => outputs.push(output);

  it('should scan the parsed selection and print the report', async () => {
    const { dialer, stats } = instrumentedDialer([22]);
    const config = resolveConfig({ target: 'scan.test', ports: '20-23', format: 'json' });

    const report = await new App(config, { dialer, lookup, write }).run();

    expect(stats.calls).toBe(4);
    expect(report.summary.openCount).toBe(1);
    expect(outputs).toHaveLength(1);
    expect(JSON.parse(outputs[0])).toMatchObject({
      target: { host: 'scan.test', address: '127.0.0.1' },
      results: [{ port: 22, state: 'open', service: 'SSH' }],
      summary: { totalScanned: 4, openCount: 1, closedCount: 3, filteredCount: 0 },
    });
  });

  it('should export the rendered output', async () => {
    const { dialer } = instrumentedDialer([80]);
    const file = join(workDir, 'report.json');
    const config = resolveConfig({
      target: 'scan.test',
      ports: '80,443',
      format: 'json',
      export: file,
      quiet: true,
    });

    await new App(config, { dialer, lookup, write }).run();

    const exported = await readFile(file, 'utf-8');
    expect(outputs).toHaveLength(0);
    expect(JSON.parse(exported)).toMatchObject({
      results: [{ port: 80, state: 'open', service: 'HTTP' }],
      summary: { totalScanned: 2, openCount: 1 },
    });
  });

  it('should apply quiet and verbose settings to the logger', () => {
    const config = resolveConfig({ target: 'scan.test', quiet: true, verbose: true });

    new App(config, { lookup, write });

    expect(logger.isQuiet()).toBe(true);
    expect(logger.getLevel()).toBe('debug');
  });

  it('should reject a malformed port selection before scanning', async () => {
    const { dialer, stats } = instrumentedDialer([]);
    const config = resolveConfig({ target: 'scan.test', ports: '22,ssh', quiet: true });

    await expect(new App(config, { dialer, lookup, write }).run()).rejects.toBeInstanceOf(
      InvalidPortRangeError
    );
    expect(stats.calls).toBe(0);
  });
});
