/**
 * Tests for report rendering
 */

import { describe, it, expect, beforeAll } from 'vitest';
import chalk from 'chalk';
import { formatJSON, formatRow, formatText, render, summaryLine } from '../src/core/report.js';
import type { ScanReport } from '../src/core/types.js';

const createReport = (overrides: Partial<ScanReport> = {}): ScanReport => ({
  target: { host: 'example.test', address: '192.0.2.10' },
  results: [
    { port: 22, state: 'open', service: 'SSH', latency: 3 },
    { port: 8081, state: 'open', latency: 12 },
  ],
  summary: {
    totalScanned: 3,
    openCount: 2,
    closedCount: 1,
    filteredCount: 0,
    elapsedMs: 1234,
  },
  startTime: new Date('2026-01-01T00:00:00.000Z'),
  endTime: new Date('2026-01-01T00:00:01.234Z'),
  ...overrides,
});

describe('report', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('should build the summary line', () => {
    expect(summaryLine(createReport())).toBe('2 open out of 3 scanned in 1.23 seconds');
  });

  it('should align table rows', () => {
    expect(formatRow({ port: 22, state: 'open', service: 'SSH', latency: 3 })).toBe(
      '22/tcp    open     SSH             3ms'
    );
    expect(formatRow({ port: 8081, state: 'open', latency: 12 })).toBe(
      '8081/tcp  open     -               12ms'
    );
  });

  it('should render target, open ports and counts as text', () => {
    const lines = formatText(createReport()).split('\n');

    expect(lines).toContain('   Target : example.test (192.0.2.10)');
    expect(lines).toContain('   22/tcp    open     SSH             3ms');
    expect(lines).toContain('   8081/tcp  open     -               12ms');
    expect(lines).toContain('   2 open out of 3 scanned in 1.23 seconds');
    expect(lines).toContain('   Closed: 1  Filtered: 0');
  });

  it('should omit the resolved address when the target is an IP', () => {
    const lines = formatText(
      createReport({ target: { host: '192.0.2.10', address: '192.0.2.10' } })
    ).split('\n');

    expect(lines).toContain('   Target : 192.0.2.10');
  });

  it('should say so when nothing is open', () => {
    const lines = formatText(
      createReport({
        results: [],
        summary: { totalScanned: 19, openCount: 0, closedCount: 17, filteredCount: 2, elapsedMs: 500 },
      })
    ).split('\n');

    expect(lines).toContain('   No open ports found');
    expect(lines).toContain('   0 open out of 19 scanned in 0.50 seconds');
    expect(lines).toContain('   Closed: 17  Filtered: 2');
  });

  it('should serialize the report as JSON', () => {
    const parsed: unknown = JSON.parse(formatJSON(createReport()));

    expect(parsed).toEqual({
      target: { host: 'example.test', address: '192.0.2.10' },
      results: [
        { port: 22, state: 'open', service: 'SSH', latency: 3 },
        { port: 8081, state: 'open', latency: 12 },
      ],
      summary: {
        totalScanned: 3,
        openCount: 2,
        closedCount: 1,
        filteredCount: 0,
        elapsedMs: 1234,
      },
      startTime: '2026-01-01T00:00:00.000Z',
      endTime: '2026-01-01T00:00:01.234Z',
    });
  });

  it('should dispatch on format', () => {
    const report = createReport();
    expect(render(report, 'json')).toBe(formatJSON(report));
    expect(render(report, 'text')).toBe(formatText(report));
  });
});
