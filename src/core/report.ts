/**
 * Report renderers
 */

import chalk from 'chalk';
import type { OutputFormat, PortResult, ScanReport } from './types.js';

const COLUMNS = { port: 10, state: 9, service: 16 } as const;

/**
 * One-line summary, e.g. "2 open out of 19 scanned in 1.04 seconds"
 */
export function summaryLine(report: ScanReport): string {
  const { openCount, totalScanned, elapsedMs } = report.summary;
  return `${openCount} open out of ${totalScanned} scanned in ${(elapsedMs / 1000).toFixed(2)} seconds`;
}

export function formatRow(result: PortResult): string {
  const port = `${result.port}/tcp`.padEnd(COLUMNS.port);
  const state = result.state.padEnd(COLUMNS.state);
  const service = (result.service ?? '-').padEnd(COLUMNS.service);
  return `${chalk.cyan(port)}${chalk.green(state)}${chalk.white(service)}${chalk.dim(`${result.latency}ms`)}`;
}

export function formatText(report: ScanReport): string {
  const lines: string[] = [];
  const { target, summary } = report;

  lines.push(chalk.cyan.bold('\n╔════════════════════════════════════════════════════════════╗'));
  lines.push(chalk.cyan.bold('║                     PORTSCOUT RESULTS                      ║'));
  lines.push(chalk.cyan.bold('╚════════════════════════════════════════════════════════════╝\n'));

  const resolved = target.address === target.host ? '' : chalk.gray(` (${target.address})`);
  lines.push(`   Target : ${chalk.cyan.bold(target.host)}${resolved}\n`);

  if (report.results.length > 0) {
    lines.push(
      chalk.bold(
        '   ' +
          'PORT'.padEnd(COLUMNS.port) +
          'STATE'.padEnd(COLUMNS.state) +
          'SERVICE'.padEnd(COLUMNS.service) +
          'LATENCY'
      )
    );
    for (const result of report.results) {
      lines.push(`   ${formatRow(result)}`);
    }
  } else {
    lines.push(chalk.yellow('   No open ports found'));
  }

  lines.push('');
  lines.push(`   ${chalk.white.bold(summaryLine(report))}`);
  lines.push(
    chalk.gray(`   Closed: ${summary.closedCount}  Filtered: ${summary.filteredCount}\n`)
  );

  return lines.join('\n');
}

export function formatJSON(report: ScanReport): string {
  return JSON.stringify(report, null, 2);
}

export function render(report: ScanReport, format: OutputFormat): string {
  switch (format) {
    case 'json':
      return formatJSON(report);
    default:
      return formatText(report);
  }
}
