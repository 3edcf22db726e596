import { Command } from 'commander';
import chalk from 'chalk';
import { COMMON_PORTS, WELL_KNOWN_PORTS } from '../../core/services.js';

/**
 * Lines of the well-known port listing; `*` marks members of the common preset
 */
export function serviceLines(): string[] {
  const common = new Set(COMMON_PORTS);
  return Array.from(WELL_KNOWN_PORTS.entries())
    .sort(([a], [b]) => a - b)
    .map(([port, name]) => `${common.has(port) ? '*' : ' '} ${String(port).padStart(5)}  ${name}`);
}

export const servicesCommand = new Command('services')
  .description('List the well-known port table used to label open ports')
  .action(() => {
    console.log(chalk.cyan.bold('\n   Well-known TCP ports\n'));
    for (const line of serviceLines()) {
      const marked = line.startsWith('*');
      console.log('   ' + (marked ? chalk.green(line) : chalk.white(line)));
    }
    console.log(chalk.gray(`\n   * included in the "common" preset (${COMMON_PORTS.length} ports)\n`));
  });
