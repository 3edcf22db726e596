#!/usr/bin/env node

/**
 * PORTSCOUT CLI Entry Point
 */

import { Command, CommanderError } from 'commander';
import chalk from 'chalk';
import { scanCommand } from './commands/scan.js';
import { servicesCommand } from './commands/services.js';
import { VERSION } from '../index.js';

const program = new Command();

program
  .name('portscout')
  .description('Concurrent TCP port scanner with well-known service labels')
  .version(VERSION);

const banner = `
${chalk.cyan('╔═══════════════════════════════════════════════════════════╗')}
${chalk.cyan('║')}  ${chalk.bold.white('PORTSCOUT')} ${chalk.gray(`v${VERSION}`)}                                    ${chalk.cyan('║')}
${chalk.cyan('║')}  ${chalk.gray('Concurrent TCP Port Scanner')}                              ${chalk.cyan('║')}
${chalk.cyan('╚═══════════════════════════════════════════════════════════╝')}
`;

program.addHelpText('beforeAll', banner);

program.addCommand(scanCommand);
program.addCommand(servicesCommand);

program.exitOverride();

try {
  await program.parseAsync(process.argv);
} catch (error) {
  if (error instanceof CommanderError) {
    // help, version or a usage error commander has already printed
    process.exitCode = error.exitCode;
  } else if (error instanceof Error) {
    console.error(chalk.red(`\n❌ Error: ${error.message}\n`));
    process.exitCode = 1;
  } else {
    throw error;
  }
}
