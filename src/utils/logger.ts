/**
 * Levelled console logger
 */

import chalk from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

class Logger {
  private level: LogLevel = 'info';
  private quiet = false;

  setLevel(level: LogLevel) {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Quiet mode silences everything, errors included
   */
  setQuiet(quiet: boolean) {
    this.quiet = quiet;
  }

  isQuiet(): boolean {
    return this.quiet;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.quiet && LEVELS[level] >= LEVELS[this.level];
  }

  debug(message: string, ...args: unknown[]) {
    if (this.shouldLog('debug')) {
      console.error(chalk.gray(`[DEBUG] ${message}`), ...args);
    }
  }

  info(message: string, ...args: unknown[]) {
    if (this.shouldLog('info')) {
      console.error(chalk.blue(`[INFO] ${message}`), ...args);
    }
  }

  /**
   * Single-line progress indicator. Redraws in place on a TTY, otherwise only logs at debug.
   */
  progress(message: string, current: number, total: number) {
    if (!this.shouldLog('info') || total === 0) {
      return;
    }

    const percentage = Math.round((current / total) * 100);
    const line = chalk.cyan(`[${percentage}%] ${message} (${current}/${total})`);

    if (process.stderr.isTTY) {
      process.stderr.write(`\r${line}`);
      if (current === total) process.stderr.write('\n');
    } else {
      this.debug(`${message} (${current}/${total})`);
    }
  }

  /**
   * Erase a progress line left by `progress`
   */
  clearProgress() {
    if (!this.quiet && process.stderr.isTTY) {
      process.stderr.write('\r\x1b[2K');
    }
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
