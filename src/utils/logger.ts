/**
 * Levelled, coloured logging.
 *
 * Every level writes to stderr; stdout is reserved for hostnames.
 */

import chalk, { type ChalkInstance } from 'chalk';
import type { LogLevel } from '../core/types.js';

const LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Level and quiet flag, captured so a library call can put them back
 */
export interface LoggerState {
  level: LogLevel;
  quiet: boolean;
}

class Logger {
  private state: LoggerState = { level: 'info', quiet: false };

  setLevel(level: LogLevel) {
    this.state.level = level;
  }

  setQuiet(quiet: boolean) {
    this.state.quiet = quiet;
  }

  isQuiet(): boolean {
    return this.state.quiet;
  }

  snapshot(): LoggerState {
    return { ...this.state };
  }

  restore(state: LoggerState) {
    this.state = { ...state };
  }

  debug(message: string, ...args: unknown[]) {
    this.write('debug', chalk.gray, 'DEBUG', message, args);
  }

  info(message: string, ...args: unknown[]) {
    this.write('info', chalk.blue, 'INFO', message, args);
  }

  warn(message: string, ...args: unknown[]) {
    this.write('warn', chalk.yellow, 'WARN', message, args);
  }

  error(message: string, ...args: unknown[]) {
    this.write('error', chalk.red, 'ERROR', message, args);
  }

  /** info level */
  success(message: string, ...args: unknown[]) {
    this.write('info', chalk.green, '✓', message, args);
  }

  /** info level, with a percentage of `total` */
  progress(message: string, current: number, total: number) {
    const percentage = Math.round((current / total) * 100);
    this.write('info', chalk.cyan, `${percentage}%`, `${message} (${current}/${total})`, []);
  }

  private write(level: LogLevel, color: ChalkInstance, tag: string, message: string, args: unknown[]) {
    if (this.state.quiet || LEVELS[level] < LEVELS[this.state.level]) {
      return;
    }
    console.error(color(`[${tag}] ${message}`), ...args);
  }
}

/**
 * Global logger instance
 */
export const logger = new Logger();
