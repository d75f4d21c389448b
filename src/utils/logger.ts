/**
 * Leveled, coloured console logging for the CLI and the generator.
 */
import chalk, { type ChalkInstance } from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type Sink = 'log' | 'warn' | 'error';

/**
 * Simple structured logger for the wrapgen CLI.
 */
class Logger {
  private level: LogLevel = 'info';

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.level];
  }

  private emit(sink: Sink, color: ChalkInstance, tag: string, message: string, data?: Record<string, unknown>): void {
    console[sink](color(`[${tag}] ${message}`));
    if (data) {
      console[sink](color(JSON.stringify(data, null, 2)));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.emit('log', chalk.gray, 'DEBUG', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('info')) return;
    this.emit('log', chalk.blue, 'INFO', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('warn')) return;
    this.emit('warn', chalk.yellow, 'WARN', message, data);
  }

  error(message: string, error?: Error | Record<string, unknown>): void {
    if (!this.shouldLog('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
    if (!error) return;
    if (error instanceof Error) {
      // Stacks only help when someone asked for them.
      console.error(chalk.red(this.level === 'debug' ? error.stack || error.message : error.message));
    } else {
      console.error(chalk.red(JSON.stringify(error, null, 2)));
    }
  }

  /**
   * Log the start of a generation phase (extract, validate, render, write).
   */
  phase(name: string, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog('debug')) return;
    this.emit('log', chalk.cyan, name.toUpperCase(), message, data);
  }

  /**
   * Log a success message (always shown unless silent).
   */
  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }
}

// Singleton instance
export const logger = new Logger();

export { Logger };
