/**
 * Structured Logger for the routewright CLI
 *
 * Diagnostics are printed by the commands themselves; the logger carries
 * progress messages and the closing success or failure line.
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info';

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
  json?: boolean;
}

export class Logger {
  private verbose = false;
  private silent = false;
  private json = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
    this.json = options.json ?? false;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log('info', message, data);
  }

  success(message: string): void {
    if (this.silent || this.json) return;
    console.log(pc.green('✓'), message);
  }

  fail(message: string): void {
    if (this.json) return;
    console.log(pc.red('✗'), message);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (this.json) {
      console.log(
        JSON.stringify({
          timestamp: new Date().toISOString(),
          level,
          message,
          ...(data && { data }),
        })
      );
      return;
    }

    console.log(`${this.getPrefix(level)} ${message}`);

    if (this.verbose && data) {
      console.log(pc.dim(JSON.stringify(data, null, 2)));
    }
  }

  private getPrefix(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return pc.dim('[DEBUG]');
      case 'info':
        return pc.blue('[INFO]');
    }
  }
}

// Singleton logger instance
export const logger = new Logger();
