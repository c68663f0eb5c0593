import { LogEntry } from '../types/index.js';

/**
 * Diagnostics go to stderr so that stdout stays free for MCP frames and CLI
 * results. `log` is the one method that writes to stdout.
 */
export class Logger {
  private verbose: boolean;
  private readonly scope?: string;

  constructor(options: { scope?: string; verbose?: boolean } = {}) {
    this.scope = options.scope;
    this.verbose = options.verbose ?? false;
  }

  child(scope: string): Logger {
    return new Logger({ scope, verbose: this.verbose });
  }

  private createLogEntry(
    level: LogEntry['level'],
    message: string,
    context?: Record<string, unknown>
  ): LogEntry {
    return {
      timestamp: new Date().toISOString(),
      level,
      scope: this.scope,
      message,
      context,
    };
  }

  formatMessage(entry: LogEntry): string {
    const level = entry.level.toUpperCase().padEnd(5);
    const scope = entry.scope ? ` [${entry.scope}]` : '';
    let message = `[${entry.timestamp}] ${level}${scope} ${entry.message}`;

    if (entry.context && Object.keys(entry.context).length > 0) {
      message += ` ${JSON.stringify(entry.context)}`;
    }

    return message;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.verbose) {
      console.error(this.formatMessage(this.createLogEntry('debug', message, context)));
    }
  }

  info(message: string, context?: Record<string, unknown>): void {
    console.error(this.formatMessage(this.createLogEntry('info', message, context)));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    console.error(this.formatMessage(this.createLogEntry('warn', message, context)));
  }

  error(message: string, context?: Record<string, unknown>): void {
    console.error(this.formatMessage(this.createLogEntry('error', message, context)));
  }

  log(message: string): void {
    console.log(message);
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }
}
