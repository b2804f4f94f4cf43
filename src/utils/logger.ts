/**
 * Logger utility for the planner core
 * debug/log output is dropped in production; warnings and errors always print
 */

type LogLevel = 'log' | 'warn' | 'error' | 'debug';

class Logger {
  private isDevelopment: boolean;
  private enabled = true;

  constructor() {
    this.isDevelopment = process.env.NODE_ENV !== 'production';
  }

  setEnabled(enabled: boolean): void {
    this.enabled = enabled;
  }

  private formatMessage(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.enabled) return;
    if (!this.isDevelopment && (level === 'log' || level === 'debug')) return;

    const timestamp = new Date().toISOString();
    const prefix = `[DayPlanner ${level.toUpperCase()}] ${timestamp}:`;

    switch (level) {
      case 'log':
        console.log(prefix, message, ...args);
        break;
      case 'warn':
        console.warn(prefix, message, ...args);
        break;
      case 'error':
        console.error(prefix, message, ...args);
        break;
      case 'debug':
        console.debug(prefix, message, ...args);
        break;
    }
  }

  log(message: string, ...args: unknown[]): void {
    this.formatMessage('log', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.formatMessage('warn', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.formatMessage('error', message, ...args);
  }

  debug(message: string, ...args: unknown[]): void {
    this.formatMessage('debug', message, ...args);
  }
}

export const logger = new Logger();
