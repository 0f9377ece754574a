import type { LogLevel } from './config';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

class Logger {
  private level: LogLevel = 'info';

  public setLevel(level: LogLevel): void {
    this.level = level;
  }

  public debug(message: string, ...meta: unknown[]): void {
    this.write('debug', message, meta);
  }

  public info(message: string, ...meta: unknown[]): void {
    this.write('info', message, meta);
  }

  public warn(message: string, ...meta: unknown[]): void {
    this.write('warn', message, meta);
  }

  public error(message: string, ...meta: unknown[]): void {
    this.write('error', message, meta);
  }

  private write(level: LogLevel, message: string, meta: unknown[]): void {
    if (LEVEL_RANK[level] < LEVEL_RANK[this.level]) {
      return;
    }

    const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
    if (level === 'error') {
      console.error(line, ...meta);
    } else if (level === 'warn') {
      console.warn(line, ...meta);
    } else {
      console.log(line, ...meta);
    }
  }
}

export const logger = new Logger();
