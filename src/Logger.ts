import { type LogLevel, LOG_LEVEL_ORDER } from './config';

type ConsoleMethod = (msg: string, ...data: unknown[]) => void;

const CONSOLE_METHODS: Record<LogLevel, ConsoleMethod> = {
  error: (msg, ...data) => console.error(msg, ...data),
  warn: (msg, ...data) => console.warn(msg, ...data),
  log: (msg, ...data) => console.log(msg, ...data),
  verbose: (msg, ...data) => console.log(msg, ...data),
};

/**
 * Console logger filtered by the current logLevel setting.
 * The level is read on every call, so setting changes apply at once.
 */
export class Logger {
  constructor(private getLogLevel: () => LogLevel) {}

  verbose(msg: string, ...data: unknown[]): void {
    this.write('verbose', msg, data);
  }

  log(msg: string, ...data: unknown[]): void {
    this.write('log', msg, data);
  }

  warn(msg: string, ...data: unknown[]): void {
    this.write('warn', msg, data);
  }

  error(msg: string, ...data: unknown[]): void {
    this.write('error', msg, data);
  }

  private write(level: LogLevel, msg: string, data: unknown[]): void {
    if (LOG_LEVEL_ORDER[level] <= LOG_LEVEL_ORDER[this.getLogLevel()]) {
      CONSOLE_METHODS[level](msg, ...data);
    }
  }
}
