export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  setLevel(level: LogLevel): void;
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Simple logger that simply outputs to the console */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  constructor(level: LogLevel = 'warn') {
    this.level = level;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  debug(message: string, ...args: unknown[]): void {
    if (this.level === 'debug') {
      console.debug(message, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.level !== 'error' && this.level !== 'warn') {
      console.info(message, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.level !== 'error') {
      console.warn(message, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    console.error(message, ...args);
  }
}

export function isLogLevel(value: string): value is LogLevel {
  return ['debug', 'info', 'warn', 'error'].includes(value);
}

let logger: Logger = new ConsoleLogger();

export function setLogger(newLogger: Logger): void {
  logger = newLogger;
}

/** Proxy that always forwards to the currently installed logger, so modules
 *  importing the default export pick up loggers installed later on. */
const log: Logger = {
  setLevel: (level) => logger.setLevel(level),
  debug: (message, ...args) => logger.debug(message, ...args),
  info: (message, ...args) => logger.info(message, ...args),
  warn: (message, ...args) => logger.warn(message, ...args),
  error: (message, ...args) => logger.error(message, ...args),
};

export { log as default };
