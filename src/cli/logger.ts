import winston from 'winston';

import { Logger, LogLevel } from '../log.js';

export function createLogger(level: LogLevel): winston.Logger {
  return winston.createLogger({
    level,
    format: winston.format.combine(
      winston.format.timestamp({ alias: '@timestamp' }),
      winston.format((info) => {
        delete info.timestamp;
        return info;
      })(),
      winston.format.json()
    ),
    defaultMeta: { service: 'pdfpng' },
    // Everything goes to stderr, stdout is reserved for command output
    transports: [
      new winston.transports.Console({
        stderrLevels: ['debug', 'info', 'warn', 'error'],
      }),
    ],
  });
}

export class WinstonLogger implements Logger {
  private logger: winston.Logger;
  constructor(logger: winston.Logger) {
    this.logger = logger;
  }

  setLevel(level: LogLevel): void {
    this.logger.level = level;
  }

  debug(msg: string, ...args: unknown[]): void {
    this.logger.debug(msg, ...args);
  }

  info(msg: string, ...args: unknown[]): void {
    this.logger.info(msg, ...args);
  }

  warn(msg: string, ...args: unknown[]): void {
    this.logger.warn(msg, ...args);
  }

  error(msg: string, ...args: unknown[]): void {
    this.logger.error(msg, ...args);
  }
}
