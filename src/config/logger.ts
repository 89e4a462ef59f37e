/**
 * Winston Logger Configuration
 *
 * Structured JSON logging. Every component receives the logger through its
 * constructor and scopes it with child(); nothing imports a shared instance.
 */

import winston from 'winston';

export interface LoggerOptions {
  serviceName: string;
  level: string;
  /** Extra file transport, e.g. maintenance.log */
  file?: string;
  defaultMeta?: Record<string, unknown>;
  silent?: boolean;
}

export type Logger = winston.Logger;

export function createLogger(options: LoggerOptions): Logger {
  const transports: winston.transport[] = [new winston.transports.Console()];
  if (options.file) {
    transports.push(new winston.transports.File({ filename: options.file }));
  }

  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    defaultMeta: { service: options.serviceName, ...options.defaultMeta },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports,
  });
}
