// src/observability/Logger.ts

import winston from 'winston';
import type { LoggerLike } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LoggerConfig {
  level?: LogLevel;
  format?: 'json' | 'pretty';
  silent?: boolean;
}

const ALL_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export class Logger implements LoggerLike {
  private logger: winston.Logger;

  constructor(config: LoggerConfig = {}) {
    const format =
      config.format === 'json'
        ? winston.format.json()
        : winston.format.combine(winston.format.colorize(), winston.format.simple());

    this.logger = winston.createLogger({
      level: config.level ?? 'info',
      format,
      silent: config.silent ?? false,
      // stdout carries command output; diagnostics go to stderr
      transports: [new winston.transports.Console({ stderrLevels: ALL_LEVELS })],
    });
  }

  get level(): string {
    return this.logger.level;
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.logger.debug(message, meta ?? {});
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.logger.info(message, meta ?? {});
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.logger.warn(message, meta ?? {});
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.logger.error(message, meta ?? {});
  }
}
