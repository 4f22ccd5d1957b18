// src/observability/types.ts

/**
 * Minimal logging contract the core depends on. The winston-backed `Logger`
 * satisfies it, and so does a test double.
 */
export interface LoggerLike {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Receives short progress lines (e.g. a terminal spinner).
 */
export interface StatusSink {
  update(text: string): void;
}

export const noopLogger: LoggerLike = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
};

export const noopStatus: StatusSink = {
  update: () => undefined,
};
