// src/core/pagination/pacing.ts

import { setTimeout as delay } from 'timers/promises';
import { OperationCancelledError } from '../../utils/errors';
import { noopStatus, StatusSink } from '../../observability/types';

export interface PacingWindow {
  minDelayMs: number;
  maxDelayMs: number;
}

/**
 * Whole number of milliseconds drawn uniformly from `[minDelayMs, maxDelayMs]`.
 */
export function randomDelay(window: PacingWindow, random: () => number = Math.random): number {
  const span = Math.max(0, window.maxDelayMs - window.minDelayMs);
  return window.minDelayMs + Math.floor(random() * (span + 1));
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  throwIfAborted(signal);
  if (ms <= 0) return;

  try {
    await delay(ms, undefined, { signal });
  } catch (error: unknown) {
    if (signal?.aborted) {
      throw new OperationCancelledError();
    }
    throw error;
  }
}

/**
 * Sleeps for `delayMs`, updating the status sink once per second with the
 * time left. `progress` is prefixed to every line.
 */
export async function countdown(
  delayMs: number,
  options: { progress: string; status?: StatusSink; signal?: AbortSignal }
): Promise<void> {
  const status = options.status ?? noopStatus;
  let remaining = delayMs;

  while (remaining > 0) {
    status.update(`${options.progress}, resuming in ${Math.ceil(remaining / 1000)}s`);
    const step = Math.min(1000, remaining);
    await sleep(step, options.signal);
    remaining -= step;
  }
}
