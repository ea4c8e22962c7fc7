import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '../utils/logger.js';
import type { StreamConnection } from '../core/types.js';

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
}

export const defaultBackoff: BackoffOptions = { initialDelayMs: 1_000, maxDelayMs: 30_000 };

/** Sleep unless aborted first. Resolves false on abort. */
export async function pause(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return false;
  try {
    await sleep(ms, undefined, { signal });
    return true;
  } catch (err) {
    if (signal.aborted) return false;
    throw err;
  }
}

/**
 * Connect, retrying with exponential backoff until it succeeds or `signal`
 * aborts. Resolves true once connected.
 */
export async function connectWithBackoff(
  connection: StreamConnection,
  signal: AbortSignal,
  log: Logger,
  backoff: BackoffOptions = defaultBackoff,
): Promise<boolean> {
  let delay = backoff.initialDelayMs;
  while (!signal.aborted) {
    try {
      await connection.connect();
      return true;
    } catch (err) {
      log.error({ err, retryInMs: delay }, 'Stream connect failed');
    }
    if (!(await pause(delay, signal))) return false;
    delay = Math.min(delay * 2, backoff.maxDelayMs);
  }
  return false;
}
