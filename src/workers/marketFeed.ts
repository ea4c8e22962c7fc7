import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { StreamConnection } from '../core/types.js';
import type { TickCache } from '../core/market/tickCache.js';
import type { SubscriptionManager } from '../core/subscriptions/subscriptionManager.js';
import { connectWithBackoff, defaultBackoff, pause, type BackoffOptions } from './backoff.js';

export interface MarketFeedDeps {
  connection: StreamConnection;
  cache: TickCache;
  subscriptions: SubscriptionManager;
  signal: AbortSignal;
  pollIntervalMs?: number;
  backoff?: BackoffOptions;
  logger?: Logger;
}

/**
 * Owns the data socket: feeds ticks into the cache and reconciles
 * subscriptions until `signal` aborts, then closes the socket.
 */
export async function runMarketFeed(deps: MarketFeedDeps): Promise<void> {
  const { connection, cache, subscriptions, signal } = deps;
  const pollMs = deps.pollIntervalMs ?? 1000;
  const backoff = deps.backoff ?? defaultBackoff;
  const log = (deps.logger ?? rootLogger).child({ worker: 'market-feed' });

  let dropped = false;
  connection.onMessages((messages) => {
    try {
      cache.applyTicks(messages);
    } catch (err) {
      log.error({ err }, 'Tick delivery failed');
    }
  });
  connection.onClose((reason) => {
    if (signal.aborted) return;
    log.warn({ reason }, 'Data socket closed');
    dropped = true;
    subscriptions.wake();
  });

  try {
    if (!(await connectWithBackoff(connection, signal, log, backoff))) return;
    log.info('Market data feed connected');

    while (!signal.aborted) {
      if (dropped) {
        dropped = false;
        if (!(await connectWithBackoff(connection, signal, log, backoff))) break;
        log.info('Market data feed reconnected');
        subscriptions.resubscribeAll();
      }

      const { failed } = await subscriptions.reconcile();
      if (failed.length && !(await pause(backoff.initialDelayMs, signal))) break;
      await subscriptions.waitForWork(pollMs, signal);
    }
  } finally {
    await connection.close();
    log.info('Market data feed stopped');
  }
}
