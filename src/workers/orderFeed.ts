import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { StreamConnection } from '../core/types.js';
import type { OrderBook } from '../core/orders/orderBook.js';
import { connectWithBackoff, defaultBackoff, pause, type BackoffOptions } from './backoff.js';

export interface OrderFeedDeps {
  connection: StreamConnection;
  orders: OrderBook;
  signal: AbortSignal;
  backoff?: BackoffOptions;
  logger?: Logger;
}

export async function runOrderFeed(deps: OrderFeedDeps): Promise<void> {
  const { connection, orders, signal } = deps;
  const backoff = deps.backoff ?? defaultBackoff;
  const log = (deps.logger ?? rootLogger).child({ worker: 'order-feed' });

  let dropped = false;
  let release: (() => void) | null = null;
  const onAbort = () => release?.();
  signal.addEventListener('abort', onAbort, { once: true });

  connection.onMessages((messages) => {
    try {
      orders.applyUpdates(messages);
    } catch (err) {
      log.error({ err }, 'Order delivery failed');
    }
  });
  connection.onClose((reason) => {
    if (signal.aborted) return;
    log.warn({ reason }, 'Order socket closed');
    dropped = true;
    release?.();
  });

  try {
    while (!signal.aborted) {
      dropped = false;
      if (!(await connectWithBackoff(connection, signal, log, backoff))) break;

      try {
        await connection.subscribeOrders();
        log.info('Subscribed to order updates');
      } catch (err) {
        log.error({ err }, 'Order subscription failed');
        await connection.close();
        if (!(await pause(backoff.initialDelayMs, signal))) break;
        continue;
      }

      // park until the socket drops or we are told to stop
      await new Promise<void>((resolve) => {
        release = resolve;
        if (signal.aborted || dropped) resolve();
      });
      release = null;
    }
  } finally {
    signal.removeEventListener('abort', onAbort);
    await connection.close();
    log.info('Order feed stopped');
  }
}
