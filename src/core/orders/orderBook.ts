import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { OrderUpdate } from '../types.js';
import { orderEnvelopeSchema, orderMessageSchema, toOrderUpdate } from './orderMessage.js';

/**
 * Latest state of each order seen on the order socket, keyed by order id.
 * Each update replaces the previous entry for its id.
 */
export class OrderBook {
  private readonly entries = new Map<string, OrderUpdate>();
  private readonly log: Logger;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ component: 'order-book' });
  }

  applyUpdate(message: unknown): OrderUpdate | null {
    let payload = message;
    const envelope = orderEnvelopeSchema.safeParse(message);
    if (envelope.success) {
      if (envelope.data.s !== 'ok') {
        this.log.warn({ s: envelope.data.s, message: envelope.data.message }, 'Order socket reported an error');
        return null;
      }
      payload = envelope.data.d;
    }

    const parsed = orderMessageSchema.safeParse(payload);
    if (!parsed.success) {
      this.log.warn(
        { issues: parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`) },
        'Dropping malformed order update',
      );
      return null;
    }

    const order = toOrderUpdate(parsed.data);
    this.entries.set(order.id, order);
    this.log.info(
      { id: order.id, symbol: order.symbol, side: order.side, status: order.status, filledQty: order.filledQty },
      'Order update',
    );
    return order;
  }

  applyUpdates(messages: readonly unknown[]): number {
    let n = 0;
    for (const m of messages) if (this.applyUpdate(m)) n++;
    return n;
  }

  get(id: string): OrderUpdate | undefined {
    return this.entries.get(id);
  }

  list(): OrderUpdate[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
