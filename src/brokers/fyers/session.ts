// src/brokers/fyers/session.ts
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { Config } from '../../config/index.js';
import type { Channel, StreamConnection, TokenDirectory } from '../../core/types.js';
import { TickCache } from '../../core/market/tickCache.js';
import { OrderBook } from '../../core/orders/orderBook.js';
import { SubscriptionManager } from '../../core/subscriptions/subscriptionManager.js';
import { runMarketFeed } from '../../workers/marketFeed.js';
import { runOrderFeed } from '../../workers/orderFeed.js';
import type { BackoffOptions } from '../../workers/backoff.js';
import { streamCredential } from './credentials.js';
import { FyersSocket } from './socket.js';

export interface MarketSessionOptions {
  createConnection: (channel: Channel) => StreamConnection;
  initialSymbols?: string[];
  pollIntervalMs?: number;
  backoff?: BackoffOptions;
  logger?: Logger;
}

/**
 * One live session: a data socket feeding the tick cache, an order socket
 * feeding the order book, and the subscription state between them. Nothing
 * here is shared across sessions.
 */
export class MarketSession {
  readonly ticks: TickCache;
  readonly orders: OrderBook;
  readonly subscriptions: SubscriptionManager;

  private readonly marketConnection: StreamConnection;
  private readonly orderConnection: StreamConnection;
  private readonly log: Logger;
  private controller: AbortController | null = null;
  private tasks: Promise<void>[] = [];

  constructor(private readonly opts: MarketSessionOptions) {
    this.log = (opts.logger ?? rootLogger).child({ component: 'session' });
    this.ticks = new TickCache(this.log);
    this.orders = new OrderBook(this.log);
    this.marketConnection = opts.createConnection('symbolData');
    this.orderConnection = opts.createConnection('orderUpdate');
    this.subscriptions = new SubscriptionManager(this.marketConnection, {
      initialSymbols: opts.initialSymbols,
      logger: this.log,
    });
  }

  get running(): boolean {
    return this.controller !== null;
  }

  /** Spawn both feed tasks. They run until `stop()`. */
  start(): void {
    if (this.controller) return;
    const controller = new AbortController();
    this.controller = controller;
    const { signal } = controller;

    this.tasks = [
      runMarketFeed({
        connection: this.marketConnection,
        cache: this.ticks,
        subscriptions: this.subscriptions,
        signal,
        pollIntervalMs: this.opts.pollIntervalMs,
        backoff: this.opts.backoff,
        logger: this.log,
      }).catch((err) => this.log.error({ err }, 'Market feed crashed')),
      runOrderFeed({
        connection: this.orderConnection,
        orders: this.orders,
        signal,
        backoff: this.opts.backoff,
        logger: this.log,
      }).catch((err) => this.log.error({ err }, 'Order feed crashed')),
    ];
    this.log.info('Session started');
  }

  async stop(): Promise<void> {
    const controller = this.controller;
    if (!controller) return;
    controller.abort();
    await Promise.all(this.tasks);
    this.tasks = [];
    this.controller = null;
    this.log.info('Session stopped');
  }

  getLastPrice(symbol: string): number | null {
    return this.ticks.getLastPrice(symbol);
  }
}

/** `tokens` names the binary tick packets, usually the loaded SymbolIndex. */
export function createFyersSession(
  config: Config,
  tokens: TokenDirectory,
  log: Logger = rootLogger,
): MarketSession {
  const credential = streamCredential(config.fyers.clientId, config.fyers.accessToken);
  return new MarketSession({
    createConnection: (channel) =>
      new FyersSocket({
        url: channel === 'symbolData' ? config.fyers.dataSocketUrl : config.fyers.orderSocketUrl,
        credential,
        name: channel === 'symbolData' ? 'data' : 'order',
        tokens: channel === 'symbolData' ? tokens : undefined,
        logger: log,
      }),
    initialSymbols: config.feed.initialSymbols,
    pollIntervalMs: config.feed.pollIntervalMs,
    logger: log,
  });
}
