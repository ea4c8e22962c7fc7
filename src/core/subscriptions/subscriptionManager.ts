import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { StreamConnection } from '../types.js';

export type SubscriptionTarget = Pick<StreamConnection, 'subscribe' | 'unsubscribe'>;

export interface SubscriptionManagerOptions {
  /** Queued before the first pass. The data socket closes with nothing subscribed. */
  initialSymbols?: string[];
  logger?: Logger;
}

export interface ReconcileResult {
  subscribed: string[];
  unsubscribed: string[];
  failed: string[];
}

/**
 * Desired vs. live subscription state for one data socket.
 *
 * Callers enqueue with `requestSubscribe` / `requestUnsubscribe` at any time;
 * the feed loop calls `reconcile()` to push the difference to the socket.
 * A symbol in pending-subscribe is never active: requests for active symbols
 * are dropped, and a batch moves into `active` before its call is awaited.
 */
export class SubscriptionManager {
  private readonly active = new Set<string>();
  private pendingSub = new Set<string>();
  private pendingUnsub = new Set<string>();
  private readonly waiters = new Set<() => void>();
  private inFlight: Promise<ReconcileResult> | null = null;
  private readonly log: Logger;

  constructor(
    private readonly target: SubscriptionTarget,
    options: SubscriptionManagerOptions = {},
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'subscriptions' });
    if (options.initialSymbols?.length) this.requestSubscribe(options.initialSymbols);
  }

  requestSubscribe(symbols: Iterable<string>): void {
    for (const raw of symbols) {
      const s = raw.trim();
      if (!s) continue;
      this.pendingUnsub.delete(s);
      if (this.active.has(s)) continue;
      this.pendingSub.add(s);
    }
    this.wake();
  }

  requestUnsubscribe(symbols: Iterable<string>): void {
    for (const raw of symbols) {
      const s = raw.trim();
      if (!s) continue;
      this.pendingSub.delete(s);
      this.pendingUnsub.add(s);
    }
    this.wake();
  }

  /**
   * One reconciliation pass. Both pending sets are drained even when nothing
   * in them is actionable. Socket failures are logged and their batch is
   * queued again for the next pass; this never rejects.
   */
  reconcile(): Promise<ReconcileResult> {
    this.inFlight ??= this.runPass().finally(() => {
      this.inFlight = null;
    });
    return this.inFlight;
  }

  /** Queue every active symbol again, e.g. after the socket reconnected. */
  resubscribeAll(): void {
    const symbols = [...this.active];
    this.active.clear();
    for (const s of symbols) if (!this.pendingUnsub.has(s)) this.pendingSub.add(s);
    this.pendingUnsub.clear();
    this.wake();
  }

  /** Resolves on the next request, after `timeoutMs`, or on abort. */
  waitForWork(timeoutMs: number, signal?: AbortSignal): Promise<void> {
    if (this.hasPendingWork() || signal?.aborted) return Promise.resolve();

    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        this.waiters.delete(done);
        resolve();
      };
      const timer = setTimeout(done, timeoutMs);
      signal?.addEventListener('abort', done, { once: true });
      this.waiters.add(done);
    });
  }

  /** Release anyone blocked in `waitForWork`. */
  wake(): void {
    for (const w of [...this.waiters]) w();
  }

  hasPendingWork(): boolean {
    return this.pendingSub.size > 0 || this.pendingUnsub.size > 0;
  }

  activeSymbols(): string[] {
    return [...this.active];
  }

  pendingSubscribe(): string[] {
    return [...this.pendingSub];
  }

  pendingUnsubscribe(): string[] {
    return [...this.pendingUnsub];
  }

  isActive(symbol: string): boolean {
    return this.active.has(symbol);
  }

  private async runPass(): Promise<ReconcileResult> {
    const result: ReconcileResult = { subscribed: [], unsubscribed: [], failed: [] };
    await this.subscribePending(result);
    await this.unsubscribePending(result);
    return result;
  }

  private async subscribePending(result: ReconcileResult) {
    if (this.pendingSub.size === 0) return;
    const batch = [...this.pendingSub].filter((s) => !this.active.has(s));
    this.pendingSub = new Set();
    if (!batch.length) return;

    for (const s of batch) this.active.add(s);
    this.log.info({ symbols: batch }, 'Subscribing for live market data');
    try {
      await this.target.subscribe(batch, 'symbolData');
      result.subscribed.push(...batch);
    } catch (err) {
      for (const s of batch) {
        this.active.delete(s);
        // an unsubscribe requested meanwhile wins
        if (!this.pendingUnsub.has(s)) this.pendingSub.add(s);
      }
      result.failed.push(...batch);
      this.log.error({ err, symbols: batch }, 'Subscribe failed; retrying next pass');
    }
  }

  private async unsubscribePending(result: ReconcileResult) {
    if (this.pendingUnsub.size === 0) return;
    const batch = [...this.pendingUnsub].filter((s) => this.active.has(s));
    this.pendingUnsub = new Set();
    if (!batch.length) return;

    for (const s of batch) this.active.delete(s);
    this.log.info({ symbols: batch }, 'Unsubscribing from live market data');
    try {
      await this.target.unsubscribe(batch);
      result.unsubscribed.push(...batch);
    } catch (err) {
      for (const s of batch) {
        this.active.add(s);
        // re-requested while the call was out: it is still live, keep it
        if (this.pendingSub.delete(s)) continue;
        this.pendingUnsub.add(s);
      }
      result.failed.push(...batch);
      this.log.error({ err, symbols: batch }, 'Unsubscribe failed; retrying next pass');
    }
    if (this.active.size === 0) {
      this.log.warn('No active subscriptions left; the data socket will close');
    }
  }
}
