import pino from 'pino';
import { describe, it, expect, beforeEach } from 'vitest';
import { SubscriptionManager } from '../subscriptionManager.js';
import { FakeConnection, deferred } from '../../../workers/__tests__/fakeConnection.js';

const silent = pino({ level: 'silent' });

describe('SubscriptionManager', () => {
  let conn: FakeConnection;
  let subs: SubscriptionManager;

  beforeEach(() => {
    conn = new FakeConnection();
    subs = new SubscriptionManager(conn, { logger: silent });
  });

  it('queues the initial symbols', () => {
    const seeded = new SubscriptionManager(conn, {
      initialSymbols: ['NSE:NIFTY50-INDEX', 'NSE:NIFTYBANK-INDEX'],
      logger: silent,
    });
    expect(seeded.pendingSubscribe()).toEqual(['NSE:NIFTY50-INDEX', 'NSE:NIFTYBANK-INDEX']);
  });

  it('issues one batched subscribe per pass', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);
    const result = await subs.reconcile();

    expect(conn.calls).toEqual([{ op: 'subscribe', symbols: ['NSE:SBIN-EQ', 'NSE:INFY-EQ'] }]);
    expect(result).toEqual({ subscribed: ['NSE:SBIN-EQ', 'NSE:INFY-EQ'], unsubscribed: [], failed: [] });
    expect(subs.activeSymbols()).toEqual(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);
    expect(subs.pendingSubscribe()).toEqual([]);
  });

  it('subscribes a symbol requested twice exactly once', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();

    expect(conn.calls).toEqual([{ op: 'subscribe', symbols: ['NSE:SBIN-EQ'] }]);
  });

  it('drops requests for symbols already active', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();

    subs.requestSubscribe(['NSE:SBIN-EQ']);
    expect(subs.pendingSubscribe()).toEqual([]);
    await subs.reconcile();

    expect(conn.calls).toHaveLength(1);
  });

  it('subscribes then unsubscribes with one call each', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();
    subs.requestUnsubscribe(['NSE:SBIN-EQ']);
    const result = await subs.reconcile();

    expect(result.unsubscribed).toEqual(['NSE:SBIN-EQ']);
    expect(subs.activeSymbols()).toEqual([]);
    expect(conn.calls).toEqual([
      { op: 'subscribe', symbols: ['NSE:SBIN-EQ'] },
      { op: 'unsubscribe', symbols: ['NSE:SBIN-EQ'] },
    ]);
  });

  it('drains pending unsubscribes for symbols that were never active', async () => {
    subs.requestUnsubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();

    expect(conn.calls).toEqual([]);
    expect(subs.pendingUnsubscribe()).toEqual([]);
  });

  it('lets a later request cancel an earlier opposite one', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    subs.requestUnsubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();
    expect(conn.calls).toEqual([]);

    subs.requestSubscribe(['NSE:INFY-EQ']);
    await subs.reconcile();
    subs.requestUnsubscribe(['NSE:INFY-EQ']);
    subs.requestSubscribe(['NSE:INFY-EQ']);
    await subs.reconcile();

    expect(conn.calls).toEqual([{ op: 'subscribe', symbols: ['NSE:INFY-EQ'] }]);
    expect(subs.activeSymbols()).toEqual(['NSE:INFY-EQ']);
  });

  it('ignores blank symbols', () => {
    subs.requestSubscribe(['', '  ', ' NSE:SBIN-EQ ']);
    expect(subs.pendingSubscribe()).toEqual(['NSE:SBIN-EQ']);
  });

  it('re-queues a failed subscribe for the next pass', async () => {
    conn.failSubscribes = 1;
    subs.requestSubscribe(['NSE:SBIN-EQ']);

    const first = await subs.reconcile();
    expect(first.failed).toEqual(['NSE:SBIN-EQ']);
    expect(subs.activeSymbols()).toEqual([]);
    expect(subs.pendingSubscribe()).toEqual(['NSE:SBIN-EQ']);

    const second = await subs.reconcile();
    expect(second.subscribed).toEqual(['NSE:SBIN-EQ']);
    expect(subs.activeSymbols()).toEqual(['NSE:SBIN-EQ']);
    expect(conn.calls).toHaveLength(2);
  });

  it('re-queues a failed unsubscribe and keeps the symbol active', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    await subs.reconcile();
    conn.failUnsubscribes = 1;
    subs.requestUnsubscribe(['NSE:SBIN-EQ']);

    await subs.reconcile();
    expect(subs.activeSymbols()).toEqual(['NSE:SBIN-EQ']);
    expect(subs.pendingUnsubscribe()).toEqual(['NSE:SBIN-EQ']);

    await subs.reconcile();
    expect(subs.activeSymbols()).toEqual([]);
  });

  it('never holds a symbol both active and pending while a call is in flight', async () => {
    const gate = deferred();
    conn.gate = gate.promise;
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    const pass = subs.reconcile();

    // requests racing the in-flight subscribe
    subs.requestSubscribe(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);
    expect(subs.activeSymbols()).toEqual(['NSE:SBIN-EQ']);
    expect(subs.pendingSubscribe()).toEqual(['NSE:INFY-EQ']);

    gate.resolve();
    await pass;
    conn.gate = null;
    await subs.reconcile();

    const active = subs.activeSymbols();
    expect(active).toEqual(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);
    expect(subs.pendingSubscribe().filter((s) => active.includes(s))).toEqual([]);
    expect(conn.calls).toEqual([
      { op: 'subscribe', symbols: ['NSE:SBIN-EQ'] },
      { op: 'subscribe', symbols: ['NSE:INFY-EQ'] },
    ]);
  });

  it('shares one pass between overlapping reconcile calls', async () => {
    const gate = deferred();
    conn.gate = gate.promise;
    subs.requestSubscribe(['NSE:SBIN-EQ']);

    const a = subs.reconcile();
    const b = subs.reconcile();
    expect(b).toBe(a);

    gate.resolve();
    await a;
    expect(conn.calls).toHaveLength(1);
  });

  it('does not resurrect a failed subscribe that was cancelled meanwhile', async () => {
    const gate = deferred();
    conn.gate = gate.promise;
    conn.failSubscribes = 1;
    subs.requestSubscribe(['NSE:SBIN-EQ']);
    const pass = subs.reconcile();

    subs.requestUnsubscribe(['NSE:SBIN-EQ']);
    gate.resolve();
    await pass;

    expect(subs.activeSymbols()).toEqual([]);
    expect(subs.pendingSubscribe()).toEqual([]);
  });

  it('queues every active symbol again after a reconnect', async () => {
    subs.requestSubscribe(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);
    await subs.reconcile();

    subs.resubscribeAll();
    expect(subs.activeSymbols()).toEqual([]);
    expect(subs.pendingSubscribe()).toEqual(['NSE:SBIN-EQ', 'NSE:INFY-EQ']);

    await subs.reconcile();
    expect(conn.calls.at(-1)).toEqual({ op: 'subscribe', symbols: ['NSE:SBIN-EQ', 'NSE:INFY-EQ'] });
  });

  describe('waitForWork', () => {
    it('resolves at once when work is queued', async () => {
      subs.requestSubscribe(['NSE:SBIN-EQ']);
      await expect(subs.waitForWork(60_000)).resolves.toBeUndefined();
    });

    it('wakes on a new request', async () => {
      const waiting = subs.waitForWork(60_000);
      subs.requestUnsubscribe(['NSE:SBIN-EQ']);
      await expect(waiting).resolves.toBeUndefined();
    });

    it('wakes on abort', async () => {
      const controller = new AbortController();
      const waiting = subs.waitForWork(60_000, controller.signal);
      controller.abort();
      await expect(waiting).resolves.toBeUndefined();
    });

    it('times out when nothing happens', async () => {
      const started = Date.now();
      await subs.waitForWork(20);
      expect(Date.now() - started).toBeGreaterThanOrEqual(15);
    });
  });
});
