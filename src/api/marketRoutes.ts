// src/api/marketRoutes.ts
import type { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { NotFoundError } from '../core/errors.js';
import type { SymbolIndex } from '../core/instruments/symbolIndex.js';
import { isIsoDate, toExchangeDate } from '../core/instruments/exchangeDate.js';
import type { OptionType } from '../core/types.js';
import type { MarketSession } from '../brokers/fyers/session.js';

export interface MarketRoutesOptions {
  session: MarketSession;
  index: SymbolIndex;
  timeZone: string;
}

const isoDate = z.string().refine(isIsoDate, 'Expected a YYYY-MM-DD date');

const optionType = z
  .enum(['CALL', 'PUT', 'CE', 'PE'])
  .transform((v): OptionType => (v === 'CALL' || v === 'CE' ? 'CALL' : 'PUT'));

const resolveQuery = z.object({
  underlying: z.string().min(1),
  strike: z.coerce.number().int(),
  expiry: isoDate,
  optionType,
});

const symbolsBody = z.object({
  symbols: z.array(z.string().trim().min(1)).min(1),
});

const marketRoutes: FastifyPluginAsync<MarketRoutesOptions> = async (app, { session, index, timeZone }) => {
  /** 🔹 Last traded price */
  app.get('/quotes/:symbol', async (req) => {
    const { symbol } = z.object({ symbol: z.string().min(1) }).parse(req.params);
    const ltp = session.getLastPrice(symbol);
    if (ltp === null) throw new NotFoundError(`No tick received for ${symbol}`);
    return { symbol, ltp };
  });

  /** 🔹 Expiry calendar */
  app.get('/expiries/:underlying', async (req) => {
    const { underlying } = z.object({ underlying: z.string().min(1) }).parse(req.params);
    return { underlying, expiries: index.expiries(underlying).dates };
  });

  /** 🔹 Current week expiry; `date` defaults to today on the exchange */
  app.get('/expiries/:underlying/next', async (req) => {
    const { underlying } = z.object({ underlying: z.string().min(1) }).parse(req.params);
    const { date } = z.object({ date: isoDate.optional() }).parse(req.query);
    const on = date ?? toExchangeDate(new Date(), timeZone);
    const expiry = index.expiries(underlying).nextExpiryOnOrAfter(on);
    if (!expiry) throw new NotFoundError(`No ${underlying} expiry on or after ${on}`);
    return { underlying, date: on, expiry };
  });

  /** 🔹 Logical option → broker symbol */
  app.get('/symbols/resolve', async (req) => {
    const q = resolveQuery.parse(req.query);
    const row = index.resolveSymbol(q.underlying, q.strike, q.expiry, q.optionType);
    return { symbol: row.symbol, symbolCode: row.symbolCode, code: row.code, lotSize: row.lotSize };
  });

  /** 🔹 Subscription state */
  app.get('/subscriptions', async () => ({
    active: session.subscriptions.activeSymbols(),
    pendingSubscribe: session.subscriptions.pendingSubscribe(),
    pendingUnsubscribe: session.subscriptions.pendingUnsubscribe(),
  }));

  app.post('/subscriptions', async (req, reply) => {
    const { symbols } = symbolsBody.parse(req.body);
    session.subscriptions.requestSubscribe(symbols);
    return reply.code(202).send({ ok: true, queued: symbols });
  });

  app.delete('/subscriptions', async (req, reply) => {
    const { symbols } = symbolsBody.parse(req.body);
    session.subscriptions.requestUnsubscribe(symbols);
    return reply.code(202).send({ ok: true, queued: symbols });
  });

  /** 🔹 Orders seen on the order socket */
  app.get('/orders', async () => session.orders.list());

  app.get('/orders/:id', async (req) => {
    const { id } = z.object({ id: z.string().min(1) }).parse(req.params);
    const order = session.orders.get(id);
    if (!order) throw new NotFoundError(`Order ${id} not found`);
    return order;
  });
};

export default marketRoutes;
