import { z } from 'zod';
import type { TickSnapshot } from '../types.js';

const price = z.number().finite();
const count = z.number().finite().nonnegative();

/**
 * Decoded symbolData message as delivered by the data socket. Unknown keys
 * are rejected; `market_pic` (depth) is accepted and dropped.
 */
export const tickMessageSchema = z
  .object({
    symbol: z.string().min(1),
    timestamp: z.number().int(),
    fyCode: z.number().int(),
    fyFlag: z.number().int(),
    pktLen: z.number().int(),
    ltp: price,
    open_price: price,
    high_price: price,
    low_price: price,
    close_price: price,
    min_open_price: price,
    min_high_price: price,
    min_low_price: price,
    min_close_price: price,
    min_volume: count,
    last_traded_qty: count,
    last_traded_time: z.number().int(),
    avg_trade_price: price,
    vol_traded_today: count,
    tot_buy_qty: count,
    tot_sell_qty: count,
    market_pic: z.unknown().optional(),
  })
  .strict();

export type TickMessage = z.infer<typeof tickMessageSchema>;

export function toSnapshot(m: TickMessage): TickSnapshot {
  return Object.freeze({
    symbol: m.symbol,
    timestamp: m.timestamp,
    fyCode: m.fyCode,
    fyFlag: m.fyFlag,
    pktLen: m.pktLen,
    ltp: m.ltp,
    openPrice: m.open_price,
    highPrice: m.high_price,
    lowPrice: m.low_price,
    closePrice: m.close_price,
    minOpenPrice: m.min_open_price,
    minHighPrice: m.min_high_price,
    minLowPrice: m.min_low_price,
    minClosePrice: m.min_close_price,
    minVolume: m.min_volume,
    lastTradedQty: m.last_traded_qty,
    lastTradedTime: m.last_traded_time,
    avgTradePrice: m.avg_trade_price,
    volTradedToday: m.vol_traded_today,
    totBuyQty: m.tot_buy_qty,
    totSellQty: m.tot_sell_qty,
  });
}
