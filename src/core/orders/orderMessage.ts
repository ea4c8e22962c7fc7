import { z } from 'zod';
import type { OrderUpdate, Side } from '../types.js';

export const orderMessageSchema = z
  .object({
    id: z.string().min(1),
    exchOrdId: z.string(),
    symbol: z.string().min(1),
    fyToken: z.string(),
    side: z.union([z.literal(1), z.literal(-1)]),
    tradedPrice: z.number().finite(),
    limitPrice: z.number().finite(),
    stopPrice: z.number().finite(),
    status: z.number().int(),
    orderNumStatus: z.string(),
    qty: z.number().int().nonnegative(),
    filledQty: z.number().int().nonnegative(),
    remainingQuantity: z.number().int().nonnegative(),
    discloseQty: z.number().int().nonnegative(),
    dqQtyRem: z.number().int().nonnegative(),
    type: z.number().int(),
    productType: z.string(),
    orderValidity: z.string(),
    instrument: z.string(),
    segment: z.string(),
    message: z.string(),
    offlineOrder: z.boolean(),
    slNo: z.number().int(),
    orderDateTime: z.number().int(),
  })
  .strict();

/** Order socket frames arrive as `{ s, d }`; `d` holds the order. */
export const orderEnvelopeSchema = z.object({
  s: z.string(),
  d: z.unknown(),
  message: z.string().optional(),
});

export type OrderMessage = z.infer<typeof orderMessageSchema>;

export function toOrderUpdate(m: OrderMessage): OrderUpdate {
  const { side, ...rest } = m;
  const order: OrderUpdate = { ...rest, side: (side === 1 ? 'BUY' : 'SELL') satisfies Side };
  return Object.freeze(order);
}
