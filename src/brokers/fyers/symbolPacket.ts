import type { TokenDirectory } from '../../core/types.js';
import type { TickMessage } from '../../core/market/tickMessage.js';

// Packed big-endian layout of one symbolData packet:
//   header  24 bytes  fyToken u64, timestamp u32, fyCode u16, fyFlag u16, pktLen u16, 6 reserved
//   common  48 bytes  priceConv u32, ltp, open, high, low, close, min open/high/low/close (u32 each), min volume u64
//   trade   32 bytes  last traded qty u32, last traded time u32, avg price u32, volume today u32, total buy u64, total sell u64
//   depth  120 bytes  5 bids + 5 asks of price, qty, orders (u32 each)
// `pktLen` covers the whole packet, header included. Index packets stop after
// the common section. Prices are integers scaled by `priceConv`.
export const HEADER_LEN = 24;
export const COMMON_LEN = 48;
export const TRADE_LEN = 32;
export const DEPTH_LEN = 120;

export interface DecodedPackets {
  messages: TickMessage[];
  /** Tokens with no known ticker; their packets are skipped. */
  unknownTokens: string[];
}

/**
 * Decode every packet in one binary frame into tick messages.
 * @throws RangeError on a truncated frame or a packet shorter than its header says
 */
export function decodeSymbolPackets(frame: Buffer, tokens: TokenDirectory): DecodedPackets {
  const messages: TickMessage[] = [];
  const unknownTokens: string[] = [];

  let offset = 0;
  while (offset < frame.length) {
    if (frame.length - offset < HEADER_LEN) {
      throw new RangeError(`Truncated packet header at byte ${offset}`);
    }
    const pktLen = frame.readUInt16BE(offset + 16);
    if (pktLen < HEADER_LEN + COMMON_LEN || offset + pktLen > frame.length) {
      throw new RangeError(`Bad packet length ${pktLen} at byte ${offset}`);
    }

    const fyToken = frame.readBigUInt64BE(offset).toString();
    const symbol = tokens.symbolForToken(fyToken);
    if (symbol) messages.push(readPacket(frame.subarray(offset, offset + pktLen), symbol));
    else unknownTokens.push(fyToken);

    offset += pktLen;
  }
  return { messages, unknownTokens };
}

function readPacket(p: Buffer, symbol: string): TickMessage {
  const c = HEADER_LEN;
  const conv = p.readUInt32BE(c) || 1;
  const px = (at: number) => p.readUInt32BE(c + at) / conv;

  const msg: TickMessage = {
    symbol,
    timestamp: p.readUInt32BE(8),
    fyCode: p.readUInt16BE(12),
    fyFlag: p.readUInt16BE(14),
    pktLen: p.length,
    ltp: px(4),
    open_price: px(8),
    high_price: px(12),
    low_price: px(16),
    close_price: px(20),
    min_open_price: px(24),
    min_high_price: px(28),
    min_low_price: px(32),
    min_close_price: px(36),
    min_volume: Number(p.readBigUInt64BE(c + 40)),
    // indices carry no trade section
    last_traded_qty: 0,
    last_traded_time: 0,
    avg_trade_price: 0,
    vol_traded_today: 0,
    tot_buy_qty: 0,
    tot_sell_qty: 0,
  };

  const t = HEADER_LEN + COMMON_LEN;
  if (p.length >= t + TRADE_LEN) {
    msg.last_traded_qty = p.readUInt32BE(t);
    msg.last_traded_time = p.readUInt32BE(t + 4);
    msg.avg_trade_price = p.readUInt32BE(t + 8) / conv;
    msg.vol_traded_today = p.readUInt32BE(t + 12);
    msg.tot_buy_qty = Number(p.readBigUInt64BE(t + 16));
    msg.tot_sell_qty = Number(p.readBigUInt64BE(t + 24));
  }
  return msg;
}
