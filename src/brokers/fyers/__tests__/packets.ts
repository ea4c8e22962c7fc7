import { COMMON_LEN, DEPTH_LEN, HEADER_LEN, TRADE_LEN } from '../symbolPacket.js';

export interface PacketInput {
  fyToken: string;
  ltp: number;
  timestamp?: number;
  fyCode?: number;
  priceConv?: number;
  /** `index` stops after the common section. */
  shape?: 'full' | 'trade' | 'index';
}

/** Build one packed symbolData packet with made-up values. */
export function symbolPacket(input: PacketInput): Buffer {
  const shape = input.shape ?? 'full';
  const conv = input.priceConv ?? 100;
  const len =
    HEADER_LEN + COMMON_LEN + (shape === 'index' ? 0 : TRADE_LEN) + (shape === 'full' ? DEPTH_LEN : 0);
  const p = Buffer.alloc(len);
  const scaled = (v: number) => Math.round(v * conv);

  p.writeBigUInt64BE(BigInt(input.fyToken), 0);
  p.writeUInt32BE(input.timestamp ?? 1652340000, 8);
  p.writeUInt16BE(input.fyCode ?? 7208, 12);
  p.writeUInt16BE(2, 14);
  p.writeUInt16BE(len, 16);

  const c = HEADER_LEN;
  p.writeUInt32BE(conv, c);
  [input.ltp, 428, 432.4, 426.1, 427.9, 430, 430.9, 429.8, 430.5].forEach((v, i) => {
    p.writeUInt32BE(scaled(v), c + 4 + i * 4);
  });
  p.writeBigUInt64BE(1200n, c + 40);

  if (shape !== 'index') {
    const t = HEADER_LEN + COMMON_LEN;
    p.writeUInt32BE(15, t);
    p.writeUInt32BE(1652339999, t + 4);
    p.writeUInt32BE(scaled(429.62), t + 8);
    p.writeUInt32BE(8123456, t + 12);
    p.writeBigUInt64BE(512000n, t + 16);
    p.writeBigUInt64BE(634000n, t + 24);
  }
  if (shape === 'full') {
    const d = HEADER_LEN + COMMON_LEN + TRADE_LEN;
    p.writeUInt32BE(scaled(430.45), d);
    p.writeUInt32BE(100, d + 4);
    p.writeUInt32BE(3, d + 8);
  }
  return p;
}

const tickers = new Map([
  ['10100000003045', 'NSE:SBIN-EQ'],
  ['101000000026000', 'NSE:NIFTY50-INDEX'],
]);

export const tokens = {
  symbolForToken: (fyToken: string) => tickers.get(fyToken),
};
