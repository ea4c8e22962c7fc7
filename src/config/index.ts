function list(value: string | undefined, fallback: string[]): string[] {
  if (!value) return fallback;
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

export const cfg = {
  host: process.env.HOST ?? '0.0.0.0',
  port: Number(process.env.PORT ?? 8080),
  fyers: {
    clientId: process.env.FYERS_CLIENT_ID,
    accessToken: process.env.FYERS_ACCESS_TOKEN,
    dataSocketUrl: process.env.FYERS_DATA_SOCKET_URL || 'wss://api.fyers.in/socket/v2/dataSock',
    orderSocketUrl: process.env.FYERS_ORDER_SOCKET_URL || 'wss://api.fyers.in/socket/v2/orderSock',
  },
  instruments: {
    // URL or local path; the master file has no header row
    source: process.env.INSTRUMENT_MASTER_URL || 'https://public.fyers.in/sym_details/NSE_FO.csv',
    underlyings: list(process.env.INSTRUMENT_UNDERLYINGS, ['NIFTY', 'BANKNIFTY']),
    timeZone: process.env.EXCHANGE_TIME_ZONE || 'Asia/Kolkata',
  },
  feed: {
    // the data socket closes once nothing is subscribed, so keep the indices on
    initialSymbols: list(process.env.FEED_INITIAL_SYMBOLS, [
      'NSE:NIFTY50-INDEX',
      'NSE:NIFTYBANK-INDEX',
    ]),
    pollIntervalMs: Number(process.env.FEED_POLL_INTERVAL_MS ?? 1000),
  },
};

export type Config = typeof cfg;
