export type OptionType = 'CALL' | 'PUT';
export type Side = 'BUY' | 'SELL';
export type Channel = 'symbolData' | 'orderUpdate';

/** Calendar date in the exchange time zone, e.g. 2022-05-12. */
export type IsoDate = string;

export interface InstrumentRow {
  underlying: string; // e.g., NIFTY
  strike: number;
  expiry: IsoDate;
  optionType: OptionType | null; // null for futures and other non-option rows
  symbol: string; // broker symbol, e.g., "NIFTY 22 May 12 18150 CE"
  symbolCode: string; // e.g., NSE:NIFTY2251218150CE
  code: number;
  fyToken: string;
  lotSize: number;
  tickSize: number;
}

export interface TickSnapshot {
  symbol: string;
  timestamp: number;
  fyCode: number;
  fyFlag: number;
  pktLen: number;
  ltp: number;
  openPrice: number;
  highPrice: number;
  lowPrice: number;
  closePrice: number;
  minOpenPrice: number;
  minHighPrice: number;
  minLowPrice: number;
  minClosePrice: number;
  minVolume: number;
  lastTradedQty: number;
  lastTradedTime: number;
  avgTradePrice: number;
  volTradedToday: number;
  totBuyQty: number;
  totSellQty: number;
}

export interface OrderUpdate {
  id: string;
  exchOrdId: string;
  symbol: string;
  fyToken: string;
  side: Side;
  tradedPrice: number;
  limitPrice: number;
  stopPrice: number;
  status: number;
  orderNumStatus: string;
  qty: number;
  filledQty: number;
  remainingQuantity: number;
  discloseQty: number;
  dqQtyRem: number;
  type: number;
  productType: string;
  orderValidity: string;
  instrument: string;
  segment: string;
  message: string;
  offlineOrder: boolean;
  slNo: number;
  orderDateTime: number;
}

/** Maps the numeric token carried by binary packets back to a ticker. */
export interface TokenDirectory {
  symbolForToken(fyToken: string): string | undefined;
}

export type MessagesHandler = (messages: unknown[]) => void;
export type CloseHandler = (reason: { code: number; reason: string }) => void;

/**
 * Live push connection to the broker. Implementations decode frames before
 * handing them to the registered handler.
 */
export interface StreamConnection {
  connect(): Promise<void>;
  subscribe(symbols: string[], channel: 'symbolData'): Promise<void>;
  subscribeOrders(): Promise<void>;
  unsubscribe(symbols: string[]): Promise<void>;
  /** Replaces any previously registered handler. */
  onMessages(handler: MessagesHandler): void;
  /** Called when the socket drops without `close()` having been called. */
  onClose(handler: CloseHandler): void;
  close(): Promise<void>;
}
