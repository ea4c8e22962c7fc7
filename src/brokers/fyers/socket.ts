// src/brokers/fyers/socket.ts
import WebSocket from 'ws';
import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { ConnectionError, StaleCredentialError } from '../../core/errors.js';
import type { CloseHandler, MessagesHandler, StreamConnection, TokenDirectory } from '../../core/types.js';
import { decodeSymbolPackets } from './symbolPacket.js';

export interface FyersSocketOptions {
  url: string;
  /** `client_id:access_token` */
  credential: string;
  name: string;
  /** Names the tokens in binary tick packets. Without it binary frames are dropped. */
  tokens?: TokenDirectory;
  connectTimeoutMs?: number;
  logger?: Logger;
}

function rawToBuffer(data: WebSocket.RawData): Buffer {
  if (Array.isArray(data)) return Buffer.concat(data);
  if (data instanceof ArrayBuffer) return Buffer.from(data);
  return data;
}

/**
 * Split one decoded frame into the message list handed to the feed.
 * `{ s, d: [...] }` frames carry a batch; anything else is one message.
 */
export function framesToMessages(frame: unknown): unknown[] {
  if (Array.isArray(frame)) return frame;
  if (typeof frame === 'object' && frame !== null && 'd' in frame && Array.isArray(frame.d)) {
    return frame.d;
  }
  return [frame];
}

/**
 * JSON control frames over a Fyers push socket. The access token rides on the
 * query string in `client_id:access_token` form. Text frames carry JSON
 * (order updates, acks); binary frames carry packed tick packets.
 */
export class FyersSocket implements StreamConnection {
  private ws: WebSocket | null = null;
  private closing = false;
  private handleMessages: MessagesHandler = () => {};
  private handleClose: CloseHandler = () => {};
  private readonly log: Logger;

  constructor(private readonly opts: FyersSocketOptions) {
    this.log = (opts.logger ?? rootLogger).child({ socket: opts.name });
  }

  onMessages(handler: MessagesHandler): void {
    this.handleMessages = handler;
  }

  onClose(handler: CloseHandler): void {
    this.handleClose = handler;
  }

  connect(): Promise<void> {
    if (this.ws?.readyState === WebSocket.OPEN) return Promise.resolve();
    this.closing = false;

    const url = new URL(this.opts.url);
    url.searchParams.set('access_token', this.opts.credential);

    return new Promise((resolve, reject) => {
      const ws = new WebSocket(url, { handshakeTimeout: this.opts.connectTimeoutMs ?? 10_000 });

      const fail = (err: Error) => {
        ws.removeAllListeners();
        ws.terminate();
        const msg = err.message;
        if (msg.includes('401') || msg.toLowerCase().includes('unauthorized')) {
          reject(new StaleCredentialError(`${this.opts.name} socket rejected the access token`));
        } else {
          reject(new ConnectionError(`${this.opts.name} socket connect failed: ${msg}`, { cause: err }));
        }
      };

      ws.once('error', fail);
      ws.once('open', () => {
        ws.off('error', fail);
        this.attach(ws);
        this.log.info('Socket open');
        resolve();
      });
    });
  }

  subscribe(symbols: string[], _channel: 'symbolData'): Promise<void> {
    return this.send({ T: 'SUB_DATA', TLIST: symbols, SUB_T: 1 });
  }

  unsubscribe(symbols: string[]): Promise<void> {
    return this.send({ T: 'SUB_DATA', TLIST: symbols, SUB_T: 0 });
  }

  subscribeOrders(): Promise<void> {
    return this.send({ T: 'SUB_ORD', SLIST: ['orderUpdate'], SUB_T: 1 });
  }

  async close(): Promise<void> {
    this.closing = true;
    const ws = this.ws;
    this.ws = null;
    if (!ws || ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        ws.terminate();
        resolve();
      }, 2_000);
      ws.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      ws.close(1000);
    });
  }

  private attach(ws: WebSocket) {
    this.ws = ws;
    ws.on('message', (data, isBinary) => {
      let messages: unknown[];
      try {
        const buf = rawToBuffer(data);
        messages = isBinary ? this.decodeBinary(buf) : framesToMessages(JSON.parse(buf.toString('utf8')));
      } catch (err) {
        this.log.warn({ err, isBinary }, 'Dropping undecodable frame');
        return;
      }
      if (!messages.length) return;
      try {
        this.handleMessages(messages);
      } catch (err) {
        this.log.error({ err }, 'Message handler threw');
      }
    });
    ws.on('error', (err) => this.log.error({ err }, 'Socket error'));
    ws.on('close', (code, reason) => {
      // close() detaches first; a replaced socket closing late is not a drop
      if (this.ws !== ws) return;
      this.ws = null;
      if (this.closing) return;
      this.handleClose({ code, reason: reason.toString('utf8') });
    });
  }

  private decodeBinary(frame: Buffer): unknown[] {
    const tokens = this.opts.tokens;
    if (!tokens) {
      this.log.debug('No token directory; ignoring binary frame');
      return [];
    }
    const { messages, unknownTokens } = decodeSymbolPackets(frame, tokens);
    if (unknownTokens.length) this.log.debug({ unknownTokens }, 'Skipping packets for unknown tokens');
    return messages;
  }

  private send(frame: Record<string, unknown>): Promise<void> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new ConnectionError(`${this.opts.name} socket is not open`));
    }
    return new Promise((resolve, reject) => {
      ws.send(JSON.stringify(frame), (err) => {
        if (err) reject(new ConnectionError(`${this.opts.name} socket send failed`, { cause: err }));
        else resolve();
      });
    });
  }
}
