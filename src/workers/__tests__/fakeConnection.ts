import { ConnectionError } from '../../core/errors.js';
import type { CloseHandler, MessagesHandler, StreamConnection } from '../../core/types.js';

export type Call =
  | { op: 'subscribe'; symbols: string[] }
  | { op: 'unsubscribe'; symbols: string[] }
  | { op: 'subscribeOrders' };

/** In-process stand-in for a push socket. */
export class FakeConnection implements StreamConnection {
  calls: Call[] = [];
  connects = 0;
  closes = 0;
  /** Number of upcoming connect / subscribe / unsubscribe calls to fail. */
  failConnects = 0;
  failSubscribes = 0;
  failUnsubscribes = 0;
  /** When set, subscribe calls wait for it before resolving. */
  gate: Promise<void> | null = null;

  private messages: MessagesHandler = () => {};
  private closed: CloseHandler = () => {};

  onMessages(handler: MessagesHandler): void {
    this.messages = handler;
  }

  onClose(handler: CloseHandler): void {
    this.closed = handler;
  }

  async connect(): Promise<void> {
    if (this.failConnects > 0) {
      this.failConnects--;
      throw new ConnectionError('connect refused');
    }
    this.connects++;
  }

  async subscribe(symbols: string[]): Promise<void> {
    this.calls.push({ op: 'subscribe', symbols: [...symbols] });
    if (this.gate) await this.gate;
    if (this.failSubscribes > 0) {
      this.failSubscribes--;
      throw new ConnectionError('subscribe rejected');
    }
  }

  async unsubscribe(symbols: string[]): Promise<void> {
    this.calls.push({ op: 'unsubscribe', symbols: [...symbols] });
    if (this.gate) await this.gate;
    if (this.failUnsubscribes > 0) {
      this.failUnsubscribes--;
      throw new ConnectionError('unsubscribe rejected');
    }
  }

  async subscribeOrders(): Promise<void> {
    this.calls.push({ op: 'subscribeOrders' });
  }

  async close(): Promise<void> {
    this.closes++;
  }

  push(messages: unknown[]) {
    this.messages(messages);
  }

  drop() {
    this.closed({ code: 1006, reason: 'connection reset' });
  }
}

export function deferred() {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
