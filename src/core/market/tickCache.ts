import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import type { TickSnapshot } from '../types.js';
import { tickMessageSchema, toSnapshot } from './tickMessage.js';

/**
 * Latest snapshot per symbol. No history is kept.
 *
 * Snapshots are frozen and swapped into their map slot whole, so a reader
 * sees either the previous tick or the new one. `applyTick` is synchronous:
 * validation and the swap cannot interleave with another write on the event
 * loop. One feed writes a cache; give each session its own instance.
 */
export class TickCache {
  private readonly entries = new Map<string, TickSnapshot>();
  private readonly log: Logger;
  private applied = 0;
  private dropped = 0;

  constructor(log: Logger = rootLogger) {
    this.log = log.child({ component: 'tick-cache' });
  }

  /** Returns false when the message was malformed and dropped. */
  applyTick(message: unknown): boolean {
    const parsed = tickMessageSchema.safeParse(message);
    if (!parsed.success) {
      this.dropped++;
      this.log.warn(
        { issues: parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`) },
        'Dropping malformed tick',
      );
      return false;
    }
    const snapshot = toSnapshot(parsed.data);
    this.entries.set(snapshot.symbol, snapshot);
    this.applied++;
    return true;
  }

  /** Apply one socket delivery in arrival order. */
  applyTicks(messages: readonly unknown[]): number {
    let n = 0;
    for (const m of messages) if (this.applyTick(m)) n++;
    return n;
  }

  get(symbol: string): TickSnapshot | undefined {
    return this.entries.get(symbol);
  }

  getLastPrice(symbol: string): number | null {
    return this.entries.get(symbol)?.ltp ?? null;
  }

  symbols(): string[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  getStats() {
    return { symbols: this.entries.size, applied: this.applied, dropped: this.dropped };
  }
}
