import type { IsoDate } from '../types.js';
import { isIsoDate, toExchangeDate } from './exchangeDate.js';

/**
 * Ascending, deduplicated expiry dates of one underlying.
 * Built once from the loaded index and never mutated.
 */
export class ExpiryCalendar {
  private readonly entries: readonly IsoDate[];

  private constructor(
    entries: IsoDate[],
    private readonly timeZone: string,
  ) {
    this.entries = Object.freeze(entries);
  }

  static from(dates: Iterable<IsoDate>, timeZone = 'Asia/Kolkata'): ExpiryCalendar {
    const unique = [...new Set(dates)];
    for (const d of unique) {
      if (!isIsoDate(d)) throw new RangeError(`Invalid expiry date: ${d}`);
    }
    // ISO dates order lexicographically
    unique.sort();
    return new ExpiryCalendar(unique, timeZone);
  }

  get dates(): readonly IsoDate[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  get first(): IsoDate | null {
    return this.entries[0] ?? null;
  }

  get last(): IsoDate | null {
    return this.entries[this.entries.length - 1] ?? null;
  }

  /**
   * First expiry on or after `date`, or null once `date` is past the last
   * loaded expiry. A `Date` is read in the exchange time zone.
   */
  nextExpiryOnOrAfter(date: IsoDate | Date): IsoDate | null {
    const target = typeof date === 'string' ? date : toExchangeDate(date, this.timeZone);
    if (!isIsoDate(target)) throw new RangeError(`Invalid date: ${target}`);

    let lo = 0;
    let hi = this.entries.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.entries[mid] < target) lo = mid + 1;
      else hi = mid;
    }
    return this.entries[lo] ?? null;
  }
}
