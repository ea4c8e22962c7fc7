import { logger as rootLogger, type Logger } from '../../utils/logger.js';
import { DataIntegrityError, NotFoundError } from '../errors.js';
import type { InstrumentRow, IsoDate, OptionType, TokenDirectory } from '../types.js';
import { ExpiryCalendar } from './expiryCalendar.js';
import { parseInstrumentRow, underlyingOf } from './instrumentRow.js';

export interface SymbolIndexOptions {
  /**
   * Underlyings to keep (e.g. NIFTY, BANKNIFTY). Every row is kept when
   * omitted, which only loads masters whose strikes are all integers: the
   * full NSE_FO file carries stock options on half strikes and fails to load.
   */
  underlyings?: string[];
  timeZone?: string;
  logger?: Logger;
}

interface Partition {
  rows: InstrumentRow[];
  byKey: Map<string, InstrumentRow[]>;
  calendar: ExpiryCalendar;
}

function lookupKey(strike: number, expiry: IsoDate, optionType: OptionType | null): string {
  return `${strike}|${expiry}|${optionType ?? '-'}`;
}

/**
 * Read-only index over the instrument master, partitioned by underlying.
 */
export class SymbolIndex implements TokenDirectory {
  private readonly partitions = new Map<string, Partition>();
  private readonly byToken = new Map<string, InstrumentRow>();
  private readonly log: Logger;

  private constructor(instruments: InstrumentRow[], timeZone: string, log: Logger) {
    this.log = log;

    const grouped = new Map<string, InstrumentRow[]>();
    for (const row of instruments) {
      if (!this.byToken.has(row.fyToken)) this.byToken.set(row.fyToken, row);
      const list = grouped.get(row.underlying) ?? [];
      list.push(row);
      grouped.set(row.underlying, list);
    }

    for (const [underlying, rows] of grouped) {
      const byKey = new Map<string, InstrumentRow[]>();
      for (const row of rows) {
        const key = lookupKey(row.strike, row.expiry, row.optionType);
        const bucket = byKey.get(key);
        if (bucket) bucket.push(row);
        else byKey.set(key, [row]);
      }
      const calendar = ExpiryCalendar.from(
        rows.map((r) => r.expiry),
        timeZone,
      );
      this.partitions.set(underlying, { rows, byKey, calendar });
    }
  }

  /**
   * Build the index from positional master rows. Any malformed row among the
   * kept underlyings throws, so a partial index is never returned.
   */
  static load(table: Iterable<readonly string[]>, options: SymbolIndexOptions = {}): SymbolIndex {
    const timeZone = options.timeZone ?? 'Asia/Kolkata';
    const log = (options.logger ?? rootLogger).child({ component: 'symbol-index' });
    const wanted = options.underlyings
      ? new Set(options.underlyings.map((u) => u.trim().toUpperCase()))
      : null;

    const instruments: InstrumentRow[] = [];
    let line = 0;
    for (const cols of table) {
      line++;
      if (wanted && !wanted.has(underlyingOf(cols))) continue;
      instruments.push(parseInstrumentRow(cols, line, timeZone));
    }

    const index = new SymbolIndex(instruments, timeZone, log);
    log.info(
      { rows: instruments.length, scanned: line, underlyings: index.underlyings() },
      'Instrument master indexed',
    );
    return index;
  }

  get size(): number {
    let n = 0;
    for (const p of this.partitions.values()) n += p.rows.length;
    return n;
  }

  underlyings(): string[] {
    return [...this.partitions.keys()].sort();
  }

  rows(underlying: string): readonly InstrumentRow[] {
    return this.partition(underlying).rows;
  }

  /** Ticker (e.g. NSE:NIFTY2251218150CE) for a Fyers token seen in the master. */
  symbolForToken(fyToken: string): string | undefined {
    return this.byToken.get(fyToken)?.symbolCode;
  }

  expiries(underlying: string): ExpiryCalendar {
    return this.partition(underlying).calendar;
  }

  /**
   * Exact match on (strike, expiry, option type) within one underlying.
   * @throws NotFoundError when nothing matches
   * @throws DataIntegrityError when the master carries duplicates
   */
  resolveSymbol(
    underlying: string,
    strike: number,
    expiry: IsoDate,
    optionType: OptionType | null,
  ): InstrumentRow {
    const key = underlying.trim().toUpperCase();
    const matches = this.partition(key).byKey.get(lookupKey(strike, expiry, optionType)) ?? [];

    if (matches.length > 1) {
      this.log.warn(
        { underlying: key, strike, expiry, optionType, matches: matches.length },
        'More than one row found in instrument master',
      );
      throw new DataIntegrityError(
        `More than one row found for ${key} ${strike} ${optionType ?? 'FUT'} for expiry ${expiry}`,
        matches.length,
      );
    }
    const [row] = matches;
    if (!row) {
      throw new NotFoundError(
        `No instrument for ${key} ${strike} ${optionType ?? 'FUT'} for expiry ${expiry}`,
      );
    }
    return row;
  }

  private partition(underlying: string): Partition {
    const p = this.partitions.get(underlying.trim().toUpperCase());
    if (!p) throw new NotFoundError(`Underlying ${underlying} is not indexed`);
    return p;
  }
}
