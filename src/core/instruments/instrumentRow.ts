import { InstrumentParseError } from '../errors.js';
import type { InstrumentRow, OptionType } from '../types.js';
import { epochToExchangeDate } from './exchangeDate.js';

// Positional layout of the Fyers NSE_FO master file (no header row)
export const COL = {
  fyToken: 0,
  symbol: 1,
  lotSize: 3,
  tickSize: 4,
  expiry: 8,
  symbolCode: 9,
  underlying: 13,
  code: 14,
  strike: 15,
  optionType: 16,
} as const;

const MIN_COLUMNS = COL.optionType + 1;

const OPTION_CODES: Record<string, OptionType | null> = {
  CE: 'CALL',
  PE: 'PUT',
  XX: null,
  '': null,
};

export function underlyingOf(cols: readonly string[]): string {
  return (cols[COL.underlying] ?? '').trim().toUpperCase();
}

function num(cols: readonly string[], idx: number, name: string, line: number): number {
  const raw = (cols[idx] ?? '').trim();
  const n = raw === '' ? NaN : Number(raw);
  if (!Number.isFinite(n)) throw new InstrumentParseError(`Invalid ${name} "${raw}"`, line);
  return n;
}

function text(cols: readonly string[], idx: number, name: string, line: number): string {
  const raw = (cols[idx] ?? '').trim();
  if (!raw) throw new InstrumentParseError(`Missing ${name}`, line);
  return raw;
}

/**
 * Parse one positional master row. Strikes arrive as floats ("18150.0") and
 * must carry an integer; expiry is epoch seconds read in `timeZone`.
 */
export function parseInstrumentRow(
  cols: readonly string[],
  line: number,
  timeZone: string,
): InstrumentRow {
  if (cols.length < MIN_COLUMNS) {
    throw new InstrumentParseError(`Expected at least ${MIN_COLUMNS} columns, got ${cols.length}`, line);
  }

  const strike = num(cols, COL.strike, 'strike', line);
  if (!Number.isInteger(strike)) {
    throw new InstrumentParseError(`Non-integer strike ${strike}`, line);
  }

  const optionCode = (cols[COL.optionType] ?? '').trim().toUpperCase();
  if (!Object.hasOwn(OPTION_CODES, optionCode)) {
    throw new InstrumentParseError(`Unknown option type "${optionCode}"`, line);
  }

  const row: InstrumentRow = {
    underlying: text(cols, COL.underlying, 'underlying', line).toUpperCase(),
    strike,
    expiry: epochToExchangeDate(num(cols, COL.expiry, 'expiry', line), timeZone),
    optionType: OPTION_CODES[optionCode] ?? null,
    symbol: text(cols, COL.symbol, 'symbol', line),
    symbolCode: text(cols, COL.symbolCode, 'symbol code', line),
    code: num(cols, COL.code, 'code', line),
    fyToken: text(cols, COL.fyToken, 'fyToken', line),
    lotSize: num(cols, COL.lotSize, 'lot size', line),
    tickSize: num(cols, COL.tickSize, 'tick size', line),
  };
  return Object.freeze(row);
}
