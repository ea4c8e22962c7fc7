// src/core/instruments/masterFile.ts
import { readFile } from 'node:fs/promises';
import { parse } from 'csv-parse/sync';
import { request, type Dispatcher } from 'undici';
import { getAgent } from '../../infra/http/agent.js';
import { logger } from '../../utils/logger.js';
import { ConnectionError, InstrumentParseError } from '../errors.js';
import { SymbolIndex, type SymbolIndexOptions } from './symbolIndex.js';

const log = logger.child({ component: 'instrument-master' });

function isRemote(source: string) {
  return /^https?:\/\//i.test(source);
}

/** Raw CSV text of the master file, from a URL or a local path. */
export async function fetchInstrumentMaster(source: string): Promise<string> {
  if (!isRemote(source)) {
    log.info({ source }, 'Reading instrument master from disk');
    return readFile(source, 'utf8');
  }

  log.info({ source }, 'Downloading instrument master');
  let res: Dispatcher.ResponseData;
  try {
    res = await request(source, { dispatcher: getAgent('instruments') });
  } catch (err) {
    throw new ConnectionError(`Instrument master download failed: ${source}`, { cause: err });
  }
  if (res.statusCode !== 200) {
    await res.body.dump();
    throw new ConnectionError(`Instrument master download failed with HTTP ${res.statusCode}`);
  }
  return res.body.text();
}

/** Split headerless CSV into positional rows. */
export function parseInstrumentTable(csv: string): string[][] {
  const records: unknown = parse(csv, {
    skip_empty_lines: true,
    relax_column_count: true,
    trim: true,
  });
  if (!Array.isArray(records)) throw new InstrumentParseError('Master file did not parse to rows', 0);

  return records.map((rec: unknown, i) => {
    if (!Array.isArray(rec) || !rec.every((c): c is string => typeof c === 'string')) {
      throw new InstrumentParseError('Row is not a list of fields', i + 1);
    }
    return rec;
  });
}

export async function loadSymbolIndex(
  source: string,
  options: SymbolIndexOptions = {},
): Promise<SymbolIndex> {
  const csv = await fetchInstrumentMaster(source);
  return SymbolIndex.load(parseInstrumentTable(csv), options);
}
