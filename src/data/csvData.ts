import fs from 'fs';
import path from 'path';
import { ensureDir } from '../core/utils';
import { daysBetween, toISODate } from '../core/time';
import { OptionQuote, OptionType, StockQuote } from '../core/types';
import { OptionColumns, StockColumns, optionSchema, stockSchema } from './marketData.types';
import { OptionSeries, StockSeries } from './series';

export type CsvRecord = Record<string, string>;

const splitLine = (line: string): string[] => {
  const cells: string[] = [];
  let current = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (ch === '"') {
        quoted = false;
      } else {
        current += ch;
      }
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells.map((c) => c.trim());
};

export const parseCsv = (content: string): CsvRecord[] => {
  const lines = content.split(/\r?\n/).filter((l) => l.trim().length > 0);
  if (!lines.length) return [];
  const header = splitLine(lines[0]);
  return lines.slice(1).map((line) => {
    const cells = splitLine(line);
    const record: CsvRecord = {};
    header.forEach((name, i) => {
      record[name] = cells[i] ?? '';
    });
    return record;
  });
};

const toNumber = (value: string | undefined): number => (value === undefined || value === '' ? NaN : Number(value));

const toOptionType = (value: string | undefined): OptionType | undefined => {
  const normalized = (value ?? '').toLowerCase();
  if (normalized === 'call' || normalized === 'c') return 'call';
  if (normalized === 'put' || normalized === 'p') return 'put';
  return undefined;
};

const safeDate = (value: string | undefined): string | undefined => {
  if (!value) return undefined;
  try {
    return toISODate(value);
  } catch {
    return undefined;
  }
};

export const toStockQuote = (record: CsvRecord, columns: StockColumns): StockQuote | undefined => {
  const date = safeDate(record[columns.date]);
  const symbol = record[columns.symbol];
  const adjClose = toNumber(record[columns.adjClose]);
  if (!date || !symbol || !Number.isFinite(adjClose)) return undefined;
  return { date, symbol, adjClose };
};

export const toOptionQuote = (record: CsvRecord, columns: OptionColumns): OptionQuote | undefined => {
  const date = safeDate(record[columns.date]);
  const expiration = safeDate(record[columns.expiration]);
  const type = toOptionType(record[columns.type]);
  const contract = record[columns.contract];
  const underlying = record[columns.underlying];
  const strike = toNumber(record[columns.strike]);
  const bid = toNumber(record[columns.bid]);
  const ask = toNumber(record[columns.ask]);
  if (!date || !expiration || !type || !contract || !underlying) return undefined;
  if (![strike, bid, ask].every(Number.isFinite)) return undefined;
  const underlyingLast = toNumber(record[columns.underlyingLast]);
  const volume = toNumber(record[columns.volume]);
  const openInterest = toNumber(record[columns.openInterest]);
  return {
    date,
    contract,
    underlying,
    underlyingLast: Number.isFinite(underlyingLast) ? underlyingLast : 0,
    type,
    expiration,
    strike,
    bid,
    ask,
    volume: Number.isFinite(volume) ? volume : 0,
    openInterest: Number.isFinite(openInterest) ? openInterest : 0,
    dte: daysBetween(date, expiration)
  };
};

const mapRecords = <T>(file: string, records: CsvRecord[], convert: (r: CsvRecord) => T | undefined): T[] => {
  const rows: T[] = [];
  let dropped = 0;
  for (const record of records) {
    const row = convert(record);
    if (row) rows.push(row);
    else dropped++;
  }
  if (dropped > 0) {
    console.warn(`${path.basename(file)}: dropped ${dropped} of ${records.length} rows with missing or invalid fields.`);
  }
  return rows;
};

export const loadStockSeries = (file: string, columns: Partial<StockColumns> = {}): StockSeries => {
  const schema = stockSchema(columns);
  const records = parseCsv(fs.readFileSync(file, 'utf-8'));
  return new StockSeries(mapRecords(file, records, (r) => toStockQuote(r, schema.columns)), schema);
};

export const loadOptionSeries = (file: string, columns: Partial<OptionColumns> = {}): OptionSeries => {
  const schema = optionSchema(columns);
  const records = parseCsv(fs.readFileSync(file, 'utf-8'));
  return new OptionSeries(mapRecords(file, records, (r) => toOptionQuote(r, schema.columns)), schema);
};

const writeCsv = (file: string, header: string[], lines: string[][]) => {
  ensureDir(path.dirname(file));
  fs.writeFileSync(file, [header.join(','), ...lines.map((l) => l.join(','))].join('\n') + '\n');
};

export const writeStockCsv = (file: string, series: StockSeries) => {
  const cols = series.schema.columns;
  const lines: string[][] = [];
  for (const snap of series.iterDates()) {
    for (const q of snap.rows) lines.push([q.date, q.symbol, String(q.adjClose)]);
  }
  writeCsv(file, [cols.date, cols.symbol, cols.adjClose], lines);
};

export const writeOptionCsv = (file: string, series: OptionSeries) => {
  const cols = series.schema.columns;
  const lines: string[][] = [];
  for (const snap of series.iterDates()) {
    for (const q of snap.rows) {
      lines.push([
        q.date,
        q.contract,
        q.underlying,
        String(q.underlyingLast),
        q.type,
        q.expiration,
        String(q.strike),
        String(q.bid),
        String(q.ask),
        String(q.volume),
        String(q.openInterest)
      ]);
    }
  }
  writeCsv(
    file,
    [
      cols.date,
      cols.contract,
      cols.underlying,
      cols.underlyingLast,
      cols.type,
      cols.expiration,
      cols.strike,
      cols.bid,
      cols.ask,
      cols.volume,
      cols.openInterest
    ],
    lines
  );
};
