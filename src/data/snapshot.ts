import { OptionQuote, StockQuote } from '../core/types';

/** One date's rows with a key index built once, so lookups never scan the table. */
export class Snapshot<T> {
  readonly date: string;
  readonly rows: readonly T[];
  private readonly index = new Map<string, T>();

  constructor(date: string, rows: readonly T[], keyOf: (row: T) => string) {
    this.date = date;
    this.rows = rows;
    for (const row of rows) {
      const key = keyOf(row);
      // first row wins on duplicate keys
      if (!this.index.has(key)) this.index.set(key, row);
    }
  }

  get(key: string): T | undefined {
    return this.index.get(key);
  }

  get size(): number {
    return this.rows.length;
  }
}

export type StockSnapshot = Snapshot<StockQuote>;
export type OptionSnapshot = Snapshot<OptionQuote>;

export const stockSnapshot = (date: string, rows: readonly StockQuote[]): StockSnapshot =>
  new Snapshot(date, rows, (r) => r.symbol);

export const optionSnapshot = (date: string, rows: readonly OptionQuote[]): OptionSnapshot =>
  new Snapshot(date, rows, (r) => r.contract);
