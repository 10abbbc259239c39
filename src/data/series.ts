import { OptionQuote, StockQuote } from '../core/types';
import { monthKey } from '../core/time';
import { OptionSchema, StockSchema, optionSchema, stockSchema } from './marketData.types';
import { Snapshot, optionSnapshot, stockSnapshot } from './snapshot';

/** Date-ordered rows grouped into per-date snapshots. */
abstract class MarketSeries<T extends { date: string }> {
  private readonly byDate = new Map<string, T[]>();
  private readonly sortedDates: string[];

  protected constructor(rows: readonly T[]) {
    for (const row of rows) {
      const bucket = this.byDate.get(row.date);
      if (bucket) bucket.push(row);
      else this.byDate.set(row.date, [row]);
    }
    this.sortedDates = Array.from(this.byDate.keys()).sort();
  }

  protected abstract snapshotOf(date: string, rows: readonly T[]): Snapshot<T>;

  /** Distinct dates, ascending. */
  dates(): string[] {
    return [...this.sortedDates];
  }

  get startDate(): string | undefined {
    return this.sortedDates[0];
  }

  get endDate(): string | undefined {
    return this.sortedDates[this.sortedDates.length - 1];
  }

  get length(): number {
    return this.sortedDates.length;
  }

  snapshot(date: string): Snapshot<T> {
    return this.snapshotOf(date, this.byDate.get(date) ?? []);
  }

  *iterDates(): IterableIterator<Snapshot<T>> {
    for (const date of this.sortedDates) {
      yield this.snapshot(date);
    }
  }

  /** First trading date of every month. */
  *iterMonths(): IterableIterator<Snapshot<T>> {
    let lastMonth = '';
    for (const date of this.sortedDates) {
      const month = monthKey(date);
      if (month === lastMonth) continue;
      lastMonth = month;
      yield this.snapshot(date);
    }
  }
}

export class StockSeries extends MarketSeries<StockQuote> {
  readonly schema: StockSchema;

  constructor(rows: readonly StockQuote[], schema: StockSchema = stockSchema()) {
    super(rows);
    this.schema = schema;
  }

  protected snapshotOf(date: string, rows: readonly StockQuote[]) {
    return stockSnapshot(date, rows);
  }
}

export class OptionSeries extends MarketSeries<OptionQuote> {
  readonly schema: OptionSchema;

  constructor(rows: readonly OptionQuote[], schema: OptionSchema = optionSchema()) {
    super(rows);
    this.schema = schema;
  }

  protected snapshotOf(date: string, rows: readonly OptionQuote[]) {
    return optionSnapshot(date, rows);
  }
}
