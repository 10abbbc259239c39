import { OptionQuote, OptionType } from '../core/types';

export type OptionFilter = (quote: OptionQuote) => boolean;
export type QuoteComparator = (a: OptionQuote, b: OptionQuote) => number;

export const allOf =
  (...filters: OptionFilter[]): OptionFilter =>
  (q) =>
    filters.every((f) => f(q));

export const anyOf =
  (...filters: OptionFilter[]): OptionFilter =>
  (q) =>
    filters.some((f) => f(q));

export const not =
  (filter: OptionFilter): OptionFilter =>
  (q) =>
    !filter(q);

export const isType =
  (type: OptionType): OptionFilter =>
  (q) =>
    q.type === type;

export const underlyingIs =
  (symbol: string): OptionFilter =>
  (q) =>
    q.underlying === symbol;

export const dteBetween =
  (min: number, max: number): OptionFilter =>
  (q) =>
    q.dte >= min && q.dte <= max;

export const dteAtMost =
  (max: number): OptionFilter =>
  (q) =>
    q.dte <= max;

/** Strike between `min` and `max` times the underlying's last price. */
export const strikeWithin =
  (min: number, max: number): OptionFilter =>
  (q) =>
    q.underlyingLast > 0 && q.strike >= min * q.underlyingLast && q.strike <= max * q.underlyingLast;

export const byStrike =
  (order: 'asc' | 'desc' = 'asc'): QuoteComparator =>
  (a, b) =>
    order === 'asc' ? a.strike - b.strike : b.strike - a.strike;

export const byDte =
  (order: 'asc' | 'desc' = 'asc'): QuoteComparator =>
  (a, b) =>
    order === 'asc' ? a.dte - b.dte : b.dte - a.dte;
