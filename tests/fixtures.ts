import { OptionQuote, StockQuote } from '../src/core/types';
import { daysBetween } from '../src/core/time';
import { optionSnapshot, stockSnapshot } from '../src/data/snapshot';
import { OptionSeries, StockSeries } from '../src/data/series';
import { optionSchema } from '../src/data/marketData.types';
import { OptionStrategy } from '../src/strategy/strategy';
import { isType, underlyingIs, allOf, dteAtMost } from '../src/strategy/filters';

type OptionQuoteInput = Partial<OptionQuote> & { contract: string };

export const optionQuote = (input: OptionQuoteInput): OptionQuote => {
  const date = input.date ?? '2024-01-02';
  const expiration = input.expiration ?? '2024-03-15';
  return {
    underlying: 'SPY',
    underlyingLast: 100,
    type: 'put',
    strike: 95,
    bid: 1,
    ask: 1.2,
    volume: 10,
    openInterest: 100,
    dte: daysBetween(date, expiration),
    ...input,
    date,
    expiration
  };
};

export const stockQuote = (date: string, symbol: string, adjClose: number): StockQuote => ({ date, symbol, adjClose });

export const stocksOn = (date: string, prices: Record<string, number>) =>
  stockSnapshot(
    date,
    Object.entries(prices).map(([symbol, px]) => stockQuote(date, symbol, px))
  );

export const optionsOn = (date: string, quotes: OptionQuoteInput[]) =>
  optionSnapshot(
    date,
    quotes.map((q) => optionQuote({ ...q, date }))
  );

export const stockSeries = (prices: Record<string, Record<string, number>>): StockSeries =>
  new StockSeries(
    Object.entries(prices).flatMap(([date, bySymbol]) =>
      Object.entries(bySymbol).map(([symbol, px]) => stockQuote(date, symbol, px))
    )
  );

export const optionSeries = (quotes: Record<string, OptionQuoteInput[]>): OptionSeries =>
  new OptionSeries(
    Object.entries(quotes).flatMap(([date, rows]) => rows.map((q) => optionQuote({ ...q, date })))
  );

/** One long SPY put leg, optionally closed once dte drops to `exitDte`. */
export const longPutStrategy = (initialCapital = 1000, exitDte?: number): OptionStrategy => {
  const strategy = new OptionStrategy(optionSchema(), { initialCapital });
  strategy.addLeg({
    name: 'leg_1',
    direction: 'BUY',
    entryFilter: allOf(underlyingIs('SPY'), isType('put')),
    exitFilter: exitDte !== undefined ? dteAtMost(exitDte) : undefined
  });
  return strategy;
};
