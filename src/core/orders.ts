import { Direction, OptionQuote, Order } from './types';

export const priceColumn = (direction: Direction): 'ask' | 'bid' => (direction === 'BUY' ? 'ask' : 'bid');

export const invertDirection = (direction: Direction): Direction => (direction === 'BUY' ? 'SELL' : 'BUY');

export const entryOrder = (direction: Direction): Order => (direction === 'BUY' ? 'BTO' : 'STO');

export const exitOrder = (direction: Direction): Order => (direction === 'BUY' ? 'STC' : 'BTC');

export const isEntryOrder = (order: Order): boolean => order === 'BTO' || order === 'STO';

/** Cash paid (positive) or received (negative) to open one contract of a leg. */
export const entryCost = (direction: Direction, quote: OptionQuote, sharesPerContract: number): number => {
  const sign = direction === 'BUY' ? 1 : -1;
  return sign * quote[priceColumn(direction)] * sharesPerContract;
};

/** Cash paid (positive) or received (negative) to close one contract opened in `direction`. */
export const exitCost = (direction: Direction, quote: OptionQuote, sharesPerContract: number): number => {
  const closing = invertDirection(direction);
  const sign = closing === 'BUY' ? 1 : -1;
  return sign * quote[priceColumn(closing)] * sharesPerContract;
};
