import { ExitSignals, OptionPosition, StockTarget } from '../core/types';
import { debitOptionsCash } from '../core/capital';
import { sum } from '../core/utils';
import { StockSnapshot } from '../data/snapshot';
import { addOption, addStock, clonePosition, removeOptions } from '../portfolio/inventory';
import { SimulationState } from '../backtest/state';

export interface EntryOptions {
  stopIfBroke: boolean;
}

export interface EntryResult {
  filled: boolean;
  totalPrice: number;
  entry?: OptionPosition;
  reason?: 'NO_CANDIDATES' | 'INSUFFICIENT_CASH';
}

/**
 * Single admission: only the top-ranked candidate is considered. With `stopIfBroke` it fills
 * only when the option cash covers cost * qty; a refused candidate is not retried.
 */
export const executeEntry = (
  state: SimulationState,
  candidates: readonly OptionPosition[],
  options: EntryOptions
): EntryResult => {
  const entry = candidates[0];
  if (!entry) return { filled: false, totalPrice: 0, reason: 'NO_CANDIDATES' };
  const totalPrice = entry.totals.cost * entry.totals.qty;
  if (options.stopIfBroke && state.ledger.optionsCash < totalPrice) {
    return { filled: false, totalPrice, entry, reason: 'INSUFFICIENT_CASH' };
  }
  addOption(state.inventory, entry);
  state.tradeLog.push(clonePosition(entry));
  debitOptionsCash(state.ledger, totalPrice);
  return { filled: true, totalPrice, entry };
};

/** Closes the masked rows unconditionally and books the exit costs against option cash. */
export const executeExit = (state: SimulationState, signals: ExitSignals): OptionPosition[] => {
  const removed = removeOptions(state.inventory, signals.mask);
  state.tradeLog.push(...signals.exits.map(clonePosition));
  debitOptionsCash(state.ledger, sum(signals.costs));
  return removed;
};

/**
 * Buys floor(allocation * percentage / price) shares of every target and returns the dollars
 * spent. Targets without a usable quote are left out and their share stays in cash.
 */
export const resizeStocks = (
  state: SimulationState,
  targets: readonly StockTarget[],
  stocksAllocation: number,
  quotes: StockSnapshot
): number => {
  let spent = 0;
  for (const target of targets) {
    const price = quotes.get(target.symbol)?.adjClose;
    if (price === undefined || !(price > 0)) continue;
    const qty = Math.max(0, Math.floor((stocksAllocation * target.percentage) / price));
    addStock(state.inventory, target.symbol, price, qty);
    spent += qty * price;
  }
  return spent;
};
