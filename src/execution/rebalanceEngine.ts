import { Allocation, ExitSignals, StockTarget } from '../core/types';
import { CapitalSplit, computeStockValue, splitCapital } from '../core/capital';
import { OptionSnapshot, StockSnapshot } from '../data/snapshot';
import { resetInventory } from '../portfolio/inventory';
import { exitOrder } from '../core/orders';
import { sum } from '../core/utils';
import { Strategy } from '../strategy/strategy';
import { SimulationState } from '../backtest/state';
import { EntryResult, executeEntry, executeExit, resizeStocks } from './executionEngine';

export interface StepContext {
  date: string;
  stocks: StockSnapshot;
  options: OptionSnapshot;
  strategy: Strategy;
}

export interface RebalanceContext extends StepContext {
  allocation: Allocation;
  targets: readonly StockTarget[];
  stopIfBroke: boolean;
}

export interface RebalanceResult extends CapitalSplit {
  totalCapital: number;
  stocksSpent: number;
  liquidated: number;
  entry: EntryResult;
}

/** Exit rows that close every open option position at the day's marks (zero when unquoted). */
export const liquidationSignals = (state: SimulationState, ctx: StepContext): ExitSignals => {
  const positions = state.inventory.options;
  const marks = ctx.strategy.legs.map((_, i) => ctx.strategy.exitCandidates(i, positions, ctx.options));
  const exits = positions.map((position, row) => {
    const legs = position.legs.map((held, i) => ({
      ...held,
      cost: marks[i]?.[row]?.cost ?? 0,
      order: exitOrder(ctx.strategy.legs[i]?.direction ?? 'BUY')
    }));
    return { legs, totals: { cost: sum(legs.map((l) => l.cost)), qty: position.totals.qty, date: ctx.date } };
  });
  return {
    exits,
    mask: positions.map(() => true),
    costs: exits.map((e) => e.totals.cost * e.totals.qty)
  };
};

/**
 * Full liquidation and re-entry at the target allocation:
 * strategy exits, liquidate remaining options, value the book, split it, rebuild stocks,
 * hand the option sleeve to the strategy and admit one entry.
 */
export const rebalancePortfolio = (state: SimulationState, ctx: RebalanceContext): RebalanceResult => {
  const { date, stocks, options, strategy } = ctx;
  executeExit(state, strategy.filterExits(options, state.inventory.options, date));
  const liquidated = executeExit(state, liquidationSignals(state, ctx)).length;

  const stockValue = computeStockValue(state.inventory.stocks, stocks);
  const marked = state.ledger.stocksCash + state.ledger.optionsCash + stockValue;
  // nothing held and no cash yet (first date): keep the tracked capital
  if (marked !== 0) state.ledger.totalCapital = marked;
  const totalCapital = state.ledger.totalCapital;
  const split = splitCapital(totalCapital, ctx.allocation);

  resetInventory(state.inventory);
  const stocksSpent = resizeStocks(state, ctx.targets, split.stocksAllocation, stocks);
  // the cash sleeve rides in the stock-side pool
  state.ledger.stocksCash = split.stocksAllocation - stocksSpent + split.cashAllocation;
  state.ledger.optionsCash = split.optionsAllocation;

  strategy.initialCapital = split.optionsAllocation;
  const entry = executeEntry(state, strategy.filterEntries(options, state.inventory.options, date), {
    stopIfBroke: ctx.stopIfBroke
  });

  return { ...split, totalCapital, stocksSpent, liquidated, entry };
};
