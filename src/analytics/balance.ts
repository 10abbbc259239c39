import { BalanceRecord, BalanceRow } from '../core/types';
import { computeStockValue, totalCash } from '../core/capital';
import { optionQuantity, stockQuantity } from '../portfolio/inventory';
import { markOptions } from '../portfolio/valuation';
import { executeExit } from '../execution/executionEngine';
import { StepContext } from '../execution/rebalanceEngine';
import { SimulationState } from '../backtest/state';

/** Runs the day's exits, marks the book and appends one balance record. */
export const updateBalance = (state: SimulationState, ctx: StepContext): BalanceRecord => {
  const { date, stocks, options, strategy } = ctx;
  executeExit(state, strategy.filterExits(options, state.inventory.options, date));

  const { callCapital, putCapital } = markOptions(strategy, state.inventory.options, options);
  const optionCapital = state.ledger.optionsCash + callCapital + putCapital;
  const stockCapital = computeStockValue(state.inventory.stocks, stocks) + state.ledger.stocksCash;
  const totalCapital = stockCapital + optionCapital;
  state.ledger.totalCapital = totalCapital;

  const record: BalanceRecord = {
    date,
    totalCapital,
    totalCash: totalCash(state.ledger),
    stockCapital,
    optionCapital,
    callCapital,
    putCapital,
    stockQty: stockQuantity(state.inventory),
    optionQty: optionQuantity(state.inventory)
  };
  state.balance.push(record);
  return record;
};

/** Adds period-over-period change and the running total-return index (1.0 at the first record). */
export const withReturns = (records: readonly BalanceRecord[]): BalanceRow[] => {
  let accumulated = 1;
  return records.map((record, i) => {
    const prev = i > 0 ? records[i - 1].totalCapital : 0;
    const pctChange = i > 0 && prev !== 0 ? record.totalCapital / prev - 1 : 0;
    accumulated *= 1 + pctChange;
    return { ...record, pctChange, accumulatedReturn: accumulated };
  });
};
