import { BalanceRow, TradeLogEntry } from '../core/types';
import { isEntryOrder } from '../core/orders';
import { average, sum } from '../core/utils';

export interface SummaryStats {
  totalTrades: number;
  wins: number;
  losses: number;
  winPct: number;
  largestLoss: number;
  profitFactor: number;
  averageProfit: number;
  averagePnlPct: number;
  totalPnlPct: number;
}

/**
 * Net cash outlay of every round trip (entry cost * qty + exit cost * qty), matching entries
 * to exits on the first leg's contract in log order. Negative means the trade made money.
 * Entries with no matching exit are skipped.
 */
export const roundTripCosts = (tradeLog: readonly TradeLogEntry[]): number[] => {
  const isEntry = (row: TradeLogEntry) => row.legs.length > 0 && isEntryOrder(row.legs[0].order);
  const entries = tradeLog.filter(isEntry);
  const exits = tradeLog.filter((row) => row.legs.length > 0 && !isEntry(row));
  const used = new Set<number>();
  const costs: number[] = [];
  for (const entry of entries) {
    const contract = entry.legs[0].contract;
    const matchIndex = exits.findIndex((exit, i) => !used.has(i) && exit.legs[0].contract === contract);
    if (matchIndex < 0) continue;
    used.add(matchIndex);
    const exit = exits[matchIndex];
    costs.push(entry.totals.cost * entry.totals.qty + exit.totals.cost * exit.totals.qty);
  }
  return costs;
};

export const profitFactor = (costs: readonly number[]): number => {
  const grossProfit = sum(costs.filter((c) => c < 0).map((c) => -c));
  const grossLoss = sum(costs.filter((c) => c > 0));
  if (grossLoss > 0) return grossProfit / grossLoss;
  return grossProfit > 0 ? Infinity : 0;
};

export const computeSummary = (
  tradeLog: readonly TradeLogEntry[],
  balance: readonly BalanceRow[],
  initialCapital: number
): SummaryStats => {
  const costs = roundTripCosts(tradeLog);
  const totalTrades = tradeLog.filter((row) => row.legs.length > 0 && !isEntryOrder(row.legs[0].order)).length;
  const wins = costs.filter((c) => c < 0).length;
  const finalCapital = balance.length ? balance[balance.length - 1].totalCapital : initialCapital;
  return {
    totalTrades,
    wins,
    losses: totalTrades - wins,
    winPct: totalTrades > 0 ? (wins / totalTrades) * 100 : 0,
    largestLoss: Math.max(0, ...costs),
    profitFactor: profitFactor(costs),
    averageProfit: average(costs.map((c) => -c)),
    averagePnlPct: average(balance.slice(1).map((r) => r.pctChange * 100)),
    totalPnlPct: initialCapital > 0 ? (finalCapital / initialCapital - 1) * 100 : 0
  };
};
