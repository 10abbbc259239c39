import { BalanceRow } from '../core/types';
import { SummaryStats } from './metrics';

const money = (x: number) => `$${x.toFixed(2)}`;
const pct = (x: number) => `${x.toFixed(2)}%`;
const count = (x: number) => x.toFixed(0);
const ratio = (x: number) => (Number.isFinite(x) ? x.toFixed(2) : 'inf');

const rows: Array<[string, keyof SummaryStats, (x: number) => string]> = [
  ['Total trades', 'totalTrades', count],
  ['Number of wins', 'wins', count],
  ['Number of losses', 'losses', count],
  ['Win %', 'winPct', pct],
  ['Largest loss', 'largestLoss', money],
  ['Profit factor', 'profitFactor', ratio],
  ['Average profit', 'averageProfit', money],
  ['Average P&L %', 'averagePnlPct', pct],
  ['Total P&L %', 'totalPnlPct', pct]
];

export const formatSummary = (stats: SummaryStats): string[] => {
  const width = Math.max(...rows.map(([label]) => label.length));
  return rows.map(([label, key, fmt]) => `${label.padEnd(width)}  ${fmt(stats[key])}`);
};

export const BALANCE_CSV_HEADER =
  'date,total_capital,total_cash,stock_capital,option_capital,call_capital,put_capital,stock_qty,option_qty,pct_change,accumulated_return';

export const balanceToCsv = (rows: readonly BalanceRow[]): string => {
  const lines = [BALANCE_CSV_HEADER];
  for (const r of rows) {
    lines.push(
      [
        r.date,
        r.totalCapital.toFixed(2),
        r.totalCash.toFixed(2),
        r.stockCapital.toFixed(2),
        r.optionCapital.toFixed(2),
        r.callCapital.toFixed(2),
        r.putCapital.toFixed(2),
        r.stockQty,
        r.optionQty,
        r.pctChange.toFixed(6),
        r.accumulatedReturn.toFixed(6)
      ].join(',')
    );
  }
  return lines.join('\n');
};
