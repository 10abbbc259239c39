import { Allocation, AssetClass, BalanceRow, StockTarget, TradeLogEntry } from '../core/types';
import { ConfigurationError } from '../core/errors';
import { businessMonthStarts, monthKey } from '../core/time';
import { sameSchema } from '../data/marketData.types';
import { OptionSeries, StockSeries } from '../data/series';
import { OptionSnapshot, StockSnapshot } from '../data/snapshot';
import { normalizeAllocation, validateStockTargets } from '../portfolio/allocation';
import { clonePosition } from '../portfolio/inventory';
import { Strategy, isStrategy } from '../strategy/strategy';
import { rebalancePortfolio } from '../execution/rebalanceEngine';
import { updateBalance, withReturns } from '../analytics/balance';
import { SummaryStats, computeSummary } from '../analytics/metrics';
import { SimulationState, createSimulationState } from './state';

export type BacktestPhase = 'initializing' | 'running' | 'finished';

export interface BacktestHooks {
  onProgress?: (done: number, total: number, date: string) => void;
}

interface Step {
  date: string;
  stocks: StockSnapshot;
  options: OptionSnapshot;
}

const sameDates = (a: readonly string[], b: readonly string[]): boolean =>
  a.length === b.length && a.every((d, i) => d === b[i]);

/** Moves each boundary to the first trading date on or after it in the same month; months with none are dropped. */
export const alignToTradingDates = (boundaries: readonly string[], dates: readonly string[]): string[] => {
  const aligned: string[] = [];
  for (const boundary of boundaries) {
    const day = dates.find((d) => d >= boundary);
    if (day !== undefined && monthKey(day) === monthKey(boundary)) aligned.push(day);
  }
  return aligned;
};

/**
 * Drives a stock + options portfolio through a date range: rebalances to the allocation on the
 * first date and on scheduled business-month starts, applies strategy exits every step and
 * records the daily balance.
 */
export class Backtest {
  readonly allocation: Allocation;
  readonly initialCapital: number;
  stopIfBroke = true;
  hooks: BacktestHooks = {};

  private phase: BacktestPhase = 'initializing';
  private stockTargets: StockTarget[] = [];
  private optionsStrategy?: Strategy;
  private stockFeed?: StockSeries;
  private optionFeed?: OptionSeries;
  private state: SimulationState;
  private balanceRows: BalanceRow[] = [];

  constructor(allocation: Partial<Record<AssetClass, number>>, initialCapital = 1_000_000) {
    if (!Number.isFinite(initialCapital) || initialCapital <= 0) {
      throw new ConfigurationError('Initial capital must be a positive number', { initialCapital });
    }
    this.allocation = normalizeAllocation(allocation);
    this.initialCapital = initialCapital;
    this.state = createSimulationState(initialCapital);
  }

  get status(): BacktestPhase {
    return this.phase;
  }

  get stocks(): StockTarget[] {
    return [...this.stockTargets];
  }

  set stocks(targets: StockTarget[]) {
    this.stockTargets = validateStockTargets(targets);
  }

  get strategy(): Strategy | undefined {
    return this.optionsStrategy;
  }

  set strategy(strategy: Strategy | undefined) {
    if (!isStrategy(strategy)) {
      throw new ConfigurationError('Invalid strategy');
    }
    this.optionsStrategy = strategy;
  }

  get stocksData(): StockSeries | undefined {
    return this.stockFeed;
  }

  set stocksData(data: StockSeries | undefined) {
    if (!(data instanceof StockSeries)) {
      throw new ConfigurationError('Stocks data must be a StockSeries');
    }
    this.stockFeed = data;
  }

  get optionsData(): OptionSeries | undefined {
    return this.optionFeed;
  }

  set optionsData(data: OptionSeries | undefined) {
    if (!(data instanceof OptionSeries)) {
      throw new ConfigurationError('Options data must be an OptionSeries');
    }
    this.optionFeed = data;
  }

  get tradeLog(): TradeLogEntry[] {
    return this.state.tradeLog.map(clonePosition);
  }

  get balance(): readonly BalanceRow[] {
    return this.balanceRows;
  }

  /**
   * Runs the simulation and returns the trade log.
   * @param rebalanceFrequency months between scheduled rebalances; 0 rebalances only on the first date
   * @param monthly step through the first trading date of each month instead of every date
   */
  run(rebalanceFrequency = 0, monthly = false): TradeLogEntry[] {
    const { stocksData, optionsData, strategy } = this.assertReady();
    if (!Number.isInteger(rebalanceFrequency) || rebalanceFrequency < 0) {
      throw new ConfigurationError('Rebalance frequency must be a non-negative integer', { rebalanceFrequency });
    }

    const { startDate, endDate } = stocksData;
    if (startDate === undefined || endDate === undefined) throw new ConfigurationError('Stock data is empty');
    this.phase = 'running';
    this.state = createSimulationState(this.initialCapital);
    this.balanceRows = [];

    // a boundary on a market holiday moves to the month's next trading date
    const rebalanceDays = new Set(
      alignToTradingDates(businessMonthStarts(startDate, endDate, rebalanceFrequency), stocksData.dates())
    );
    const steps = this.steps(stocksData, optionsData, monthly);

    steps.forEach((step, i) => {
      const ctx = { ...step, strategy };
      if (i === 0 || rebalanceDays.has(step.date)) {
        rebalancePortfolio(this.state, {
          ...ctx,
          allocation: this.allocation,
          targets: this.stockTargets,
          stopIfBroke: this.stopIfBroke
        });
      }
      updateBalance(this.state, ctx);
      this.hooks.onProgress?.(i + 1, steps.length, step.date);
    });

    this.balanceRows = withReturns(this.state.balance);
    this.phase = 'finished';
    return this.tradeLog;
  }

  summary(): SummaryStats {
    return computeSummary(this.state.tradeLog, this.balanceRows, this.initialCapital);
  }

  private assertReady(): { stocksData: StockSeries; optionsData: OptionSeries; strategy: Strategy } {
    const stocksData = this.stockFeed;
    const optionsData = this.optionFeed;
    const strategy = this.optionsStrategy;
    if (!stocksData) throw new ConfigurationError('Stock data not set');
    if (!optionsData) throw new ConfigurationError('Options data not set');
    if (!strategy) throw new ConfigurationError('Options strategy not set');
    if (!this.stockTargets.length) throw new ConfigurationError('Stock targets not set');
    if (!sameSchema(optionsData.schema, strategy.schema)) {
      throw new ConfigurationError('Options data schema does not match the strategy schema');
    }
    const stockDates = stocksData.dates();
    const optionDates = optionsData.dates();
    if (!stockDates.length) throw new ConfigurationError('Stock data is empty');
    if (!sameDates(stockDates, optionDates)) {
      throw new ConfigurationError('Stock and options dates do not match', {
        stockDates: stockDates.length,
        optionDates: optionDates.length
      });
    }
    return { stocksData, optionsData, strategy };
  }

  private steps(stocksData: StockSeries, optionsData: OptionSeries, monthly: boolean): Step[] {
    const stockIt = monthly ? stocksData.iterMonths() : stocksData.iterDates();
    const optionIt = monthly ? optionsData.iterMonths() : optionsData.iterDates();
    const optionSnaps = Array.from(optionIt);
    return Array.from(stockIt).map((stocks, i) => ({ date: stocks.date, stocks, options: optionSnaps[i] }));
  }
}
