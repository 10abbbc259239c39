import path from 'path';
import { BacktestConfig, DataConfig } from '../core/schema';
import { ConfigurationError } from '../core/errors';
import { loadOptionSeries, loadStockSeries } from '../data/csvData';
import { buildStubData } from '../data/marketData.stub';
import { OptionColumns, StockColumns, defaultOptionColumns, defaultStockColumns } from '../data/marketData.types';
import { OptionSeries, StockSeries } from '../data/series';
import { buildStrategy } from '../strategy/strategyConfig';
import { Backtest } from './backtest';

const isColumn = <K extends string>(defaults: Record<K, string>, key: string): key is K =>
  Object.prototype.hasOwnProperty.call(defaults, key);

const pickColumns = <K extends string>(
  defaults: Record<K, string>,
  overrides: Record<string, string> = {}
): Partial<Record<K, string>> => {
  const picked: Partial<Record<K, string>> = {};
  for (const [key, column] of Object.entries(overrides)) {
    if (!isColumn(defaults, key)) {
      throw new ConfigurationError(`Unknown column override: ${key}`);
    }
    picked[key] = column;
  }
  return picked;
};

export const loadFeeds = (
  data: DataConfig,
  symbols: string[],
  optionUnderlyings: string[],
  baseDir = process.cwd()
): { stocks: StockSeries; options: OptionSeries } => {
  if (data.source === 'stub') {
    return buildStubData({
      symbols,
      optionUnderlyings: optionUnderlyings.length ? optionUnderlyings : symbols,
      start: data.start,
      end: data.end,
      seed: data.seed
    });
  }
  const stockColumns: Partial<StockColumns> = pickColumns(defaultStockColumns, data.stockColumns);
  const optionColumns: Partial<OptionColumns> = pickColumns(defaultOptionColumns, data.optionColumns);
  return {
    stocks: loadStockSeries(path.resolve(baseDir, data.stocksFile), stockColumns),
    options: loadOptionSeries(path.resolve(baseDir, data.optionsFile), optionColumns)
  };
};

/** Wires feeds, strategy and targets from a validated config into a ready-to-run Backtest. */
export const createBacktest = (config: BacktestConfig, baseDir = process.cwd()): Backtest => {
  const symbols = config.stocks.map((s) => s.symbol);
  const underlyings = Array.from(new Set(config.strategy.legs.map((l) => l.underlying)));
  const feeds = loadFeeds(config.data, symbols, underlyings, baseDir);

  const backtest = new Backtest(config.allocation, config.initialCapital);
  backtest.stopIfBroke = config.stopIfBroke;
  backtest.stocks = config.stocks;
  backtest.stocksData = feeds.stocks;
  backtest.optionsData = feeds.options;
  backtest.strategy = buildStrategy(config.strategy, feeds.options.schema, config.initialCapital);
  return backtest;
};
