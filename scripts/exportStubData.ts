/* eslint-disable no-console */
/**
 * Writes the synthetic stock and option feeds for a config's date range to CSV, so they can be
 * fed back in through a `csv` data source.
 */
import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { loadConfig } from '../src/core/utils';
import { buildStubData } from '../src/data/marketData.stub';
import { writeOptionCsv, writeStockCsv } from '../src/data/csvData';

export const exportStubData = (configPath: string, outDir: string): { stocksFile: string; optionsFile: string } => {
  const config = loadConfig(configPath);
  if (config.data.source !== 'stub') {
    throw new Error(`Config ${configPath} does not use the stub data source`);
  }
  const symbols = config.stocks.map((s) => s.symbol);
  const underlyings = Array.from(new Set(config.strategy.legs.map((l) => l.underlying)));
  const { stocks, options } = buildStubData({
    symbols,
    optionUnderlyings: underlyings.length ? underlyings : symbols,
    start: config.data.start,
    end: config.data.end,
    seed: config.data.seed
  });
  const stocksFile = path.join(outDir, 'stocks.csv');
  const optionsFile = path.join(outDir, 'options.csv');
  writeStockCsv(stocksFile, stocks);
  writeOptionCsv(optionsFile, options);
  return { stocksFile, optionsFile };
};

if (require.main === module) {
  const program = new Command();
  program
    .option('--config <path>', 'stub-sourced backtest config', 'src/config/default.json')
    .option('--out <dir>', 'output directory', 'data/stub');
  const opts = program.parse(process.argv).opts<{ config: string; out: string }>();
  try {
    const written = exportStubData(path.resolve(opts.config), path.resolve(opts.out));
    console.log(`Wrote ${written.stocksFile}`);
    console.log(`Wrote ${written.optionsFile}`);
  } catch (err) {
    console.error('export failed', err);
    process.exitCode = 1;
  }
}
