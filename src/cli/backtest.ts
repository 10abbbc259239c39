#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import path from 'path';
import { loadConfig } from '../core/utils';
import { makeRunId } from '../core/time';
import { BacktestConfig } from '../core/schema';
import { createBacktest } from '../backtest/setup';
import { SummaryStats } from '../analytics/metrics';
import { balanceToCsv, formatSummary } from '../analytics/format';
import { appendEvent, makeEvent } from '../ledger/ledger';
import { writeRunArtifact } from '../ledger/storage';

export type BacktestCommandOptions = {
  config?: string;
  rebalance?: string;
  monthly?: boolean;
  allowNegativeCash?: boolean;
  runId?: string;
  quiet?: boolean;
};

export interface BacktestCommandResult {
  runId: string;
  summary: SummaryStats;
  trades: number;
  steps: number;
}

const applyOverrides = (config: BacktestConfig, options: BacktestCommandOptions): BacktestConfig => {
  const next = { ...config };
  if (options.rebalance !== undefined) {
    const freq = Number(options.rebalance);
    if (!Number.isInteger(freq) || freq < 0) {
      throw new Error(`--rebalance must be a non-negative integer, got ${options.rebalance}`);
    }
    next.rebalanceFrequency = freq;
  }
  if (options.monthly) next.monthly = true;
  if (options.allowNegativeCash) next.stopIfBroke = false;
  return next;
};

export const runBacktestCommand = (options: BacktestCommandOptions): BacktestCommandResult => {
  const configPath = path.resolve(
    process.cwd(),
    options.config || process.env.BACKTEST_CONFIG || 'src/config/default.json'
  );
  const runId = options.runId || makeRunId();
  const log = options.quiet ? () => undefined : (msg: string) => console.log(msg);

  appendEvent(makeEvent(runId, 'BACKTEST_STARTED', { configPath }));
  try {
    const config = applyOverrides(loadConfig(configPath), options);
    writeRunArtifact(runId, 'config.json', config);
    const backtest = createBacktest(config, path.dirname(configPath));

    let lastReported = -1;
    backtest.hooks.onProgress = (done, total, date) => {
      const pct = Math.floor((done / total) * 10);
      if (pct !== lastReported) {
        lastReported = pct;
        log(`[${runId}] ${done}/${total} ${date}`);
      }
    };

    const tradeLog = backtest.run(config.rebalanceFrequency, config.monthly);
    const summary = backtest.summary();
    writeRunArtifact(runId, 'trade_log.json', tradeLog);
    writeRunArtifact(runId, 'balance.json', backtest.balance);
    writeRunArtifact(runId, 'balance.csv', balanceToCsv(backtest.balance));
    writeRunArtifact(runId, 'summary.json', summary);
    appendEvent(
      makeEvent(runId, 'BACKTEST_COMPLETED', {
        trades: tradeLog.length,
        steps: backtest.balance.length,
        totalPnlPct: summary.totalPnlPct
      })
    );

    formatSummary(summary).forEach((line) => log(line));
    log(`Artifacts written for run ${runId}`);
    return { runId, summary, trades: tradeLog.length, steps: backtest.balance.length };
  } catch (err) {
    appendEvent(makeEvent(runId, 'BACKTEST_FAILED', { message: err instanceof Error ? err.message : String(err) }));
    throw err;
  }
};

if (require.main === module) {
  const program = new Command();
  program
    .name('backtest')
    .option('--config <path>', 'backtest config JSON (default src/config/default.json or BACKTEST_CONFIG)')
    .option('--rebalance <months>', 'months between rebalances (0 = first date only)')
    .option('--monthly', 'step through the first trading date of each month', false)
    .option('--allow-negative-cash', 'fill entries even when option cash cannot cover them', false)
    .option('--run-id <id>', 'identifier for the run artifacts')
    .option('--quiet', 'suppress progress output', false);

  try {
    runBacktestCommand(program.parse(process.argv).opts<BacktestCommandOptions>());
  } catch (err) {
    console.error('backtest failed', err);
    process.exitCode = 1;
  }
}
