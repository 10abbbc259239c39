import fs from 'fs';
import os from 'os';
import path from 'path';
import { runBacktestCommand } from '../src/cli/backtest';
import { describeRun } from '../src/cli/report';
import { getRunStatus } from '../src/ledger/ledger';
import { readRunArtifact, runDir } from '../src/ledger/storage';
import { BALANCE_CSV_HEADER } from '../src/analytics/format';
import { ConfigurationError } from '../src/core/errors';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'backtest-cli-'));

const config = {
  initialCapital: 100000,
  allocation: { stocks: 0.9, options: 0.1 },
  stocks: [
    { symbol: 'SPY', percentage: 0.5 },
    { symbol: 'TLT', percentage: 0.5 }
  ],
  strategy: {
    legs: [
      {
        name: 'put',
        direction: 'BUY',
        type: 'put',
        underlying: 'SPY',
        entryDte: { min: 60, max: 120 },
        strikePct: { min: 0.9, max: 1.0 },
        sort: 'strike_desc'
      }
    ]
  },
  data: { source: 'stub', start: '2024-01-02', end: '2024-01-31', seed: 11 }
};

const writeConfig = (name: string, body: unknown) => {
  const file = path.join(tmpDir, name);
  fs.writeFileSync(file, JSON.stringify(body));
  return file;
};

beforeAll(() => {
  process.env.RUNS_DIR = path.join(tmpDir, 'runs');
  process.env.LEDGER_FILE = path.join(tmpDir, 'ledger', 'events.jsonl');
});

afterAll(() => {
  delete process.env.RUNS_DIR;
  delete process.env.LEDGER_FILE;
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('backtest command', () => {
  it('runs a stub-data backtest and writes its artifacts', () => {
    const result = runBacktestCommand({ config: writeConfig('ok.json', config), runId: 'bt-ok', quiet: true });
    expect(result).toMatchObject({ runId: 'bt-ok', trades: 1, steps: 22 });
    expect(getRunStatus('bt-ok')).toBe('COMPLETED');

    for (const file of ['config.json', 'trade_log.json', 'balance.json', 'balance.csv', 'summary.json']) {
      expect(fs.existsSync(path.join(runDir('bt-ok'), file))).toBe(true);
    }
    expect(readRunArtifact('bt-ok', 'summary.json')).toEqual(result.summary);
    const csv = fs.readFileSync(path.join(runDir('bt-ok'), 'balance.csv'), 'utf-8').split('\n');
    expect(csv[0]).toBe(BALANCE_CSV_HEADER);
    expect(csv).toHaveLength(23);
  });

  it('applies command line overrides to the stored config', () => {
    runBacktestCommand({
      config: writeConfig('monthly.json', config),
      runId: 'bt-monthly',
      monthly: true,
      rebalance: '2',
      allowNegativeCash: true,
      quiet: true
    });
    expect(readRunArtifact('bt-monthly', 'config.json')).toMatchObject({
      monthly: true,
      rebalanceFrequency: 2,
      stopIfBroke: false
    });
  });

  it('records a failed run for an invalid config', () => {
    const file = writeConfig('bad.json', { ...config, stocks: [] });
    expect(() => runBacktestCommand({ config: file, runId: 'bt-bad', quiet: true })).toThrow(ConfigurationError);
    expect(getRunStatus('bt-bad')).toBe('FAILED');
  });

  it('rejects a malformed rebalance override', () => {
    const file = writeConfig('ok2.json', config);
    expect(() => runBacktestCommand({ config: file, runId: 'bt-rebalance', rebalance: 'x', quiet: true })).toThrow(
      '--rebalance must be a non-negative integer, got x'
    );
  });
});

describe('report', () => {
  it('describes a stored run', () => {
    const lines = describeRun('bt-ok', 2);
    expect(lines[0]).toBe('Run bt-ok: COMPLETED');
    expect(lines[1]).toBe('Total trades      0');
    expect(lines.slice(-3, -2)).toEqual(['date        total_capital  accumulated_return']);
    expect(lines[lines.length - 1].startsWith('2024-01-31')).toBe(true);
  });

  it('notes a run without artifacts', () => {
    expect(describeRun('bt-missing')).toEqual(['Run bt-missing: UNKNOWN', 'No summary.json for this run.']);
  });
});
