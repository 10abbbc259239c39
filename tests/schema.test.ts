import fs from 'fs';
import os from 'os';
import path from 'path';
import { validateBacktestConfig } from '../src/core/schema';
import { loadConfig, readJSONFile } from '../src/core/utils';
import { ConfigurationError } from '../src/core/errors';

const defaultConfigPath = path.resolve(__dirname, '../src/config/default.json');

const minimal = {
  initialCapital: 1000,
  allocation: { stocks: 1 },
  stocks: [{ symbol: 'SPY', percentage: 1 }],
  strategy: { legs: [] },
  data: { source: 'stub', start: '2024-01-02', end: '2024-01-31' }
};

describe('backtest config schema', () => {
  it('accepts the bundled default config', () => {
    const result = validateBacktestConfig(readJSONFile(defaultConfigPath));
    expect(result.success).toBe(true);
  });

  it('fills defaults', () => {
    const result = validateBacktestConfig(minimal);
    if (!result.success) throw new Error(result.errors.join('; '));
    expect(result.value).toMatchObject({
      rebalanceFrequency: 0,
      monthly: false,
      stopIfBroke: true,
      strategy: { sharesPerContract: 100, legs: [] }
    });
  });

  it('reports each invalid field by path', () => {
    const result = validateBacktestConfig({
      ...minimal,
      allocation: { stocks: 1, bonds: 1 },
      data: { source: 'stub', start: '2024/01/02', end: '2024-01-31' }
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toContain('data.start: must be YYYY-MM-DD');
    expect(result.errors.some((e) => e.startsWith('allocation:'))).toBe(true);
  });

  it('rejects an inverted dte range', () => {
    const result = validateBacktestConfig({
      ...minimal,
      strategy: {
        legs: [{ name: 'p', direction: 'BUY', type: 'put', underlying: 'SPY', entryDte: { min: 90, max: 60 } }]
      }
    });
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.errors).toEqual(['strategy.legs.0.entryDte: min must not exceed max']);
  });

  it('loadConfig throws a ConfigurationError for an invalid file', () => {
    const file = path.join(fs.mkdtempSync(path.join(os.tmpdir(), 'config-')), 'bad.json');
    fs.writeFileSync(file, JSON.stringify({ ...minimal, initialCapital: -5 }));
    expect(() => loadConfig(file)).toThrow(ConfigurationError);
    expect(() => loadConfig(file)).toThrow('initialCapital: Number must be greater than 0');
  });
});
