import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadOptionSeries, loadStockSeries, parseCsv, toOptionQuote, writeStockCsv } from '../src/data/csvData';
import { defaultOptionColumns } from '../src/data/marketData.types';
import { stockSeries } from './fixtures';

const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'csv-data-'));

afterAll(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe('parseCsv', () => {
  it('reads quoted cells and skips blank lines', () => {
    expect(parseCsv('a,b\n"x, y","say ""hi"""\n\n1,2\n')).toEqual([
      { a: 'x, y', b: 'say "hi"' },
      { a: '1', b: '2' }
    ]);
  });
});

describe('toOptionQuote', () => {
  it('accepts single-letter option types and derives days to expiration', () => {
    const quote = toOptionQuote(
      {
        quotedate: '2024-01-02',
        optionroot: 'SPY240315P00095000',
        underlying: 'SPY',
        underlying_last: '100',
        type: 'P',
        expiration: '2024-03-15',
        strike: '95',
        bid: '1.5',
        ask: '1.7',
        volume: '',
        openinterest: '12'
      },
      defaultOptionColumns
    );
    expect(quote).toEqual({
      date: '2024-01-02',
      contract: 'SPY240315P00095000',
      underlying: 'SPY',
      underlyingLast: 100,
      type: 'put',
      expiration: '2024-03-15',
      strike: 95,
      bid: 1.5,
      ask: 1.7,
      volume: 0,
      openInterest: 12,
      dte: 73
    });
  });

  it('rejects rows without prices', () => {
    expect(
      toOptionQuote({ quotedate: '2024-01-02', optionroot: 'X', underlying: 'SPY', type: 'call', expiration: '2024-03-15', strike: '95' }, defaultOptionColumns)
    ).toBeUndefined();
  });
});

describe('loading series', () => {
  it('maps custom stock columns and drops invalid rows', () => {
    const file = path.join(tmpDir, 'stocks.csv');
    fs.writeFileSync(file, 'Date,Ticker,Close\n2024-01-03,SPY,101\n2024-01-02,SPY,100\n2024-01-02,TLT,oops\n');
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    const series = loadStockSeries(file, { date: 'Date', symbol: 'Ticker', adjClose: 'Close' });
    expect(warn).toHaveBeenCalledWith('stocks.csv: dropped 1 of 3 rows with missing or invalid fields.');
    warn.mockRestore();

    expect(series.dates()).toEqual(['2024-01-02', '2024-01-03']);
    expect(series.snapshot('2024-01-03').get('SPY')?.adjClose).toBe(101);
    expect(series.schema.columns.symbol).toBe('Ticker');
  });

  it('writes stock feeds that load back in', () => {
    const file = path.join(tmpDir, 'out', 'stocks.csv');
    writeStockCsv(file, stockSeries({ '2024-01-02': { SPY: 100.5, TLT: 90 } }));
    expect(fs.readFileSync(file, 'utf-8')).toBe('date,symbol,adjClose\n2024-01-02,SPY,100.5\n2024-01-02,TLT,90\n');
    expect(loadStockSeries(file).length).toBe(1);
  });

  it('loads an option chain keyed by contract', () => {
    const file = path.join(tmpDir, 'options.csv');
    fs.writeFileSync(
      file,
      [
        'quotedate,optionroot,underlying,underlying_last,type,expiration,strike,bid,ask,volume,openinterest',
        '2024-01-02,SPY240315C00105000,SPY,100,call,2024-03-15,105,0.8,0.9,5,50'
      ].join('\n')
    );
    const series = loadOptionSeries(file);
    const quote = series.snapshot('2024-01-02').get('SPY240315C00105000');
    expect(quote?.type).toBe('call');
    expect(quote?.dte).toBe(73);
  });
});
