import { buildStubData, occSymbol } from '../src/data/marketData.stub';

describe('stub market data', () => {
  const opts = { symbols: ['SPY', 'TLT'], optionUnderlyings: ['SPY'], start: '2024-01-02', end: '2024-01-31', seed: 3 };

  it('is repeatable for the same seed', () => {
    const a = buildStubData(opts);
    const b = buildStubData(opts);
    expect(a.stocks.snapshot('2024-01-31').rows).toEqual(b.stocks.snapshot('2024-01-31').rows);
    expect(a.options.snapshot('2024-01-31').rows).toEqual(b.options.snapshot('2024-01-31').rows);
  });

  it('produces matching stock and option dates on business days only', () => {
    const { stocks, options } = buildStubData(opts);
    expect(stocks.dates()).toEqual(options.dates());
    expect(stocks.length).toBe(22);
    expect(stocks.snapshot('2024-01-02').get('SPY')?.adjClose).toBe(475);
  });

  it('quotes a chain of calls and puts on the option underlyings', () => {
    const { options } = buildStubData({ ...opts, strikesEachSide: 2, expirations: 3 });
    const chain = options.snapshot('2024-01-02');
    expect(chain.size).toBe(3 * 5 * 2);
    expect(chain.rows.every((q) => q.underlying === 'SPY')).toBe(true);
    expect(chain.rows.every((q) => q.ask > q.bid && q.bid >= 0)).toBe(true);
    expect(Array.from(new Set(chain.rows.map((q) => q.expiration)))).toEqual(['2024-01-19', '2024-02-16', '2024-03-15']);
    expect(chain.get(occSymbol('SPY', '2024-01-19', 'put', 475))?.strike).toBe(475);
  });

  it('formats OCC contract symbols', () => {
    expect(occSymbol('SPY', '2024-03-15', 'put', 475)).toBe('SPY240315P00475000');
    expect(occSymbol('TLT', '2024-06-21', 'call', 92.5)).toBe('TLT240621C00092500');
  });
});
