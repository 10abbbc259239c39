import { OptionQuote, OptionType, StockQuote } from '../core/types';
import { hashString, mulberry32, round2 } from '../core/utils';
import { businessDays, daysBetween, thirdFriday } from '../core/time';
import { OptionSeries, StockSeries } from './series';

// Static price anchors so stub runs look plausible and stay repeatable.
const priceOverrides: Record<string, number> = {
  SPY: 475,
  QQQ: 405,
  IWM: 195,
  EFA: 75,
  EEM: 40,
  TLT: 95,
  SHY: 82,
  GLD: 190
};

export interface StubDataOptions {
  symbols: string[];
  start: string;
  end: string;
  seed?: number;
  optionUnderlyings?: string[]; // defaults to every symbol
  strikesEachSide?: number;
  expirations?: number;
  volatility?: number;
}

const basePriceForSymbol = (symbol: string): number => {
  if (priceOverrides[symbol] !== undefined) return priceOverrides[symbol];
  const rng = mulberry32(hashString(symbol));
  return 50 + rng() * 150;
};

const annualDrift = (symbol: string): number => {
  const rng = mulberry32(hashString(symbol + 'drift'));
  return rng() * 0.16 - 0.04; // -4% to +12% a year
};

const simulatePath = (symbol: string, days: string[], seed: number, volatility: number): number[] => {
  const rng = mulberry32(hashString(`${symbol}-${seed}`));
  const dailyDrift = annualDrift(symbol) / 252;
  const dailyVol = volatility / Math.sqrt(252);
  const prices: number[] = [];
  let price = basePriceForSymbol(symbol);
  for (let i = 0; i < days.length; i++) {
    if (i > 0) {
      // sum of two uniforms, roughly bell shaped in [-1, 1]
      const shock = rng() + rng() - 1;
      price = Math.max(1, price * (1 + dailyDrift + shock * dailyVol * 2.45));
    }
    prices.push(round2(price));
  }
  return prices;
};

export const occSymbol = (underlying: string, expiration: string, type: OptionType, strike: number): string => {
  const yymmdd = expiration.slice(2).replace(/-/g, '');
  const strikeCode = String(Math.round(strike * 1000)).padStart(8, '0');
  return `${underlying}${yymmdd}${type === 'call' ? 'C' : 'P'}${strikeCode}`;
};

const strikeStep = (spot: number): number => {
  if (spot < 25) return 0.5;
  if (spot < 100) return 1;
  if (spot < 250) return 2.5;
  return 5;
};

// Crude premium: intrinsic plus a time value that decays away from the money.
const premium = (type: OptionType, spot: number, strike: number, dte: number, volatility: number): number => {
  const intrinsic = type === 'call' ? Math.max(0, spot - strike) : Math.max(0, strike - spot);
  const atmTime = 0.4 * spot * volatility * Math.sqrt(Math.max(dte, 1) / 365);
  const distance = Math.abs(strike - spot) / (spot * volatility * Math.sqrt(Math.max(dte, 1) / 365) + 1e-9);
  return intrinsic + atmTime * Math.exp(-0.5 * distance * distance);
};

const buildChain = (
  underlying: string,
  date: string,
  spot: number,
  options: Required<Pick<StubDataOptions, 'strikesEachSide' | 'expirations' | 'volatility'>>
): OptionQuote[] => {
  const rows: OptionQuote[] = [];
  const step = strikeStep(spot);
  const center = Math.round(spot / step) * step;
  const expirations: string[] = [];
  for (let offset = 0; expirations.length < options.expirations; offset++) {
    const exp = thirdFriday(date, offset);
    if (exp > date) expirations.push(exp);
  }
  for (const expiration of expirations) {
    const dte = daysBetween(date, expiration);
    for (let k = -options.strikesEachSide; k <= options.strikesEachSide; k++) {
      const strike = center + k * step;
      if (strike <= 0) continue;
      for (const type of ['call', 'put'] as const) {
        const mid = premium(type, spot, strike, dte, options.volatility);
        const bid = round2(Math.max(0, mid * 0.97));
        const ask = round2(Math.max(mid * 1.03, bid + 0.01));
        const liquidity = mulberry32(hashString(`${underlying}-${expiration}-${strike}-${type}-${date}`))();
        rows.push({
          date,
          contract: occSymbol(underlying, expiration, type, strike),
          underlying,
          underlyingLast: spot,
          type,
          expiration,
          strike,
          bid,
          ask,
          volume: Math.round(liquidity * 2000),
          openInterest: Math.round(liquidity * 20000),
          dte
        });
      }
    }
  }
  return rows;
};

/** Deterministic stock and option feeds over the business days between `start` and `end`. */
export const buildStubData = (opts: StubDataOptions): { stocks: StockSeries; options: OptionSeries } => {
  const days = businessDays(opts.start, opts.end);
  const seed = opts.seed ?? 1;
  const volatility = opts.volatility ?? 0.2;
  const chainOptions = {
    strikesEachSide: opts.strikesEachSide ?? 8,
    expirations: opts.expirations ?? 4,
    volatility
  };
  const underlyings = opts.optionUnderlyings ?? opts.symbols;
  const symbols = Array.from(new Set([...opts.symbols, ...underlyings]));
  const paths = new Map(symbols.map((s) => [s, simulatePath(s, days, seed, volatility)]));

  const stockRows: StockQuote[] = [];
  const optionRows: OptionQuote[] = [];
  days.forEach((date, i) => {
    for (const symbol of symbols) {
      const prices = paths.get(symbol) ?? [];
      stockRows.push({ date, symbol, adjClose: prices[i] });
    }
    for (const underlying of underlyings) {
      const prices = paths.get(underlying) ?? [];
      optionRows.push(...buildChain(underlying, date, prices[i], chainOptions));
    }
  });
  return { stocks: new StockSeries(stockRows), options: new OptionSeries(optionRows) };
};
