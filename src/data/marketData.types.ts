export interface StockColumns {
  date: string;
  symbol: string;
  adjClose: string;
}

export interface OptionColumns {
  date: string;
  contract: string;
  underlying: string;
  underlyingLast: string;
  type: string;
  expiration: string;
  strike: string;
  bid: string;
  ask: string;
  volume: string;
  openInterest: string;
}

// Logical field -> source column name. Two feeds are interchangeable only if their schemas match.
export type DataSchema =
  | { kind: 'stocks'; columns: StockColumns }
  | { kind: 'options'; columns: OptionColumns };

export type StockSchema = Extract<DataSchema, { kind: 'stocks' }>;
export type OptionSchema = Extract<DataSchema, { kind: 'options' }>;

export const defaultStockColumns: StockColumns = {
  date: 'date',
  symbol: 'symbol',
  adjClose: 'adjClose'
};

export const defaultOptionColumns: OptionColumns = {
  date: 'quotedate',
  contract: 'optionroot',
  underlying: 'underlying',
  underlyingLast: 'underlying_last',
  type: 'type',
  expiration: 'expiration',
  strike: 'strike',
  bid: 'bid',
  ask: 'ask',
  volume: 'volume',
  openInterest: 'openinterest'
};

export const stockSchema = (overrides: Partial<StockColumns> = {}): StockSchema => ({
  kind: 'stocks',
  columns: { ...defaultStockColumns, ...overrides }
});

export const optionSchema = (overrides: Partial<OptionColumns> = {}): OptionSchema => ({
  kind: 'options',
  columns: { ...defaultOptionColumns, ...overrides }
});

export const sameSchema = (a: DataSchema, b: DataSchema): boolean => {
  if (a.kind !== b.kind) return false;
  const left: Record<string, string> = { ...a.columns };
  const right: Record<string, string> = { ...b.columns };
  const keys = new Set([...Object.keys(left), ...Object.keys(right)]);
  return Array.from(keys).every((k) => left[k] === right[k]);
};
