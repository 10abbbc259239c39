export type AssetClass = 'stocks' | 'options' | 'cash';

export type Allocation = Record<AssetClass, number>;

export interface StockTarget {
  symbol: string;
  percentage: number; // 0..1, all targets sum to 1
}

export type OptionType = 'call' | 'put';

// BUY legs are valued on the ask, SELL legs on the bid
export type Direction = 'BUY' | 'SELL';

export type Order = 'BTO' | 'BTC' | 'STO' | 'STC';

export interface LegDefinition {
  name: string;
  direction: Direction;
}

export interface StockQuote {
  date: string; // ISO date
  symbol: string;
  adjClose: number;
}

export interface OptionQuote {
  date: string;
  contract: string;
  underlying: string;
  underlyingLast: number;
  type: OptionType;
  expiration: string;
  strike: number;
  bid: number;
  ask: number;
  volume: number;
  openInterest: number;
  dte: number;
}

export interface StockPosition {
  symbol: string;
  price: number; // price at acquisition
  qty: number; // whole shares
}

export interface OptionLeg {
  leg: string;
  contract: string;
  underlying: string;
  expiration: string;
  type: OptionType;
  strike: number;
  cost: number; // per contract, already multiplied by shares per contract
  order: Order;
}

export interface OptionTotals {
  cost: number;
  qty: number;
  date: string;
}

export interface OptionPosition {
  legs: OptionLeg[];
  totals: OptionTotals;
}

export type TradeLogEntry = Readonly<OptionPosition>;

export interface ExitSignals {
  exits: OptionPosition[];
  mask: boolean[];
  costs: number[];
}

export interface BalanceRecord {
  date: string;
  totalCapital: number;
  totalCash: number;
  stockCapital: number;
  optionCapital: number;
  callCapital: number;
  putCapital: number;
  stockQty: number;
  optionQty: number;
}

export interface BalanceRow extends BalanceRecord {
  pctChange: number;
  accumulatedReturn: number;
}

export type LedgerEventType = 'BACKTEST_STARTED' | 'BACKTEST_COMPLETED' | 'BACKTEST_FAILED';

export interface LedgerEvent {
  id: string;
  runId: string;
  timestamp: string;
  type: LedgerEventType;
  details?: Record<string, unknown>;
}
