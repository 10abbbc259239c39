import { Allocation, StockPosition } from './types';
import { StockSnapshot } from '../data/snapshot';

export interface CapitalLedger {
  stocksCash: number;
  optionsCash: number;
  totalCapital: number;
}

export interface CapitalSplit {
  stocksAllocation: number;
  optionsAllocation: number;
  cashAllocation: number;
}

export const createLedger = (initialCapital: number): CapitalLedger => ({
  stocksCash: 0,
  optionsCash: 0,
  totalCapital: initialCapital
});

export const totalCash = (ledger: CapitalLedger): number => ledger.stocksCash + ledger.optionsCash;

export const debitOptionsCash = (ledger: CapitalLedger, amount: number) => {
  ledger.optionsCash -= amount;
};

export const splitCapital = (total: number, allocation: Allocation): CapitalSplit => ({
  stocksAllocation: total * allocation.stocks,
  optionsAllocation: total * allocation.options,
  cashAllocation: total * allocation.cash
});

/** Market value of the stock inventory; a symbol missing from the day's quotes is carried at its acquisition price. */
export const computeStockValue = (positions: StockPosition[], quotes: StockSnapshot): number =>
  positions.reduce((acc, p) => {
    const px = quotes.get(p.symbol)?.adjClose ?? p.price;
    return acc + p.qty * px;
  }, 0);
