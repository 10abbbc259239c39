import { executeEntry, executeExit, resizeStocks } from '../src/execution/executionEngine';
import { createSimulationState } from '../src/backtest/state';
import { OptionPosition } from '../src/core/types';
import { stocksOn } from './fixtures';

const candidate = (contract: string, cost: number, qty: number): OptionPosition => ({
  legs: [
    {
      leg: 'leg_1',
      contract,
      underlying: 'SPY',
      expiration: '2024-03-15',
      type: 'put',
      strike: 95,
      cost,
      order: 'BTO'
    }
  ],
  totals: { cost, qty, date: '2024-01-02' }
});

describe('executeEntry', () => {
  it('refuses an entry the option cash cannot cover', () => {
    const state = createSimulationState(1000);
    state.ledger.optionsCash = 1.5;
    const result = executeEntry(state, [candidate('A', 2, 1)], { stopIfBroke: true });
    expect(result).toMatchObject({ filled: false, totalPrice: 2, reason: 'INSUFFICIENT_CASH' });
    expect(state.ledger.optionsCash).toBe(1.5);
    expect(state.inventory.options).toHaveLength(0);
    expect(state.tradeLog).toHaveLength(0);
  });

  it('fills an entry that costs exactly the available option cash', () => {
    const state = createSimulationState(1000);
    state.ledger.optionsCash = 2;
    const result = executeEntry(state, [candidate('A', 2, 1)], { stopIfBroke: true });
    expect(result).toMatchObject({ filled: true, totalPrice: 2 });
    expect(state.ledger.optionsCash).toBe(0);
    expect(state.inventory.options).toHaveLength(1);
    expect(state.tradeLog).toHaveLength(1);
  });

  it('lets option cash go negative when the cash check is off', () => {
    const state = createSimulationState(1000);
    state.ledger.optionsCash = 1.5;
    const result = executeEntry(state, [candidate('A', 2, 1)], { stopIfBroke: false });
    expect(result.filled).toBe(true);
    expect(state.ledger.optionsCash).toBe(-0.5);
    expect(state.inventory.options).toHaveLength(1);
    expect(state.tradeLog).toHaveLength(1);
  });

  it('only considers the top-ranked candidate', () => {
    const state = createSimulationState(1000);
    state.ledger.optionsCash = 100;
    const result = executeEntry(state, [candidate('A', 200, 1), candidate('B', 50, 1)], { stopIfBroke: true });
    expect(result.reason).toBe('INSUFFICIENT_CASH');
    expect(state.inventory.options).toHaveLength(0);
  });

  it('reports when there is nothing to enter', () => {
    const state = createSimulationState(1000);
    expect(executeEntry(state, [], { stopIfBroke: true })).toEqual({
      filled: false,
      totalPrice: 0,
      reason: 'NO_CANDIDATES'
    });
  });

  it('debits a credit entry as incoming cash', () => {
    const state = createSimulationState(1000);
    executeEntry(state, [candidate('A', -150, 4)], { stopIfBroke: true });
    expect(state.ledger.optionsCash).toBe(600);
  });
});

describe('executeExit', () => {
  it('removes masked rows, logs the exits and books their costs', () => {
    const state = createSimulationState(1000);
    state.ledger.optionsCash = 10;
    executeEntry(state, [candidate('A', 0, 2)], { stopIfBroke: false });
    executeEntry(state, [candidate('B', 0, 3)], { stopIfBroke: false });
    const exit = candidate('B', -250, 3);
    exit.legs[0].order = 'STC';
    const removed = executeExit(state, { exits: [exit], mask: [false, true], costs: [-750] });
    expect(removed.map((p) => p.legs[0].contract)).toEqual(['B']);
    expect(state.inventory.options.map((p) => p.legs[0].contract)).toEqual(['A']);
    expect(state.ledger.optionsCash).toBe(760);
    expect(state.tradeLog.map((r) => r.legs[0].order)).toEqual(['BTO', 'BTO', 'STC']);
  });
});

describe('resizeStocks', () => {
  it('buys whole shares of every quoted target and returns the amount spent', () => {
    const state = createSimulationState(100_000);
    const spent = resizeStocks(
      state,
      [
        { symbol: 'SPY', percentage: 0.5 },
        { symbol: 'TLT', percentage: 0.5 }
      ],
      10_000,
      stocksOn('2024-01-02', { SPY: 37, TLT: 90 })
    );
    expect(state.inventory.stocks).toEqual([
      { symbol: 'SPY', price: 37, qty: 135 },
      { symbol: 'TLT', price: 90, qty: 55 }
    ]);
    expect(spent).toBe(135 * 37 + 55 * 90);
    state.inventory.stocks.forEach((s) => expect(s.qty * s.price).toBeLessThanOrEqual(5_000));
  });

  it('skips targets with no quote', () => {
    const state = createSimulationState(100_000);
    const spent = resizeStocks(state, [{ symbol: 'SPY', percentage: 1 }], 10_000, stocksOn('2024-01-02', {}));
    expect(spent).toBe(0);
    expect(state.inventory.stocks).toEqual([]);
  });
});
