import { BalanceRecord, TradeLogEntry } from '../core/types';
import { CapitalLedger, createLedger } from '../core/capital';
import { Inventory, createInventory } from '../portfolio/inventory';

/** Everything a run mutates. One instance per run, owned by the driver. */
export interface SimulationState {
  inventory: Inventory;
  ledger: CapitalLedger;
  tradeLog: TradeLogEntry[];
  balance: BalanceRecord[];
}

export const createSimulationState = (initialCapital: number): SimulationState => ({
  inventory: createInventory(),
  ledger: createLedger(initialCapital),
  tradeLog: [],
  balance: []
});
