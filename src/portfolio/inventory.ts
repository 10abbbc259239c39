import { OptionPosition, StockPosition } from '../core/types';

export interface Inventory {
  stocks: StockPosition[];
  options: OptionPosition[];
}

export const createInventory = (): Inventory => ({ stocks: [], options: [] });

export const resetInventory = (inventory: Inventory) => {
  inventory.stocks = [];
  inventory.options = [];
};

export const clonePosition = (position: OptionPosition): OptionPosition => ({
  legs: position.legs.map((l) => ({ ...l })),
  totals: { ...position.totals }
});

export const addStock = (inventory: Inventory, symbol: string, price: number, qty: number) => {
  inventory.stocks.push({ symbol, price, qty });
};

export const removeStock = (inventory: Inventory, symbol: string): StockPosition[] => {
  const removed = inventory.stocks.filter((s) => s.symbol === symbol);
  inventory.stocks = inventory.stocks.filter((s) => s.symbol !== symbol);
  return removed;
};

export const addOption = (inventory: Inventory, position: OptionPosition) => {
  inventory.options.push(clonePosition(position));
};

/** Drops every option row whose mask entry is true and returns the dropped rows. */
export const removeOptions = (inventory: Inventory, mask: readonly boolean[]): OptionPosition[] => {
  if (mask.length !== inventory.options.length) {
    throw new Error(`Exit mask has ${mask.length} entries for ${inventory.options.length} option positions`);
  }
  const removed = inventory.options.filter((_, i) => mask[i]);
  inventory.options = inventory.options.filter((_, i) => !mask[i]);
  return removed;
};

export const stockQuantity = (inventory: Inventory): number => inventory.stocks.reduce((acc, s) => acc + s.qty, 0);

export const optionQuantity = (inventory: Inventory): number =>
  inventory.options.reduce((acc, p) => acc + p.totals.qty, 0);
