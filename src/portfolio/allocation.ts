import { ConfigurationError } from '../core/errors';
import { Allocation, AssetClass, StockTarget } from '../core/types';
import { stockTargetSchema } from '../core/schema';
import { sum } from '../core/utils';

const ASSETS: AssetClass[] = ['stocks', 'options', 'cash'];

// percentages are compared to 1.0 with this much slack for binary rounding
export const PERCENTAGE_TOLERANCE = 1e-9;

export const normalizeAllocation = (raw: Partial<Record<AssetClass, number>>): Allocation => {
  const weights = ASSETS.map((asset) => raw[asset] ?? 0);
  weights.forEach((w, i) => {
    if (!Number.isFinite(w) || w < 0) {
      throw new ConfigurationError(`Allocation for ${ASSETS[i]} must be a non-negative number`, { value: w });
    }
  });
  const total = sum(weights);
  if (total <= 0) {
    throw new ConfigurationError('Allocation weights must not all be zero', { allocation: raw });
  }
  return {
    stocks: weights[0] / total,
    options: weights[1] / total,
    cash: weights[2] / total
  };
};

export const validateStockTargets = (targets: readonly unknown[]): StockTarget[] => {
  const parsed = targets.map((t, i) => {
    const result = stockTargetSchema.safeParse(t);
    if (!result.success) {
      throw new ConfigurationError(`Invalid stock target at index ${i}`, { target: t });
    }
    return result.data;
  });
  const symbols = new Set<string>();
  for (const t of parsed) {
    if (symbols.has(t.symbol)) throw new ConfigurationError(`Duplicate stock target ${t.symbol}`);
    symbols.add(t.symbol);
  }
  const total = sum(parsed.map((t) => t.percentage));
  if (Math.abs(total - 1) > PERCENTAGE_TOLERANCE) {
    throw new ConfigurationError('Stock percentages must sum to 1.0', { total });
  }
  return parsed;
};
