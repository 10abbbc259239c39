import { LegConfig, StrategyConfig } from '../core/schema';
import { OptionSchema } from '../data/marketData.types';
import { OptionFilter, QuoteComparator, allOf, byDte, byStrike, dteAtMost, dteBetween, isType, strikeWithin, underlyingIs } from './filters';
import { OptionStrategy, StrategyLeg } from './strategy';

const sortFor = (sort: LegConfig['sort']): QuoteComparator | undefined => {
  switch (sort) {
    case 'strike_asc':
      return byStrike('asc');
    case 'strike_desc':
      return byStrike('desc');
    case 'dte_asc':
      return byDte('asc');
    case 'dte_desc':
      return byDte('desc');
    default:
      return undefined;
  }
};

export const legFromConfig = (config: LegConfig): StrategyLeg => {
  const entryFilters: OptionFilter[] = [
    underlyingIs(config.underlying),
    isType(config.type),
    dteBetween(config.entryDte.min, config.entryDte.max)
  ];
  if (config.strikePct) entryFilters.push(strikeWithin(config.strikePct.min, config.strikePct.max));
  return {
    name: config.name,
    direction: config.direction,
    entryFilter: allOf(...entryFilters),
    exitFilter: config.exitDte !== undefined ? dteAtMost(config.exitDte) : undefined,
    entrySort: sortFor(config.sort)
  };
};

export const buildStrategy = (config: StrategyConfig, schema: OptionSchema, initialCapital?: number): OptionStrategy => {
  const strategy = new OptionStrategy(schema, { sharesPerContract: config.sharesPerContract, initialCapital });
  config.legs.forEach((leg) => strategy.addLeg(legFromConfig(leg)));
  if (config.exitThresholds) {
    strategy.addExitThresholds(config.exitThresholds.profitPct, config.exitThresholds.lossPct);
  }
  return strategy;
};
