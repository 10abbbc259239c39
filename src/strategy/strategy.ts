import {
  ExitSignals,
  LegDefinition,
  OptionLeg,
  OptionPosition,
  OptionQuote,
  OptionType
} from '../core/types';
import { entryCost, entryOrder, exitCost, exitOrder } from '../core/orders';
import { sum } from '../core/utils';
import { OptionSchema } from '../data/marketData.types';
import { OptionSnapshot } from '../data/snapshot';
import { OptionFilter, QuoteComparator } from './filters';

export interface StrategyLeg extends LegDefinition {
  entryFilter: OptionFilter;
  exitFilter?: OptionFilter;
  entrySort?: QuoteComparator;
}

/** Current closing value of one leg of a held position. */
export interface LegMark {
  contract: string;
  type: OptionType;
  cost: number; // zero when the contract is not in the day's chain
  quoted: boolean;
}

/** What the simulation needs from a signal source. */
export interface Strategy {
  readonly schema: OptionSchema;
  readonly legs: readonly LegDefinition[];
  initialCapital: number;
  filterEntries(options: OptionSnapshot, inventory: readonly OptionPosition[], date: string): OptionPosition[];
  filterExits(options: OptionSnapshot, inventory: readonly OptionPosition[], date: string): ExitSignals;
  exitCandidates(legIndex: number, inventory: readonly OptionPosition[], options: OptionSnapshot): LegMark[];
}

export interface OptionStrategyOptions {
  initialCapital?: number;
  sharesPerContract?: number;
}

export const isStrategy = (value: unknown): value is Strategy =>
  typeof value === 'object' &&
  value !== null &&
  'schema' in value &&
  typeof value.schema === 'object' &&
  'legs' in value &&
  Array.isArray(value.legs) &&
  'initialCapital' in value &&
  typeof value.initialCapital === 'number' &&
  'filterEntries' in value &&
  typeof value.filterEntries === 'function' &&
  'filterExits' in value &&
  typeof value.filterExits === 'function' &&
  'exitCandidates' in value &&
  typeof value.exitCandidates === 'function';

/**
 * Multi-leg option strategy. Each leg picks contracts with its own entry filter; row r of every
 * leg's candidate list forms the r-th ranked combination. Positions close when any leg's exit
 * filter matches or when the profit/loss thresholds are crossed.
 */
export class OptionStrategy implements Strategy {
  readonly schema: OptionSchema;
  readonly sharesPerContract: number;
  initialCapital: number;
  private readonly strategyLegs: StrategyLeg[] = [];
  private profitPct = Infinity;
  private lossPct = Infinity;

  constructor(schema: OptionSchema, options: OptionStrategyOptions = {}) {
    this.schema = schema;
    this.initialCapital = options.initialCapital ?? 1_000_000;
    this.sharesPerContract = options.sharesPerContract ?? 100;
  }

  get legs(): readonly StrategyLeg[] {
    return this.strategyLegs;
  }

  addLeg(leg: StrategyLeg): this {
    if (this.strategyLegs.some((l) => l.name === leg.name)) {
      throw new Error(`Duplicate leg name ${leg.name}`);
    }
    this.strategyLegs.push(leg);
    return this;
  }

  addExitThresholds(profitPct = Infinity, lossPct = Infinity): this {
    if (profitPct <= 0 || lossPct <= 0) {
      throw new Error('Exit thresholds must be positive');
    }
    this.profitPct = profitPct;
    this.lossPct = lossPct;
    return this;
  }

  get exitThresholds(): { profitPct: number; lossPct: number } {
    return { profitPct: this.profitPct, lossPct: this.lossPct };
  }

  filterEntries(options: OptionSnapshot, inventory: readonly OptionPosition[], date: string): OptionPosition[] {
    if (!this.strategyLegs.length) return [];
    const perLeg = this.strategyLegs.map((leg, i) => {
      const held = new Set(inventory.map((p) => p.legs[i]?.contract));
      const candidates = options.rows.filter((q) => leg.entryFilter(q) && !held.has(q.contract));
      return leg.entrySort ? [...candidates].sort(leg.entrySort) : candidates;
    });
    const count = Math.min(...perLeg.map((c) => c.length));

    const entries: OptionPosition[] = [];
    for (let rank = 0; rank < count; rank++) {
      const legs = this.strategyLegs.map((leg, i) => this.openLeg(leg, perLeg[i][rank]));
      const cost = sum(legs.map((l) => l.cost));
      if (cost === 0) continue;
      const qty = Math.floor(this.initialCapital / Math.abs(cost));
      if (qty <= 0) continue;
      entries.push({ legs, totals: { cost, qty, date } });
    }
    return entries;
  }

  exitCandidates(legIndex: number, inventory: readonly OptionPosition[], options: OptionSnapshot): LegMark[] {
    const leg = this.strategyLegs[legIndex];
    if (!leg) throw new Error(`Unknown leg index ${legIndex}`);
    return inventory.map((position) => {
      const held = position.legs[legIndex];
      const quote = options.get(held.contract);
      return {
        contract: held.contract,
        type: held.type,
        cost: quote ? exitCost(leg.direction, quote, this.sharesPerContract) : 0,
        quoted: quote !== undefined
      };
    });
  }

  filterExits(options: OptionSnapshot, inventory: readonly OptionPosition[], date: string): ExitSignals {
    const marks = this.strategyLegs.map((_, i) => this.exitCandidates(i, inventory, options));
    const mask = inventory.map((position, row) => {
      const quotes = position.legs.map((l) => options.get(l.contract));
      const quoted = quotes.filter((q): q is OptionQuote => q !== undefined);
      // a contract missing from the chain cannot be traded today
      if (quoted.length !== quotes.length || !quoted.length) return false;
      const filterHit = this.strategyLegs.some((leg, i) => (leg.exitFilter ? leg.exitFilter(quoted[i]) : false));
      if (filterHit) return true;
      const entry = position.totals.cost;
      if (entry === 0) return false;
      const closing = sum(marks.map((m) => m[row].cost));
      const pnl = -(entry + closing) / Math.abs(entry);
      return pnl >= this.profitPct || pnl <= -this.lossPct;
    });

    const exits: OptionPosition[] = [];
    inventory.forEach((position, row) => {
      if (!mask[row]) return;
      exits.push(this.closePosition(position, marks.map((m) => m[row]), date));
    });
    return { exits, mask, costs: exits.map((e) => e.totals.cost * e.totals.qty) };
  }

  /** Exit rows for `position` at the given marks. */
  closePosition(position: OptionPosition, marks: LegMark[], date: string): OptionPosition {
    const legs = position.legs.map((held, i) => ({
      ...held,
      cost: marks[i]?.cost ?? 0,
      order: exitOrder(this.strategyLegs[i].direction)
    }));
    return { legs, totals: { cost: sum(legs.map((l) => l.cost)), qty: position.totals.qty, date } };
  }

  private openLeg(leg: StrategyLeg, quote: OptionQuote): OptionLeg {
    return {
      leg: leg.name,
      contract: quote.contract,
      underlying: quote.underlying,
      expiration: quote.expiration,
      type: quote.type,
      strike: quote.strike,
      cost: entryCost(leg.direction, quote, this.sharesPerContract),
      order: entryOrder(leg.direction)
    };
  }
}
