import { OptionPosition } from '../core/types';
import { OptionSnapshot } from '../data/snapshot';
import { Strategy } from '../strategy/strategy';

export interface OptionMarks {
  callCapital: number;
  putCapital: number;
}

/**
 * Value of the open option legs at the day's closing prices. A leg's value is the negative of
 * what it would cost to close it; contracts absent from the chain are worth zero but stay held.
 */
export const markOptions = (
  strategy: Strategy,
  positions: readonly OptionPosition[],
  options: OptionSnapshot
): OptionMarks => {
  let callCapital = 0;
  let putCapital = 0;
  strategy.legs.forEach((_, legIndex) => {
    strategy.exitCandidates(legIndex, positions, options).forEach((mark, row) => {
      const value = -mark.cost * positions[row].totals.qty;
      if (mark.type === 'call') callCapital += value;
      else putCapital += value;
    });
  });
  return { callCapital, putCapital };
};
