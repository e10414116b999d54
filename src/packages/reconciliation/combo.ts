import { roundHalfUp } from '../../utils/money.js';

/**
 * Split a combo's value across `parts` components: each gets the rounded
 * quota and the last one absorbs the remainder, so the parts always add up
 * to `totalCents`. A non-positive total yields zeros.
 */
export function splitComboValue(totalCents: number, parts: number): number[] {
  const count = Math.floor(parts);
  if (count < 1) {
    return [];
  }
  if (totalCents <= 0) {
    return new Array<number>(count).fill(0);
  }

  const quota = roundHalfUp(totalCents / count);
  const values = new Array<number>(count).fill(quota);
  values[count - 1] = totalCents - quota * (count - 1);
  return values;
}
