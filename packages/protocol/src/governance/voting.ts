/**
 * Governance: Voting Power Calculation
 *
 * Formula: power = floor(sqrt(stake * PRECISION))
 *
 * - Square root damps large stakes relative to linear weighting
 * - PRECISION keeps power in the same base units as stake, so one whole
 *   unit (10^18) of stake yields exactly one whole unit of power
 * - Pure integer arithmetic; no floating point anywhere
 */

export const VOTING_POWER_PRECISION = 10n ** 18n;

/**
 * Integer square root (floor) by Newton's method.
 *
 * Starting from an overestimate, the iterates decrease strictly until they
 * reach floor(sqrt(n)), so the loop ends on the first non-decrease.
 */
export function isqrt(value: bigint): bigint {
  if (value < 0n) {
    throw new RangeError('square root of negative value');
  }
  if (value < 2n) {
    return value;
  }
  let x = value;
  let y = (x + 1n) / 2n;
  while (y < x) {
    x = y;
    y = (x + value / x) / 2n;
  }
  return x;
}

export function quadraticVotingPower(stake: bigint): bigint {
  if (stake <= 0n) return 0n;
  return isqrt(stake * VOTING_POWER_PRECISION);
}
