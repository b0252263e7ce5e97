import { describe, expect, it } from 'vitest';
import { isqrt, quadraticVotingPower, VOTING_POWER_PRECISION } from '../src/index.js';
import { ETHER } from './helpers.js';

describe('isqrt', () => {
  it('returns exact floors for small values', () => {
    expect(isqrt(0n)).toBe(0n);
    expect(isqrt(1n)).toBe(1n);
    expect(isqrt(2n)).toBe(1n);
    expect(isqrt(3n)).toBe(1n);
    expect(isqrt(4n)).toBe(2n);
    expect(isqrt(15n)).toBe(3n);
    expect(isqrt(16n)).toBe(4n);
    expect(isqrt(99n)).toBe(9n);
  });

  it('handles perfect squares around 10^36', () => {
    const root = 10n ** 18n;
    expect(isqrt(root * root)).toBe(root);
    expect(isqrt(root * root - 1n)).toBe(root - 1n);
    expect(isqrt((root + 1n) * (root + 1n) - 1n)).toBe(root);
  });

  it('brackets non-square inputs', () => {
    for (const value of [10n * 10n ** 36n, 160n * 10n ** 36n, 123_456_789_012_345_678_901n]) {
      const root = isqrt(value);
      expect(root * root <= value).toBe(true);
      expect((root + 1n) * (root + 1n) > value).toBe(true);
    }
  });

  it('rejects negative input', () => {
    expect(() => isqrt(-1n)).toThrow(RangeError);
  });
});

describe('quadratic voting power', () => {
  it('maps one whole unit of stake to one whole unit of power', () => {
    expect(VOTING_POWER_PRECISION).toBe(ETHER);
    expect(quadraticVotingPower(ETHER)).toBe(ETHER);
    expect(quadraticVotingPower(4n * ETHER)).toBe(2n * ETHER);
    expect(quadraticVotingPower(100n * ETHER)).toBe(10n * ETHER);
  });

  it('gives zero power to zero stake', () => {
    expect(quadraticVotingPower(0n)).toBe(0n);
    expect(quadraticVotingPower(-5n)).toBe(0n);
  });

  it('is strictly increasing and never exceeds whole-unit stakes', () => {
    const stakes = [1n, 2n, 10n, 50n, 100n, 1000n].map((units) => units * ETHER);
    const powers = stakes.map(quadraticVotingPower);
    for (let i = 1; i < powers.length; i++) {
      expect(powers[i] > powers[i - 1]).toBe(true);
    }
    stakes.forEach((stake, i) => {
      expect(powers[i] <= stake).toBe(true);
    });
  });

  it('is deterministic', () => {
    const stake = 37n * ETHER + 12_345n;
    expect(quadraticVotingPower(stake)).toBe(quadraticVotingPower(stake));
  });
});
