import { describe, expect, it } from 'vitest';
import { PERCENTAGE_BASE } from '../src/domain/governance/governanceTypes.js';
import {
  cappedHoldingPercentage,
  computeWeight,
  holdingPercentage,
  tierPoints,
} from '../src/domain/governance/weightCalculator.js';

describe('tierPoints', () => {
  it('awards 4 to vip down to 0 for no tier', () => {
    expect(tierPoints('vip')).toBe(4);
    expect(tierPoints('gold')).toBe(3);
    expect(tierPoints('silver')).toBe(2);
    expect(tierPoints('bronze')).toBe(1);
    expect(tierPoints('none')).toBe(0);
  });
});

describe('holdingPercentage', () => {
  it('floors the share of supply on the 1,000,000 base', () => {
    expect(holdingPercentage(1, 3)).toBe(333_333);
    expect(holdingPercentage(1_100_000, 10_000_000)).toBe(110_000);
    expect(holdingPercentage(10_000_000, 10_000_000)).toBe(PERCENTAGE_BASE);
  });

  it('returns 0 when total supply is 0', () => {
    expect(holdingPercentage(500, 0)).toBe(0);
  });

  it('stays exact for amounts near the safe integer limit', () => {
    const max = Number.MAX_SAFE_INTEGER;
    expect(holdingPercentage(max, max)).toBe(PERCENTAGE_BASE);
    expect(holdingPercentage(max - 1, max)).toBe(999_999);
  });
});

describe('cappedHoldingPercentage', () => {
  it('never exceeds the cap', () => {
    expect(cappedHoldingPercentage(10_000_000, 10_000_000, 30_000)).toBe(30_000);
    expect(cappedHoldingPercentage(1_100_000, 10_000_000, 30_000)).toBe(30_000);
  });

  it('passes smaller shares through', () => {
    expect(cappedHoldingPercentage(12_000, 10_000_000, 30_000)).toBe(1_200);
  });

  it('clamps to 0 with a zero cap', () => {
    expect(cappedHoldingPercentage(5_000_000, 10_000_000, 0)).toBe(0);
  });
});

describe('computeWeight', () => {
  const input = { tier: 'gold' as const, holdings: 110_000, totalSupply: 10_000_000, maxCappedPercentage: 5_000 };

  it('dispatches on the vote method', () => {
    expect(computeWeight('tier_point', input)).toBe(3);
    expect(computeWeight('holding_percentage', input)).toBe(11_000);
    expect(computeWeight('capped_holding_percentage', input)).toBe(5_000);
  });
});
