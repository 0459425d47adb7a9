/**
 * Vote weight policies.
 *
 * tier_point                 fixed points per tier (VIP 4 … Bronze 1, none 0)
 * holding_percentage         share of total supply on the PERCENTAGE_BASE scale
 * capped_holding_percentage  holding_percentage clamped to the configured cap
 */

import { assertNever } from '../../utils/assertNever.js';
import { PERCENTAGE_BASE, Tier, VoteMethod } from './governanceTypes.js';

const TIER_POINTS: Record<Tier, number> = {
  vip: 4,
  gold: 3,
  silver: 2,
  bronze: 1,
  none: 0,
};

export const tierPoints = (tier: Tier): number => TIER_POINTS[tier];

/**
 * floor(holdings * PERCENTAGE_BASE / totalSupply), 0 when supply is 0.
 * Integer arithmetic runs on bigint so large base-unit amounts stay exact.
 */
export const holdingPercentage = (holdings: number, totalSupply: number): number => {
  if (totalSupply <= 0) return 0;
  const scaled = (BigInt(holdings) * BigInt(PERCENTAGE_BASE)) / BigInt(totalSupply);
  return Number(scaled);
};

export const cappedHoldingPercentage = (
  holdings: number,
  totalSupply: number,
  maxCappedPercentage: number,
): number => Math.min(holdingPercentage(holdings, totalSupply), maxCappedPercentage);

export interface WeightInput {
  tier: Tier;
  holdings: number;
  totalSupply: number;
  maxCappedPercentage: number;
}

export const computeWeight = (method: VoteMethod, input: WeightInput): number => {
  switch (method) {
    case 'tier_point':
      return tierPoints(input.tier);
    case 'holding_percentage':
      return holdingPercentage(input.holdings, input.totalSupply);
    case 'capped_holding_percentage':
      return cappedHoldingPercentage(input.holdings, input.totalSupply, input.maxCappedPercentage);
    default:
      return assertNever(method, 'vote method');
  }
};
