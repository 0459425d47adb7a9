import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { Tier, TierThresholds } from './governanceTypes.js';

/** Ascending order; index doubles as the tier rank. */
export const TIER_ORDER: readonly Tier[] = ['none', 'bronze', 'silver', 'gold', 'vip'];

export const tierRank = (tier: Tier): number => TIER_ORDER.indexOf(tier);

export const compareTiers = (a: Tier, b: Tier): number => tierRank(a) - tierRank(b);

/**
 * Highest tier whose threshold the holdings meet, checked from VIP down.
 */
export const classifyTier = (holdings: number, thresholds: TierThresholds): Tier => {
  if (holdings >= thresholds.vip) return 'vip';
  if (holdings >= thresholds.gold) return 'gold';
  if (holdings >= thresholds.silver) return 'silver';
  if (holdings >= thresholds.bronze) return 'bronze';
  return 'none';
};

/**
 * Throws unless vip > gold > silver > bronze > 0.
 */
export const validateThresholds = (thresholds: TierThresholds): TierThresholds => {
  const { vip, gold, silver, bronze } = thresholds;
  const values = [vip, gold, silver, bronze];

  if (values.some((value) => !Number.isSafeInteger(value) || value < 0)) {
    throw new DomainError(
      ErrorCode.InvalidThresholdOrdering,
      400,
      'Thresholds must be non-negative integers.',
      { thresholds },
    );
  }

  if (bronze === 0) {
    throw new DomainError(
      ErrorCode.InvalidThresholdOrdering,
      400,
      'Bronze threshold must be greater than zero.',
      { thresholds },
    );
  }

  if (!(vip > gold && gold > silver && silver > bronze)) {
    throw new DomainError(
      ErrorCode.InvalidThresholdOrdering,
      400,
      'Thresholds must be strictly descending: vip > gold > silver > bronze.',
      { thresholds },
    );
  }

  return { vip, gold, silver, bronze };
};
