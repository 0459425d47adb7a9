import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { DAY_MS } from '../../utils/time.js';
import { GovernanceParams, PERCENTAGE_BASE } from './governanceTypes.js';

/** Upper bound accepted by set-max-percentage. */
export const MAX_PERCENTAGE_INPUT = 100;

export const MIN_VOTING_DURATION_DAYS = 1;

export const votingDurationMsFromDays = (days: number): number => {
  if (!Number.isInteger(days) || days < MIN_VOTING_DURATION_DAYS) {
    throw new DomainError(
      ErrorCode.InvalidPayload,
      400,
      `Voting duration must be a whole number of days, at least ${MIN_VOTING_DURATION_DAYS}.`,
      { days },
    );
  }
  return days * DAY_MS;
};

export interface MaxPercentageCheck {
  value: number;
  /** Set when the accepted value reads differently on the stored scale. */
  scaleWarning: string | null;
}

/**
 * The update bound is 100 while stored percentages use PERCENTAGE_BASE
 * (1,000,000 = 100%), so an accepted value caps weights at value / 10,000 %.
 * The bound is kept as-is and every accepted update carries a warning.
 */
export const checkMaxPercentageInput = (value: number): MaxPercentageCheck => {
  if (!Number.isInteger(value) || value < 0 || value > MAX_PERCENTAGE_INPUT) {
    throw new DomainError(
      ErrorCode.InvalidPayload,
      400,
      `Max capped percentage must be an integer between 0 and ${MAX_PERCENTAGE_INPUT}.`,
      { value },
    );
  }

  const effectivePct = (value * 100) / PERCENTAGE_BASE;
  return {
    value,
    scaleWarning:
      `Input bound is ${MAX_PERCENTAGE_INPUT} but percentages are stored on a ${PERCENTAGE_BASE} base; `
      + `a cap of ${value} limits weights to ${effectivePct}% of supply.`,
  };
};

/** Every params mutation goes through here. */
export const bumpVersion = (params: GovernanceParams, now: string): void => {
  params.version += 1;
  params.updatedAt = now;
};
