import { GovernanceState, TierThresholds, VoteMethod } from '../../domain/governance/governanceTypes.js';
import { votingDurationMsFromDays } from '../../domain/governance/params.js';
import { validateThresholds } from '../../domain/governance/tierClassifier.js';
import { isoNow } from '../../utils/time.js';

export interface GovernanceDefaults {
  admins: string[];
  thresholds: TierThresholds;
  maxCappedPercentage: number;
  votingDurationDays: number;
  voteMethod: VoteMethod;
}

export const createDefaultState = (defaults: GovernanceDefaults, now = isoNow()): GovernanceState => ({
  params: {
    version: 1,
    admins: [...new Set(defaults.admins)],
    thresholds: validateThresholds(defaults.thresholds),
    maxCappedPercentage: defaults.maxCappedPercentage,
    votingDurationMs: votingDurationMsFromDays(defaults.votingDurationDays),
    voteMethod: defaults.voteMethod,
    paused: false,
    activeProposalId: null,
    updatedAt: now,
  },
  nextProposalId: 1,
  currentSessionId: 1,
  proposals: {},
  sessions: {
    1: {
      id: 1,
      proposalIds: [],
      creators: [],
      openedAt: now,
      closedAt: null,
      chosenProposalId: null,
    },
  },
  votes: {},
  tallies: {},
});
