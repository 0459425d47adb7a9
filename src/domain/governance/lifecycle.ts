import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { assertNever } from '../../utils/assertNever.js';
import { fromIso } from '../../utils/time.js';
import { GovernanceState, Proposal, ProposalStatus } from './governanceTypes.js';

export const allowedTransitions = (from: ProposalStatus): readonly ProposalStatus[] => {
  switch (from) {
    case 'draft':
      return ['chosen', 'rejected'];
    case 'chosen':
      return ['passed', 'rejected', 'done', 'cancelled'];
    case 'passed':
    case 'rejected':
    case 'done':
    case 'cancelled':
      return [];
    default:
      return assertNever(from, 'proposal status');
  }
};

export const isTerminal = (status: ProposalStatus): boolean => allowedTransitions(status).length === 0;

export const canTransition = (from: ProposalStatus, to: ProposalStatus): boolean => (
  allowedTransitions(from).includes(to)
);

export const assertTransition = (proposalId: number, from: ProposalStatus, to: ProposalStatus): void => {
  if (!canTransition(from, to)) {
    throw new DomainError(
      ErrorCode.InvalidLifecycleTransition,
      409,
      `Proposal ${proposalId} cannot move from ${from} to ${to}.`,
      { proposalId, from, to },
    );
  }
};

/** Chosen and not past its end time. */
export const isVotingOpen = (proposal: Proposal, nowMs: number): boolean => (
  proposal.status === 'chosen' && proposal.endTime !== null && nowMs <= fromIso(proposal.endTime)
);

/** The active proposal while its voting window is still open, otherwise null. */
export const liveActiveProposal = (state: GovernanceState, nowMs: number): Proposal | null => {
  const activeId = state.params.activeProposalId;
  if (activeId === null) return null;

  const proposal: Proposal | undefined = state.proposals[activeId];
  return proposal !== undefined && isVotingOpen(proposal, nowMs) ? proposal : null;
};

export const requireProposal = (state: GovernanceState, proposalId: number): Proposal => {
  const proposal: Proposal | undefined = state.proposals[proposalId];
  if (!proposal) {
    throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { proposalId });
  }
  return proposal;
};
