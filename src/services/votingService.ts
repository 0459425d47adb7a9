/**
 * Voting engine: one final vote per voter per chosen proposal, weighed by
 * the vote method in effect when it is cast.
 */

import { v4 as uuid } from 'uuid';
import {
  GovernanceState,
  Proposal,
  ProposalTally,
  VoteDetail,
} from '../domain/governance/governanceTypes.js';
import { isVotingOpen, requireProposal } from '../domain/governance/lifecycle.js';
import { emptyTally, selectWinner } from '../domain/governance/tally.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { LedgerOracle } from '../integrations/ledger/ledgerOracle.js';
import { Clock, fromIso, systemClock, toIso } from '../utils/time.js';
import { evaluateStanding, readHolderSnapshot } from './holderService.js';

export interface ChoiceTally {
  choiceIndex: number;
  label: string;
  weight: number;
  voters: number;
}

export interface ProposalTallies {
  proposalId: number;
  status: Proposal['status'];
  choices: ChoiceTally[];
  totalWeight: number;
  totalVoters: number;
}

export interface WinnerView {
  proposalId: number;
  choiceIndex: number;
  label: string;
  weight: number;
  /** False while the proposal is still open for voting. */
  final: boolean;
}

/** Voter addresses are opaque, so only own keys count as ballots. */
const ballotOf = (ballots: Record<string, VoteDetail>, voter: string): VoteDetail | null => (
  Object.hasOwn(ballots, voter) ? ballots[voter] : null
);

const tallyOf = (state: GovernanceState, proposal: Proposal): ProposalTally => (
  state.tallies[proposal.id] ?? emptyTally(proposal.id, proposal.choices.length)
);

export class VotingService {
  constructor(
    private readonly store: StateStore,
    private readonly ledger: LedgerOracle,
    private readonly logger: EventLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Cast a vote. Votes are final: there is no change or revocation.
   */
  async vote(voter: string, proposalId: number, choiceIndex: number): Promise<VoteDetail> {
    const detail = await this.store.transaction(async (state) => {
      if (state.params.paused) {
        throw new DomainError(ErrorCode.Paused, 409, 'Governance is paused.');
      }

      const proposal = requireProposal(state, proposalId);
      if (proposal.status !== 'chosen' || proposal.endTime === null) {
        throw new DomainError(
          ErrorCode.InvalidLifecycleTransition,
          409,
          `Proposal ${proposalId} is ${proposal.status}, not open for voting.`,
          { proposalId, status: proposal.status },
        );
      }

      const nowMs = this.clock();
      if (nowMs > fromIso(proposal.endTime)) {
        throw new DomainError(
          ErrorCode.VotingClosed,
          409,
          'Voting period has ended.',
          { proposalId, endTime: proposal.endTime },
        );
      }

      if (!Number.isInteger(choiceIndex) || choiceIndex < 0 || choiceIndex >= proposal.choices.length) {
        throw new DomainError(
          ErrorCode.InvalidChoiceIndex,
          400,
          `Choice index must be between 0 and ${proposal.choices.length - 1}.`,
          { proposalId, choiceIndex },
        );
      }

      const ballots = state.votes[proposalId] ?? {};
      if (ballotOf(ballots, voter)) {
        throw new DomainError(
          ErrorCode.DuplicateVote,
          409,
          'Voter has already voted on this proposal.',
          { proposalId, voter },
        );
      }

      const standing = evaluateStanding(state.params, await readHolderSnapshot(this.ledger, voter));

      const cast: VoteDetail = {
        id: uuid(),
        proposalId,
        voter,
        choiceIndex,
        weight: standing.weight,
        method: standing.method,
        tier: standing.tier,
        holdings: standing.holdings,
        castAt: toIso(nowMs),
      };

      const tally = tallyOf(state, proposal);
      tally.weights[choiceIndex] += cast.weight;
      tally.voters[choiceIndex] += 1;

      state.tallies[proposalId] = tally;
      state.votes[proposalId] = { ...ballots, [voter]: cast };

      return structuredClone(cast);
    });

    eventBus.emit('vote.cast', detail);
    await this.logger.log('info', 'governance.vote.cast', {
      proposalId: detail.proposalId,
      voter: detail.voter,
      choiceIndex: detail.choiceIndex,
      weight: detail.weight,
      method: detail.method,
    });

    return detail;
  }

  getVote(proposalId: number, voter: string): VoteDetail | null {
    const state = this.store.snapshot();
    requireProposal(state, proposalId);
    return ballotOf(state.votes[proposalId] ?? {}, voter);
  }

  listVotes(proposalId: number): VoteDetail[] {
    const state = this.store.snapshot();
    requireProposal(state, proposalId);
    return Object.values(state.votes[proposalId] ?? {})
      .sort((a, b) => a.castAt.localeCompare(b.castAt));
  }

  getProposalVote(proposalId: number, choiceIndex: number): ChoiceTally {
    const tallies = this.getAllTallies(proposalId);
    const choice = tallies.choices.find((entry) => entry.choiceIndex === choiceIndex);
    if (!choice) {
      throw new DomainError(
        ErrorCode.InvalidChoiceIndex,
        400,
        `Choice index must be between 0 and ${tallies.choices.length - 1}.`,
        { proposalId, choiceIndex },
      );
    }
    return choice;
  }

  getAllTallies(proposalId: number): ProposalTallies {
    const state = this.store.snapshot();
    const proposal = requireProposal(state, proposalId);
    const tally = tallyOf(state, proposal);

    const choices = proposal.choices.map((label, choiceIndex) => ({
      choiceIndex,
      label,
      weight: tally.weights[choiceIndex],
      voters: tally.voters[choiceIndex],
    }));

    return {
      proposalId,
      status: proposal.status,
      choices,
      totalWeight: choices.reduce((sum, c) => sum + c.weight, 0),
      totalVoters: choices.reduce((sum, c) => sum + c.voters, 0),
    };
  }

  getWinner(proposalId: number): WinnerView {
    const state = this.store.snapshot();
    const proposal = requireProposal(state, proposalId);
    const { choiceIndex, weight } = selectWinner(tallyOf(state, proposal).weights);

    return {
      proposalId,
      choiceIndex,
      label: proposal.choices[choiceIndex],
      weight,
      final: !isVotingOpen(proposal, this.clock()),
    };
  }
}
