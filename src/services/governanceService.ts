/**
 * Session & proposal lifecycle.
 *
 * Admins create draft proposals into the current session (one per admin per
 * session). Selecting one draft closes the session: the pick becomes the
 * single active proposal and opens for voting, every other draft in the
 * session is rejected, and a new session starts.
 */

import {
  FINAL_STATUSES,
  GovernanceState,
  MAX_CHOICES,
  MIN_CHOICES,
  Proposal,
  ProposalStatus,
  Session,
} from '../domain/governance/governanceTypes.js';
import {
  assertTransition,
  isVotingOpen,
  liveActiveProposal,
  requireProposal,
} from '../domain/governance/lifecycle.js';
import { bumpVersion } from '../domain/governance/params.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { Clock, systemClock, toIso } from '../utils/time.js';
import { assertAdmin } from './auth.js';

export interface ProposalContentInput {
  title: string;
  description: string;
  choices: string[];
}

export interface SelectionResult {
  proposal: Proposal;
  closedSession: Session;
  rejectedProposalIds: number[];
  nextSessionId: number;
}

export interface ActiveProposalView {
  proposal: Proposal;
  /** True once the voting window has passed but no final status is set yet. */
  expired: boolean;
}

export interface ProposalFilter {
  status?: ProposalStatus;
  sessionId?: number;
}

const normalizeContent = (input: ProposalContentInput): ProposalContentInput => {
  if (input.choices.length < MIN_CHOICES || input.choices.length > MAX_CHOICES) {
    throw new DomainError(
      ErrorCode.InvalidChoiceCount,
      400,
      `A proposal needs between ${MIN_CHOICES} and ${MAX_CHOICES} choices.`,
      { choiceCount: input.choices.length },
    );
  }

  const choices = input.choices.map((choice) => choice.trim());
  if (choices.some((choice) => choice.length === 0)) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Choice labels must not be empty.');
  }

  const title = input.title.trim();
  if (!title) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Proposal title must not be empty.');
  }

  return { title, description: input.description.trim(), choices };
};

const assertNoLiveActive = (state: GovernanceState, nowMs: number, exceptId?: number): void => {
  const active = liveActiveProposal(state, nowMs);
  if (active && active.id !== exceptId) {
    throw new DomainError(
      ErrorCode.ActiveProposalConflict,
      409,
      'Another proposal is open for voting.',
      { activeProposalId: active.id, endTime: active.endTime },
    );
  }
};

export class GovernanceService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  /**
   * Create a draft proposal in the current session.
   */
  async createProposal(caller: string, input: ProposalContentInput): Promise<Proposal> {
    const proposal = await this.store.transaction((state) => {
      assertAdmin(state.params, caller);

      if (state.params.paused) {
        throw new DomainError(ErrorCode.Paused, 409, 'Governance is paused.');
      }

      const nowMs = this.clock();
      assertNoLiveActive(state, nowMs);

      const session = state.sessions[state.currentSessionId];
      if (session.creators.includes(caller)) {
        throw new DomainError(
          ErrorCode.DuplicateCreatorInSession,
          409,
          'Caller already created a proposal in this session.',
          { sessionId: session.id, caller },
        );
      }

      const content = normalizeContent(input);
      const now = toIso(nowMs);
      const created: Proposal = {
        id: state.nextProposalId,
        sessionId: session.id,
        creator: caller,
        ...content,
        status: 'draft',
        startTime: null,
        endTime: null,
        createdAt: now,
        updatedAt: now,
      };

      state.nextProposalId += 1;
      state.proposals[created.id] = created;
      session.proposalIds.push(created.id);
      session.creators.push(caller);

      return structuredClone(created);
    });

    eventBus.emit('proposal.created', proposal);
    await this.logger.log('info', 'governance.proposal.created', {
      proposalId: proposal.id,
      sessionId: proposal.sessionId,
      creator: proposal.creator,
      choiceCount: proposal.choices.length,
    });

    return proposal;
  }

  /**
   * Pick a draft for voting and close its session.
   * Title, description and choices are replaced with the given content.
   */
  async selectProposal(caller: string, proposalId: number, input: ProposalContentInput): Promise<SelectionResult> {
    const result = await this.store.transaction((state): SelectionResult => {
      assertAdmin(state.params, caller);

      const proposal = requireProposal(state, proposalId);
      if (proposal.status !== 'draft') {
        throw new DomainError(
          ErrorCode.InvalidLifecycleTransition,
          409,
          `Only draft proposals can be selected; proposal ${proposalId} is ${proposal.status}.`,
          { proposalId, status: proposal.status },
        );
      }

      const nowMs = this.clock();
      assertNoLiveActive(state, nowMs, proposalId);

      const content = normalizeContent(input);
      const now = toIso(nowMs);
      const session = state.sessions[proposal.sessionId];

      const rejectedProposalIds: number[] = [];
      for (const otherId of session.proposalIds) {
        const other = state.proposals[otherId];
        if (other.id === proposalId || other.status !== 'draft') continue;
        assertTransition(other.id, other.status, 'rejected');
        other.status = 'rejected';
        other.updatedAt = now;
        rejectedProposalIds.push(other.id);
      }

      assertTransition(proposal.id, proposal.status, 'chosen');
      Object.assign(proposal, content);
      proposal.status = 'chosen';
      proposal.startTime = now;
      proposal.endTime = toIso(nowMs + state.params.votingDurationMs);
      proposal.updatedAt = now;

      session.closedAt = now;
      session.chosenProposalId = proposal.id;

      const nextSessionId = state.currentSessionId + 1;
      state.currentSessionId = nextSessionId;
      state.sessions[nextSessionId] = {
        id: nextSessionId,
        proposalIds: [],
        creators: [],
        openedAt: now,
        closedAt: null,
        chosenProposalId: null,
      };

      state.params.activeProposalId = proposal.id;
      bumpVersion(state.params, now);

      return structuredClone({ proposal, closedSession: session, rejectedProposalIds, nextSessionId });
    });

    eventBus.emit('proposal.status.updated', {
      proposalId: result.proposal.id,
      from: 'draft',
      to: 'chosen',
      startTime: result.proposal.startTime,
      endTime: result.proposal.endTime,
    });
    eventBus.emit('session.closed', {
      sessionId: result.closedSession.id,
      chosenProposalId: result.proposal.id,
      rejectedProposalIds: result.rejectedProposalIds,
      nextSessionId: result.nextSessionId,
    });
    await this.logger.log('info', 'governance.session.closed', {
      caller,
      sessionId: result.closedSession.id,
      chosenProposalId: result.proposal.id,
      rejectedProposalIds: result.rejectedProposalIds,
      endTime: result.proposal.endTime,
    });

    return result;
  }

  /**
   * Cancel a chosen proposal. Not blocked by pause.
   */
  async cancelProposal(caller: string, proposalId: number): Promise<Proposal> {
    const proposal = await this.store.transaction((state) => {
      assertAdmin(state.params, caller);

      const target = requireProposal(state, proposalId);
      assertTransition(target.id, target.status, 'cancelled');

      const now = toIso(this.clock());
      target.status = 'cancelled';
      target.updatedAt = now;
      this.releaseActive(state, target.id, now);

      return structuredClone(target);
    });

    eventBus.emit('proposal.cancelled', { proposalId: proposal.id, sessionId: proposal.sessionId });
    await this.logger.log('info', 'governance.proposal.cancelled', { caller, proposalId: proposal.id });

    return proposal;
  }

  /**
   * Move a chosen proposal to passed, rejected or done. Not blocked by pause
   * and does not wait for the voting window to end.
   */
  async finalizeStatus(caller: string, proposalId: number, status: ProposalStatus): Promise<Proposal> {
    const proposal = await this.store.transaction((state) => {
      assertAdmin(state.params, caller);

      const target = requireProposal(state, proposalId);
      const finalStatus = FINAL_STATUSES.find((allowed) => allowed === status);
      if (!finalStatus) {
        throw new DomainError(
          ErrorCode.InvalidLifecycleTransition,
          409,
          `Status must be one of ${FINAL_STATUSES.join(', ')}.`,
          { proposalId, requested: status },
        );
      }
      if (target.status !== 'chosen') {
        throw new DomainError(
          ErrorCode.InvalidLifecycleTransition,
          409,
          `Only chosen proposals can be finalized; proposal ${proposalId} is ${target.status}.`,
          { proposalId, status: target.status, requested: finalStatus },
        );
      }
      assertTransition(target.id, target.status, finalStatus);

      const now = toIso(this.clock());
      target.status = finalStatus;
      target.updatedAt = now;
      this.releaseActive(state, target.id, now);

      return structuredClone(target);
    });

    eventBus.emit('proposal.status.updated', { proposalId: proposal.id, from: 'chosen', to: proposal.status });
    await this.logger.log('info', 'governance.proposal.status.updated', {
      caller,
      proposalId: proposal.id,
      status: proposal.status,
    });

    return proposal;
  }

  getProposal(proposalId: number): Proposal | null {
    const proposal: Proposal | undefined = this.store.snapshot().proposals[proposalId];
    return proposal ?? null;
  }

  listProposals(filter: ProposalFilter = {}): Proposal[] {
    return Object.values(this.store.snapshot().proposals)
      .filter((p) => filter.status === undefined || p.status === filter.status)
      .filter((p) => filter.sessionId === undefined || p.sessionId === filter.sessionId)
      .sort((a, b) => a.id - b.id);
  }

  getSession(sessionId: number): Session | null {
    const session: Session | undefined = this.store.snapshot().sessions[sessionId];
    return session ?? null;
  }

  getCurrentSession(): Session {
    const state = this.store.snapshot();
    return state.sessions[state.currentSessionId];
  }

  getActiveProposal(): ActiveProposalView | null {
    const state = this.store.snapshot();
    const activeId = state.params.activeProposalId;
    if (activeId === null) return null;

    const proposal = state.proposals[activeId];
    return { proposal, expired: !isVotingOpen(proposal, this.clock()) };
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private releaseActive(state: GovernanceState, proposalId: number, now: string): void {
    if (state.params.activeProposalId !== proposalId) return;
    state.params.activeProposalId = null;
    bumpVersion(state.params, now);
  }
}
