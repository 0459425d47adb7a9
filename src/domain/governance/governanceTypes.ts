/**
 * Governance types.
 *
 * An admin opens proposals in sessions, picks one per session for voting,
 * and holders of the governance asset vote on it with a weight derived from
 * their tier or their share of total supply.
 */

export type ProposalStatus =
  | 'draft'
  | 'chosen'
  | 'passed'
  | 'rejected'
  | 'done'
  | 'cancelled';

/** Statuses an admin may finalize a chosen proposal into. */
export type FinalStatus = Extract<ProposalStatus, 'passed' | 'rejected' | 'done'>;

export const FINAL_STATUSES: readonly FinalStatus[] = ['passed', 'rejected', 'done'];

export type Tier = 'none' | 'bronze' | 'silver' | 'gold' | 'vip';

export type VoteMethod =
  | 'tier_point'
  | 'holding_percentage'
  | 'capped_holding_percentage';

export const VOTE_METHODS: readonly VoteMethod[] = [
  'tier_point',
  'holding_percentage',
  'capped_holding_percentage',
];

/** 1,000,000 represents 100%. */
export const PERCENTAGE_BASE = 1_000_000;

export const MIN_CHOICES = 2;
export const MAX_CHOICES = 4;

export interface TierThresholds {
  vip: number;
  gold: number;
  silver: number;
  bronze: number;
}

export interface Proposal {
  id: number;
  sessionId: number;
  creator: string;
  title: string;
  description: string;
  choices: string[];
  status: ProposalStatus;
  startTime: string | null;
  endTime: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface Session {
  id: number;
  proposalIds: number[];
  creators: string[];
  openedAt: string;
  closedAt: string | null;
  chosenProposalId: number | null;
}

export interface VoteDetail {
  id: string;
  proposalId: number;
  voter: string;
  choiceIndex: number;
  weight: number;
  method: VoteMethod;
  tier: Tier;
  holdings: number;
  castAt: string;
}

export interface ProposalTally {
  proposalId: number;
  /** Accumulated weight per choice index. */
  weights: number[];
  /** Number of voters per choice index. */
  voters: number[];
}

export interface GovernanceParams {
  /** Incremented on every mutation. */
  version: number;
  admins: string[];
  thresholds: TierThresholds;
  maxCappedPercentage: number;
  votingDurationMs: number;
  voteMethod: VoteMethod;
  paused: boolean;
  activeProposalId: number | null;
  updatedAt: string;
}

export interface GovernanceState {
  params: GovernanceParams;
  nextProposalId: number;
  currentSessionId: number;
  proposals: Record<string, Proposal>;
  sessions: Record<string, Session>;
  /** Keyed by proposal id, then voter address. */
  votes: Record<string, Record<string, VoteDetail>>;
  tallies: Record<string, ProposalTally>;
}

export interface HolderSnapshot {
  account: string;
  balance: number;
  locked: number;
  holdings: number;
  totalSupply: number;
}
