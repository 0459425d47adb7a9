// ─── Governance API SDK types ──────────────────────────────────────────────
// Standalone copies of the wire shapes so the SDK can be vendored without
// the server sources.
// ────────────────────────────────────────────────────────────────────────────

export type ProposalStatus = 'draft' | 'chosen' | 'passed' | 'rejected' | 'done' | 'cancelled';
export type FinalStatus = 'passed' | 'rejected' | 'done';
export type Tier = 'none' | 'bronze' | 'silver' | 'gold' | 'vip';
export type VoteMethod = 'tier_point' | 'holding_percentage' | 'capped_holding_percentage';

// ─── Params ──────────────────────────────────────────────────────────────

export interface TierThresholds {
  vip: number;
  gold: number;
  silver: number;
  bronze: number;
}

export interface GovernanceParams {
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

export interface MaxPercentageUpdate {
  params: GovernanceParams;
  scaleWarning: string | null;
}

// ─── Proposals & sessions ────────────────────────────────────────────────

export interface ProposalContent {
  title: string;
  description?: string;
  choices: string[];
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

export interface SelectionResult {
  proposal: Proposal;
  closedSession: Session;
  rejectedProposalIds: number[];
  nextSessionId: number;
}

export interface ActiveProposal {
  proposal: Proposal | null;
  expired: boolean;
}

// ─── Votes & results ─────────────────────────────────────────────────────

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

export interface ChoiceTally {
  choiceIndex: number;
  label: string;
  weight: number;
  voters: number;
}

export interface ProposalTallies {
  proposalId: number;
  status: ProposalStatus;
  choices: ChoiceTally[];
  totalWeight: number;
  totalVoters: number;
}

export interface Winner {
  proposalId: number;
  choiceIndex: number;
  label: string;
  weight: number;
  final: boolean;
}

export interface HolderStanding {
  account: string;
  balance: number;
  locked: number;
  holdings: number;
  totalSupply: number;
  tier: Tier;
  votePercentage: number;
  cappedPercentage: number;
  method: VoteMethod;
  weight: number;
}

// ─── System ──────────────────────────────────────────────────────────────

export interface HealthResponse {
  status: string;
  env: string;
  uptimeSeconds: number;
  processPid: number;
  paramsVersion: number;
  paused: boolean;
  activeProposalId: number | null;
  wsClients: number;
}

export interface APIErrorEnvelope {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}
