// Tiered governance API — SDK entry point
export { GovernanceAPIClient, GovernanceAPIError } from './client.js';
export type { GovernanceAPIClientOptions } from './client.js';
export type {
  // Enums / unions
  ProposalStatus,
  FinalStatus,
  Tier,
  VoteMethod,

  // Params
  TierThresholds,
  GovernanceParams,
  MaxPercentageUpdate,

  // Proposals & sessions
  ProposalContent,
  Proposal,
  Session,
  SelectionResult,
  ActiveProposal,

  // Votes & results
  VoteDetail,
  ChoiceTally,
  ProposalTallies,
  Winner,
  HolderStanding,

  // System
  HealthResponse,
  APIErrorEnvelope,
} from './types.js';
