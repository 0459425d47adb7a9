export const ErrorCode = {
  InvalidPayload: 'invalid_payload',
  MissingCaller: 'missing_caller',
  Unauthorized: 'unauthorized',
  Paused: 'paused',
  InvalidChoiceCount: 'invalid_choice_count',
  ActiveProposalConflict: 'active_proposal_conflict',
  DuplicateCreatorInSession: 'duplicate_creator_in_session',
  InvalidLifecycleTransition: 'invalid_lifecycle_transition',
  VotingClosed: 'voting_closed',
  InvalidChoiceIndex: 'invalid_choice_index',
  DuplicateVote: 'duplicate_vote',
  InvalidThresholdOrdering: 'invalid_threshold_ordering',
  VoteMethodLocked: 'vote_method_locked',
  ProposalNotFound: 'proposal_not_found',
  SessionNotFound: 'session_not_found',
  ReentrantCall: 'reentrant_call',
  LedgerMisconfigured: 'ledger_misconfigured',
  LedgerUnavailable: 'ledger_unavailable',
  InvalidLedgerResponse: 'invalid_ledger_response',
  InternalError: 'internal_error',
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

export class DomainError extends Error {
  constructor(
    public readonly code: ErrorCode,
    public readonly statusCode: number,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'DomainError';
  }
}

export const toErrorEnvelope = (
  code: ErrorCode,
  message: string,
  details?: unknown,
): {
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
} => ({
  error: {
    code,
    message,
    ...(details === undefined ? {} : { details }),
  },
});
