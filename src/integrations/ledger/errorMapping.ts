import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

export type LedgerOperation = 'balance' | 'supply';

export class LedgerConfigError extends Error {
  constructor(message: string, public readonly details?: Record<string, unknown>) {
    super(message);
    this.name = 'LedgerConfigError';
  }
}

export class LedgerHttpError extends Error {
  constructor(
    public readonly operation: LedgerOperation,
    public readonly statusCode: number,
    public readonly bodyText: string,
  ) {
    super(`ledger ${operation} failed with status ${statusCode}`);
    this.name = 'LedgerHttpError';
  }
}

export class LedgerNetworkError extends Error {
  constructor(
    public readonly operation: LedgerOperation,
    message: string,
  ) {
    super(message);
    this.name = 'LedgerNetworkError';
  }
}

export class LedgerResponseError extends Error {
  constructor(
    public readonly operation: LedgerOperation,
    public readonly issues: string[],
  ) {
    super(`ledger ${operation} returned a malformed body`);
    this.name = 'LedgerResponseError';
  }
}

export const mapLedgerError = (error: unknown, operation: LedgerOperation): DomainError => {
  if (error instanceof DomainError) {
    return error;
  }

  if (error instanceof LedgerConfigError) {
    return new DomainError(
      ErrorCode.LedgerMisconfigured,
      503,
      'Ledger integration is misconfigured.',
      {
        operation,
        action: 'Set LEDGER_BASE_URL or LEDGER_FILE, then retry.',
        ...(error.details ?? {}),
      },
    );
  }

  if (error instanceof LedgerResponseError) {
    return new DomainError(
      ErrorCode.InvalidLedgerResponse,
      502,
      'Ledger returned amounts that are not non-negative integers.',
      { operation, issues: error.issues },
    );
  }

  if (error instanceof LedgerHttpError) {
    return new DomainError(
      ErrorCode.LedgerUnavailable,
      503,
      'Ledger request failed.',
      {
        operation,
        upstreamStatus: error.statusCode,
        upstreamMessage: error.bodyText.trim().slice(0, 300) || undefined,
      },
    );
  }

  if (error instanceof LedgerNetworkError || (error instanceof Error && error.name === 'AbortError')) {
    return new DomainError(
      ErrorCode.LedgerUnavailable,
      503,
      'Ledger is unreachable.',
      { operation, reason: error.message },
    );
  }

  return new DomainError(
    ErrorCode.InternalError,
    500,
    'Unexpected ledger integration failure.',
    { operation, error: String(error) },
  );
};
