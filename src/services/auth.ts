import { GovernanceParams } from '../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';

export const CALLER_HEADER = 'x-caller-address';

/**
 * Callers arrive already authenticated; the transport hands over their
 * address in the x-caller-address header.
 */
export const resolveCaller = (headerValue: string | string[] | undefined): string => {
  const raw = Array.isArray(headerValue) ? headerValue[0] : headerValue;
  const caller = raw?.trim();

  if (!caller) {
    throw new DomainError(ErrorCode.MissingCaller, 401, `Missing ${CALLER_HEADER} header.`);
  }

  return caller;
};

export const isAdmin = (params: GovernanceParams, caller: string): boolean => params.admins.includes(caller);

export const assertAdmin = (params: GovernanceParams, caller: string): void => {
  if (!isAdmin(params, caller)) {
    throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller is not a governance admin.', { caller });
  }
};
