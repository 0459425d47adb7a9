/**
 * Holder standing: ledger holdings → tier and vote weight.
 */

import {
  GovernanceParams,
  HolderSnapshot,
  Tier,
  VoteMethod,
} from '../domain/governance/governanceTypes.js';
import { classifyTier } from '../domain/governance/tierClassifier.js';
import {
  cappedHoldingPercentage,
  computeWeight,
  holdingPercentage,
} from '../domain/governance/weightCalculator.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { LedgerAccount, LedgerOracle } from '../integrations/ledger/ledgerOracle.js';

export interface HolderStanding extends HolderSnapshot {
  tier: Tier;
  votePercentage: number;
  cappedPercentage: number;
  method: VoteMethod;
  /** Weight a vote would carry right now under the active method. */
  weight: number;
}

const assertAmount = (field: string, value: number): number => {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new DomainError(
      ErrorCode.InvalidLedgerResponse,
      502,
      'Ledger returned amounts that are not non-negative integers.',
      { field, value },
    );
  }
  return value;
};

const readAccount = async (ledger: LedgerOracle, account: string): Promise<LedgerAccount> => {
  if (ledger.accountOf) return ledger.accountOf(account);

  const [balance, locked] = await Promise.all([ledger.balanceOf(account), ledger.lockedAmount(account)]);
  return { balance, locked };
};

/**
 * Reads balance, locked amount and supply. Pure reads: the oracle never
 * mutates governance state.
 */
export const readHolderSnapshot = async (ledger: LedgerOracle, account: string): Promise<HolderSnapshot> => {
  const [{ balance, locked }, totalSupply] = await Promise.all([
    readAccount(ledger, account),
    ledger.totalSupply(),
  ]);

  const holdings = assertAmount('balance', balance) + assertAmount('locked', locked);

  return {
    account,
    balance,
    locked,
    holdings: assertAmount('holdings', holdings),
    totalSupply: assertAmount('totalSupply', totalSupply),
  };
};

export const evaluateStanding = (params: GovernanceParams, snapshot: HolderSnapshot): HolderStanding => {
  const tier = classifyTier(snapshot.holdings, params.thresholds);
  return {
    ...snapshot,
    tier,
    votePercentage: holdingPercentage(snapshot.holdings, snapshot.totalSupply),
    cappedPercentage: cappedHoldingPercentage(snapshot.holdings, snapshot.totalSupply, params.maxCappedPercentage),
    method: params.voteMethod,
    weight: computeWeight(params.voteMethod, {
      tier,
      holdings: snapshot.holdings,
      totalSupply: snapshot.totalSupply,
      maxCappedPercentage: params.maxCappedPercentage,
    }),
  };
};

export class HolderService {
  constructor(
    private readonly store: StateStore,
    private readonly ledger: LedgerOracle,
  ) {}

  async getStanding(account: string): Promise<HolderStanding> {
    const snapshot = await readHolderSnapshot(this.ledger, account);
    return evaluateStanding(this.store.snapshot().params, snapshot);
  }

  async getTier(account: string): Promise<Tier> {
    return (await this.getStanding(account)).tier;
  }

  async getVotePercentage(account: string): Promise<number> {
    return (await this.getStanding(account)).votePercentage;
  }

  async getCappedPercentage(account: string): Promise<number> {
    return (await this.getStanding(account)).cappedPercentage;
  }
}
