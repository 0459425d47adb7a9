/**
 * Admin control surface: thresholds, weight cap, voting duration, vote
 * method, pause switch and the admin roster.
 *
 * Every update runs as one store transaction and bumps the params version.
 * Pausing blocks proposal creation and voting only.
 */

import {
  GovernanceParams,
  TierThresholds,
  VoteMethod,
} from '../domain/governance/governanceTypes.js';
import { liveActiveProposal } from '../domain/governance/lifecycle.js';
import {
  bumpVersion,
  checkMaxPercentageInput,
  votingDurationMsFromDays,
} from '../domain/governance/params.js';
import { validateThresholds } from '../domain/governance/tierClassifier.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { eventBus } from '../infra/eventBus.js';
import { EventLogger } from '../infra/logger.js';
import { StateStore } from '../infra/storage/stateStore.js';
import { Clock, systemClock, toIso } from '../utils/time.js';
import { assertAdmin } from './auth.js';

export interface MaxPercentageUpdate {
  params: GovernanceParams;
  scaleWarning: string | null;
}

type ParamsField = 'thresholds' | 'maxCappedPercentage' | 'votingDurationMs' | 'voteMethod';

export class AdminService {
  constructor(
    private readonly store: StateStore,
    private readonly logger: EventLogger,
    private readonly clock: Clock = systemClock,
  ) {}

  getParams(): GovernanceParams {
    return this.store.snapshot().params;
  }

  async updateThresholds(caller: string, input: TierThresholds): Promise<GovernanceParams> {
    const params = await this.mutate(caller, (draft) => {
      draft.thresholds = validateThresholds(input);
    });
    await this.announce('thresholds', params);
    return params;
  }

  async setMaxPercentage(caller: string, value: number): Promise<MaxPercentageUpdate> {
    const outcome: { scaleWarning: string | null } = { scaleWarning: null };
    const params = await this.mutate(caller, (draft) => {
      const checked = checkMaxPercentageInput(value);
      draft.maxCappedPercentage = checked.value;
      outcome.scaleWarning = checked.scaleWarning;
    });

    const { scaleWarning } = outcome;
    if (scaleWarning) {
      await this.logger.log('warn', 'governance.max_percentage.scale_mismatch', {
        value,
        warning: scaleWarning,
      });
    }
    await this.announce('maxCappedPercentage', params);
    return { params, scaleWarning };
  }

  async updateVotingDuration(caller: string, days: number): Promise<GovernanceParams> {
    const params = await this.mutate(caller, (draft) => {
      draft.votingDurationMs = votingDurationMsFromDays(days);
    });
    await this.announce('votingDurationMs', params);
    return params;
  }

  /**
   * Locked while a chosen proposal is still open for voting, so every vote
   * on one proposal is weighed by the same rule.
   */
  async setVoteMethod(caller: string, method: VoteMethod): Promise<GovernanceParams> {
    const params = await this.store.transaction((state) => {
      assertAdmin(state.params, caller);

      const nowMs = this.clock();
      const active = liveActiveProposal(state, nowMs);
      if (active) {
        throw new DomainError(
          ErrorCode.VoteMethodLocked,
          409,
          'Vote method cannot change while a proposal is open for voting.',
          { activeProposalId: active.id, endTime: active.endTime },
        );
      }

      state.params.voteMethod = method;
      bumpVersion(state.params, toIso(nowMs));
      return structuredClone(state.params);
    });

    await this.announce('voteMethod', params);
    return params;
  }

  async setPaused(caller: string, paused: boolean): Promise<GovernanceParams> {
    const params = await this.mutate(caller, (draft) => {
      draft.paused = paused;
    });

    eventBus.emit('dao.status.updated', { paused: params.paused, version: params.version });
    await this.logger.log('info', 'governance.dao.status.updated', {
      caller,
      paused: params.paused,
      version: params.version,
    });
    return params;
  }

  async grantAdmin(caller: string, account: string): Promise<GovernanceParams> {
    const params = await this.mutate(caller, (draft) => {
      if (!draft.admins.includes(account)) {
        draft.admins.push(account);
      }
    });

    eventBus.emit('admin.updated', { action: 'granted', account, admins: params.admins });
    await this.logger.log('info', 'governance.admin.granted', { caller, account });
    return params;
  }

  async revokeAdmin(caller: string, account: string): Promise<GovernanceParams> {
    const params = await this.mutate(caller, (draft) => {
      if (!draft.admins.includes(account)) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, 'Account is not an admin.', { account });
      }
      if (draft.admins.length === 1) {
        throw new DomainError(ErrorCode.InvalidPayload, 400, 'Cannot revoke the last admin.', { account });
      }
      draft.admins = draft.admins.filter((admin) => admin !== account);
    });

    eventBus.emit('admin.updated', { action: 'revoked', account, admins: params.admins });
    await this.logger.log('info', 'governance.admin.revoked', { caller, account });
    return params;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private async mutate(
    caller: string,
    apply: (params: GovernanceParams) => void,
  ): Promise<GovernanceParams> {
    return this.store.transaction((state) => {
      assertAdmin(state.params, caller);
      apply(state.params);
      bumpVersion(state.params, toIso(this.clock()));
      return structuredClone(state.params);
    });
  }

  private async announce(field: ParamsField, params: GovernanceParams): Promise<void> {
    eventBus.emit('params.updated', { field, value: params[field], version: params.version });
    await this.logger.log('info', 'governance.params.updated', {
      field,
      value: params[field],
      version: params.version,
    });
  }
}
