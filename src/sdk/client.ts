// ─── GovernanceAPIClient ───────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the tiered governance API.
// Uses the global fetch (Node.js 18+), or one passed in.
// ────────────────────────────────────────────────────────────────────────────

import type {
  ActiveProposal,
  APIErrorEnvelope,
  ChoiceTally,
  FinalStatus,
  GovernanceParams,
  HealthResponse,
  HolderStanding,
  MaxPercentageUpdate,
  Proposal,
  ProposalContent,
  ProposalStatus,
  ProposalTallies,
  SelectionResult,
  Session,
  TierThresholds,
  VoteDetail,
  VoteMethod,
  Winner,
} from './types.js';

export class GovernanceAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'GovernanceAPIError';
  }
}

export interface GovernanceAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** Address sent as x-caller-address on every request. */
  caller?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

export class GovernanceAPIClient {
  private readonly baseUrl: string;
  private readonly caller?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, caller?: string);
  constructor(opts: GovernanceAPIClientOptions);
  constructor(baseUrlOrOpts: string | GovernanceAPIClientOptions, caller?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.caller = caller;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.caller = baseUrlOrOpts.caller;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** Same server, different caller address. */
  as(caller: string): GovernanceAPIClient {
    return new GovernanceAPIClient({ baseUrl: this.baseUrl, caller, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(hasBody: boolean): Record<string, string> {
    const h: Record<string, string> = { accept: 'application/json' };
    if (hasBody) h['content-type'] = 'application/json';
    if (this.caller) h['x-caller-address'] = this.caller;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(body !== undefined),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      let errorBody: APIErrorEnvelope | undefined;
      try {
        errorBody = (await res.json()) as APIErrorEnvelope;
      } catch {
        errorBody = undefined;
      }
      throw new GovernanceAPIError(
        res.status,
        errorBody?.error?.code ?? `HTTP_${res.status}`,
        errorBody?.error?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        errorBody?.error?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body);
  }

  // ─── System ────────────────────────────────────────────────────────────

  health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }

  async getParams(): Promise<GovernanceParams> {
    return (await this.get<{ params: GovernanceParams }>('/params')).params;
  }

  // ─── Admin ─────────────────────────────────────────────────────────────

  async updateThresholds(thresholds: TierThresholds): Promise<GovernanceParams> {
    return (await this.post<{ params: GovernanceParams }>('/admin/thresholds', thresholds)).params;
  }

  setMaxPercentage(value: number): Promise<MaxPercentageUpdate> {
    return this.post<MaxPercentageUpdate>('/admin/max-percentage', { value });
  }

  async updateVotingDuration(days: number): Promise<GovernanceParams> {
    return (await this.post<{ params: GovernanceParams }>('/admin/voting-duration', { days })).params;
  }

  async setVoteMethod(method: VoteMethod): Promise<GovernanceParams> {
    return (await this.post<{ params: GovernanceParams }>('/admin/vote-method', { method })).params;
  }

  async setPaused(paused: boolean): Promise<GovernanceParams> {
    return (await this.post<{ params: GovernanceParams }>('/admin/pause', { paused })).params;
  }

  async grantAdmin(account: string): Promise<GovernanceParams> {
    return (await this.post<{ params: GovernanceParams }>('/admin/admins', { account })).params;
  }

  async revokeAdmin(account: string): Promise<GovernanceParams> {
    const path = `/admin/admins/${encodeURIComponent(account)}`;
    return (await this.request<{ params: GovernanceParams }>('DELETE', path)).params;
  }

  // ─── Proposals & sessions ──────────────────────────────────────────────

  async createProposal(content: ProposalContent): Promise<Proposal> {
    return (await this.post<{ proposal: Proposal }>('/proposals', content)).proposal;
  }

  async listProposals(filter: { status?: ProposalStatus; sessionId?: number } = {}): Promise<Proposal[]> {
    const qs = new URLSearchParams();
    if (filter.status) qs.set('status', filter.status);
    if (filter.sessionId !== undefined) qs.set('sessionId', String(filter.sessionId));
    const query = qs.toString();
    const suffix = query ? `?${query}` : '';
    return (await this.get<{ proposals: Proposal[] }>(`/proposals${suffix}`)).proposals;
  }

  async getProposal(proposalId: number): Promise<Proposal> {
    return (await this.get<{ proposal: Proposal }>(`/proposals/${proposalId}`)).proposal;
  }

  getActiveProposal(): Promise<ActiveProposal> {
    return this.get<ActiveProposal>('/proposals/active');
  }

  selectProposal(proposalId: number, content: ProposalContent): Promise<SelectionResult> {
    return this.post<SelectionResult>(`/proposals/${proposalId}/select`, content);
  }

  async cancelProposal(proposalId: number): Promise<Proposal> {
    return (await this.post<{ proposal: Proposal }>(`/proposals/${proposalId}/cancel`)).proposal;
  }

  async finalizeStatus(proposalId: number, status: FinalStatus): Promise<Proposal> {
    return (await this.post<{ proposal: Proposal }>(`/proposals/${proposalId}/status`, { status })).proposal;
  }

  async getCurrentSession(): Promise<Session> {
    return (await this.get<{ session: Session }>('/sessions/current')).session;
  }

  async getSession(sessionId: number): Promise<Session> {
    return (await this.get<{ session: Session }>(`/sessions/${sessionId}`)).session;
  }

  // ─── Votes & results ───────────────────────────────────────────────────

  async vote(proposalId: number, choiceIndex: number): Promise<VoteDetail> {
    return (await this.post<{ vote: VoteDetail }>(`/proposals/${proposalId}/votes`, { choiceIndex })).vote;
  }

  async getVote(proposalId: number, voter: string): Promise<VoteDetail | null> {
    const path = `/proposals/${proposalId}/votes/${encodeURIComponent(voter)}`;
    return (await this.get<{ vote: VoteDetail | null }>(path)).vote;
  }

  getAllTallies(proposalId: number): Promise<ProposalTallies> {
    return this.get<ProposalTallies>(`/proposals/${proposalId}/tallies`);
  }

  getProposalVote(proposalId: number, choiceIndex: number): Promise<ChoiceTally> {
    return this.get<ChoiceTally>(`/proposals/${proposalId}/tallies/${choiceIndex}`);
  }

  getWinner(proposalId: number): Promise<Winner> {
    return this.get<Winner>(`/proposals/${proposalId}/winner`);
  }

  async getHolder(account: string): Promise<HolderStanding> {
    return (await this.get<{ holder: HolderStanding }>(`/holders/${encodeURIComponent(account)}`)).holder;
  }
}
