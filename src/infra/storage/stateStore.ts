import { AsyncLocalStorage } from 'node:async_hooks';
import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { GovernanceState } from '../../domain/governance/governanceTypes.js';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

const amount = z.number().int().nonnegative();
const proposalStatus = z.enum(['draft', 'chosen', 'passed', 'rejected', 'done', 'cancelled']);
const tier = z.enum(['none', 'bronze', 'silver', 'gold', 'vip']);
const voteMethod = z.enum(['tier_point', 'holding_percentage', 'capped_holding_percentage']);

const voteDetailSchema = z.object({
  id: z.string(),
  proposalId: z.number().int(),
  voter: z.string(),
  choiceIndex: z.number().int().nonnegative(),
  weight: amount,
  method: voteMethod,
  tier,
  holdings: amount,
  castAt: z.string(),
});

// Ballots are keyed by voter address. z.record skips a "__proto__" key, so
// the entries are validated as pairs and rebuilt as own properties.
const ballotsSchema = z.preprocess(
  (raw) => (raw !== null && typeof raw === 'object' && !Array.isArray(raw) ? Object.entries(raw) : raw),
  z.array(z.tuple([z.string(), voteDetailSchema])),
).transform((entries) => Object.fromEntries(entries));

const persistedStateSchema = z.object({
  params: z.object({
    version: z.number().int().positive(),
    admins: z.array(z.string()),
    thresholds: z.object({ vip: amount, gold: amount, silver: amount, bronze: amount }),
    maxCappedPercentage: amount,
    votingDurationMs: amount,
    voteMethod,
    paused: z.boolean(),
    activeProposalId: z.number().int().nullable(),
    updatedAt: z.string(),
  }),
  nextProposalId: z.number().int().positive(),
  currentSessionId: z.number().int().positive(),
  proposals: z.record(z.string(), z.object({
    id: z.number().int().positive(),
    sessionId: z.number().int().positive(),
    creator: z.string(),
    title: z.string(),
    description: z.string(),
    choices: z.array(z.string()),
    status: proposalStatus,
    startTime: z.string().nullable(),
    endTime: z.string().nullable(),
    createdAt: z.string(),
    updatedAt: z.string(),
  })),
  sessions: z.record(z.string(), z.object({
    id: z.number().int().positive(),
    proposalIds: z.array(z.number().int()),
    creators: z.array(z.string()),
    openedAt: z.string(),
    closedAt: z.string().nullable(),
    chosenProposalId: z.number().int().nullable(),
  })),
  votes: z.record(z.string(), ballotsSchema),
  tallies: z.record(z.string(), z.object({
    proposalId: z.number().int(),
    weights: z.array(amount),
    voters: z.array(amount),
  })),
});

const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);

/**
 * Holds the committed governance state and serializes every mutation.
 *
 * Transactions run one at a time against a draft copy; the draft replaces the
 * committed state only after the work resolves and the file write succeeds.
 */
export class StateStore {
  private state: GovernanceState;
  private lock: Promise<void> = Promise.resolve();
  private readonly inTransaction = new AsyncLocalStorage<boolean>();

  constructor(
    private readonly stateFilePath: string,
    private readonly createDefaults: () => GovernanceState,
  ) {
    this.state = createDefaults();
  }

  async init(): Promise<void> {
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
      this.state = this.createDefaults();
      await this.persist(this.state);
      return;
    }

    this.state = persistedStateSchema.parse(JSON.parse(raw));
  }

  snapshot(): GovernanceState {
    return structuredClone(this.state);
  }

  async transaction<T>(work: (state: GovernanceState) => Promise<T> | T): Promise<T> {
    if (this.inTransaction.getStore()) {
      throw new DomainError(
        ErrorCode.ReentrantCall,
        409,
        'A governance operation cannot start while another one is in progress in the same call chain.',
      );
    }

    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      const draft = structuredClone(this.state);
      const result = await this.inTransaction.run(true, () => work(draft));
      await this.persist(draft);
      this.state = draft;
      return result;
    } finally {
      release();
    }
  }

  async flush(): Promise<void> {
    await this.lock;
    await this.persist(this.state);
  }

  private async persist(state: GovernanceState): Promise<void> {
    await fs.writeFile(this.stateFilePath, JSON.stringify(state, null, 2));
  }
}
