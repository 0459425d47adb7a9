import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { AppConfig, config as baseConfig } from '../src/config.js';
import { GovernanceDefaults, createDefaultState } from '../src/infra/storage/defaultState.js';
import { EventLogger } from '../src/infra/logger.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { InMemoryLedgerOracle, LedgerSeed } from '../src/integrations/ledger/ledgerOracle.js';
import { AdminService } from '../src/services/adminService.js';
import { GovernanceService } from '../src/services/governanceService.js';
import { HolderService } from '../src/services/holderService.js';
import { VotingService } from '../src/services/votingService.js';
import { Clock, DAY_MS, toIso } from '../src/utils/time.js';

export const START_MS = Date.parse('2026-03-01T12:00:00.000Z');

export const testDefaults: GovernanceDefaults = {
  admins: ['admin'],
  thresholds: { vip: 1_000_000, gold: 100_000, silver: 10_000, bronze: 1_000 },
  maxCappedPercentage: 30_000,
  votingDurationDays: 7,
  voteMethod: 'tier_point',
};

/**
 * Holdings = balance + locked:
 *   holder-vip 1,100,000 · holder-gold 110,000 · holder-gold-2 150,000
 *   holder-silver 12,000 · holder-bronze 1,200 · holder-none 10
 */
export const testLedgerSeed: LedgerSeed = {
  totalSupply: 10_000_000,
  accounts: {
    'holder-vip': { balance: 900_000, locked: 200_000 },
    'holder-gold': { balance: 50_000, locked: 60_000 },
    'holder-gold-2': { balance: 150_000, locked: 0 },
    'holder-silver': { balance: 12_000, locked: 0 },
    'holder-bronze': { balance: 500, locked: 700 },
    'holder-none': { balance: 10, locked: 0 },
  },
};

export class TestClock {
  constructor(public nowMs = START_MS) {}

  readonly now: Clock = () => this.nowMs;

  advance(ms: number): void {
    this.nowMs += ms;
  }

  iso(): string {
    return toIso(this.nowMs);
  }
}

export const makeTempDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(os.tmpdir(), prefix));

export interface Harness {
  dir: string;
  clock: TestClock;
  store: StateStore;
  ledger: InMemoryLedgerOracle;
  logger: EventLogger;
  admin: AdminService;
  governance: GovernanceService;
  voting: VotingService;
  holders: HolderService;
  cleanup: () => Promise<void>;
}

export async function createHarness(overrides: Partial<GovernanceDefaults> = {}): Promise<Harness> {
  const dir = await makeTempDir('governance-test-');
  const clock = new TestClock();
  const defaults = { ...testDefaults, ...overrides };

  const store = new StateStore(path.join(dir, 'state.json'), () => createDefaultState(defaults, clock.iso()));
  await store.init();

  const logger = new EventLogger(path.join(dir, 'events.ndjson'));
  await logger.init();

  const ledger = new InMemoryLedgerOracle(structuredClone(testLedgerSeed));

  return {
    dir,
    clock,
    store,
    ledger,
    logger,
    admin: new AdminService(store, logger, clock.now),
    governance: new GovernanceService(store, logger, clock.now),
    voting: new VotingService(store, ledger, logger, clock.now),
    holders: new HolderService(store, ledger),
    cleanup: async () => {
      await store.flush();
      await logger.flush();
      await fs.rm(dir, { recursive: true, force: true });
    },
  };
}

export const content = (title: string, choices: string[] = ['Yes', 'No']) => ({
  title,
  description: `${title} description`,
  choices,
});

/** Create a draft as `admin` and select it, returning the chosen proposal id. */
export async function openProposal(h: Harness, choices: string[] = ['Yes', 'No']): Promise<number> {
  const draft = await h.governance.createProposal('admin', content('Open proposal', choices));
  const { proposal } = await h.governance.selectProposal('admin', draft.id, content('Open proposal', choices));
  return proposal.id;
}

export const VOTING_WINDOW_MS = 7 * DAY_MS;

export const makeTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0, logRequests: false },
  paths: {
    dataDir: dir,
    stateFile: path.join(dir, 'state.json'),
    logFile: path.join(dir, 'events.ndjson'),
    ledgerFile: undefined,
  },
  governance: { ...testDefaults, thresholds: { ...testDefaults.thresholds } },
  ledger: { baseUrl: undefined, timeoutMs: 1_000 },
});

/** Runs `fn` and returns what it threw, or undefined. */
export const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};
