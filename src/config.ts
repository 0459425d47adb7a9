import dotenv from 'dotenv';
import path from 'node:path';
import { VOTE_METHODS, VoteMethod } from './domain/governance/governanceTypes.js';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

const parseList = (input: string | undefined, fallback: string[]): string[] => {
  if (input === undefined) return fallback;
  const items = input.split(',').map((s) => s.trim()).filter(Boolean);
  return items.length > 0 ? items : fallback;
};

const parseVoteMethod = (input: string | undefined, fallback: VoteMethod): VoteMethod => {
  const match = VOTE_METHODS.find((method) => method === input);
  return match ?? fallback;
};

const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

export const config = {
  app: {
    name: 'tiered-governance-api',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
    logRequests: parseBool(process.env.LOG_REQUESTS, false),
  },
  paths: {
    dataDir,
    stateFile: process.env.STATE_FILE ?? path.join(dataDir, 'state.json'),
    logFile: process.env.LOG_FILE ?? path.join(dataDir, 'events.ndjson'),
    ledgerFile: process.env.LEDGER_FILE,
  },
  governance: {
    admins: parseList(process.env.GOVERNANCE_ADMINS, ['admin']),
    thresholds: {
      vip: parseNumber(process.env.GOVERNANCE_THRESHOLD_VIP, 1_000_000),
      gold: parseNumber(process.env.GOVERNANCE_THRESHOLD_GOLD, 100_000),
      silver: parseNumber(process.env.GOVERNANCE_THRESHOLD_SILVER, 10_000),
      bronze: parseNumber(process.env.GOVERNANCE_THRESHOLD_BRONZE, 1_000),
    },
    maxCappedPercentage: parseNumber(process.env.GOVERNANCE_MAX_CAPPED_PERCENTAGE, 30_000),
    votingDurationDays: parseNumber(process.env.GOVERNANCE_VOTING_DURATION_DAYS, 7),
    voteMethod: parseVoteMethod(process.env.GOVERNANCE_VOTE_METHOD, 'tier_point'),
  },
  ledger: {
    baseUrl: process.env.LEDGER_BASE_URL,
    timeoutMs: parseNumber(process.env.LEDGER_TIMEOUT_MS, 5_000),
  },
};

export type AppConfig = typeof config;
