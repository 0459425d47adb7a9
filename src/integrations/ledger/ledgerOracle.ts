import fs from 'node:fs/promises';
import { z } from 'zod';

/**
 * Read-only view of the asset ledger. Amounts are non-negative integers in
 * ledger base units. Implementations must not call back into governance.
 */
export interface LedgerAccount {
  balance: number;
  locked: number;
}

export interface LedgerOracle {
  balanceOf(account: string): Promise<number>;
  lockedAmount(account: string): Promise<number>;
  totalSupply(): Promise<number>;
  /** Balance and locked amount from one consistent read, where the ledger offers one. */
  accountOf?(account: string): Promise<LedgerAccount>;
}

const amount = z.number().int().nonnegative();

export const ledgerSeedSchema = z.object({
  totalSupply: amount,
  accounts: z.record(z.string(), z.object({
    balance: amount.default(0),
    locked: amount.default(0),
  })).default({}),
});

export type LedgerSeed = z.infer<typeof ledgerSeedSchema>;

export class InMemoryLedgerOracle implements LedgerOracle {
  private readonly accounts: Map<string, LedgerAccount> = new Map();
  private supply: number;

  constructor(seed: LedgerSeed = { totalSupply: 0, accounts: {} }) {
    this.supply = seed.totalSupply;
    for (const [account, entry] of Object.entries(seed.accounts)) {
      this.accounts.set(account, { balance: entry.balance, locked: entry.locked });
    }
  }

  static async fromFile(filePath: string): Promise<InMemoryLedgerOracle> {
    const raw = await fs.readFile(filePath, 'utf-8');
    return new InMemoryLedgerOracle(ledgerSeedSchema.parse(JSON.parse(raw)));
  }

  async balanceOf(account: string): Promise<number> {
    return this.accounts.get(account)?.balance ?? 0;
  }

  async lockedAmount(account: string): Promise<number> {
    return this.accounts.get(account)?.locked ?? 0;
  }

  async totalSupply(): Promise<number> {
    return this.supply;
  }

  async accountOf(account: string): Promise<LedgerAccount> {
    return { ...(this.accounts.get(account) ?? { balance: 0, locked: 0 }) };
  }

  /** Replace an account's amounts. */
  setAccount(account: string, entry: Partial<LedgerAccount>): void {
    const current = this.accounts.get(account) ?? { balance: 0, locked: 0 };
    this.accounts.set(account, { ...current, ...entry });
  }

  setTotalSupply(totalSupply: number): void {
    this.supply = totalSupply;
  }
}
