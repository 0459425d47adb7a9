import { z } from 'zod';
import { LedgerAccount, LedgerOracle } from './ledgerOracle.js';
import {
  LedgerConfigError,
  LedgerHttpError,
  LedgerNetworkError,
  LedgerOperation,
  LedgerResponseError,
  mapLedgerError,
} from './errorMapping.js';

export interface HttpLedgerOracleConfig {
  baseUrl?: string;
  timeoutMs: number;
  fetch?: typeof globalThis.fetch;
}

const amount = z.number().int().nonnegative();
const accountSchema = z.object({ balance: amount, locked: amount });
const supplySchema = z.object({ totalSupply: amount });

/**
 * Ledger oracle backed by a read-only HTTP endpoint:
 *   GET /accounts/:account -> { balance, locked }
 *   GET /supply            -> { totalSupply }
 */
export class HttpLedgerOracle implements LedgerOracle {
  private readonly _fetch: typeof globalThis.fetch;

  constructor(private readonly config: HttpLedgerOracleConfig) {
    this._fetch = config.fetch ?? globalThis.fetch;
  }

  async balanceOf(account: string): Promise<number> {
    return (await this.accountOf(account)).balance;
  }

  async lockedAmount(account: string): Promise<number> {
    return (await this.accountOf(account)).locked;
  }

  async accountOf(account: string): Promise<LedgerAccount> {
    return this.getJson('balance', `/accounts/${encodeURIComponent(account)}`, accountSchema);
  }

  async totalSupply(): Promise<number> {
    const body = await this.getJson('supply', '/supply', supplySchema);
    return body.totalSupply;
  }

  private get baseUrl(): string {
    const baseUrl = this.config.baseUrl?.trim();
    if (!baseUrl) {
      throw new LedgerConfigError('LEDGER_BASE_URL is not configured.', {
        requiredEnv: 'LEDGER_BASE_URL',
      });
    }
    return baseUrl;
  }

  private async getJson<T>(operation: LedgerOperation, endpointPath: string, schema: z.ZodType<T>): Promise<T> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const url = new URL(endpointPath, this.baseUrl).toString();
      let response: Response;
      try {
        response = await this._fetch(url, {
          method: 'GET',
          headers: { accept: 'application/json' },
          signal: controller.signal,
        });
      } catch (error) {
        if (error instanceof Error && error.name === 'AbortError') throw error;
        throw new LedgerNetworkError(operation, 'Failed to call ledger endpoint.');
      }

      const bodyText = await response.text();
      if (!response.ok) {
        throw new LedgerHttpError(operation, response.status, bodyText);
      }

      let body: unknown;
      try {
        body = JSON.parse(bodyText);
      } catch {
        throw new LedgerResponseError(operation, ['body is not JSON']);
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        throw new LedgerResponseError(
          operation,
          parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
        );
      }
      return parsed.data;
    } catch (error) {
      throw mapLedgerError(error, operation);
    } finally {
      clearTimeout(timeout);
    }
  }
}
