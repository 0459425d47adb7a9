import fs from 'node:fs/promises';
import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { ErrorCode } from '../src/errors/taxonomy.js';
import {
  LedgerConfigError,
  LedgerHttpError,
  LedgerNetworkError,
  LedgerResponseError,
  mapLedgerError,
} from '../src/integrations/ledger/errorMapping.js';
import { HttpLedgerOracle } from '../src/integrations/ledger/httpLedgerOracle.js';
import { InMemoryLedgerOracle } from '../src/integrations/ledger/ledgerOracle.js';
import { readHolderSnapshot } from '../src/services/holderService.js';
import { makeTempDir } from './helpers.js';

const BASE = 'http://ledger.test';

function mockFetch(status: number, bodyText: string): typeof globalThis.fetch {
  return vi.fn().mockResolvedValue({
    ok: status >= 200 && status < 300,
    status,
    text: async () => bodyText,
  }) as unknown as typeof globalThis.fetch;
}

describe('mapLedgerError', () => {
  it('maps configuration errors to ledger_misconfigured', () => {
    const mapped = mapLedgerError(new LedgerConfigError('missing env'), 'balance');

    expect(mapped.code).toBe(ErrorCode.LedgerMisconfigured);
    expect(mapped.statusCode).toBe(503);
  });

  it('maps upstream failures to ledger_unavailable', () => {
    const mapped = mapLedgerError(new LedgerHttpError('supply', 500, '  maintenance  '), 'supply');

    expect(mapped.code).toBe(ErrorCode.LedgerUnavailable);
    expect(mapped.statusCode).toBe(503);
    expect(mapped.details?.upstreamMessage).toBe('maintenance');
  });

  it('maps network errors to ledger_unavailable', () => {
    const mapped = mapLedgerError(new LedgerNetworkError('balance', 'network down'), 'balance');

    expect(mapped.code).toBe(ErrorCode.LedgerUnavailable);
    expect(mapped.details?.reason).toBe('network down');
  });

  it('maps malformed bodies to invalid_ledger_response', () => {
    const mapped = mapLedgerError(new LedgerResponseError('balance', ['balance: required']), 'balance');

    expect(mapped.code).toBe(ErrorCode.InvalidLedgerResponse);
    expect(mapped.statusCode).toBe(502);
    expect(mapped.details?.issues).toEqual(['balance: required']);
  });

  it('maps anything else to internal_error', () => {
    const mapped = mapLedgerError('weird', 'supply');

    expect(mapped.code).toBe(ErrorCode.InternalError);
    expect(mapped.statusCode).toBe(500);
  });
});

describe('HttpLedgerOracle', () => {
  it('reads account amounts from /accounts/:account', async () => {
    const fetch = mockFetch(200, JSON.stringify({ balance: 1_200, locked: 300 }));
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch });

    expect(await ledger.balanceOf('holder one')).toBe(1_200);
    expect(await ledger.lockedAmount('holder one')).toBe(300);
    expect(fetch).toHaveBeenCalledWith(
      'http://ledger.test/accounts/holder%20one',
      expect.objectContaining({ method: 'GET' }),
    );
  });

  it('reads total supply from /supply', async () => {
    const fetch = mockFetch(200, JSON.stringify({ totalSupply: 10_000_000 }));
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch });

    expect(await ledger.totalSupply()).toBe(10_000_000);
    expect(fetch).toHaveBeenCalledWith('http://ledger.test/supply', expect.anything());
  });

  it('surfaces upstream status codes as ledger_unavailable', async () => {
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch: mockFetch(503, 'down') });

    await expect(ledger.totalSupply()).rejects.toMatchObject({
      code: ErrorCode.LedgerUnavailable,
      statusCode: 503,
      details: { operation: 'supply', upstreamStatus: 503, upstreamMessage: 'down' },
    });
  });

  it('rejects negative amounts as invalid_ledger_response', async () => {
    const fetch = mockFetch(200, JSON.stringify({ balance: -5, locked: 0 }));
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch });

    await expect(ledger.balanceOf('holder')).rejects.toMatchObject({
      code: ErrorCode.InvalidLedgerResponse,
      statusCode: 502,
    });
  });

  it('rejects bodies that are not JSON', async () => {
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch: mockFetch(200, 'not json') });

    await expect(ledger.totalSupply()).rejects.toMatchObject({
      code: ErrorCode.InvalidLedgerResponse,
      details: { issues: ['body is not JSON'] },
    });
  });

  it('maps transport failures to ledger_unavailable', async () => {
    const fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed')) as unknown as typeof globalThis.fetch;
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch });

    await expect(ledger.balanceOf('holder')).rejects.toMatchObject({
      code: ErrorCode.LedgerUnavailable,
      details: { reason: 'Failed to call ledger endpoint.' },
    });
  });

  it('aborts requests that outlive the timeout', async () => {
    const fetch = vi.fn((_url: string | URL | Request, init?: RequestInit) => new Promise<Response>((_resolve, reject) => {
      init?.signal?.addEventListener('abort', () => {
        const abort = new Error('aborted');
        abort.name = 'AbortError';
        reject(abort);
      });
    }));
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 5, fetch });

    await expect(ledger.totalSupply()).rejects.toMatchObject({
      code: ErrorCode.LedgerUnavailable,
      statusCode: 503,
    });
  });

  it('reads an account once per holder snapshot', async () => {
    const fetch = vi.fn(async (url: string | URL | Request) => {
      const body = String(url).endsWith('/supply')
        ? { totalSupply: 10_000_000 }
        : { balance: 1_200, locked: 300 };
      return new Response(JSON.stringify(body), { status: 200 });
    });
    const ledger = new HttpLedgerOracle({ baseUrl: BASE, timeoutMs: 1_000, fetch });

    const snapshot = await readHolderSnapshot(ledger, 'holder');

    expect(snapshot).toEqual({
      account: 'holder',
      balance: 1_200,
      locked: 300,
      holdings: 1_500,
      totalSupply: 10_000_000,
    });
    expect(fetch).toHaveBeenCalledTimes(2);
    expect(fetch.mock.calls.map(([url]) => String(url)).sort()).toEqual([
      'http://ledger.test/accounts/holder',
      'http://ledger.test/supply',
    ]);
  });

  it('reports a missing base URL without calling out', async () => {
    const fetch = mockFetch(200, '{}');
    const ledger = new HttpLedgerOracle({ baseUrl: undefined, timeoutMs: 1_000, fetch });

    await expect(ledger.totalSupply()).rejects.toMatchObject({ code: ErrorCode.LedgerMisconfigured });
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('InMemoryLedgerOracle', () => {
  it('loads a seed file and defaults missing amounts to 0', async () => {
    const dir = await makeTempDir('governance-ledger-');
    const seedFile = path.join(dir, 'ledger.json');
    await fs.writeFile(seedFile, JSON.stringify({
      totalSupply: 5_000,
      accounts: { alice: { balance: 40 }, bob: { balance: 1, locked: 9 } },
    }));

    try {
      const ledger = await InMemoryLedgerOracle.fromFile(seedFile);

      expect(await ledger.totalSupply()).toBe(5_000);
      expect(await ledger.balanceOf('alice')).toBe(40);
      expect(await ledger.lockedAmount('alice')).toBe(0);
      expect(await ledger.lockedAmount('bob')).toBe(9);
      expect(await ledger.balanceOf('nobody')).toBe(0);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('updates accounts in place', async () => {
    const ledger = new InMemoryLedgerOracle({ totalSupply: 100, accounts: { alice: { balance: 5, locked: 1 } } });

    ledger.setAccount('alice', { locked: 7 });
    ledger.setTotalSupply(200);

    expect(await ledger.balanceOf('alice')).toBe(5);
    expect(await ledger.lockedAmount('alice')).toBe(7);
    expect(await ledger.totalSupply()).toBe(200);
    expect(await ledger.accountOf('alice')).toEqual({ balance: 5, locked: 7 });
  });
});
