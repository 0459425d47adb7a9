import { describe, expect, it } from 'vitest';
import { ErrorCode } from '../src/errors/taxonomy.js';
import { createDefaultState } from '../src/infra/storage/defaultState.js';
import { assertAdmin, isAdmin, resolveCaller } from '../src/services/auth.js';
import { testDefaults, thrownBy } from './helpers.js';

describe('resolveCaller', () => {
  it('trims the header value', () => {
    expect(resolveCaller('  holder-vip ')).toBe('holder-vip');
  });

  it('takes the first of repeated headers', () => {
    expect(resolveCaller(['admin', 'holder-vip'])).toBe('admin');
  });

  it('rejects missing or blank values', () => {
    expect(thrownBy(() => resolveCaller(undefined))).toMatchObject({ code: ErrorCode.MissingCaller, statusCode: 401 });
    expect(thrownBy(() => resolveCaller('   '))).toMatchObject({ code: ErrorCode.MissingCaller });
  });
});

describe('admin checks', () => {
  const params = createDefaultState({ ...testDefaults, admins: ['admin', 'admin', 'ops'] }).params;

  it('deduplicates the configured roster', () => {
    expect(params.admins).toEqual(['admin', 'ops']);
  });

  it('accepts roster members only', () => {
    expect(isAdmin(params, 'ops')).toBe(true);
    expect(isAdmin(params, 'holder-vip')).toBe(false);
    expect(thrownBy(() => assertAdmin(params, 'holder-vip'))).toMatchObject({
      code: ErrorCode.Unauthorized,
      statusCode: 403,
      details: { caller: 'holder-vip' },
    });
  });
});
