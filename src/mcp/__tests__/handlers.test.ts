import { describe, expect, it } from 'vitest';
import { CodecError, ValidationError } from '../../core/errors.js';
import { MemoryCredentialStore } from '../../credentials/store.js';
import type { Account } from '../../credentials/types.js';
import { FinanzOnlineClient } from '../../finanzonline/client.js';
import { soap, stubFetch, type Reply } from '../../soap/__tests__/stubFetch.js';
import { describeError, handleTool, type ToolContext } from '../handlers.js';
import { TOOLS } from '../tools.js';

function context(accounts: Account[] = [], replies: Reply[] = []): ToolContext {
  const stub = stubFetch(replies);
  const store = new MemoryCredentialStore(accounts);
  const client = new FinanzOnlineClient({ fetch: stub.fetch, maxRetries: 0, retryBaseMs: 0 });
  return {
    credentials: () => store,
    finanzOnline: () => client,
    now: () => new Date('2025-04-10T09:30:00Z'),
  };
}

describe('TOOLS', () => {
  it('lists every offline and online tool once', () => {
    expect(TOOLS.map((t) => t.name)).toEqual([
      'iban_validate', 'bic_lookup', 'uid_validate_format', 'svnr_validate', 'fn_validate',
      'uva_calculate', 'uva_generate_xml', 'zm_validate', 'zm_generate_xml',
      'erechnung_calculate', 'erechnung_validate', 'erechnung_generate', 'erechnung_parse',
      'sepa_pain001_generate', 'camt053_parse', 'databox_list', 'dashboard',
    ]);
  });
});

describe('identifier tools', () => {
  it('describes a valid Austrian IBAN with its bank', async () => {
    const text = await handleTool('iban_validate', { iban: 'AT61 1904 3002 3457 3201' }, context());
    expect(text).toBe(
      '✅ AT61 1904 3002 3457 3201 is valid\nCountry: AT\nBank code: 19043\nBank: Bank Austria (Landesdirektion)\nBIC: BKAUATWW',
    );
  });

  it('reports a bad check digit as a result, not an error', async () => {
    expect(await handleTool('iban_validate', { iban: 'AT611904300234573202' }, context()))
      .toBe('❌ AT611904300234573202: IBAN check digit validation failed');
  });

  it('looks up a bank code', async () => {
    expect(await handleTool('bic_lookup', { bank_code: '20111' }, context()))
      .toBe('✅ 20111: Erste Bank der oesterreichischen Sparkassen\nBIC: GIBAATWWXXX');
  });

  it('needs a bank code or a BIC', async () => {
    await expect(handleTool('bic_lookup', {}, context())).rejects.toThrow(ValidationError);
  });

  it('checks an SV number against a birth date', async () => {
    expect(await handleTool('svnr_validate', { svnr: '1234 150189', birth_date: '1989-01-15' }, context()))
      .toBe('✅ 1234 150189 is valid\nBirth date: 1989-01-15\nBirth date 1989-01-15 matches');
  });

  it('normalizes a Firmenbuch number', async () => {
    expect(await handleTool('fn_validate', { fn: 'fn 123456 a' }, context())).toBe('✅ FN123456a is a valid Firmenbuch number');
  });

  it('rejects a missing argument with the field name', async () => {
    const failure = await handleTool('uid_validate_format', {}, context()).catch((e: unknown) => e);
    expect(failure).toBeInstanceOf(ValidationError);
    expect(describeError(failure)).toBe('Validation failed: Required\n  • uid: Required');
  });
});

describe('document tools', () => {
  it('computes KZ095 of a monthly return', async () => {
    const uva = { year: 2025, period: { type: 'monthly', value: 1 }, kz: { kz017: 100000, kz060: 5000 } };
    expect(await handleTool('uva_calculate', { uva }, context()))
      .toBe('UVA 2025-01\nKZ095 (payable): 150.00 EUR\n\nValid.');
  });

  it('flags a partner listed twice in a ZM', async () => {
    const entries = [
      { partner_uid: 'DE123456789', country_code: 'DE', delivery_type: 'L', amount: 100000 },
      { partner_uid: 'DE123456789', country_code: 'DE', delivery_type: 'L', amount: 50000 },
    ];
    expect(await handleTool('zm_validate', { year: 2025, quarter: 1, entries }, context())).toBe(
      'ZM Q1/2025: 2 entries, total 1500.00 EUR\n\n' +
        '1 error(s):\n  - [duplicate_entry] entries[1]: partner DE123456789 with delivery type L is listed twice',
    );
  });

  it('reads ZM entries from CSV text', async () => {
    const csv = 'partner_uid,country_code,delivery_type,amount\nDE123456789,DE,S,25000\n';
    expect(await handleTool('zm_validate', { year: 2025, quarter: 2, csv }, context()))
      .toBe('ZM Q2/2025: 1 entries, total 250.00 EUR\n\nValid.');
  });

  it('refuses XML that is no invoice', async () => {
    await expect(handleTool('erechnung_parse', { xml: '<Order/>' }, context())).rejects.toThrow(CodecError);
  });

  it('rejects an unknown tool', async () => {
    await expect(handleTool('nope', {}, context())).rejects.toThrow('Validation failed: unknown tool "nope"');
  });
});

describe('databox_list', () => {
  const account: Account = { type: 'finanzonline', name: 'main', tid: '123456789012', benid: 'WSUSER', pin: 'test-secret' };
  const entry = (applkey: string, classification: string) =>
    `<databox><applkey>${applkey}</applkey><filebez>${applkey}.pdf</filebez>` +
    `<ts_zust>2025-03-01</ts_zust><erlession>${classification}</erlession><veression>1</veression></databox>`;

  it('lists the single stored account without naming it', async () => {
    const ctx = context([account], [
      soap('LoginResponse', '<rc>0</rc><msg></msg><id>S-1</id>'),
      soap('GetDataboxInfoResponse', `<rc>0</rc><msg></msg><result>${entry('K1', 'B') + entry('K2', 'E')}</result>`),
      soap('LogoutResponse', '<rc>0</rc><msg></msg>'),
    ]);

    expect(await handleTool('databox_list', {}, ctx)).toBe(
      'Databox of "main": 2 documents, 1 require action\n' +
        '  • 2025-03-01 Bescheid: K1.pdf [K1]\n' +
        '  ⚠ 2025-03-01 Ergänzungsersuchen: K2.pdf [K2]',
    );
  });

  it('names the missing account', async () => {
    await expect(handleTool('databox_list', { account: 'other' }, context([account])))
      .rejects.toThrow('Validation failed: no FinanzOnline account named "other"');
  });
});
