import { describe, it, expect } from 'vitest';
import { CodecError, ValidationError } from '../../core/errors.js';
import { submitZm } from '../client.js';
import { buildZm, generateZmXml, totalAmount, zmPeriodLabel } from '../generator.js';
import { parseZmCsv, parseZmXml } from '../parser.js';
import type { ZmEntry } from '../types.js';
import { validateZm } from '../validator.js';

const entries: ZmEntry[] = [
  { partnerUid: 'DE123456789', countryCode: 'DE', deliveryType: 'L', amount: 500000 },
  { partnerUid: 'FR12345678901', countryCode: 'FR', deliveryType: 'S', amount: 250000 },
];

const q1 = buildZm(2025, 1, entries);

describe('validateZm', () => {
  it('accepts the first-quarter statement', () => {
    expect(validateZm(q1)).toEqual({ valid: true, errors: [], warnings: [] });
    expect(totalAmount(q1)).toBe(750000);
    expect(zmPeriodLabel(q1)).toBe('Q1/2025');
  });

  it('rejects an Austrian partner', () => {
    const zm = buildZm(2025, 1, [...entries, { partnerUid: 'ATU12345678', countryCode: 'AT', deliveryType: 'L', amount: 1000 }]);
    const result = validateZm(zm);
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.code, e.field])).toEqual([
      ['partner_uid', 'entries[2].partnerUid'],
      ['country_code', 'entries[2].countryCode'],
    ]);
  });

  it('rejects an Austrian UID under a foreign country code', () => {
    const result = validateZm(buildZm(2025, 1, [{ partnerUid: 'ATU12345678', countryCode: 'DE', deliveryType: 'L', amount: 1000 }]));
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => [e.code, e.message])).toEqual([
      ['partner_uid', 'Austrian UIDs are not allowed in ZM (intra-community only)'],
    ]);
    expect(result.warnings).toEqual([]);
  });

  it('rejects an empty statement and a bad quarter', () => {
    const result = validateZm(buildZm(2025, 5));
    expect(result.errors.map((e) => e.code)).toEqual(['quarter_range', 'entries_empty']);
  });

  it('checks every entry field', () => {
    const result = validateZm(buildZm(2101, 2, [
      { partnerUid: 'DE12', countryCode: 'D', deliveryType: 'L', amount: 0 },
    ]));
    expect(result.errors.map((e) => e.code)).toEqual(['year_range', 'partner_uid', 'country_code', 'amount']);
  });

  it('rejects the same partner twice with one delivery type', () => {
    const result = validateZm(buildZm(2025, 1, [...entries, { ...entries[0], amount: 100 }]));
    expect(result.errors.map((e) => [e.code, e.field])).toEqual([['duplicate_entry', 'entries[2]']]);
  });

  it('allows the same partner with another delivery type', () => {
    expect(validateZm(buildZm(2025, 1, [...entries, { ...entries[0], deliveryType: 'D' }])).valid).toBe(true);
  });

  it('warns on prefixes without a format rule and on mismatching countries', () => {
    const result = validateZm(buildZm(2025, 1, [
      { partnerUid: 'SE123456789001', countryCode: 'SE', deliveryType: 'S', amount: 10 },
      { partnerUid: 'DE123456789', countryCode: 'NL', deliveryType: 'S', amount: 10 },
    ]));
    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['partner_uid_unchecked', 'uid_country_mismatch']);
  });
});

describe('ZM XML', () => {
  it('writes one Position per entry with amounts in cents', () => {
    const xml = generateZmXml(q1);
    expect(xml).toContain('<Jahr>2025</Jahr>');
    expect(xml).toContain('<Quartal>1</Quartal>');
    expect(xml).toContain('<PartnerUID>FR12345678901</PartnerUID>');
    expect(xml).toContain('<Bemessungsgrundlage>500000</Bemessungsgrundlage>');
    expect(xml.match(/<Position>/g)).toHaveLength(2);
  });

  it('round-trips', () => {
    expect(parseZmXml(generateZmXml(q1))).toEqual(q1);
  });

  it('reads a single Position', () => {
    const zm = parseZmXml(
      '<ZM><Jahr>2025</Jahr><Quartal>3</Quartal><Position><PartnerUID>DE123456789</PartnerUID>' +
      '<LandCode>DE</LandCode><Lieferart>D</Lieferart><Bemessungsgrundlage>12</Bemessungsgrundlage></Position></ZM>',
    );
    expect(zm.entries).toEqual([{ partnerUid: 'DE123456789', countryCode: 'DE', deliveryType: 'D', amount: 12 }]);
  });

  it('rejects an unknown Lieferart', () => {
    expect(() => parseZmXml('<ZM><Jahr>2025</Jahr><Quartal>1</Quartal><Position><Lieferart>X</Lieferart></Position></ZM>'))
      .toThrow(CodecError);
  });
});

describe('ZM CSV', () => {
  it('imports entries', () => {
    const csv = 'partner_uid,country_code,delivery_type,amount\nde123456789,de,l,500000\r\nFR12345678901,FR,S,250000\n';
    expect(parseZmCsv(csv)).toEqual(entries);
  });

  it('reports every malformed row', () => {
    const csv = 'partner_uid,country_code,delivery_type,amount\nDE123456789,DE,X,1\nDE123456789,DE,L,12.50\n';
    const err = (() => {
      try {
        parseZmCsv(csv);
        return undefined;
      } catch (e) {
        return e;
      }
    })();
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({
      issues: [
        { code: 'delivery_type', field: 'line 2' },
        { code: 'amount', field: 'line 3' },
      ],
    });
  });

  it('requires all columns', () => {
    expect(() => parseZmCsv('partner_uid,amount\nDE123456789,1\n')).toThrow('Validation failed with 2 issues');
  });
});

describe('submitZm', () => {
  it('uploads and moves the statement to submitted', async () => {
    const kinds: string[] = [];
    const fo = {
      submit: async (_s: unknown, kind: 'advance-VAT' | 'recapitulative-statement') => {
        kinds.push(kind);
        return { kind, reference: 'ZM-77', message: 'OK' };
      },
    };
    const submitted = await submitZm(fo, undefined, q1);
    expect(kinds).toEqual(['recapitulative-statement']);
    expect(submitted).toMatchObject({ status: 'submitted', reference: 'ZM-77' });
  });
});
