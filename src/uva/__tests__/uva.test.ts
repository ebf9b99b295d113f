import { describe, it, expect } from 'vitest';
import { CodecError, ValidationError } from '../../core/errors.js';
import type { UploadKind } from '../../finanzonline/types.js';
import { calculatePayable, periodLabel } from '../calculator.js';
import { submitUva } from '../client.js';
import { buildUva, generateUvaXml } from '../generator.js';
import { parseUvaJson, parseUvaXml } from '../parser.js';
import { validateUva } from '../validator.js';

const january = buildUva({
  year: 2025,
  period: { type: 'monthly', value: 1 },
  kz: { kz017: 80000, kz060: 1600 },
});

describe('calculatePayable', () => {
  it('computes the monthly example', () => {
    expect(january.kz.kz095).toBe(14400);
    expect(january.status).toBe('draft');
  });

  it('drops the fraction of each rate term', () => {
    const kz = { ...january.kz, kz017: 0, kz060: 0, kz018: 15, kz019: 50 };
    // 1.5 → 1, 6.5 → 6
    expect(calculatePayable(kz)).toBe(7);
  });

  it('truncates a 20 % term instead of rounding it', () => {
    const uva = buildUva({ year: 2025, period: { type: 'monthly', value: 1 }, kz: { kz017: 80003 } });
    // 16000.6 → 16000
    expect(uva.kz.kz095).toBe(16000);
    expect(validateUva(uva).valid).toBe(true);
  });

  it('goes negative for a refund', () => {
    const q2 = buildUva({
      year: 2025,
      period: { type: 'quarterly', value: 2 },
      kz: { kz018: 10000, kz019: 10000, kz022: 300, kz029: 1000, kz060: 5000, kz070: 100 },
    });
    // 1000 + 1300 + 300 + 200 - 5100
    expect(q2.kz.kz095).toBe(-2300);
    expect(validateUva(q2).valid).toBe(true);
  });

  it('ignores a caller-supplied KZ095', () => {
    const uva = buildUva({ year: 2025, period: { type: 'monthly', value: 2 }, kz: { kz017: 1000, kz095: 5 } });
    expect(uva.kz.kz095).toBe(200);
  });

  it('labels periods', () => {
    expect(periodLabel(2025, { type: 'monthly', value: 1 })).toBe('2025-01');
    expect(periodLabel(2025, { type: 'quarterly', value: 1 })).toBe('Q1/2025');
  });
});

describe('validateUva', () => {
  it('accepts the monthly example', () => {
    expect(validateUva(january)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it('rejects a stored payable that disagrees with the formula', () => {
    const result = validateUva({ ...january, kz: { ...january.kz, kz095: 100 } });
    expect(result.valid).toBe(false);
    expect(result.errors.map((e) => e.code)).toEqual(['payable_mismatch']);
    expect(result.errors[0].message).toBe('KZ095 is 1.00 but the Kennzahlen give 144.00');
  });

  it('rejects negative inputs and out-of-range periods', () => {
    const result = validateUva({
      ...january,
      year: 1999,
      period: { type: 'monthly', value: 13 },
      kz: { ...january.kz, kz060: -1 },
    });
    expect(result.errors.map((e) => [e.code, e.field])).toEqual([
      ['year_range', 'year'],
      ['period_value', 'period.value'],
      ['negative_amount', 'kz.kz060'],
    ]);
  });

  it('rejects a quarter above 4', () => {
    const result = validateUva({ ...january, period: { type: 'quarterly', value: 5 } });
    expect(result.errors.map((e) => e.code)).toEqual(['period_value']);
  });

  it('warns about a malformed tax number', () => {
    const result = validateUva({ ...january, taxNumber: '123' });
    expect(result.valid).toBe(true);
    expect(result.warnings.map((w) => w.code)).toEqual(['tax_number_format']);
  });
});

describe('U30 XML', () => {
  it('writes period and non-zero Kennzahlen only', () => {
    const xml = generateUvaXml(january);
    expect(xml).toContain('<Umsatzsteuervoranmeldung xmlns="http://www.bmf.gv.at/steuern/fon/u30">');
    expect(xml).toContain('<Monat>01</Monat>');
    expect(xml).toContain('<KZ017>80000</KZ017>');
    expect(xml).toContain('<KZ095>14400</KZ095>');
    expect(xml).not.toContain('<KZ000>');
    expect(xml).not.toContain('<Steuernummer>');
  });

  it('round-trips a monthly return', () => {
    expect(parseUvaXml(generateUvaXml(january))).toEqual(january);
  });

  it('round-trips a quarterly refund with tax number', () => {
    const q4 = buildUva({
      year: 2024,
      period: { type: 'quarterly', value: 4 },
      taxNumber: '12-345/6789',
      kz: { kz000: 500000, kz001: 200000, kz018: 10000, kz060: 9000 },
    });
    const xml = generateUvaXml(q4);
    expect(xml).toContain('<Quartal>4</Quartal>');
    expect(xml).toContain('<KZ095>-8000</KZ095>');
    expect(parseUvaXml(xml)).toEqual(q4);
  });

  it('refuses to serialise an invalid return', () => {
    expect(() => generateUvaXml({ ...january, year: 1990 })).toThrow(ValidationError);
  });

  it('rejects a foreign document', () => {
    expect(() => parseUvaXml('<ZM><Jahr>2025</Jahr></ZM>')).toThrow(CodecError);
    expect(() => parseUvaXml('<Umsatzsteuervoranmeldung><Zeitraum><Jahr>2025</Jahr></Zeitraum></Umsatzsteuervoranmeldung>'))
      .toThrow('Zeitraum carries neither Monat nor Quartal');
  });
});

describe('UVA JSON input', () => {
  it('derives KZ095 when the file has none', () => {
    const uva = parseUvaJson('{"year":2025,"period":{"type":"monthly","value":1},"kz":{"kz017":80000,"kz060":1600}}');
    expect(uva).toEqual(january);
  });

  it('keeps a KZ095 from the file so validation can check it', () => {
    const uva = parseUvaJson('{"year":2025,"period":{"type":"monthly","value":1},"kz":{"kz017":80000,"kz095":99}}');
    expect(uva.kz.kz095).toBe(99);
    expect(validateUva(uva).errors.map((e) => e.code)).toEqual(['payable_mismatch']);
  });

  it('rejects unknown Kennzahlen and broken JSON', () => {
    expect(() => parseUvaJson('{"year":2025,"period":{"type":"monthly","value":1},"kz":{"kz999":1}}'))
      .toThrow(ValidationError);
    expect(() => parseUvaJson('{"year":')).toThrow(CodecError);
  });
});

describe('submitUva', () => {
  function fakeUpload() {
    const sent: { kind: UploadKind; payload: string }[] = [];
    const fo = {
      submit: async (_session: unknown, kind: UploadKind, payload: Uint8Array | string) => {
        sent.push({ kind, payload: String(payload) });
        return { kind, reference: 'BN-1', message: 'OK' };
      },
    };
    return { fo, sent };
  }

  it('uploads the U30 document and records the reference', async () => {
    const { fo, sent } = fakeUpload();
    const submitted = await submitUva(fo, undefined, january);

    expect(submitted.status).toBe('submitted');
    expect(submitted.reference).toBe('BN-1');
    expect(submitted.submittedAt).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(january.status).toBe('draft');
    expect(sent).toHaveLength(1);
    expect(sent[0].kind).toBe('advance-VAT');
    expect(sent[0].payload).toContain('<KZ095>14400</KZ095>');
  });

  it('never uploads the same return twice', async () => {
    const { fo, sent } = fakeUpload();
    const submitted = await submitUva(fo, undefined, january);
    await expect(submitUva(fo, undefined, submitted)).rejects.toMatchObject({ code: 'invalid_transition' });
    expect(sent).toHaveLength(1);
  });

  it('does not upload an invalid return', async () => {
    const { fo, sent } = fakeUpload();
    await expect(submitUva(fo, undefined, { ...january, kz: { ...january.kz, kz095: 0 } })).rejects.toBeInstanceOf(ValidationError);
    expect(sent).toHaveLength(0);
  });
});
