import { z } from 'zod';
import { CodecError } from '../core/errors.js';
import { parseJson, parseWithSchema } from '../core/schema.js';
import { child, isNode, optText, parseXml, text, type XmlNode } from '../core/xml.js';
import { buildUva } from './generator.js';
import { mapKennzahlen, type Uva, type UvaPeriod } from './types.js';

const INT_RE = /^-?\d+$/;

function integer(node: XmlNode, name: string): number {
  const value = text(node, name);
  if (!value) return 0;
  if (!INT_RE.test(value)) throw new CodecError(`${name} is not an integer: "${value}"`);
  return Number(value);
}

/** Reads a U30 document back into a draft return. */
export function parseUvaXml(xmlContent: string | Uint8Array): Uva {
  const doc = parseXml(xmlContent);
  const root = doc['Umsatzsteuervoranmeldung'];
  if (!isNode(root)) throw new CodecError('Not a U30 document: root <Umsatzsteuervoranmeldung> missing');

  const zeitraum = child(root, 'Zeitraum');
  let period: UvaPeriod;
  if (text(zeitraum, 'Monat')) {
    period = { type: 'monthly', value: integer(zeitraum, 'Monat') };
  } else if (text(zeitraum, 'Quartal')) {
    period = { type: 'quarterly', value: integer(zeitraum, 'Quartal') };
  } else {
    throw new CodecError('Zeitraum carries neither Monat nor Quartal');
  }

  const kennzahlen = child(root, 'Kennzahlen');
  const kz = mapKennzahlen((key) => integer(kennzahlen, key.toUpperCase()));

  const uva: Uva = {
    year: integer(zeitraum, 'Jahr'),
    period,
    kz,
    status: 'draft',
  };
  const taxNumber = optText(root, 'Steuernummer');
  if (taxNumber) uva.taxNumber = taxNumber;
  return uva;
}

// ── JSON input ──────────────────────────────────────────────────────────────

const amount = z.number().int().optional();

const uvaJsonSchema = z.object({
  year: z.number().int(),
  period: z.object({
    type: z.enum(['monthly', 'quarterly']),
    value: z.number().int(),
  }),
  tax_number: z.string().optional(),
  kz: z.object({
    kz000: amount, kz001: amount, kz011: amount, kz017: amount, kz018: amount,
    kz019: amount, kz020: amount, kz022: amount, kz029: amount, kz060: amount,
    kz065: amount, kz066: amount, kz070: amount, kz095: amount,
  }).strict(),
});

/**
 * `{ "year": 2025, "period": { "type": "monthly", "value": 1 }, "kz": { "kz017": 80000 } }`
 * with amounts in cents. A `kz095` in the file is kept as given so that
 * validation can compare it with the computed value.
 */
export function parseUvaJson(content: string): Uva {
  const data = parseWithSchema(uvaJsonSchema, parseJson(content, 'UVA JSON'));
  const uva = buildUva({ year: data.year, period: data.period, taxNumber: data.tax_number, kz: data.kz });
  if (data.kz.kz095 !== undefined) uva.kz.kz095 = data.kz.kz095;
  return uva;
}
