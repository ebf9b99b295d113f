import { CodecError, ValidationError, type ValidationIssue } from '../core/errors.js';
import { parseCsv, requireColumns } from '../core/csv.js';
import { children, isNode, parseXml, text, type XmlNode } from '../core/xml.js';
import { buildZm } from './generator.js';
import type { Zm, ZmEntry } from './types.js';
import { isDeliveryType } from './validator.js';

const INT_RE = /^\d+$/;

function integer(node: XmlNode, name: string): number {
  const value = text(node, name);
  if (!INT_RE.test(value)) throw new CodecError(`${name} is not an integer: "${value}"`);
  return Number(value);
}

export function parseZmXml(xmlContent: string | Uint8Array): Zm {
  const doc = parseXml(xmlContent);
  const root = doc['ZM'];
  if (!isNode(root)) throw new CodecError('Not a ZM document: root <ZM> missing');

  const entries = children(root, 'Position').map((p): ZmEntry => {
    const deliveryType = text(p, 'Lieferart');
    if (!isDeliveryType(deliveryType)) throw new CodecError(`Unknown Lieferart "${deliveryType}"`);
    return {
      partnerUid: text(p, 'PartnerUID'),
      countryCode: text(p, 'LandCode'),
      deliveryType,
      amount: integer(p, 'Bemessungsgrundlage'),
    };
  });

  return buildZm(integer(root, 'Jahr'), integer(root, 'Quartal'), entries);
}

/**
 * `partner_uid,country_code,delivery_type,amount` with the amount in cents.
 * Every malformed row is reported, not just the first.
 */
export function parseZmCsv(content: string): ZmEntry[] {
  const { header, rows } = parseCsv(content);
  const col = requireColumns(header, ['partner_uid', 'country_code', 'delivery_type', 'amount']);

  const issues: ValidationIssue[] = [];
  const entries: ZmEntry[] = [];
  rows.forEach((row, i) => {
    const line = i + 2;
    const deliveryType = (row[col.delivery_type] ?? '').toUpperCase();
    const amount = row[col.amount] ?? '';
    if (!isDeliveryType(deliveryType)) {
      issues.push({ code: 'delivery_type', field: `line ${line}`, message: `invalid delivery type "${deliveryType}" (must be L, D, or S)` });
      return;
    }
    if (!INT_RE.test(amount)) {
      issues.push({ code: 'amount', field: `line ${line}`, message: `amount must be whole cents, got "${amount}"` });
      return;
    }
    entries.push({
      partnerUid: (row[col.partner_uid] ?? '').toUpperCase(),
      countryCode: (row[col.country_code] ?? '').toUpperCase(),
      deliveryType,
      amount: Number(amount),
    });
  });

  if (issues.length > 0) throw new ValidationError(issues);
  return entries;
}
