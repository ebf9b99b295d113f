import { CodecError } from '../core/errors.js';
import type { InvoiceTypeCode, PaymentMeansCode } from './types.js';

export function invoiceType(value: string): InvoiceTypeCode {
  if (value === '380' || value === '381' || value === '389') return value;
  throw new CodecError(`Unknown invoice type code "${value}"`);
}

export function paymentMeans(value: string): PaymentMeansCode {
  if (value === '30' || value === '49' || value === '48' || value === '10') return value;
  throw new CodecError(`Unknown payment means code "${value}"`);
}

const DECIMAL_RE = /^-?\d+(?:\.\d+)?$/;

function decimal(value: string, what: string): number {
  if (!DECIMAL_RE.test(value)) throw new CodecError(`Invalid ${what}: "${value}"`);
  return Number(value);
}

const EXPONENT_RE = /^(-?)(\d)(?:\.(\d+))?e([+-]\d+)$/;

/**
 * Plain decimal text for a quantity or rate: 5e-7 → "0.0000005",
 * 1e21 → "1000000000000000000000". Parses back to the same number.
 */
export function decimalText(value: number): string {
  const text = String(value);
  const m = EXPONENT_RE.exec(text);
  if (!m) return text;
  const [, sign, lead, frac = '', exp] = m;
  const digits = lead + frac;
  const point = 1 + Number(exp);
  if (point <= 0) return `${sign}0.${'0'.repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${'0'.repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

export function quantity(value: string): number {
  return decimal(value, 'quantity');
}

export function rate(value: string): number {
  return decimal(value, 'tax rate');
}
