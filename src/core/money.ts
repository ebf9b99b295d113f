import { CodecError } from './errors.js';

/** Signed integer amount in minor units (cents). */
export type Minor = number;

const EPSILON = 1e-9;

/** Round half to even (banker's rounding). */
export function roundHalfEven(value: number): number {
  const floor = Math.floor(value);
  const diff = value - floor;
  if (diff > 0.5 + EPSILON) return floor + 1;
  if (diff < 0.5 - EPSILON) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

/** 12345 → "123.45", -5 → "-0.05" */
export function formatMinor(amount: Minor): string {
  const sign = amount < 0 ? '-' : '';
  const abs = Math.abs(amount);
  const major = Math.trunc(abs / 100);
  const cents = abs % 100;
  return `${sign}${major}.${String(cents).padStart(2, '0')}`;
}

const DECIMAL_RE = /^([+-])?(\d+)(?:[.,](\d+))?$/;

/**
 * Parses a decimal string ("123.45", "12,5", "-7") into minor units without
 * going through a float. More than two fraction digits are rounded half-even.
 */
export function parseMinor(text: string): Minor {
  const m = DECIMAL_RE.exec(text.trim());
  if (!m) throw new CodecError(`Invalid amount: "${text}"`);
  const [, sign, intPart, fracPart = ''] = m;
  const cents2 = (fracPart + '00').slice(0, 2);
  let value = Number(intPart) * 100 + Number(cents2);
  const rest = fracPart.slice(2);
  if (rest.length > 0) {
    const restValue = Number(`0.${rest}`);
    if (restValue > 0.5 || (restValue === 0.5 && value % 2 === 1)) value += 1;
  }
  return sign === '-' ? -value : value;
}
