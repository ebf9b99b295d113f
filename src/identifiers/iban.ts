import { lookupAustrianBank } from './bic.js';

const IBAN_RE = /^[A-Z]{2}[0-9]{2}[A-Z0-9]{1,30}$/;

export const IBAN_LENGTHS: Readonly<Record<string, number>> = {
  AT: 20, DE: 22, CH: 21, LI: 21, BE: 16, NL: 18, FR: 27, IT: 27, ES: 24, PT: 25,
  GB: 22, IE: 22, LU: 20, CZ: 24, SK: 24, HU: 28, PL: 28, SI: 19, HR: 21,
};

export type IbanFailure = 'format' | 'unsupported_country' | 'length' | 'checksum';

export type IbanCheck =
  | {
      valid: true;
      iban: string;
      countryCode: string;
      bankCode?: string;
      bic?: string;
      bankName?: string;
    }
  | { valid: false; iban: string; reason: IbanFailure; message: string };

export function normalizeIban(iban: string): string {
  return iban.replace(/\s/g, '').toUpperCase();
}

// A=10 … Z=35, digits unchanged
function expand(s: string): string {
  let out = '';
  for (const ch of s) {
    const code = ch.charCodeAt(0);
    out += code >= 65 && code <= 90 ? String(code - 55) : ch;
  }
  return out;
}

function mod97(numeric: string): number {
  return Number(BigInt(numeric) % 97n);
}

export function validateIban(input: string): IbanCheck {
  const iban = normalizeIban(input);
  if (!IBAN_RE.test(iban)) {
    return { valid: false, iban, reason: 'format', message: 'invalid IBAN format' };
  }
  const countryCode = iban.slice(0, 2);
  const expected = IBAN_LENGTHS[countryCode];
  if (expected === undefined) {
    return { valid: false, iban, reason: 'unsupported_country', message: `unsupported IBAN country ${countryCode}` };
  }
  if (iban.length !== expected) {
    return { valid: false, iban, reason: 'length', message: `IBAN for ${countryCode} must have ${expected} characters` };
  }
  if (mod97(expand(iban.slice(4) + iban.slice(0, 4))) !== 1) {
    return { valid: false, iban, reason: 'checksum', message: 'IBAN check digit validation failed' };
  }

  switch (countryCode) {
    case 'AT': {
      const bankCode = iban.slice(4, 9);
      const bank = lookupAustrianBank(bankCode);
      return { valid: true, iban, countryCode, bankCode, bic: bank?.bic, bankName: bank?.name };
    }
    case 'DE':
      return { valid: true, iban, countryCode, bankCode: iban.slice(4, 12) };
    case 'CH':
    case 'LI':
      return { valid: true, iban, countryCode, bankCode: iban.slice(4, 9) };
    default:
      return { valid: true, iban, countryCode };
  }
}

export function isValidIban(iban: string): boolean {
  return validateIban(iban).valid;
}

/** Builds a full IBAN from country + BBAN by computing the two check digits. */
export function synthesizeIban(countryCode: string, bban: string): string {
  const cc = countryCode.toUpperCase();
  const b = normalizeIban(bban);
  const check = 98 - mod97(expand(b + cc + '00'));
  return `${cc}${String(check).padStart(2, '0')}${b}`;
}

/** Groups of four: "AT61 1904 3002 3457 3201" */
export function formatIban(iban: string): string {
  return normalizeIban(iban).replace(/(.{4})(?=.)/g, '$1 ');
}
