/**
 * Austrian social-security numbers (Sozialversicherungsnummer).
 *
 * Ten digits. Digit 10 is the check digit: the weighted sum of digits 1–9
 * (weights 3,7,9,5,8,4,2,1,6) modulo 11. A remainder of 10 is never issued.
 * Digits 5–10 read as DDMMYY give the embedded birth date.
 */

const SVNR_RE = /^\d{10}$/;
const WEIGHTS = [3, 7, 9, 5, 8, 4, 2, 1, 6] as const;

export type SvnrFailure = 'format' | 'check_digit' | 'birth_date';

export type SvnrCheck =
  | { valid: true; svnr: string; birthDate: string }
  | { valid: false; svnr: string; reason: SvnrFailure; message: string };

export function normalizeSvnr(svnr: string): string {
  return svnr.replace(/\s/g, '');
}

export function checkDigit(svnr: string): number {
  let sum = 0;
  for (let i = 0; i < WEIGHTS.length; i++) sum += WEIGHTS[i] * Number(svnr[i]);
  return sum % 11;
}

function expandYear(yy: number, now: Date): number {
  const currentYear = now.getUTCFullYear();
  const year = Math.floor(currentYear / 100) * 100 + yy;
  return year > currentYear ? year - 100 : year;
}

function isRealDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const d = new Date(Date.UTC(year, month - 1, day));
  return d.getUTCFullYear() === year && d.getUTCMonth() === month - 1 && d.getUTCDate() === day;
}

export function validateSvnr(input: string, now = new Date()): SvnrCheck {
  const svnr = normalizeSvnr(input);
  if (!SVNR_RE.test(svnr)) {
    return { valid: false, svnr, reason: 'format', message: 'SV-Nummer must have exactly 10 digits' };
  }
  const expected = checkDigit(svnr);
  if (expected === 10 || expected !== Number(svnr[9])) {
    return { valid: false, svnr, reason: 'check_digit', message: 'SV-Nummer check digit is invalid' };
  }
  const day = Number(svnr.slice(4, 6));
  const month = Number(svnr.slice(6, 8));
  const year = expandYear(Number(svnr.slice(8, 10)), now);
  if (!isRealDate(year, month, day)) {
    return { valid: false, svnr, reason: 'birth_date', message: 'SV-Nummer contains no valid birth date' };
  }
  const birthDate = `${year}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
  return { valid: true, svnr, birthDate };
}

/** ISO birth date (YYYY-MM-DD) embedded in a valid number, or undefined. */
export function extractBirthDate(svnr: string, now = new Date()): string | undefined {
  const result = validateSvnr(svnr, now);
  return result.valid ? result.birthDate : undefined;
}

/** Compares the embedded birth date, century included, with a supplied ISO date. */
export function birthDateMatches(svnr: string, birthDate: string, now = new Date()): boolean {
  return extractBirthDate(svnr, now) === birthDate;
}

/** "1234150189" → "1234 150189" */
export function formatSvnr(svnr: string): string {
  const s = normalizeSvnr(svnr);
  return s.length === 10 ? `${s.slice(0, 4)} ${s.slice(4)}` : s;
}
