import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

const BIC_RE = /^[A-Z]{4}[A-Z]{2}[A-Z0-9]{2}([A-Z0-9]{3})?$/;

export interface BankInfo {
  bankCode: string;
  bic: string;
  name: string;
}

export function normalizeBic(bic: string): string {
  return bic.replace(/\s/g, '').toUpperCase();
}

/** 4 letters bank, 2 letters country, 2 alphanumerics location, optional 3 branch. */
export function isValidBic(bic: string): boolean {
  return BIC_RE.test(normalizeBic(bic));
}

export function bicCountry(bic: string): string {
  return normalizeBic(bic).slice(4, 6);
}

// Lazily loaded: data/at-banks.json sits two levels above both src/ and dist/ files.
let registry: Map<string, BankInfo> | undefined;

function loadRegistry(): Map<string, BankInfo> {
  if (registry) return registry;
  const file = fileURLToPath(new URL('../../data/at-banks.json', import.meta.url));
  const raw: unknown = JSON.parse(readFileSync(file, 'utf-8'));
  const map = new Map<string, BankInfo>();
  if (typeof raw === 'object' && raw !== null) {
    for (const [bankCode, entry] of Object.entries(raw)) {
      if (typeof entry !== 'object' || entry === null) continue;
      const bic = 'bic' in entry && typeof entry.bic === 'string' ? entry.bic : '';
      const name = 'name' in entry && typeof entry.name === 'string' ? entry.name : '';
      if (bic) map.set(bankCode, { bankCode, bic, name });
    }
  }
  registry = map;
  return map;
}

/** Looks up an Austrian bank by its 5-digit Bankleitzahl. */
export function lookupAustrianBank(bankCode: string): BankInfo | undefined {
  return loadRegistry().get(bankCode);
}
