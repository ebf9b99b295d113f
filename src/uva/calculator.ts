import type { Minor } from '../core/money.js';
import type { UvaKennzahlen, UvaPeriod } from './types.js';

// Integer cents; each rate term drops its fraction, as FinanzOnline computes it.
function percent(base: Minor, rate: number): Minor {
  return Math.trunc((base * rate) / 100);
}

/**
 * Zahllast (KZ095): output tax at 20/10/13 % plus import VAT plus 20 % on
 * intra-community acquisitions, less all input-tax deductions. Negative means
 * a refund.
 */
export function calculatePayable(kz: Omit<UvaKennzahlen, 'kz095'>): Minor {
  const outputTax =
    percent(kz.kz017, 20) +
    percent(kz.kz018, 10) +
    percent(kz.kz019, 13) +
    kz.kz022 +
    percent(kz.kz029, 20);
  const inputTax = kz.kz060 + kz.kz065 + kz.kz066 + kz.kz070;
  return outputTax - inputTax;
}

/** "2025-01" for a month, "Q1/2025" for a quarter. */
export function periodLabel(year: number, period: UvaPeriod): string {
  return period.type === 'monthly'
    ? `${year}-${String(period.value).padStart(2, '0')}`
    : `Q${period.value}/${year}`;
}
