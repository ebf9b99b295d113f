import { toValidationResult, type ValidationIssue, type ValidationResult } from '../core/errors.js';
import { formatMinor } from '../core/money.js';
import { calculatePayable } from './calculator.js';
import { KENNZAHL_KEYS, type Uva } from './types.js';

const TAX_NUMBER_RE = /^\d{2}[-\s]?\d{3}\/?\d{4}$/;

export function validateUva(uva: Uva): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  // ── Zeitraum ──────────────────────────────────────────────────────────
  if (!Number.isInteger(uva.year) || uva.year < 2000 || uva.year > 2100)
    errors.push({ code: 'year_range', field: 'year', message: 'year must be between 2000 and 2100' });

  const { type, value } = uva.period;
  if (type === 'monthly') {
    if (!Number.isInteger(value) || value < 1 || value > 12)
      errors.push({ code: 'period_value', field: 'period.value', message: 'month must be between 1 and 12' });
  } else if (type === 'quarterly') {
    if (!Number.isInteger(value) || value < 1 || value > 4)
      errors.push({ code: 'period_value', field: 'period.value', message: 'quarter must be between 1 and 4' });
  } else {
    errors.push({ code: 'period_type', field: 'period.type', message: "period type must be 'monthly' or 'quarterly'" });
  }

  if (uva.taxNumber !== undefined && !TAX_NUMBER_RE.test(uva.taxNumber.trim()))
    warnings.push({ code: 'tax_number_format', field: 'taxNumber', message: 'Steuernummer should have 9 digits (FA-Nr + 7)' });

  // ── Kennzahlen ────────────────────────────────────────────────────────
  for (const key of KENNZAHL_KEYS) {
    const amount = uva.kz[key];
    const field = `kz.${key}`;
    if (!Number.isSafeInteger(amount)) {
      errors.push({ code: 'invalid_amount', field, message: `${key.toUpperCase()} must be an integer amount in cents` });
    } else if (key !== 'kz095' && amount < 0) {
      errors.push({ code: 'negative_amount', field, message: `${key.toUpperCase()} must be non-negative` });
    }
  }

  if (errors.length === 0) {
    const expected = calculatePayable(uva.kz);
    if (uva.kz.kz095 !== expected) {
      errors.push({
        code: 'payable_mismatch',
        field: 'kz.kz095',
        message: `KZ095 is ${formatMinor(uva.kz.kz095)} but the Kennzahlen give ${formatMinor(expected)}`,
      });
    }
  }

  return toValidationResult(errors, warnings);
}
