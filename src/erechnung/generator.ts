import { assertValid } from '../core/errors.js';
import { calculateTotals } from './calculator.js';
import { generateZugferd } from './cii.js';
import type { Invoice, InvoiceFormat } from './types.js';
import { generateXRechnung } from './ubl.js';
import { validateInvoice } from './validator.js';

/**
 * Recalculates the totals, refuses an invalid invoice and renders it in the
 * requested dialect. Both dialects share the same model and totals.
 */
export function generateInvoiceXml(invoice: Invoice, format: InvoiceFormat = 'xrechnung'): string {
  const calculated = calculateTotals(invoice);
  assertValid(validateInvoice(calculated));
  return format === 'zugferd' ? generateZugferd(calculated) : generateXRechnung(calculated);
}
