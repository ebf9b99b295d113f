import { roundHalfEven, type Minor } from '../core/money.js';
import type { Invoice, InvoiceInput, InvoiceLine, InvoiceLineInput, TaxSubtotal } from './types.js';

export function lineTotal(line: Pick<InvoiceLine, 'unitPrice' | 'quantity'>): Minor {
  return roundHalfEven(line.unitPrice * line.quantity);
}

function groupKey(category: string, percent: number): string {
  return `${category}|${percent}`;
}

function withLineTotal(line: InvoiceLineInput): InvoiceLine {
  return { ...line, lineTotal: lineTotal(line) };
}

/**
 * Recomputes line totals, the VAT breakdown (grouped by category and rate in
 * first-seen order) and the document totals. Returns a new invoice; applying
 * it twice gives the same result. Exemption reasons of an existing breakdown
 * are carried over by group.
 */
export function calculateTotals(invoice: InvoiceInput): Invoice {
  const lines = invoice.lines.map(withLineTotal);

  const reasons = new Map<string, string>();
  for (const s of invoice.taxSubtotals ?? []) {
    if (s.exemptionReason) reasons.set(groupKey(s.taxCategory, s.taxPercent), s.exemptionReason);
  }

  const groups = new Map<string, TaxSubtotal>();
  for (const line of lines) {
    const key = groupKey(line.taxCategory, line.taxPercent);
    let group = groups.get(key);
    if (!group) {
      group = { taxCategory: line.taxCategory, taxPercent: line.taxPercent, taxableAmount: 0, taxAmount: 0 };
      const reason = reasons.get(key);
      if (reason) group.exemptionReason = reason;
      groups.set(key, group);
    }
    group.taxableAmount += line.lineTotal;
  }

  const taxSubtotals = [...groups.values()].map((g) => ({
    ...g,
    taxAmount: roundHalfEven((g.taxableAmount * g.taxPercent) / 100),
  }));

  const taxExclusiveAmount = taxSubtotals.reduce((sum, s) => sum + s.taxableAmount, 0);
  const taxAmount = taxSubtotals.reduce((sum, s) => sum + s.taxAmount, 0);
  const taxInclusiveAmount = taxExclusiveAmount + taxAmount;

  return {
    ...invoice,
    invoiceType: invoice.invoiceType ?? '380',
    currency: invoice.currency ?? 'EUR',
    lines,
    taxSubtotals,
    taxExclusiveAmount,
    taxAmount,
    taxInclusiveAmount,
    payableAmount: taxInclusiveAmount,
  };
}

/** New invoice with defaults (type 380, EUR) and all derived amounts. */
export function buildInvoice(input: InvoiceInput): Invoice {
  const invoice = calculateTotals(input);
  if (invoice.bankAccount && !invoice.paymentMeans) invoice.paymentMeans = '30';
  return invoice;
}
