import { z } from 'zod';
import { CodecError } from '../core/errors.js';
import { parseJson, parseWithSchema } from '../core/schema.js';
import { parseXml } from '../core/xml.js';
import { buildInvoice } from './calculator.js';
import { isCiiInvoice, parseZugferd } from './cii.js';
import type { Invoice, InvoiceFormat, InvoiceParty } from './types.js';
import { isUblInvoice, parseXRechnung } from './ubl.js';

/** Tells the dialect from the root element. */
export function detectInvoiceFormat(xmlContent: string | Uint8Array): InvoiceFormat {
  const doc = parseXml(xmlContent);
  if (isUblInvoice(doc)) return 'xrechnung';
  if (isCiiInvoice(doc)) return 'zugferd';
  throw new CodecError('Unknown invoice XML: expected a UBL <Invoice> or a CII <CrossIndustryInvoice>');
}

export function parseInvoiceXml(xmlContent: string | Uint8Array): { format: InvoiceFormat; invoice: Invoice } {
  const format = detectInvoiceFormat(xmlContent);
  const invoice = format === 'zugferd' ? parseZugferd(xmlContent) : parseXRechnung(xmlContent);
  return { format, invoice };
}

// ── JSON ────────────────────────────────────────────────────────────────────

const date = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const cents = z.number().int();

const partySchema = z.object({
  name: z.string(),
  id: z.string().optional(),
  street: z.string().optional(),
  additional_street: z.string().optional(),
  city: z.string().optional(),
  postal_code: z.string().optional(),
  country: z.string(),
  vat_number: z.string().optional(),
  tax_id: z.string().optional(),
  email: z.string().optional(),
  contact_name: z.string().optional(),
  contact_phone: z.string().optional(),
});

const lineSchema = z.object({
  id: z.string(),
  description: z.string(),
  detailed_description: z.string().optional(),
  quantity: z.number(),
  unit_code: z.string().default('C62'),
  unit_price: cents,
  line_total: cents.optional(),
  tax_category: z.string(),
  tax_percent: z.number(),
  item_id: z.string().optional(),
  gtin: z.string().optional(),
});

const subtotalSchema = z.object({
  tax_category: z.string(),
  tax_percent: z.number(),
  taxable_amount: cents.optional(),
  tax_amount: cents.optional(),
  exemption_reason: z.string().optional(),
});

const invoiceSchema = z.object({
  id: z.string(),
  invoice_type: z.enum(['380', '381', '389']).default('380'),
  issue_date: date,
  due_date: date.optional(),
  currency: z.string().default('EUR'),
  buyer_reference: z.string().optional(),
  order_reference: z.string().optional(),
  seller: partySchema,
  buyer: partySchema,
  lines: z.array(lineSchema),
  payment_means: z.enum(['30', '49', '48', '10']).optional(),
  payment_terms: z.string().optional(),
  bank_account: z.object({ iban: z.string(), bic: z.string().optional(), name: z.string().optional() }).optional(),
  tax_subtotals: z.array(subtotalSchema).optional(),
  notes: z.string().optional(),
});

type PartyJson = z.infer<typeof partySchema>;

function partyFromJson(p: PartyJson): InvoiceParty {
  return {
    name: p.name,
    id: p.id,
    street: p.street,
    additionalStreet: p.additional_street,
    city: p.city,
    postalCode: p.postal_code,
    country: p.country,
    vatNumber: p.vat_number,
    taxId: p.tax_id,
    email: p.email,
    contactName: p.contact_name,
    contactPhone: p.contact_phone,
  };
}

/** Reads the snake_case invoice JSON; totals in the file are recomputed. */
export function parseInvoiceJson(content: string): Invoice {
  const d = parseWithSchema(invoiceSchema, parseJson(content, 'invoice JSON'));
  return buildInvoice({
    id: d.id,
    invoiceType: d.invoice_type,
    issueDate: d.issue_date,
    dueDate: d.due_date,
    currency: d.currency,
    buyerReference: d.buyer_reference,
    orderReference: d.order_reference,
    seller: partyFromJson(d.seller),
    buyer: partyFromJson(d.buyer),
    lines: d.lines.map((l) => ({
      id: l.id,
      description: l.description,
      detailedDescription: l.detailed_description,
      quantity: l.quantity,
      unitCode: l.unit_code,
      unitPrice: l.unit_price,
      taxCategory: l.tax_category,
      taxPercent: l.tax_percent,
      itemId: l.item_id,
      gtin: l.gtin,
    })),
    paymentMeans: d.payment_means,
    paymentTerms: d.payment_terms,
    bankAccount: d.bank_account,
    taxSubtotals: (d.tax_subtotals ?? []).map((s) => ({
      taxCategory: s.tax_category,
      taxPercent: s.tax_percent,
      taxableAmount: s.taxable_amount ?? 0,
      taxAmount: s.tax_amount ?? 0,
      exemptionReason: s.exemption_reason,
    })),
    notes: d.notes,
  });
}

function partyToJson(p: InvoiceParty) {
  return {
    name: p.name,
    id: p.id,
    street: p.street,
    additional_street: p.additionalStreet,
    city: p.city,
    postal_code: p.postalCode,
    country: p.country,
    vat_number: p.vatNumber,
    tax_id: p.taxId,
    email: p.email,
    contact_name: p.contactName,
    contact_phone: p.contactPhone,
  };
}

/** The snake_case mirror of the model, totals included; absent fields are left out. */
export function invoiceToJson(invoice: Invoice): string {
  return JSON.stringify({
    id: invoice.id,
    invoice_type: invoice.invoiceType,
    issue_date: invoice.issueDate,
    due_date: invoice.dueDate,
    currency: invoice.currency,
    buyer_reference: invoice.buyerReference,
    order_reference: invoice.orderReference,
    seller: partyToJson(invoice.seller),
    buyer: partyToJson(invoice.buyer),
    lines: invoice.lines.map((l) => ({
      id: l.id,
      description: l.description,
      detailed_description: l.detailedDescription,
      quantity: l.quantity,
      unit_code: l.unitCode,
      unit_price: l.unitPrice,
      line_total: l.lineTotal,
      tax_category: l.taxCategory,
      tax_percent: l.taxPercent,
      item_id: l.itemId,
      gtin: l.gtin,
    })),
    payment_means: invoice.paymentMeans,
    payment_terms: invoice.paymentTerms,
    bank_account: invoice.bankAccount,
    tax_subtotals: invoice.taxSubtotals.map((s) => ({
      tax_category: s.taxCategory,
      tax_percent: s.taxPercent,
      taxable_amount: s.taxableAmount,
      tax_amount: s.taxAmount,
      exemption_reason: s.exemptionReason,
    })),
    tax_exclusive_amount: invoice.taxExclusiveAmount,
    tax_amount: invoice.taxAmount,
    tax_inclusive_amount: invoice.taxInclusiveAmount,
    payable_amount: invoice.payableAmount,
    notes: invoice.notes,
  }, null, 2);
}
