import type { Minor } from '../core/money.js';

/** UNTDID 1001 */
export type InvoiceTypeCode = '380' | '381' | '389';
/** UNCL 4461 */
export type PaymentMeansCode = '30' | '49' | '48' | '10';
export type InvoiceFormat = 'xrechnung' | 'zugferd';

/** UNCL 5305 subset used in Austria: standard, reduced, zero, exempt, reverse charge. */
export const TAX_CATEGORIES = ['S', 'AA', 'Z', 'E', 'AE'] as const;
export type TaxCategory = (typeof TAX_CATEGORIES)[number];

export interface InvoiceParty {
  name: string;
  /** BT-29 / BT-46 */
  id?: string;
  street?: string;
  additionalStreet?: string;
  city?: string;
  postalCode?: string;
  /** ISO 3166-1 alpha-2 */
  country: string;
  vatNumber?: string;
  /** Tax registration (BT-32) */
  taxId?: string;
  email?: string;
  contactName?: string;
  contactPhone?: string;
}

export interface InvoiceLine {
  id: string;
  /** Item name (BT-153) */
  description: string;
  detailedDescription?: string;
  quantity: number;
  /** UN/ECE rec 20, e.g. "C62" piece, "HUR" hour */
  unitCode: string;
  unitPrice: Minor;
  /** round_half_even(unitPrice × quantity); set by calculateTotals */
  lineTotal: Minor;
  taxCategory: string;
  taxPercent: number;
  itemId?: string;
  gtin?: string;
}

export interface TaxSubtotal {
  taxCategory: string;
  taxPercent: number;
  taxableAmount: Minor;
  taxAmount: Minor;
  exemptionReason?: string;
}

export interface BankAccount {
  iban: string;
  bic?: string;
  name?: string;
}

export interface Invoice {
  id: string;
  invoiceType: InvoiceTypeCode;
  /** YYYY-MM-DD */
  issueDate: string;
  dueDate?: string;
  currency: string;
  buyerReference?: string;
  orderReference?: string;
  seller: InvoiceParty;
  buyer: InvoiceParty;
  lines: InvoiceLine[];
  paymentMeans?: PaymentMeansCode;
  paymentTerms?: string;
  bankAccount?: BankAccount;
  notes?: string;
  taxSubtotals: TaxSubtotal[];
  taxExclusiveAmount: Minor;
  taxAmount: Minor;
  taxInclusiveAmount: Minor;
  payableAmount: Minor;
}

/** Builder input: totals are derived, so they may be left out. */
export type InvoiceLineInput = Omit<InvoiceLine, 'lineTotal'> & { lineTotal?: Minor };

export type InvoiceInput =
  Omit<Invoice, 'lines' | 'taxSubtotals' | 'taxExclusiveAmount' | 'taxAmount' | 'taxInclusiveAmount' | 'payableAmount' | 'invoiceType' | 'currency'> & {
    invoiceType?: InvoiceTypeCode;
    currency?: string;
    lines: InvoiceLineInput[];
    taxSubtotals?: TaxSubtotal[];
  };
