import { toValidationResult, type ValidationIssue, type ValidationResult } from '../core/errors.js';
import { validateIban } from '../identifiers/iban.js';
import { isValidBic } from '../identifiers/bic.js';
import { TAX_CATEGORIES, type Invoice, type InvoiceLine, type InvoiceParty } from './types.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const CURRENCY_RE = /^[A-Z]{3}$/;
const INVOICE_TYPES = new Set(['380', '381', '389']);
const KNOWN_CATEGORIES: ReadonlySet<string> = new Set(TAX_CATEGORIES);

function isDate(value: string | undefined): boolean {
  if (!value || !DATE_RE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

/**
 * EN 16931 business rules. Field paths follow the snake_case invoice JSON,
 * with lines addressed by position: `lines[0].unit_price`.
 */
export function validateInvoice(invoice: Invoice): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const error = (code: string, field: string, message: string) => errors.push({ code, field, message });

  // ── Header ────────────────────────────────────────────────────────────
  if (!invoice.id.trim()) error('BR-02', 'id', 'Invoice number (BT-1) is mandatory');
  if (!invoice.issueDate) error('BR-03', 'issue_date', 'Invoice issue date (BT-2) is mandatory');
  else if (!isDate(invoice.issueDate)) error('BR-03', 'issue_date', 'Invoice issue date (BT-2) must be YYYY-MM-DD');
  if (!INVOICE_TYPES.has(invoice.invoiceType))
    error('BR-04', 'invoice_type', 'Invoice type code (BT-3) must be 380, 381 or 389');
  if (!CURRENCY_RE.test(invoice.currency))
    error('BR-05', 'currency', 'Invoice currency code (BT-5) must be an ISO 4217 code');
  const { dueDate } = invoice;
  if (dueDate !== undefined) {
    if (!isDate(dueDate)) error('BT-9', 'due_date', 'Due date (BT-9) must be YYYY-MM-DD');
    else if (isDate(invoice.issueDate) && dueDate < invoice.issueDate)
      warnings.push({ code: 'due_before_issue', field: 'due_date', message: 'Due date lies before the issue date' });
  }

  // ── Parties ───────────────────────────────────────────────────────────
  checkParty(errors, invoice.seller, 'seller', { name: 'BT-27', country: 'BR-09' });
  checkParty(errors, invoice.buyer, 'buyer', { name: 'BT-44', country: 'BR-11' });
  if (!invoice.seller.vatNumber && !invoice.seller.taxId)
    warnings.push({ code: 'BR-CO-26', field: 'seller.vat_number', message: 'Seller VAT identifier (BT-31) or tax registration (BT-32) is recommended' });

  // ── Lines ─────────────────────────────────────────────────────────────
  if (invoice.lines.length === 0)
    error('BR-16', 'lines', 'Invoice shall have at least one Invoice line (BG-25)');
  const seen = new Set<string>();
  invoice.lines.forEach((line, i) => {
    checkLine(errors, line, `lines[${i}]`);
    if (line.id && seen.has(line.id))
      error('duplicate_line_id', `lines[${i}].id`, `Invoice line identifier "${line.id}" is used twice`);
    seen.add(line.id);
  });

  // ── Payment ───────────────────────────────────────────────────────────
  if (invoice.bankAccount) {
    const iban = validateIban(invoice.bankAccount.iban);
    if (!iban.valid) error('BR-50', 'bank_account.iban', `Payment account identifier (BT-84): ${iban.message}`);
    if (invoice.bankAccount.bic && !isValidBic(invoice.bankAccount.bic))
      error('BT-86', 'bank_account.bic', 'Payment service provider identifier (BT-86) is not a valid BIC');
  }

  return toValidationResult(errors, warnings);
}

function checkParty(
  errors: ValidationIssue[],
  party: InvoiceParty,
  prefix: string,
  codes: { name: string; country: string },
): void {
  if (!party.name.trim())
    errors.push({ code: codes.name, field: `${prefix}.name`, message: `${prefix === 'seller' ? 'Seller' : 'Buyer'} name (${codes.name}) is mandatory` });
  if (!party.country.trim())
    errors.push({ code: codes.country, field: `${prefix}.country`, message: `${prefix === 'seller' ? 'Seller' : 'Buyer'} country code is mandatory` });
}

function checkLine(errors: ValidationIssue[], line: InvoiceLine, prefix: string): void {
  const error = (code: string, field: string, message: string) =>
    errors.push({ code, field: `${prefix}.${field}`, message });

  if (!line.id.trim()) error('BR-21', 'id', 'Invoice line identifier (BT-126) is mandatory');
  if (!Number.isFinite(line.quantity) || line.quantity === 0)
    error('BR-22', 'quantity', 'Invoiced quantity (BT-129) is mandatory');
  if (!line.unitCode.trim()) error('BR-23', 'unit_code', 'Invoiced quantity unit of measure code (BT-130) is mandatory');
  if (!line.description.trim()) error('BR-25', 'description', 'Item name (BT-153) is mandatory');
  if (!Number.isInteger(line.unitPrice) || line.unitPrice <= 0)
    error('BR-26', 'unit_price', 'Item net price (BT-146) must be a positive amount in cents');

  const category = line.taxCategory;
  if (!category) {
    error('BR-CO-18', 'tax_category', 'VAT category code (BT-151) is mandatory');
    return;
  }
  if (!KNOWN_CATEGORIES.has(category)) {
    error('BR-CO-18', 'tax_category', `VAT category code must be one of ${TAX_CATEGORIES.join(', ')}`);
    return;
  }
  switch (category) {
    case 'S':
    case 'AA':
      if (!(line.taxPercent > 0))
        error(`BR-${category}-05`, 'tax_percent', `VAT rate shall be greater than zero for category ${category}`);
      break;
    default:
      if (line.taxPercent !== 0)
        error(`BR-${category}-05`, 'tax_percent', `VAT rate shall be 0 for category ${category}`);
  }
}
