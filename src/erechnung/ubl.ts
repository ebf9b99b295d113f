import { create } from 'xmlbuilder2';
import { CodecError } from '../core/errors.js';
import { formatMinor, parseMinor } from '../core/money.js';
import { attr, child, children, isNode, optChild, optText, parseXml, text, type XmlNode } from '../core/xml.js';
import type { XMLBuilder } from '../soap/envelope.js';
import { decimalText, invoiceType, paymentMeans, quantity, rate } from './codes.js';
import type { Invoice, InvoiceLine, InvoiceParty, TaxSubtotal } from './types.js';

export const UBL_INVOICE_NS = 'urn:oasis:names:specification:ubl:schema:xsd:Invoice-2';
export const UBL_CAC_NS = 'urn:oasis:names:specification:ubl:schema:xsd:CommonAggregateComponents-2';
export const UBL_CBC_NS = 'urn:oasis:names:specification:ubl:schema:xsd:CommonBasicComponents-2';
export const XRECHNUNG_CUSTOMIZATION_ID = 'urn:cen.eu:en16931:2017#compliant#urn:xoev-de:kosit:standard:xrechnung_2.3';
export const XRECHNUNG_PROFILE_ID = 'urn:fdc:peppol.eu:2017:poacc:billing:01:1.0';

// ── Encode ──────────────────────────────────────────────────────────────────

function amount(parent: XMLBuilder, name: string, value: number, currency: string): void {
  parent.ele(name, { currencyID: currency }).txt(formatMinor(value)).up();
}

function opt(parent: XMLBuilder, name: string, value: string | undefined): void {
  if (value) parent.ele(name).txt(value).up();
}

function writeParty(parent: XMLBuilder, name: string, p: InvoiceParty): void {
  const party = parent.ele(name).ele('cac:Party');

  if (p.id) {
    party.ele('cac:PartyIdentification').ele('cbc:ID').txt(p.id).up().up();
  }
  party.ele('cac:PartyName').ele('cbc:Name').txt(p.name).up().up();

  const address = party.ele('cac:PostalAddress');
  opt(address, 'cbc:StreetName', p.street);
  opt(address, 'cbc:AdditionalStreetName', p.additionalStreet);
  opt(address, 'cbc:CityName', p.city);
  opt(address, 'cbc:PostalZone', p.postalCode);
  address.ele('cac:Country').ele('cbc:IdentificationCode').txt(p.country).up().up();
  address.up();

  if (p.vatNumber) {
    party.ele('cac:PartyTaxScheme')
      .ele('cbc:CompanyID').txt(p.vatNumber).up()
      .ele('cac:TaxScheme').ele('cbc:ID').txt('VAT').up().up()
    .up();
  }
  if (p.taxId) {
    party.ele('cac:PartyLegalEntity')
      .ele('cbc:RegistrationName').txt(p.name).up()
      .ele('cbc:CompanyID').txt(p.taxId).up()
    .up();
  }
  if (p.contactName || p.contactPhone || p.email) {
    const contact = party.ele('cac:Contact');
    opt(contact, 'cbc:Name', p.contactName);
    opt(contact, 'cbc:Telephone', p.contactPhone);
    opt(contact, 'cbc:ElectronicMail', p.email);
    contact.up();
  }
  party.up().up();
}

function writeTaxCategory(parent: XMLBuilder, name: string, category: string, percent: number, reason?: string): void {
  const el = parent.ele(name);
  el.ele('cbc:ID').txt(category).up();
  el.ele('cbc:Percent').txt(decimalText(percent)).up();
  opt(el, 'cbc:TaxExemptionReason', reason);
  el.ele('cac:TaxScheme').ele('cbc:ID').txt('VAT').up().up();
  el.up();
}

function writeLine(parent: XMLBuilder, line: InvoiceLine, currency: string): void {
  const el = parent.ele('cac:InvoiceLine');
  el.ele('cbc:ID').txt(line.id).up();
  el.ele('cbc:InvoicedQuantity', { unitCode: line.unitCode }).txt(decimalText(line.quantity)).up();
  amount(el, 'cbc:LineExtensionAmount', line.lineTotal, currency);

  const item = el.ele('cac:Item');
  opt(item, 'cbc:Description', line.detailedDescription);
  item.ele('cbc:Name').txt(line.description).up();
  if (line.itemId) item.ele('cac:SellersItemIdentification').ele('cbc:ID').txt(line.itemId).up().up();
  if (line.gtin) item.ele('cac:StandardItemIdentification').ele('cbc:ID', { schemeID: '0160' }).txt(line.gtin).up().up();
  writeTaxCategory(item, 'cac:ClassifiedTaxCategory', line.taxCategory, line.taxPercent);
  item.up();

  const price = el.ele('cac:Price');
  amount(price, 'cbc:PriceAmount', line.unitPrice, currency);
  price.up();
  el.up();
}

/** UBL 2.1 invoice with the XRechnung customization. Totals are written as given. */
export function generateXRechnung(invoice: Invoice): string {
  const cur = invoice.currency;
  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('Invoice', {
      xmlns: UBL_INVOICE_NS,
      'xmlns:cac': UBL_CAC_NS,
      'xmlns:cbc': UBL_CBC_NS,
    });

  root.ele('cbc:CustomizationID').txt(XRECHNUNG_CUSTOMIZATION_ID).up();
  root.ele('cbc:ProfileID').txt(XRECHNUNG_PROFILE_ID).up();
  root.ele('cbc:ID').txt(invoice.id).up();
  root.ele('cbc:IssueDate').txt(invoice.issueDate).up();
  opt(root, 'cbc:DueDate', invoice.dueDate);
  root.ele('cbc:InvoiceTypeCode').txt(invoice.invoiceType).up();
  opt(root, 'cbc:Note', invoice.notes);
  root.ele('cbc:DocumentCurrencyCode').txt(cur).up();
  opt(root, 'cbc:BuyerReference', invoice.buyerReference);
  if (invoice.orderReference) {
    root.ele('cac:OrderReference').ele('cbc:ID').txt(invoice.orderReference).up().up();
  }

  writeParty(root, 'cac:AccountingSupplierParty', invoice.seller);
  writeParty(root, 'cac:AccountingCustomerParty', invoice.buyer);

  if (invoice.paymentMeans) {
    const means = root.ele('cac:PaymentMeans');
    means.ele('cbc:PaymentMeansCode').txt(invoice.paymentMeans).up();
    const bank = invoice.bankAccount;
    if (bank) {
      const account = means.ele('cac:PayeeFinancialAccount');
      account.ele('cbc:ID').txt(bank.iban).up();
      opt(account, 'cbc:Name', bank.name);
      if (bank.bic) account.ele('cac:FinancialInstitutionBranch').ele('cbc:ID').txt(bank.bic).up().up();
      account.up();
    }
    means.up();
  }
  if (invoice.paymentTerms) {
    root.ele('cac:PaymentTerms').ele('cbc:Note').txt(invoice.paymentTerms).up().up();
  }

  // ── Tax breakdown ─────────────────────────────────────────────────────
  const taxTotal = root.ele('cac:TaxTotal');
  amount(taxTotal, 'cbc:TaxAmount', invoice.taxAmount, cur);
  for (const s of invoice.taxSubtotals) {
    const sub = taxTotal.ele('cac:TaxSubtotal');
    amount(sub, 'cbc:TaxableAmount', s.taxableAmount, cur);
    amount(sub, 'cbc:TaxAmount', s.taxAmount, cur);
    writeTaxCategory(sub, 'cac:TaxCategory', s.taxCategory, s.taxPercent, s.exemptionReason);
    sub.up();
  }
  taxTotal.up();

  const totals = root.ele('cac:LegalMonetaryTotal');
  amount(totals, 'cbc:LineExtensionAmount', invoice.taxExclusiveAmount, cur);
  amount(totals, 'cbc:TaxExclusiveAmount', invoice.taxExclusiveAmount, cur);
  amount(totals, 'cbc:TaxInclusiveAmount', invoice.taxInclusiveAmount, cur);
  amount(totals, 'cbc:PayableAmount', invoice.payableAmount, cur);
  totals.up();

  for (const line of invoice.lines) writeLine(root, line, cur);

  return root.end({ prettyPrint: true });
}

// ── Decode ──────────────────────────────────────────────────────────────────

function money(node: XmlNode, name: string): number {
  const value = text(node, name);
  if (!value) throw new CodecError(`Missing amount ${name}`);
  return parseMinor(value);
}

function readParty(node: XmlNode): InvoiceParty {
  const p = child(node, 'Party');
  const address = child(p, 'PostalAddress');
  const contact = child(p, 'Contact');
  return {
    name:             text(child(p, 'PartyName'), 'Name'),
    id:               optText(child(p, 'PartyIdentification'), 'ID'),
    street:           optText(address, 'StreetName'),
    additionalStreet: optText(address, 'AdditionalStreetName'),
    city:             optText(address, 'CityName'),
    postalCode:       optText(address, 'PostalZone'),
    country:          text(child(address, 'Country'), 'IdentificationCode'),
    vatNumber:        optText(child(p, 'PartyTaxScheme'), 'CompanyID'),
    taxId:            optText(child(p, 'PartyLegalEntity'), 'CompanyID'),
    email:            optText(contact, 'ElectronicMail'),
    contactName:      optText(contact, 'Name'),
    contactPhone:     optText(contact, 'Telephone'),
  };
}

function readLine(node: XmlNode): InvoiceLine {
  const item = child(node, 'Item');
  const category = child(item, 'ClassifiedTaxCategory');
  const qty = node['InvoicedQuantity'];
  return {
    id:                  text(node, 'ID'),
    description:         text(item, 'Name'),
    detailedDescription: optText(item, 'Description'),
    quantity:            quantity(text(node, 'InvoicedQuantity')),
    unitCode:            attr(qty, 'unitCode'),
    unitPrice:           money(child(node, 'Price'), 'PriceAmount'),
    lineTotal:           money(node, 'LineExtensionAmount'),
    taxCategory:         text(category, 'ID'),
    taxPercent:          rate(text(category, 'Percent')),
    itemId:              optText(child(item, 'SellersItemIdentification'), 'ID'),
    gtin:                optText(child(item, 'StandardItemIdentification'), 'ID'),
  };
}

function readSubtotal(node: XmlNode): TaxSubtotal {
  const category = child(node, 'TaxCategory');
  return {
    taxCategory:     text(category, 'ID'),
    taxPercent:      rate(text(category, 'Percent')),
    taxableAmount:   money(node, 'TaxableAmount'),
    taxAmount:       money(node, 'TaxAmount'),
    exemptionReason: optText(category, 'TaxExemptionReason'),
  };
}

export function isUblInvoice(doc: XmlNode): boolean {
  return isNode(doc['Invoice']);
}

export function parseXRechnung(xmlContent: string | Uint8Array): Invoice {
  const root = parseXml(xmlContent)['Invoice'];
  if (!isNode(root)) throw new CodecError('Not a UBL invoice: root <Invoice> missing');

  const totals = child(root, 'LegalMonetaryTotal');
  const taxTotal = child(root, 'TaxTotal');
  const means = optChild(root, 'PaymentMeans');
  const account = means ? optChild(means, 'PayeeFinancialAccount') : undefined;

  return {
    id:             text(root, 'ID'),
    invoiceType:    invoiceType(text(root, 'InvoiceTypeCode')),
    issueDate:      text(root, 'IssueDate'),
    dueDate:        optText(root, 'DueDate'),
    currency:       text(root, 'DocumentCurrencyCode'),
    buyerReference: optText(root, 'BuyerReference'),
    orderReference: optText(child(root, 'OrderReference'), 'ID'),
    seller:         readParty(child(root, 'AccountingSupplierParty')),
    buyer:          readParty(child(root, 'AccountingCustomerParty')),
    lines:          children(root, 'InvoiceLine').map(readLine),
    paymentMeans:   means ? paymentMeans(text(means, 'PaymentMeansCode')) : undefined,
    paymentTerms:   optText(child(root, 'PaymentTerms'), 'Note'),
    bankAccount:    account ? {
      iban: text(account, 'ID'),
      bic:  optText(child(account, 'FinancialInstitutionBranch'), 'ID'),
      name: optText(account, 'Name'),
    } : undefined,
    notes:              optText(root, 'Note'),
    taxSubtotals:       children(taxTotal, 'TaxSubtotal').map(readSubtotal),
    taxExclusiveAmount: money(totals, 'TaxExclusiveAmount'),
    taxAmount:          money(taxTotal, 'TaxAmount'),
    taxInclusiveAmount: money(totals, 'TaxInclusiveAmount'),
    payableAmount:      money(totals, 'PayableAmount'),
  };
}
