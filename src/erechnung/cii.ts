import { create } from 'xmlbuilder2';
import { CodecError } from '../core/errors.js';
import { formatMinor, parseMinor } from '../core/money.js';
import { attr, child, children, isNode, optChild, optText, parseXml, path, text, type XmlNode } from '../core/xml.js';
import type { XMLBuilder } from '../soap/envelope.js';
import { decimalText, invoiceType, paymentMeans, quantity, rate } from './codes.js';
import type { Invoice, InvoiceLine, InvoiceParty, TaxSubtotal } from './types.js';

export const CII_RSM_NS = 'urn:un:unece:uncefact:data:standard:CrossIndustryInvoice:100';
export const CII_RAM_NS = 'urn:un:unece:uncefact:data:standard:ReusableAggregateBusinessInformationEntity:100';
export const CII_QDT_NS = 'urn:un:unece:uncefact:data:standard:QualifiedDataType:100';
export const CII_UDT_NS = 'urn:un:unece:uncefact:data:standard:UnqualifiedDataType:100';
export const ZUGFERD_GUIDELINE_ID = 'urn:cen.eu:en16931:2017';

// YYYY-MM-DD ⇄ YYYYMMDD (format 102)
function toDate8(iso: string): string {
  return iso.replace(/-/g, '');
}

function fromDate8(s: string): string {
  if (!/^\d{8}$/.test(s)) throw new CodecError(`Invalid date (format 102): "${s}"`);
  return `${s.slice(0, 4)}-${s.slice(4, 6)}-${s.slice(6, 8)}`;
}

function fmt(amount: number): string {
  return formatMinor(amount);
}

function dateTime(parent: XMLBuilder, name: string, iso: string): void {
  parent.ele(name)
    .ele('udt:DateTimeString', { format: '102' }).txt(toDate8(iso)).up()
  .up();
}

// ── Encode ──────────────────────────────────────────────────────────────────

function writeParty(parent: XMLBuilder, name: string, p: InvoiceParty): void {
  const party = parent.ele(name);
  if (p.id) party.ele('ram:ID').txt(p.id).up();
  party.ele('ram:Name').txt(p.name).up();
  if (p.taxId) {
    party.ele('ram:SpecifiedLegalOrganization')
      .ele('ram:ID').txt(p.taxId).up()
    .up();
  }
  if (p.contactName || p.contactPhone) {
    const contact = party.ele('ram:DefinedTradeContact');
    if (p.contactName) contact.ele('ram:PersonName').txt(p.contactName).up();
    if (p.contactPhone) {
      contact.ele('ram:TelephoneUniversalCommunication')
        .ele('ram:CompleteNumber').txt(p.contactPhone).up()
      .up();
    }
    contact.up();
  }

  const address = party.ele('ram:PostalTradeAddress');
  if (p.postalCode) address.ele('ram:PostcodeCode').txt(p.postalCode).up();
  if (p.street) address.ele('ram:LineOne').txt(p.street).up();
  if (p.additionalStreet) address.ele('ram:LineTwo').txt(p.additionalStreet).up();
  if (p.city) address.ele('ram:CityName').txt(p.city).up();
  address.ele('ram:CountryID').txt(p.country).up();
  address.up();

  if (p.email) {
    party.ele('ram:URIUniversalCommunication')
      .ele('ram:URIID', { schemeID: 'EM' }).txt(p.email).up()
    .up();
  }
  if (p.vatNumber) {
    party.ele('ram:SpecifiedTaxRegistration')
      .ele('ram:ID', { schemeID: 'VA' }).txt(p.vatNumber).up()
    .up();
  }
  party.up();
}

function writeLine(trx: XMLBuilder, line: InvoiceLine): void {
  const li = trx.ele('ram:IncludedSupplyChainTradeLineItem');

  li.ele('ram:AssociatedDocumentLineDocument')
    .ele('ram:LineID').txt(line.id).up()
  .up();

  const product = li.ele('ram:SpecifiedTradeProduct');
  if (line.gtin) product.ele('ram:GlobalID', { schemeID: '0160' }).txt(line.gtin).up();
  if (line.itemId) product.ele('ram:SellerAssignedID').txt(line.itemId).up();
  product.ele('ram:Name').txt(line.description).up();
  if (line.detailedDescription) product.ele('ram:Description').txt(line.detailedDescription).up();
  product.up();

  li.ele('ram:SpecifiedLineTradeAgreement')
    .ele('ram:NetPriceProductTradePrice')
      .ele('ram:ChargeAmount').txt(fmt(line.unitPrice)).up()
    .up()
  .up();

  li.ele('ram:SpecifiedLineTradeDelivery')
    .ele('ram:BilledQuantity', { unitCode: line.unitCode }).txt(decimalText(line.quantity)).up()
  .up();

  li.ele('ram:SpecifiedLineTradeSettlement')
    .ele('ram:ApplicableTradeTax')
      .ele('ram:TypeCode').txt('VAT').up()
      .ele('ram:CategoryCode').txt(line.taxCategory).up()
      .ele('ram:RateApplicablePercent').txt(decimalText(line.taxPercent)).up()
    .up()
    .ele('ram:SpecifiedTradeSettlementLineMonetarySummation')
      .ele('ram:LineTotalAmount').txt(fmt(line.lineTotal)).up()
    .up()
  .up();

  li.up();
}

function writeTax(settlement: XMLBuilder, s: TaxSubtotal): void {
  const tax = settlement.ele('ram:ApplicableTradeTax');
  tax.ele('ram:CalculatedAmount').txt(fmt(s.taxAmount)).up();
  tax.ele('ram:TypeCode').txt('VAT').up();
  if (s.exemptionReason) tax.ele('ram:ExemptionReason').txt(s.exemptionReason).up();
  tax.ele('ram:BasisAmount').txt(fmt(s.taxableAmount)).up();
  tax.ele('ram:CategoryCode').txt(s.taxCategory).up();
  tax.ele('ram:RateApplicablePercent').txt(decimalText(s.taxPercent)).up();
  tax.up();
}

/** UN/CEFACT Cross Industry Invoice (ZUGFeRD, EN 16931 profile). */
export function generateZugferd(invoice: Invoice): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('rsm:CrossIndustryInvoice', {
      'xmlns:rsm': CII_RSM_NS,
      'xmlns:ram': CII_RAM_NS,
      'xmlns:qdt': CII_QDT_NS,
      'xmlns:udt': CII_UDT_NS,
    });

  // ── ExchangedDocumentContext ──────────────────────────────────────────
  root.ele('rsm:ExchangedDocumentContext')
    .ele('ram:GuidelineSpecifiedDocumentContextParameter')
      .ele('ram:ID').txt(ZUGFERD_GUIDELINE_ID).up()
    .up()
  .up();

  // ── ExchangedDocument ─────────────────────────────────────────────────
  const doc = root.ele('rsm:ExchangedDocument');
  doc.ele('ram:ID').txt(invoice.id).up();
  doc.ele('ram:TypeCode').txt(invoice.invoiceType).up();
  dateTime(doc, 'ram:IssueDateTime', invoice.issueDate);
  if (invoice.notes) {
    doc.ele('ram:IncludedNote')
      .ele('ram:Content').txt(invoice.notes).up()
    .up();
  }
  doc.up();

  // ── SupplyChainTradeTransaction ───────────────────────────────────────
  const trx = root.ele('rsm:SupplyChainTradeTransaction');
  for (const line of invoice.lines) writeLine(trx, line);

  const agreement = trx.ele('ram:ApplicableHeaderTradeAgreement');
  if (invoice.buyerReference) agreement.ele('ram:BuyerReference').txt(invoice.buyerReference).up();
  writeParty(agreement, 'ram:SellerTradeParty', invoice.seller);
  writeParty(agreement, 'ram:BuyerTradeParty', invoice.buyer);
  if (invoice.orderReference) {
    agreement.ele('ram:BuyerOrderReferencedDocument')
      .ele('ram:IssuerAssignedID').txt(invoice.orderReference).up()
    .up();
  }
  agreement.up();

  trx.ele('ram:ApplicableHeaderTradeDelivery').up();

  const settlement = trx.ele('ram:ApplicableHeaderTradeSettlement');
  settlement.ele('ram:InvoiceCurrencyCode').txt(invoice.currency).up();

  if (invoice.paymentMeans) {
    const means = settlement.ele('ram:SpecifiedTradeSettlementPaymentMeans');
    means.ele('ram:TypeCode').txt(invoice.paymentMeans).up();
    const bank = invoice.bankAccount;
    if (bank) {
      const account = means.ele('ram:PayeePartyCreditorFinancialAccount');
      account.ele('ram:IBANID').txt(bank.iban).up();
      if (bank.name) account.ele('ram:AccountName').txt(bank.name).up();
      account.up();
      if (bank.bic) {
        means.ele('ram:PayeeSpecifiedCreditorFinancialInstitution')
          .ele('ram:BICID').txt(bank.bic).up()
        .up();
      }
    }
    means.up();
  }

  for (const s of invoice.taxSubtotals) writeTax(settlement, s);

  if (invoice.paymentTerms || invoice.dueDate) {
    const terms = settlement.ele('ram:SpecifiedTradePaymentTerms');
    if (invoice.paymentTerms) terms.ele('ram:Description').txt(invoice.paymentTerms).up();
    if (invoice.dueDate) dateTime(terms, 'ram:DueDateDateTime', invoice.dueDate);
    terms.up();
  }

  settlement.ele('ram:SpecifiedTradeSettlementHeaderMonetarySummation')
    .ele('ram:LineTotalAmount').txt(fmt(invoice.taxExclusiveAmount)).up()
    .ele('ram:TaxBasisTotalAmount').txt(fmt(invoice.taxExclusiveAmount)).up()
    .ele('ram:TaxTotalAmount', { currencyID: invoice.currency }).txt(fmt(invoice.taxAmount)).up()
    .ele('ram:GrandTotalAmount').txt(fmt(invoice.taxInclusiveAmount)).up()
    .ele('ram:DuePayableAmount').txt(fmt(invoice.payableAmount)).up()
  .up();

  settlement.up();
  trx.up();

  return root.end({ prettyPrint: true });
}

// ── Decode ──────────────────────────────────────────────────────────────────

function money(node: XmlNode, name: string): number {
  const value = text(node, name);
  if (!value) throw new CodecError(`Missing amount ${name}`);
  return parseMinor(value);
}

function readParty(node: XmlNode): InvoiceParty {
  const address = child(node, 'PostalTradeAddress');
  const contact = child(node, 'DefinedTradeContact');
  return {
    name:             text(node, 'Name'),
    id:               optText(node, 'ID'),
    street:           optText(address, 'LineOne'),
    additionalStreet: optText(address, 'LineTwo'),
    city:             optText(address, 'CityName'),
    postalCode:       optText(address, 'PostcodeCode'),
    country:          text(address, 'CountryID'),
    vatNumber:        optText(child(node, 'SpecifiedTaxRegistration'), 'ID'),
    taxId:            optText(child(node, 'SpecifiedLegalOrganization'), 'ID'),
    email:            optText(child(node, 'URIUniversalCommunication'), 'URIID'),
    contactName:      optText(contact, 'PersonName'),
    contactPhone:     optText(child(contact, 'TelephoneUniversalCommunication'), 'CompleteNumber'),
  };
}

function readLine(node: XmlNode): InvoiceLine {
  const product = child(node, 'SpecifiedTradeProduct');
  const delivery = child(node, 'SpecifiedLineTradeDelivery');
  const settlement = child(node, 'SpecifiedLineTradeSettlement');
  const tax = child(settlement, 'ApplicableTradeTax');
  return {
    id:                  text(child(node, 'AssociatedDocumentLineDocument'), 'LineID'),
    description:         text(product, 'Name'),
    detailedDescription: optText(product, 'Description'),
    quantity:            quantity(text(delivery, 'BilledQuantity')),
    unitCode:            attr(delivery['BilledQuantity'], 'unitCode'),
    unitPrice:           money(path(node, 'SpecifiedLineTradeAgreement', 'NetPriceProductTradePrice'), 'ChargeAmount'),
    lineTotal:           money(child(settlement, 'SpecifiedTradeSettlementLineMonetarySummation'), 'LineTotalAmount'),
    taxCategory:         text(tax, 'CategoryCode'),
    taxPercent:          rate(text(tax, 'RateApplicablePercent')),
    itemId:              optText(product, 'SellerAssignedID'),
    gtin:                optText(product, 'GlobalID'),
  };
}

function readTax(node: XmlNode): TaxSubtotal {
  return {
    taxCategory:     text(node, 'CategoryCode'),
    taxPercent:      rate(text(node, 'RateApplicablePercent')),
    taxableAmount:   money(node, 'BasisAmount'),
    taxAmount:       money(node, 'CalculatedAmount'),
    exemptionReason: optText(node, 'ExemptionReason'),
  };
}

export function isCiiInvoice(doc: XmlNode): boolean {
  return isNode(doc['CrossIndustryInvoice']);
}

export function parseZugferd(xmlContent: string | Uint8Array): Invoice {
  const root = parseXml(xmlContent)['CrossIndustryInvoice'];
  if (!isNode(root)) throw new CodecError('Not a CII invoice: root <CrossIndustryInvoice> missing');

  const doc = optChild(root, 'ExchangedDocument');
  const trx = optChild(root, 'SupplyChainTradeTransaction');
  if (!doc || !trx) throw new CodecError('CII invoice lacks ExchangedDocument or SupplyChainTradeTransaction');

  const agreement = child(trx, 'ApplicableHeaderTradeAgreement');
  const settlement = child(trx, 'ApplicableHeaderTradeSettlement');
  const summation = child(settlement, 'SpecifiedTradeSettlementHeaderMonetarySummation');
  const means = optChild(settlement, 'SpecifiedTradeSettlementPaymentMeans');
  const account = means ? optChild(means, 'PayeePartyCreditorFinancialAccount') : undefined;
  const terms = child(settlement, 'SpecifiedTradePaymentTerms');
  const due = text(child(terms, 'DueDateDateTime'), 'DateTimeString');

  return {
    id:             text(doc, 'ID'),
    invoiceType:    invoiceType(text(doc, 'TypeCode')),
    issueDate:      fromDate8(text(child(doc, 'IssueDateTime'), 'DateTimeString')),
    dueDate:        due ? fromDate8(due) : undefined,
    currency:       text(settlement, 'InvoiceCurrencyCode'),
    buyerReference: optText(agreement, 'BuyerReference'),
    orderReference: optText(child(agreement, 'BuyerOrderReferencedDocument'), 'IssuerAssignedID'),
    seller:         readParty(child(agreement, 'SellerTradeParty')),
    buyer:          readParty(child(agreement, 'BuyerTradeParty')),
    lines:          children(trx, 'IncludedSupplyChainTradeLineItem').map(readLine),
    paymentMeans:   means ? paymentMeans(text(means, 'TypeCode')) : undefined,
    paymentTerms:   optText(terms, 'Description'),
    bankAccount:    account ? {
      iban: text(account, 'IBANID'),
      bic:  optText(child(means, 'PayeeSpecifiedCreditorFinancialInstitution'), 'BICID'),
      name: optText(account, 'AccountName'),
    } : undefined,
    notes:              optText(child(doc, 'IncludedNote'), 'Content'),
    taxSubtotals:       children(settlement, 'ApplicableTradeTax').map(readTax),
    taxExclusiveAmount: money(summation, 'TaxBasisTotalAmount'),
    taxAmount:          money(summation, 'TaxTotalAmount'),
    taxInclusiveAmount: money(summation, 'GrandTotalAmount'),
    payableAmount:      money(summation, 'DuePayableAmount'),
  };
}
