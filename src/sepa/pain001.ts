import { create } from 'xmlbuilder2';
import { assertValid, CodecError, ValidationError, type ValidationIssue } from '../core/errors.js';
import { parseCsv, requireColumns } from '../core/csv.js';
import { formatMinor, parseMinor } from '../core/money.js';
import type { XMLBuilder } from '../soap/envelope.js';
import type { CreditTransactionInput, CreditTransfer, CreditTransferInput, SepaAccount, SepaParty } from './types.js';
import { validateCreditTransfer } from './validator.js';

export const PAIN001_NS = 'urn:iso:std:iso:20022:tech:xsd:pain.001.001.03';

/** `YYYY-MM-DDTHH:mm:ss` in UTC. */
export function isoSeconds(date: Date): string {
  return date.toISOString().slice(0, 19);
}

/** Missing end-to-end ids become `<messageId>-<n>`, numbered from 1. */
export function endToEndIdFor(messageId: string, index: number): string {
  return `${messageId}-${index + 1}`;
}

/** Fills defaults and derives the transaction count and control sum. */
export function buildCreditTransfer(input: CreditTransferInput, now = new Date()): CreditTransfer {
  const creationTime = input.creationTime ?? isoSeconds(now);
  const transactions = input.transactions.map((tx, i) => ({
    ...tx,
    endToEndId: tx.endToEndId?.trim() || endToEndIdFor(input.messageId, i),
    currency: tx.currency ?? 'EUR',
  }));
  return {
    messageId: input.messageId,
    creationTime,
    requestedExecutionDate: input.requestedExecutionDate ?? creationTime.slice(0, 10),
    initiatingParty: input.initiatingParty ?? { name: input.debtor.name },
    debtor: input.debtor,
    debtorAccount: input.debtorAccount,
    transactions,
    numberOfTxs: transactions.length,
    controlSum: transactions.reduce((sum, tx) => sum + tx.amount, 0),
  };
}

// ── Shared writers (pain.008 uses them too) ─────────────────────────────────

export function writeParty(parent: XMLBuilder, name: string, party: SepaParty): void {
  const el = parent.ele(name);
  el.ele('Nm').txt(party.name).up();
  const a = party.address;
  if (a) {
    const adr = el.ele('PstlAdr');
    if (a.streetName) adr.ele('StrtNm').txt(a.streetName).up();
    if (a.buildingNumber) adr.ele('BldgNb').txt(a.buildingNumber).up();
    if (a.postCode) adr.ele('PstCd').txt(a.postCode).up();
    if (a.townName) adr.ele('TwnNm').txt(a.townName).up();
    adr.ele('Ctry').txt(a.country).up();
    adr.up();
  }
  if (party.id) {
    el.ele('Id').ele('OrgId').ele('Othr').ele('Id').txt(party.id).up().up().up().up();
  }
  el.up();
}

export function writeAccount(parent: XMLBuilder, name: string, account: SepaAccount): void {
  const el = parent.ele(name);
  el.ele('Id').ele('IBAN').txt(account.iban.replace(/\s/g, '').toUpperCase()).up().up();
  if (account.currency) el.ele('Ccy').txt(account.currency).up();
  el.up();
}

/** An agent without a BIC is written as `Othr/Id NOTPROVIDED`. */
export function writeAgent(parent: XMLBuilder, name: string, bic: string | undefined): void {
  const fin = parent.ele(name).ele('FinInstnId');
  if (bic) fin.ele('BIC').txt(bic.toUpperCase()).up();
  else fin.ele('Othr').ele('Id').txt('NOTPROVIDED').up().up();
  fin.up().up();
}

export function writeAmount(parent: XMLBuilder, name: string, amount: number, currency: string): void {
  parent.ele(name, { Ccy: currency }).txt(formatMinor(amount)).up();
}

// ── Encode ──────────────────────────────────────────────────────────────────

/** One payment-information block carrying every transaction. */
export function generatePain001(ct: CreditTransfer): string {
  assertValid(validateCreditTransfer(ct));

  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('Document', { xmlns: PAIN001_NS })
    .ele('CstmrCdtTrfInitn');

  const hdr = root.ele('GrpHdr');
  hdr.ele('MsgId').txt(ct.messageId).up();
  hdr.ele('CreDtTm').txt(ct.creationTime).up();
  hdr.ele('NbOfTxs').txt(String(ct.numberOfTxs)).up();
  hdr.ele('CtrlSum').txt(formatMinor(ct.controlSum)).up();
  writeParty(hdr, 'InitgPty', ct.initiatingParty);
  hdr.up();

  const pmt = root.ele('PmtInf');
  pmt.ele('PmtInfId').txt(`${ct.messageId}-001`).up();
  pmt.ele('PmtMtd').txt('TRF').up();
  pmt.ele('BtchBookg').txt('true').up();
  pmt.ele('NbOfTxs').txt(String(ct.numberOfTxs)).up();
  pmt.ele('CtrlSum').txt(formatMinor(ct.controlSum)).up();
  pmt.ele('PmtTpInf').ele('SvcLvl').ele('Cd').txt('SEPA').up().up().up();
  pmt.ele('ReqdExctnDt').txt(ct.requestedExecutionDate).up();
  writeParty(pmt, 'Dbtr', ct.debtor);
  writeAccount(pmt, 'DbtrAcct', ct.debtorAccount);
  writeAgent(pmt, 'DbtrAgt', ct.debtorAccount.bic);
  pmt.ele('ChrgBr').txt('SLEV').up();

  for (const tx of ct.transactions) {
    const el = pmt.ele('CdtTrfTxInf');
    const id = el.ele('PmtId');
    if (tx.instructionId) id.ele('InstrId').txt(tx.instructionId).up();
    id.ele('EndToEndId').txt(tx.endToEndId).up();
    id.up();
    writeAmount(el.ele('Amt'), 'InstdAmt', tx.amount, tx.currency);
    if (tx.creditorAccount.bic) writeAgent(el, 'CdtrAgt', tx.creditorAccount.bic);
    writeParty(el, 'Cdtr', tx.creditor);
    writeAccount(el, 'CdtrAcct', tx.creditorAccount);
    if (tx.remittanceInfo) el.ele('RmtInf').ele('Ustrd').txt(tx.remittanceInfo).up().up();
    el.up();
  }

  return root.end({ prettyPrint: true });
}

// ── CSV import ──────────────────────────────────────────────────────────────

/**
 * `creditor_name,creditor_iban,amount[,currency,reference,creditor_bic]` with
 * amounts in major units. The reference becomes both the end-to-end id and the
 * remittance text; rows without one get a generated id when the batch is built.
 */
export function parseCreditTransferCsv(content: string): CreditTransactionInput[] {
  const { header, rows } = parseCsv(content);
  const col = requireColumns(header, ['creditor_name', 'creditor_iban', 'amount']);
  const cell = (row: string[], name: string): string => {
    const i = col[name];
    return i === undefined ? '' : (row[i] ?? '').trim();
  };

  const issues: ValidationIssue[] = [];
  const transactions: CreditTransactionInput[] = [];
  rows.forEach((row, i) => {
    const line = i + 2;
    let amount: number;
    try {
      amount = parseMinor(cell(row, 'amount'));
    } catch (err) {
      if (!(err instanceof CodecError)) throw err;
      issues.push({ code: 'amount', field: `line ${line}`, message: err.message });
      return;
    }
    const reference = cell(row, 'reference');
    const bic = cell(row, 'creditor_bic').toUpperCase();
    transactions.push({
      instructionId: `TXN-${i + 1}`,
      endToEndId: reference || undefined,
      amount,
      currency: cell(row, 'currency').toUpperCase() || 'EUR',
      creditor: { name: cell(row, 'creditor_name') },
      creditorAccount: { iban: cell(row, 'creditor_iban').replace(/\s/g, '').toUpperCase(), bic: bic || undefined },
      remittanceInfo: reference || undefined,
    });
  });

  if (issues.length > 0) throw new ValidationError(issues);
  return transactions;
}
