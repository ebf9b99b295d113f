import { create } from 'xmlbuilder2';
import { assertValid } from '../core/errors.js';
import { formatMinor } from '../core/money.js';
import { endToEndIdFor, isoSeconds, writeAccount, writeAgent, writeAmount, writeParty } from './pain001.js';
import type { DirectDebit, DirectDebitInput, DirectDebitTransaction, SequenceType } from './types.js';
import { validateDirectDebit } from './validator.js';

export const PAIN008_NS = 'urn:iso:std:iso:20022:tech:xsd:pain.008.001.02';

/** Days between creation and the default collection date. */
export const COLLECTION_LEAD_DAYS = 5;

export function addDays(date: string, days: number): string {
  const d = new Date(`${date.slice(0, 10)}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

export function buildDirectDebit(input: DirectDebitInput, now = new Date()): DirectDebit {
  const creationTime = input.creationTime ?? isoSeconds(now);
  const transactions = input.transactions.map((tx, i) => ({
    ...tx,
    endToEndId: tx.endToEndId?.trim() || endToEndIdFor(input.messageId, i),
    currency: tx.currency ?? 'EUR',
  }));
  return {
    messageId: input.messageId,
    creationTime,
    requestedCollectionDate: input.requestedCollectionDate ?? addDays(creationTime, COLLECTION_LEAD_DAYS),
    creditor: input.creditor,
    creditorAccount: input.creditorAccount,
    creditorId: input.creditorId,
    transactions,
    numberOfTxs: transactions.length,
    controlSum: transactions.reduce((sum, tx) => sum + tx.amount, 0),
  };
}

/** Sequence type is set per payment block, so transactions are grouped by it in first-seen order. */
export function groupBySequence(transactions: readonly DirectDebitTransaction[]): Map<SequenceType, DirectDebitTransaction[]> {
  const groups = new Map<SequenceType, DirectDebitTransaction[]>();
  for (const tx of transactions) {
    const group = groups.get(tx.sequenceType);
    if (group) group.push(tx);
    else groups.set(tx.sequenceType, [tx]);
  }
  return groups;
}

export function generatePain008(dd: DirectDebit): string {
  assertValid(validateDirectDebit(dd));

  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('Document', { xmlns: PAIN008_NS })
    .ele('CstmrDrctDbtInitn');

  const hdr = root.ele('GrpHdr');
  hdr.ele('MsgId').txt(dd.messageId).up();
  hdr.ele('CreDtTm').txt(dd.creationTime).up();
  hdr.ele('NbOfTxs').txt(String(dd.numberOfTxs)).up();
  hdr.ele('CtrlSum').txt(formatMinor(dd.controlSum)).up();
  writeParty(hdr, 'InitgPty', dd.creditor);
  hdr.up();

  let block = 0;
  for (const [sequenceType, txs] of groupBySequence(dd.transactions)) {
    block += 1;
    const sum = txs.reduce((s, tx) => s + tx.amount, 0);
    const pmt = root.ele('PmtInf');
    pmt.ele('PmtInfId').txt(`${dd.messageId}-${String(block).padStart(3, '0')}`).up();
    pmt.ele('PmtMtd').txt('DD').up();
    pmt.ele('BtchBookg').txt('true').up();
    pmt.ele('NbOfTxs').txt(String(txs.length)).up();
    pmt.ele('CtrlSum').txt(formatMinor(sum)).up();
    pmt.ele('PmtTpInf')
      .ele('SvcLvl').ele('Cd').txt('SEPA').up().up()
      .ele('LclInstrm').ele('Cd').txt('CORE').up().up()
      .ele('SeqTp').txt(sequenceType).up()
    .up();
    pmt.ele('ReqdColltnDt').txt(dd.requestedCollectionDate).up();
    writeParty(pmt, 'Cdtr', dd.creditor);
    writeAccount(pmt, 'CdtrAcct', dd.creditorAccount);
    writeAgent(pmt, 'CdtrAgt', dd.creditorAccount.bic);
    pmt.ele('ChrgBr').txt('SLEV').up();
    pmt.ele('CdtrSchmeId').ele('Id').ele('PrvtId').ele('Othr')
      .ele('Id').txt(dd.creditorId).up()
      .ele('SchmeNm').ele('Prtry').txt('SEPA').up().up()
    .up().up().up().up();

    for (const tx of txs) {
      const el = pmt.ele('DrctDbtTxInf');
      const id = el.ele('PmtId');
      if (tx.instructionId) id.ele('InstrId').txt(tx.instructionId).up();
      id.ele('EndToEndId').txt(tx.endToEndId).up();
      id.up();
      writeAmount(el, 'InstdAmt', tx.amount, tx.currency);
      el.ele('DrctDbtTx').ele('MndtRltdInf')
        .ele('MndtId').txt(tx.mandateId).up()
        .ele('DtOfSgntr').txt(tx.mandateDate).up()
      .up().up();
      if (tx.debtorAccount.bic) writeAgent(el, 'DbtrAgt', tx.debtorAccount.bic);
      writeParty(el, 'Dbtr', tx.debtor);
      writeAccount(el, 'DbtrAcct', tx.debtorAccount);
      if (tx.remittanceInfo) el.ele('RmtInf').ele('Ustrd').txt(tx.remittanceInfo).up().up();
      el.up();
    }
    pmt.up();
  }

  return root.end({ prettyPrint: true });
}
