import { CodecError } from '../core/errors.js';
import { parseMinor, type Minor } from '../core/money.js';
import { attr, child, children, isNode, optChild, optText, parseXml, path, text, type XmlNode } from '../core/xml.js';
import type { CreditDebit, Statement, StatementEntry } from './types.js';

function creditDebit(node: XmlNode, where: string): CreditDebit {
  const value = text(node, 'CdtDbtInd');
  if (value !== 'CRDT' && value !== 'DBIT') throw new CodecError(`${where}: CdtDbtInd must be CRDT or DBIT, got "${value}"`);
  return value;
}

function amountOf(node: XmlNode, where: string): { amount: Minor; currency: string } {
  const amt = child(node, 'Amt');
  const raw = text(node, 'Amt');
  if (!raw) throw new CodecError(`${where}: Amt is missing`);
  return { amount: parseMinor(raw), currency: attr(amt, 'Ccy') };
}

function parseEntry(ntry: XmlNode, index: number): StatementEntry {
  const where = `Ntry[${index}]`;
  const { amount, currency } = amountOf(ntry, where);
  const side = creditDebit(ntry, where);
  const entry: StatementEntry = {
    amount,
    currency: currency || 'EUR',
    creditDebit: side,
    bookingDate: optText(child(ntry, 'BookgDt'), 'Dt'),
    valueDate: optText(child(ntry, 'ValDt'), 'Dt'),
  };

  const tx = optChild(child(ntry, 'NtryDtls'), 'TxDtls');
  if (tx) {
    const refs = child(tx, 'Refs');
    entry.endToEndId = optText(refs, 'EndToEndId');
    entry.reference = optText(refs, 'TxId');
    const ustrd = children(child(tx, 'RmtInf'), 'Ustrd').map((u) => text(u, '#text')).filter((s) => s.length > 0);
    if (ustrd.length > 0) entry.remittanceInfo = ustrd.join(' ');

    // The counterparty is whoever sits on the other side of our account.
    const parties = child(tx, 'RltdPties');
    const [party, account] = side === 'CRDT' ? ['Dbtr', 'DbtrAcct'] : ['Cdtr', 'CdtrAcct'];
    entry.counterpartyName = optText(child(parties, party), 'Nm');
    entry.counterpartyIban = optText(path(parties, account, 'Id'), 'IBAN');
  }
  return entry;
}

/**
 * Reads the first statement of a camt.053 document. Amounts keep their exact
 * cents; a DBIT balance is negative.
 */
export function parseCamt053(xmlContent: string | Uint8Array): Statement {
  const doc = parseXml(xmlContent);
  const root = doc['Document'];
  if (!isNode(root)) throw new CodecError('Not a camt.053 document: root <Document> missing');
  const stmt = children(child(root, 'BkToCstmrStmt'), 'Stmt')[0];
  if (!stmt) throw new CodecError('no statement found in document');

  let openingBalance = 0;
  let closingBalance = 0;
  children(stmt, 'Bal').forEach((bal, i) => {
    const code = text(path(bal, 'Tp', 'CdOrPrtry'), 'Cd');
    if (code !== 'OPBD' && code !== 'CLBD') return;
    const { amount } = amountOf(bal, `Bal[${i}]`);
    const signed = creditDebit(bal, `Bal[${i}]`) === 'DBIT' ? -amount : amount;
    if (code === 'OPBD') openingBalance = signed;
    else closingBalance = signed;
  });

  const entries = children(stmt, 'Ntry').map(parseEntry);
  const computedClosingBalance = entries.reduce(
    (sum, e) => (e.creditDebit === 'CRDT' ? sum + e.amount : sum - e.amount),
    openingBalance,
  );

  const acct = child(stmt, 'Acct');
  return {
    id: text(stmt, 'Id'),
    creationTime: optText(stmt, 'CreDtTm'),
    account: {
      iban: text(child(acct, 'Id'), 'IBAN'),
      currency: optText(acct, 'Ccy'),
    },
    openingBalance,
    closingBalance,
    entries,
    computedClosingBalance,
    balanced: computedClosingBalance === closingBalance,
  };
}

export function totalCredits(statement: Statement): Minor {
  return statement.entries.filter((e) => e.creditDebit === 'CRDT').reduce((s, e) => s + e.amount, 0);
}

export function totalDebits(statement: Statement): Minor {
  return statement.entries.filter((e) => e.creditDebit === 'DBIT').reduce((s, e) => s + e.amount, 0);
}
