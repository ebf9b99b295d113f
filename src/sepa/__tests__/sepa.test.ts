import { describe, it, expect } from 'vitest';
import { CodecError, ValidationError } from '../../core/errors.js';
import { attr, child, children, parseXml, path, text } from '../../core/xml.js';
import { parseCamt053, totalCredits, totalDebits } from '../camt053.js';
import { buildCreditTransfer, generatePain001, parseCreditTransferCsv } from '../pain001.js';
import { addDays, buildDirectDebit, generatePain008 } from '../pain008.js';
import { parseDirectDebitJson, parseOpenItemsJson } from '../parser.js';
import { reconcile } from '../reconcile.js';
import type { CreditTransferInput, DirectDebitInput } from '../types.js';
import { validateCreditTransfer, validateDirectDebit } from '../validator.js';

const codes = (issues: { code: string; field: string }[]) => issues.map((i) => [i.code, i.field]);

function transfer(): CreditTransferInput {
  return {
    messageId: 'MSG-2025-001',
    creationTime: '2025-03-10T09:30:00',
    debtor: { name: 'Muster GmbH' },
    debtorAccount: { iban: 'AT611904300234573201', bic: 'BKAUATWW' },
    transactions: [
      {
        endToEndId: 'E2E-A',
        amount: 12550,
        creditor: { name: 'Lieferant A' },
        creditorAccount: { iban: 'DE89370400440532013000' },
        remittanceInfo: 'RE-100',
      },
      {
        amount: 999,
        creditor: { name: 'Lieferant B' },
        creditorAccount: { iban: 'AT483200000012345864', bic: 'RLNWATWW' },
      },
    ],
  };
}

function directDebit(): DirectDebitInput {
  return {
    messageId: 'DD-2025-03',
    creationTime: '2025-03-28T08:00:00',
    creditor: { name: 'Verein Muster' },
    creditorAccount: { iban: 'AT026000000001349870', bic: 'OPSKATWW' },
    creditorId: 'AT61ZZZ01234567890',
    transactions: [
      {
        amount: 3500,
        debtor: { name: 'Anna Beispiel' },
        debtorAccount: { iban: 'AT611904300234573201' },
        mandateId: 'M-001',
        mandateDate: '2024-12-01',
        sequenceType: 'RCUR',
      },
      {
        endToEndId: 'E-2',
        amount: 5000,
        debtor: { name: 'Ben Test' },
        debtorAccount: { iban: 'DE89370400440532013000', bic: 'COBADEFFXXX' },
        mandateId: 'M-002',
        mandateDate: '2025-03-20',
        sequenceType: 'FRST',
      },
      {
        amount: 3500,
        debtor: { name: 'Carla Probe' },
        debtorAccount: { iban: 'AT483200000012345864' },
        mandateId: 'M-003',
        mandateDate: '2023-05-05',
        sequenceType: 'RCUR',
      },
    ],
  };
}

const STATEMENT = `<?xml version="1.0" encoding="UTF-8"?>
<Document xmlns="urn:iso:std:iso:20022:tech:xsd:camt.053.001.02">
  <BkToCstmrStmt>
    <GrpHdr><MsgId>STMT-1</MsgId><CreDtTm>2025-03-31T18:00:00</CreDtTm></GrpHdr>
    <Stmt>
      <Id>STMT-2025-03-31</Id>
      <CreDtTm>2025-03-31T18:00:00</CreDtTm>
      <Acct><Id><IBAN>AT611904300234573201</IBAN></Id><Ccy>EUR</Ccy></Acct>
      <Bal><Tp><CdOrPrtry><Cd>OPBD</Cd></CdOrPrtry></Tp><Amt Ccy="EUR">1000.00</Amt><CdtDbtInd>CRDT</CdtDbtInd><Dt><Dt>2025-03-01</Dt></Dt></Bal>
      <Bal><Tp><CdOrPrtry><Cd>CLBD</Cd></CdOrPrtry></Tp><Amt Ccy="EUR">1235.19</Amt><CdtDbtInd>CRDT</CdtDbtInd><Dt><Dt>2025-03-31</Dt></Dt></Bal>
      <Ntry>
        <Amt Ccy="EUR">235.44</Amt>
        <CdtDbtInd>CRDT</CdtDbtInd>
        <BookgDt><Dt>2025-03-05</Dt></BookgDt>
        <ValDt><Dt>2025-03-05</Dt></ValDt>
        <NtryDtls><TxDtls>
          <Refs><EndToEndId>RE-2025-0042</EndToEndId><TxId>TX-1</TxId></Refs>
          <RltdPties>
            <Dbtr><Nm>Kunde AG</Nm></Dbtr>
            <DbtrAcct><Id><IBAN>DE89370400440532013000</IBAN></Id></DbtrAcct>
          </RltdPties>
          <RmtInf><Ustrd>Rechnung RE-2025-0042</Ustrd></RmtInf>
        </TxDtls></NtryDtls>
      </Ntry>
      <Ntry>
        <Amt Ccy="EUR">0.29</Amt>
        <CdtDbtInd>DBIT</CdtDbtInd>
        <BookgDt><Dt>2025-03-10</Dt></BookgDt>
        <NtryDtls><TxDtls>
          <Refs><EndToEndId>NOTPROVIDED</EndToEndId></Refs>
          <RltdPties>
            <Cdtr><Nm>Bank Austria</Nm></Cdtr>
            <CdtrAcct><Id><IBAN>AT026000000001349870</IBAN></Id></CdtrAcct>
          </RltdPties>
          <RmtInf><Ustrd>Kontoführung</Ustrd></RmtInf>
        </TxDtls></NtryDtls>
      </Ntry>
      <Ntry>
        <Amt Ccy="EUR">0.04</Amt>
        <CdtDbtInd>CRDT</CdtDbtInd>
        <BookgDt><Dt>2025-03-31</Dt></BookgDt>
      </Ntry>
    </Stmt>
  </BkToCstmrStmt>
</Document>`;

describe('credit transfer batch', () => {
  it('derives count, control sum and missing end-to-end ids', () => {
    const ct = buildCreditTransfer(transfer());
    expect(ct.numberOfTxs).toBe(2);
    expect(ct.controlSum).toBe(13549);
    expect(ct.requestedExecutionDate).toBe('2025-03-10');
    expect(ct.initiatingParty).toEqual({ name: 'Muster GmbH' });
    expect(ct.transactions.map((t) => t.endToEndId)).toEqual(['E2E-A', 'MSG-2025-001-2']);
    expect(ct.transactions.map((t) => t.currency)).toEqual(['EUR', 'EUR']);
  });

  it('reports every transaction problem with its position', () => {
    const ct = buildCreditTransfer({
      ...transfer(),
      transactions: [
        { endToEndId: 'X', amount: 0, creditor: { name: '' }, creditorAccount: { iban: 'AT611904300234573202' } },
        { endToEndId: 'X', amount: 100, creditor: { name: 'B' }, creditorAccount: { iban: 'DE89370400440532013000' } },
      ],
    });
    const result = validateCreditTransfer(ct);
    expect(result.valid).toBe(false);
    expect(codes(result.errors)).toEqual([
      ['amount', 'transactions[0].amount'],
      ['duplicate_end_to_end_id', 'transactions[1].end_to_end_id'],
      ['required', 'transactions[0].creditor.name'],
      ['invalid_iban', 'transactions[0].creditor_account.iban'],
    ]);
  });

  it('rejects an empty batch and a tampered control sum', () => {
    const empty = buildCreditTransfer({ ...transfer(), transactions: [] });
    expect(codes(validateCreditTransfer(empty).errors)).toEqual([['no_transactions', 'transactions']]);

    const tampered = { ...buildCreditTransfer(transfer()), controlSum: 1 };
    expect(codes(validateCreditTransfer(tampered).errors)).toEqual([['control_sum', 'control_sum']]);
  });

  it('warns about non-euro amounts without failing', () => {
    const input = transfer();
    const ct = buildCreditTransfer({ ...input, transactions: [{ ...input.transactions[0], currency: 'CHF' }] });
    const result = validateCreditTransfer(ct);
    expect(result.valid).toBe(true);
    expect(codes(result.warnings)).toEqual([['non_euro', 'transactions[0].currency']]);
  });

  it('writes pain.001.001.03', () => {
    const xml = generatePain001(buildCreditTransfer(transfer()));
    expect(xml).toContain('<Document xmlns="urn:iso:std:iso:20022:tech:xsd:pain.001.001.03">');

    const root = path(parseXml(xml), 'Document', 'CstmrCdtTrfInitn');
    const hdr = child(root, 'GrpHdr');
    expect(text(hdr, 'MsgId')).toBe('MSG-2025-001');
    expect(text(hdr, 'CreDtTm')).toBe('2025-03-10T09:30:00');
    expect(text(hdr, 'NbOfTxs')).toBe('2');
    expect(text(hdr, 'CtrlSum')).toBe('135.49');

    const pmt = child(root, 'PmtInf');
    expect(text(pmt, 'PmtInfId')).toBe('MSG-2025-001-001');
    expect(text(pmt, 'PmtMtd')).toBe('TRF');
    expect(text(pmt, 'ReqdExctnDt')).toBe('2025-03-10');
    expect(text(path(pmt, 'DbtrAcct', 'Id'), 'IBAN')).toBe('AT611904300234573201');
    expect(text(path(pmt, 'DbtrAgt', 'FinInstnId'), 'BIC')).toBe('BKAUATWW');

    const [first, second] = children(pmt, 'CdtTrfTxInf');
    expect(text(child(first, 'PmtId'), 'EndToEndId')).toBe('E2E-A');
    expect(text(child(first, 'Amt'), 'InstdAmt')).toBe('125.50');
    expect(attr(path(first, 'Amt', 'InstdAmt'), 'Ccy')).toBe('EUR');
    expect(first['CdtrAgt']).toBeUndefined();
    expect(text(child(first, 'RmtInf'), 'Ustrd')).toBe('RE-100');
    expect(text(path(second, 'CdtrAgt', 'FinInstnId'), 'BIC')).toBe('RLNWATWW');
    expect(text(child(second, 'Cdtr'), 'Nm')).toBe('Lieferant B');
  });

  it('refuses to write an invalid batch', () => {
    expect(() => generatePain001(buildCreditTransfer({ ...transfer(), messageId: '' }))).toThrow(ValidationError);
  });
});

describe('credit transfer CSV', () => {
  it('imports rows with exact cents and optional columns', () => {
    const csv = [
      'creditor_name,creditor_iban,amount,currency,reference,creditor_bic',
      'Lieferant A,DE89 3704 0044 0532 0130 00,125.50,,RE-100,',
      '"Lieferant B, Wien",AT483200000012345864,0.29,eur,,rlnwatww',
    ].join('\n');
    expect(parseCreditTransferCsv(csv)).toEqual([
      {
        instructionId: 'TXN-1',
        endToEndId: 'RE-100',
        amount: 12550,
        currency: 'EUR',
        creditor: { name: 'Lieferant A' },
        creditorAccount: { iban: 'DE89370400440532013000' },
        remittanceInfo: 'RE-100',
      },
      {
        instructionId: 'TXN-2',
        amount: 29,
        currency: 'EUR',
        creditor: { name: 'Lieferant B, Wien' },
        creditorAccount: { iban: 'AT483200000012345864', bic: 'RLNWATWW' },
      },
    ]);
  });

  it('generates end-to-end ids for rows without a reference', () => {
    const csv = 'creditor_name,creditor_iban,amount\nA,DE89370400440532013000,10\nB,AT611904300234573201,20.5\n';
    const ct = buildCreditTransfer({ ...transfer(), messageId: 'CSV-1', transactions: parseCreditTransferCsv(csv) });
    expect(ct.transactions.map((t) => t.endToEndId)).toEqual(['CSV-1-1', 'CSV-1-2']);
    expect(ct.controlSum).toBe(3050);
  });

  it('reports malformed amounts by line', () => {
    const csv = 'creditor_name,creditor_iban,amount\nA,AT611904300234573201,12.x\n';
    try {
      parseCreditTransferCsv(csv);
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) {
        expect(err.issues).toEqual([{ code: 'amount', field: 'line 2', message: 'Invalid amount: "12.x"' }]);
      }
    }
  });

  it('names missing columns', () => {
    try {
      parseCreditTransferCsv('name,iban,amount\nA,B,1\n');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ValidationError);
      if (err instanceof ValidationError) expect(err.issues.map((i) => i.field)).toEqual(['creditor_name', 'creditor_iban']);
    }
  });
});

describe('direct debit batch', () => {
  it('collects five days after creation by default', () => {
    const dd = buildDirectDebit(directDebit());
    expect(dd.requestedCollectionDate).toBe('2025-04-02');
    expect(dd.controlSum).toBe(12000);
    expect(dd.transactions.map((t) => t.endToEndId)).toEqual(['DD-2025-03-1', 'E-2', 'DD-2025-03-3']);
    expect(addDays('2025-12-29', 5)).toBe('2026-01-03');
  });

  it('writes one payment block per sequence type', () => {
    const xml = generatePain008(buildDirectDebit(directDebit()));
    expect(xml).toContain('<Document xmlns="urn:iso:std:iso:20022:tech:xsd:pain.008.001.02">');

    const root = path(parseXml(xml), 'Document', 'CstmrDrctDbtInitn');
    expect(text(child(root, 'GrpHdr'), 'CtrlSum')).toBe('120.00');
    expect(text(path(root, 'GrpHdr', 'InitgPty'), 'Nm')).toBe('Verein Muster');

    const blocks = children(root, 'PmtInf');
    expect(blocks.map((b) => text(b, 'PmtInfId'))).toEqual(['DD-2025-03-001', 'DD-2025-03-002']);
    expect(blocks.map((b) => text(child(b, 'PmtTpInf'), 'SeqTp'))).toEqual(['RCUR', 'FRST']);
    expect(blocks.map((b) => text(b, 'NbOfTxs'))).toEqual(['2', '1']);
    expect(blocks.map((b) => text(b, 'CtrlSum'))).toEqual(['70.00', '50.00']);

    const [rcur] = blocks;
    expect(text(rcur, 'PmtMtd')).toBe('DD');
    expect(text(rcur, 'ReqdColltnDt')).toBe('2025-04-02');
    expect(text(path(rcur, 'PmtTpInf', 'LclInstrm'), 'Cd')).toBe('CORE');
    const scheme = path(rcur, 'CdtrSchmeId', 'Id', 'PrvtId', 'Othr');
    expect(text(scheme, 'Id')).toBe('AT61ZZZ01234567890');
    expect(text(child(scheme, 'SchmeNm'), 'Prtry')).toBe('SEPA');

    const txs = children(rcur, 'DrctDbtTxInf');
    expect(txs.map((t) => text(child(t, 'Dbtr'), 'Nm'))).toEqual(['Anna Beispiel', 'Carla Probe']);
    const mandate = path(txs[0], 'DrctDbtTx', 'MndtRltdInf');
    expect(text(mandate, 'MndtId')).toBe('M-001');
    expect(text(mandate, 'DtOfSgntr')).toBe('2024-12-01');
    expect(text(txs[0], 'InstdAmt')).toBe('35.00');
  });

  it('requires a creditor id and a mandate signed before collection', () => {
    const dd = buildDirectDebit(directDebit());
    const result = validateDirectDebit({
      ...dd,
      creditorId: '',
      transactions: [{ ...dd.transactions[0], mandateDate: '2025-04-03' }],
      numberOfTxs: 1,
      controlSum: 3500,
    });
    expect(codes(result.errors)).toEqual([
      ['required', 'creditor_id'],
      ['mandate_date', 'transactions[0].mandate_date'],
    ]);
  });

  it('reads JSON with a recurrent default sequence', () => {
    const dd = parseDirectDebitJson(JSON.stringify({
      message_id: 'DD-J',
      creation_time: '2025-12-29T10:00:00',
      creditor: { name: 'Verein Muster' },
      creditor_account: { iban: 'AT026000000001349870' },
      creditor_id: 'AT61ZZZ01234567890',
      transactions: [{
        amount: 1200,
        debtor: { name: 'Anna Beispiel' },
        debtor_account: { iban: 'AT611904300234573201' },
        mandate_id: 'M-9',
        mandate_date: '2025-01-01',
      }],
    }));
    expect(dd.requestedCollectionDate).toBe('2026-01-03');
    expect(dd.transactions[0].sequenceType).toBe('RCUR');
    expect(validateDirectDebit(dd).valid).toBe(true);
  });
});

describe('camt.053', () => {
  it('reads balances and entries in exact cents', () => {
    const stmt = parseCamt053(STATEMENT);
    expect(stmt.id).toBe('STMT-2025-03-31');
    expect(stmt.account).toEqual({ iban: 'AT611904300234573201', currency: 'EUR' });
    expect(stmt.openingBalance).toBe(100000);
    expect(stmt.closingBalance).toBe(123519);
    expect(stmt.computedClosingBalance).toBe(123519);
    expect(stmt.balanced).toBe(true);
    expect(totalCredits(stmt)).toBe(23548);
    expect(totalDebits(stmt)).toBe(29);

    expect(stmt.entries[0]).toEqual({
      amount: 23544,
      currency: 'EUR',
      creditDebit: 'CRDT',
      bookingDate: '2025-03-05',
      valueDate: '2025-03-05',
      endToEndId: 'RE-2025-0042',
      reference: 'TX-1',
      remittanceInfo: 'Rechnung RE-2025-0042',
      counterpartyName: 'Kunde AG',
      counterpartyIban: 'DE89370400440532013000',
    });
  });

  it('takes the creditor as counterparty of a debit', () => {
    const entry = parseCamt053(STATEMENT).entries[1];
    expect(entry.amount).toBe(29);
    expect(entry.creditDebit).toBe('DBIT');
    expect(entry.counterpartyName).toBe('Bank Austria');
    expect(entry.counterpartyIban).toBe('AT026000000001349870');
  });

  it('exposes an inconsistent balance instead of failing', () => {
    const xml = STATEMENT.replace('<CdtDbtInd>CRDT</CdtDbtInd><Dt><Dt>2025-03-01', '<CdtDbtInd>DBIT</CdtDbtInd><Dt><Dt>2025-03-01');
    const stmt = parseCamt053(xml);
    expect(stmt.openingBalance).toBe(-100000);
    expect(stmt.computedClosingBalance).toBe(-76481);
    expect(stmt.balanced).toBe(false);
  });

  it('rejects documents without a statement or with a malformed amount', () => {
    expect(() => parseCamt053('<Document><BkToCstmrStmt/></Document>')).toThrow('no statement found in document');
    expect(() => parseCamt053(STATEMENT.replace('235.44', '235,44.0'))).toThrow(CodecError);
  });
});

describe('reconcile', () => {
  it('matches by end-to-end id, then reference, then unique amount', () => {
    const items = parseOpenItemsJson(JSON.stringify([
      { id: 'INV-42', amount: 23544, end_to_end_id: 'RE-2025-0042' },
      { id: 'FEE', amount: 29, reference: 'KONTOFÜHRUNG', credit_debit: 'DBIT' },
      { id: 'INT', amount: 4 },
      { id: 'OPEN', amount: 5000 },
    ]));
    expect(reconcile(parseCamt053(STATEMENT), items)).toEqual({
      matches: [
        { entryIndex: 0, itemId: 'INV-42', method: 'end_to_end_id', difference: 0 },
        { entryIndex: 1, itemId: 'FEE', method: 'reference', difference: 0 },
        { entryIndex: 2, itemId: 'INT', method: 'amount', difference: 0 },
      ],
      unmatchedEntries: [],
      unmatchedItems: ['OPEN'],
    });
  });

  it('reports the difference of a partial payment', () => {
    const result = reconcile(parseCamt053(STATEMENT), [{ id: 'X', amount: 25000, endToEndId: 'RE-2025-0042' }]);
    expect(result.matches).toEqual([{ entryIndex: 0, itemId: 'X', method: 'end_to_end_id', difference: -1456 }]);
    expect(result.unmatchedEntries).toEqual([1, 2]);
  });

  it('leaves ambiguous amounts and the wrong side unmatched', () => {
    const result = reconcile(parseCamt053(STATEMENT), [
      { id: 'A', amount: 4 },
      { id: 'B', amount: 4 },
      { id: 'C', amount: 29, creditDebit: 'CRDT' },
    ]);
    expect(result.matches).toEqual([]);
    expect(result.unmatchedEntries).toEqual([0, 1, 2]);
    expect(result.unmatchedItems).toEqual(['A', 'B', 'C']);
  });
});
