import type { Minor } from '../core/money.js';

export type CreditDebit = 'CRDT' | 'DBIT';

/** First, recurrent, final, one-off. */
export type SequenceType = 'FRST' | 'RCUR' | 'FNAL' | 'OOFF';

export const SEQUENCE_TYPES: readonly SequenceType[] = ['FRST', 'RCUR', 'FNAL', 'OOFF'];

export interface SepaAddress {
  streetName?: string;
  buildingNumber?: string;
  postCode?: string;
  townName?: string;
  country: string;
}

export interface SepaParty {
  name: string;
  /** Organisation id, written as `Id/OrgId/Othr/Id`. */
  id?: string;
  address?: SepaAddress;
}

export interface SepaAccount {
  iban: string;
  bic?: string;
  name?: string;
  currency?: string;
}

// ── pain.001 ────────────────────────────────────────────────────────────────

export interface CreditTransferTransaction {
  instructionId?: string;
  endToEndId: string;
  amount: Minor;
  currency: string;
  creditor: SepaParty;
  creditorAccount: SepaAccount;
  remittanceInfo?: string;
}

export interface CreditTransfer {
  messageId: string;
  /** `YYYY-MM-DDTHH:mm:ss` */
  creationTime: string;
  requestedExecutionDate: string;
  initiatingParty: SepaParty;
  debtor: SepaParty;
  debtorAccount: SepaAccount;
  transactions: CreditTransferTransaction[];
  numberOfTxs: number;
  controlSum: Minor;
}

export type CreditTransactionInput = Omit<CreditTransferTransaction, 'endToEndId' | 'currency'> & {
  endToEndId?: string;
  currency?: string;
};

export interface CreditTransferInput {
  messageId: string;
  creationTime?: string;
  requestedExecutionDate?: string;
  initiatingParty?: SepaParty;
  debtor: SepaParty;
  debtorAccount: SepaAccount;
  transactions: CreditTransactionInput[];
}

// ── pain.008 ────────────────────────────────────────────────────────────────

export interface DirectDebitTransaction {
  instructionId?: string;
  endToEndId: string;
  amount: Minor;
  currency: string;
  debtor: SepaParty;
  debtorAccount: SepaAccount;
  mandateId: string;
  /** Date of signature, `YYYY-MM-DD`. */
  mandateDate: string;
  sequenceType: SequenceType;
  remittanceInfo?: string;
}

export interface DirectDebit {
  messageId: string;
  creationTime: string;
  requestedCollectionDate: string;
  creditor: SepaParty;
  creditorAccount: SepaAccount;
  /** SEPA creditor identifier, e.g. AT61ZZZ01234567890. */
  creditorId: string;
  transactions: DirectDebitTransaction[];
  numberOfTxs: number;
  controlSum: Minor;
}

export type DirectDebitTransactionInput = Omit<DirectDebitTransaction, 'endToEndId' | 'currency'> & {
  endToEndId?: string;
  currency?: string;
};

export interface DirectDebitInput {
  messageId: string;
  creationTime?: string;
  requestedCollectionDate?: string;
  creditor: SepaParty;
  creditorAccount: SepaAccount;
  creditorId: string;
  transactions: DirectDebitTransactionInput[];
}

// ── camt.053 ────────────────────────────────────────────────────────────────

export interface StatementEntry {
  amount: Minor;
  currency: string;
  creditDebit: CreditDebit;
  bookingDate?: string;
  valueDate?: string;
  /** Bank transaction id (`Refs/TxId`). */
  reference?: string;
  endToEndId?: string;
  remittanceInfo?: string;
  counterpartyName?: string;
  counterpartyIban?: string;
}

export interface Statement {
  id: string;
  creationTime?: string;
  account: SepaAccount;
  /** Signed: a debit balance is negative. */
  openingBalance: Minor;
  closingBalance: Minor;
  entries: StatementEntry[];
  /** Opening balance plus credits minus debits. */
  computedClosingBalance: Minor;
  balanced: boolean;
}

// ── Reconciliation ──────────────────────────────────────────────────────────

export interface OpenItem {
  id: string;
  amount: Minor;
  endToEndId?: string;
  /** Payment reference expected in the remittance information. */
  reference?: string;
  /** Expected booking side; either side matches when omitted. */
  creditDebit?: CreditDebit;
}

export type MatchMethod = 'end_to_end_id' | 'reference' | 'amount';

export interface ReconciliationMatch {
  entryIndex: number;
  itemId: string;
  method: MatchMethod;
  /** Entry amount minus item amount. */
  difference: Minor;
}

export interface ReconciliationResult {
  matches: ReconciliationMatch[];
  unmatchedEntries: number[];
  unmatchedItems: string[];
}
