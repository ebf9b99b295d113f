import { toValidationResult, type ValidationIssue, type ValidationResult } from '../core/errors.js';
import { isValidBic } from '../identifiers/bic.js';
import { validateIban } from '../identifiers/iban.js';
import { SEQUENCE_TYPES, type CreditTransfer, type DirectDebit, type SepaAccount } from './types.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;
const CURRENCY_RE = /^[A-Z]{3}$/;
const MAX_ID_LENGTH = 35;
const MAX_NAME_LENGTH = 70;
const MAX_REMITTANCE_LENGTH = 140;

type Report = (code: string, field: string, message: string) => void;

function checkAccount(account: SepaAccount, field: string, error: Report): void {
  const check = validateIban(account.iban);
  if (!check.valid) error('invalid_iban', `${field}.iban`, check.message);
  if (account.bic && !isValidBic(account.bic)) error('invalid_bic', `${field}.bic`, `invalid BIC "${account.bic}"`);
}

function checkId(value: string, field: string, error: Report): void {
  if (!value.trim()) error('required', field, `${field} is required`);
  else if (value.length > MAX_ID_LENGTH) error('too_long', field, `${field} exceeds ${MAX_ID_LENGTH} characters`);
}

function checkName(value: string, field: string, error: Report): void {
  if (!value.trim()) error('required', field, `${field} is required`);
  else if (value.length > MAX_NAME_LENGTH) error('too_long', field, `${field} exceeds ${MAX_NAME_LENGTH} characters`);
}

interface BatchLike {
  messageId: string;
  creationTime: string;
  numberOfTxs: number;
  controlSum: number;
  transactions: readonly {
    instructionId?: string;
    endToEndId: string;
    amount: number;
    currency: string;
    remittanceInfo?: string;
  }[];
}

/** Header and per-transaction rules shared by both initiation messages. */
function checkBatch(batch: BatchLike, error: Report, warn: Report): void {
  checkId(batch.messageId, 'message_id', error);
  if (!DATE_TIME_RE.test(batch.creationTime))
    error('date_format', 'creation_time', 'creation_time must be YYYY-MM-DDTHH:mm:ss');

  if (batch.transactions.length === 0) {
    error('no_transactions', 'transactions', 'at least one transaction is required');
    return;
  }

  const seen = new Set<string>();
  batch.transactions.forEach((tx, i) => {
    const at = `transactions[${i}]`;
    if (!Number.isInteger(tx.amount) || tx.amount <= 0)
      error('amount', `${at}.amount`, 'amount must be a positive number of cents');
    if (!CURRENCY_RE.test(tx.currency)) error('currency', `${at}.currency`, `invalid currency "${tx.currency}"`);
    else if (tx.currency !== 'EUR') warn('non_euro', `${at}.currency`, `SEPA payments are settled in EUR, got ${tx.currency}`);
    checkId(tx.endToEndId, `${at}.end_to_end_id`, error);
    if (seen.has(tx.endToEndId))
      error('duplicate_end_to_end_id', `${at}.end_to_end_id`, `end-to-end id "${tx.endToEndId}" is used more than once`);
    seen.add(tx.endToEndId);
    if (tx.instructionId !== undefined && tx.instructionId.length > MAX_ID_LENGTH)
      error('too_long', `${at}.instruction_id`, `instruction id exceeds ${MAX_ID_LENGTH} characters`);
    if (tx.remittanceInfo !== undefined && tx.remittanceInfo.length > MAX_REMITTANCE_LENGTH)
      error('too_long', `${at}.remittance_info`, `remittance information exceeds ${MAX_REMITTANCE_LENGTH} characters`);
  });

  const sum = batch.transactions.reduce((s, tx) => s + tx.amount, 0);
  if (batch.numberOfTxs !== batch.transactions.length)
    error('number_of_txs', 'number_of_txs', `number_of_txs ${batch.numberOfTxs} does not match ${batch.transactions.length} transactions`);
  if (batch.controlSum !== sum)
    error('control_sum', 'control_sum', `control_sum ${batch.controlSum} does not match the transaction total ${sum}`);
}

export function validateCreditTransfer(ct: CreditTransfer): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const error: Report = (code, field, message) => errors.push({ code, field, message });
  const warn: Report = (code, field, message) => warnings.push({ code, field, message });

  checkName(ct.initiatingParty.name, 'initiating_party.name', error);
  checkName(ct.debtor.name, 'debtor.name', error);
  checkAccount(ct.debtorAccount, 'debtor_account', error);
  if (!DATE_RE.test(ct.requestedExecutionDate))
    error('date_format', 'requested_execution_date', 'requested_execution_date must be YYYY-MM-DD');

  checkBatch(ct, error, warn);
  ct.transactions.forEach((tx, i) => {
    checkName(tx.creditor.name, `transactions[${i}].creditor.name`, error);
    checkAccount(tx.creditorAccount, `transactions[${i}].creditor_account`, error);
  });

  return toValidationResult(errors, warnings);
}

export function validateDirectDebit(dd: DirectDebit): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];
  const error: Report = (code, field, message) => errors.push({ code, field, message });
  const warn: Report = (code, field, message) => warnings.push({ code, field, message });

  checkName(dd.creditor.name, 'creditor.name', error);
  checkAccount(dd.creditorAccount, 'creditor_account', error);
  checkId(dd.creditorId, 'creditor_id', error);
  if (!DATE_RE.test(dd.requestedCollectionDate))
    error('date_format', 'requested_collection_date', 'requested_collection_date must be YYYY-MM-DD');

  checkBatch(dd, error, warn);
  dd.transactions.forEach((tx, i) => {
    const at = `transactions[${i}]`;
    checkName(tx.debtor.name, `${at}.debtor.name`, error);
    checkAccount(tx.debtorAccount, `${at}.debtor_account`, error);
    checkId(tx.mandateId, `${at}.mandate_id`, error);
    if (!DATE_RE.test(tx.mandateDate)) error('date_format', `${at}.mandate_date`, 'mandate_date must be YYYY-MM-DD');
    else if (tx.mandateDate > dd.requestedCollectionDate)
      error('mandate_date', `${at}.mandate_date`, 'mandate is signed after the collection date');
    if (!SEQUENCE_TYPES.includes(tx.sequenceType))
      error('sequence_type', `${at}.sequence_type`, `sequence type must be one of ${SEQUENCE_TYPES.join(', ')}`);
  });

  return toValidationResult(errors, warnings);
}
