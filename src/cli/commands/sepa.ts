import { formatMinor } from '../../core/money.js';
import { formatIban, validateIban } from '../../identifiers/iban.js';
import { parseCamt053, totalCredits, totalDebits } from '../../sepa/camt053.js';
import { buildCreditTransfer, generatePain001, parseCreditTransferCsv } from '../../sepa/pain001.js';
import { generatePain008 } from '../../sepa/pain008.js';
import { parseCreditTransferJson, parseDirectDebitJson, parseOpenItemsJson } from '../../sepa/parser.js';
import { reconcile } from '../../sepa/reconcile.js';
import type { CreditTransfer } from '../../sepa/types.js';
import type { ParsedArgs } from '../args.js';
import { emit, readText, table, type CliContext, type Command } from '../context.js';

const validateIbanCommand: Command = async (args) => {
  const check = validateIban(args.positional(0, 'IBAN'));
  if (!check.valid) {
    return { data: check, text: `${check.iban}: ${check.message}`, exitCode: 1 };
  }
  const lines = [`${formatIban(check.iban)} is valid (${check.countryCode})`];
  if (check.bankName) lines.push(`Bank: ${check.bankName}${check.bic ? `, BIC ${check.bic}` : ''}`);
  return { data: check, text: lines.join('\n') };
};

/**
 * A CSV file holds only the transactions; the debtor side comes from
 * `--debtor-name`, `--debtor-iban` and optionally `--debtor-bic`.
 */
async function loadCreditTransfer(args: ParsedArgs, ctx: CliContext): Promise<CreditTransfer> {
  const file = args.positional(0, 'credit transfer file');
  const content = await readText(file);
  if (!file.toLowerCase().endsWith('.csv')) return parseCreditTransferJson(content, ctx.now());

  const now = ctx.now();
  return buildCreditTransfer({
    messageId: args.string('message-id') ?? `MSG-${now.getTime()}`,
    requestedExecutionDate: args.string('execution-date'),
    debtor: { name: args.requireString('debtor-name') },
    debtorAccount: { iban: args.requireString('debtor-iban'), bic: args.string('debtor-bic') },
    transactions: parseCreditTransferCsv(content),
  }, now);
}

const pain001: Command = async (args, ctx) => {
  const ct = await loadCreditTransfer(args, ctx);
  return emit(args, generatePain001(ct), {
    message_id: ct.messageId,
    number_of_txs: ct.numberOfTxs,
    control_sum: ct.controlSum,
  });
};

const pain008: Command = async (args, ctx) => {
  const dd = parseDirectDebitJson(await readText(args.positional(0, 'direct debit JSON file')), ctx.now());
  return emit(args, generatePain008(dd), {
    message_id: dd.messageId,
    number_of_txs: dd.numberOfTxs,
    control_sum: dd.controlSum,
  });
};

/** With `--open-items <file.json>` the entries are reconciled as well. */
const camt053: Command = async (args) => {
  const statement = parseCamt053(await readText(args.positional(0, 'camt.053 file')));
  const itemsFile = args.string('open-items');
  const reconciliation = itemsFile ? reconcile(statement, parseOpenItemsJson(await readText(itemsFile))) : undefined;

  const rows = statement.entries.map((e) => [
    e.bookingDate ?? '',
    `${e.creditDebit === 'DBIT' ? '-' : ''}${formatMinor(e.amount)}`,
    e.counterpartyName ?? '',
    e.remittanceInfo ?? '',
  ]);
  const lines = [
    `Statement ${statement.id} ${formatIban(statement.account.iban)}`,
    table(['BOOKED', 'AMOUNT', 'COUNTERPARTY', 'REMITTANCE'], rows),
    `Opening ${formatMinor(statement.openingBalance)}, credits ${formatMinor(totalCredits(statement))}, ` +
      `debits ${formatMinor(totalDebits(statement))}, closing ${formatMinor(statement.closingBalance)}`,
  ];
  if (!statement.balanced) {
    lines.push(`WARNING: computed closing balance ${formatMinor(statement.computedClosingBalance)} does not match`);
  }
  if (reconciliation) {
    lines.push(
      `Reconciled ${reconciliation.matches.length} entries, ` +
        `${reconciliation.unmatchedEntries.length} unmatched entries, ${reconciliation.unmatchedItems.length} open items left`,
    );
  }
  return {
    data: reconciliation ? { statement, reconciliation } : { statement },
    text: lines.join('\n'),
  };
};

export const sepaCommands: Record<string, Command> = {
  'validate-iban': validateIbanCommand,
  pain001,
  pain008,
  camt053,
};
