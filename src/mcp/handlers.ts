import { z } from 'zod';
import { ValidationError, formatValidation } from '../core/errors.js';
import { formatMinor } from '../core/money.js';
import { parseWithSchema } from '../core/schema.js';
import type { CredentialStore, FinanzOnlineAccount } from '../credentials/types.js';
import { Dashboard, parseServices, summarize } from '../dashboard/dashboard.js';
import { calculateTotals } from '../erechnung/calculator.js';
import { generateInvoiceXml } from '../erechnung/generator.js';
import { invoiceToJson, parseInvoiceJson, parseInvoiceXml } from '../erechnung/parser.js';
import { validateInvoice } from '../erechnung/validator.js';
import type { FinanzOnlineClient } from '../finanzonline/client.js';
import { bicCountry, isValidBic, lookupAustrianBank, normalizeBic } from '../identifiers/bic.js';
import { isValidFn, normalizeFn } from '../identifiers/fn.js';
import { formatIban, validateIban } from '../identifiers/iban.js';
import { birthDateMatches, formatSvnr, validateSvnr } from '../identifiers/svnr.js';
import { validateUidFormat } from '../identifiers/uid.js';
import { parseCamt053, totalCredits, totalDebits } from '../sepa/camt053.js';
import { generatePain001 } from '../sepa/pain001.js';
import { parseCreditTransferJson, parseOpenItemsJson } from '../sepa/parser.js';
import { reconcile } from '../sepa/reconcile.js';
import { calculatePayable, periodLabel } from '../uva/calculator.js';
import { generateUvaXml } from '../uva/generator.js';
import { parseUvaJson } from '../uva/parser.js';
import { validateUva } from '../uva/validator.js';
import { buildZm, generateZmXml, totalAmount, zmPeriodLabel } from '../zm/generator.js';
import { parseZmCsv } from '../zm/parser.js';
import type { Zm } from '../zm/types.js';
import { validateZm } from '../zm/validator.js';

/** What the online tools reach; both are opened on first use. */
export interface ToolContext {
  credentials: () => CredentialStore;
  finanzOnline: () => FinanzOnlineClient;
  now: () => Date;
}

// ── Argument schemas ────────────────────────────────────────────────────────

const str = (name: string) => z.object({ [name]: z.string().min(1) });

const bicArgs = z.object({ bank_code: z.string().optional(), bic: z.string().optional() });
const svnrArgs = z.object({ svnr: z.string().min(1), birth_date: z.string().optional() });
const documentArgs = (name: string) => z.object({ [name]: z.record(z.unknown()) });

const zmArgs = z.object({
  year: z.number().int(),
  quarter: z.number().int(),
  entries: z.array(z.object({
    partner_uid: z.string(),
    country_code: z.string(),
    delivery_type: z.enum(['L', 'D', 'S']),
    amount: z.number().int(),
  })).optional(),
  csv: z.string().optional(),
});

const generateArgs = z.object({
  invoice: z.record(z.unknown()),
  format: z.enum(['xrechnung', 'zugferd']).default('xrechnung'),
});

const camtArgs = z.object({ xml: z.string().min(1), open_items: z.array(z.unknown()).optional() });
const databoxArgs = z.object({ account: z.string().optional(), from: z.string().optional(), to: z.string().optional() });
const dashboardArgs = z.object({ accounts: z.array(z.string()).optional(), services: z.string().optional() });

function field(args: unknown, name: string): string {
  const parsed = parseWithSchema(str(name), args);
  return parsed[name];
}

/** Object arguments go through the same snake_case readers as files. */
function document(args: unknown, name: string): string {
  return JSON.stringify(parseWithSchema(documentArgs(name), args)[name]);
}

// ── Offline tools ───────────────────────────────────────────────────────────

function ibanValidate(args: unknown): string {
  const check = validateIban(field(args, 'iban'));
  if (!check.valid) return `❌ ${check.iban}: ${check.message}`;
  const lines = [`✅ ${formatIban(check.iban)} is valid`, `Country: ${check.countryCode}`];
  if (check.bankCode) lines.push(`Bank code: ${check.bankCode}`);
  if (check.bankName) lines.push(`Bank: ${check.bankName}`);
  if (check.bic) lines.push(`BIC: ${check.bic}`);
  return lines.join('\n');
}

function bicLookup(args: unknown): string {
  const { bank_code: bankCode, bic } = parseWithSchema(bicArgs, args);
  if (bankCode) {
    const bank = lookupAustrianBank(bankCode.trim());
    return bank ? `✅ ${bank.bankCode}: ${bank.name}\nBIC: ${bank.bic}` : `❌ Unknown Austrian bank code ${bankCode.trim()}`;
  }
  if (bic) {
    const normalized = normalizeBic(bic);
    return isValidBic(normalized)
      ? `✅ ${normalized} is a well-formed BIC (country ${bicCountry(normalized)})`
      : `❌ ${normalized} is not a valid BIC`;
  }
  throw new ValidationError([{ code: 'required', field: 'bank_code', message: 'give bank_code or bic' }]);
}

function uidValidateFormat(args: unknown): string {
  const result = validateUidFormat(field(args, 'uid'));
  return result.valid
    ? `✅ ${result.uid} has a valid format for ${result.countryCode}`
    : `❌ ${result.uid}: ${result.error}`;
}

function svnrValidate(args: unknown, ctx: ToolContext): string {
  const { svnr, birth_date: birthDate } = parseWithSchema(svnrArgs, args);
  const check = validateSvnr(svnr, ctx.now());
  if (!check.valid) return `❌ ${check.svnr}: ${check.message}`;
  const lines = [`✅ ${formatSvnr(check.svnr)} is valid`, `Birth date: ${check.birthDate}`];
  if (birthDate) {
    lines.push(birthDateMatches(check.svnr, birthDate, ctx.now())
      ? `Birth date ${birthDate} matches`
      : `⚠ Birth date ${birthDate} does not match the number`);
  }
  return lines.join('\n');
}

function fnValidate(args: unknown): string {
  const input = field(args, 'fn');
  const fn = normalizeFn(input);
  return fn && isValidFn(fn) ? `✅ ${fn} is a valid Firmenbuch number` : `❌ "${input}" is not a valid Firmenbuch number`;
}

function uvaCalculate(args: unknown): string {
  const uva = parseUvaJson(document(args, 'uva'));
  const computed = calculatePayable(uva.kz);
  const result = validateUva(uva);
  return [
    `UVA ${periodLabel(uva.year, uva.period)}`,
    `KZ095 (payable): ${formatMinor(computed)} EUR${computed < 0 ? ' (refund)' : ''}`,
    '',
    formatValidation(result),
  ].join('\n');
}

function uvaGenerateXml(args: unknown): string {
  const uva = parseUvaJson(document(args, 'uva'));
  const xml = generateUvaXml(uva);
  return `✅ UVA ${periodLabel(uva.year, uva.period)}, KZ095 ${formatMinor(uva.kz.kz095)} EUR\n\n${xml}`;
}

function zmFromArgs(args: unknown): Zm {
  const { year, quarter, entries, csv } = parseWithSchema(zmArgs, args);
  const list = csv
    ? parseZmCsv(csv)
    : (entries ?? []).map((e) => ({
        partnerUid: e.partner_uid,
        countryCode: e.country_code,
        deliveryType: e.delivery_type,
        amount: e.amount,
      }));
  return buildZm(year, quarter, list);
}

function zmValidate(args: unknown): string {
  const zm = zmFromArgs(args);
  return `ZM ${zmPeriodLabel(zm)}: ${zm.entries.length} entries, total ${formatMinor(totalAmount(zm))} EUR\n\n` +
    formatValidation(validateZm(zm));
}

function zmGenerateXml(args: unknown): string {
  const zm = zmFromArgs(args);
  return `✅ ZM ${zmPeriodLabel(zm)}, ${zm.entries.length} entries\n\n${generateZmXml(zm)}`;
}

function erechnungCalculate(args: unknown): string {
  const invoice = calculateTotals(parseInvoiceJson(document(args, 'invoice')));
  const c = invoice.currency;
  return [
    `Invoice ${invoice.id}`,
    ...invoice.lines.map((l) => `  [${l.id}] ${l.description}: ${l.quantity} x ${formatMinor(l.unitPrice)} = ${formatMinor(l.lineTotal)} ${c}`),
    '',
    ...invoice.taxSubtotals.map((s) =>
      `  Tax ${s.taxCategory} ${s.taxPercent}%: ${formatMinor(s.taxAmount)} ${c} on ${formatMinor(s.taxableAmount)} ${c}`),
    `Net:     ${formatMinor(invoice.taxExclusiveAmount)} ${c}`,
    `Tax:     ${formatMinor(invoice.taxAmount)} ${c}`,
    `Gross:   ${formatMinor(invoice.taxInclusiveAmount)} ${c}`,
    `Payable: ${formatMinor(invoice.payableAmount)} ${c}`,
  ].join('\n');
}

function erechnungValidate(args: unknown): string {
  return formatValidation(validateInvoice(parseInvoiceJson(document(args, 'invoice'))));
}

function erechnungGenerate(args: unknown): string {
  const { invoice, format } = parseWithSchema(generateArgs, args);
  const parsed = parseInvoiceJson(JSON.stringify(invoice));
  const xml = generateInvoiceXml(parsed, format);
  return `✅ ${format === 'zugferd' ? 'ZUGFeRD' : 'XRechnung'} invoice ${parsed.id}\n\n${xml}`;
}

function erechnungParse(args: unknown): string {
  const { format, invoice } = parseInvoiceXml(field(args, 'xml'));
  return `✅ ${format} invoice ${invoice.id}\n\n${invoiceToJson(invoice)}`;
}

function pain001Generate(args: unknown, ctx: ToolContext): string {
  const ct = parseCreditTransferJson(document(args, 'credit_transfer'), ctx.now());
  return `✅ pain.001 ${ct.messageId}: ${ct.numberOfTxs} transactions, ${formatMinor(ct.controlSum)} EUR\n\n${generatePain001(ct)}`;
}

function camt053Parse(args: unknown): string {
  const { xml, open_items: openItems } = parseWithSchema(camtArgs, args);
  const statement = parseCamt053(xml);
  const lines = [
    `Statement ${statement.id}, account ${formatIban(statement.account.iban)}`,
    `Opening ${formatMinor(statement.openingBalance)}, credits ${formatMinor(totalCredits(statement))}, ` +
      `debits ${formatMinor(totalDebits(statement))}, closing ${formatMinor(statement.closingBalance)}`,
  ];
  if (!statement.balanced) {
    lines.push(`⚠ Computed closing balance ${formatMinor(statement.computedClosingBalance)} does not match`);
  }
  const result: Record<string, unknown> = { statement };
  if (openItems) {
    const reconciliation = reconcile(statement, parseOpenItemsJson(JSON.stringify(openItems)));
    lines.push(`Reconciled ${reconciliation.matches.length} of ${statement.entries.length} entries, ${reconciliation.unmatchedItems.length} open items left`);
    result.reconciliation = reconciliation;
  }
  return `${lines.join('\n')}\n\n${JSON.stringify(result, null, 2)}`;
}

// ── Online tools ────────────────────────────────────────────────────────────

async function finanzOnlineAccount(ctx: ToolContext, name: string | undefined): Promise<FinanzOnlineAccount> {
  const accounts = (await ctx.credentials().list()).filter((a): a is FinanzOnlineAccount => a.type === 'finanzonline');
  const account = name ? accounts.find((a) => a.name === name) : accounts.length === 1 ? accounts[0] : undefined;
  if (account) return account;
  throw new ValidationError([{
    code: 'unknown_account',
    field: 'account',
    message: name ? `no FinanzOnline account named "${name}"` : 'account is required when several or no FinanzOnline accounts are stored',
  }]);
}

async function databoxList(args: unknown, ctx: ToolContext): Promise<string> {
  const { account: name, from, to } = parseWithSchema(databoxArgs, args);
  const account = await finanzOnlineAccount(ctx, name);
  const client = ctx.finanzOnline();
  const entries = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.listDatabox(session, { from, to }),
    { accountName: account.name },
  );
  if (entries.length === 0) return `Databox of "${account.name}" is empty.`;
  const actions = entries.filter((e) => e.actionRequired).length;
  return [
    `Databox of "${account.name}": ${entries.length} documents, ${actions} require action`,
    ...entries.map((e) => `  ${e.actionRequired ? '⚠' : '•'} ${e.deliveredAt} ${e.typeName}: ${e.description} [${e.applkey}]`),
  ].join('\n');
}

async function dashboard(args: unknown, ctx: ToolContext): Promise<string> {
  const { accounts, services } = parseWithSchema(dashboardArgs, args);
  const records = await new Dashboard(ctx.credentials(), ctx.finanzOnline()).run({
    accounts,
    services: parseServices(services ?? ''),
  });
  const summary = summarize(records);
  return [
    `${summary.totalServices} services, ${summary.totalPending} pending items, ${summary.errors} errors`,
    ...records.map((r) => r.hasError
      ? `  ❌ ${r.account} ${r.service}: ${r.error ?? 'error'}`
      : `  ${r.status === 'pending' ? '⚠' : '✅'} ${r.account} ${r.service}: ${r.details ?? r.status}`),
  ].join('\n');
}

// ── Dispatch ────────────────────────────────────────────────────────────────

/** Runs one tool; errors propagate to the server, which turns them into an error result. */
export async function handleTool(name: string, args: unknown, ctx: ToolContext): Promise<string> {
  switch (name) {
    case 'iban_validate':         return ibanValidate(args);
    case 'bic_lookup':            return bicLookup(args);
    case 'uid_validate_format':   return uidValidateFormat(args);
    case 'svnr_validate':         return svnrValidate(args, ctx);
    case 'fn_validate':           return fnValidate(args);
    case 'uva_calculate':         return uvaCalculate(args);
    case 'uva_generate_xml':      return uvaGenerateXml(args);
    case 'zm_validate':           return zmValidate(args);
    case 'zm_generate_xml':       return zmGenerateXml(args);
    case 'erechnung_calculate':   return erechnungCalculate(args);
    case 'erechnung_validate':    return erechnungValidate(args);
    case 'erechnung_generate':    return erechnungGenerate(args);
    case 'erechnung_parse':       return erechnungParse(args);
    case 'sepa_pain001_generate': return pain001Generate(args, ctx);
    case 'camt053_parse':         return camt053Parse(args);
    case 'databox_list':          return databoxList(args, ctx);
    case 'dashboard':             return dashboard(args, ctx);
    default:
      throw new ValidationError([{ code: 'unknown_tool', field: 'name', message: `unknown tool "${name}"` }]);
  }
}

/** Error text for the client: the message, then one line per validation issue. */
export function describeError(err: unknown): string {
  if (err instanceof ValidationError) {
    return [err.message, ...err.issues.map((i) => `  • ${i.field}: ${i.message}`)].join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}
