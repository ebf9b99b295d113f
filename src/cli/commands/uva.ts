import { formatMinor } from '../../core/money.js';
import { periodLabel } from '../../uva/calculator.js';
import { submitUva } from '../../uva/client.js';
import { generateUvaXml } from '../../uva/generator.js';
import { parseUvaJson, parseUvaXml } from '../../uva/parser.js';
import type { Uva } from '../../uva/types.js';
import { validateUva } from '../../uva/validator.js';
import type { ParsedArgs } from '../args.js';
import { accountOfType, emit, foClient, readText, table, validationResult, type Command } from '../context.js';

/** JSON, or a previously generated U30 XML. */
async function load(args: ParsedArgs): Promise<Uva> {
  const content = await readText(args.positional(0, 'UVA file'));
  return content.trimStart().startsWith('<') ? parseUvaXml(content) : parseUvaJson(content);
}

const validate: Command = async (args) => {
  const uva = await load(args);
  const result = validateUva(uva);
  const outcome = validationResult(result, { ...result, period: periodLabel(uva.year, uva.period), payable: uva.kz.kz095 });
  return { ...outcome, text: `UVA ${periodLabel(uva.year, uva.period)}, KZ095 ${formatMinor(uva.kz.kz095)}\n${outcome.text}` };
};

const generate: Command = async (args) => {
  const uva = await load(args);
  return emit(args, generateUvaXml(uva), { period: periodLabel(uva.year, uva.period) });
};

const submit: Command = async (args, ctx) => {
  const uva = await load(args);
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const submitted = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => submitUva(client, session, uva),
    { accountName: account.name },
  );
  return {
    data: { status: submitted.status, reference: submitted.reference, period: periodLabel(uva.year, uva.period) },
    text: `UVA ${periodLabel(uva.year, uva.period)} submitted, reference ${submitted.reference ?? '-'}`,
  };
};

/**
 * FinanzOnline files the processing notice for a return in the databox; the
 * status is whatever notice mentions the reference, `pending` until one does.
 */
const status: Command = async (args, ctx) => {
  const reference = args.positional(0, 'reference');
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const entries = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.listDatabox(session, { from: args.string('from'), to: args.string('to') }),
    { accountName: account.name },
  );
  const notices = entries.filter((e) => e.applkey === reference || e.description.includes(reference));
  if (notices.length === 0) {
    return { data: { reference, status: 'pending', notices }, text: `${reference}: no notice in the databox yet` };
  }
  const rows = notices.map((e) => [e.applkey, e.deliveredAt, e.typeName, e.description]);
  return {
    data: { reference, status: 'notified', notices },
    text: `${reference}: ${notices.length} notice(s)\n${table(['APPLKEY', 'DELIVERED', 'TYPE', 'DESCRIPTION'], rows)}`,
  };
};

export const uvaCommands: Record<string, Command> = { validate, generate, submit, status };
