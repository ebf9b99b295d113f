import { formatMinor } from '../../core/money.js';
import { submitZm } from '../../zm/client.js';
import { buildZm, generateZmXml, totalAmount, zmPeriodLabel } from '../../zm/generator.js';
import { parseZmCsv } from '../../zm/parser.js';
import type { Zm } from '../../zm/types.js';
import { validateZm } from '../../zm/validator.js';
import type { ParsedArgs } from '../args.js';
import { accountOfType, emit, foClient, readText, validationResult, type Command } from '../context.js';

/** `<file.csv> --year YYYY --quarter Q` */
async function load(args: ParsedArgs): Promise<Zm> {
  const entries = parseZmCsv(await readText(args.positional(0, 'ZM CSV file')));
  return buildZm(args.requireInt('year'), args.requireInt('quarter'), entries);
}

const validate: Command = async (args) => {
  const zm = await load(args);
  const result = validateZm(zm);
  const outcome = validationResult(result, { ...result, period: zmPeriodLabel(zm), entries: zm.entries.length, total_amount: totalAmount(zm) });
  return {
    ...outcome,
    text: `ZM ${zmPeriodLabel(zm)}: ${zm.entries.length} entries, total ${formatMinor(totalAmount(zm))}\n${outcome.text}`,
  };
};

const generate: Command = async (args) => {
  const zm = await load(args);
  return emit(args, generateZmXml(zm), { period: zmPeriodLabel(zm) });
};

const submit: Command = async (args, ctx) => {
  const zm = await load(args);
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const submitted = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => submitZm(client, session, zm),
    { accountName: account.name },
  );
  return {
    data: { status: submitted.status, reference: submitted.reference, period: zmPeriodLabel(zm) },
    text: `ZM ${zmPeriodLabel(zm)} submitted, reference ${submitted.reference ?? '-'}`,
  };
};

export const zmCommands: Record<string, Command> = { validate, generate, submit };
