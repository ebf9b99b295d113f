import { ValidationError } from '../../core/errors.js';
import { summarizeAccount } from '../../credentials/store.js';
import { ACCOUNT_TYPES, type Account, type AccountType } from '../../credentials/types.js';
import { UsageError, type ParsedArgs } from '../args.js';
import { table, type CliContext, type Command } from '../context.js';

function accountType(value: string): AccountType {
  const type = ACCOUNT_TYPES.find((t) => t === value);
  if (!type) throw new UsageError(`invalid account type: ${value} (valid: ${ACCOUNT_TYPES.join(', ')})`);
  return type;
}

/** Flag value, or an interactive answer when the flag is missing. */
async function field(args: ParsedArgs, ctx: CliContext, flag: string, question: string): Promise<string> {
  return args.string(flag) ?? (await ctx.prompt(question));
}

async function readAccount(args: ParsedArgs, ctx: CliContext, name: string, type: AccountType): Promise<Account> {
  switch (type) {
    case 'finanzonline':
      return {
        type,
        name,
        tid: await field(args, ctx, 'tid', 'TID (12 digits): '),
        benid: await field(args, ctx, 'benid', 'BenID (WebService user): '),
        pin: await field(args, ctx, 'pin', 'PIN: '),
      };
    case 'elda':
      return {
        type,
        name,
        dienstgeberNr: await field(args, ctx, 'dienstgeber-nr', 'Dienstgebernummer (8 digits): '),
        benutzerNr: await field(args, ctx, 'benutzer-nr', 'ELDA Benutzer: '),
        pin: await field(args, ctx, 'pin', 'ELDA PIN: '),
      };
    case 'firmenbuch':
      return { type, name, apiKey: await field(args, ctx, 'api-key', 'API key: ') };
  }
}

const add: Command = async (args, ctx) => {
  const name = args.positional(0, 'account name');
  const type = accountType(args.string('type') ?? 'finanzonline');
  await ctx.credentials().add(await readAccount(args, ctx, name, type));
  return {
    data: { status: 'success', action: 'add', account: name, type },
    text: `Account "${name}" (${type}) added.`,
  };
};

const list: Command = async (_args, ctx) => {
  const accounts = (await ctx.credentials().list()).map(summarizeAccount);
  if (accounts.length === 0) return { data: [], text: 'No accounts configured.' };
  return {
    data: accounts,
    text: table(['NAME', 'TYPE', 'IDENTIFIER'], accounts.map((a) => [a.name, a.type, a.identifier])),
  };
};

const remove: Command = async (args, ctx) => {
  const name = args.positional(0, 'account name');
  if (!(await ctx.credentials().remove(name))) {
    throw new ValidationError([{ code: 'unknown_account', field: 'account', message: `account "${name}" not found` }]);
  }
  return { data: { status: 'success', action: 'remove', account: name }, text: `Account "${name}" removed.` };
};

export const accountCommands: Record<string, Command> = { add, list, remove };
