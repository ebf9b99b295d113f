import { isAppError, toErrorEnvelope, type ErrorEnvelope } from '../core/errors.js';
import { UsageError, parseArgs, type ParsedArgs } from './args.js';
import { accountCommands } from './commands/account.js';
import { dashboardCommand } from './commands/dashboard.js';
import { databoxCommands } from './commands/databox.js';
import { eldaCommands } from './commands/elda.js';
import { erechnungCommands } from './commands/erechnung.js';
import { fbCommands } from './commands/fb.js';
import { sepaCommands } from './commands/sepa.js';
import { sessionCommands } from './commands/session.js';
import { uidCommands } from './commands/uid.js';
import { uvaCommands } from './commands/uva.js';
import { zmCommands } from './commands/zm.js';
import type { CliContext, Command, CommandResult } from './context.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/** A group maps subcommands to handlers; a bare command takes none. */
const COMMANDS: Record<string, Record<string, Command> | Command> = {
  account: accountCommands,
  session: sessionCommands,
  dashboard: dashboardCommand,
  databox: databoxCommands,
  uva: uvaCommands,
  zm: zmCommands,
  uid: uidCommands,
  erechnung: erechnungCommands,
  elda: eldaCommands,
  fb: fbCommands,
  sepa: sepaCommands,
};

export const USAGE = `Usage: fo <command> [subcommand] [args] [--json]

Commands:
  account    add|list|remove          manage stored credentials
  session    login|logout             verify FinanzOnline credentials
  dashboard                           databox overview across accounts
  databox    list|download            FinanzOnline databox
  uva        validate|generate|submit|status
  zm         validate|generate|submit <file.csv> --year --quarter
  uid        check <uid>|batch <file.csv>
  erechnung  create|validate|calc|parse <file> [--format xrechnung|zugferd]
  elda       validate|anmelden|abmelden <file.json>, status <reference>
  fb         search|extract|validate, watch add|list|remove|check
  sepa       validate-iban|pain001|pain008|camt053

Environment: FO_MASTER_PASSWORD unlocks the credential store, FO_HOME holds state.`;

function resolve(args: ParsedArgs): { command: Command; consumed: number } {
  const name = args.positionals[0];
  if (name === undefined) throw new UsageError('missing command');
  const entry = Object.hasOwn(COMMANDS, name) ? COMMANDS[name] : undefined;
  if (entry === undefined) throw new UsageError(`unknown command "${name}"`);
  if (typeof entry === 'function') return { command: entry, consumed: 1 };

  const sub = args.positionals[1];
  const names = Object.keys(entry).join(', ');
  if (sub === undefined) throw new UsageError(`${name} needs a subcommand: ${names}`);
  const command = Object.hasOwn(entry, sub) ? entry[sub] : undefined;
  if (command === undefined) throw new UsageError(`unknown ${name} subcommand "${sub}" (expected ${names})`);
  return { command, consumed: 2 };
}

function usageEnvelope(err: UsageError) {
  return { error: true, error_type: 'usage', message: err.message } as const;
}

function render(result: CommandResult, json: boolean, ctx: CliContext): number {
  ctx.out.out(json ? JSON.stringify({ ok: true, data: result.data }, null, 2) : result.text);
  return result.exitCode ?? EXIT_OK;
}

/**
 * Parses argv, dispatches and writes the result. Returns the exit code; the
 * caller decides what to do with it.
 */
export async function run(argv: readonly string[], ctx: CliContext): Promise<number> {
  const args = parseArgs(argv);
  const json = args.json;

  if (args.bool('help') || argv.length === 0) {
    ctx.out.out(USAGE);
    return argv.length === 0 ? EXIT_USAGE : EXIT_OK;
  }

  try {
    const { command, consumed } = resolve(args);
    return render(await command(args.shift(consumed), ctx), json, ctx);
  } catch (err) {
    if (err instanceof UsageError) {
      if (json) ctx.out.out(JSON.stringify(usageEnvelope(err), null, 2));
      else ctx.out.err(`fo: ${err.message}\n\n${USAGE}`);
      return EXIT_USAGE;
    }
    if (!isAppError(err)) ctx.logger.error({ err }, 'command failed');
    const envelope = toErrorEnvelope(err);
    if (json) {
      ctx.out.out(JSON.stringify(envelope, null, 2));
    } else {
      ctx.out.err(`Error: ${envelope.message}`);
      for (const issue of issues(envelope)) ctx.out.err(`  - ${issue}`);
    }
    return EXIT_FAILURE;
  }
}

function issues(envelope: ErrorEnvelope): string[] {
  const details = envelope.details;
  if (!Array.isArray(details)) return [];
  return details.flatMap((d: unknown) =>
    typeof d === 'object' && d !== null && 'field' in d && 'message' in d ? [`${String(d.field)}: ${String(d.message)}`] : [],
  );
}
