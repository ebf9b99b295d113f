import { parseAbmeldungJson, parseAnmeldungJson } from '../../elda/parser.js';
import { validateAbmeldung, validateAnmeldung } from '../../elda/validator.js';
import { UsageError } from '../args.js';
import { accountOfType, eldaClient, readText, validationResult, type Command } from '../context.js';

const validate: Command = async (args, ctx) => {
  const type = args.string('type') ?? 'an';
  const content = await readText(args.positional(0, 'ELDA JSON file'));
  switch (type) {
    case 'an':
      return validationResult(validateAnmeldung(parseAnmeldungJson(content), ctx.now()));
    case 'ab':
      return validationResult(validateAbmeldung(parseAbmeldungJson(content), ctx.now()));
    default:
      throw new UsageError(`--type must be an or ab, got "${type}"`);
  }
};

const anmelden: Command = async (args, ctx) => {
  const anmeldung = parseAnmeldungJson(await readText(args.positional(0, 'Anmeldung JSON file')));
  const { result } = await eldaClient(ctx).submitAnmeldung(anmeldung, { now: ctx.now() });
  return {
    data: { status: 'submitted', ...result },
    text: [`Anmeldung submitted, reference ${result.reference}`, ...result.warnings.map((w) => `warning: ${w}`)].join('\n'),
  };
};

const abmelden: Command = async (args, ctx) => {
  const abmeldung = parseAbmeldungJson(await readText(args.positional(0, 'Abmeldung JSON file')));
  const { result } = await eldaClient(ctx).submitAbmeldung(abmeldung, { now: ctx.now() });
  return {
    data: { status: 'submitted', ...result },
    text: [`Abmeldung submitted, reference ${result.reference}`, ...result.warnings.map((w) => `warning: ${w}`)].join('\n'),
  };
};

/** `--dienstgeber-nr`, else the one from the ELDA account. */
const status: Command = async (args, ctx) => {
  const reference = args.positional(0, 'reference');
  const dienstgeberNr = args.string('dienstgeber-nr') ?? (await accountOfType(args, ctx, 'elda')).dienstgeberNr;
  const result = await eldaClient(ctx).queryStatus(dienstgeberNr, reference);
  return {
    data: result,
    text: `${result.reference}: ${result.rc === 0 ? 'OK' : `rc ${result.rc}${result.code ? ` (${result.code})` : ''}`} ${result.message}`.trimEnd(),
    exitCode: result.rc === 0 ? 0 : 1,
  };
};

export const eldaCommands: Record<string, Command> = { validate, anmelden, abmelden, status };
