import { ValidationError } from '../../core/errors.js';
import { formatMinor } from '../../core/money.js';
import { WatchlistStore } from '../../firmenbuch/watchlist.js';
import { isValidFn, normalizeFn } from '../../identifiers/fn.js';
import { UsageError } from '../args.js';
import { firmenbuchClient, table, type CliContext, type Command } from '../context.js';

function requireFn(input: string): string {
  const fn = normalizeFn(input);
  if (!fn) throw new ValidationError([{ code: 'invalid_fn', field: 'fn', message: `invalid Firmenbuch number "${input}"` }]);
  return fn;
}

const search: Command = async (args, ctx) => {
  const client = await firmenbuchClient(args, ctx);
  const result = await client.search({
    name: args.string('name') ?? args.positionals[0],
    fn: args.string('fn'),
    location: args.string('location'),
    maxHits: args.int('max-hits'),
  });
  const rows = result.hits.map((h) => [h.fn, h.company, h.legalForm, h.seat, h.status]);
  return {
    data: result,
    text: result.hits.length === 0
      ? 'No matches.'
      : `${table(['FN', 'COMPANY', 'FORM', 'SEAT', 'STATUS'], rows)}\n${result.hits.length} of ${result.total} shown`,
  };
};

const extract: Command = async (args, ctx) => {
  const fn = requireFn(args.positional(0, 'Firmenbuch number'));
  const e = await (await firmenbuchClient(args, ctx)).extract(fn);
  const lines = [
    `${e.fn}  ${e.company} (${e.legalForm})`,
    `Status:   ${e.status}`,
    `Seat:     ${e.seat}, ${e.address.street}, ${e.address.postCode} ${e.address.city}`,
    `Capital:  ${formatMinor(e.shareCapital)} ${e.currency}`,
  ];
  if (e.uid) lines.push(`UID:      ${e.uid}`);
  for (const p of e.managingDirectors) {
    lines.push(`Director: ${p.firstName} ${p.lastName}${p.representation ? ` (${p.representation})` : ''}`);
  }
  for (const s of e.shareholders) {
    lines.push(`Holder:   ${s.name} ${(s.shareBasisPoints / 100).toFixed(2)}%`);
  }
  return { data: e, text: lines.join('\n') };
};

const validate: Command = async (args) => {
  const input = args.positional(0, 'Firmenbuch number');
  const fn = normalizeFn(input);
  const valid = fn !== undefined && isValidFn(fn);
  return {
    data: { input, valid, ...(fn ? { fn } : {}) },
    text: valid ? `${fn} is a valid Firmenbuch number` : `"${input}" is not a valid Firmenbuch number`,
    exitCode: valid ? 0 : 1,
  };
};

// ── Watchlist ───────────────────────────────────────────────────────────────

function watchlist(ctx: CliContext): WatchlistStore {
  return WatchlistStore.inHome(ctx.config.home);
}

const watchCommands: Record<string, Command> = {
  async add(args, ctx) {
    const entry = await watchlist(ctx).add({
      fn: requireFn(args.positional(0, 'Firmenbuch number')),
      company: args.string('company'),
      notes: args.string('notes'),
      enabled: args.has('disabled') ? !args.bool('disabled') : undefined,
    }, ctx.now());
    return { data: entry, text: `Watching ${entry.fn}${entry.company ? ` (${entry.company})` : ''}` };
  },

  async list(_args, ctx) {
    const entries = await watchlist(ctx).list();
    const rows = entries.map((e) => [e.fn, e.company, e.lastStatus ?? '-', e.lastCheck ?? 'never', e.enabled ? '' : 'disabled']);
    return {
      data: { entries },
      text: entries.length === 0 ? 'Watchlist is empty.' : table(['FN', 'COMPANY', 'STATUS', 'LAST CHECK', ''], rows),
    };
  },

  async remove(args, ctx) {
    const fn = requireFn(args.positional(0, 'Firmenbuch number'));
    if (!(await watchlist(ctx).remove(fn))) {
      throw new ValidationError([{ code: 'not_found', field: 'fn', message: `${fn} is not on the watchlist` }]);
    }
    return { data: { fn, removed: true }, text: `Removed ${fn}` };
  },

  async check(args, ctx) {
    const client = await firmenbuchClient(args, ctx);
    const result = await watchlist(ctx).checkAll(client, { now: ctx.now() });
    const lines = [`Checked ${result.checked} entries, ${result.changes.length} changed`];
    for (const c of result.changes) {
      const status = c.oldStatus && c.oldStatus !== c.newStatus ? ` ${c.oldStatus} -> ${c.newStatus}` : '';
      lines.push(`  ${c.fn} ${c.company}:${status} ${c.changedFields.join(', ')}`);
    }
    for (const e of result.errors) lines.push(`  ${e.fn}: ERROR ${e.message}`);
    return { data: result, text: lines.join('\n'), exitCode: result.errors.length > 0 ? 1 : 0 };
  },
};

/** `fb watch add|list|remove|check` */
const watch: Command = (args, ctx) => {
  const sub = args.positional(0, 'watch subcommand (add, list, remove, check)');
  const handler = watchCommands[sub];
  if (!handler) throw new UsageError(`unknown watch subcommand "${sub}"`);
  return handler(args.shift(1), ctx);
};

export const fbCommands: Record<string, Command> = { search, extract, validate, watch };
