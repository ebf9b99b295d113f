import { writeFile } from 'node:fs/promises';
import { readUidCsv, writeUidResultsCsv } from '../../finanzonline/uid.js';
import type { UidQueryResult } from '../../finanzonline/types.js';
import { UsageError } from '../args.js';
import { accountOfType, foClient, readText, table, type Command } from '../context.js';

function level(value: number | undefined): 1 | 2 {
  if (value === undefined || value === 2) return 2;
  if (value === 1) return 1;
  throw new UsageError('--level must be 1 or 2');
}

function describe(r: UidQueryResult): string {
  if (r.error) return `${r.uid}: ${r.error}`;
  if (!r.valid) return `${r.uid}: not valid`;
  const address = [r.street, [r.postCode, r.city].filter(Boolean).join(' ')].filter(Boolean).join(', ');
  return `${r.uid}: valid${r.companyName ? `, ${r.companyName}` : ''}${address ? `, ${address}` : ''}`;
}

const check: Command = async (args, ctx) => {
  const uid = args.positional(0, 'UID');
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const result = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.checkUid(session, uid, { level: level(args.int('level')) }),
    { accountName: account.name },
  );
  return { data: result, text: describe(result), exitCode: result.valid ? 0 : 1 };
};

const batch: Command = async (args, ctx) => {
  const uids = readUidCsv(await readText(args.positional(0, 'UID CSV file')));
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const results = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.uid.checkBatch(session, uids),
    { accountName: account.name },
  );
  const out = args.string('out');
  if (out) await writeFile(out, writeUidResultsCsv(results));
  const valid = results.filter((r) => r.valid).length;
  const rows = results.map((r) => [r.uid, r.valid ? 'yes' : 'no', r.companyName ?? '', r.error ?? '']);
  return {
    data: { results, total: results.length, valid, ...(out ? { file: out } : {}) },
    text: `${table(['UID', 'VALID', 'NAME', 'ERROR'], rows)}\n${valid} of ${results.length} valid`,
  };
};

export const uidCommands: Record<string, Command> = { check, batch };
