import { accountOfType, foClient, table, type Command } from '../context.js';

const list: Command = async (args, ctx) => {
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const entries = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.listDatabox(session, { from: args.string('from'), to: args.string('to') }),
    { accountName: account.name },
  );
  const actions = entries.filter((e) => e.actionRequired).length;
  const rows = entries.map((e) => [e.applkey, e.deliveredAt, e.typeName, e.actionRequired ? 'yes' : '', e.description]);
  return {
    data: { account: account.name, entries, total: entries.length, action_required: actions },
    text: entries.length === 0
      ? 'Databox is empty.'
      : `${table(['APPLKEY', 'DELIVERED', 'TYPE', 'ACTION', 'DESCRIPTION'], rows)}\n${entries.length} documents, ${actions} require action`,
  };
};

const download: Command = async (args, ctx) => {
  const applkey = args.positional(0, 'applkey');
  const account = await accountOfType(args, ctx, 'finanzonline');
  const client = foClient(ctx);
  const file = await client.withLogin(
    { tid: account.tid, benid: account.benid, pin: account.pin },
    (session) => client.databox.download(session, applkey, args.string('out') ?? '.'),
    { accountName: account.name },
  );
  return { data: { applkey, file }, text: `Saved ${file}` };
};

export const databoxCommands: Record<string, Command> = { list, download };
