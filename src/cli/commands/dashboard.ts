import { Dashboard, parseServices, summarize } from '../../dashboard/dashboard.js';
import { foClient, table, type Command } from '../context.js';

/** `fo dashboard [--all] [--accounts=a,b] [--services=databox] [--from] [--to]` */
export const dashboardCommand: Command = async (args, ctx) => {
  const accounts = args.bool('all') ? [] : args.list('accounts');
  const services = parseServices(args.string('services') ?? '');
  const dashboard = new Dashboard(ctx.credentials(), foClient(ctx));

  const records = await dashboard.run({
    accounts,
    services,
    from: args.string('from'),
    to: args.string('to'),
  });
  const summary = summarize(records);

  const rows = records.map((r) => [
    r.account,
    r.service,
    r.identifier,
    r.pendingItems > 0 ? String(r.pendingItems) : '-',
    r.hasError ? `ERROR: ${r.error ?? ''}` : r.status,
  ]);
  const footer =
    `TOTAL: ${summary.totalServices} services` +
    (summary.totalPending > 0 ? `, ${summary.totalPending} pending items` : '') +
    (summary.errors > 0 ? `, ${summary.errors} errors` : '');

  return {
    data: {
      services: records,
      total_services: summary.totalServices,
      total_pending: summary.totalPending,
      errors: summary.errors,
    },
    text: `${table(['ACCOUNT', 'SERVICE', 'IDENTIFIER', 'PENDING', 'STATUS'], rows)}\n${footer}`,
  };
};
