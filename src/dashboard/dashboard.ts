import { CancelledError, ValidationError, toErrorEnvelope, type ErrorEnvelope } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import type { Account, CredentialStore, FinanzOnlineAccount } from '../credentials/types.js';
import type { FinanzOnlineClient } from '../finanzonline/client.js';

const log = createLogger('dashboard');

/** Read-only queries the dashboard can run per FinanzOnline account. */
export type DashboardService = 'databox';

export const DASHBOARD_SERVICES: readonly DashboardService[] = ['databox'];

export type DashboardStatus = 'ok' | 'pending' | 'error';

export interface DashboardRecord {
  account: string;
  service: DashboardService;
  /** Teilnehmer-ID of the account. */
  identifier: string;
  status: DashboardStatus;
  hasError: boolean;
  pendingItems: number;
  totalItems: number;
  details?: string;
  error?: string;
  errorType?: ErrorEnvelope['error_type'];
}

export interface DashboardOptions {
  /** Account names; all FinanzOnline accounts when omitted. */
  accounts?: readonly string[];
  services?: readonly DashboardService[];
  from?: string;
  to?: string;
  signal?: AbortSignal;
}

export interface DashboardSummary {
  totalServices: number;
  totalPending: number;
  errors: number;
}

export function parseServices(input: string): DashboardService[] {
  const names = input.split(',').map((s) => s.trim()).filter(Boolean);
  const services: DashboardService[] = [];
  for (const name of names) {
    const known = DASHBOARD_SERVICES.find((s) => s === name);
    if (!known) {
      throw new ValidationError([{ code: 'unknown_service', field: 'services', message: `unknown dashboard service "${name}"` }]);
    }
    if (!services.includes(known)) services.push(known);
  }
  return services;
}

/** Errors first, then most pending items, then account name. */
export function compareRecords(a: DashboardRecord, b: DashboardRecord): number {
  if (a.hasError !== b.hasError) return a.hasError ? -1 : 1;
  if (a.pendingItems !== b.pendingItems) return b.pendingItems - a.pendingItems;
  if (a.account !== b.account) return a.account < b.account ? -1 : 1;
  return a.service < b.service ? -1 : a.service > b.service ? 1 : 0;
}

export function summarize(records: readonly DashboardRecord[]): DashboardSummary {
  return {
    totalServices: records.length,
    totalPending: records.reduce((sum, r) => sum + r.pendingItems, 0),
    errors: records.filter((r) => r.hasError).length,
  };
}

function errorRecord(account: string, identifier: string, service: DashboardService, err: unknown): DashboardRecord {
  const envelope = toErrorEnvelope(err);
  return {
    account,
    service,
    identifier,
    status: 'error',
    hasError: true,
    pendingItems: 0,
    totalItems: 0,
    error: envelope.message,
    errorType: envelope.error_type,
  };
}

function isFinanzOnline(account: Account): account is FinanzOnlineAccount {
  return account.type === 'finanzonline';
}

/**
 * Checks many FinanzOnline accounts at once. Each account gets its own
 * session (login, queries, logout) and a failure becomes an error record
 * instead of aborting the others. The shared client transport is the only
 * thing the tasks have in common.
 */
export class Dashboard {
  constructor(
    private readonly credentials: CredentialStore,
    private readonly client: FinanzOnlineClient,
  ) {}

  async run(options: DashboardOptions = {}): Promise<DashboardRecord[]> {
    const services = options.services?.length ? options.services : DASHBOARD_SERVICES;
    const targets = await this.targets(options.accounts);

    const settled = await Promise.allSettled(targets.map((target) => this.checkAccount(target, services, options)));
    if (options.signal?.aborted) throw new CancelledError();

    const records: DashboardRecord[] = [];
    settled.forEach((outcome, i) => {
      if (outcome.status === 'fulfilled') {
        records.push(...outcome.value);
      } else {
        const target = targets[i];
        const name = typeof target === 'string' ? target : target.name;
        const identifier = typeof target === 'string' ? '' : target.tid;
        records.push(...services.map((s) => errorRecord(name, identifier, s, outcome.reason)));
      }
    });
    return records.sort(compareRecords);
  }

  /** Resolved accounts; a requested name that is missing stays a string. */
  private async targets(names: readonly string[] | undefined): Promise<(FinanzOnlineAccount | string)[]> {
    const all = await this.credentials.list();
    if (!names?.length) return all.filter(isFinanzOnline);
    return names.map((name) => {
      const account = all.find((a) => a.name === name);
      return account && isFinanzOnline(account) ? account : name;
    });
  }

  private async checkAccount(
    target: FinanzOnlineAccount | string,
    services: readonly DashboardService[],
    options: DashboardOptions,
  ): Promise<DashboardRecord[]> {
    if (typeof target === 'string') {
      throw new ValidationError([
        { code: 'unknown_account', field: 'account', message: `no FinanzOnline account named "${target}"` },
      ]);
    }
    const { signal } = options;
    try {
      return await this.client.withLogin(
        { tid: target.tid, benid: target.benid, pin: target.pin },
        async (session) => {
          const records: DashboardRecord[] = [];
          for (const service of services) {
            const entries = await this.client.listDatabox(session, { from: options.from, to: options.to, signal });
            const pending = entries.filter((e) => e.actionRequired).length;
            records.push({
              account: target.name,
              service,
              identifier: target.tid,
              status: pending > 0 ? 'pending' : 'ok',
              hasError: false,
              pendingItems: pending,
              totalItems: entries.length,
              details: pending > 0 ? `${entries.length} docs, ${pending} require action` : `${entries.length} docs`,
            });
          }
          return records;
        },
        { accountName: target.name, signal },
      );
    } catch (err) {
      log.warn({ account: target.name, err }, 'dashboard check failed');
      throw err;
    }
  }
}
