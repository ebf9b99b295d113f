import { readFile, writeFile } from 'node:fs/promises';
import { createInterface } from 'node:readline/promises';
import type { Config } from '../core/config.js';
import { ValidationError, formatValidation, type ValidationResult } from '../core/errors.js';
import type { Logger } from '../core/logger.js';
import { openCredentialStore } from '../credentials/store.js';
import type { Account, CredentialStore, EldaAccount, FinanzOnlineAccount, FirmenbuchAccount } from '../credentials/types.js';
import { EldaClient } from '../elda/client.js';
import { FinanzOnlineClient } from '../finanzonline/client.js';
import { FirmenbuchClient } from '../firmenbuch/client.js';
import type { FetchFn } from '../soap/transport.js';
import { UsageError, type ParsedArgs } from './args.js';

export interface Output {
  out(text: string): void;
  err(text: string): void;
}

/**
 * Everything a command may touch. Commands get it as an argument; there is
 * no process-wide session or store.
 */
export interface CliContext {
  config: Config;
  /** Opened on first use, since most commands never need it. */
  credentials: () => CredentialStore;
  logger: Logger;
  out: Output;
  prompt: (question: string) => Promise<string>;
  now: () => Date;
  /** Replaces global fetch in every client the command creates. */
  fetch?: FetchFn;
}

export interface CommandResult {
  data: unknown;
  text: string;
  exitCode?: number;
}

export type Command = (args: ParsedArgs, ctx: CliContext) => Promise<CommandResult>;

export function createContext(config: Config, logger: Logger): CliContext {
  let store: CredentialStore | undefined;
  return {
    config,
    logger,
    credentials: () => {
      store ??= openCredentialStore(config.home, config.masterPassword);
      return store;
    },
    out: {
      out: (text) => process.stdout.write(text.endsWith('\n') ? text : `${text}\n`),
      err: (text) => process.stderr.write(text.endsWith('\n') ? text : `${text}\n`),
    },
    prompt: async (question) => {
      const rl = createInterface({ input: process.stdin, output: process.stderr });
      try {
        return (await rl.question(question)).trim();
      } finally {
        rl.close();
      }
    },
    now: () => new Date(),
  };
}

// ── Clients ─────────────────────────────────────────────────────────────────

export function foClient(ctx: CliContext): FinanzOnlineClient {
  return FinanzOnlineClient.fromConfig(ctx.config, { fetch: ctx.fetch });
}

export function eldaClient(ctx: CliContext): EldaClient {
  return EldaClient.fromConfig(ctx.config, { fetch: ctx.fetch });
}

/** API key from `--account`, else FB_API_KEY. */
export async function firmenbuchClient(args: ParsedArgs, ctx: CliContext): Promise<FirmenbuchClient> {
  const name = args.string('account');
  const overrides = { fetch: ctx.fetch, testMode: ctx.config.firmenbuch.testMode || args.bool('test') };
  if (!name && ctx.config.firmenbuch.apiKey) return FirmenbuchClient.fromConfig(ctx.config, overrides);
  const account = await accountOfType(args, ctx, 'firmenbuch');
  return FirmenbuchClient.fromConfig(ctx.config, { ...overrides, apiKey: account.apiKey });
}

// ── Accounts ────────────────────────────────────────────────────────────────

type AccountByType = {
  finanzonline: FinanzOnlineAccount;
  elda: EldaAccount;
  firmenbuch: FirmenbuchAccount;
};

function hasType<T extends Account['type']>(account: Account, type: T): account is AccountByType[T] {
  return account.type === type;
}

/**
 * The account named by `--account`; without the flag, the only account of
 * that type.
 */
export async function accountOfType<T extends Account['type']>(
  args: ParsedArgs,
  ctx: CliContext,
  type: T,
): Promise<AccountByType[T]> {
  const name = args.string('account');
  const candidates = (await ctx.credentials().list()).filter((a): a is AccountByType[T] => hasType(a, type));
  if (name) {
    const account = candidates.find((a) => a.name === name);
    if (!account) {
      throw new ValidationError([{ code: 'unknown_account', field: 'account', message: `no ${type} account named "${name}"` }]);
    }
    return account;
  }
  if (candidates.length === 1) return candidates[0];
  throw new UsageError(candidates.length === 0 ? `no ${type} account configured` : '--account is required');
}

// ── Files and formatting ────────────────────────────────────────────────────

export function readText(path: string): Promise<string> {
  return readFile(path, 'utf-8');
}

/** Writes to `--out` when given; otherwise the content becomes the command's text. */
export async function emit(args: ParsedArgs, content: string, data: Record<string, unknown> = {}): Promise<CommandResult> {
  const target = args.string('out');
  if (!target) return { data: { ...data, content }, text: content };
  await writeFile(target, content);
  return { data: { ...data, file: target }, text: `Written to ${target}` };
}

export function validationResult(result: ValidationResult, data: unknown = result): CommandResult {
  return { data, text: formatValidation(result), exitCode: result.valid ? 0 : 1 };
}

/** Left-aligned columns, two spaces apart. */
export function table(header: readonly string[], rows: readonly (readonly string[])[]): string {
  const widths = header.map((h, i) => Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)));
  const line = (cells: readonly string[]) => cells.map((c, i) => c.padEnd(widths[i])).join('  ').trimEnd();
  return [line(header), ...rows.map(line)].join('\n');
}
