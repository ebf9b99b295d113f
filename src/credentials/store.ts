import { createCipheriv, createDecipheriv, randomBytes, scryptSync } from 'node:crypto';
import { join } from 'node:path';
import { z } from 'zod';
import { CodecError, ValidationError, type ValidationIssue } from '../core/errors.js';
import { readOptional, writePrivateFile } from '../core/files.js';
import { createLogger } from '../core/logger.js';
import { parseJson, parseWithSchema } from '../core/schema.js';
import type { Account, AccountSummary, CredentialStore } from './types.js';

const log = createLogger('credentials');

export const CREDENTIALS_FILE = 'credentials.enc';

const ALGORITHM = 'aes-256-gcm';
const SALT_LENGTH = 16;
const IV_LENGTH = 12;
const KEY_LENGTH = 32;
const DEFAULT_COST = 2 ** 15;

const TID_RE = /^\d{12}$/;
const DIENSTGEBER_RE = /^\d{8}$/;

// ── Validation ──────────────────────────────────────────────────────────────

export function validateAccount(account: Account): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  const required = (field: string, value: string) => {
    if (!value) issues.push({ code: 'required', field, message: `${field} must not be empty` });
  };

  if (!account.name.trim()) {
    issues.push({ code: 'required', field: 'name', message: 'name must not be empty' });
  } else if (account.name.length > 100) {
    issues.push({ code: 'too_long', field: 'name', message: 'name must not exceed 100 characters' });
  }

  switch (account.type) {
    case 'finanzonline':
      if (!TID_RE.test(account.tid)) issues.push({ code: 'invalid_tid', field: 'tid', message: 'tid must be exactly 12 digits' });
      required('benid', account.benid);
      required('pin', account.pin);
      break;
    case 'elda':
      if (!DIENSTGEBER_RE.test(account.dienstgeberNr)) {
        issues.push({ code: 'invalid_dienstgeber_nr', field: 'dienstgeber_nr', message: 'dienstgeber_nr must be exactly 8 digits' });
      }
      required('benutzer_nr', account.benutzerNr);
      required('pin', account.pin);
      break;
    case 'firmenbuch':
      required('api_key', account.apiKey);
      break;
  }
  return issues;
}

export function summarizeAccount(account: Account): AccountSummary {
  switch (account.type) {
    case 'finanzonline':
      return { name: account.name, type: account.type, identifier: account.tid };
    case 'elda':
      return { name: account.name, type: account.type, identifier: account.dienstgeberNr };
    case 'firmenbuch':
      return { name: account.name, type: account.type, identifier: '' };
  }
}

function checkNew(existing: readonly Account[], account: Account): void {
  const issues = validateAccount(account);
  if (existing.some((a) => a.name === account.name)) {
    issues.push({ code: 'duplicate_account', field: 'name', message: `account "${account.name}" already exists` });
  }
  if (issues.length > 0) throw new ValidationError(issues);
}

// ── In-memory store ─────────────────────────────────────────────────────────

export class MemoryCredentialStore implements CredentialStore {
  private readonly accounts: Account[];

  constructor(accounts: readonly Account[] = []) {
    this.accounts = [...accounts];
  }

  async get(name: string): Promise<Account | undefined> {
    return this.accounts.find((a) => a.name === name);
  }

  async list(): Promise<Account[]> {
    return [...this.accounts];
  }

  async add(account: Account): Promise<void> {
    checkNew(this.accounts, account);
    this.accounts.push(account);
  }

  async remove(name: string): Promise<boolean> {
    const index = this.accounts.findIndex((a) => a.name === name);
    if (index < 0) return false;
    this.accounts.splice(index, 1);
    return true;
  }
}

// ── Encrypted file store ────────────────────────────────────────────────────

const envelopeSchema = z.object({
  version: z.literal(1),
  salt: z.string(),
  iv: z.string(),
  tag: z.string(),
  data: z.string(),
});

type Envelope = z.infer<typeof envelopeSchema>;

// Plaintext payload, snake_case on disk.
const accountSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('finanzonline'), name: z.string(), tid: z.string(), benid: z.string(), pin: z.string() }),
  z.object({ type: z.literal('elda'), name: z.string(), dienstgeber_nr: z.string(), benutzer_nr: z.string(), pin: z.string() }),
  z.object({ type: z.literal('firmenbuch'), name: z.string(), api_key: z.string() }),
]);

const payloadSchema = z.object({
  version: z.literal(1),
  accounts: z.array(accountSchema),
});

type AccountJson = z.infer<typeof accountSchema>;

function fromJson(a: AccountJson): Account {
  switch (a.type) {
    case 'finanzonline':
      return { type: a.type, name: a.name, tid: a.tid, benid: a.benid, pin: a.pin };
    case 'elda':
      return { type: a.type, name: a.name, dienstgeberNr: a.dienstgeber_nr, benutzerNr: a.benutzer_nr, pin: a.pin };
    case 'firmenbuch':
      return { type: a.type, name: a.name, apiKey: a.api_key };
  }
}

function toJson(a: Account): AccountJson {
  switch (a.type) {
    case 'finanzonline':
      return { type: a.type, name: a.name, tid: a.tid, benid: a.benid, pin: a.pin };
    case 'elda':
      return { type: a.type, name: a.name, dienstgeber_nr: a.dienstgeberNr, benutzer_nr: a.benutzerNr, pin: a.pin };
    case 'firmenbuch':
      return { type: a.type, name: a.name, api_key: a.apiKey };
  }
}

export interface EncryptedStoreOptions {
  /** scrypt N; lower it only in tests. */
  cost?: number;
}

/**
 * AES-256-GCM encrypted JSON file; the key is derived with scrypt from the
 * master password and a fresh salt on every write. The file is read once and
 * cached; writes replace it atomically with mode 0600.
 */
export class EncryptedFileCredentialStore implements CredentialStore {
  private readonly cost: number;
  private cache: Account[] | undefined;

  constructor(
    readonly file: string,
    private readonly password: string,
    options: EncryptedStoreOptions = {},
  ) {
    if (!password) {
      throw new ValidationError([{ code: 'required', field: 'master_password', message: 'master password is required' }]);
    }
    this.cost = options.cost ?? DEFAULT_COST;
  }

  static inHome(home: string, password: string, options: EncryptedStoreOptions = {}): EncryptedFileCredentialStore {
    return new EncryptedFileCredentialStore(join(home, CREDENTIALS_FILE), password, options);
  }

  async get(name: string): Promise<Account | undefined> {
    return (await this.load()).find((a) => a.name === name);
  }

  async list(): Promise<Account[]> {
    return [...(await this.load())];
  }

  async add(account: Account): Promise<void> {
    const accounts = await this.load();
    checkNew(accounts, account);
    await this.save([...accounts, account]);
    log.info({ account: account.name, type: account.type }, 'account added');
  }

  async remove(name: string): Promise<boolean> {
    const accounts = await this.load();
    const remaining = accounts.filter((a) => a.name !== name);
    if (remaining.length === accounts.length) return false;
    await this.save(remaining);
    log.info({ account: name }, 'account removed');
    return true;
  }

  private async load(): Promise<Account[]> {
    if (this.cache) return this.cache;
    const content = await readOptional(this.file);
    if (content === undefined) {
      this.cache = [];
      return this.cache;
    }
    const envelope = parseWithSchema(envelopeSchema, parseJson(content, 'credential store'));
    const payload = parseWithSchema(payloadSchema, parseJson(this.decrypt(envelope), 'credential store'));
    this.cache = payload.accounts.map(fromJson);
    return this.cache;
  }

  private async save(accounts: Account[]): Promise<void> {
    const plaintext = JSON.stringify({ version: 1, accounts: accounts.map(toJson) });
    await writePrivateFile(this.file, JSON.stringify(this.encrypt(plaintext), null, 2) + '\n');
    this.cache = accounts;
  }

  private deriveKey(salt: Buffer): Buffer {
    // scrypt needs 128 * N * r bytes; the default maxmem is exactly that for N = 2^15.
    return scryptSync(this.password, salt, KEY_LENGTH, { N: this.cost, r: 8, p: 1, maxmem: 256 * this.cost * 8 });
  }

  private encrypt(plaintext: string): Envelope {
    const salt = randomBytes(SALT_LENGTH);
    const iv = randomBytes(IV_LENGTH);
    const cipher = createCipheriv(ALGORITHM, this.deriveKey(salt), iv);
    const data = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final()]);
    return {
      version: 1,
      salt: salt.toString('base64'),
      iv: iv.toString('base64'),
      tag: cipher.getAuthTag().toString('base64'),
      data: data.toString('base64'),
    };
  }

  private decrypt(envelope: Envelope): string {
    const salt = Buffer.from(envelope.salt, 'base64');
    const decipher = createDecipheriv(ALGORITHM, this.deriveKey(salt), Buffer.from(envelope.iv, 'base64'));
    try {
      decipher.setAuthTag(Buffer.from(envelope.tag, 'base64'));
      return Buffer.concat([decipher.update(Buffer.from(envelope.data, 'base64')), decipher.final()]).toString('utf8');
    } catch (err) {
      throw new CodecError('Cannot decrypt credential store: wrong master password or corrupted file', { cause: err });
    }
  }
}

/** The store under `home`, unlocked by the configured master password. */
export function openCredentialStore(home: string, masterPassword: string | undefined): CredentialStore {
  if (!masterPassword) {
    throw new ValidationError([
      { code: 'required', field: 'FO_MASTER_PASSWORD', message: 'set FO_MASTER_PASSWORD to unlock the credential store' },
    ]);
  }
  return EncryptedFileCredentialStore.inHome(home, masterPassword);
}
