import { mkdtemp, readFile, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CodecError, ValidationError } from '../../core/errors.js';
import {
  EncryptedFileCredentialStore,
  MemoryCredentialStore,
  summarizeAccount,
  validateAccount,
} from '../store.js';
import type { Account } from '../types.js';

const fo: Account = { type: 'finanzonline', name: 'muster', tid: '123456789012', benid: 'WEBUSER', pin: 'test-secret' };
const elda: Account = { type: 'elda', name: 'lohn', dienstgeberNr: '12345678', benutzerNr: 'ELDA01', pin: 'test-secret' };
const fb: Account = { type: 'firmenbuch', name: 'register', apiKey: 'test-api-key' };

describe('validateAccount', () => {
  it('accepts well-formed records', () => {
    expect(validateAccount(fo)).toEqual([]);
    expect(validateAccount(elda)).toEqual([]);
    expect(validateAccount(fb)).toEqual([]);
  });

  it('checks the identifiers of each kind', () => {
    expect(validateAccount({ ...fo, tid: '12345', pin: '' }).map((i) => i.code)).toEqual(['invalid_tid', 'required']);
    expect(validateAccount({ ...elda, dienstgeberNr: '1234567a' }).map((i) => i.field)).toEqual(['dienstgeber_nr']);
    expect(validateAccount({ ...fb, name: ' ', apiKey: '' }).map((i) => i.field)).toEqual(['name', 'api_key']);
  });
});

describe('summarizeAccount', () => {
  it('leaves out secrets', () => {
    expect(summarizeAccount(fo)).toEqual({ name: 'muster', type: 'finanzonline', identifier: '123456789012' });
    expect(summarizeAccount(elda)).toEqual({ name: 'lohn', type: 'elda', identifier: '12345678' });
    expect(summarizeAccount(fb)).toEqual({ name: 'register', type: 'firmenbuch', identifier: '' });
  });
});

describe('MemoryCredentialStore', () => {
  it('adds, finds and removes accounts', async () => {
    const store = new MemoryCredentialStore([fo]);
    await store.add(elda);

    expect(await store.get('lohn')).toEqual(elda);
    expect(await store.get('missing')).toBeUndefined();
    expect((await store.list()).map((a) => a.name)).toEqual(['muster', 'lohn']);
    expect(await store.remove('muster')).toBe(true);
    expect(await store.remove('muster')).toBe(false);
    expect((await store.list()).map((a) => a.name)).toEqual(['lohn']);
  });

  it('rejects a duplicate name', async () => {
    const store = new MemoryCredentialStore([fo]);
    const err = await store.add({ ...fb, name: 'muster' }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toHaveProperty('code', 'duplicate_account');
  });
});

describe('EncryptedFileCredentialStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fo-credentials-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts empty when no file exists', async () => {
    const store = EncryptedFileCredentialStore.inHome(dir, 'test-master', { cost: 1024 });
    expect(await store.list()).toEqual([]);
  });

  it('round-trips every account kind through the encrypted file', async () => {
    const store = EncryptedFileCredentialStore.inHome(dir, 'test-master', { cost: 1024 });
    await store.add(fo);
    await store.add(elda);
    await store.add(fb);

    const raw = await readFile(store.file, 'utf-8');
    expect(Object.keys(JSON.parse(raw)).sort()).toEqual(['data', 'iv', 'salt', 'tag', 'version']);
    expect(raw.includes('test-secret')).toBe(false);
    expect((await stat(store.file)).mode & 0o777).toBe(0o600);

    const reopened = EncryptedFileCredentialStore.inHome(dir, 'test-master', { cost: 1024 });
    expect(await reopened.list()).toEqual([fo, elda, fb]);
    expect(await reopened.remove('lohn')).toBe(true);

    const again = EncryptedFileCredentialStore.inHome(dir, 'test-master', { cost: 1024 });
    expect((await again.list()).map((a) => a.name)).toEqual(['muster', 'register']);
  });

  it('refuses the wrong master password', async () => {
    await EncryptedFileCredentialStore.inHome(dir, 'test-master', { cost: 1024 }).add(fo);
    const wrong = EncryptedFileCredentialStore.inHome(dir, 'not-the-master', { cost: 1024 });
    await expect(wrong.list()).rejects.toBeInstanceOf(CodecError);
  });

  it('needs a master password', () => {
    expect(() => EncryptedFileCredentialStore.inHome(dir, '')).toThrow(ValidationError);
  });
});
