import { mkdtemp, readFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect } from 'vitest';
import {
  CancelledError,
  HttpError,
  NoSessionError,
  ProtocolError,
  TransportError,
  ValidationError,
} from '../../core/errors.js';
import { soap, stubFetch, type Reply } from '../../soap/__tests__/stubFetch.js';
import { FinanzOnlineClient } from '../client.js';
import { isActionRequired, typeName } from '../databox.js';
import { parseUidList, readUidCsv, writeUidResultsCsv } from '../uid.js';

const loginOk = soap('LoginResponse', '<rc>0</rc><msg></msg><id>S1</id>');
const creds = { tid: '123456789', benid: 'WEBUSER', pin: 'test-secret' };

function clientWith(replies: Reply[], maxRetries = 3) {
  const stub = stubFetch(replies);
  const client = new FinanzOnlineClient({ fetch: stub.fetch, retryBaseMs: 0, maxRetries });
  return { client, calls: stub.calls };
}

// ── Session ─────────────────────────────────────────────────────────────────

describe('session', () => {
  it('logs in and stores the session token', async () => {
    const { client, calls } = clientWith([loginOk]);
    const session = await client.login(creds);

    expect(session.valid).toBe(true);
    expect(session.token).toBe('S1');
    expect(calls).toHaveLength(1);
    expect(calls[0].url).toBe('https://finanzonline.bmf.gv.at/fonws/ws/sessionService');
    expect(calls[0].body).toContain('<pin>test-secret</pin>');
    expect(calls[0].body).toContain('<herstellerid>false</herstellerid>');
    expect(calls[0].headers.get('Content-Type')).toBe('text/xml; charset=utf-8');
  });

  it('maps result code -4 to invalid credentials', async () => {
    const { client } = clientWith([soap('LoginResponse', '<rc>-4</rc><msg>Falsche Anmeldedaten</msg>')]);
    const err = await client.login(creds).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toMatchObject({
      reason: 'invalid-credentials',
      resultCode: -4,
      code: '-4',
      message: 'Invalid credentials. Check Teilnehmer-ID, Benutzer-ID, and PIN. (Falsche Anmeldedaten)',
    });
  });

  it('absorbs an expired session on logout', async () => {
    const { client } = clientWith([loginOk, soap('LogoutResponse', '<rc>-1</rc><msg></msg>')]);
    const session = await client.login(creds);

    await client.logout(session);
    expect(session.valid).toBe(false);
    expect(session.state).toBe('invalidated');
  });

  it('does not call the server when logging out an invalid session', async () => {
    const { client, calls } = clientWith([loginOk, soap('LogoutResponse', '<rc>0</rc>')]);
    const session = await client.login(creds);
    await client.logout(session);
    await client.logout(session);
    expect(calls).toHaveLength(2);
  });
});

// ── Transport behaviour ─────────────────────────────────────────────────────

describe('transport', () => {
  it('retries a 503 and then succeeds', async () => {
    const { client, calls } = clientWith([{ status: 503, body: 'busy' }, loginOk]);
    const session = await client.login(creds);
    expect(session.valid).toBe(true);
    expect(calls).toHaveLength(2);
  });

  it('does not retry a 400', async () => {
    const { client, calls } = clientWith([{ status: 400, body: 'bad request' }, loginOk]);
    const err = await client.login(creds).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HttpError);
    expect(err).toMatchObject({ kind: 'http-terminal', status: 400, code: 'HTTP_400' });
    expect(calls).toHaveLength(1);
  });

  it('gives up after maxRetries + 1 attempts', async () => {
    const { client, calls } = clientWith(
      [new Error('ECONNRESET'), new Error('ECONNRESET'), new Error('ECONNRESET')],
      2,
    );
    const err = await client.login(creds).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(TransportError);
    expect(err).toMatchObject({ message: 'request failed: ECONNRESET' });
    expect(calls).toHaveLength(3);
  });

  it('fails fast when the signal is already aborted', async () => {
    const { client, calls } = clientWith([loginOk]);
    const controller = new AbortController();
    controller.abort();

    await expect(client.login(creds, { signal: controller.signal })).rejects.toBeInstanceOf(CancelledError);
    expect(calls).toHaveLength(0);
  });

  it('turns a SOAP fault into a protocol error', async () => {
    const fault = {
      body:
        '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/"><soap:Body>' +
        '<soap:Fault><faultcode>soap:Server</faultcode><faultstring>boom</faultstring></soap:Fault>' +
        '</soap:Body></soap:Envelope>',
    };
    const { client } = clientWith([fault]);
    await expect(client.login(creds)).rejects.toMatchObject({ kind: 'protocol', reason: 'generic', message: 'boom' });
  });
});

// ── Databox ─────────────────────────────────────────────────────────────────

function databoxEntry(applkey: string, classification: string): string {
  return (
    `<databox><applkey>${applkey}</applkey><filebez>Dokument ${applkey}</filebez>` +
    `<ts_zust>2025-03-01</ts_zust><erlession>${classification}</erlession><veression>1</veression></databox>`
  );
}

describe('databox', () => {
  it('flags supplementary requests and preliminary rulings', async () => {
    const list = soap(
      'GetDataboxInfoResponse',
      `<rc>0</rc><msg></msg><result>${databoxEntry('A1', 'B')}${databoxEntry('A2', 'E')}${databoxEntry('A3', 'V')}</result>`,
    );
    const { client, calls } = clientWith([loginOk, list]);
    const session = await client.login(creds);
    const entries = await client.listDatabox(session, { from: '2025-01-01' });

    expect(entries.map((e) => e.applkey)).toEqual(['A1', 'A2', 'A3']);
    expect(entries.map((e) => e.actionRequired)).toEqual([false, true, true]);
    expect(entries.map((e) => e.typeName)).toEqual(['Bescheid', 'Ergänzungsersuchen', 'Vorhalt']);
    expect(entries[0]).toMatchObject({ description: 'Dokument A1', deliveredAt: '2025-03-01', version: '1' });
    expect(calls[1].url).toBe('https://finanzonline.bmf.gv.at/fonws/ws/databoxService');
    expect(calls[1].body).toContain('<id>S1</id>');
    expect(calls[1].body).toContain('<ts_zust_von>2025-01-01</ts_zust_von>');
    expect(calls[1].body).not.toContain('ts_zust_bis');
  });

  it('handles a single entry and an empty result', async () => {
    const one = soap('GetDataboxInfoResponse', `<rc>0</rc><result>${databoxEntry('A1', 'M')}</result>`);
    const none = soap('GetDataboxInfoResponse', '<rc>0</rc><result></result>');
    const { client } = clientWith([loginOk, one, none]);
    const session = await client.login(creds);

    expect(await client.listDatabox(session)).toHaveLength(1);
    expect(await client.listDatabox(session)).toEqual([]);
  });

  it('invalidates the session on result code -1 and sends nothing afterwards', async () => {
    const expired = soap('GetDataboxInfoResponse', '<rc>-1</rc><msg>abgelaufen</msg>');
    const { client, calls } = clientWith([loginOk, expired]);
    const session = await client.login(creds);

    await expect(client.listDatabox(session)).rejects.toMatchObject({ reason: 'session-expired' });
    expect(session.valid).toBe(false);

    await expect(client.listDatabox(session)).rejects.toBeInstanceOf(NoSessionError);
    await expect(client.submit(session, 'advance-VAT', '<x/>')).rejects.toBeInstanceOf(NoSessionError);
    expect(calls).toHaveLength(2);
  });

  it('falls back to <applkey>.pdf and writes the file', async () => {
    const doc = soap(
      'GetDataboxResponse',
      `<rc>0</rc><result><content>${Buffer.from('PDFDATA').toString('base64')}</content></result>`,
    );
    const { client } = clientWith([loginOk, doc]);
    const session = await client.login(creds);
    const dir = await mkdtemp(join(tmpdir(), 'fo-databox-'));

    const target = await client.databox.download(session, 'A7', dir);
    expect(target).toBe(join(dir, 'A7.pdf'));
    expect(await readFile(target, 'utf-8')).toBe('PDFDATA');
  });

  it('rejects content that is not base64', async () => {
    const doc = soap('GetDataboxResponse', '<rc>0</rc><result><filename>a.pdf</filename><content>@@@</content></result>');
    const { client } = clientWith([loginOk, doc]);
    const session = await client.login(creds);
    await expect(client.downloadDocument(session, 'A1')).rejects.toMatchObject({ kind: 'codec' });
  });

  it('names classification codes', () => {
    expect(typeName('M')).toBe('Mitteilung');
    expect(typeName('Z')).toBe('Z');
    expect(isActionRequired('B')).toBe(false);
  });
});

// ── Upload ──────────────────────────────────────────────────────────────────

describe('upload', () => {
  it('submits base64 content and returns the Belegnummer', async () => {
    const ok = soap('uploadResponse', '<rc>0</rc><msg>OK</msg><belegnummer>BN-4711</belegnummer>');
    const { client, calls } = clientWith([loginOk, ok]);
    const session = await client.login(creds);

    const result = await client.submit(session, 'advance-VAT', 'hello');
    expect(result).toEqual({ kind: 'advance-VAT', reference: 'BN-4711', message: 'OK' });
    expect(calls[1].url).toBe('https://finanzonline.bmf.gv.at/fonws/ws/fileUploadService');
    expect(calls[1].body).toContain('<art>U30</art>');
    expect(calls[1].body).toContain('<data>aGVsbG8=</data>');
  });

  it('rejects a success without Belegnummer', async () => {
    const { client } = clientWith([loginOk, soap('uploadResponse', '<rc>0</rc><msg>OK</msg>')]);
    const session = await client.login(creds);
    await expect(client.submit(session, 'recapitulative-statement', 'x')).rejects.toMatchObject({ kind: 'codec' });
  });
});

// ── UID query ───────────────────────────────────────────────────────────────

describe('uid query', () => {
  it('returns name and address for a valid UID', async () => {
    const res = soap(
      'uidAbfrageResponse',
      '<rc>0</rc><msg></msg><uid_tn>ATU12345678</uid_tn><gueltig>true</gueltig>' +
      '<name>Muster GmbH</name><adr_strasse>Hauptstraße 1</adr_strasse><adr_plz>1010</adr_plz><adr_ort>Wien</adr_ort>',
    );
    const { client, calls } = clientWith([loginOk, res]);
    const session = await client.login(creds);

    const result = await client.checkUid(session, 'atu 1234 5678');
    expect(result).toMatchObject({
      uid: 'ATU12345678',
      valid: true,
      countryCode: 'AT',
      companyName: 'Muster GmbH',
      street: 'Hauptstraße 1',
      postCode: '1010',
      city: 'Wien',
    });
    expect(calls[1].body).toContain('<uid_tn>ATU12345678</uid_tn>');
    expect(calls[1].body).toContain('<stufe>2</stufe>');
  });

  it('reports an unknown UID as invalid', async () => {
    const { client } = clientWith([loginOk, soap('uidAbfrageResponse', '<rc>1514</rc><msg></msg>')]);
    const session = await client.login(creds);

    const result = await client.checkUid(session, 'DE123456789');
    expect(result).toMatchObject({ uid: 'DE123456789', valid: false, errorCode: 1514, error: 'UID not found.' });
  });

  it('raises on the daily limit', async () => {
    const { client } = clientWith([loginOk, soap('uidAbfrageResponse', '<rc>1513</rc><msg></msg>')]);
    const session = await client.login(creds);
    await expect(client.checkUid(session, 'DE123456789')).rejects.toMatchObject({ reason: 'uid-daily-limit' });
  });

  it('checks the format before sending', async () => {
    const { client, calls } = clientWith([loginOk]);
    const session = await client.login(creds);
    await expect(client.checkUid(session, 'ATU1234')).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(1);
  });

  it('records per-item failures in a batch', async () => {
    const ok = soap('uidAbfrageResponse', '<rc>0</rc><uid_tn>ATU12345678</uid_tn><gueltig>1</gueltig>');
    const { client } = clientWith([loginOk, ok]);
    const session = await client.login(creds);

    const results = await client.uid.checkBatch(session, ['ATU12345678', 'XX1']);
    expect(results.map((r) => r.valid)).toEqual([true, false]);
    expect(results[1].error).toBe('UID too short');
  });

  it('reads and writes UID lists', () => {
    expect(parseUidList('atu12345678; DE123456789\n\n')).toEqual(['ATU12345678', 'DE123456789']);
    expect(readUidCsv('UID,note\natu12345678,x\n,\n')).toEqual(['ATU12345678']);

    const csv = writeUidResultsCsv([
      { uid: 'ATU12345678', valid: true, countryCode: 'AT', companyName: 'Muster, GmbH', queriedAt: '2025-01-01T00:00:00.000Z' },
    ]);
    expect(csv).toBe('uid,valid,company_name,street,post_code,city,error\nATU12345678,true,"Muster, GmbH",,,,\n');
  });
});
