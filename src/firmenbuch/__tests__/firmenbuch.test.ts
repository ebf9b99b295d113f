import { mkdtemp, rm, stat } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CodecError, ProtocolError, ValidationError } from '../../core/errors.js';
import { soap, stubFetch, type Reply } from '../../soap/__tests__/stubFetch.js';
import { FB_ENDPOINT, FB_TEST_ENDPOINT, FirmenbuchClient } from '../client.js';
import type { FbExtract } from '../types.js';
import { canonicalJson, WatchlistStore, type ExtractSource } from '../watchlist.js';

const EXTRACT_XML =
  '<FN>FN123456a</FN><Firma>Muster GmbH</Firma><Rechtsform>GmbH</Rechtsform><Sitz>Wien</Sitz>' +
  '<Adresse><Strasse>Hauptstraße 1</Strasse><PLZ>1010</PLZ><Ort>Wien</Ort><Land>AT</Land></Adresse>' +
  '<Stammkapital>3500000</Stammkapital><Waehrung>EUR</Waehrung><Status>aktiv</Status>' +
  '<Geschaeftsfuehrer><Person><Vorname>Maria</Vorname><Nachname>Muster</Nachname>' +
  '<Funktion>GF</Funktion><VertretungsArt>selbstaendig</VertretungsArt></Person></Geschaeftsfuehrer>' +
  '<Gesellschafter>' +
  '<Gesellschafter><Name>Maria Muster</Name><Anteil>7500</Anteil><Stammeinlage>2625000</Stammeinlage></Gesellschafter>' +
  '<Gesellschafter><Name>Holding AG</Name><FN>FN654321b</FN><Anteil>2500</Anteil><Stammeinlage>875000</Stammeinlage></Gesellschafter>' +
  '</Gesellschafter>' +
  '<Gegenstand>Softwareentwicklung</Gegenstand><UID>ATU12345678</UID>';

function extract(fn: string, overrides: Partial<FbExtract> = {}): FbExtract {
  return {
    fn,
    company: 'Muster GmbH',
    legalForm: 'GmbH',
    seat: 'Wien',
    address: { street: 'Hauptstraße 1', postCode: '1010', city: 'Wien', country: 'AT' },
    shareCapital: 3500000,
    currency: 'EUR',
    status: 'aktiv',
    managingDirectors: [{ firstName: 'Maria', lastName: 'Muster', role: 'GF', representation: 'selbstaendig' }],
    shareholders: [{ name: 'Maria Muster', shareBasisPoints: 10000, contribution: 3500000 }],
    purpose: 'Softwareentwicklung',
    uid: 'ATU12345678',
    ...overrides,
  };
}

/** Same content, keys in a different order. */
function reordered(e: FbExtract): FbExtract {
  return {
    uid: e.uid,
    purpose: e.purpose,
    shareholders: e.shareholders,
    managingDirectors: e.managingDirectors,
    status: e.status,
    currency: e.currency,
    shareCapital: e.shareCapital,
    address: { country: e.address.country, city: e.address.city, postCode: e.address.postCode, street: e.address.street },
    seat: e.seat,
    legalForm: e.legalForm,
    company: e.company,
    fn: e.fn,
  };
}

function client(replies: Reply[], testMode = false) {
  const stub = stubFetch(replies);
  return {
    client: new FirmenbuchClient({ apiKey: 'test-api-key', testMode, maxRetries: 0, fetch: stub.fetch }),
    calls: stub.calls,
  };
}

describe('FirmenbuchClient', () => {
  it('searches with the API key in the header', async () => {
    const { client: fb, calls } = client([
      soap('FBSucheAntwort',
        '<Treffer><FN>FN123456a</FN><Firma>Muster GmbH</Firma><Rechtsform>GmbH</Rechtsform><Sitz>Wien</Sitz><Status>aktiv</Status></Treffer>' +
        '<Treffer><FN>FN654321b</FN><Firma>Muster Holding AG</Firma><Rechtsform>AG</Rechtsform><Sitz>Linz</Sitz><Status>geloescht</Status></Treffer>' +
        '<Anzahl>17</Anzahl>'),
    ], true);

    const result = await fb.search({ name: 'Muster', maxHits: 5 });

    expect(result.total).toBe(17);
    expect(result.hits).toEqual([
      { fn: 'FN123456a', company: 'Muster GmbH', legalForm: 'GmbH', seat: 'Wien', status: 'aktiv' },
      { fn: 'FN654321b', company: 'Muster Holding AG', legalForm: 'AG', seat: 'Linz', status: 'geloescht' },
    ]);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe(FB_TEST_ENDPOINT);
    expect(calls[0]?.headers.get('SOAPAction')).toBe('Search');
    expect(calls[0]?.body).toContain('<auth:APIKey>test-api-key</auth:APIKey>');
    expect(calls[0]?.body).toContain('<Name>Muster</Name>');
    expect(calls[0]?.body).toContain('<MaxHits>5</MaxHits>');
    expect(calls[0]?.body).not.toContain('<FN>');
  });

  it('normalises a register number used as search term', async () => {
    const { client: fb, calls } = client([soap('FBSucheAntwort', '')]);
    const result = await fb.search({ fn: 'fn 123456 A' });
    expect(result).toEqual({ hits: [], total: 0 });
    expect(calls[0]?.body).toContain('<FN>FN123456a</FN>');
  });

  it('refuses an empty search', async () => {
    const { client: fb, calls } = client([]);
    await expect(fb.search({ name: '  ' })).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it('reads a full extract', async () => {
    const { client: fb, calls } = client([soap('FBAuszug', EXTRACT_XML)]);

    const result = await fb.extract('FN123456a');

    expect(calls[0]?.url).toBe(FB_ENDPOINT);
    expect(calls[0]?.headers.get('SOAPAction')).toBe('Extract');
    expect(calls[0]?.body).toContain('<FN>FN123456a</FN>');
    expect(result).toEqual({
      fn: 'FN123456a',
      company: 'Muster GmbH',
      legalForm: 'GmbH',
      seat: 'Wien',
      address: { street: 'Hauptstraße 1', postCode: '1010', city: 'Wien', country: 'AT' },
      shareCapital: 3500000,
      currency: 'EUR',
      status: 'aktiv',
      managingDirectors: [{ firstName: 'Maria', lastName: 'Muster', role: 'GF', representation: 'selbstaendig' }],
      shareholders: [
        { name: 'Maria Muster', shareBasisPoints: 7500, contribution: 2625000 },
        { name: 'Holding AG', fn: 'FN654321b', shareBasisPoints: 2500, contribution: 875000 },
      ],
      purpose: 'Softwareentwicklung',
      uid: 'ATU12345678',
    });
  });

  it('validates the register number before sending', async () => {
    const { client: fb, calls } = client([]);
    await expect(fb.extract('FN123456')).rejects.toBeInstanceOf(ValidationError);
    expect(calls).toHaveLength(0);
  });

  it('raises the register error code', async () => {
    const { client: fb } = client([soap('FBAntwort', '<rc>404</rc><msg>FN nicht gefunden</msg>')]);
    const err = await fb.extract('FN999999z').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProtocolError);
    expect(err).toHaveProperty('message', 'Firmenbuch error 404: FN nicht gefunden');
  });

  it('rejects an unknown company status', async () => {
    const { client: fb } = client([soap('FBAuszug', EXTRACT_XML.replace('<Status>aktiv</Status>', '<Status>ruhend</Status>'))]);
    await expect(fb.extract('FN123456a')).rejects.toBeInstanceOf(CodecError);
  });

  it('needs an API key', () => {
    expect(() => new FirmenbuchClient({ apiKey: '' })).toThrow(ValidationError);
  });
});

describe('canonicalJson', () => {
  it('ignores key order and undefined members', () => {
    expect(canonicalJson({ b: 1, a: { d: [2, { z: 1, y: undefined }], c: 'x' } })).toBe('{"a":{"c":"x","d":[2,{"z":1}]},"b":1}');
    expect(canonicalJson(reordered(extract('FN123456a')))).toBe(canonicalJson(extract('FN123456a')));
  });
});

describe('WatchlistStore', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'fb-watchlist-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('upserts by register number and writes mode 0600', async () => {
    const store = WatchlistStore.inHome(dir);
    await store.add({ fn: 'FN123456a', company: 'Muster GmbH', notes: 'Lieferant' }, new Date('2025-01-01T00:00:00Z'));
    await store.add({ fn: 'FN654321b' }, new Date('2025-01-02T00:00:00Z'));
    const updated = await store.add({ fn: 'FN123456a', notes: 'Hauptlieferant' }, new Date('2025-01-03T00:00:00Z'));

    expect(updated).toEqual({
      fn: 'FN123456a',
      company: 'Muster GmbH',
      addedAt: '2025-01-01T00:00:00.000Z',
      notes: 'Hauptlieferant',
      enabled: true,
    });
    expect((await store.list()).map((e) => e.fn)).toEqual(['FN123456a', 'FN654321b']);
    expect(store.file).toBe(join(dir, 'fb-watchlist.json'));
    expect((await stat(store.file)).mode & 0o777).toBe(0o600);
  });

  it('reports whether remove deleted anything', async () => {
    const store = WatchlistStore.inHome(dir);
    await store.add({ fn: 'FN654321b' });
    expect(await store.remove('FN654321b')).toBe(true);
    expect(await store.remove('FN654321b')).toBe(false);
    expect(await store.list()).toEqual([]);
  });

  it('refuses a malformed register number', async () => {
    await expect(WatchlistStore.inHome(dir).add({ fn: 'FN12' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('records a change only when the canonical extract differs', async () => {
    const store = WatchlistStore.inHome(dir);
    const current = new Map<string, FbExtract>([
      ['FN123456a', extract('FN123456a')],
      ['FN654321b', extract('FN654321b', { company: 'Holding AG', legalForm: 'AG' })],
    ]);
    const source: ExtractSource = {
      extract: async (fn) => {
        const e = current.get(fn);
        if (!e) throw new Error(`no extract for ${fn}`);
        return e;
      },
    };
    await store.add({ fn: 'FN123456a' });
    await store.add({ fn: 'FN654321b' });
    await store.add({ fn: 'FN111111c', enabled: false });

    const baseline = await store.checkAll(source, { now: new Date('2025-02-01T00:00:00Z') });
    expect(baseline).toEqual({ checked: 2, changes: [], errors: [] });
    const [first] = await store.list();
    expect(first.company).toBe('Muster GmbH');
    expect(first.lastStatus).toBe('aktiv');
    expect(first.lastCheck).toBe('2025-02-01T00:00:00.000Z');

    current.set('FN123456a', extract('FN123456a', { status: 'in_liquidation', purpose: 'Abwicklung' }));
    current.set('FN654321b', reordered(extract('FN654321b', { company: 'Holding AG', legalForm: 'AG' })));

    const second = await store.checkAll(source, { now: new Date('2025-03-01T00:00:00Z') });
    expect(second.checked).toBe(2);
    expect(second.changes).toEqual([{
      fn: 'FN123456a',
      company: 'Muster GmbH',
      detectedAt: '2025-03-01T00:00:00.000Z',
      oldStatus: 'aktiv',
      newStatus: 'in_liquidation',
      changedFields: ['purpose', 'status'],
    }]);
    expect(await store.changes()).toEqual(second.changes);
    expect((await store.list()).map((e) => e.lastStatus)).toEqual(['in_liquidation', 'aktiv', undefined]);
  });

  it('reports a failed fetch and keeps the last observed status', async () => {
    const store = WatchlistStore.inHome(dir);
    await store.add({ fn: 'FN123456a', company: 'Muster GmbH' });
    const source: ExtractSource = {
      extract: async () => {
        throw new Error('register offline');
      },
    };

    const result = await store.checkAll(source, { now: new Date('2025-03-01T00:00:00Z') });

    expect(result).toEqual({ checked: 0, changes: [], errors: [{ fn: 'FN123456a', message: 'register offline' }] });
    const [entry] = await store.list();
    expect(entry.lastCheck).toBe('2025-03-01T00:00:00.000Z');
    expect(entry.lastStatus).toBeUndefined();
  });
});
