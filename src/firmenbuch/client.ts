import type { Config } from '../core/config.js';
import { CodecError, ProtocolError, ValidationError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { child, children, intText, text, type XmlNode } from '../core/xml.js';
import { isValidFn, normalizeFn } from '../identifiers/fn.js';
import type { SoapElement, SoapFields, SoapResponse } from '../soap/envelope.js';
import { SoapTransport } from '../soap/transport.js';
import {
  FB_STATUSES,
  type FbExtract,
  type FbPerson,
  type FbSearchHit,
  type FbSearchQuery,
  type FbSearchResult,
  type FbShareholder,
  type FbStatus,
  type FirmenbuchClientConfig,
  type Representation,
} from './types.js';

export const FB_NS = 'https://www.justiz.gv.at/firmenbuch';
export const FB_AUTH_NS = 'https://www.justiz.gv.at/auth';
export const FB_ENDPOINT = 'https://www.justiz.gv.at/firmenbuch/ws/abfrage';
export const FB_TEST_ENDPOINT = 'https://test.justiz.gv.at/firmenbuch/ws/abfrage';

const log = createLogger('firmenbuch');

const INT_RE = /^-?\d+$/;

function integer(node: XmlNode, name: string): number {
  const value = text(node, name);
  if (!value) return 0;
  if (!INT_RE.test(value)) throw new CodecError(`${name} is not an integer: "${value}"`);
  return Number(value);
}

function status(node: XmlNode): FbStatus {
  const value = text(node, 'Status');
  const known = FB_STATUSES.find((s) => s === value);
  if (!known) throw new CodecError(`Unknown Firmenbuch status "${value}"`);
  return known;
}

function representation(value: string): Representation {
  return value === 'selbstaendig' || value === 'gemeinsam' ? value : '';
}

export function readSearchResponse(node: XmlNode): FbSearchResult {
  const hits = children(node, 'Treffer').map((t): FbSearchHit => ({
    fn: text(t, 'FN'),
    company: text(t, 'Firma'),
    legalForm: text(t, 'Rechtsform'),
    seat: text(t, 'Sitz'),
    status: status(t),
  }));
  return { hits, total: text(node, 'Anzahl') ? integer(node, 'Anzahl') : hits.length };
}

export function readExtract(node: XmlNode): FbExtract {
  const address = child(node, 'Adresse');
  const managingDirectors = children(child(node, 'Geschaeftsfuehrer'), 'Person').map((p): FbPerson => ({
    firstName: text(p, 'Vorname'),
    lastName: text(p, 'Nachname'),
    role: text(p, 'Funktion'),
    representation: representation(text(p, 'VertretungsArt')),
  }));
  const shareholders = children(child(node, 'Gesellschafter'), 'Gesellschafter').map((g): FbShareholder => {
    const holder: FbShareholder = {
      name: text(g, 'Name'),
      shareBasisPoints: integer(g, 'Anteil'),
      contribution: integer(g, 'Stammeinlage'),
    };
    const fn = text(g, 'FN');
    if (fn) holder.fn = fn;
    return holder;
  });

  const extract: FbExtract = {
    fn: text(node, 'FN'),
    company: text(node, 'Firma'),
    legalForm: text(node, 'Rechtsform'),
    seat: text(node, 'Sitz'),
    address: {
      street: text(address, 'Strasse'),
      postCode: text(address, 'PLZ'),
      city: text(address, 'Ort'),
      country: text(address, 'Land'),
    },
    shareCapital: integer(node, 'Stammkapital'),
    currency: text(node, 'Waehrung') || 'EUR',
    status: status(node),
    managingDirectors,
    shareholders,
    purpose: text(node, 'Gegenstand'),
  };
  const uid = text(node, 'UID');
  if (uid) extract.uid = uid;
  return extract;
}

/** Company-register queries over SOAP; the API key travels in an `auth:Authentication` header. */
export class FirmenbuchClient {
  readonly endpoint: string;
  private readonly apiKey: string;
  private readonly transport: SoapTransport;

  constructor(config: FirmenbuchClientConfig) {
    if (!config.apiKey) {
      throw new ValidationError([{ code: 'required', field: 'api_key', message: 'Firmenbuch API key is required' }]);
    }
    this.apiKey = config.apiKey;
    this.endpoint = config.endpoint ?? (config.testMode ? FB_TEST_ENDPOINT : FB_ENDPOINT);
    this.transport = new SoapTransport({
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      retryBaseMs: config.retryBaseMs,
      fetch: config.fetch,
    });
  }

  /** `apiKey` comes from the overrides (credential store) or FB_API_KEY. */
  static fromConfig(config: Config, overrides: Partial<FirmenbuchClientConfig> = {}): FirmenbuchClient {
    return new FirmenbuchClient({
      apiKey: config.firmenbuch.apiKey ?? '',
      testMode: config.firmenbuch.testMode,
      endpoint: config.firmenbuch.endpoint,
      maxRetries: config.finanzOnline.maxRetries,
      retryBaseMs: config.finanzOnline.retryBaseMs,
      ...overrides,
    });
  }

  async search(query: FbSearchQuery, options: { signal?: AbortSignal } = {}): Promise<FbSearchResult> {
    if (!query.name?.trim() && !query.fn?.trim() && !query.location?.trim()) {
      throw new ValidationError([{ code: 'required', field: 'query', message: 'search needs a name, FN or location' }]);
    }
    const fn = query.fn ? normalizeFn(query.fn) ?? query.fn : undefined;
    const res = await this.call('Search', 'FBSuche', {
      Name: query.name?.trim() || undefined,
      FN: fn,
      Ort: query.location?.trim() || undefined,
      MaxHits: query.maxHits,
    }, options.signal);
    const result = readSearchResponse(this.expect(res, 'FBSucheAntwort'));
    log.debug({ hits: result.hits.length, total: result.total }, 'Firmenbuch search');
    return result;
  }

  /** Nothing is sent for a malformed register number. */
  async extract(fn: string, options: { signal?: AbortSignal } = {}): Promise<FbExtract> {
    if (!isValidFn(fn)) {
      throw new ValidationError([{ code: 'invalid_fn', field: 'fn', message: `invalid Firmenbuch number "${fn}"` }]);
    }
    const res = await this.call('Extract', 'FBAuszugAnfrage', { FN: fn }, options.signal);
    return readExtract(this.expect(res, 'FBAuszug'));
  }

  private call(action: string, element: string, fields: SoapFields, signal?: AbortSignal): Promise<SoapResponse> {
    const header: SoapElement = {
      name: 'auth:Authentication',
      prefix: 'auth',
      namespace: FB_AUTH_NS,
      fields: { 'auth:APIKey': this.apiKey },
    };
    return this.transport.call({
      url: this.endpoint,
      soapAction: action,
      signal,
      header,
      body: { name: element, namespace: FB_NS, fields },
    });
  }

  /** A generic `FBAntwort` carries an error code instead of the expected element. */
  private expect(res: SoapResponse, name: string): XmlNode {
    if (res.name === name) return res.node;
    if (res.name === 'FBAntwort') {
      const rc = intText(res.node, 'rc');
      const msg = text(res.node, 'msg');
      throw new ProtocolError('generic', rc, `Firmenbuch error ${rc}: ${msg || 'no message'}`, msg);
    }
    throw new CodecError(`Unexpected Firmenbuch response <${res.name}>, expected <${name}>`);
  }
}
