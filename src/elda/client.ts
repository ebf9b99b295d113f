import type { Config } from '../core/config.js';
import { assertValid } from '../core/errors.js';
import { assertTransition, transition } from '../core/lifecycle.js';
import { createLogger } from '../core/logger.js';
import type { XmlNode } from '../core/xml.js';
import type { SoapFields } from '../soap/envelope.js';
import { withRetry } from '../soap/retry.js';
import { DEFAULT_MAX_RETRIES, DEFAULT_RETRY_BASE_MS, SoapTransport } from '../soap/transport.js';
import { isEldaWarning, toEldaError } from './codes.js';
import { ELDA_NS, abmeldungFields, anmeldungFields } from './generator.js';
import { readEldaResponse } from './parser.js';
import type { Abmeldung, Anmeldung, EldaClientConfig, EldaResult, EldaStatus } from './types.js';
import { validateAbmeldung, validateAnmeldung } from './validator.js';

export const ELDA_ENDPOINT = 'https://elda.sozvers.at/elda-webservice/';
export const ELDA_TEST_ENDPOINT = 'https://elda-test.sozvers.at/elda-webservice/';
const ELDA_TIMEOUT_MS = 60_000;

const log = createLogger('elda');

interface CallOptions {
  signal?: AbortSignal;
  /** Kopf/Datum; defaults to today. */
  date?: string;
  now?: Date;
}

/**
 * Social-insurance registrations over SOAP. Transport failures and the
 * retryable ELDA codes (E104, E901-E903) share one retry budget.
 */
export class EldaClient {
  readonly endpoint: string;
  private readonly transport: SoapTransport;
  private readonly maxRetries: number;
  private readonly retryBaseMs: number;

  constructor(config: EldaClientConfig = {}) {
    this.endpoint = config.endpoint ?? (config.mode === 'production' ? ELDA_ENDPOINT : ELDA_TEST_ENDPOINT);
    this.maxRetries = config.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseMs = config.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
    this.transport = new SoapTransport({
      timeoutMs: config.timeoutMs ?? ELDA_TIMEOUT_MS,
      maxRetries: 0,
      fetch: config.fetch,
    });
  }

  static fromConfig(config: Config, overrides: Partial<EldaClientConfig> = {}): EldaClient {
    return new EldaClient({
      mode: config.elda.mode,
      endpoint: config.elda.endpoint,
      maxRetries: config.finanzOnline.maxRetries,
      retryBaseMs: config.finanzOnline.retryBaseMs,
      ...overrides,
    });
  }

  async submitAnmeldung(a: Anmeldung, options: CallOptions = {}): Promise<{ anmeldung: Anmeldung; result: EldaResult }> {
    assertTransition(a, 'submitted');
    assertValid(validateAnmeldung(a, options.now));
    const node = await this.call('SubmitAnmeldung', 'Anmeldung', anmeldungFields(a, options.date), options.signal);
    const result = this.result(node);
    log.info({ dienstgeberNr: a.dienstgeberNr, reference: result.reference }, 'Anmeldung submitted');
    return { anmeldung: transition(a, 'submitted', result.reference), result };
  }

  async submitAbmeldung(a: Abmeldung, options: CallOptions = {}): Promise<{ abmeldung: Abmeldung; result: EldaResult }> {
    assertTransition(a, 'submitted');
    assertValid(validateAbmeldung(a, options.now));
    const node = await this.call('SubmitAbmeldung', 'Abmeldung', abmeldungFields(a, options.date), options.signal);
    const result = this.result(node);
    log.info({ dienstgeberNr: a.dienstgeberNr, reference: result.reference }, 'Abmeldung submitted');
    return { abmeldung: transition(a, 'submitted', result.reference), result };
  }

  /** Processing state of an earlier submission; a non-zero code is reported, not raised. */
  async queryStatus(dienstgeberNr: string, reference: string, options: { signal?: AbortSignal } = {}): Promise<EldaStatus> {
    const res = await withRetry(
      () => this.transport.call({
        url: this.endpoint,
        soapAction: 'StatusAbfrage',
        signal: options.signal,
        body: {
          name: 'StatusAbfrage',
          namespace: ELDA_NS,
          fields: { DienstgeberNr: dienstgeberNr, Referenz: reference },
        },
      }),
      this.policy(options.signal, 'StatusAbfrage'),
      log,
    );
    const r = readEldaResponse(res.node);
    const status: EldaStatus = { reference: r.reference || reference, rc: r.rc, message: r.message };
    if (r.code) status.code = r.code;
    return status;
  }

  private policy(signal: AbortSignal | undefined, action: string) {
    return { maxRetries: this.maxRetries, retryBaseMs: this.retryBaseMs, signal, context: { action } };
  }

  private call(action: string, element: string, fields: SoapFields, signal?: AbortSignal): Promise<XmlNode> {
    return withRetry(
      async () => {
        const res = await this.transport.call({
          url: this.endpoint,
          soapAction: action,
          signal,
          body: { name: element, namespace: ELDA_NS, fields },
        });
        const r = readEldaResponse(res.node);
        if (r.rc !== 0) throw toEldaError(r.code || String(r.rc), r.message);
        return res.node;
      },
      this.policy(signal, action),
      log,
    );
  }

  private result(node: XmlNode): EldaResult {
    const r = readEldaResponse(node);
    return {
      reference: r.reference,
      message: r.message,
      warnings: r.code && isEldaWarning(r.code) ? [r.code] : [],
    };
  }
}
