import { createLogger } from '../core/logger.js';
import { AppError, CancelledError, HttpError, TransportError } from '../core/errors.js';
import { errorMessage, withRetry } from './retry.js';
import { buildEnvelope, parseEnvelope, type SoapElement, type SoapResponse } from './envelope.js';

const log = createLogger('soap');

export type FetchFn = typeof fetch;

export interface TransportOptions {
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  fetch?: FetchFn;
}

export interface SoapCall {
  url: string;
  body: SoapElement;
  header?: SoapElement;
  soapAction?: string;
  signal?: AbortSignal;
}

export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_MAX_RETRIES = 3;
export const DEFAULT_RETRY_BASE_MS = 1_000;

/**
 * SOAP 1.1 over HTTP POST. Shared between tasks; holds no per-session state.
 *
 * At most `maxRetries + 1` attempts. Only transport failures and HTTP 429/5xx
 * are retried, with backoff `retryBaseMs * 2^(attempt-1)`. The timeout applies
 * to each attempt; cancelling `signal` aborts the in-flight request.
 */
export class SoapTransport {
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryBaseMs: number;
  private readonly fetchFn: FetchFn;

  constructor(options: TransportOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
    this.fetchFn = options.fetch ?? fetch;
  }

  async call(request: SoapCall): Promise<SoapResponse> {
    const envelope = buildEnvelope(request.body, request.header);
    const raw = await this.postWithRetry(request, envelope);
    return parseEnvelope(raw);
  }

  private postWithRetry(request: SoapCall, envelope: string): Promise<string> {
    return withRetry(
      (attempt) => {
        log.debug({ url: request.url, operation: request.body.name, attempt }, 'SOAP request');
        return this.post(request, envelope);
      },
      {
        maxRetries: this.maxRetries,
        retryBaseMs: this.retryBaseMs,
        signal: request.signal,
        context: { url: request.url },
      },
      log,
    );
  }

  private async post(request: SoapCall, envelope: string): Promise<string> {
    if (request.signal?.aborted) throw new CancelledError();

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);
    const onAbort = () => controller.abort();
    request.signal?.addEventListener('abort', onAbort, { once: true });

    const headers: Record<string, string> = {
      'Content-Type': 'text/xml; charset=utf-8',
      'Accept':       'text/xml',
    };
    if (request.soapAction !== undefined) headers['SOAPAction'] = request.soapAction;

    try {
      const res = await this.fetchFn(request.url, {
        method: 'POST',
        headers,
        body: envelope,
        signal: controller.signal,
      });
      const body = await res.text();
      if (!res.ok) throw new HttpError(res.status, body);
      return body;
    } catch (err) {
      if (err instanceof AppError) throw err;
      if (request.signal?.aborted) throw new CancelledError();
      if (timedOut) throw new TransportError(`request timed out after ${this.timeoutMs} ms`, { cause: err });
      throw new TransportError(`request failed: ${errorMessage(err)}`, { cause: err });
    } finally {
      clearTimeout(timer);
      request.signal?.removeEventListener('abort', onAbort);
    }
  }
}
