import type { FetchFn } from '../transport.js';

export type Reply = { status?: number; body: string } | Error;

export interface RecordedCall {
  url: string;
  body: string;
  headers: Headers;
}

/** Answers each request with the next reply in order. */
export function stubFetch(replies: Reply[]): { fetch: FetchFn; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const fetchFn: FetchFn = async (input, init) => {
    calls.push({
      url: String(input),
      body: typeof init?.body === 'string' ? init.body : '',
      headers: new Headers(init?.headers),
    });
    const reply = replies.shift();
    if (!reply) throw new Error('unexpected request');
    if (reply instanceof Error) throw reply;
    return new Response(reply.body, { status: reply.status ?? 200 });
  };
  return { fetch: fetchFn, calls };
}

export function soap(name: string, inner: string): { body: string } {
  return {
    body:
      '<?xml version="1.0" encoding="UTF-8"?>' +
      '<soap:Envelope xmlns:soap="http://schemas.xmlsoap.org/soap/envelope/">' +
      `<soap:Body><${name}>${inner}</${name}></soap:Body></soap:Envelope>`,
  };
}
