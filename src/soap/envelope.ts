import { create } from 'xmlbuilder2';
import { CodecError, ProtocolError } from '../core/errors.js';
import { parseXml, isNode, child, text, type XmlNode } from '../core/xml.js';

export type XMLBuilder = ReturnType<typeof create>;

export const SOAP_ENV_NS = 'http://schemas.xmlsoap.org/soap/envelope/';

/** Nested element content; `undefined` members are skipped, arrays repeat the element. */
export type SoapValue = string | number | boolean | undefined | SoapFields | SoapValue[];
export interface SoapFields {
  [element: string]: SoapValue;
}

export interface SoapElement {
  /** Element name, optionally prefixed (e.g. "fon:upload"). */
  name: string;
  namespace: string;
  /** Prefix to bind the namespace to; omitted means default namespace. */
  prefix?: string;
  fields: SoapFields;
}

export function appendFields(parent: XMLBuilder, fields: SoapFields): void {
  for (const [name, value] of Object.entries(fields)) {
    appendValue(parent, name, value);
  }
}

function appendValue(parent: XMLBuilder, name: string, value: SoapValue): void {
  if (value === undefined) return;
  if (Array.isArray(value)) {
    for (const item of value) appendValue(parent, name, item);
    return;
  }
  const el = parent.ele(name);
  if (typeof value === 'object') appendFields(el, value);
  else el.txt(String(value));
  el.up();
}

function appendElement(parent: XMLBuilder, element: SoapElement): void {
  const nsAttr = element.prefix ? `xmlns:${element.prefix}` : 'xmlns';
  const el = parent.ele(element.name, { [nsAttr]: element.namespace });
  appendFields(el, element.fields);
  el.up();
}

/** Serialises `<soap:Envelope>` with an optional header block and one body element. */
export function buildEnvelope(body: SoapElement, header?: SoapElement): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('soap:Envelope', { 'xmlns:soap': SOAP_ENV_NS });

  if (header) {
    const h = root.ele('soap:Header');
    appendElement(h, header);
    h.up();
  }

  const b = root.ele('soap:Body');
  appendElement(b, body);
  b.up();

  return root.end({ prettyPrint: true });
}

export interface SoapResponse {
  /** Local name of the first body element, e.g. "LoginResponse". */
  name: string;
  node: XmlNode;
}

/** Extracts the first element inside `Envelope/Body`; a SOAP Fault becomes a protocol error. */
export function parseEnvelope(xmlContent: string): SoapResponse {
  const doc = parseXml(xmlContent);
  const envelope = child(doc, 'Envelope');
  const body = envelope['Body'];
  if (!isNode(body)) throw new CodecError('SOAP response has no Body element');

  const fault = body['Fault'];
  if (isNode(fault)) {
    const faultString = text(fault, 'faultstring') || 'SOAP fault';
    throw new ProtocolError('generic', text(fault, 'faultcode') || 'SOAP_FAULT', faultString, faultString);
  }

  for (const [name, value] of Object.entries(body)) {
    if (name.startsWith('@_') || name === '#text') continue;
    return { name, node: isNode(value) ? value : { '#text': value } };
  }
  throw new CodecError('SOAP Body is empty');
}
