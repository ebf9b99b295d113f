import { XMLParser } from 'fast-xml-parser';
import { CodecError } from './errors.js';

export type XmlNode = { [key: string]: unknown };

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  textNodeName: '#text',
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
  allowBooleanAttributes: true,
});

export function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parses XML with namespace prefixes stripped; every leaf stays a string. */
export function parseXml(xmlContent: string | Uint8Array): XmlNode {
  const text = typeof xmlContent === 'string' ? xmlContent : Buffer.from(xmlContent).toString('utf-8');
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(text, true);
  } catch (e) {
    throw new CodecError(`Malformed XML: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
  }
  if (!isNode(parsed)) throw new CodecError('Malformed XML: no root element');
  return parsed;
}

export function str(node: unknown): string {
  if (node == null) return '';
  if (typeof node === 'string') return node;
  if (typeof node === 'number' || typeof node === 'boolean') return String(node);
  if (Array.isArray(node)) return str(node[0]);
  if (isNode(node) && '#text' in node) return str(node['#text']);
  return '';
}

export function attr(node: unknown, name: string): string {
  return isNode(node) ? str(node[`@_${name}`]) : '';
}

/** Child element as an object; missing or text-only children become `{}`. */
export function child(node: unknown, name: string): XmlNode {
  if (!isNode(node)) return {};
  const value = node[name];
  if (Array.isArray(value)) return isNode(value[0]) ? value[0] : {};
  return isNode(value) ? value : {};
}

export function optChild(node: unknown, name: string): XmlNode | undefined {
  if (!isNode(node) || node[name] === undefined) return undefined;
  return child(node, name);
}

/** Repeated child elements, normalised to an array. */
export function children(node: unknown, name: string): XmlNode[] {
  if (!isNode(node)) return [];
  const value = node[name];
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  return list.map((v) => (isNode(v) ? v : { '#text': str(v) }));
}

export function text(node: unknown, name: string): string {
  return isNode(node) ? str(node[name]) : '';
}

export function optText(node: unknown, name: string): string | undefined {
  return text(node, name) || undefined;
}

export function intText(node: unknown, name: string): number {
  const s = text(node, name);
  if (!s) return 0;
  const n = Number.parseInt(s, 10);
  if (Number.isNaN(n)) throw new CodecError(`Element ${name} is not an integer: "${s}"`);
  return n;
}

/** Walks a path of element names, e.g. path(root, 'Body', 'LoginResponse'). */
export function path(node: unknown, ...names: string[]): XmlNode {
  let current: XmlNode = isNode(node) ? node : {};
  for (const name of names) current = child(current, name);
  return current;
}
