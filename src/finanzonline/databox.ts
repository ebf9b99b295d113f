import { mkdir, rename, writeFile } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { CodecError } from '../core/errors.js';
import { child, children, intText, text } from '../core/xml.js';
import type { SoapTransport } from '../soap/transport.js';
import { checkResult } from './codes.js';
import type { FinanzOnlineEndpoints } from './endpoints.js';
import { sessionFields, withSession, type Session } from './session.js';
import type { DataboxDocument, DataboxEntry, DataboxListOptions } from './types.js';

const TYPE_NAMES: Readonly<Record<string, string>> = {
  B: 'Bescheid',
  E: 'Ergänzungsersuchen',
  M: 'Mitteilung',
  V: 'Vorhalt',
};

/** Supplementary requests and preliminary rulings need an answer. */
export function isActionRequired(classification: string): boolean {
  return classification === 'E' || classification === 'V';
}

/** Total: unknown codes map to themselves. */
export function typeName(classification: string): string {
  return TYPE_NAMES[classification] ?? classification;
}

const BASE64_RE = /^[A-Za-z0-9+/]*={0,2}$/;

export function decodeBase64(content: string): Buffer {
  const compact = content.replace(/\s/g, '');
  if (compact.length % 4 !== 0 || !BASE64_RE.test(compact)) {
    throw new CodecError('failed to decode document content: invalid base64');
  }
  return Buffer.from(compact, 'base64');
}

export class DataboxService {
  constructor(
    private readonly transport: SoapTransport,
    private readonly endpoints: FinanzOnlineEndpoints,
  ) {}

  list(session: Session | undefined, options: DataboxListOptions = {}): Promise<DataboxEntry[]> {
    return withSession(session, async (s) => {
      const { url, namespace } = this.endpoints.databox;
      const res = await this.transport.call({
        url,
        signal: options.signal,
        body: {
          name: 'GetDataboxInfo',
          namespace,
          fields: {
            ...sessionFields(s),
            ts_zust_von: options.from,
            ts_zust_bis: options.to,
          },
        },
      });
      checkResult(intText(res.node, 'rc'), text(res.node, 'msg'));

      return children(child(res.node, 'result'), 'databox').map((e) => {
        const classification = text(e, 'erlession');
        return {
          applkey:        text(e, 'applkey'),
          description:    text(e, 'filebez'),
          deliveredAt:    text(e, 'ts_zust'),
          classification,
          version:        text(e, 'veression'),
          typeName:       typeName(classification),
          actionRequired: isActionRequired(classification),
        };
      });
    });
  }

  downloadToBytes(
    session: Session | undefined,
    applkey: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<DataboxDocument> {
    return withSession(session, async (s) => {
      const { url, namespace } = this.endpoints.databox;
      const res = await this.transport.call({
        url,
        signal: options.signal,
        body: {
          name: 'GetDatabox',
          namespace,
          fields: { ...sessionFields(s), applkey },
        },
      });
      checkResult(intText(res.node, 'rc'), text(res.node, 'msg'));

      const result = child(res.node, 'result');
      return {
        filename: text(result, 'filename') || `${applkey}.pdf`,
        content:  decodeBase64(text(result, 'content')),
      };
    });
  }

  /**
   * Saves the document under `outputDir` and returns the path. The payload is
   * decoded fully before anything is written, then moved into place.
   */
  async download(
    session: Session | undefined,
    applkey: string,
    outputDir: string,
    options: { signal?: AbortSignal } = {},
  ): Promise<string> {
    const doc = await this.downloadToBytes(session, applkey, options);
    await mkdir(outputDir, { recursive: true });
    const target = join(outputDir, basename(doc.filename));
    const tmp = `${target}.part`;
    await writeFile(tmp, doc.content);
    await rename(tmp, target);
    return target;
  }
}
