import { CodecError } from '../core/errors.js';
import { createLogger } from '../core/logger.js';
import { intText, text } from '../core/xml.js';
import type { SoapTransport } from '../soap/transport.js';
import { checkResult } from './codes.js';
import type { FinanzOnlineEndpoints } from './endpoints.js';
import { withSession, type Session } from './session.js';
import type { UploadKind, UploadResult } from './types.js';

const log = createLogger('fo-upload');

/** Document kind tag → `art` value of the upload request. */
export const UPLOAD_ART: Readonly<Record<UploadKind, string>> = {
  'advance-VAT':              'U30',
  'recapitulative-statement': 'ZM',
};

export class UploadService {
  constructor(
    private readonly transport: SoapTransport,
    private readonly endpoints: FinanzOnlineEndpoints,
  ) {}

  /**
   * Submits one serialised document. Success is result code 0 with a
   * Belegnummer; any other code surfaces as a protocol error.
   */
  submit(
    session: Session | undefined,
    kind: UploadKind,
    payload: Uint8Array | string,
    options: { signal?: AbortSignal } = {},
  ): Promise<UploadResult> {
    return withSession(session, async (s) => {
      const { url, namespace } = this.endpoints.upload;
      const bytes = typeof payload === 'string' ? Buffer.from(payload, 'utf-8') : Buffer.from(payload);
      const data = bytes.toString('base64');
      const res = await this.transport.call({
        url,
        signal: options.signal,
        body: {
          name: 'fon:upload',
          prefix: 'fon',
          namespace,
          fields: {
            tid:   s.tid,
            benid: s.benid,
            id:    s.token,
            art:   UPLOAD_ART[kind],
            uebermittlung: { data },
          },
        },
      });

      const msg = text(res.node, 'msg');
      checkResult(intText(res.node, 'rc'), msg);

      const reference = text(res.node, 'belegnummer');
      if (!reference) throw new CodecError('Upload response carries no belegnummer');
      log.info({ kind, reference }, 'document submitted');
      return { kind, reference, message: msg };
    });
  }
}
