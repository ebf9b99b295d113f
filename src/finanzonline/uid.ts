import { ValidationError } from '../core/errors.js';
import { parseCsv, requireColumns, writeCsv } from '../core/csv.js';
import { intText, text } from '../core/xml.js';
import { validateUidFormat } from '../identifiers/uid.js';
import type { SoapTransport } from '../soap/transport.js';
import { RC_OK, RC_UID_NOT_FOUND, checkResult, resultMessage } from './codes.js';
import type { FinanzOnlineEndpoints } from './endpoints.js';
import { withSession, type Session } from './session.js';
import type { UidQueryResult } from './types.js';

export class UidService {
  constructor(
    private readonly transport: SoapTransport,
    private readonly endpoints: FinanzOnlineEndpoints,
  ) {}

  /**
   * Level-2 query returns name and address. The format is checked locally
   * first; nothing is sent for a malformed UID.
   */
  check(
    session: Session | undefined,
    uid: string,
    options: { level?: 1 | 2; signal?: AbortSignal } = {},
  ): Promise<UidQueryResult> {
    const format = validateUidFormat(uid);
    if (!format.valid) {
      return Promise.reject(new ValidationError([{ code: 'uid_format', field: 'uid', message: format.error }]));
    }

    return withSession(session, async (s) => {
      const { url, namespace } = this.endpoints.uid;
      const res = await this.transport.call({
        url,
        signal: options.signal,
        body: {
          name: 'uid:uidAbfrage',
          prefix: 'uid',
          namespace,
          fields: {
            tid:    s.tid,
            benid:  s.benid,
            id:     s.token,
            uid_tn: format.uid,
            stufe:  options.level ?? 2,
          },
        },
      });

      const rc = intText(res.node, 'rc');
      const msg = text(res.node, 'msg');
      const queriedAt = new Date().toISOString();

      if (rc === RC_UID_NOT_FOUND) {
        return {
          uid: format.uid,
          valid: false,
          countryCode: format.countryCode,
          queriedAt,
          errorCode: rc,
          error: resultMessage(rc),
        };
      }
      checkResult(rc, msg);

      const gueltig = text(res.node, 'gueltig');
      const valid = rc === RC_OK && (gueltig === 'true' || gueltig === '1');
      return {
        uid: text(res.node, 'uid_tn') || format.uid,
        valid,
        countryCode: format.countryCode,
        companyName: text(res.node, 'name') || undefined,
        street:      text(res.node, 'adr_strasse') || undefined,
        postCode:    text(res.node, 'adr_plz') || undefined,
        city:        text(res.node, 'adr_ort') || undefined,
        queriedAt,
      };
    });
  }

  /**
   * Sequential batch; a failing item is recorded and the batch continues.
   * Session loss and cancellation stop the batch.
   */
  async checkBatch(
    session: Session | undefined,
    uids: readonly string[],
    options: { signal?: AbortSignal } = {},
  ): Promise<UidQueryResult[]> {
    const results: UidQueryResult[] = [];
    for (const uid of uids) {
      try {
        results.push(await this.check(session, uid, options));
      } catch (err) {
        if (err instanceof ValidationError) {
          results.push({
            uid,
            valid: false,
            countryCode: uid.slice(0, 2).toUpperCase(),
            queriedAt: new Date().toISOString(),
            error: err.issues[0]?.message ?? err.message,
          });
          continue;
        }
        throw err;
      }
    }
    return results;
  }
}

// ── List / CSV helpers ──────────────────────────────────────────────────────

/** Splits free text on commas, semicolons and newlines. */
export function parseUidList(input: string): string[] {
  return input
    .split(/[,;\r\n]+/)
    .map((s) => s.trim().toUpperCase())
    .filter((s) => s.length > 0);
}

/** Reads the `uid` column; other columns are ignored. */
export function readUidCsv(content: string): string[] {
  const { header, rows } = parseCsv(content);
  const { uid: col } = requireColumns(header, ['uid']);
  return rows
    .map((r) => (r[col] ?? '').trim().toUpperCase())
    .filter((s) => s.length > 0);
}

export const UID_RESULT_HEADER = ['uid', 'valid', 'company_name', 'street', 'post_code', 'city', 'error'] as const;

export function writeUidResultsCsv(results: readonly UidQueryResult[]): string {
  return writeCsv(UID_RESULT_HEADER, results.map((r) => [
    r.uid,
    String(r.valid),
    r.companyName ?? '',
    r.street ?? '',
    r.postCode ?? '',
    r.city ?? '',
    r.error ?? '',
  ]));
}
