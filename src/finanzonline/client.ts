import type { Config } from '../core/config.js';
import { createLogger } from '../core/logger.js';
import { SoapTransport } from '../soap/transport.js';
import { DataboxService } from './databox.js';
import { finanzOnlineEndpoints, type FinanzOnlineEndpoints } from './endpoints.js';
import { SessionService, type Session } from './session.js';
import type {
  DataboxDocument,
  DataboxEntry,
  DataboxListOptions,
  FinanzOnlineConfig,
  FinanzOnlineCredentials,
  UidQueryResult,
  UploadKind,
  UploadResult,
} from './types.js';
import { UidService } from './uid.js';
import { UploadService } from './upload.js';

const log = createLogger('fo-client');

/**
 * One transport, four services. The client holds no session: callers log in,
 * pass the session to each call and log out, so several sessions can share it.
 */
export class FinanzOnlineClient {
  readonly endpoints: FinanzOnlineEndpoints;
  readonly transport: SoapTransport;
  readonly sessions: SessionService;
  readonly databox: DataboxService;
  readonly upload: UploadService;
  readonly uid: UidService;

  constructor(config: FinanzOnlineConfig = {}) {
    this.endpoints = finanzOnlineEndpoints(config.baseUrl);
    this.transport = new SoapTransport({
      timeoutMs:   config.timeoutMs,
      maxRetries:  config.maxRetries,
      retryBaseMs: config.retryBaseMs,
      fetch:       config.fetch,
    });
    this.sessions = new SessionService(this.transport, this.endpoints, config.herstellerId);
    this.databox = new DataboxService(this.transport, this.endpoints);
    this.upload = new UploadService(this.transport, this.endpoints);
    this.uid = new UidService(this.transport, this.endpoints);
  }

  static fromConfig(config: Config, overrides: Partial<FinanzOnlineConfig> = {}): FinanzOnlineClient {
    return new FinanzOnlineClient({ ...config.finanzOnline, ...overrides });
  }

  login(credentials: FinanzOnlineCredentials, options: { accountName?: string; signal?: AbortSignal } = {}): Promise<Session> {
    return this.sessions.login(credentials, options);
  }

  logout(session: Session, options: { signal?: AbortSignal } = {}): Promise<void> {
    return this.sessions.logout(session, options);
  }

  listDatabox(session: Session | undefined, options: DataboxListOptions = {}): Promise<DataboxEntry[]> {
    return this.databox.list(session, options);
  }

  downloadDocument(session: Session | undefined, applkey: string, options: { signal?: AbortSignal } = {}): Promise<DataboxDocument> {
    return this.databox.downloadToBytes(session, applkey, options);
  }

  submit(
    session: Session | undefined,
    kind: UploadKind,
    payload: Uint8Array | string,
    options: { signal?: AbortSignal } = {},
  ): Promise<UploadResult> {
    return this.upload.submit(session, kind, payload, options);
  }

  checkUid(session: Session | undefined, uid: string, options: { level?: 1 | 2; signal?: AbortSignal } = {}): Promise<UidQueryResult> {
    return this.uid.check(session, uid, options);
  }

  /** Logs in, runs `op`, and always logs out again. */
  async withLogin<T>(
    credentials: FinanzOnlineCredentials,
    op: (session: Session) => Promise<T>,
    options: { accountName?: string; signal?: AbortSignal } = {},
  ): Promise<T> {
    const session = await this.login(credentials, options);
    try {
      return await op(session);
    } finally {
      try {
        await this.logout(session, { signal: options.signal });
      } catch (err) {
        log.warn({ err, account: options.accountName }, 'logout failed');
      }
    }
  }
}
