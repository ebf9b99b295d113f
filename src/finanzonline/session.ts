import { createLogger } from '../core/logger.js';
import { NoSessionError, isSessionExpired } from '../core/errors.js';
import { intText, text } from '../core/xml.js';
import type { SoapTransport } from '../soap/transport.js';
import { RC_SESSION_EXPIRED, checkResult } from './codes.js';
import type { FinanzOnlineEndpoints } from './endpoints.js';
import type { FinanzOnlineCredentials, SessionState } from './types.js';

const log = createLogger('fo-session');

/**
 * Session token bound to one participant/user. Validity is a one-way gate:
 * fresh → authenticated → invalidated, never back.
 */
export class Session {
  private _state: SessionState = 'fresh';
  private _token = '';
  readonly createdAt = new Date();

  constructor(
    readonly tid: string,
    readonly benid: string,
    readonly accountName = '',
  ) {}

  get state(): SessionState {
    return this._state;
  }

  get valid(): boolean {
    return this._state === 'authenticated';
  }

  get token(): string {
    return this._token;
  }

  /** @internal called by SessionService after a successful Login. */
  authenticate(token: string): void {
    if (this._state !== 'fresh') throw new Error(`Cannot authenticate a session in state ${this._state}`);
    this._token = token;
    this._state = 'authenticated';
  }

  invalidate(): void {
    this._state = 'invalidated';
  }
}

/** Fields every authenticated FinanzOnline request carries. */
export function sessionFields(session: Session): { id: string; tid: string; benid: string } {
  return { id: session.token, tid: session.tid, benid: session.benid };
}

/**
 * Runs an authenticated operation. Without a valid session nothing is sent;
 * a session-expired result invalidates the session before it propagates.
 */
export async function withSession<T>(session: Session | undefined, op: (session: Session) => Promise<T>): Promise<T> {
  if (!session || !session.valid) throw new NoSessionError();
  try {
    return await op(session);
  } catch (err) {
    if (isSessionExpired(err)) session.invalidate();
    throw err;
  }
}

export class SessionService {
  constructor(
    private readonly transport: SoapTransport,
    private readonly endpoints: FinanzOnlineEndpoints,
    private readonly herstellerId = 'false',
  ) {}

  async login(
    credentials: FinanzOnlineCredentials,
    options: { accountName?: string; signal?: AbortSignal } = {},
  ): Promise<Session> {
    const { url, namespace } = this.endpoints.session;
    const res = await this.transport.call({
      url,
      signal: options.signal,
      body: {
        name: 'Login',
        namespace,
        fields: {
          tid:          credentials.tid,
          benid:        credentials.benid,
          pin:          credentials.pin,
          herstellerid: this.herstellerId,
        },
      },
    });

    checkResult(intText(res.node, 'rc'), text(res.node, 'msg'));

    const session = new Session(credentials.tid, credentials.benid, options.accountName);
    session.authenticate(text(res.node, 'id'));
    log.info({ tid: credentials.tid, account: options.accountName }, 'logged in');
    return session;
  }

  /** Idempotent: an already expired session is absorbed; the session always ends invalid. */
  async logout(session: Session, options: { signal?: AbortSignal } = {}): Promise<void> {
    if (!session.valid) return;
    const { url, namespace } = this.endpoints.session;
    try {
      const res = await this.transport.call({
        url,
        signal: options.signal,
        body: {
          name: 'Logout',
          namespace,
          fields: sessionFields(session),
        },
      });
      const rc = intText(res.node, 'rc');
      if (rc !== RC_SESSION_EXPIRED) checkResult(rc, text(res.node, 'msg'));
      log.info({ tid: session.tid, account: session.accountName }, 'logged out');
    } finally {
      session.invalidate();
    }
  }
}
