import type { Minor } from '../core/money.js';
import type { FetchFn } from '../soap/transport.js';

export type FbStatus = 'aktiv' | 'geloescht' | 'in_liquidation' | 'insolvent';

export const FB_STATUSES: readonly FbStatus[] = ['aktiv', 'geloescht', 'in_liquidation', 'insolvent'];

/** GmbH, AG, KG, OG, e.U., GenmbH, Verein, Stiftung; kept as delivered. */
export type LegalForm = string;

/** GF, VOR, PRO, AR, KOMP, KOMM */
export type PersonRole = string;

export type Representation = 'selbstaendig' | 'gemeinsam' | '';

export interface FbAddress {
  street: string;
  postCode: string;
  city: string;
  country: string;
}

export interface FbSearchQuery {
  name?: string;
  fn?: string;
  location?: string;
  maxHits?: number;
}

export interface FbSearchHit {
  fn: string;
  company: string;
  legalForm: LegalForm;
  seat: string;
  status: FbStatus;
}

export interface FbSearchResult {
  hits: FbSearchHit[];
  total: number;
}

export interface FbPerson {
  firstName: string;
  lastName: string;
  role: PersonRole;
  representation: Representation;
}

export interface FbShareholder {
  name: string;
  /** Register number when the shareholder is itself a company. */
  fn?: string;
  /** 1/100 of a percent: 2550 = 25.5 %. */
  shareBasisPoints: number;
  contribution: Minor;
}

export interface FbExtract {
  fn: string;
  company: string;
  legalForm: LegalForm;
  seat: string;
  address: FbAddress;
  shareCapital: Minor;
  currency: string;
  status: FbStatus;
  managingDirectors: FbPerson[];
  shareholders: FbShareholder[];
  purpose: string;
  uid?: string;
}

export interface FirmenbuchClientConfig {
  apiKey: string;
  testMode?: boolean;
  endpoint?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  fetch?: FetchFn;
}

// ── Watchlist ───────────────────────────────────────────────────────────────

export interface WatchlistEntry {
  fn: string;
  company: string;
  addedAt: string;
  lastCheck?: string;
  lastStatus?: FbStatus;
  notes?: string;
  enabled: boolean;
  /** Extract as of the last successful check. */
  lastSnapshot?: unknown;
}

export interface WatchlistChange {
  fn: string;
  company: string;
  detectedAt: string;
  oldStatus?: FbStatus;
  newStatus: FbStatus;
  /** Top-level extract fields that differ from the previous snapshot. */
  changedFields: string[];
}

export interface WatchlistCheckResult {
  checked: number;
  changes: WatchlistChange[];
  errors: { fn: string; message: string }[];
}
