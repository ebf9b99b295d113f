import type { FetchFn } from '../soap/transport.js';

export interface FinanzOnlineConfig {
  /** Base URL without trailing slash; service paths are appended. */
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  /** Value sent as `herstellerid` on login. */
  herstellerId?: string;
  fetch?: FetchFn;
}

export interface FinanzOnlineCredentials {
  tid: string;    // Teilnehmer-ID
  benid: string;  // Benutzer-ID
  pin: string;
}

export type SessionState = 'fresh' | 'authenticated' | 'invalidated';

// ── Databox ─────────────────────────────────────────────────────────────────

export interface DataboxEntry {
  applkey: string;
  description: string;   // filebez
  deliveredAt: string;   // ts_zust
  classification: string; // B=Bescheid, E=Ergänzungsersuchen, M=Mitteilung, V=Vorhalt
  version: string;
  typeName: string;
  actionRequired: boolean;
}

export interface DataboxListOptions {
  from?: string;  // YYYY-MM-DD
  to?: string;    // YYYY-MM-DD
  signal?: AbortSignal;
}

export interface DataboxDocument {
  filename: string;
  content: Buffer;
}

// ── Upload ──────────────────────────────────────────────────────────────────

export type UploadKind = 'advance-VAT' | 'recapitulative-statement';

export interface UploadResult {
  kind: UploadKind;
  reference: string;  // belegnummer
  message: string;
}

// ── UID query ───────────────────────────────────────────────────────────────

export interface UidQueryResult {
  uid: string;
  valid: boolean;
  countryCode: string;
  companyName?: string;
  street?: string;
  postCode?: string;
  city?: string;
  queriedAt: string;
  errorCode?: number;
  error?: string;
}
