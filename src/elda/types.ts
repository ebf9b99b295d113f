import type { Lifecycle } from '../core/lifecycle.js';
import type { Minor } from '../core/money.js';
import type { FetchFn } from '../soap/transport.js';

export type Geschlecht = 'M' | 'W';
export type BeschaeftigungsArt = 'vollzeit' | 'teilzeit' | 'geringfuegig';

/**
 * K = Kündigung, E = einvernehmliche Lösung, EN = Entlassung,
 * A = vorzeitiger Austritt, B = Ablauf der Befristung
 */
export type AustrittGrund = 'K' | 'E' | 'EN' | 'A' | 'B';

export const AUSTRITT_GRUENDE: Readonly<Record<AustrittGrund, string>> = {
  K:  'Kündigung',
  E:  'Einvernehmliche Lösung',
  EN: 'Entlassung',
  A:  'Vorzeitiger Austritt',
  B:  'Befristung',
};

export type MeldungsArt = 'AN' | 'AB';

export interface Beschaeftigung {
  art: BeschaeftigungsArt;
  taetigkeit: string;
  kollektiv: string;
  einstufung: string;
}

export interface Arbeitszeit {
  stunden: number;  // per week
  tage: number;     // per week
}

export interface Entgelt {
  brutto: Minor;      // monthly
  netto?: Minor;
  sonderzahl: Minor;  // per year
}

/** Employee registration. Dates are YYYY-MM-DD. */
export interface Anmeldung extends Lifecycle {
  dienstgeberNr: string;
  svNummer: string;
  vorname: string;
  nachname: string;
  geburtsdatum: string;
  geschlecht: Geschlecht;
  eintrittsdatum: string;
  beschaeftigung: Beschaeftigung;
  arbeitszeit: Arbeitszeit;
  entgelt: Entgelt;
}

/** Employee deregistration. */
export interface Abmeldung extends Lifecycle {
  dienstgeberNr: string;
  svNummer: string;
  austrittsdatum: string;
  grund: AustrittGrund;
  abfertigung?: Minor;
  urlaubsersatz?: Minor;
}

export interface MeldungsKopf {
  dienstgeberNr: string;
  datum: string;
  meldungsArt: MeldungsArt;
}

export interface EldaResult {
  reference: string;
  message: string;
  /** W-codes returned alongside an accepted submission. */
  warnings: string[];
}

export interface EldaStatus {
  reference: string;
  rc: number;
  code?: string;
  message: string;
}

export interface EldaClientConfig {
  mode?: 'test' | 'production';
  endpoint?: string;
  timeoutMs?: number;
  maxRetries?: number;
  retryBaseMs?: number;
  fetch?: FetchFn;
}
