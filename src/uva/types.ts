import type { Lifecycle } from '../core/lifecycle.js';
import type { Minor } from '../core/money.js';

export type UvaPeriodType = 'monthly' | 'quarterly';

export interface UvaPeriod {
  type: UvaPeriodType;
  value: number;  // 1-12 monthly, 1-4 quarterly
}

/** Kennzahlen (numbered form fields), all in cents. */
export interface UvaKennzahlen {
  kz000: Minor;  // Gesamtbetrag der Lieferungen
  kz001: Minor;  // Innergemeinschaftliche Lieferungen
  kz011: Minor;  // Steuerfrei ohne Vorsteuerabzug
  kz017: Minor;  // Normalsteuersatz 20 %
  kz018: Minor;  // Ermäßigter Steuersatz 10 %
  kz019: Minor;  // Ermäßigter Steuersatz 13 %
  kz020: Minor;  // Sonstige Steuersätze
  kz022: Minor;  // Einfuhrumsatzsteuer
  kz029: Minor;  // Innergemeinschaftliche Erwerbe
  kz060: Minor;  // Vorsteuer
  kz065: Minor;  // Einfuhrumsatzsteuer als Vorsteuer
  kz066: Minor;  // Vorsteuern aus IG Erwerben
  kz070: Minor;  // Sonstige Berichtigungen
  kz095: Minor;  // Zahllast (+) / Gutschrift (-)
}

export type KennzahlKey = keyof UvaKennzahlen;

export const KENNZAHL_KEYS: readonly KennzahlKey[] = [
  'kz000', 'kz001', 'kz011', 'kz017', 'kz018', 'kz019', 'kz020',
  'kz022', 'kz029', 'kz060', 'kz065', 'kz066', 'kz070', 'kz095',
];

export interface Uva extends Lifecycle {
  year: number;
  period: UvaPeriod;
  taxNumber?: string;  // Steuernummer
  kz: UvaKennzahlen;
}

export interface UvaInput {
  year: number;
  period: UvaPeriod;
  taxNumber?: string;
  kz?: Partial<UvaKennzahlen>;
}

/** Builds a full Kennzahlen record from a per-field function. */
export function mapKennzahlen(fn: (key: KennzahlKey) => Minor): UvaKennzahlen {
  return {
    kz000: fn('kz000'), kz001: fn('kz001'), kz011: fn('kz011'), kz017: fn('kz017'),
    kz018: fn('kz018'), kz019: fn('kz019'), kz020: fn('kz020'), kz022: fn('kz022'),
    kz029: fn('kz029'), kz060: fn('kz060'), kz065: fn('kz065'), kz066: fn('kz066'),
    kz070: fn('kz070'), kz095: fn('kz095'),
  };
}
