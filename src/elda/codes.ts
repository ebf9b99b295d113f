import { ProtocolError, type ProtocolReason } from '../core/errors.js';

interface EldaCode {
  reason: ProtocolReason;
  message: string;
}

const CODES: ReadonlyMap<string, EldaCode> = new Map([
  // E0xx validation
  ['E001', { reason: 'elda-validation', message: 'SV-Nummer ist ungültig' }],
  ['E002', { reason: 'elda-validation', message: 'Beitragsgruppe fehlt oder ist ungültig' }],
  ['E003', { reason: 'elda-validation', message: 'Zeitraum ist ungültig' }],
  ['E004', { reason: 'elda-validation', message: 'Betrag ist ungültig' }],
  ['E005', { reason: 'elda-validation', message: 'Datum ist ungültig' }],
  ['E006', { reason: 'elda-validation', message: 'Pflichtfeld fehlt' }],
  ['E007', { reason: 'elda-validation', message: 'Formatfehler' }],
  ['E008', { reason: 'elda-validation', message: 'Meldung bereits vorhanden' }],
  // E1xx authentication
  ['E101', { reason: 'elda-authentication', message: 'ELDA-Zertifikat ist abgelaufen' }],
  ['E102', { reason: 'elda-authentication', message: 'Keine Berechtigung für Dienstgeber' }],
  ['E103', { reason: 'elda-authentication', message: 'ELDA-Zertifikat ist ungültig' }],
  ['E104', { reason: 'elda-authentication', message: 'ELDA-Session ist abgelaufen' }],
  // E2xx business
  ['E201', { reason: 'elda-business', message: 'Dienstnehmer nicht gefunden' }],
  ['E202', { reason: 'elda-business', message: 'Dienstnehmer bereits angemeldet' }],
  ['E203', { reason: 'elda-business', message: 'Dienstnehmer nicht angemeldet' }],
  ['E204', { reason: 'elda-business', message: 'Meldung wurde bereits gesendet' }],
  ['E205', { reason: 'elda-business', message: 'Korrektur nicht möglich' }],
  // E9xx system
  ['E901', { reason: 'elda-system', message: 'ELDA-Server nicht erreichbar' }],
  ['E902', { reason: 'elda-system', message: 'ELDA-System in Wartung' }],
  ['E903', { reason: 'elda-system', message: 'ELDA-Anfrage Zeitüberschreitung' }],
]);

const RETRYABLE = new Set(['E104', 'E901', 'E902', 'E903']);

export const ELDA_WARNINGS: Readonly<Record<string, string>> = {
  W001: 'Geringfügige Beschäftigung',
  W002: 'Höchstbeitragsgrundlage überschritten',
  W003: 'Rückwirkende Meldung',
};

export function isEldaWarning(code: string): boolean {
  return code.startsWith('W');
}

export function eldaMessage(code: string): string {
  return CODES.get(code)?.message ?? ELDA_WARNINGS[code] ?? `Unbekannter ELDA-Fehler (${code})`;
}

export function toEldaError(code: string, serverMessage = ''): ProtocolError {
  const known = CODES.get(code);
  const base = known?.message ?? `Unbekannter ELDA-Fehler (${code})`;
  const message = serverMessage && serverMessage !== base ? `${base} (${serverMessage})` : base;
  return new ProtocolError(known?.reason ?? 'generic', code, message, serverMessage, RETRYABLE.has(code));
}
