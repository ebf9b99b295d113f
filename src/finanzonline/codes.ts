import { ProtocolError, type ProtocolReason } from '../core/errors.js';

export const RC_OK = 0;
export const RC_SESSION_EXPIRED = -1;
export const RC_UID_NOT_FOUND = 1514;

const RESULT_CODES: ReadonlyMap<number, { reason: ProtocolReason; message: string }> = new Map([
  [-1,   { reason: 'session-expired',         message: 'Session expired. Please log in again.' }],
  [-2,   { reason: 'maintenance',             message: 'FinanzOnline is under maintenance. Try again later.' }],
  [-3,   { reason: 'technical',               message: 'Technical error. Please try again later.' }],
  [-4,   { reason: 'invalid-credentials',     message: 'Invalid credentials. Check Teilnehmer-ID, Benutzer-ID, and PIN.' }],
  [-5,   { reason: 'user-locked-temporarily', message: 'User temporarily locked. Too many failed attempts.' }],
  [-6,   { reason: 'user-locked-permanently', message: 'User permanently locked. Contact FinanzOnline support.' }],
  [-7,   { reason: 'not-webservice-user',     message: 'Not a WebService user. Enable WebService access in FinanzOnline.' }],
  [-8,   { reason: 'participant-locked',      message: 'Participant locked. Contact FinanzOnline support.' }],
  [1513, { reason: 'uid-daily-limit',         message: 'UID query daily limit reached.' }],
  [1514, { reason: 'uid-not-found',           message: 'UID not found.' }],
]);

export function resultMessage(code: number): string {
  return RESULT_CODES.get(code)?.message ?? `Unknown error (code ${code})`;
}

/** Lifts a non-zero result code into the error taxonomy. */
export function toProtocolError(code: number, serverMessage = ''): ProtocolError {
  const known = RESULT_CODES.get(code);
  const base = known?.message ?? `Unknown error (code ${code})`;
  const message = serverMessage ? `${base} (${serverMessage})` : base;
  return new ProtocolError(known?.reason ?? 'generic', code, message, serverMessage);
}

export function checkResult(code: number, serverMessage = ''): void {
  if (code !== RC_OK) throw toProtocolError(code, serverMessage);
}
