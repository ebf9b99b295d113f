import { toValidationResult, type ValidationIssue, type ValidationResult } from '../core/errors.js';
import { birthDateMatches, validateSvnr } from '../identifiers/svnr.js';
import { AUSTRITT_GRUENDE, type Abmeldung, type Anmeldung } from './types.js';

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const DIENSTGEBER_RE = /^\d{1,10}$/;
const BESCHAEFTIGUNG_ARTEN = new Set(['vollzeit', 'teilzeit', 'geringfuegig']);

function isDate(value: string): boolean {
  if (!DATE_RE.test(value)) return false;
  const d = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === value;
}

function checkSvnr(errors: ValidationIssue[], svnr: string, now?: Date): boolean {
  const result = validateSvnr(svnr, now);
  if (!result.valid) errors.push({ code: 'sv_nummer', field: 'svNummer', message: result.message });
  return result.valid;
}

function checkRequired(errors: ValidationIssue[], field: string, value: string): boolean {
  if (value.trim()) return true;
  errors.push({ code: 'required', field, message: `${field} is required` });
  return false;
}

function checkDate(errors: ValidationIssue[], field: string, value: string): boolean {
  if (!checkRequired(errors, field, value)) return false;
  if (isDate(value)) return true;
  errors.push({ code: 'date_format', field, message: `${field} must be a date in YYYY-MM-DD format` });
  return false;
}

function checkAmount(errors: ValidationIssue[], field: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isFinite(value) || value < 0) {
    errors.push({ code: 'negative_value', field, message: `${field} must be non-negative` });
  }
}

function checkDienstgeber(errors: ValidationIssue[], value: string): void {
  if (checkRequired(errors, 'dienstgeberNr', value) && !DIENSTGEBER_RE.test(value)) {
    errors.push({ code: 'invalid_value', field: 'dienstgeberNr', message: 'Dienstgebernummer must be numeric' });
  }
}

export function validateAnmeldung(a: Anmeldung, now?: Date): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  checkDienstgeber(errors, a.dienstgeberNr);

  const svnrOk = checkSvnr(errors, a.svNummer, now);
  checkRequired(errors, 'vorname', a.vorname);
  checkRequired(errors, 'nachname', a.nachname);
  const birthOk = checkDate(errors, 'geburtsdatum', a.geburtsdatum);
  if (svnrOk && birthOk && !birthDateMatches(a.svNummer, a.geburtsdatum, now)) {
    errors.push({
      code: 'birth_date_mismatch',
      field: 'geburtsdatum',
      message: 'birth date does not match the date embedded in the SV-Nummer',
    });
  }
  if (a.geschlecht !== 'M' && a.geschlecht !== 'W')
    errors.push({ code: 'invalid_value', field: 'geschlecht', message: "geschlecht must be 'M' or 'W'" });

  const entryOk = checkDate(errors, 'eintrittsdatum', a.eintrittsdatum);
  if (entryOk && birthOk && a.eintrittsdatum <= a.geburtsdatum)
    errors.push({ code: 'date_order', field: 'eintrittsdatum', message: 'eintrittsdatum must be after geburtsdatum' });

  if (!BESCHAEFTIGUNG_ARTEN.has(a.beschaeftigung.art))
    errors.push({ code: 'invalid_value', field: 'beschaeftigung.art', message: 'art must be vollzeit, teilzeit or geringfuegig' });
  checkRequired(errors, 'beschaeftigung.taetigkeit', a.beschaeftigung.taetigkeit);

  checkAmount(errors, 'arbeitszeit.stunden', a.arbeitszeit.stunden);
  checkAmount(errors, 'arbeitszeit.tage', a.arbeitszeit.tage);
  if (a.arbeitszeit.tage > 7)
    errors.push({ code: 'invalid_value', field: 'arbeitszeit.tage', message: 'at most 7 days per week' });
  if (a.beschaeftigung.art === 'vollzeit' && a.arbeitszeit.stunden > 0 && a.arbeitszeit.stunden < 30)
    warnings.push({ code: 'hours_low', field: 'arbeitszeit.stunden', message: 'fewer than 30 hours for a full-time employment' });

  checkAmount(errors, 'entgelt.brutto', a.entgelt.brutto);
  checkAmount(errors, 'entgelt.netto', a.entgelt.netto);
  checkAmount(errors, 'entgelt.sonderzahl', a.entgelt.sonderzahl);
  if (a.entgelt.netto !== undefined && a.entgelt.netto > a.entgelt.brutto)
    warnings.push({ code: 'netto_exceeds_brutto', field: 'entgelt.netto', message: 'net pay exceeds gross pay' });

  return toValidationResult(errors, warnings);
}

export function validateAbmeldung(a: Abmeldung, now?: Date): ValidationResult {
  const errors: ValidationIssue[] = [];

  checkDienstgeber(errors, a.dienstgeberNr);
  checkSvnr(errors, a.svNummer, now);
  checkDate(errors, 'austrittsdatum', a.austrittsdatum);
  if (!(a.grund in AUSTRITT_GRUENDE))
    errors.push({ code: 'grund', field: 'grund', message: `grund must be one of ${Object.keys(AUSTRITT_GRUENDE).join(', ')}` });
  checkAmount(errors, 'abfertigung', a.abfertigung);
  checkAmount(errors, 'urlaubsersatz', a.urlaubsersatz);

  return toValidationResult(errors);
}
