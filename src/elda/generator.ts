import { create } from 'xmlbuilder2';
import { assertValid } from '../core/errors.js';
import { appendFields, type SoapFields } from '../soap/envelope.js';
import type { Abmeldung, Anmeldung, MeldungsArt } from './types.js';
import { validateAbmeldung, validateAnmeldung } from './validator.js';

export const ELDA_NS = 'https://www.elda.at/elda';

export function today(now = new Date()): string {
  return now.toISOString().slice(0, 10);
}

function kopf(dienstgeberNr: string, meldungsArt: MeldungsArt, datum: string): SoapFields {
  return { DienstgeberNr: dienstgeberNr, Datum: datum, MeldungsArt: meldungsArt };
}

// ── Element content ─────────────────────────────────────────────────────────

export function anmeldungFields(a: Anmeldung, datum = today()): SoapFields {
  return {
    Kopf:           kopf(a.dienstgeberNr, 'AN', datum),
    SVNummer:       a.svNummer,
    Vorname:        a.vorname,
    Nachname:       a.nachname,
    Geburtsdatum:   a.geburtsdatum,
    Geschlecht:     a.geschlecht,
    Eintrittsdatum: a.eintrittsdatum,
    Beschaeftigung: {
      Art:        a.beschaeftigung.art,
      Taetigkeit: a.beschaeftigung.taetigkeit,
      Kollektiv:  a.beschaeftigung.kollektiv,
      Einstufung: a.beschaeftigung.einstufung,
    },
    Arbeitszeit: {
      Stunden: a.arbeitszeit.stunden,
      Tage:    a.arbeitszeit.tage,
    },
    Entgelt: {
      Brutto:     a.entgelt.brutto,
      Netto:      a.entgelt.netto,
      Sonderzahl: a.entgelt.sonderzahl,
    },
  };
}

export function abmeldungFields(a: Abmeldung, datum = today()): SoapFields {
  return {
    Kopf:           kopf(a.dienstgeberNr, 'AB', datum),
    SVNummer:       a.svNummer,
    Austrittsdatum: a.austrittsdatum,
    Grund:          a.grund,
    Abfertigung:    a.abfertigung || undefined,
    Urlaubsersatz:  a.urlaubsersatz || undefined,
  };
}

// ── Documents ───────────────────────────────────────────────────────────────

function document(name: 'Anmeldung' | 'Abmeldung', fields: SoapFields): string {
  const root = create({ version: '1.0', encoding: 'UTF-8' }).ele(name, { xmlns: ELDA_NS });
  appendFields(root, fields);
  return root.end({ prettyPrint: true });
}

export function generateAnmeldungXml(a: Anmeldung, options: { date?: string; now?: Date } = {}): string {
  assertValid(validateAnmeldung(a, options.now));
  return document('Anmeldung', anmeldungFields(a, options.date));
}

export function generateAbmeldungXml(a: Abmeldung, options: { date?: string; now?: Date } = {}): string {
  assertValid(validateAbmeldung(a, options.now));
  return document('Abmeldung', abmeldungFields(a, options.date));
}
