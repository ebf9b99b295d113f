import { z } from 'zod';
import { CodecError } from '../core/errors.js';
import { parseJson, parseWithSchema } from '../core/schema.js';
import { child, isNode, optText, parseXml, text, type XmlNode } from '../core/xml.js';
import type { Abmeldung, Anmeldung, AustrittGrund, BeschaeftigungsArt, Geschlecht, MeldungsKopf } from './types.js';

function root(xmlContent: string | Uint8Array, name: string): XmlNode {
  const node = parseXml(xmlContent)[name];
  if (!isNode(node)) throw new CodecError(`Not an ELDA ${name}: root <${name}> missing`);
  return node;
}

function num(node: XmlNode, name: string): number {
  const value = text(node, name);
  const n = Number(value);
  if (!value || Number.isNaN(n)) throw new CodecError(`${name} is not a number: "${value}"`);
  return n;
}

function optNum(node: XmlNode, name: string): number | undefined {
  return text(node, name) ? num(node, name) : undefined;
}

function readKopf(node: XmlNode): MeldungsKopf {
  const kopf = child(node, 'Kopf');
  const art = text(kopf, 'MeldungsArt');
  if (art !== 'AN' && art !== 'AB') throw new CodecError(`Unknown MeldungsArt "${art}"`);
  return { dienstgeberNr: text(kopf, 'DienstgeberNr'), datum: text(kopf, 'Datum'), meldungsArt: art };
}

function geschlecht(value: string): Geschlecht {
  if (value === 'M' || value === 'W') return value;
  throw new CodecError(`Unknown Geschlecht "${value}"`);
}

function beschaeftigungsArt(value: string): BeschaeftigungsArt {
  if (value === 'vollzeit' || value === 'teilzeit' || value === 'geringfuegig') return value;
  throw new CodecError(`Unknown Beschaeftigung/Art "${value}"`);
}

function grund(value: string): AustrittGrund {
  if (value === 'K' || value === 'E' || value === 'EN' || value === 'A' || value === 'B') return value;
  throw new CodecError(`Unknown Grund "${value}"`);
}

export function parseAnmeldungXml(xmlContent: string | Uint8Array): { kopf: MeldungsKopf; anmeldung: Anmeldung } {
  const node = root(xmlContent, 'Anmeldung');
  const kopf = readKopf(node);
  const b = child(node, 'Beschaeftigung');
  const az = child(node, 'Arbeitszeit');
  const e = child(node, 'Entgelt');

  const anmeldung: Anmeldung = {
    dienstgeberNr:  kopf.dienstgeberNr,
    svNummer:       text(node, 'SVNummer'),
    vorname:        text(node, 'Vorname'),
    nachname:       text(node, 'Nachname'),
    geburtsdatum:   text(node, 'Geburtsdatum'),
    geschlecht:     geschlecht(text(node, 'Geschlecht')),
    eintrittsdatum: text(node, 'Eintrittsdatum'),
    beschaeftigung: {
      art:        beschaeftigungsArt(text(b, 'Art')),
      taetigkeit: text(b, 'Taetigkeit'),
      kollektiv:  text(b, 'Kollektiv'),
      einstufung: text(b, 'Einstufung'),
    },
    arbeitszeit: { stunden: num(az, 'Stunden'), tage: num(az, 'Tage') },
    entgelt: { brutto: num(e, 'Brutto'), sonderzahl: num(e, 'Sonderzahl') },
    status: 'draft',
  };
  const netto = optNum(e, 'Netto');
  if (netto !== undefined) anmeldung.entgelt.netto = netto;
  return { kopf, anmeldung };
}

export function parseAbmeldungXml(xmlContent: string | Uint8Array): { kopf: MeldungsKopf; abmeldung: Abmeldung } {
  const node = root(xmlContent, 'Abmeldung');
  const kopf = readKopf(node);
  const abmeldung: Abmeldung = {
    dienstgeberNr:  kopf.dienstgeberNr,
    svNummer:       text(node, 'SVNummer'),
    austrittsdatum: text(node, 'Austrittsdatum'),
    grund:          grund(text(node, 'Grund')),
    status:         'draft',
  };
  const abfertigung = optNum(node, 'Abfertigung');
  const urlaubsersatz = optNum(node, 'Urlaubsersatz');
  if (abfertigung !== undefined) abmeldung.abfertigung = abfertigung;
  if (urlaubsersatz !== undefined) abmeldung.urlaubsersatz = urlaubsersatz;
  return { kopf, abmeldung };
}

/** Response element of a submission or status query. */
export function readEldaResponse(node: XmlNode): { rc: number; message: string; reference: string; code: string } {
  const rc = text(node, 'rc');
  return {
    rc: rc ? Number(rc) : 0,
    message: text(node, 'msg'),
    reference: text(node, 'referenz'),
    code: optText(node, 'fehlercode') ?? '',
  };
}

// ── JSON input ──────────────────────────────────────────────────────────────

const cents = z.number().int();

const anmeldungSchema = z.object({
  dienstgeber_nr: z.string(),
  sv_nummer: z.string(),
  vorname: z.string(),
  nachname: z.string(),
  geburtsdatum: z.string(),
  geschlecht: z.enum(['M', 'W']),
  eintrittsdatum: z.string(),
  beschaeftigung: z.object({
    art: z.enum(['vollzeit', 'teilzeit', 'geringfuegig']),
    taetigkeit: z.string(),
    kollektiv: z.string().default(''),
    einstufung: z.string().default(''),
  }),
  arbeitszeit: z.object({ stunden: z.number(), tage: z.number().int() }),
  entgelt: z.object({ brutto: cents, netto: cents.optional(), sonderzahl: cents.default(0) }),
});

const abmeldungSchema = z.object({
  dienstgeber_nr: z.string(),
  sv_nummer: z.string(),
  austrittsdatum: z.string(),
  grund: z.enum(['K', 'E', 'EN', 'A', 'B']),
  abfertigung: cents.optional(),
  urlaubsersatz: cents.optional(),
});

export function parseAnmeldungJson(content: string): Anmeldung {
  const d = parseWithSchema(anmeldungSchema, parseJson(content, 'Anmeldung JSON'));
  const anmeldung: Anmeldung = {
    dienstgeberNr: d.dienstgeber_nr,
    svNummer: d.sv_nummer.replace(/\s/g, ''),
    vorname: d.vorname,
    nachname: d.nachname,
    geburtsdatum: d.geburtsdatum,
    geschlecht: d.geschlecht,
    eintrittsdatum: d.eintrittsdatum,
    beschaeftigung: d.beschaeftigung,
    arbeitszeit: d.arbeitszeit,
    entgelt: { brutto: d.entgelt.brutto, sonderzahl: d.entgelt.sonderzahl },
    status: 'draft',
  };
  if (d.entgelt.netto !== undefined) anmeldung.entgelt.netto = d.entgelt.netto;
  return anmeldung;
}

export function parseAbmeldungJson(content: string): Abmeldung {
  const d = parseWithSchema(abmeldungSchema, parseJson(content, 'Abmeldung JSON'));
  const abmeldung: Abmeldung = {
    dienstgeberNr: d.dienstgeber_nr,
    svNummer: d.sv_nummer.replace(/\s/g, ''),
    austrittsdatum: d.austrittsdatum,
    grund: d.grund,
    status: 'draft',
  };
  if (d.abfertigung !== undefined) abmeldung.abfertigung = d.abfertigung;
  if (d.urlaubsersatz !== undefined) abmeldung.urlaubsersatz = d.urlaubsersatz;
  return abmeldung;
}
