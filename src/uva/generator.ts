import { create } from 'xmlbuilder2';
import { assertValid } from '../core/errors.js';
import { calculatePayable } from './calculator.js';
import { KENNZAHL_KEYS, type Uva, type UvaInput, type UvaKennzahlen } from './types.js';
import { validateUva } from './validator.js';

export const UVA_NS = 'http://www.bmf.gv.at/steuern/fon/u30';

const ZERO_KZ: Omit<UvaKennzahlen, 'kz095'> = {
  kz000: 0, kz001: 0, kz011: 0, kz017: 0, kz018: 0, kz019: 0, kz020: 0,
  kz022: 0, kz029: 0, kz060: 0, kz065: 0, kz066: 0, kz070: 0,
};

/** New draft with missing Kennzahlen zeroed and KZ095 derived. */
export function buildUva(input: UvaInput): Uva {
  const { kz095: _ignored, ...given } = input.kz ?? {};
  const base = { ...ZERO_KZ, ...given };
  const uva: Uva = {
    year: input.year,
    period: { ...input.period },
    kz: { ...base, kz095: calculatePayable(base) },
    status: 'draft',
  };
  if (input.taxNumber) uva.taxNumber = input.taxNumber;
  return uva;
}

/** U30 document; refuses an invalid return. Zero Kennzahlen are left out. */
export function generateUvaXml(uva: Uva): string {
  assertValid(validateUva(uva));

  const root = create({ version: '1.0', encoding: 'UTF-8' })
    .ele('Umsatzsteuervoranmeldung', { xmlns: UVA_NS });

  if (uva.taxNumber) root.ele('Steuernummer').txt(uva.taxNumber).up();

  const zeitraum = root.ele('Zeitraum');
  zeitraum.ele('Jahr').txt(String(uva.year)).up();
  if (uva.period.type === 'monthly') {
    zeitraum.ele('Monat').txt(String(uva.period.value).padStart(2, '0')).up();
  } else {
    zeitraum.ele('Quartal').txt(String(uva.period.value)).up();
  }
  zeitraum.up();

  const kennzahlen = root.ele('Kennzahlen');
  for (const key of KENNZAHL_KEYS) {
    const amount = uva.kz[key];
    if (amount !== 0) kennzahlen.ele(key.toUpperCase()).txt(String(amount)).up();
  }
  kennzahlen.up();

  return root.end({ prettyPrint: true });
}
