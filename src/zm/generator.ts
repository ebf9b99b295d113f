import { create } from 'xmlbuilder2';
import { assertValid } from '../core/errors.js';
import type { Minor } from '../core/money.js';
import type { Zm, ZmEntry } from './types.js';
import { validateZm } from './validator.js';

export function buildZm(year: number, quarter: number, entries: ZmEntry[] = []): Zm {
  return {
    year,
    quarter,
    entries: entries.map((e) => ({
      partnerUid: e.partnerUid.trim().toUpperCase(),
      countryCode: e.countryCode.trim().toUpperCase(),
      deliveryType: e.deliveryType,
      amount: e.amount,
    })),
    status: 'draft',
  };
}

export function totalAmount(zm: Zm): Minor {
  return zm.entries.reduce((sum, e) => sum + e.amount, 0);
}

/** "Q1/2025" */
export function zmPeriodLabel(zm: Pick<Zm, 'year' | 'quarter'>): string {
  return `Q${zm.quarter}/${zm.year}`;
}

/** Bemessungsgrundlage is written in cents. */
export function generateZmXml(zm: Zm): string {
  assertValid(validateZm(zm));

  const root = create({ version: '1.0', encoding: 'UTF-8' }).ele('ZM');
  root.ele('Jahr').txt(String(zm.year)).up();
  root.ele('Quartal').txt(String(zm.quarter)).up();

  for (const entry of zm.entries) {
    root.ele('Position')
      .ele('PartnerUID').txt(entry.partnerUid).up()
      .ele('LandCode').txt(entry.countryCode).up()
      .ele('Lieferart').txt(entry.deliveryType).up()
      .ele('Bemessungsgrundlage').txt(String(entry.amount)).up()
    .up();
  }

  return root.end({ prettyPrint: true });
}
