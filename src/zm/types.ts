import type { Lifecycle } from '../core/lifecycle.js';
import type { Minor } from '../core/money.js';

/** L = Lieferungen, D = Dreiecksgeschäfte, S = sonstige Leistungen */
export type ZmDeliveryType = 'L' | 'D' | 'S';

export const DELIVERY_TYPES: readonly ZmDeliveryType[] = ['L', 'D', 'S'];

export interface ZmEntry {
  partnerUid: string;
  countryCode: string;
  deliveryType: ZmDeliveryType;
  amount: Minor;
}

/** Zusammenfassende Meldung for one quarter. */
export interface Zm extends Lifecycle {
  year: number;
  quarter: number;
  entries: ZmEntry[];
}
