import { assertValid } from '../core/errors.js';
import { assertTransition, transition } from '../core/lifecycle.js';
import { createLogger } from '../core/logger.js';
import type { FinanzOnlineClient } from '../finanzonline/client.js';
import type { Session } from '../finanzonline/session.js';
import { periodLabel } from './calculator.js';
import { generateUvaXml } from './generator.js';
import type { Uva } from './types.js';
import { validateUva } from './validator.js';

const log = createLogger('uva');

/** Validates, serialises and uploads; returns the return in state `submitted` with its Belegnummer. */
export async function submitUva(
  fo: Pick<FinanzOnlineClient, 'submit'>,
  session: Session | undefined,
  uva: Uva,
  options: { signal?: AbortSignal } = {},
): Promise<Uva> {
  assertTransition(uva, 'submitted');
  assertValid(validateUva(uva));
  const validated = uva.status === 'draft' ? transition(uva, 'validated') : uva;
  const xml = generateUvaXml(validated);
  const result = await fo.submit(session, 'advance-VAT', xml, options);
  log.info({ period: periodLabel(uva.year, uva.period), reference: result.reference }, 'UVA submitted');
  return transition(validated, 'submitted', result.reference);
}
