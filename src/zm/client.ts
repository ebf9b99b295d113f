import { assertValid } from '../core/errors.js';
import { assertTransition, transition } from '../core/lifecycle.js';
import { createLogger } from '../core/logger.js';
import type { FinanzOnlineClient } from '../finanzonline/client.js';
import type { Session } from '../finanzonline/session.js';
import { generateZmXml, totalAmount, zmPeriodLabel } from './generator.js';
import type { Zm } from './types.js';
import { validateZm } from './validator.js';

const log = createLogger('zm');

export async function submitZm(
  fo: Pick<FinanzOnlineClient, 'submit'>,
  session: Session | undefined,
  zm: Zm,
  options: { signal?: AbortSignal } = {},
): Promise<Zm> {
  assertTransition(zm, 'submitted');
  assertValid(validateZm(zm));
  const result = await fo.submit(session, 'recapitulative-statement', generateZmXml(zm), options);
  log.info({ period: zmPeriodLabel(zm), entries: zm.entries.length, total: totalAmount(zm), reference: result.reference }, 'ZM submitted');
  return transition(zm, 'submitted', result.reference);
}
