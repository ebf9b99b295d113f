import { createLogger } from '../core/logger.js';
import type { OpenItem, ReconciliationMatch, ReconciliationResult, Statement, StatementEntry } from './types.js';

const log = createLogger('sepa-reconcile');

// Placeholder banks write when the payer sent no end-to-end id.
const NO_END_TO_END_ID = 'NOTPROVIDED';

function sideMatches(entry: StatementEntry, item: OpenItem): boolean {
  return item.creditDebit === undefined || item.creditDebit === entry.creditDebit;
}

function referenceMatches(entry: StatementEntry, item: OpenItem): boolean {
  const ref = item.reference?.trim().toUpperCase();
  if (!ref) return false;
  if (entry.reference?.trim().toUpperCase() === ref) return true;
  return (entry.remittanceInfo ?? '').toUpperCase().includes(ref);
}

/**
 * Three passes over the whole statement, each on what the previous left
 * unmatched: end-to-end id, then payment reference, then amount where exactly
 * one entry and one open item share it.
 */
export function reconcile(statement: Statement, openItems: readonly OpenItem[]): ReconciliationResult {
  const entries = statement.entries;
  const matches: ReconciliationMatch[] = [];
  const usedEntries = new Set<number>();
  const usedItems = new Set<string>();

  const record = (entryIndex: number, item: OpenItem, method: ReconciliationMatch['method']) => {
    usedEntries.add(entryIndex);
    usedItems.add(item.id);
    matches.push({ entryIndex, itemId: item.id, method, difference: entries[entryIndex].amount - item.amount });
  };
  const freeItems = () => openItems.filter((item) => !usedItems.has(item.id));

  entries.forEach((entry, i) => {
    const e2e = entry.endToEndId?.trim();
    if (!e2e || e2e === NO_END_TO_END_ID) return;
    const item = freeItems().find((it) => it.endToEndId === e2e && sideMatches(entry, it));
    if (item) record(i, item, 'end_to_end_id');
  });

  entries.forEach((entry, i) => {
    if (usedEntries.has(i)) return;
    const item = freeItems().find((it) => sideMatches(entry, it) && referenceMatches(entry, it));
    if (item) record(i, item, 'reference');
  });

  entries.forEach((entry, i) => {
    if (usedEntries.has(i)) return;
    const candidates = freeItems().filter((it) => it.amount === entry.amount && sideMatches(entry, it));
    if (candidates.length !== 1) return;
    const rivals = entries.filter((other, j) =>
      !usedEntries.has(j) && other.amount === entry.amount && other.creditDebit === entry.creditDebit);
    if (rivals.length === 1) record(i, candidates[0], 'amount');
  });

  matches.sort((a, b) => a.entryIndex - b.entryIndex);
  const result: ReconciliationResult = {
    matches,
    unmatchedEntries: entries.map((_, i) => i).filter((i) => !usedEntries.has(i)),
    unmatchedItems: openItems.filter((it) => !usedItems.has(it.id)).map((it) => it.id),
  };
  log.debug({ statement: statement.id, matched: matches.length, open: result.unmatchedItems.length }, 'statement reconciled');
  return result;
}
