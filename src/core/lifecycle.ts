import { ValidationError } from './errors.js';

export type DocumentStatus = 'draft' | 'validated' | 'submitted' | 'accepted' | 'rejected';

export interface Lifecycle {
  status: DocumentStatus;
  reference?: string;
  submittedAt?: string;
}

const TRANSITIONS: Record<DocumentStatus, readonly DocumentStatus[]> = {
  draft:     ['validated', 'submitted'],
  validated: ['submitted'],
  submitted: ['accepted', 'rejected'],
  accepted:  [],
  rejected:  [],
};

export function canTransition(from: DocumentStatus, to: DocumentStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(doc: Lifecycle, to: DocumentStatus): void {
  if (!canTransition(doc.status, to)) {
    throw new ValidationError([{
      code: 'invalid_transition',
      field: 'status',
      message: `Cannot move document from ${doc.status} to ${to}`,
    }]);
  }
}

/** Monotone transition; returns a new object, the input is left untouched. */
export function transition<T extends Lifecycle>(doc: T, to: DocumentStatus, reference?: string): T {
  assertTransition(doc, to);
  const next: T = { ...doc, status: to };
  if (to === 'submitted') {
    next.submittedAt = new Date().toISOString();
    if (reference) next.reference = reference;
  }
  return next;
}

/** A rejected document is never re-opened; it is copied into a new draft. */
export function copyAsDraft<T extends Lifecycle>(doc: T): T {
  const copy: T = structuredClone(doc);
  copy.status = 'draft';
  delete copy.reference;
  delete copy.submittedAt;
  return copy;
}
