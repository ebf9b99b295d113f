// Firmenbuchnummer: "FN" + 1–9 digits + one lowercase check letter, e.g. FN123456a
const FN_RE = /^FN\d{1,9}[a-z]$/;

export function isValidFn(fn: string): boolean {
  return FN_RE.test(fn);
}

/**
 * Canonical form: uppercase prefix, no spaces, lowercase suffix.
 * "fn 123456 A" → "FN123456a". Returns undefined when the result is not valid.
 */
export function normalizeFn(input: string): string | undefined {
  const compact = input.replace(/\s/g, '');
  const m = /^(?:fn)?(\d{1,9})([a-z])$/i.exec(compact);
  if (!m) return undefined;
  return `FN${m[1]}${m[2].toLowerCase()}`;
}
