// EU VAT identification numbers (UID). Unknown prefixes are a hard failure.

const UID_PATTERNS: Readonly<Record<string, RegExp>> = {
  AT: /^ATU\d{8}$/,
  DE: /^DE\d{9}$/,
  IT: /^IT\d{11}$/,
  FR: /^FR[A-Z0-9]{2}\d{9}$/,
  NL: /^NL\d{9}B\d{2}$/,
  BE: /^BE0?\d{9,10}$/,
  ES: /^ES[A-Z0-9]\d{7}[A-Z0-9]$/,
  GB: /^GB\d{9}(\d{3})?$/,
  PL: /^PL\d{10}$/,
  CH: /^CHE\d{9}$/,
};

export type UidFormatResult =
  | { valid: true; uid: string; countryCode: string }
  | { valid: false; uid: string; countryCode?: string; error: string };

export function normalizeUid(uid: string): string {
  return uid.replace(/\s/g, '').toUpperCase();
}

export function validateUidFormat(input: string): UidFormatResult {
  const uid = normalizeUid(input);
  if (uid.length < 4) return { valid: false, uid, error: 'UID too short' };

  const countryCode = uid.slice(0, 2);
  const pattern = UID_PATTERNS[countryCode];
  if (!pattern) {
    return { valid: false, uid, error: `unsupported country code: ${countryCode}` };
  }
  if (!pattern.test(uid)) {
    return { valid: false, uid, countryCode, error: `invalid format for country ${countryCode}` };
  }
  return { valid: true, uid, countryCode };
}

export function isValidUid(uid: string): boolean {
  return validateUidFormat(uid).valid;
}

export const SUPPORTED_UID_COUNTRIES = Object.keys(UID_PATTERNS);
