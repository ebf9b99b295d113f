import { toValidationResult, type ValidationIssue, type ValidationResult } from '../core/errors.js';
import { SUPPORTED_UID_COUNTRIES, validateUidFormat } from '../identifiers/uid.js';
import { DELIVERY_TYPES, type Zm, type ZmDeliveryType, type ZmEntry } from './types.js';

const COUNTRY_RE = /^[A-Z]{2}$/;
const DELIVERY_SET: ReadonlySet<string> = new Set(DELIVERY_TYPES);

export function isDeliveryType(value: string): value is ZmDeliveryType {
  return DELIVERY_SET.has(value);
}

export function validateZmEntry(entry: ZmEntry, field = 'entry'): { errors: ValidationIssue[]; warnings: ValidationIssue[] } {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  const uid = entry.partnerUid.trim().toUpperCase();
  if (!uid) {
    errors.push({ code: 'partner_uid', field: `${field}.partnerUid`, message: 'partner UID is required' });
  } else if (uid.startsWith('AT')) {
    errors.push({ code: 'partner_uid', field: `${field}.partnerUid`, message: 'Austrian UIDs are not allowed in ZM (intra-community only)' });
  } else if (SUPPORTED_UID_COUNTRIES.includes(uid.slice(0, 2))) {
    const check = validateUidFormat(uid);
    if (!check.valid) errors.push({ code: 'partner_uid', field: `${field}.partnerUid`, message: check.error });
  } else {
    warnings.push({ code: 'partner_uid_unchecked', field: `${field}.partnerUid`, message: `no format rule for UID prefix ${uid.slice(0, 2)}` });
  }

  const country = entry.countryCode.trim().toUpperCase();
  if (!COUNTRY_RE.test(country)) {
    errors.push({ code: 'country_code', field: `${field}.countryCode`, message: 'country code must be 2 letters' });
  } else if (country === 'AT') {
    errors.push({ code: 'country_code', field: `${field}.countryCode`, message: 'Austrian partners are not allowed in ZM (intra-community only)' });
  } else if (uid && !uid.startsWith('AT') && uid.slice(0, 2) !== country && !(country === 'GR' && uid.startsWith('EL'))) {
    warnings.push({ code: 'uid_country_mismatch', field: `${field}.countryCode`, message: `UID prefix ${uid.slice(0, 2)} differs from country ${country}` });
  }

  if (!isDeliveryType(entry.deliveryType))
    errors.push({ code: 'delivery_type', field: `${field}.deliveryType`, message: 'invalid delivery type (must be L, D, or S)' });

  if (!Number.isSafeInteger(entry.amount) || entry.amount <= 0)
    errors.push({ code: 'amount', field: `${field}.amount`, message: 'amount must be a positive number of cents' });

  return { errors, warnings };
}

export function validateZm(zm: Zm): ValidationResult {
  const errors: ValidationIssue[] = [];
  const warnings: ValidationIssue[] = [];

  if (!Number.isInteger(zm.year) || zm.year < 2000 || zm.year > 2100)
    errors.push({ code: 'year_range', field: 'year', message: 'year must be between 2000 and 2100' });
  if (!Number.isInteger(zm.quarter) || zm.quarter < 1 || zm.quarter > 4)
    errors.push({ code: 'quarter_range', field: 'quarter', message: 'quarter must be between 1 and 4' });
  if (zm.entries.length === 0)
    errors.push({ code: 'entries_empty', field: 'entries', message: 'ZM must have at least one entry' });

  const seen = new Set<string>();
  zm.entries.forEach((entry, i) => {
    const field = `entries[${i}]`;
    const result = validateZmEntry(entry, field);
    errors.push(...result.errors);
    warnings.push(...result.warnings);

    const key = `${entry.partnerUid.trim().toUpperCase()}-${entry.deliveryType}`;
    if (seen.has(key)) {
      errors.push({ code: 'duplicate_entry', field, message: `partner ${entry.partnerUid} with delivery type ${entry.deliveryType} is listed twice` });
    }
    seen.add(key);
  });

  return toValidationResult(errors, warnings);
}
