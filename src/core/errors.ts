// ── Error taxonomy ──────────────────────────────────────────────────────────
// Closed set of kinds. Retry and session-invalidation decisions match on
// `kind` / `reason`, never on message text.

export type ErrorKind =
  | 'transport'
  | 'http-transient'
  | 'http-terminal'
  | 'protocol'
  | 'no-session'
  | 'validation'
  | 'codec'
  | 'cancelled';

export type ProtocolReason =
  | 'session-expired'
  | 'maintenance'
  | 'technical'
  | 'invalid-credentials'
  | 'user-locked-temporarily'
  | 'user-locked-permanently'
  | 'not-webservice-user'
  | 'participant-locked'
  | 'uid-daily-limit'
  | 'uid-not-found'
  | 'elda-validation'
  | 'elda-authentication'
  | 'elda-business'
  | 'elda-system'
  | 'generic';

export interface ValidationIssue {
  code: string;
  field: string;
  message: string;
}

/** Pure verdict of a document validator; `valid` iff there are no errors. */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

export function toValidationResult(errors: ValidationIssue[], warnings: ValidationIssue[] = []): ValidationResult {
  return { valid: errors.length === 0, errors, warnings };
}

/** Throws the collected errors as one ValidationError. */
export function assertValid(result: ValidationResult): void {
  if (!result.valid) throw new ValidationError(result.errors);
}

/** One line per issue, errors first. */
export function formatValidation(result: ValidationResult): string {
  const lines: string[] = [];
  if (result.valid) {
    lines.push('Valid.');
  } else {
    lines.push(`${result.errors.length} error(s):`);
    for (const e of result.errors) lines.push(`  - [${e.code}] ${e.field}: ${e.message}`);
  }
  if (result.warnings.length > 0) {
    lines.push(`${result.warnings.length} warning(s):`);
    for (const w of result.warnings) lines.push(`  - [${w.code}] ${w.field}: ${w.message}`);
  }
  return lines.join('\n');
}

export class AppError extends Error {
  constructor(
    public readonly kind: ErrorKind,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class TransportError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', 'TRANSPORT', message);
    this.name = 'TransportError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class HttpError extends AppError {
  constructor(
    public readonly status: number,
    public readonly body: string,
  ) {
    super(
      status >= 500 || status === 429 ? 'http-transient' : 'http-terminal',
      `HTTP_${status}`,
      `HTTP error ${status}: ${body.slice(0, 200)}`,
    );
    this.name = 'HttpError';
  }
}

export class ProtocolError extends AppError {
  constructor(
    public readonly reason: ProtocolReason,
    public readonly resultCode: number | string,
    message: string,
    public readonly serverMessage = '',
    public readonly retryable = false,
  ) {
    super('protocol', String(resultCode), message);
    this.name = 'ProtocolError';
  }
}

export class NoSessionError extends AppError {
  constructor(message = 'No valid session. Please log in first.') {
    super('no-session', 'NO_SESSION', message);
    this.name = 'NoSessionError';
  }
}

export class ValidationError extends AppError {
  constructor(
    public readonly issues: ValidationIssue[],
    message = issues.length === 1
      ? `Validation failed: ${issues[0].message}`
      : `Validation failed with ${issues.length} issues`,
  ) {
    super('validation', issues[0]?.code ?? 'VALIDATION', message, issues);
    this.name = 'ValidationError';
  }
}

export class CodecError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('codec', 'CODEC', message);
    this.name = 'CodecError';
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class CancelledError extends AppError {
  constructor(message = 'Operation cancelled') {
    super('cancelled', 'CANCELLED', message);
    this.name = 'CancelledError';
  }
}

// ── Predicates ──────────────────────────────────────────────────────────────

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}

export function isRetryable(err: unknown): boolean {
  if (!(err instanceof AppError)) return false;
  switch (err.kind) {
    case 'transport':
    case 'http-transient':
      return true;
    case 'protocol':
      return err instanceof ProtocolError && err.retryable;
    default:
      return false;
  }
}

export function isSessionExpired(err: unknown): boolean {
  return err instanceof ProtocolError && err.reason === 'session-expired';
}

// ── JSON envelope ───────────────────────────────────────────────────────────

export interface ErrorEnvelope {
  error: true;
  error_type: ErrorKind | 'internal';
  message: string;
  code?: string;
  reason?: ProtocolReason;
  details?: unknown;
}

export function toErrorEnvelope(err: unknown): ErrorEnvelope {
  if (err instanceof ProtocolError) {
    return {
      error: true,
      error_type: err.kind,
      message: err.message,
      code: err.code,
      reason: err.reason,
    };
  }
  if (err instanceof AppError) {
    return {
      error: true,
      error_type: err.kind,
      message: err.message,
      code: err.code,
      ...(err.details !== undefined ? { details: err.details } : {}),
    };
  }
  return {
    error: true,
    error_type: 'internal',
    message: err instanceof Error ? err.message : String(err),
  };
}
