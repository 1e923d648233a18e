export type UnauthenticatedReason =
  | 'MissingToken'
  | 'Malformed'
  | 'SignatureInvalid'
  | 'Expired'
  | 'NotYetValid'
  | 'IssuerMismatch'
  | 'AudienceMismatch';

export type AuthFailureReason = UnauthenticatedReason | 'InsufficientRole' | 'KeySetUnavailable';

/** How a rejection is reported to the caller. */
export type AuthOutcome = 'unauthenticated' | 'forbidden' | 'unavailable';

const OUTCOME_BY_REASON: Record<AuthFailureReason, AuthOutcome> = {
  MissingToken: 'unauthenticated',
  Malformed: 'unauthenticated',
  SignatureInvalid: 'unauthenticated',
  Expired: 'unauthenticated',
  NotYetValid: 'unauthenticated',
  IssuerMismatch: 'unauthenticated',
  AudienceMismatch: 'unauthenticated',
  InsufficientRole: 'forbidden',
  KeySetUnavailable: 'unavailable',
};

const STATUS_BY_OUTCOME: Record<AuthOutcome, number> = {
  unauthenticated: 401,
  forbidden: 403,
  unavailable: 503,
};

const CODE_BY_REASON: Record<AuthFailureReason, string> = {
  MissingToken: 'auth.missing_token',
  Malformed: 'auth.malformed',
  SignatureInvalid: 'auth.signature_invalid',
  Expired: 'auth.expired',
  NotYetValid: 'auth.not_yet_valid',
  IssuerMismatch: 'auth.issuer_mismatch',
  AudienceMismatch: 'auth.audience_mismatch',
  InsufficientRole: 'auth.insufficient_role',
  KeySetUnavailable: 'auth.key_set_unavailable',
};

export function outcomeOf(reason: AuthFailureReason): AuthOutcome {
  return OUTCOME_BY_REASON[reason];
}

export function statusOf(reason: AuthFailureReason): number {
  return STATUS_BY_OUTCOME[OUTCOME_BY_REASON[reason]];
}

export function codeOf(reason: AuthFailureReason): string {
  return CODE_BY_REASON[reason];
}

/**
 * Terminal rejection raised by the validator chain, the gate or the key set cache.
 * Messages describe the failed check only; they never embed the token or key material.
 */
export class AuthError extends Error {
  readonly code: string;
  readonly outcome: AuthOutcome;
  readonly status: number;

  constructor(public readonly reason: AuthFailureReason, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AuthError';
    this.code = codeOf(reason);
    this.outcome = outcomeOf(reason);
    this.status = statusOf(reason);
  }

  /** Only a key-set outage is worth retrying with the same token. */
  get retryable(): boolean {
    return this.reason === 'KeySetUnavailable';
  }
}

export class KeySetUnavailableError extends AuthError {
  constructor(public readonly issuer: string, message: string, options?: { cause?: unknown }) {
    super('KeySetUnavailable', message, options);
    this.name = 'KeySetUnavailableError';
  }
}

export function isAuthError(error: unknown): error is AuthError {
  return error instanceof AuthError;
}
