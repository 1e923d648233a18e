import {
  compactVerify,
  decodeJwt,
  decodeProtectedHeader,
  type JWTPayload,
  type ProtectedHeaderParameters,
} from 'jose';
import { AuthError } from './errors.js';
import { isSigningAlgorithm, type KeySetEntry, type SigningAlgorithm } from './keySetCache.js';

/** Compact JWS exactly as presented by the caller. Never re-encoded. */
export type RawToken = string;

export interface DecodedToken {
  readonly raw: RawToken;
  readonly header: ProtectedHeaderParameters;
  readonly payload: JWTPayload;
}

export interface ValidatedClaims {
  readonly subject: string;
  readonly issuer: string;
  readonly audiences: ReadonlySet<string>;
  readonly issuedAt: Date | null;
  readonly expiresAt: Date;
  readonly rawClaims: Readonly<Record<string, unknown>>;
}

export type CheckName = 'structure' | 'signature' | 'expiry' | 'issuer' | 'audience';

export interface TokenCheck {
  readonly name: Exclude<CheckName, 'structure'>;
  run(token: DecodedToken): void | Promise<void>;
}

/** Resolves the signing key for a kid; rejects with KeySetUnavailableError when keys cannot be fetched. */
export type KeyLookup = (keyId: string) => Promise<KeySetEntry | undefined>;

export interface TokenValidatorOptions {
  expectedIssuer: string;
  expectedAudience: string;
  lookupKey: KeyLookup;
  algorithms?: readonly SigningAlgorithm[];
  clockToleranceSec?: number;
  now?: () => number;
}

export interface TokenValidator {
  validate(raw: RawToken, onCheckPassed?: (check: CheckName) => void): Promise<ValidatedClaims>;
}

export function checkStructure(raw: RawToken): DecodedToken {
  const segments = raw.split('.');
  if (segments.length !== 3 || segments.some((segment) => segment.length === 0)) {
    throw new AuthError('Malformed', 'Token must consist of three non-empty segments');
  }

  let header: ProtectedHeaderParameters;
  let payload: JWTPayload;
  try {
    header = decodeProtectedHeader(raw);
    payload = decodeJwt(raw);
  } catch (error) {
    throw new AuthError('Malformed', 'Token header or payload is not valid encoded JSON', { cause: error });
  }

  if (typeof header.alg !== 'string') {
    throw new AuthError('Malformed', 'Token header has no algorithm');
  }
  if (typeof payload.sub !== 'string' || payload.sub.length === 0) {
    throw new AuthError('Malformed', 'Token has no subject');
  }

  return { raw, header, payload };
}

export function signatureCheck(lookupKey: KeyLookup, algorithms: readonly SigningAlgorithm[]): TokenCheck {
  const accepted = new Set<string>(algorithms);

  return {
    name: 'signature',
    async run({ raw, header }) {
      const alg = header.alg;
      if (!isSigningAlgorithm(alg) || !accepted.has(alg)) {
        throw new AuthError('SignatureInvalid', 'Token algorithm is not accepted');
      }
      if (typeof header.kid !== 'string' || header.kid.length === 0) {
        throw new AuthError('SignatureInvalid', 'Token header has no key id');
      }

      const entry = await lookupKey(header.kid);
      if (!entry) {
        throw new AuthError('SignatureInvalid', 'No signing key matches the token key id');
      }
      if (entry.algorithm !== alg) {
        throw new AuthError('SignatureInvalid', 'Token algorithm does not match the signing key');
      }

      try {
        await compactVerify(raw, entry.publicKey, { algorithms: [entry.algorithm] });
      } catch (error) {
        throw new AuthError('SignatureInvalid', 'Token signature does not verify', { cause: error });
      }
    },
  };
}

export function expiryCheck(clockToleranceSec = 0, now: () => number = Date.now): TokenCheck {
  return {
    name: 'expiry',
    run({ payload }) {
      const nowSec = now() / 1000;
      if (typeof payload.exp !== 'number') {
        throw new AuthError('Expired', 'Token has no expiry');
      }
      if (!(payload.exp + clockToleranceSec > nowSec)) {
        throw new AuthError('Expired', 'Token has expired');
      }
      if (typeof payload.nbf === 'number' && payload.nbf - clockToleranceSec > nowSec) {
        throw new AuthError('NotYetValid', 'Token is not valid yet');
      }
    },
  };
}

export function issuerCheck(expectedIssuer: string): TokenCheck {
  return {
    name: 'issuer',
    run({ payload }) {
      if (payload.iss !== expectedIssuer) {
        throw new AuthError('IssuerMismatch', 'Token was issued by an untrusted issuer');
      }
    },
  };
}

export function normalizeAudiences(aud: unknown): Set<string> {
  if (typeof aud === 'string') {
    return new Set([aud]);
  }
  if (Array.isArray(aud)) {
    return new Set(aud.filter((value): value is string => typeof value === 'string'));
  }
  return new Set();
}

export function audienceCheck(expectedAudience: string): TokenCheck {
  return {
    name: 'audience',
    run({ payload }) {
      if (!normalizeAudiences(payload.aud).has(expectedAudience)) {
        throw new AuthError('AudienceMismatch', 'Token is not intended for this service');
      }
    },
  };
}

function toDate(seconds: unknown): Date | null {
  return typeof seconds === 'number' && Number.isFinite(seconds) ? new Date(seconds * 1000) : null;
}

function freezeClaims({ payload }: DecodedToken): ValidatedClaims {
  return Object.freeze({
    subject: String(payload.sub),
    issuer: String(payload.iss),
    audiences: normalizeAudiences(payload.aud),
    issuedAt: toDate(payload.iat),
    expiresAt: new Date(Number(payload.exp) * 1000),
    rawClaims: Object.freeze({ ...payload }),
  });
}

export function createTokenValidator(options: TokenValidatorOptions): TokenValidator {
  if (!options.expectedIssuer.trim()) {
    throw new Error('Token validator requires an expected issuer');
  }
  if (!options.expectedAudience.trim()) {
    throw new Error('Token validator requires an expected audience');
  }

  const checks: readonly TokenCheck[] = [
    signatureCheck(options.lookupKey, options.algorithms ?? ['RS256']),
    expiryCheck(options.clockToleranceSec ?? 0, options.now),
    issuerCheck(options.expectedIssuer),
    audienceCheck(options.expectedAudience),
  ];

  return {
    async validate(raw, onCheckPassed) {
      const decoded = checkStructure(raw);
      onCheckPassed?.('structure');
      for (const check of checks) {
        await check.run(decoded);
        onCheckPassed?.(check.name);
      }
      return freezeClaims(decoded);
    },
  };
}
