import type { ClaimSet } from './codec.js';
import { AuthoritySet, type AuthenticationContext } from './context.js';
import { DEFAULT_AUTHORITIES_PATHS, resolveAuthorities } from './claimPaths.js';
import { ClaimError } from './errors.js';

/** Largest magnitude `Date` accepts, in milliseconds. */
const MAX_DATE_MS = 8.64e15;

export interface ClaimPolicy {
  /** Seconds of leeway applied to `exp` and `nbf`. */
  clockToleranceSec: number;
  issuer?: string;
  /** Accepted audiences; an empty list disables the check. */
  audiences: readonly string[];
  authoritiesPaths: readonly string[];
}

export const DEFAULT_CLAIM_POLICY: Readonly<ClaimPolicy> = Object.freeze({
  clockToleranceSec: 0,
  audiences: [],
  authoritiesPaths: DEFAULT_AUTHORITIES_PATHS,
});

export interface NormalizedClaims {
  subject: string;
  /** NumericDate seconds. */
  expiresAt: number;
  notBefore?: number;
  issuedAt?: number;
  authorities: Set<string>;
}

function pick(claims: ClaimSet, registered: string, long: string): unknown {
  return claims[registered] !== undefined ? claims[registered] : claims[long];
}

function readNumericDate(claims: ClaimSet, registered: string, long: string): number | undefined {
  const value = pick(claims, registered, long);
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new ClaimError('InvalidClaim', `Claim "${registered}" must be a NumericDate`);
  }
  if (Math.abs(value * 1000) > MAX_DATE_MS) {
    throw new ClaimError('InvalidClaim', `Claim "${registered}" is outside the representable date range`);
  }
  return value;
}

function readAudiences(claims: ClaimSet): string[] {
  const aud = claims.aud;
  if (typeof aud === 'string') {
    return [aud];
  }
  if (Array.isArray(aud)) {
    return aud.filter((entry): entry is string => typeof entry === 'string');
  }
  return [];
}

/**
 * Checks subject, time and optional issuer/audience claims. `now` always comes
 * from the caller.
 */
export function validateClaims(
  claims: ClaimSet,
  now: Date,
  policy: Readonly<ClaimPolicy> = DEFAULT_CLAIM_POLICY,
): NormalizedClaims {
  if (Number.isNaN(now.getTime())) {
    throw new Error('Validation clock returned an invalid date');
  }

  const subject = pick(claims, 'sub', 'subject');
  if (typeof subject !== 'string' || subject.length === 0) {
    throw new ClaimError('MissingSubject', 'Token has no subject');
  }

  const expiresAt = readNumericDate(claims, 'exp', 'expiresAt');
  if (expiresAt === undefined) {
    throw new ClaimError('MissingExpiry', 'Token has no expiry');
  }
  const notBefore = readNumericDate(claims, 'nbf', 'notBefore');
  const issuedAt = readNumericDate(claims, 'iat', 'issuedAt');

  const nowSec = now.getTime() / 1000;
  const tolerance = policy.clockToleranceSec;

  if (nowSec - tolerance >= expiresAt) {
    throw new ClaimError('Expired', `Token expired at ${expiresAt}`);
  }

  if (notBefore !== undefined && nowSec + tolerance < notBefore) {
    throw new ClaimError('NotYetValid', `Token not valid before ${notBefore}`);
  }

  if (issuedAt !== undefined && issuedAt > expiresAt) {
    throw new ClaimError('IssuedAfterExpiry', 'Token issued after its own expiry');
  }

  if (policy.issuer !== undefined && claims.iss !== policy.issuer) {
    throw new ClaimError('IssuerMismatch', 'Unexpected token issuer');
  }

  if (policy.audiences.length > 0) {
    const audiences = readAudiences(claims);
    if (!audiences.some((aud) => policy.audiences.includes(aud))) {
      throw new ClaimError('AudienceMismatch', 'Token audience not accepted');
    }
  }

  return {
    subject,
    expiresAt,
    notBefore,
    issuedAt,
    authorities: resolveAuthorities(claims, policy.authoritiesPaths),
  };
}

function toDate(seconds: number): Date {
  return new Date(seconds * 1000);
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const member of Object.values(value)) {
      deepFreeze(member);
    }
    Object.freeze(value);
  }
  return value;
}

export function buildAuthenticationContext(normalized: NormalizedClaims, claims: ClaimSet): AuthenticationContext {
  return Object.freeze({
    subject: normalized.subject,
    authorities: new AuthoritySet(normalized.authorities),
    issuedAt: normalized.issuedAt !== undefined ? toDate(normalized.issuedAt) : undefined,
    expiresAt: toDate(normalized.expiresAt),
    claims: deepFreeze(structuredClone(claims)),
  });
}
