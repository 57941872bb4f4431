import { decodeToken } from './codec.js';
import { buildAuthenticationContext, DEFAULT_CLAIM_POLICY, validateClaims, type ClaimPolicy } from './claims.js';
import type { AuthenticationContext } from './context.js';
import { isTokenError, type TokenErrorCode } from './errors.js';
import type { SigningKey } from './signingKey.js';
import { verifySignature } from './verifier.js';

export type ValidationOutcome =
  | { kind: 'accepted'; context: AuthenticationContext }
  | { kind: 'rejected'; reason: TokenErrorCode; detail: string };

export interface ValidateTokenOptions {
  key: SigningKey;
  now: Date;
  policy?: Readonly<ClaimPolicy>;
  maxTokenLength?: number;
}

export async function validateToken(raw: string, options: ValidateTokenOptions): Promise<ValidationOutcome> {
  try {
    const token = decodeToken(raw, { maxLength: options.maxTokenLength });
    await verifySignature(token, options.key);
    const normalized = validateClaims(token.claims, options.now, options.policy ?? DEFAULT_CLAIM_POLICY);
    return { kind: 'accepted', context: buildAuthenticationContext(normalized, token.claims) };
  } catch (error) {
    if (isTokenError(error)) {
      return { kind: 'rejected', reason: error.code, detail: error.message };
    }
    throw error;
  }
}
