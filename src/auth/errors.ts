export type TokenErrorCode =
  | 'MalformedToken'
  | 'UnsupportedAlgorithm'
  | 'SignatureMismatch'
  | 'MissingSubject'
  | 'MissingExpiry'
  | 'InvalidClaim'
  | 'Expired'
  | 'NotYetValid'
  | 'IssuedAfterExpiry'
  | 'IssuerMismatch'
  | 'AudienceMismatch'
  | 'MissingOrMalformedHeader';

export type ClaimErrorCode = Extract<
  TokenErrorCode,
  | 'MissingSubject'
  | 'MissingExpiry'
  | 'InvalidClaim'
  | 'Expired'
  | 'NotYetValid'
  | 'IssuedAfterExpiry'
  | 'IssuerMismatch'
  | 'AudienceMismatch'
>;

/**
 * Base class for every verification failure. The message is internal detail
 * meant for logs; callers only ever see a generic 401.
 */
export class TokenError extends Error {
  readonly code: TokenErrorCode;

  constructor(code: TokenErrorCode, message: string) {
    super(message);
    this.name = 'TokenError';
    this.code = code;
  }
}

export class MalformedTokenError extends TokenError {
  constructor(message: string) {
    super('MalformedToken', message);
    this.name = 'MalformedTokenError';
  }
}

export class UnsupportedAlgorithmError extends TokenError {
  readonly algorithm: string;

  constructor(algorithm: string, message = `Algorithm "${algorithm}" is not accepted`) {
    super('UnsupportedAlgorithm', message);
    this.name = 'UnsupportedAlgorithmError';
    this.algorithm = algorithm;
  }
}

export class SignatureMismatchError extends TokenError {
  constructor() {
    super('SignatureMismatch', 'Token signature does not match');
    this.name = 'SignatureMismatchError';
  }
}

export class ClaimError extends TokenError {
  declare readonly code: ClaimErrorCode;

  constructor(code: ClaimErrorCode, message: string) {
    super(code, message);
    this.name = 'ClaimError';
  }
}

export function isTokenError(error: unknown): error is TokenError {
  return error instanceof TokenError;
}
