import { errors, flattenedVerify } from 'jose';
import type { DecodedToken } from './codec.js';
import { MalformedTokenError, SignatureMismatchError, UnsupportedAlgorithmError } from './errors.js';
import { isSupportedAlgorithm, type SigningKey } from './signingKey.js';

/**
 * Checks the token signature against the configured key. The key is bound to a
 * single algorithm, so a header naming anything else (including `none`) fails
 * closed before any cryptography runs. HMAC comparison inside jose is
 * constant-time.
 */
export async function verifySignature(token: DecodedToken, key: SigningKey): Promise<void> {
  const { alg } = token.header;

  if (!isSupportedAlgorithm(alg)) {
    throw new UnsupportedAlgorithmError(alg);
  }

  if (alg !== key.algorithm) {
    throw new UnsupportedAlgorithmError(alg, `Algorithm "${alg}" does not match configured ${key.algorithm} key`);
  }

  try {
    await flattenedVerify(
      {
        protected: token.segments.header,
        payload: token.segments.payload,
        signature: token.segments.signature,
      },
      key.material,
      { algorithms: [key.algorithm] },
    );
  } catch (error) {
    if (error instanceof errors.JWSSignatureVerificationFailed) {
      throw new SignatureMismatchError();
    }
    if (error instanceof errors.JOSEAlgNotAllowed || error instanceof errors.JOSENotSupported) {
      throw new UnsupportedAlgorithmError(alg);
    }
    if (error instanceof errors.JWSInvalid) {
      throw new MalformedTokenError(error.message);
    }
    throw error;
  }
}
