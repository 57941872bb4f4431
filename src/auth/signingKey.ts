import { importSPKI, type KeyLike } from 'jose';

export const HMAC_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;

export const PUBLIC_KEY_ALGORITHMS = [
  'RS256',
  'RS384',
  'RS512',
  'PS256',
  'PS384',
  'PS512',
  'ES256',
  'ES384',
  'ES512',
] as const;

export const SUPPORTED_ALGORITHMS = [...HMAC_ALGORITHMS, ...PUBLIC_KEY_ALGORITHMS] as const;

export type HmacAlgorithm = (typeof HMAC_ALGORITHMS)[number];
export type SupportedAlgorithm = (typeof SUPPORTED_ALGORITHMS)[number];

export interface SigningKey {
  readonly algorithm: SupportedAlgorithm;
  readonly material: KeyLike | Uint8Array;
}

export interface SigningKeyOptions {
  algorithm: SupportedAlgorithm;
  /** Shared secret for HS* algorithms. */
  secret?: string;
  /** PEM encoded SPKI public key for RS*, PS* and ES* algorithms. */
  publicKey?: string;
}

export function isSupportedAlgorithm(value: string): value is SupportedAlgorithm {
  return (SUPPORTED_ALGORITHMS as readonly string[]).includes(value);
}

export function isHmacAlgorithm(value: string): value is HmacAlgorithm {
  return (HMAC_ALGORITHMS as readonly string[]).includes(value);
}

export function createHmacKey(secret: string, algorithm: HmacAlgorithm = 'HS256'): SigningKey {
  if (!secret) {
    throw new Error('HMAC secret must not be empty');
  }
  return Object.freeze({ algorithm, material: new TextEncoder().encode(secret) });
}

export async function createSigningKey(options: SigningKeyOptions): Promise<SigningKey> {
  const { algorithm } = options;

  if (isHmacAlgorithm(algorithm)) {
    if (!options.secret) {
      throw new Error(`A shared secret is required for ${algorithm}`);
    }
    return createHmacKey(options.secret, algorithm);
  }

  if (!options.publicKey) {
    throw new Error(`A PEM public key is required for ${algorithm}`);
  }

  const material = await importSPKI(options.publicKey, algorithm);
  return Object.freeze({ algorithm, material });
}
