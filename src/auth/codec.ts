import { base64url } from 'jose';
import { z } from 'zod';
import { MalformedTokenError } from './errors.js';

export const DEFAULT_MAX_TOKEN_LENGTH = 8192;

const SEGMENT_PATTERN = /^[A-Za-z0-9_-]+$/;

const HeaderSchema = z
  .object({
    alg: z.string(),
    typ: z.string().optional(),
    kid: z.string().optional(),
  })
  .passthrough();

export type TokenHeader = z.infer<typeof HeaderSchema>;

export type ClaimSet = Record<string, unknown>;

export interface TokenSegments {
  header: string;
  payload: string;
  signature: string;
}

export interface DecodedToken {
  header: TokenHeader;
  claims: ClaimSet;
  signature: Uint8Array;
  /** Original textual segments; the signing input is `header.payload`. */
  segments: TokenSegments;
}

export interface DecodeOptions {
  maxLength?: number;
}

export interface EncodableToken {
  header: TokenHeader;
  claims: ClaimSet;
  signature: Uint8Array;
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string, label: string): Uint8Array {
  if (!SEGMENT_PATTERN.test(segment)) {
    throw new MalformedTokenError(`${label} segment is not base64url`);
  }

  const bytes = base64url.decode(segment);
  // Buffer-based decoding ignores stray trailing bits; insist on the canonical form.
  if (base64url.encode(bytes) !== segment) {
    throw new MalformedTokenError(`${label} segment is not canonical base64url`);
  }
  return bytes;
}

function decodeJsonObject(segment: string, label: string): Record<string, unknown> {
  const bytes = decodeSegment(segment, label);

  let parsed: unknown;
  try {
    parsed = JSON.parse(utf8.decode(bytes));
  } catch {
    throw new MalformedTokenError(`${label} segment is not valid JSON`);
  }

  if (!isRecord(parsed)) {
    throw new MalformedTokenError(`${label} segment is not a JSON object`);
  }
  return parsed;
}

export function decodeToken(raw: string, options: DecodeOptions = {}): DecodedToken {
  const maxLength = options.maxLength ?? DEFAULT_MAX_TOKEN_LENGTH;
  if (raw.length > maxLength) {
    throw new MalformedTokenError(`Token exceeds ${maxLength} characters`);
  }

  const parts = raw.split('.');
  if (parts.length !== 3) {
    throw new MalformedTokenError(`Expected 3 segments, got ${parts.length}`);
  }

  const [headerSegment, payloadSegment, signatureSegment] = parts;
  if (!headerSegment || !payloadSegment || !signatureSegment) {
    throw new MalformedTokenError('Token contains an empty segment');
  }

  const header = HeaderSchema.safeParse(decodeJsonObject(headerSegment, 'Header'));
  if (!header.success) {
    throw new MalformedTokenError('Header is missing a string "alg" member');
  }

  const claims = decodeJsonObject(payloadSegment, 'Payload');
  const signature = decodeSegment(signatureSegment, 'Signature');

  return {
    header: header.data,
    claims,
    signature,
    segments: {
      header: headerSegment,
      payload: payloadSegment,
      signature: signatureSegment,
    },
  };
}

export function encodeSigningInput(header: TokenHeader, claims: ClaimSet): string {
  return `${base64url.encode(JSON.stringify(header))}.${base64url.encode(JSON.stringify(claims))}`;
}

/** Inverse of {@link decodeToken}. Issuance is not this service's job; tests and tooling use it. */
export function encodeToken(token: EncodableToken): string {
  return `${encodeSigningInput(token.header, token.claims)}.${base64url.encode(token.signature)}`;
}
