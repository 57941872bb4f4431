import { test } from 'node:test';
import assert from 'node:assert/strict';
import { base64url } from 'jose';
import { decodeToken, encodeSigningInput, encodeToken } from '../src/auth/codec.js';
import { MalformedTokenError } from '../src/auth/errors.js';

const HS256_HEADER_SEGMENT = 'eyJhbGciOiJIUzI1NiJ9';

function segment(json: string): string {
  return base64url.encode(json);
}

test('decodes header, claims and signature of an encoded token', () => {
  const raw = encodeToken({
    header: { alg: 'HS256' },
    claims: { subject: 'alice', expiresAt: 9999999999 },
    signature: new Uint8Array([1, 2, 3]),
  });

  assert.equal(raw, `${HS256_HEADER_SEGMENT}.${segment('{"subject":"alice","expiresAt":9999999999}')}.AQID`);

  const decoded = decodeToken(raw);
  assert.deepEqual(decoded.header, { alg: 'HS256' });
  assert.deepEqual(decoded.claims, { subject: 'alice', expiresAt: 9999999999 });
  assert.deepEqual([...decoded.signature], [1, 2, 3]);
  assert.equal(decoded.segments.header, HS256_HEADER_SEGMENT);
  assert.equal(decoded.segments.signature, 'AQID');
});

test('keeps unknown header members', () => {
  const raw = `${segment('{"alg":"HS256","typ":"JWT","x5t":"abc"}')}.${segment('{}')}.AQID`;
  assert.deepEqual(decodeToken(raw).header, { alg: 'HS256', typ: 'JWT', x5t: 'abc' });
});

test('encodeSigningInput joins header and payload segments', () => {
  assert.equal(encodeSigningInput({ alg: 'HS256' }, {}), `${HS256_HEADER_SEGMENT}.e30`);
});

test('rejects tokens without exactly three segments', () => {
  assert.throws(() => decodeToken(''), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30.AQID.AQID`), MalformedTokenError);
});

test('rejects empty segments', () => {
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}..AQID`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30.`), MalformedTokenError);
});

test('rejects characters outside the base64url alphabet', () => {
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30.AQ+D`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30.AQID==`), MalformedTokenError);
});

test('rejects non-canonical base64url', () => {
  // "AB" carries stray low bits; the canonical form of the same byte is "AA"
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.e30.AB`), MalformedTokenError);
});

test('rejects payloads that are not JSON objects', () => {
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.${segment('not json')}.AQID`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.${segment('[1,2]')}.AQID`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}.${segment('null')}.AQID`), MalformedTokenError);
  assert.throws(() => decodeToken(`${HS256_HEADER_SEGMENT}._w.AQID`), MalformedTokenError);
});

test('rejects headers without a string alg', () => {
  assert.throws(() => decodeToken(`${segment('{"typ":"JWT"}')}.e30.AQID`), MalformedTokenError);
  assert.throws(() => decodeToken(`${segment('{"alg":256}')}.e30.AQID`), MalformedTokenError);
});

test('rejects tokens longer than the configured limit', () => {
  const raw = `${HS256_HEADER_SEGMENT}.e30.AQID`;
  assert.doesNotThrow(() => decodeToken(raw, { maxLength: raw.length }));
  assert.throws(() => decodeToken(raw, { maxLength: raw.length - 1 }), MalformedTokenError);
});
