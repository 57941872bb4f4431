import { test } from 'node:test';
import assert from 'node:assert/strict';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../src/app.js';
import { DEFAULT_CLAIM_POLICY } from '../src/auth/claims.js';
import { createHmacKey } from '../src/auth/signingKey.js';
import type { RouteDefinition } from '../src/routes/index.js';
import { NOW, NOW_SECONDS, signToken, TEST_SECRET } from './helpers/tokens.js';

async function withApp(run: (app: FastifyInstance) => Promise<void>, extra?: readonly RouteDefinition[]) {
  const app = await buildApp({
    key: createHmacKey(TEST_SECRET),
    policy: DEFAULT_CLAIM_POLICY,
    clock: () => NOW,
    routes: extra,
  });
  try {
    await run(app);
  } finally {
    await app.close();
  }
}

test('GET /health works anonymously', async () => {
  await withApp(async (app) => {
    const response = await app.inject({ method: 'GET', url: '/health' });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: 'ok', authenticated: false });
  });
});

test('GET /health reports an authenticated caller', async () => {
  const token = await signToken({ sub: 'alice', exp: NOW_SECONDS + 60 });
  await withApp(async (app) => {
    const response = await app.inject({ method: 'GET', url: '/health', headers: { authorization: `Bearer ${token}` } });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), { status: 'ok', authenticated: true });
  });
});

test('GET /auth/profile returns the authentication context', async () => {
  const token = await signToken({ sub: 'alice', exp: NOW_SECONDS + 3600, iat: NOW_SECONDS, roles: ['viewer', 'admin'] });
  await withApp(async (app) => {
    const response = await app.inject({
      method: 'GET',
      url: '/auth/profile',
      headers: { authorization: `Bearer ${token}` },
    });
    assert.equal(response.statusCode, 200);
    assert.deepEqual(response.json(), {
      user: {
        subject: 'alice',
        authorities: ['admin', 'viewer'],
        issuedAt: '2023-11-14T22:13:20.000Z',
        expiresAt: '2023-11-14T23:13:20.000Z',
      },
    });
  });
});

test('GET /auth/profile without a token is refused by the route', async () => {
  await withApp(async (app) => {
    const response = await app.inject({ method: 'GET', url: '/auth/profile' });
    assert.equal(response.statusCode, 401);
    assert.equal(response.headers['www-authenticate'], 'Bearer');
    assert.deepEqual(response.json(), { error: 'missing token' });
  });
});

test('a wrong scheme is rejected before routing', async () => {
  await withApp(async (app) => {
    const response = await app.inject({ method: 'GET', url: '/health', headers: { authorization: 'Basic abc123' } });
    assert.equal(response.statusCode, 401);
    assert.equal(response.headers['www-authenticate'], 'Bearer error="invalid_token"');
    assert.deepEqual(response.json(), { error: 'malformed authorization header' });
  });
});

test('an expired token gets the generic invalid token body', async () => {
  const token = await signToken({ sub: 'alice', exp: NOW_SECONDS - 1 });
  await withApp(async (app) => {
    const response = await app.inject({
      method: 'GET',
      url: '/auth/profile',
      headers: { authorization: `Bearer ${token}` },
    });
    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), { error: 'invalid token' });
  });
});

test('CORS preflight is not authenticated', async () => {
  await withApp(async (app) => {
    const response = await app.inject({
      method: 'OPTIONS',
      url: '/auth/profile',
      headers: {
        origin: 'https://app.test',
        'access-control-request-method': 'GET',
        authorization: 'Basic abc123',
      },
    });
    assert.equal(response.statusCode, 204);
  });
});

test('custom route tables receive the context as an argument', async () => {
  const token = await signToken({ sub: 'bob', exp: NOW_SECONDS + 60, authorities: ['ops'] });
  await withApp(
    async (app) => {
      const response = await app.inject({ method: 'GET', url: '/whoami', headers: { authorization: `Bearer ${token}` } });
      assert.equal(response.statusCode, 200);
      assert.deepEqual(response.json(), { subject: 'bob', isOps: true });
    },
    [
      {
        method: 'GET',
        url: '/whoami',
        auth: 'required',
        handler: async (auth) => ({ subject: auth.subject, isOps: auth.authorities.has('ops') }),
      },
    ],
  );
});

test('an expiry beyond the Date range is refused instead of crashing the profile route', async () => {
  const token = await signToken({ sub: 'alice', exp: 1e13 });
  await withApp(async (app) => {
    const response = await app.inject({
      method: 'GET',
      url: '/auth/profile',
      headers: { authorization: `Bearer ${token}` },
    });
    assert.equal(response.statusCode, 401);
    assert.deepEqual(response.json(), { error: 'invalid token' });
  });
});
