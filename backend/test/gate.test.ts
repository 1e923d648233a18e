import { before, test } from 'node:test';
import assert from 'node:assert/strict';
import Fastify from 'fastify';
import { requireAnyRole } from '../src/auth/authorize.js';
import { createRequestContext } from '../src/auth/context.js';
import { KeySetUnavailableError } from '../src/auth/errors.js';
import { KeySetCache } from '../src/auth/keySetCache.js';
import { createTokenValidator, type KeyLookup } from '../src/auth/tokenValidator.js';
import {
  buildValidationGateHook,
  contextOf,
  createValidationGate,
  principalOf,
  type ValidationGate,
} from '../src/middleware/auth.js';
import { silentLogger } from './helpers/apps.js';
import {
  adminClaims,
  AUDIENCE,
  createSigningKey,
  ISSUER,
  JWKS_URI,
  keySetOf,
  nowSeconds,
  signToken,
  type TestSigningKey,
} from './helpers/tokens.js';

const ADMIN = requireAnyRole('admin');

let signingKey: TestSigningKey;
let lookupKey: KeyLookup;

function gateWith(lookup: KeyLookup): ValidationGate {
  return createValidationGate({
    validator: createTokenValidator({ expectedIssuer: ISSUER, expectedAudience: AUDIENCE, lookupKey: lookup }),
    principal: { rolesClaimPath: 'realm_access.roles' },
  });
}

function contextFor(token?: string) {
  return createRequestContext('req-1', new AbortController().signal, token);
}

before(async () => {
  signingKey = await createSigningKey('kid-1');
  const cache = new KeySetCache({
    issuers: [{ issuer: ISSUER, jwksUri: JWKS_URI }],
    logger: silentLogger,
    fetcher: async () => keySetOf(signingKey),
  });
  lookupKey = (kid) => cache.getKey(ISSUER, kid);
});

test('authorizes a valid token and fills the request context', async () => {
  const context = contextFor(await signToken(signingKey));
  const decision = await gateWith(lookupKey).run(context, requireAnyRole());

  assert.equal(decision.outcome, 'authorized');
  assert.equal(decision.state, 'Authorized');
  assert.equal(context.claims?.subject, 'user-1');
  assert.equal(context.principal?.username, 'alice');
});

test('rejects a request without a token before any check runs', async () => {
  const decision = await gateWith(lookupKey).run(contextFor(), requireAnyRole());
  assert.equal(decision.outcome, 'rejected');
  if (decision.outcome === 'rejected') {
    assert.equal(decision.reason, 'MissingToken');
    assert.equal(decision.lastState, 'Received');
    assert.equal(decision.error.status, 401);
  }
});

test('records the last state reached before a rejection', async () => {
  const gate = gateWith(lookupKey);
  const cases = [
    { token: 'garbage', reason: 'Malformed', lastState: 'Received' },
    { token: await signToken(signingKey, { exp: nowSeconds() - 60 }), reason: 'Expired', lastState: 'SignatureChecked' },
    { token: await signToken(signingKey, { iss: 'https://other-idp.test' }), reason: 'IssuerMismatch', lastState: 'ExpiryChecked' },
    { token: await signToken(signingKey, { aud: 'svc-b' }), reason: 'AudienceMismatch', lastState: 'IssuerChecked' },
  ];

  for (const { token, reason, lastState } of cases) {
    const decision = await gate.run(contextFor(token), requireAnyRole());
    assert.equal(decision.outcome, 'rejected');
    if (decision.outcome === 'rejected') {
      assert.equal(decision.reason, reason);
      assert.equal(decision.lastState, lastState);
    }
  }
});

test('a validated principal without the role is forbidden, not unauthenticated', async () => {
  const context = contextFor(await signToken(signingKey));
  const decision = await gateWith(lookupKey).run(context, ADMIN);

  assert.equal(decision.outcome, 'rejected');
  if (decision.outcome === 'rejected') {
    assert.equal(decision.reason, 'InsufficientRole');
    assert.equal(decision.lastState, 'ClaimsExtracted');
    assert.equal(decision.error.status, 403);
  }
});

test('a key set outage rejects with KeySetUnavailable', async () => {
  const gate = gateWith(async () => {
    throw new KeySetUnavailableError(ISSUER, 'Signing keys could not be retrieved from the issuer');
  });
  const decision = await gate.run(contextFor(await signToken(signingKey)), requireAnyRole());

  assert.equal(decision.outcome, 'rejected');
  if (decision.outcome === 'rejected') {
    assert.equal(decision.reason, 'KeySetUnavailable');
    assert.equal(decision.lastState, 'StructurallyChecked');
    assert.equal(decision.error.status, 503);
  }
});

test('errors that are not authentication failures propagate', async () => {
  const gate = gateWith(async () => {
    throw new RangeError('lookup exploded');
  });
  await assert.rejects(gate.run(contextFor(await signToken(signingKey)), requireAnyRole()), RangeError);
});

async function buildGatedApp() {
  const app = Fastify({ logger: false });
  app.addHook('onRequest', buildValidationGateHook(gateWith(lookupKey), silentLogger));
  app.get('/open', { config: { auth: 'public' } }, async (request) => ({ token: contextOf(request).token ?? null }));
  app.get('/me', async (request) => ({ username: principalOf(request).username }));
  app.get('/admin', { config: { auth: ADMIN } }, async () => ({ ok: true }));
  await app.ready();
  return app;
}

test('hook: public routes skip validation', async () => {
  const app = await buildGatedApp();
  const res = await app.inject({ method: 'GET', url: '/open' });
  assert.equal(res.statusCode, 200);
  assert.deepEqual(res.json(), { token: null });
  await app.close();
});

test('hook: a missing token gets a bare Bearer challenge', async () => {
  const app = await buildGatedApp();
  const res = await app.inject({ method: 'GET', url: '/me?verbose=1' });

  assert.equal(res.statusCode, 401);
  assert.equal(res.headers['www-authenticate'], 'Bearer');
  const body = res.json();
  assert.equal(body.error, 'Unauthorized');
  assert.equal(body.code, 'auth.missing_token');
  assert.equal(body.status, 401);
  assert.equal(body.path, '/me');
  assert.equal(body.retryable, false);
  assert.deepEqual(body.details, { reason: 'MissingToken' });
  await app.close();
});

test('hook: an invalid token gets an invalid_token challenge without echoing the token', async () => {
  const app = await buildGatedApp();
  const token = await signToken(signingKey, { exp: nowSeconds() - 60 });
  const res = await app.inject({ method: 'GET', url: '/me', headers: { authorization: `Bearer ${token}` } });

  assert.equal(res.statusCode, 401);
  assert.equal(res.headers['www-authenticate'], 'Bearer error="invalid_token", error_description="auth.expired"');
  assert.equal(res.json().code, 'auth.expired');
  assert.equal(res.body.includes(token), false);
  await app.close();
});

test('hook: insufficient role answers 403 with insufficient_scope', async () => {
  const app = await buildGatedApp();
  const token = await signToken(signingKey);
  const res = await app.inject({ method: 'GET', url: '/admin', headers: { authorization: `Bearer ${token}` } });

  assert.equal(res.statusCode, 403);
  assert.equal(res.headers['www-authenticate'], 'Bearer error="insufficient_scope"');
  assert.equal(res.json().code, 'auth.insufficient_role');
  await app.close();
});

test('hook: admins reach role-protected routes and handlers see the principal', async () => {
  const app = await buildGatedApp();
  const token = await signToken(signingKey, adminClaims());

  const admin = await app.inject({ method: 'GET', url: '/admin', headers: { authorization: `Bearer ${token}` } });
  const me = await app.inject({ method: 'GET', url: '/me', headers: { authorization: `bearer ${token}` } });

  assert.equal(admin.statusCode, 200);
  assert.deepEqual(me.json(), { username: 'root-admin' });
  await app.close();
});

test('hook: CORS preflight is not challenged', async () => {
  const app = await buildGatedApp();
  const res = await app.inject({ method: 'OPTIONS', url: '/admin' });
  assert.equal(res.statusCode, 404);
  assert.equal(res.headers['www-authenticate'], undefined);
  await app.close();
});
