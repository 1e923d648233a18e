import { before, test } from 'node:test';
import assert from 'node:assert/strict';
import { KeySetUnavailableError } from '../src/auth/errors.js';
import { KeySetCache } from '../src/auth/keySetCache.js';
import { checkStructure, createTokenValidator, type CheckName, type TokenValidator } from '../src/auth/tokenValidator.js';
import { silentLogger } from './helpers/apps.js';
import {
  AUDIENCE,
  createSigningKey,
  ISSUER,
  JWKS_URI,
  keySetOf,
  nowSeconds,
  signToken,
  type TestSigningKey,
} from './helpers/tokens.js';

let signingKey: TestSigningKey;
let strangerKey: TestSigningKey;
let ecKey: TestSigningKey;
let validator: TokenValidator;

function encodeSegment(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

function rejectsWith(promise: Promise<unknown>, reason: string) {
  return assert.rejects(promise, { name: 'AuthError', reason });
}

before(async () => {
  signingKey = await createSigningKey('kid-1');
  strangerKey = await createSigningKey('kid-stranger');
  ecKey = await createSigningKey('kid-ec', 'ES256');

  const cache = new KeySetCache({
    issuers: [{ issuer: ISSUER, jwksUri: JWKS_URI }],
    logger: silentLogger,
    fetcher: async () => keySetOf(signingKey, ecKey),
  });
  validator = createTokenValidator({
    expectedIssuer: ISSUER,
    expectedAudience: AUDIENCE,
    lookupKey: (kid) => cache.getKey(ISSUER, kid),
  });
});

test('accepts a well-formed token and runs every check in order', async () => {
  const token = await signToken(signingKey);
  const passed: CheckName[] = [];

  const claims = await validator.validate(token, (check) => passed.push(check));

  assert.deepEqual(passed, ['structure', 'signature', 'expiry', 'issuer', 'audience']);
  assert.equal(claims.subject, 'user-1');
  assert.equal(claims.issuer, ISSUER);
  assert.deepEqual([...claims.audiences], [AUDIENCE]);
  assert.equal(claims.rawClaims.preferred_username, 'alice');
  assert.ok(Object.isFrozen(claims));
});

test('accepts a token whose audience list includes this service', async () => {
  const token = await signToken(signingKey, { aud: ['account', AUDIENCE] });
  const claims = await validator.validate(token);
  assert.deepEqual([...claims.audiences], ['account', AUDIENCE]);
});

test('rejects tokens that are not three base64url segments', async () => {
  await rejectsWith(validator.validate('not-a-token'), 'Malformed');
  await rejectsWith(validator.validate('a.b'), 'Malformed');
  await rejectsWith(validator.validate('a..c'), 'Malformed');
  await rejectsWith(validator.validate('%%%.%%%.%%%'), 'Malformed');
});

test('rejects a token without a subject as malformed', async () => {
  const token = await signToken(signingKey, { sub: undefined });
  assert.throws(() => checkStructure(token), { reason: 'Malformed', message: 'Token has no subject' });
});

test('rejects a token signed by a key the issuer does not publish', async () => {
  const token = await signToken(strangerKey);
  await rejectsWith(validator.validate(token), 'SignatureInvalid');
});

test('rejects a token signed by a different key under a published kid', async () => {
  const token = await signToken(strangerKey, {}, { kid: 'kid-1' });
  await rejectsWith(validator.validate(token), 'SignatureInvalid');
});

test('rejects a token without a kid', async () => {
  const token = await signToken(signingKey, {}, { kid: null });
  await rejectsWith(validator.validate(token), 'SignatureInvalid');
});

test('rejects an algorithm outside the accepted list', async () => {
  const token = await signToken(ecKey);
  await rejectsWith(validator.validate(token), 'SignatureInvalid');
});

test('rejects an unsigned token', async () => {
  const token = `${encodeSegment({ alg: 'none', kid: 'kid-1' })}.${encodeSegment({ sub: 'user-1', iss: ISSUER, aud: AUDIENCE, exp: nowSeconds() + 60 })}.AAAA`;
  await rejectsWith(validator.validate(token), 'SignatureInvalid');
});

test('rejects a token whose payload was altered after signing', async () => {
  const token = await signToken(signingKey);
  const [header, , signature] = token.split('.');
  const forgedPayload = encodeSegment({
    iss: ISSUER,
    aud: AUDIENCE,
    sub: 'user-1',
    exp: nowSeconds() + 300,
    realm_access: { roles: ['admin'] },
  });
  await rejectsWith(validator.validate(`${header}.${forgedPayload}.${signature}`), 'SignatureInvalid');
});

test('rejects an expired token and one without expiry', async () => {
  const expired = await signToken(signingKey, { iat: nowSeconds() - 600, exp: nowSeconds() - 60 });
  await assert.rejects(validator.validate(expired), { reason: 'Expired', message: 'Token has expired' });

  const noExpiry = await signToken(signingKey, { exp: undefined });
  await assert.rejects(validator.validate(noExpiry), { reason: 'Expired', message: 'Token has no expiry' });
});

test('rejects a token that is not valid yet', async () => {
  const token = await signToken(signingKey, { nbf: nowSeconds() + 600 });
  await rejectsWith(validator.validate(token), 'NotYetValid');
});

test('rejects a token from another issuer', async () => {
  const token = await signToken(signingKey, { iss: 'https://other-idp.test/realms/demo' });
  await rejectsWith(validator.validate(token), 'IssuerMismatch');
});

test('rejects a token minted for another audience', async () => {
  const token = await signToken(signingKey, { aud: 'svc-b' });
  await assert.rejects(validator.validate(token), {
    reason: 'AudienceMismatch',
    message: 'Token is not intended for this service',
  });
});

test('rejects a token without an audience', async () => {
  const token = await signToken(signingKey, { aud: undefined });
  await rejectsWith(validator.validate(token), 'AudienceMismatch');
});

test('rejects an audience list that does not name this service', async () => {
  const token = await signToken(signingKey, { aud: ['account', 'svc-b'] });
  await rejectsWith(validator.validate(token), 'AudienceMismatch');
});

test('reports the first failing check only', async () => {
  const expiredForeign = await signToken(signingKey, { exp: nowSeconds() - 60, iss: 'https://other-idp.test', aud: 'svc-b' });
  await rejectsWith(validator.validate(expiredForeign), 'Expired');

  const unsignedAndExpired = await signToken(strangerKey, { exp: nowSeconds() - 60 });
  await rejectsWith(validator.validate(unsignedAndExpired), 'SignatureInvalid');
});

test('clock tolerance accepts a token that expired moments ago', async () => {
  const cache = new KeySetCache({
    issuers: [{ issuer: ISSUER, jwksUri: JWKS_URI }],
    logger: silentLogger,
    fetcher: async () => keySetOf(signingKey),
  });
  const lenient = createTokenValidator({
    expectedIssuer: ISSUER,
    expectedAudience: AUDIENCE,
    lookupKey: (kid) => cache.getKey(ISSUER, kid),
    clockToleranceSec: 30,
  });

  const token = await signToken(signingKey, { exp: nowSeconds() - 5 });
  const claims = await lenient.validate(token);
  assert.equal(claims.subject, 'user-1');
});

test('lets a key set outage through unchanged', async () => {
  const outage = createTokenValidator({
    expectedIssuer: ISSUER,
    expectedAudience: AUDIENCE,
    lookupKey: async () => {
      throw new KeySetUnavailableError(ISSUER, 'Signing keys could not be retrieved from the issuer');
    },
  });
  const token = await signToken(signingKey);
  await assert.rejects(outage.validate(token), KeySetUnavailableError);
});

test('refuses to build a validator without issuer or audience', () => {
  const lookupKey = async () => undefined;
  assert.throws(() => createTokenValidator({ expectedIssuer: ISSUER, expectedAudience: ' ', lookupKey }), /audience/);
  assert.throws(() => createTokenValidator({ expectedIssuer: '', expectedAudience: AUDIENCE, lookupKey }), /issuer/);
});
