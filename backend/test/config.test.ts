import { test } from 'node:test';
import assert from 'node:assert/strict';
import { parseConfig } from '../src/config.js';
import { ConfigError } from '../src/utils/errors.js';

const baseEnv = {
  SERVICE_NAME: 'user-service',
  AUTH_ISSUER: 'https://idp.test/realms/demo',
  AUTH_AUDIENCE: 'demo-client',
};

function issuesOf(env: NodeJS.ProcessEnv): string[] {
  try {
    parseConfig(env);
  } catch (error) {
    if (!(error instanceof ConfigError)) throw error;
    return error.issues;
  }
  throw new Error('expected ConfigError');
}

test('applies defaults that keep validation strict', () => {
  const config = parseConfig(baseEnv);
  assert.equal(config.serviceName, 'user-service');
  assert.equal(config.port, 8080);
  assert.equal(config.auth.jwksUri, 'https://idp.test/realms/demo/protocol/openid-connect/certs');
  assert.equal(config.auth.rolesClaimPath, 'realm_access.roles');
  assert.deepEqual(config.auth.algorithms, ['RS256']);
  assert.equal(config.auth.clockToleranceSec, 0);
  assert.equal(config.auth.jwksCacheTtlMs, 600_000);
  assert.equal(config.auth.jwksRefreshCooldownMs, 10_000);
  assert.equal(config.downstreamTimeoutMs, 5_000);
  assert.deepEqual(config.gatewayRoutes, {
    users: 'user-service',
    products: 'product-service',
    orders: 'order-service',
  });
});

test('derives the key set endpoint from an issuer with a trailing slash', () => {
  const config = parseConfig({ ...baseEnv, AUTH_ISSUER: 'https://idp.test/realms/demo/' });
  assert.equal(config.auth.jwksUri, 'https://idp.test/realms/demo/protocol/openid-connect/certs');
});

test('reads explicit auth settings and service urls', () => {
  const config = parseConfig({
    ...baseEnv,
    AUTH_JWKS_URI: 'https://keys.test/jwks.json',
    AUTH_ALGORITHMS: 'RS256, ES256',
    AUTH_CLOCK_TOLERANCE_SEC: '30',
    AUTH_ROLES_CLAIM_PATH: 'resource_access.*.roles',
    SERVICE_URLS: 'user-service=http://localhost:8081, product-service=http://localhost:8082',
    CORS_ALLOWED_ORIGINS: 'http://localhost:3000,http://localhost:3000',
  });
  assert.equal(config.auth.jwksUri, 'https://keys.test/jwks.json');
  assert.deepEqual(config.auth.algorithms, ['RS256', 'ES256']);
  assert.equal(config.auth.clockToleranceSec, 30);
  assert.equal(config.auth.rolesClaimPath, 'resource_access.*.roles');
  assert.deepEqual(config.serviceUrls, {
    'user-service': 'http://localhost:8081',
    'product-service': 'http://localhost:8082',
  });
  assert.deepEqual(config.corsAllowedOrigins, ['http://localhost:3000']);
});

test('fails when the audience is missing', () => {
  const issues = issuesOf({ SERVICE_NAME: 'gateway', AUTH_ISSUER: 'https://idp.test/realms/demo' });
  assert.deepEqual(issues, ['auth.audience: AUTH_AUDIENCE is required']);
});

test('fails when the audience is blank', () => {
  const issues = issuesOf({ ...baseEnv, AUTH_AUDIENCE: '   ' });
  assert.deepEqual(issues, ['auth.audience: AUTH_AUDIENCE must not be empty']);
});

test('fails when the issuer is missing and lists every problem', () => {
  const issues = issuesOf({ SERVICE_NAME: 'gateway', AUTH_AUDIENCE: 'demo-client' });
  assert.ok(issues.includes('auth.issuer: AUTH_ISSUER is required'));
  assert.ok(issues.includes('auth.jwksUri: AUTH_JWKS_URI is required when AUTH_ISSUER is not set'));
});

test('rejects an unsupported signing algorithm', () => {
  const issues = issuesOf({ ...baseEnv, AUTH_ALGORITHMS: 'HS256' });
  assert.equal(issues.length, 1);
  assert.match(issues[0] ?? '', /^auth\.algorithms\.0: /);
});

test('rejects an unknown service name', () => {
  const issues = issuesOf({ ...baseEnv, SERVICE_NAME: 'billing' });
  assert.equal(issues.length, 1);
  assert.match(issues[0] ?? '', /^serviceName: /);
});
