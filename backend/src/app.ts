import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { LoggerOptions } from 'pino';
import { isAuthError } from './auth/errors.js';
import { KeySetCache, type KeySetFetcher } from './auth/keySetCache.js';
import { createTokenValidator } from './auth/tokenValidator.js';
import type { AppConfig } from './config.js';
import { buildLoggerOptions } from './logger.js';
import { recordHttpRequest } from './metrics/prometheus.js';
import { buildValidationGateHook, createValidationGate, sendAuthError } from './middleware/auth.js';
import { registerGatewayRoutes } from './routes/gateway.js';
import { registerHealthRoute } from './routes/health.js';
import { registerPrometheusMetricsRoute } from './routes/metricsExporter.js';
import { registerOrderRoutes } from './routes/orders.js';
import { registerProductRoutes } from './routes/products.js';
import { registerUserRoutes } from './routes/users.js';
import { ServiceClient, type HttpFetch } from './services/propagation.js';
import { StaticServiceRegistry, type ServiceRegistry } from './services/registry.js';
import { OrderStore } from './storage/orderStore.js';
import { ProductStore } from './storage/productStore.js';
import { DownstreamError, HttpError, sendError } from './utils/errors.js';

/** Metrics label shared by every request that matched no route. */
const UNMATCHED_ROUTE = 'unmatched';

export interface AppDependencies {
  /** Key-set retrieval; defaults to an HTTP GET of the issuer's JWKS endpoint. */
  fetchKeySet?: KeySetFetcher;
  /** Transport for propagated calls; defaults to the global fetch. */
  fetch?: HttpFetch;
  registry?: ServiceRegistry;
  now?: () => number;
  /** `false` silences request logging entirely. */
  logger?: boolean | LoggerOptions;
  productStore?: ProductStore;
  orderStore?: OrderStore;
}

export async function buildApp(config: AppConfig, deps: AppDependencies = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logger ?? buildLoggerOptions(config),
  });

  await app.register(cors, {
    origin: config.corsAllowedOrigins.length ? config.corsAllowedOrigins : true,
    methods: ['GET', 'POST', 'DELETE', 'PUT', 'PATCH', 'OPTIONS'],
    allowedHeaders: ['Authorization', 'Content-Type'],
    exposedHeaders: ['x-request-id', 'WWW-Authenticate', 'Retry-After'],
  });

  const { auth } = config;
  const keySetCache = new KeySetCache({
    issuers: [{ issuer: auth.issuer, jwksUri: auth.jwksUri }],
    logger: app.log.child({ component: 'key-set-cache' }),
    fetcher: deps.fetchKeySet,
    ttlMs: auth.jwksCacheTtlMs,
    refreshCooldownMs: auth.jwksRefreshCooldownMs,
    fetchTimeoutMs: auth.jwksFetchTimeoutMs,
    now: deps.now,
  });

  // Keys are always looked up under the configured issuer, never the token's own claim.
  const validator = createTokenValidator({
    expectedIssuer: auth.issuer,
    expectedAudience: auth.audience,
    lookupKey: (keyId) => keySetCache.getKey(auth.issuer, keyId),
    algorithms: auth.algorithms,
    clockToleranceSec: auth.clockToleranceSec,
    now: deps.now,
  });

  const gate = createValidationGate({
    validator,
    principal: { rolesClaimPath: auth.rolesClaimPath },
  });

  app.addHook('onRequest', async (request, reply) => {
    request.metricsStart = process.hrtime.bigint();
    reply.header('x-request-id', request.id);
  });
  app.addHook('onRequest', buildValidationGateHook(gate));

  app.setErrorHandler((error, request, reply) => {
    if (isAuthError(error)) {
      return sendAuthError(request, reply, error);
    }
    if (error instanceof HttpError) {
      return sendError(request, reply, error.status, error.code, error.message, { details: error.details });
    }
    if (error instanceof DownstreamError) {
      request.log.warn({ service: error.service, status: error.downstreamStatus }, error.message);
      return sendError(request, reply, 502, error.code, error.message, {
        details: { service: error.service, status: error.downstreamStatus ?? null },
      });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return sendError(request, reply, error.statusCode, 'request.invalid', error.message);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return sendError(request, reply, 500, 'internal.error', 'Internal server error');
  });

  app.setNotFoundHandler((request, reply) => {
    return sendError(request, reply, 404, 'route.not_found', `Route ${request.method} ${request.url.split('?')[0]} not found`);
  });

  const registry = deps.registry ?? new StaticServiceRegistry(config.serviceUrls);
  const client = new ServiceClient({
    registry,
    logger: app.log.child({ component: 'service-client' }),
    timeoutMs: config.downstreamTimeoutMs,
    fetch: deps.fetch,
  });

  await registerHealthRoute(app, { keySetCache, issuer: auth.issuer, serviceName: config.serviceName });
  await registerPrometheusMetricsRoute(app);

  switch (config.serviceName) {
    case 'gateway':
      await registerGatewayRoutes(app, { client, routes: config.gatewayRoutes });
      break;
    case 'user-service':
      await registerUserRoutes(app);
      break;
    case 'product-service':
      await registerProductRoutes(app, { store: deps.productStore ?? new ProductStore() });
      break;
    case 'order-service':
      await registerOrderRoutes(app, { store: deps.orderStore ?? new OrderStore(), client });
      break;
  }

  app.addHook('onResponse', async (request, reply) => {
    const start = request.metricsStart;
    const durationMs = start === undefined ? 0 : Number(process.hrtime.bigint() - start) / 1_000_000;
    const route = request.is404 ? UNMATCHED_ROUTE : request.routeOptions.url ?? UNMATCHED_ROUTE;
    recordHttpRequest({ method: request.method.toUpperCase(), route, status: reply.statusCode }, durationMs);
  });

  return app;
}
