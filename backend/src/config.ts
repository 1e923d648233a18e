import { config as loadEnv } from 'dotenv';
import { z } from 'zod';
import { SUPPORTED_ALGORITHMS } from './auth/keySetCache.js';
import { ConfigError } from './utils/errors.js';

loadEnv();

export const SERVICE_NAMES = ['gateway', 'user-service', 'product-service', 'order-service'] as const;
export type ServiceName = (typeof SERVICE_NAMES)[number];

const DEFAULT_GATEWAY_ROUTES = 'users=user-service,products=product-service,orders=order-service';

function normaliseIssuer(issuer: string): string {
  return issuer.endsWith('/') ? issuer.slice(0, -1) : issuer;
}

function parseEnvList(raw: string | undefined): string[] {
  const unique = new Set<string>();
  if (!raw) {
    return [];
  }
  for (const entry of raw.split(',')) {
    const trimmed = entry.trim();
    if (trimmed.length > 0) {
      unique.add(trimmed);
    }
  }
  return [...unique];
}

/** Parses `name=value,name=value` pairs; entries without `=` are ignored. */
function parseEnvMap(raw: string | undefined): Record<string, string> {
  const result: Record<string, string> = {};
  for (const entry of parseEnvList(raw)) {
    const index = entry.indexOf('=');
    if (index <= 0) continue;
    result[entry.slice(0, index).trim()] = entry.slice(index + 1).trim();
  }
  return result;
}

const ConfigSchema = z.object({
  nodeEnv: z.string().default('development'),
  serviceName: z.enum(SERVICE_NAMES, {
    required_error: `SERVICE_NAME is required (${SERVICE_NAMES.join(', ')})`,
  }),
  host: z.string().min(1).default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(8080),
  logLevel: z.string().default('info'),
  corsAllowedOrigins: z.array(z.string().min(1)),
  downstreamTimeoutMs: z.coerce.number().int().positive().default(5_000),
  serviceUrls: z.record(z.string().url()),
  gatewayRoutes: z.record(z.enum(SERVICE_NAMES)),
  auth: z.object({
    // No defaults: a blank issuer or audience would disable the matching check.
    issuer: z.string({ required_error: 'AUTH_ISSUER is required' }).trim().min(1, 'AUTH_ISSUER must not be empty'),
    audience: z
      .string({ required_error: 'AUTH_AUDIENCE is required' })
      .trim()
      .min(1, 'AUTH_AUDIENCE must not be empty'),
    jwksUri: z.string({ required_error: 'AUTH_JWKS_URI is required when AUTH_ISSUER is not set' }).url(),
    rolesClaimPath: z.string().trim().min(1, 'AUTH_ROLES_CLAIM_PATH must not be empty'),
    algorithms: z.array(z.enum(SUPPORTED_ALGORITHMS)).nonempty('AUTH_ALGORITHMS must list at least one algorithm'),
    clockToleranceSec: z.coerce.number().int().nonnegative().default(0),
    jwksCacheTtlMs: z.coerce.number().int().nonnegative().default(600_000),
    jwksRefreshCooldownMs: z.coerce.number().int().nonnegative().default(10_000),
    jwksFetchTimeoutMs: z.coerce.number().int().positive().default(5_000),
  }),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Builds the typed configuration from environment variables.
 * Throws ConfigError listing every problem; callers exit before listening.
 */
export function parseConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const issuer = env.AUTH_ISSUER;
  const algorithms = parseEnvList(env.AUTH_ALGORITHMS);

  const result = ConfigSchema.safeParse({
    nodeEnv: env.NODE_ENV,
    serviceName: env.SERVICE_NAME,
    host: env.HOST,
    port: env.PORT,
    logLevel: env.LOG_LEVEL,
    corsAllowedOrigins: parseEnvList(env.CORS_ALLOWED_ORIGINS),
    downstreamTimeoutMs: env.DOWNSTREAM_TIMEOUT_MS,
    serviceUrls: parseEnvMap(env.SERVICE_URLS),
    gatewayRoutes: parseEnvMap(env.GATEWAY_ROUTES ?? DEFAULT_GATEWAY_ROUTES),
    auth: {
      issuer,
      audience: env.AUTH_AUDIENCE,
      jwksUri:
        env.AUTH_JWKS_URI ??
        (issuer && issuer.trim() ? `${normaliseIssuer(issuer.trim())}/protocol/openid-connect/certs` : undefined),
      rolesClaimPath: env.AUTH_ROLES_CLAIM_PATH ?? 'realm_access.roles',
      algorithms: algorithms.length ? algorithms : ['RS256'],
      clockToleranceSec: env.AUTH_CLOCK_TOLERANCE_SEC,
      jwksCacheTtlMs: env.AUTH_JWKS_CACHE_TTL_MS,
      jwksRefreshCooldownMs: env.AUTH_JWKS_REFRESH_COOLDOWN_MS,
      jwksFetchTimeoutMs: env.AUTH_JWKS_FETCH_TIMEOUT_MS,
    },
  });

  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)),
    );
  }

  return result.data;
}
