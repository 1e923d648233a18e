import type { FastifyInstance } from 'fastify';
import type { KeySetCache } from '../auth/keySetCache.js';
import type { ServiceName } from '../config.js';

interface RegisterHealthRouteOptions {
  keySetCache: KeySetCache;
  issuer: string;
  serviceName: ServiceName;
}

export async function registerHealthRoute(app: FastifyInstance, options: RegisterHealthRouteOptions) {
  const { keySetCache, issuer, serviceName } = options;

  app.get('/health', { config: { auth: 'public' } }, async () => {
    const keySet = keySetCache.peek(issuer);
    return {
      status: 'ok' as const,
      service: serviceName,
      keySet: {
        issuer,
        keyIds: keySet?.keyIds ?? [],
        fetchedAt: keySet?.fetchedAt?.toISOString() ?? null,
        stats: keySetCache.stats(),
      },
    };
  });

  // Readiness probe: ready once the issuer's signing keys have been loaded
  app.get('/ready', { config: { auth: 'public' } }, async (request, reply) => {
    try {
      const cached = keySetCache.peek(issuer)?.keyIds.length ?? 0;
      const keyCount = cached > 0 ? cached : await keySetCache.refresh(issuer);
      if (keyCount === 0) {
        reply.code(503);
        return { status: 'not-ready', error: 'Issuer published no usable signing keys' } as const;
      }
      reply.code(200);
      return { status: 'ready', keyCount } as const;
    } catch (error) {
      reply.code(503);
      return { status: 'not-ready', error: error instanceof Error ? error.message : String(error) } as const;
    }
  });
}
