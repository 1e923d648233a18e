import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { ServiceName } from '../config.js';
import { contextOf } from '../middleware/auth.js';
import type { ServiceClient } from '../services/propagation.js';
import { NotFoundError } from '../utils/errors.js';

// Downstream rejections keep their challenge and back-off hints at the edge.
const RELAYED_HEADERS = ['www-authenticate', 'retry-after'] as const;

interface RegisterGatewayRoutesOptions {
  client: ServiceClient;
  /** First path segment under /api → downstream service. */
  routes: Record<string, ServiceName>;
}

function segmentOf(url: string): string {
  const path = url.split('?')[0] ?? url;
  return path.replace(/^\/api\/?/, '').split('/')[0] ?? '';
}

/**
 * Front door for the demo services. The gateway validates the caller like any other
 * service, then relays the call with the same token; downstream responses are passed
 * through unchanged.
 */
export async function registerGatewayRoutes(app: FastifyInstance, options: RegisterGatewayRoutesOptions) {
  const { client, routes } = options;

  async function relay(request: FastifyRequest, reply: FastifyReply) {
    const segment = segmentOf(request.url);
    const target = Object.hasOwn(routes, segment) ? routes[segment] : undefined;
    if (!target) {
      throw new NotFoundError('Route', `/api/${segment}`);
    }

    const res = await client.request(contextOf(request), target, request.url, {
      method: request.method,
      body: request.body ?? undefined,
    });

    request.log.debug({ target, status: res.status }, 'Relayed request');
    reply.code(res.status);
    if (res.contentType) {
      reply.header('content-type', res.contentType);
    }
    for (const name of RELAYED_HEADERS) {
      const value = res.headers.get(name);
      if (value !== null) {
        reply.header(name, value);
      }
    }
    return reply.send(res.body ?? '');
  }

  app.route({
    method: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
    url: '/api/*',
    handler: relay,
  });
}
