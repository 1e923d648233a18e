import 'fastify';
import type { RouteRequirement } from '../auth/authorize.js';
import type { RequestContext } from '../auth/context.js';

declare module 'fastify' {
  interface FastifyRequest {
    authContext?: RequestContext;
    metricsStart?: bigint;
  }

  interface FastifyContextConfig {
    /** Role requirement checked by the validation gate; routes without one need any authenticated principal. */
    auth?: RouteRequirement | 'public';
  }
}
