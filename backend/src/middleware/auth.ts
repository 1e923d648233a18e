import type { FastifyReply, FastifyRequest } from 'fastify';
import type { BaseLogger } from 'pino';
import { anyAuthenticated, authorize, type RouteRequirement } from '../auth/authorize.js';
import { createRequestContext, extractBearerToken, type RequestContext } from '../auth/context.js';
import { AuthError, isAuthError, type AuthFailureReason } from '../auth/errors.js';
import { extractPrincipal, type Principal, type PrincipalOptions } from '../auth/principal.js';
import type { CheckName, TokenValidator, ValidatedClaims } from '../auth/tokenValidator.js';
import { recordGateDecision } from '../metrics/prometheus.js';
import { buildErrorBody } from '../utils/errors.js';

type OnRequestHook = (request: FastifyRequest, reply: FastifyReply) => Promise<FastifyReply | undefined>;

export type GateState =
  | 'Received'
  | 'StructurallyChecked'
  | 'SignatureChecked'
  | 'ExpiryChecked'
  | 'IssuerChecked'
  | 'AudienceChecked'
  | 'ClaimsExtracted'
  | 'Authorized'
  | 'Rejected';

const STATE_AFTER_CHECK: Record<CheckName, GateState> = {
  structure: 'StructurallyChecked',
  signature: 'SignatureChecked',
  expiry: 'ExpiryChecked',
  issuer: 'IssuerChecked',
  audience: 'AudienceChecked',
};

export type GateDecision =
  | { outcome: 'authorized'; state: 'Authorized'; claims: ValidatedClaims; principal: Principal }
  | { outcome: 'rejected'; state: 'Rejected'; reason: AuthFailureReason; lastState: GateState; error: AuthError };

export interface ValidationGate {
  run(context: RequestContext, requirement: RouteRequirement): Promise<GateDecision>;
}

export interface ValidationGateOptions {
  validator: TokenValidator;
  principal: PrincipalOptions;
}

const KEY_SET_RETRY_AFTER_SECONDS = 5;

function rejected(error: AuthError, lastState: GateState): GateDecision {
  return { outcome: 'rejected', state: 'Rejected', reason: error.reason, lastState, error };
}

/**
 * Runs validation, principal extraction and authorization for one request.
 * The first failure is terminal; nothing from an upstream hop is trusted.
 * An `Authorized` decision lets Fastify dispatch the route handler.
 */
export function createValidationGate(options: ValidationGateOptions): ValidationGate {
  const { validator } = options;

  return {
    async run(context, requirement) {
      let state: GateState = 'Received';

      if (!context.token) {
        return rejected(new AuthError('MissingToken', 'Bearer token required'), state);
      }

      try {
        const claims = await validator.validate(context.token, (check) => {
          state = STATE_AFTER_CHECK[check];
        });

        const principal = extractPrincipal(claims, options.principal);
        context.claims = claims;
        context.principal = principal;
        state = 'ClaimsExtracted';

        const decision = authorize(principal, requirement);
        if (!decision.allowed) {
          return rejected(new AuthError('InsufficientRole', 'Principal lacks every role required by this route'), state);
        }

        return { outcome: 'authorized', state: 'Authorized', claims, principal };
      } catch (error) {
        if (isAuthError(error)) {
          return rejected(error, state);
        }
        throw error;
      }
    },
  };
}

function challengeFor(error: AuthError, tokenPresented: boolean): string {
  if (error.reason === 'InsufficientRole') {
    return 'Bearer error="insufficient_scope"';
  }
  if (tokenPresented) {
    return `Bearer error="invalid_token", error_description="${error.code}"`;
  }
  return 'Bearer';
}

export function sendAuthError(request: FastifyRequest, reply: FastifyReply, error: AuthError) {
  if (error.outcome === 'unavailable') {
    reply.header('Retry-After', String(KEY_SET_RETRY_AFTER_SECONDS));
  } else {
    reply.header('WWW-Authenticate', challengeFor(error, Boolean(request.authContext?.token)));
  }
  return reply.status(error.status).send(
    buildErrorBody(request, error.status, error.code, error.message, {
      retryable: error.retryable,
      details: { reason: error.reason },
    }),
  );
}

function linkToConnection(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client closed the connection'));
    }
  });
  return controller.signal;
}

export function buildValidationGateHook(gate: ValidationGate, logger?: BaseLogger): OnRequestHook {
  return async function validationGate(request: FastifyRequest, reply: FastifyReply) {
    const token = extractBearerToken(request.headers.authorization);
    request.authContext = createRequestContext(request.id, linkToConnection(reply), token);

    // Skip auth for CORS preflight
    if (request.method.toUpperCase() === 'OPTIONS') {
      return undefined;
    }

    const routeAuth = request.routeOptions.config.auth;
    if (routeAuth === 'public') {
      recordGateDecision({ outcome: 'public' });
      return undefined;
    }

    const decision = await gate.run(request.authContext, routeAuth ?? anyAuthenticated);

    if (decision.outcome === 'authorized') {
      recordGateDecision({ outcome: 'authorized' });
      (logger ?? request.log).debug(
        { username: decision.principal.username, path: request.routeOptions.url },
        'Request authorized',
      );
      return undefined;
    }

    recordGateDecision({ outcome: 'rejected', reason: decision.reason });
    (logger ?? request.log).warn(
      { reason: decision.reason, stage: decision.lastState, path: request.url.split('?')[0] },
      'Request rejected by validation gate',
    );
    return sendAuthError(request, reply, decision.error);
  };
}

export function contextOf(request: FastifyRequest): RequestContext {
  if (!request.authContext) {
    throw new Error('Request context is missing; is the validation gate registered?');
  }
  return request.authContext;
}

export function principalOf(request: FastifyRequest): Principal {
  const principal = contextOf(request).principal;
  if (!principal) {
    throw new AuthError('MissingToken', 'Bearer token required');
  }
  return principal;
}
