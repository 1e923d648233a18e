import type { Principal } from './principal.js';
import type { RawToken, ValidatedClaims } from './tokenValidator.js';

/**
 * Request-scoped authentication state. Created by the validation gate for one inbound
 * request and handed explicitly to anything that acts on the caller's behalf.
 */
export interface RequestContext {
  readonly requestId: string;
  /** Bearer token as received; absent on public routes called anonymously and in background work. */
  token?: RawToken;
  claims?: ValidatedClaims;
  principal?: Principal;
  /** Aborted when the inbound connection closes before the response is sent. */
  readonly signal: AbortSignal;
}

export function createRequestContext(requestId: string, signal: AbortSignal, token?: RawToken): RequestContext {
  return { requestId, token, signal };
}

/** Context for work that has no inbound request, such as scheduled jobs. */
export function createDetachedContext(requestId: string, signal: AbortSignal = new AbortController().signal): RequestContext {
  return { requestId, signal };
}

export function extractBearerToken(headerValue?: string): RawToken | undefined {
  if (!headerValue) {
    return undefined;
  }

  const match = headerValue.match(/^Bearer\s+(.+)$/i);
  return match?.[1];
}
