import type { BaseLogger } from 'pino';
import type { ZodType, ZodTypeDef } from 'zod';
import type { RequestContext } from '../auth/context.js';
import { recordPropagatedCall } from '../metrics/prometheus.js';
import { DownstreamError } from '../utils/errors.js';
import { ServiceNotFoundError, type ServiceRegistry } from './registry.js';

export interface OutboundCall {
  url: URL;
  method: string;
  headers: Headers;
  body?: string;
}

export type HttpFetch = (url: URL, init: RequestInit) => Promise<Response>;

/**
 * Attaches the inbound bearer token, byte for byte, to an outbound call.
 * Without a token nothing is attached (a handler-supplied Authorization header is
 * dropped too) and the downstream gate is left to reject the call.
 */
export function forward(context: RequestContext, call: OutboundCall, logger: BaseLogger): OutboundCall {
  const headers = new Headers(call.headers);
  headers.delete('authorization');

  if (context.token) {
    headers.set('authorization', `Bearer ${context.token}`);
  } else {
    logger.warn(
      { requestId: context.requestId, target: call.url.toString() },
      'No bearer token in request context; outbound call sent unauthenticated',
    );
  }

  return { ...call, headers };
}

export interface ServiceClientOptions {
  registry: ServiceRegistry;
  logger: BaseLogger;
  timeoutMs: number;
  fetch?: HttpFetch;
}

export interface ServiceRequestInit {
  method?: string;
  headers?: Record<string, string>;
  body?: unknown;
}

export interface ServiceResponse {
  status: number;
  contentType: string | null;
  headers: Headers;
  body: unknown;
}

function joinUrl(base: URL, path: string): URL {
  const root = base.href.endsWith('/') ? base.href : `${base.href}/`;
  return new URL(path.replace(/^\/+/, ''), root);
}

async function readBody(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  const contentType = res.headers.get('content-type') ?? '';
  return contentType.includes('json') ? JSON.parse(text) : text;
}

/**
 * The only way handlers reach other services. Every call goes through {@link forward},
 * is bound to the inbound request's lifetime and has its own timeout. Failures are
 * reported once as DownstreamError; retrying is the caller's decision.
 */
export class ServiceClient {
  private readonly fetchImpl: HttpFetch;

  constructor(private readonly options: ServiceClientOptions) {
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async request(context: RequestContext, serviceName: string, path: string, init: ServiceRequestInit = {}): Promise<ServiceResponse> {
    let base: URL;
    try {
      base = this.options.registry.resolve(serviceName);
    } catch (error) {
      if (error instanceof ServiceNotFoundError) {
        throw new DownstreamError(serviceName, error.message, undefined, { cause: error });
      }
      throw error;
    }

    const headers = new Headers({ accept: 'application/json', 'x-request-id': context.requestId, ...init.headers });
    let body: string | undefined;
    if (init.body !== undefined) {
      headers.set('content-type', 'application/json');
      body = JSON.stringify(init.body);
    }

    const call = forward(
      context,
      { url: joinUrl(base, path), method: (init.method ?? 'GET').toUpperCase(), headers, body },
      this.options.logger,
    );

    const controller = new AbortController();
    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort(new Error(`Timed out after ${this.options.timeoutMs}ms`));
    }, this.options.timeoutMs);
    const onCancel = () => controller.abort(context.signal.reason);
    if (context.signal.aborted) {
      onCancel();
    } else {
      context.signal.addEventListener('abort', onCancel, { once: true });
    }

    const authenticated = Boolean(context.token);
    try {
      const res = await this.fetchImpl(call.url, {
        method: call.method,
        headers: call.headers,
        body: call.body,
        signal: controller.signal,
      });
      const payload = await readBody(res);
      recordPropagatedCall({ service: serviceName, result: res.ok ? 'ok' : 'error', authenticated });
      return { status: res.status, contentType: res.headers.get('content-type'), headers: res.headers, body: payload };
    } catch (error) {
      const result = timedOut ? 'timeout' : context.signal.aborted ? 'cancelled' : 'error';
      recordPropagatedCall({ service: serviceName, result, authenticated });
      this.options.logger.warn(
        { err: error, service: serviceName, method: call.method, path, result },
        'Downstream call failed',
      );
      const message =
        result === 'timeout'
          ? `${serviceName} did not respond within ${this.options.timeoutMs}ms`
          : result === 'cancelled'
            ? `Call to ${serviceName} was cancelled with the inbound request`
            : `Call to ${serviceName} failed`;
      throw new DownstreamError(serviceName, message, undefined, { cause: error });
    } finally {
      clearTimeout(timer);
      context.signal.removeEventListener('abort', onCancel);
    }
  }

  /** GET a JSON resource; any non-2xx status or unexpected shape is a DownstreamError. */
  async getJson<T>(context: RequestContext, serviceName: string, path: string, schema: ZodType<T, ZodTypeDef, unknown>): Promise<T> {
    const res = await this.request(context, serviceName, path);
    if (res.status < 200 || res.status >= 300) {
      throw new DownstreamError(serviceName, `${serviceName} responded with ${res.status}`, res.status);
    }
    const parsed = schema.safeParse(res.body);
    if (!parsed.success) {
      throw new DownstreamError(serviceName, `${serviceName} returned an unexpected payload`, res.status);
    }
    return parsed.data;
  }
}
