import type { FastifyReply, FastifyRequest } from 'fastify';

export type ErrorBody = {
  error: string;
  code: string;
  message: string;
  status: number;
  path: string;
  timestamp: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
};

const STATUS_TEXT: Record<number, string> = {
  400: 'Bad Request',
  401: 'Unauthorized',
  403: 'Forbidden',
  404: 'Not Found',
  409: 'Conflict',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  503: 'Service Unavailable',
};

export class HttpError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = 'HttpError';
  }
}

export class NotFoundError extends HttpError {
  constructor(resource: string, id: string) {
    super(404, 'resource.not_found', `${resource} not found: ${id}`, { resource });
    this.name = 'NotFoundError';
  }
}

export class DownstreamError extends Error {
  code = 'downstream.failed';
  constructor(
    public readonly service: string,
    message: string,
    public readonly downstreamStatus?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'DownstreamError';
  }
}

export class ConfigError extends Error {
  code = 'config.invalid';
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration:\n  - ${issues.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

export function buildErrorBody(
  request: FastifyRequest,
  status: number,
  code: string,
  message: string,
  extra?: { details?: Record<string, unknown>; retryable?: boolean },
): ErrorBody {
  const body: ErrorBody = {
    error: STATUS_TEXT[status] ?? 'Error',
    code,
    message,
    status,
    path: request.url.split('?')[0] ?? request.url,
    timestamp: new Date().toISOString(),
  };
  if (extra?.retryable !== undefined) body.retryable = extra.retryable;
  if (extra?.details !== undefined) body.details = extra.details;
  return body;
}

export function sendError(
  request: FastifyRequest,
  reply: FastifyReply,
  status: number,
  code: string,
  message: string,
  extra?: { details?: Record<string, unknown>; retryable?: boolean },
) {
  return reply.status(status).send(buildErrorBody(request, status, code, message, extra));
}
