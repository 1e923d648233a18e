import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireAnyRole } from '../auth/authorize.js';
import { contextOf, principalOf } from '../middleware/auth.js';
import { sendError } from '../utils/errors.js';

const ADMIN = requireAnyRole('admin');

const UserParamsSchema = z.object({
  id: z.string().min(1),
});

const CreateUserSchema = z.object({
  username: z.string().trim().min(3).max(50),
  email: z.string().email(),
  name: z.string().min(1).optional(),
  roles: z.array(z.string().min(1)).default([]),
});

function optionalClaim(claims: Readonly<Record<string, unknown>> | undefined, name: string): string | null {
  const value = claims?.[name];
  return typeof value === 'string' ? value : null;
}

export async function registerUserRoutes(app: FastifyInstance) {
  app.get('/api/users/me', async (request) => {
    const principal = principalOf(request);
    const claims = contextOf(request).claims?.rawClaims;
    request.log.info({ username: principal.username }, 'GET /users/me');

    return {
      subject: principal.subject,
      username: principal.username,
      email: principal.email,
      name: optionalClaim(claims, 'name'),
      givenName: optionalClaim(claims, 'given_name'),
      familyName: optionalClaim(claims, 'family_name'),
      emailVerified: claims?.email_verified === true,
      roles: [...principal.roles],
      expiresAt: principal.expiresAt.toISOString(),
    };
  });

  app.get('/api/users/admin-only', { config: { auth: ADMIN } }, async (request) => {
    return { message: 'You are an admin', username: principalOf(request).username };
  });

  app.get('/api/users/jwt-info', async (request) => {
    return contextOf(request).claims?.rawClaims ?? {};
  });

  app.get('/api/users/:id', { config: { auth: ADMIN } }, async (request, reply) => {
    const parsed = UserParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Invalid user id', { details: { issues: parsed.error.issues } });
    }

    const id = parsed.data.id;
    request.log.info({ id, admin: principalOf(request).username }, 'GET /users/:id');
    return {
      username: id,
      email: `${id}@example.com`,
      name: `User ${id}`,
      roles: ['user'],
      emailVerified: true,
    };
  });

  app.post('/api/users', { config: { auth: ADMIN } }, async (request, reply) => {
    const parsed = CreateUserSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Validation failed', { details: { issues: parsed.error.issues } });
    }

    request.log.info({ admin: principalOf(request).username, username: parsed.data.username }, 'POST /users');
    reply.code(201);
    return parsed.data;
  });
}
