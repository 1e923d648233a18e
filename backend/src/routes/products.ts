import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { requireAnyRole } from '../auth/authorize.js';
import { principalOf } from '../middleware/auth.js';
import type { ProductStore } from '../storage/productStore.js';
import { NotFoundError, sendError } from '../utils/errors.js';

const ADMIN = requireAnyRole('admin');

const ProductParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const ProductBodySchema = z.object({
  name: z.string().trim().min(1),
  description: z.string().default(''),
  price: z.number().nonnegative(),
  stock: z.number().int().nonnegative(),
});

interface RegisterProductRoutesOptions {
  store: ProductStore;
}

export async function registerProductRoutes(app: FastifyInstance, options: RegisterProductRoutesOptions) {
  const { store } = options;

  app.get('/api/products', async (request) => {
    const products = store.list();
    request.log.info({ username: principalOf(request).username, total: products.length }, 'GET /products');
    return products;
  });

  app.get('/api/products/:id', async (request, reply) => {
    const parsed = ProductParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Invalid product id', { details: { issues: parsed.error.issues } });
    }
    const product = store.get(parsed.data.id);
    if (!product) {
      throw new NotFoundError('Product', String(parsed.data.id));
    }
    return product;
  });

  app.post('/api/products', { config: { auth: ADMIN } }, async (request, reply) => {
    const parsed = ProductBodySchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Validation failed', { details: { issues: parsed.error.issues } });
    }
    const product = store.create(parsed.data);
    request.log.info({ admin: principalOf(request).username, productId: product.id }, 'POST /products');
    reply.code(201);
    return product;
  });

  app.put('/api/products/:id', { config: { auth: ADMIN } }, async (request, reply) => {
    const params = ProductParamsSchema.safeParse(request.params);
    const body = ProductBodySchema.safeParse(request.body ?? {});
    if (!params.success || !body.success) {
      const issues = [...(params.error?.issues ?? []), ...(body.error?.issues ?? [])];
      return sendError(request, reply, 400, 'request.invalid', 'Validation failed', { details: { issues } });
    }
    const product = store.update(params.data.id, body.data);
    if (!product) {
      throw new NotFoundError('Product', String(params.data.id));
    }
    return product;
  });

  app.delete('/api/products/:id', { config: { auth: ADMIN } }, async (request, reply) => {
    const parsed = ProductParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Invalid product id', { details: { issues: parsed.error.issues } });
    }
    if (!store.remove(parsed.data.id)) {
      throw new NotFoundError('Product', String(parsed.data.id));
    }
    request.log.info({ admin: principalOf(request).username, productId: parsed.data.id }, 'DELETE /products/:id');
    return { message: 'Product deleted successfully', id: String(parsed.data.id) };
  });
}
