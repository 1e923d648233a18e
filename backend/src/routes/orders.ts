import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { contextOf, principalOf } from '../middleware/auth.js';
import type { ServiceClient } from '../services/propagation.js';
import type { OrderStore } from '../storage/orderStore.js';
import { DownstreamError, HttpError, NotFoundError, sendError } from '../utils/errors.js';

const CreateOrderSchema = z.object({
  productId: z.number().int().positive(),
  quantity: z.number().int().positive(),
});

const OrderParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

const UserInfoSchema = z.object({
  username: z.string().min(1),
  email: z.string(),
});

const ProductSchema = z.object({
  id: z.number(),
  name: z.string(),
  price: z.number(),
  stock: z.number(),
});

interface RegisterOrderRoutesOptions {
  store: OrderStore;
  client: ServiceClient;
}

function roundToCents(value: number): number {
  return Math.round(value * 100) / 100;
}

export async function registerOrderRoutes(app: FastifyInstance, options: RegisterOrderRoutesOptions) {
  const { store, client } = options;

  app.get('/api/orders', async (request) => {
    const principal = principalOf(request);
    return store.listForUser(principal.username);
  });

  app.get('/api/orders/:id', async (request, reply) => {
    const parsed = OrderParamsSchema.safeParse(request.params);
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Invalid order id', { details: { issues: parsed.error.issues } });
    }
    const order = store.get(parsed.data.id);
    if (!order) {
      throw new NotFoundError('Order', String(parsed.data.id));
    }
    if (order.username !== principalOf(request).username) {
      throw new HttpError(403, 'order.forbidden', 'Order belongs to another user');
    }
    return order;
  });

  app.post('/api/orders', async (request, reply) => {
    const parsed = CreateOrderSchema.safeParse(request.body ?? {});
    if (!parsed.success) {
      return sendError(request, reply, 400, 'request.invalid', 'Validation failed', { details: { issues: parsed.error.issues } });
    }

    const { productId, quantity } = parsed.data;
    const context = contextOf(request);

    // Both calls carry the caller's own token; each service validates it again.
    const user = await client.getJson(context, 'user-service', '/api/users/me', UserInfoSchema);

    let product: z.infer<typeof ProductSchema>;
    try {
      product = await client.getJson(context, 'product-service', `/api/products/${productId}`, ProductSchema);
    } catch (error) {
      if (error instanceof DownstreamError && error.downstreamStatus === 404) {
        throw new NotFoundError('Product', String(productId));
      }
      throw error;
    }

    if (product.stock < quantity) {
      throw new HttpError(409, 'order.insufficient_stock', `Insufficient stock for ${product.name}`, {
        available: product.stock,
        requested: quantity,
      });
    }

    const order = store.create({
      username: user.username,
      productId: product.id,
      productName: product.name,
      productPrice: product.price,
      quantity,
      totalPrice: roundToCents(product.price * quantity),
    });

    request.log.info({ orderId: order.id, username: order.username, productId }, 'Order created');
    reply.code(201);
    return order;
  });
}
