import { FastifyInstance } from 'fastify';
import { logger } from '../observability/logger';
import { sessionFor, shopperOf } from '../session/request-session';
import { renderCart, renderConfirmation } from '../views/pages';
import { normalizePrice, normalizeProductId, normalizeQuantity } from '../cart/cart-service';
import { pageContext } from './page-context';
import { firstValue, FormValue, StorefrontServices } from './types';

interface AddToCartForm {
  product_id?: FormValue;
  product_price?: FormValue;
  quantity?: FormValue;
  attribution_token?: FormValue;
}

interface RemoveFromCartForm {
  product_id?: FormValue;
}

const log = logger.child({ component: 'cart-routes' });

/**
 * Cart pages and actions. Mutations redirect (POST-redirect-GET); the
 * matching user event is written server-side and a failed write never
 * blocks the action.
 */
export function registerCartRoutes(app: FastifyInstance, services: StorefrontServices): void {
  app.get('/cart', async (req, reply) => {
    const session = sessionFor(req);
    const view = await services.cart.view(session);
    return reply.type('text/html').send(renderCart(view, pageContext(session, services.currencyCode)));
  });

  app.post<{ Body: AddToCartForm | undefined }>('/cart/add', async (req, reply) => {
    const form = req.body ?? {};
    const productId = normalizeProductId(firstValue(form.product_id));
    if (!productId) return reply.redirect(303, '/');

    const session = sessionFor(req);
    const quantity = normalizeQuantity(firstValue(form.quantity));
    services.cart.add(session, productId, normalizePrice(firstValue(form.product_price)), quantity);

    const attributionToken = firstValue(form.attribution_token);
    await services.events.record(
      {
        eventType: 'add-to-cart',
        productDetails: [{ product: { id: productId }, quantity }],
        ...(attributionToken ? { attributionToken } : {}),
      },
      shopperOf(session),
    );
    return reply.redirect(303, '/cart');
  });

  app.post<{ Body: RemoveFromCartForm | undefined }>('/cart/remove', async (req, reply) => {
    const productId = normalizeProductId(firstValue(req.body?.product_id));
    if (!productId) return reply.redirect(303, '/cart');

    const session = sessionFor(req);
    const removed = services.cart.remove(session, productId);
    if (removed) {
      await services.events.record(
        {
          eventType: 'remove-from-cart',
          productDetails: [{ product: { id: removed.productId }, quantity: removed.quantity }],
        },
        shopperOf(session),
      );
    }
    return reply.redirect(303, '/cart');
  });

  app.post('/checkout', async (req, reply) => {
    const session = sessionFor(req);
    const order = services.cart.checkout(session);

    if (order.items.length > 0) {
      await services.events.record(
        {
          eventType: 'purchase-complete',
          productDetails: order.items.map((i) => ({ product: { id: i.productId }, quantity: i.quantity })),
          purchaseTransaction: {
            id: order.transactionId,
            revenue: order.total,
            currencyCode: services.currencyCode,
          },
        },
        shopperOf(session),
      );
    } else {
      log.info({ visitorId: session.visitorId }, 'Checkout with an empty cart');
    }
    return reply.redirect(303, '/confirmation');
  });

  app.get('/confirmation', async (req, reply) => {
    const session = sessionFor(req);
    const order = session.takeOrder();
    if (!order) return reply.redirect('/');
    return reply.type('text/html').send(renderConfirmation(order, pageContext(session, services.currencyCode)));
  });
}
