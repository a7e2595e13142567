/**
 * Cart Service: session-backed shopping cart.
 *
 * Add, remove, checkout and view. Every mutation is committed through the
 * session wrapper, which owns the cart total. Input is normalized rather than
 * rejected: a bad price becomes 0, a bad quantity becomes 1.
 */

import { v4 as uuidv4 } from 'uuid';
import { CartEntry, CartLineView, CartView, Order } from './types';
import { CatalogService } from '../catalog/catalog-service';
import { StorefrontSession } from '../session/storefront-session';
import { logger } from '../observability/logger';
import { cartMutations } from '../observability/metrics';

const log = logger.child({ component: 'cart-service' });

/** Parse a submitted price; anything that is not a finite, non-negative number is 0 */
export function normalizePrice(raw: unknown): number {
  const n = typeof raw === 'number' ? raw : typeof raw === 'string' ? parseFloat(raw) : NaN;
  return Number.isFinite(n) && n >= 0 ? n : 0;
}

/** Same limit the event schema puts on product ids */
export const MAX_PRODUCT_ID_LENGTH = 128;

/** A submitted product id, or undefined when blank or longer than MAX_PRODUCT_ID_LENGTH */
export function normalizeProductId(raw: string | undefined): string | undefined {
  const id = raw?.trim();
  return id && id.length <= MAX_PRODUCT_ID_LENGTH ? id : undefined;
}

/** Parse a submitted quantity; anything that is not a positive integer is 1 */
export function normalizeQuantity(raw: unknown): number {
  const n = typeof raw === 'number' ? raw : typeof raw === 'string' && /^\s*\d+\s*$/.test(raw) ? parseInt(raw, 10) : NaN;
  return Number.isInteger(n) && n >= 1 ? n : 1;
}

export class CartService {
  constructor(
    private readonly catalog: CatalogService,
    private readonly newTransactionId: () => string = uuidv4,
  ) {}

  /** Add a product, or increase its quantity when already in the cart */
  add(session: StorefrontSession, productId: string, unitPrice: number, quantity = 1): CartEntry {
    const entries = session.cartEntries();
    const price = normalizePrice(unitPrice);
    const qty = normalizeQuantity(quantity);

    let entry = entries.find((e) => e.productId === productId);
    if (entry) {
      entry.quantity += qty;
    } else {
      entry = { productId, unitPrice: price, quantity: qty };
      entries.push(entry);
    }
    session.commitCart(entries);
    cartMutations.inc({ action: 'add' });

    log.info({ visitorId: session.visitorId, productId, quantity: entry.quantity }, 'Cart item added');
    return { ...entry };
  }

  /** Remove a product; returns the removed entry, or null when it was not in the cart */
  remove(session: StorefrontSession, productId: string): CartEntry | null {
    const entries = session.cartEntries();
    const idx = entries.findIndex((e) => e.productId === productId);
    if (idx === -1) return null;

    const [removed] = entries.splice(idx, 1);
    session.commitCart(entries);
    cartMutations.inc({ action: 'remove' });

    log.info({ visitorId: session.visitorId, productId }, 'Cart item removed');
    return removed;
  }

  /**
   * Simulated purchase: snapshot the cart into an order, then empty it.
   * There is no payment step and nothing to roll back.
   */
  checkout(session: StorefrontSession): Order {
    const order: Order = {
      transactionId: this.newTransactionId(),
      items: session.cartEntries(),
      total: session.cartTotal,
      createdAt: Date.now(),
    };
    session.commitCart([]);
    session.storeOrder(order);
    cartMutations.inc({ action: 'checkout' });

    log.info(
      { visitorId: session.visitorId, transactionId: order.transactionId, items: order.items.length, total: order.total },
      'Checkout completed',
    );
    return order;
  }

  /** Cart lines with catalog metadata; a failed lookup yields a placeholder line */
  async view(session: StorefrontSession): Promise<CartView> {
    const entries = session.cartEntries();
    const lines: CartLineView[] = [];

    for (const entry of entries) {
      const product = await this.catalog.lookup(entry.productId);
      lines.push({
        ...entry,
        title: product?.title ?? entry.productId,
        imageUrl: product?.imageUrl,
        uri: product?.uri,
        lineTotal: entry.unitPrice * entry.quantity,
        placeholder: product === null,
      });
    }

    return {
      lines,
      itemCount: entries.reduce((sum, e) => sum + e.quantity, 0),
      total: session.cartTotal,
      event: {
        eventType: 'shopping-cart-page-view',
        productDetails: entries.map((e) => ({ product: { id: e.productId }, quantity: e.quantity })),
      },
    };
  }
}
