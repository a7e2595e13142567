/**
 * Catalog Service: single-product lookups.
 *
 * Detail pages read through to the service; cart enrichment goes through the
 * cache so a cart page costs at most one lookup per product per TTL.
 */

import { CacheStore } from '../cache/types';
import { describeError } from '../retail/errors';
import { RetailService } from '../retail/types';
import { logger } from '../observability/logger';
import { toProductCard } from './product-mapper';
import { PageEvent, ProductCard } from './types';

const log = logger.child({ component: 'catalog-service' });

export interface ProductPageView {
  productId: string;
  product?: ProductCard;
  attributionToken?: string;
  event: PageEvent;
  error?: string;
}

export class CatalogService {
  constructor(
    private readonly retail: RetailService,
    private readonly cache: CacheStore,
    private readonly ttlSeconds: number,
  ) {}

  async productPage(productId: string, attributionToken?: string): Promise<ProductPageView> {
    const event: PageEvent = {
      eventType: 'detail-page-view',
      productDetails: [{ product: { id: productId } }],
      ...(attributionToken ? { attributionToken } : {}),
    };
    try {
      const product = toProductCard(await this.retail.getProduct(productId), productId);
      await this.cache.set(cacheKey(productId), product, this.ttlSeconds);
      return { productId, product, attributionToken, event };
    } catch (err) {
      log.warn({ productId }, 'Product detail degraded');
      return { productId, attributionToken, event, error: describeError(err) };
    }
  }

  /** Cached lookup; null when the product cannot be fetched */
  async lookup(productId: string): Promise<ProductCard | null> {
    const cached = await this.cache.get<ProductCard>(cacheKey(productId));
    if (cached) return cached;
    try {
      const product = toProductCard(await this.retail.getProduct(productId), productId);
      await this.cache.set(cacheKey(productId), product, this.ttlSeconds);
      return product;
    } catch (err) {
      log.warn({ productId, err: describeError(err) }, 'Product lookup failed');
      return null;
    }
  }
}

function cacheKey(productId: string): string {
  return `product:${productId}`;
}
