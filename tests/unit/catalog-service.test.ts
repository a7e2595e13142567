import { InMemoryCacheStore } from '../../src/cache/cache-service';
import { CatalogService } from '../../src/catalog/catalog-service';
import { FakeRetail } from '../helpers/fake-retail';

describe('CatalogService', () => {
  let retail: FakeRetail;
  let catalog: CatalogService;

  beforeEach(() => {
    retail = new FakeRetail();
    retail.products.set('p1', {
      id: 'p1',
      title: 'Desk Lamp',
      brands: ['Acme'],
      categories: ['Home > Lighting'],
      priceInfo: { price: 30, originalPrice: 40, currencyCode: 'USD' },
      rating: { averageRating: 4.5, ratingCount: 12 },
      images: [{ uri: 'https://img.example/p1.png' }],
    });
    catalog = new CatalogService(retail, new InMemoryCacheStore(), 300);
  });

  describe('productPage', () => {
    it('should map the product and build a detail-page-view event', async () => {
      const view = await catalog.productPage('p1', 'tok-1');

      expect(view.product).toMatchObject({
        id: 'p1',
        title: 'Desk Lamp',
        price: 30,
        originalPrice: 40,
        currencyCode: 'USD',
        brands: ['Acme'],
        categories: ['Home > Lighting'],
        averageRating: 4.5,
        ratingCount: 12,
        imageUrl: 'https://img.example/p1.png',
      });
      expect(view.event).toEqual({
        eventType: 'detail-page-view',
        productDetails: [{ product: { id: 'p1' } }],
        attributionToken: 'tok-1',
      });
      expect(view.error).toBeUndefined();
    });

    it('should degrade when the product cannot be fetched', async () => {
      const view = await catalog.productPage('missing');
      expect(view.product).toBeUndefined();
      expect(view.error).toBe('getProduct failed (404): Product missing not found');
      expect(view.event).toEqual({ eventType: 'detail-page-view', productDetails: [{ product: { id: 'missing' } }] });
    });

    it('should warm the cache used by cart lookups', async () => {
      await catalog.productPage('p1');
      await catalog.lookup('p1');
      expect(retail.productLookups).toEqual(['p1']);
    });
  });

  describe('lookup', () => {
    it('should return null when the lookup fails', async () => {
      retail.failing.add('getProduct');
      expect(await catalog.lookup('p1')).toBeNull();
    });

    it('should retry a failed lookup on the next request', async () => {
      retail.failing.add('getProduct');
      await catalog.lookup('p1');
      retail.failing.clear();
      expect((await catalog.lookup('p1'))?.title).toBe('Desk Lamp');
      expect(retail.productLookups).toEqual(['p1', 'p1']);
    });
  });
});
