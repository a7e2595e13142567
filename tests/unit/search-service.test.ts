import path from 'path';
import { ConfigService } from '../../src/config/config-service';
import { ResourcePaths } from '../../src/retail/paths';
import { facetValueLabel, SearchService } from '../../src/search/search-service';
import { FakeRetail } from '../helpers/fake-retail';

const CATALOG = 'projects/test-project/locations/global/catalogs/default_catalog';

describe('SearchService', () => {
  let retail: FakeRetail;
  let service: SearchService;

  beforeEach(() => {
    retail = new FakeRetail();
    const paths = new ResourcePaths({
      projectId: 'test-project',
      location: 'global',
      catalogId: 'default_catalog',
      branch: 'default_branch',
    });
    // A missing file leaves the built-in facet definitions in place
    const config = new ConfigService(path.join(__dirname, 'no-such-facets.json'));
    service = new SearchService(retail, paths, config, { servingConfigId: 'default_search', defaultPageSize: 20 });
  });

  describe('search', () => {
    const params = { query: 'shoes', brands: 'Acme', page: '2', page_size: '10' };

    beforeEach(() => {
      retail.searchResponse = {
        results: [
          { id: 'p1', product: { id: 'p1', title: 'Runner', priceInfo: { price: 50, currencyCode: 'USD' } } },
          { id: 'p2' },
        ],
        totalSize: 35,
        attributionToken: 'tok-1',
        facets: [
          {
            key: 'price',
            values: [
              { interval: { maximum: 25 }, count: '4' },
              { interval: { minimum: 25, maximum: 100 }, count: 9 },
            ],
          },
          { key: 'brands', values: [{ value: 'Acme', count: 3 }, { value: 'Zeta', count: 1 }] },
          { key: 'colorFamilies', values: [{ value: 'Red', count: 2 }] },
        ],
      };
    });

    it('should send filter, paging, facet specs and expansion settings', async () => {
      await service.search(params, { visitorId: 'visitor-1' });

      expect(retail.searches).toHaveLength(1);
      expect(retail.searches[0]).toEqual({
        placement: `${CATALOG}/servingConfigs/default_search`,
        branch: `${CATALOG}/branches/default_branch`,
        query: 'shoes',
        visitorId: 'visitor-1',
        pageSize: 10,
        offset: 10,
        filter: 'brands: ANY("Acme")',
        facetSpecs: [
          { facetKey: { key: 'brands' }, limit: 10 },
          { facetKey: { key: 'categories' }, limit: 10 },
          {
            facetKey: {
              key: 'price',
              intervals: [{ maximum: 25 }, { minimum: 25, maximum: 100 }, { minimum: 100 }],
            },
          },
        ],
        queryExpansionSpec: { condition: 'DISABLED', pinUnexpandedResults: false },
      });
    });

    it('should map results, paging links and the page event', async () => {
      const view = await service.search(params, { visitorId: 'visitor-1' });

      expect(view.products.map((p) => [p.id, p.title, p.price])).toEqual([
        ['p1', 'Runner', 50],
        ['p2', 'p2', undefined],
      ]);
      expect(view.totalPages).toBe(4);
      expect(view.prevHref).toBe('/search?query=shoes&brands=Acme&page_size=10&page=1');
      expect(view.nextHref).toBe('/search?query=shoes&brands=Acme&page_size=10&page=3');
      expect(view.event).toEqual({
        eventType: 'search',
        searchQuery: 'shoes',
        filter: 'brands: ANY("Acme")',
        offset: 10,
        productDetails: [{ product: { id: 'p1' } }, { product: { id: 'p2' } }],
        attributionToken: 'tok-1',
      });
      expect(view.error).toBeUndefined();
    });

    it('should order facets by configuration and append dynamic ones', async () => {
      const view = await service.search(params, { visitorId: 'visitor-1' });

      expect(view.facets.map((f) => [f.key, f.label])).toEqual([
        ['brands', 'Brand'],
        ['price', 'Price'],
        ['colorFamilies', 'colorFamilies'],
      ]);

      const brands = view.facets[0].values;
      expect(brands[0]).toEqual({
        label: 'Acme',
        token: 'Acme',
        count: 3,
        selected: true,
        href: '/search?query=shoes&page_size=10',
      });
      expect(brands[1].selected).toBe(false);
      expect(brands[1].href).toBe('/search?query=shoes&brands=Acme&page_size=10&brands=Zeta');

      const price = view.facets[1].values;
      expect(price.map((v) => [v.label, v.token, v.count])).toEqual([
        ['Under $25', '-25', 4],
        ['$25 – $100', '25-100', 9],
      ]);
    });

    it('should request query expansion when asked', async () => {
      retail.searchResponse = { totalSize: 0, queryExpansionInfo: { expandedQuery: true } };
      const view = await service.search({ query: 'lamp', expand: 'true' }, { visitorId: 'v' });

      expect(retail.searches[0].queryExpansionSpec).toEqual({ condition: 'AUTO', pinUnexpandedResults: true });
      expect(view.expand).toBe(true);
      expect(view.expandedQuery).toBe(true);
    });

    it('should degrade to an empty page carrying the error', async () => {
      retail.failing.add('search');
      const view = await service.search({ query: 'shoes' }, { visitorId: 'v' });

      expect(view.error).toBe('search failed (503): unavailable');
      expect(view.products).toEqual([]);
      expect(view.facets).toEqual([]);
      expect(view.totalSize).toBe(0);
      expect(view.event).toEqual({ eventType: 'search', searchQuery: 'shoes', offset: 0 });
    });
  });

  describe('browse', () => {
    it('should pin the category and send no query text', async () => {
      retail.searchResponse = { totalSize: 0 };
      const view = await service.browse('Shoes & Boots', {}, { visitorId: 'visitor-2', userId: 'user-2' });

      const request = retail.searches[0];
      expect(request.query).toBe('');
      expect(request.pageCategories).toEqual(['Shoes & Boots']);
      expect(request.userInfo).toEqual({ userId: 'user-2' });
      expect(request).not.toHaveProperty('filter');

      expect(view.mode).toBe('browse');
      expect(view.category).toBe('Shoes & Boots');
      expect(view.event.eventType).toBe('category-page-view');
      expect(view.event.pageCategories).toEqual(['Shoes & Boots']);
    });
  });

  describe('facetValueLabel', () => {
    it('should label price intervals with a currency sign', () => {
      expect(facetValueLabel('price', { interval: { minimum: 200 } })).toBe('$200 & up');
      expect(facetValueLabel('rating', { interval: { minimum: 3, maximum: 4 } })).toBe('3 – 4');
      expect(facetValueLabel('brands', { value: 'Acme' })).toBe('Acme');
    });
  });
});
