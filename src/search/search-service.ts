/**
 * Search Service: search and category browse pages.
 *
 * Builds the service request from the shopper's query parameters (filter,
 * facet specs, paging, query expansion), maps the response into the page view
 * and never throws: a failed call yields an empty page carrying the error.
 */

import { ConfigService } from '../config/config-service';
import { FacetDefinition } from '../config/types';
import { toProductCard, productDetails } from '../catalog/product-mapper';
import { ResourcePaths } from '../retail/paths';
import { describeError } from '../retail/errors';
import { Facet, FacetSpec, FacetValue, RetailService, SearchRequest, SearchResponse } from '../retail/types';
import { logger } from '../observability/logger';
import { buildFacetFilter, FacetSelection, intervalToken, QueryParams } from './facet-filter';
import { buildHref, parseSearchParams } from './search-params';
import { FacetView, SearchPageView, SearchParams, ShopperContext } from './types';

const log = logger.child({ component: 'search-service' });

export interface SearchServiceOptions {
  servingConfigId: string;
  defaultPageSize: number;
}

export class SearchService {
  constructor(
    private readonly retail: RetailService,
    private readonly paths: ResourcePaths,
    private readonly config: ConfigService,
    private readonly options: SearchServiceOptions,
  ) {}

  /** Keyword search. The caller redirects home when the query is empty. */
  async search(params: QueryParams, shopper: ShopperContext): Promise<SearchPageView> {
    return this.run('search', '/search', params, shopper);
  }

  /** Category browse: no query text, the category pinned as page category */
  async browse(category: string, params: QueryParams, shopper: ShopperContext): Promise<SearchPageView> {
    return this.run('browse', `/browse/${encodeURIComponent(category)}`, params, shopper, category);
  }

  buildRequest(
    search: SearchParams,
    filter: string,
    shopper: ShopperContext,
    category?: string,
  ): SearchRequest {
    const request: SearchRequest = {
      placement: this.paths.servingConfig(this.options.servingConfigId),
      branch: this.paths.branch(),
      query: category ? '' : search.query,
      visitorId: shopper.visitorId,
      pageSize: search.pageSize,
      offset: (search.page - 1) * search.pageSize,
      facetSpecs: this.facetSpecs(),
      queryExpansionSpec: {
        condition: search.expand ? 'AUTO' : 'DISABLED',
        pinUnexpandedResults: search.expand,
      },
    };
    if (filter) request.filter = filter;
    if (category) request.pageCategories = [category];
    if (shopper.userId) request.userInfo = { userId: shopper.userId };
    return request;
  }

  facetSpecs(): FacetSpec[] {
    return this.config.facets.map((facet) => ({
      facetKey: {
        key: facet.key,
        ...(facet.intervals ? { intervals: facet.intervals.map((i) => ({ ...i })) } : {}),
      },
      ...(facet.limit ? { limit: facet.limit } : {}),
    }));
  }

  private async run(
    mode: SearchPageView['mode'],
    path: string,
    params: QueryParams,
    shopper: ShopperContext,
    category?: string,
  ): Promise<SearchPageView> {
    const search = parseSearchParams(params, this.options.defaultPageSize);
    const { filter, selected } = buildFacetFilter(params, this.config.numericKeys);
    const request = this.buildRequest(search, filter, shopper, category);

    const view: SearchPageView = {
      mode,
      query: mode === 'search' ? search.query : '',
      category,
      products: [],
      facets: [],
      selected,
      filter,
      totalSize: 0,
      page: search.page,
      pageSize: search.pageSize,
      totalPages: 0,
      expand: search.expand,
      expandedQuery: false,
      event: {
        eventType: mode === 'search' ? 'search' : 'category-page-view',
        ...(mode === 'search' ? { searchQuery: search.query } : {}),
        ...(category ? { pageCategories: [category] } : {}),
        ...(filter ? { filter } : {}),
        offset: request.offset,
      },
    };

    let response: SearchResponse;
    try {
      response = await this.retail.search(request);
    } catch (err) {
      log.warn({ mode, query: search.query, category }, 'Search degraded');
      view.error = describeError(err);
      return view;
    }

    const products = (response.results ?? []).map((r) => toProductCard(r.product ?? { id: r.id }, r.id));
    const totalSize = response.totalSize ?? 0;
    const totalPages = Math.ceil(totalSize / search.pageSize);

    view.products = products;
    view.totalSize = totalSize;
    view.totalPages = totalPages;
    view.facets = this.facetViews(response.facets ?? [], selected, path, params);
    view.expandedQuery = response.queryExpansionInfo?.expandedQuery ?? false;
    view.correctedQuery = response.correctedQuery || undefined;
    view.attributionToken = response.attributionToken;
    view.event.productDetails = productDetails(products.map((p) => p.id));
    view.event.attributionToken = response.attributionToken;
    if (search.page > 1) {
      view.prevHref = buildHref(path, params, { set: { page: String(search.page - 1) } });
    }
    if (search.page < totalPages) {
      view.nextHref = buildHref(path, params, { set: { page: String(search.page + 1) } });
    }

    log.info({ mode, query: search.query, category, totalSize, page: search.page }, 'Search completed');
    return view;
  }

  /** Configured facets first (in config order), then any dynamic facets the service added */
  facetViews(facets: Facet[], selected: FacetSelection, path: string, params: QueryParams): FacetView[] {
    const byKey = new Map(facets.map((f) => [f.key, f]));
    const ordered: Array<{ facet: Facet; definition?: FacetDefinition }> = [];
    for (const definition of this.config.facets) {
      const facet = byKey.get(definition.key);
      if (facet) ordered.push({ facet, definition });
    }
    for (const facet of facets) {
      if (!this.config.facet(facet.key)) ordered.push({ facet });
    }

    return ordered
      .map(({ facet, definition }) => ({
        key: facet.key,
        label: definition?.label ?? facet.key,
        values: (facet.values ?? [])
          .map((value) => {
            const token = facetToken(value);
            return {
              label: facetValueLabel(facet.key, value),
              token,
              count: Number(value.count ?? 0),
              selected: selected.get(facet.key)?.includes(token) ?? false,
              href: buildHref(path, params, { toggle: { key: facet.key, value: token } }),
            };
          })
          .filter((v) => v.token !== ''),
      }))
      .filter((f) => f.values.length > 0);
  }
}

export function facetToken(value: FacetValue): string {
  if (value.interval) {
    return intervalToken({ min: value.interval.minimum, max: value.interval.maximum });
  }
  return value.value ?? '';
}

export function facetValueLabel(key: string, value: FacetValue): string {
  const interval = value.interval;
  if (!interval) return value.value ?? '';
  const { minimum: min, maximum: max } = interval;
  const unit = key === 'price' ? '$' : '';
  if (min === undefined && max !== undefined) return `Under ${unit}${max}`;
  if (min !== undefined && max === undefined) return `${unit}${min} & up`;
  return `${unit}${min ?? ''} – ${unit}${max ?? ''}`;
}
