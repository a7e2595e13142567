import { PageEvent, ProductCard } from '../catalog/types';
import { FacetSelection } from './facet-filter';

export interface SearchParams {
  query: string;
  page: number;
  pageSize: number;
  expand: boolean;
}

export interface FacetValueView {
  label: string;
  /** Raw value as it travels in the query string */
  token: string;
  count: number;
  selected: boolean;
  /** Link that toggles this value */
  href: string;
}

export interface FacetView {
  key: string;
  label: string;
  values: FacetValueView[];
}

export interface SearchPageView {
  mode: 'search' | 'browse';
  query: string;
  category?: string;
  products: ProductCard[];
  facets: FacetView[];
  selected: FacetSelection;
  filter: string;
  totalSize: number;
  page: number;
  pageSize: number;
  totalPages: number;
  prevHref?: string;
  nextHref?: string;
  expand: boolean;
  expandedQuery: boolean;
  correctedQuery?: string;
  attributionToken?: string;
  event: PageEvent;
  error?: string;
}

export interface ShopperContext {
  visitorId: string;
  userId?: string;
}
