/**
 * Commerce search service (Retail API v2) wire types.
 *
 * Only the fields the storefront reads or writes are modelled; the service
 * returns more. Shapes follow the REST JSON mapping (camelCase).
 */

// ───── Catalog ─────

export interface PriceInfo {
  currencyCode?: string;
  price?: number;
  originalPrice?: number;
}

export interface ProductImage {
  uri: string;
  height?: number;
  width?: number;
}

export interface Rating {
  ratingCount?: number;
  averageRating?: number;
}

export interface ColorInfo {
  colorFamilies?: string[];
  colors?: string[];
}

export interface Product {
  name?: string;
  id: string;
  type?: 'PRIMARY' | 'VARIANT' | 'COLLECTION';
  primaryProductId?: string;
  title?: string;
  description?: string;
  brands?: string[];
  categories?: string[];
  uri?: string;
  images?: ProductImage[];
  priceInfo?: PriceInfo;
  rating?: Rating;
  colorInfo?: ColorInfo;
  availability?: 'IN_STOCK' | 'OUT_OF_STOCK' | 'PREORDER' | 'BACKORDER';
  attributes?: Record<string, { text?: string[]; numbers?: number[] }>;
}

// ───── Search ─────

export interface Interval {
  minimum?: number;
  exclusiveMinimum?: number;
  maximum?: number;
  exclusiveMaximum?: number;
}

export interface FacetSpec {
  facetKey: {
    key: string;
    intervals?: Interval[];
  };
  limit?: number;
}

export type QueryExpansionCondition = 'CONDITION_UNSPECIFIED' | 'DISABLED' | 'AUTO';

export interface SearchRequest {
  placement: string;
  branch?: string;
  query?: string;
  visitorId: string;
  userInfo?: UserInfo;
  pageSize?: number;
  offset?: number;
  pageToken?: string;
  filter?: string;
  pageCategories?: string[];
  facetSpecs?: FacetSpec[];
  queryExpansionSpec?: {
    condition: QueryExpansionCondition;
    pinUnexpandedResults?: boolean;
  };
}

export interface SearchResult {
  id: string;
  product?: Product;
  matchingVariantCount?: number;
}

export interface FacetValue {
  value?: string;
  interval?: Interval;
  count?: number | string;
}

export interface Facet {
  key: string;
  values?: FacetValue[];
  dynamicFacet?: boolean;
}

export interface SearchResponse {
  results?: SearchResult[];
  facets?: Facet[];
  totalSize?: number;
  correctedQuery?: string;
  attributionToken?: string;
  nextPageToken?: string;
  queryExpansionInfo?: {
    expandedQuery?: boolean;
    pinnedResultCount?: number | string;
  };
}

// ───── Prediction ─────

export interface PredictRequest {
  placement: string;
  userEvent: UserEvent;
  pageSize?: number;
  filter?: string;
  params?: Record<string, boolean | number | string>;
}

export interface PredictResult {
  id: string;
  metadata?: {
    product?: Product;
    [key: string]: unknown;
  };
}

export interface PredictResponse {
  results?: PredictResult[];
  attributionToken?: string;
  missingIds?: string[];
}

// ───── Autocomplete ─────

export interface CompleteQueryRequest {
  catalog: string;
  query: string;
  visitorId?: string;
  maxSuggestions?: number;
}

export interface CompletionResult {
  suggestion: string;
}

export interface CompleteQueryResponse {
  completionResults?: CompletionResult[];
  attributionToken?: string;
}

// ───── User events ─────

export interface UserInfo {
  userId?: string;
  ipAddress?: string;
  userAgent?: string;
}

export interface ProductDetail {
  product: { id: string };
  quantity?: number;
}

export interface PurchaseTransaction {
  id?: string;
  revenue: number;
  currencyCode: string;
  tax?: number;
}

export interface UserEvent {
  eventType: string;
  visitorId: string;
  eventTime?: string;
  attributionToken?: string;
  productDetails?: ProductDetail[];
  searchQuery?: string;
  pageCategories?: string[];
  filter?: string;
  offset?: number;
  orderBy?: string;
  purchaseTransaction?: PurchaseTransaction;
  userInfo?: UserInfo;
  uri?: string;
  referrerUri?: string;
  pageViewId?: string;
  sessionId?: string;
}

// ───── Conversational search ─────

export interface ConversationalSearchRequest {
  placement: string;
  branch: string;
  query: string;
  visitorId: string;
  conversationId?: string;
  userInfo?: UserInfo;
}

export interface SuggestedAnswer {
  productAttributeValue?: { name?: string; value?: string };
}

export interface ConversationalSearchFragment {
  userQueryTypes?: string[];
  conversationalTextResponse?: string;
  followupQuestion?: {
    followupQuestion?: string;
    suggestedAnswers?: SuggestedAnswer[];
  };
  conversationId?: string;
  refinedSearch?: Array<{ query?: string }>;
  state?: 'STATE_UNSPECIFIED' | 'STREAMING' | 'SUCCEEDED';
}

/** Accumulated conversational reply after the stream is drained */
export interface ConversationalReply {
  text: string;
  conversationId?: string;
  followupQuestion?: string;
  suggestedAnswers: string[];
  refinedQueries: string[];
  userQueryTypes: string[];
  state?: ConversationalSearchFragment['state'];
}

// ───── Client contract ─────

/**
 * The operations the storefront needs from the commerce search service.
 * Route handlers depend on this interface; tests supply an in-process fake.
 */
export interface RetailService {
  search(request: SearchRequest): Promise<SearchResponse>;
  predict(request: PredictRequest): Promise<PredictResponse>;
  getProduct(productId: string): Promise<Product>;
  completeQuery(request: CompleteQueryRequest): Promise<CompleteQueryResponse>;
  writeUserEvent(event: UserEvent): Promise<UserEvent>;
  conversationalSearch(request: ConversationalSearchRequest): AsyncIterable<ConversationalSearchFragment>;
}
