import { RetailApiError, RetailOperation } from '../../src/retail/errors';
import {
  CompleteQueryRequest,
  CompleteQueryResponse,
  ConversationalSearchFragment,
  ConversationalSearchRequest,
  PredictRequest,
  PredictResponse,
  Product,
  RetailService,
  SearchRequest,
  SearchResponse,
  UserEvent,
} from '../../src/retail/types';

/** In-process commerce search service: canned responses, recorded requests, switchable failures */
export class FakeRetail implements RetailService {
  searchResponse: SearchResponse = {};
  predictResponse: PredictResponse = {};
  completeResponse: CompleteQueryResponse = {};
  fragments: ConversationalSearchFragment[] = [];
  readonly products = new Map<string, Product>();
  readonly failing = new Set<RetailOperation>();

  readonly searches: SearchRequest[] = [];
  readonly predictions: PredictRequest[] = [];
  readonly productLookups: string[] = [];
  readonly completions: CompleteQueryRequest[] = [];
  readonly events: UserEvent[] = [];
  readonly conversations: ConversationalSearchRequest[] = [];

  async search(request: SearchRequest): Promise<SearchResponse> {
    this.searches.push(request);
    this.failIf('search');
    return this.searchResponse;
  }

  async predict(request: PredictRequest): Promise<PredictResponse> {
    this.predictions.push(request);
    this.failIf('predict');
    return this.predictResponse;
  }

  async getProduct(productId: string): Promise<Product> {
    this.productLookups.push(productId);
    this.failIf('getProduct');
    const product = this.products.get(productId);
    if (!product) throw new RetailApiError('getProduct', 404, `Product ${productId} not found`);
    return product;
  }

  async completeQuery(request: CompleteQueryRequest): Promise<CompleteQueryResponse> {
    this.completions.push(request);
    this.failIf('completeQuery');
    return this.completeResponse;
  }

  async writeUserEvent(event: UserEvent): Promise<UserEvent> {
    this.failIf('writeUserEvent');
    this.events.push(event);
    return event;
  }

  async *conversationalSearch(request: ConversationalSearchRequest): AsyncGenerator<ConversationalSearchFragment> {
    this.conversations.push(request);
    this.failIf('conversationalSearch');
    for (const fragment of this.fragments) {
      yield fragment;
    }
  }

  private failIf(operation: RetailOperation): void {
    if (this.failing.has(operation)) {
      throw new RetailApiError(operation, 503, 'unavailable');
    }
  }
}
