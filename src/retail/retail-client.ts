/**
 * Retail Client: REST access to the commerce search service.
 *
 * One instance is built at startup and handed to every route module. Each
 * method makes exactly one HTTP call; failures surface as RetailApiError and
 * are handled by the caller.
 */

import { GoogleAuth } from 'google-auth-library';
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
} from './types';
import { ResourcePaths } from './paths';
import { RetailApiError, RetailOperation, describeError } from './errors';
import { DependencyHealthTracker } from '../resilience/dependency-health';
import { retailCallDuration, retailCallFailures } from '../observability/metrics';
import { logger } from '../observability/logger';

const CLOUD_PLATFORM_SCOPE = 'https://www.googleapis.com/auth/cloud-platform';

export interface AccessTokenProvider {
  getAccessToken(): Promise<string | null | undefined>;
}

export interface RetailClientOptions {
  projectId: string;
  baseUrl: string;
  apiVersion: string;
  conversationalApiVersion: string;
  timeoutMs: number;
}

interface GoogleErrorBody {
  error?: { code?: number; message?: string; status?: string };
}

export class RetailClient implements RetailService {
  private readonly log = logger.child({ component: 'retail-client' });
  private readonly tokens: AccessTokenProvider;

  constructor(
    private readonly paths: ResourcePaths,
    private readonly options: RetailClientOptions,
    tokens?: AccessTokenProvider,
    private readonly health?: DependencyHealthTracker,
  ) {
    this.tokens = tokens ?? new GoogleAuth({ scopes: CLOUD_PLATFORM_SCOPE });
  }

  async search(request: SearchRequest): Promise<SearchResponse> {
    const { placement, ...body } = request;
    return this.call<SearchResponse>('search', 'POST', this.url(`${placement}:search`), body);
  }

  async predict(request: PredictRequest): Promise<PredictResponse> {
    const { placement, ...body } = request;
    return this.call<PredictResponse>('predict', 'POST', this.url(`${placement}:predict`), body);
  }

  async getProduct(productId: string): Promise<Product> {
    return this.call<Product>('getProduct', 'GET', this.url(this.paths.product(productId)));
  }

  async completeQuery(request: CompleteQueryRequest): Promise<CompleteQueryResponse> {
    const params = new URLSearchParams({ query: request.query });
    if (request.visitorId) params.set('visitorId', request.visitorId);
    if (request.maxSuggestions) params.set('maxSuggestions', String(request.maxSuggestions));
    const url = `${this.url(`${request.catalog}:completeQuery`)}?${params.toString()}`;
    return this.call<CompleteQueryResponse>('completeQuery', 'GET', url);
  }

  async writeUserEvent(event: UserEvent): Promise<UserEvent> {
    const url = this.url(`${this.paths.catalog()}/userEvents:write`);
    return this.call<UserEvent>('writeUserEvent', 'POST', url, event);
  }

  /**
   * Server-streaming call. The REST transport delivers the stream as a JSON
   * array; the body is drained completely before fragments are yielded.
   */
  async *conversationalSearch(
    request: ConversationalSearchRequest,
  ): AsyncGenerator<ConversationalSearchFragment> {
    const { placement, ...body } = request;
    const url = this.url(`${placement}:conversationalSearch`, this.options.conversationalApiVersion);
    const payload = await this.call<ConversationalSearchFragment[] | ConversationalSearchFragment>(
      'conversationalSearch',
      'POST',
      url,
      body,
    );
    const fragments = Array.isArray(payload) ? payload : [payload];
    for (const fragment of fragments) {
      yield fragment;
    }
  }

  private url(resource: string, version = this.options.apiVersion): string {
    return `${this.options.baseUrl}/${version}/${resource}`;
  }

  private async call<T>(
    operation: RetailOperation,
    method: 'GET' | 'POST',
    url: string,
    body?: unknown,
  ): Promise<T> {
    const start = Date.now();
    try {
      const token = await this.tokens.getAccessToken();
      if (!token) {
        throw new RetailApiError(operation, undefined, 'no access token available');
      }

      const response = await fetch(url, {
        method,
        headers: {
          Authorization: `Bearer ${token}`,
          'Content-Type': 'application/json',
          'X-Goog-User-Project': this.options.projectId,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      const text = await response.text();
      if (!response.ok) {
        throw new RetailApiError(operation, response.status, errorMessage(text, response.statusText));
      }

      const result = (text ? JSON.parse(text) : {}) as T;
      this.health?.recordSuccess(operation);
      retailCallDuration.observe({ operation, status: 'ok' }, (Date.now() - start) / 1000);
      return result;
    } catch (err) {
      const error = err instanceof RetailApiError
        ? err
        : new RetailApiError(operation, undefined, describeError(err));
      this.health?.recordFailure(operation, error.message);
      retailCallFailures.inc({ operation });
      retailCallDuration.observe({ operation, status: 'error' }, (Date.now() - start) / 1000);
      this.log.error({ operation, status: error.status, err: error }, 'Commerce search call failed');
      throw error;
    }
  }
}

function errorMessage(text: string, fallback: string): string {
  try {
    const parsed = JSON.parse(text) as GoogleErrorBody;
    return parsed.error?.message ?? fallback;
  } catch {
    return text || fallback;
  }
}
