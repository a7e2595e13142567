import { CartService } from '../cart/cart-service';
import { CatalogService } from '../catalog/catalog-service';
import { ChatService } from '../chat/chat-service';
import { EventService } from '../events/event-service';
import { RecommendationEngine } from '../recommendations/recommendation-engine';
import { AutocompleteService } from '../search/autocomplete-service';
import { SearchService } from '../search/search-service';

/** Services the route modules are built from; constructed once in buildApp() */
export interface StorefrontServices {
  search: SearchService;
  autocomplete: AutocompleteService;
  recommendations: RecommendationEngine;
  catalog: CatalogService;
  cart: CartService;
  chat: ChatService;
  events: EventService;
  currencyCode: string;
}

/** Form and query values as @fastify/formbody and the querystring parser deliver them */
export type FormValue = string | string[] | undefined;

export function firstValue(value: FormValue): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}
