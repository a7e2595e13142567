import { ProductDetail } from '../retail/types';

/** An event as the browser tracker sends it; identity fields are filled in server-side */
export interface IncomingEvent {
  eventType: string;
  productDetails?: ProductDetail[];
  searchQuery?: string;
  pageCategories?: string[];
  attributionToken?: string;
  filter?: string;
  offset?: number;
  purchaseTransaction?: {
    id?: string;
    revenue: number;
    currencyCode?: string;
  };
  uri?: string;
  referrerUri?: string;
  pageViewId?: string;
}

export interface IngestResult {
  written: number;
  failed: number;
  errors: string[];
}
