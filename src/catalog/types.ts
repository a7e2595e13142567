/** Product data shaped for rendering */
export interface ProductCard {
  id: string;
  title: string;
  uri?: string;
  imageUrl?: string;
  price?: number;
  originalPrice?: number;
  currencyCode?: string;
  brands: string[];
  categories: string[];
  description?: string;
  averageRating?: number;
  ratingCount?: number;
  availability?: string;
}

/**
 * Pre-serialized page event handed to the client-side tracker, which posts it
 * to /events once the page is visible.
 */
export interface PageEvent {
  eventType: string;
  productDetails?: Array<{ product: { id: string }; quantity?: number }>;
  searchQuery?: string;
  pageCategories?: string[];
  filter?: string;
  offset?: number;
  attributionToken?: string;
  purchaseTransaction?: { id: string; revenue: number; currencyCode: string };
}
