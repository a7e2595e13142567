/**
 * Cart Types: session-backed shopping cart.
 */

import { PageEvent } from '../catalog/types';

export interface CartEntry {
  productId: string;
  unitPrice: number;
  quantity: number;
}

export interface Order {
  transactionId: string;
  items: CartEntry[];
  total: number;
  createdAt: number;
}

/** Cart entry enriched with catalog metadata for the cart page */
export interface CartLineView extends CartEntry {
  title: string;
  imageUrl?: string;
  uri?: string;
  lineTotal: number;
  /** Metadata lookup failed; title falls back to the product id */
  placeholder: boolean;
}

export interface CartView {
  lines: CartLineView[];
  itemCount: number;
  total: number;
  event: PageEvent;
}
