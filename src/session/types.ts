import { CartEntry, Order } from '../cart/types';
import { ChatTurn } from '../chat/types';

export interface SessionUser {
  id: string;
  email?: string;
  name?: string;
  picture?: string;
}

/** Everything the storefront keeps for a visitor, stored in the encrypted session cookie */
export interface StorefrontSessionData {
  visitorId: string;
  cart: CartEntry[];
  /** Derived from cart; recomputed on every commit */
  cartTotal: number;
  chatHistory: ChatTurn[];
  conversationId?: string;
  user?: SessionUser;
  /** Written at checkout, removed by the confirmation page */
  lastOrder?: Order;
}

/** Where session data is loaded from and saved to (the request's cookie session in production) */
export interface SessionSlot {
  load(): StorefrontSessionData | undefined;
  save(data: StorefrontSessionData): void;
}
