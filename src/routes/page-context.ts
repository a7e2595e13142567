import { StorefrontSession } from '../session/storefront-session';
import { PageContext } from '../views/pages';

export function pageContext(session: StorefrontSession, currencyCode: string): PageContext {
  return {
    cartCount: session.cartEntries().reduce((sum, e) => sum + e.quantity, 0),
    currencyCode,
    user: session.user,
  };
}
