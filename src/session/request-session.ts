import { FastifyRequest } from 'fastify';
import { StorefrontSession } from './storefront-session';
import { StorefrontSessionData } from './types';
import { ShopperContext } from '../search/types';

declare module '@fastify/secure-session' {
  interface SessionData {
    storefront: StorefrontSessionData;
  }
}

const sessions = new WeakMap<FastifyRequest, StorefrontSession>();

/** The visitor's session for this request, backed by the encrypted session cookie */
export function sessionFor(req: FastifyRequest): StorefrontSession {
  let session = sessions.get(req);
  if (!session) {
    session = new StorefrontSession({
      load: () => req.session.get('storefront'),
      save: (data) => req.session.set('storefront', data),
    });
    sessions.set(req, session);
  }
  return session;
}

export function shopperOf(session: StorefrontSession): ShopperContext {
  return session.user ? { visitorId: session.visitorId, userId: session.user.id } : { visitorId: session.visitorId };
}
