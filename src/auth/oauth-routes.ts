import { FastifyInstance } from 'fastify';
import oauthPlugin, { OAuth2Namespace } from '@fastify/oauth2';
import { logger } from '../observability/logger';
import { sessionFor } from '../session/request-session';
import { SessionUser } from '../session/types';

declare module 'fastify' {
  interface FastifyInstance {
    googleOAuth2: OAuth2Namespace;
  }
}

const GOOGLE_USERINFO_URL = 'https://openidconnect.googleapis.com/v1/userinfo';

const log = logger.child({ component: 'auth' });

export type ProfileFetcher = (accessToken: string) => Promise<SessionUser>;

export interface AuthOptions {
  clientId: string;
  clientSecret: string;
  callbackUri: string;
  timeoutMs: number;
  fetchProfile?: ProfileFetcher;
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value ? value : undefined;
}

/** Map an OpenID Connect userinfo document to the session user */
export function toSessionUser(payload: unknown): SessionUser {
  if (payload === null || typeof payload !== 'object') {
    throw new Error('Userinfo response is not an object');
  }
  const doc: Record<string, unknown> = { ...payload };
  const id = readString(doc, 'sub');
  if (!id) throw new Error('Userinfo response has no subject');

  const email = readString(doc, 'email');
  const name = readString(doc, 'name');
  const picture = readString(doc, 'picture');
  return {
    id,
    ...(email ? { email } : {}),
    ...(name ? { name } : {}),
    ...(picture ? { picture } : {}),
  };
}

function googleProfileFetcher(timeoutMs: number): ProfileFetcher {
  return async (accessToken) => {
    const response = await fetch(GOOGLE_USERINFO_URL, {
      headers: { Authorization: `Bearer ${accessToken}` },
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!response.ok) {
      throw new Error(`Userinfo request failed with status ${response.status}`);
    }
    return toSessionUser(await response.json());
  };
}

/**
 * Sign in with Google. /login starts the authorization code flow, the
 * callback stores the profile in the session, /logout drops it. The visitor
 * id survives both so cart and chat stay attached.
 */
export async function registerAuthRoutes(app: FastifyInstance, options: AuthOptions): Promise<void> {
  await app.register(oauthPlugin, {
    name: 'googleOAuth2',
    scope: ['openid', 'email', 'profile'],
    credentials: {
      client: { id: options.clientId, secret: options.clientSecret },
      auth: oauthPlugin.GOOGLE_CONFIGURATION,
    },
    startRedirectPath: '/login',
    callbackUri: options.callbackUri,
  });

  const fetchProfile = options.fetchProfile ?? googleProfileFetcher(options.timeoutMs);

  app.get('/auth/callback', async (req, reply) => {
    const session = sessionFor(req);
    try {
      const { token } = await app.googleOAuth2.getAccessTokenFromAuthorizationCodeFlow(req);
      const user = await fetchProfile(token.access_token);
      session.setUser(user);
      log.info({ visitorId: session.visitorId, userId: user.id }, 'User signed in');
    } catch (err) {
      log.warn({ err, visitorId: session.visitorId }, 'Sign-in failed');
    }
    return reply.redirect('/');
  });

  app.get('/logout', async (req, reply) => {
    const session = sessionFor(req);
    if (session.user) {
      log.info({ visitorId: session.visitorId, userId: session.user.id }, 'User signed out');
      session.clearUser();
    }
    return reply.redirect('/');
  });
}
