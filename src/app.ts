import path from 'path';
import Fastify, { FastifyError, FastifyInstance, FastifyRequest } from 'fastify';
import secureSession from '@fastify/secure-session';
import formbody from '@fastify/formbody';
import fastifyStatic from '@fastify/static';
import Redis from 'ioredis';
import { env } from './config/env';
import { configService } from './config/config-service';
import { logger, requestLogger } from './observability/logger';
import { httpRequestDuration } from './observability/metrics';
import { createCacheStore } from './cache/cache-service';
import { DependencyHealthTracker } from './resilience/dependency-health';
import { ResourcePaths } from './retail/paths';
import { AccessTokenProvider, RetailClient } from './retail/retail-client';
import { RetailService } from './retail/types';
import { SearchService } from './search/search-service';
import { AutocompleteService } from './search/autocomplete-service';
import { RecommendationEngine } from './recommendations/recommendation-engine';
import { CatalogService } from './catalog/catalog-service';
import { CartService } from './cart/cart-service';
import { ChatService } from './chat/chat-service';
import { EventService } from './events/event-service';
import { registerAuthRoutes, ProfileFetcher } from './auth/oauth-routes';
import { registerHealthRoutes } from './health/health-routes';
import { registerStorefrontRoutes } from './routes/storefront-routes';
import { registerCartRoutes } from './routes/cart-routes';
import { registerChatRoutes } from './routes/chat-routes';
import { registerApiRoutes } from './routes/api-routes';
import { StorefrontServices } from './routes/types';
import { renderError } from './views/pages';

const CHAT_PRODUCT_PREVIEW_SIZE = 4;

export interface AppContext {
  app: FastifyInstance;
  redis?: Redis;
  services: StorefrontServices;
  dependencies: DependencyHealthTracker;
}

/** Seams for tests: an in-process commerce service, a fixed token, a canned sign-in profile */
export interface BuildOptions {
  retail?: RetailService;
  tokens?: AccessTokenProvider;
  fetchProfile?: ProfileFetcher;
}

async function connectRedis(url: string): Promise<Redis | undefined> {
  try {
    const redisInstance = new Redis(url, {
      keyPrefix: env.redis.keyPrefix,
      maxRetriesPerRequest: 3,
      retryStrategy(times) {
        if (times > 5) return null;
        return Math.min(times * 200, 2000);
      },
      lazyConnect: true,
    });
    // Attach before connect so connection errors are not unhandled events
    redisInstance.on('error', (err) => {
      logger.debug({ err: err.message }, 'Redis connection error (handled)');
    });
    await redisInstance.connect();
    logger.info('Redis connected');
    return redisInstance;
  } catch (err) {
    logger.warn({ err }, 'Redis not available; using in-memory fallback');
    return undefined;
  }
}

function wantsHtml(req: FastifyRequest): boolean {
  return req.method === 'GET' && (req.headers.accept ?? '').includes('text/html');
}

export async function buildApp(options: BuildOptions = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false, // pino is used directly
    trustProxy: true,
    bodyLimit: 262_144,
  });

  await app.register(secureSession, {
    secret: env.session.secret,
    salt: env.session.salt,
    cookieName: 'storefront_session',
    cookie: {
      path: '/',
      httpOnly: true,
      sameSite: 'lax',
      secure: env.isProd,
    },
  });
  await app.register(formbody);
  await app.register(fastifyStatic, {
    root: path.join(env.projectRoot, 'public'),
    prefix: '/static/',
  });

  app.addHook('onResponse', (req, reply, done) => {
    const route = req.routeOptions?.url ?? 'unmatched';
    httpRequestDuration.observe(
      { method: req.method, route, status_code: String(reply.statusCode) },
      reply.elapsedTime / 1000,
    );
    done();
  });

  const redis = env.redis.url ? await connectRedis(env.redis.url) : undefined;

  // ───── Services ─────
  const dependencies = new DependencyHealthTracker();
  const paths = new ResourcePaths({
    projectId: env.retail.projectId,
    location: env.retail.location,
    catalogId: env.retail.catalogId,
    branch: env.retail.branch,
  });
  const retail = options.retail ?? new RetailClient(
    paths,
    {
      projectId: env.retail.projectId,
      baseUrl: env.retail.baseUrl,
      apiVersion: env.retail.apiVersion,
      conversationalApiVersion: env.retail.conversationalApiVersion,
      timeoutMs: env.retail.timeoutMs,
    },
    options.tokens,
    dependencies,
  );

  const cache = createCacheStore(redis, { ttlSeconds: env.cache.productTtlSeconds }, dependencies);
  const catalog = new CatalogService(retail, cache, env.cache.productTtlSeconds);

  const services: StorefrontServices = {
    search: new SearchService(retail, paths, configService, {
      servingConfigId: env.retail.servingConfigId,
      defaultPageSize: env.storefront.searchPageSize,
    }),
    autocomplete: new AutocompleteService(retail, paths, env.storefront.autocompleteMaxSuggestions),
    recommendations: new RecommendationEngine(retail, paths, {
      servingConfigId: env.retail.recommendationServingConfigId,
      pageSize: env.storefront.recommendationPageSize,
    }),
    catalog,
    cart: new CartService(catalog),
    chat: new ChatService(retail, paths, {
      servingConfigId: env.retail.servingConfigId,
      maxHistory: env.chat.maxHistory,
      productPreviewSize: CHAT_PRODUCT_PREVIEW_SIZE,
    }),
    events: new EventService(retail, env.storefront.currencyCode),
    currencyCode: env.storefront.currencyCode,
  };

  // ───── Error pages ─────
  app.setErrorHandler((err: FastifyError, req, reply) => {
    const status = err.statusCode && err.statusCode >= 400 ? err.statusCode : 500;
    const log = requestLogger(req.id);
    if (status >= 500) {
      log.error({ err, method: req.method, url: req.url }, 'Unhandled request error');
    } else {
      log.info({ status, url: req.url, msg: err.message }, 'Rejected request');
    }

    const message = status >= 500 ? 'Something went wrong. Please try again.' : err.message;
    if (wantsHtml(req)) {
      return reply
        .status(status)
        .type('text/html')
        .send(renderError(message, { cartCount: 0, currencyCode: services.currencyCode }));
    }
    return reply.status(status).send({ error: message });
  });

  app.setNotFoundHandler((req, reply) => {
    if (wantsHtml(req)) {
      return reply
        .status(404)
        .type('text/html')
        .send(renderError('Page not found', { cartCount: 0, currencyCode: services.currencyCode }));
    }
    return reply.status(404).send({ error: 'Not found' });
  });

  // ───── Routes ─────
  registerHealthRoutes(app, { redis, dependencies, enableMetrics: env.observability.enableMetrics });
  await registerAuthRoutes(app, {
    clientId: env.oauth.clientId,
    clientSecret: env.oauth.clientSecret,
    callbackUri: `${env.storefront.publicBaseUrl}/auth/callback`,
    timeoutMs: env.retail.timeoutMs,
    fetchProfile: options.fetchProfile,
  });
  registerStorefrontRoutes(app, services);
  registerCartRoutes(app, services);
  registerChatRoutes(app, services);
  registerApiRoutes(app, services);

  logger.info(
    {
      project: env.retail.projectId,
      catalog: env.retail.catalogId,
      branch: env.retail.branch,
      redis: Boolean(redis),
    },
    'Storefront initialized',
  );

  return { app, redis, services, dependencies };
}
