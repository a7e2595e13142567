import dotenv from 'dotenv';
import path from 'path';

// Resolve .env from project root (handles running from any CWD)
const projectRoot = path.resolve(__dirname, '..', '..');
dotenv.config({ path: path.join(projectRoot, '.env') });

function required(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required env var: ${key}`);
  return val;
}

function optional(key: string, fallback: string): string {
  return process.env[key] || fallback;
}

/** Integer setting; unset or unparseable values take the fallback */
export function optionalInt(key: string, fallback: number): number {
  const parsed = parseInt(process.env[key] ?? '', 10);
  return Number.isNaN(parsed) ? fallback : parsed;
}

function optionalBool(key: string, fallback: boolean): boolean {
  const val = process.env[key];
  if (!val) return fallback;
  return val === 'true' || val === '1';
}

function sessionSecret(): string {
  const secret = required('SESSION_SECRET');
  if (secret.length < 32) throw new Error('SESSION_SECRET must be at least 32 characters');
  return secret;
}

export const env = {
  nodeEnv: optional('NODE_ENV', 'development'),
  port: optionalInt('PORT', 8080),
  logLevel: optional('LOG_LEVEL', 'info'),
  projectRoot,

  // ───── Commerce search service ─────
  retail: {
    projectId: required('GCP_PROJECT_ID'),
    location: required('RETAIL_LOCATION'),
    catalogId: required('RETAIL_CATALOG_ID'),
    servingConfigId: required('RETAIL_SERVING_CONFIG_ID'),
    recommendationServingConfigId: required('RETAIL_RECOMMENDATION_SERVING_CONFIG_ID'),
    // Pinned explicitly; product lookups and search both go through this branch
    branch: optional('RETAIL_BRANCH', 'default_branch'),
    baseUrl: optional('RETAIL_API_BASE_URL', 'https://retail.googleapis.com'),
    apiVersion: optional('RETAIL_API_VERSION', 'v2'),
    conversationalApiVersion: optional('RETAIL_CONVERSATIONAL_API_VERSION', 'v2beta'),
    timeoutMs: optionalInt('RETAIL_TIMEOUT_MS', 15000),
  },

  storefront: {
    searchPageSize: optionalInt('SEARCH_PAGE_SIZE', 20),
    recommendationPageSize: optionalInt('RECOMMENDATION_PAGE_SIZE', 10),
    autocompleteMaxSuggestions: optionalInt('AUTOCOMPLETE_MAX_SUGGESTIONS', 8),
    currencyCode: optional('CURRENCY_CODE', 'USD'),
    publicBaseUrl: optional('PUBLIC_BASE_URL', 'http://localhost:8080'),
  },

  chat: {
    maxHistory: optionalInt('CHAT_MAX_HISTORY', 20),
  },

  oauth: {
    clientId: required('OAUTH_CLIENT_ID'),
    clientSecret: required('OAUTH_CLIENT_SECRET'),
  },

  session: {
    secret: sessionSecret(),
    // @fastify/secure-session requires a 16-byte salt
    salt: optional('SESSION_SALT', 'vQ3h7Rk2LmX9pZ4e'),
  },

  redis: {
    url: optional('REDIS_URL', ''),
    keyPrefix: optional('REDIS_KEY_PREFIX', 'storefront:'),
  },

  cache: {
    productTtlSeconds: optionalInt('PRODUCT_CACHE_TTL_SECONDS', 300),
  },

  observability: {
    enableMetrics: optionalBool('ENABLE_METRICS', true),
  },

  get isProd(): boolean {
    return this.nodeEnv === 'production';
  },
} as const;

export type Env = typeof env;
