// Placeholder configuration so src/config/env loads without a .env file.
process.env.NODE_ENV = 'test';
process.env.LOG_LEVEL = process.env.LOG_LEVEL || 'silent';
process.env.GCP_PROJECT_ID = 'test-project';
process.env.RETAIL_LOCATION = 'global';
process.env.RETAIL_CATALOG_ID = 'default_catalog';
process.env.RETAIL_SERVING_CONFIG_ID = 'default_search';
process.env.RETAIL_RECOMMENDATION_SERVING_CONFIG_ID = 'recently_viewed_default';
process.env.RETAIL_BRANCH = 'default_branch';
process.env.OAUTH_CLIENT_ID = 'test-client-id';
process.env.OAUTH_CLIENT_SECRET = 'test-secret';
process.env.SESSION_SECRET = 'test-session-secret-test-session-secret';
process.env.REDIS_URL = '';
