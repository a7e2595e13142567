import client from 'prom-client';

export const registry = new client.Registry();

/** Process-level metrics; started once from the server entry point */
export function enableDefaultMetrics(): void {
  client.collectDefaultMetrics({ register: registry, prefix: 'storefront_' });
}

export const httpRequestDuration = new client.Histogram({
  name: 'storefront_http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'route', 'status_code'],
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2.5, 5],
  registers: [registry],
});

export const retailCallDuration = new client.Histogram({
  name: 'storefront_retail_call_duration_seconds',
  help: 'Commerce search service call duration in seconds',
  labelNames: ['operation', 'status'],
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10],
  registers: [registry],
});

export const retailCallFailures = new client.Counter({
  name: 'storefront_retail_call_failures_total',
  help: 'Failed commerce search service calls',
  labelNames: ['operation'],
  registers: [registry],
});

export const cartMutations = new client.Counter({
  name: 'storefront_cart_mutations_total',
  help: 'Cart mutations by action',
  labelNames: ['action'],
  registers: [registry],
});

export const chatTurns = new client.Counter({
  name: 'storefront_chat_turns_total',
  help: 'Conversational shopping turns by outcome',
  labelNames: ['outcome'],
  registers: [registry],
});

export const eventsIngested = new client.Counter({
  name: 'storefront_user_events_total',
  help: 'User events forwarded to the commerce search service',
  labelNames: ['event_type', 'status'],
  registers: [registry],
});

export const cacheLookups = new client.Counter({
  name: 'storefront_cache_lookups_total',
  help: 'Product cache lookups by store and outcome',
  labelNames: ['store', 'outcome'],
  registers: [registry],
});

export async function getMetrics(): Promise<string> {
  return registry.metrics();
}

export function getContentType(): string {
  return registry.contentType;
}
