/** JSON schema for one ingested user event; unknown fields are stripped */
export const incomingEventSchema = {
  type: 'object',
  required: ['eventType'],
  additionalProperties: false,
  properties: {
    eventType: { type: 'string', minLength: 1, maxLength: 64 },
    productDetails: {
      type: 'array',
      maxItems: 200,
      items: {
        type: 'object',
        required: ['product'],
        additionalProperties: false,
        properties: {
          product: {
            type: 'object',
            required: ['id'],
            additionalProperties: false,
            properties: { id: { type: 'string', minLength: 1, maxLength: 128 } },
          },
          quantity: { type: 'integer', minimum: 1 },
        },
      },
    },
    searchQuery: { type: 'string', maxLength: 5000 },
    pageCategories: { type: 'array', maxItems: 10, items: { type: 'string' } },
    attributionToken: { type: 'string' },
    filter: { type: 'string' },
    offset: { type: 'integer', minimum: 0 },
    purchaseTransaction: {
      type: 'object',
      required: ['revenue'],
      additionalProperties: false,
      properties: {
        id: { type: 'string' },
        revenue: { type: 'number' },
        currencyCode: { type: 'string', minLength: 3, maxLength: 3 },
      },
    },
    uri: { type: 'string', maxLength: 5000 },
    referrerUri: { type: 'string', maxLength: 5000 },
    pageViewId: { type: 'string' },
  },
} as const;

/** Largest batch accepted by POST /events */
export const MAX_EVENTS_PER_REQUEST = 50;
