export type RetailOperation =
  | 'search'
  | 'predict'
  | 'getProduct'
  | 'completeQuery'
  | 'writeUserEvent'
  | 'conversationalSearch';

/** A failed call to the commerce search service (network, quota, auth, 4xx/5xx). */
export class RetailApiError extends Error {
  constructor(
    readonly operation: RetailOperation,
    readonly status: number | undefined,
    message: string,
  ) {
    super(`${operation} failed${status ? ` (${status})` : ''}: ${message}`);
    this.name = 'RetailApiError';
  }
}

/** Flatten any thrown value into the string shown on degraded pages */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
