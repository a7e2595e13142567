/**
 * Event Service: user events for the commerce search service.
 *
 * Two entry points: ingest() for events posted by the browser tracker, and
 * record() for events the server emits itself (cart changes, purchases).
 * The visitor id always comes from the session, never from the client.
 */

import Ajv from 'ajv';
import { logger } from '../observability/logger';
import { eventsIngested } from '../observability/metrics';
import { describeError } from '../retail/errors';
import { RetailService, UserEvent } from '../retail/types';
import { ShopperContext } from '../search/types';
import { incomingEventSchema, MAX_EVENTS_PER_REQUEST } from './event-schema';
import { IncomingEvent, IngestResult } from './types';

const log = logger.child({ component: 'event-service' });

const ajv = new Ajv({ allErrors: true, removeAdditional: 'all' });
const validateEvent = ajv.compile<IncomingEvent>(incomingEventSchema);

export class EventBatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EventBatchError';
  }
}

export class EventService {
  constructor(
    private readonly retail: RetailService,
    private readonly currencyCode: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /** Accept one event object or an array of them; throws EventBatchError for any other body */
  splitBatch(body: unknown): unknown[] {
    if (Array.isArray(body)) {
      if (body.length > MAX_EVENTS_PER_REQUEST) {
        throw new EventBatchError(`At most ${MAX_EVENTS_PER_REQUEST} events per request`);
      }
      return body;
    }
    if (body !== null && typeof body === 'object') return [body];
    throw new EventBatchError('Body must be an event object or an array of events');
  }

  async ingest(body: unknown, shopper: ShopperContext): Promise<IngestResult> {
    const batch = this.splitBatch(body);
    const result: IngestResult = { written: 0, failed: 0, errors: [] };

    for (const [index, candidate] of batch.entries()) {
      if (!validateEvent(candidate)) {
        const reason = ajv.errorsText(validateEvent.errors);
        result.failed++;
        result.errors.push(`event[${index}]: ${reason}`);
        eventsIngested.inc({ event_type: 'invalid', status: 'rejected' });
        continue;
      }

      const written = await this.write(this.toUserEvent(candidate, shopper));
      if (written) {
        result.written++;
      } else {
        result.failed++;
        result.errors.push(`event[${index}]: write failed`);
      }
    }

    if (result.failed > 0) {
      log.warn({ written: result.written, failed: result.failed }, 'Event batch partially failed');
    }
    return result;
  }

  /** Server-emitted event; failures are logged and reported as false */
  async record(event: Omit<UserEvent, 'visitorId' | 'eventTime'>, shopper: ShopperContext): Promise<boolean> {
    return this.write({
      ...event,
      visitorId: shopper.visitorId,
      eventTime: this.now().toISOString(),
      ...(shopper.userId ? { userInfo: { userId: shopper.userId } } : {}),
    });
  }

  toUserEvent(event: IncomingEvent, shopper: ShopperContext): UserEvent {
    const { purchaseTransaction, ...rest } = event;
    return {
      ...rest,
      visitorId: shopper.visitorId,
      eventTime: this.now().toISOString(),
      ...(purchaseTransaction
        ? {
            purchaseTransaction: {
              ...purchaseTransaction,
              currencyCode: purchaseTransaction.currencyCode ?? this.currencyCode,
            },
          }
        : {}),
      ...(shopper.userId ? { userInfo: { userId: shopper.userId } } : {}),
    };
  }

  private async write(event: UserEvent): Promise<boolean> {
    try {
      await this.retail.writeUserEvent(event);
      eventsIngested.inc({ event_type: event.eventType, status: 'written' });
      return true;
    } catch (err) {
      eventsIngested.inc({ event_type: event.eventType, status: 'failed' });
      log.warn({ eventType: event.eventType, err: describeError(err) }, 'User event write failed');
      return false;
    }
  }
}
