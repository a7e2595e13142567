import { EventBatchError, EventService } from '../../src/events/event-service';
import { MAX_EVENTS_PER_REQUEST } from '../../src/events/event-schema';
import { FakeRetail } from '../helpers/fake-retail';

const NOW = '2026-01-01T00:00:00.000Z';

describe('EventService', () => {
  let retail: FakeRetail;
  let events: EventService;

  beforeEach(() => {
    retail = new FakeRetail();
    events = new EventService(retail, 'USD', () => new Date(NOW));
  });

  describe('ingest', () => {
    it('should write a single event with the session identity', async () => {
      const result = await events.ingest(
        { eventType: 'detail-page-view', productDetails: [{ product: { id: 'p1' } }], visitorId: 'spoofed' },
        { visitorId: 'visitor-1', userId: 'user-1' },
      );

      expect(result).toEqual({ written: 1, failed: 0, errors: [] });
      expect(retail.events).toEqual([
        {
          eventType: 'detail-page-view',
          productDetails: [{ product: { id: 'p1' } }],
          visitorId: 'visitor-1',
          eventTime: NOW,
          userInfo: { userId: 'user-1' },
        },
      ]);
    });

    it('should count invalid events as failed and write the rest', async () => {
      const result = await events.ingest(
        [{ eventType: 'search', searchQuery: 'lamp' }, { searchQuery: 'no type' }, { eventType: 'home-page-view' }],
        { visitorId: 'visitor-1' },
      );

      expect(result.written).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.errors).toEqual(["event[1]: data must have required property 'eventType'"]);
      expect(retail.events.map((e) => e.eventType)).toEqual(['search', 'home-page-view']);
    });

    it('should accept an empty batch', async () => {
      expect(await events.ingest([], { visitorId: 'v' })).toEqual({ written: 0, failed: 0, errors: [] });
    });

    it('should default the purchase currency', async () => {
      await events.ingest(
        { eventType: 'purchase-complete', purchaseTransaction: { id: 'txn-1', revenue: 20 } },
        { visitorId: 'v' },
      );
      expect(retail.events[0].purchaseTransaction).toEqual({ id: 'txn-1', revenue: 20, currencyCode: 'USD' });
    });

    it('should report write failures per event', async () => {
      retail.failing.add('writeUserEvent');
      const result = await events.ingest({ eventType: 'search' }, { visitorId: 'v' });
      expect(result).toEqual({ written: 0, failed: 1, errors: ['event[0]: write failed'] });
    });

    it('should reject bodies that are not events', async () => {
      await expect(events.ingest('click', { visitorId: 'v' })).rejects.toBeInstanceOf(EventBatchError);
      await expect(events.ingest(null, { visitorId: 'v' })).rejects.toBeInstanceOf(EventBatchError);
    });

    it('should reject oversized batches', async () => {
      const batch = Array.from({ length: MAX_EVENTS_PER_REQUEST + 1 }, () => ({ eventType: 'search' }));
      await expect(events.ingest(batch, { visitorId: 'v' })).rejects.toThrow(
        `At most ${MAX_EVENTS_PER_REQUEST} events per request`,
      );
      expect(retail.events).toHaveLength(0);
    });
  });

  describe('record', () => {
    it('should write a server-side event', async () => {
      const ok = await events.record(
        { eventType: 'add-to-cart', productDetails: [{ product: { id: 'p1' }, quantity: 2 }] },
        { visitorId: 'visitor-2' },
      );

      expect(ok).toBe(true);
      expect(retail.events[0]).toEqual({
        eventType: 'add-to-cart',
        productDetails: [{ product: { id: 'p1' }, quantity: 2 }],
        visitorId: 'visitor-2',
        eventTime: NOW,
      });
    });

    it('should report failure without throwing', async () => {
      retail.failing.add('writeUserEvent');
      await expect(events.record({ eventType: 'add-to-cart' }, { visitorId: 'v' })).resolves.toBe(false);
    });
  });
});
