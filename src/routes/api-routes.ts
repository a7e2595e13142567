import { FastifyInstance } from 'fastify';
import { EventBatchError } from '../events/event-service';
import { sessionFor, shopperOf } from '../session/request-session';
import { firstValue, FormValue, StorefrontServices } from './types';

/** JSON endpoints used by the browser scripts */
export function registerApiRoutes(app: FastifyInstance, services: StorefrontServices): void {
  app.get<{ Querystring: { q?: FormValue } }>('/autocomplete', async (req, reply) => {
    const session = sessionFor(req);
    const result = await services.autocomplete.complete(firstValue(req.query.q) ?? '', shopperOf(session));
    return reply.send(result);
  });

  app.post<{ Body: unknown }>('/events', async (req, reply) => {
    const session = sessionFor(req);
    try {
      const result = await services.events.ingest(req.body, shopperOf(session));
      return reply.status(202).send(result);
    } catch (err) {
      if (err instanceof EventBatchError) {
        return reply.status(400).send({ error: err.message });
      }
      throw err;
    }
  });
}
