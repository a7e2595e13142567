import { FastifyInstance } from 'fastify';
import { QueryParams } from '../search/facet-filter';
import { sessionFor, shopperOf } from '../session/request-session';
import { renderHome, renderProduct, renderSearch } from '../views/pages';
import { pageContext } from './page-context';
import { firstValue, FormValue, StorefrontServices } from './types';

interface WildcardParams {
  '*': string;
}

/**
 * Browsing pages: home (recommendations), keyword search, category browse
 * and product detail. Service failures render the page with an error banner.
 */
export function registerStorefrontRoutes(app: FastifyInstance, services: StorefrontServices): void {
  app.get('/', async (req, reply) => {
    const session = sessionFor(req);
    const view = await services.recommendations.homePage(shopperOf(session));
    return reply.type('text/html').send(renderHome(view, pageContext(session, services.currencyCode)));
  });

  app.get<{ Querystring: QueryParams }>('/search', async (req, reply) => {
    const query = (firstValue(req.query.query) ?? '').trim();
    if (!query) return reply.redirect('/');

    const session = sessionFor(req);
    const view = await services.search.search(req.query, shopperOf(session));
    return reply.type('text/html').send(renderSearch(view, pageContext(session, services.currencyCode)));
  });

  app.get<{ Params: WildcardParams; Querystring: QueryParams }>('/browse/*', async (req, reply) => {
    const category = req.params['*'].trim();
    if (!category) return reply.redirect('/');

    const session = sessionFor(req);
    const view = await services.search.browse(category, req.query, shopperOf(session));
    return reply.type('text/html').send(renderSearch(view, pageContext(session, services.currencyCode)));
  });

  app.get<{ Params: WildcardParams; Querystring: { attribution_token?: FormValue } }>(
    '/product/*',
    async (req, reply) => {
      const productId = req.params['*'];
      if (!productId) return reply.redirect('/');

      const session = sessionFor(req);
      const view = await services.catalog.productPage(productId, firstValue(req.query.attribution_token));
      return reply.type('text/html').send(renderProduct(view, pageContext(session, services.currencyCode)));
    },
  );
}
