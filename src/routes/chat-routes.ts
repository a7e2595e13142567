import { FastifyInstance } from 'fastify';
import { sessionFor, shopperOf } from '../session/request-session';
import { renderChat } from '../views/pages';
import { pageContext } from './page-context';
import { MAX_CHAT_MESSAGE_LENGTH } from '../chat/types';
import { StorefrontServices } from './types';

interface ChatMessageBody {
  message?: unknown;
}

export function registerChatRoutes(app: FastifyInstance, services: StorefrontServices): void {
  app.get('/chat', async (req, reply) => {
    const session = sessionFor(req);
    const html = renderChat(
      session.chatHistory(),
      services.chat.state(session),
      pageContext(session, services.currencyCode),
    );
    return reply.type('text/html').send(html);
  });

  /** One conversational turn. Failures answer 200 with { error } so the page can show them inline. */
  app.post<{ Body: ChatMessageBody | undefined }>('/chat/message', async (req, reply) => {
    const message = typeof req.body?.message === 'string' ? req.body.message.trim() : '';
    if (!message) {
      return reply.status(400).send({ error: 'message is required' });
    }
    if (message.length > MAX_CHAT_MESSAGE_LENGTH) {
      return reply.status(400).send({ error: `message must be at most ${MAX_CHAT_MESSAGE_LENGTH} characters` });
    }

    const session = sessionFor(req);
    const outcome = await services.chat.send(session, message, shopperOf(session));
    if (!outcome.ok) {
      return reply.send({ error: outcome.error });
    }

    const { exchange } = outcome;
    return reply.send({
      reply: exchange.reply.text,
      followupQuestion: exchange.reply.followupQuestion,
      suggestedAnswers: exchange.reply.suggestedAnswers ?? [],
      refinedQuery: exchange.reply.refinedQuery,
      conversationId: exchange.conversationId,
      state: exchange.state,
      products: exchange.products,
      attributionToken: exchange.attributionToken,
    });
  });

  app.post('/chat/clear', async (req, reply) => {
    services.chat.clear(sessionFor(req));
    return reply.redirect(303, '/chat');
  });
}
