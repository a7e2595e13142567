/**
 * Chat Service: conversational shopping.
 *
 * Conversation lifecycle:
 *   NO_CONVERSATION → (first successful exchange assigns an id) → ACTIVE
 *   ACTIVE → (id reused on every later turn) → ACTIVE
 *   ACTIVE → clear() → NO_CONVERSATION
 *
 * A successful turn appends exactly one user turn and one bot turn. A failed
 * turn leaves the session untouched.
 */

import { toProductCard } from '../catalog/product-mapper';
import { ProductCard } from '../catalog/types';
import { logger } from '../observability/logger';
import { chatTurns } from '../observability/metrics';
import { ResourcePaths } from '../retail/paths';
import { describeError } from '../retail/errors';
import { ConversationalReply, ConversationalSearchRequest, RetailService } from '../retail/types';
import { ShopperContext } from '../search/types';
import { StorefrontSession } from '../session/storefront-session';
import { accumulate } from './response-accumulator';
import { ChatExchange, ChatTurn, ConversationState } from './types';

const log = logger.child({ component: 'chat-service' });

export interface ChatServiceOptions {
  servingConfigId: string;
  maxHistory: number;
  /** Products fetched for the refined query shown under a reply */
  productPreviewSize: number;
}

export type ChatOutcome =
  | { ok: true; exchange: ChatExchange }
  | { ok: false; error: string };

export class ChatService {
  constructor(
    private readonly retail: RetailService,
    private readonly paths: ResourcePaths,
    private readonly options: ChatServiceOptions,
  ) {}

  state(session: StorefrontSession): ConversationState {
    return session.conversationId ? 'ACTIVE' : 'NO_CONVERSATION';
  }

  buildRequest(message: string, session: StorefrontSession, shopper: ShopperContext): ConversationalSearchRequest {
    return {
      placement: this.paths.servingConfig(this.options.servingConfigId),
      branch: this.paths.branch(),
      query: message,
      visitorId: shopper.visitorId,
      ...(session.conversationId ? { conversationId: session.conversationId } : {}),
      ...(shopper.userId ? { userInfo: { userId: shopper.userId } } : {}),
    };
  }

  async send(session: StorefrontSession, message: string, shopper: ShopperContext): Promise<ChatOutcome> {
    const text = message.trim();
    const sentAt = Date.now();

    let reply: ConversationalReply;
    try {
      reply = await accumulate(this.retail.conversationalSearch(this.buildRequest(text, session, shopper)));
    } catch (err) {
      chatTurns.inc({ outcome: 'error' });
      log.warn({ visitorId: shopper.visitorId, conversationId: session.conversationId }, 'Chat turn failed');
      return { ok: false, error: describeError(err) };
    }

    if (reply.conversationId && reply.conversationId !== session.conversationId) {
      session.setConversationId(reply.conversationId);
    }

    const userTurn: ChatTurn = { role: 'user', text, at: sentAt };
    const botTurn: ChatTurn = {
      role: 'bot',
      text: reply.text,
      at: Date.now(),
      ...(reply.followupQuestion ? { followupQuestion: reply.followupQuestion } : {}),
      ...(reply.suggestedAnswers.length ? { suggestedAnswers: reply.suggestedAnswers } : {}),
      ...(reply.refinedQueries.length ? { refinedQuery: reply.refinedQueries[0] } : {}),
    };
    session.appendChatTurns([userTurn, botTurn], this.options.maxHistory);
    chatTurns.inc({ outcome: 'ok' });

    const preview = botTurn.refinedQuery
      ? await this.previewProducts(botTurn.refinedQuery, shopper)
      : { products: [] };

    log.info(
      { conversationId: session.conversationId, refinedQuery: botTurn.refinedQuery, products: preview.products.length },
      'Chat turn completed',
    );

    return {
      ok: true,
      exchange: {
        reply: botTurn,
        conversationId: session.conversationId,
        state: this.state(session),
        products: preview.products,
        attributionToken: preview.attributionToken,
      },
    };
  }

  clear(session: StorefrontSession): void {
    session.clearChat();
    log.info({ visitorId: session.visitorId }, 'Chat cleared');
  }

  private async previewProducts(
    query: string,
    shopper: ShopperContext,
  ): Promise<{ products: ProductCard[]; attributionToken?: string }> {
    try {
      const response = await this.retail.search({
        placement: this.paths.servingConfig(this.options.servingConfigId),
        branch: this.paths.branch(),
        query,
        visitorId: shopper.visitorId,
        pageSize: this.options.productPreviewSize,
      });
      return {
        products: (response.results ?? []).map((r) => toProductCard(r.product ?? { id: r.id }, r.id)),
        attributionToken: response.attributionToken,
      };
    } catch (err) {
      log.warn({ query, err: describeError(err) }, 'Chat product preview failed');
      return { products: [] };
    }
  }
}
