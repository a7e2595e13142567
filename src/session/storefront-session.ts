import { v4 as uuidv4 } from 'uuid';
import { CartEntry, Order } from '../cart/types';
import { ChatTurn } from '../chat/types';
import { SessionSlot, SessionUser, StorefrontSessionData } from './types';

export function computeCartTotal(entries: CartEntry[]): number {
  return entries.reduce((sum, e) => sum + e.unitPrice * e.quantity, 0);
}

/**
 * Serialized session data must stay under this many bytes. The cookie value is
 * the base64 ciphertext plus nonce, URI-encoded; browsers drop cookies over 4096.
 */
export const SESSION_BYTE_BUDGET = 2_400;

/** Longest text kept per stored chat turn */
export const MAX_STORED_TURN_TEXT = 400;
const MAX_STORED_SUGGESTIONS = 5;
const MAX_STORED_SUGGESTION_TEXT = 80;

function clip(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

/** Copy of a turn that is small enough to keep in the cookie */
export function compactTurn(turn: ChatTurn): ChatTurn {
  return {
    role: turn.role,
    text: clip(turn.text, MAX_STORED_TURN_TEXT),
    at: turn.at,
    ...(turn.followupQuestion ? { followupQuestion: clip(turn.followupQuestion, MAX_STORED_TURN_TEXT) } : {}),
    ...(turn.suggestedAnswers?.length
      ? {
          suggestedAnswers: turn.suggestedAnswers
            .slice(0, MAX_STORED_SUGGESTIONS)
            .map((a) => clip(a, MAX_STORED_SUGGESTION_TEXT)),
        }
      : {}),
    ...(turn.refinedQuery ? { refinedQuery: clip(turn.refinedQuery, MAX_STORED_SUGGESTION_TEXT) } : {}),
  };
}

export function serializedSize(data: StorefrontSessionData): number {
  return Buffer.byteLength(JSON.stringify(data), 'utf8');
}

function emptySession(visitorId: string): StorefrontSessionData {
  return { visitorId, cart: [], cartTotal: 0, chatHistory: [] };
}

/**
 * Typed view over one visitor's session. All writes go through here, and the
 * cart total is only ever computed in commitCart().
 */
export class StorefrontSession {
  private data: StorefrontSessionData;

  constructor(
    private readonly slot: SessionSlot,
    newVisitorId: () => string = uuidv4,
  ) {
    const existing = slot.load();
    if (existing?.visitorId) {
      const cart = Array.isArray(existing.cart) ? existing.cart : [];
      this.data = {
        ...existing,
        cart,
        cartTotal: computeCartTotal(cart),
        chatHistory: Array.isArray(existing.chatHistory) ? existing.chatHistory : [],
      };
    } else {
      this.data = emptySession(newVisitorId());
      this.persist();
    }
  }

  get visitorId(): string {
    return this.data.visitorId;
  }

  // ───── Cart ─────

  cartEntries(): CartEntry[] {
    return this.data.cart.map((e) => ({ ...e }));
  }

  get cartTotal(): number {
    return this.data.cartTotal;
  }

  commitCart(entries: CartEntry[]): void {
    this.data.cart = entries.map((e) => ({ ...e }));
    this.data.cartTotal = computeCartTotal(this.data.cart);
    this.persist();
  }

  // ───── Orders ─────

  storeOrder(order: Order): void {
    this.data.lastOrder = order;
    this.persist();
  }

  /** Read and remove the last order; a second call returns undefined */
  takeOrder(): Order | undefined {
    const order = this.data.lastOrder;
    if (!order) return undefined;
    delete this.data.lastOrder;
    this.persist();
    return order;
  }

  // ───── Chat ─────

  chatHistory(): ChatTurn[] {
    return [...this.data.chatHistory];
  }

  get conversationId(): string | undefined {
    return this.data.conversationId;
  }

  setConversationId(conversationId: string): void {
    this.data.conversationId = conversationId;
    this.persist();
  }

  /** Append turns, keeping at most maxTurns (oldest dropped); text is clipped on the way in */
  appendChatTurns(turns: ChatTurn[], maxTurns: number): void {
    const history = [...this.data.chatHistory, ...turns.map(compactTurn)];
    this.data.chatHistory = maxTurns > 0 ? history.slice(-maxTurns) : history;
    this.persist();
  }

  clearChat(): void {
    this.data.chatHistory = [];
    delete this.data.conversationId;
    this.persist();
  }

  // ───── Identity ─────

  get user(): SessionUser | undefined {
    return this.data.user;
  }

  setUser(user: SessionUser): void {
    this.data.user = user;
    this.persist();
  }

  clearUser(): void {
    delete this.data.user;
    this.persist();
  }

  snapshot(): StorefrontSessionData {
    return structuredClone(this.data);
  }

  private persist(): void {
    this.fitToBudget();
    this.slot.save(structuredClone(this.data));
  }

  /** Chat history is the only part given up to stay under the cookie budget */
  private fitToBudget(): void {
    let size = serializedSize(this.data);
    if (size <= SESSION_BYTE_BUDGET) return;
    const history = this.data.chatHistory.map(compactTurn);
    this.data.chatHistory = history;
    size = serializedSize(this.data);
    while (size > SESSION_BYTE_BUDGET && history.length > 0) {
      history.shift();
      size = serializedSize(this.data);
    }
  }
}

/** In-process slot holding one session; backs unit tests */
export class MemorySessionSlot implements SessionSlot {
  constructor(private data?: StorefrontSessionData) {}

  load(): StorefrontSessionData | undefined {
    return this.data;
  }

  save(data: StorefrontSessionData): void {
    this.data = data;
  }
}
