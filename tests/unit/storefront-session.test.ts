import { ChatTurn } from '../../src/chat/types';
import {
  computeCartTotal,
  MAX_STORED_TURN_TEXT,
  MemorySessionSlot,
  serializedSize,
  SESSION_BYTE_BUDGET,
  StorefrontSession,
} from '../../src/session/storefront-session';

function turn(role: ChatTurn['role'], text: string): ChatTurn {
  return { role, text, at: 0 };
}

describe('StorefrontSession', () => {
  it('should create and persist a visitor id on first use', () => {
    const slot = new MemorySessionSlot();
    const session = new StorefrontSession(slot, () => 'visitor-new');
    expect(session.visitorId).toBe('visitor-new');
    expect(slot.load()).toEqual({ visitorId: 'visitor-new', cart: [], cartTotal: 0, chatHistory: [] });
  });

  it('should keep an existing visitor id', () => {
    const slot = new MemorySessionSlot({ visitorId: 'visitor-old', cart: [], cartTotal: 0, chatHistory: [] });
    const session = new StorefrontSession(slot, () => 'visitor-new');
    expect(session.visitorId).toBe('visitor-old');
  });

  it('should recompute a stale cart total on load', () => {
    const slot = new MemorySessionSlot({
      visitorId: 'v',
      cart: [{ productId: 'p1', unitPrice: 4, quantity: 3 }],
      cartTotal: 999,
      chatHistory: [],
    });
    expect(new StorefrontSession(slot).cartTotal).toBe(12);
  });

  it('should not expose its internal cart for mutation', () => {
    const session = new StorefrontSession(new MemorySessionSlot(), () => 'v');
    session.commitCart([{ productId: 'p1', unitPrice: 1, quantity: 1 }]);
    session.cartEntries()[0].quantity = 50;
    expect(session.cartEntries()[0].quantity).toBe(1);
  });

  it('should cap chat history to the newest turns', () => {
    const session = new StorefrontSession(new MemorySessionSlot(), () => 'v');
    session.appendChatTurns([turn('user', 'a'), turn('bot', 'b')], 4);
    session.appendChatTurns([turn('user', 'c'), turn('bot', 'd')], 4);
    session.appendChatTurns([turn('user', 'e'), turn('bot', 'f')], 4);
    expect(session.chatHistory().map((t) => t.text)).toEqual(['c', 'd', 'e', 'f']);
  });

  it('should clip long turn text before storing it', () => {
    const session = new StorefrontSession(new MemorySessionSlot(), () => 'v');
    session.appendChatTurns([turn('bot', 'x'.repeat(1000))], 20);
    const [stored] = session.chatHistory();
    expect(stored.text).toHaveLength(MAX_STORED_TURN_TEXT);
    expect(stored.text.endsWith('…')).toBe(true);
  });

  it('should drop the oldest turns to stay under the byte budget', () => {
    const slot = new MemorySessionSlot();
    const session = new StorefrontSession(slot, () => 'v');
    for (let i = 0; i < 20; i++) {
      session.appendChatTurns([turn('bot', `turn-${i} `.padEnd(350, 'x'))], 100);
    }
    const stored = slot.load();
    expect(stored && serializedSize(stored)).toBeLessThanOrEqual(SESSION_BYTE_BUDGET);
    const history = session.chatHistory();
    expect(history.length).toBeLessThan(20);
    expect(history[history.length - 1].text.startsWith('turn-19 ')).toBe(true);
  });

  it('should give up chat history rather than cart entries when the cart grows', () => {
    const slot = new MemorySessionSlot();
    const session = new StorefrontSession(slot, () => 'v');
    for (let i = 0; i < 6; i++) {
      session.appendChatTurns([turn('bot', 'y'.repeat(350))], 100);
    }
    const cart = Array.from({ length: 30 }, (_, i) => ({ productId: `product-${i}`, unitPrice: 1, quantity: 1 }));
    session.commitCart(cart);

    expect(session.cartEntries()).toHaveLength(30);
    const stored = slot.load();
    expect(stored && serializedSize(stored)).toBeLessThanOrEqual(SESSION_BYTE_BUDGET);
    expect(session.chatHistory().length).toBeLessThan(6);
  });

  it('should clear chat history and the conversation id together', () => {
    const session = new StorefrontSession(new MemorySessionSlot(), () => 'v');
    session.setConversationId('conv-1');
    session.appendChatTurns([turn('user', 'hi'), turn('bot', 'hello')], 20);
    session.clearChat();
    expect(session.chatHistory()).toEqual([]);
    expect(session.conversationId).toBeUndefined();
  });

  it('should keep the visitor id across sign-in and sign-out', () => {
    const slot = new MemorySessionSlot();
    const session = new StorefrontSession(slot, () => 'v-1');
    session.setUser({ id: 'user-1', email: 'shopper@example.com' });
    expect(new StorefrontSession(slot).user).toEqual({ id: 'user-1', email: 'shopper@example.com' });
    session.clearUser();
    const reloaded = new StorefrontSession(slot);
    expect(reloaded.user).toBeUndefined();
    expect(reloaded.visitorId).toBe('v-1');
  });
});

describe('computeCartTotal', () => {
  it('should sum unit price times quantity', () => {
    expect(
      computeCartTotal([
        { productId: 'a', unitPrice: 2.5, quantity: 2 },
        { productId: 'b', unitPrice: 10, quantity: 1 },
      ]),
    ).toBe(15);
  });

  it('should be 0 for an empty cart', () => {
    expect(computeCartTotal([])).toBe(0);
  });
});
