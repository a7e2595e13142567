import { ProductCard } from '../catalog/types';

/** Longest shopper message accepted by /chat/message */
export const MAX_CHAT_MESSAGE_LENGTH = 500;

export type ChatRole = 'user' | 'bot';

export interface ChatTurn {
  role: ChatRole;
  text: string;
  at: number;
  followupQuestion?: string;
  suggestedAnswers?: string[];
  refinedQuery?: string;
}

/** Conversation lifecycle, derived from whether a conversation id is held */
export type ConversationState = 'NO_CONVERSATION' | 'ACTIVE';

export interface ChatExchange {
  reply: ChatTurn;
  conversationId?: string;
  state: ConversationState;
  /** Products for the refined query; rendered but not kept in the session */
  products: ProductCard[];
  attributionToken?: string;
}
