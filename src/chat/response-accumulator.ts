import { ConversationalReply, ConversationalSearchFragment } from '../retail/types';

/**
 * Merges streamed conversational-search fragments into one reply.
 * Text is concatenated in arrival order; scalar fields keep the last
 * non-empty value; list fields are unioned in first-seen order.
 */
export class ResponseAccumulator {
  private text = '';
  private conversationId?: string;
  private followupQuestion?: string;
  private suggestedAnswers: string[] = [];
  private refinedQueries: string[] = [];
  private userQueryTypes: string[] = [];
  private state?: ConversationalSearchFragment['state'];
  private fragments = 0;

  push(fragment: ConversationalSearchFragment): void {
    this.fragments++;
    if (fragment.conversationalTextResponse) this.text += fragment.conversationalTextResponse;
    if (fragment.conversationId) this.conversationId = fragment.conversationId;
    if (fragment.state) this.state = fragment.state;

    const followup = fragment.followupQuestion;
    if (followup?.followupQuestion) this.followupQuestion = followup.followupQuestion;
    for (const answer of followup?.suggestedAnswers ?? []) {
      const value = answer.productAttributeValue?.value;
      if (value) addUnique(this.suggestedAnswers, value);
    }

    for (const refined of fragment.refinedSearch ?? []) {
      if (refined.query) addUnique(this.refinedQueries, refined.query);
    }
    for (const type of fragment.userQueryTypes ?? []) {
      addUnique(this.userQueryTypes, type);
    }
  }

  get fragmentCount(): number {
    return this.fragments;
  }

  result(): ConversationalReply {
    return {
      text: this.text,
      conversationId: this.conversationId,
      followupQuestion: this.followupQuestion,
      suggestedAnswers: [...this.suggestedAnswers],
      refinedQueries: [...this.refinedQueries],
      userQueryTypes: [...this.userQueryTypes],
      state: this.state,
    };
  }
}

/** Drain a fragment stream to the end and return the merged reply */
export async function accumulate(
  stream: AsyncIterable<ConversationalSearchFragment>,
): Promise<ConversationalReply> {
  const acc = new ResponseAccumulator();
  for await (const fragment of stream) {
    acc.push(fragment);
  }
  return acc.result();
}

function addUnique(list: string[], value: string): void {
  if (!list.includes(value)) list.push(value);
}
