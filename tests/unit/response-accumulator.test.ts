import { accumulate, ResponseAccumulator } from '../../src/chat/response-accumulator';
import { ConversationalSearchFragment } from '../../src/retail/types';

async function* stream(fragments: ConversationalSearchFragment[]): AsyncGenerator<ConversationalSearchFragment> {
  for (const fragment of fragments) {
    yield fragment;
  }
}

describe('ResponseAccumulator', () => {
  it('should concatenate text in arrival order', async () => {
    const reply = await accumulate(
      stream([
        { conversationalTextResponse: 'Here are ' },
        { conversationalTextResponse: 'some ' },
        { conversationalTextResponse: 'lamps.' },
      ]),
    );
    expect(reply.text).toBe('Here are some lamps.');
  });

  it('should keep the last non-empty scalar values', async () => {
    const reply = await accumulate(
      stream([
        { conversationId: 'conv-1', state: 'STREAMING', followupQuestion: { followupQuestion: 'Color?' } },
        { conversationId: '', followupQuestion: { followupQuestion: 'Which color?' } },
        { state: 'SUCCEEDED' },
      ]),
    );
    expect(reply.conversationId).toBe('conv-1');
    expect(reply.followupQuestion).toBe('Which color?');
    expect(reply.state).toBe('SUCCEEDED');
  });

  it('should union list fields in first-seen order', async () => {
    const reply = await accumulate(
      stream([
        { refinedSearch: [{ query: 'red lamp' }], userQueryTypes: ['SIMPLE_PRODUCT_SEARCH'] },
        {
          refinedSearch: [{ query: 'blue lamp' }, { query: 'red lamp' }, {}],
          userQueryTypes: ['SIMPLE_PRODUCT_SEARCH', 'INTENT_REFINEMENT'],
          followupQuestion: {
            suggestedAnswers: [
              { productAttributeValue: { value: 'red' } },
              { productAttributeValue: { value: 'red' } },
              { productAttributeValue: {} },
            ],
          },
        },
      ]),
    );
    expect(reply.refinedQueries).toEqual(['red lamp', 'blue lamp']);
    expect(reply.userQueryTypes).toEqual(['SIMPLE_PRODUCT_SEARCH', 'INTENT_REFINEMENT']);
    expect(reply.suggestedAnswers).toEqual(['red']);
  });

  it('should produce an empty reply for an empty stream', async () => {
    expect(await accumulate(stream([]))).toEqual({
      text: '',
      conversationId: undefined,
      followupQuestion: undefined,
      suggestedAnswers: [],
      refinedQueries: [],
      userQueryTypes: [],
      state: undefined,
    });
  });

  it('should count fragments and return independent copies', () => {
    const acc = new ResponseAccumulator();
    acc.push({ refinedSearch: [{ query: 'a' }] });
    acc.push({});
    const first = acc.result();
    first.refinedQueries.push('mutated');
    expect(acc.fragmentCount).toBe(2);
    expect(acc.result().refinedQueries).toEqual(['a']);
  });
});
