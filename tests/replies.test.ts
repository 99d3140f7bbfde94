import { faqData, faqFallback, findFaqAnswer } from '../src/logic/faq';
import { createReplyGenerator } from '../src/nlu/openai';

describe('findFaqAnswer', () => {
  it('answers from the first FAQ whose keyword appears', () => {
    expect(findFaqAnswer('Can you explain how interest rates work?')).toBe(faqData.faqs[0].answer);
    expect(findFaqAnswer('What documents do I need?')).toBe(
      'You usually need a government ID, your last two bank statements, a recent pay stub or tax return, and proof of income.',
    );
  });

  it('lists services and contact details', () => {
    expect(findFaqAnswer('What services do you offer?')).toBe(
      'We currently help with business, personal, auto, home and student loans, collateral valuation, credit history checks, document collection, profile analysis, job matching, skill recommendations.',
    );
    expect(findFaqAnswer('How can I contact you?')).toBe(
      'You can reach our team at support@example.com (Monday to Friday, 9am to 6pm).',
    );
  });

  it('matches keywords as whole words only', () => {
    expect(findFaqAnswer('What is the APR on a car loan?')).toBe(faqData.faqs[0].answer);
    expect(findFaqAnswer('Is the April promotion still running?')).toBeUndefined();
  });

  it('returns undefined for questions it cannot answer', () => {
    expect(findFaqAnswer("What's the weather like?")).toBeUndefined();
  });
});

describe('createReplyGenerator', () => {
  it('answers from the FAQ when no API key is configured', async () => {
    const replies = createReplyGenerator();

    expect(replies.usesModel).toBe(false);
    await expect(
      replies.generate({ question: 'How long does approval take?', recentTurns: [], language: 'en' }),
    ).resolves.toBe('Most applications are reviewed within three business days after all documents are uploaded.');
    await expect(replies.generate({ question: 'Tell me a joke', recentTurns: [], language: 'en' })).resolves.toBe(
      faqFallback,
    );
  });

  it('reports that a model is used when a key is configured', () => {
    expect(createReplyGenerator({ apiKey: 'test-secret' }).usesModel).toBe(true);
  });
});
