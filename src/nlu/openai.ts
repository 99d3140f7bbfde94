import { OpenAI } from 'openai';
import { faqData, faqFallback, findFaqAnswer } from '../logic/faq';
import { errorMessage } from '../utils/errors';
import { childLogger } from '../utils/logger';

const log = childLogger('replies');

const systemPrompt = `You are the assistant of a lending and career service. Answer briefly and politely in the user's language. Only use the facts below; if you do not know the answer, say that the team will follow up. Never promise approval, rates or amounts.
Services: ${faqData.services.join(', ')}.
FAQ:
${faqData.faqs.map((item) => `- ${item.answer}`).join('\n')}`;

export interface ReplyRequest {
  question: string;
  recentTurns: string[];
  language: string;
}

export interface ReplyGenerator {
  readonly usesModel: boolean;
  generate(request: ReplyRequest, signal?: AbortSignal): Promise<string>;
}

export interface ReplyGeneratorOptions {
  apiKey?: string;
  model?: string;
}

const cannedReply = (question: string): string => findFaqAnswer(question) ?? faqFallback;

export const createReplyGenerator = ({ apiKey, model = 'gpt-4o-mini' }: ReplyGeneratorOptions = {}): ReplyGenerator => {
  const client = apiKey ? new OpenAI({ apiKey }) : undefined;

  const generate = async (request: ReplyRequest, signal?: AbortSignal): Promise<string> => {
    if (!client) {
      return cannedReply(request.question);
    }

    const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [
      { role: 'system', content: `${systemPrompt}\nReply language: ${request.language}.` },
    ];
    request.recentTurns.slice(-6).forEach((turn) => {
      messages.push({ role: 'user', content: turn });
    });
    messages.push({ role: 'user', content: request.question });

    try {
      const completion = await client.chat.completions.create({ model, temperature: 0.2, messages }, { signal });
      const content = completion.choices[0]?.message?.content;
      return content?.trim() || cannedReply(request.question);
    } catch (error) {
      if (signal?.aborted) {
        throw error;
      }
      log.warn(`Model reply failed, using canned answer: ${errorMessage(error)}`);
      return cannedReply(request.question);
    }
  };

  return { usesModel: Boolean(client), generate };
};
