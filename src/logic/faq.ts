import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { wholeWord } from '../nlu/patterns';
import { normalizeForMatching, sanitizeInput } from '../utils/sanitize';

const FaqSchema = z.object({
  services: z.array(z.string()),
  contact: z.object({
    email: z.string(),
    hours: z.string(),
  }),
  faqs: z.array(
    z.object({
      keywords: z.array(z.string().min(1)).min(1),
      answer: z.string().min(1),
    }),
  ),
});

export type FaqData = z.infer<typeof FaqSchema>;

export const loadFaq = (filePath = path.join(__dirname, '../../data/faq.json')): FaqData => {
  const raw = fs.readFileSync(filePath, 'utf8');
  return FaqSchema.parse(JSON.parse(raw));
};

export const faqData = loadFaq();

export const findFaqAnswer = (question: string, data: FaqData = faqData): string | undefined => {
  const normalized = normalizeForMatching(sanitizeInput(question));
  const direct = data.faqs.find((item) => item.keywords.some((keyword) => wholeWord(keyword).test(normalized)));
  if (direct) {
    return direct.answer;
  }

  if (/\b(services?|offer)\b/.test(normalized)) {
    return `We currently help with ${data.services.join(', ')}.`;
  }

  if (/\b(contact|email|phone|reach you)\b/.test(normalized)) {
    return `You can reach our team at ${data.contact.email} (${data.contact.hours}).`;
  }

  return undefined;
};

export const faqFallback = "I don't have that information yet. Would you like me to connect you with someone from our team?";
