import { RouteHandler } from '../types';
import { ReplyGenerator } from '../nlu/openai';
import { sanitizeInput } from '../utils/sanitize';
import { text } from './text';

const MENU = [
  'Apply for a loan',
  'Check collateral requirements',
  'View credit history',
  'Upload documents',
  'Analyze LinkedIn profile',
  'Find job matches',
  'Get skill recommendations',
];

export const greetingHandler: RouteHandler = {
  execute: (_intent, context) => ({
    message:
      context && context.interactionCount > 0
        ? 'Hello again! What would you like to do next?'
        : 'Hello! I can help with loans, credit checks, documents and your career. What would you like to do?',
    suggestedActions: MENU.slice(0, 4),
  }),
};

export const helpHandler: RouteHandler = {
  execute: () => ({
    message: 'Here is what I can help you with:',
    suggestedActions: [...MENU, 'Check application status'],
  }),
};

export const statusHandler: RouteHandler = {
  execute: (intent, context) => {
    const applicationId = text(intent.entities.applicationId) ?? text(context?.contextData.applicationId);
    if (!applicationId) {
      return {
        message: 'Which application would you like to check? Please share the reference, for example APP-12345.',
        followupIntent: 'status',
      };
    }
    return {
      message: `Application ${applicationId.toUpperCase()} is with our review team. We'll notify you as soon as its status changes.`,
      data: { applicationId: applicationId.toUpperCase() },
      contextUpdates: { applicationId: applicationId.toUpperCase() },
    };
  },
};

export const settingsHandler: RouteHandler = {
  execute: (intent) => {
    const language = text(intent.entities.language);
    if (language) {
      return {
        message: `Done. I'll use ${language} from now on.`,
        contextUpdates: { preferredLanguage: language.toLowerCase() },
      };
    }
    return {
      message: 'Which setting would you like to change? You can update your language or notifications.',
      followupIntent: 'settings',
    };
  },
};

export const feedbackHandler: RouteHandler = {
  execute: (intent) => {
    const rating = text(intent.entities.rating);
    const thanks =
      intent.sentiment === 'negative'
        ? "I'm sorry the experience wasn't better. I've shared your feedback with the team."
        : 'Thank you for the feedback!';
    return {
      message: thanks,
      data: rating ? { rating: Number(rating) } : undefined,
      contextUpdates: { lastFeedbackSentiment: intent.sentiment ?? 'neutral' },
    };
  },
};

export const createQuestionHandler = (replies: ReplyGenerator): RouteHandler => ({
  execute: async (intent, context, { signal }) => {
    const recentTurns = (context?.history ?? []).slice(-6).map((previous) => sanitizeInput(previous.text));
    const message = await replies.generate(
      { question: sanitizeInput(intent.text), recentTurns, language: context?.language ?? intent.language },
      signal,
    );
    return {
      message,
      data: { generated: replies.usesModel },
    };
  },
});
