import { RouteHandler } from '../types';
import { ReplyGenerator } from '../nlu/openai';
import { RouteDefinition, RouteRegistry } from '../routing/registry';
import {
  createQuestionHandler,
  feedbackHandler,
  greetingHandler,
  helpHandler,
  settingsHandler,
  statusHandler,
} from './assistant';
import { jobMatchingHandler, profileAnalysisHandler, skillRecommendationHandler } from './career';
import { collateralCheckHandler, creditHistoryHandler, documentUploadHandler, loanDocumentUploadHandler } from './finance';
import { loanApplicationHandler } from './loan';

export const defaultRoutes = (replies: ReplyGenerator): Array<[RouteDefinition, RouteHandler]> => [
  [{ id: 'assistant.greeting', intentType: 'greeting', priority: 1, tags: ['assistant'] }, greetingHandler],
  [{ id: 'assistant.help', intentType: 'help', priority: 1, minConfidence: 0.3, tags: ['assistant'] }, helpHandler],
  [
    { id: 'assistant.question', intentType: 'question', priority: 5, minConfidence: 0.4, tags: ['assistant'] },
    createQuestionHandler(replies),
  ],
  [{ id: 'assistant.status', intentType: 'status', priority: 1, tags: ['assistant', 'loans'] }, statusHandler],
  [{ id: 'assistant.settings', intentType: 'settings', priority: 1, tags: ['assistant'] }, settingsHandler],
  [{ id: 'assistant.feedback', intentType: 'feedback', priority: 1, minConfidence: 0.4, tags: ['assistant'] }, feedbackHandler],
  [
    {
      id: 'loans.application',
      intentType: 'loan_application',
      priority: 1,
      tags: ['loans'],
      description: 'Collects loan type and amount across turns',
    },
    loanApplicationHandler,
  ],
  [{ id: 'loans.collateral', intentType: 'collateral_check', priority: 1, tags: ['loans'] }, collateralCheckHandler],
  [
    { id: 'loans.credit-history', intentType: 'credit_history', priority: 1, requiresAuth: true, tags: ['loans'] },
    creditHistoryHandler,
  ],
  [
    {
      id: 'documents.loan',
      intentType: 'document_upload',
      priority: 1,
      requiredContextKeys: ['loanType'],
      tags: ['loans', 'documents'],
      description: 'Attaches documents to an application in progress',
    },
    loanDocumentUploadHandler,
  ],
  [
    { id: 'documents.generic', intentType: 'document_upload', priority: 2, tags: ['documents'] },
    documentUploadHandler,
  ],
  [{ id: 'career.profile', intentType: 'profile_analysis', priority: 1, tags: ['career'] }, profileAnalysisHandler],
  [{ id: 'career.jobs', intentType: 'job_matching', priority: 1, tags: ['career'] }, jobMatchingHandler],
  [{ id: 'career.skills', intentType: 'skill_recommendation', priority: 1, tags: ['career'] }, skillRecommendationHandler],
];

export const registerDefaultRoutes = (registry: RouteRegistry, replies: ReplyGenerator): void => {
  defaultRoutes(replies).forEach(([route, handler]) => registry.register(route, handler));
};
