import { ContextData, ContextValue, Intent, IntentContext, RouteHandler, RouteResponse } from '../types';
import { text } from './text';

type LoanField = 'loanType' | 'loanAmount';

const REQUIRED_FIELDS: LoanField[] = ['loanType', 'loanAmount'];

const prompts: Record<LoanField, string> = {
  loanType: 'What type of loan are you interested in? (business, personal, auto, home, student or mortgage)',
  loanAmount: 'How much would you like to borrow? For example: $25,000.',
};

const asText = (value: ContextValue | undefined): string | undefined =>
  text(value) ?? (typeof value === 'number' ? String(value) : undefined);

const parseAmount = (raw: string | undefined): number | undefined => {
  if (!raw) return undefined;
  const amount = Number(raw.replace(/[$,\s]/g, ''));
  return Number.isFinite(amount) && amount > 0 ? amount : undefined;
};

const formatAmount = (amount: number): string =>
  `$${amount.toLocaleString('en-US', { maximumFractionDigits: 2 })}`;

export interface LoanDraft {
  loanType?: string;
  loanAmount?: number;
  loanTerm?: string;
}

// Entities from the current turn win over values collected earlier in the session.
export const collectLoanDraft = (intent: Intent, context?: IntentContext): LoanDraft => {
  const stored = context?.contextData ?? {};
  const storedAmount = stored.loanAmount;
  return {
    loanType: asText(intent.entities.loanType)?.toLowerCase() ?? asText(stored.loanType),
    loanAmount: parseAmount(asText(intent.entities.amount)) ?? (typeof storedAmount === 'number' ? storedAmount : undefined),
    loanTerm: asText(intent.entities.term) ?? asText(stored.loanTerm),
  };
};

const draftUpdates = (draft: LoanDraft): ContextData => {
  const updates: ContextData = {};
  if (draft.loanType) updates.loanType = draft.loanType;
  if (draft.loanAmount !== undefined) updates.loanAmount = draft.loanAmount;
  if (draft.loanTerm) updates.loanTerm = draft.loanTerm;
  return updates;
};

export const handleLoanApplication = (intent: Intent, context?: IntentContext): RouteResponse => {
  const draft = collectLoanDraft(intent, context);
  const missing = REQUIRED_FIELDS.filter((field) => draft[field] === undefined);
  const contextUpdates = draftUpdates(draft);

  if (missing.length > 0) {
    const nextField = missing[0];
    const noted = draft.loanType ? `Great, a ${draft.loanType} loan. ` : '';
    return {
      message: `${noted}${prompts[nextField]}`,
      data: { missingFields: missing },
      followupIntent: 'loan_application',
      contextUpdates: { ...contextUpdates, loanStage: 'collecting' },
    };
  }

  const amount = draft.loanAmount === undefined ? '' : formatAmount(draft.loanAmount);
  const term = draft.loanTerm ? ` over ${draft.loanTerm}` : '';
  return {
    message: `Here is what I noted: a ${draft.loanType} loan of ${amount}${term}. The next step is to upload your documents so a loan officer can review the application.`,
    data: { ...contextUpdates },
    suggestedActions: ['Upload documents', 'Check collateral requirements', 'Check my credit score'],
    contextUpdates: { ...contextUpdates, loanStage: 'ready_for_documents' },
  };
};

export const loanApplicationHandler: RouteHandler = {
  execute: (intent, context) => handleLoanApplication(intent, context),
};
