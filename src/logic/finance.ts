import { RouteHandler } from '../types';
import { text } from './text';

export const collateralCheckHandler: RouteHandler = {
  execute: (intent) => {
    const assetType = text(intent.entities.assetType);
    if (!assetType) {
      return {
        message: 'Which asset would you like to offer as collateral? (property, vehicle, equipment, inventory or securities)',
        followupIntent: 'collateral_check',
      };
    }
    return {
      message: `Thanks. We will schedule a valuation of your ${assetType}. Please have the ownership documents ready.`,
      data: { assetType },
      suggestedActions: ['Upload documents', 'Apply for a loan'],
      contextUpdates: { collateralAsset: assetType },
    };
  },
};

export const creditHistoryHandler: RouteHandler = {
  execute: (intent) => {
    const bureau = text(intent.entities.bureau);
    const source = bureau ? ` from ${bureau.charAt(0).toUpperCase()}${bureau.slice(1)}` : '';
    return {
      message: `I've requested your credit report${source}. You'll see your score and open accounts once it arrives.`,
      data: bureau ? { bureau } : undefined,
      suggestedActions: ['Apply for a loan', 'Get help'],
      contextUpdates: { creditCheckRequested: true },
    };
  },
};

export const loanDocumentUploadHandler: RouteHandler = {
  execute: (intent, context) => {
    const loanType = text(context?.contextData.loanType) ?? 'loan';
    const documentType = text(intent.entities.documentType);
    const document = documentType ? `your ${documentType}` : 'your document';
    return {
      message: `I'll attach ${document} to your ${loanType} application. You can upload it using the secure link we sent you.`,
      data: { loanType, ...(documentType ? { documentType } : {}) },
      contextUpdates: documentType ? { lastDocumentType: documentType } : undefined,
    };
  },
};

export const documentUploadHandler: RouteHandler = {
  execute: (intent) => {
    const documentType = text(intent.entities.documentType);
    return {
      message: documentType
        ? `You can upload your ${documentType} using the secure link we sent you.`
        : 'Which document would you like to upload? (tax return, bank statement, pay stub, ID)',
      followupIntent: documentType ? undefined : 'document_upload',
      contextUpdates: documentType ? { lastDocumentType: documentType } : undefined,
    };
  },
};
