import { ContextValue } from '../types';

// Trimmed string entity or context value; blanks and non-strings read as missing.
export const text = (value: ContextValue | undefined): string | undefined =>
  typeof value === 'string' && value.trim() ? value.trim() : undefined;
