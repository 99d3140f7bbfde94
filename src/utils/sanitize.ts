const dangerousPattern = /[<>\\{}\[\]\^`]/g;
// eslint-disable-next-line no-control-regex
const controlPattern = /[\u0000-\u0008\u000b\u000c\u000e-\u001f\u007f]/g;

export const MAX_INPUT_LENGTH = 2000;

export const sanitizeInput = (input: string, maxLength = MAX_INPUT_LENGTH): string =>
  input.replace(controlPattern, '').replace(dangerousPattern, '').replace(/\s+/g, ' ').trim().slice(0, maxLength);

export const normalizeForMatching = (input: string): string => input.toLowerCase().replace(/\s+/g, ' ').trim();

export const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
