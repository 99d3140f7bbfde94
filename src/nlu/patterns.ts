import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { INTENT_TYPES, IntentPattern, IntentType, SignalWeights } from '../types';
import { PatternValidationError, errorMessage } from '../utils/errors';
import { escapeRegExp } from '../utils/sanitize';

export const DEFAULT_WEIGHTS: SignalWeights = { keyword: 0.3, phrase: 0.5, regex: 0.2 };

export const DEFAULT_PATTERNS_PATH = path.join(__dirname, '../../data/intent-patterns.json');

const saturationValue = z.number().int().positive().optional();

export const IntentPatternSchema = z.object({
  intentType: z
    .enum(INTENT_TYPES)
    .refine((type) => type !== 'unknown' && type !== 'multi_intent' && type !== 'clarification_needed', {
      message: 'Patterns cannot target composite or unknown intent types',
    }),
  keywords: z.array(z.string().trim().min(1)).default([]),
  phrases: z.array(z.string().trim().min(1)).default([]),
  regexes: z.array(z.string().min(1)).default([]),
  weights: z
    .object({
      keyword: z.number().min(0).max(1),
      phrase: z.number().min(0).max(1),
      regex: z.number().min(0).max(1),
    })
    .default(DEFAULT_WEIGHTS),
  saturation: z
    .object({ keyword: saturationValue, phrase: saturationValue, regex: saturationValue })
    .optional(),
  entityPatterns: z.record(z.string().min(1)).default({}),
});

const PatternFileSchema = z.object({
  patterns: z.array(IntentPatternSchema),
  sentiment: z
    .object({
      positive: z.array(z.string().min(1)).default([]),
      negative: z.array(z.string().min(1)).default([]),
    })
    .default({ positive: [], negative: [] }),
});

export interface SentimentLexicon {
  positive: string[];
  negative: string[];
}

export interface PatternLibrary {
  patterns: IntentPattern[];
  sentiment: SentimentLexicon;
}

export interface CompiledPattern {
  source: IntentPattern;
  keywords: RegExp[];
  phrases: RegExp[];
  regexes: RegExp[];
  entities: Array<[string, RegExp]>;
  saturation: SignalWeights;
}

const describeIssues = (error: z.ZodError): string =>
  error.issues.map((issue) => `${issue.path.join('.') || 'pattern'}: ${issue.message}`).join('; ');

export const parsePattern = (input: unknown): IntentPattern => {
  const parsed = IntentPatternSchema.safeParse(input);
  if (!parsed.success) {
    throw new PatternValidationError(`Invalid intent pattern: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
};

export const parsePatternLibrary = (input: unknown): PatternLibrary => {
  const parsed = PatternFileSchema.safeParse(input);
  if (!parsed.success) {
    throw new PatternValidationError(`Invalid pattern library: ${describeIssues(parsed.error)}`);
  }
  const seen = new Set<IntentType>();
  for (const pattern of parsed.data.patterns) {
    if (seen.has(pattern.intentType)) {
      throw new PatternValidationError(`Duplicate pattern for intent type ${pattern.intentType}`, {
        intentType: pattern.intentType,
      });
    }
    seen.add(pattern.intentType);
  }
  return parsed.data;
};

export const loadPatternLibrary = (filePath: string = DEFAULT_PATTERNS_PATH): PatternLibrary => {
  const raw = fs.readFileSync(filePath, 'utf8');
  return parsePatternLibrary(JSON.parse(raw));
};

// Keywords and phrases only match on word boundaries of the lowercased text.
export const wholeWord = (term: string): RegExp =>
  new RegExp(`(?<![a-z0-9])${escapeRegExp(term.toLowerCase().replace(/\s+/g, ' '))}(?![a-z0-9])`);

const compileRegex = (source: string, intentType: IntentType): RegExp => {
  try {
    return new RegExp(source, 'i');
  } catch (error) {
    throw new PatternValidationError(`Invalid regular expression for ${intentType}: ${source}`, {
      intentType,
      source,
      reason: errorMessage(error),
    });
  }
};

export const compilePattern = (pattern: IntentPattern): CompiledPattern => ({
  source: pattern,
  keywords: pattern.keywords.map(wholeWord),
  phrases: pattern.phrases.map(wholeWord),
  regexes: pattern.regexes.map((source) => compileRegex(source, pattern.intentType)),
  entities: Object.entries(pattern.entityPatterns).map(([name, source]): [string, RegExp] => [
    name,
    compileRegex(source, pattern.intentType),
  ]),
  saturation: {
    keyword: pattern.saturation?.keyword ?? pattern.keywords.length,
    phrase: pattern.saturation?.phrase ?? pattern.phrases.length,
    regex: pattern.saturation?.regex ?? pattern.regexes.length,
  },
});
