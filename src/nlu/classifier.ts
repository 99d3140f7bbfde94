import { randomUUID } from 'crypto';
import {
  Clock,
  ConfidenceLevel,
  ContextData,
  Intent,
  IntentContext,
  IntentPattern,
  IntentType,
  MultiIntentResult,
  Sentiment,
} from '../types';
import { InputError } from '../utils/errors';
import { childLogger } from '../utils/logger';
import { normalizeForMatching, sanitizeInput } from '../utils/sanitize';
import { CompiledPattern, PatternLibrary, compilePattern, loadPatternLibrary, parsePattern, wholeWord } from './patterns';

const log = childLogger('classifier');

export interface ClassifierOptions {
  minConfidence?: number;
  multiIntentThreshold?: number;
  clarificationMargin?: number;
  topicBonus?: number;
  frequentIntentBonus?: number;
  defaultLanguage?: string;
  now?: Clock;
}

export interface IntentScore {
  type: IntentType;
  score: number;
}

export interface PatternCounts {
  keywords: number;
  phrases: number;
  regexes: number;
  entities: number;
}

export interface ClassifierStatistics {
  totalPatterns: number;
  patternsByType: Partial<Record<IntentType, PatternCounts>>;
  totalKeywords: number;
  totalPhrases: number;
  totalRegexes: number;
  totalEntityPatterns: number;
  minConfidence: number;
  multiIntentThreshold: number;
}

const CONFIDENCE_BUCKETS: Array<[number, ConfidenceLevel]> = [
  [0.9, 'very_high'],
  [0.75, 'high'],
  [0.5, 'medium'],
  [0.3, 'low'],
];

export const confidenceLevelFor = (score: number): ConfidenceLevel => {
  for (const [threshold, level] of CONFIDENCE_BUCKETS) {
    if (score >= threshold) {
      return level;
    }
  }
  return 'very_low';
};

const round = (value: number): number => Math.round(value * 10_000) / 10_000;

const countMatches = (matchers: RegExp[], text: string): number =>
  matchers.reduce((count, matcher) => (matcher.test(text) ? count + 1 : count), 0);

const signalRatio = (matches: number, saturation: number): number =>
  saturation > 0 ? Math.min(matches, saturation) / saturation : 0;

const newIntentId = (): string => `intent_${randomUUID().replace(/-/g, '').slice(0, 12)}`;

export class IntentClassifier {
  private patterns = new Map<IntentType, CompiledPattern>();
  private positiveTerms: RegExp[];
  private negativeTerms: RegExp[];
  private readonly minConfidence: number;
  private readonly multiIntentThreshold: number;
  private readonly clarificationMargin: number;
  private readonly topicBonus: number;
  private readonly frequentIntentBonus: number;
  private readonly defaultLanguage: string;
  private readonly now: Clock;

  constructor(library: PatternLibrary = loadPatternLibrary(), options: ClassifierOptions = {}) {
    library.patterns.forEach((pattern) => this.patterns.set(pattern.intentType, compilePattern(pattern)));
    this.positiveTerms = library.sentiment.positive.map(wholeWord);
    this.negativeTerms = library.sentiment.negative.map(wholeWord);
    this.minConfidence = options.minConfidence ?? 0.3;
    this.multiIntentThreshold = options.multiIntentThreshold ?? 0.6;
    this.clarificationMargin = options.clarificationMargin ?? 0.15;
    this.topicBonus = options.topicBonus ?? 0.1;
    this.frequentIntentBonus = options.frequentIntentBonus ?? 0.05;
    this.defaultLanguage = options.defaultLanguage ?? 'en';
    this.now = options.now ?? Date.now;
  }

  /**
   * Scores a sanitised copy of the text (markup and control characters removed,
   * whitespace collapsed, cut to `MAX_INPUT_LENGTH`); the intent keeps the text
   * exactly as given.
   */
  classify(text: string, context?: IntentContext): Intent {
    const input = this.requireText(text);
    const cleaned = sanitizeInput(input);
    if (!cleaned) {
      return this.unknownIntent(input, cleaned, 0, context);
    }

    const scores = this.scoreAll(cleaned, context);
    const best = scores.reduce<IntentScore | undefined>(
      (top, candidate) => (!top || candidate.score > top.score ? candidate : top),
      undefined,
    );

    if (!best || best.score < this.minConfidence) {
      log.debug(`No intent above ${this.minConfidence} (best=${best?.type ?? 'none'}:${best?.score ?? 0})`);
      return this.unknownIntent(input, cleaned, best?.score ?? 0, context);
    }

    return this.buildIntent(input, cleaned, best, context);
  }

  classifyMulti(text: string, context?: IntentContext): MultiIntentResult {
    const input = this.requireText(text);
    const cleaned = sanitizeInput(input);
    const candidates = cleaned
      ? this.scoreAll(cleaned, context)
          .filter((candidate) => candidate.score >= this.multiIntentThreshold)
          .sort((a, b) => b.score - a.score)
      : [];

    if (candidates.length === 0) {
      const primary = this.unknownIntent(input, cleaned, 0, context);
      return {
        primary,
        secondary: [],
        executionOrder: [primary.id],
        requiresClarification: true,
      };
    }

    const intents = candidates.map((candidate) => this.buildIntent(input, cleaned, candidate, context));
    const [primary, ...secondary] = intents;
    const requiresClarification =
      candidates.length > 1 && round(candidates[0].score - candidates[1].score) < this.clarificationMargin;

    return {
      primary,
      secondary,
      executionOrder: intents.map((intent) => intent.id),
      requiresClarification,
    };
  }

  /**
   * Scores every registered pattern in library order. Each signal contributes
   * `min(matches, saturation) / saturation * weight`; context bonuses are added
   * before the score is capped at 1.
   */
  scoreAll(text: string, context?: IntentContext): IntentScore[] {
    const normalized = normalizeForMatching(text);
    const scores: IntentScore[] = [];

    for (const [type, pattern] of this.patterns) {
      const { weights } = pattern.source;
      let score = 0;
      score += signalRatio(countMatches(pattern.keywords, normalized), pattern.saturation.keyword) * weights.keyword;
      score += signalRatio(countMatches(pattern.phrases, normalized), pattern.saturation.phrase) * weights.phrase;
      score += signalRatio(countMatches(pattern.regexes, text), pattern.saturation.regex) * weights.regex;

      if (context) {
        score += this.contextBonus(type, context);
      }

      scores.push({ type, score: round(Math.min(1, score)) });
    }

    return scores;
  }

  extractEntities(text: string, type: IntentType): ContextData {
    const pattern = this.patterns.get(type);
    const entities: ContextData = {};
    if (!pattern) {
      return entities;
    }
    for (const [name, matcher] of pattern.entities) {
      const match = matcher.exec(text);
      if (match) {
        entities[name] = match[1] ?? match[0];
      }
    }
    return entities;
  }

  detectSentiment(text: string): Sentiment {
    const normalized = normalizeForMatching(text);
    const positive = countMatches(this.positiveTerms, normalized);
    const negative = countMatches(this.negativeTerms, normalized);
    if (positive > negative) return 'positive';
    if (negative > positive) return 'negative';
    return 'neutral';
  }

  addPattern(input: IntentPattern): void {
    const pattern = parsePattern(input);
    this.patterns.set(pattern.intentType, compilePattern(pattern));
    log.info(`Pattern registered for intent type ${pattern.intentType}`);
  }

  removePattern(type: IntentType): boolean {
    const removed = this.patterns.delete(type);
    if (removed) {
      log.info(`Pattern removed for intent type ${type}`);
    }
    return removed;
  }

  getPatterns(): IntentPattern[] {
    return Array.from(this.patterns.values(), (pattern) => structuredClone(pattern.source));
  }

  getStatistics(): ClassifierStatistics {
    const patternsByType: Partial<Record<IntentType, PatternCounts>> = {};
    const totals: PatternCounts = { keywords: 0, phrases: 0, regexes: 0, entities: 0 };
    for (const [type, pattern] of this.patterns) {
      const counts: PatternCounts = {
        keywords: pattern.keywords.length,
        phrases: pattern.phrases.length,
        regexes: pattern.regexes.length,
        entities: pattern.entities.length,
      };
      patternsByType[type] = counts;
      totals.keywords += counts.keywords;
      totals.phrases += counts.phrases;
      totals.regexes += counts.regexes;
      totals.entities += counts.entities;
    }

    return {
      totalPatterns: this.patterns.size,
      patternsByType,
      totalKeywords: totals.keywords,
      totalPhrases: totals.phrases,
      totalRegexes: totals.regexes,
      totalEntityPatterns: totals.entities,
      minConfidence: this.minConfidence,
      multiIntentThreshold: this.multiIntentThreshold,
    };
  }

  private contextBonus(type: IntentType, context: IntentContext): number {
    let bonus = 0;
    if (context.currentTopic === type) {
      bonus += this.topicBonus;
    }
    const frequent = context.preferences.frequentIntents;
    if (Array.isArray(frequent) && frequent.includes(type)) {
      bonus += this.frequentIntentBonus;
    }
    return bonus;
  }

  private buildIntent(input: string, cleaned: string, candidate: IntentScore, context?: IntentContext): Intent {
    return Object.freeze({
      id: newIntentId(),
      type: candidate.type,
      confidence: candidate.score,
      confidenceLevel: confidenceLevelFor(candidate.score),
      text: input,
      entities: Object.freeze(this.extractEntities(cleaned, candidate.type)),
      parameters: Object.freeze({}),
      language: context?.language ?? this.defaultLanguage,
      sentiment: this.detectSentiment(cleaned),
      timestamp: this.now(),
    });
  }

  private unknownIntent(input: string, cleaned: string, score: number, context?: IntentContext): Intent {
    return Object.freeze({
      id: newIntentId(),
      type: 'unknown',
      confidence: score,
      confidenceLevel: confidenceLevelFor(score),
      text: input,
      entities: Object.freeze({}),
      parameters: Object.freeze({}),
      language: context?.language ?? this.defaultLanguage,
      sentiment: cleaned ? this.detectSentiment(cleaned) : undefined,
      timestamp: this.now(),
    });
  }

  private requireText(text: unknown): string {
    if (typeof text !== 'string') {
      throw new InputError('Classifier input must be a string', { receivedType: typeof text });
    }
    return text;
  }
}
