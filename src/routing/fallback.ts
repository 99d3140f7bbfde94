import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import {
  Clock,
  ConfidenceLevel,
  FallbackResult,
  FallbackStrategy,
  Intent,
  IntentContext,
  IntentType,
  isIntentType,
} from '../types';
import { errorMessage } from '../utils/errors';
import { childLogger } from '../utils/logger';

const log = childLogger('fallback');

export const DEFAULT_FALLBACK_MESSAGES_PATH = path.join(__dirname, '../../data/fallback-messages.json');

const intentKeyed = <T extends z.ZodTypeAny>(value: T) =>
  z.record(value).refine((record) => Object.keys(record).every(isIntentType), {
    message: 'Keys must be intent types',
  });

const MessageBlockSchema = z.object({
  response: z.string().min(1),
  actions: z.array(z.string().min(1)),
});

const FallbackMessagesSchema = z.object({
  clarificationPrefix: z.string(),
  clarifications: intentKeyed(z.array(z.string().min(1)).min(1)),
  genericClarifications: z.array(z.string().min(1)).min(1),
  defaultResponses: intentKeyed(z.string().min(1)),
  genericDefault: z.string().min(1),
  history: MessageBlockSchema,
  escalation: MessageBlockSchema,
  options: MessageBlockSchema,
});

export type FallbackMessages = z.infer<typeof FallbackMessagesSchema>;

export const loadFallbackMessages = (filePath: string = DEFAULT_FALLBACK_MESSAGES_PATH): FallbackMessages =>
  FallbackMessagesSchema.parse(JSON.parse(fs.readFileSync(filePath, 'utf8')));

export interface FallbackOptions {
  defaultStrategy?: FallbackStrategy;
  enableHistoryFallback?: boolean;
  enableEscalation?: boolean;
  escalationThreshold?: number;
  messages?: FallbackMessages;
  now?: Clock;
}

const WEAK_LEVELS: ConfidenceLevel[] = ['low', 'very_low'];
const ESCALATION_WINDOW = 5;
const HISTORY_WINDOW = 3;

const fillTopic = (template: string, topic: IntentType): string => template.split('{topic}').join(topic);

const toMap = <T>(record: Record<string, T>): Map<IntentType, T> => {
  const map = new Map<IntentType, T>();
  for (const [key, value] of Object.entries(record)) {
    if (isIntentType(key)) {
      map.set(key, value);
    }
  }
  return map;
};

// Most frequent type among the given intents; ties go to the most recent one.
export const mostFrequentType = (intents: Intent[]): IntentType | undefined => {
  const counts = new Map<IntentType, number>();
  intents.forEach((intent) => counts.set(intent.type, (counts.get(intent.type) ?? 0) + 1));
  let best: IntentType | undefined;
  let bestCount = 0;
  for (let index = intents.length - 1; index >= 0; index -= 1) {
    const type = intents[index].type;
    const count = counts.get(type) ?? 0;
    if (count > bestCount) {
      best = type;
      bestCount = count;
    }
  }
  return best;
};

export class FallbackHandler {
  private readonly defaultStrategy: FallbackStrategy;
  private readonly enableHistoryFallback: boolean;
  private readonly enableEscalation: boolean;
  private readonly escalationThreshold: number;
  private readonly messages: FallbackMessages;
  private readonly clarifications: Map<IntentType, string[]>;
  private readonly defaultResponses: Map<IntentType, string>;
  private readonly now: Clock;

  constructor(options: FallbackOptions = {}) {
    this.defaultStrategy = options.defaultStrategy ?? 'ask_clarification';
    this.enableHistoryFallback = options.enableHistoryFallback ?? true;
    this.enableEscalation = options.enableEscalation ?? true;
    this.escalationThreshold = options.escalationThreshold ?? 3;
    this.messages = options.messages ?? loadFallbackMessages();
    this.clarifications = toMap(this.messages.clarifications);
    this.defaultResponses = toMap(this.messages.defaultResponses);
    this.now = options.now ?? Date.now;
  }

  handle(intent: Intent, context?: IntentContext): FallbackResult {
    const strategy = this.selectStrategy(intent, context);
    log.warn(`Fallback ${strategy} for intent ${intent.type} (confidence=${intent.confidence})`);
    try {
      return this.execute(strategy, intent, context);
    } catch (error) {
      log.error(`Fallback strategy ${strategy} failed: ${errorMessage(error)}`);
      return {
        strategy,
        intent,
        handled: false,
        response: this.messages.genericDefault,
        suggestedActions: [],
        timestamp: this.now(),
      };
    }
  }

  selectStrategy(intent: Intent, context?: IntentContext): FallbackStrategy {
    if (intent.confidenceLevel === 'very_low') {
      return 'ask_clarification';
    }
    if (intent.type === 'unknown') {
      return 'provide_options';
    }
    if (context && this.enableHistoryFallback && context.history.length > 0) {
      return 'use_history';
    }
    if (context && this.enableEscalation) {
      const weak = context.history
        .slice(-ESCALATION_WINDOW)
        .filter((previous) => WEAK_LEVELS.includes(previous.confidenceLevel)).length;
      if (weak >= this.escalationThreshold) {
        return 'escalate_to_human';
      }
    }
    return this.defaultStrategy;
  }

  setDefaultResponse(type: IntentType, response: string): void {
    this.defaultResponses.set(type, response);
  }

  getDefaultResponse(type: IntentType): string | undefined {
    return this.defaultResponses.get(type);
  }

  private execute(strategy: FallbackStrategy, intent: Intent, context?: IntentContext): FallbackResult {
    switch (strategy) {
      case 'ask_clarification':
        return this.askClarification(intent);
      case 'use_default':
        return this.useDefault(intent);
      case 'use_history':
        return this.useHistory(intent, context);
      case 'escalate_to_human':
        return this.result(strategy, intent, this.messages.escalation.response, this.messages.escalation.actions);
      case 'provide_options':
        return this.result(strategy, intent, this.messages.options.response, this.messages.options.actions);
    }
  }

  private askClarification(intent: Intent): FallbackResult {
    const options = this.clarifications.get(intent.type) ?? this.messages.genericClarifications;
    const result = this.result(
      'ask_clarification',
      intent,
      `${this.messages.clarificationPrefix} ${options[0]}`.trim(),
      [],
    );
    return { ...result, clarificationOptions: [...options] };
  }

  private useDefault(intent: Intent): FallbackResult {
    const response = this.defaultResponses.get(intent.type) ?? this.messages.genericDefault;
    return this.result('use_default', intent, response, []);
  }

  private useHistory(intent: Intent, context?: IntentContext): FallbackResult {
    const inferred = context ? mostFrequentType(context.history.slice(-HISTORY_WINDOW)) : undefined;
    if (!inferred) {
      return this.useDefault(intent);
    }
    const { response, actions } = this.messages.history;
    const result = this.result(
      'use_history',
      intent,
      fillTopic(response, inferred),
      actions.map((action) => fillTopic(action, inferred)),
    );
    return { ...result, inferredIntent: inferred };
  }

  private result(strategy: FallbackStrategy, intent: Intent, response: string, actions: string[]): FallbackResult {
    return {
      strategy,
      intent,
      handled: true,
      response,
      suggestedActions: [...actions],
      timestamp: this.now(),
    };
  }
}
