import { confidenceLevelFor } from '../src/nlu/classifier';
import { ContextData, Intent, IntentContext, IntentType, RouteHandler, RouteResponse } from '../src/types';

let counter = 0;

export const makeIntent = (type: IntentType, confidence = 0.9, overrides: Partial<Intent> = {}): Intent => {
  counter += 1;
  return {
    id: `intent_test${counter}`,
    type,
    confidence,
    confidenceLevel: confidenceLevelFor(confidence),
    text: `text for ${type}`,
    entities: {},
    parameters: {},
    language: 'en',
    timestamp: 0,
    ...overrides,
  };
};

export const makeContext = (overrides: Partial<IntentContext> = {}): IntentContext => ({
  sessionId: 'session-local',
  history: [],
  contextData: {},
  preferences: {},
  language: 'en',
  createdAt: 0,
  lastInteraction: 0,
  interactionCount: 0,
  ...overrides,
});

export const replyWith = (message: string, contextUpdates?: ContextData): RouteHandler => ({
  execute: (): RouteResponse => ({ message, contextUpdates }),
});

export class ManualClock {
  constructor(public current = Date.UTC(2024, 0, 15, 10, 0, 0)) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

export const MINUTE = 60 * 1000;
export const HOUR = 60 * MINUTE;
