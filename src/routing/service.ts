import {
  Clock,
  ContextData,
  ContextValue,
  Intent,
  IntentContext,
  IntentPattern,
  IntentType,
  MultiIntentResult,
  Route,
  RouteHandler,
  RouteMetrics,
  RouteResult,
  TopRoutesMetric,
} from '../types';
import { AppConfig, config as appConfig } from '../config';
import { registerDefaultRoutes } from '../logic/routes';
import { ContextManager, ContextStatistics } from '../memory/contextManager';
import {
  ConfidenceStats,
  HistorySummary,
  HourlyVolume,
  IntentCount,
  IntentHistoryTracker,
  UserPatterns,
} from '../memory/historyTracker';
import { ClassifierStatistics, IntentClassifier } from '../nlu/classifier';
import { ReplyGenerator, createReplyGenerator } from '../nlu/openai';
import { InputError } from '../utils/errors';
import { KeyedLock } from '../utils/keyedLock';
import { childLogger } from '../utils/logger';
import { FallbackHandler } from './fallback';
import { RegistrySummary, RouteDefinition, RouteRegistry } from './registry';
import { IntentRouter, RouteValidation } from './router';

const log = childLogger('service');

const HOUR_MS = 60 * 60 * 1000;

export interface ClassifyOptions {
  sessionId?: string;
  userId?: string;
  detectMultiple?: boolean;
}

export interface RouteRequest {
  sessionId?: string;
  userId?: string;
  language?: string;
  authenticated?: boolean;
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface RoutedTurn extends RouteResult {
  sessionId: string;
  // False when the session expired before the turn could be stored.
  saved: boolean;
}

export interface MultiRoutedTurn {
  sessionId: string;
  saved: boolean;
  classification: MultiIntentResult;
  results: RouteResult[];
}

export interface HistoryQuery {
  userId?: string;
  intentType?: IntentType;
  sinceHours?: number;
  limit?: number;
}

export interface MetricsSummary {
  routes: RegistrySummary;
  sessions: ContextStatistics;
  trackedIntents: number;
}

export interface ServiceComponents {
  classifier: IntentClassifier;
  contexts: ContextManager;
  registry: RouteRegistry;
  fallback: FallbackHandler;
  history: IntentHistoryTracker;
  router?: IntentRouter;
  now?: Clock;
}

export class IntentRoutingService {
  readonly classifier: IntentClassifier;
  readonly contexts: ContextManager;
  readonly registry: RouteRegistry;
  readonly fallback: FallbackHandler;
  readonly history: IntentHistoryTracker;
  readonly router: IntentRouter;
  private readonly now: Clock;
  private readonly locks = new KeyedLock();
  private sweeper?: NodeJS.Timeout;

  constructor(components: ServiceComponents) {
    this.classifier = components.classifier;
    this.contexts = components.contexts;
    this.registry = components.registry;
    this.fallback = components.fallback;
    this.history = components.history;
    this.now = components.now ?? Date.now;
    this.router =
      components.router ?? new IntentRouter(this.registry, this.contexts, this.fallback, { now: this.now });
  }

  classify(text: string, options: ClassifyOptions = {}): Intent | MultiIntentResult {
    const input = this.requireText(text);
    const context = options.sessionId ? this.contexts.getSession(options.sessionId) : undefined;
    const userId = options.userId ?? context?.userId;

    if (options.detectMultiple) {
      const classification = this.classifier.classifyMulti(input, context);
      [classification.primary, ...classification.secondary].forEach((intent) => this.history.track(intent, userId));
      return classification;
    }

    const intent = this.classifier.classify(input, context);
    this.history.track(intent, userId);
    return intent;
  }

  async route(text: string, request: RouteRequest = {}): Promise<RoutedTurn> {
    const input = this.requireText(text);
    const sessionId = this.resolveSession(request);

    return this.locks.runExclusive(sessionId, async () => {
      const context = this.sessionFor(sessionId, request);
      const userId = request.userId ?? context.userId;
      const intent = this.classifier.classify(input, context);
      this.history.track(intent, userId);

      const result = await this.router.route(intent, context, request.authenticated ?? false, {
        signal: request.signal,
        timeoutMs: request.timeoutMs,
      });
      const updated = this.router.commitTurn(context, intent, result);
      log.info(
        `session=${updated.sessionId} intent=${intent.type} confidence=${intent.confidence} route=${result.routeId} success=${result.success}`,
      );
      return { ...result, sessionId: updated.sessionId, saved: this.contexts.has(updated.sessionId) };
    });
  }

  async routeMulti(text: string, request: RouteRequest = {}): Promise<MultiRoutedTurn> {
    const input = this.requireText(text);
    const sessionId = this.resolveSession(request);

    return this.locks.runExclusive(sessionId, async () => {
      const context = this.sessionFor(sessionId, request);
      const userId = request.userId ?? context.userId;
      const classification = this.classifier.classifyMulti(input, context);
      [classification.primary, ...classification.secondary].forEach((intent) => this.history.track(intent, userId));

      const results = await this.router.routeMulti(classification, context, request.authenticated ?? false, {
        signal: request.signal,
        timeoutMs: request.timeoutMs,
      });
      return { sessionId: context.sessionId, saved: this.contexts.has(context.sessionId), classification, results };
    });
  }

  registerRoute(route: RouteDefinition, handler: RouteHandler, override = false): Route {
    return this.registry.register(route, handler, override);
  }

  unregisterRoute(routeId: string): void {
    this.registry.unregister(routeId);
  }

  enableRoute(routeId: string): boolean {
    return this.registry.enable(routeId);
  }

  disableRoute(routeId: string): boolean {
    return this.registry.disable(routeId);
  }

  getRoute(routeId: string): Route | undefined {
    return this.registry.getRoute(routeId);
  }

  listRoutes(intentType?: IntentType, enabledOnly = false): Route[] {
    return this.registry.listRoutes(intentType, enabledOnly);
  }

  // Classifies without tracking so eligibility checks leave no trace in history.
  validateRoute(routeId: string, text: string, sessionId?: string, authenticated = false): RouteValidation {
    const context = sessionId ? this.contexts.getSession(sessionId) : undefined;
    const intent = this.classifier.classify(this.requireText(text), context);
    return this.router.validateRoute(routeId, intent, context, authenticated);
  }

  createSession(userId?: string, language?: string, preferences?: ContextData): string {
    return this.contexts.createSession(userId, language, preferences).sessionId;
  }

  getSession(sessionId: string): IntentContext | undefined {
    return this.contexts.getSession(sessionId);
  }

  endSession(sessionId: string): boolean {
    return this.contexts.endSession(sessionId);
  }

  getContextValue(sessionId: string, key: string): ContextValue | undefined {
    return this.contexts.getContextValue(sessionId, key);
  }

  setContextValue(sessionId: string, key: string, value: ContextValue): boolean {
    return this.contexts.setContextValue(sessionId, key, value);
  }

  getPreference(sessionId: string, key: string): ContextValue | undefined {
    return this.contexts.getPreference(sessionId, key);
  }

  setPreference(sessionId: string, key: string, value: ContextValue): boolean {
    return this.contexts.setPreference(sessionId, key, value);
  }

  setTopic(sessionId: string, topic: string): boolean {
    return this.contexts.setTopic(sessionId, topic);
  }

  getSessionHistory(sessionId: string, limit?: number): Intent[] | undefined {
    return this.contexts.getConversationHistory(sessionId, limit);
  }

  cleanupExpiredSessions(): number {
    return this.contexts.cleanupExpired();
  }

  startSessionSweeper(intervalMs: number): void {
    this.stopSessionSweeper();
    this.sweeper = setInterval(() => this.cleanupExpiredSessions(), intervalMs);
    this.sweeper.unref();
  }

  stopSessionSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  getHistory(query: HistoryQuery = {}): Intent[] {
    return this.history.getHistory({
      userId: query.userId,
      intentType: query.intentType,
      since: this.sinceHours(query.sinceHours),
      limit: query.limit,
    });
  }

  getFrequency(userId?: string, sinceHours?: number): Partial<Record<IntentType, number>> {
    return this.history.getFrequency(userId, this.sinceHours(sinceHours));
  }

  getTopIntents(n = 10, userId?: string, sinceHours?: number): IntentCount[] {
    return this.history.getTopIntents(n, userId, this.sinceHours(sinceHours));
  }

  getUserPatterns(userId: string): UserPatterns | undefined {
    return this.history.getUserPatterns(userId);
  }

  getConfidenceStats(intentType?: IntentType, userId?: string, sinceHours?: number): ConfidenceStats {
    return this.history.getConfidenceStats(intentType, userId, this.sinceHours(sinceHours));
  }

  getHourlyVolume(hours = 24, userId?: string): HourlyVolume[] {
    return this.history.getHourlyVolume(hours, userId);
  }

  getHistorySummary(): HistorySummary {
    return this.history.getSummary();
  }

  getRouteMetrics(routeId: string): RouteMetrics | undefined {
    return this.registry.getMetrics(routeId);
  }

  getMetricsSummary(): MetricsSummary {
    return {
      routes: this.registry.getSummary(),
      sessions: this.contexts.getStatistics(),
      trackedIntents: this.history.size,
    };
  }

  getTopRoutes(n = 10, by: TopRoutesMetric = 'executions'): RouteMetrics[] {
    return this.registry.getTopRoutes(n, by);
  }

  addPattern(pattern: IntentPattern): void {
    this.classifier.addPattern(pattern);
  }

  removePattern(intentType: IntentType): boolean {
    return this.classifier.removePattern(intentType);
  }

  getPatterns(): IntentPattern[] {
    return this.classifier.getPatterns();
  }

  getClassifierStatistics(): ClassifierStatistics {
    return this.classifier.getStatistics();
  }

  // Checked before a session is resolved so bad input never creates one.
  private requireText(text: unknown): string {
    if (typeof text !== 'string') {
      throw new InputError('Text must be a string', { receivedType: typeof text });
    }
    return text;
  }

  private resolveSession(request: RouteRequest): string {
    if (request.sessionId && this.contexts.has(request.sessionId)) {
      return request.sessionId;
    }
    return this.contexts.createSession(request.userId, request.language).sessionId;
  }

  // The session may have expired while the turn waited for the lock.
  private sessionFor(sessionId: string, request: RouteRequest): IntentContext {
    return this.contexts.getSession(sessionId) ?? this.contexts.createSession(request.userId, request.language);
  }

  private sinceHours(hours?: number): number | undefined {
    return hours === undefined ? undefined : this.now() - hours * HOUR_MS;
  }
}

export interface ServiceOverrides {
  now?: Clock;
  replies?: ReplyGenerator;
  registerDefaults?: boolean;
}

export const createRoutingService = (
  settings: AppConfig = appConfig,
  overrides: ServiceOverrides = {},
): IntentRoutingService => {
  const { now } = overrides;
  const classifier = new IntentClassifier(undefined, {
    minConfidence: settings.minConfidence,
    multiIntentThreshold: settings.multiIntentThreshold,
    defaultLanguage: settings.defaultLanguage,
    now,
  });
  const contexts = new ContextManager({
    timeoutMs: settings.sessionTimeoutMs,
    defaultLanguage: settings.defaultLanguage,
    now,
  });
  const registry = new RouteRegistry({ now });
  const fallback = new FallbackHandler({ now });
  const history = new IntentHistoryTracker({ capacity: settings.historyCapacity, now });
  const router = new IntentRouter(registry, contexts, fallback, { handlerTimeoutMs: settings.handlerTimeoutMs, now });

  if (overrides.registerDefaults ?? true) {
    const replies = overrides.replies ?? createReplyGenerator({ apiKey: settings.openaiApiKey, model: settings.openaiModel });
    registerDefaultRoutes(registry, replies);
  }

  return new IntentRoutingService({ classifier, contexts, registry, fallback, history, router, now });
};
