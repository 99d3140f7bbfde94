import { randomUUID } from 'crypto';
import { Clock, ContextData, ContextValue, Intent, IntentContext, SessionUpdate } from '../types';
import { childLogger } from '../utils/logger';

const log = childLogger('context');

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000;

export interface ContextManagerOptions {
  timeoutMs?: number;
  defaultLanguage?: string;
  now?: Clock;
}

export interface ContextStatistics {
  totalSessions: number;
  totalInteractions: number;
  avgInteractionsPerSession: number;
  avgSessionAgeMinutes: number;
  sessionsByLanguage: Record<string, number>;
  sessionTimeoutMinutes: number;
}

const snapshot = (context: IntentContext): IntentContext => structuredClone(context);

export class ContextManager {
  private sessions = new Map<string, IntentContext>();
  private readonly timeoutMs: number;
  private readonly defaultLanguage: string;
  private readonly now: Clock;

  constructor(options: ContextManagerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.defaultLanguage = options.defaultLanguage ?? 'en';
    this.now = options.now ?? Date.now;
  }

  createSession(userId?: string, language?: string, preferences: ContextData = {}): IntentContext {
    const now = this.now();
    const context: IntentContext = {
      sessionId: `session_${randomUUID()}`,
      userId,
      history: [],
      contextData: {},
      preferences: structuredClone(preferences),
      language: language ?? this.defaultLanguage,
      createdAt: now,
      lastInteraction: now,
      interactionCount: 0,
    };
    this.sessions.set(context.sessionId, context);
    log.info(`Session ${context.sessionId} created${userId ? ` for user ${userId}` : ''}`);
    return snapshot(context);
  }

  getSession(sessionId: string): IntentContext | undefined {
    const context = this.live(sessionId);
    return context ? snapshot(context) : undefined;
  }

  has(sessionId: string): boolean {
    return this.live(sessionId) !== undefined;
  }

  // Unknown or expired ids start a fresh session under a new id.
  getOrCreateSession(
    sessionId?: string,
    userId?: string,
    language?: string,
    preferences?: ContextData,
  ): IntentContext {
    const existing = sessionId ? this.getSession(sessionId) : undefined;
    return existing ?? this.createSession(userId, language, preferences);
  }

  updateSession(sessionId: string, update: SessionUpdate): IntentContext | undefined {
    const context = this.live(sessionId);
    if (!context) {
      return undefined;
    }

    if (update.intent) {
      context.history.push(update.intent);
      if (update.intent.type !== 'unknown') {
        context.currentTopic = update.intent.type;
      }
    }
    if (update.contextData) {
      Object.assign(context.contextData, structuredClone(update.contextData));
    }
    if (update.preferences) {
      Object.assign(context.preferences, structuredClone(update.preferences));
    }
    if (update.topic !== undefined) {
      context.currentTopic = update.topic;
    }

    this.touch(context);
    context.interactionCount += 1;
    return snapshot(context);
  }

  getContextValue(sessionId: string, key: string): ContextValue | undefined {
    const context = this.live(sessionId);
    return context && Object.hasOwn(context.contextData, key) ? structuredClone(context.contextData[key]) : undefined;
  }

  // Single-key writes touch the session without counting as an interaction.
  setContextValue(sessionId: string, key: string, value: ContextValue): boolean {
    const context = this.live(sessionId);
    if (!context) {
      return false;
    }
    context.contextData[key] = structuredClone(value);
    this.touch(context);
    return true;
  }

  getPreference(sessionId: string, key: string): ContextValue | undefined {
    const context = this.live(sessionId);
    return context && Object.hasOwn(context.preferences, key) ? structuredClone(context.preferences[key]) : undefined;
  }

  setPreference(sessionId: string, key: string, value: ContextValue): boolean {
    const context = this.live(sessionId);
    if (!context) {
      return false;
    }
    context.preferences[key] = structuredClone(value);
    this.touch(context);
    return true;
  }

  getTopic(sessionId: string): string | undefined {
    return this.live(sessionId)?.currentTopic;
  }

  setTopic(sessionId: string, topic: string): boolean {
    const context = this.live(sessionId);
    if (!context) {
      return false;
    }
    context.currentTopic = topic;
    this.touch(context);
    return true;
  }

  endSession(sessionId: string): boolean {
    const removed = this.sessions.delete(sessionId);
    if (removed) {
      log.info(`Session ${sessionId} ended`);
    }
    return removed;
  }

  getConversationHistory(sessionId: string, limit?: number): Intent[] | undefined {
    const context = this.live(sessionId);
    if (!context) {
      return undefined;
    }
    let history = context.history;
    if (limit !== undefined) {
      history = limit > 0 ? history.slice(-limit) : [];
    }
    return structuredClone(history);
  }

  clearHistory(sessionId: string): boolean {
    const context = this.live(sessionId);
    if (!context) {
      return false;
    }
    context.history = [];
    return true;
  }

  getUserSessions(userId: string): IntentContext[] {
    return this.liveSessions()
      .filter((context) => context.userId === userId)
      .map(snapshot);
  }

  getActiveSessionIds(): string[] {
    return this.liveSessions().map((context) => context.sessionId);
  }

  cleanupExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [sessionId, context] of this.sessions) {
      if (this.isExpired(context, now)) {
        this.sessions.delete(sessionId);
        removed += 1;
      }
    }
    if (removed > 0) {
      log.info(`Removed ${removed} expired session(s)`);
    }
    return removed;
  }

  getStatistics(): ContextStatistics {
    const sessions = this.liveSessions();
    const now = this.now();
    const totalSessions = sessions.length;
    const totalInteractions = sessions.reduce((sum, context) => sum + context.interactionCount, 0);
    const totalAgeMs = sessions.reduce((sum, context) => sum + (now - context.createdAt), 0);
    const sessionsByLanguage: Record<string, number> = {};
    sessions.forEach((context) => {
      sessionsByLanguage[context.language] = (sessionsByLanguage[context.language] ?? 0) + 1;
    });

    return {
      totalSessions,
      totalInteractions,
      avgInteractionsPerSession: totalSessions > 0 ? totalInteractions / totalSessions : 0,
      avgSessionAgeMinutes: totalSessions > 0 ? totalAgeMs / totalSessions / 60_000 : 0,
      sessionsByLanguage,
      sessionTimeoutMinutes: this.timeoutMs / 60_000,
    };
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(context: IntentContext, now: number): boolean {
    return now - context.lastInteraction > this.timeoutMs;
  }

  private touch(context: IntentContext): void {
    context.lastInteraction = Math.max(context.lastInteraction, this.now());
  }

  private live(sessionId: string): IntentContext | undefined {
    const context = this.sessions.get(sessionId);
    if (!context) {
      return undefined;
    }
    if (this.isExpired(context, this.now())) {
      this.sessions.delete(sessionId);
      log.info(`Session ${sessionId} expired`);
      return undefined;
    }
    return context;
  }

  private liveSessions(): IntentContext[] {
    this.cleanupExpired();
    return Array.from(this.sessions.values());
  }
}
