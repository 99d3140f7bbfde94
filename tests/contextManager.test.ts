import { ContextManager } from '../src/memory/contextManager';
import { HOUR, MINUTE, ManualClock, makeIntent } from './helpers';

describe('ContextManager', () => {
  let clock: ManualClock;
  let manager: ContextManager;

  beforeEach(() => {
    clock = new ManualClock();
    manager = new ContextManager({ timeoutMs: 30 * MINUTE, now: clock.now });
  });

  it('creates sessions with defaults', () => {
    const context = manager.createSession('user-1');

    expect(context.sessionId).toMatch(/^session_[0-9a-f-]{36}$/);
    expect(context).toMatchObject({
      userId: 'user-1',
      history: [],
      contextData: {},
      preferences: {},
      language: 'en',
      createdAt: clock.current,
      lastInteraction: clock.current,
      interactionCount: 0,
    });
    expect(context.currentTopic).toBeUndefined();
  });

  it('returns snapshots that do not alias stored state', () => {
    const { sessionId } = manager.createSession();
    const copy = manager.getSession(sessionId);
    copy?.history.push(makeIntent('greeting'));
    if (copy) {
      copy.contextData.leaked = true;
    }

    expect(manager.getSession(sessionId)?.history).toEqual([]);
    expect(manager.getSession(sessionId)?.contextData).toEqual({});
  });

  it('records a turn and moves the topic', () => {
    const { sessionId } = manager.createSession();
    clock.advance(MINUTE);
    const intent = makeIntent('loan_application');

    const updated = manager.updateSession(sessionId, { intent, contextData: { loanType: 'business' } });

    expect(updated?.history.map((entry) => entry.id)).toEqual([intent.id]);
    expect(updated?.currentTopic).toBe('loan_application');
    expect(updated?.contextData).toEqual({ loanType: 'business' });
    expect(updated?.interactionCount).toBe(1);
    expect(updated?.lastInteraction).toBe(clock.current);
  });

  it('keeps the topic when the intent is unknown', () => {
    const { sessionId } = manager.createSession();
    manager.updateSession(sessionId, { intent: makeIntent('greeting') });

    const updated = manager.updateSession(sessionId, { intent: makeIntent('unknown', 0) });

    expect(updated?.currentTopic).toBe('greeting');
    expect(updated?.history).toHaveLength(2);
  });

  it('merges context data and lets an explicit topic win', () => {
    const { sessionId } = manager.createSession(undefined, 'es', { tone: 'formal' });
    manager.updateSession(sessionId, { contextData: { a: 1, b: 'x' } });

    const updated = manager.updateSession(sessionId, {
      intent: makeIntent('question'),
      contextData: { b: 'y' },
      preferences: { frequentIntents: ['question'] },
      topic: 'pricing',
    });

    expect(updated?.contextData).toEqual({ a: 1, b: 'y' });
    expect(updated?.preferences).toEqual({ tone: 'formal', frequentIntents: ['question'] });
    expect(updated?.currentTopic).toBe('pricing');
    expect(updated?.language).toBe('es');
    expect(updated?.interactionCount).toBe(2);
  });

  it('reads and writes single context values and preferences', () => {
    const { sessionId } = manager.createSession();
    clock.advance(5 * MINUTE);
    const tags = ['vip'];

    expect(manager.setContextValue(sessionId, 'loanType', 'auto')).toBe(true);
    expect(manager.setContextValue(sessionId, 'tags', tags)).toBe(true);
    expect(manager.setPreference(sessionId, 'tone', 'formal')).toBe(true);
    tags.push('leaked');

    expect(manager.getContextValue(sessionId, 'loanType')).toBe('auto');
    expect(manager.getContextValue(sessionId, 'tags')).toEqual(['vip']);
    expect(manager.getContextValue(sessionId, 'toString')).toBeUndefined();
    expect(manager.getPreference(sessionId, 'tone')).toBe('formal');
    expect(manager.getPreference(sessionId, 'missing')).toBeUndefined();

    const session = manager.getSession(sessionId);
    expect(session?.lastInteraction).toBe(clock.current);
    expect(session?.interactionCount).toBe(0);
  });

  it('sets the topic without recording a turn', () => {
    const { sessionId } = manager.createSession();

    expect(manager.getTopic(sessionId)).toBeUndefined();
    expect(manager.setTopic(sessionId, 'loan_application')).toBe(true);
    expect(manager.getTopic(sessionId)).toBe('loan_application');
    expect(manager.getSession(sessionId)?.history).toEqual([]);
  });

  it('ignores single-key access to missing or expired sessions', () => {
    const { sessionId } = manager.createSession();
    manager.setContextValue(sessionId, 'loanType', 'auto');
    clock.advance(30 * MINUTE + 1);

    expect(manager.getContextValue(sessionId, 'loanType')).toBeUndefined();
    expect(manager.setContextValue(sessionId, 'loanType', 'home')).toBe(false);
    expect(manager.setPreference('session_missing', 'tone', 'formal')).toBe(false);
    expect(manager.getPreference('session_missing', 'tone')).toBeUndefined();
    expect(manager.setTopic('session_missing', 'help')).toBe(false);
    expect(manager.getTopic(sessionId)).toBeUndefined();
    expect(manager.size).toBe(0);
  });

  it('returns undefined when updating a missing session', () => {
    expect(manager.updateSession('session_missing', { topic: 'x' })).toBeUndefined();
  });

  it('expires idle sessions lazily', () => {
    const { sessionId } = manager.createSession();

    clock.advance(30 * MINUTE);
    expect(manager.has(sessionId)).toBe(true);

    clock.advance(1);
    expect(manager.getSession(sessionId)).toBeUndefined();
    expect(manager.size).toBe(0);
  });

  it('extends the session on every interaction', () => {
    const { sessionId } = manager.createSession();
    clock.advance(20 * MINUTE);
    manager.updateSession(sessionId, { intent: makeIntent('help') });
    clock.advance(20 * MINUTE);

    expect(manager.has(sessionId)).toBe(true);
  });

  it('starts a new session for unknown ids', () => {
    const existing = manager.createSession('user-1');

    expect(manager.getOrCreateSession(existing.sessionId).sessionId).toBe(existing.sessionId);

    const created = manager.getOrCreateSession('session_gone', 'user-2', 'fr');
    expect(created.sessionId).not.toBe('session_gone');
    expect(created.userId).toBe('user-2');
    expect(created.language).toBe('fr');
    expect(manager.size).toBe(2);
  });

  it('ends sessions', () => {
    const { sessionId } = manager.createSession();

    expect(manager.endSession(sessionId)).toBe(true);
    expect(manager.endSession(sessionId)).toBe(false);
    expect(manager.getSession(sessionId)).toBeUndefined();
  });

  it('returns the most recent history entries', () => {
    const { sessionId } = manager.createSession();
    const intents = [makeIntent('greeting'), makeIntent('question'), makeIntent('help')];
    intents.forEach((intent) => manager.updateSession(sessionId, { intent }));

    expect(manager.getConversationHistory(sessionId, 2)?.map((entry) => entry.type)).toEqual(['question', 'help']);
    expect(manager.getConversationHistory(sessionId)).toHaveLength(3);
    expect(manager.getConversationHistory(sessionId, 0)).toEqual([]);
    expect(manager.getConversationHistory('session_missing')).toBeUndefined();

    expect(manager.clearHistory(sessionId)).toBe(true);
    expect(manager.getConversationHistory(sessionId)).toEqual([]);
  });

  it('lists sessions per user', () => {
    manager.createSession('user-1');
    manager.createSession('user-1');
    manager.createSession('user-2');

    expect(manager.getUserSessions('user-1')).toHaveLength(2);
    expect(manager.getActiveSessionIds()).toHaveLength(3);
  });

  it('sweeps only expired sessions', () => {
    manager.createSession();
    clock.advance(20 * MINUTE);
    const fresh = manager.createSession();
    clock.advance(15 * MINUTE);

    expect(manager.cleanupExpired()).toBe(1);
    expect(manager.getActiveSessionIds()).toEqual([fresh.sessionId]);
  });

  it('reports statistics over live sessions', () => {
    const first = manager.createSession(undefined, 'en');
    manager.updateSession(first.sessionId, { intent: makeIntent('greeting') });
    manager.updateSession(first.sessionId, { intent: makeIntent('help') });
    clock.advance(10 * MINUTE);
    const second = manager.createSession(undefined, 'es');
    manager.updateSession(second.sessionId, { intent: makeIntent('question') });

    expect(manager.getStatistics()).toEqual({
      totalSessions: 2,
      totalInteractions: 3,
      avgInteractionsPerSession: 1.5,
      avgSessionAgeMinutes: 5,
      sessionsByLanguage: { en: 1, es: 1 },
      sessionTimeoutMinutes: 30,
    });
  });

  it('reports empty statistics without sessions', () => {
    const stats = new ContextManager({ timeoutMs: HOUR }).getStatistics();

    expect(stats.totalSessions).toBe(0);
    expect(stats.avgInteractionsPerSession).toBe(0);
    expect(stats.avgSessionAgeMinutes).toBe(0);
    expect(stats.sessionTimeoutMinutes).toBe(60);
  });
});
