import { ContextManager } from '../src/memory/contextManager';
import { FallbackHandler, loadFallbackMessages } from '../src/routing/fallback';
import { RouteRegistry } from '../src/routing/registry';
import { IntentRouter } from '../src/routing/router';
import { HandlerOptions, RouteHandler, RouteResponse } from '../src/types';
import { ManualClock, makeContext, makeIntent, replyWith } from './helpers';

const waitForAbort = (): RouteHandler => ({
  execute: (_intent, _context, { signal }: HandlerOptions) =>
    new Promise<RouteResponse>((_resolve, reject) => {
      signal.addEventListener('abort', () => reject(signal.reason), { once: true });
    }),
});

describe('IntentRouter', () => {
  const messages = loadFallbackMessages();
  let clock: ManualClock;
  let registry: RouteRegistry;
  let contexts: ContextManager;
  let router: IntentRouter;

  beforeEach(() => {
    clock = new ManualClock();
    registry = new RouteRegistry({ now: clock.now });
    contexts = new ContextManager({ now: clock.now });
    router = new IntentRouter(registry, contexts, new FallbackHandler({ messages, now: clock.now }), {
      handlerTimeoutMs: 1_000,
      now: clock.now,
    });
  });

  describe('route selection', () => {
    it('runs the highest-priority eligible route', async () => {
      registry.register({ id: 'greet.low', intentType: 'greeting', priority: 3 }, replyWith('low'));
      registry.register({ id: 'greet.high', intentType: 'greeting', priority: 1 }, replyWith('high'));

      const result = await router.route(makeIntent('greeting'));

      expect(result.routeId).toBe('greet.high');
      expect(result.success).toBe(true);
      expect(result.response?.message).toBe('high');
      expect(result.requiresFollowup).toBe(false);
      expect(result.timestamp).toBe(clock.current);
    });

    it('skips routes whose confidence floor is not met', async () => {
      registry.register({ id: 'strict', intentType: 'help', priority: 1, minConfidence: 0.8 }, replyWith('strict'));
      registry.register({ id: 'lenient', intentType: 'help', priority: 2, minConfidence: 0.3 }, replyWith('lenient'));

      expect((await router.route(makeIntent('help', 0.7))).routeId).toBe('lenient');
      expect((await router.route(makeIntent('help', 0.8))).routeId).toBe('strict');
    });

    it('skips authenticated routes for anonymous callers', async () => {
      registry.register({ id: 'private', intentType: 'status', priority: 1, requiresAuth: true }, replyWith('private'));
      registry.register({ id: 'public', intentType: 'status', priority: 2 }, replyWith('public'));

      expect((await router.route(makeIntent('status'))).routeId).toBe('public');
      expect((await router.route(makeIntent('status'), undefined, true)).routeId).toBe('private');
    });

    it('requires the declared context keys', async () => {
      registry.register(
        { id: 'docs.loan', intentType: 'document_upload', priority: 1, requiredContextKeys: ['loanType'] },
        replyWith('loan documents'),
      );
      registry.register({ id: 'docs.generic', intentType: 'document_upload', priority: 2 }, replyWith('documents'));
      const intent = makeIntent('document_upload');

      expect((await router.route(intent)).routeId).toBe('docs.generic');
      expect((await router.route(intent, makeContext({ contextData: { toString: 'x' } }))).routeId).toBe('docs.generic');
      expect((await router.route(intent, makeContext({ contextData: { loanType: 'auto' } }))).routeId).toBe('docs.loan');
    });

    it('stops using a route once its per-minute limit is reached', async () => {
      registry.register({ id: 'limited', intentType: 'help', priority: 1, rateLimit: 2 }, replyWith('limited'));
      registry.register({ id: 'overflow', intentType: 'help', priority: 2 }, replyWith('overflow'));

      const ids: string[] = [];
      for (let i = 0; i < 3; i += 1) {
        ids.push((await router.route(makeIntent('help'))).routeId);
      }
      clock.advance(61_000);
      ids.push((await router.route(makeIntent('help'))).routeId);

      expect(ids).toEqual(['limited', 'limited', 'overflow', 'limited']);
    });

    it('flags follow-ups requested by the handler', async () => {
      registry.register(
        { id: 'loan', intentType: 'loan_application' },
        { execute: () => ({ message: 'How much?', followupIntent: 'loan_application' }) },
      );

      const result = await router.route(makeIntent('loan_application'));

      expect(result.requiresFollowup).toBe(true);
      expect(result.followupIntent).toBe('loan_application');
    });
  });

  describe('failures', () => {
    it('reports handler errors and counts them', async () => {
      registry.register(
        { id: 'broken', intentType: 'help' },
        {
          execute: () => {
            throw new Error('boom');
          },
        },
      );

      const result = await router.route(makeIntent('help'));

      expect(result).toMatchObject({ routeId: 'broken', success: false, error: { kind: 'handler_error', message: 'boom' } });
      expect(result.response).toBeUndefined();
      expect(registry.getMetrics('broken')).toMatchObject({ totalExecutions: 1, failedExecutions: 1 });
    });

    it('times out slow handlers and aborts their signal', async () => {
      const handler = waitForAbort();
      registry.register({ id: 'slow', intentType: 'help' }, handler);

      const result = await router.route(makeIntent('help'), undefined, false, { timeoutMs: 20 });

      expect(result.success).toBe(false);
      expect(result.error).toEqual({ kind: 'timeout', message: 'Handler for route slow timed out after 20ms' });
      expect(registry.getMetrics('slow')?.failedExecutions).toBe(1);
    });

    it('cancels when the caller aborts', async () => {
      registry.register({ id: 'slow', intentType: 'help' }, waitForAbort());
      const caller = new AbortController();
      setTimeout(() => caller.abort(), 10);

      const result = await router.route(makeIntent('help'), undefined, false, { signal: caller.signal });

      expect(result.error).toEqual({ kind: 'cancelled', message: 'Handler for route slow was cancelled' });
    });

    it('does not call the handler when the signal is already aborted', async () => {
      const execute = jest.fn(() => ({ message: 'never' }));
      registry.register({ id: 'help', intentType: 'help' }, { execute });
      const caller = new AbortController();
      caller.abort();

      const result = await router.route(makeIntent('help'), undefined, false, { signal: caller.signal });

      expect(execute).not.toHaveBeenCalled();
      expect(result.error?.kind).toBe('cancelled');
    });

    it('keeps total executions equal to successes plus failures', async () => {
      registry.register({ id: 'flaky', intentType: 'help' }, {
        execute: (intent) => {
          if (intent.confidence < 0.6) {
            throw new Error('too vague');
          }
          return { message: 'fine' };
        },
      });

      await router.route(makeIntent('help', 0.9));
      await router.route(makeIntent('help', 0.55));
      await router.route(makeIntent('help', 0.7));

      expect(registry.getMetrics('flaky')).toMatchObject({
        totalExecutions: 3,
        successfulExecutions: 2,
        failedExecutions: 1,
      });
    });
  });

  describe('fallback', () => {
    it('falls back when no route is registered and records no metrics', async () => {
      const result = await router.route(makeIntent('status', 0.9));

      expect(result).toMatchObject({
        routeId: 'fallback',
        success: true,
        fallbackStrategy: 'ask_clarification',
        requiresFollowup: true,
        response: { message: 'I need a bit more information to help you. Could you please provide more details?' },
      });
      expect(registry.getSummary().totalExecutions).toBe(0);
    });

    it('falls back when every candidate is ineligible', async () => {
      registry.register({ id: 'private', intentType: 'status', requiresAuth: true }, replyWith('private'));

      const result = await router.route(makeIntent('unknown', 0.4));
      const blocked = await router.route(makeIntent('status'));

      expect(result.fallbackStrategy).toBe('provide_options');
      expect(result.requiresFollowup).toBe(false);
      expect(blocked.routeId).toBe('fallback');
    });

    it('carries the inferred intent of a history fallback', async () => {
      const context = makeContext({ history: [makeIntent('credit_history'), makeIntent('credit_history')] });

      const result = await router.route(makeIntent('question', 0.4), context);

      expect(result.fallbackStrategy).toBe('use_history');
      expect(result.followupIntent).toBe('credit_history');
      expect(result.response?.followupIntent).toBe('credit_history');
      expect(result.requiresFollowup).toBe(true);
    });
  });

  describe('routeMulti', () => {
    it('runs intents in order and lets later handlers see earlier updates', async () => {
      registry.register({ id: 'loan', intentType: 'loan_application' }, replyWith('Noted', { loanType: 'business' }));
      registry.register(
        { id: 'credit', intentType: 'credit_history' },
        {
          execute: (_intent, context) => ({ message: `Checking credit for ${String(context?.contextData.loanType)}` }),
        },
      );
      const session = contexts.createSession('user-1');
      const loan = makeIntent('loan_application', 1);
      const credit = makeIntent('credit_history', 1);

      const results = await router.routeMulti(
        { primary: loan, secondary: [credit], executionOrder: [loan.id, credit.id], requiresClarification: false },
        session,
      );

      expect(results.map((result) => result.response?.message)).toEqual(['Noted', 'Checking credit for business']);
      const stored = contexts.getSession(session.sessionId);
      expect(stored?.contextData).toEqual({
        loanType: 'business',
        [`result_${loan.id}`]: 'loan:ok',
        [`result_${credit.id}`]: 'credit:ok',
      });
      expect(stored?.history.map((intent) => intent.type)).toEqual(['loan_application', 'credit_history']);
      expect(stored?.currentTopic).toBe('credit_history');
    });

    it('follows the execution order rather than list order', async () => {
      const seen: string[] = [];
      const recorder: RouteHandler = {
        execute: (intent) => {
          seen.push(intent.type);
          return { message: intent.type };
        },
      };
      registry.register({ id: 'help', intentType: 'help' }, recorder);
      registry.register({ id: 'status', intentType: 'status' }, recorder);
      const help = makeIntent('help');
      const status = makeIntent('status');

      await router.routeMulti({
        primary: help,
        secondary: [status],
        executionOrder: [status.id, help.id],
        requiresClarification: false,
      });

      expect(seen).toEqual(['status', 'help']);
    });
  });

  it('does not bring back metrics for a route unregistered while it ran', async () => {
    registry.register(
      { id: 'help.once', intentType: 'help' },
      {
        execute: () => {
          registry.unregister('help.once');
          return { message: 'Last answer.' };
        },
      },
    );

    const result = await router.route(makeIntent('help'));

    expect(result.response?.message).toBe('Last answer.');
    expect(registry.getMetrics('help.once')).toBeUndefined();
    expect(registry.getTopRoutes()).toEqual([]);
  });

  describe('commitTurn', () => {
    it('updates a detached context as a copy', () => {
      const context = makeContext({ contextData: { a: 1 } });
      const intent = makeIntent('help');

      const updated = router.commitTurn(context, intent, {
        routeId: 'help',
        intent,
        success: true,
        response: { message: 'ok', contextUpdates: { b: 2 } },
        executionTimeMs: 1,
        requiresFollowup: false,
        timestamp: 0,
      });

      expect(updated.contextData).toEqual({ a: 1, b: 2 });
      expect(updated.currentTopic).toBe('help');
      expect(updated.interactionCount).toBe(1);
      expect(updated.lastInteraction).toBe(clock.current);
      expect(context.contextData).toEqual({ a: 1 });
      expect(context.history).toEqual([]);
    });
  });

  describe('validateRoute', () => {
    it('lists every reason a route cannot take an intent', () => {
      registry.register({ id: 'loan', intentType: 'loan_application', requiresAuth: true, enabled: false }, replyWith('x'));

      expect(router.validateRoute('loan', makeIntent('greeting'))).toEqual({
        canRoute: false,
        reasons: ['Route is disabled', 'Route expects loan_application, got greeting', 'Route requires authentication'],
      });
      expect(router.validateRoute('missing', makeIntent('greeting'))).toEqual({
        canRoute: false,
        reasons: ['Route missing not found'],
      });
    });

    it('accepts an eligible route', () => {
      registry.register({ id: 'greet', intentType: 'greeting' }, replyWith('hi'));

      expect(router.validateRoute('greet', makeIntent('greeting'))).toEqual({ canRoute: true, reasons: [] });
    });
  });
});
