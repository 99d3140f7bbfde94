import { RouteRegistry } from '../src/routing/registry';
import { RouteNotFoundError, RouteRegistrationError } from '../src/utils/errors';
import { HOUR, ManualClock, replyWith } from './helpers';

describe('RouteRegistry', () => {
  let clock: ManualClock;
  let registry: RouteRegistry;
  const handler = replyWith('ok');

  beforeEach(() => {
    clock = new ManualClock();
    registry = new RouteRegistry({ now: clock.now });
  });

  describe('registration', () => {
    it('fills in route defaults', () => {
      const route = registry.register({ id: 'greet', intentType: 'greeting' }, handler);

      expect(route).toEqual({
        id: 'greet',
        intentType: 'greeting',
        priority: 5,
        requiresAuth: false,
        requiredContextKeys: [],
        minConfidence: 0.5,
        enabled: true,
        tags: [],
      });
      expect(registry.getMetrics('greet')?.totalExecutions).toBe(0);
    });

    it('rejects out-of-range fields', () => {
      expect(() => registry.register({ id: 'greet', intentType: 'greeting', priority: 11 }, handler)).toThrow(
        RouteRegistrationError,
      );
      expect(() => registry.register({ id: 'greet', intentType: 'greeting', minConfidence: 1.5 }, handler)).toThrow(
        /minConfidence/,
      );
      expect(() => registry.register({ id: ' ', intentType: 'greeting' }, handler)).toThrow(RouteRegistrationError);
    });

    it('rejects handlers without execute', () => {
      expect(() => Reflect.apply(registry.register, registry, [{ id: 'greet', intentType: 'greeting' }, {}])).toThrow(
        /must implement execute/,
      );
    });

    it('rejects duplicates unless overriding and keeps metrics across an override', () => {
      registry.register({ id: 'greet', intentType: 'greeting' }, handler);
      registry.updateMetrics('greet', true, 10, 0.9);

      expect(() => registry.register({ id: 'greet', intentType: 'greeting' }, handler)).toThrow(/already registered/);

      const replacement = replyWith('replaced');
      registry.register({ id: 'greet', intentType: 'greeting', priority: 2 }, replacement, true);

      expect(registry.getRoute('greet')?.priority).toBe(2);
      expect(registry.getHandler('greet')).toBe(replacement);
      expect(registry.getMetrics('greet')?.totalExecutions).toBe(1);
    });

    it('unregisters routes with their metrics', () => {
      registry.register({ id: 'greet', intentType: 'greeting' }, handler);

      registry.unregister('greet');

      expect(registry.has('greet')).toBe(false);
      expect(registry.getMetrics('greet')).toBeUndefined();
      expect(() => registry.unregister('greet')).toThrow(RouteNotFoundError);
    });
  });

  describe('lookup', () => {
    beforeEach(() => {
      registry.register({ id: 'help.late', intentType: 'help', priority: 3 }, handler);
      registry.register({ id: 'help.first', intentType: 'help', priority: 1 }, handler);
      registry.register({ id: 'help.tied', intentType: 'help', priority: 3 }, handler);
      registry.register({ id: 'greet', intentType: 'greeting' }, handler);
    });

    it('orders routes by priority then registration order', () => {
      expect(registry.getRoutesForIntent('help').map((route) => route.id)).toEqual([
        'help.first',
        'help.late',
        'help.tied',
      ]);
    });

    it('skips disabled routes unless asked for all of them', () => {
      expect(registry.disable('help.first')).toBe(true);

      expect(registry.getRoutesForIntent('help').map((route) => route.id)).toEqual(['help.late', 'help.tied']);
      expect(registry.getRoutesForIntent('help', false)).toHaveLength(3);
      expect(registry.listRoutes(undefined, true)).toHaveLength(3);
      expect(registry.listRoutes()).toHaveLength(4);

      expect(registry.enable('help.first')).toBe(true);
      expect(registry.getRoutesForIntent('help')[0].id).toBe('help.first');
      expect(registry.enable('missing')).toBe(false);
    });

    it('returns copies of stored routes', () => {
      const route = registry.getRoute('greet');
      route?.tags.push('mutated');

      expect(registry.getRoute('greet')?.tags).toEqual([]);
      expect(registry.getRoute('missing')).toBeUndefined();
    });
  });

  describe('metrics', () => {
    beforeEach(() => {
      registry.register({ id: 'a', intentType: 'help' }, handler);
      registry.register({ id: 'b', intentType: 'status', enabled: false }, handler);
      registry.register({ id: 'c', intentType: 'help' }, handler);
    });

    it('keeps running averages and counters', () => {
      registry.updateMetrics('a', true, 10, 0.5);
      registry.updateMetrics('a', false, 30, 1);
      registry.updateMetrics('a', true, 20, 0.75);

      const metrics = registry.getMetrics('a');
      expect(metrics).toMatchObject({
        routeId: 'a',
        totalExecutions: 3,
        successfulExecutions: 2,
        failedExecutions: 1,
        avgExecutionTimeMs: 20,
        minExecutionTimeMs: 10,
        maxExecutionTimeMs: 30,
        avgConfidence: 0.75,
        lastExecution: clock.current,
      });
      expect(metrics?.successRate).toBeCloseTo(66.667, 2);
      expect(metrics?.errorRate).toBeCloseTo(33.333, 2);
      expect((metrics?.successfulExecutions ?? 0) + (metrics?.failedExecutions ?? 0)).toBe(metrics?.totalExecutions);
    });

    it('counts executions in sliding windows', () => {
      registry.updateMetrics('a', true, 1, 1);
      clock.advance(2 * HOUR);
      registry.updateMetrics('a', true, 1, 1);
      registry.updateMetrics('a', true, 1, 1);

      expect(registry.getMetrics('a')).toMatchObject({ executionsLastHour: 2, executionsLastDay: 3 });
      expect(registry.executionsInWindow('a', 60_000)).toBe(2);

      clock.advance(23 * HOUR);
      expect(registry.getMetrics('a')).toMatchObject({
        totalExecutions: 3,
        executionsLastHour: 0,
        executionsLastDay: 2,
      });
    });

    it('ranks top routes and leaves unexecuted routes out of rate rankings', () => {
      registry.updateMetrics('a', true, 5, 1);
      registry.updateMetrics('a', false, 5, 1);
      registry.updateMetrics('a', false, 5, 1);
      registry.updateMetrics('b', true, 50, 1);

      const ids = (by: 'executions' | 'successRate' | 'avgLatency'): string[] =>
        registry.getTopRoutes(10, by).map((metrics) => metrics.routeId);

      expect(ids('executions')).toEqual(['a', 'b', 'c']);
      expect(ids('successRate')).toEqual(['b', 'a']);
      expect(ids('avgLatency')).toEqual(['a', 'b']);
      expect(registry.getTopRoutes(1)).toHaveLength(1);
    });

    it('ignores executions reported for unregistered routes', () => {
      registry.unregister('c');
      registry.updateMetrics('c', true, 5, 1);

      expect(registry.getMetrics('c')).toBeUndefined();
      expect(registry.getTopRoutes(10).map((metrics) => metrics.routeId)).toEqual(['a', 'b']);
    });

    it('resets one route or all of them', () => {
      registry.updateMetrics('a', true, 5, 1);
      registry.updateMetrics('b', true, 5, 1);

      registry.resetMetrics('a');
      expect(registry.getMetrics('a')?.totalExecutions).toBe(0);
      expect(registry.getMetrics('b')?.totalExecutions).toBe(1);

      registry.resetMetrics();
      expect(registry.getMetrics('b')?.totalExecutions).toBe(0);
      expect(registry.getAllMetrics()).toHaveLength(3);
    });

    it('summarises routes and executions', () => {
      registry.updateMetrics('a', true, 5, 1);
      registry.updateMetrics('a', false, 5, 1);
      registry.updateMetrics('c', true, 5, 1);
      registry.updateMetrics('c', true, 5, 1);

      expect(registry.getSummary()).toEqual({
        totalRoutes: 3,
        enabledRoutes: 2,
        disabledRoutes: 1,
        routesByIntent: { help: 2, status: 1 },
        totalExecutions: 4,
        totalSuccesses: 3,
        totalFailures: 1,
        overallSuccessRate: 75,
      });
    });
  });
});
