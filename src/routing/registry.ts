import { z } from 'zod';
import { Clock, INTENT_TYPES, IntentType, Route, RouteHandler, RouteMetrics, TopRoutesMetric } from '../types';
import { RouteNotFoundError, RouteRegistrationError } from '../utils/errors';
import { childLogger } from '../utils/logger';

const log = childLogger('registry');

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

export const RouteSchema = z.object({
  id: z.string().trim().min(1),
  intentType: z.enum(INTENT_TYPES),
  priority: z.number().int().min(1).max(10).default(5),
  requiresAuth: z.boolean().default(false),
  requiredContextKeys: z.array(z.string().min(1)).default([]),
  minConfidence: z.number().min(0).max(1).default(0.5),
  rateLimit: z.number().int().positive().optional(),
  enabled: z.boolean().default(true),
  tags: z.array(z.string()).default([]),
  description: z.string().optional(),
});

export type RouteDefinition = z.input<typeof RouteSchema>;

export interface RegistrySummary {
  totalRoutes: number;
  enabledRoutes: number;
  disabledRoutes: number;
  routesByIntent: Partial<Record<IntentType, number>>;
  totalExecutions: number;
  totalSuccesses: number;
  totalFailures: number;
  overallSuccessRate: number;
}

interface RegisteredRoute {
  route: Route;
  handler: RouteHandler;
  sequence: number;
}

interface MetricsState {
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  avgExecutionTimeMs: number;
  minExecutionTimeMs: number;
  maxExecutionTimeMs: number;
  avgConfidence: number;
  lastExecution?: number;
  executions: number[];
}

const emptyMetrics = (): MetricsState => ({
  totalExecutions: 0,
  successfulExecutions: 0,
  failedExecutions: 0,
  avgExecutionTimeMs: 0,
  minExecutionTimeMs: 0,
  maxExecutionTimeMs: 0,
  avgConfidence: 0,
  executions: [],
});

const isHandler = (handler: unknown): handler is RouteHandler =>
  typeof handler === 'object' && handler !== null && 'execute' in handler && typeof handler.execute === 'function';

const byPriority = (a: RegisteredRoute, b: RegisteredRoute): number =>
  a.route.priority - b.route.priority || a.sequence - b.sequence;

const copyRoute = (route: Route): Route => structuredClone(route);

export interface RouteRegistryOptions {
  now?: Clock;
}

export class RouteRegistry {
  private routes = new Map<string, RegisteredRoute>();
  private metrics = new Map<string, MetricsState>();
  private sequence = 0;
  private readonly now: Clock;

  constructor(options: RouteRegistryOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  register(definition: RouteDefinition, handler: RouteHandler, override = false): Route {
    const parsed = RouteSchema.safeParse(definition);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || 'route'}: ${issue.message}`);
      throw new RouteRegistrationError(`Invalid route definition: ${issues.join('; ')}`, { issues });
    }
    const route = parsed.data;
    if (!isHandler(handler)) {
      throw new RouteRegistrationError(`Handler for route ${route.id} must implement execute()`, { routeId: route.id });
    }
    if (this.routes.has(route.id) && !override) {
      throw new RouteRegistrationError(`Route ${route.id} already registered. Pass override to replace it.`, {
        routeId: route.id,
      });
    }

    this.sequence += 1;
    this.routes.set(route.id, { route, handler, sequence: this.sequence });
    if (!this.metrics.has(route.id)) {
      this.metrics.set(route.id, emptyMetrics());
    }
    log.info(`Registered route ${route.id} for intent ${route.intentType} (priority ${route.priority})`);
    return copyRoute(route);
  }

  unregister(routeId: string): void {
    if (!this.routes.delete(routeId)) {
      throw new RouteNotFoundError(routeId);
    }
    this.metrics.delete(routeId);
    log.info(`Unregistered route ${routeId}`);
  }

  has(routeId: string): boolean {
    return this.routes.has(routeId);
  }

  getRoute(routeId: string): Route | undefined {
    const entry = this.routes.get(routeId);
    return entry ? copyRoute(entry.route) : undefined;
  }

  getHandler(routeId: string): RouteHandler | undefined {
    return this.routes.get(routeId)?.handler;
  }

  getRoutesForIntent(intentType: IntentType, enabledOnly = true): Route[] {
    return Array.from(this.routes.values())
      .filter((entry) => entry.route.intentType === intentType && (!enabledOnly || entry.route.enabled))
      .sort(byPriority)
      .map((entry) => copyRoute(entry.route));
  }

  listRoutes(intentType?: IntentType, enabledOnly = false): Route[] {
    if (intentType) {
      return this.getRoutesForIntent(intentType, enabledOnly);
    }
    return Array.from(this.routes.values())
      .filter((entry) => !enabledOnly || entry.route.enabled)
      .map((entry) => copyRoute(entry.route));
  }

  enable(routeId: string): boolean {
    return this.setEnabled(routeId, true);
  }

  disable(routeId: string): boolean {
    return this.setEnabled(routeId, false);
  }

  // Routes unregistered while their handler ran have no metrics left to update.
  updateMetrics(routeId: string, success: boolean, latencyMs: number, confidence: number): void {
    const state = this.metrics.get(routeId);
    if (!state) {
      log.debug(`Ignoring metrics for unregistered route ${routeId}`);
      return;
    }

    state.totalExecutions += 1;
    if (success) {
      state.successfulExecutions += 1;
    } else {
      state.failedExecutions += 1;
    }

    const n = state.totalExecutions;
    if (n === 1) {
      state.avgExecutionTimeMs = latencyMs;
      state.minExecutionTimeMs = latencyMs;
      state.maxExecutionTimeMs = latencyMs;
      state.avgConfidence = confidence;
    } else {
      state.avgExecutionTimeMs = (state.avgExecutionTimeMs * (n - 1) + latencyMs) / n;
      state.minExecutionTimeMs = Math.min(state.minExecutionTimeMs, latencyMs);
      state.maxExecutionTimeMs = Math.max(state.maxExecutionTimeMs, latencyMs);
      state.avgConfidence = (state.avgConfidence * (n - 1) + confidence) / n;
    }

    const now = this.now();
    state.lastExecution = now;
    state.executions.push(now);
    this.prune(state, now);
  }

  executionsInWindow(routeId: string, windowMs: number): number {
    const state = this.metrics.get(routeId);
    if (!state) {
      return 0;
    }
    const now = this.now();
    this.prune(state, now);
    return state.executions.filter((timestamp) => timestamp > now - windowMs).length;
  }

  getMetrics(routeId: string): RouteMetrics | undefined {
    const state = this.metrics.get(routeId);
    return state ? this.toMetrics(routeId, state) : undefined;
  }

  getAllMetrics(): RouteMetrics[] {
    return Array.from(this.metrics.entries(), ([routeId, state]) => this.toMetrics(routeId, state));
  }

  // Routes that never ran are not ranked by success rate or latency.
  getTopRoutes(n = 10, by: TopRoutesMetric = 'executions'): RouteMetrics[] {
    const all = this.getAllMetrics();
    let ranked: RouteMetrics[];
    if (by === 'successRate') {
      ranked = all.filter((m) => m.totalExecutions > 0).sort((a, b) => b.successRate - a.successRate);
    } else if (by === 'avgLatency') {
      ranked = all.filter((m) => m.totalExecutions > 0).sort((a, b) => a.avgExecutionTimeMs - b.avgExecutionTimeMs);
    } else {
      ranked = all.sort((a, b) => b.totalExecutions - a.totalExecutions);
    }
    return ranked.slice(0, Math.max(0, n));
  }

  resetMetrics(routeId?: string): void {
    if (routeId) {
      if (this.metrics.has(routeId)) {
        this.metrics.set(routeId, emptyMetrics());
      }
    } else {
      this.metrics = new Map(Array.from(this.routes.keys(), (id): [string, MetricsState] => [id, emptyMetrics()]));
    }
    log.info(`Reset metrics for ${routeId ?? 'all routes'}`);
  }

  getSummary(): RegistrySummary {
    const routes = Array.from(this.routes.values(), (entry) => entry.route);
    const enabledRoutes = routes.filter((route) => route.enabled).length;
    const routesByIntent: Partial<Record<IntentType, number>> = {};
    routes.forEach((route) => {
      routesByIntent[route.intentType] = (routesByIntent[route.intentType] ?? 0) + 1;
    });

    let totalExecutions = 0;
    let totalSuccesses = 0;
    let totalFailures = 0;
    for (const state of this.metrics.values()) {
      totalExecutions += state.totalExecutions;
      totalSuccesses += state.successfulExecutions;
      totalFailures += state.failedExecutions;
    }

    return {
      totalRoutes: routes.length,
      enabledRoutes,
      disabledRoutes: routes.length - enabledRoutes,
      routesByIntent,
      totalExecutions,
      totalSuccesses,
      totalFailures,
      overallSuccessRate: totalExecutions > 0 ? (totalSuccesses / totalExecutions) * 100 : 0,
    };
  }

  private setEnabled(routeId: string, enabled: boolean): boolean {
    const entry = this.routes.get(routeId);
    if (!entry) {
      return false;
    }
    entry.route = { ...entry.route, enabled };
    log.info(`${enabled ? 'Enabled' : 'Disabled'} route ${routeId}`);
    return true;
  }

  private prune(state: MetricsState, now: number): void {
    const cutoff = now - DAY_MS;
    const firstKept = state.executions.findIndex((timestamp) => timestamp > cutoff);
    if (firstKept === -1) {
      state.executions = [];
    } else if (firstKept > 0) {
      state.executions = state.executions.slice(firstKept);
    }
  }

  private toMetrics(routeId: string, state: MetricsState): RouteMetrics {
    const now = this.now();
    this.prune(state, now);
    const { executions, ...counters } = state;
    const total = state.totalExecutions;
    return {
      routeId,
      ...counters,
      executionsLastHour: executions.filter((timestamp) => timestamp > now - HOUR_MS).length,
      executionsLastDay: executions.length,
      successRate: total > 0 ? (state.successfulExecutions / total) * 100 : 0,
      errorRate: total > 0 ? (state.failedExecutions / total) * 100 : 0,
    };
  }
}
