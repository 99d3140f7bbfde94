import {
  Clock,
  ContextData,
  Intent,
  IntentContext,
  MultiIntentResult,
  Route,
  RouteErrorKind,
  RouteHandler,
  RouteResponse,
  RouteResult,
} from '../types';
import { ContextManager } from '../memory/contextManager';
import { HandlerCancelledError, HandlerTimeoutError, errorMessage } from '../utils/errors';
import { childLogger } from '../utils/logger';
import { FallbackHandler } from './fallback';
import { RouteRegistry } from './registry';

const log = childLogger('router');

const RATE_WINDOW_MS = 60 * 1000;

export interface RouteOptions {
  signal?: AbortSignal;
  timeoutMs?: number;
}

export interface RouterOptions {
  handlerTimeoutMs?: number;
  now?: Clock;
}

export interface RouteValidation {
  canRoute: boolean;
  reasons: string[];
}

const errorKind = (error: unknown): RouteErrorKind => {
  if (error instanceof HandlerTimeoutError) return 'timeout';
  if (error instanceof HandlerCancelledError) return 'cancelled';
  return 'handler_error';
};

interface Interruption {
  promise: Promise<never>;
  dispose: () => void;
}

// Rejects on timeout or caller abort and aborts the signal handed to the handler.
const interruption = (
  routeId: string,
  timeoutMs: number,
  controller: AbortController,
  signal?: AbortSignal,
): Interruption => {
  let dispose = (): void => undefined;
  const promise = new Promise<never>((_resolve, reject) => {
    const fail = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };
    const timer = setTimeout(() => fail(new HandlerTimeoutError(routeId, timeoutMs)), timeoutMs);
    const onAbort = (): void => fail(new HandlerCancelledError(routeId));
    signal?.addEventListener('abort', onAbort, { once: true });
    dispose = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    };
  });
  return { promise, dispose };
};

export class IntentRouter {
  private readonly handlerTimeoutMs: number;
  private readonly now: Clock;

  constructor(
    private readonly registry: RouteRegistry,
    private readonly contexts: ContextManager,
    private readonly fallback: FallbackHandler,
    options: RouterOptions = {},
  ) {
    this.handlerTimeoutMs = options.handlerTimeoutMs ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  async route(
    intent: Intent,
    context?: IntentContext,
    authenticated = false,
    options: RouteOptions = {},
  ): Promise<RouteResult> {
    for (const route of this.registry.getRoutesForIntent(intent.type)) {
      const reasons = this.ineligibility(route, intent, context, authenticated);
      if (reasons.length > 0) {
        log.debug(`Skipping route ${route.id}: ${reasons.join('; ')}`);
        continue;
      }
      const handler = this.registry.getHandler(route.id);
      if (!handler) {
        continue;
      }
      return this.execute(route, handler, intent, context, options);
    }
    return this.handleNoRoute(intent, context);
  }

  /**
   * Routes each intent of a multi-intent classification in execution order.
   * The turn is committed to the context after every step, so later handlers
   * see the context updates of earlier ones.
   */
  async routeMulti(
    classification: MultiIntentResult,
    context?: IntentContext,
    authenticated = false,
    options: RouteOptions = {},
  ): Promise<RouteResult[]> {
    const intents = [classification.primary, ...classification.secondary];
    const results: RouteResult[] = [];
    let current = context;

    for (const intentId of classification.executionOrder) {
      const intent = intents.find((candidate) => candidate.id === intentId);
      if (!intent) {
        log.error(`Intent ${intentId} is not part of the classification`);
        continue;
      }
      const result = await this.route(intent, current, authenticated, options);
      results.push(result);
      if (current) {
        current = this.commitTurn(current, intent, result, {
          [`result_${intent.id}`]: `${result.routeId}:${result.success ? 'ok' : 'failed'}`,
        });
      }
    }
    return results;
  }

  /**
   * Appends the intent and merges the handler's context updates. Sessions
   * owned by the context manager are updated in place there; any other
   * context, including one that expired while its handler ran, is updated as
   * a copy that is not stored anywhere.
   */
  commitTurn(context: IntentContext, intent: Intent, result: RouteResult, extra: ContextData = {}): IntentContext {
    const contextData: ContextData = { ...result.response?.contextUpdates, ...extra };
    const updated = this.contexts.updateSession(context.sessionId, { intent, contextData });
    if (updated) {
      return updated;
    }

    log.warn(`Session ${context.sessionId} is not live; turn for route ${result.routeId} was not saved`);
    const copy = structuredClone(context);
    copy.history.push(intent);
    if (intent.type !== 'unknown') {
      copy.currentTopic = intent.type;
    }
    Object.assign(copy.contextData, contextData);
    copy.lastInteraction = Math.max(copy.lastInteraction, this.now());
    copy.interactionCount += 1;
    return copy;
  }

  validateRoute(routeId: string, intent: Intent, context?: IntentContext, authenticated = false): RouteValidation {
    const route = this.registry.getRoute(routeId);
    if (!route) {
      return { canRoute: false, reasons: [`Route ${routeId} not found`] };
    }
    const reasons: string[] = [];
    if (!route.enabled) {
      reasons.push('Route is disabled');
    }
    if (route.intentType !== intent.type) {
      reasons.push(`Route expects ${route.intentType}, got ${intent.type}`);
    }
    reasons.push(...this.ineligibility(route, intent, context, authenticated));
    return { canRoute: reasons.length === 0, reasons };
  }

  private ineligibility(route: Route, intent: Intent, context: IntentContext | undefined, authenticated: boolean): string[] {
    const reasons: string[] = [];
    if (intent.confidence < route.minConfidence) {
      reasons.push(`Confidence ${intent.confidence} below minimum ${route.minConfidence}`);
    }
    if (route.requiresAuth && !authenticated) {
      reasons.push('Route requires authentication');
    }
    if (route.requiredContextKeys.length > 0) {
      if (!context) {
        reasons.push('Route requires context but none provided');
      } else {
        const missing = route.requiredContextKeys.filter((key) => !Object.hasOwn(context.contextData, key));
        if (missing.length > 0) {
          reasons.push(`Missing context keys: ${missing.join(', ')}`);
        }
      }
    }
    if (route.rateLimit !== undefined && this.registry.executionsInWindow(route.id, RATE_WINDOW_MS) >= route.rateLimit) {
      reasons.push(`Rate limit of ${route.rateLimit} per minute reached`);
    }
    return reasons;
  }

  private async execute(
    route: Route,
    handler: RouteHandler,
    intent: Intent,
    context: IntentContext | undefined,
    options: RouteOptions,
  ): Promise<RouteResult> {
    const started = performance.now();
    const timeoutMs = options.timeoutMs ?? this.handlerTimeoutMs;
    const controller = new AbortController();
    const interrupt = interruption(route.id, timeoutMs, controller, options.signal);

    let response: RouteResponse | undefined;
    let failure: unknown;
    try {
      if (options.signal?.aborted) {
        throw new HandlerCancelledError(route.id);
      }
      const running = Promise.resolve().then(() => handler.execute(intent, context, { signal: controller.signal }));
      response = await Promise.race([running, interrupt.promise]);
    } catch (error) {
      failure = error;
    } finally {
      interrupt.dispose();
    }

    const executionTimeMs = performance.now() - started;
    const success = failure === undefined && response !== undefined;
    this.registry.updateMetrics(route.id, success, executionTimeMs, intent.confidence);

    if (!success || !response) {
      const message = errorMessage(failure ?? 'Handler returned no response');
      log.error(`Route ${route.id} failed: ${message}`);
      return {
        routeId: route.id,
        intent,
        success: false,
        error: { kind: errorKind(failure), message },
        executionTimeMs,
        requiresFollowup: false,
        timestamp: this.now(),
      };
    }

    return {
      routeId: route.id,
      intent,
      success: true,
      response,
      executionTimeMs,
      requiresFollowup: response.followupIntent !== undefined,
      followupIntent: response.followupIntent,
      timestamp: this.now(),
    };
  }

  private handleNoRoute(intent: Intent, context?: IntentContext): RouteResult {
    const started = performance.now();
    const fallback = this.fallback.handle(intent, context);
    const response: RouteResponse = {
      message: fallback.response,
      suggestedActions: fallback.suggestedActions,
      clarificationOptions: fallback.clarificationOptions,
      followupIntent: fallback.inferredIntent,
    };
    return {
      routeId: 'fallback',
      intent,
      success: fallback.handled,
      response,
      executionTimeMs: performance.now() - started,
      requiresFollowup: fallback.strategy === 'ask_clarification' || fallback.strategy === 'use_history',
      followupIntent: fallback.inferredIntent,
      fallbackStrategy: fallback.strategy,
      timestamp: this.now(),
    };
  }
}
