export type RoutingErrorCode =
  | 'INVALID_INPUT'
  | 'INVALID_PATTERN'
  | 'ROUTE_REGISTRATION'
  | 'ROUTE_NOT_FOUND'
  | 'HANDLER_TIMEOUT'
  | 'HANDLER_CANCELLED';

export abstract class RoutingError extends Error {
  abstract readonly code: RoutingErrorCode;

  constructor(message: string, public readonly details: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

export class InputError extends RoutingError {
  readonly code = 'INVALID_INPUT';
}

export class PatternValidationError extends RoutingError {
  readonly code = 'INVALID_PATTERN';
}

export class RouteRegistrationError extends RoutingError {
  readonly code = 'ROUTE_REGISTRATION';
}

export class RouteNotFoundError extends RoutingError {
  readonly code = 'ROUTE_NOT_FOUND';

  constructor(routeId: string) {
    super(`Route ${routeId} not found`, { routeId });
  }
}

export class HandlerTimeoutError extends RoutingError {
  readonly code = 'HANDLER_TIMEOUT';

  constructor(routeId: string, timeoutMs: number) {
    super(`Handler for route ${routeId} timed out after ${timeoutMs}ms`, { routeId, timeoutMs });
  }
}

export class HandlerCancelledError extends RoutingError {
  readonly code = 'HANDLER_CANCELLED';

  constructor(routeId: string) {
    super(`Handler for route ${routeId} was cancelled`, { routeId });
  }
}

export const isRoutingError = (error: unknown): error is RoutingError => error instanceof RoutingError;

export const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));
