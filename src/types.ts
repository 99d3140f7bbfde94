export const INTENT_TYPES = [
  'greeting',
  'question',
  'command',
  'feedback',
  'loan_application',
  'collateral_check',
  'credit_history',
  'document_upload',
  'profile_analysis',
  'job_matching',
  'skill_recommendation',
  'help',
  'status',
  'settings',
  'multi_intent',
  'clarification_needed',
  'unknown',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

export const CONFIDENCE_LEVELS = ['very_high', 'high', 'medium', 'low', 'very_low'] as const;

export type ConfidenceLevel = (typeof CONFIDENCE_LEVELS)[number];

export const FALLBACK_STRATEGIES = [
  'ask_clarification',
  'use_default',
  'use_history',
  'escalate_to_human',
  'provide_options',
] as const;

export type FallbackStrategy = (typeof FALLBACK_STRATEGIES)[number];

export type Sentiment = 'positive' | 'negative' | 'neutral';

export type ContextValue = string | number | boolean | string[];

export type ContextData = Record<string, ContextValue>;

export type Clock = () => number;

export interface Intent {
  readonly id: string;
  readonly type: IntentType;
  readonly confidence: number;
  readonly confidenceLevel: ConfidenceLevel;
  readonly text: string;
  readonly entities: Readonly<ContextData>;
  readonly parameters: Readonly<ContextData>;
  readonly language: string;
  readonly sentiment?: Sentiment;
  readonly timestamp: number;
}

export interface MultiIntentResult {
  primary: Intent;
  secondary: Intent[];
  executionOrder: string[];
  requiresClarification: boolean;
}

export interface IntentContext {
  sessionId: string;
  userId?: string;
  history: Intent[];
  currentTopic?: string;
  contextData: ContextData;
  preferences: ContextData;
  language: string;
  createdAt: number;
  lastInteraction: number;
  interactionCount: number;
}

export interface SessionUpdate {
  intent?: Intent;
  contextData?: ContextData;
  preferences?: ContextData;
  topic?: string;
}

export interface SignalWeights {
  keyword: number;
  phrase: number;
  regex: number;
}

export interface IntentPattern {
  intentType: IntentType;
  keywords: string[];
  phrases: string[];
  regexes: string[];
  weights: SignalWeights;
  saturation?: Partial<SignalWeights>;
  entityPatterns: Record<string, string>;
}

export interface Route {
  id: string;
  intentType: IntentType;
  priority: number;
  requiresAuth: boolean;
  requiredContextKeys: string[];
  minConfidence: number;
  rateLimit?: number;
  enabled: boolean;
  tags: string[];
  description?: string;
}

export interface RouteResponse {
  message: string;
  data?: ContextData;
  suggestedActions?: string[];
  clarificationOptions?: string[];
  followupIntent?: IntentType;
  contextUpdates?: ContextData;
}

export interface HandlerOptions {
  signal: AbortSignal;
}

export interface RouteHandler {
  execute(intent: Intent, context: IntentContext | undefined, options: HandlerOptions): Promise<RouteResponse> | RouteResponse;
}

export type RouteErrorKind = 'handler_error' | 'timeout' | 'cancelled';

export interface RouteError {
  kind: RouteErrorKind;
  message: string;
}

export interface RouteResult {
  routeId: string;
  intent: Intent;
  success: boolean;
  response?: RouteResponse;
  error?: RouteError;
  executionTimeMs: number;
  requiresFollowup: boolean;
  followupIntent?: IntentType;
  fallbackStrategy?: FallbackStrategy;
  timestamp: number;
}

export interface RouteMetrics {
  routeId: string;
  totalExecutions: number;
  successfulExecutions: number;
  failedExecutions: number;
  avgExecutionTimeMs: number;
  minExecutionTimeMs: number;
  maxExecutionTimeMs: number;
  avgConfidence: number;
  lastExecution?: number;
  executionsLastHour: number;
  executionsLastDay: number;
  successRate: number;
  errorRate: number;
}

export type TopRoutesMetric = 'executions' | 'successRate' | 'avgLatency';

export interface FallbackResult {
  strategy: FallbackStrategy;
  intent: Intent;
  handled: boolean;
  response: string;
  suggestedActions: string[];
  clarificationOptions?: string[];
  inferredIntent?: IntentType;
  timestamp: number;
}

export interface HistoryFilters {
  userId?: string;
  intentType?: IntentType;
  since?: number;
  limit?: number;
}

export const isIntentType = (value: string): value is IntentType => INTENT_TYPES.some((type) => type === value);
