import express, { ErrorRequestHandler, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { z } from 'zod';
import { config } from './config';
import { INTENT_TYPES } from './types';
import { IntentRoutingService } from './routing/service';
import { RouteNotFoundError, RoutingErrorCode, isRoutingError } from './utils/errors';
import { childLogger } from './utils/logger';
import { MAX_INPUT_LENGTH } from './utils/sanitize';

const logger = childLogger('http');

const ChatSchema = z.object({
  message: z.string().min(1).max(MAX_INPUT_LENGTH),
  sessionId: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
  language: z.string().min(2).optional(),
  authenticated: z.boolean().default(false),
  multi: z.boolean().default(false),
});

const ClassifySchema = z.object({
  text: z.string().max(MAX_INPUT_LENGTH),
  sessionId: z.string().min(1).optional(),
  userId: z.string().min(1).optional(),
});

const contextValue = z.union([z.string(), z.number(), z.boolean(), z.array(z.string())]);

const SessionSchema = z.object({
  userId: z.string().min(1).optional(),
  language: z.string().min(2).optional(),
  preferences: z.record(contextValue).optional(),
});

const ValueSchema = z.object({ value: contextValue });

const TopicSchema = z.object({ topic: z.string().min(1) });

const queryFlag = z.enum(['true', 'false']).transform((value) => value === 'true');
const intentType = z.enum(INTENT_TYPES);

const RoutesQuery = z.object({
  intentType: intentType.optional(),
  enabledOnly: queryFlag.default('false'),
});

const TopRoutesQuery = z.object({
  n: z.coerce.number().int().min(1).max(100).default(10),
  by: z.enum(['executions', 'successRate', 'avgLatency']).default('executions'),
});

const HistoryQuery = z.object({
  userId: z.string().min(1).optional(),
  intentType: intentType.optional(),
  sinceHours: z.coerce.number().positive().optional(),
  limit: z.coerce.number().int().positive().default(100),
});

const WindowQuery = z.object({
  userId: z.string().min(1).optional(),
  intentType: intentType.optional(),
  hours: z.coerce.number().positive().default(24),
  n: z.coerce.number().int().min(1).max(50).default(10),
});

const HourlyQuery = z.object({
  userId: z.string().min(1).optional(),
  hours: z.coerce.number().int().min(1).max(168).default(24),
});

const SessionHistoryQuery = z.object({
  n: z.coerce.number().int().positive().optional(),
});

const STATUS_BY_CODE: Record<RoutingErrorCode, number> = {
  INVALID_INPUT: 400,
  INVALID_PATTERN: 400,
  ROUTE_REGISTRATION: 409,
  ROUTE_NOT_FOUND: 404,
  HANDLER_TIMEOUT: 504,
  HANDLER_CANCELLED: 499,
};

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

const asyncRoute =
  (handler: AsyncHandler) =>
  (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };

const notFound = (res: Response, message: string): void => {
  res.status(404).json({ error: message });
};

export interface AppOptions {
  allowedOrigins?: string[];
  rateLimitPerMinute?: number;
}

export const createApp = (service: IntentRoutingService, options: AppOptions = {}): express.Express => {
  const app = express();
  const allowedOrigins = options.allowedOrigins ?? config.allowedOrigins;

  app.use(express.json({ limit: '1mb' }));
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin)) {
          callback(null, origin ?? allowedOrigins[0]);
        } else {
          callback(new Error('Not allowed by CORS'));
        }
      },
      credentials: false,
    }),
  );
  app.use(helmet());
  app.use(
    rateLimit({
      windowMs: 60 * 1000,
      max: options.rateLimitPerMinute ?? config.rateLimitPerMinute,
      standardHeaders: true,
      legacyHeaders: false,
    }),
  );

  app.post(
    '/api/chat',
    asyncRoute(async (req, res) => {
      const body = ChatSchema.parse(req.body ?? {});
      const controller = new AbortController();
      res.on('close', () => {
        if (!res.writableEnded) {
          controller.abort();
        }
      });
      const request = {
        sessionId: body.sessionId,
        userId: body.userId,
        language: body.language,
        authenticated: body.authenticated,
        signal: controller.signal,
      };

      if (body.multi) {
        const turn = await service.routeMulti(body.message, request);
        res.json({
          sessionId: turn.sessionId,
          saved: turn.saved,
          replies: turn.results.map((result) => result.response?.message ?? ''),
          intents: turn.results.map((result) => result.intent.type),
          requiresClarification: turn.classification.requiresClarification,
          results: turn.results,
        });
        return;
      }

      const turn = await service.route(body.message, request);
      const { sessionId, saved, ...result } = turn;
      res.json({
        sessionId,
        saved,
        reply: result.response?.message ?? '',
        intent: result.intent.type,
        confidence: result.intent.confidence,
        routeId: result.routeId,
        success: result.success,
        result,
      });
    }),
  );

  app.post('/api/classify', (req, res) => {
    const body = ClassifySchema.parse(req.body ?? {});
    res.json(service.classify(body.text, { sessionId: body.sessionId, userId: body.userId }));
  });

  app.post('/api/classify-multi', (req, res) => {
    const body = ClassifySchema.parse(req.body ?? {});
    res.json(service.classify(body.text, { sessionId: body.sessionId, userId: body.userId, detectMultiple: true }));
  });

  app.get('/api/routes', (req, res) => {
    const query = RoutesQuery.parse(req.query);
    res.json(service.listRoutes(query.intentType, query.enabledOnly));
  });

  app.get('/api/routes/:id', (req, res) => {
    const route = service.getRoute(req.params.id);
    if (!route) {
      throw new RouteNotFoundError(req.params.id);
    }
    res.json(route);
  });

  app.post('/api/routes/:id/enable', (req, res) => {
    if (!service.enableRoute(req.params.id)) {
      throw new RouteNotFoundError(req.params.id);
    }
    res.json({ routeId: req.params.id, enabled: true });
  });

  app.post('/api/routes/:id/disable', (req, res) => {
    if (!service.disableRoute(req.params.id)) {
      throw new RouteNotFoundError(req.params.id);
    }
    res.json({ routeId: req.params.id, enabled: false });
  });

  app.get('/api/routes/:id/metrics', (req, res) => {
    const metrics = service.getRouteMetrics(req.params.id);
    if (!metrics) {
      throw new RouteNotFoundError(req.params.id);
    }
    res.json(metrics);
  });

  app.get('/api/metrics/summary', (_req, res) => {
    res.json(service.getMetricsSummary());
  });

  app.get('/api/metrics/top-routes', (req, res) => {
    const query = TopRoutesQuery.parse(req.query);
    res.json(service.getTopRoutes(query.n, query.by));
  });

  app.post('/api/sessions', (req, res) => {
    const body = SessionSchema.parse(req.body ?? {});
    const sessionId = service.createSession(body.userId, body.language, body.preferences);
    res.status(201).json({ sessionId });
  });

  app.get('/api/sessions/:id', (req, res) => {
    const session = service.getSession(req.params.id);
    if (!session) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    res.json(session);
  });

  app.delete('/api/sessions/:id', (req, res) => {
    if (!service.endSession(req.params.id)) {
      notFound(res, `Session ${req.params.id} not found`);
      return;
    }
    res.status(204).end();
  });

  app.get('/api/sessions/:id/history', (req, res) => {
    const query = SessionHistoryQuery.parse(req.query);
    const history = service.getSessionHistory(req.params.id, query.n);
    if (!history) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    res.json({ sessionId: req.params.id, history });
  });

  app.get('/api/sessions/:id/context/:key', (req, res) => {
    if (!service.getSession(req.params.id)) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    const value = service.getContextValue(req.params.id, req.params.key);
    if (value === undefined) {
      notFound(res, `No context value ${req.params.key}`);
      return;
    }
    res.json({ key: req.params.key, value });
  });

  app.put('/api/sessions/:id/context/:key', (req, res) => {
    const body = ValueSchema.parse(req.body ?? {});
    if (!service.setContextValue(req.params.id, req.params.key, body.value)) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    res.json({ key: req.params.key, value: body.value });
  });

  app.put('/api/sessions/:id/preferences/:key', (req, res) => {
    const body = ValueSchema.parse(req.body ?? {});
    if (!service.setPreference(req.params.id, req.params.key, body.value)) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    res.json({ key: req.params.key, value: body.value });
  });

  app.put('/api/sessions/:id/topic', (req, res) => {
    const body = TopicSchema.parse(req.body ?? {});
    if (!service.setTopic(req.params.id, body.topic)) {
      notFound(res, `Session ${req.params.id} not found or expired`);
      return;
    }
    res.json({ sessionId: req.params.id, topic: body.topic });
  });

  app.get('/api/classifier/statistics', (_req, res) => {
    res.json(service.getClassifierStatistics());
  });

  app.get('/api/history', (req, res) => {
    const query = HistoryQuery.parse(req.query);
    res.json(service.getHistory(query));
  });

  app.get('/api/history/frequency', (req, res) => {
    const query = WindowQuery.parse(req.query);
    res.json(service.getFrequency(query.userId, query.hours));
  });

  app.get('/api/history/top-intents', (req, res) => {
    const query = WindowQuery.parse(req.query);
    res.json(service.getTopIntents(query.n, query.userId, query.hours));
  });

  app.get('/api/history/confidence-stats', (req, res) => {
    const query = WindowQuery.parse(req.query);
    res.json(service.getConfidenceStats(query.intentType, query.userId, query.hours));
  });

  app.get('/api/history/hourly-volume', (req, res) => {
    const query = HourlyQuery.parse(req.query);
    res.json(service.getHourlyVolume(query.hours, query.userId));
  });

  app.get('/api/history/user-patterns/:userId', (req, res) => {
    const patterns = service.getUserPatterns(req.params.userId);
    if (!patterns) {
      notFound(res, `No history for user ${req.params.userId}`);
      return;
    }
    res.json(patterns);
  });

  app.get('/api/history/summary', (_req, res) => {
    res.json(service.getHistorySummary());
  });

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', sessions: service.contexts.size, routes: service.listRoutes().length });
  });

  const errorHandler: ErrorRequestHandler = (error: unknown, _req, res, _next) => {
    if (error instanceof z.ZodError) {
      res.status(400).json({ error: 'Invalid request', issues: error.issues });
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Malformed JSON body' });
      return;
    }
    if (isRoutingError(error)) {
      res.status(STATUS_BY_CODE[error.code]).json({ error: error.message, code: error.code, details: error.details });
      return;
    }
    logger.error(`Unhandled error: ${error instanceof Error ? error.stack ?? error.message : String(error)}`);
    res.status(500).json({ error: 'Internal server error' });
  };
  app.use(errorHandler);

  return app;
};
