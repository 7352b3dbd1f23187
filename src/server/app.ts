import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { SessionRegistry } from '../shared/core/SessionRegistry';
import { GameErrorCode } from '../shared/errors';
import { Logger, createLogger } from '../shared/logger';
import { ServerConfig } from './config';
import { Leaderboard } from './leaderboard/Leaderboard';
import { RequestMetrics } from './metrics/RequestMetrics';
import { asyncHandler, createErrorHandler, requestTiming } from './middleware/http';
import { SessionService } from './services/SessionService';
import { generateNickname } from './utils/NicknameGenerator';

export interface AppDependencies {
  config: ServerConfig;
  sessions: SessionRegistry;
  rooms: SessionRegistry;
  leaderboard: Leaderboard;
  metrics: RequestMetrics;
  version: string;
  logger?: Logger;
  generateId?: () => string;
}

export function createApp(deps: AppDependencies): Express {
  const { config, sessions, rooms, leaderboard, metrics, version } = deps;
  const logger = deps.logger ?? createLogger('Http');
  const service = new SessionService(sessions, leaderboard, config, deps.generateId);

  const app = express();

  // Trust proxy (for rate limiting behind reverse proxy like Nginx)
  app.set('trust proxy', 1);

  app.use(helmet({
    contentSecurityPolicy: false,
    crossOriginEmbedderPolicy: false,
  }));

  app.use(cors({
    origin: (origin, callback) => {
      // Requests without an origin (curl, native shells) are fine outside production
      if (!origin && !config.isProduction) {
        return callback(null, true);
      }
      if (origin && config.allowedOrigins.includes(origin)) {
        callback(null, true);
      } else {
        logger.warn('CORS rejected origin', { origin });
        callback(null, false);
      }
    },
    credentials: true,
  }));

  const apiLimiter = rateLimit({
    windowMs: 15 * 60 * 1000,
    limit: 600,
    message: { error: { code: GameErrorCode.RATE_LIMITED, message: 'Too many requests, please try again later' } },
    standardHeaders: true,
    legacyHeaders: false,
  });

  const sessionCreateLimiter = rateLimit({
    windowMs: 60 * 1000,
    limit: 30,
    message: { error: { code: GameErrorCode.RATE_LIMITED, message: 'Too many session creation requests' } },
    standardHeaders: true,
    legacyHeaders: false,
  });

  app.use(requestTiming(metrics));
  app.use('/api', apiLimiter);
  app.use(express.json({ limit: '10kb' }));

  // Sessions
  app.post('/api/sessions', sessionCreateLimiter, asyncHandler(async (req, res) => {
    res.status(201).json(await service.createSession(req.body));
  }));

  app.get('/api/sessions/:id', asyncHandler(async (req, res) => {
    res.json(await service.getState(req.params.id));
  }));

  app.post('/api/sessions/:id/move', asyncHandler(async (req, res) => {
    res.json(await service.move(req.params.id, req.body));
  }));

  app.post('/api/sessions/:id/new', asyncHandler(async (req, res) => {
    res.json(await service.newGame(req.params.id, req.body));
  }));

  app.get('/api/sessions/:id/save', asyncHandler(async (req, res) => {
    res.json(await service.save(req.params.id));
  }));

  app.post('/api/sessions/:id/load', asyncHandler(async (req, res) => {
    res.json(await service.load(req.params.id, req.body));
  }));

  app.delete('/api/sessions/:id', (req, res) => {
    service.end(req.params.id);
    res.status(204).end();
  });

  // Leaderboard
  app.get('/api/leaderboard', (_req, res) => {
    res.json(leaderboard.getTopScores(config.leaderboardLimit));
  });

  app.get('/api/leaderboard/stats', (_req, res) => {
    res.json(leaderboard.getStats());
  });

  app.post('/api/leaderboard', asyncHandler(async (req, res) => {
    res.json(await service.submitScore(req.body));
  }));

  // Server info
  app.get('/api/performance', (_req, res) => {
    res.json(metrics.snapshot(sessions.size, rooms.size));
  });

  app.get('/api/nickname', (_req, res) => {
    res.json({ nickname: generateNickname() });
  });

  app.get('/api/version', (_req, res) => {
    res.json({ version });
  });

  app.use(createErrorHandler(logger, metrics));

  return app;
}
