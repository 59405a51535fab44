import express, { Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import type { AppConfig } from './config';
import { AppDependencies } from './api/dependencies';
import { API_VERSION, createHealthRouter } from './api/health';
import { createPlayersRouter } from './api/players';
import { createStatsRouter } from './api/stats';
import { createCalendarRouter } from './api/calendar';
import { errorHandler, notFoundHandler } from './api/middleware/errorHandlers';
import { rateLimit, RequestRateLimiter } from './api/middleware/rateLimit';
import { BallDontLieClient } from './services/ballDontLieClient';
import { GoogleCalendarService } from './services/calendarService';
import { createResponseCache } from './services/responseCache';

export function createDependencies(appConfig: AppConfig): AppDependencies {
  const cache = createResponseCache(appConfig.cacheDriver, {
    directory: appConfig.cacheDir,
    ttlSeconds: appConfig.cacheTtlSeconds,
  });

  if (!appConfig.ballDontLieApiKey) {
    console.warn('⚠️ BALLDONTLIE_API_KEY environment variable not set');
    console.warn('⚠️ Data endpoints will fail until the key is configured.');
  }

  const nbaClient = appConfig.ballDontLieApiKey
    ? new BallDontLieClient({
      apiKey: appConfig.ballDontLieApiKey,
      baseUrl: appConfig.ballDontLieApiBaseUrl,
      cache,
      minRequestIntervalMs: appConfig.apiRateLimitDelayMs,
    })
    : null;

  return {
    nbaClient,
    calendarService: new GoogleCalendarService({
      tokenPath: appConfig.googleTokenPath,
      timeZone: appConfig.calendarTimeZone,
    }),
    rateLimiter: new RequestRateLimiter({
      maxRequests: appConfig.rateLimitMaxRequests,
      windowMs: appConfig.rateLimitWindowMs,
    }),
    corsOrigins: appConfig.corsOrigins,
    cacheDriver: appConfig.cacheDriver,
    environment: appConfig.nodeEnv,
    logRequests: appConfig.nodeEnv !== 'test',
  };
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({
    origin: deps.corsOrigins.includes('*') ? '*' : deps.corsOrigins,
  }));
  if (deps.logRequests !== false) {
    app.use(morgan('combined'));
  }
  app.use(rateLimit(deps.rateLimiter));
  app.use(express.json({ limit: '1mb' }));

  app.get('/', (_, res) => {
    res.status(200).json({
      message: 'Welcome to the NBA Player Analysis API',
      docs_url: '/docs',
      version: API_VERSION,
    });
  });

  app.use('/health', createHealthRouter(deps));
  app.use('/players', createPlayersRouter(deps));
  app.use('/stats', createStatsRouter(deps));
  app.use('/calendar', createCalendarRouter(deps));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
