import { Router } from 'express';
import { asyncHandler } from './middleware/errorHandlers';
import { AppDependencies } from './dependencies';

export const API_VERSION = '0.1.0';

export function createHealthRouter(deps: AppDependencies): Router {
  const healthRouter = Router();
  const now = deps.now ?? (() => new Date());

  // GET /health - Liveness plus the state of each upstream dependency
  healthRouter.get('/', asyncHandler(async (_, res) => {
    const apiKeyConfigured = deps.nbaClient !== null;
    const calendarAuthenticated = await deps.calendarService.isAuthenticated();

    res.status(200).json({
      status: apiKeyConfigured ? 'ok' : 'degraded',
      message: apiKeyConfigured
        ? 'NBA Player Analysis API is healthy'
        : 'NBA Player Analysis API is running without a BallDontLie API key',
      uptime: process.uptime(),
      timestamp: now().toISOString(),
      environment: deps.environment,
      version: API_VERSION,
      services: {
        balldontlie: { configured: apiKeyConfigured },
        cache: { driver: deps.cacheDriver },
        calendar: { authenticated: calendarAuthenticated },
      },
    });
  }));

  return healthRouter;
}
