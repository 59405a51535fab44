import { NbaApiError } from '../lib/errors';
import type { NbaDataClient } from '../services/ballDontLieClient';
import type { CalendarService } from '../services/calendarService';
import type { CacheDriver } from '../services/responseCache';
import type { AppConfig } from '../config';
import type { RequestRateLimiter } from './middleware/rateLimit';

export interface AppDependencies {
  /** null when no BallDontLie API key is configured */
  nbaClient: NbaDataClient | null;
  calendarService: CalendarService;
  rateLimiter: RequestRateLimiter;
  corsOrigins: string[];
  cacheDriver: CacheDriver;
  environment: AppConfig['nodeEnv'];
  now?: () => Date;
  logRequests?: boolean;
}

export function requireNbaClient(deps: AppDependencies): NbaDataClient {
  if (!deps.nbaClient) {
    console.error('❌ BallDontLie API key not configured');
    throw new NbaApiError('CONFIGURATION_ERROR', 'API key not configured');
  }
  return deps.nbaClient;
}
