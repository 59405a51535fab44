/**
 * Test app wiring: real Express stack, fake upstream services
 */

import type { Express } from 'express';
import { createApp } from '../../src/app';
import type { AppDependencies } from '../../src/api/dependencies';
import { RequestRateLimiter } from '../../src/api/middleware/rateLimit';
import type { CalendarService } from '../../src/services/calendarService';
import type { CalendarEventResponse, CalendarEventSummary } from '../../src/types/calendar';

export const TEST_NOW = new Date('2026-10-18T12:00:00Z');

export function createFakeCalendarService(authenticated = true) {
  const service = {
    isAuthenticated: jest.fn(async (): Promise<boolean> => authenticated),
    listUpcomingEvents: jest.fn(async (): Promise<CalendarEventSummary[]> => []),
    addEvent: jest.fn(async (): Promise<CalendarEventResponse> => ({
      id: 'evt-1',
      htmlLink: 'https://calendar.test/evt-1',
      status: 'created',
    })),
  } satisfies CalendarService;

  return service;
}

export type FakeCalendarService = ReturnType<typeof createFakeCalendarService>;

export function createTestApp(overrides: Partial<AppDependencies> = {}): Express {
  return createApp({
    nbaClient: null,
    calendarService: createFakeCalendarService(),
    rateLimiter: new RequestRateLimiter({ maxRequests: 1000, windowMs: 60_000 }),
    corsOrigins: ['*'],
    cacheDriver: 'memory',
    environment: 'test',
    now: () => TEST_NOW,
    logRequests: false,
    ...overrides,
  });
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  jest.spyOn(console, 'error').mockImplementation(() => undefined);
}
