import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from './middleware/errorHandlers';
import { AppDependencies, requireNbaClient } from './dependencies';
import { formatGameForCalendar, formatIsoDate } from '../lib/calendar';
import { describeError, isNbaApiError, NbaApiError } from '../lib/errors';
import type { CalendarAuthStatus, CalendarEventResponse } from '../types/calendar';

const gameEventSchema = z.object({
  summary: z.string().min(1),
  location: z.string().nullish(),
  description: z.string().nullish(),
  start_datetime: z.string().min(1),
  end_datetime: z.string().min(1),
  game_id: z.number().int(),
  home_team: z.string(),
  visitor_team: z.string(),
});

const upcomingEventsQuerySchema = z.object({
  max_results: z.coerce.number().int().positive().max(250).default(10),
});

const teamGamesQuerySchema = z.object({
  team_id: z.coerce.number().int().positive(),
  max_games: z.coerce.number().int().positive().default(5),
});

export function createCalendarRouter(deps: AppDependencies): Router {
  const calendarRouter = Router();
  const { calendarService } = deps;
  const now = deps.now ?? (() => new Date());

  const ensureAuthenticated = async (): Promise<void> => {
    if (!(await calendarService.isAuthenticated())) {
      throw new NbaApiError('CALENDAR_NOT_AUTHENTICATED', 'Calendar service not authenticated');
    }
  };

  // GET /calendar/auth-status
  calendarRouter.get('/auth-status', asyncHandler(async (_, res) => {
    const authenticated = await calendarService.isAuthenticated();
    const status: CalendarAuthStatus = {
      authenticated,
      message: authenticated ? 'Authenticated and ready to use' : 'Not authenticated',
    };
    res.status(200).json(status);
  }));

  // GET /calendar/upcoming-events?max_results=10
  calendarRouter.get('/upcoming-events', asyncHandler(async (req, res) => {
    const { max_results } = upcomingEventsQuerySchema.parse(req.query);
    await ensureAuthenticated();

    res.status(200).json(await calendarService.listUpcomingEvents(max_results));
  }));

  // POST /calendar/add-game - Add a single game event
  calendarRouter.post('/add-game', asyncHandler(async (req, res) => {
    const gameEvent = gameEventSchema.parse(req.body);
    await ensureAuthenticated();

    res.status(200).json(await calendarService.addEvent(gameEvent));
  }));

  // POST /calendar/add-team-games?team_id=14&max_games=5 - Add a team's upcoming games
  calendarRouter.post('/add-team-games', asyncHandler(async (req, res) => {
    const { team_id, max_games } = teamGamesQuerySchema.parse(req.query);
    const client = requireNbaClient(deps);
    await ensureAuthenticated();

    const games = await client.getTeamGames(team_id, { startDate: formatIsoDate(now()) });
    if (games.length === 0) {
      throw new NbaApiError('NOT_FOUND', `No upcoming games found for team ID ${team_id}`);
    }

    const results: CalendarEventResponse[] = [];
    for (const game of games.slice(0, max_games)) {
      try {
        results.push(await calendarService.addEvent(formatGameForCalendar(game)));
      } catch (error) {
        if (!isNbaApiError(error, 'CALENDAR_ERROR')) {
          throw error;
        }
        console.warn(`⚠️ Skipping game ${game.id}: ${describeError(error)}`);
      }
    }

    if (results.length === 0) {
      throw new NbaApiError('CALENDAR_ERROR', 'Failed to add any games to calendar');
    }

    res.status(200).json(results);
  }));

  return calendarRouter;
}
