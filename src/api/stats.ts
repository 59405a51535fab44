import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from './middleware/errorHandlers';
import { AppDependencies, requireNbaClient } from './dependencies';
import { NbaApiError } from '../lib/errors';
import { SeasonComparisonService } from '../services/seasonComparisonService';

const playerIdSchema = z.object({
  playerId: z.coerce.number().int().positive(),
});

// ?seasons=2021&seasons=2022 arrives as an array, a single season as a string
const compareQuerySchema = z.object({
  seasons: z.preprocess(
    value => (value === undefined ? [] : Array.isArray(value) ? value : [value]),
    z.array(z.coerce.number().int())
  ),
});

const compareBodySchema = z.object({
  seasons: z.array(z.number().int()),
});

export function createStatsRouter(deps: AppDependencies): Router {
  const statsRouter = Router();

  const compare = async (playerId: number, seasons: number[]) => {
    console.log(`📊 API request: Compare seasons ${seasons.join(', ')} for player ${playerId}`);
    if (seasons.length < 1) {
      throw new NbaApiError('INVALID_PARAMETER', 'At least one season must be specified');
    }
    const service = new SeasonComparisonService(requireNbaClient(deps), deps.now);
    return service.compareSeasons(playerId, seasons);
  };

  // GET /stats/player/:playerId/seasons - Seasons the player has game lines for
  statsRouter.get('/player/:playerId/seasons', asyncHandler(async (req, res) => {
    const { playerId } = playerIdSchema.parse(req.params);
    const client = requireNbaClient(deps);

    console.log(`📊 API request: Get seasons for player ${playerId}`);
    const seasons = await client.fetchPlayerSeasons(playerId);

    if (seasons.length === 0) {
      throw new NbaApiError('NOT_FOUND', `No seasons found for player ID ${playerId}`);
    }

    res.status(200).json(seasons);
  }));

  // GET /stats/player/:playerId/compare?seasons=2022&seasons=2023
  statsRouter.get('/player/:playerId/compare', asyncHandler(async (req, res) => {
    const { playerId } = playerIdSchema.parse(req.params);
    const { seasons } = compareQuerySchema.parse(req.query);

    res.status(200).json(await compare(playerId, seasons));
  }));

  // POST /stats/player/:playerId/compare - Same comparison, seasons in the body
  statsRouter.post('/player/:playerId/compare', asyncHandler(async (req, res) => {
    const { playerId } = playerIdSchema.parse(req.params);
    const { seasons } = compareBodySchema.parse(req.body);

    res.status(200).json(await compare(playerId, seasons));
  }));

  return statsRouter;
}
