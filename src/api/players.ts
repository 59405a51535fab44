import { Router } from 'express';
import { z } from 'zod';
import { asyncHandler } from './middleware/errorHandlers';
import { AppDependencies, requireNbaClient } from './dependencies';
import { toPlayerStat } from '../lib/players';

const playerIdSchema = z.object({
  playerId: z.coerce.number().int().positive(),
});

const searchQuerySchema = z.object({
  name: z.string().trim().min(1),
});

const statsQuerySchema = z.object({
  season: z.coerce.number().int().optional(),
});

export function createPlayersRouter(deps: AppDependencies): Router {
  const playersRouter = Router();

  // GET /players/search?name=LeBron James - Search players by name
  playersRouter.get('/search', asyncHandler(async (req, res) => {
    const { name } = searchQuerySchema.parse(req.query);
    const client = requireNbaClient(deps);

    console.log(`🔍 Searching for player: ${name}`);
    const players = await client.searchPlayers(name);
    console.log(`✅ Found ${players.length} players matching '${name}'`);

    res.status(200).json({
      count: players.length,
      results: players,
    });
  }));

  // GET /players/:playerId - Player details
  playersRouter.get('/:playerId', asyncHandler(async (req, res) => {
    const { playerId } = playerIdSchema.parse(req.params);
    const client = requireNbaClient(deps);

    const player = await client.fetchPlayer(playerId);
    res.status(200).json(player);
  }));

  // GET /players/:playerId/stats?season=2023 - Player details with a game line
  playersRouter.get('/:playerId/stats', asyncHandler(async (req, res) => {
    const { playerId } = playerIdSchema.parse(req.params);
    const { season } = statsQuerySchema.parse(req.query);
    const client = requireNbaClient(deps);

    const player = await client.fetchPlayer(playerId);
    const stats = await client.fetchPlayerGameStats(playerId, season ?? null);

    res.status(200).json({
      ...player,
      stats: stats.length > 0 ? toPlayerStat(stats[0], season ?? null) : null,
    });
  }));

  return playersRouter;
}
