import { toPlayerSummary } from '../lib/players';
import { assertPlayerId, assertSeasons } from '../lib/validation';
import { ComparisonResult, GROWTH_METRICS, GrowthEntry, SeasonAverages } from '../types/stats';
import type { PlayerDataSource } from './ballDontLieClient';
import { calculateGrowth } from './growthCalculator';
import { aggregateSeason } from './seasonAggregator';

export class SeasonComparisonService {
  constructor(
    private readonly dataSource: PlayerDataSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  /**
   * Compare a player's per-game averages across seasons.
   *
   * Seasons are processed in the order given (duplicates included) and growth
   * is computed between neighbours in that list, not between calendar years.
   * Any failed fetch aborts the whole comparison.
   */
  async compareSeasons(playerId: number, seasons: number[]): Promise<ComparisonResult> {
    assertPlayerId(playerId);
    assertSeasons(seasons, this.now());

    console.log(`📊 Comparing seasons ${seasons.join(', ')} for player ${playerId}`);

    const player = await this.dataSource.fetchPlayer(playerId);

    const averagesBySeason = new Map<number, SeasonAverages | null>();
    for (const season of seasons) {
      const stats = await this.dataSource.fetchPlayerGameStats(playerId, season);
      if (stats.length === 0) {
        console.warn(`⚠️ No stats found for player ${playerId} in season ${season}`);
      }
      averagesBySeason.set(season, aggregateSeason(stats));
    }

    const growth: Record<string, GrowthEntry> = {};
    for (let i = 1; i < seasons.length; i++) {
      const prevSeason = seasons[i - 1];
      const currSeason = seasons[i];
      const prev = averagesBySeason.get(prevSeason);
      const curr = averagesBySeason.get(currSeason);

      if (!prev || !curr) {
        continue;
      }
      growth[`${prevSeason}-${currSeason}`] = calculateGrowth(prev, curr, GROWTH_METRICS);
    }

    const seasonAverages: Record<string, SeasonAverages | null> = {};
    for (const [season, averages] of averagesBySeason) {
      seasonAverages[String(season)] = averages;
    }

    return {
      player: toPlayerSummary(player),
      seasons: [...seasons],
      season_averages: seasonAverages,
      growth,
      metrics: [...GROWTH_METRICS],
    };
  }
}
