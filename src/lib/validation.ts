import { NbaApiError } from './errors';

// First BAA/NBA season
export const FIRST_SEASON = 1946;

export function assertPlayerId(playerId: number): void {
  if (!Number.isInteger(playerId) || playerId <= 0) {
    throw new NbaApiError(
      'INVALID_PARAMETER',
      `Invalid player ID: ${playerId}. Must be a positive integer.`
    );
  }
}

export function assertSeason(season: number, now: Date): void {
  const currentYear = now.getFullYear();
  if (!Number.isInteger(season) || season < FIRST_SEASON || season > currentYear) {
    throw new NbaApiError(
      'INVALID_PARAMETER',
      `Invalid season: ${season}. Must be between ${FIRST_SEASON} and ${currentYear}.`
    );
  }
}

export function assertSeasons(seasons: readonly number[], now: Date): void {
  if (seasons.length === 0) {
    throw new NbaApiError('INVALID_PARAMETER', 'Seasons must be a non-empty list of integers');
  }
  for (const season of seasons) {
    assertSeason(season, now);
  }
}
