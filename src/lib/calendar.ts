import type { BdlGame } from '../types/balldontlie';
import type { GameEvent } from '../types/calendar';

// Upstream dates carry no tip-off time, so every game is booked 19:30-22:00
const GAME_START_TIME = '19:30:00';
const GAME_END_TIME = '22:00:00';

export function formatGameForCalendar(game: BdlGame): GameEvent {
  const homeTeam = game.home_team ?? {};
  const visitorTeam = game.visitor_team ?? {};

  const gameDate = (game.date ?? '').slice(0, 10);
  const homeTeamName = homeTeam.full_name ?? 'Unknown';
  const visitorTeamName = visitorTeam.full_name ?? 'Unknown';

  return {
    summary: `${visitorTeamName} @ ${homeTeamName}`,
    location: `${homeTeam.city ?? ''}, ${homeTeam.name ?? 'Arena'}`,
    description: `NBA game: ${visitorTeamName} at ${homeTeamName}`,
    start_datetime: `${gameDate}T${GAME_START_TIME}`,
    end_datetime: `${gameDate}T${GAME_END_TIME}`,
    game_id: game.id,
    home_team: homeTeamName,
    visitor_team: visitorTeamName,
  };
}

/**
 * YYYY-MM-DD in local time
 */
export function formatIsoDate(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}
