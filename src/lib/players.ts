import type { BdlGameStat, BdlPlayer } from '../types/balldontlie';
import type { PlayerStat, PlayerSummary } from '../types/stats';

export function fullName(player: Pick<BdlPlayer, 'first_name' | 'last_name'>): string {
  return `${player.first_name} ${player.last_name}`;
}

export function toPlayerSummary(player: BdlPlayer): PlayerSummary {
  return {
    id: player.id,
    name: fullName(player),
    team: player.team?.full_name ?? null,
  };
}

function toNumber(value: unknown, fallback: number): number {
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'string' && value.trim() !== '' && !Number.isNaN(Number(value))) {
    return Number(value);
  }
  return fallback;
}

function toNullableNumber(value: unknown): number | null {
  return value === null || value === undefined ? null : toNumber(value, 0);
}

/**
 * Single game line shaped for the player stats endpoint.
 */
export function toPlayerStat(stat: BdlGameStat, season: number | null): PlayerStat {
  return {
    pts: toNumber(stat.pts, 0),
    reb: toNumber(stat.reb, 0),
    ast: toNumber(stat.ast, 0),
    stl: toNumber(stat.stl, 0),
    blk: toNumber(stat.blk, 0),
    fg_pct: toNullableNumber(stat.fg_pct),
    fg3_pct: toNullableNumber(stat.fg3_pct),
    ft_pct: toNullableNumber(stat.ft_pct),
    turnover: toNullableNumber(stat.turnover),
    min: stat.min ?? '0',
    season,
  };
}
