import type { BdlGameStat } from '../types/balldontlie';
import { AVERAGED_FIELDS, SeasonAverages, StatTotals } from '../types/stats';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

function emptyTotals(): StatTotals {
  return {
    pts: 0,
    reb: 0,
    ast: 0,
    stl: 0,
    blk: 0,
    turnover: 0,
    fg_pct: 0,
    fg3_pct: 0,
    ft_pct: 0,
    min: 0,
  };
}

function parseDecimal(text: string): number | null {
  const trimmed = text.trim();
  return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : null;
}

function parseInteger(text: string): number | null {
  const trimmed = text.trim();
  return INTEGER_PATTERN.test(trimmed) ? parseInt(trimmed, 10) : null;
}

/**
 * Decode a minutes-played value into decimal minutes.
 * "34:30" -> 34.5, "34" -> 34. Returns null when the value can't be read.
 */
export function parseMinutes(value: string | null | undefined): number | null {
  if (value === undefined) {
    return 0;
  }
  if (typeof value !== 'string') {
    return null;
  }

  if (value.includes(':')) {
    const parts = value.split(':');
    if (parts.length !== 2) {
      return null;
    }
    const minutes = parseInteger(parts[0]);
    const seconds = parseInteger(parts[1]);
    if (minutes === null || seconds === null) {
      return null;
    }
    return minutes + seconds / 60;
  }

  return parseDecimal(value);
}

/**
 * Absent and null stats count as zero; anything present that isn't a number
 * makes the value unreadable (null).
 */
export function parseStatValue(value: unknown): number | null {
  if (value === undefined || value === null) {
    return 0;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'string') {
    return parseDecimal(value);
  }
  return null;
}

function parseGame(record: BdlGameStat): StatTotals | null {
  const minutes = parseMinutes(record.min);
  if (minutes === null) {
    return null;
  }

  const parsed = emptyTotals();
  parsed.min = minutes;
  for (const field of AVERAGED_FIELDS) {
    const value = parseStatValue(record[field]);
    if (value === null) {
      return null;
    }
    parsed[field] = value;
  }
  return parsed;
}

/**
 * Average one season of game lines.
 *
 * Only games whose every field parses are averaged, but games_played reports
 * every line received for the season, including the unreadable ones.
 */
export function aggregateSeason(records: readonly BdlGameStat[]): SeasonAverages | null {
  if (records.length === 0) {
    return null;
  }

  const totals = emptyTotals();
  let validGames = 0;

  for (const record of records) {
    const game = parseGame(record);
    if (!game) {
      continue;
    }
    for (const field of AVERAGED_FIELDS) {
      totals[field] += game[field];
    }
    totals.min += game.min;
    validGames++;
  }

  if (validGames === 0) {
    return null;
  }

  const averages = emptyTotals();
  for (const field of AVERAGED_FIELDS) {
    averages[field] = totals[field] / validGames;
  }
  averages.min = totals.min / validGames;

  return { ...averages, games_played: records.length };
}
