export const AVERAGED_FIELDS = [
  'pts',
  'reb',
  'ast',
  'stl',
  'blk',
  'turnover',
  'fg_pct',
  'fg3_pct',
  'ft_pct',
] as const;

export type AveragedField = typeof AVERAGED_FIELDS[number];

// turnover, min and games_played are averaged/reported but never compared
export const GROWTH_METRICS = ['pts', 'reb', 'ast', 'stl', 'blk', 'fg_pct', 'fg3_pct', 'ft_pct'] as const;

export type GrowthMetric = typeof GROWTH_METRICS[number];

export type StatTotals = Record<AveragedField, number> & { min: number };

export type SeasonAverages = StatTotals & { games_played: number };

export type GrowthEntry = Record<string, number | null>;

export interface PlayerSummary {
  id: number;
  name: string;
  team: string | null;
}

export interface ComparisonResult {
  player: PlayerSummary;
  seasons: number[];
  season_averages: Record<string, SeasonAverages | null>;
  growth: Record<string, GrowthEntry>;
  metrics: string[];
}

export interface PlayerStat {
  pts: number;
  reb: number;
  ast: number;
  stl: number;
  blk: number;
  fg_pct: number | null;
  fg3_pct: number | null;
  ft_pct: number | null;
  turnover: number | null;
  min: string | null;
  season: number | null;
}
