// Response shapes of the BallDontLie v1 REST API

export interface BdlTeam {
  id: number;
  full_name: string;
  abbreviation: string;
  conference?: string | null;
  division?: string | null;
  city?: string | null;
  name?: string | null;
}

export interface BdlPlayer {
  id: number;
  first_name: string;
  last_name: string;
  position?: string | null;
  height?: string | null;
  weight?: string | null;
  jersey_number?: string | null;
  college?: string | null;
  country?: string | null;
  team?: BdlTeam | null;
}

export interface BdlGame {
  id: number;
  date: string;
  season: number;
  status?: string;
  postseason?: boolean;
  home_team_score?: number;
  visitor_team_score?: number;
  home_team?: Partial<BdlTeam> | null;
  visitor_team?: Partial<BdlTeam> | null;
  home_team_id?: number;
  visitor_team_id?: number;
}

/**
 * Raw per-game line. Upstream usually sends numbers, but nulls and the odd
 * string value do show up, so every stat is kept loose here and parsed later.
 */
export type StatValue = number | string | null;

export interface BdlGameStat {
  id?: number;
  min?: string | null;
  pts?: StatValue;
  reb?: StatValue;
  ast?: StatValue;
  stl?: StatValue;
  blk?: StatValue;
  turnover?: StatValue;
  fg_pct?: StatValue;
  fg3_pct?: StatValue;
  ft_pct?: StatValue;
  player?: Partial<BdlPlayer> | null;
  team?: Partial<BdlTeam> | null;
  game?: Partial<BdlGame> | null;
}

export interface BdlMeta {
  next_cursor?: number | null;
  per_page?: number;
}

export interface BdlResponse<T> {
  data: T;
  meta?: BdlMeta;
}
