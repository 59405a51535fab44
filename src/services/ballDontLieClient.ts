import { describeError, isNbaApiError, NbaApiError } from '../lib/errors';
import { assertPlayerId, assertSeason } from '../lib/validation';
import type { BdlGame, BdlGameStat, BdlPlayer, BdlResponse } from '../types/balldontlie';
import { createCacheKey, QueryParams, ResponseCache } from './responseCache';

const STATS_PAGE_SIZE = 100;

/**
 * What the season comparison needs from an NBA data provider.
 */
export interface PlayerDataSource {
  fetchPlayer(playerId: number): Promise<BdlPlayer>;
  fetchPlayerGameStats(playerId: number, season: number | null): Promise<BdlGameStat[]>;
  fetchPlayerSeasons(playerId: number): Promise<number[]>;
}

export interface TeamGameFilters {
  startDate?: string;
  endDate?: string;
  season?: number;
}

export interface NbaDataClient extends PlayerDataSource {
  searchPlayers(name: string): Promise<BdlPlayer[]>;
  getTeamGames(teamId: number, filters?: TeamGameFilters): Promise<BdlGame[]>;
}

export interface BallDontLieClientOptions {
  apiKey: string;
  baseUrl: string;
  cache: ResponseCache;
  minRequestIntervalMs?: number;
  now?: () => Date;
}

export class BallDontLieClient implements NbaDataClient {
  private lastRequestTime = 0;
  private readonly now: () => Date;

  constructor(private readonly options: BallDontLieClientOptions) {
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Rate limiting: enforce minimum delay between upstream requests
   */
  private async enforceRateLimit(): Promise<void> {
    const minDelay = this.options.minRequestIntervalMs ?? 0;
    const timeSinceLastRequest = Date.now() - this.lastRequestTime;

    if (minDelay > 0 && timeSinceLastRequest < minDelay) {
      const waitTime = minDelay - timeSinceLastRequest;
      await new Promise(resolve => setTimeout(resolve, waitTime));
    }

    this.lastRequestTime = Date.now();
  }

  private buildUrl(endpoint: string, params: QueryParams): string {
    const url = new URL(`${this.options.baseUrl}/${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      if (value !== undefined) {
        url.searchParams.append(key, String(value));
      }
    }
    return url.toString();
  }

  private async readCache<T>(key: string, endpoint: string): Promise<T | undefined> {
    try {
      return await this.options.cache.get<T>(key);
    } catch (error) {
      console.warn(`⚠️ Ignoring unreadable cache entry for ${endpoint}: ${describeError(error)}`);
      return undefined;
    }
  }

  private async writeCache<T>(key: string, endpoint: string, data: T): Promise<void> {
    try {
      await this.options.cache.set(key, data);
    } catch (error) {
      console.warn(`⚠️ Failed to cache response for ${endpoint}: ${describeError(error)}`);
    }
  }

  /**
   * Make a request to the BallDontLie API, going through the response cache
   */
  private async request<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    const cacheKey = createCacheKey(endpoint, params);
    const cached = await this.readCache<T>(cacheKey, endpoint);
    if (cached !== undefined) {
      return cached;
    }

    await this.enforceRateLimit();

    let response: Response;
    try {
      response = await fetch(this.buildUrl(endpoint, params), {
        headers: { Authorization: this.options.apiKey },
      });
    } catch (error) {
      throw new NbaApiError('UPSTREAM_ERROR', `Network error: ${describeError(error)}`, endpoint, {
        cause: error,
      });
    }

    if (response.status === 401) {
      throw new NbaApiError('API_KEY_INVALID', 'Invalid or missing API key', endpoint);
    }
    if (response.status === 429) {
      throw new NbaApiError('RATE_LIMITED', 'Rate limit exceeded. Please try again later.', endpoint);
    }
    if (response.status === 404) {
      throw new NbaApiError('NOT_FOUND', `Resource not found: ${endpoint}`, endpoint);
    }
    if (!response.ok) {
      throw new NbaApiError(
        'UPSTREAM_ERROR',
        `API request failed with status ${response.status} ${response.statusText}`,
        endpoint
      );
    }

    let data: T;
    try {
      data = await response.json();
    } catch (error) {
      throw new NbaApiError('UPSTREAM_ERROR', `Malformed response from ${endpoint}`, endpoint, {
        cause: error,
      });
    }

    await this.writeCache(cacheKey, endpoint, data);
    return data;
  }

  /**
   * Follow cursor pagination until the last page
   */
  private async requestAllPages<T>(endpoint: string, params: QueryParams): Promise<T[]> {
    const results: T[] = [];
    let cursor: number | undefined;

    do {
      const page = await this.request<BdlResponse<T[]>>(endpoint, {
        ...params,
        per_page: STATS_PAGE_SIZE,
        cursor,
      });
      results.push(...(page.data ?? []));
      cursor = page.meta?.next_cursor ?? undefined;
    } while (cursor !== undefined);

    return results;
  }

  /**
   * Search players by name. Multi-word names also run a first/last name
   * query, merged with the general search and de-duplicated by player id.
   */
  async searchPlayers(name: string): Promise<BdlPlayer[]> {
    const nameParts = name.trim().split(/\s+/).filter(Boolean);

    const general = await this.request<BdlResponse<BdlPlayer[]>>('players', { search: name });
    if (nameParts.length <= 1) {
      return general.data ?? [];
    }

    const byName = await this.request<BdlResponse<BdlPlayer[]>>('players', {
      first_name: nameParts[0],
      last_name: nameParts[nameParts.length - 1],
    });

    const seenIds = new Set<number>();
    const uniquePlayers: BdlPlayer[] = [];
    for (const player of [...(general.data ?? []), ...(byName.data ?? [])]) {
      if (!seenIds.has(player.id)) {
        seenIds.add(player.id);
        uniquePlayers.push(player);
      }
    }
    return uniquePlayers;
  }

  async fetchPlayer(playerId: number): Promise<BdlPlayer> {
    assertPlayerId(playerId);

    let response: BdlResponse<BdlPlayer | null>;
    try {
      response = await this.request<BdlResponse<BdlPlayer | null>>(`players/${playerId}`);
    } catch (error) {
      if (isNbaApiError(error, 'NOT_FOUND')) {
        throw new NbaApiError('PLAYER_NOT_FOUND', `Player not found with ID: ${playerId}`, error.endpoint);
      }
      throw error;
    }

    const player = response.data;
    if (!player || typeof player.id !== 'number') {
      throw new NbaApiError('PLAYER_NOT_FOUND', `Player not found with ID: ${playerId}`);
    }
    return player;
  }

  async fetchPlayerGameStats(playerId: number, season: number | null): Promise<BdlGameStat[]> {
    assertPlayerId(playerId);
    if (season !== null) {
      assertSeason(season, this.now());
    }

    return this.requestAllPages<BdlGameStat>('stats', {
      'player_ids[]': playerId,
      'seasons[]': season ?? undefined,
    });
  }

  /**
   * Every season the player has game lines for, oldest first
   */
  async fetchPlayerSeasons(playerId: number): Promise<number[]> {
    const stats = await this.fetchPlayerGameStats(playerId, null);

    const seasons = new Set<number>();
    for (const stat of stats) {
      const season = stat.game?.season;
      if (typeof season === 'number') {
        seasons.add(season);
      }
    }
    return [...seasons].sort((a, b) => a - b);
  }

  async getTeamGames(teamId: number, filters: TeamGameFilters = {}): Promise<BdlGame[]> {
    const response = await this.request<BdlResponse<BdlGame[]>>('games', {
      'team_ids[]': teamId,
      start_date: filters.startDate,
      end_date: filters.endDate,
      'seasons[]': filters.season,
    });
    return response.data ?? [];
  }
}
