import { NbaApiError } from '../../src/lib/errors';
import { SeasonComparisonService } from '../../src/services/seasonComparisonService';
import { GROWTH_METRICS } from '../../src/types/stats';
import { gameLine, mockFreeAgent, mockPlayer } from '../fixtures/mockData';
import { createFakeNbaClient, FakeNbaClient } from '../mocks/dataSource.mock';

const fixedNow = () => new Date('2026-10-18T12:00:00Z');

describe('SeasonComparisonService', () => {
  let client: FakeNbaClient;
  let service: SeasonComparisonService;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    client = createFakeNbaClient({
      players: [mockPlayer, mockFreeAgent],
      statsBySeason: {
        2021: [gameLine(2021, { pts: 20 })],
        2022: [],
        2023: [gameLine(2023, { pts: 30 })],
      },
    });
    service = new SeasonComparisonService(client, fixedNow);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe('result structure', () => {
    test('should summarise the player and echo the requested seasons', async () => {
      const result = await service.compareSeasons(237, [2021, 2023]);

      expect(result.player).toEqual({ id: 237, name: 'Jamal Rivers', team: 'Test City Comets' });
      expect(result.seasons).toEqual([2021, 2023]);
      expect(result.metrics).toEqual(['pts', 'reb', 'ast', 'stl', 'blk', 'fg_pct', 'fg3_pct', 'ft_pct']);
    });

    test('should report a null team for players without one', async () => {
      const result = await service.compareSeasons(512, [2021]);
      expect(result.player).toEqual({ id: 512, name: 'Owen Park', team: null });
    });

    test('should key season averages by season', async () => {
      const result = await service.compareSeasons(237, [2021, 2023]);

      expect(result.season_averages).toEqual({
        '2021': {
          pts: 20,
          reb: 8,
          ast: 5,
          stl: 1,
          blk: 1,
          turnover: 3,
          fg_pct: 0.5,
          fg3_pct: 0.4,
          ft_pct: 0.8,
          min: 30,
          games_played: 1,
        },
        '2023': {
          pts: 30,
          reb: 8,
          ast: 5,
          stl: 1,
          blk: 1,
          turnover: 3,
          fg_pct: 0.5,
          fg3_pct: 0.4,
          ft_pct: 0.8,
          min: 30,
          games_played: 1,
        },
      });
    });
  });

  describe('growth', () => {
    test('should compute growth between neighbouring seasons in the list', async () => {
      const result = await service.compareSeasons(237, [2021, 2023]);

      expect(result.growth).toEqual({
        '2021-2023': {
          pts: 50,
          reb: 0,
          ast: 0,
          stl: 0,
          blk: 0,
          fg_pct: 0,
          fg3_pct: 0,
          ft_pct: 0,
        },
      });
    });

    test('should omit every pair that touches a season without data', async () => {
      const result = await service.compareSeasons(237, [2021, 2022, 2023]);

      expect(result.season_averages['2022']).toBeNull();
      expect(result.growth).toEqual({});
      expect(Object.keys(result.season_averages)).toHaveLength(3);
    });

    test('should follow list order rather than calendar order', async () => {
      const result = await service.compareSeasons(237, [2023, 2021]);

      expect(result.seasons).toEqual([2023, 2021]);
      expect(Object.keys(result.growth)).toEqual(['2023-2021']);
      expect(result.growth['2023-2021'].pts).toBe(-33.3);
    });

    test('should keep duplicate seasons and compare them with each other', async () => {
      const result = await service.compareSeasons(237, [2021, 2021]);

      expect(client.fetchPlayerGameStats).toHaveBeenCalledTimes(2);
      expect(Object.keys(result.season_averages)).toEqual(['2021']);
      expect(result.growth['2021-2021']).toEqual({
        pts: 0,
        reb: 0,
        ast: 0,
        stl: 0,
        blk: 0,
        fg_pct: 0,
        fg3_pct: 0,
        ft_pct: 0,
      });
    });

    test('should report null for metrics with a zero baseline', async () => {
      client = createFakeNbaClient({
        players: [mockPlayer],
        statsBySeason: {
          2020: [gameLine(2020, { blk: 0, fg3_pct: 0 })],
          2021: [gameLine(2021, { blk: 2, fg3_pct: 0.35 })],
        },
      });
      service = new SeasonComparisonService(client, fixedNow);

      const result = await service.compareSeasons(237, [2020, 2021]);

      expect(result.growth['2020-2021'].blk).toBeNull();
      expect(result.growth['2020-2021'].fg3_pct).toBeNull();
      expect(result.growth['2020-2021'].pts).toBe(0);
      expect(Object.keys(result.growth['2020-2021'])).toEqual([...GROWTH_METRICS]);
    });
  });

  describe('games played', () => {
    test('should count unreadable games as played while leaving them out of the averages', async () => {
      client = createFakeNbaClient({
        players: [mockPlayer],
        statsBySeason: {
          2021: [
            gameLine(2021, { pts: 10 }),
            gameLine(2021, { pts: 40, min: 'abc' }),
          ],
        },
      });
      service = new SeasonComparisonService(client, fixedNow);

      const result = await service.compareSeasons(237, [2021]);

      expect(result.season_averages['2021']?.pts).toBe(10);
      expect(result.season_averages['2021']?.games_played).toBe(2);
    });
  });

  describe('validation', () => {
    test.each<{ label: string; playerId: number; seasons: number[] }>([
      { label: 'an empty season list', playerId: 237, seasons: [] },
      { label: 'a season before 1946', playerId: 237, seasons: [1900] },
      { label: 'a season after the current year', playerId: 237, seasons: [2021, 2027] },
      { label: 'a fractional season', playerId: 237, seasons: [2021.5] },
      { label: 'a zero player id', playerId: 0, seasons: [2021] },
      { label: 'a negative player id', playerId: -5, seasons: [2021] },
      { label: 'a fractional player id', playerId: 1.5, seasons: [2021] },
    ])('should reject $label before fetching anything', async ({ playerId, seasons }) => {
      await expect(service.compareSeasons(playerId, seasons)).rejects.toMatchObject({
        kind: 'INVALID_PARAMETER',
      });
      expect(client.fetchPlayer).not.toHaveBeenCalled();
      expect(client.fetchPlayerGameStats).not.toHaveBeenCalled();
    });

    test('should accept the first and the current season', async () => {
      const result = await service.compareSeasons(237, [1946, 2026]);
      expect(result.season_averages).toEqual({ '1946': null, '2026': null });
    });
  });

  describe('errors', () => {
    test('should signal an unknown player', async () => {
      await expect(service.compareSeasons(999, [2021])).rejects.toMatchObject({
        kind: 'PLAYER_NOT_FOUND',
      });
      expect(client.fetchPlayerGameStats).not.toHaveBeenCalled();
    });

    test('should abort the whole comparison when any season fails to load', async () => {
      client.fetchPlayerGameStats
        .mockResolvedValueOnce([gameLine(2021)])
        .mockRejectedValueOnce(new NbaApiError('RATE_LIMITED', 'Rate limit exceeded. Please try again later.'));

      await expect(service.compareSeasons(237, [2021, 2022, 2023])).rejects.toMatchObject({
        kind: 'RATE_LIMITED',
      });
      expect(client.fetchPlayerGameStats).toHaveBeenCalledTimes(2);
    });
  });

  test('should produce identical results for identical inputs', async () => {
    const first = await service.compareSeasons(237, [2021, 2022, 2023]);
    const second = await service.compareSeasons(237, [2021, 2022, 2023]);

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });
});
