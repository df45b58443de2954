import { describe, it, expect, beforeEach, vi } from 'vitest';
import axios, { AxiosHeaders, type AxiosResponse } from 'axios';
import { createStatsApiClient, EMPTY_PAGE, gameUrl, statsUrl } from '../../src/http/statsApiClient.js';
import { createSunApiClient, sunTimeParams } from '../../src/http/sunApiClient.js';
import { ApiError } from '../../src/errors/index.js';
import { ValidationError } from '../../src/util/validation.js';

vi.mock('axios', async importOriginal => {
  const actual = await importOriginal<typeof import('axios')>();
  return { ...actual, default: { ...actual.default, get: vi.fn() } };
});

function response(status: number, data: unknown): AxiosResponse<unknown> {
  return { status, statusText: '', data, headers: {}, config: { headers: new AxiosHeaders() } };
}

const get = vi.mocked(axios.get);

describe('statsApiClient', () => {
  beforeEach(() => {
    get.mockReset();
  });

  it('should build the stats and game URLs', () => {
    expect(statsUrl()).toBe('https://api.balldontlie.io/v1/stats');
    expect(gameUrl(857)).toBe('https://api.balldontlie.io/v1/games/857');
  });

  it('should reject game ids that are not positive integers', () => {
    expect(() => gameUrl(0)).toThrow(ValidationError);
    expect(() => gameUrl(1.5)).toThrow(ValidationError);
  });

  it('should send the key and the page query', async () => {
    const page = { data: [], meta: { next_cursor: 42 } };
    get.mockResolvedValueOnce(response(200, page));

    const result = await createStatsApiClient('test-key').fetchStatsPage({
      playerIds: [15, 46],
      seasons: [2023],
      perPage: 25,
      cursor: 7
    });

    expect(result).toEqual(page);
    expect(get).toHaveBeenCalledWith('https://api.balldontlie.io/v1/stats', {
      params: { player_ids: [15, 46], seasons: [2023], per_page: 25, cursor: 7 },
      headers: { Authorization: 'test-key' },
      timeout: 15000,
      validateStatus: expect.any(Function)
    });
  });

  it('should serialize id lists as repeated bracketed keys', async () => {
    const actual = await vi.importActual<typeof import('axios')>('axios');
    const uri = actual.default.getUri({
      url: 'https://api.balldontlie.io/v1/stats',
      params: { player_ids: [15, 46], per_page: 25 }
    });

    expect(uri).toBe('https://api.balldontlie.io/v1/stats?player_ids%5B%5D=15&player_ids%5B%5D=46&per_page=25');
  });

  it('should return an empty page without a cursor when the request fails', async () => {
    get.mockResolvedValueOnce(response(429, { message: 'Too Many Requests' }));

    const result = await createStatsApiClient('test-key').fetchStatsPage({
      playerIds: [15],
      seasons: [2023],
      perPage: 25
    });

    expect(result).toBe(EMPTY_PAGE);
    expect(get.mock.calls[0][1]?.params).toEqual({ player_ids: [15], seasons: [2023], per_page: 25 });
  });

  it('should return the game, or null when it cannot be fetched', async () => {
    const game = {
      id: 857,
      date: '2023-01-05',
      datetime: '2023-01-05T00:30:00.000Z',
      season: 2022,
      home_team: { id: 20 },
      visitor_team: { id: 2 }
    };
    get.mockResolvedValueOnce(response(200, { data: game }));
    get.mockResolvedValueOnce(response(404, { message: 'Not Found' }));
    const client = createStatsApiClient('test-key');

    expect(await client.fetchGame(857)).toEqual(game);
    expect(await client.fetchGame(858)).toBeNull();
    expect(get.mock.calls[1][0]).toBe('https://api.balldontlie.io/v1/games/858');
  });

  it('should turn a transport failure into an ApiError with status 0', async () => {
    get.mockRejectedValueOnce(new Error('socket hang up'));

    const failure = createStatsApiClient('test-key').fetchGame(857);

    await expect(failure).rejects.toBeInstanceOf(ApiError);
    await expect(failure).rejects.toMatchObject({ statusCode: 0, url: 'https://api.balldontlie.io/v1/games/857' });
  });
});

describe('sunApiClient', () => {
  beforeEach(() => {
    get.mockReset();
  });

  it('should request ISO timestamps for a coordinate', () => {
    expect(sunTimeParams({ latitude: 40.7506, longitude: -73.9935 })).toEqual({
      lat: 40.7506,
      lng: -73.9935,
      formatted: 0
    });
  });

  it('should pass the game date through', () => {
    expect(sunTimeParams({ latitude: 34.043, longitude: -118.267, date: '2023-01-05' })).toEqual({
      lat: 34.043,
      lng: -118.267,
      formatted: 0,
      date: '2023-01-05'
    });
  });

  it('should reject invalid coordinates and dates', () => {
    expect(() => sunTimeParams({ latitude: 95, longitude: 0 })).toThrow(ValidationError);
    expect(() => sunTimeParams({ latitude: 40, longitude: -74, date: '2023-02-30' })).toThrow(ValidationError);
  });

  it('should return sunrise and sunset from an OK answer', async () => {
    get.mockResolvedValueOnce(
      response(200, {
        results: {
          sunrise: '2023-01-05T12:20:00+00:00',
          sunset: '2023-01-05T21:45:00+00:00',
          day_length: 33900
        },
        status: 'OK'
      })
    );

    const times = await createSunApiClient().fetchSunTimes({ latitude: 40.7506, longitude: -73.9935, date: '2023-01-05' });

    expect(times).toEqual({ sunrise: '2023-01-05T12:20:00+00:00', sunset: '2023-01-05T21:45:00+00:00' });
    expect(get.mock.calls[0][0]).toBe('https://api.sunrise-sunset.org/json');
    expect(get.mock.calls[0][1]?.params).toEqual({ lat: 40.7506, lng: -73.9935, formatted: 0, date: '2023-01-05' });
  });

  it('should throw an ApiError when the service answers with a non-OK status', async () => {
    get.mockResolvedValueOnce(response(200, { results: { sunrise: '', sunset: '' }, status: 'INVALID_REQUEST' }));

    const lookup = createSunApiClient().fetchSunTimes({ latitude: 40.7506, longitude: -73.9935 });

    await expect(lookup).rejects.toBeInstanceOf(ApiError);
    await expect(lookup).rejects.toThrow('Sun API returned status INVALID_REQUEST');
  });

  it('should throw an ApiError on an HTTP error', async () => {
    get.mockResolvedValueOnce(response(500, 'Internal Server Error'));

    await expect(createSunApiClient().fetchSunTimes({ latitude: 40.7506, longitude: -73.9935 })).rejects.toMatchObject({
      statusCode: 500,
      message: 'Sun API request failed with status 500'
    });
  });
});
