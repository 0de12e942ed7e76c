import { describe, it, expect } from 'vitest';
import { WeatherTool } from '../weather.js';
import { WeatherSnapshot } from '../schemas.js';
import { describeWeatherCode } from '../weather-codes.js';
import { fakeFetch } from './fake-fetch.js';

const FORECAST = {
  latitude: 51.5,
  longitude: -0.120000124,
  timezone: 'Europe/London',
  current: {
    time: '2024-05-01T14:00',
    interval: 900,
    temperature_2m: 15.5,
    relative_humidity_2m: 72,
    is_day: 1,
    wind_speed_10m: 11.2,
    weather_code: 3,
  },
};

describe('WeatherTool', () => {
  it('returns a snapshot of current conditions', async () => {
    const { fetch, urls } = fakeFetch({ body: FORECAST });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: 51.50853, longitude: -0.12574 }, {});

    expect(result.type).toBe('text');
    const snapshot: unknown = JSON.parse(result.content);
    expect(snapshot).toEqual({
      latitude: 51.50853,
      longitude: -0.12574,
      temperature: 15.5,
      wind_speed: 11.2,
      relative_humidity: 72,
      is_day: true,
      weather_code: 3,
      conditions: 'Overcast',
      time: '2024-05-01T14:00',
    });
    expect(WeatherSnapshot.safeParse(snapshot).success).toBe(true);

    expect(urls[0].origin + urls[0].pathname).toBe('https://api.open-meteo.com/v1/forecast');
    expect(Object.fromEntries(urls[0].searchParams)).toEqual({
      latitude: '51.50853',
      longitude: '-0.12574',
      current: 'temperature_2m,relative_humidity_2m,is_day,wind_speed_10m,weather_code',
      timezone: 'auto',
      forecast_days: '1',
    });
  });

  it('accepts numeric strings for coordinates', async () => {
    const { fetch, urls } = fakeFetch({ body: FORECAST });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: '48.85', longitude: '2.35' }, {});

    expect(result.type).toBe('text');
    expect(urls[0].searchParams.get('latitude')).toBe('48.85');
  });

  it.each([
    ['null', null],
    ['a blank string', '  '],
    ['a boolean', true],
    ['a non-numeric string', 'north'],
  ])('rejects %s as a latitude without calling the API', async (_label, latitude) => {
    const { fetch } = fakeFetch({ body: FORECAST });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude, longitude: -0.1278 }, {});

    expect(result.type).toBe('error');
    expect(result.content.startsWith('{"error":"Invalid arguments for get_current_weather: latitude: ')).toBe(true);
    expect(result.metadata).toEqual({ errorCode: 'INVALID_ARGUMENTS' });
    expect(fetch).not.toHaveBeenCalled();
  });

  it('rejects an empty longitude', async () => {
    const { fetch } = fakeFetch({ body: FORECAST });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: 51.5074, longitude: '' }, {});

    expect(result.content.startsWith('{"error":"Invalid arguments for get_current_weather: longitude: ')).toBe(true);
    expect(fetch).not.toHaveBeenCalled();
  });

  it('reports a location without current data', async () => {
    const { fetch } = fakeFetch({ body: { latitude: 10, longitude: 10 } });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: 10, longitude: 10 }, {});

    expect(result.content).toBe('{"error":"No current weather data available for this location."}');
    expect(result.metadata).toEqual({ errorCode: 'NOT_FOUND' });
  });

  it('reports a current block missing fields', async () => {
    const { current, ...rest } = FORECAST;
    const { temperature_2m: _dropped, ...partial } = current;
    const { fetch } = fakeFetch({ body: { ...rest, current: partial } });
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: 51.5, longitude: -0.12 }, {});

    expect(result.content).toBe('{"error":"Failed to validate weather data schema: temperature_2m: Required"}');
  });

  it('rejects coordinates out of range', async () => {
    const { fetch } = fakeFetch();
    const tool = new WeatherTool({ fetch });

    const result = await tool.execute({ latitude: 95, longitude: 0 }, {});

    expect(result.content).toBe('{"error":"Invalid arguments for get_current_weather: latitude: Number must be less than or equal to 90"}');
    expect(fetch).not.toHaveBeenCalled();
  });
});

describe('describeWeatherCode', () => {
  it('describes known codes and falls back for others', () => {
    expect(describeWeatherCode(0)).toBe('Clear sky');
    expect(describeWeatherCode(3)).toBe('Overcast');
    expect(describeWeatherCode(42)).toBe('Unknown');
  });
});
