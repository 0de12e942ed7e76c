import { NotFoundError, SchemaError, formatZodIssues } from '@almanac/shared';
import type { AgentTool, ToolContext, ToolResult } from './base.js';
import { createToolResult, failureResult, parseToolInput } from './base.js';
import { fetchJson, type HttpClientOptions } from './http.js';
import { ForecastResponse, OpenMeteoCurrent, WeatherInput, WeatherSnapshot } from './schemas.js';
import { describeWeatherCode } from './weather-codes.js';

export const WEATHER_API_URL = 'https://api.open-meteo.com/v1/forecast';

const CURRENT_FIELDS = 'temperature_2m,relative_humidity_2m,is_day,wind_speed_10m,weather_code';

export interface WeatherToolConfig extends HttpClientOptions {
  endpoint?: string;
}

export class WeatherTool implements AgentTool {
  definition = {
    name: 'get_current_weather',
    description: 'Retrieves the current weather conditions for a latitude and longitude using the Open-Meteo Weather API. Returns a JSON object with temperature (°C), wind speed (km/h), relative humidity (%), day/night flag, WMO weather code with a description, and observation time.',
    input_schema: {
      type: 'object',
      properties: {
        latitude: { type: 'number', description: 'Latitude in degrees, -90 to 90' },
        longitude: { type: 'number', description: 'Longitude in degrees, -180 to 180' },
      },
      required: ['latitude', 'longitude'],
    },
  };

  constructor(private readonly config: WeatherToolConfig = {}) {}

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const input = parseToolInput(this.definition.name, WeatherInput, params);
    if (!input.ok) return input.result;

    try {
      const snapshot = await this.current(input.value.latitude, input.value.longitude, context.signal);
      return createToolResult(JSON.stringify(snapshot), { service: 'weather' });
    } catch (err) {
      return failureResult(err, 'weather retrieval');
    }
  }

  /** Conditions at the current instant only; no multi-day forecast */
  async current(latitude: number, longitude: number, signal?: AbortSignal): Promise<WeatherSnapshot> {
    const data = await fetchJson(
      {
        service: 'Weather API',
        url: this.config.endpoint ?? WEATHER_API_URL,
        params: {
          latitude,
          longitude,
          current: CURRENT_FIELDS,
          timezone: 'auto',
          forecast_days: 1,
        },
        signal,
      },
      this.config,
    );

    const response = ForecastResponse.safeParse(data);
    if (!response.success) {
      throw new SchemaError(`Failed to validate weather data schema: ${formatZodIssues(response.error)}`);
    }
    if (response.data.current === undefined) {
      throw new NotFoundError('No current weather data available for this location.');
    }

    const current = OpenMeteoCurrent.safeParse(response.data.current);
    if (!current.success) {
      throw new SchemaError(`Failed to validate weather data schema: ${formatZodIssues(current.error)}`);
    }

    const c = current.data;
    return {
      latitude,
      longitude,
      temperature: c.temperature_2m,
      wind_speed: c.wind_speed_10m,
      relative_humidity: c.relative_humidity_2m,
      is_day: c.is_day === 1 || c.is_day === true,
      weather_code: c.weather_code,
      conditions: describeWeatherCode(c.weather_code),
      time: c.time,
    };
  }
}
