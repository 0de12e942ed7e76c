import { NotFoundError, SchemaError, formatZodIssues } from '@almanac/shared';
import type { AgentTool, ToolContext, ToolResult } from './base.js';
import { createToolResult, failureResult, parseToolInput } from './base.js';
import { fetchJson, type HttpClientOptions } from './http.js';
import { CityInput, GeocodedPlace, GeocodingResponse } from './schemas.js';

export const GEOCODING_API_URL = 'https://geocoding-api.open-meteo.com/v1/search';

export interface GeocodingToolConfig extends HttpClientOptions {
  endpoint?: string;
}

export class GeocodingTool implements AgentTool {
  definition = {
    name: 'get_coordinates_from_city',
    description: 'Converts a city name into geographical latitude and longitude using the Open-Meteo Geocoding API. Returns a JSON object with latitude, longitude, name and country of the most relevant match.',
    input_schema: {
      type: 'object',
      properties: {
        city_name: { type: 'string', description: 'Name of the city or place, e.g. "London"' },
      },
      required: ['city_name'],
    },
  };

  constructor(private readonly config: GeocodingToolConfig = {}) {}

  async execute(params: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    const input = parseToolInput(this.definition.name, CityInput, params);
    if (!input.ok) return input.result;

    try {
      const place = await this.lookup(input.value.city_name, context.signal);
      return createToolResult(JSON.stringify(place), { service: 'geocoding' });
    } catch (err) {
      return failureResult(err, 'coordinate retrieval');
    }
  }

  /** Resolve the first-ranked match for a place name */
  async lookup(cityName: string, signal?: AbortSignal): Promise<GeocodedPlace> {
    const data = await fetchJson(
      {
        service: 'Geocoding API',
        url: this.config.endpoint ?? GEOCODING_API_URL,
        params: { name: cityName, count: 1, language: 'en', format: 'json' },
        signal,
      },
      this.config,
    );

    const response = GeocodingResponse.safeParse(data);
    if (!response.success) {
      throw new SchemaError(`Failed to validate coordinates schema: ${formatZodIssues(response.error)}`);
    }

    const top = response.data.results?.[0];
    if (top === undefined) {
      throw new NotFoundError(`Could not find coordinates for city: ${cityName}`);
    }

    const place = GeocodedPlace.safeParse(top);
    if (!place.success) {
      throw new SchemaError(`Failed to validate coordinates schema: ${formatZodIssues(place.error)}`);
    }
    return place.data;
  }
}
