import { z } from 'zod';

// ─── Tool outputs ───

export const Coordinates = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
});
export type Coordinates = z.infer<typeof Coordinates>;

export const GeocodedPlace = Coordinates.extend({
  name: z.string().optional(),
  country: z.string().optional(),
});
export type GeocodedPlace = z.infer<typeof GeocodedPlace>;

export const WeatherSnapshot = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  /** °C */
  temperature: z.number(),
  /** km/h */
  wind_speed: z.number(),
  /** % */
  relative_humidity: z.number(),
  is_day: z.boolean(),
  /** WMO weather interpretation code */
  weather_code: z.number().int(),
  conditions: z.string(),
  /** ISO-8601 observation time, local to the location */
  time: z.string(),
});
export type WeatherSnapshot = z.infer<typeof WeatherSnapshot>;

export const ArticleSummary = z.object({
  title: z.string(),
  summary: z.string(),
  url: z.string().url(),
});
export type ArticleSummary = z.infer<typeof ArticleSummary>;

// ─── Tool inputs ───

export const CityInput = z.object({
  city_name: z.string().trim().min(1, 'city_name must not be empty'),
});

/** A number, or a non-blank string holding one; null, booleans and blanks are rejected */
const coordinate = (limit: number) =>
  z
    .union([z.number(), z.string().trim().min(1).pipe(z.coerce.number())])
    .pipe(z.number().min(-limit).max(limit));

export const WeatherInput = z.object({
  latitude: coordinate(90),
  longitude: coordinate(180),
});

export const WikipediaInput = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
});

export const CalculateInput = z.object({
  expression: z.string(),
});

// ─── Upstream payloads (only the fields we read) ───

export const GeocodingResponse = z.object({
  results: z.array(z.unknown()).optional(),
});

export const OpenMeteoCurrent = z.object({
  temperature_2m: z.number(),
  wind_speed_10m: z.number(),
  relative_humidity_2m: z.number(),
  is_day: z.union([z.literal(0), z.literal(1), z.boolean()]),
  weather_code: z.number().int(),
  time: z.string(),
});

export const ForecastResponse = z.object({
  current: z.unknown().optional(),
});

export const WikipediaPage = z.object({
  title: z.string(),
  extract: z.string(),
  fullurl: z.string().url(),
});

export const WikipediaQueryResponse = z.object({
  query: z
    .object({
      pages: z.record(z.record(z.unknown())).optional(),
    })
    .optional(),
});
