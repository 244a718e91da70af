// This module resolves a city through the geocoding API and reads its current conditions.

import type { FastifyBaseLogger } from 'fastify';
import { z } from 'zod';
import type { ToolSettings } from '../config/settings.js';
import { AppError } from '../utils/errors.js';
import { fetchJson } from '../utils/http.js';

export type WeatherUnits = 'metric' | 'imperial';

export interface WeatherContext {
  settings: ToolSettings;
  signal?: AbortSignal;
  logger?: FastifyBaseLogger;
}

export interface CurrentWeather {
  location: {
    name: string;
    country: string | null;
    latitude: number;
    longitude: number;
  };
  units: WeatherUnits;
  observedAt: string;
  temperature: number;
  apparentTemperature: number | null;
  relativeHumidity: number | null;
  windSpeed: number | null;
  weatherCode: number;
  conditions: string;
}

const geocodingSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        country: z.string().optional(),
        latitude: z.number(),
        longitude: z.number()
      })
    )
    .optional()
});

const forecastSchema = z.object({
  current: z.object({
    time: z.string(),
    temperature_2m: z.number(),
    apparent_temperature: z.number().nullable().optional(),
    relative_humidity_2m: z.number().nullable().optional(),
    wind_speed_10m: z.number().nullable().optional(),
    weather_code: z.number().int()
  })
});

// WMO weather interpretation codes, grouped.
const WEATHER_CODE_GROUPS: Array<{ codes: number[]; label: string }> = [
  { codes: [0], label: 'clear sky' },
  { codes: [1, 2], label: 'partly cloudy' },
  { codes: [3], label: 'overcast' },
  { codes: [45, 48], label: 'fog' },
  { codes: [51, 53, 55, 56, 57], label: 'drizzle' },
  { codes: [61, 63, 65, 66, 67], label: 'rain' },
  { codes: [71, 73, 75, 77], label: 'snow' },
  { codes: [80, 81, 82], label: 'rain showers' },
  { codes: [85, 86], label: 'snow showers' },
  { codes: [95, 96, 99], label: 'thunderstorm' }
];

export function describeWeatherCode(code: number): string {
  return WEATHER_CODE_GROUPS.find((group) => group.codes.includes(code))?.label ?? 'unknown';
}

// This helper validates one backend payload and reports shape drift as a tool parse failure.
function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, label: string): T {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new AppError(502, 'tool_parse_error', `${label} response has an unexpected shape.`, result.error.flatten());
  }
  return result.data;
}

// This function returns current conditions for one city name.
export async function getCurrentWeather(city: string, units: WeatherUnits, context: WeatherContext): Promise<CurrentWeather> {
  const geocodingUrl = new URL(`${context.settings.weatherGeocodingBaseUrl}/search`);
  geocodingUrl.searchParams.set('name', city);
  geocodingUrl.searchParams.set('count', '1');
  geocodingUrl.searchParams.set('format', 'json');

  const geocoding = parsePayload(
    geocodingSchema,
    await fetchJson(geocodingUrl, {
      label: 'Geocoding API',
      timeoutMs: context.settings.timeoutMs,
      signal: context.signal,
      logger: context.logger
    }),
    'Geocoding API'
  );

  const place = geocoding.results?.[0];
  if (!place) {
    throw new AppError(400, 'validation_error', `No location found for city "${city}".`, { city });
  }

  const forecastUrl = new URL(`${context.settings.weatherApiBaseUrl}/forecast`);
  forecastUrl.searchParams.set('latitude', String(place.latitude));
  forecastUrl.searchParams.set('longitude', String(place.longitude));
  forecastUrl.searchParams.set(
    'current',
    'temperature_2m,apparent_temperature,relative_humidity_2m,wind_speed_10m,weather_code'
  );
  if (units === 'imperial') {
    forecastUrl.searchParams.set('temperature_unit', 'fahrenheit');
    forecastUrl.searchParams.set('wind_speed_unit', 'mph');
  }

  const forecast = parsePayload(
    forecastSchema,
    await fetchJson(forecastUrl, {
      label: 'Weather API',
      timeoutMs: context.settings.timeoutMs,
      signal: context.signal,
      logger: context.logger
    }),
    'Weather API'
  );

  const current = forecast.current;
  return {
    location: {
      name: place.name,
      country: place.country ?? null,
      latitude: place.latitude,
      longitude: place.longitude
    },
    units,
    observedAt: current.time,
    temperature: current.temperature_2m,
    apparentTemperature: current.apparent_temperature ?? null,
    relativeHumidity: current.relative_humidity_2m ?? null,
    windSpeed: current.wind_speed_10m ?? null,
    weatherCode: current.weather_code,
    conditions: describeWeatherCode(current.weather_code)
  };
}
