/**
 * Weather provider using Open-Meteo (no API key): current wind and air temperature.
 */
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Coordinates, WeatherReading } from '@/types/forecast';
import { degreesToCardinal } from '../direction';
import { getJson } from '../http';
import { providerErr, providerOk, type ProviderResult } from '../provider-result';

const FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';

const DEFAULT_WIND_SPEED_KN = 12;
const DEFAULT_WIND_DIRECTION_DEG = 90;
const DEFAULT_TEMPERATURE_C = 15;

const currentSchema = z.object({
  current: z
    .object({
      temperature_2m: z.number().optional(),
      wind_speed_10m: z.number().optional(),
      wind_direction_10m: z.number().optional(),
    })
    .default({}),
});

export type CurrentWeather = Omit<WeatherReading, 'source'>;

export class OpenMeteoWeatherProvider {
  readonly name = 'open-meteo';

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: { timeoutMs?: number } = {},
  ) {}

  async fetchCurrent(coordinates: Coordinates): Promise<ProviderResult<CurrentWeather>> {
    const res = await getJson(this.http, FORECAST_URL, {
      params: {
        latitude: coordinates.latitude,
        longitude: coordinates.longitude,
        current: 'temperature_2m,wind_speed_10m,wind_direction_10m',
        wind_speed_unit: 'kn',
      },
      timeoutMs: this.options.timeoutMs,
    });
    if (!res.ok) return res;

    const parsed = currentSchema.safeParse(res.data);
    if (!parsed.success) {
      return providerErr('parse', `Unexpected Open-Meteo body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const current = parsed.data.current;
    return providerOk({
      wind_speed: current.wind_speed_10m ?? DEFAULT_WIND_SPEED_KN,
      wind_direction: degreesToCardinal(current.wind_direction_10m ?? DEFAULT_WIND_DIRECTION_DEG),
      temperature: current.temperature_2m ?? DEFAULT_TEMPERATURE_C,
    });
  }
}
