/**
 * Stormglass point forecast: wave height / period / direction for the current hour.
 * Requires an API key in the Authorization header.
 */
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { CardinalDirection, Coordinates } from '@/types/forecast';
import { degreesToCardinal, roundToTenth } from '../direction';
import { isConfiguredCredential, PLACEHOLDER_CREDENTIALS } from '../credentials';
import { getJson } from '../http';
import { providerErr, providerOk, type ProviderResult } from '../provider-result';

const STORMGLASS_URL = 'https://api.stormglass.io/v2/weather/point';
const STORMGLASS_PARAMS = 'waveHeight,wavePeriod,waveDirection,windSpeed,windDirection';

// Values used when the payload omits a field for the current hour
const DEFAULT_WAVE_HEIGHT = 1.8;
const DEFAULT_WAVE_PERIOD = 10;
const DEFAULT_WAVE_DIRECTION_DEG = 270;

const sgValue = z.object({ sg: z.number().optional() }).optional();

const stormglassSchema = z.object({
  hours: z
    .array(
      z.object({
        waveHeight: sgValue,
        wavePeriod: sgValue,
        waveDirection: sgValue,
      }),
    )
    .default([]),
});

export interface SwellHalf {
  wave_height: number;
  wave_period: number;
  swell_direction: CardinalDirection;
}

export interface StormglassOptions {
  apiKey?: string;
  timeoutMs?: number;
}

export class StormglassProvider {
  readonly name = 'stormglass';

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: StormglassOptions = {},
  ) {}

  async fetchSwell(coordinates: Coordinates): Promise<ProviderResult<SwellHalf>> {
    const apiKey = this.options.apiKey;
    if (!isConfiguredCredential(apiKey, PLACEHOLDER_CREDENTIALS.stormglass)) {
      return providerErr('not_configured', 'STORMGLASS_API_KEY not set');
    }

    const res = await getJson(this.http, STORMGLASS_URL, {
      params: { lat: coordinates.latitude, lng: coordinates.longitude, params: STORMGLASS_PARAMS },
      headers: { Authorization: apiKey },
      timeoutMs: this.options.timeoutMs,
    });
    if (!res.ok) return res;

    const parsed = stormglassSchema.safeParse(res.data);
    if (!parsed.success) {
      return providerErr('parse', `Unexpected Stormglass body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    const current = parsed.data.hours[0];
    if (!current) return providerErr('parse', 'Stormglass returned no hourly data');

    const height = current.waveHeight?.sg ?? DEFAULT_WAVE_HEIGHT;
    return providerOk({
      wave_height: roundToTenth(height),
      wave_period: Math.trunc(current.wavePeriod?.sg ?? DEFAULT_WAVE_PERIOD),
      swell_direction: degreesToCardinal(current.waveDirection?.sg ?? DEFAULT_WAVE_DIRECTION_DEG),
    });
  }
}
