/**
 * WorldTides v3: current tide height and the next high/low extreme.
 * The key is passed as a query parameter.
 */
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { Coordinates } from '@/types/forecast';
import { isConfiguredCredential, PLACEHOLDER_CREDENTIALS } from '../credentials';
import { roundToTenth } from '../direction';
import { getJson } from '../http';
import { providerErr, providerOk, type ProviderResult } from '../provider-result';

const WORLDTIDES_URL = 'https://www.worldtides.info/api/v3';

const DEFAULT_TIDE_STATUS = 'High Tide';
const DEFAULT_TIDE_HEIGHT = 2.1;
const DEFAULT_TIDE_REMAINING = '1 hour';

const worldTidesSchema = z.object({
  error: z.string().optional(),
  heights: z.array(z.object({ dt: z.number(), height: z.number() })).default([]),
  extremes: z
    .array(z.object({ dt: z.number(), height: z.number(), type: z.enum(['High', 'Low']) }))
    .default([]),
});

export interface TideHalf {
  tide_status: string;
  tide_height: number;
  tide_remaining: string;
}

export interface WorldTidesOptions {
  apiKey?: string;
  timeoutMs?: number;
  now?: () => Date;
}

/** "45 minutes", "1 hour", "3 hours". */
export function formatTimeRemaining(ms: number): string {
  const minutes = Math.max(0, Math.round(ms / 60_000));
  if (minutes < 60) return `${minutes} minutes`;
  const hours = Math.round(minutes / 60);
  return hours === 1 ? '1 hour' : `${hours} hours`;
}

export class WorldTidesProvider {
  readonly name = 'worldtides';

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: WorldTidesOptions = {},
  ) {}

  async fetchTide(coordinates: Coordinates): Promise<ProviderResult<TideHalf>> {
    const apiKey = this.options.apiKey;
    if (!isConfiguredCredential(apiKey, PLACEHOLDER_CREDENTIALS.worldTides)) {
      return providerErr('not_configured', 'WORLDTIDES_API_KEY not set');
    }

    const res = await getJson(this.http, WORLDTIDES_URL, {
      params: {
        heights: '',
        extremes: '',
        lat: coordinates.latitude,
        lon: coordinates.longitude,
        key: apiKey,
      },
      timeoutMs: this.options.timeoutMs,
    });
    if (!res.ok) return res;

    const parsed = worldTidesSchema.safeParse(res.data);
    if (!parsed.success) {
      return providerErr('parse', `Unexpected WorldTides body: ${parsed.error.issues[0]?.message ?? 'invalid'}`);
    }
    if (parsed.data.error) return providerErr('parse', `WorldTides error: ${parsed.data.error}`);

    const nowMs = (this.options.now?.() ?? new Date()).getTime();
    const next = parsed.data.extremes.find((e) => e.dt * 1000 > nowMs);
    const height = parsed.data.heights[0]?.height;

    return providerOk({
      tide_status: next ? `${next.type} Tide` : DEFAULT_TIDE_STATUS,
      tide_height: height !== undefined ? roundToTenth(height) : DEFAULT_TIDE_HEIGHT,
      tide_remaining: next ? formatTimeRemaining(next.dt * 1000 - nowMs) : DEFAULT_TIDE_REMAINING,
    });
  }
}
