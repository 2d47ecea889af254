// src/services/providers/wave/wave-source.ts: swell (Stormglass) + tide (WorldTides), merged key-wise
import type { Coordinates, WaveReading } from '@/types/forecast';
import { logger } from '@/services/logger';
import { SIMULATED_SOURCE, type DataSource, type DataSourceContext } from '../data-source';
import type { ProviderResult } from '../provider-result';
import type { StormglassProvider, SwellHalf } from './stormglass';
import type { TideHalf, WorldTidesProvider } from './worldtides';

const SWELL_FALLBACK: SwellHalf = {
  wave_height: 1.8,
  wave_period: 10,
  swell_direction: 'W',
};

const TIDE_FALLBACK: TideHalf = {
  tide_status: 'High Tide',
  tide_height: 2.1,
  tide_remaining: '1 hour',
};

interface Half<T> {
  values: T;
  source: string;
}

function resolveHalf<T>(provider: string, result: ProviderResult<T>, fallback: T): Half<T> {
  if (result.ok) return { values: result.data, source: provider };
  if (result.error.code === 'not_configured') {
    logger.debug(`${provider}:not_configured`, { reason: result.error.message });
  } else {
    logger.warn(`${provider}:fetch_failed`, { code: result.error.code, error: result.error.message });
  }
  return { values: { ...fallback }, source: SIMULATED_SOURCE };
}

function merge(swell: Half<SwellHalf>, tide: Half<TideHalf>): WaveReading {
  return {
    ...swell.values,
    ...tide.values,
    source: tide.source,
    provenance: { wave: swell.source, tide: tide.source },
  };
}

export class WaveDataSource implements DataSource<'wave_data'> {
  readonly key = 'wave_data';

  constructor(
    private readonly stormglass: StormglassProvider,
    private readonly worldTides: WorldTidesProvider,
  ) {}

  async fetch(coordinates: Coordinates, _context: DataSourceContext): Promise<WaveReading> {
    // the two halves are independent; one failing never blocks the other
    const [swellResult, tideResult] = await Promise.all([
      this.stormglass.fetchSwell(coordinates),
      this.worldTides.fetchTide(coordinates),
    ]);
    return merge(
      resolveHalf(this.stormglass.name, swellResult, SWELL_FALLBACK),
      resolveHalf(this.worldTides.name, tideResult, TIDE_FALLBACK),
    );
  }

  fallback(): WaveReading {
    return merge(
      { values: { ...SWELL_FALLBACK }, source: SIMULATED_SOURCE },
      { values: { ...TIDE_FALLBACK }, source: SIMULATED_SOURCE },
    );
  }
}
