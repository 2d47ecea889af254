import { describe, it, expect, vi, afterEach } from 'vitest';
import { ForecastPipeline, ForecastInputError, type PipelineDeps, type PipelineOptions } from '@/services/orchestrator';
import { ForecastSynthesizer, FORECAST_PLACEHOLDER } from '@/services/forecast-synthesizer';
import { StormglassProvider } from '@/services/providers/wave/stormglass';
import { WorldTidesProvider } from '@/services/providers/wave/worldtides';
import { WaveDataSource } from '@/services/providers/wave/wave-source';
import { OpenMeteoWeatherProvider } from '@/services/providers/weather/open-meteo-weather';
import { WeatherDataSource } from '@/services/providers/weather/weather-source';
import { SimulatedSafetySource } from '@/services/providers/safety/safety-source';
import { SimulatedAmenitiesSource } from '@/services/providers/amenities/amenities-source';
import type { DataSource } from '@/services/providers/data-source';
import { logger } from '@/services/logger';
import type { ForecastRequest, ReadingKey, ReadingMap } from '@/types/forecast';
import { FakeCompletionClient, fakeHttp } from './helpers';

const OPEN_METEO_URL = 'https://api.open-meteo.com/v1/forecast';

function request(overrides: Partial<ForecastRequest> = {}): ForecastRequest {
  return {
    location: 'Lahinch, Ireland',
    coordinates: { latitude: 52.9335, longitude: -9.3472 },
    skillLevel: 'Beginner',
    image: { data: Buffer.from([0xff, 0xd8, 0xff, 0xe0]), mimeType: 'image/jpeg' },
    ...overrides,
  };
}

/** Deps with no provider keys and Open-Meteo unreachable: every reading is a fallback. */
function offlineDeps(client = new FakeCompletionClient()): PipelineDeps {
  const { http } = fakeHttp();
  return {
    wave: new WaveDataSource(new StormglassProvider(http), new WorldTidesProvider(http)),
    weather: new WeatherDataSource(new OpenMeteoWeatherProvider(http)),
    safety: new SimulatedSafetySource(),
    amenities: new SimulatedAmenitiesSource(),
    synthesizer: new ForecastSynthesizer(client),
  };
}

/** Wraps a source so its fetch is delayed and its start/end are logged to `events`. */
function timed<K extends ReadingKey>(
  inner: DataSource<K>,
  events: string[],
  delayMs: number,
): DataSource<K> {
  return {
    key: inner.key,
    fallback: () => inner.fallback(),
    async fetch(): Promise<ReadingMap[K]> {
      events.push(`start:${inner.key}`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      events.push(`end:${inner.key}`);
      return inner.fallback();
    },
  };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('ForecastPipeline', () => {
  it('produces a full result from fallbacks and a healthy model', async () => {
    const client = new FakeCompletionClient(() => 'Small clean waves; stay between the flags.');
    const result = await new ForecastPipeline(offlineDeps(client)).run(request());

    expect(result.forecast).toBe('Small clean waves; stay between the flags.');
    expect(result.error).toBe('');
    expect(result.wave_data).toEqual({
      wave_height: 1.8,
      wave_period: 10,
      swell_direction: 'W',
      tide_status: 'High Tide',
      tide_height: 2.1,
      tide_remaining: '1 hour',
      source: 'simulated',
      provenance: { wave: 'simulated', tide: 'simulated' },
    });
    expect(result.weather_data).toEqual({ wind_speed: 12, wind_direction: 'E', temperature: 15, source: 'simulated' });
    expect(result.safety_data.alert_level).toBe('moderate');
    expect(result.amenities_data.surf_shops).toHaveLength(2);

    expect(client.calls).toHaveLength(1);
    const [prompt, image] = client.calls[0];
    expect(prompt).toContain('Generate a 3-sentence surf forecast for a Beginner surfer at Lahinch, Ireland:');
    expect(image.mimeType).toBe('image/jpeg');
  });

  it('still returns every reading when the model fails', async () => {
    const client = new FakeCompletionClient(() => {
      throw new Error('upstream 500');
    });
    const result = await new ForecastPipeline(offlineDeps(client)).run(request());

    expect(result.forecast).toBe(FORECAST_PLACEHOLDER);
    expect(result.error).toBe('Forecast generation failed: upstream 500');
    expect(Object.keys(result).sort()).toEqual([
      'amenities_data',
      'error',
      'forecast',
      'safety_data',
      'wave_data',
      'weather_data',
    ]);
  });

  it('uses live weather when the provider answers', async () => {
    const { http } = fakeHttp({
      [OPEN_METEO_URL]: {
        status: 200,
        data: { current: { temperature_2m: 11, wind_speed_10m: 5, wind_direction_10m: 95 } },
      },
    });
    const deps = { ...offlineDeps(), weather: new WeatherDataSource(new OpenMeteoWeatherProvider(http)) };
    const result = await new ForecastPipeline(deps).run(request());
    expect(result.weather_data).toEqual({ wind_speed: 5, wind_direction: 'E', temperature: 11, source: 'open-meteo' });
  });

  it('rejects requests without an image before any stage runs', async () => {
    const client = new FakeCompletionClient();
    const pipeline = new ForecastPipeline(offlineDeps(client));

    await expect(
      pipeline.run(request({ image: { data: Buffer.alloc(0), mimeType: 'image/jpeg' } })),
    ).rejects.toBeInstanceOf(ForecastInputError);
    expect(client.calls).toHaveLength(0);
  });

  it('rejects a blank location and non-finite coordinates', async () => {
    const pipeline = new ForecastPipeline(offlineDeps());

    await expect(pipeline.run(request({ location: '   ' }))).rejects.toThrow(ForecastInputError);

    const err = await pipeline
      .run(request({ coordinates: { latitude: Number.NaN, longitude: 0 } }))
      .catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ForecastInputError);
    expect(err instanceof ForecastInputError && err.issues.map((i) => i.path)).toEqual(['coordinates.latitude']);
  });

  it('runs collection stages concurrently by default', async () => {
    const events: string[] = [];
    const base = offlineDeps();
    const deps: PipelineDeps = {
      ...base,
      wave: timed(base.wave, events, 20),
      weather: timed(base.weather, events, 5),
      safety: timed(base.safety, events, 5),
      amenities: timed(base.amenities, events, 5),
    };
    await new ForecastPipeline(deps).run(request());

    expect(events.slice(0, 4)).toEqual([
      'start:wave_data',
      'start:weather_data',
      'start:safety_data',
      'start:amenities_data',
    ]);
    expect(events[events.length - 1]).toBe('end:wave_data');
  });

  it('runs collection stages in fixed order when sequential', async () => {
    const events: string[] = [];
    const base = offlineDeps();
    const deps: PipelineDeps = {
      ...base,
      wave: timed(base.wave, events, 10),
      weather: timed(base.weather, events, 1),
      safety: timed(base.safety, events, 1),
      amenities: timed(base.amenities, events, 1),
    };
    const options: PipelineOptions = { sequentialCollection: true };
    await new ForecastPipeline(deps, options).run(request());

    expect(events).toEqual([
      'start:wave_data',
      'end:wave_data',
      'start:weather_data',
      'end:weather_data',
      'start:safety_data',
      'end:safety_data',
      'start:amenities_data',
      'end:amenities_data',
    ]);
  });

  it('records the fallback when a stage throws unexpectedly', async () => {
    const errorSpy = vi.spyOn(logger, 'error').mockImplementation(() => undefined);
    const base = offlineDeps();
    const brokenSafety: DataSource<'safety_data'> = {
      key: 'safety_data',
      fallback: () => base.safety.fallback(),
      fetch: async () => {
        throw new Error('feed exploded');
      },
    };
    const result = await new ForecastPipeline({ ...base, safety: brokenSafety }).run(request());

    expect(result.safety_data).toEqual(base.safety.fallback());
    expect(result.error).toBe('');
    expect(errorSpy).toHaveBeenCalledWith('collect-safety:stage_failed', { error: 'feed exploded' });
  });

  it('logs a trace with every stage when tracing is enabled', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    const client = new FakeCompletionClient(() => 'Glassy at dawn.');
    await new ForecastPipeline(offlineDeps(client), { traceEnabled: true }).run(request());

    const traceCall = infoSpy.mock.calls.find((call) => call[0] === 'forecast:trace');
    expect(traceCall?.[1]).toMatchObject({
      location: 'Lahinch, Ireland',
      stages: expect.arrayContaining([
        expect.objectContaining({ stage: 'collect-wave', source: 'simulated' }),
        expect.objectContaining({ stage: 'collect-weather', source: 'simulated' }),
        expect.objectContaining({ stage: 'collect-safety', source: 'simulated' }),
        expect.objectContaining({ stage: 'collect-amenities', source: 'simulated' }),
        expect.objectContaining({
          stage: 'synthesize-forecast',
          prompt: client.calls[0][0],
          response: 'Glassy at dawn.',
        }),
      ]),
    });
  });

  it('does not build a trace when tracing is off', async () => {
    const infoSpy = vi.spyOn(logger, 'info').mockImplementation(() => undefined);
    await new ForecastPipeline(offlineDeps()).run(request());
    expect(infoSpy.mock.calls.some((call) => call[0] === 'forecast:trace')).toBe(false);
  });
});
