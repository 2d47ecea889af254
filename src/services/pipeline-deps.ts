// src/services/pipeline-deps.ts: builds the pipeline and image supplier from AppConfig (HTTP route and tests share it)
import type { AxiosInstance } from 'axios';
import type { AppConfig } from '@/config/app.config';
import { ForecastPipeline } from './orchestrator';
import { ForecastSynthesizer } from './forecast-synthesizer';
import { ImageSupplier, SampleImageSource, UploadImageSource } from './image-supplier';
import { OpenAiVisionClient, type MultimodalCompletionClient } from './llm-client';
import { SpotCatalog } from './spot-catalog';
import { createProviderHttp } from './providers/http';
import { StormglassProvider } from './providers/wave/stormglass';
import { WorldTidesProvider } from './providers/wave/worldtides';
import { WaveDataSource } from './providers/wave/wave-source';
import { OpenMeteoWeatherProvider } from './providers/weather/open-meteo-weather';
import { WeatherDataSource } from './providers/weather/weather-source';
import { SimulatedSafetySource } from './providers/safety/safety-source';
import { SimulatedAmenitiesSource } from './providers/amenities/amenities-source';

export interface ForecastServices {
  pipeline: ForecastPipeline;
  imageSupplier: ImageSupplier;
  catalog: SpotCatalog;
}

export interface ForecastServiceOverrides {
  http?: AxiosInstance;
  completionClient?: MultimodalCompletionClient;
  catalog?: SpotCatalog;
  sampleBaseDir?: string;
}

export function createForecastServices(
  config: AppConfig,
  overrides: ForecastServiceOverrides = {},
): ForecastServices {
  const http = overrides.http ?? createProviderHttp();
  const timeoutMs = config.providerTimeoutMs;
  const catalog = overrides.catalog ?? SpotCatalog.fromConfig();

  const completionClient =
    overrides.completionClient ??
    new OpenAiVisionClient({ apiKey: config.credentials.openai, model: config.openaiModel });

  const pipeline = new ForecastPipeline(
    {
      wave: new WaveDataSource(
        new StormglassProvider(http, { apiKey: config.credentials.stormglass, timeoutMs }),
        new WorldTidesProvider(http, { apiKey: config.credentials.worldTides, timeoutMs }),
      ),
      weather: new WeatherDataSource(new OpenMeteoWeatherProvider(http, { timeoutMs })),
      safety: new SimulatedSafetySource(),
      amenities: new SimulatedAmenitiesSource(),
      synthesizer: new ForecastSynthesizer(completionClient),
    },
    {
      sequentialCollection: config.sequentialCollection,
      traceEnabled: config.traceEnabled,
    },
  );

  const imageSupplier = new ImageSupplier({
    upload: new UploadImageSource(),
    sample: new SampleImageSource(catalog, http, { baseDir: overrides.sampleBaseDir, timeoutMs }),
  });

  return { pipeline, imageSupplier, catalog };
}
