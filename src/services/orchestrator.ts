// src/services/orchestrator.ts: fixed-topology forecast pipeline: four collection stages, then synthesis
import { z } from 'zod';
import {
  SKILL_LEVELS,
  type ForecastRequest,
  type ForecastResult,
  type ReadingKey,
} from '@/types/forecast';
import type { AnyDataSource, DataSource } from './providers/data-source';
import type { ForecastSynthesizer } from './forecast-synthesizer';
import { ForecastState } from './forecast-state';
import { composeForecastPrompt } from './prompt-templates';
import { ForecastTrace } from './forecast-trace';
import { logger } from './logger';
import { fieldErrorsFromZod, type FieldError } from '@/utils/errorResponse';

export const STAGE_ORDER = [
  'collect-wave',
  'collect-weather',
  'collect-safety',
  'collect-amenities',
  'synthesize-forecast',
] as const;

export type StageName = (typeof STAGE_ORDER)[number];

export interface PipelineDeps {
  wave: DataSource<'wave_data'>;
  weather: DataSource<'weather_data'>;
  safety: DataSource<'safety_data'>;
  amenities: DataSource<'amenities_data'>;
  synthesizer: ForecastSynthesizer;
}

export interface PipelineOptions {
  /** Run the four collection stages one after another instead of concurrently. */
  sequentialCollection?: boolean;
  traceEnabled?: boolean;
}

/** The pipeline was called without the inputs it requires (e.g. no image). */
export class ForecastInputError extends Error {
  constructor(
    message: string,
    readonly issues: FieldError[] = [],
  ) {
    super(message);
    this.name = 'ForecastInputError';
  }
}

const forecastRequestSchema = z.object({
  location: z.string().trim().min(1, 'location is required'),
  coordinates: z.object({
    latitude: z.number().finite(),
    longitude: z.number().finite(),
  }),
  skillLevel: z.enum(SKILL_LEVELS),
  image: z.object({
    data: z.instanceof(Buffer).refine((b) => b.length > 0, 'image is empty'),
    mimeType: z.enum(['image/jpeg', 'image/png', 'image/webp']),
  }),
});

interface CollectionStage {
  name: StageName;
  source: AnyDataSource;
}

export class ForecastPipeline {
  private readonly collectionStages: CollectionStage[];

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions = {},
  ) {
    this.collectionStages = [
      { name: 'collect-wave', source: deps.wave },
      { name: 'collect-weather', source: deps.weather },
      { name: 'collect-safety', source: deps.safety },
      { name: 'collect-amenities', source: deps.amenities },
    ];
  }

  /**
   * Runs one forecast. Throws only ForecastInputError (before any stage runs);
   * provider and model failures are contained in their stages.
   */
  async run(request: ForecastRequest): Promise<ForecastResult> {
    const parsed = forecastRequestSchema.safeParse(request);
    if (!parsed.success) {
      const issues = fieldErrorsFromZod(parsed.error.issues);
      throw new ForecastInputError(`Invalid forecast request: ${issues.map((i) => i.path).join(', ')}`, issues);
    }

    const startedAt = Date.now();
    const state = new ForecastState(parsed.data);
    const trace = this.options.traceEnabled ? new ForecastTrace(state.location) : undefined;

    if (this.options.sequentialCollection) {
      for (const stage of this.collectionStages) {
        await this.collect(stage.name, stage.source, state, trace);
      }
    } else {
      await Promise.all(this.collectionStages.map((stage) => this.collect(stage.name, stage.source, state, trace)));
    }

    await this.synthesize(state, trace);

    const result = state.snapshot();
    logger.info('forecast:completed', {
      location: state.location,
      durationMs: Date.now() - startedAt,
      sources: {
        wave: result.wave_data.provenance,
        weather: result.weather_data.source,
        safety: result.safety_data.source,
        amenities: result.amenities_data.source,
      },
      failed: result.error !== '',
    });
    if (trace) logger.info('forecast:trace', trace.toLog());
    return result;
  }

  private async collect<K extends ReadingKey>(
    name: StageName,
    source: DataSource<K>,
    state: ForecastState,
    trace: ForecastTrace | undefined,
  ): Promise<void> {
    const startedAt = Date.now();
    try {
      const reading = await source.fetch(state.coordinates, { locationName: state.location });
      state.record(source.key, reading);
      trace?.mark(name, startedAt, { source: reading.source });
    } catch (err: unknown) {
      // adapters are not supposed to reject; keep the reading total anyway
      const message = err instanceof Error ? err.message : String(err);
      logger.error(`${name}:stage_failed`, { error: message });
      if (!state.has(source.key)) state.record(source.key, source.fallback());
      trace?.mark(name, startedAt, { error: message, fallback: true });
    }
  }

  private async synthesize(state: ForecastState, trace: ForecastTrace | undefined): Promise<void> {
    const startedAt = Date.now();
    const prompt = composeForecastPrompt(state);
    const outcome = await this.deps.synthesizer.synthesize(prompt, state.image);
    state.recordOutcome(outcome.forecast, outcome.error);
    trace?.mark('synthesize-forecast', startedAt, {
      prompt,
      response: outcome.error ? undefined : outcome.forecast,
      error: outcome.error || undefined,
    });
  }
}
