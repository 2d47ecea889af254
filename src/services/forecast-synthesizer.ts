// src/services/forecast-synthesizer.ts: model call boundary; failures become an error string, never a throw
import type { ForecastImage } from '@/types/forecast';
import { logger } from './logger';
import type { MultimodalCompletionClient } from './llm-client';

export const FORECAST_PLACEHOLDER = 'Unable to generate forecast at this time.';

export interface SynthesisOutcome {
  forecast: string;
  error: string;
}

export class ForecastSynthesizer {
  constructor(private readonly client: MultimodalCompletionClient) {}

  async synthesize(prompt: string, image: ForecastImage): Promise<SynthesisOutcome> {
    try {
      const response = await this.client.complete([prompt, image]);
      return { forecast: response.text, error: '' };
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error('synthesize:model_call_failed', { error: message, imageBytes: image.data.length });
      return { forecast: FORECAST_PLACEHOLDER, error: `Forecast generation failed: ${message}` };
    }
  }
}
