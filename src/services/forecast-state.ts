// src/services/forecast-state.ts: per-request record threaded through the pipeline
import type {
  Coordinates,
  ForecastImage,
  ForecastRequest,
  ForecastResult,
  ReadingKey,
  ReadingMap,
  SkillLevel,
} from '@/types/forecast';

type ReadingSlots = { [K in ReadingKey]: ReadingMap[K] | null };

/** A field was written twice, or read before the stage that owns it ran. */
export class ForecastStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ForecastStateError';
  }
}

/**
 * Inputs are fixed at construction. Each reading is written once by its
 * collection stage and frozen; `forecast` / `error` are written once by synthesis.
 * Stages write disjoint fields, so concurrent collection needs no locking.
 */
export class ForecastState {
  readonly location: string;
  readonly coordinates: Coordinates;
  readonly skillLevel: SkillLevel;
  readonly image: ForecastImage;

  private readonly readings: ReadingSlots = {
    wave_data: null,
    weather_data: null,
    safety_data: null,
    amenities_data: null,
  };
  private outcome: { forecast: string; error: string } | null = null;

  constructor(request: ForecastRequest) {
    this.location = request.location;
    this.coordinates = Object.freeze({ ...request.coordinates });
    this.skillLevel = request.skillLevel;
    this.image = request.image;
  }

  record<K extends ReadingKey>(key: K, reading: ReadingMap[K]): void {
    if (this.readings[key] !== null) {
      throw new ForecastStateError(`${key} already recorded`);
    }
    Object.freeze(reading);
    this.readings[key] = reading;
  }

  has(key: ReadingKey): boolean {
    return this.readings[key] !== null;
  }

  reading<K extends ReadingKey>(key: K): ReadingMap[K] {
    const value: ReadingMap[K] | null = this.readings[key];
    if (value === null) {
      throw new ForecastStateError(`${key} read before its stage completed`);
    }
    return value;
  }

  recordOutcome(forecast: string, error: string): void {
    if (this.outcome) throw new ForecastStateError('forecast already recorded');
    this.outcome = { forecast, error };
  }

  get forecast(): string {
    return this.outcome?.forecast ?? '';
  }

  get error(): string {
    return this.outcome?.error ?? '';
  }

  snapshot(): ForecastResult {
    return {
      forecast: this.forecast,
      wave_data: this.reading('wave_data'),
      weather_data: this.reading('weather_data'),
      safety_data: this.reading('safety_data'),
      amenities_data: this.reading('amenities_data'),
      error: this.error,
    };
  }
}
