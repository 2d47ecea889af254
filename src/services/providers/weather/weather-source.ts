import type { Coordinates, WeatherReading } from '@/types/forecast';
import { logger } from '@/services/logger';
import { SIMULATED_SOURCE, type DataSource } from '../data-source';
import type { OpenMeteoWeatherProvider } from './open-meteo-weather';

export class WeatherDataSource implements DataSource<'weather_data'> {
  readonly key = 'weather_data';

  constructor(private readonly openMeteo: OpenMeteoWeatherProvider) {}

  async fetch(coordinates: Coordinates): Promise<WeatherReading> {
    const result = await this.openMeteo.fetchCurrent(coordinates);
    if (result.ok) return { ...result.data, source: this.openMeteo.name };

    logger.warn(`${this.openMeteo.name}:fetch_failed`, { code: result.error.code, error: result.error.message });
    return this.fallback();
  }

  fallback(): WeatherReading {
    return {
      wind_speed: 12,
      wind_direction: 'E',
      temperature: 15,
      source: SIMULATED_SOURCE,
    };
  }
}
