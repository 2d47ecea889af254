// src/types/forecast.ts
export const CARDINAL_DIRECTIONS = ['N', 'NE', 'E', 'SE', 'S', 'SW', 'W', 'NW'] as const;
export type CardinalDirection = (typeof CARDINAL_DIRECTIONS)[number];

export const SKILL_LEVELS = ['Beginner', 'Intermediate', 'Advanced'] as const;
export type SkillLevel = (typeof SKILL_LEVELS)[number];

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

/** Image bytes as held in memory; the model client turns them into a data URL. */
export interface ForecastImage {
  data: Buffer;
  mimeType: 'image/jpeg' | 'image/png' | 'image/webp';
}

/** Provider name (e.g. "stormglass") or "simulated" for static fallbacks. */
export type ReadingSource = string;

export interface WaveReading {
  wave_height: number;
  wave_period: number;
  swell_direction: CardinalDirection;
  tide_status: string;
  tide_height: number;
  tide_remaining: string;
  /** Source of the tide half, which wins the key-wise merge. See `provenance` for both halves. */
  source: ReadingSource;
  provenance: {
    wave: ReadingSource;
    tide: ReadingSource;
  };
}

export interface WeatherReading {
  wind_speed: number;
  wind_direction: CardinalDirection;
  temperature: number;
  source: ReadingSource;
}

export interface SafetyReading {
  rip_current_alert: boolean;
  alert_level: 'low' | 'moderate' | 'high';
  shark_activity: boolean;
  water_quality: string;
  warnings: string[];
  source: ReadingSource;
}

export interface SurfShop {
  name: string;
  distance: string;
  status: 'open' | 'closed';
}

export interface AmenitiesReading {
  surf_shops: SurfShop[];
  parking: {
    available: boolean;
    type: string;
    cost: string;
  };
  facilities: string[];
  source: ReadingSource;
}

/** Accumulator fields of the forecast state, keyed as they appear in the result. */
export interface ReadingMap {
  wave_data: WaveReading;
  weather_data: WeatherReading;
  safety_data: SafetyReading;
  amenities_data: AmenitiesReading;
}

export type ReadingKey = keyof ReadingMap;

export interface ForecastRequest {
  location: string;
  coordinates: Coordinates;
  skillLevel: SkillLevel;
  image: ForecastImage;
}

/** Caller-facing result. Field names are a compatibility contract with front ends. */
export interface ForecastResult extends ReadingMap {
  forecast: string;
  error: string;
}
