// src/services/prompt-templates.ts: forecast prompt rendered from the completed state
import type { ForecastState } from './forecast-state';

const ROLE_PREAMBLE =
  'You are an experienced surf forecaster prioritizing safety. ' +
  'Analyze all provided data (numerical, text, and image) to generate a concise forecast.';

const VISUAL_INSTRUCTION = 'Analyze the image for crowd levels and surface conditions.';

const REQUIREMENTS = [
  'Start with wave quality assessment',
  'Include safety warnings if applicable',
  'Provide skill-specific advice',
  'Use accessible language',
];

/**
 * Pure: same state, same text. Reads all four readings, so it must only run
 * after every collection stage has recorded.
 */
export function composeForecastPrompt(state: ForecastState): string {
  const wave = state.reading('wave_data');
  const weather = state.reading('weather_data');
  const safety = state.reading('safety_data');
  const amenities = state.reading('amenities_data');

  const numericalMetrics =
    `Wave Height: ${wave.wave_height}m, Period: ${wave.wave_period}s, ` +
    `Direction: ${wave.swell_direction}. ` +
    `Wind: ${weather.wind_speed} knots ${weather.wind_direction}. ` +
    `Tide: ${wave.tide_status}, ${wave.tide_remaining} remaining. ` +
    `Temperature: ${weather.temperature}°C.`;

  const safetyContext = safety.warnings.join(' ');

  const parking = amenities.parking.available ? 'Parking available.' : 'No parking available.';
  const amenitiesInfo = `Nearby: ${amenities.surf_shops.length} surf shops. ${parking}`;

  const userPrompt =
    `Generate a 3-sentence surf forecast for a ${state.skillLevel} surfer at ${state.location}:\n\n` +
    `1. Numerical Metrics: ${numericalMetrics}\n` +
    `2. Safety & Context: ${safetyContext}\n` +
    `3. Local Amenities: ${amenitiesInfo}\n` +
    `4. Visual: ${VISUAL_INSTRUCTION}\n\n` +
    `Requirements:\n` +
    REQUIREMENTS.map((r) => `- ${r}`).join('\n');

  return `${ROLE_PREAMBLE}\n\n${userPrompt}`;
}
