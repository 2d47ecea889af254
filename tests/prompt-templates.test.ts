import { describe, it, expect } from 'vitest';
import { composeForecastPrompt } from '@/services/prompt-templates';
import { ForecastState } from '@/services/forecast-state';
import { WaveDataSource } from '@/services/providers/wave/wave-source';
import { StormglassProvider } from '@/services/providers/wave/stormglass';
import { WorldTidesProvider } from '@/services/providers/wave/worldtides';
import { WeatherDataSource } from '@/services/providers/weather/weather-source';
import { OpenMeteoWeatherProvider } from '@/services/providers/weather/open-meteo-weather';
import { SimulatedSafetySource } from '@/services/providers/safety/safety-source';
import { SimulatedAmenitiesSource } from '@/services/providers/amenities/amenities-source';
import { fakeHttp } from './helpers';

const EXPECTED_PROMPT = [
  'You are an experienced surf forecaster prioritizing safety. Analyze all provided data (numerical, text, and image) to generate a concise forecast.',
  '',
  'Generate a 3-sentence surf forecast for a Beginner surfer at Lahinch, Ireland:',
  '',
  '1. Numerical Metrics: Wave Height: 1.8m, Period: 10s, Direction: W. Wind: 12 knots E. Tide: High Tide, 1 hour remaining. Temperature: 15°C.',
  '2. Safety & Context: Local Riptide Alert for beginners Surf School rental shops closed until 12:00 PM',
  '3. Local Amenities: Nearby: 2 surf shops. Parking available.',
  '4. Visual: Analyze the image for crowd levels and surface conditions.',
  '',
  'Requirements:',
  '- Start with wave quality assessment',
  '- Include safety warnings if applicable',
  '- Provide skill-specific advice',
  '- Use accessible language',
].join('\n');

function fallbackState(): ForecastState {
  const { http } = fakeHttp();
  const state = new ForecastState({
    location: 'Lahinch, Ireland',
    coordinates: { latitude: 52.9335, longitude: -9.3472 },
    skillLevel: 'Beginner',
    image: { data: Buffer.from([1]), mimeType: 'image/jpeg' },
  });
  state.record('wave_data', new WaveDataSource(new StormglassProvider(http), new WorldTidesProvider(http)).fallback());
  state.record('weather_data', new WeatherDataSource(new OpenMeteoWeatherProvider(http)).fallback());
  state.record('safety_data', new SimulatedSafetySource().fallback());
  return state;
}

describe('composeForecastPrompt', () => {
  it('renders the fallback readings into the fixed template', () => {
    const state = fallbackState();
    state.record('amenities_data', new SimulatedAmenitiesSource().fallback());
    expect(composeForecastPrompt(state)).toBe(EXPECTED_PROMPT);
  });

  it('is stable across calls', () => {
    const state = fallbackState();
    state.record('amenities_data', new SimulatedAmenitiesSource().fallback());
    expect(composeForecastPrompt(state)).toBe(composeForecastPrompt(state));
  });

  it('says when parking is unavailable', () => {
    const state = fallbackState();
    state.record('amenities_data', {
      surf_shops: [],
      parking: { available: false, type: 'none', cost: 'n/a' },
      facilities: [],
      source: 'simulated',
    });
    expect(composeForecastPrompt(state)).toContain('3. Local Amenities: Nearby: 0 surf shops. No parking available.\n');
  });

  it('cannot run before every reading is recorded', () => {
    expect(() => composeForecastPrompt(fallbackState())).toThrow('amenities_data read before its stage completed');
  });
});
