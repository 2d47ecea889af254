import { describe, it, expect, vi, afterEach } from 'vitest';
import { ForecastTrace } from '@/services/forecast-trace';

afterEach(() => {
  vi.useRealTimers();
});

describe('ForecastTrace', () => {
  it('records stage durations against the given start time', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-05-01T07:00:00Z'));
    const trace = new ForecastTrace('Bundoran, Ireland');
    const since = Date.now();

    vi.advanceTimersByTime(40);
    trace.mark('collect-weather', since, { source: 'open-meteo' });
    vi.advanceTimersByTime(10);
    trace.mark('collect-safety', since, { error: 'feed down', fallback: true });

    expect(trace.toLog()).toEqual({
      id: trace.id,
      location: 'Bundoran, Ireland',
      totalMs: 50,
      stages: [
        { stage: 'collect-weather', ms: 40, source: 'open-meteo' },
        { stage: 'collect-safety', ms: 50, error: 'feed down', fallback: true },
      ],
    });
  });
});
