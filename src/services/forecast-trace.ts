// src/services/forecast-trace.ts: per-run stage timings, only built when FORECAST_TRACE is on
import { randomUUID } from 'crypto';

export interface StageTiming {
  stage: string;
  ms: number;
  /** Reading source for collection stages. */
  source?: string;
  fallback?: boolean;
  error?: string;
  prompt?: string;
  response?: string;
}

export type StageDetail = Omit<StageTiming, 'stage' | 'ms'>;

export class ForecastTrace {
  readonly id = randomUUID();
  readonly stages: StageTiming[] = [];
  private readonly startedAt = Date.now();

  constructor(readonly location: string) {}

  mark(stage: string, since: number, detail: StageDetail = {}): void {
    this.stages.push({ stage, ms: Date.now() - since, ...detail });
  }

  toLog(): { id: string; location: string; totalMs: number; stages: StageTiming[] } {
    return {
      id: this.id,
      location: this.location,
      totalMs: Date.now() - this.startedAt,
      stages: this.stages,
    };
  }
}
