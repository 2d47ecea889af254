// src/services/providers/data-source.ts: uniform contract for the four collection adapters
import type { Coordinates, ReadingKey, ReadingMap } from '@/types/forecast';

export interface DataSourceContext {
  locationName: string;
}

export interface DataSource<K extends ReadingKey> {
  /** Result key the reading is stored under. */
  readonly key: K;
  /**
   * Never rejects: provider failures resolve to the static fallback (or its
   * half of the keys, for adapters with two providers).
   */
  fetch(coordinates: Coordinates, context: DataSourceContext): Promise<ReadingMap[K]>;
  /** Deterministic reading used when no provider produced data. */
  fallback(): ReadingMap[K];
}

export type AnyDataSource = { [K in ReadingKey]: DataSource<K> }[ReadingKey];

export const SIMULATED_SOURCE = 'simulated';
