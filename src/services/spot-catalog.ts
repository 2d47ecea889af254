// src/services/spot-catalog.ts: known surf spots (coordinates + sample still), loaded from config/spots.json
import { z } from 'zod';
import type { Coordinates } from '@/types/forecast';
import spotsJson from '@/config/spots.json';

const spotSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  latitude: z.number().finite(),
  longitude: z.number().finite(),
  /** Local path (relative to the working directory) or http(s) URL. */
  sample: z.string().min(1),
});

export type Spot = z.infer<typeof spotSchema>;

export interface SpotSummary {
  key: string;
  name: string;
  coordinates: Coordinates;
}

function canonical(location: string): string {
  return location.trim().toLowerCase();
}

export class SpotCatalog {
  private readonly byKey = new Map<string, Spot>();

  constructor(spots: Spot[]) {
    for (const spot of spots) {
      this.byKey.set(canonical(spot.key), spot);
    }
  }

  static fromConfig(): SpotCatalog {
    return new SpotCatalog(z.array(spotSchema).parse(spotsJson));
  }

  get(location: string): Spot | undefined {
    return this.byKey.get(canonical(location));
  }

  list(): SpotSummary[] {
    return [...this.byKey.values()].map((s) => ({
      key: s.key,
      name: s.name,
      coordinates: { latitude: s.latitude, longitude: s.longitude },
    }));
  }
}
