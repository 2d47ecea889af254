/** Nearby surf shops, parking and facilities. Simulated until a places provider is wired in. */
import type { AmenitiesReading } from '@/types/forecast';
import { SIMULATED_SOURCE, type DataSource } from '../data-source';

export class SimulatedAmenitiesSource implements DataSource<'amenities_data'> {
  readonly key = 'amenities_data';

  async fetch(): Promise<AmenitiesReading> {
    return this.fallback();
  }

  fallback(): AmenitiesReading {
    return {
      surf_shops: [
        { name: 'Local Surf Shop', distance: '0.5km', status: 'open' },
        { name: 'Surf School', distance: '0.8km', status: 'closed' },
      ],
      parking: { available: true, type: 'public', cost: 'free' },
      facilities: ['showers', 'toilets', 'changing_rooms'],
      source: SIMULATED_SOURCE,
    };
  }
}
