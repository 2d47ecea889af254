/**
 * Safety alerts (rip currents, shark sightings, water quality).
 * No live provider is wired yet; a lifeguard / coastguard feed can replace this
 * class behind the same DataSource contract.
 */
import type { Coordinates, SafetyReading } from '@/types/forecast';
import { logger } from '@/services/logger';
import { SIMULATED_SOURCE, type DataSource, type DataSourceContext } from '../data-source';

export class SimulatedSafetySource implements DataSource<'safety_data'> {
  readonly key = 'safety_data';

  async fetch(_coordinates: Coordinates, context: DataSourceContext): Promise<SafetyReading> {
    logger.debug('safety:simulated', { location: context.locationName });
    return this.fallback();
  }

  fallback(): SafetyReading {
    return {
      rip_current_alert: true,
      alert_level: 'moderate',
      shark_activity: false,
      water_quality: 'good',
      warnings: ['Local Riptide Alert for beginners', 'Surf School rental shops closed until 12:00 PM'],
      source: SIMULATED_SOURCE,
    };
  }
}
