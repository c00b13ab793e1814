import { InMemoryReadinessRepository } from './InMemoryReadinessRepository';
import type { ReadinessRepository } from './ReadinessRepository';
import { READINESS_LEVELS } from './referenceData';
import { SqliteReadinessRepository } from './SqliteReadinessRepository';
import { DEFAULT_VEHICLE_PLATFORMS } from './vehiclePlatforms';

/**
 * Inserts the TRL scale and the stock vehicle platforms when their tables are
 * empty. Platforms are inserted under their documented ids, which the legacy
 * `vehicle_type` names resolve to.
 */
export function seedReferenceData(repository: ReadinessRepository): {
  readinessLevels: number;
  vehiclePlatforms: number;
} {
  return repository.transaction(() => {
    let readinessLevels = 0;
    let vehiclePlatforms = 0;

    if (repository.list('technical_readiness_level').length === 0) {
      for (const level of READINESS_LEVELS) {
        repository.insert('technical_readiness_level', level);
        readinessLevels += 1;
      }
    }

    if (repository.list('vehicle_platform').length === 0) {
      for (const { id, ...platform } of DEFAULT_VEHICLE_PLATFORMS) {
        repository.insert('vehicle_platform', platform, { id });
        vehiclePlatforms += 1;
      }
    }

    return { readinessLevels, vehiclePlatforms };
  });
}

/**
 * Opens the repository for a database path and seeds reference data.
 * `memory:` selects the in-process store (nothing persisted).
 */
export function openReadinessRepository(databasePath: string): ReadinessRepository {
  const repository: ReadinessRepository =
    databasePath === 'memory:'
      ? new InMemoryReadinessRepository()
      : new SqliteReadinessRepository(databasePath);
  seedReferenceData(repository);
  return repository;
}
