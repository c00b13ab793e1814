import type { VehiclePlatform } from './model';

export const GENERIC_PLATFORM_ID = 8;

export type LegacyVehicleType =
  | 'truck'
  | 'van'
  | 'car'
  | 'terberg'
  | 'ca500'
  | 't800'
  | 'aev'
  | 'generic';

const LEGACY_VEHICLE_TYPES: Record<LegacyVehicleType, number> = {
  terberg: 1,
  ca500: 2,
  t800: 3,
  aev: 4,
  truck: 5,
  van: 6,
  car: 7,
  generic: GENERIC_PLATFORM_ID,
};

/** Seeded platforms; ids are stable and referenced by legacy batch files. */
export const DEFAULT_VEHICLE_PLATFORMS: readonly VehiclePlatform[] = [
  {
    id: 1,
    name: 'Terberg ATT',
    description: 'Autonomous terminal tractor',
    vehicleType: 'ATT',
    maxPayload: 40000,
  },
  {
    id: 2,
    name: 'CA500',
    description: 'CA500 autonomous platform',
    vehicleType: 'CA500',
    maxPayload: null,
  },
  {
    id: 3,
    name: 'T800',
    description: 'T800 autonomous platform',
    vehicleType: 'T800',
    maxPayload: null,
  },
  {
    id: 4,
    name: 'AEV',
    description: 'Autonomous electric vehicle',
    vehicleType: 'AEV',
    maxPayload: null,
  },
  {
    id: 5,
    name: 'Truck Platform',
    description: 'General truck features',
    vehicleType: 'truck',
    maxPayload: null,
  },
  {
    id: 6,
    name: 'Van Platform',
    description: 'General van features',
    vehicleType: 'van',
    maxPayload: null,
  },
  {
    id: 7,
    name: 'Car Platform',
    description: 'General car features',
    vehicleType: 'car',
    maxPayload: null,
  },
  {
    id: GENERIC_PLATFORM_ID,
    name: 'Generic Platform',
    description: 'Applies to all platforms',
    vehicleType: 'generic',
    maxPayload: null,
  },
];

const isLegacyVehicleType = (value: string): value is LegacyVehicleType =>
  Object.prototype.hasOwnProperty.call(LEGACY_VEHICLE_TYPES, value);

/**
 * Resolves a `vehicle_type` string to a platform id.
 * Unrecognised strings fall back to the Generic platform.
 */
export function platformIdForVehicleType(vehicleType: string): number {
  const key = vehicleType.trim().toLowerCase();
  return isLegacyVehicleType(key)
    ? LEGACY_VEHICLE_TYPES[key]
    : GENERIC_PLATFORM_ID;
}

/**
 * Normalizes the two accepted spellings of a platform reference.
 * `vehicle_platform_id` wins when both are present.
 *
 * Returns `undefined` when neither is supplied (field absent), `null` when
 * the id was explicitly cleared.
 */
export function normalizePlatformReference(args: {
  vehiclePlatformId?: number | string | null;
  vehicleType?: string | null;
}): number | null | undefined {
  const { vehiclePlatformId, vehicleType } = args;
  if (vehiclePlatformId !== undefined) {
    if (vehiclePlatformId === null) return null;
    if (typeof vehiclePlatformId === 'number') return vehiclePlatformId;
    const trimmed = vehiclePlatformId.trim();
    if (!trimmed) return null;
    const numeric = Number(trimmed);
    if (Number.isInteger(numeric)) return numeric;
    return platformIdForVehicleType(trimmed);
  }
  if (vehicleType === undefined) return undefined;
  if (vehicleType === null || !vehicleType.trim()) return null;
  return platformIdForVehicleType(vehicleType);
}
