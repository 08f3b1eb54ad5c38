import type { AltitudeBand, FlightPhase, WeightClass } from './types.js';

/**
 * ADS-B emitter category to weight class. Keys are the numeric codes the
 * /states/all endpoint returns with extended=1, plus the A-set letter codes
 * other feeds use for the same categories.
 */
export const DEFAULT_WEIGHT_CLASS_TABLE: Record<string, WeightClass> = {
  '2': 'LIGHT',
  '3': 'SMALL',
  '4': 'LARGE',
  '5': 'LARGE', // high vortex large (B757)
  '6': 'HEAVY',
  '7': 'HIGH_PERF',
  '8': 'ROTORCRAFT',
  A1: 'LIGHT',
  A2: 'SMALL',
  A3: 'LARGE',
  A4: 'LARGE',
  A5: 'HEAVY',
  A6: 'HIGH_PERF',
  A7: 'ROTORCRAFT',
};

export const classifyWeight = (
  category: number | string | null,
  table: Record<string, WeightClass> = DEFAULT_WEIGHT_CLASS_TABLE,
): WeightClass => {
  if (category === null) return 'UNKNOWN';
  const key = typeof category === 'number' ? String(category) : category.trim().toUpperCase();
  return Object.prototype.hasOwnProperty.call(table, key) ? table[key] : 'UNKNOWN';
};

export const classifyPhase = (
  onGround: boolean,
  verticalRateMps: number | null,
  thresholdMps: number,
): FlightPhase => {
  if (onGround) return 'GROUND';
  if (verticalRateMps === null) return 'LEVEL';
  if (verticalRateMps > thresholdMps) return 'CLIMBING';
  if (verticalRateMps < -thresholdMps) return 'DESCENDING';
  return 'LEVEL';
};

const METRES_PER_FOOT = 0.3048;

// Upper bounds in feet, inclusive
const ALTITUDE_BANDS: { band: AltitudeBand; maxFt: number }[] = [
  { band: 'LOW', maxFt: 10_000 },
  { band: 'MEDIUM', maxFt: 20_000 },
  { band: 'HIGH', maxFt: 30_000 },
  { band: 'VERY_HIGH', maxFt: 45_000 },
];

export const classifyAltitudeBand = (altitudeM: number | null): AltitudeBand => {
  if (altitudeM === null) return 'UNKNOWN';
  const feet = altitudeM / METRES_PER_FOOT;
  return ALTITUDE_BANDS.find(b => feet <= b.maxFt)?.band ?? 'EXTREME';
};
