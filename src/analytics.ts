import type { AltitudeBand, AnalyticsOptions, AnalyticsResult, FlightRecord, WeightClass } from './types.js';
import { headingSector, sectorLabels } from './utils.js';

export const DEFAULT_MAX_SPEED_MPS: Record<WeightClass, number> = {
  LIGHT: 120,
  SMALL: 220,
  LARGE: 320,
  HEAVY: 330,
  HIGH_PERF: 700,
  ROTORCRAFT: 110,
  UNKNOWN: 350,
};

export const DEFAULT_ANALYTICS_OPTIONS: AnalyticsOptions = {
  stdDevThreshold: 3,
  minSamples: 3,
  headingSectors: 8,
  maxSpeedMps: DEFAULT_MAX_SPEED_MPS,
};

export const ANOMALY_REASONS = {
  speedAboveClassLimit: 'speed_above_class_limit',
  altitudeOutlier: 'altitude_outlier',
  speedOutlier: 'speed_outlier',
} as const;

const UNKNOWN_COUNTRY = 'Unknown';

// Summing in sorted order keeps float results independent of record order
const sortedSum = (values: number[]): number => {
  return [...values].sort((a, b) => a - b).reduce((sum, v) => sum + v, 0);
};

const mean = (values: number[]): number | null => {
  return values.length ? sortedSum(values) / values.length : null;
};

const max = (values: number[]): number | null => {
  return values.length ? Math.max(...values) : null;
};

const populationStdDev = (values: number[], avg: number): number => {
  return Math.sqrt(sortedSum(values.map(v => (v - avg) ** 2)) / values.length);
};

const byIcao = (a: FlightRecord, b: FlightRecord): number => {
  return a.icao24 < b.icao24 ? -1 : a.icao24 > b.icao24 ? 1 : 0;
};

/**
 * Flags z-score outliers for one metric within one group of records
 */
const flagOutliers = (
  group: FlightRecord[],
  metric: (record: FlightRecord) => number | null,
  reason: string,
  options: AnalyticsOptions,
  reasons: Map<string, Set<string>>,
): void => {
  const samples = group.flatMap(record => {
    const value = metric(record);
    return value === null ? [] : [{ record, value }];
  });
  if (samples.length < options.minSamples) return;

  const values = samples.map(s => s.value);
  const avg = sortedSum(values) / values.length;
  const stdDev = populationStdDev(values, avg);
  if (stdDev === 0) return;

  for (const { record, value } of samples) {
    if (Math.abs(value - avg) / stdDev > options.stdDevThreshold) {
      addReason(reasons, record.icao24, reason);
    }
  }
};

const addReason = (reasons: Map<string, Set<string>>, icao24: string, reason: string): void => {
  const existing = reasons.get(icao24);
  if (existing) {
    existing.add(reason);
  } else {
    reasons.set(icao24, new Set([reason]));
  }
};

/**
 * Single-snapshot anomaly rules. No state is carried between snapshots.
 * @returns anomaly reasons keyed by icao24, for flagged records only
 */
export const detectAnomalies = (
  records: FlightRecord[],
  options: AnalyticsOptions = DEFAULT_ANALYTICS_OPTIONS,
): Map<string, string[]> => {
  const reasons = new Map<string, Set<string>>();
  const airborneByClass = new Map<WeightClass, FlightRecord[]>();

  for (const record of records) {
    if (record.speed_mps !== null && record.speed_mps > options.maxSpeedMps[record.weight_class]) {
      addReason(reasons, record.icao24, ANOMALY_REASONS.speedAboveClassLimit);
    }
    if (record.flight_phase !== 'GROUND') {
      const group = airborneByClass.get(record.weight_class) ?? [];
      group.push(record);
      airborneByClass.set(record.weight_class, group);
    }
  }

  for (const group of airborneByClass.values()) {
    flagOutliers(group, r => r.altitude_m, ANOMALY_REASONS.altitudeOutlier, options, reasons);
    flagOutliers(group, r => r.speed_mps, ANOMALY_REASONS.speedOutlier, options, reasons);
  }

  return new Map([...reasons].map(([icao24, set]) => [icao24, [...set].sort()]));
};

/**
 * Aggregates one snapshot's records. Every aggregate is independent of input order.
 */
export const analyze = (
  records: FlightRecord[],
  options: AnalyticsOptions = DEFAULT_ANALYTICS_OPTIONS,
): AnalyticsResult => {
  const phaseCounts = { CLIMBING: 0, DESCENDING: 0, LEVEL: 0, GROUND: 0 };
  const countries = new Map<string, number>();
  const weightClasses: Record<WeightClass, number> = {
    LIGHT: 0, SMALL: 0, LARGE: 0, HEAVY: 0, HIGH_PERF: 0, ROTORCRAFT: 0, UNKNOWN: 0,
  };
  const altitudeBands: Record<AltitudeBand, number> = {
    LOW: 0, MEDIUM: 0, HIGH: 0, VERY_HIGH: 0, EXTREME: 0, UNKNOWN: 0,
  };
  const trafficFlow: Record<string, number> = Object.fromEntries(sectorLabels(options.headingSectors).map(s => [s, 0]));
  const altitudes: number[] = [];
  const speeds: number[] = [];
  let positioned = 0;

  for (const record of records) {
    phaseCounts[record.flight_phase]++;
    weightClasses[record.weight_class]++;
    altitudeBands[record.altitude_band]++;

    const country = record.country || UNKNOWN_COUNTRY;
    countries.set(country, (countries.get(country) ?? 0) + 1);

    if (record.altitude_m !== null) altitudes.push(record.altitude_m);
    if (record.speed_mps !== null) speeds.push(record.speed_mps);

    // traffic flow is map-bound: unpositioned records count in totals only
    if (record.position !== null) {
      positioned++;
      if (record.heading_deg !== null) {
        trafficFlow[headingSector(record.heading_deg, options.headingSectors)]++;
      }
    }
  }

  const flagged = detectAnomalies(records, options);
  const anomalies = records
    .filter(record => flagged.has(record.icao24))
    .map(record => ({ ...record, is_anomalous: true, anomaly_reasons: flagged.get(record.icao24) ?? [] }))
    .sort(byIcao);

  const countryDistribution = Object.fromEntries(
    [...countries].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0)),
  );

  return {
    total_count: records.length,
    climbing_count: phaseCounts.CLIMBING,
    descending_count: phaseCounts.DESCENDING,
    level_count: phaseCounts.LEVEL,
    ground_count: phaseCounts.GROUND,
    positioned_count: positioned,
    avg_altitude_m: mean(altitudes),
    avg_speed_mps: mean(speeds),
    max_altitude_m: max(altitudes),
    max_speed_mps: max(speeds),
    altitude_band_distribution: altitudeBands,
    country_distribution: countryDistribution,
    weight_class_distribution: weightClasses,
    anomalies,
    traffic_flow: trafficFlow,
  };
};

/**
 * Substitutes the flagged copies from `anomalies` into the record list, so the
 * snapshot's records and its anomaly list share the same objects
 */
export const annotateAnomalies = (records: FlightRecord[], anomalies: FlightRecord[]): FlightRecord[] => {
  const flagged = new Map(anomalies.map(record => [record.icao24, record]));
  return records.map(record => flagged.get(record.icao24) ?? record);
};
