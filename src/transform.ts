import { classifyAltitudeBand, classifyPhase, classifyWeight, DEFAULT_WEIGHT_CLASS_TABLE } from './classification.js';
import { MalformedPayloadError, MalformedRecordError } from './errors.js';
import type { FlightRecord, Position, RawStatesPayload, RawStateVector, TransformOptions } from './types.js';
import { headingSector, isObject, normalizeHeading, toFiniteNumber, toTrimmedString } from './utils.js';

export const DEFAULT_TRANSFORM_OPTIONS: TransformOptions = {
  climbRateThresholdMps: 1,
  headingSectors: 8,
  weightClassTable: DEFAULT_WEIGHT_CLASS_TABLE,
};

// Column order of a /states/all row (extended=1 appends category at index 17)
const COLUMNS = {
  icao24: 0,
  callsign: 1,
  origin_country: 2,
  time_position: 3,
  last_contact: 4,
  longitude: 5,
  latitude: 6,
  baro_altitude: 7,
  on_ground: 8,
  velocity: 9,
  true_track: 10,
  vertical_rate: 11,
  geo_altitude: 13,
  squawk: 14,
  category: 17,
} as const;

type Field = keyof typeof COLUMNS;

// sorts after every real icao24 (hex digits)
export const FALLBACK_KEY_PREFIX = '~row-';

export type TransformReport = {
  records: FlightRecord[];
  dropped: MalformedRecordError[];
}

/**
 * Validates the envelope of a /states/all response
 * @throws MalformedPayloadError if the payload is not an object with a states array (or null)
 */
export const parseStatesPayload = (payload: unknown): RawStatesPayload => {
  if (!isObject(payload)) {
    throw new MalformedPayloadError('States payload must be an object');
  }
  const { time, states } = payload;
  if (states !== null && states !== undefined && !Array.isArray(states)) {
    throw new MalformedPayloadError('States payload "states" must be an array or null');
  }
  return {
    time: toFiniteNumber(time) ?? 0,
    states: Array.isArray(states) ? states : null,
  };
};

/**
 * Reads one upstream row, either the positional tuple or an object keyed by field name
 * @throws MalformedRecordError if the row is neither
 */
export const toRawStateVector = (row: unknown, index: number): RawStateVector => {
  let read: (field: Field) => unknown;
  if (Array.isArray(row)) {
    read = (field) => row[COLUMNS[field]];
  } else if (isObject(row)) {
    read = (field) => row[field];
  } else {
    throw new MalformedRecordError(`Row ${index} is not a state vector`, index);
  }

  const icao24 = toTrimmedString(read('icao24'));
  const category = read('category');

  return {
    icao24: icao24 ? icao24.toLowerCase() : null,
    callsign: toTrimmedString(read('callsign')),
    origin_country: toTrimmedString(read('origin_country')),
    time_position: toFiniteNumber(read('time_position')),
    last_contact: toFiniteNumber(read('last_contact')),
    longitude: toFiniteNumber(read('longitude')),
    latitude: toFiniteNumber(read('latitude')),
    baro_altitude: toFiniteNumber(read('baro_altitude')),
    on_ground: read('on_ground') === true,
    velocity: toFiniteNumber(read('velocity')),
    true_track: toFiniteNumber(read('true_track')),
    vertical_rate: toFiniteNumber(read('vertical_rate')),
    geo_altitude: toFiniteNumber(read('geo_altitude')),
    squawk: toTrimmedString(read('squawk')) || null,
    category: typeof category === 'number' || typeof category === 'string' ? category : null,
  };
};

const toPosition = (latitude: number | null, longitude: number | null): Position | null => {
  if (latitude === null || longitude === null) return null;
  if (latitude < -90 || latitude > 90 || longitude < -180 || longitude > 180) return null;
  return { lat: latitude, lon: longitude };
};

export const normalizeStateVector = (raw: RawStateVector, icao24: string, options: TransformOptions): FlightRecord => {
  const heading = raw.true_track === null ? null : normalizeHeading(raw.true_track);
  const altitude = raw.baro_altitude ?? raw.geo_altitude;
  return {
    icao24,
    callsign: raw.callsign ?? '',
    country: raw.origin_country ?? '',
    position: toPosition(raw.latitude, raw.longitude),
    altitude_m: altitude,
    altitude_band: classifyAltitudeBand(altitude),
    speed_mps: raw.velocity,
    heading_deg: heading,
    vertical_rate_mps: raw.vertical_rate,
    squawk: raw.squawk,
    category: raw.category,
    last_contact: raw.last_contact,
    weight_class: classifyWeight(raw.category, options.weightClassTable),
    flight_phase: classifyPhase(raw.on_ground, raw.vertical_rate, options.climbRateThresholdMps),
    heading_sector: heading === null ? null : headingSector(heading, options.headingSectors),
    is_anomalous: false,
    anomaly_reasons: [],
  };
};

/**
 * Normalizes a raw states payload into flight records, keyed and sorted by icao24.
 * Pure: the same payload and options always give the same records.
 * Rows with neither icao24 nor position are reported in `dropped` instead of aborting the transform.
 */
export const transformWithReport = (
  payload: unknown,
  options: TransformOptions = DEFAULT_TRANSFORM_OPTIONS,
): TransformReport => {
  const { states } = parseStatesPayload(payload);
  const dropped: MalformedRecordError[] = [];
  const byIcao = new Map<string, FlightRecord>();

  (states ?? []).forEach((row, index) => {
    let raw: RawStateVector;
    try {
      raw = toRawStateVector(row, index);
    } catch (error) {
      if (error instanceof MalformedRecordError) {
        dropped.push(error);
        return;
      }
      throw error;
    }

    if (!raw.icao24 && toPosition(raw.latitude, raw.longitude) === null) {
      dropped.push(new MalformedRecordError(`Row ${index} has neither icao24 nor position`, index));
      return;
    }

    // a positioned row without icao24 still counts; its key is derived from the row
    const record = normalizeStateVector(raw, raw.icao24 || `${FALLBACK_KEY_PREFIX}${index}`, options);
    const existing = byIcao.get(record.icao24);
    // duplicate transponder in one payload: the most recent contact wins
    if (!existing || (record.last_contact ?? -Infinity) > (existing.last_contact ?? -Infinity)) {
      byIcao.set(record.icao24, record);
    }
  });

  const records = [...byIcao.values()].sort((a, b) => (a.icao24 < b.icao24 ? -1 : a.icao24 > b.icao24 ? 1 : 0));
  return { records, dropped };
};

export const transform = (payload: unknown, options: TransformOptions = DEFAULT_TRANSFORM_OPTIONS): FlightRecord[] => {
  const { records, dropped } = transformWithReport(payload, options);
  for (const error of dropped) {
    console.warn(`[TRANSFORM] Dropped record: ${error.message}`);
  }
  return records;
};
