import { classifyAltitudeBand } from '../src/classification.js';
import type { FlightRecord, HttpRequestInit, HttpResponse } from '../src/types.js';

export const TOKEN_URL = 'https://auth.test/token';
export const API_BASE = 'https://api.test/api';

export const jsonResponse = (
  body: unknown,
  status: number = 200,
  headers: Record<string, string> = {},
): HttpResponse => {
  const lower = new Map(Object.entries(headers).map(([k, v]) => [k.toLowerCase(), v]));
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: status === 200 ? 'OK' : 'Error',
    headers: { get: (name: string) => lower.get(name.toLowerCase()) ?? null },
    json: async () => body,
  };
};

export type StateRowFields = {
  callsign?: string | null;
  country?: string | null;
  lastContact?: number | null;
  lon?: number | string | null;
  lat?: number | string | null;
  baroAltitude?: number | string | null;
  onGround?: boolean;
  velocity?: number | string | null;
  track?: number | null;
  verticalRate?: number | null;
  geoAltitude?: number | null;
  squawk?: string | null;
  category?: number | string | null;
}

/**
 * Builds a positional /states/all row with the extended category column
 */
export const stateRow = (icao24: string | null, fields: StateRowFields = {}): unknown[] => {
  const has = (key: keyof StateRowFields): boolean => Object.prototype.hasOwnProperty.call(fields, key);
  return [
    icao24,
    has('callsign') ? fields.callsign : 'TEST123 ',
    has('country') ? fields.country : 'Germany',
    1700000000,
    has('lastContact') ? fields.lastContact : 1700000000,
    has('lon') ? fields.lon : 8.5,
    has('lat') ? fields.lat : 50.0,
    has('baroAltitude') ? fields.baroAltitude : 10000,
    fields.onGround ?? false,
    has('velocity') ? fields.velocity : 230,
    has('track') ? fields.track : 90,
    has('verticalRate') ? fields.verticalRate : 0,
    null,
    has('geoAltitude') ? fields.geoAltitude : 10100,
    has('squawk') ? fields.squawk : '1000',
    false,
    0,
    has('category') ? fields.category : 4,
  ];
};

export const statesPayload = (rows: unknown[]): { time: number; states: unknown[] } => ({
  time: 1700000000,
  states: rows,
});

export const makeRecord = (overrides: Partial<FlightRecord> = {}): FlightRecord => {
  const altitude = overrides.altitude_m === undefined ? 10000 : overrides.altitude_m;
  return {
    altitude_band: classifyAltitudeBand(altitude),
    ...baseRecord(),
    ...overrides,
  };
};

const baseRecord = (): Omit<FlightRecord, 'altitude_band'> => ({
  icao24: 'abc123',
  callsign: 'TEST123',
  country: 'Germany',
  position: { lat: 50, lon: 8.5 },
  altitude_m: 10000,
  speed_mps: 230,
  heading_deg: 90,
  vertical_rate_mps: 0,
  squawk: '1000',
  category: 4,
  last_contact: 1700000000,
  weight_class: 'LARGE',
  flight_phase: 'LEVEL',
  heading_sector: 'E',
  is_anomalous: false,
  anomaly_reasons: [],
});

/**
 * Fake upstream: answers the token endpoint with a fixed token and hands
 * every API request to `onApi`
 */
export const fakeUpstream = (
  onApi: (url: string, init?: HttpRequestInit) => Promise<HttpResponse>,
  onToken: () => Promise<HttpResponse> = async () => jsonResponse({ access_token: 'test-token', expires_in: 1800 }),
) => {
  return jest.fn(async (url: string, init?: HttpRequestInit): Promise<HttpResponse> => {
    if (url === TOKEN_URL) return onToken();
    return onApi(url, init);
  });
};

// Never resolves; rejects with the abort reason once the request's signal aborts
export const hangUntilAborted = (init?: HttpRequestInit): Promise<HttpResponse> => {
  return new Promise((_resolve, reject) => {
    const signal = init?.signal;
    if (!signal) return;
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason));
  });
};

export const silenceConsole = (): void => {
  jest.spyOn(console, 'log').mockImplementation(() => {});
  jest.spyOn(console, 'warn').mockImplementation(() => {});
  jest.spyOn(console, 'error').mockImplementation(() => {});
};
