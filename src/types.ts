export type WeightClass = 'LIGHT' | 'SMALL' | 'LARGE' | 'HEAVY' | 'HIGH_PERF' | 'ROTORCRAFT' | 'UNKNOWN';
export type FlightPhase = 'CLIMBING' | 'DESCENDING' | 'LEVEL' | 'GROUND';
export type AltitudeBand = 'LOW' | 'MEDIUM' | 'HIGH' | 'VERY_HIGH' | 'EXTREME' | 'UNKNOWN';
export type HeadingSectorCount = 8 | 16;

export type Credentials = {
  readonly clientId: string;
  readonly clientSecret: string;
}

// Epoch milliseconds throughout
export type Token = {
  readonly value: string;
  readonly issuedAt: number;
  readonly expiresAt: number;
}

export type BoundingBox = {
  lamin: number;
  lamax: number;
  lomin: number;
  lomax: number;
}

export type Region = {
  name: string;
  bbox: BoundingBox;
  creditCost: number;
}

export type LedgerEntry = {
  at: number;
  cost: number;
  label: string;
}

export type BudgetWindow = {
  windowStart: number;
  creditsConsumed: number;
  creditsLimit: number;
}

export type BudgetDecision =
  | { granted: true; cost: number; at: number; remaining: number }
  | { granted: false; cost: number; remaining: number; retryAt: number | null };

// Raw upstream payload for /states/all. Rows are positional tuples.
export type RawStatesPayload = {
  time: number;
  states: unknown[] | null;
}

export type RawStateVector = {
  icao24: string | null;
  callsign: string | null;
  origin_country: string | null;
  time_position: number | null;
  last_contact: number | null;
  longitude: number | null;
  latitude: number | null;
  baro_altitude: number | null;
  on_ground: boolean;
  velocity: number | null;
  true_track: number | null;
  vertical_rate: number | null;
  geo_altitude: number | null;
  squawk: string | null;
  category: number | string | null;
}

export type Position = {
  lat: number;
  lon: number;
}

// null means "unknown" and is never the same as zero
export type FlightRecord = {
  icao24: string;
  callsign: string;
  country: string;
  position: Position | null;
  altitude_m: number | null;
  altitude_band: AltitudeBand;
  speed_mps: number | null;
  heading_deg: number | null;
  vertical_rate_mps: number | null;
  squawk: string | null;
  category: number | string | null;
  last_contact: number | null;
  weight_class: WeightClass;
  flight_phase: FlightPhase;
  heading_sector: string | null;
  is_anomalous: boolean;
  anomaly_reasons: string[];
}

export type AnalyticsResult = {
  total_count: number;
  climbing_count: number;
  descending_count: number;
  level_count: number;
  ground_count: number;
  positioned_count: number;
  avg_altitude_m: number | null;
  avg_speed_mps: number | null;
  max_altitude_m: number | null;
  max_speed_mps: number | null;
  altitude_band_distribution: Record<AltitudeBand, number>;
  country_distribution: Record<string, number>;
  weight_class_distribution: Record<WeightClass, number>;
  anomalies: FlightRecord[];
  traffic_flow: Record<string, number>;
}

export type RecordFilter = {
  weightClass?: WeightClass;
  country?: string;
  callsign?: string;
  anomalousOnly?: boolean;
}

export type Snapshot = {
  capturedAt: number;
  region: string;
  records: FlightRecord[];
  aggregates: AnalyticsResult;
}

export type SnapshotLookup =
  | { status: 'available'; snapshot: Snapshot }
  | { status: 'not_yet_available'; region: string };

export type RegionPhase = 'IDLE' | 'AUTHORIZING' | 'FETCHING' | 'SUCCEEDED' | 'FAILED';

export type TickOutcome =
  | { region: string; outcome: 'succeeded'; capturedAt: number; recordCount: number }
  | { region: string; outcome: 'denied'; retryAt: number | null }
  | { region: string; outcome: 'failed'; error: string }
  | { region: string; outcome: 'skipped'; reason: string };

export type RegionStatus = {
  region: string;
  phase: RegionPhase;
  lastOutcome: TickOutcome['outcome'] | null;
  lastError: string | null;
  lastAttemptAt: number | null;
  lastSuccessAt: number | null;
  consecutiveFailures: number;
}

export type TransformOptions = {
  climbRateThresholdMps: number;
  headingSectors: HeadingSectorCount;
  weightClassTable: Record<string, WeightClass>;
}

export type AnalyticsOptions = {
  stdDevThreshold: number;
  minSamples: number;
  headingSectors: HeadingSectorCount;
  maxSpeedMps: Record<WeightClass, number>;
}

// Historical flight summary from /flights/arrival, /flights/departure, /flights/all, /flights/aircraft
export type HistoricalFlight = {
  icao24: string;
  firstSeen: number;
  lastSeen: number;
  estDepartureAirport: string | null;
  estArrivalAirport: string | null;
  callsign: string | null;
}

export type HistoricalQuery =
  | { kind: 'arrivals'; airport: string; begin: number; end: number }
  | { kind: 'departures'; airport: string; begin: number; end: number }
  | { kind: 'interval'; begin: number; end: number }
  | { kind: 'aircraft'; icao24: string; begin: number; end: number };

// Narrow view of fetch so tests can supply a fake transport
export type HttpRequestInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string;
  signal?: AbortSignal;
}

export type HttpResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
}

export type FetchLike = (url: string, init?: HttpRequestInit) => Promise<HttpResponse>;
