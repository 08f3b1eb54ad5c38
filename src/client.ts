import { z } from 'zod';
import { errorMessage, UpstreamTransportError } from './errors.js';
import type { TokenManager } from './token.js';
import type { BoundingBox, FetchLike, HistoricalFlight, HistoricalQuery, HttpResponse } from './types.js';
import { toFiniteNumber } from './utils.js';

export type StatesResponse = {
  payload: unknown;
  remainingCredits: number | null;
}

const historicalFlightSchema = z.object({
  icao24: z.string(),
  firstSeen: z.number(),
  lastSeen: z.number(),
  estDepartureAirport: z.string().nullable().default(null),
  estArrivalAirport: z.string().nullable().default(null),
  callsign: z.string().nullable().default(null),
});

const historicalResponseSchema = z.array(historicalFlightSchema);

const HISTORICAL_PATHS: Record<HistoricalQuery['kind'], string> = {
  arrivals: '/flights/arrival',
  departures: '/flights/departure',
  interval: '/flights/all',
  aircraft: '/flights/aircraft',
};

/**
 * Bearer-authenticated client for the OpenSky REST API.
 * Every failure to obtain a usable response surfaces as UpstreamTransportError;
 * token failures propagate as AuthError from the TokenManager.
 */
export class OpenSkyClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly apiBase: string,
    private readonly tokens: TokenManager,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? ((url, init) => fetch(url, init));
  }

  /**
   * Current state vectors inside a bounding box, with the emitter category column
   */
  getStates = async (bbox: BoundingBox, signal?: AbortSignal): Promise<StatesResponse> => {
    const response = await this.request('/states/all', {
      lamin: bbox.lamin,
      lamax: bbox.lamax,
      lomin: bbox.lomin,
      lomax: bbox.lomax,
      extended: 1,
    }, signal);

    return {
      payload: await this.readJson(response, '/states/all'),
      remainingCredits: toFiniteNumber(response.headers.get('X-Rate-Limit-Remaining')),
    };
  };

  getHistorical = async (query: HistoricalQuery, signal?: AbortSignal): Promise<HistoricalFlight[]> => {
    const path = HISTORICAL_PATHS[query.kind];
    const params: Record<string, string | number> = { begin: query.begin, end: query.end };
    if (query.kind === 'arrivals' || query.kind === 'departures') params.airport = query.airport;
    if (query.kind === 'aircraft') params.icao24 = query.icao24;

    let response: HttpResponse;
    try {
      response = await this.request(path, params, signal);
    } catch (error) {
      // the flights endpoints answer 404 when nothing matched
      if (error instanceof UpstreamTransportError && error.status === 404) return [];
      throw error;
    }

    const parsed = historicalResponseSchema.safeParse(await this.readJson(response, path));
    if (!parsed.success) {
      throw new UpstreamTransportError(`Unexpected response shape from ${path}`, response.status);
    }
    return parsed.data;
  };

  private request = async (
    path: string,
    params: Record<string, string | number>,
    signal?: AbortSignal,
  ): Promise<HttpResponse> => {
    const token = await this.tokens.getValidToken();
    const search = new URLSearchParams(Object.entries(params).map(([k, v]): [string, string] => [k, String(v)]));
    const url = `${this.apiBase}${path}?${search.toString()}`;

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(url, {
        headers: { Authorization: `Bearer ${token.value}`, Accept: 'application/json' },
        signal,
      });
    } catch (error) {
      throw new UpstreamTransportError(`Request to ${path} failed: ${errorMessage(error)}`);
    }

    if (response.status === 401) {
      this.tokens.invalidate();
      throw new UpstreamTransportError(`Request to ${path} was not authorized`, 401);
    }
    if (response.status === 429) {
      const retryAfter = toFiniteNumber(response.headers.get('X-Rate-Limit-Retry-After-Seconds'));
      throw new UpstreamTransportError(`Rate limited on ${path}`, 429, retryAfter);
    }
    if (!response.ok) {
      throw new UpstreamTransportError(`HTTP ${response.status}: ${response.statusText}`, response.status);
    }
    return response;
  };

  private readJson = async (response: HttpResponse, path: string): Promise<unknown> => {
    try {
      return await response.json();
    } catch (error) {
      throw new UpstreamTransportError(`Invalid JSON from ${path}: ${errorMessage(error)}`, response.status);
    }
  };
}
