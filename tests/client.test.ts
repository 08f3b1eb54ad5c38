import { OpenSkyClient } from '../src/client.js';
import { UpstreamTransportError } from '../src/errors.js';
import { TokenManager } from '../src/token.js';
import type { HttpRequestInit, HttpResponse } from '../src/types.js';
import { API_BASE, fakeUpstream, jsonResponse, silenceConsole, TOKEN_URL } from './helpers.js';

const bbox = { lamin: 45, lamax: 49, lomin: 6, lomax: 11 };

describe('OpenSkyClient', () => {
  beforeEach(() => {
    silenceConsole();
  });

  const clientWith = (onApi: (url: string, init?: HttpRequestInit) => Promise<HttpResponse>) => {
    const fetch = fakeUpstream(onApi);
    const tokens = new TokenManager({ clientId: 'test-client', clientSecret: 'test-secret' }, { tokenUrl: TOKEN_URL, fetch });
    const client = new OpenSkyClient(API_BASE, tokens, fetch);
    const apiCalls = () => fetch.mock.calls.filter(([url]) => url !== TOKEN_URL);
    return { client, tokens, fetch, apiCalls };
  };

  describe('getStates', () => {
    it('should query the bounding box with a bearer token', async () => {
      const { client, apiCalls } = clientWith(async () => jsonResponse(
        { time: 1700000000, states: [] },
        200,
        { 'X-Rate-Limit-Remaining': '3996' },
      ));

      const result = await client.getStates(bbox);

      expect(result).toEqual({ payload: { time: 1700000000, states: [] }, remainingCredits: 3996 });
      const [[url, init]] = apiCalls();
      expect(url).toBe('https://api.test/api/states/all?lamin=45&lamax=49&lomin=6&lomax=11&extended=1');
      expect(init?.headers).toEqual({ Authorization: 'Bearer test-token', Accept: 'application/json' });
    });

    it('should report unknown remaining credits when the header is absent', async () => {
      const { client } = clientWith(async () => jsonResponse({ time: 1, states: null }));
      expect((await client.getStates(bbox)).remainingCredits).toBeNull();
    });

    it('should surface rate limiting with the retry delay', async () => {
      const { client } = clientWith(async () => jsonResponse({}, 429, { 'X-Rate-Limit-Retry-After-Seconds': '120' }));

      const attempt = client.getStates(bbox);

      await expect(attempt).rejects.toBeInstanceOf(UpstreamTransportError);
      await expect(attempt).rejects.toMatchObject({ message: 'Rate limited on /states/all', status: 429, retryAfterSec: 120 });
    });

    it('should drop the cached token when the API answers 401', async () => {
      let status = 401;
      const { client, tokens } = clientWith(async () => jsonResponse({ time: 1, states: [] }, status));

      await expect(client.getStates(bbox)).rejects.toMatchObject({
        message: 'Request to /states/all was not authorized',
        status: 401,
      });
      expect(tokens.exchangeCount()).toBe(1);

      status = 200;
      await client.getStates(bbox);
      expect(tokens.exchangeCount()).toBe(2);
    });

    it('should wrap network failures and server errors', async () => {
      const unreachable = clientWith(async () => {
        throw new Error('socket hang up');
      });
      await expect(unreachable.client.getStates(bbox)).rejects.toMatchObject({
        name: 'UpstreamTransportError',
        message: 'Request to /states/all failed: socket hang up',
        status: null,
      });

      const failing = clientWith(async () => jsonResponse({}, 500));
      await expect(failing.client.getStates(bbox)).rejects.toMatchObject({ message: 'HTTP 500: Error', status: 500 });
    });

    it('should reject a body that is not JSON', async () => {
      const { client } = clientWith(async () => ({
        ...jsonResponse(null),
        json: async () => {
          throw new SyntaxError('Unexpected token <');
        },
      }));

      await expect(client.getStates(bbox)).rejects.toMatchObject({
        message: 'Invalid JSON from /states/all: Unexpected token <',
      });
    });
  });

  describe('getHistorical', () => {
    const flight = {
      icao24: '3c6444',
      firstSeen: 1700000000,
      lastSeen: 1700003600,
      estDepartureAirport: 'EDDF',
      estArrivalAirport: 'LSZH',
      callsign: 'DLH4AB  ',
    };

    it('should query arrivals for an airport', async () => {
      const { client, apiCalls } = clientWith(async () => jsonResponse([flight]));

      const flights = await client.getHistorical({ kind: 'arrivals', airport: 'LSZH', begin: 1700000000, end: 1700086400 });

      expect(flights).toEqual([flight]);
      expect(apiCalls()[0][0]).toBe('https://api.test/api/flights/arrival?begin=1700000000&end=1700086400&airport=LSZH');
    });

    it('should query an aircraft track of flights', async () => {
      const { client, apiCalls } = clientWith(async () => jsonResponse([{ icao24: '3c6444', firstSeen: 1, lastSeen: 2 }]));

      const flights = await client.getHistorical({ kind: 'aircraft', icao24: '3c6444', begin: 0, end: 86400 });

      expect(flights).toEqual([{
        icao24: '3c6444',
        firstSeen: 1,
        lastSeen: 2,
        estDepartureAirport: null,
        estArrivalAirport: null,
        callsign: null,
      }]);
      expect(apiCalls()[0][0]).toBe('https://api.test/api/flights/aircraft?begin=0&end=86400&icao24=3c6444');
    });

    it('should treat 404 as no flights', async () => {
      const { client } = clientWith(async () => jsonResponse({}, 404));
      await expect(client.getHistorical({ kind: 'interval', begin: 0, end: 3600 })).resolves.toEqual([]);
    });

    it('should reject an unexpected response shape', async () => {
      const { client } = clientWith(async () => jsonResponse({ flights: [] }));

      await expect(client.getHistorical({ kind: 'departures', airport: 'EDDF', begin: 0, end: 3600 }))
        .rejects.toMatchObject({ message: 'Unexpected response shape from /flights/departure', status: 200 });
    });
  });
});
