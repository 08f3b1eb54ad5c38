import type { Request, Response } from 'express';
import { z } from 'zod';
import type { BudgetTracker } from './budget.js';
import { toCsv } from './csv.js';
import { AuthError, BudgetDeniedError, errorMessage, UpstreamTransportError } from './errors.js';
import { filterRecords, recordFilterQuerySchema } from './filters.js';
import type { FetchScheduler } from './scheduler.js';
import type { SnapshotStore } from './storage.js';
import type { FlightRecord, Snapshot } from './types.js';
import { ageSec, historicalCreditCost } from './utils.js';

const MAX_HISTORY_SPAN_SEC = 7 * 86400; // arrivals/departures accept at most a week per query

const historyQuerySchema = z.object({
  begin: z.coerce.number().int().nonnegative(),
  end: z.coerce.number().int().positive(),
}).refine(q => q.end > q.begin, { message: 'end must be after begin' })
  .refine(q => q.end - q.begin <= MAX_HISTORY_SPAN_SEC, { message: 'interval must not exceed 7 days' });

const airportSchema = z.string().regex(/^[A-Za-z0-9]{4}$/, 'airport must be a 4-character ICAO code');

export class Controllers {
  constructor(
    private scheduler: FetchScheduler,
    private store: SnapshotStore,
    private budget: BudgetTracker,
    private clock: () => number = Date.now,
  ) {}

  listRegions = withErrorHandling((_req: Request, res: Response): void => {
    const statuses = new Map(this.scheduler.getStatus().regions.map(s => [s.region, s]));
    const regions = this.scheduler.getRegions().map(region => {
      const status = statuses.get(region.name);
      return {
        name: region.name,
        bbox: region.bbox,
        credit_cost: region.creditCost,
        phase: status?.phase ?? 'IDLE',
        last_outcome: status?.lastOutcome ?? null,
        last_error: status?.lastError ?? null,
        last_success_at: status?.lastSuccessAt ? new Date(status.lastSuccessAt).toISOString() : null,
        snapshot_available: this.store.current(region.name).status === 'available',
      };
    });
    res.status(200).json({ regions });
  });

  getSnapshot = withErrorHandling((req: Request, res: Response): void => {
    const snapshot = this.resolveSnapshot(req, res);
    if (!snapshot) return;
    const records = this.filteredRecords(snapshot, req, res);
    if (!records) return;

    // aggregates always describe the whole region
    res.status(200).json({
      region: snapshot.region,
      ...this.freshness(snapshot),
      records,
      aggregates: snapshot.aggregates,
    });
  });

  getAnalytics = withErrorHandling((req: Request, res: Response): void => {
    const snapshot = this.resolveSnapshot(req, res);
    if (!snapshot) return;

    res.status(200).json({
      region: snapshot.region,
      ...this.freshness(snapshot),
      ...snapshot.aggregates,
    });
  });

  getFlightsCsv = withErrorHandling((req: Request, res: Response): void => {
    const snapshot = this.resolveSnapshot(req, res);
    if (!snapshot) return;

    const records = this.filteredRecords(snapshot, req, res);
    if (!records) return;

    res.status(200)
      .type('text/csv')
      .set('Content-Disposition', `attachment; filename="${snapshot.region}-flights.csv"`)
      .set('X-Captured-At', new Date(snapshot.capturedAt).toISOString())
      .send(toCsv(records));
  });

  rebuildSnapshot = withErrorHandling((req: Request, res: Response): void => {
    const region = req.params.region ?? '';
    if (!this.scheduler.getRegions().some(r => r.name === region)) {
      res.status(404).json({ error: 'Unknown region', region });
      return;
    }

    if (!this.scheduler.rebuild(region)) {
      res.status(409).json({ error: 'No cached payload', region, message: 'Nothing fetched recently enough to rebuild from' });
      return;
    }
    const lookup = this.store.current(region);
    res.status(200).json({
      region,
      rebuilt: true,
      ...(lookup.status === 'available' ? this.freshness(lookup.snapshot) : {}),
    });
  });

  getBudget = withErrorHandling((_req: Request, res: Response): void => {
    const now = this.clock();
    const window = this.budget.window(now);
    res.status(200).json({
      window_start: new Date(window.windowStart).toISOString(),
      credits_consumed: window.creditsConsumed,
      credits_limit: window.creditsLimit,
      credits_remaining: window.creditsLimit - window.creditsConsumed,
    });
  });

  getStatus = withErrorHandling((_req: Request, res: Response): void => {
    const status = this.scheduler.getStatus();
    res.status(200).json({
      running: status.running,
      auth_disabled: status.authDisabled,
      auth_backoff_until: status.authBackoffUntil ? new Date(status.authBackoffUntil).toISOString() : null,
      regions: status.regions,
    });
  });

  getArrivals = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    await this.airportHistory('arrivals', req, res);
  });

  getDepartures = withErrorHandling(async (req: Request, res: Response): Promise<void> => {
    await this.airportHistory('departures', req, res);
  });

  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({ ok: true });
  };

  private airportHistory = async (kind: 'arrivals' | 'departures', req: Request, res: Response): Promise<void> => {
    const airport = airportSchema.safeParse(req.params.airport);
    const interval = historyQuerySchema.safeParse(req.query);
    if (!airport.success || !interval.success) {
      const issues = [
        ...(airport.success ? [] : airport.error.issues),
        ...(interval.success ? [] : interval.error.issues),
      ];
      res.status(400).json({ error: 'Invalid query', message: issues.map(i => i.message).join('; ') });
      return;
    }

    const { begin, end } = interval.data;
    try {
      const flights = await this.scheduler.query(
        { kind, airport: airport.data.toUpperCase(), begin, end },
        historicalCreditCost(begin, end),
      );
      res.status(200).json({ airport: airport.data.toUpperCase(), begin, end, flights });
    } catch (error) {
      if (error instanceof BudgetDeniedError) {
        res.status(429).json({
          error: 'Credit budget exhausted',
          retry_at: error.retryAt === null ? null : new Date(error.retryAt).toISOString(),
        });
        return;
      }
      if (error instanceof AuthError) {
        res.status(503).json({ error: 'Upstream authentication failed', message: error.message });
        return;
      }
      if (error instanceof UpstreamTransportError) {
        res.status(502).json({ error: 'Upstream request failed', message: error.message });
        return;
      }
      throw error;
    }
  };

  /**
   * Looks up the region's snapshot, answering 404 or 503 itself when there is none
   */
  private resolveSnapshot = (req: Request, res: Response): Snapshot | null => {
    const region = req.params.region ?? '';
    if (!this.scheduler.getRegions().some(r => r.name === region)) {
      res.status(404).json({ error: 'Unknown region', region });
      return null;
    }

    const lookup = this.store.current(region);
    if (lookup.status === 'not_yet_available') {
      res.status(503).json({ status: 'not_yet_available', region, message: 'No successful refresh yet' });
      return null;
    }
    return lookup.snapshot;
  };

  // Answers 400 itself when the filter query is invalid
  private filteredRecords = (snapshot: Snapshot, req: Request, res: Response): FlightRecord[] | null => {
    const filter = recordFilterQuerySchema.safeParse(req.query);
    if (!filter.success) {
      res.status(400).json({ error: 'Invalid query', message: filter.error.issues.map(i => i.message).join('; ') });
      return null;
    }
    return filterRecords(snapshot.records, filter.data);
  };

  // Staleness is reported, never treated as an error
  private freshness = (snapshot: Snapshot): { captured_at: string; age_sec: number } => {
    return {
      captured_at: new Date(snapshot.capturedAt).toISOString(),
      age_sec: ageSec(snapshot.capturedAt, this.clock()),
    };
  };
}

type ControllerHandler = (req: Request, res: Response) => void | Promise<void>;
const withErrorHandling = (handler: ControllerHandler): ((req: Request, res: Response) => void) => {
  return (req: Request, res: Response): void => {
    const fail = (error: unknown): void => {
      console.error(`[HTTP] ${req.method} ${req.path} failed:`, errorMessage(error));
      if (res.headersSent) return;
      res.status(500).json({
        error: 'Internal server error',
        message: errorMessage(error),
      });
    };

    try {
      const result = handler(req, res);
      if (result instanceof Promise) {
        result.catch(fail);
      }
    } catch (error) {
      fail(error);
    }
  };
};
