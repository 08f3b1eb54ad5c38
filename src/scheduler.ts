import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { analyze, annotateAnomalies } from './analytics.js';
import type { BudgetTracker } from './budget.js';
import type { RawResponseCache } from './cache.js';
import type { OpenSkyClient } from './client.js';
import { AuthError, BudgetDeniedError, errorMessage, UpstreamTransportError } from './errors.js';
import type { SnapshotStore } from './storage.js';
import type { TokenManager } from './token.js';
import { parseStatesPayload, transform } from './transform.js';
import type {
  AnalyticsOptions,
  HistoricalFlight,
  HistoricalQuery,
  Region,
  RegionPhase,
  RegionStatus,
  Snapshot,
  TickOutcome,
  TransformOptions,
} from './types.js';
import { intervalToCron, MAX_AUTH_BACKOFF_MS } from './utils.js';

export type FetchSchedulerOptions = {
  regions: Region[];
  budget: BudgetTracker;
  tokens: TokenManager;
  client: OpenSkyClient;
  cache: RawResponseCache;
  store: SnapshotStore;
  transform: TransformOptions;
  analytics: AnalyticsOptions;
  refreshIntervalSec: number;
  fetchTimeoutSec: number;
  cronExpression?: string;
  clock?: () => number;
}

export type SchedulerStatus = {
  running: boolean;
  authDisabled: boolean;
  authBackoffUntil: number | null;
  regions: RegionStatus[];
}

/**
 * FetchScheduler drives one refresh per region on every tick:
 * authorize credits -> obtain token -> query -> cache raw payload -> transform -> analyze -> publish.
 *
 * Credits for all regions are authorized synchronously, in configuration order, before any
 * region waits on I/O, so a tick that runs short of budget always favours the same regions.
 * After that each region runs on its own and a failure in one never reaches another.
 * A failed or denied region keeps serving its previous snapshot.
 */
export class FetchScheduler {
  private readonly regions: Region[];
  private readonly states: Map<string, RegionStatus> = new Map();
  private readonly inFlight: Set<string> = new Set();
  private readonly controllers: Set<AbortController> = new Set();
  private readonly clock: () => number;
  private task: ScheduledTask | null = null;

  private authDisabled: boolean = false;
  private authFailures: number = 0;
  private authBackoffUntil: number = 0;

  constructor(private readonly options: FetchSchedulerOptions) {
    this.regions = options.regions;
    this.clock = options.clock ?? Date.now;
    for (const region of this.regions) {
      this.states.set(region.name, {
        region: region.name,
        phase: 'IDLE',
        lastOutcome: null,
        lastError: null,
        lastAttemptAt: null,
        lastSuccessAt: null,
        consecutiveFailures: 0,
      });
    }
  }

  /**
   * Schedules recurring ticks and runs the first one immediately. Calling it twice is a no-op.
   */
  start = (): void => {
    if (this.task) return;
    const expression = this.options.cronExpression ?? intervalToCron(this.options.refreshIntervalSec);
    if (!expression) {
      throw new Error(`Refresh interval of ${this.options.refreshIntervalSec}s cannot be scheduled`);
    }

    console.log(`[SCHEDULER] Starting - ${this.regions.length} region(s), schedule "${expression}"`);
    this.runTick();
    this.task = cron.schedule(expression, () => this.runTick(), { scheduled: true });
  };

  /**
   * Stops the timer and aborts every in-flight query. Credits already granted stay spent.
   */
  stop = (): void => {
    this.task?.stop();
    this.task = null;
    for (const controller of this.controllers) {
      controller.abort(new Error('Scheduler stopped'));
    }
    this.controllers.clear();
  };

  isRunning = (): boolean => {
    return this.task !== null;
  };

  /**
   * Runs one refresh for every region. Never rejects; per-region results are returned.
   */
  tick = async (): Promise<TickOutcome[]> => {
    // each refreshRegion call authorizes before its first await, so this map fixes the order
    const runs = this.regions.map(region => this.refreshRegion(region));
    return Promise.all(runs);
  };

  tickRegion = async (name: string): Promise<TickOutcome> => {
    return this.refreshRegion(this.getRegion(name));
  };

  /**
   * Re-derives a region's snapshot from its cached raw payload without spending credits,
   * e.g. after the analytics options change
   * @returns false if no fresh payload is cached
   */
  rebuild = (name: string): boolean => {
    this.getRegion(name);
    const cached = this.options.cache.get(name, this.clock());
    if (!cached) return false;
    return this.options.store.publish(this.buildSnapshot(name, cached.payload, cached.fetchedAt));
  };

  /**
   * Issues an authenticated historical flights query under the same credit budget
   * @throws BudgetDeniedError, AuthError or UpstreamTransportError
   */
  query = async (query: HistoricalQuery, cost: number): Promise<HistoricalFlight[]> => {
    if (this.authDisabled) {
      throw new AuthError('Client credentials were rejected, queries are disabled', false);
    }
    const decision = this.options.budget.authorize(cost, `history:${query.kind}`, this.clock());
    if (!decision.granted) {
      throw new BudgetDeniedError(cost, decision.retryAt);
    }
    await this.options.tokens.getValidToken();
    return this.withTimeout(signal => this.options.client.getHistorical(query, signal));
  };

  getStatus = (): SchedulerStatus => {
    return {
      running: this.isRunning(),
      authDisabled: this.authDisabled,
      authBackoffUntil: this.authBackoffUntil > this.clock() ? this.authBackoffUntil : null,
      regions: this.regions.map(region => ({ ...this.getState(region.name) })),
    };
  };

  getRegions = (): Region[] => {
    return [...this.regions];
  };

  private runTick = (): void => {
    this.tick().catch(error => {
      console.error('[SCHEDULER] Tick failed:', errorMessage(error));
    });
  };

  private refreshRegion = async (region: Region): Promise<TickOutcome> => {
    const state = this.getState(region.name);
    if (this.inFlight.has(region.name)) {
      return { region: region.name, outcome: 'skipped', reason: 'previous refresh still in flight' };
    }

    const now = this.clock();
    state.lastAttemptAt = now;
    this.setPhase(state, 'IDLE');

    if (this.authDisabled) {
      return this.fail(state, 'client credentials were rejected, fetching disabled until restart');
    }
    if (now < this.authBackoffUntil) {
      return this.fail(state, `token endpoint backoff until ${new Date(this.authBackoffUntil).toISOString()}`);
    }

    this.setPhase(state, 'AUTHORIZING');
    const decision = this.options.budget.authorize(region.creditCost, `states:${region.name}`, now);
    if (!decision.granted) {
      this.setPhase(state, 'FAILED');
      state.lastOutcome = 'denied';
      state.lastError = 'credit budget exhausted';
      console.warn(`[SCHEDULER] ${region.name}: budget denied (${decision.remaining} credit(s) left), serving last snapshot`);
      return { region: region.name, outcome: 'denied', retryAt: decision.retryAt };
    }

    this.inFlight.add(region.name);
    try {
      // still AUTHORIZING until a token is in hand
      await this.options.tokens.getValidToken();
      this.setPhase(state, 'FETCHING');
      const { payload, remainingCredits } = await this.withTimeout(
        signal => this.options.client.getStates(region.bbox, signal),
      );
      parseStatesPayload(payload);

      const fetchedAt = this.clock();
      this.options.cache.put(region.name, payload, fetchedAt);
      const snapshot = this.buildSnapshot(region.name, payload, fetchedAt);
      this.options.store.publish(snapshot);

      this.authFailures = 0;
      this.setPhase(state, 'SUCCEEDED');
      state.lastOutcome = 'succeeded';
      state.lastError = null;
      state.lastSuccessAt = fetchedAt;
      state.consecutiveFailures = 0;

      const upstream = remainingCredits === null ? '' : `, upstream reports ${remainingCredits} credit(s) left`;
      console.log(
        `[SCHEDULER] ${region.name}: ${snapshot.records.length} aircraft, ` +
        `${snapshot.aggregates.anomalies.length} anomalies, ${decision.remaining} credit(s) left${upstream}`,
      );
      return { region: region.name, outcome: 'succeeded', capturedAt: fetchedAt, recordCount: snapshot.records.length };
    } catch (error) {
      if (error instanceof AuthError) {
        this.handleAuthError(error, now);
      }
      return this.fail(state, errorMessage(error));
    } finally {
      this.inFlight.delete(region.name);
    }
  };

  private buildSnapshot = (region: string, payload: unknown, capturedAt: number): Snapshot => {
    const records = transform(payload, this.options.transform);
    const aggregates = analyze(records, this.options.analytics);
    return {
      capturedAt,
      region,
      records: annotateAnomalies(records, aggregates.anomalies),
      aggregates,
    };
  };

  private handleAuthError = (error: AuthError, tickStart: number): void => {
    if (!error.retryable) {
      this.authDisabled = true;
      console.error(`[SCHEDULER] ${error.message}. Fetching disabled until restart.`);
      return;
    }
    // regions failing on the same shared exchange count once
    if (tickStart < this.authBackoffUntil) return;
    this.authFailures++;
    const intervalMs = this.options.refreshIntervalSec * 1000;
    const delayMs = Math.min(intervalMs * 2 ** (this.authFailures - 1), MAX_AUTH_BACKOFF_MS);
    // half an interval of slack so a delay of one interval still lets the next tick through
    this.authBackoffUntil = tickStart + delayMs - intervalMs / 2;
    console.warn(`[SCHEDULER] Token exchange failed (${error.message}), retrying after ${Math.round(delayMs / 1000)}s`);
  };

  private fail = (state: RegionStatus, message: string): TickOutcome => {
    this.setPhase(state, 'FAILED');
    state.lastOutcome = 'failed';
    state.lastError = message;
    state.consecutiveFailures++;
    console.error(`[SCHEDULER] ${state.region}: refresh failed (attempt ${state.consecutiveFailures}): ${message}`);
    return { region: state.region, outcome: 'failed', error: message };
  };

  private withTimeout = async <T>(run: (signal: AbortSignal) => Promise<T>): Promise<T> => {
    const controller = new AbortController();
    const timeoutMs = this.options.fetchTimeoutSec * 1000;
    const timer = setTimeout(() => {
      controller.abort(new UpstreamTransportError(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    this.controllers.add(controller);
    try {
      return await run(controller.signal);
    } finally {
      clearTimeout(timer);
      this.controllers.delete(controller);
    }
  };

  private setPhase = (state: RegionStatus, phase: RegionPhase): void => {
    state.phase = phase;
  };

  private getState = (name: string): RegionStatus => {
    const state = this.states.get(name);
    if (!state) {
      throw new Error(`Unknown region: ${name}`);
    }
    return state;
  };

  private getRegion = (name: string): Region => {
    const region = this.regions.find(r => r.name === name);
    if (!region) {
      throw new Error(`Unknown region: ${name}`);
    }
    return region;
  };
}
