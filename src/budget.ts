import type { BudgetDecision, BudgetWindow, LedgerEntry } from './types.js';
import { DAY_MS } from './utils.js';

/**
 * BudgetTracker keeps a rolling 24h ledger of credits spent against the upstream API.
 * @method authorize: grants a query if it fits the remaining budget and records the spend
 * @method window: returns the current rolling window
 * @method remaining: returns the credits still available
 *
 * Spend is recorded synchronously inside authorize, before any network call, so a tick
 * cancelled mid-flight still leaves the ledger correct. Granted credits are never refunded.
 */
export class BudgetTracker {
  private ledger: LedgerEntry[] = [];
  private latest: number = 0; // newest timestamp seen, time never runs backwards

  constructor(
    private readonly dailyLimit: number,
    private readonly clock: () => number = Date.now,
    private readonly windowMs: number = DAY_MS,
  ) {
    if (!Number.isInteger(dailyLimit) || dailyLimit <= 0) {
      throw new Error(`Daily credit limit must be a positive integer, got ${dailyLimit}`);
    }
  }

  /**
   * Grants `cost` credits if the rolling window has room for them
   * @param label - what the credits are spent on, kept in the ledger
   * @param now - epoch ms, defaults to the tracker's clock
   */
  authorize = (cost: number, label: string = 'query', now?: number): BudgetDecision => {
    if (!Number.isInteger(cost) || cost <= 0) {
      throw new Error(`Query cost must be a positive integer, got ${cost}`);
    }
    const at = this.advance(now);
    const consumed = this.consumed();

    if (consumed + cost > this.dailyLimit) {
      return { granted: false, cost, remaining: this.dailyLimit - consumed, retryAt: this.retryAt(cost, consumed) };
    }

    this.ledger.push({ at, cost, label });
    return { granted: true, cost, at, remaining: this.dailyLimit - consumed - cost };
  };

  window = (now?: number): BudgetWindow => {
    const at = this.advance(now);
    return {
      windowStart: at - this.windowMs,
      creditsConsumed: this.consumed(),
      creditsLimit: this.dailyLimit,
    };
  };

  remaining = (now?: number): number => {
    const { creditsConsumed, creditsLimit } = this.window(now);
    return creditsLimit - creditsConsumed;
  };

  entries = (): readonly LedgerEntry[] => {
    return [...this.ledger];
  };

  // Moves the window forward and discards entries that have aged out of it
  private advance = (now?: number): number => {
    const requested = now ?? this.clock();
    this.latest = Math.max(this.latest, requested);
    const windowStart = this.latest - this.windowMs;
    const firstLive = this.ledger.findIndex(entry => entry.at > windowStart);
    this.ledger = firstLive === -1 ? [] : this.ledger.slice(firstLive);
    return this.latest;
  };

  private consumed = (): number => {
    return this.ledger.reduce((sum, entry) => sum + entry.cost, 0);
  };

  // Earliest instant at which enough old entries expire for `cost` to fit
  private retryAt = (cost: number, consumed: number): number | null => {
    if (cost > this.dailyLimit) return null;
    let freed = 0;
    for (const entry of this.ledger) {
      freed += entry.cost;
      if (consumed - freed + cost <= this.dailyLimit) {
        return entry.at + this.windowMs;
      }
    }
    return null;
  };
}
