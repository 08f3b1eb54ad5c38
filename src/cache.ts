export type CachedPayload = {
  payload: unknown;
  fetchedAt: number;
}

/**
 * RawResponseCache keeps the latest successful raw payload per region for a short time,
 * so a snapshot can be rebuilt without spending credits.
 */
export class RawResponseCache {
  private entries: Map<string, CachedPayload> = new Map();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: () => number = Date.now,
  ) {}

  put = (region: string, payload: unknown, fetchedAt?: number): void => {
    this.entries.set(region, { payload, fetchedAt: fetchedAt ?? this.clock() });
  };

  /**
   * @returns the cached payload, or undefined if none was stored or it has expired
   */
  get = (region: string, now?: number): CachedPayload | undefined => {
    const entry = this.entries.get(region);
    if (!entry) return undefined;

    if ((now ?? this.clock()) - entry.fetchedAt > this.ttlMs) {
      this.entries.delete(region);
      return undefined;
    }
    return entry;
  };
}
