import type { FlightRecord, Snapshot, SnapshotLookup } from './types.js';

export type SnapshotListener = (snapshot: Snapshot) => void;

const freezeRecord = (record: FlightRecord): FlightRecord => {
  if (Object.isFrozen(record)) return record;
  if (record.position) Object.freeze(record.position);
  Object.freeze(record.anomaly_reasons);
  return Object.freeze(record);
};

/**
 * SnapshotStore holds the latest published snapshot per region.
 * @method publish: atomically replaces the region's snapshot, freezing it first
 * @method current: returns the region's snapshot, or not_yet_available before the first publish
 * @method subscribe: registers a listener called once per replacement
 *
 * A published snapshot is deep-frozen before the swap, so readers only ever see whole snapshots.
 */
export class SnapshotStore {
  private snapshots: Map<string, Snapshot> = new Map();
  private listeners: Set<SnapshotListener> = new Set();
  private publishCount: number = 0;

  /**
   * @returns true if the store changed; publishing the current object again is a no-op
   */
  publish = (snapshot: Snapshot): boolean => {
    if (this.snapshots.get(snapshot.region) === snapshot) {
      return false;
    }

    snapshot.records.forEach(freezeRecord);
    snapshot.aggregates.anomalies.forEach(freezeRecord);
    Object.freeze(snapshot.records);
    Object.freeze(snapshot.aggregates.anomalies);
    Object.freeze(snapshot.aggregates.country_distribution);
    Object.freeze(snapshot.aggregates.weight_class_distribution);
    Object.freeze(snapshot.aggregates.altitude_band_distribution);
    Object.freeze(snapshot.aggregates.traffic_flow);
    Object.freeze(snapshot.aggregates);
    Object.freeze(snapshot);

    this.snapshots.set(snapshot.region, snapshot);
    this.publishCount++;

    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        console.error(`[STORE] Listener failed for region ${snapshot.region}:`, error);
      }
    }
    return true;
  };

  current = (region: string): SnapshotLookup => {
    const snapshot = this.snapshots.get(region);
    return snapshot ? { status: 'available', snapshot } : { status: 'not_yet_available', region };
  };

  regions = (): string[] => {
    return [...this.snapshots.keys()].sort();
  };

  subscribe = (listener: SnapshotListener): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getPublishCount = (): number => {
    return this.publishCount;
  };
}
