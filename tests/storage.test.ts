import { analyze } from '../src/analytics.js';
import { SnapshotStore } from '../src/storage.js';
import type { FlightRecord, Snapshot } from '../src/types.js';
import { makeRecord, silenceConsole } from './helpers.js';

const snapshotOf = (region: string, records: FlightRecord[], capturedAt: number = 1700000000000): Snapshot => ({
  capturedAt,
  region,
  records,
  aggregates: analyze(records),
});

describe('SnapshotStore', () => {
  let store: SnapshotStore;

  beforeEach(() => {
    silenceConsole();
    store = new SnapshotStore();
  });

  it('should report not_yet_available before the first publish', () => {
    expect(store.current('europe')).toEqual({ status: 'not_yet_available', region: 'europe' });
    expect(store.regions()).toEqual([]);
  });

  it('should serve the published snapshot', () => {
    const snapshot = snapshotOf('europe', [makeRecord()]);

    expect(store.publish(snapshot)).toBe(true);

    const lookup = store.current('europe');
    expect(lookup.status).toBe('available');
    if (lookup.status === 'available') {
      expect(lookup.snapshot).toBe(snapshot);
    }
    expect(store.current('asia').status).toBe('not_yet_available');
  });

  it('should treat publishing the current snapshot again as a no-op', () => {
    const listener = jest.fn();
    store.subscribe(listener);
    const snapshot = snapshotOf('europe', [makeRecord()]);

    expect(store.publish(snapshot)).toBe(true);
    expect(store.publish(snapshot)).toBe(false);

    expect(listener).toHaveBeenCalledTimes(1);
    expect(store.getPublishCount()).toBe(1);
  });

  it('should replace a region snapshot without touching the others', () => {
    const first = snapshotOf('europe', [makeRecord({ icao24: 'aaa001' })], 1000);
    const second = snapshotOf('europe', [makeRecord({ icao24: 'bbb002' })], 2000);
    const asia = snapshotOf('asia', [makeRecord({ icao24: 'ccc003' })], 1500);

    store.publish(first);
    store.publish(asia);
    store.publish(second);

    expect(store.current('europe')).toEqual({ status: 'available', snapshot: second });
    expect(store.current('asia')).toEqual({ status: 'available', snapshot: asia });
    expect(store.regions()).toEqual(['asia', 'europe']);
    expect(store.getPublishCount()).toBe(3);
  });

  it('should freeze published snapshots', () => {
    const records = [makeRecord()];
    const snapshot = snapshotOf('europe', records);
    store.publish(snapshot);

    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.aggregates)).toBe(true);
    expect(Object.isFrozen(snapshot.aggregates.altitude_band_distribution)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(() => records.push(makeRecord({ icao24: 'zzz999' }))).toThrow(TypeError);
    expect(() => {
      records[0].altitude_m = 0;
    }).toThrow(TypeError);
  });

  it('should stop notifying after unsubscribe', () => {
    const listener = jest.fn();
    const unsubscribe = store.subscribe(listener);

    store.publish(snapshotOf('europe', [], 1000));
    unsubscribe();
    store.publish(snapshotOf('europe', [], 2000));

    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ capturedAt: 1000 }));
  });

  it('should keep publishing when a listener throws', () => {
    const failing = jest.fn(() => {
      throw new Error('listener broke');
    });
    const healthy = jest.fn();
    store.subscribe(failing);
    store.subscribe(healthy);

    expect(store.publish(snapshotOf('europe', []))).toBe(true);

    expect(healthy).toHaveBeenCalledTimes(1);
    expect(store.current('europe').status).toBe('available');
    expect(console.error).toHaveBeenCalledWith('[STORE] Listener failed for region europe:', expect.any(Error));
  });
});
