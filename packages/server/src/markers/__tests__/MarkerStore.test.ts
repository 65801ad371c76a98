import { CotDetail, CotEvent, VirtualClock } from '@cotmesh/core';
import { ConfigValidationError } from '../../errors';
import { TimerRegistry } from '../../utils/TimerRegistry';
import { MarkerStore } from '../MarkerStore';
import type { MarkerChangeEvent } from '../MarkerModel';

jest.mock('../../utils/logger', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { logger } from '../../utils/logger';

const mockLogger = jest.mocked(logger);

const T0 = Date.UTC(2024, 0, 1);

interface ReportOptions {
  type?: string;
  lat?: number;
  lon?: number;
  staleAfterMs?: number;
  detail?: CotDetail;
}

describe('MarkerStore', () => {
  let clock: VirtualClock;

  function report(uid: string, options: ReportOptions = {}): CotEvent {
    const now = clock.now();
    const event: CotEvent = {
      version: '2.0',
      uid,
      type: options.type ?? 'a-f-G-E-S',
      time: now,
      start: now,
      stale: now + (options.staleAfterMs ?? 60_000),
      how: 'm-g',
      point: { lat: options.lat ?? 1, lon: options.lon ?? 2, hae: 0, ce: 9999999, le: 9999999 },
    };
    if (options.detail) {
      event.detail = options.detail;
    }
    return event;
  }

  beforeEach(() => {
    jest.clearAllMocks();
    clock = new VirtualClock(T0);
  });

  describe('ingest', () => {
    it('creates a marker from a position report', () => {
      const store = new MarkerStore({ clock: clock.now });

      const marker = store.ingest(report('U1', { detail: { contact: { callsign: 'ALPHA1' } } }));

      expect(marker).toEqual({
        uid: 'U1',
        type: 'a-f-G-E-S',
        callsign: 'ALPHA1',
        point: { lat: 1, lon: 2, hae: 0, ce: 9999999, le: 9999999 },
        how: 'm-g',
        affiliation: 'friend',
        dimension: 'ground',
        created: T0,
        updated: T0,
        stale: T0 + 60_000,
        state: 'active',
      });
      expect(store.size()).toBe(1);
    });

    it('updates the same record for repeated reports', () => {
      const store = new MarkerStore({ clock: clock.now });
      const changes: MarkerChangeEvent[] = [];
      store.subscribe((change) => changes.push(change));

      store.ingest(report('U1'));
      clock.advance(1_000);
      store.ingest(report('U1', { lat: 5 }));

      expect(store.size()).toBe(1);
      expect(store.get('U1')).toMatchObject({ created: T0, updated: T0 + 1_000, point: { lat: 5 } });
      expect(changes.map((change) => change.type)).toEqual(['created', 'updated']);
      expect(changes[1].previous?.point.lat).toBe(1);
      expect(changes[1].marker.point.lat).toBe(5);
    });

    it('keeps callsign and team when a report omits them', () => {
      const store = new MarkerStore({ clock: clock.now });

      store.ingest(
        report('U1', {
          detail: { contact: { callsign: 'ALPHA1' }, group: { name: 'Cyan', role: 'Team Member' }, status: { battery: 80 } },
        })
      );
      const marker = store.ingest(report('U1'));

      expect(marker?.callsign).toBe('ALPHA1');
      expect(marker?.team).toBe('Cyan');
      expect(marker?.battery).toBeUndefined();
    });

    it('uses the uid as callsign when none was ever reported', () => {
      const store = new MarkerStore({ clock: clock.now });
      expect(store.ingest(report('U1'))?.callsign).toBe('U1');
    });

    it('ignores events that are not position reports', () => {
      const store = new MarkerStore({ clock: clock.now });

      expect(store.ingest(report('chat-1', { type: 'b-t-f' }))).toBeNull();
      expect(store.size()).toBe(0);
    });

    it('marks a report that is already past its stale time', () => {
      const store = new MarkerStore({ clock: clock.now });
      expect(store.ingest(report('U1', { staleAfterMs: 0 }))?.state).toBe('stale');
    });

    it('hands out copies', () => {
      const store = new MarkerStore({ clock: clock.now });
      const marker = store.ingest(report('U1'));
      if (marker) {
        marker.point.lat = 50;
      }

      expect(store.get('U1')?.point.lat).toBe(1);
    });
  });

  describe('sweep', () => {
    it('marks markers stale, then removes them after the grace period', () => {
      const store = new MarkerStore({ clock: clock.now, staleGracePeriodMs: 60_000 });
      const removed: MarkerChangeEvent[] = [];
      store.on('removed', (change) => removed.push(change));
      store.ingest(report('U1', { staleAfterMs: 10_000 }));

      clock.advance(10_000);
      expect(store.sweep()).toEqual({ staled: 1, removed: 0 });
      expect(store.get('U1')?.state).toBe('stale');

      clock.advance(60_000);
      expect(store.sweep()).toEqual({ staled: 0, removed: 0 });

      clock.advance(1);
      expect(store.sweep()).toEqual({ staled: 0, removed: 1 });
      expect(store.has('U1')).toBe(false);
      expect(removed).toHaveLength(1);
      expect(removed[0].reason).toBe('expired');
    });

    it('revives a stale marker on a fresh report', () => {
      const store = new MarkerStore({ clock: clock.now });
      store.ingest(report('U1', { staleAfterMs: 1_000 }));
      clock.advance(2_000);
      store.sweep();

      expect(store.ingest(report('U1'))?.state).toBe('active');
    });

    it('runs on the configured interval while started', () => {
      jest.useFakeTimers();
      try {
        const timers = new TimerRegistry();
        const store = new MarkerStore({ clock: clock.now, sweepIntervalMs: 5_000, timers });
        store.ingest(report('U1', { staleAfterMs: 1_000 }));

        store.start();
        expect(store.isRunning()).toBe(true);
        expect(timers.has('marker-store-sweep')).toBe(true);

        clock.advance(1_000);
        jest.advanceTimersByTime(5_000);
        expect(store.get('U1')?.state).toBe('stale');

        store.shutdown();
        expect(store.isRunning()).toBe(false);
        expect(timers.has('marker-store-sweep')).toBe(false);
      } finally {
        jest.useRealTimers();
      }
    });
  });

  describe('capacity', () => {
    it('evicts the least recently updated marker when nothing is stale', () => {
      const store = new MarkerStore({ clock: clock.now, maxMarkers: 3 });
      const removed: MarkerChangeEvent[] = [];
      store.on('removed', (change) => removed.push(change));

      for (const uid of ['A', 'B', 'C']) {
        store.ingest(report(uid));
        clock.advance(1);
      }
      store.ingest(report('A'));
      store.ingest(report('D'));

      expect(store.size()).toBe(3);
      expect(store.has('B')).toBe(false);
      expect(removed.map((change) => [change.marker.uid, change.reason])).toEqual([['B', 'evicted']]);
    });

    it('prefers the marker that went stale first', () => {
      const store = new MarkerStore({ clock: clock.now, maxMarkers: 3 });
      store.ingest(report('A'));
      clock.advance(1_000);
      store.ingest(report('B', { staleAfterMs: 4_000 }));
      clock.advance(1_000);
      store.ingest(report('C', { staleAfterMs: 1_000 }));
      clock.advance(8_000);
      store.sweep();

      store.ingest(report('D'));

      expect([...store.query().map((marker) => marker.uid)].sort()).toEqual(['A', 'B', 'D']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { uid: 'C', state: 'stale', maxMarkers: 3 },
        'Marker capacity reached, evicting'
      );
    });

    it('treats a marker past its stale time as stale before the sweep runs', () => {
      const store = new MarkerStore({ clock: clock.now, maxMarkers: 3 });
      store.ingest(report('A'));
      clock.advance(1_000);
      store.ingest(report('B', { staleAfterMs: 4_000 }));
      clock.advance(1_000);
      store.ingest(report('C', { staleAfterMs: 1_000 }));
      clock.advance(2_000);

      store.ingest(report('D'));

      expect([...store.query().map((marker) => marker.uid)].sort()).toEqual(['A', 'B', 'D']);
      expect(mockLogger.warn).toHaveBeenCalledWith(
        { uid: 'C', state: 'active', maxMarkers: 3 },
        'Marker capacity reached, evicting'
      );
    });
  });

  describe('query', () => {
    let store: MarkerStore;

    beforeEach(() => {
      store = new MarkerStore({ clock: clock.now });
      const entries: Array<[string, string, number, number, string]> = [
        ['F1', 'a-f-G-E-S', 10, 10, 'Alpha'],
        ['H1', 'a-h-A', 10, 179, 'Raven'],
        ['N1', 'a-n-S', -10, -179, 'Dolphin'],
        ['F2', 'a-f-G', 50, 10, 'alpine'],
      ];
      for (const [uid, type, lat, lon, callsign] of entries) {
        store.ingest(report(uid, { type, lat, lon, detail: { contact: { callsign } } }));
        clock.advance(1);
      }
    });

    const uids = (markers: Array<{ uid: string }>) => markers.map((marker) => marker.uid).sort();

    it('filters by a box crossing the antimeridian', () => {
      expect(uids(store.query({ bounds: { north: 20, south: -20, west: 170, east: -170 } }))).toEqual(['H1', 'N1']);
    });

    it('filters by a regular box', () => {
      expect(uids(store.query({ bounds: { north: 60, south: 0, west: 0, east: 20 } }))).toEqual(['F1', 'F2']);
    });

    it('filters by affiliation, dimension and type', () => {
      expect(uids(store.query({ affiliations: ['friend'] }))).toEqual(['F1', 'F2']);
      expect(uids(store.query({ dimensions: ['air'] }))).toEqual(['H1']);
      expect(uids(store.query({ types: ['a-n-S'] }))).toEqual(['N1']);
      expect(store.query({ states: ['stale'] })).toEqual([]);
    });

    it('searches callsigns and uids case-insensitively', () => {
      expect(uids(store.query({ search: 'ALP' }))).toEqual(['F1', 'F2']);
      expect(uids(store.query({ search: 'h1' }))).toEqual(['H1']);
    });

    it('sorts and limits', () => {
      expect(store.query({ sort: { field: 'callsign' } }).map((marker) => marker.uid)).toEqual(['F1', 'F2', 'N1', 'H1']);
      expect(store.query({ sort: { field: 'updated', direction: 'desc' }, limit: 2 }).map((marker) => marker.uid)).toEqual([
        'F2',
        'N1',
      ]);
    });

    it('summarises the store', () => {
      expect(store.stats()).toEqual({
        total: 4,
        active: 4,
        stale: 0,
        byAffiliation: { friend: 2, hostile: 1, neutral: 1 },
        byDimension: { ground: 2, air: 1, sea_surface: 1 },
        byType: { 'a-f-G-E-S': 1, 'a-h-A': 1, 'a-n-S': 1, 'a-f-G': 1 },
      });
    });
  });

  describe('removal', () => {
    it('removes a marker once', () => {
      const store = new MarkerStore({ clock: clock.now });
      const listener = jest.fn();
      store.on('removed', listener);
      store.ingest(report('U1'));

      expect(store.remove('U1')).toBe(true);
      expect(store.remove('U1')).toBe(false);
      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener.mock.calls[0][0]).toMatchObject({ type: 'removed', reason: 'explicit', timestamp: T0 });
    });

    it('clears everything', () => {
      const store = new MarkerStore({ clock: clock.now });
      store.ingest(report('U1'));
      store.ingest(report('U2'));

      expect(store.clear()).toBe(2);
      expect(store.size()).toBe(0);
    });
  });

  describe('listeners', () => {
    it('calls typed listeners before general ones and survives a throwing listener', () => {
      const store = new MarkerStore({ clock: clock.now });
      const order: string[] = [];
      const failure = new Error('boom');
      store.subscribe(() => order.push('general'));
      store.on('created', () => {
        order.push('typed');
        throw failure;
      });

      store.ingest(report('U1'));

      expect(order).toEqual(['typed', 'general']);
      expect(mockLogger.error).toHaveBeenCalledWith(
        { err: failure, uid: 'U1', change: 'created' },
        'MarkerStore listener error'
      );
    });

    it('stops notifying after the disposer runs', () => {
      const store = new MarkerStore({ clock: clock.now });
      const listener = jest.fn();
      const off = store.subscribe(listener);
      off();

      store.ingest(report('U1'));

      expect(listener).not.toHaveBeenCalled();
    });
  });

  describe('snapshot', () => {
    it('restores the most recent markers up to capacity', () => {
      const source = new MarkerStore({ clock: clock.now });
      source.ingest(report('OLD', { detail: { contact: { callsign: 'Old' } } }));
      clock.advance(1_000);
      source.ingest(report('NEW', { detail: { contact: { callsign: 'New' } } }));
      const snapshot: unknown = JSON.parse(JSON.stringify(source.snapshot()));

      const target = new MarkerStore({ clock: clock.now, maxMarkers: 1 });
      target.ingest(report('EXISTING'));

      expect(target.restore(snapshot)).toBe(1);
      expect(target.has('EXISTING')).toBe(false);
      expect(target.get('NEW')).toMatchObject({ callsign: 'New', created: T0 + 1_000, state: 'active' });
    });

    it('recomputes staleness on restore', () => {
      const source = new MarkerStore({ clock: clock.now });
      source.ingest(report('U1', { staleAfterMs: 1_000 }));
      const snapshot = source.snapshot();

      clock.advance(5_000);
      const target = new MarkerStore({ clock: clock.now });
      target.restore(snapshot);

      expect(target.get('U1')?.state).toBe('stale');
    });

    it('rejects malformed snapshots', () => {
      const store = new MarkerStore({ clock: clock.now });

      expect(() => store.restore({ version: 2, takenAt: T0, markers: [] })).toThrow(ConfigValidationError);
      expect(() => store.restore({ version: 1, takenAt: T0, markers: [{ uid: 'U1' }] })).toThrow(/^Invalid marker snapshot:/);
    });
  });

  it('rejects an invalid configuration', () => {
    expect(() => new MarkerStore({ maxMarkers: 0 })).toThrow(
      'Invalid marker store config:\n  - maxMarkers: Number must be greater than 0'
    );
  });
});
