/**
 * MarkerStore - live set of tactical entities built from position reports.
 *
 * Every report for a uid updates the same record in place. Records move
 * from active to stale when their `stale` time passes and are removed once
 * they have been stale for longer than the grace period. Capacity is
 * bounded: inserting past `maxMarkers` evicts the oldest stale marker, or
 * the least recently updated one when nothing is stale.
 *
 * All mutation happens synchronously inside the published operations, so
 * concurrent connection callbacks cannot interleave a read-modify-write.
 */

import { z } from 'zod';
import {
  CotEvent,
  getAffiliation,
  getBattleDimension,
  isAtomType,
} from '@cotmesh/core';
import { ConfigValidationError } from '../errors';
import { logger } from '../utils/logger';
import { TimerRegistry } from '../utils/TimerRegistry';
import {
  cloneMarker,
  isWithinBounds,
  Marker,
  MarkerChangeEvent,
  MarkerChangeListener,
  MarkerChangeType,
  MarkerFilter,
  MarkerRemovalReason,
  MarkerSnapshot,
  MarkerSnapshotSchema,
  MarkerStats,
  MARKER_SNAPSHOT_VERSION,
  SweepResult,
} from './MarkerModel';

export const MarkerStoreConfigSchema = z.object({
  sweepIntervalMs: z.number().int().positive(),
  staleGracePeriodMs: z.number().int().nonnegative(),
  maxMarkers: z.number().int().positive(),
});

export interface MarkerStoreConfig extends z.infer<typeof MarkerStoreConfigSchema> {
  /** Time source. Default: Date.now */
  clock: () => number;
}

export const DEFAULT_MARKER_STORE_CONFIG: MarkerStoreConfig = {
  sweepIntervalMs: 5000,
  staleGracePeriodMs: 60000,
  maxMarkers: 10000,
  clock: Date.now,
};

export interface MarkerStoreOptions extends Partial<MarkerStoreConfig> {
  /** Shared registry; the store creates its own when omitted */
  timers?: TimerRegistry;
}

const SWEEP_TIMER_ID = 'marker-store-sweep';

export class MarkerStore {
  private readonly config: MarkerStoreConfig;
  private readonly clock: () => number;
  private readonly timers: TimerRegistry;
  private readonly markers: Map<string, Marker> = new Map();
  private readonly typedListeners: Map<MarkerChangeType, Set<MarkerChangeListener>> = new Map();
  private readonly listeners: Set<MarkerChangeListener> = new Set();
  private started = false;

  constructor(options: MarkerStoreOptions = {}) {
    const { timers, ...overrides } = options;
    const config: MarkerStoreConfig = { ...DEFAULT_MARKER_STORE_CONFIG, ...overrides };

    const result = MarkerStoreConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigValidationError('marker store config', result.error.issues);
    }

    this.config = config;
    this.clock = config.clock;
    this.timers = timers ?? new TimerRegistry();
  }

  /**
   * Schedule the periodic sweep.
   */
  start(): void {
    if (this.started) return;
    this.started = true;

    this.timers.setInterval(() => {
      this.sweep();
    }, this.config.sweepIntervalMs, SWEEP_TIMER_ID);

    logger.info(
      {
        sweepIntervalMs: this.config.sweepIntervalMs,
        staleGracePeriodMs: this.config.staleGracePeriodMs,
        maxMarkers: this.config.maxMarkers,
      },
      'MarkerStore started'
    );
  }

  /**
   * Cancel the periodic sweep. Markers and listeners are kept.
   */
  shutdown(): void {
    if (!this.started) return;
    this.started = false;
    this.timers.clearInterval(SWEEP_TIMER_ID);
    logger.info({ markers: this.markers.size }, 'MarkerStore stopped');
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Create or update the marker for a position report.
   *
   * @returns A copy of the resulting marker, or null when the event is not
   * a position report.
   */
  ingest(event: CotEvent): Marker | null {
    if (!isAtomType(event.type)) {
      logger.debug({ uid: event.uid, type: event.type }, 'Ignoring non-position event');
      return null;
    }

    const now = this.clock();
    const existing = this.markers.get(event.uid);

    if (existing) {
      const previous = cloneMarker(existing);
      this.applyEvent(existing, event, now);
      const marker = cloneMarker(existing);
      this.emit({ type: 'updated', marker, previous, timestamp: now });
      return cloneMarker(marker);
    }

    if (this.markers.size >= this.config.maxMarkers) {
      this.evictOne(now);
    }

    const created = this.createMarker(event, now);
    this.markers.set(created.uid, created);
    this.emit({ type: 'created', marker: cloneMarker(created), timestamp: now });
    return cloneMarker(created);
  }

  /**
   * @returns Whether a marker existed
   */
  remove(uid: string, reason: MarkerRemovalReason = 'explicit'): boolean {
    const marker = this.markers.get(uid);
    if (!marker) {
      return false;
    }
    this.markers.delete(uid);
    this.emit({ type: 'removed', marker: cloneMarker(marker), reason, timestamp: this.clock() });
    return true;
  }

  /**
   * Remove every marker, emitting `removed` for each.
   * @returns Number of markers removed
   */
  clear(): number {
    const uids = [...this.markers.keys()];
    for (const uid of uids) {
      this.remove(uid, 'explicit');
    }
    return uids.length;
  }

  get(uid: string): Marker | undefined {
    const marker = this.markers.get(uid);
    return marker ? cloneMarker(marker) : undefined;
  }

  has(uid: string): boolean {
    return this.markers.has(uid);
  }

  size(): number {
    return this.markers.size;
  }

  /**
   * Markers matching every given criterion. Unsorted unless `sort` is set.
   */
  query(filter: MarkerFilter = {}): Marker[] {
    const search = filter.search?.trim().toLowerCase();
    const results: Marker[] = [];

    for (const marker of this.markers.values()) {
      if (filter.bounds && !isWithinBounds(marker, filter.bounds)) continue;
      if (filter.affiliations && !filter.affiliations.includes(marker.affiliation)) continue;
      if (filter.dimensions && !filter.dimensions.includes(marker.dimension)) continue;
      if (filter.states && !filter.states.includes(marker.state)) continue;
      if (filter.types && !filter.types.includes(marker.type)) continue;
      if (
        search &&
        !marker.callsign.toLowerCase().includes(search) &&
        !marker.uid.toLowerCase().includes(search)
      ) {
        continue;
      }
      results.push(cloneMarker(marker));
    }

    if (filter.sort) {
      const { field } = filter.sort;
      const sign = filter.sort.direction === 'desc' ? -1 : 1;
      results.sort((a, b) => {
        const left = a[field];
        const right = b[field];
        if (typeof left === 'string' && typeof right === 'string') {
          return sign * left.localeCompare(right);
        }
        return sign * (Number(left) - Number(right));
      });
    }

    if (filter.limit !== undefined && filter.limit >= 0) {
      return results.slice(0, filter.limit);
    }
    return results;
  }

  stats(): MarkerStats {
    const stats: MarkerStats = {
      total: this.markers.size,
      active: 0,
      stale: 0,
      byAffiliation: {},
      byDimension: {},
      byType: {},
    };

    for (const marker of this.markers.values()) {
      if (marker.state === 'active') {
        stats.active++;
      } else {
        stats.stale++;
      }
      stats.byAffiliation[marker.affiliation] = (stats.byAffiliation[marker.affiliation] ?? 0) + 1;
      stats.byDimension[marker.dimension] = (stats.byDimension[marker.dimension] ?? 0) + 1;
      stats.byType[marker.type] = (stats.byType[marker.type] ?? 0) + 1;
    }

    return stats;
  }

  /**
   * One staleness pass: active markers past `stale` become stale, markers
   * stale for longer than the grace period are removed.
   */
  sweep(now: number = this.clock()): SweepResult {
    const result: SweepResult = { staled: 0, removed: 0 };
    const expiry = now - this.config.staleGracePeriodMs;

    for (const marker of [...this.markers.values()]) {
      if (marker.stale < expiry) {
        this.markers.delete(marker.uid);
        result.removed++;
        this.emit({ type: 'removed', marker: cloneMarker(marker), reason: 'expired', timestamp: now });
        continue;
      }

      if (marker.state === 'active' && marker.stale <= now) {
        const previous = cloneMarker(marker);
        marker.state = 'stale';
        result.staled++;
        this.emit({ type: 'updated', marker: cloneMarker(marker), previous, timestamp: now });
      }
    }

    if (result.staled > 0 || result.removed > 0) {
      logger.debug({ ...result, remaining: this.markers.size }, 'Marker sweep');
    }
    return result;
  }

  on(type: MarkerChangeType, listener: MarkerChangeListener): () => void {
    let set = this.typedListeners.get(type);
    if (!set) {
      set = new Set();
      this.typedListeners.set(type, set);
    }
    const listeners = set;
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  subscribe(listener: MarkerChangeListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * JSON-safe copy of every marker.
   */
  snapshot(): MarkerSnapshot {
    return {
      version: MARKER_SNAPSHOT_VERSION,
      takenAt: this.clock(),
      markers: [...this.markers.values()].map(cloneMarker),
    };
  }

  /**
   * Replace the store contents with a snapshot. Markers beyond capacity are
   * dropped, least recently updated first.
   *
   * @returns Number of markers restored
   * @throws ConfigValidationError when the input is not a valid snapshot
   */
  restore(input: unknown): number {
    const parsed = MarkerSnapshotSchema.safeParse(input);
    if (!parsed.success) {
      throw new ConfigValidationError('marker snapshot', parsed.error.issues);
    }

    this.clear();

    const now = this.clock();
    const markers = [...parsed.data.markers]
      .sort((a, b) => b.updated - a.updated)
      .slice(0, this.config.maxMarkers);

    for (const marker of markers) {
      const restored = cloneMarker(marker);
      restored.state = restored.stale <= now ? 'stale' : 'active';
      this.markers.set(restored.uid, restored);
      this.emit({ type: 'created', marker: cloneMarker(restored), timestamp: now });
    }

    logger.info(
      { restored: markers.length, dropped: parsed.data.markers.length - markers.length },
      'MarkerStore restored from snapshot'
    );
    return markers.length;
  }

  private createMarker(event: CotEvent, now: number): Marker {
    const marker: Marker = {
      uid: event.uid,
      type: event.type,
      callsign: event.uid,
      point: { ...event.point },
      how: event.how,
      affiliation: getAffiliation(event.type),
      dimension: getBattleDimension(event.type),
      created: now,
      updated: now,
      stale: event.stale,
      state: 'active',
    };
    this.applyEvent(marker, event, now);
    return marker;
  }

  /**
   * Copy a report onto an existing record. Callsign and team survive reports
   * that omit them; movement, battery and remarks always reflect the latest.
   */
  private applyEvent(marker: Marker, event: CotEvent, now: number): void {
    const detail = event.detail;

    marker.type = event.type;
    marker.point = { ...event.point };
    marker.how = event.how;
    marker.affiliation = getAffiliation(event.type);
    marker.dimension = getBattleDimension(event.type);
    marker.updated = now;
    marker.stale = event.stale;
    marker.state = event.stale <= now ? 'stale' : 'active';

    if (detail?.contact?.callsign) {
      marker.callsign = detail.contact.callsign;
    }
    if (detail?.group?.name) {
      marker.team = detail.group.name;
    }

    marker.speed = detail?.track?.speed;
    marker.course = detail?.track?.course;
    marker.battery = detail?.status?.battery;
    marker.remarks = detail?.remarks?.text || undefined;
  }

  private evictOne(now: number): void {
    let oldestStale: Marker | undefined;
    let leastRecent: Marker | undefined;

    for (const marker of this.markers.values()) {
      // Past `stale` counts even before the sweep has flagged it
      const expired = marker.state === 'stale' || marker.stale <= now;
      if (expired && (!oldestStale || marker.stale < oldestStale.stale)) {
        oldestStale = marker;
      }
      if (!leastRecent || marker.updated < leastRecent.updated) {
        leastRecent = marker;
      }
    }

    const victim = oldestStale ?? leastRecent;
    if (!victim) {
      return;
    }

    this.markers.delete(victim.uid);
    logger.warn(
      { uid: victim.uid, state: victim.state, maxMarkers: this.config.maxMarkers },
      'Marker capacity reached, evicting'
    );
    this.emit({ type: 'removed', marker: cloneMarker(victim), reason: 'evicted', timestamp: now });
  }

  private emit(change: MarkerChangeEvent): void {
    const typed = this.typedListeners.get(change.type);
    const targets = typed ? [...typed, ...this.listeners] : [...this.listeners];

    for (const listener of targets) {
      try {
        listener(change);
      } catch (e) {
        logger.error({ err: e, uid: change.marker.uid, change: change.type }, 'MarkerStore listener error');
      }
    }
  }
}
