import { z } from 'zod';
import { AffiliationSchema, BattleDimensionSchema, CotPointSchema } from '@cotmesh/core';

export const MarkerStateSchema = z.enum(['active', 'stale']);
export type MarkerState = z.infer<typeof MarkerStateSchema>;

/**
 * Live tactical entity derived from position reports. One per uid.
 */
export const MarkerSchema = z.object({
  uid: z.string().min(1),
  type: z.string().min(1),
  callsign: z.string(),
  point: CotPointSchema,
  how: z.string(),
  speed: z.number().optional(),
  course: z.number().optional(),
  team: z.string().optional(),
  battery: z.number().optional(),
  remarks: z.string().optional(),
  affiliation: AffiliationSchema,
  dimension: BattleDimensionSchema,
  created: z.number(),
  updated: z.number(),
  stale: z.number(),
  state: MarkerStateSchema,
});
export type Marker = z.infer<typeof MarkerSchema>;

export const MARKER_SNAPSHOT_VERSION = 1;

export const MarkerSnapshotSchema = z.object({
  version: z.literal(MARKER_SNAPSHOT_VERSION),
  takenAt: z.number(),
  markers: z.array(MarkerSchema),
});
export type MarkerSnapshot = z.infer<typeof MarkerSnapshotSchema>;

export type MarkerRemovalReason = 'explicit' | 'expired' | 'evicted' | 'deleted';

export type MarkerChangeType = 'created' | 'updated' | 'removed';

export interface MarkerChangeEvent {
  type: MarkerChangeType;
  marker: Marker;
  /** State before an update */
  previous?: Marker;
  reason?: MarkerRemovalReason;
  timestamp: number;
}

export type MarkerChangeListener = (change: MarkerChangeEvent) => void;

export interface GeoBounds {
  north: number;
  south: number;
  /** When west > east the box crosses the antimeridian */
  east: number;
  west: number;
}

export type MarkerSortField = 'uid' | 'callsign' | 'updated' | 'created' | 'stale';

export interface MarkerFilter {
  bounds?: GeoBounds;
  affiliations?: Marker['affiliation'][];
  dimensions?: Marker['dimension'][];
  states?: MarkerState[];
  types?: string[];
  /** Case-insensitive substring over callsign and uid */
  search?: string;
  sort?: { field: MarkerSortField; direction?: 'asc' | 'desc' };
  limit?: number;
}

export interface MarkerStats {
  total: number;
  active: number;
  stale: number;
  byAffiliation: Record<string, number>;
  byDimension: Record<string, number>;
  byType: Record<string, number>;
}

export interface SweepResult {
  staled: number;
  removed: number;
}

export function cloneMarker(marker: Marker): Marker {
  return { ...marker, point: { ...marker.point } };
}

export function isWithinBounds(marker: Marker, bounds: GeoBounds): boolean {
  const { lat, lon } = marker.point;
  if (lat < bounds.south || lat > bounds.north) {
    return false;
  }
  if (bounds.west <= bounds.east) {
    return lon >= bounds.west && lon <= bounds.east;
  }
  return lon >= bounds.west || lon <= bounds.east;
}
