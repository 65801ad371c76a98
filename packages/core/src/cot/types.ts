/**
 * Cursor-on-Target data model.
 *
 * Timestamps are Unix epoch milliseconds. The `detail` block is modelled as a
 * set of known sub-structures plus a residual list of unrecognised elements,
 * so vendor extensions survive a parse/serialize cycle.
 */

/** Sentinel for circular/linear error when the sender did not report accuracy. */
export const COT_UNKNOWN_ERROR = 9999999;

export const COT_VERSION = '2.0';

export interface CotPoint {
  /** Latitude in degrees, [-90, 90] */
  lat: number;
  /** Longitude in degrees, [-180, 180] */
  lon: number;
  /** Height above ellipsoid in meters */
  hae: number;
  /** Circular error in meters */
  ce: number;
  /** Linear error in meters */
  le: number;
}

export interface CotContact {
  callsign: string;
  /** host:port:protocol for direct contact */
  endpoint?: string;
}

export interface CotGroup {
  name: string;
  role: string;
}

export interface CotTrack {
  /** meters per second */
  speed: number;
  /** degrees true, 0 = north */
  course: number;
}

export interface CotStatus {
  battery: number;
}

export interface CotPrecisionLocation {
  geopointsrc: string;
  altsrc: string;
}

export interface CotTakVersion {
  device?: string;
  platform?: string;
  os?: string;
  version?: string;
}

export interface CotLink {
  uid: string;
  relation?: string;
  type?: string;
  parentCallsign?: string;
  productionTime?: string;
}

export interface CotRemarks {
  text: string;
  source?: string;
  to?: string;
  time?: string;
}

export interface CotChatGroup {
  uid0: string;
  uid1?: string;
  id?: string;
}

export interface CotChat {
  id: string;
  chatroom: string;
  senderCallsign: string;
  parent?: string;
  chatgrp?: CotChatGroup;
}

export interface CotMarti {
  dest: Array<{ callsign: string }>;
}

export interface CotGeofence {
  id: string;
  name: string;
  event?: string;
  userId?: string;
}

export interface CotEmergency {
  type?: string;
  cancel?: boolean;
  text?: string;
}

/**
 * SALUTE observation report. Each field is free text as the observer typed
 * it; `time` is usually the DTG form `DDHHMMZ MON YY`.
 */
export interface CotSalute {
  size?: string;
  activity?: string;
  location?: string;
  unit?: string;
  time?: string;
  equipment?: string;
}

/**
 * An element of the detail block the codec has no typed model for.
 */
export interface CotRawElement {
  name: string;
  attributes: Record<string, string>;
  text?: string;
  children: CotRawElement[];
}

export interface CotDetail {
  contact?: CotContact;
  group?: CotGroup;
  track?: CotTrack;
  status?: CotStatus;
  precisionLocation?: CotPrecisionLocation;
  takv?: CotTakVersion;
  links?: CotLink[];
  remarks?: CotRemarks;
  chat?: CotChat;
  marti?: CotMarti;
  geofence?: CotGeofence;
  emergency?: CotEmergency;
  salute?: CotSalute;
  extras?: CotRawElement[];
}

export interface CotEvent {
  version: string;
  uid: string;
  /** Dash-delimited type code, e.g. `a-f-G-E-S` */
  type: string;
  /** Generation time */
  time: number;
  /** Start of validity */
  start: number;
  /** End of validity */
  stale: number;
  /** Provenance code, e.g. `h-g-i-g-o` or `m-g` */
  how: string;
  point: CotPoint;
  detail?: CotDetail;
}
