import { COT_UNKNOWN_ERROR, COT_VERSION, CotDetail, CotEmergency, CotEvent, CotPoint } from './types';
import { formatCotTimestamp } from './timestamps';

export const ALL_CHAT_USERS = 'All Chat Users';

export const SELF_POSITION_TYPE = 'a-f-G-E-S';
export const CHAT_TYPE = 'b-t-f';
export const DELETE_TYPE = 't-x-d-d';

export type EmergencyAlertType = 'emergency_911' | 'ring_the_bell' | 'in_contact' | 'geofence' | 'custom';

/** Type codes used when originating an alert. */
export const EMERGENCY_TYPE_CODES: Record<EmergencyAlertType, string> = {
  emergency_911: 'b-a-o-tbl',
  ring_the_bell: 'b-a-o-pan',
  in_contact: 'b-a-o-opn',
  geofence: 'b-a-g',
  custom: 'b-a-o-c',
};

export const EMERGENCY_CANCEL_TYPE = 'b-a-o-can';

const EMERGENCY_LABELS: Record<EmergencyAlertType, string> = {
  emergency_911: '911 Alert',
  ring_the_bell: 'Ring The Bell',
  in_contact: 'In Contact',
  geofence: 'Geo-fence Breached',
  custom: 'Custom',
};

export type PointInput = Pick<CotPoint, 'lat' | 'lon'> & Partial<Pick<CotPoint, 'hae' | 'ce' | 'le'>>;

function toPoint(input: PointInput | undefined): CotPoint {
  return {
    lat: input?.lat ?? 0,
    lon: input?.lon ?? 0,
    hae: input?.hae ?? 0,
    ce: input?.ce ?? COT_UNKNOWN_ERROR,
    le: input?.le ?? COT_UNKNOWN_ERROR,
  };
}

export interface SelfPositionOptions {
  uid: string;
  callsign: string;
  point: PointInput;
  team?: string;
  role?: string;
  battery?: number;
  speed?: number;
  course?: number;
  /** Default: 60 seconds */
  staleAfterMs?: number;
  now?: number;
}

/**
 * Self situational-awareness report (own position), friendly ground unit.
 */
export function createSelfPositionEvent(options: SelfPositionOptions): CotEvent {
  const now = options.now ?? Date.now();
  const detail: CotDetail = {
    contact: { callsign: options.callsign },
    precisionLocation: { geopointsrc: 'GPS', altsrc: 'GPS' },
  };
  if (options.team) {
    detail.group = { name: options.team, role: options.role ?? 'Team Member' };
  }
  if (options.battery !== undefined) {
    detail.status = { battery: options.battery };
  }
  if (options.speed !== undefined && options.course !== undefined) {
    detail.track = { speed: options.speed, course: options.course };
  }

  return {
    version: COT_VERSION,
    uid: options.uid,
    type: SELF_POSITION_TYPE,
    time: now,
    start: now,
    stale: now + (options.staleAfterMs ?? 60_000),
    how: 'h-g-i-g-o',
    point: toPoint({ ce: 10, le: 10, ...options.point }),
    detail,
  };
}

export interface ChatEventOptions {
  senderUid: string;
  senderCallsign: string;
  text: string;
  messageId: string;
  /** Callsign or room name; defaults to the all-users room */
  chatroom?: string;
  /** Uid of a direct-message recipient */
  recipientUid?: string;
  point?: PointInput;
  /** Default: 1 hour */
  staleAfterMs?: number;
  now?: number;
}

/**
 * GeoChat message (`b-t-f`).
 */
export function createChatEvent(options: ChatEventOptions): CotEvent {
  const now = options.now ?? Date.now();
  const chatroom = options.chatroom ?? ALL_CHAT_USERS;
  const nowText = formatCotTimestamp(now);

  return {
    version: COT_VERSION,
    uid: `GeoChat.${options.senderUid}.${chatroom}.${options.messageId}`,
    type: CHAT_TYPE,
    time: now,
    start: now,
    stale: now + (options.staleAfterMs ?? 3_600_000),
    how: 'h-g-i-g-o',
    point: toPoint(options.point),
    detail: {
      chat: {
        id: options.messageId,
        chatroom,
        senderCallsign: options.senderCallsign,
        parent: 'RootContactGroup',
        chatgrp: {
          uid0: options.senderUid,
          uid1: options.recipientUid ?? chatroom,
          id: chatroom,
        },
      },
      links: [
        {
          uid: options.senderUid,
          relation: 'p-p',
          type: SELF_POSITION_TYPE,
          parentCallsign: options.senderCallsign,
          productionTime: nowText,
        },
      ],
      remarks: {
        text: options.text,
        source: `BAO.F.ATAK.${options.senderUid}`,
        to: chatroom,
        time: nowText,
      },
      marti: { dest: [{ callsign: chatroom }] },
    },
  };
}

export interface EmergencyEventOptions {
  uid: string;
  callsign: string;
  alertType: EmergencyAlertType;
  point: PointInput;
  message?: string;
  cancel?: boolean;
  /** Default: 10 minutes */
  staleAfterMs?: number;
  now?: number;
}

/**
 * Emergency alert (`b-a-*`) or its cancellation.
 */
export function createEmergencyEvent(options: EmergencyEventOptions): CotEvent {
  const now = options.now ?? Date.now();
  const emergency: CotEmergency = {
    type: EMERGENCY_LABELS[options.alertType],
    text: options.callsign,
  };
  if (options.cancel) {
    emergency.cancel = true;
  }

  const detail: CotDetail = {
    contact: { callsign: options.callsign },
    links: [{ uid: options.uid, relation: 'p-p', type: SELF_POSITION_TYPE }],
    emergency,
  };
  if (options.message) {
    detail.remarks = { text: options.message };
  }

  return {
    version: COT_VERSION,
    uid: `${options.uid}-9-1-1`,
    type: options.cancel ? EMERGENCY_CANCEL_TYPE : EMERGENCY_TYPE_CODES[options.alertType],
    time: now,
    start: now,
    stale: now + (options.staleAfterMs ?? 600_000),
    how: 'h-e',
    point: toPoint(options.point),
    detail,
  };
}

export interface DeleteEventOptions {
  targetUid: string;
  now?: number;
  /** Default: 20 seconds */
  staleAfterMs?: number;
}

/**
 * Tasking message asking every receiver to drop `targetUid`.
 */
export function createDeleteEvent(options: DeleteEventOptions): CotEvent {
  const now = options.now ?? Date.now();
  return {
    version: COT_VERSION,
    uid: `${options.targetUid}.delete`,
    type: DELETE_TYPE,
    time: now,
    start: now,
    stale: now + (options.staleAfterMs ?? 20_000),
    how: 'h-g-i-g-o',
    point: toPoint(undefined),
    detail: {
      links: [{ uid: options.targetUid, relation: 'none', type: 'none' }],
    },
  };
}
