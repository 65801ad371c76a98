import { ALL_CHAT_USERS, CHAT_TYPE, DELETE_TYPE, EMERGENCY_CANCEL_TYPE, EmergencyAlertType } from '../cot/builders';
import { getAffiliation, getBattleDimension } from '../cot/taxonomy';
import type { CotEvent } from '../cot/types';
import type { ChatMessage, EmergencyAlert, EventKind, PositionUpdate, Waypoint } from './types';

const GROUP_CHATROOMS = new Set([ALL_CHAT_USERS, 'All Chat Rooms']);

/**
 * Classify an event by its type code. Rules are evaluated in order and the
 * first match wins:
 *
 * 1. `a-*`                    position update
 * 2. `b-t-f`                  chat message
 * 3. `b-a-*`                  emergency alert
 * 4. `b-m-p-w`, `b-m-p-s-p-i*` waypoint
 * 5. anything else            unknown
 *
 * When the sub-parser for the matched kind cannot make sense of the event
 * the result is `unknown` instead of an error.
 */
export function classifyEvent(event: CotEvent): EventKind {
  const { type } = event;

  if (type.startsWith('a-')) {
    return { kind: 'position', event, position: parsePositionUpdate(event) };
  }

  if (type === CHAT_TYPE) {
    const message = parseChatMessage(event);
    return message ? { kind: 'chat', event, message } : unknown(event);
  }

  if (type.startsWith('b-a-')) {
    return { kind: 'emergency', event, alert: parseEmergencyAlert(event) };
  }

  if (type === 'b-m-p-w' || type.startsWith('b-m-p-s-p-i')) {
    return { kind: 'waypoint', event, waypoint: parseWaypoint(event) };
  }

  return unknown(event);
}

function unknown(event: CotEvent): EventKind {
  return { kind: 'unknown', event, rawType: event.type };
}

export function parsePositionUpdate(event: CotEvent): PositionUpdate {
  const position: PositionUpdate = {
    affiliation: getAffiliation(event.type),
    dimension: getBattleDimension(event.type),
  };
  const callsign = event.detail?.contact?.callsign;
  if (callsign) {
    position.callsign = callsign;
  }
  return position;
}

function directConversationId(a: string, b: string): string {
  const [first, second] = [a, b].sort();
  return `DM-${first}-${second}`;
}

/**
 * GeoChat payload of a `b-t-f` event, or null when the `__chat` element,
 * the sender uid or the message text is missing.
 */
export function parseChatMessage(event: CotEvent): ChatMessage | null {
  const detail = event.detail;
  const chat = detail?.chat;
  if (!detail || !chat) {
    return null;
  }

  const senderUid = chat.chatgrp?.uid0 ?? detail.links?.[0]?.uid;
  const text = detail.remarks?.text;
  if (!senderUid || text === undefined || text === '') {
    return null;
  }

  const isGroupChat = GROUP_CHATROOMS.has(chat.chatroom);
  const message: ChatMessage = {
    id: chat.id,
    senderUid,
    senderCallsign: chat.senderCallsign,
    chatroom: chat.chatroom,
    text,
    timestamp: event.time,
    isGroupChat,
    conversationId: ALL_CHAT_USERS,
  };

  if (!isGroupChat) {
    message.recipientCallsign = chat.chatroom;
    const uid1 = chat.chatgrp?.uid1;
    if (uid1 && uid1 !== chat.chatroom) {
      message.recipientUid = uid1;
    }
    message.conversationId = directConversationId(senderUid, message.recipientUid ?? chat.chatroom);
  }

  return message;
}

function alertTypeFromLabel(label: string): EmergencyAlertType | null {
  if (label.includes('911')) return 'emergency_911';
  if (label.includes('Ring')) return 'ring_the_bell';
  if (label.includes('Contact')) return 'in_contact';
  if (label.toLowerCase().includes('geo-fence') || label.toLowerCase().includes('geofence')) return 'geofence';
  return null;
}

function alertTypeFromCode(type: string): EmergencyAlertType {
  if (type.startsWith('b-a-o-tbl')) return 'emergency_911';
  if (type.startsWith('b-a-o-pan')) return 'ring_the_bell';
  if (type.startsWith('b-a-o-opn')) return 'in_contact';
  if (type.startsWith('b-a-g')) return 'geofence';
  return 'custom';
}

export function parseEmergencyAlert(event: CotEvent): EmergencyAlert {
  const emergency = event.detail?.emergency;
  const label = emergency?.type;

  const alert: EmergencyAlert = {
    uid: event.uid,
    alertType: (label ? alertTypeFromLabel(label) : null) ?? alertTypeFromCode(event.type),
    callsign: event.detail?.contact?.callsign || emergency?.text || event.uid,
    point: { ...event.point },
    timestamp: event.time,
    cancel: emergency?.cancel === true || event.type === EMERGENCY_CANCEL_TYPE,
  };

  const remarks = event.detail?.remarks?.text;
  if (remarks) {
    alert.message = remarks;
  }
  return alert;
}

export function parseWaypoint(event: CotEvent): Waypoint {
  const waypoint: Waypoint = {};
  const callsign = event.detail?.contact?.callsign;
  const remarks = event.detail?.remarks?.text;
  if (callsign) waypoint.callsign = callsign;
  if (remarks) waypoint.remarks = remarks;
  return waypoint;
}

export function isDeleteEvent(event: CotEvent): boolean {
  return event.type === DELETE_TYPE;
}

/**
 * Uids a `t-x-d-d` delete message asks receivers to drop.
 */
export function getDeleteTargets(event: CotEvent): string[] {
  if (!isDeleteEvent(event)) {
    return [];
  }
  return (event.detail?.links ?? []).map((link) => link.uid);
}
