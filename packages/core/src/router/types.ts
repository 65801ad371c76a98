import type { EmergencyAlertType } from '../cot/builders';
import type { Affiliation, BattleDimension } from '../cot/taxonomy';
import type { CotEvent, CotPoint } from '../cot/types';

export type EventKindName = 'position' | 'chat' | 'emergency' | 'waypoint' | 'unknown';

export interface ChatMessage {
  id: string;
  senderUid: string;
  senderCallsign: string;
  chatroom: string;
  text: string;
  timestamp: number;
  isGroupChat: boolean;
  recipientCallsign?: string;
  recipientUid?: string;
  /** Stable id for the conversation this message belongs to */
  conversationId: string;
}

export interface EmergencyAlert {
  uid: string;
  alertType: EmergencyAlertType;
  callsign: string;
  point: CotPoint;
  timestamp: number;
  message?: string;
  cancel: boolean;
}

export interface PositionUpdate {
  affiliation: Affiliation;
  dimension: BattleDimension;
  callsign?: string;
}

export interface Waypoint {
  callsign?: string;
  remarks?: string;
}

/**
 * Classification of a decoded event. Every variant carries the event it was
 * derived from.
 */
export type EventKind =
  | { kind: 'position'; event: CotEvent; position: PositionUpdate }
  | { kind: 'chat'; event: CotEvent; message: ChatMessage }
  | { kind: 'emergency'; event: CotEvent; alert: EmergencyAlert }
  | { kind: 'waypoint'; event: CotEvent; waypoint: Waypoint }
  | { kind: 'unknown'; event: CotEvent; rawType: string };

export type EventOfKind<K extends EventKindName> = Extract<EventKind, { kind: K }>;
