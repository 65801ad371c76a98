// CoT data model
export { COT_UNKNOWN_ERROR, COT_VERSION } from './cot/types';
export type {
  CotPoint,
  CotContact,
  CotGroup,
  CotTrack,
  CotStatus,
  CotPrecisionLocation,
  CotTakVersion,
  CotLink,
  CotRemarks,
  CotChatGroup,
  CotChat,
  CotMarti,
  CotGeofence,
  CotEmergency,
  CotSalute,
  CotRawElement,
  CotDetail,
  CotEvent,
} from './cot/types';

// Codec
export { parseCot, serializeCot } from './cot/CotCodec';
export type { CotParseResult, CotParseWarning, SerializeCotOptions } from './cot/CotCodec';
export { CotParseError } from './cot/CotParseError';
export type { CotParseErrorCode } from './cot/CotParseError';
export { parseCotTimestamp, formatCotTimestamp } from './cot/timestamps';
export { escapeXml } from './cot/escape';
export { CotStreamFramer, DEFAULT_STREAM_FRAMER_CONFIG } from './cot/CotStreamFramer';
export type { CotStreamFramerConfig } from './cot/CotStreamFramer';

// Taxonomy
export { getAffiliation, getBattleDimension, isAtomType, isFriendlyType } from './cot/taxonomy';
export type { Affiliation, BattleDimension } from './cot/taxonomy';
export { AffiliationSchema, BattleDimensionSchema, CotPointSchema } from './schemas/cot-schemas';

// Builders
export {
  ALL_CHAT_USERS,
  SELF_POSITION_TYPE,
  CHAT_TYPE,
  DELETE_TYPE,
  EMERGENCY_CANCEL_TYPE,
  EMERGENCY_TYPE_CODES,
  createSelfPositionEvent,
  createChatEvent,
  createEmergencyEvent,
  createDeleteEvent,
} from './cot/builders';
export type {
  EmergencyAlertType,
  PointInput,
  SelfPositionOptions,
  ChatEventOptions,
  EmergencyEventOptions,
  DeleteEventOptions,
} from './cot/builders';

// Router
export { EventRouter } from './router/EventRouter';
export type { RouteListener, AnyRouteListener } from './router/EventRouter';
export {
  classifyEvent,
  parsePositionUpdate,
  parseChatMessage,
  parseEmergencyAlert,
  parseWaypoint,
  isDeleteEvent,
  getDeleteTargets,
} from './router/classify';
export type {
  EventKind,
  EventKindName,
  EventOfKind,
  ChatMessage,
  EmergencyAlert,
  PositionUpdate,
  Waypoint,
} from './router/types';

// Federation policy
export {
  DEFAULT_DATA_SHARING_POLICY,
  getDataType,
  shouldReceive,
  shouldSend,
  mergePolicy,
} from './federation/policy';
export {
  DataTypeSchema,
  DataTypeSelectorSchema,
  DataSharingPolicySchema,
  PartialDataSharingPolicySchema,
  TransportProtocolSchema,
  ServerConfigSchema,
} from './schemas/federation-schemas';
export type {
  DataType,
  DataTypeSelector,
  DataSharingPolicy,
  TransportProtocol,
  ServerConfig,
} from './schemas/federation-schemas';

// Logger
export { logger } from './utils/logger';
export type { Logger } from './utils/logger';

// Test support
export { VirtualClock } from './testing';
