export * from './errors';
export * from './utils/logger';
export { TimerRegistry } from './utils/TimerRegistry';
export { RateLimitedLogger } from './utils/RateLimitedLogger';
export type { RateLimitConfig, BaseLogger } from './utils/RateLimitedLogger';
export { validateEnv, loadConfigFromEnv } from './config/env-schema';
export type { EnvConfig, EnvDerivedConfig } from './config/env-schema';

// Markers
export * from './markers/MarkerModel';
export {
  MarkerStore,
  MarkerStoreConfigSchema,
  DEFAULT_MARKER_STORE_CONFIG,
} from './markers/MarkerStore';
export type { MarkerStoreConfig, MarkerStoreOptions } from './markers/MarkerStore';

// Transport
export type {
  ConnectionHandle,
  CotTransport,
  TransportConnectResult,
  TransportSendResult,
  TransportStatus,
} from './transport/CotTransport';
export { InMemoryTransport } from './transport/InMemoryTransport';
export type { SentMessage } from './transport/InMemoryTransport';

// Federation
export {
  FederationManager,
  FederationManagerConfigSchema,
  DEFAULT_FEDERATION_MANAGER_CONFIG,
} from './federation/FederationManager';
export type { FederationManagerConfig, FederationManagerOptions } from './federation/FederationManager';
export * from './federation/types';

// Pipeline
export { CotPipeline } from './pipeline/CotPipeline';
export type { PipelineResult, PipelineStats } from './pipeline/CotPipeline';
export { createCotMesh } from './CotMeshFactory';
export type { CotMesh, CotMeshOptions } from './CotMeshFactory';
