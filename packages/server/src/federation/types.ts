import type { CotEvent, DataSharingPolicy, ServerConfig } from '@cotmesh/core';

export type ServerStatus = 'disconnected' | 'connecting' | 'connected' | 'error';

export type ConnectionErrorCode = 'CONNECT_FAILED' | 'SEND_FAILED' | 'DISCONNECTED';

export interface FederatedServerStats {
  messagesReceived: number;
  eventsAccepted: number;
  policyRejected: number;
  parseErrors: number;
  messagesSent: number;
  sendFailures: number;
}

export interface FederatedServer {
  id: string;
  name: string;
  /** Transport handle while connected */
  connectionId?: string;
  config: ServerConfig;
  policy: DataSharingPolicy;
  status: ServerStatus;
  lastError?: string;
  lastErrorCode?: ConnectionErrorCode;
  stats: FederatedServerStats;
}

/**
 * Cache entry for one uid. `sharedTo` only ever grows; `receivedFrom` lists
 * every server that supplied the uid and is never sent it back.
 */
export interface FederatedCotEvent {
  event: CotEvent;
  sourceServerId: string;
  sourceServerName: string;
  receivedAt: number;
  sharedTo: Set<string>;
  receivedFrom: Set<string>;
}

export type ConnectResult =
  | { success: true }
  | { success: false; code: ConnectionErrorCode; error: string };

export type SendOutcome =
  | 'sent'
  | 'already_shared'
  | 'policy_rejected'
  | 'not_connected'
  | 'unknown_server'
  | 'failed';

export interface SendReport {
  serverId: string;
  outcome: SendOutcome;
  error?: string;
}

export type IncomingOutcome =
  | 'accepted'
  | 'parse_error'
  | 'policy_rejected'
  | 'not_connected'
  | 'unknown_server';

export interface IncomingResult {
  outcome: IncomingOutcome;
  uid?: string;
  /** Settles once automatic fan-out for this message has finished; never rejects */
  fanOut: Promise<SendReport[]>;
}

export type FederatedEventListener = (entry: FederatedCotEvent, serverId: string) => void;

export type ServerStatusListener = (server: FederatedServer, previous: ServerStatus) => void;
