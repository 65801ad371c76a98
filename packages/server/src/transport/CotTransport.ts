import type { ServerConfig } from '@cotmesh/core';

/** Opaque identifier of one live connection. */
export type ConnectionHandle = string;

export type TransportConnectResult =
  | { ok: true; handle: ConnectionHandle }
  | { ok: false; error: string };

export type TransportSendResult =
  | { ok: true }
  | { ok: false; error: string };

export interface TransportStatus {
  connected: boolean;
  messagesSent: number;
  messagesReceived: number;
  lastErrorCode?: string;
}

/**
 * Connection collaborator used by the federation layer. Implementations own
 * sockets, TLS and reconnect timing (`config.reconnect`,
 * `config.reconnectDelayMs`); the federation layer only sees text in and
 * text out.
 *
 * Inbound text may arrive split or batched; the caller reassembles whole
 * `<event>` documents.
 */
export interface CotTransport {
  connect(config: ServerConfig): Promise<TransportConnectResult>;
  send(handle: ConnectionHandle, text: string): Promise<TransportSendResult>;
  onMessage(handle: ConnectionHandle, callback: (text: string) => void): () => void;
  /** Notified when the connection ends without a `disconnect` call */
  onClose?(handle: ConnectionHandle, callback: (reason?: string) => void): () => void;
  disconnect(handle: ConnectionHandle): Promise<void>;
  status(handle: ConnectionHandle): TransportStatus | undefined;
}
