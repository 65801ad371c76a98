import type { ServerConfig } from '@cotmesh/core';
import type {
  ConnectionHandle,
  CotTransport,
  TransportConnectResult,
  TransportSendResult,
  TransportStatus,
} from './CotTransport';

interface InMemoryConnection {
  config: ServerConfig;
  connected: boolean;
  messagesSent: number;
  messagesReceived: number;
  lastErrorCode?: string;
  messageListeners: Set<(text: string) => void>;
  closeListeners: Set<(reason?: string) => void>;
}

export interface SentMessage {
  handle: ConnectionHandle;
  text: string;
}

/**
 * In-process transport. Nothing leaves the process: outbound text is
 * recorded, inbound text is injected with `deliver`, and connect or send
 * failures are scripted. Useful for tests and for wiring a host before a
 * socket transport exists.
 */
export class InMemoryTransport implements CotTransport {
  private readonly connections: Map<ConnectionHandle, InMemoryConnection> = new Map();
  private readonly connectFailures: string[] = [];
  private readonly sendFailures: Map<ConnectionHandle, string> = new Map();
  private connectGate: Promise<void> | null = null;
  private handleCounter = 0;
  private connectAttempts = 0;

  readonly sent: SentMessage[] = [];

  async connect(config: ServerConfig): Promise<TransportConnectResult> {
    this.connectAttempts++;
    if (this.connectGate) {
      await this.connectGate;
    }

    const failure = this.connectFailures.shift();
    if (failure !== undefined) {
      return { ok: false, error: failure };
    }

    const handle = `mem-${++this.handleCounter}`;
    this.connections.set(handle, {
      config,
      connected: true,
      messagesSent: 0,
      messagesReceived: 0,
      messageListeners: new Set(),
      closeListeners: new Set(),
    });
    return { ok: true, handle };
  }

  async send(handle: ConnectionHandle, text: string): Promise<TransportSendResult> {
    const connection = this.connections.get(handle);
    if (!connection || !connection.connected) {
      return { ok: false, error: `Connection ${handle} is closed` };
    }

    const failure = this.sendFailures.get(handle);
    if (failure !== undefined) {
      connection.lastErrorCode = 'SEND_FAILED';
      return { ok: false, error: failure };
    }

    connection.messagesSent++;
    this.sent.push({ handle, text });
    return { ok: true };
  }

  onMessage(handle: ConnectionHandle, callback: (text: string) => void): () => void {
    const listeners = this.connections.get(handle)?.messageListeners;
    listeners?.add(callback);
    return () => {
      listeners?.delete(callback);
    };
  }

  onClose(handle: ConnectionHandle, callback: (reason?: string) => void): () => void {
    const listeners = this.connections.get(handle)?.closeListeners;
    listeners?.add(callback);
    return () => {
      listeners?.delete(callback);
    };
  }

  async disconnect(handle: ConnectionHandle): Promise<void> {
    const connection = this.connections.get(handle);
    if (!connection) return;
    connection.connected = false;
    connection.messageListeners.clear();
    connection.closeListeners.clear();
  }

  status(handle: ConnectionHandle): TransportStatus | undefined {
    const connection = this.connections.get(handle);
    if (!connection) return undefined;
    const status: TransportStatus = {
      connected: connection.connected,
      messagesSent: connection.messagesSent,
      messagesReceived: connection.messagesReceived,
    };
    if (connection.lastErrorCode !== undefined) {
      status.lastErrorCode = connection.lastErrorCode;
    }
    return status;
  }

  // --- Scripting ---

  /**
   * Push inbound text to every listener of a connection.
   */
  deliver(handle: ConnectionHandle, text: string): void {
    const connection = this.connections.get(handle);
    if (!connection || !connection.connected) {
      throw new Error(`Connection ${handle} is not open`);
    }
    connection.messagesReceived++;
    for (const listener of [...connection.messageListeners]) {
      listener(text);
    }
  }

  /**
   * Simulate the remote end dropping the connection.
   */
  close(handle: ConnectionHandle, reason?: string): void {
    const connection = this.connections.get(handle);
    if (!connection || !connection.connected) return;
    connection.connected = false;
    connection.lastErrorCode = 'DISCONNECTED';
    const listeners = [...connection.closeListeners];
    connection.messageListeners.clear();
    connection.closeListeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
  }

  /** Make the next `connect` call fail with `error`. */
  failNextConnect(error: string): void {
    this.connectFailures.push(error);
  }

  /** Make every send on `handle` fail until `clearSendFailure`. */
  failSends(handle: ConnectionHandle, error: string): void {
    this.sendFailures.set(handle, error);
  }

  clearSendFailure(handle: ConnectionHandle): void {
    this.sendFailures.delete(handle);
  }

  /**
   * Hold every `connect` call until the returned function is invoked.
   */
  holdConnects(): () => void {
    let release: () => void = () => undefined;
    this.connectGate = new Promise<void>((resolve) => {
      release = () => {
        this.connectGate = null;
        resolve();
      };
    });
    return release;
  }

  getConnectAttempts(): number {
    return this.connectAttempts;
  }

  isOpen(handle: ConnectionHandle): boolean {
    return this.connections.get(handle)?.connected ?? false;
  }

  listenerCount(handle: ConnectionHandle): number {
    return this.connections.get(handle)?.messageListeners.size ?? 0;
  }

  sentTo(handle: ConnectionHandle): string[] {
    return this.sent.filter((message) => message.handle === handle).map((message) => message.text);
  }

  configOf(handle: ConnectionHandle): ServerConfig | undefined {
    return this.connections.get(handle)?.config;
  }
}
