/**
 * FederationManager - bridges CoT traffic between several TAK servers.
 *
 * Each registered server has its own connection, status and data-sharing
 * policy. Inbound events are filtered by the source server's receive
 * policy, deduplicated by uid into a cache, and (with `autoShare`) fanned
 * out to every other connected server whose send policy admits them.
 *
 * Fan-out is at most once per cache entry per peer: a peer is reserved
 * synchronously before the send starts and recorded in `sharedTo` once the
 * send succeeds. Peers that supplied a uid are never sent it back.
 *
 * Connection failures are values (status `error` plus `lastError`), never
 * exceptions.
 */

import { z } from 'zod';
import {
  CotEvent,
  CotStreamFramer,
  DataSharingPolicy,
  DataSharingPolicySchema,
  mergePolicy,
  parseCot,
  serializeCot,
  ServerConfig,
  ServerConfigSchema,
  shouldReceive,
  shouldSend,
} from '@cotmesh/core';
import { ConfigValidationError, DuplicateServerError, UnknownServerError } from '../errors';
import type { ConnectionHandle, CotTransport, TransportConnectResult, TransportSendResult, TransportStatus } from '../transport/CotTransport';
import { logger } from '../utils/logger';
import { RateLimitedLogger } from '../utils/RateLimitedLogger';
import { TimerRegistry } from '../utils/TimerRegistry';
import type {
  ConnectionErrorCode,
  ConnectResult,
  FederatedCotEvent,
  FederatedEventListener,
  FederatedServer,
  IncomingOutcome,
  IncomingResult,
  SendReport,
  ServerStatus,
  ServerStatusListener,
} from './types';

export const FederationManagerConfigSchema = z.object({
  cacheRetentionMs: z.number().int().nonnegative(),
  cachePruneIntervalMs: z.number().int().positive(),
  maxMessageLength: z.number().int().positive(),
});

export interface FederationManagerConfig extends z.infer<typeof FederationManagerConfigSchema> {
  /** Time source. Default: Date.now */
  clock: () => number;
}

export const DEFAULT_FEDERATION_MANAGER_CONFIG: FederationManagerConfig = {
  cacheRetentionMs: 60000,
  cachePruneIntervalMs: 30000,
  maxMessageLength: 1024 * 1024,
  clock: Date.now,
};

export interface FederationManagerOptions extends Partial<FederationManagerConfig> {
  timers?: TimerRegistry;
  /** Logger for peer parse failures; rate limited per server by default */
  parseFailureLogger?: RateLimitedLogger;
}

interface CacheEntry extends FederatedCotEvent {
  /** Peers with a send in progress */
  inFlight: Set<string>;
}

interface ServerRecord {
  server: FederatedServer;
  handle?: ConnectionHandle;
  subscriptions: Array<() => void>;
  framer: CotStreamFramer;
  pendingConnect?: Promise<ConnectResult>;
  /** Bumped by every disconnect; a connect that finishes under an older generation is discarded */
  generation: number;
}

const PRUNE_TIMER_ID = 'federation-cache-prune';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function copyPolicy(policy: DataSharingPolicy): DataSharingPolicy {
  return { ...policy, receiveTypes: [...policy.receiveTypes], sendTypes: [...policy.sendTypes] };
}

function copyServer(server: FederatedServer): FederatedServer {
  return {
    ...server,
    config: { ...server.config },
    policy: copyPolicy(server.policy),
    stats: { ...server.stats },
  };
}

function copyEntry(entry: CacheEntry): FederatedCotEvent {
  return {
    event: structuredClone(entry.event),
    sourceServerId: entry.sourceServerId,
    sourceServerName: entry.sourceServerName,
    receivedAt: entry.receivedAt,
    sharedTo: new Set(entry.sharedTo),
    receivedFrom: new Set(entry.receivedFrom),
  };
}

function ignored(outcome: IncomingOutcome, uid?: string): IncomingResult {
  const result: IncomingResult = { outcome, fanOut: Promise.resolve([]) };
  if (uid !== undefined) {
    result.uid = uid;
  }
  return result;
}

export class FederationManager {
  private readonly config: FederationManagerConfig;
  private readonly clock: () => number;
  private readonly timers: TimerRegistry;
  private readonly parseFailureLogger: RateLimitedLogger;
  private readonly servers: Map<string, ServerRecord> = new Map();
  private readonly cache: Map<string, CacheEntry> = new Map();
  private readonly eventListeners: Set<FederatedEventListener> = new Set();
  private readonly statusListeners: Set<ServerStatusListener> = new Set();
  private activeSends = 0;
  private idleWaiters: Array<() => void> = [];
  private started = false;

  constructor(
    private readonly transport: CotTransport,
    options: FederationManagerOptions = {}
  ) {
    const { timers, parseFailureLogger, ...overrides } = options;
    const config: FederationManagerConfig = { ...DEFAULT_FEDERATION_MANAGER_CONFIG, ...overrides };

    const result = FederationManagerConfigSchema.safeParse(config);
    if (!result.success) {
      throw new ConfigValidationError('federation manager config', result.error.issues);
    }

    this.config = config;
    this.clock = config.clock;
    this.timers = timers ?? new TimerRegistry();
    this.parseFailureLogger = parseFailureLogger ?? new RateLimitedLogger({ clock: config.clock });
  }

  // --- Lifecycle ---

  /**
   * Schedule periodic cache pruning. The same tick flushes parse-failure
   * summaries for peers that went quiet.
   */
  start(): void {
    if (this.started) return;
    this.started = true;
    this.timers.setInterval(() => {
      this.pruneCache();
      this.parseFailureLogger.cleanup();
    }, this.config.cachePruneIntervalMs, PRUNE_TIMER_ID);
    logger.info(
      { cacheRetentionMs: this.config.cacheRetentionMs, cachePruneIntervalMs: this.config.cachePruneIntervalMs },
      'FederationManager started'
    );
  }

  /**
   * Stop pruning, disconnect every server and wait for in-flight sends.
   */
  async shutdown(): Promise<void> {
    if (this.started) {
      this.started = false;
      this.timers.clearInterval(PRUNE_TIMER_ID);
    }
    await this.disconnectAll();
    await this.whenIdle();
    logger.info('FederationManager stopped');
  }

  /**
   * Resolves when no send is in progress.
   */
  whenIdle(): Promise<void> {
    if (this.activeSends === 0) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  // --- Server registry ---

  /**
   * Register a server. Does not connect.
   *
   * @throws ConfigValidationError for an invalid config or policy
   * @throws DuplicateServerError when `id` is already registered
   */
  addServer(id: string, name: string, config: ServerConfig, policy: Partial<DataSharingPolicy> = {}): FederatedServer {
    if (this.servers.has(id)) {
      throw new DuplicateServerError(id);
    }

    const parsedConfig = ServerConfigSchema.safeParse(config);
    if (!parsedConfig.success) {
      throw new ConfigValidationError(`server config for ${id}`, parsedConfig.error.issues);
    }
    const parsedPolicy = DataSharingPolicySchema.safeParse(mergePolicy(policy));
    if (!parsedPolicy.success) {
      throw new ConfigValidationError(`sharing policy for ${id}`, parsedPolicy.error.issues);
    }

    const record: ServerRecord = {
      server: {
        id,
        name,
        config: parsedConfig.data,
        policy: parsedPolicy.data,
        status: 'disconnected',
        stats: {
          messagesReceived: 0,
          eventsAccepted: 0,
          policyRejected: 0,
          parseErrors: 0,
          messagesSent: 0,
          sendFailures: 0,
        },
      },
      subscriptions: [],
      framer: new CotStreamFramer({ maxBufferLength: this.config.maxMessageLength }),
      generation: 0,
    };
    this.servers.set(id, record);

    logger.info({ serverId: id, name, host: config.host, port: config.port, protocol: config.protocol }, 'Federated server added');
    return copyServer(record.server);
  }

  /**
   * Disconnect and unregister a server. Cache entries keep their ledgers.
   * @returns Whether the server existed
   */
  async removeServer(id: string): Promise<boolean> {
    if (!this.servers.has(id)) {
      return false;
    }
    await this.disconnectServer(id);
    this.servers.delete(id);
    this.parseFailureLogger.forget(`parse-failure:${id}`);
    for (const entry of this.cache.values()) {
      entry.inFlight.delete(id);
    }
    logger.info({ serverId: id }, 'Federated server removed');
    return true;
  }

  /**
   * Merge `overrides` onto the server's current policy.
   */
  updatePolicy(id: string, overrides: Partial<DataSharingPolicy>): FederatedServer {
    const record = this.requireRecord(id);
    const parsed = DataSharingPolicySchema.safeParse(mergePolicy(overrides, record.server.policy));
    if (!parsed.success) {
      throw new ConfigValidationError(`sharing policy for ${id}`, parsed.error.issues);
    }
    record.server.policy = parsed.data;
    logger.info({ serverId: id, policy: parsed.data }, 'Sharing policy updated');
    return copyServer(record.server);
  }

  getServers(): FederatedServer[] {
    return [...this.servers.values()].map((record) => copyServer(record.server));
  }

  getServer(id: string): FederatedServer | undefined {
    const record = this.servers.get(id);
    return record ? copyServer(record.server) : undefined;
  }

  getConnectedCount(): number {
    let count = 0;
    for (const record of this.servers.values()) {
      if (record.server.status === 'connected') count++;
    }
    return count;
  }

  getTransportStatus(id: string): TransportStatus | undefined {
    const handle = this.servers.get(id)?.handle;
    return handle === undefined ? undefined : this.transport.status(handle);
  }

  // --- Connections ---

  /**
   * Connect a server. Already connected: immediate success. A connect in
   * progress is shared with every caller.
   *
   * @throws UnknownServerError
   */
  async connectServer(id: string): Promise<ConnectResult> {
    const record = this.requireRecord(id);
    if (record.server.status === 'connected') {
      return { success: true };
    }
    if (record.pendingConnect) {
      return record.pendingConnect;
    }

    const attempt = this.openConnection(record);
    record.pendingConnect = attempt;
    try {
      return await attempt;
    } finally {
      if (record.pendingConnect === attempt) {
        record.pendingConnect = undefined;
      }
    }
  }

  /**
   * Unsubscribe from the inbound stream, mark the server disconnected and
   * close the transport connection. Idempotent. A connect still in progress
   * is abandoned and its connection closed when it arrives.
   */
  async disconnectServer(id: string): Promise<void> {
    const record = this.requireRecord(id);
    record.generation++;
    // The abandoned attempt must not answer later connectServer calls.
    record.pendingConnect = undefined;

    const handle = record.handle;
    this.teardown(record);
    this.setStatus(record, 'disconnected');

    if (handle !== undefined) {
      await this.closeHandle(id, handle);
      logger.info({ serverId: id }, 'Federated server disconnected');
    }
  }

  async connectAll(): Promise<Record<string, ConnectResult>> {
    const ids = [...this.servers.keys()];
    const results = await Promise.all(ids.map((id) => this.connectServer(id)));
    const byId: Record<string, ConnectResult> = {};
    ids.forEach((id, i) => {
      byId[id] = results[i];
    });
    return byId;
  }

  async disconnectAll(): Promise<void> {
    await Promise.all([...this.servers.keys()].map((id) => this.disconnectServer(id)));
  }

  // --- Inbound ---

  /**
   * Process one CoT document received from `serverId`. Bad input and
   * policy rejections are reported in the result and otherwise dropped.
   */
  handleIncoming(serverId: string, rawText: string): IncomingResult {
    const record = this.servers.get(serverId);
    if (!record) {
      logger.debug({ serverId }, 'Message for unknown server ignored');
      return ignored('unknown_server');
    }

    const server = record.server;
    if (server.status !== 'connected') {
      logger.debug({ serverId, status: server.status }, 'Message for server that is not connected ignored');
      return ignored('not_connected');
    }
    server.stats.messagesReceived++;

    const parsed = parseCot(rawText);
    if (!parsed.success) {
      server.stats.parseErrors++;
      this.parseFailureLogger.warn(
        `parse-failure:${serverId}`,
        { serverId, code: parsed.error.code, field: parsed.error.field, reason: parsed.error.message },
        'Dropping unparseable CoT from peer'
      );
      return ignored('parse_error');
    }

    const event = parsed.event;
    if (!shouldReceive(server.policy, event)) {
      server.stats.policyRejected++;
      logger.debug({ serverId, uid: event.uid, type: event.type }, 'Inbound event rejected by policy');
      return ignored('policy_rejected', event.uid);
    }

    server.stats.eventsAccepted++;
    const entry = this.upsert(server, event);
    this.notifyFederatedEvent(entry, serverId);

    const fanOut = server.policy.autoShare ? this.fanOut(entry) : Promise.resolve([]);
    return { outcome: 'accepted', uid: event.uid, fanOut };
  }

  // --- Outbound ---

  /**
   * Send a locally originated event to every registered server the policy allows.
   */
  broadcast(event: CotEvent): Promise<SendReport[]> {
    return this.sendToServers(event, [...this.servers.keys()]);
  }

  sendToServers(event: CotEvent, ids: string[]): Promise<SendReport[]> {
    let text: string | undefined;
    const reports = ids.map(async (serverId): Promise<SendReport> => {
      const record = this.servers.get(serverId);
      if (!record) {
        return { serverId, outcome: 'unknown_server' };
      }
      if (record.server.status !== 'connected') {
        return { serverId, outcome: 'not_connected' };
      }
      if (!shouldSend(record.server.policy, event)) {
        logger.debug({ serverId, uid: event.uid, type: event.type }, 'Outbound event rejected by policy');
        return { serverId, outcome: 'policy_rejected' };
      }

      text ??= serializeCot(event);
      const result = await this.sendText(record, text);
      return result.ok ? { serverId, outcome: 'sent' } : { serverId, outcome: 'failed', error: result.error };
    });
    return Promise.all(reports);
  }

  // --- Cache ---

  getFederatedEvents(): FederatedCotEvent[] {
    return [...this.cache.values()].map(copyEntry);
  }

  getCachedEvent(uid: string): FederatedCotEvent | undefined {
    const entry = this.cache.get(uid);
    return entry ? copyEntry(entry) : undefined;
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  /**
   * Drop entries whose event went stale more than `cacheRetentionMs` ago.
   * A uid reported again after pruning starts with an empty ledger.
   *
   * @returns Number of entries removed
   */
  pruneCache(now: number = this.clock()): number {
    let removed = 0;
    for (const [uid, entry] of this.cache) {
      if (entry.event.stale + this.config.cacheRetentionMs < now) {
        this.cache.delete(uid);
        removed++;
      }
    }
    if (removed > 0) {
      logger.debug({ removed, remaining: this.cache.size }, 'Federation cache pruned');
    }
    return removed;
  }

  // --- Subscriptions ---

  onFederatedEvent(listener: FederatedEventListener): () => void {
    this.eventListeners.add(listener);
    return () => {
      this.eventListeners.delete(listener);
    };
  }

  onStatusChange(listener: ServerStatusListener): () => void {
    this.statusListeners.add(listener);
    return () => {
      this.statusListeners.delete(listener);
    };
  }

  // --- Internals ---

  private requireRecord(id: string): ServerRecord {
    const record = this.servers.get(id);
    if (!record) {
      throw new UnknownServerError(id);
    }
    return record;
  }

  private async openConnection(record: ServerRecord): Promise<ConnectResult> {
    const { server } = record;
    const generation = record.generation;
    this.setStatus(record, 'connecting');

    let result: TransportConnectResult;
    try {
      result = await this.transport.connect(server.config);
    } catch (e) {
      result = { ok: false, error: errorMessage(e) };
    }

    if (record.generation !== generation || this.servers.get(server.id) !== record) {
      if (result.ok) {
        await this.closeHandle(server.id, result.handle);
      }
      logger.info({ serverId: server.id }, 'Connect abandoned by disconnect');
      return { success: false, code: 'DISCONNECTED', error: 'Disconnected while connecting' };
    }

    if (!result.ok) {
      this.recordError(record, 'CONNECT_FAILED', result.error);
      this.setStatus(record, 'error');
      logger.warn({ serverId: server.id, host: server.config.host, error: result.error }, 'Federated server connect failed');
      return { success: false, code: 'CONNECT_FAILED', error: result.error };
    }

    const handle = result.handle;
    record.handle = handle;
    server.connectionId = handle;
    record.framer.reset();
    record.subscriptions.push(
      this.transport.onMessage(handle, (text) => {
        this.onTransportText(record, handle, text);
      })
    );
    if (this.transport.onClose) {
      record.subscriptions.push(
        this.transport.onClose(handle, (reason) => {
          this.onTransportClose(record, handle, reason);
        })
      );
    }

    delete server.lastError;
    delete server.lastErrorCode;
    this.setStatus(record, 'connected');
    logger.info({ serverId: server.id, host: server.config.host, port: server.config.port }, 'Federated server connected');
    return { success: true };
  }

  private onTransportText(record: ServerRecord, handle: ConnectionHandle, text: string): void {
    if (record.handle !== handle) return;

    const overflowsBefore = record.framer.getOverflowCount();
    const documents = record.framer.push(text);
    if (record.framer.getOverflowCount() !== overflowsBefore) {
      this.parseFailureLogger.warn(
        `parse-failure:${record.server.id}`,
        { serverId: record.server.id, maxMessageLength: this.config.maxMessageLength },
        'Inbound buffer overflow, partial message discarded'
      );
    }

    for (const document of documents) {
      const result = this.handleIncoming(record.server.id, document);
      result.fanOut.catch((e: unknown) => {
        logger.error({ err: e, serverId: record.server.id }, 'Fan-out failed');
      });
    }
  }

  private onTransportClose(record: ServerRecord, handle: ConnectionHandle, reason?: string): void {
    if (record.handle !== handle) return;

    this.teardown(record);
    this.recordError(record, 'DISCONNECTED', reason ?? 'Connection closed by transport');
    this.setStatus(record, 'error');
    logger.warn({ serverId: record.server.id, reason }, 'Federated server connection lost');
  }

  private teardown(record: ServerRecord): void {
    for (const unsubscribe of record.subscriptions) {
      try {
        unsubscribe();
      } catch (e) {
        logger.warn({ err: e, serverId: record.server.id }, 'Transport unsubscribe failed');
      }
    }
    record.subscriptions = [];
    record.handle = undefined;
    delete record.server.connectionId;
    record.framer.reset();
  }

  private async closeHandle(serverId: string, handle: ConnectionHandle): Promise<void> {
    try {
      await this.transport.disconnect(handle);
    } catch (e) {
      logger.warn({ err: e, serverId }, 'Transport disconnect failed');
    }
  }

  private recordError(record: ServerRecord, code: ConnectionErrorCode, message: string): void {
    record.server.lastError = message;
    record.server.lastErrorCode = code;
  }

  private setStatus(record: ServerRecord, status: ServerStatus): void {
    const previous = record.server.status;
    if (previous === status) return;
    record.server.status = status;

    const snapshot = copyServer(record.server);
    for (const listener of this.statusListeners) {
      try {
        listener(snapshot, previous);
      } catch (e) {
        logger.error({ err: e, serverId: snapshot.id }, 'Status listener error');
      }
    }
  }

  private upsert(server: FederatedServer, event: CotEvent): CacheEntry {
    const now = this.clock();
    const existing = this.cache.get(event.uid);
    if (existing) {
      existing.event = event;
      existing.sourceServerId = server.id;
      existing.sourceServerName = server.name;
      existing.receivedAt = now;
      existing.receivedFrom.add(server.id);
      return existing;
    }

    const entry: CacheEntry = {
      event,
      sourceServerId: server.id,
      sourceServerName: server.name,
      receivedAt: now,
      sharedTo: new Set(),
      receivedFrom: new Set([server.id]),
      inFlight: new Set(),
    };
    this.cache.set(event.uid, entry);
    return entry;
  }

  private notifyFederatedEvent(entry: CacheEntry, serverId: string): void {
    if (this.eventListeners.size === 0) return;
    const copy = copyEntry(entry);
    for (const listener of this.eventListeners) {
      try {
        listener(copy, serverId);
      } catch (e) {
        logger.error({ err: e, serverId, uid: entry.event.uid }, 'Federated event listener error');
      }
    }
  }

  private fanOut(entry: CacheEntry): Promise<SendReport[]> {
    const event = entry.event;
    let text: string | undefined;
    const reports: Array<Promise<SendReport>> = [];

    for (const record of this.servers.values()) {
      const serverId = record.server.id;
      if (entry.receivedFrom.has(serverId)) {
        continue;
      }
      if (entry.sharedTo.has(serverId) || entry.inFlight.has(serverId)) {
        reports.push(Promise.resolve<SendReport>({ serverId, outcome: 'already_shared' }));
        continue;
      }
      if (record.server.status !== 'connected') {
        reports.push(Promise.resolve<SendReport>({ serverId, outcome: 'not_connected' }));
        continue;
      }
      if (!shouldSend(record.server.policy, event)) {
        logger.debug({ serverId, uid: event.uid, type: event.type }, 'Fan-out rejected by policy');
        reports.push(Promise.resolve<SendReport>({ serverId, outcome: 'policy_rejected' }));
        continue;
      }

      text ??= serializeCot(event);
      entry.inFlight.add(serverId);
      reports.push(
        this.sendText(record, text).then((result): SendReport => {
          entry.inFlight.delete(serverId);
          if (result.ok) {
            entry.sharedTo.add(serverId);
            return { serverId, outcome: 'sent' };
          }
          return { serverId, outcome: 'failed', error: result.error };
        })
      );
    }

    return Promise.all(reports);
  }

  private async sendText(record: ServerRecord, text: string): Promise<TransportSendResult> {
    const handle = record.handle;
    if (handle === undefined) {
      return { ok: false, error: 'Not connected' };
    }

    this.activeSends++;
    try {
      let result: TransportSendResult;
      try {
        result = await this.transport.send(handle, text);
      } catch (e) {
        result = { ok: false, error: errorMessage(e) };
      }

      if (result.ok) {
        record.server.stats.messagesSent++;
      } else {
        record.server.stats.sendFailures++;
        this.recordError(record, 'SEND_FAILED', result.error);
        logger.warn({ serverId: record.server.id, error: result.error }, 'Send to federated server failed');
      }
      return result;
    } finally {
      this.activeSends--;
      if (this.activeSends === 0) {
        const waiters = this.idleWaiters;
        this.idleWaiters = [];
        for (const resolve of waiters) resolve();
      }
    }
  }
}
