import {
  CotEvent,
  CotParseError,
  CotStreamFramer,
  EventKind,
  EventRouter,
  getDeleteTargets,
  isDeleteEvent,
  parseCot,
} from '@cotmesh/core';
import type { FederationManager } from '../federation/FederationManager';
import type { MarkerStore } from '../markers/MarkerStore';
import { logger } from '../utils/logger';

export type PipelineResult =
  | { ok: true; routed: EventKind }
  | { ok: false; error: CotParseError };

export interface PipelineStats {
  received: number;
  parseErrors: number;
  routed: number;
  deletes: number;
}

/**
 * Inbound data flow: text → codec → router → Marker Store.
 *
 * Position reports are ingested by a router subscription, so any other
 * router subscriber sees the same events. `t-x-d-d` deletes remove their
 * targets from the store before routing.
 */
export class CotPipeline {
  private readonly disposers: Array<() => void> = [];
  private readonly stats: PipelineStats = { received: 0, parseErrors: 0, routed: 0, deletes: 0 };

  constructor(
    private readonly router: EventRouter,
    private readonly store: MarkerStore
  ) {
    this.disposers.push(
      router.on('position', ({ event }) => {
        this.store.ingest(event);
      })
    );
  }

  handleText(raw: string): PipelineResult {
    this.stats.received++;
    const parsed = parseCot(raw);
    if (!parsed.success) {
      this.stats.parseErrors++;
      logger.warn({ code: parsed.error.code, field: parsed.error.field }, 'Dropping unparseable CoT');
      return { ok: false, error: parsed.error };
    }
    if (parsed.warnings.length > 0) {
      logger.debug({ uid: parsed.event.uid, warnings: parsed.warnings }, 'CoT parsed with warnings');
    }
    return { ok: true, routed: this.handleEvent(parsed.event) };
  }

  handleEvent(event: CotEvent): EventKind {
    if (isDeleteEvent(event)) {
      for (const uid of getDeleteTargets(event)) {
        if (this.store.remove(uid, 'deleted')) {
          this.stats.deletes++;
        }
      }
    }
    this.stats.routed++;
    return this.router.route(event);
  }

  /**
   * Returns a chunk handler for a raw text stream (TCP, file replay).
   */
  createStreamHandler(framer: CotStreamFramer = new CotStreamFramer()): (chunk: string) => PipelineResult[] {
    return (chunk) => framer.push(chunk).map((document) => this.handleText(document));
  }

  /**
   * Feed every event the federation layer accepts into this pipeline.
   */
  attachFederation(federation: FederationManager): () => void {
    const detach = federation.onFederatedEvent((entry) => {
      this.handleEvent(entry.event);
    });
    this.disposers.push(detach);
    return detach;
  }

  getStats(): PipelineStats {
    return { ...this.stats };
  }

  dispose(): void {
    for (const dispose of this.disposers.splice(0)) {
      dispose();
    }
  }
}
