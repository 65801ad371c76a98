import type { CotEvent } from '../cot/types';
import { logger } from '../utils/logger';
import { classifyEvent } from './classify';
import type { EventKind, EventKindName, EventOfKind } from './types';

export type RouteListener<K extends EventKindName> = (routed: EventOfKind<K>) => void;
export type AnyRouteListener = (routed: EventKind) => void;

type ListenerTable = { [K in EventKindName]: Set<RouteListener<K>> };

/**
 * Typed publish/subscribe over classified events.
 *
 * Each listener registration returns a disposer. A throwing listener is
 * logged and does not prevent delivery to the others.
 */
export class EventRouter {
  private readonly listeners: ListenerTable = {
    position: new Set(),
    chat: new Set(),
    emergency: new Set(),
    waypoint: new Set(),
    unknown: new Set(),
  };
  private readonly anyListeners: Set<AnyRouteListener> = new Set();
  private readonly routedCounts: Record<EventKindName, number> = {
    position: 0,
    chat: 0,
    emergency: 0,
    waypoint: 0,
    unknown: 0,
  };

  /**
   * Classify an event and dispatch it. Returns the classification.
   */
  route(event: CotEvent): EventKind {
    const routed = classifyEvent(event);
    this.routedCounts[routed.kind]++;

    switch (routed.kind) {
      case 'position':
        this.notify('position', routed);
        break;
      case 'chat':
        this.notify('chat', routed);
        break;
      case 'emergency':
        this.notify('emergency', routed);
        break;
      case 'waypoint':
        this.notify('waypoint', routed);
        break;
      case 'unknown':
        this.notify('unknown', routed);
        break;
    }

    for (const listener of this.anyListeners) {
      try {
        listener(routed);
      } catch (e) {
        logger.error({ err: e, kind: routed.kind, uid: event.uid }, 'EventRouter listener error');
      }
    }

    return routed;
  }

  on<K extends EventKindName>(kind: K, listener: RouteListener<K>): () => void {
    const set: Set<RouteListener<K>> = this.listeners[kind];
    set.add(listener);
    return () => {
      set.delete(listener);
    };
  }

  onAny(listener: AnyRouteListener): () => void {
    this.anyListeners.add(listener);
    return () => {
      this.anyListeners.delete(listener);
    };
  }

  /**
   * Number of events routed per kind since construction.
   */
  getStats(): Record<EventKindName, number> {
    return { ...this.routedCounts };
  }

  getListenerCount(): number {
    let count = this.anyListeners.size;
    for (const set of Object.values(this.listeners)) {
      count += set.size;
    }
    return count;
  }

  dispose(): void {
    for (const set of Object.values(this.listeners)) {
      set.clear();
    }
    this.anyListeners.clear();
  }

  private notify<K extends EventKindName>(kind: K, routed: EventOfKind<K>): void {
    const set: Set<RouteListener<K>> = this.listeners[kind];
    for (const listener of set) {
      try {
        listener(routed);
      } catch (e) {
        logger.error({ err: e, kind, uid: routed.event.uid }, 'EventRouter listener error');
      }
    }
  }
}
