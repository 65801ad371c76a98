import { EventRouter } from '@cotmesh/core';
import { loadConfigFromEnv } from './config/env-schema';
import { FederationManager, FederationManagerConfig } from './federation/FederationManager';
import { MarkerStore, MarkerStoreConfig } from './markers/MarkerStore';
import { CotPipeline } from './pipeline/CotPipeline';
import type { CotTransport } from './transport/CotTransport';
import { logger } from './utils/logger';
import { TimerRegistry } from './utils/TimerRegistry';

export interface CotMeshOptions {
  transport: CotTransport;
  markerStore?: Partial<MarkerStoreConfig>;
  federation?: Partial<FederationManagerConfig>;
  /** Environment to read defaults from; `false` skips the environment. Default: process.env */
  env?: NodeJS.ProcessEnv | false;
}

export interface CotMesh {
  router: EventRouter;
  markerStore: MarkerStore;
  federation: FederationManager;
  pipeline: CotPipeline;
  timers: TimerRegistry;
  start(): void;
  shutdown(): Promise<void>;
}

/**
 * Build one independent instance of every component and wire federated
 * traffic into the pipeline. Explicit options win over the environment.
 */
export function createCotMesh(options: CotMeshOptions): CotMesh {
  const fromEnv = options.env === false ? undefined : loadConfigFromEnv(options.env ?? process.env);
  const timers = new TimerRegistry();

  const router = new EventRouter();
  const markerStore = new MarkerStore({ ...fromEnv?.markerStore, ...options.markerStore, timers });
  const federation = new FederationManager(options.transport, { ...fromEnv?.federation, ...options.federation, timers });
  const pipeline = new CotPipeline(router, markerStore);
  const detachFederation = pipeline.attachFederation(federation);

  let running = false;

  return {
    router,
    markerStore,
    federation,
    pipeline,
    timers,
    start() {
      if (running) return;
      running = true;
      markerStore.start();
      federation.start();
      logger.info('CotMesh started');
    },
    async shutdown() {
      running = false;
      markerStore.shutdown();
      await federation.shutdown();
      detachFederation();
      pipeline.dispose();
      router.dispose();
      const cleared = timers.clear();
      logger.info(cleared, 'CotMesh stopped');
    },
  };
}
