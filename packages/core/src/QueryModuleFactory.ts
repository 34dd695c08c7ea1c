/**
 * Wires the registry, refresher, index manager and engines for one
 * namespace from validated settings.
 *
 * @module QueryModuleFactory
 */

import { resolveSettings, type EngineSettings, type EngineSettingsInput } from './config/settings';
import { IndexManager } from './index/IndexManager';
import { IndexRefresher } from './index/IndexRefresher';
import { IndexRegistry } from './index/IndexRegistry';
import { ReactiveQueryEngine } from './query/ReactiveQueryEngine';
import type { StoreClient } from './store/StoreClient';
import type { ClockSource } from './utils/clock';
import { logger as rootLogger, type Logger } from './utils/logger';

export interface QueryModule {
  readonly settings: EngineSettings;
  readonly registry: IndexRegistry;
  readonly refresher: IndexRefresher;
  readonly indexManager: IndexManager;
  readonly engine: ReactiveQueryEngine;
  /** Initial index load plus scheduled refresh */
  start(): Promise<void>;
  stop(): void;
}

export interface QueryModuleOptions {
  clock?: ClockSource;
  logger?: Logger;
}

export function createQueryModule(
  client: StoreClient,
  input: EngineSettingsInput,
  options: QueryModuleOptions = {}
): QueryModule {
  const settings = resolveSettings(input);
  const log = options.logger ?? rootLogger;
  const registry = new IndexRegistry();
  const refresher = new IndexRefresher(client, registry, {
    namespace: settings.namespace,
    refreshIntervalSeconds: settings.indexCacheRefreshSeconds,
    logger: log.child({ component: 'IndexRefresher' }),
  });
  const indexManager = new IndexManager(client, registry, refresher, {
    namespace: settings.namespace,
    logger: log.child({ component: 'IndexManager' }),
  });
  const engine = new ReactiveQueryEngine(client, registry, {
    scansEnabled: settings.scansEnabled,
    queryMaxRecords: settings.queryMaxRecords,
    logger: log.child({ component: 'QueryEngine' }),
    ...(options.clock ? { clock: options.clock } : {}),
  });

  return {
    settings,
    registry,
    refresher,
    indexManager,
    engine,
    async start() {
      await refresher.refreshIndexes();
      refresher.start();
    },
    stop() {
      refresher.stop();
    },
  };
}
