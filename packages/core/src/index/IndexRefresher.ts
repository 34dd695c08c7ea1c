/**
 * IndexRefresher
 *
 * Loads index metadata from the store and swaps it into the IndexRegistry,
 * on demand or on a fixed interval. It is the only writer of the registry:
 * incremental updates after create/drop go through it as well.
 *
 * A failed refresh leaves the registry untouched. A load that overlaps a
 * register or unregister is repeated, so its older snapshot never wipes the
 * incremental update.
 *
 * @module index/IndexRefresher
 */

import { contextFromBase64 } from '../context/ContextCodec';
import { EMPTY_CONTEXT } from '../context/ContextPath';
import type { StoreClient } from '../store/StoreClient';
import { componentLogger, type Logger } from '../utils/logger';
import type { IndexRegistry } from './IndexRegistry';
import {
  IndexMetadataSchema,
  type IndexDescriptor,
  type IndexedField,
  type IndexMetadata,
} from './IndexTypes';

export interface IndexRefresherOptions {
  namespace: string;
  /** Scheduled refresh interval; 0 or negative disables scheduling */
  refreshIntervalSeconds?: number;
  logger?: Logger;
}

/**
 * Converts store metadata into a registry descriptor.
 *
 * @throws ZodError or InvalidContextSyntaxError for malformed metadata
 */
export function descriptorFromMetadata(metadata: IndexMetadata): IndexDescriptor {
  const parsed = IndexMetadataSchema.parse(metadata);
  return {
    name: parsed.name,
    namespace: parsed.namespace,
    set: parsed.set,
    bin: parsed.bin,
    context: parsed.context ? contextFromBase64(parsed.context) : EMPTY_CONTEXT,
    indexType: parsed.indexType,
    collectionType: parsed.collectionType,
  };
}

export class IndexRefresher {
  private readonly namespace: string;
  private readonly intervalMs: number;
  private readonly log: Logger;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<boolean> | null = null;
  private trailing: Promise<boolean> | null = null;
  /** Bumped on every incremental registry write */
  private generation = 0;

  constructor(
    private readonly client: StoreClient,
    private readonly registry: IndexRegistry,
    options: IndexRefresherOptions
  ) {
    this.namespace = options.namespace;
    this.intervalMs = Math.max(0, options.refreshIntervalSeconds ?? 0) * 1000;
    this.log = options.logger ?? componentLogger('IndexRefresher');
  }

  get isScheduled(): boolean {
    return this.timer !== null;
  }

  /**
   * Reload all indexes of the namespace. A call made while a refresh is in
   * flight gets one trailing refresh that starts after it, shared with any
   * other caller arriving in the meantime.
   *
   * @returns true if the registry was replaced, false if the refresh failed
   */
  refreshIndexes(): Promise<boolean> {
    if (!this.inFlight) {
      this.inFlight = this.loadIndexes().finally(() => {
        this.inFlight = null;
      });
      return this.inFlight;
    }
    if (!this.trailing) {
      this.trailing = this.inFlight.then(() => {
        this.trailing = null;
        return this.refreshIndexes();
      });
    }
    return this.trailing;
  }

  /**
   * Timer entry point. Never rejects; failures are logged by refreshIndexes.
   */
  scheduledRefresh(): void {
    void this.refreshIndexes();
  }

  /**
   * Start the periodic refresh. No-op when the interval is disabled or the
   * timer already runs.
   */
  start(): void {
    if (this.intervalMs <= 0 || this.timer) return;
    this.timer = setInterval(() => this.scheduledRefresh(), this.intervalMs);
    this.timer.unref();
    this.log.info({ namespace: this.namespace, intervalMs: this.intervalMs }, 'Index refresh scheduled');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.log.info({ namespace: this.namespace }, 'Index refresh stopped');
  }

  registerIndex(descriptor: IndexDescriptor): void {
    this.generation++;
    this.registry.add(descriptor);
    this.log.debug({ index: descriptor.name }, 'Index registered');
  }

  unregisterIndex(field: IndexedField, name: string): boolean {
    this.generation++;
    const removed = this.registry.remove(field, name);
    this.log.debug({ index: name, removed }, 'Index unregistered');
    return removed;
  }

  clearCache(): void {
    this.generation++;
    this.registry.clear();
  }

  private async loadIndexes(): Promise<boolean> {
    for (;;) {
      const generation = this.generation;
      let descriptors: IndexDescriptor[];
      try {
        const metadata = await this.client.listIndexes(this.namespace);
        descriptors = metadata.map(descriptorFromMetadata);
      } catch (err) {
        this.log.warn(
          { err, namespace: this.namespace, cached: this.registry.size },
          'Index refresh failed, keeping cached indexes'
        );
        return false;
      }

      if (generation !== this.generation) {
        this.log.debug({ namespace: this.namespace }, 'Registry changed during refresh, reloading');
        continue;
      }
      this.registry.replaceAll(descriptors);
      this.log.debug({ namespace: this.namespace, count: descriptors.length }, 'Index cache refreshed');
      return true;
    }
  }
}
