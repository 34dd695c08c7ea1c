/**
 * IndexManager
 *
 * Creates and drops secondary indexes through the store and keeps the
 * registry in step via the IndexRefresher. Also installs the indexes the
 * mapping layer declares for its entities.
 *
 * "Already exists" on create and "not found" on drop already match the
 * requested end state: they are logged and swallowed. Anything else is
 * rethrown as IndexOperationError.
 *
 * @module index/IndexManager
 */

import { contextToBase64 } from '../context/ContextCodec';
import { EMPTY_CONTEXT, type ContextPath } from '../context/ContextPath';
import { parseContextPath } from '../context/ContextPathParser';
import { IndexOperationError, StoreError } from '../errors';
import { ResultCode, type StoreClient } from '../store/StoreClient';
import { componentLogger, type Logger } from '../utils/logger';
import type { IndexRefresher } from './IndexRefresher';
import type { IndexRegistry } from './IndexRegistry';
import {
  defaultIndexName,
  fieldOfDescriptor,
  type IndexCollectionType,
  type IndexDeclaration,
  type IndexDescriptor,
  type IndexValueType,
} from './IndexTypes';

export interface CreateIndexParams {
  set: string;
  bin: string;
  indexType: IndexValueType;
  collectionType?: IndexCollectionType;
  /** Defaults to `<set>_<bin>_<type>_<collectionType>`, lowercase */
  name?: string;
  context?: ContextPath;
}

export interface IndexManagerOptions {
  namespace: string;
  logger?: Logger;
}

export class IndexManager {
  private readonly namespace: string;
  private readonly log: Logger;

  constructor(
    private readonly client: StoreClient,
    private readonly registry: IndexRegistry,
    private readonly refresher: IndexRefresher,
    options: IndexManagerOptions
  ) {
    this.namespace = options.namespace;
    this.log = options.logger ?? componentLogger('IndexManager');
  }

  /**
   * Create an index and register it.
   *
   * @returns the descriptor now registered for the index
   * @throws IndexOperationError for any store failure other than "already exists"
   */
  async createIndex(params: CreateIndexParams): Promise<IndexDescriptor> {
    const collectionType = params.collectionType ?? 'DEFAULT';
    const context = params.context ?? EMPTY_CONTEXT;
    const descriptor: IndexDescriptor = {
      name: params.name ?? defaultIndexName(params.set, params.bin, params.indexType, collectionType),
      namespace: this.namespace,
      set: params.set,
      bin: params.bin,
      context,
      indexType: params.indexType,
      collectionType,
    };

    try {
      await this.client.createIndex({
        namespace: descriptor.namespace,
        set: descriptor.set,
        name: descriptor.name,
        bin: descriptor.bin,
        indexType: descriptor.indexType,
        collectionType: descriptor.collectionType,
        ...(context.length > 0 ? { context: contextToBase64(context) } : {}),
      });
      this.log.info({ index: descriptor.name, set: descriptor.set, bin: descriptor.bin }, 'Index created');
    } catch (err) {
      if (!(err instanceof StoreError && err.resultCode === ResultCode.INDEX_ALREADY_EXISTS)) {
        throw new IndexOperationError(`Failed to create index '${descriptor.name}'`, descriptor.name, {
          cause: err,
        });
      }
      this.log.warn({ index: descriptor.name }, 'Index already exists, skipping creation');
    }

    this.refresher.registerIndex(descriptor);
    return descriptor;
  }

  /**
   * Drop an index by name and unregister it.
   *
   * @returns true if the index existed in the registry
   * @throws IndexOperationError for any store failure other than "not found"
   */
  async dropIndex(set: string, name: string): Promise<boolean> {
    try {
      await this.client.dropIndex(this.namespace, set, name);
      this.log.info({ index: name, set }, 'Index dropped');
    } catch (err) {
      if (!(err instanceof StoreError && err.resultCode === ResultCode.INDEX_NOTFOUND)) {
        throw new IndexOperationError(`Failed to drop index '${name}'`, name, { cause: err });
      }
      this.log.warn({ index: name }, 'Index not found, nothing to drop');
    }

    const registered = this.registry.findByName(this.namespace, name);
    return registered ? this.refresher.unregisterIndex(fieldOfDescriptor(registered), name) : false;
  }

  /**
   * Install declared indexes, then reload the registry from the store.
   * Context strings are parsed up front so a malformed declaration fails
   * before any index is created.
   *
   * @throws InvalidContextSyntaxError for a malformed `ctx`
   */
  async installDeclaredIndexes(declarations: readonly IndexDeclaration[]): Promise<IndexDescriptor[]> {
    const params: CreateIndexParams[] = declarations.map((d) => ({
      set: d.set,
      bin: d.bin,
      indexType: d.indexType,
      ...(d.collectionType ? { collectionType: d.collectionType } : {}),
      ...(d.name ? { name: d.name } : {}),
      ...(d.ctx ? { context: parseContextPath(d.ctx) } : {}),
    }));

    const created: IndexDescriptor[] = [];
    for (const p of params) {
      created.push(await this.createIndex(p));
    }
    await this.refresher.refreshIndexes();
    return created;
  }
}
