/**
 * Index Types
 *
 * Descriptors for the store's secondary indexes as cached by the
 * IndexRegistry, plus the raw metadata shape reported by the store.
 *
 * @module index/IndexTypes
 */

import { z } from 'zod';
import { EMPTY_CONTEXT, formatContextPath, type ContextPath } from '../context/ContextPath';

export const IndexValueTypeSchema = z.enum(['STRING', 'NUMERIC', 'GEO2DSPHERE', 'BLOB']);
export const IndexCollectionTypeSchema = z.enum(['DEFAULT', 'LIST', 'MAPKEYS', 'MAPVALUES']);

export type IndexValueType = z.infer<typeof IndexValueTypeSchema>;
export type IndexCollectionType = z.infer<typeof IndexCollectionTypeSchema>;

/**
 * Target of a (potential) index: a bin inside a set, optionally narrowed
 * to a nested value by a context path.
 */
export interface IndexedField {
  readonly namespace: string;
  readonly set: string;
  readonly bin: string;
  readonly context?: ContextPath;
}

export interface IndexDescriptor {
  /** Unique per namespace */
  readonly name: string;
  readonly namespace: string;
  readonly set: string;
  readonly bin: string;
  readonly context: ContextPath;
  readonly indexType: IndexValueType;
  readonly collectionType: IndexCollectionType;
}

/**
 * Index metadata as listed by the store. `context` is the base64 wire
 * form of the context path (see context/ContextCodec).
 */
export const IndexMetadataSchema = z.object({
  name: z.string().min(1),
  namespace: z.string().min(1),
  set: z.string().default(''),
  bin: z.string().min(1),
  indexType: IndexValueTypeSchema,
  collectionType: IndexCollectionTypeSchema.default('DEFAULT'),
  context: z.string().optional(),
});

export type IndexMetadata = z.input<typeof IndexMetadataSchema>;

/**
 * Index declared by the mapping layer (the `@Indexed`-style annotation of
 * an entity field), installed by IndexManager at startup.
 */
export interface IndexDeclaration {
  /** Defaults to `<set>_<bin>_<type>_<collectionType>`, lowercase */
  readonly name?: string;
  readonly set: string;
  readonly bin: string;
  readonly indexType: IndexValueType;
  readonly collectionType?: IndexCollectionType;
  /** Context path in annotation syntax, e.g. `address.{=city}` */
  readonly ctx?: string;
}

/**
 * Registry key of a field. Two fields share a key exactly when all their
 * components are equal.
 */
export function indexedFieldKey(field: IndexedField): string {
  return JSON.stringify([
    field.namespace,
    field.set,
    field.bin,
    formatContextPath(field.context ?? EMPTY_CONTEXT),
  ]);
}

export function fieldOfDescriptor(descriptor: IndexDescriptor): IndexedField {
  return {
    namespace: descriptor.namespace,
    set: descriptor.set,
    bin: descriptor.bin,
    context: descriptor.context,
  };
}

export function defaultIndexName(
  set: string,
  bin: string,
  indexType: IndexValueType,
  collectionType: IndexCollectionType
): string {
  return `${set}_${bin}_${indexType}_${collectionType}`.toLowerCase();
}
