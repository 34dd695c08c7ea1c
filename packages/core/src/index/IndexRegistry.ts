/**
 * IndexRegistry Implementation
 *
 * In-memory cache of the store's secondary indexes, keyed by
 * `(namespace, set, bin, context)`. A field may be served by several
 * indexes (e.g. a STRING and a NUMERIC index on the same bin).
 *
 * Reads go against an immutable snapshot. Every write builds a new
 * snapshot and swaps the reference, so a reader holding the previous
 * snapshot never sees a half-applied update.
 *
 * @module index/IndexRegistry
 */

import {
  fieldOfDescriptor,
  indexedFieldKey,
  type IndexDescriptor,
  type IndexedField,
} from './IndexTypes';

type Snapshot = ReadonlyMap<string, ReadonlySet<IndexDescriptor>>;

const EMPTY: Snapshot = new Map();

export class IndexRegistry {
  private snapshot: Snapshot = EMPTY;

  /**
   * Check if any index targets the field.
   */
  hasIndexFor(field: IndexedField): boolean {
    return this.snapshot.has(indexedFieldKey(field));
  }

  /**
   * All indexes targeting the field, or undefined if there are none.
   */
  lookup(field: IndexedField): ReadonlySet<IndexDescriptor> | undefined {
    return this.snapshot.get(indexedFieldKey(field));
  }

  /**
   * Find an index by its name within a namespace.
   */
  findByName(namespace: string, name: string): IndexDescriptor | undefined {
    for (const descriptors of this.snapshot.values()) {
      for (const d of descriptors) {
        if (d.namespace === namespace && d.name === name) return d;
      }
    }
    return undefined;
  }

  getAll(): IndexDescriptor[] {
    const all: IndexDescriptor[] = [];
    for (const descriptors of this.snapshot.values()) {
      all.push(...descriptors);
    }
    return all;
  }

  /** Number of registered indexes */
  get size(): number {
    let count = 0;
    for (const descriptors of this.snapshot.values()) {
      count += descriptors.size;
    }
    return count;
  }

  /**
   * Replace the whole registry content in one swap.
   * Later duplicates (same namespace and name) win.
   */
  replaceAll(descriptors: Iterable<IndexDescriptor>): void {
    const byName = new Map<string, IndexDescriptor>();
    for (const d of descriptors) {
      byName.set(`${d.namespace}\u0000${d.name}`, freezeDescriptor(d));
    }

    const next = new Map<string, Set<IndexDescriptor>>();
    for (const d of byName.values()) {
      const key = indexedFieldKey(fieldOfDescriptor(d));
      let entry = next.get(key);
      if (!entry) {
        entry = new Set();
        next.set(key, entry);
      }
      entry.add(d);
    }
    this.snapshot = next;
  }

  /**
   * Register one index. An index with the same name in the same namespace
   * is replaced.
   */
  add(descriptor: IndexDescriptor): void {
    const frozen = freezeDescriptor(descriptor);
    const next = this.withoutName(frozen.namespace, frozen.name);
    const key = indexedFieldKey(fieldOfDescriptor(frozen));
    next.set(key, new Set([...(next.get(key) ?? []), frozen]));
    this.snapshot = next;
  }

  /**
   * Remove the named index from the field's entry.
   *
   * @returns true if the index was registered
   */
  remove(field: IndexedField, name: string): boolean {
    const key = indexedFieldKey(field);
    const current = this.snapshot.get(key);
    if (!current) return false;

    const remaining = [...current].filter((d) => d.name !== name);
    if (remaining.length === current.size) return false;

    const next = new Map(this.snapshot);
    if (remaining.length === 0) {
      next.delete(key);
    } else {
      next.set(key, new Set(remaining));
    }
    this.snapshot = next;
    return true;
  }

  clear(): void {
    this.snapshot = EMPTY;
  }

  private withoutName(namespace: string, name: string): Map<string, ReadonlySet<IndexDescriptor>> {
    const next = new Map(this.snapshot);
    for (const [key, descriptors] of this.snapshot) {
      const remaining = [...descriptors].filter((d) => !(d.namespace === namespace && d.name === name));
      if (remaining.length === descriptors.size) continue;
      if (remaining.length === 0) {
        next.delete(key);
      } else {
        next.set(key, new Set(remaining));
      }
    }
    return next;
  }
}

function freezeDescriptor(d: IndexDescriptor): IndexDescriptor {
  return Object.freeze({ ...d, context: Object.freeze([...d.context]) });
}
