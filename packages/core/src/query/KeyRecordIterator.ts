/**
 * KeyRecordIterator Implementation
 *
 * Lazy, single-pass async sequence over a store cursor. The cursor is
 * opened on the first `next()` and closed on exhaustion, on error, on
 * `return()` (early `break` out of `for await`) and on `close()`.
 *
 * Records failing the residual predicate are skipped; the others pass
 * through an optional mapper (bin projection). A positive limit counts
 * accepted records only; the cursor is closed once it is reached. Store
 * errors reach the consumer as a rejected `next()`.
 *
 * @module query/KeyRecordIterator
 */

import type { KeyRecord, RecordCursor } from '../store/StoreClient';

export type CursorSource = () => Promise<RecordCursor>;

export type RecordPredicate = (record: KeyRecord) => boolean;

export type RecordMapper = (record: KeyRecord) => KeyRecord;

const acceptAll: RecordPredicate = () => true;

const identity: RecordMapper = (record) => record;

/**
 * Cursor over records already in memory (multi-get results).
 */
export function arrayCursor(records: readonly (KeyRecord | undefined)[]): RecordCursor {
  let position = 0;
  return {
    async next() {
      while (position < records.length) {
        const record = records[position++];
        if (record) return record;
      }
      return undefined;
    },
    async close() {
      position = records.length;
    },
  };
}

export class KeyRecordIterator implements AsyncIterableIterator<KeyRecord> {
  private cursor: RecordCursor | null = null;
  private started = false;
  private iterating = false;
  private closed = false;
  private accepted = 0;

  constructor(
    private readonly openCursor: CursorSource,
    private readonly accept: RecordPredicate = acceptAll,
    private readonly map: RecordMapper = identity,
    /** Maximum number of records to yield; 0 means unlimited */
    private readonly limit = 0
  ) {}

  /**
   * Returns itself once; a second iteration attempt throws since the
   * sequence cannot be replayed.
   */
  [Symbol.asyncIterator](): AsyncIterableIterator<KeyRecord> {
    if (this.iterating || this.started) {
      throw new Error('KeyRecordIterator supports a single pass only');
    }
    this.iterating = true;
    return this;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  async next(): Promise<IteratorResult<KeyRecord>> {
    if (this.closed) return { done: true, value: undefined };
    this.started = true;

    try {
      const cursor = this.cursor ?? (await this.open());
      for (;;) {
        // close() may run while awaiting
        if (this.closed) return { done: true, value: undefined };
        const record = await cursor.next();
        if (record === undefined) {
          await this.close();
          return { done: true, value: undefined };
        }
        if (this.accept(record)) {
          this.accepted++;
          if (this.limit > 0 && this.accepted >= this.limit) {
            await this.close();
          }
          return { done: false, value: this.map(record) };
        }
      }
    } catch (err) {
      await this.close();
      throw err;
    }
  }

  private async open(): Promise<RecordCursor> {
    const cursor = await this.openCursor();
    if (this.closed) {
      await cursor.close();
    } else {
      this.cursor = cursor;
    }
    return cursor;
  }

  async return(): Promise<IteratorResult<KeyRecord>> {
    await this.close();
    return { done: true, value: undefined };
  }

  /**
   * Release the underlying cursor. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const cursor = this.cursor;
    this.cursor = null;
    if (cursor) {
      await cursor.close();
    }
  }

  /**
   * Drain the remaining records into an array.
   */
  async toArray(): Promise<KeyRecord[]> {
    const out: KeyRecord[] = [];
    for (;;) {
      const result = await this.next();
      if (result.done) return out;
      out.push(result.value);
    }
  }
}
