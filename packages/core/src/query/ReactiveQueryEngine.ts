/**
 * ReactiveQueryEngine Implementation
 *
 * Push-based flavour of the QueryEngine: records are delivered to an
 * observer as the store produces them. Unsubscribing stops delivery and
 * closes the upstream cursor.
 *
 * Errors, the scan guard's included, are delivered through the observer
 * rather than thrown.
 *
 * @module query/ReactiveQueryEngine
 */

import type { KeyRecord } from '../store/StoreClient';
import type { KeyRecordIterator } from './KeyRecordIterator';
import type { Qualifier } from './Qualifier';
import { QueryEngine } from './QueryEngine';
import type { CompiledStatement, ExecuteOptions, SelectOptions } from './QueryTypes';

export interface RecordObserver {
  next(record: KeyRecord): void;
  error?(err: unknown): void;
  complete?(): void;
}

export type Unsubscribe = () => void;

export class ReactiveQueryEngine extends QueryEngine {
  /**
   * Subscribe to the results of a compiled statement.
   *
   * @returns Unsubscribe function
   */
  subscribe(statement: CompiledStatement, observer: RecordObserver, options: ExecuteOptions = {}): Unsubscribe {
    let iterator: KeyRecordIterator;
    try {
      iterator = this.execute(statement, options);
    } catch (err) {
      this.deliverError(observer, err);
      return () => {};
    }

    let cancelled = false;
    this.pump(iterator, observer, () => cancelled).catch((err: unknown) => {
      this.log.error({ err }, 'Subscription failed after completion');
    });

    return () => {
      if (cancelled) return;
      cancelled = true;
      iterator.close().catch((err: unknown) => {
        this.log.warn({ err }, 'Failed to close cursor on unsubscribe');
      });
    };
  }

  /**
   * Compile, execute and subscribe in one call.
   *
   * @example
   * ```typescript
   * const stop = engine.subscribeSelect('test', 'person', qualifier, {
   *   next: (record) => received.push(record),
   *   complete: () => console.log('done'),
   * });
   * ```
   */
  subscribeSelect(
    namespace: string,
    set: string,
    qualifier: Qualifier | undefined,
    observer: RecordObserver,
    options: SelectOptions = {}
  ): Unsubscribe {
    let statement: CompiledStatement;
    try {
      statement = this.compile(qualifier, namespace, set, options);
    } catch (err) {
      this.deliverError(observer, err);
      return () => {};
    }
    return this.subscribe(statement, observer, options);
  }

  private async pump(iterator: KeyRecordIterator, observer: RecordObserver, isCancelled: () => boolean): Promise<void> {
    try {
      for (;;) {
        const result = await iterator.next();
        if (isCancelled()) return;
        if (result.done) break;
        observer.next(result.value);
      }
      observer.complete?.();
    } catch (err) {
      if (!isCancelled()) {
        this.deliverError(observer, err);
      }
    } finally {
      await iterator.close();
    }
  }

  private deliverError(observer: RecordObserver, err: unknown): void {
    if (observer.error) {
      observer.error(err);
    } else {
      this.log.error({ err }, 'Unhandled query error');
    }
  }
}
