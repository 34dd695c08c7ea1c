/**
 * QueryEngine Implementation
 *
 * Compiles qualifier trees (see StatementBuilder) and runs the compiled
 * statements against the store:
 *
 * - ids present: multi-get, residual applied to the fetched records
 * - filter present: indexed query, residual applied to every record
 * - otherwise: full scan, allowed only through the ScanGuard
 *
 * If the store refuses an indexed query because the index is unusable,
 * the statement is retried once as a scan with the same residual.
 *
 * `maxRecords` counts records that pass the residual. It is handed to the
 * store only when there is no residual to drop records after the limit.
 *
 * @module query/QueryEngine
 */

import type { IndexRegistry } from '../index/IndexRegistry';
import { StoreError } from '../errors';
import { isSecondaryIndexFailure, type RecordCursor, type StoreClient } from '../store/StoreClient';
import { componentLogger, type Logger } from '../utils/logger';
import { RealClock, type ClockSource } from '../utils/clock';
import { evaluateQualifier } from './evaluate';
import {
  arrayCursor,
  KeyRecordIterator,
  type RecordMapper,
  type RecordPredicate,
} from './KeyRecordIterator';
import { referencedBins, type Qualifier } from './Qualifier';
import type {
  CompileOptions,
  CompiledStatement,
  ExecuteOptions,
  SelectOptions,
} from './QueryTypes';
import { ScanGuard } from './ScanGuard';
import { StatementBuilder } from './StatementBuilder';

export interface QueryEngineOptions {
  /** Allow full scans; off unless set */
  scansEnabled?: boolean;
  /** Default record limit for compiled statements; 0 means unlimited */
  queryMaxRecords?: number;
  clock?: ClockSource;
  logger?: Logger;
}

export class QueryEngine {
  private readonly statementBuilder: StatementBuilder;
  private readonly scanGuard: ScanGuard;
  private readonly queryMaxRecords: number;
  private readonly clock: ClockSource;
  protected readonly log: Logger;

  constructor(
    protected readonly client: StoreClient,
    indexRegistry: IndexRegistry,
    options: QueryEngineOptions = {}
  ) {
    this.statementBuilder = new StatementBuilder(indexRegistry);
    this.scanGuard = new ScanGuard(options.scansEnabled ?? false);
    this.queryMaxRecords = options.queryMaxRecords ?? 0;
    this.clock = options.clock ?? RealClock;
    this.log = options.logger ?? componentLogger('QueryEngine');
  }

  get guard(): ScanGuard {
    return this.scanGuard;
  }

  /**
   * Compile a qualifier tree into a statement. Pure and synchronous.
   */
  compile(
    qualifier: Qualifier | undefined,
    namespace: string,
    set: string,
    options: CompileOptions = {}
  ): CompiledStatement {
    const statement = this.statementBuilder.build(qualifier, namespace, set, {
      ...options,
      maxRecords: options.maxRecords ?? this.queryMaxRecords,
    });
    this.log.debug(
      {
        namespace,
        set,
        filter: statement.filter,
        ids: statement.ids?.length,
        fullScanRequired: statement.fullScanRequired,
      },
      'Statement compiled'
    );
    return statement;
  }

  /**
   * Run a compiled statement. Fails before any store call if it needs a
   * full scan and scans are disabled.
   *
   * @throws ScansDisabledError
   */
  execute(statement: CompiledStatement, options: ExecuteOptions = {}): KeyRecordIterator {
    if (!statement.ids) {
      this.scanGuard.checkAllowed(statement, options.scansEnabled);
    }
    return new KeyRecordIterator(
      () => this.openCursor(statement),
      this.residualPredicate(statement),
      this.projection(statement),
      statement.maxRecords ?? 0
    );
  }

  /**
   * Compile and execute in one call.
   *
   * @example
   * ```typescript
   * const young = Qualifier.builder().setBin('age').setFilterOperation('LT').setValue(26).build();
   * for await (const { key, record } of engine.select('test', 'person', young)) {
   *   console.log(key.userKey, record.bins.age);
   * }
   * ```
   */
  select(
    namespace: string,
    set: string,
    qualifier?: Qualifier,
    options: SelectOptions = {}
  ): KeyRecordIterator {
    return this.execute(this.compile(qualifier, namespace, set, options), options);
  }

  protected residualPredicate(statement: CompiledStatement): RecordPredicate {
    const residual = statement.residual;
    if (!residual) return () => true;
    const ctx = { clock: this.clock };
    return (record) => evaluateQualifier(residual, record, ctx);
  }

  /**
   * Bins requested from the store must include those the residual reads;
   * the extra ones are dropped again after evaluation.
   */
  protected projection(statement: CompiledStatement): RecordMapper | undefined {
    const { binNames, residual } = statement;
    if (!binNames || !residual) return undefined;
    const keep = new Set(binNames);
    return ({ key, record }) => ({
      key,
      record: {
        ...record,
        bins: Object.fromEntries(Object.entries(record.bins).filter(([name]) => keep.has(name))),
      },
    });
  }

  protected async openCursor(statement: CompiledStatement): Promise<RecordCursor> {
    const { namespace, set, filter, ids, residual, maxRecords } = statement;
    const binNames =
      statement.binNames && residual
        ? [...new Set([...statement.binNames, ...referencedBins(residual)])]
        : statement.binNames;
    const request = {
      namespace,
      set,
      ...(binNames ? { binNames } : {}),
      ...(maxRecords && !residual ? { maxRecords } : {}),
    };

    if (ids) {
      return arrayCursor(await this.client.getMany(namespace, set, ids, binNames));
    }
    if (!filter) {
      return this.client.scan(request);
    }

    try {
      return await this.client.query({ ...request, filter });
    } catch (err) {
      if (err instanceof StoreError && isSecondaryIndexFailure(err.resultCode)) {
        this.log.warn(
          { namespace, set, bin: filter.bin, resultCode: err.resultCode },
          'Secondary index query failed, retrying without index filter'
        );
        return this.client.scan(request);
      }
      throw err;
    }
  }
}
