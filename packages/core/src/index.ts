// Context paths
export {
  Ctx,
  EMPTY_CONTEXT,
  formatContextPath,
  formatContextStep,
  contextPathsEqual,
} from './context/ContextPath';
export type {
  ContextPath,
  ContextStep,
  ContextStepKind,
  ContextValue,
  KeyedStep,
  PositionalStep,
} from './context/ContextPath';
export { parseContextPath } from './context/ContextPathParser';
export {
  CONTEXT_TYPE_IDS,
  encodeContext,
  decodeContext,
  contextToBase64,
  contextFromBase64,
} from './context/ContextCodec';

// Index cache
export { IndexRegistry } from './index/IndexRegistry';
export { IndexRefresher, descriptorFromMetadata } from './index/IndexRefresher';
export type { IndexRefresherOptions } from './index/IndexRefresher';
export { IndexManager } from './index/IndexManager';
export type { CreateIndexParams, IndexManagerOptions } from './index/IndexManager';
export { parseIndexInfo, parseIndexInfoEntry, SINDEX_LIST_COMMAND } from './index/IndexInfoParser';
export {
  IndexMetadataSchema,
  indexedFieldKey,
  defaultIndexName,
} from './index/IndexTypes';
export type {
  IndexCollectionType,
  IndexDeclaration,
  IndexDescriptor,
  IndexedField,
  IndexMetadata,
  IndexValueType,
} from './index/IndexTypes';

// Qualifiers and query execution
export {
  FILTER_OPERATIONS,
  METADATA_OPERATIONS,
  OPERATION_ARITY,
  validateArguments,
} from './query/FilterOperation';
export type { Arity, FilterOperation, MetadataField, MetadataOperation } from './query/FilterOperation';
export { Qualifier, QualifierBuilder, MetadataQualifierBuilder, referencedBins } from './query/Qualifier';
export type {
  BinQualifier,
  ConjunctionQualifier,
  IdQualifier,
  LeafQualifier,
  MetadataQualifier,
} from './query/Qualifier';
export { evaluateQualifier } from './query/evaluate';
export type { EvaluationContext } from './query/evaluate';
export type { GeoPoint, GeoRegion } from './query/geo';
export { toSecondaryIndexFilter } from './query/IndexFilter';
export type {
  CompiledStatement,
  CompileOptions,
  ExecuteOptions,
  SecondaryIndexFilter,
  SelectOptions,
} from './query/QueryTypes';
export { StatementBuilder } from './query/StatementBuilder';
export { ScanGuard } from './query/ScanGuard';
export { KeyRecordIterator } from './query/KeyRecordIterator';
export { QueryEngine } from './query/QueryEngine';
export type { QueryEngineOptions } from './query/QueryEngine';
export { ReactiveQueryEngine } from './query/ReactiveQueryEngine';
export type { RecordObserver, Unsubscribe } from './query/ReactiveQueryEngine';

// Store
export { ResultCode, isSecondaryIndexFailure } from './store/StoreClient';
export type {
  Bins,
  CreateIndexRequest,
  KeyRecord,
  QueryRequest,
  RecordCursor,
  RecordKey,
  RecordMetadata,
  ScanRequest,
  StoreClient,
  StoreKey,
  StoreRecord,
} from './store/StoreClient';

// Configuration, wiring, errors
export { loadSettingsFromEnv, resolveSettings, EngineSettingsSchema } from './config/settings';
export type { EngineSettings, EngineSettingsInput } from './config/settings';
export { createQueryModule } from './QueryModuleFactory';
export type { QueryModule, QueryModuleOptions } from './QueryModuleFactory';
export {
  AeroQueryError,
  ConfigurationError,
  IndexOperationError,
  InvalidContextSyntaxError,
  InvalidQualifierArityError,
  InvalidQualifierError,
  ScansDisabledError,
  SCANS_DISABLED_MESSAGE,
  StoreError,
  UnsupportedQualifierError,
} from './errors';
export type { AeroQueryErrorCode } from './errors';
export type { ClockSource } from './utils/clock';
export { logger } from './utils/logger';
