// Re-export the shared types and errors so callers need a single import
export type {
  Ack,
  AdapterState,
  BenchmarkReport,
  BenchmarkSample,
  BenchmarkStats,
  BenchmarkSummary,
  ColumnarCommand,
  ColumnarQueryInput,
  ColumnarStoreConfig,
  ColumnDef,
  ColumnType,
  ConfigErrorEntry,
  Command,
  CommandFor,
  DebugLogEntry,
  ErrorCategory,
  ErrorInfo,
  FailureEnvelope,
  GatewayConfig,
  GatewayLimits,
  GatewayRequest,
  GraphCommand,
  GraphStoreConfig,
  HealthCheckResult,
  HealthRecord,
  MetadataValue,
  NamedQuery,
  NamedQueryParam,
  ObjectCommand,
  ObjectStoreConfig,
  Operation,
  Paradigm,
  PropertyValue,
  ResultEnvelope,
  SuccessEnvelope,
  TableSchema,
  TraversalDirection,
  ValidationErrorEntry,
  VectorCommand,
  VectorMetric,
  VectorQueryInput,
  VectorStoreConfig,
} from '@polystore/validation'
export {
  ACK,
  ConfigError,
  ConflictError,
  ConnectionError,
  decodeBytes,
  encodeBytes,
  ERROR_CATEGORIES,
  ExecutionError,
  GatewayError,
  isBase64,
  isColumnType,
  isErrorCategory,
  isIdentifier,
  isMetadataValue,
  isParadigm,
  isPlainRecord,
  NotFoundError,
  PARADIGMS,
  serializeError,
  ValidationError,
  validateGatewayConfig,
  validateOperation,
  wrapBackendError,
} from '@polystore/validation'
// Benchmarks
export { BenchmarkTracker } from './benchmark/tracker.js'
// Logging
export type { GatewayLogger, LogLevel } from './debug/logger.js'
export { createConsoleLogger, debugEntry, isLogLevel, silentLogger, withDebugLog } from './debug/logger.js'
// Gateway facade
export type { AdapterFactories, CreateGatewayOptions, Gateway } from './gateway.js'
export { createGateway } from './gateway.js'
// Lifecycle
export type { DeadlineOptions } from './lifecycle/deadline.js'
export { delay, withDeadline } from './lifecycle/deadline.js'
export type {
  AdapterHandle,
  HandleExecuteOptions,
  ShutdownReport,
  SupervisorOptions,
} from './lifecycle/supervisor.js'
export { LifecycleSupervisor } from './lifecycle/supervisor.js'
// Normalizer
export type { ErrorMappingRule, ErrorMappingTable, NativeErrorSignal } from './normalizer/mappings.js'
export {
  COLUMNAR_ERROR_TABLE,
  DEFAULT_ERROR_TABLES,
  extractSignals,
  GRAPH_ERROR_TABLE,
  matchRule,
  NETWORK_ERROR_TABLE,
  OBJECT_ERROR_TABLE,
  VECTOR_ERROR_TABLE,
} from './normalizer/mappings.js'
export type { AdapterOutcome, NormalizerOptions } from './normalizer/normalizer.js'
export { ResponseNormalizer, sanitizeMessage } from './normalizer/normalizer.js'
// Router
export type { GatewayRouterOptions, RouteOptions } from './router.js'
export { DEFAULT_OPERATION_TIMEOUT_MS, GatewayRouter } from './router.js'
// Adapter capability interface
export type { AdapterConcurrency, AdapterFactory, ExecutionContext, StorageAdapter } from './types/interfaces.js'
