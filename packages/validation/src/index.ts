// Bytes
export { decodeBytes, encodeBytes, isBase64 } from './bytes.js'

// Config validation
export { MAX_VECTOR_DIMENSION, validateGatewayConfig } from './configValidation.js'

// Errors
export type {
  ConfigErrorEntry,
  ConnectionErrorCode,
  ConnectionErrorDetails,
  ExecutionErrorDetails,
  ResourceDetails,
  ValidationErrorEntry,
} from './errors.js'
export {
  ConfigError,
  ConflictError,
  ConnectionError,
  ExecutionError,
  GatewayError,
  NotFoundError,
  serializeError,
  ValidationError,
  wrapBackendError,
} from './errors.js'

// Types — benchmark
export type { BenchmarkReport, BenchmarkSample, BenchmarkStats, BenchmarkSummary } from './types/benchmark.js'
// Types — commands
export type {
  ColumnarCommand,
  ColumnarQueryInput,
  ColumnDef,
  ColumnType,
  Command,
  CommandFor,
  GraphCommand,
  MetadataValue,
  ObjectCommand,
  PropertyValue,
  TableSchema,
  TraversalDirection,
  VectorCommand,
  VectorQueryInput,
} from './types/commands.js'
// Types — config
export type {
  ColumnarStoreConfig,
  GatewayConfig,
  GatewayLimits,
  GraphStoreConfig,
  NamedQuery,
  NamedQueryParam,
  ObjectStoreConfig,
  VectorMetric,
  VectorStoreConfig,
} from './types/config.js'
// Types — envelope
export type { Ack, DebugLogEntry, ErrorInfo, FailureEnvelope, ResultEnvelope, SuccessEnvelope } from './types/envelope.js'
export { ACK } from './types/envelope.js'
// Types — health
export type { AdapterState, HealthCheckResult, HealthRecord } from './types/health.js'
// Types — operation
export type { GatewayRequest, Operation } from './types/operation.js'
export { createOperation } from './types/operation.js'
// Types — paradigm
export type { ErrorCategory, Paradigm } from './types/paradigm.js'
export { ERROR_CATEGORIES, isErrorCategory, isParadigm, PARADIGMS } from './types/paradigm.js'

// Operation validation
export type { OperationValidation } from './validation/operationValidator.js'
export { isRegisteredKind, OPERATION_KINDS, parseRequest, validateOperation } from './validation/operationValidator.js'
export { isColumnType, isIdentifier, isMetadataValue, isPlainRecord } from './validation/rules.js'
