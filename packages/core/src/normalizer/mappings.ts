import type { ErrorCategory, Paradigm } from '@polystore/validation'

// ── Types ──────────────────────────────────────────────────────

/** The parts of a driver error the mapping tables look at. */
export interface NativeErrorSignal {
  readonly name: string
  readonly message: string
  /** Driver error code: SQLSTATE, Neo4j status code, ClickHouse numeric code or a Node.js errno name. */
  readonly code?: string | undefined
  /** Symbolic error type where the driver reports one separately (ClickHouse). */
  readonly type?: string | undefined
}

export interface ErrorMappingRule {
  readonly code?: string | RegExp | undefined
  readonly name?: string | RegExp | undefined
  readonly message?: RegExp | undefined
  readonly category: ErrorCategory
  readonly retryable: boolean
}

export type ErrorMappingTable = readonly ErrorMappingRule[]

// ── Object store (S3 error names, as reported by MinIO) ───────

export const OBJECT_ERROR_TABLE: ErrorMappingTable = [
  { name: /^(NoSuchKey|NotFound|NoSuchBucket)$/, category: 'NotFound', retryable: false },
  { name: /^(InvalidObjectName|KeyTooLongError|InvalidArgument|EntityTooLarge)$/, category: 'InvalidInput', retryable: false },
  { name: /^(PreconditionFailed|OperationAborted|BucketAlreadyOwnedByYou)$/, category: 'Conflict', retryable: false },
  { name: /^(RequestTimeout|TimeoutError)$/, category: 'Timeout', retryable: true },
  {
    name: /^(AccessDenied|InvalidAccessKeyId|SignatureDoesNotMatch)$/,
    category: 'BackendUnavailable',
    retryable: false,
  },
  { name: /^(SlowDown|ServiceUnavailable|InternalError|XMinioServerNotInitialized)$/, category: 'BackendUnavailable', retryable: true },
]

// ── Vector store (PostgreSQL SQLSTATE) ─────────────────────────

export const VECTOR_ERROR_TABLE: ErrorMappingTable = [
  { code: /^08/, category: 'BackendUnavailable', retryable: true },
  { code: /^(57P01|57P02|57P03|53300)$/, category: 'BackendUnavailable', retryable: true },
  { code: /^(28000|28P01|3D000)$/, category: 'BackendUnavailable', retryable: false },
  { code: '57014', category: 'Timeout', retryable: true },
  // pgvector reports dimension mismatches as data_exception
  { code: /^(22000|22P02|22003|42804)$/, category: 'InvalidInput', retryable: false },
  { code: '23505', category: 'Conflict', retryable: false },
  { code: /^(40001|40P01)$/, category: 'Conflict', retryable: true },
  { code: '42P01', category: 'NotFound', retryable: false },
]

// ── Graph store (Neo4j status codes) ───────────────────────────

export const GRAPH_ERROR_TABLE: ErrorMappingTable = [
  { code: /^(ServiceUnavailable|SessionExpired)$/, category: 'BackendUnavailable', retryable: true },
  { code: /^Neo\.ClientError\.Security\./, category: 'BackendUnavailable', retryable: false },
  { code: /^Neo\.ClientError\.Database\.DatabaseNotFound$/, category: 'BackendUnavailable', retryable: false },
  { code: 'Neo.ClientError.Schema.ConstraintValidationFailed', category: 'Conflict', retryable: false },
  { code: 'Neo.TransientError.Transaction.DeadlockDetected', category: 'Conflict', retryable: true },
  { code: /^Neo\.ClientError\.Transaction\.TransactionTimedOut/, category: 'Timeout', retryable: true },
  {
    code: /^Neo\.ClientError\.Statement\.(SyntaxError|TypeError|ArgumentError|ParameterMissing|SemanticError)$/,
    category: 'InvalidInput',
    retryable: false,
  },
  { code: /^Neo\.TransientError\./, category: 'BackendUnavailable', retryable: true },
]

// ── Columnar store (ClickHouse error types) ────────────────────

export const COLUMNAR_ERROR_TABLE: ErrorMappingTable = [
  { code: /^(UNKNOWN_TABLE|UNKNOWN_DATABASE)$/, category: 'NotFound', retryable: false },
  { code: 'TABLE_ALREADY_EXISTS', category: 'Conflict', retryable: false },
  {
    code: /^(SYNTAX_ERROR|UNKNOWN_IDENTIFIER|TYPE_MISMATCH|ILLEGAL_TYPE_OF_ARGUMENT|UNKNOWN_FUNCTION|NUMBER_OF_ARGUMENTS_DOESNT_MATCH|READONLY|CANNOT_PARSE_\w+)$/,
    category: 'InvalidInput',
    retryable: false,
  },
  { code: /^(TIMEOUT_EXCEEDED|SOCKET_TIMEOUT)$/, category: 'Timeout', retryable: true },
  { message: /^Timeout error/, category: 'Timeout', retryable: true },
  { code: /^(MEMORY_LIMIT_EXCEEDED|TOO_MANY_SIMULTANEOUS_QUERIES)$/, category: 'BackendUnavailable', retryable: true },
  { code: /^(AUTHENTICATION_FAILED|REQUIRED_PASSWORD)$/, category: 'BackendUnavailable', retryable: false },
]

// ── Shared network errors ──────────────────────────────────────

export const NETWORK_ERROR_TABLE: ErrorMappingTable = [
  { code: /^(ECONNREFUSED|ECONNRESET|ENOTFOUND|EHOSTUNREACH|ENETUNREACH|EPIPE|EAI_AGAIN)$/, category: 'BackendUnavailable', retryable: true },
  { code: /^(ETIMEDOUT|ESOCKETTIMEDOUT)$/, category: 'Timeout', retryable: true },
]

export const DEFAULT_ERROR_TABLES: Readonly<Record<Paradigm, ErrorMappingTable>> = {
  object: OBJECT_ERROR_TABLE,
  vector: VECTOR_ERROR_TABLE,
  graph: GRAPH_ERROR_TABLE,
  columnar: COLUMNAR_ERROR_TABLE,
}

// ── Matching ───────────────────────────────────────────────────

export function matchRule(table: ErrorMappingTable, signal: NativeErrorSignal): ErrorMappingRule | undefined {
  return table.find((rule) => ruleMatches(rule, signal))
}

function ruleMatches(rule: ErrorMappingRule, signal: NativeErrorSignal): boolean {
  if (rule.code !== undefined && !codeMatches(rule.code, signal.code) && !codeMatches(rule.code, signal.type)) {
    return false
  }
  if (rule.name !== undefined && !codeMatches(rule.name, signal.name)) return false
  if (rule.message !== undefined && !rule.message.test(signal.message)) return false
  return true
}

function codeMatches(pattern: string | RegExp, value: string | undefined): boolean {
  if (value === undefined) return false
  return typeof pattern === 'string' ? pattern === value : pattern.test(value)
}

/**
 * Walks an error and its cause chain, returning the signal of every Error found.
 */
export function extractSignals(err: unknown): NativeErrorSignal[] {
  const signals: NativeErrorSignal[] = []
  let current: unknown = err
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    signals.push({
      name: current.name,
      message: current.message,
      code: readStringField(current, 'code'),
      type: readStringField(current, 'type'),
    })
    current = current.cause
  }
  return signals
}

function readStringField(err: Error, field: 'code' | 'type'): string | undefined {
  if (!(field in err)) return undefined
  const value: unknown = Reflect.get(err, field)
  if (typeof value === 'string') return value
  if (typeof value === 'number') return String(value)
  return undefined
}
