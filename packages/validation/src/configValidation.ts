import type { ConfigErrorEntry } from './errors.js'
import { ConfigError } from './errors.js'
import type {
  ColumnarStoreConfig,
  GatewayConfig,
  GatewayLimits,
  GraphStoreConfig,
  ObjectStoreConfig,
  VectorStoreConfig,
} from './types/config.js'
import type { Paradigm } from './types/paradigm.js'
import { isColumnType, isIdentifier } from './validation/rules.js'

// --- Constants ---

const BUCKET_NAME_REGEX = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/
const NAMED_QUERY_REGEX = /^[a-z][a-z0-9-]*$/
const GRAPH_URI_REGEX = /^(neo4j|neo4j\+s|neo4j\+ssc|bolt|bolt\+s|bolt\+ssc):\/\/.+/
const HTTP_URL_REGEX = /^https?:\/\/.+/
const VECTOR_METRICS = new Set(['cosine', 'l2', 'innerProduct'])

export const MAX_VECTOR_DIMENSION = 16_000

// --- Gateway Config Validation ---

export function validateGatewayConfig(config: GatewayConfig): ConfigError | null {
  const errors: ConfigErrorEntry[] = []

  if (config.object !== undefined) validateObjectConfig(config.object, errors)
  if (config.vector !== undefined) validateVectorConfig(config.vector, errors)
  if (config.graph !== undefined) validateGraphConfig(config.graph, errors)
  if (config.columnar !== undefined) validateColumnarConfig(config.columnar, errors)
  if (config.limits !== undefined) validateLimits(config.limits, errors)

  return errors.length > 0 ? new ConfigError(errors) : null
}

function validateObjectConfig(config: ObjectStoreConfig, errors: ConfigErrorEntry[]): void {
  required('object', 'endPoint', config.endPoint, errors)
  required('object', 'accessKey', config.accessKey, errors)
  required('object', 'secretKey', config.secretKey, errors)
  if (!BUCKET_NAME_REGEX.test(config.bucket)) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `Bucket name '${config.bucket}' is not a valid S3 bucket name`,
      details: { paradigm: 'object', field: 'bucket', expected: BUCKET_NAME_REGEX.source, actual: config.bucket },
    })
  }
  if (config.port !== undefined) port('object', config.port, errors)
}

function validateVectorConfig(config: VectorStoreConfig, errors: ConfigErrorEntry[]): void {
  if (config.connectionString === undefined && config.host === undefined) {
    errors.push({
      code: 'MISSING_SETTING',
      message: 'Vector store needs connectionString or host',
      details: { paradigm: 'vector', field: 'connectionString' },
    })
  }
  identifier('vector', 'collection', config.collection, errors)
  if (!Number.isInteger(config.dimension) || config.dimension < 1 || config.dimension > MAX_VECTOR_DIMENSION) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `Vector dimension must be an integer in 1–${MAX_VECTOR_DIMENSION}, got ${config.dimension}`,
      details: { paradigm: 'vector', field: 'dimension', actual: String(config.dimension) },
    })
  }
  if (config.metric !== undefined && !VECTOR_METRICS.has(config.metric)) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `Unknown vector metric '${String(config.metric)}'`,
      details: { paradigm: 'vector', field: 'metric', expected: 'cosine | l2 | innerProduct', actual: String(config.metric) },
    })
  }
  positive('vector', 'maxTopK', config.maxTopK, errors)
  positive('vector', 'poolSize', config.poolSize, errors)
  positive('vector', 'statementTimeoutMs', config.statementTimeoutMs, errors)
  if (config.port !== undefined) port('vector', config.port, errors)
}

function validateGraphConfig(config: GraphStoreConfig, errors: ConfigErrorEntry[]): void {
  if (!GRAPH_URI_REGEX.test(config.uri)) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `Graph URI '${config.uri}' must use a neo4j:// or bolt:// scheme`,
      details: { paradigm: 'graph', field: 'uri', actual: config.uri },
    })
  }
  required('graph', 'user', config.user, errors)
  required('graph', 'password', config.password, errors)
  positive('graph', 'maxHops', config.maxHops, errors)
  positive('graph', 'connectionTimeoutMs', config.connectionTimeoutMs, errors)
}

function validateColumnarConfig(config: ColumnarStoreConfig, errors: ConfigErrorEntry[]): void {
  if (!HTTP_URL_REGEX.test(config.url)) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `Columnar URL '${config.url}' must be http(s)`,
      details: { paradigm: 'columnar', field: 'url', actual: config.url },
    })
  }
  if (config.database !== undefined) identifier('columnar', 'database', config.database, errors)
  positive('columnar', 'timeoutMs', config.timeoutMs, errors)

  const names = new Set<string>()
  for (const query of config.namedQueries ?? []) {
    if (!NAMED_QUERY_REGEX.test(query.name)) {
      errors.push({
        code: 'INVALID_IDENTIFIER',
        message: `Named query '${query.name}' must match ${NAMED_QUERY_REGEX.source}`,
        details: { paradigm: 'columnar', field: 'namedQueries', actual: query.name },
      })
    }
    if (names.has(query.name)) {
      errors.push({
        code: 'DUPLICATE_NAMED_QUERY',
        message: `Duplicate named query '${query.name}'`,
        details: { paradigm: 'columnar', field: 'namedQueries', actual: query.name },
      })
    }
    names.add(query.name)
    for (const [param, spec] of Object.entries(query.params ?? {})) {
      if (!isIdentifier(param) || !isColumnType(spec.type)) {
        errors.push({
          code: 'INVALID_SETTING',
          message: `Named query '${query.name}' declares invalid parameter '${param}'`,
          details: { paradigm: 'columnar', field: `namedQueries.${query.name}.${param}`, actual: String(spec.type) },
        })
      }
    }
  }
}

function validateLimits(limits: GatewayLimits, errors: ConfigErrorEntry[]): void {
  positive(undefined, 'operationTimeoutMs', limits.operationTimeoutMs, errors)
  positive(undefined, 'maxConnectAttempts', limits.maxConnectAttempts, errors)
  positive(undefined, 'backoffBaseMs', limits.backoffBaseMs, errors)
  positive(undefined, 'backoffMaxMs', limits.backoffMaxMs, errors)
  positive(undefined, 'connectTimeoutMs', limits.connectTimeoutMs, errors)
  positive(undefined, 'healthCheckIntervalMs', limits.healthCheckIntervalMs, errors)
  if (limits.shutdownGraceMs !== undefined && (!Number.isFinite(limits.shutdownGraceMs) || limits.shutdownGraceMs < 0)) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `shutdownGraceMs must be ≥ 0, got ${limits.shutdownGraceMs}`,
      details: { field: 'shutdownGraceMs', actual: String(limits.shutdownGraceMs) },
    })
  }
}

// --- Field Helpers ---

function required(paradigm: Paradigm, field: string, value: string, errors: ConfigErrorEntry[]): void {
  if (value.length === 0) {
    errors.push({
      code: 'MISSING_SETTING',
      message: `Missing ${paradigm} setting '${field}'`,
      details: { paradigm, field },
    })
  }
}

function identifier(paradigm: Paradigm, field: string, value: string, errors: ConfigErrorEntry[]): void {
  if (!isIdentifier(value)) {
    errors.push({
      code: 'INVALID_IDENTIFIER',
      message: `${paradigm} setting '${field}' must be an identifier, got '${value}'`,
      details: { paradigm, field, actual: value },
    })
  }
}

function positive(
  paradigm: Paradigm | undefined,
  field: string,
  value: number | undefined,
  errors: ConfigErrorEntry[],
): void {
  if (value === undefined) return
  if (!Number.isInteger(value) || value < 1) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `'${field}' must be a positive integer, got ${value}`,
      details: { paradigm, field, actual: String(value) },
    })
  }
}

function port(paradigm: Paradigm, value: number, errors: ConfigErrorEntry[]): void {
  if (!Number.isInteger(value) || value < 1 || value > 65_535) {
    errors.push({
      code: 'INVALID_SETTING',
      message: `${paradigm} port must be in 1–65535, got ${value}`,
      details: { paradigm, field: 'port', actual: String(value) },
    })
  }
}
