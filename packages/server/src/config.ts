import type {
  ColumnarStoreConfig,
  ConfigErrorEntry,
  GatewayConfig,
  GatewayLimits,
  GraphStoreConfig,
  LogLevel,
  ObjectStoreConfig,
  Paradigm,
  VectorStoreConfig,
} from '@polystore/gateway'
import { ConfigError, isLogLevel } from '@polystore/gateway'

// ── Types ──────────────────────────────────────────────────────

export type Env = Readonly<Record<string, string | undefined>>

export interface ServerSettings {
  readonly port: number
  readonly host: string
  readonly logLevel: LogLevel
}

export interface LoadedConfig {
  readonly gateway: GatewayConfig
  readonly server: ServerSettings
  /** Environment variables each unconfigured paradigm still needs. */
  readonly missing: Readonly<Partial<Record<Paradigm, readonly string[]>>>
}

// ── Readers ────────────────────────────────────────────────────

class EnvReader {
  readonly errors: ConfigErrorEntry[] = []

  constructor(private readonly env: Env) {}

  string(name: string): string | undefined {
    const value = this.env[name]?.trim()
    return value === undefined || value === '' ? undefined : value
  }

  integer(name: string, paradigm?: Paradigm): number | undefined {
    const raw = this.string(name)
    if (raw === undefined) return undefined
    const value = Number(raw)
    if (!Number.isInteger(value)) {
      this.errors.push({
        code: 'INVALID_SETTING',
        message: `${name} must be an integer, got '${raw}'`,
        details: { paradigm, field: name, expected: 'integer', actual: raw },
      })
      return undefined
    }
    return value
  }

  boolean(name: string): boolean | undefined {
    const raw = this.string(name)
    if (raw === undefined) return undefined
    return raw.toLowerCase() === 'true' || raw === '1'
  }

  /** Names among `names` that are unset. */
  absent(...names: string[]): string[] {
    return names.filter((name) => this.string(name) === undefined)
  }
}

// ── Per-paradigm loaders ───────────────────────────────────────

function splitHostPort(endpoint: string): { host: string; port?: number | undefined } {
  const match = /^(.+):(\d+)$/.exec(endpoint)
  if (match?.[1] === undefined || match[2] === undefined) return { host: endpoint }
  return { host: match[1], port: Number(match[2]) }
}

function loadObject(env: EnvReader): ObjectStoreConfig | string[] {
  const absent = env.absent('MINIO_ENDPOINT', 'MINIO_ACCESS_KEY', 'MINIO_SECRET_KEY', 'MINIO_BUCKET_NAME')
  const endpoint = env.string('MINIO_ENDPOINT')
  const accessKey = env.string('MINIO_ACCESS_KEY')
  const secretKey = env.string('MINIO_SECRET_KEY')
  const bucket = env.string('MINIO_BUCKET_NAME')
  if (endpoint === undefined || accessKey === undefined || secretKey === undefined || bucket === undefined) {
    return absent
  }
  const { host, port } = splitHostPort(endpoint)
  return {
    endPoint: host,
    port: env.integer('MINIO_PORT', 'object') ?? port,
    useSSL: env.boolean('MINIO_SECURE'),
    accessKey,
    secretKey,
    bucket,
    region: env.string('MINIO_REGION'),
  }
}

function loadVector(env: EnvReader): VectorStoreConfig | string[] {
  const connectionString = env.string('PGVECTOR_URL')
  const host = env.string('PGVECTOR_HOST')
  const dimension = env.integer('PGVECTOR_DIMENSION', 'vector')
  const absent: string[] = []
  if (connectionString === undefined && host === undefined) absent.push('PGVECTOR_URL')
  if (dimension === undefined) absent.push('PGVECTOR_DIMENSION')
  if (dimension === undefined || absent.length > 0) return absent

  const metric = env.string('PGVECTOR_METRIC')
  if (metric !== undefined && metric !== 'cosine' && metric !== 'l2' && metric !== 'innerProduct') {
    env.errors.push({
      code: 'INVALID_SETTING',
      message: `PGVECTOR_METRIC must be cosine, l2 or innerProduct, got '${metric}'`,
      details: { paradigm: 'vector', field: 'PGVECTOR_METRIC', expected: 'cosine | l2 | innerProduct', actual: metric },
    })
  }
  return {
    connectionString,
    host,
    port: env.integer('PGVECTOR_PORT', 'vector'),
    database: env.string('PGVECTOR_DATABASE'),
    user: env.string('PGVECTOR_USER'),
    password: env.string('PGVECTOR_PASSWORD'),
    collection: env.string('PGVECTOR_COLLECTION') ?? 'documents',
    dimension,
    metric: metric === 'l2' || metric === 'innerProduct' ? metric : 'cosine',
    maxTopK: env.integer('PGVECTOR_MAX_TOP_K', 'vector'),
    poolSize: env.integer('PGVECTOR_POOL_SIZE', 'vector'),
  }
}

function loadGraph(env: EnvReader): GraphStoreConfig | string[] {
  const absent = env.absent('NEO4J_URI', 'NEO4J_USER', 'NEO4J_PASSWORD')
  const uri = env.string('NEO4J_URI')
  const user = env.string('NEO4J_USER')
  const password = env.string('NEO4J_PASSWORD')
  if (uri === undefined || user === undefined || password === undefined) return absent
  return {
    uri,
    user,
    password,
    database: env.string('NEO4J_DATABASE'),
    maxHops: env.integer('NEO4J_MAX_HOPS', 'graph'),
  }
}

function loadColumnar(env: EnvReader): ColumnarStoreConfig | string[] {
  const url = env.string('CLICKHOUSE_URL')
  if (url === undefined) return ['CLICKHOUSE_URL']
  return {
    url,
    username: env.string('CLICKHOUSE_USER'),
    password: env.string('CLICKHOUSE_PASSWORD'),
    database: env.string('CLICKHOUSE_DATABASE'),
    timeoutMs: env.integer('CLICKHOUSE_TIMEOUT_MS', 'columnar'),
  }
}

function loadLimits(env: EnvReader): GatewayLimits {
  return {
    operationTimeoutMs: env.integer('GATEWAY_OPERATION_TIMEOUT_MS'),
    maxConnectAttempts: env.integer('GATEWAY_MAX_CONNECT_ATTEMPTS'),
    backoffBaseMs: env.integer('GATEWAY_BACKOFF_BASE_MS'),
    backoffMaxMs: env.integer('GATEWAY_BACKOFF_MAX_MS'),
    connectTimeoutMs: env.integer('GATEWAY_CONNECT_TIMEOUT_MS'),
    shutdownGraceMs: env.integer('GATEWAY_SHUTDOWN_GRACE_MS'),
    healthCheckIntervalMs: env.integer('GATEWAY_HEALTH_CHECK_INTERVAL_MS'),
  }
}

function loadServer(env: EnvReader): ServerSettings {
  const logLevel = env.string('GATEWAY_LOG_LEVEL') ?? 'info'
  if (!isLogLevel(logLevel)) {
    env.errors.push({
      code: 'INVALID_SETTING',
      message: `GATEWAY_LOG_LEVEL must be debug, info, warn, error or silent, got '${logLevel}'`,
      details: { field: 'GATEWAY_LOG_LEVEL', expected: 'debug | info | warn | error | silent', actual: logLevel },
    })
  }
  return {
    port: env.integer('GATEWAY_PORT') ?? 3000,
    host: env.string('GATEWAY_HOST') ?? '0.0.0.0',
    logLevel: isLogLevel(logLevel) ? logLevel : 'info',
  }
}

// ── loadGatewayConfig ──────────────────────────────────────────

/**
 * Reads store settings from environment variables. A store whose required
 * variables are unset is left out of `gateway` and listed in `missing`.
 * Throws `ConfigError` for values that are set but malformed.
 */
export function loadGatewayConfig(env: Env): LoadedConfig {
  const reader = new EnvReader(env)
  const missing: Partial<Record<Paradigm, readonly string[]>> = {}

  const object = loadObject(reader)
  const vector = loadVector(reader)
  const graph = loadGraph(reader)
  const columnar = loadColumnar(reader)
  if (Array.isArray(object)) missing.object = object
  if (Array.isArray(vector)) missing.vector = vector
  if (Array.isArray(graph)) missing.graph = graph
  if (Array.isArray(columnar)) missing.columnar = columnar

  const gateway: GatewayConfig = {
    object: Array.isArray(object) ? undefined : object,
    vector: Array.isArray(vector) ? undefined : vector,
    graph: Array.isArray(graph) ? undefined : graph,
    columnar: Array.isArray(columnar) ? undefined : columnar,
    limits: loadLimits(reader),
  }
  const server = loadServer(reader)

  if (reader.errors.length > 0) throw new ConfigError(reader.errors)
  return { gateway, server, missing }
}
