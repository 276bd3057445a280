import type { ColumnType } from './commands.js'

// --- Per-paradigm connection settings ---

export interface ObjectStoreConfig {
  readonly endPoint: string
  readonly port?: number | undefined
  readonly useSSL?: boolean | undefined
  readonly accessKey: string
  readonly secretKey: string
  readonly bucket: string
  readonly region?: string | undefined
}

export type VectorMetric = 'cosine' | 'l2' | 'innerProduct'

export interface VectorStoreConfig {
  readonly connectionString?: string | undefined
  readonly host?: string | undefined
  readonly port?: number | undefined
  readonly database?: string | undefined
  readonly user?: string | undefined
  readonly password?: string | undefined
  readonly collection: string
  readonly dimension: number
  readonly metric?: VectorMetric | undefined
  readonly maxTopK?: number | undefined
  readonly poolSize?: number | undefined
  readonly statementTimeoutMs?: number | undefined
}

export interface GraphStoreConfig {
  readonly uri: string
  readonly user: string
  readonly password: string
  readonly database?: string | undefined
  readonly maxHops?: number | undefined
  readonly connectionTimeoutMs?: number | undefined
}

export interface NamedQueryParam {
  readonly type: ColumnType
  readonly required?: boolean | undefined
  readonly default?: string | number | boolean | undefined
}

/** A pre-registered analytical query. `sql` uses ClickHouse `{name:Type}` placeholders. */
export interface NamedQuery {
  readonly name: string
  readonly description?: string | undefined
  readonly sql: string
  readonly params?: Readonly<Record<string, NamedQueryParam>> | undefined
}

export interface ColumnarStoreConfig {
  readonly url: string
  readonly username?: string | undefined
  readonly password?: string | undefined
  readonly database?: string | undefined
  readonly timeoutMs?: number | undefined
  readonly namedQueries?: readonly NamedQuery[] | undefined
}

// --- Gateway-level settings ---

export interface GatewayLimits {
  /** Per-call adapter timeout. */
  readonly operationTimeoutMs?: number | undefined
  readonly maxConnectAttempts?: number | undefined
  readonly backoffBaseMs?: number | undefined
  readonly backoffMaxMs?: number | undefined
  /** Bound on building and connecting one adapter. */
  readonly connectTimeoutMs?: number | undefined
  readonly shutdownGraceMs?: number | undefined
  readonly healthCheckIntervalMs?: number | undefined
}

export interface GatewayConfig {
  readonly object?: ObjectStoreConfig | undefined
  readonly vector?: VectorStoreConfig | undefined
  readonly graph?: GraphStoreConfig | undefined
  readonly columnar?: ColumnarStoreConfig | undefined
  readonly limits?: GatewayLimits | undefined
}
