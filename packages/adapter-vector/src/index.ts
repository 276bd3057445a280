import type {
  ExecutionContext,
  MetadataValue,
  StorageAdapter,
  ValidationErrorEntry,
  VectorCommand,
  VectorMetric,
  VectorQueryInput,
  VectorStoreConfig,
} from '@polystore/gateway'
import {
  ConnectionError,
  isMetadataValue,
  isPlainRecord,
  NotFoundError,
  ValidationError,
  wrapBackendError,
} from '@polystore/gateway'
import { Pool, types } from 'pg'

// Parse INT8 as a JavaScript number instead of a string
types.setTypeParser(20, Number)

export type Embedder = (text: string, signal: AbortSignal) => Promise<readonly number[]>

export interface VectorAdapterOptions {
  /** Turns query text into an embedding. Without one, text queries are rejected. */
  readonly embedder?: Embedder | undefined
}

export interface VectorMatch {
  readonly id: string
  readonly score: number
  readonly metadata: Readonly<Record<string, MetadataValue>>
  readonly text?: string | undefined
}

export interface CollectionStats {
  readonly collection: string
  readonly dimension: number
  readonly metric: VectorMetric
  readonly total: number
}

export const DEFAULT_MAX_TOP_K = 100

// ── Metrics ────────────────────────────────────────────────────

interface MetricSpec {
  readonly operator: string
  /** Converts the operator's distance into a score where larger means more similar. */
  readonly score: (distance: number) => number
}

export const METRICS: Readonly<Record<VectorMetric, MetricSpec>> = {
  cosine: { operator: '<=>', score: (d) => 1 - d },
  l2: { operator: '<->', score: (d) => 1 / (1 + d) },
  // <#> returns the negated inner product
  innerProduct: { operator: '<#>', score: (d) => -d },
}

export function toVectorLiteral(embedding: readonly number[]): string {
  return `[${embedding.join(',')}]`
}

/** Connection target with any credentials removed, for error messages. */
export function describeTarget(config: VectorStoreConfig): string {
  if (config.connectionString !== undefined) {
    try {
      const url = new URL(config.connectionString)
      url.username = ''
      url.password = ''
      return url.toString()
    } catch {
      return 'postgres://<invalid connection string>'
    }
  }
  return `postgres://${config.host ?? 'localhost'}:${String(config.port ?? 5432)}/${config.database ?? ''}`
}

// ── Adapter ────────────────────────────────────────────────────

/**
 * Vector store adapter over PostgreSQL with the pgvector extension.
 * One table per collection; the table and extension are created on connect.
 */
export function createVectorAdapter(
  config: VectorStoreConfig,
  options: VectorAdapterOptions = {},
): StorageAdapter<'vector'> {
  const table = `"${config.collection}"`
  const metric: VectorMetric = config.metric ?? 'cosine'
  const maxTopK = config.maxTopK ?? DEFAULT_MAX_TOP_K
  const target = describeTarget(config)

  const pool = new Pool({
    connectionString: config.connectionString,
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    max: config.poolSize,
    statement_timeout: config.statementTimeoutMs,
  })

  function unreachable(err: unknown, message = `Vector store unreachable at ${target}`): ConnectionError {
    return new ConnectionError(
      'CONNECTION_FAILED',
      message,
      { paradigm: 'vector', url: target },
      err instanceof Error ? err : new Error(String(err)),
    )
  }

  function checkEmbedding(kind: string, embedding: readonly number[]): void {
    if (embedding.length !== config.dimension) {
      throw new ValidationError('vector', kind, [
        {
          code: 'DIMENSION_MISMATCH',
          message: `Embedding has ${embedding.length} dimensions, collection '${config.collection}' expects ${config.dimension}`,
          details: { parameter: 'embedding', expected: String(config.dimension), actual: String(embedding.length) },
        },
      ])
    }
    if (!embedding.every((x) => Number.isFinite(x))) {
      throw new ValidationError('vector', kind, [
        {
          code: 'INVALID_PARAMETER',
          message: 'Embedding values must be finite numbers',
          details: { parameter: 'embedding', expected: 'finite numbers' },
        },
      ])
    }
    // Cosine distance is undefined for a zero vector.
    if (metric === 'cosine' && embedding.every((x) => x === 0)) {
      throw new ValidationError('vector', kind, [
        {
          code: 'INVALID_PARAMETER',
          message: 'Embedding must not be the zero vector under the cosine metric',
          details: { parameter: 'embedding', expected: 'non-zero vector' },
        },
      ])
    }
  }

  async function resolveEmbedding(input: VectorQueryInput, signal: AbortSignal): Promise<readonly number[]> {
    if ('embedding' in input) return input.embedding
    if (options.embedder === undefined) {
      throw new ValidationError('vector', 'query', [
        {
          code: 'INVALID_PARAMETER',
          message: "Text queries need an embedder; pass 'embedding' instead",
          details: { parameter: 'text', expected: 'embedding' },
        },
      ])
    }
    return options.embedder(input.text, signal)
  }

  async function run(command: VectorCommand, signal: AbortSignal): Promise<unknown> {
    switch (command.kind) {
      case 'index':
        checkEmbedding('index', command.embedding)
        await pool.query(
          `INSERT INTO ${table} (id, embedding, metadata, text)
           VALUES ($1, $2::vector, $3::jsonb, $4)
           ON CONFLICT (id) DO UPDATE
           SET embedding = EXCLUDED.embedding, metadata = EXCLUDED.metadata, text = EXCLUDED.text, updated_at = now()`,
          [command.id, toVectorLiteral(command.embedding), JSON.stringify(command.metadata), command.text ?? null],
        )
        return undefined

      case 'query': {
        if (command.topK > maxTopK) {
          const entry: ValidationErrorEntry = {
            code: 'LIMIT_EXCEEDED',
            message: `topK must be at most ${maxTopK}, got ${command.topK}`,
            details: { parameter: 'topK', expected: `<= ${maxTopK}`, actual: String(command.topK) },
          }
          throw new ValidationError('vector', 'query', [entry])
        }
        const embedding = await resolveEmbedding(command.input, signal)
        checkEmbedding('query', embedding)

        const spec = METRICS[metric]
        const params: unknown[] = [toVectorLiteral(embedding), command.topK]
        let where = ''
        if (command.filter !== undefined && Object.keys(command.filter).length > 0) {
          params.push(JSON.stringify(command.filter))
          where = 'WHERE metadata @> $3::jsonb'
        }
        const result = await pool.query(
          `SELECT id, metadata, text, embedding ${spec.operator} $1::vector AS distance
           FROM ${table} ${where}
           ORDER BY distance
           LIMIT $2`,
          params,
        )
        return rankMatches(result.rows, spec)
      }

      case 'delete': {
        const result = await pool.query(`DELETE FROM ${table} WHERE id = $1`, [command.id])
        if (result.rowCount === 0) {
          throw new NotFoundError({ paradigm: 'vector', resource: 'vector', id: command.id })
        }
        return undefined
      }

      case 'stats': {
        const result = await pool.query(`SELECT count(*)::int8 AS total FROM ${table}`)
        const stats: CollectionStats = {
          collection: config.collection,
          dimension: config.dimension,
          metric,
          total: Number(result.rows[0]?.total ?? 0),
        }
        return stats
      }
    }
  }

  return {
    paradigm: 'vector',
    concurrency: 'concurrent',

    async connect(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        throw unreachable(err)
      }
      try {
        await pool.query('CREATE EXTENSION IF NOT EXISTS "vector"')
        await pool.query(
          `CREATE TABLE IF NOT EXISTS ${table} (
             id TEXT PRIMARY KEY,
             embedding vector(${config.dimension}) NOT NULL,
             metadata JSONB NOT NULL DEFAULT '{}',
             text TEXT,
             updated_at TIMESTAMPTZ NOT NULL DEFAULT now()
           )`,
        )
      } catch (err) {
        throw unreachable(err, `Failed to prepare vector collection '${config.collection}'`)
      }

      // An existing table keeps the dimension it was created with
      const existing = await pool
        .query(
          `SELECT atttypmod AS dimension FROM pg_attribute
           WHERE attrelid = $1::regclass AND attname = 'embedding'`,
          [table],
        )
        .catch((err: unknown) => {
          throw unreachable(err)
        })
      const stored = Number(existing.rows[0]?.dimension ?? config.dimension)
      if (stored !== config.dimension) {
        throw new ConnectionError(
          'CONNECTION_FAILED',
          `Vector collection '${config.collection}' has dimension ${stored}, configured ${config.dimension}`,
          { paradigm: 'vector', url: target },
        )
      }
    },

    async disconnect(): Promise<void> {
      await pool.end()
    },

    async healthCheck(): Promise<void> {
      try {
        await pool.query('SELECT 1')
      } catch (err) {
        throw unreachable(err)
      }
    },

    async execute(command: VectorCommand, context: ExecutionContext): Promise<unknown> {
      try {
        return await run(command, context.signal)
      } catch (err) {
        throw wrapBackendError(err, 'vector', command.kind)
      }
    },
  }
}

// ── Helpers ────────────────────────────────────────────────────

function rankMatches(rows: readonly Record<string, unknown>[], spec: MetricSpec): VectorMatch[] {
  const matches = rows.map((row): VectorMatch => {
    const match = {
      id: String(row.id),
      score: spec.score(Number(row.distance)),
      metadata: readMetadata(row.metadata),
    }
    return typeof row.text === 'string' ? { ...match, text: row.text } : match
  })
  return matches.sort((a, b) => b.score - a.score)
}

function readMetadata(value: unknown): Record<string, MetadataValue> {
  const metadata: Record<string, MetadataValue> = {}
  if (!isPlainRecord(value)) return metadata
  for (const [key, entry] of Object.entries(value)) {
    if (isMetadataValue(entry)) metadata[key] = entry
  }
  return metadata
}
